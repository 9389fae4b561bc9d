import { GateBreakdown, RawSignalVector, RegimeLabel } from '../core/types';

export const GATE_MIN = 0.1;
export const GATE_MAX = 1.0;

export const CHOP_VOLATILITY_GATE = 0.25;
export const EXCESS_VOLATILITY_THRESHOLD = 0.7;
export const EXCESS_VOLATILITY_GATE = 0.5;
export const REGIME_CONTRADICTION_GATE = 0.5;
export const SECTOR_ALIGNED_MULT = 1.2;
export const SECTOR_OPPOSED_MULT = 0.5;

// Negative volatility signal means chop; above the threshold it is excessive.
export const volatilityGate = (volatilitySignal: number): number => {
  if (volatilitySignal < 0) return CHOP_VOLATILITY_GATE;
  if (volatilitySignal > EXCESS_VOLATILITY_THRESHOLD) return EXCESS_VOLATILITY_GATE;
  return 1;
};

export const regimeConsistencyGate = (regime: RegimeLabel, trend: number, momentum: number): number => {
  if (regime === 'BULL' && trend < 0 && momentum < 0) return REGIME_CONTRADICTION_GATE;
  if (regime === 'BEAR' && trend > 0 && momentum > 0) return REGIME_CONTRADICTION_GATE;
  return 1;
};

export const sectorAlignmentMultiplier = (sectorMomentum: number, trend: number): number => {
  if (!sectorMomentum || !trend) return 1;
  return Math.sign(sectorMomentum) === Math.sign(trend) ? SECTOR_ALIGNED_MULT : SECTOR_OPPOSED_MULT;
};

export const clampGate = (value: number): number => {
  if (Number.isNaN(value)) return GATE_MIN;
  return Math.min(GATE_MAX, Math.max(GATE_MIN, value));
};

export const compositeGate = (signals: RawSignalVector, regime: RegimeLabel, sectorMomentum: number): GateBreakdown => {
  const volatility = volatilityGate(signals.volatility);
  const regimeConsistency = regimeConsistencyGate(regime, signals.trend, signals.momentum);
  const sectorAlignment = sectorAlignmentMultiplier(sectorMomentum, signals.trend);
  return {
    volatility,
    regimeConsistency,
    sectorAlignment,
    composite: clampGate(volatility * regimeConsistency * sectorAlignment)
  };
};
