import { RegimeLabel, SIGNAL_KEYS, SignalKey, WeightVector } from '../core/types';

export const BASE_WEIGHTS: Readonly<WeightVector> = {
  trend: 0.04,
  momentum: 0.035,
  volatility: 0.02,
  regime: 0.025,
  sector: 0.025,
  reversal: 0.02,
  breakout: 0.03,
  meanReversion: 0.02
};

export const BOOST = 1.25;
export const DAMP = 0.75;

interface RegimeTilt {
  boost: SignalKey[];
  damp: SignalKey[];
}

const REGIME_TILTS: Record<RegimeLabel, RegimeTilt> = {
  BULL: { boost: ['trend', 'momentum', 'breakout'], damp: ['reversal', 'meanReversion'] },
  BEAR: { boost: ['trend', 'momentum', 'reversal'], damp: ['meanReversion'] },
  RANGE: { boost: ['reversal', 'meanReversion'], damp: ['trend', 'breakout'] },
  UNKNOWN: { boost: [], damp: [] }
};

export const weightsFor = (regime: RegimeLabel): WeightVector => {
  const tilt = REGIME_TILTS[regime] ?? REGIME_TILTS.UNKNOWN;
  const weights: WeightVector = { ...BASE_WEIGHTS };
  for (const key of tilt.boost) {
    weights[key] *= BOOST;
  }
  for (const key of tilt.damp) {
    weights[key] *= DAMP;
  }
  for (const key of SIGNAL_KEYS) {
    weights[key] = Math.max(0, weights[key]);
  }
  return weights;
};

/** Human-readable list of the tilts applied for a regime, e.g. `bull_boost_trend`. */
export const regimeTiltReasons = (regime: RegimeLabel): string[] => {
  const tilt = REGIME_TILTS[regime] ?? REGIME_TILTS.UNKNOWN;
  const prefix = regime.toLowerCase();
  if (!tilt.boost.length && !tilt.damp.length) return ['no_regime'];
  return [...tilt.boost.map((k) => `${prefix}_boost_${k}`), ...tilt.damp.map((k) => `${prefix}_damp_${k}`)];
};
