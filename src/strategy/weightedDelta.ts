import { RawSignalVector, SIGNAL_KEYS, WeightVector } from '../core/types';

export const DELTA_BOUND = 0.25;

export const clampDelta = (value: number): number => {
  if (Number.isNaN(value)) return 0;
  return Math.min(DELTA_BOUND, Math.max(-DELTA_BOUND, value));
};

const valueOrZero = (value: number | undefined): number => (value !== undefined && Number.isFinite(value) ? value : 0);

export const weightedSum = (signals: Partial<RawSignalVector>, weights: Partial<WeightVector>): number =>
  SIGNAL_KEYS.reduce((acc, key) => acc + valueOrZero(signals[key]) * valueOrZero(weights[key]), 0);

/**
 * Bounded score adjustment: `gate * Σ signals[k] * weights[k]`, clamped to ±DELTA_BOUND.
 * Keys absent on either side contribute nothing.
 */
export const computeWeightedDelta = (
  signals: Partial<RawSignalVector>,
  weights: Partial<WeightVector>,
  gate: number
): number => clampDelta(gate * weightedSum(signals, weights));

export const integrateScore = (baseEntryScore: number, delta: number): number => baseEntryScore + delta;
