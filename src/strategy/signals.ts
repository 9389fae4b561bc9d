import { REGIME_LABELS, RawSignalVector, RegimeLabel, SIGNAL_KEYS, SignalKey } from '../core/types';

const SNAKE_NAMES: Record<SignalKey, string> = {
  trend: 'trend',
  momentum: 'momentum',
  volatility: 'volatility',
  regime: 'regime',
  sector: 'sector',
  reversal: 'reversal',
  breakout: 'breakout',
  meanReversion: 'mean_reversion'
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

export const finiteOrZero = (value: unknown): number =>
  typeof value === 'number' && Number.isFinite(value) ? value : 0;

export const neutralSignals = (): RawSignalVector => ({
  trend: 0,
  momentum: 0,
  volatility: 0,
  regime: 0,
  sector: 0,
  reversal: 0,
  breakout: 0,
  meanReversion: 0
});

const lookupSignal = (raw: Record<string, unknown>, key: SignalKey): number => {
  const snake = SNAKE_NAMES[key];
  const found = [raw[key], raw[snake], raw[`${snake}_signal`]].find(
    (v): v is number => typeof v === 'number' && Number.isFinite(v)
  );
  return found ?? 0;
};

// Feeds spell keys either way (`meanReversion`, `mean_reversion`, `mean_reversion_signal`).
// Anything missing or non-numeric counts as no opinion.
export const normalizeSignals = (raw: unknown): RawSignalVector => {
  const signals = neutralSignals();
  if (!isRecord(raw)) return signals;
  for (const key of SIGNAL_KEYS) {
    signals[key] = lookupSignal(raw, key);
  }
  return signals;
};

export const normalizeRegime = (raw: unknown): RegimeLabel => {
  if (typeof raw !== 'string') return 'UNKNOWN';
  const label = raw.trim().toUpperCase();
  return REGIME_LABELS.find((known) => known === label) ?? 'UNKNOWN';
};

export const normalizeSectorMomentum = (raw: unknown): number => finiteOrZero(raw);
