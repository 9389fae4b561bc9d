import { z } from 'zod';
import { BotConfig, Candidate, CooldownRegistry, PortfolioState } from './types';
import { toMillis } from './time';
import { normalizeRegime, normalizeSectorMomentum, normalizeSignals } from '../strategy/signals';

export type Validation<T> = { success: true; value: T } | { success: false; errors: string[] };

const isoString = z.string().refine((val) => !Number.isNaN(toMillis(val)), {
  message: 'must be ISO date'
});

const formatIssues = (error: z.ZodError): string[] =>
  error.issues.map((i) => (i.path.length ? `${i.path.join('.')}: ${i.message}` : i.message));

const validateWith = <S extends z.ZodTypeAny>(schema: S, input: unknown): Validation<z.infer<S>> => {
  const result = schema.safeParse(input);
  if (result.success) {
    return { success: true, value: result.data };
  }
  return { success: false, errors: formatIssues(result.error) };
};

// --- configuration ---

const floorProfileSchema = z.object({
  scoreFloor: z.number().finite(),
  evFloor: z.number().finite()
});

const displacementSchema = z.object({
  enabled: z.boolean().default(true),
  margin: z.number().min(0).default(0),
  cooldownMinutes: z.number().min(0).default(360),
  minHoldMinutes: z.number().min(0).default(0),
  emergencyScoreBelow: z.number().finite().default(3)
});

export const botConfigSchema = z
  .object({
    profile: z.string().min(1),
    capacity: z.number().int().min(1),
    maxNewPositionsPerCycle: z.number().int().min(0),
    displacement: displacementSchema.default({}),
    profiles: z.record(z.string(), floorProfileSchema),
    uiPort: z.number().int().min(0).optional(),
    uiBind: z.string().optional()
  })
  .refine((cfg) => Object.prototype.hasOwnProperty.call(cfg.profiles, cfg.profile), {
    message: 'profile must name an entry of profiles',
    path: ['profile']
  });

export const validateBotConfig = (input: unknown): Validation<BotConfig> => validateWith(botConfigSchema, input);

// --- persisted state ---

export const openPositionSchema = z.object({
  symbol: z.string().trim().min(1).toUpperCase(),
  scoreAtEntry: z.number().finite(),
  openedAt: isoString
});

export const portfolioStateSchema = z.object({
  positions: z.array(openPositionSchema)
});

// Keys are matched against upper-cased candidate symbols; on a case clash the later expiry wins.
export const cooldownRegistrySchema = z.record(z.string(), isoString).transform((registry) => {
  const normalized: Record<string, string> = {};
  for (const [symbol, expiry] of Object.entries(registry)) {
    const key = symbol.trim().toUpperCase();
    const seen = normalized[key];
    if (!seen || toMillis(expiry) > toMillis(seen)) normalized[key] = expiry;
  }
  return normalized;
});

export const validatePortfolioState = (input: unknown): Validation<PortfolioState> =>
  validateWith(portfolioStateSchema, input);

export const validateCooldownRegistry = (input: unknown): Validation<CooldownRegistry> =>
  validateWith(cooldownRegistrySchema, input);

// --- candidate snapshots ---

const SNAPSHOT_ALIASES: Record<string, string> = {
  base_entry_score: 'baseEntryScore',
  sector_momentum: 'sectorMomentum',
  estimated_ev: 'estimatedEv',
  regime_label: 'regime'
};

const toCamelSnapshot = (raw: unknown): unknown => {
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) return raw;
  const out: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(raw)) {
    const target = SNAPSHOT_ALIASES[key] ?? key;
    if (out[target] === undefined) out[target] = value;
  }
  return out;
};

// Only identity and the base score are structural; everything else degrades to neutral.
const candidateSnapshotSchema = z.preprocess(
  toCamelSnapshot,
  z
    .object({
      symbol: z.string().trim().min(1, 'symbol is required'),
      baseEntryScore: z.number().finite(),
      signals: z.unknown().optional(),
      regime: z.unknown().optional(),
      sectorMomentum: z.unknown().optional(),
      estimatedEv: z.unknown().optional(),
      timestamp: z.unknown().optional()
    })
    .passthrough()
);

export type CandidateParse =
  | { success: true; value: Candidate }
  | { success: false; symbol: string; errors: string[] };

const rawSymbol = (raw: unknown): string => {
  if (typeof raw === 'object' && raw !== null && 'symbol' in raw) {
    const sym = raw.symbol;
    if (typeof sym === 'string' && sym.trim().length) return sym.trim();
  }
  return 'UNKNOWN';
};

export const parseCandidateSnapshot = (raw: unknown, fallbackTimestamp: string): CandidateParse => {
  const result = candidateSnapshotSchema.safeParse(raw);
  if (!result.success) {
    return { success: false, symbol: rawSymbol(raw), errors: formatIssues(result.error) };
  }
  const snap = result.data;
  // Flat feeds put `trend_signal` etc. next to the identity fields.
  const signals = normalizeSignals(snap.signals ?? snap);
  const ev = snap.estimatedEv;
  const timestamp =
    typeof snap.timestamp === 'string' && !Number.isNaN(Date.parse(snap.timestamp)) ? snap.timestamp : fallbackTimestamp;
  return {
    success: true,
    value: {
      symbol: snap.symbol.toUpperCase(),
      signals,
      regime: normalizeRegime(snap.regime),
      sectorMomentum: normalizeSectorMomentum(snap.sectorMomentum),
      baseEntryScore: snap.baseEntryScore,
      estimatedEv: typeof ev === 'number' && Number.isFinite(ev) ? ev : undefined,
      timestamp
    }
  };
};

const candidateFileSchema = z.union([
  z.array(z.unknown()),
  z.object({
    asOf: z.string().optional(),
    candidates: z.array(z.unknown())
  })
]);

export const parseCandidateFile = (input: unknown): Validation<{ asOf?: string; entries: unknown[] }> => {
  const result = validateWith(candidateFileSchema, input);
  if (!result.success) return result;
  const value = result.value;
  if (Array.isArray(value)) return { success: true, value: { entries: value } };
  return { success: true, value: { asOf: value.asOf, entries: value.candidates } };
};
