export const SIGNAL_KEYS = [
  'trend',
  'momentum',
  'volatility',
  'regime',
  'sector',
  'reversal',
  'breakout',
  'meanReversion'
] as const;

export type SignalKey = (typeof SIGNAL_KEYS)[number];

export type RawSignalVector = Record<SignalKey, number>;

// Same keys as the signal vector; every weight is non-negative.
export type WeightVector = Record<SignalKey, number>;

export const REGIME_LABELS = ['BULL', 'BEAR', 'RANGE', 'UNKNOWN'] as const;
export type RegimeLabel = (typeof REGIME_LABELS)[number];

export interface Candidate {
  symbol: string;
  signals: RawSignalVector;
  regime: RegimeLabel;
  sectorMomentum: number;
  baseEntryScore: number;
  estimatedEv?: number;
  timestamp: string; // ISO
}

export interface GateBreakdown {
  volatility: number;
  regimeConsistency: number;
  sectorAlignment: number;
  composite: number; // [GATE_MIN, 1]
}

/**
 * Minimal shape the admission controller needs. Scored candidates satisfy it,
 * and so do entries that failed validation (carrying `validationErrors`).
 */
export interface AdmissionCandidate {
  symbol: string;
  finalScore: number;
  estimatedEv?: number;
  timestamp?: string;
  validationErrors?: string[];
}

export interface ScoredCandidate extends AdmissionCandidate {
  candidate: Candidate;
  weights: WeightVector;
  tilts: string[];
  gates: GateBreakdown;
  delta: number;
}

export interface OpenPosition {
  symbol: string;
  scoreAtEntry: number;
  openedAt: string; // ISO
}

export interface PortfolioState {
  positions: OpenPosition[];
}

// symbol -> ISO expiry
export type CooldownRegistry = Record<string, string>;

export type BlockReason =
  | 'symbol_on_cooldown'
  | 'position_already_open'
  | 'expectancy_blocked:score_floor_breach'
  | 'expectancy_blocked:ev_below_floor'
  | 'max_new_positions_per_cycle'
  | 'max_positions_reached'
  | 'order_validation_failed';

export type DisplacementOutcome = 'displacement_disabled' | 'displacement_min_hold' | 'displacement_delta_too_small';

export interface BlockRecord {
  cycleId: string;
  symbol: string;
  reason: BlockReason;
  candidateScore: number | null;
  timestamp: string;
  detail?: string;
}

export type AdmissionDecision =
  | { action: 'admit'; symbol: string; finalScore: number }
  | {
      action: 'displace';
      symbol: string;
      finalScore: number;
      evictedSymbol: string;
      evictedScore: number;
      cooldownUntil: string;
    }
  | { action: 'reject'; symbol: string; finalScore: number | null; reason: BlockReason; detail?: string };

export interface DisplacementSettings {
  enabled: boolean;
  margin: number;
  cooldownMinutes: number;
  minHoldMinutes: number;
  /** Positions entered below this score can be displaced before `minHoldMinutes` has passed. */
  emergencyScoreBelow: number;
}

export interface AdmissionConfig {
  capacity: number;
  maxNewPositionsPerCycle: number;
  scoreFloor: number;
  evFloor: number;
  displacement: DisplacementSettings;
}

export interface FloorProfile {
  scoreFloor: number;
  evFloor: number;
}

export interface BotConfig {
  profile: string;
  capacity: number;
  maxNewPositionsPerCycle: number;
  displacement: DisplacementSettings;
  profiles: Record<string, FloorProfile>;
  uiPort?: number;
  uiBind?: string;
}

export interface CycleSummary {
  considered: number;
  admitted: number;
  displaced: number;
  rejected: number;
  openPositions: number;
  capacity: number;
  rejectionsByReason: Partial<Record<BlockReason, number>>;
}

export interface CycleResult {
  decisions: AdmissionDecision[];
  blockRecords: BlockRecord[];
  portfolio: PortfolioState;
  cooldowns: CooldownRegistry;
  summary: CycleSummary;
}

export type LedgerEventType =
  | 'CYCLE_STARTED'
  | 'CANDIDATES_SCORED'
  | 'CANDIDATE_ADMITTED'
  | 'POSITION_DISPLACED'
  | 'CANDIDATE_BLOCKED'
  | 'STATE_SAVED'
  | 'CYCLE_COMPLETED'
  | 'CYCLE_FAILED';

export interface LedgerEvent {
  id: string;
  cycleId: string;
  timestamp: string;
  type: LedgerEventType;
  details?: Record<string, unknown>;
}
