import {
  AdmissionCandidate,
  AdmissionConfig,
  CooldownRegistry,
  DisplacementOutcome,
  OpenPosition,
  PortfolioState
} from '../core/types';
import { minutesBetween, toMillis } from '../core/time';

export const validationProblems = (candidate: AdmissionCandidate): string[] => {
  const problems = [...(candidate.validationErrors ?? [])];
  if (typeof candidate.symbol !== 'string' || !candidate.symbol.trim()) {
    problems.push('symbol: missing');
  }
  if (typeof candidate.finalScore !== 'number' || !Number.isFinite(candidate.finalScore)) {
    problems.push('finalScore: not finite');
  }
  return problems;
};

export const isOnCooldown = (cooldowns: CooldownRegistry, symbol: string, now: string): boolean => {
  const expiry = cooldowns[symbol];
  if (!expiry) return false;
  const expiryTs = toMillis(expiry);
  if (Number.isNaN(expiryTs)) return false;
  return expiryTs > toMillis(now);
};

export const pruneExpiredCooldowns = (cooldowns: CooldownRegistry, now: string): CooldownRegistry =>
  Object.fromEntries(Object.entries(cooldowns).filter(([symbol]) => isOnCooldown(cooldowns, symbol, now)));

export const holdsSymbol = (portfolio: PortfolioState, symbol: string): boolean =>
  portfolio.positions.some((p) => p.symbol === symbol);

export const breachesScoreFloor = (finalScore: number, scoreFloor: number): boolean => finalScore < scoreFloor;

// A missing or non-finite estimate means the EV floor does not apply.
export const evBelowFloor = (estimatedEv: number | undefined, evFloor: number): boolean =>
  estimatedEv !== undefined && Number.isFinite(estimatedEv) && estimatedEv < evFloor;

export const budgetExhausted = (admittedThisCycle: number, config: AdmissionConfig): boolean =>
  admittedThisCycle >= config.maxNewPositionsPerCycle;

export const hasCapacity = (portfolio: PortfolioState, config: AdmissionConfig): boolean =>
  portfolio.positions.length < config.capacity;

/** Lowest entry score; ties go to the oldest position, then symbol. */
export const findWeakestPosition = (portfolio: PortfolioState): OpenPosition | undefined =>
  portfolio.positions.reduce<OpenPosition | undefined>((weakest, pos) => {
    if (!weakest) return pos;
    if (pos.scoreAtEntry !== weakest.scoreAtEntry) return pos.scoreAtEntry < weakest.scoreAtEntry ? pos : weakest;
    const posTs = toMillis(pos.openedAt);
    const weakestTs = toMillis(weakest.openedAt);
    if (posTs !== weakestTs) return posTs < weakestTs ? pos : weakest;
    return pos.symbol < weakest.symbol ? pos : weakest;
  }, undefined);

export type DisplacementCheck = { allowed: true } | { allowed: false; outcome: DisplacementOutcome };

export const evaluateDisplacement = (
  finalScore: number,
  weakest: OpenPosition,
  config: AdmissionConfig,
  now: string
): DisplacementCheck => {
  const settings = config.displacement;
  if (!settings.enabled) return { allowed: false, outcome: 'displacement_disabled' };
  const emergency = weakest.scoreAtEntry < settings.emergencyScoreBelow;
  if (!emergency && settings.minHoldMinutes > 0 && minutesBetween(weakest.openedAt, now) < settings.minHoldMinutes) {
    return { allowed: false, outcome: 'displacement_min_hold' };
  }
  const advantage = finalScore - weakest.scoreAtEntry;
  if (!(advantage > 0) || advantage < settings.margin) {
    return { allowed: false, outcome: 'displacement_delta_too_small' };
  }
  return { allowed: true };
};
