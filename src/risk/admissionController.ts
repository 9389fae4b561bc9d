import {
  AdmissionCandidate,
  AdmissionConfig,
  AdmissionDecision,
  BlockReason,
  BlockRecord,
  CooldownRegistry,
  CycleResult,
  CycleSummary,
  PortfolioState
} from '../core/types';
import { addMinutes } from '../core/time';
import {
  breachesScoreFloor,
  budgetExhausted,
  evaluateDisplacement,
  evBelowFloor,
  findWeakestPosition,
  hasCapacity,
  holdsSymbol,
  isOnCooldown,
  pruneExpiredCooldowns,
  validationProblems
} from './admissionRules';

export interface CycleContext {
  cycleId: string;
  now: string; // ISO
}

const summarize = (
  decisions: AdmissionDecision[],
  blockRecords: BlockRecord[],
  portfolio: PortfolioState,
  config: AdmissionConfig
): CycleSummary => {
  const rejectionsByReason: Partial<Record<BlockReason, number>> = {};
  for (const record of blockRecords) {
    rejectionsByReason[record.reason] = (rejectionsByReason[record.reason] ?? 0) + 1;
  }
  return {
    considered: decisions.length,
    admitted: decisions.filter((d) => d.action !== 'reject').length,
    displaced: decisions.filter((d) => d.action === 'displace').length,
    rejected: blockRecords.length,
    openPositions: portfolio.positions.length,
    capacity: config.capacity,
    rejectionsByReason
  };
};

/**
 * Admits, rejects or displaces each candidate in the order given (callers pass
 * the output of `rankCandidates`). Inputs are not mutated; the returned
 * portfolio and cooldown registry are the state for the next cycle.
 */
export const runAdmissionCycle = (
  ranked: AdmissionCandidate[],
  portfolio: PortfolioState,
  cooldowns: CooldownRegistry,
  config: AdmissionConfig,
  context: CycleContext
): CycleResult => {
  const { cycleId, now } = context;
  const decisions: AdmissionDecision[] = [];
  const blockRecords: BlockRecord[] = [];
  const state: PortfolioState = { positions: portfolio.positions.map((p) => ({ ...p })) };
  let registry = pruneExpiredCooldowns(cooldowns, now);
  let admitted = 0;

  const reject = (candidate: AdmissionCandidate, reason: BlockReason, detail?: string) => {
    const score = Number.isFinite(candidate.finalScore) ? candidate.finalScore : null;
    const symbol = typeof candidate.symbol === 'string' && candidate.symbol.trim() ? candidate.symbol : 'UNKNOWN';
    decisions.push({ action: 'reject', symbol, finalScore: score, reason, ...(detail ? { detail } : {}) });
    blockRecords.push({
      cycleId,
      symbol,
      reason,
      candidateScore: score,
      timestamp: now,
      ...(detail ? { detail } : {})
    });
  };

  for (const candidate of ranked) {
    const problems = validationProblems(candidate);
    if (problems.length) {
      reject(candidate, 'order_validation_failed', problems.join('; '));
      continue;
    }
    const { symbol, finalScore } = candidate;

    if (isOnCooldown(registry, symbol, now)) {
      reject(candidate, 'symbol_on_cooldown', `until ${registry[symbol]}`);
      continue;
    }

    if (holdsSymbol(state, symbol)) {
      reject(candidate, 'position_already_open');
      continue;
    }

    if (breachesScoreFloor(finalScore, config.scoreFloor)) {
      reject(candidate, 'expectancy_blocked:score_floor_breach');
      continue;
    }

    if (evBelowFloor(candidate.estimatedEv, config.evFloor)) {
      reject(candidate, 'expectancy_blocked:ev_below_floor');
      continue;
    }

    if (budgetExhausted(admitted, config)) {
      reject(candidate, 'max_new_positions_per_cycle');
      continue;
    }

    if (hasCapacity(state, config)) {
      state.positions.push({ symbol, scoreAtEntry: finalScore, openedAt: now });
      admitted += 1;
      decisions.push({ action: 'admit', symbol, finalScore });
      continue;
    }

    const weakest = findWeakestPosition(state);
    if (!weakest) {
      // capacity is at least 1, so a full book always has a weakest entry
      reject(candidate, 'max_positions_reached');
      continue;
    }
    const check = evaluateDisplacement(finalScore, weakest, config, now);
    if (!check.allowed) {
      reject(candidate, 'max_positions_reached', check.outcome);
      continue;
    }

    const cooldownUntil = addMinutes(now, config.displacement.cooldownMinutes);
    state.positions = state.positions.filter((p) => p !== weakest);
    state.positions.push({ symbol, scoreAtEntry: finalScore, openedAt: now });
    registry = { ...registry, [weakest.symbol]: cooldownUntil };
    admitted += 1;
    decisions.push({
      action: 'displace',
      symbol,
      finalScore,
      evictedSymbol: weakest.symbol,
      evictedScore: weakest.scoreAtEntry,
      cooldownUntil
    });
  }

  return {
    decisions,
    blockRecords,
    portfolio: state,
    cooldowns: registry,
    summary: summarize(decisions, blockRecords, state, config)
  };
};
