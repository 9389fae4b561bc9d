import { AdmissionCandidate, AdmissionConfig, CooldownRegistry, OpenPosition, PortfolioState } from '../src/core/types';
import { runAdmissionCycle } from '../src/risk/admissionController';
import { isOnCooldown } from '../src/risk/admissionRules';
import { rankCandidates } from '../src/strategy/scoring';

const now = '2026-10-19T14:30:00.000Z';
const ctx = { cycleId: '2026-10-19T14-30', now };

const baseConfig: AdmissionConfig = {
  capacity: 16,
  maxNewPositionsPerCycle: 6,
  scoreFloor: 1.5,
  evFloor: -0.02,
  displacement: { enabled: true, margin: 0, cooldownMinutes: 360, minHoldMinutes: 0, emergencyScoreBelow: 3 }
};

const position = (symbol: string, scoreAtEntry: number, openedAt = '2026-10-18T15:00:00.000Z'): OpenPosition => ({
  symbol,
  scoreAtEntry,
  openedAt
});

const fullBook = (): PortfolioState => ({
  positions: [position('WEAK', 3.5), ...Array.from({ length: 15 }, (_, i) => position(`HELD${i}`, 4 + i * 0.1))]
});

const empty = (): PortfolioState => ({ positions: [] });

describe('Admission controller', () => {
  it('displaces the weakest position when a stronger candidate arrives at capacity', () => {
    const portfolio = fullBook();
    const result = runAdmissionCycle([{ symbol: 'F', finalScore: 3.73 }], portfolio, {}, baseConfig, ctx);

    expect(result.decisions).toEqual([
      {
        action: 'displace',
        symbol: 'F',
        finalScore: 3.73,
        evictedSymbol: 'WEAK',
        evictedScore: 3.5,
        cooldownUntil: '2026-10-19T20:30:00.000Z'
      }
    ]);
    expect(result.blockRecords).toEqual([]);
    expect(result.portfolio.positions).toHaveLength(16);
    expect(result.portfolio.positions.map((p) => p.symbol)).toContain('F');
    expect(result.portfolio.positions.map((p) => p.symbol)).not.toContain('WEAK');
    expect(result.cooldowns).toEqual({ WEAK: '2026-10-19T20:30:00.000Z' });
    expect(result.portfolio.positions.find((p) => p.symbol === 'F')).toEqual({
      symbol: 'F',
      scoreAtEntry: 3.73,
      openedAt: now
    });
  });

  it('blocks a candidate under the score floor and leaves the book alone', () => {
    const portfolio: PortfolioState = { positions: [position('HELD', 2)] };
    const result = runAdmissionCycle([{ symbol: 'LOW', finalScore: 1.2 }], portfolio, {}, baseConfig, ctx);

    expect(result.decisions).toEqual([
      { action: 'reject', symbol: 'LOW', finalScore: 1.2, reason: 'expectancy_blocked:score_floor_breach' }
    ]);
    expect(result.blockRecords).toEqual([
      {
        cycleId: '2026-10-19T14-30',
        symbol: 'LOW',
        reason: 'expectancy_blocked:score_floor_breach',
        candidateScore: 1.2,
        timestamp: now
      }
    ]);
    expect(result.portfolio).toEqual(portfolio);
  });

  it('admits only the per-cycle budget, highest scores first', () => {
    const candidates = Array.from({ length: 20 }, (_, i) => ({
      symbol: `S${String(i).padStart(2, '0')}`,
      finalScore: 5 - i * 0.1
    }));
    const config = { ...baseConfig, maxNewPositionsPerCycle: 5 };
    const result = runAdmissionCycle(rankCandidates(candidates), empty(), {}, config, ctx);

    const admitted = result.decisions.filter((d) => d.action === 'admit').map((d) => d.symbol);
    expect(admitted).toEqual(['S00', 'S01', 'S02', 'S03', 'S04']);
    expect(result.blockRecords).toHaveLength(15);
    expect(result.blockRecords.every((r) => r.reason === 'max_new_positions_per_cycle')).toBe(true);
    expect(result.summary).toEqual({
      considered: 20,
      admitted: 5,
      displaced: 0,
      rejected: 15,
      openPositions: 5,
      capacity: 16,
      rejectionsByReason: { max_new_positions_per_cycle: 15 }
    });
  });

  it('rejects a symbol on cooldown even with the top score', () => {
    const cooldowns: CooldownRegistry = { TOP: '2026-10-19T18:00:00.000Z' };
    const ranked = rankCandidates([
      { symbol: 'TOP', finalScore: 9 },
      { symbol: 'NEXT', finalScore: 3 }
    ]);
    const result = runAdmissionCycle(ranked, empty(), cooldowns, baseConfig, ctx);

    expect(result.decisions[0]).toEqual({
      action: 'reject',
      symbol: 'TOP',
      finalScore: 9,
      reason: 'symbol_on_cooldown',
      detail: 'until 2026-10-19T18:00:00.000Z'
    });
    expect(result.decisions[1]).toEqual({ action: 'admit', symbol: 'NEXT', finalScore: 3 });
    expect(result.cooldowns).toEqual(cooldowns);
  });

  it('prunes expired cooldowns and admits the symbol again', () => {
    const cooldowns: CooldownRegistry = { BACK: '2026-10-19T12:00:00.000Z' };
    const result = runAdmissionCycle([{ symbol: 'BACK', finalScore: 3 }], empty(), cooldowns, baseConfig, ctx);
    expect(result.decisions).toEqual([{ action: 'admit', symbol: 'BACK', finalScore: 3 }]);
    expect(result.cooldowns).toEqual({});
  });

  it('isolates malformed candidates', () => {
    const ranked: AdmissionCandidate[] = [
      { symbol: 'GOOD', finalScore: 3 },
      { symbol: '', finalScore: 2.5 },
      { symbol: 'NAN', finalScore: Number.NaN },
      { symbol: 'UNKNOWN', finalScore: Number.NaN, validationErrors: ['symbol: Required'] },
      { symbol: 'LATER', finalScore: 2 }
    ];
    const result = runAdmissionCycle(ranked, empty(), {}, baseConfig, ctx);

    expect(result.decisions.map((d) => [d.symbol, d.action])).toEqual([
      ['GOOD', 'admit'],
      ['UNKNOWN', 'reject'],
      ['NAN', 'reject'],
      ['UNKNOWN', 'reject'],
      ['LATER', 'admit']
    ]);
    expect(result.blockRecords.map((r) => [r.reason, r.candidateScore, r.detail])).toEqual([
      ['order_validation_failed', 2.5, 'symbol: missing'],
      ['order_validation_failed', null, 'finalScore: not finite'],
      ['order_validation_failed', null, 'symbol: Required; finalScore: not finite']
    ]);
  });

  it('applies the EV floor only when an estimate is present', () => {
    const ranked: AdmissionCandidate[] = [
      { symbol: 'NEG', finalScore: 4, estimatedEv: -0.05 },
      { symbol: 'OK', finalScore: 3, estimatedEv: -0.01 },
      { symbol: 'NOEV', finalScore: 2 },
      { symbol: 'BADEV', finalScore: 1.9, estimatedEv: Number.NaN }
    ];
    const result = runAdmissionCycle(ranked, empty(), {}, baseConfig, ctx);
    expect(result.decisions.map((d) => (d.action === 'reject' ? d.reason : d.action))).toEqual([
      'expectancy_blocked:ev_below_floor',
      'admit',
      'admit',
      'admit'
    ]);
  });

  it('does not open a second position in a held symbol', () => {
    const portfolio: PortfolioState = { positions: [position('DUP', 2)] };
    const result = runAdmissionCycle(
      [
        { symbol: 'DUP', finalScore: 5 },
        { symbol: 'NEW', finalScore: 4 },
        { symbol: 'NEW', finalScore: 3.9 }
      ],
      portfolio,
      {},
      baseConfig,
      ctx
    );
    expect(result.decisions.map((d) => (d.action === 'reject' ? d.reason : d.action))).toEqual([
      'position_already_open',
      'admit',
      'position_already_open'
    ]);
  });

  it('lets later candidates see earlier admissions and displacements', () => {
    const config = { ...baseConfig, capacity: 2 };
    const portfolio: PortfolioState = { positions: [position('OLD', 2)] };
    const result = runAdmissionCycle(
      [
        { symbol: 'A', finalScore: 4 },
        { symbol: 'B', finalScore: 3 },
        { symbol: 'C', finalScore: 1.9 },
        { symbol: 'OLD', finalScore: 1.8 }
      ],
      portfolio,
      {},
      config,
      ctx
    );

    expect(result.decisions).toEqual([
      { action: 'admit', symbol: 'A', finalScore: 4 },
      {
        action: 'displace',
        symbol: 'B',
        finalScore: 3,
        evictedSymbol: 'OLD',
        evictedScore: 2,
        cooldownUntil: '2026-10-19T20:30:00.000Z'
      },
      {
        action: 'reject',
        symbol: 'C',
        finalScore: 1.9,
        reason: 'max_positions_reached',
        detail: 'displacement_delta_too_small'
      },
      {
        action: 'reject',
        symbol: 'OLD',
        finalScore: 1.8,
        reason: 'symbol_on_cooldown',
        detail: 'until 2026-10-19T20:30:00.000Z'
      }
    ]);
    expect(result.portfolio.positions.map((p) => p.symbol)).toEqual(['A', 'B']);
  });

  it('rejects at capacity when the candidate only ties the weakest position', () => {
    const result = runAdmissionCycle([{ symbol: 'TIE', finalScore: 3.5 }], fullBook(), {}, baseConfig, ctx);
    expect(result.decisions).toEqual([
      {
        action: 'reject',
        symbol: 'TIE',
        finalScore: 3.5,
        reason: 'max_positions_reached',
        detail: 'displacement_delta_too_small'
      }
    ]);
    expect(result.cooldowns).toEqual({});
  });

  it('reports why displacement was refused', () => {
    const disabled = { ...baseConfig, displacement: { ...baseConfig.displacement, enabled: false } };
    expect(runAdmissionCycle([{ symbol: 'X', finalScore: 9 }], fullBook(), {}, disabled, ctx).blockRecords[0].detail).toBe(
      'displacement_disabled'
    );

    const hold = { ...baseConfig, displacement: { ...baseConfig.displacement, minHoldMinutes: 30 } };
    const young = fullBook();
    young.positions[0] = position('WEAK', 3.5, '2026-10-19T14:20:00.000Z');
    expect(runAdmissionCycle([{ symbol: 'X', finalScore: 9 }], young, {}, hold, ctx).blockRecords[0].detail).toBe(
      'displacement_min_hold'
    );
  });

  it('displaces when the advantage equals the margin and not below it', () => {
    const withMargin = { ...baseConfig, displacement: { ...baseConfig.displacement, margin: 0.5 } };

    const exact = runAdmissionCycle([{ symbol: 'EVEN', finalScore: 4 }], fullBook(), {}, withMargin, ctx);
    expect(exact.decisions).toEqual([
      {
        action: 'displace',
        symbol: 'EVEN',
        finalScore: 4,
        evictedSymbol: 'WEAK',
        evictedScore: 3.5,
        cooldownUntil: '2026-10-19T20:30:00.000Z'
      }
    ]);

    const short = runAdmissionCycle([{ symbol: 'SHORT', finalScore: 3.9 }], fullBook(), {}, withMargin, ctx);
    expect(short.decisions).toEqual([
      {
        action: 'reject',
        symbol: 'SHORT',
        finalScore: 3.9,
        reason: 'max_positions_reached',
        detail: 'displacement_delta_too_small'
      }
    ]);
    expect(short.portfolio.positions.map((p) => p.symbol)).toContain('WEAK');
  });

  it('displaces a young position entered below the emergency score', () => {
    const hold = { ...baseConfig, displacement: { ...baseConfig.displacement, minHoldMinutes: 30 } };
    const book = fullBook();
    book.positions[0] = position('SHAKY', 2.5, '2026-10-19T14:20:00.000Z');

    const result = runAdmissionCycle([{ symbol: 'X', finalScore: 3.1 }], book, {}, hold, ctx);
    expect(result.decisions).toEqual([
      {
        action: 'displace',
        symbol: 'X',
        finalScore: 3.1,
        evictedSymbol: 'SHAKY',
        evictedScore: 2.5,
        cooldownUntil: '2026-10-19T20:30:00.000Z'
      }
    ]);

    const strict = { ...hold, displacement: { ...hold.displacement, emergencyScoreBelow: 0 } };
    expect(runAdmissionCycle([{ symbol: 'X', finalScore: 3.1 }], book, {}, strict, ctx).blockRecords[0].detail).toBe(
      'displacement_min_hold'
    );
  });

  it('does not mutate its inputs', () => {
    const portfolio = fullBook();
    const cooldowns: CooldownRegistry = { OLDCOOL: '2026-10-19T10:00:00.000Z' };
    const portfolioBefore = JSON.parse(JSON.stringify(portfolio));
    const cooldownsBefore = { ...cooldowns };
    runAdmissionCycle([{ symbol: 'F', finalScore: 3.73 }], portfolio, cooldowns, baseConfig, ctx);
    expect(portfolio).toEqual(portfolioBefore);
    expect(cooldowns).toEqual(cooldownsBefore);
  });

  it('holds the budget, capacity and cooldown invariants over many cycles', () => {
    let seed = 7;
    const next = () => {
      seed = (seed * 16807) % 2147483647;
      return seed / 2147483647;
    };
    const config: AdmissionConfig = { ...baseConfig, capacity: 5, maxNewPositionsPerCycle: 3, scoreFloor: 1 };
    let portfolio = empty();
    let cooldowns: CooldownRegistry = {};
    for (let cycle = 0; cycle < 40; cycle++) {
      const cycleNow = new Date(Date.parse(now) + cycle * 60 * 60 * 1000).toISOString();
      const candidates = Array.from({ length: 8 }, () => ({
        symbol: `SYM${Math.floor(next() * 12)}`,
        finalScore: Math.round(next() * 500) / 100
      }));
      const result = runAdmissionCycle(rankCandidates(candidates), portfolio, cooldowns, config, {
        cycleId: `c${cycle}`,
        now: cycleNow
      });
      const admissions = result.decisions.filter((d) => d.action !== 'reject').length;
      expect(admissions).toBeLessThanOrEqual(config.maxNewPositionsPerCycle);
      expect(result.portfolio.positions.length).toBeLessThanOrEqual(config.capacity);
      expect(result.blockRecords).toHaveLength(result.decisions.length - admissions);
      for (const pos of result.portfolio.positions) {
        expect(isOnCooldown(result.cooldowns, pos.symbol, cycleNow)).toBe(false);
      }
      portfolio = result.portfolio;
      cooldowns = result.cooldowns;
    }
  });
});
