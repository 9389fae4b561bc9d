import 'dotenv/config';
import { Command } from 'commander';
import path from 'path';
import { parseAsOfDateTime } from '../core/time';
import { readJSONFile, round } from '../core/utils';
import { loadBotConfig, resolveAdmissionConfig, DEFAULT_CONFIG_PATH } from '../core/config';
import { parseCandidateFile, parseCandidateSnapshot } from '../core/schema';
import { AdmissionCandidate, AdmissionDecision, CycleResult, ScoredCandidate } from '../core/types';
import { rankCandidates, scoreCandidate } from '../strategy/scoring';
import { runAdmissionCycle } from '../risk/admissionController';
import { appendEvent, getCycleStatus, makeEvent, recordBlocks } from '../ledger/ledger';
import { writeCycleArtifact } from '../ledger/storage';
import {
  loadCooldownRegistry,
  loadPortfolioState,
  saveCooldownRegistry,
  savePortfolioState
} from '../state/stateStore';

export interface CycleOptions {
  candidatesFile: string;
  asof?: string;
  profile?: string;
  configPath?: string;
  stateDir?: string;
  dryRun?: boolean;
  force?: boolean;
}

export type CycleOutcome =
  | { status: 'skipped'; cycleId: string; asOf: string }
  | { status: 'completed'; cycleId: string; asOf: string; scored: ScoredCandidate[]; result: CycleResult };

const describeDecision = (d: AdmissionDecision): string => {
  switch (d.action) {
    case 'admit':
      return `ADMIT    ${d.symbol} score=${round(d.finalScore)}`;
    case 'displace':
      return `DISPLACE ${d.symbol} score=${round(d.finalScore)} evicts ${d.evictedSymbol} (${round(d.evictedScore)}) cooldown until ${d.cooldownUntil}`;
    case 'reject':
      return `REJECT   ${d.symbol} ${d.reason}${d.detail ? ` (${d.detail})` : ''}`;
  }
};

const decisionEvent = (cycleId: string, d: AdmissionDecision) => {
  if (d.action === 'admit') return makeEvent(cycleId, 'CANDIDATE_ADMITTED', { ...d });
  if (d.action === 'displace') return makeEvent(cycleId, 'POSITION_DISPLACED', { ...d });
  return makeEvent(cycleId, 'CANDIDATE_BLOCKED', { ...d });
};

export const runCycle = (options: CycleOptions): CycleOutcome => {
  const file = parseCandidateFile(readJSONFile(path.resolve(options.candidatesFile)));
  if (!file.success) {
    throw new Error(`Invalid candidates file ${options.candidatesFile}: ${file.errors.join('; ')}`);
  }
  const { asOf, cycleId } = parseAsOfDateTime(options.asof ?? file.value.asOf);

  const status = getCycleStatus(cycleId);
  if (!options.force && status !== 'UNKNOWN') {
    console.log(`Cycle ${cycleId} already exists with status ${status}. Use --force to rerun.`);
    return { status: 'skipped', cycleId, asOf };
  }

  const botConfig = loadBotConfig(options.configPath ?? DEFAULT_CONFIG_PATH);
  const config = resolveAdmissionConfig(botConfig, options.profile);
  const dryRun = Boolean(options.dryRun);

  appendEvent(makeEvent(cycleId, 'CYCLE_STARTED', { asOf, dryRun, candidates: file.value.entries.length, config }));
  try {
    const scored: ScoredCandidate[] = [];
    const invalid: AdmissionCandidate[] = [];
    for (const entry of file.value.entries) {
      const parsed = parseCandidateSnapshot(entry, asOf);
      if (parsed.success) {
        scored.push(scoreCandidate(parsed.value));
      } else {
        invalid.push({ symbol: parsed.symbol, finalScore: Number.NaN, validationErrors: parsed.errors });
      }
    }
    if (invalid.length) {
      console.warn(`Cycle ${cycleId}: ${invalid.length} malformed candidate(s) will be rejected`);
    }
    const ranked = rankCandidates<AdmissionCandidate>([...scored, ...invalid]);
    writeCycleArtifact(cycleId, 'scored.json', rankCandidates(scored));
    appendEvent(makeEvent(cycleId, 'CANDIDATES_SCORED', { scored: scored.length, invalid: invalid.length }));

    const portfolio = loadPortfolioState(options.stateDir);
    const cooldowns = loadCooldownRegistry(options.stateDir);
    const result = runAdmissionCycle(ranked, portfolio, cooldowns, config, { cycleId, now: asOf });

    writeCycleArtifact(cycleId, 'decisions.json', { asOf, decisions: result.decisions, summary: result.summary });
    for (const decision of result.decisions) {
      appendEvent(decisionEvent(cycleId, decision));
    }
    recordBlocks(result.blockRecords);

    if (!dryRun) {
      savePortfolioState(result.portfolio, options.stateDir);
      saveCooldownRegistry(result.cooldowns, options.stateDir);
      appendEvent(
        makeEvent(cycleId, 'STATE_SAVED', {
          positions: result.portfolio.positions.length,
          cooldowns: Object.keys(result.cooldowns).length
        })
      );
    }

    appendEvent(makeEvent(cycleId, 'CYCLE_COMPLETED', { ...result.summary }));
    const { admitted, displaced, rejected, openPositions, capacity } = result.summary;
    console.log(
      `Cycle ${cycleId}${dryRun ? ' (dry run)' : ''}: admitted=${admitted} displaced=${displaced} rejected=${rejected} open=${openPositions}/${capacity}`
    );
    result.decisions.forEach((d) => console.log(`  ${describeDecision(d)}`));
    return { status: 'completed', cycleId, asOf, scored, result };
  } catch (err) {
    appendEvent(makeEvent(cycleId, 'CYCLE_FAILED', { error: err instanceof Error ? err.message : String(err) }));
    throw err;
  }
};

interface CycleFlags {
  candidates: string;
  asof?: string;
  profile?: string;
  config?: string;
  stateDir?: string;
  dryRun: boolean;
  force: boolean;
}

const program = new Command();

program
  .requiredOption('--candidates <file>', 'candidate snapshot JSON for this cycle')
  .option('--asof <dateTime>', 'cycle timestamp (YYYY-MM-DD or YYYY-MM-DDTHH:mm, UTC)')
  .option('--profile <name>', 'floor profile (bootstrap | steady_state)')
  .option('--config <file>', 'bot config JSON', DEFAULT_CONFIG_PATH)
  .option('--state-dir <dir>', 'directory holding portfolio.json and cooldowns.json')
  .option('--dry-run', 'decide without saving state', false)
  .option('--force', 'rerun an existing cycle id', false);

if (require.main === module) {
  try {
    const opts = program.parse(process.argv).opts<CycleFlags>();
    runCycle({
      candidatesFile: opts.candidates,
      asof: opts.asof,
      profile: opts.profile,
      configPath: opts.config,
      stateDir: opts.stateDir,
      dryRun: opts.dryRun,
      force: opts.force
    });
  } catch (err) {
    console.error('bot:cycle failed', err);
    process.exitCode = 1;
  }
}
