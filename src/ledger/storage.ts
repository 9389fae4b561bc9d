import fs from 'fs';
import path from 'path';
import { ensureDir, writeJSONFile } from '../core/utils';
import { BlockRecord, LedgerEvent } from '../core/types';

// Resolved per call so LEDGER_FILE / BLOCKS_FILE / RUNS_DIR can change between runs.
export const getLedgerFile = () =>
  process.env.LEDGER_FILE
    ? path.resolve(process.env.LEDGER_FILE)
    : path.join(path.resolve(process.cwd(), 'ledger'), 'events.jsonl');

export const getBlocksFile = () =>
  process.env.BLOCKS_FILE
    ? path.resolve(process.env.BLOCKS_FILE)
    : path.join(path.resolve(process.cwd(), 'ledger'), 'blocks.jsonl');

export const getRunsDir = () => path.resolve(process.env.RUNS_DIR || path.join(process.cwd(), 'runs'));

const appendLines = (file: string, rows: unknown[]) => {
  if (!rows.length) return;
  ensureDir(path.dirname(file));
  fs.appendFileSync(file, rows.map((row) => `${JSON.stringify(row)}\n`).join(''));
};

const readLines = <T>(file: string, isRow: (value: unknown) => value is T): T[] => {
  if (!fs.existsSync(file)) return [];
  const content = fs.readFileSync(file, 'utf-8');
  const lines = content.trim().length ? content.trim().split('\n') : [];
  const rows: T[] = [];
  for (const line of lines) {
    let parsed: unknown;
    try {
      parsed = JSON.parse(line);
    } catch {
      // a torn trailing write; later lines are still readable
      continue;
    }
    if (isRow(parsed)) rows.push(parsed);
  }
  return rows;
};

const isObject = (value: unknown): value is Record<string, unknown> => typeof value === 'object' && value !== null;

const isLedgerEvent = (value: unknown): value is LedgerEvent =>
  isObject(value) && typeof value.cycleId === 'string' && typeof value.type === 'string' && typeof value.timestamp === 'string';

const isBlockRecord = (value: unknown): value is BlockRecord =>
  isObject(value) && typeof value.cycleId === 'string' && typeof value.symbol === 'string' && typeof value.reason === 'string';

export const appendLedgerEvent = (event: LedgerEvent) => {
  appendLines(getLedgerFile(), [event]);
};

export const readLedgerEvents = (): LedgerEvent[] => readLines(getLedgerFile(), isLedgerEvent);

export const readEventsForCycle = (cycleId: string): LedgerEvent[] =>
  readLedgerEvents().filter((e) => e.cycleId === cycleId);

export const appendBlockRecords = (records: BlockRecord[]) => {
  appendLines(getBlocksFile(), records);
};

export const readBlockRecords = (): BlockRecord[] => readLines(getBlocksFile(), isBlockRecord);

export const writeCycleArtifact = (cycleId: string, fileName: string, data: unknown) => {
  writeJSONFile(path.join(getRunsDir(), cycleId, fileName), data);
};

export const readCycleArtifact = (cycleId: string, fileName: string): unknown => {
  const filePath = path.join(getRunsDir(), cycleId, fileName);
  if (!fs.existsSync(filePath)) return undefined;
  return JSON.parse(fs.readFileSync(filePath, 'utf-8'));
};
