import crypto from 'crypto';
import { BlockReason, BlockRecord, LedgerEvent, LedgerEventType } from '../core/types';
import { toMillis } from '../core/time';
import { appendBlockRecords, appendLedgerEvent, readBlockRecords, readEventsForCycle, readLedgerEvents } from './storage';

export const makeEvent = (cycleId: string, type: LedgerEventType, details?: Record<string, unknown>): LedgerEvent => ({
  id: crypto.randomUUID(),
  cycleId,
  timestamp: new Date().toISOString(),
  type,
  details
});

export const appendEvent = (event: LedgerEvent) => {
  appendLedgerEvent(event);
};

export const recordBlocks = (records: BlockRecord[]) => {
  appendBlockRecords(records);
};

export type CycleStatus = 'IN_PROGRESS' | 'COMPLETED' | 'FAILED' | 'UNKNOWN';

export const getCycleStatus = (cycleId: string): CycleStatus => {
  const events = readEventsForCycle(cycleId);
  if (!events.length) return 'UNKNOWN';
  if (events.some((e) => e.type === 'CYCLE_FAILED')) return 'FAILED';
  if (events.some((e) => e.type === 'CYCLE_COMPLETED')) return 'COMPLETED';
  return 'IN_PROGRESS';
};

export const getRecentCycles = (limit = 10): { cycleId: string; status: CycleStatus; lastEventAt: string }[] => {
  const latest = new Map<string, string>();
  for (const evt of readLedgerEvents()) {
    const seen = latest.get(evt.cycleId);
    if (!seen || toMillis(evt.timestamp) > toMillis(seen)) {
      latest.set(evt.cycleId, evt.timestamp);
    }
  }
  return Array.from(latest.entries())
    .sort(([, a], [, b]) => toMillis(b) - toMillis(a))
    .slice(0, limit)
    .map(([cycleId, lastEventAt]) => ({ cycleId, status: getCycleStatus(cycleId), lastEventAt }));
};

export interface BlockQuery {
  cycleId?: string;
  symbol?: string;
  reason?: BlockReason | string;
  limit?: number;
}

/** Newest records last, as written; `limit` keeps the tail. */
export const queryBlockRecords = (query: BlockQuery = {}): BlockRecord[] => {
  const symbol = query.symbol?.toUpperCase();
  const matches = readBlockRecords().filter(
    (r) =>
      (!query.cycleId || r.cycleId === query.cycleId) &&
      (!symbol || r.symbol === symbol) &&
      (!query.reason || r.reason === query.reason)
  );
  if (query.limit !== undefined && query.limit >= 0) {
    return query.limit === 0 ? [] : matches.slice(-query.limit);
  }
  return matches;
};
