import express from 'express';
import { getRecentCycles, getCycleStatus, queryBlockRecords, BlockQuery } from '../ledger/ledger';
import { readCycleArtifact, readEventsForCycle } from '../ledger/storage';
import { loadCooldownRegistry, loadPortfolioState } from '../state/stateStore';

const firstString = (value: unknown): string | undefined => {
  if (typeof value === 'string' && value.length) return value;
  if (Array.isArray(value)) return firstString(value[0]);
  return undefined;
};

const parseLimit = (value: unknown, fallback: number): number => {
  const raw = firstString(value);
  if (raw === undefined) return fallback;
  const n = Number.parseInt(raw, 10);
  return Number.isFinite(n) && n >= 0 ? Math.min(n, 1000) : fallback;
};

export const blockQueryFromParams = (params: Record<string, unknown>): BlockQuery => ({
  cycleId: firstString(params.cycleId),
  symbol: firstString(params.symbol),
  reason: firstString(params.reason),
  limit: parseLimit(params.limit, 200)
});

export interface RouteResult {
  status: number;
  body: unknown;
}

export const cycleDetail = (cycleId: string): RouteResult => {
  const status = getCycleStatus(cycleId);
  if (status === 'UNKNOWN') {
    return { status: 404, body: { error: `cycle ${cycleId} not found` } };
  }
  return {
    status: 200,
    body: {
      cycleId,
      status,
      decisions: readCycleArtifact(cycleId, 'decisions.json') ?? null,
      events: readEventsForCycle(cycleId)
    }
  };
};

export const stateSnapshot = (): RouteResult => {
  try {
    return { status: 200, body: { portfolio: loadPortfolioState(), cooldowns: loadCooldownRegistry() } };
  } catch (err) {
    console.error('state read failed', err);
    return { status: 500, body: { error: err instanceof Error ? err.message : String(err) } };
  }
};

export const registerRoutes = (app: express.Express) => {
  app.get('/health', (_req, res) => {
    res.json({ ok: true });
  });

  app.get('/api/cycles', (req, res) => {
    res.json({ cycles: getRecentCycles(parseLimit(req.query.limit, 20)) });
  });

  app.get('/api/cycles/:cycleId', (req, res) => {
    const { status, body } = cycleDetail(req.params.cycleId);
    res.status(status).json(body);
  });

  app.get('/api/blocks', (req, res) => {
    res.json({ blocks: queryBlockRecords(blockQueryFromParams(req.query)) });
  });

  app.get('/api/state', (_req, res) => {
    const { status, body } = stateSnapshot();
    res.status(status).json(body);
  });
};
