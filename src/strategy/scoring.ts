import { AdmissionCandidate, Candidate, ScoredCandidate } from '../core/types';
import { compositeGate } from '../risk/gates';
import { regimeTiltReasons, weightsFor } from './regimeWeights';
import { computeWeightedDelta, integrateScore } from './weightedDelta';

export const scoreCandidate = (candidate: Candidate): ScoredCandidate => {
  const weights = weightsFor(candidate.regime);
  const gates = compositeGate(candidate.signals, candidate.regime, candidate.sectorMomentum);
  const delta = computeWeightedDelta(candidate.signals, weights, gates.composite);
  return {
    symbol: candidate.symbol,
    finalScore: integrateScore(candidate.baseEntryScore, delta),
    estimatedEv: candidate.estimatedEv,
    timestamp: candidate.timestamp,
    candidate,
    weights,
    tilts: regimeTiltReasons(candidate.regime),
    gates,
    delta
  };
};

const compareSymbols = (a: string, b: string): number => (a < b ? -1 : a > b ? 1 : 0);

/**
 * Score descending, symbol ascending on ties. Entries without a finite score
 * sink to the end so they are still reported (and rejected) in a stable order.
 */
export const rankCandidates = <T extends AdmissionCandidate>(candidates: T[]): T[] =>
  candidates.slice().sort((a, b) => {
    const aFinite = Number.isFinite(a.finalScore);
    const bFinite = Number.isFinite(b.finalScore);
    if (aFinite !== bFinite) return aFinite ? -1 : 1;
    if (aFinite && b.finalScore !== a.finalScore) return b.finalScore - a.finalScore;
    return compareSymbols(a.symbol, b.symbol);
  });
