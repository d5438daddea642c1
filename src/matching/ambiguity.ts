/**
 * Ambiguity Resolution
 *
 * Picks the automatic match from scored candidates, or refuses to.
 * Ties are never broken arbitrarily: when two or more candidates clear the
 * accept threshold within epsilon of each other, the result is ambiguous
 * and only a manual link can settle it.
 */

import type { MatchingTolerances } from './tolerances';
import type { AmbiguityReport, AmbiguityResolution, ScoredCandidate } from './types';

// Absorbs float noise in score differences such as 0.82 - 0.80
const FLOAT_TOLERANCE = 1e-9;

/**
 * Orders candidates best first. Closer dates, then earlier dates, then
 * series id make the order total so results are reproducible.
 */
export function compareCandidates(a: ScoredCandidate, b: ScoredCandidate): number {
  if (a.confidence !== b.confidence) {
    return b.confidence - a.confidence;
  }
  const distance = Math.abs(a.dateOffsetDays) - Math.abs(b.dateOffsetDays);
  if (distance !== 0) {
    return distance;
  }
  if (a.instance.scheduledDate !== b.instance.scheduledDate) {
    return a.instance.scheduledDate < b.instance.scheduledDate ? -1 : 1;
  }
  if (a.instance.seriesId !== b.instance.seriesId) {
    return a.instance.seriesId < b.instance.seriesId ? -1 : 1;
  }
  return 0;
}

/**
 * Resolves the scored candidates into none, a single winner, or a tie.
 *
 * - a pattern-attributed candidate always wins outright
 * - zero candidates at or above the accept threshold: none
 * - exactly one: it wins
 * - two or more: ambiguous when the runner-up is within epsilon of the
 *   top score, otherwise the top one wins
 *
 * @example
 * // scores 0.81 and 0.80 with epsilon 0.02 → ambiguous, both listed
 * // scores 0.95 and 0.82 with epsilon 0.02 → winner 0.95
 */
export function resolveAmbiguity(
  scored: readonly ScoredCandidate[],
  tolerances: MatchingTolerances
): AmbiguityResolution {
  const patternHit = scored.find((candidate) => candidate.via === 'pattern');
  if (patternHit) {
    return { kind: 'winner', winner: patternHit };
  }

  const eligible = scored
    .filter((candidate) => candidate.confidence >= tolerances.acceptThreshold)
    .sort(compareCandidates);

  const [top, second] = eligible;
  if (top === undefined) {
    return { kind: 'none' };
  }
  if (second === undefined) {
    return { kind: 'winner', winner: top };
  }

  const margin = tolerances.ambiguityEpsilon + FLOAT_TOLERANCE;
  if (top.confidence - second.confidence <= margin) {
    return {
      kind: 'ambiguous',
      tied: eligible.filter((candidate) => top.confidence - candidate.confidence <= margin),
    };
  }

  return { kind: 'winner', winner: top };
}

export function buildAmbiguityReport(
  transactionId: string,
  tied: readonly ScoredCandidate[]
): AmbiguityReport {
  return {
    transactionId,
    candidates: tied.map((candidate) => ({
      seriesId: candidate.instance.seriesId,
      scheduledDate: candidate.instance.scheduledDate,
      confidence: candidate.confidence,
    })),
  };
}

export default resolveAmbiguity;
