/**
 * Automatic Reconciliation Decision
 *
 * Pure pipeline that decides which recurring instance, if any, a
 * transaction should be matched to:
 *
 * 1. Generate candidates (date window, unclaimed instances)
 * 2. Import patterns: a hit attributes the transaction to one series and
 *    skips scoring
 * 3. Score every candidate and drop those below the reject threshold
 * 4. Resolve ambiguity among those above the accept threshold
 *
 * Persistence, manual-link precedence and superseding stale matches are
 * handled by the reconciliation service around this function.
 */

import { buildAmbiguityReport, compareCandidates, resolveAmbiguity } from './ambiguity';
import { getReconciliationCandidates } from './candidates';
import {
  createPatternCandidate,
  isAmountWithinCeiling,
  scoreCandidate,
} from './confidenceCalculator';
import { dayOffset } from './dateProximity';
import { matchImportPatterns } from './importPatterns';
import { normalizeDescription } from './normalizeDescription';
import type { MatchingTolerances } from './tolerances';
import type {
  CandidateSummary,
  ImportPattern,
  ReconciliationDecision,
  ReconciliationMatch,
  RecurringInstance,
  ScoredCandidate,
  Transaction,
} from './types';

export interface ReconciliationInput {
  transaction: Transaction;
  /** Projected instances around the transaction date */
  instances: readonly RecurringInstance[];
  /** Active matches touching those instances */
  activeMatches: readonly ReconciliationMatch[];
  patterns: readonly ImportPattern[];
  tolerances: MatchingTolerances;
}

function summarize(candidate: ScoredCandidate): CandidateSummary {
  return {
    seriesId: candidate.instance.seriesId,
    scheduledDate: candidate.instance.scheduledDate,
    confidence: candidate.confidence,
  };
}

/**
 * Picks the instance of the pattern's series closest to the transaction
 * date; the earlier one on a tie.
 */
function nearestInstance(
  transaction: Transaction,
  instances: readonly RecurringInstance[]
): RecurringInstance | undefined {
  return [...instances].sort((a, b) => {
    const distance =
      Math.abs(dayOffset(a.scheduledDate, transaction.date)) -
      Math.abs(dayOffset(b.scheduledDate, transaction.date));
    if (distance !== 0) {
      return distance;
    }
    return a.scheduledDate < b.scheduledDate ? -1 : a.scheduledDate > b.scheduledDate ? 1 : 0;
  })[0];
}

/**
 * Scores every candidate, keeping those at or above the reject threshold,
 * best first.
 */
export function rankCandidates(
  transaction: Transaction,
  candidates: readonly RecurringInstance[],
  tolerances: MatchingTolerances
): ScoredCandidate[] {
  const normalized = normalizeDescription(transaction.description);

  return candidates
    .filter(
      (instance) =>
        !tolerances.enforceAmountCeiling ||
        isAmountWithinCeiling(transaction.amount, instance.expectedAmount, tolerances)
    )
    .map((instance) => scoreCandidate(transaction, instance, tolerances, normalized))
    .filter((candidate) => candidate.confidence >= tolerances.rejectThreshold)
    .sort(compareCandidates);
}

/**
 * Runs the automatic pipeline for one transaction.
 *
 * @throws ConfigurationError when import patterns of several series match
 */
export function decideReconciliation(input: ReconciliationInput): ReconciliationDecision {
  const { transaction, tolerances } = input;
  const candidates = getReconciliationCandidates(
    transaction,
    input.instances,
    input.activeMatches,
    tolerances
  );

  const hit = matchImportPatterns(transaction.description, input.patterns);
  if (hit) {
    const instance = nearestInstance(
      transaction,
      candidates.filter((candidate) => candidate.seriesId === hit.seriesId)
    );
    if (!instance) {
      // The user attributed this description to one series; another series must not take it
      return { kind: 'unmatched', suggestions: [] };
    }
    return {
      kind: 'matched',
      candidate: createPatternCandidate(transaction, instance, tolerances, hit.pattern),
    };
  }

  const ranked = rankCandidates(transaction, candidates, tolerances);
  const resolution = resolveAmbiguity(ranked, tolerances);

  switch (resolution.kind) {
    case 'winner':
      return { kind: 'matched', candidate: resolution.winner };
    case 'ambiguous':
      return {
        kind: 'ambiguous',
        report: buildAmbiguityReport(transaction.id, resolution.tied),
      };
    case 'none':
      return { kind: 'unmatched', suggestions: ranked.map(summarize) };
  }
}

export default decideReconciliation;
