/**
 * Confidence Score Calculator for Recurring-Instance Reconciliation
 *
 * Combines three signals into a single confidence score in [0, 1]:
 * 1. Description similarity (weight 0.5 - PRIMARY factor)
 * 2. Amount closeness (weight 0.3)
 * 3. Date proximity (weight 0.2)
 *
 * Formula: confidence = 0.5·description + 0.3·amount + 0.2·date
 *
 * Bands:
 * - ≥ acceptThreshold (0.8): eligible as the automatic match
 * - between the thresholds: kept only as a suggestion
 * - < rejectThreshold (0.4): discarded
 *
 * Description wins over amount: with the default ceiling of 100% a
 * matching description on the scheduled date still scores 0.7 even when the
 * amount differs wildly, while a perfect amount and date with an unrelated
 * description never exceeds 0.5.
 */

import {
  CONFIDENCE_LEVELS,
  PATTERN_MATCH_CONFIDENCE,
  SCORE_WEIGHTS,
} from './constants';
import { calculateDateScore, dayOffset } from './dateProximity';
import { normalizeDescription } from './normalizeDescription';
import { compareDescriptions } from './similarity';
import type { MatchingTolerances } from './tolerances';
import type {
  ConfidenceBreakdown,
  ConfidenceLevel,
  DescriptionComparison,
  NormalizedDescription,
  RecurringInstance,
  ScoredCandidate,
  Transaction,
} from './types';

/**
 * The parts of a transaction the scorer looks at.
 */
export type ScorableTransaction = Pick<Transaction, 'date' | 'description' | 'amount'>;

function round4(value: number): number {
  return Math.round(value * 10000) / 10000;
}

/**
 * Absolute value in integer cents. Compares across sign-flipped legs and
 * keeps float noise out of equality checks.
 */
export function toAbsoluteCents(amount: number): number {
  return Number.isFinite(amount) ? Math.round(Math.abs(amount) * 100) : 0;
}

/**
 * Expected minus actual, on absolute amounts.
 * Positive means less was paid than expected.
 */
export function calculateAmountVariance(actual: number, expected: number): number {
  return (toAbsoluteCents(expected) - toAbsoluteCents(actual)) / 100;
}

/**
 * Relative difference of the absolute amounts, measured against the
 * expected amount. Infinite when only the expected amount is zero.
 */
export function relativeAmountDifference(actual: number, expected: number): number {
  const actualCents = toAbsoluteCents(actual);
  const expectedCents = toAbsoluteCents(expected);

  if (actualCents === expectedCents) {
    return 0;
  }
  if (expectedCents === 0) {
    return Number.POSITIVE_INFINITY;
  }

  return Math.abs(actualCents - expectedCents) / expectedCents;
}

/**
 * Amount signal: 1.0 on an exact match, decaying linearly to 0 as the
 * relative difference approaches the tolerance ceiling.
 *
 * @example
 * calculateAmountScore(-100, 100, tolerances) // Returns: 1
 * calculateAmountScore(50, 100, tolerances)   // Returns: 0.5 (ceiling 1.0)
 */
export function calculateAmountScore(
  actual: number,
  expected: number,
  tolerances: MatchingTolerances
): number {
  const difference = relativeAmountDifference(actual, expected);
  return Math.max(0, 1 - difference / tolerances.amountToleranceCeiling);
}

export function isAmountWithinCeiling(
  actual: number,
  expected: number,
  tolerances: MatchingTolerances
): boolean {
  return relativeAmountDifference(actual, expected) <= tolerances.amountToleranceCeiling;
}

/**
 * Description signal: 1.0 while the edit distance is within the threshold,
 * scaled down linearly as it grows past it (pairs that only match on token
 * overlap), 0 when the pair is not textually matching.
 */
export function calculateDescriptionScore(
  comparison: DescriptionComparison,
  a: NormalizedDescription,
  b: NormalizedDescription,
  tolerances: MatchingTolerances
): number {
  if (!comparison.matches) {
    return 0;
  }
  if (comparison.closeByDistance) {
    return 1;
  }

  const longest = Math.max(a.normalized.length, b.normalized.length);
  const excess = comparison.editDistance - tolerances.editDistanceThreshold;
  return Math.max(0, 1 - excess / longest);
}

/**
 * Maps a confidence score to its display level.
 */
export function determineLevel(confidence: number): ConfidenceLevel {
  if (confidence >= CONFIDENCE_LEVELS.HIGH) {
    return 'high';
  }
  if (confidence >= CONFIDENCE_LEVELS.MEDIUM) {
    return 'medium';
  }
  return 'low';
}

/**
 * Generates a human-readable explanation of a scored candidate.
 *
 * @example
 * // "Description: matched (distance 0, overlap 100%). Amount: exact. Date: 1 day early. Confidence: 0.9333 (high)"
 */
export function generateExplanation(
  breakdown: ConfidenceBreakdown,
  amountVariance: number,
  dateOffsetDays: number,
  confidence: number
): string {
  const parts: string[] = [];

  const overlap = Math.round(breakdown.jaccard * 100);
  parts.push(
    breakdown.descriptionScore > 0
      ? `Description: matched (distance ${breakdown.editDistance}, overlap ${overlap}%)`
      : `Description: no match (distance ${breakdown.editDistance}, overlap ${overlap}%)`
  );

  if (amountVariance === 0) {
    parts.push('Amount: exact');
  } else {
    const direction = amountVariance > 0 ? 'under' : 'over';
    parts.push(`Amount: ${Math.abs(amountVariance).toFixed(2)} ${direction} expected`);
  }

  if (dateOffsetDays === 0) {
    parts.push('Date: on schedule');
  } else {
    const days = Math.abs(dateOffsetDays);
    parts.push(
      `Date: ${days} day${days === 1 ? '' : 's'} ${dateOffsetDays < 0 ? 'early' : 'late'}`
    );
  }

  parts.push(`Confidence: ${confidence} (${determineLevel(confidence)})`);

  return parts.join('. ');
}

function buildBreakdown(
  transaction: ScorableTransaction,
  instance: RecurringInstance,
  tolerances: MatchingTolerances,
  normalizedTransaction: NormalizedDescription
): { breakdown: ConfidenceBreakdown; offset: number } {
  const expected = normalizeDescription(instance.expectedDescription);
  const comparison = compareDescriptions(normalizedTransaction, expected, tolerances);
  const offset = dayOffset(instance.scheduledDate, transaction.date);

  return {
    offset,
    breakdown: {
      descriptionScore: calculateDescriptionScore(
        comparison,
        normalizedTransaction,
        expected,
        tolerances
      ),
      amountScore: calculateAmountScore(transaction.amount, instance.expectedAmount, tolerances),
      dateScore: calculateDateScore(offset, tolerances.dateWindowDays),
      editDistance: comparison.editDistance,
      jaccard: comparison.jaccard,
    },
  };
}

/**
 * Scores one (transaction, recurring instance) pair.
 *
 * Never throws: an empty description or a zero amount only lowers the score.
 *
 * @param normalizedTransaction - Pre-normalized description, when scoring many instances
 */
export function scoreCandidate(
  transaction: ScorableTransaction,
  instance: RecurringInstance,
  tolerances: MatchingTolerances,
  normalizedTransaction: NormalizedDescription = normalizeDescription(transaction.description)
): ScoredCandidate {
  const { breakdown, offset } = buildBreakdown(
    transaction,
    instance,
    tolerances,
    normalizedTransaction
  );

  const confidence = round4(
    breakdown.descriptionScore * SCORE_WEIGHTS.DESCRIPTION +
      breakdown.amountScore * SCORE_WEIGHTS.AMOUNT +
      breakdown.dateScore * SCORE_WEIGHTS.DATE
  );
  const amountVariance = calculateAmountVariance(transaction.amount, instance.expectedAmount);

  return {
    instance,
    confidence,
    level: determineLevel(confidence),
    breakdown,
    amountVariance,
    dateOffsetDays: offset,
    via: 'score',
    explanation: generateExplanation(breakdown, amountVariance, offset, confidence),
  };
}

/**
 * Builds the candidate for an instance attributed by an import pattern.
 * The breakdown is still computed for display, but the confidence is fixed.
 */
export function createPatternCandidate(
  transaction: ScorableTransaction,
  instance: RecurringInstance,
  tolerances: MatchingTolerances,
  pattern: string
): ScoredCandidate {
  const { breakdown, offset } = buildBreakdown(
    transaction,
    instance,
    tolerances,
    normalizeDescription(transaction.description)
  );
  const amountVariance = calculateAmountVariance(transaction.amount, instance.expectedAmount);

  return {
    instance,
    confidence: PATTERN_MATCH_CONFIDENCE,
    level: determineLevel(PATTERN_MATCH_CONFIDENCE),
    breakdown,
    amountVariance,
    dateOffsetDays: offset,
    via: 'pattern',
    explanation: `Import pattern "${pattern}" attributes this description to series ${instance.seriesId}`,
  };
}

export default scoreCandidate;
