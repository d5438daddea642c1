/**
 * Description Similarity for Transaction Matching
 *
 * Two independent measures over normalized descriptions:
 * - Levenshtein edit distance catches typo-level variance
 *   ("netflix.com" vs "netflix com")
 * - Jaccard token overlap catches word-order changes and inserted words
 *   ("city water utility payment" vs "payment city water")
 *
 * A pair is textually matching when EITHER measure passes its threshold.
 */

import { LevenshteinDistance } from 'natural';
import type { MatchingTolerances } from './tolerances';
import type { DescriptionComparison, NormalizedDescription } from './types';

/**
 * Classic Levenshtein distance (unit insert/delete/substitute costs).
 * Symmetric: levenshteinDistance(a, b) === levenshteinDistance(b, a).
 *
 * @example
 * levenshteinDistance('netflix', 'netflx') // Returns: 1
 */
export function levenshteinDistance(a: string, b: string): number {
  if (a === b) {
    return 0;
  }
  if (a.length === 0 || b.length === 0) {
    return Math.max(a.length, b.length);
  }

  return LevenshteinDistance(a, b);
}

/**
 * Jaccard index |A ∩ B| / |A ∪ B|.
 *
 * 1.0 for identical sets (including two empty sets), 0.0 for disjoint sets.
 */
export function jaccardIndex(a: ReadonlySet<string>, b: ReadonlySet<string>): number {
  if (a.size === 0 && b.size === 0) {
    return 1;
  }

  let intersection = 0;
  for (const token of a) {
    if (b.has(token)) {
      intersection += 1;
    }
  }

  const union = a.size + b.size - intersection;
  return intersection / union;
}

/**
 * Compares two normalized descriptions against the configured thresholds.
 *
 * An empty description never matches anything, including another empty one:
 * there is nothing to compare.
 */
export function compareDescriptions(
  a: NormalizedDescription,
  b: NormalizedDescription,
  tolerances: MatchingTolerances
): DescriptionComparison {
  if (!a.normalized || !b.normalized) {
    return {
      editDistance: Math.max(a.normalized.length, b.normalized.length),
      jaccard: 0,
      closeByDistance: false,
      closeByJaccard: false,
      matches: false,
    };
  }

  const editDistance = levenshteinDistance(a.normalized, b.normalized);
  const jaccard = jaccardIndex(a.tokens, b.tokens);
  const closeByDistance = editDistance <= tolerances.editDistanceThreshold;
  const closeByJaccard = jaccard >= tolerances.jaccardThreshold;

  return {
    editDistance,
    jaccard,
    closeByDistance,
    closeByJaccard,
    matches: closeByDistance || closeByJaccard,
  };
}

export default compareDescriptions;
