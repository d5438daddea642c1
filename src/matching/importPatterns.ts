/**
 * Import Pattern Matching
 *
 * Users attach wildcard patterns to a recurring series ("NETFLIX*",
 * "*CITY WATER*"). A description matching a pattern is attributed to that
 * series with full confidence, bypassing scoring.
 *
 * Pattern syntax:
 * - `*` matches any run of characters, including none
 * - matching is case-insensitive and anchored at both ends
 * - surrounding whitespace is ignored, inner whitespace runs count as one space
 *
 * Patterns of different series must never overlap (some description
 * matches both). That is checked when patterns are written; at match time
 * a hit spanning several series is a configuration error.
 */

import { ConfigurationError, type PatternConflict } from './errors';
import type { ImportPattern } from './types';

const WILDCARD = '*';

export interface PatternHit {
  seriesId: string;
  pattern: string;
}

/**
 * Canonical form of a pattern: trimmed, single-spaced, uppercase, with
 * consecutive wildcards collapsed.
 *
 * @example
 * normalizePattern('  netflix**  com ') // Returns: "NETFLIX* COM"
 */
export function normalizePattern(pattern: string): string {
  return pattern.trim().replace(/\s+/g, ' ').replace(/\*+/g, WILDCARD).toUpperCase();
}

/**
 * A pattern is malformed when nothing but wildcards and whitespace remain,
 * since it would swallow every description.
 */
export function isMalformedPattern(pattern: string): boolean {
  return normalizePattern(pattern).replace(/[\s*]/g, '').length === 0;
}

function escapeRegExp(text: string): string {
  return text.replace(/[.+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Compiles a pattern into an anchored, case-insensitive regular expression.
 */
export function compilePattern(pattern: string): RegExp {
  const body = normalizePattern(pattern).split(WILDCARD).map(escapeRegExp).join('.*');
  return new RegExp(`^${body}$`, 'i');
}

function canonicalDescription(description: string): string {
  return description.trim().replace(/\s+/g, ' ');
}

export function matchesPattern(description: string, pattern: string): boolean {
  return compilePattern(pattern).test(canonicalDescription(description));
}

/**
 * Decides whether some string matches both patterns.
 *
 * Walks both patterns at once: a wildcard may end or swallow the other
 * side's next character, literals must agree.
 *
 * @example
 * patternsOverlap('NETFLIX*', '*FLIX COM') // Returns: true ("NETFLIX COM")
 * patternsOverlap('NETFLIX*', 'HULU*')     // Returns: false
 */
export function patternsOverlap(first: string, second: string): boolean {
  const a = normalizePattern(first);
  const b = normalizePattern(second);
  const memo = new Map<number, boolean>();

  const onlyWildcards = (text: string, from: number): boolean =>
    text.slice(from).split('').every((char) => char === WILDCARD);

  const overlap = (i: number, j: number): boolean => {
    const key = i * (b.length + 1) + j;
    const cached = memo.get(key);
    if (cached !== undefined) {
      return cached;
    }

    let result: boolean;
    if (i === a.length) {
      result = onlyWildcards(b, j);
    } else if (j === b.length) {
      result = onlyWildcards(a, i);
    } else if (a[i] === WILDCARD || b[j] === WILDCARD) {
      result = overlap(i + 1, j) || overlap(i, j + 1);
    } else {
      result = a[i] === b[j] && overlap(i + 1, j + 1);
    }

    memo.set(key, result);
    return result;
  };

  return overlap(0, 0);
}

/**
 * Finds overlaps between the proposed patterns and the patterns of every
 * OTHER series. Overlap within one series is harmless.
 */
export function findOverlappingPatterns(
  proposed: readonly ImportPattern[],
  existing: readonly ImportPattern[]
): PatternConflict[] {
  const conflicts: PatternConflict[] = [];

  for (const candidate of proposed) {
    for (const other of existing) {
      if (other.seriesId === candidate.seriesId) {
        continue;
      }
      if (patternsOverlap(candidate.pattern, other.pattern)) {
        conflicts.push({
          pattern: candidate.pattern,
          seriesId: candidate.seriesId,
          conflictingPattern: other.pattern,
          conflictingSeriesId: other.seriesId,
        });
      }
    }
  }

  return conflicts;
}

/**
 * Validates the patterns of one series against everything else on record
 * and returns them normalized and de-duplicated.
 *
 * @throws ConfigurationError on a malformed pattern or a cross-series overlap
 */
export function validateImportPatterns(
  seriesId: string,
  patterns: readonly string[],
  otherSeriesPatterns: readonly ImportPattern[]
): ImportPattern[] {
  const malformed = patterns.filter(isMalformedPattern);
  if (malformed.length > 0) {
    throw new ConfigurationError(
      `Malformed import pattern(s) for series ${seriesId}: ${malformed
        .map((pattern) => JSON.stringify(pattern))
        .join(', ')}`
    );
  }

  const normalized = [...new Set(patterns.map(normalizePattern))].map((pattern) => ({
    seriesId,
    pattern,
  }));

  const conflicts = findOverlappingPatterns(normalized, otherSeriesPatterns);
  if (conflicts.length > 0) {
    throw new ConfigurationError(
      `Import patterns for series ${seriesId} overlap patterns of other series`,
      conflicts
    );
  }

  return normalized;
}

/**
 * Matches a description against every configured pattern.
 *
 * @returns The owning series of the matching pattern, or null
 * @throws ConfigurationError when patterns of two or more series match
 */
export function matchImportPatterns(
  description: string,
  patterns: readonly ImportPattern[]
): PatternHit | null {
  const hits = patterns.filter(
    (pattern) => !isMalformedPattern(pattern.pattern) && matchesPattern(description, pattern.pattern)
  );

  const [first] = hits;
  if (first === undefined) {
    return null;
  }

  const other = hits.find((hit) => hit.seriesId !== first.seriesId);
  if (other) {
    throw new ConfigurationError(
      `Description "${canonicalDescription(description)}" matches import patterns of several series`,
      [
        {
          pattern: first.pattern,
          seriesId: first.seriesId,
          conflictingPattern: other.pattern,
          conflictingSeriesId: other.seriesId,
        },
      ]
    );
  }

  return { seriesId: first.seriesId, pattern: first.pattern };
}

export default matchImportPatterns;
