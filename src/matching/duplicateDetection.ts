/**
 * Import-time Duplicate Detection
 *
 * Decides whether an imported row is already on record, so that importing
 * an overlapping statement twice, or importing a transaction that was
 * entered by hand, does not double-count it.
 *
 * Checks, in order:
 * 1. Exact: same date, same description after trim + lowercase, equal
 *    absolute amount, same kind
 * 2. Fuzzy: any candidate in the tight window (±1 day, equal absolute
 *    amount, same kind) whose normalized description passes the
 *    similarity check. The earliest-dated candidate wins.
 *
 * Duplicate suppression favours false negatives over blocking an import,
 * so there is no ambiguity failure here.
 */

import { getDuplicateCandidates } from './candidates';
import { normalizeDescription } from './normalizeDescription';
import { compareDescriptions } from './similarity';
import type { MatchingTolerances } from './tolerances';
import type { DuplicateVerdict, ParsedRow, Transaction } from './types';

function canonical(description: string): string {
  return description.trim().toLowerCase();
}

/**
 * Detects whether a row duplicates one of the stored transactions.
 *
 * @param row - Imported row
 * @param existing - Stored transactions; callers may pre-filter by account and date
 *
 * @example
 * detectDuplicate(
 *   { date: '2025-10-01', description: 'Zelle payment from John Smith Conf# AB8KL2MXC', amount: 100, kind: 'income', accountId: 'checking' },
 *   [manualEntry],
 *   tolerances
 * )
 * // Returns: { kind: 'fuzzy', transactionId: manualEntry.id }
 */
export function detectDuplicate(
  row: ParsedRow,
  existing: readonly Transaction[],
  tolerances: MatchingTolerances
): DuplicateVerdict {
  const candidates = getDuplicateCandidates(row, existing, tolerances);
  if (candidates.length === 0) {
    return { kind: 'unique' };
  }

  const rowDescription = canonical(row.description);
  const exact = candidates.find(
    (candidate) => candidate.date === row.date && canonical(candidate.description) === rowDescription
  );
  if (exact) {
    return { kind: 'exact', transactionId: exact.id };
  }

  const normalizedRow = normalizeDescription(row.description);
  const fuzzy = candidates.find(
    (candidate) =>
      compareDescriptions(normalizedRow, normalizeDescription(candidate.description), tolerances)
        .matches
  );
  if (fuzzy) {
    return { kind: 'fuzzy', transactionId: fuzzy.id };
  }

  return { kind: 'unique' };
}

export default detectDuplicate;
