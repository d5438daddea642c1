/**
 * Candidate Generation
 *
 * Enumerates the counterparts a transaction could be paired with:
 * - recurring instances for reconciliation (date window, unclaimed)
 * - stored transactions for duplicate detection (tight window, exact amount and kind)
 */

import { toAbsoluteCents } from './confidenceCalculator';
import { dayOffset, isWithinWindow } from './dateProximity';
import type { MatchingTolerances } from './tolerances';
import type {
  InstanceKey,
  ParsedRow,
  ReconciliationMatch,
  RecurringInstance,
  Transaction,
} from './types';

/**
 * Stable string key for a recurring instance.
 */
export function instanceKey(instance: InstanceKey): string {
  return `${instance.seriesId}|${instance.scheduledDate}`;
}

/**
 * Recurring instances a transaction may reconcile against.
 *
 * An instance qualifies when its scheduled date is within the date window,
 * its optional account and currency constraints hold, and no OTHER
 * transaction holds an Active match on it. The transaction's own Active
 * match does not hide its instance, so re-evaluation can keep it.
 */
export function getReconciliationCandidates(
  transaction: Transaction,
  instances: readonly RecurringInstance[],
  activeMatches: readonly ReconciliationMatch[],
  tolerances: MatchingTolerances
): RecurringInstance[] {
  const claimed = new Set(
    activeMatches
      .filter((match) => match.status === 'active' && match.transactionId !== transaction.id)
      .map(instanceKey)
  );

  return instances.filter((instance) => {
    if (claimed.has(instanceKey(instance))) {
      return false;
    }
    if (instance.accountId && instance.accountId !== transaction.accountId) {
      return false;
    }
    if (instance.currency && instance.currency.toUpperCase() !== transaction.currency.toUpperCase()) {
      return false;
    }

    const offset = dayOffset(instance.scheduledDate, transaction.date);
    return isWithinWindow(offset, tolerances.dateWindowDays);
  });
}

/**
 * Orders stored transactions earliest first; creation time and id break ties.
 */
export function compareByDate(a: Transaction, b: Transaction): number {
  if (a.date !== b.date) {
    return a.date < b.date ? -1 : 1;
  }
  const created = a.createdAt.getTime() - b.createdAt.getTime();
  if (created !== 0) {
    return created;
  }
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}

/**
 * Stored transactions an imported row could duplicate: same account,
 * within the duplicate window, equal absolute amount, same kind.
 * Sorted earliest first.
 */
export function getDuplicateCandidates(
  row: ParsedRow,
  existing: readonly Transaction[],
  tolerances: MatchingTolerances
): Transaction[] {
  const rowCents = toAbsoluteCents(row.amount);

  return existing
    .filter(
      (transaction) =>
        transaction.accountId === row.accountId &&
        transaction.kind === row.kind &&
        toAbsoluteCents(transaction.amount) === rowCents &&
        isWithinWindow(dayOffset(transaction.date, row.date), tolerances.duplicateWindowDays)
    )
    .sort(compareByDate);
}
