/**
 * Manual Link Registry
 *
 * Records explicit user decisions. A manual link always outranks the
 * automatic decider:
 * - link: rejects a prior Auto match on either side, then writes an Active
 *   Manual match
 * - unlink: rejects a match, freeing both sides
 *
 * A side already held by a different MANUAL match is not overwritten; the
 * user must unlink it first.
 */

import {
  calculateAmountVariance,
  dayOffset,
  instanceKey,
  InvalidManualLinkError,
  MatchConflictError,
} from '../matching';
import type { InstanceKey, ReconciliationMatch } from '../matching';
import type { Repositories } from '../repositories';
import { AppError, logger } from '../utils';

export class ManualLinkService {
  constructor(private readonly repositories: Repositories) {}

  /**
   * Links a transaction to a recurring instance.
   *
   * Re-linking the same pair is a no-op that returns the existing match.
   *
   * @throws AppError 404 when the transaction or instance does not exist
   * @throws InvalidManualLinkError when either side is manually linked elsewhere,
   *   or a concurrent write claimed a side first
   */
  async link(transactionId: string, key: InstanceKey): Promise<ReconciliationMatch> {
    const { transactions, instances, matches } = this.repositories;

    const [transaction, instance] = await Promise.all([
      transactions.findById(transactionId),
      instances.find(key),
    ]);
    if (!transaction) {
      throw AppError.notFound(`Transaction ${transactionId} not found`);
    }
    if (!instance) {
      throw AppError.notFound(`Recurring instance ${key.seriesId}@${key.scheduledDate} not found`);
    }

    const [byTransaction, byInstance] = await Promise.all([
      matches.findActiveByTransaction(transactionId),
      matches.findActiveByInstance(key),
    ]);

    if (
      byTransaction &&
      byTransaction.source === 'manual' &&
      instanceKey(byTransaction) === instanceKey(key)
    ) {
      return byTransaction;
    }

    for (const prior of [byTransaction, byInstance]) {
      if (prior && prior.source === 'manual') {
        throw new InvalidManualLinkError(
          prior.transactionId === transactionId
            ? `Transaction ${transactionId} is already linked to ${prior.seriesId}@${prior.scheduledDate}; unlink it first`
            : `Recurring instance ${key.seriesId}@${key.scheduledDate} is already linked to transaction ${prior.transactionId}; unlink it first`
        );
      }
    }

    const resolvedAt = new Date();
    for (const prior of [byTransaction, byInstance]) {
      if (prior) {
        await matches.reject(prior.id, resolvedAt);
      }
    }

    try {
      const match = await matches.createActive({
        transactionId,
        seriesId: instance.seriesId,
        scheduledDate: instance.scheduledDate,
        source: 'manual',
        amountVariance: calculateAmountVariance(transaction.amount, instance.expectedAmount),
        dateOffsetDays: dayOffset(instance.scheduledDate, transaction.date),
      });
      logger.info(`[${transactionId}] Manually linked to ${instance.seriesId}@${instance.scheduledDate}`);
      return match;
    } catch (error) {
      if (error instanceof MatchConflictError) {
        throw new InvalidManualLinkError(error.message);
      }
      throw error;
    }
  }

  /**
   * Rejects a match. Unlinking an already rejected match returns it unchanged.
   *
   * @throws AppError 404 when the match does not exist
   */
  async unlink(matchId: string): Promise<ReconciliationMatch> {
    const match = await this.repositories.matches.findById(matchId);
    if (!match) {
      throw AppError.notFound(`Match ${matchId} not found`);
    }
    if (match.status === 'rejected') {
      return match;
    }

    const rejected = await this.repositories.matches.reject(matchId, new Date());
    if (!rejected) {
      throw AppError.notFound(`Match ${matchId} not found`);
    }

    logger.info(`[${match.transactionId}] Unlinked match ${matchId}`);
    return rejected;
  }
}

export default ManualLinkService;
