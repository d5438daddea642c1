/**
 * Transaction Service
 *
 * Manual entry and user edits of transactions.
 *
 * BUSINESS RULES:
 * - A manually entered transaction is reconciled like an imported one
 * - Editing the description, date or amount re-runs the decider, which
 *   supersedes an Auto match that no longer wins
 * - Manual matches survive edits untouched
 */

import { AmbiguousMatchError } from '../matching';
import type { AmbiguityReport, Transaction, TransactionKind } from '../matching';
import type { Repositories, TransactionPatch } from '../repositories';
import { AppError } from '../utils';
import type { EvaluationResult, ReconciliationService } from './reconciliation.service';

export interface ManualEntryInput {
  accountId: string;
  date: string;
  description: string;
  amount: number;
  kind: TransactionKind;
  currency: string;
}

export type ReconciliationSummary =
  | EvaluationResult
  | { kind: 'ambiguous'; report: AmbiguityReport };

export interface TransactionWithReconciliation {
  transaction: Transaction;
  reconciliation: ReconciliationSummary;
}

export class TransactionService {
  constructor(
    private readonly repositories: Repositories,
    private readonly reconciliation: ReconciliationService
  ) {}

  async getTransaction(id: string): Promise<Transaction> {
    const transaction = await this.repositories.transactions.findById(id);
    if (!transaction) {
      throw AppError.notFound(`Transaction ${id} not found`);
    }
    return transaction;
  }

  async createManual(input: ManualEntryInput): Promise<TransactionWithReconciliation> {
    const transaction = await this.repositories.transactions.create({
      ...input,
      origin: 'manual',
    });
    return { transaction, reconciliation: await this.reconcile(transaction.id) };
  }

  async update(id: string, patch: TransactionPatch): Promise<TransactionWithReconciliation> {
    const transaction = await this.repositories.transactions.update(id, patch);
    if (!transaction) {
      throw AppError.notFound(`Transaction ${id} not found`);
    }
    return { transaction, reconciliation: await this.reconcile(id) };
  }

  /**
   * Runs the decider, reporting a tie as a value: the transaction itself
   * was stored successfully and the tie is for the user to settle.
   */
  private async reconcile(id: string): Promise<ReconciliationSummary> {
    try {
      return await this.reconciliation.evaluate(id);
    } catch (error) {
      if (error instanceof AmbiguousMatchError) {
        return { kind: 'ambiguous', report: error.report };
      }
      throw error;
    }
  }
}

export default TransactionService;
