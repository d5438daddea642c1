/**
 * Bulk Import Service
 *
 * Turns parsed statement rows into transactions:
 * 1. Validate the row (a bad row is reported, never fatal)
 * 2. Duplicate detection against stored transactions (exact, then fuzzy)
 * 3. Create the transaction
 * 4. Run the reconciliation decider for it
 *
 * Rows are processed in order, one at a time. Duplicates are only looked
 * for among transactions that existed before the batch started: two equal
 * rows of one statement are two real transactions. Cancellation is checked
 * between rows; everything created before it stays valid, there is no
 * rollback.
 *
 * REDIS INTEGRATION:
 * - Progress is mirrored into Redis for fast UI polling
 * - The batch repository remains the SOURCE OF TRUTH
 */

import { randomUUID } from 'crypto';
import { setImmediate as yieldToEventLoop } from 'timers/promises';
import { z } from 'zod';
import { addDays, AmbiguousMatchError, detectDuplicate, isCalendarDate } from '../matching';
import type { MatchingTolerances, ParsedRow } from '../matching';
import {
  getCachedBatchProgress,
  initBatchProgress,
  setCachedBatchProgress,
  updateBatchStatus,
  type BatchProgress,
  type BatchProgressStatus,
} from '../redis';
import type {
  ImportBatch,
  ImportBatchStatus,
  ImportReport,
  ImportRowOutcome,
  Repositories,
} from '../repositories';
import { logger } from '../utils';
import type { ReconciliationService } from './reconciliation.service';

// ============================================
// Types
// ============================================

export const parsedRowSchema = z.object({
  date: z.string().refine(isCalendarDate, 'Expected a calendar date (YYYY-MM-DD)'),
  description: z
    .string()
    .nullish()
    .transform((value) => value ?? ''),
  amount: z.number().finite(),
  kind: z.enum(['income', 'expense', 'transfer']),
  accountId: z.string().min(1),
  currency: z
    .string()
    .regex(/^[A-Za-z]{3}$/, 'Expected an ISO 4217 currency code')
    .transform((value) => value.toUpperCase())
    .optional(),
});

export interface ImportOptions {
  /** Defaults to true */
  detectDuplicates?: boolean;
  /** Currency for rows that carry none. Defaults to USD */
  defaultCurrency?: string;
  /** Cooperative cancellation, checked between rows */
  signal?: AbortSignal;
  batchId?: string;
  tolerances?: MatchingTolerances;
}

export interface ImportBatchView {
  id: string;
  status: ImportBatchStatus;
  startedAt: Date;
  completedAt?: Date;
  /** Percentage 0-100 */
  progress: number;
  counts: BatchProgress;
  report: ImportReport;
}

// ============================================
// Constants
// ============================================

const DEFAULT_CURRENCY = 'USD';

/** How often the batch record is persisted while a batch runs */
const SAVE_INTERVAL_ROWS = 100;

// ============================================
// Helpers
// ============================================

function toProgress(report: ImportReport, status: BatchProgressStatus): BatchProgress {
  return {
    totalRows: report.totalRows,
    processedCount: report.processed,
    createdCount: report.created,
    duplicateCount: report.duplicateSkipped,
    ambiguousCount: report.ambiguous,
    erroredCount: report.errored,
    autoMatchedCount: report.autoMatched,
    unmatchedCount: report.unmatched,
    status,
  };
}

function describeIssues(error: z.ZodError): string {
  return error.errors
    .map((issue) => `${issue.path.join('.') || 'row'}: ${issue.message}`)
    .join('; ');
}

function emptyReport(batchId: string, totalRows: number): ImportReport {
  return {
    batchId,
    totalRows,
    processed: 0,
    created: 0,
    duplicateSkipped: 0,
    ambiguous: 0,
    errored: 0,
    autoMatched: 0,
    unmatched: 0,
    cancelled: false,
    rows: [],
  };
}

// ============================================
// Service
// ============================================

export class ImportService {
  private readonly running = new Map<string, AbortController>();

  constructor(
    private readonly repositories: Repositories,
    private readonly reconciliation: ReconciliationService,
    private readonly tolerances: MatchingTolerances
  ) {}

  /**
   * Imports rows and returns the batch report.
   *
   * Rows are `unknown` on purpose: each is validated on its own so one bad
   * row is reported as errored while the rest of the batch proceeds.
   */
  async importRows(rows: readonly unknown[], options: ImportOptions = {}): Promise<ImportReport> {
    const batchId = options.batchId ?? randomUUID();
    const controller = new AbortController();
    const isCancelled = (): boolean =>
      controller.signal.aborted || options.signal?.aborted === true;

    const report = emptyReport(batchId, rows.length);
    const createdInBatch = new Set<string>();
    const batch: ImportBatch = { id: batchId, status: 'processing', report, startedAt: new Date() };

    this.running.set(batchId, controller);
    const startTime = Date.now();

    try {
      await this.repositories.batches.save(batch);
      await initBatchProgress(batchId, rows.length);
      logger.info(`[${batchId}] Import started: ${rows.length} row(s)`);

      for (let index = 0; index < rows.length; index++) {
        if (isCancelled()) {
          report.cancelled = true;
          break;
        }

        report.rows.push(
          await this.processRow(rows[index], index, report, createdInBatch, options)
        );
        report.processed++;

        await setCachedBatchProgress(batchId, toProgress(report, 'processing'));
        if (report.processed % SAVE_INTERVAL_ROWS === 0) {
          await this.repositories.batches.save(batch);
        }

        // Lets cancellation requests and other work in
        await yieldToEventLoop();
      }

      batch.status = report.cancelled ? 'cancelled' : 'completed';
      batch.completedAt = new Date();
      await this.repositories.batches.save(batch);
      await updateBatchStatus(batchId, batch.status);

      logger.info(
        `[${batchId}] Import ${batch.status} in ${Date.now() - startTime}ms: ${report.created} created, ${report.duplicateSkipped} duplicate(s), ${report.autoMatched} auto-matched, ${report.ambiguous} ambiguous, ${report.errored} errored`
      );
      return report;
    } catch (error) {
      batch.status = 'failed';
      batch.completedAt = new Date();
      await this.repositories.batches.save(batch);
      await updateBatchStatus(batchId, 'failed');
      logger.error(
        `[${batchId}] Import failed: ${error instanceof Error ? error.message : 'Unknown error'}`
      );
      throw error;
    } finally {
      this.running.delete(batchId);
    }
  }

  /**
   * Requests cancellation of a running import.
   *
   * @returns false when no import with that id is running
   */
  cancel(batchId: string): boolean {
    const controller = this.running.get(batchId);
    if (!controller) {
      return false;
    }
    controller.abort();
    logger.info(`[${batchId}] Import cancellation requested`);
    return true;
  }

  /**
   * Batch status. While a batch runs, counters come from the Redis mirror
   * when it has them.
   */
  async getBatch(batchId: string): Promise<ImportBatchView | null> {
    const batch = await this.repositories.batches.findById(batchId);
    if (!batch) {
      return null;
    }

    let counts = toProgress(batch.report, batch.status);
    if (batch.status === 'processing') {
      const cached = await getCachedBatchProgress(batchId);
      if (cached) {
        counts = cached;
      }
    }

    const progress =
      counts.totalRows > 0 ? Math.round((counts.processedCount / counts.totalRows) * 100) : 0;

    return {
      id: batch.id,
      status: batch.status,
      startedAt: batch.startedAt,
      completedAt: batch.completedAt,
      progress,
      counts,
      report: batch.report,
    };
  }

  private async processRow(
    raw: unknown,
    index: number,
    report: ImportReport,
    createdInBatch: Set<string>,
    options: ImportOptions
  ): Promise<ImportRowOutcome> {
    const tolerances = options.tolerances ?? this.tolerances;

    const parsed = parsedRowSchema.safeParse(raw);
    if (!parsed.success) {
      report.errored++;
      return { index, status: 'errored', error: describeIssues(parsed.error) };
    }
    const row: ParsedRow = parsed.data;

    try {
      if (options.detectDuplicates !== false) {
        const stored = await this.repositories.transactions.findByAccountBetween(
          row.accountId,
          addDays(row.date, -tolerances.duplicateWindowDays),
          addDays(row.date, tolerances.duplicateWindowDays)
        );
        const existing = stored.filter((transaction) => !createdInBatch.has(transaction.id));
        const verdict = detectDuplicate(row, existing, tolerances);

        if (verdict.kind !== 'unique') {
          report.duplicateSkipped++;
          logger.debug(`Row ${index}: ${verdict.kind} duplicate of ${verdict.transactionId}`);
          return {
            index,
            status: 'duplicate',
            duplicateOf: verdict.transactionId,
            duplicateKind: verdict.kind,
          };
        }
      }

      const transaction = await this.repositories.transactions.create({
        accountId: row.accountId,
        date: row.date,
        description: row.description,
        amount: row.amount,
        kind: row.kind,
        currency: row.currency ?? options.defaultCurrency ?? DEFAULT_CURRENCY,
        origin: 'import',
      });
      createdInBatch.add(transaction.id);
      report.created++;

      const outcome: ImportRowOutcome = { index, status: 'created', transactionId: transaction.id };

      try {
        const result = await this.reconciliation.evaluate(transaction.id, tolerances);
        if (result.kind === 'unmatched') {
          report.unmatched++;
          outcome.reconciliation = 'unmatched';
        } else {
          if (result.kind === 'matched') report.autoMatched++;
          outcome.reconciliation = result.kind;
          outcome.matchId = result.match.id;
        }
      } catch (error) {
        if (error instanceof AmbiguousMatchError) {
          report.ambiguous++;
          outcome.reconciliation = 'ambiguous';
        } else {
          report.errored++;
          outcome.reconciliation = 'failed';
          outcome.error = error instanceof Error ? error.message : 'Unknown error';
          logger.warn(`Row ${index}: reconciliation failed: ${outcome.error}`);
        }
      }

      return outcome;
    } catch (error) {
      report.errored++;
      const message = error instanceof Error ? error.message : 'Unknown error';
      logger.warn(`Row ${index}: ${message}`);
      return { index, status: 'errored', error: message };
    }
  }
}

export default ImportService;
