/**
 * Persistence boundary.
 *
 * Services talk to storage only through these interfaces. The in-memory
 * implementations in memory.ts back the service by default and in tests;
 * a database-backed implementation must keep the same conditional-write
 * guarantee on MatchRepository.createActive.
 */

import type {
  CalendarDate,
  ImportPattern,
  InstanceKey,
  ReconciliationMatch,
  RecurringInstance,
  Transaction,
} from '../matching';

export type NewTransaction = Omit<Transaction, 'id' | 'createdAt'>;

export type TransactionPatch = Partial<Pick<Transaction, 'date' | 'description' | 'amount'>>;

export type NewMatch = Omit<ReconciliationMatch, 'id' | 'status' | 'createdAt' | 'resolvedAt'>;

export interface TransactionRepository {
  create(data: NewTransaction): Promise<Transaction>;
  findById(id: string): Promise<Transaction | null>;
  update(id: string, patch: TransactionPatch): Promise<Transaction | null>;
  /** Inclusive date range, ordered by date then creation time */
  findBetween(from: CalendarDate, to: CalendarDate): Promise<Transaction[]>;
  findByAccountBetween(accountId: string, from: CalendarDate, to: CalendarDate): Promise<Transaction[]>;
}

export interface RecurringInstanceSource {
  /** Inclusive date range, ordered by scheduled date then series id */
  findBetween(from: CalendarDate, to: CalendarDate): Promise<RecurringInstance[]>;
  find(key: InstanceKey): Promise<RecurringInstance | null>;
  /** Inserts or replaces instances by (seriesId, scheduledDate) */
  upsertMany(instances: RecurringInstance[]): Promise<number>;
}

export interface ImportPatternRepository {
  findAll(): Promise<ImportPattern[]>;
  findBySeries(seriesId: string): Promise<ImportPattern[]>;
  replaceForSeries(seriesId: string, patterns: ImportPattern[]): Promise<ImportPattern[]>;
}

export interface MatchRepository {
  /**
   * Conditional write: creates an Active match only if neither the
   * transaction nor the instance already has one.
   *
   * @throws MatchConflictError otherwise
   */
  createActive(data: NewMatch): Promise<ReconciliationMatch>;
  /** Marks a match Rejected. Returns null when the id is unknown */
  reject(id: string, resolvedAt: Date): Promise<ReconciliationMatch | null>;
  findById(id: string): Promise<ReconciliationMatch | null>;
  findActiveByTransaction(transactionId: string): Promise<ReconciliationMatch | null>;
  findActiveByInstance(key: InstanceKey): Promise<ReconciliationMatch | null>;
  /** All matches of a transaction, newest first */
  findByTransaction(transactionId: string): Promise<ReconciliationMatch[]>;
  /** All matches of an instance, newest first */
  findByInstance(key: InstanceKey): Promise<ReconciliationMatch[]>;
  /** Active matches whose instance is scheduled in the inclusive range */
  findActiveBetween(from: CalendarDate, to: CalendarDate): Promise<ReconciliationMatch[]>;
}

// ============================================
// Import batches
// ============================================

export type ImportBatchStatus = 'processing' | 'completed' | 'cancelled' | 'failed';

export type ReconciliationOutcome = 'matched' | 'unmatched' | 'ambiguous' | 'manual' | 'failed';

export interface ImportRowOutcome {
  index: number;
  status: 'created' | 'duplicate' | 'errored';
  transactionId?: string;
  /** Existing transaction the row duplicated */
  duplicateOf?: string;
  duplicateKind?: 'exact' | 'fuzzy';
  reconciliation?: ReconciliationOutcome;
  matchId?: string;
  error?: string;
}

export interface ImportReport {
  batchId: string;
  totalRows: number;
  processed: number;
  created: number;
  duplicateSkipped: number;
  ambiguous: number;
  errored: number;
  autoMatched: number;
  unmatched: number;
  cancelled: boolean;
  rows: ImportRowOutcome[];
}

export interface ImportBatch {
  id: string;
  status: ImportBatchStatus;
  report: ImportReport;
  startedAt: Date;
  completedAt?: Date;
}

export interface ImportBatchRepository {
  save(batch: ImportBatch): Promise<void>;
  findById(id: string): Promise<ImportBatch | null>;
}

export interface Repositories {
  transactions: TransactionRepository;
  instances: RecurringInstanceSource;
  patterns: ImportPatternRepository;
  matches: MatchRepository;
  batches: ImportBatchRepository;
}
