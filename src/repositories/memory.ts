/**
 * In-memory repositories.
 *
 * Records are copied on the way in and out so callers cannot mutate
 * stored state behind the repository's back. Every method body runs
 * without an await between its check and its write, which makes the
 * conditional match write atomic within the process.
 */

import { randomUUID } from 'crypto';
import { compareByDate, instanceKey, MatchConflictError } from '../matching';
import type {
  CalendarDate,
  ImportPattern,
  InstanceKey,
  ReconciliationMatch,
  RecurringInstance,
  Transaction,
} from '../matching';
import type {
  ImportBatch,
  ImportBatchRepository,
  ImportPatternRepository,
  MatchRepository,
  NewMatch,
  NewTransaction,
  RecurringInstanceSource,
  Repositories,
  TransactionPatch,
  TransactionRepository,
} from './types';

function inRange(date: CalendarDate, from: CalendarDate, to: CalendarDate): boolean {
  return date >= from && date <= to;
}

function newestFirst(a: ReconciliationMatch, b: ReconciliationMatch): number {
  return b.createdAt.getTime() - a.createdAt.getTime();
}

export class InMemoryTransactionRepository implements TransactionRepository {
  private readonly rows = new Map<string, Transaction>();

  async create(data: NewTransaction): Promise<Transaction> {
    const transaction: Transaction = { ...data, id: randomUUID(), createdAt: new Date() };
    this.rows.set(transaction.id, transaction);
    return { ...transaction };
  }

  async findById(id: string): Promise<Transaction | null> {
    const row = this.rows.get(id);
    return row ? { ...row } : null;
  }

  async update(id: string, patch: TransactionPatch): Promise<Transaction | null> {
    const row = this.rows.get(id);
    if (!row) {
      return null;
    }
    const updated: Transaction = { ...row, ...patch };
    this.rows.set(id, updated);
    return { ...updated };
  }

  async findBetween(from: CalendarDate, to: CalendarDate): Promise<Transaction[]> {
    return [...this.rows.values()]
      .filter((row) => inRange(row.date, from, to))
      .sort(compareByDate)
      .map((row) => ({ ...row }));
  }

  async findByAccountBetween(
    accountId: string,
    from: CalendarDate,
    to: CalendarDate
  ): Promise<Transaction[]> {
    const rows = await this.findBetween(from, to);
    return rows.filter((row) => row.accountId === accountId);
  }
}

export class InMemoryRecurringInstanceSource implements RecurringInstanceSource {
  private readonly rows = new Map<string, RecurringInstance>();

  async findBetween(from: CalendarDate, to: CalendarDate): Promise<RecurringInstance[]> {
    return [...this.rows.values()]
      .filter((row) => inRange(row.scheduledDate, from, to))
      .sort((a, b) =>
        a.scheduledDate === b.scheduledDate
          ? a.seriesId.localeCompare(b.seriesId)
          : a.scheduledDate.localeCompare(b.scheduledDate)
      )
      .map((row) => ({ ...row }));
  }

  async find(key: InstanceKey): Promise<RecurringInstance | null> {
    const row = this.rows.get(instanceKey(key));
    return row ? { ...row } : null;
  }

  async upsertMany(instances: RecurringInstance[]): Promise<number> {
    for (const instance of instances) {
      this.rows.set(instanceKey(instance), { ...instance });
    }
    return instances.length;
  }
}

export class InMemoryImportPatternRepository implements ImportPatternRepository {
  private readonly bySeries = new Map<string, ImportPattern[]>();

  async findAll(): Promise<ImportPattern[]> {
    return [...this.bySeries.values()].flat().map((pattern) => ({ ...pattern }));
  }

  async findBySeries(seriesId: string): Promise<ImportPattern[]> {
    return (this.bySeries.get(seriesId) ?? []).map((pattern) => ({ ...pattern }));
  }

  async replaceForSeries(seriesId: string, patterns: ImportPattern[]): Promise<ImportPattern[]> {
    if (patterns.length === 0) {
      this.bySeries.delete(seriesId);
      return [];
    }
    const stored = patterns.map((pattern) => ({ seriesId, pattern: pattern.pattern }));
    this.bySeries.set(seriesId, stored);
    return stored.map((pattern) => ({ ...pattern }));
  }
}

export class InMemoryMatchRepository implements MatchRepository {
  private readonly rows = new Map<string, ReconciliationMatch>();
  private readonly activeByTransaction = new Map<string, string>();
  private readonly activeByInstance = new Map<string, string>();

  async createActive(data: NewMatch): Promise<ReconciliationMatch> {
    const key = instanceKey(data);
    const instance = { seriesId: data.seriesId, scheduledDate: data.scheduledDate };

    if (this.activeByTransaction.has(data.transactionId)) {
      throw new MatchConflictError(data.transactionId, instance, 'transaction');
    }
    if (this.activeByInstance.has(key)) {
      throw new MatchConflictError(data.transactionId, instance, 'instance');
    }

    const match: ReconciliationMatch = {
      ...data,
      id: randomUUID(),
      status: 'active',
      createdAt: new Date(),
    };
    this.rows.set(match.id, match);
    this.activeByTransaction.set(match.transactionId, match.id);
    this.activeByInstance.set(key, match.id);

    return { ...match };
  }

  async reject(id: string, resolvedAt: Date): Promise<ReconciliationMatch | null> {
    const row = this.rows.get(id);
    if (!row) {
      return null;
    }
    if (row.status === 'rejected') {
      return { ...row };
    }

    this.activeByTransaction.delete(row.transactionId);
    this.activeByInstance.delete(instanceKey(row));
    const rejected: ReconciliationMatch = { ...row, status: 'rejected', resolvedAt };
    this.rows.set(id, rejected);
    return { ...rejected };
  }

  async findById(id: string): Promise<ReconciliationMatch | null> {
    const row = this.rows.get(id);
    return row ? { ...row } : null;
  }

  async findActiveByTransaction(transactionId: string): Promise<ReconciliationMatch | null> {
    const id = this.activeByTransaction.get(transactionId);
    return id === undefined ? null : this.findById(id);
  }

  async findActiveByInstance(key: InstanceKey): Promise<ReconciliationMatch | null> {
    const id = this.activeByInstance.get(instanceKey(key));
    return id === undefined ? null : this.findById(id);
  }

  async findByTransaction(transactionId: string): Promise<ReconciliationMatch[]> {
    return [...this.rows.values()]
      .filter((row) => row.transactionId === transactionId)
      .sort(newestFirst)
      .map((row) => ({ ...row }));
  }

  async findByInstance(key: InstanceKey): Promise<ReconciliationMatch[]> {
    const wanted = instanceKey(key);
    return [...this.rows.values()]
      .filter((row) => instanceKey(row) === wanted)
      .sort(newestFirst)
      .map((row) => ({ ...row }));
  }

  async findActiveBetween(from: CalendarDate, to: CalendarDate): Promise<ReconciliationMatch[]> {
    return [...this.rows.values()]
      .filter((row) => row.status === 'active' && inRange(row.scheduledDate, from, to))
      .map((row) => ({ ...row }));
  }
}

export class InMemoryImportBatchRepository implements ImportBatchRepository {
  private readonly rows = new Map<string, ImportBatch>();

  async save(batch: ImportBatch): Promise<void> {
    this.rows.set(batch.id, {
      ...batch,
      report: { ...batch.report, rows: [...batch.report.rows] },
    });
  }

  async findById(id: string): Promise<ImportBatch | null> {
    const row = this.rows.get(id);
    return row ? { ...row, report: { ...row.report, rows: [...row.report.rows] } } : null;
  }
}

export function createInMemoryRepositories(): Repositories {
  return {
    transactions: new InMemoryTransactionRepository(),
    instances: new InMemoryRecurringInstanceSource(),
    patterns: new InMemoryImportPatternRepository(),
    matches: new InMemoryMatchRepository(),
    batches: new InMemoryImportBatchRepository(),
  };
}
