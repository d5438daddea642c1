/**
 * Tests for the In-memory Repositories
 *
 * The match repository's conditional write is what keeps at most one
 * Active match per transaction and per recurring instance.
 */

import { MatchConflictError } from '../../src/matching/errors';
import type { NewMatch } from '../../src/repositories';
import {
  InMemoryMatchRepository,
  InMemoryTransactionRepository,
} from '../../src/repositories/memory';

function newMatch(overrides: Partial<NewMatch> = {}): NewMatch {
  return {
    transactionId: 'tx-1',
    seriesId: 'netflix',
    scheduledDate: '2025-03-09',
    source: 'auto',
    confidence: 0.93,
    amountVariance: 0,
    dateOffsetDays: 1,
    ...overrides,
  };
}

describe('InMemoryMatchRepository', () => {
  let matches: InMemoryMatchRepository;

  beforeEach(() => {
    matches = new InMemoryMatchRepository();
  });

  describe('createActive', () => {
    it('should store an active match', async () => {
      const match = await matches.createActive(newMatch());

      expect(match.status).toBe('active');
      expect(await matches.findActiveByTransaction('tx-1')).toEqual(match);
      expect(await matches.findActiveByInstance({ seriesId: 'netflix', scheduledDate: '2025-03-09' })).toEqual(match);
    });

    it('should refuse a second active match for the transaction', async () => {
      await matches.createActive(newMatch());

      await expect(
        matches.createActive(newMatch({ seriesId: 'hulu' }))
      ).rejects.toThrow('Transaction tx-1 already has an active match');
    });

    it('should refuse a second active match for the instance', async () => {
      await matches.createActive(newMatch());

      await expect(matches.createActive(newMatch({ transactionId: 'tx-2' }))).rejects.toThrow(
        MatchConflictError
      );
      await expect(matches.createActive(newMatch({ transactionId: 'tx-2' }))).rejects.toThrow(
        'Recurring instance netflix@2025-03-09 already has an active match'
      );
    });

    it('should let only one of two concurrent writes win', async () => {
      const results = await Promise.allSettled([
        matches.createActive(newMatch({ transactionId: 'tx-1' })),
        matches.createActive(newMatch({ transactionId: 'tx-2' })),
      ]);

      expect(results.map((result) => result.status)).toEqual(['fulfilled', 'rejected']);
    });
  });

  describe('reject', () => {
    it('should free both sides of the match', async () => {
      const match = await matches.createActive(newMatch());
      const resolvedAt = new Date('2025-03-12T00:00:00Z');

      const rejected = await matches.reject(match.id, resolvedAt);

      expect(rejected).toMatchObject({ status: 'rejected', resolvedAt });
      expect(await matches.findActiveByTransaction('tx-1')).toBeNull();
      await expect(matches.createActive(newMatch({ transactionId: 'tx-2' }))).resolves.toMatchObject({
        status: 'active',
      });
    });

    it('should keep history', async () => {
      const first = await matches.createActive(newMatch());
      await matches.reject(first.id, new Date());
      await matches.createActive(newMatch({ seriesId: 'hulu' }));

      const history = await matches.findByTransaction('tx-1');

      expect(history).toHaveLength(2);
      expect(history.filter((match) => match.status === 'active')).toHaveLength(1);
    });

    it('should return null for an unknown match', async () => {
      expect(await matches.reject('missing', new Date())).toBeNull();
    });
  });

  describe('findActiveBetween', () => {
    it('should filter by scheduled date', async () => {
      await matches.createActive(newMatch());
      await matches.createActive(newMatch({ transactionId: 'tx-2', scheduledDate: '2025-04-09' }));

      const march = await matches.findActiveBetween('2025-03-01', '2025-03-31');

      expect(march.map((match) => match.transactionId)).toEqual(['tx-1']);
    });
  });
});

describe('InMemoryTransactionRepository', () => {
  let transactions: InMemoryTransactionRepository;

  beforeEach(() => {
    transactions = new InMemoryTransactionRepository();
  });

  it('should return copies that cannot change stored state', async () => {
    const created = await transactions.create({
      accountId: 'checking',
      date: '2025-03-10',
      description: 'COFFEE HOUSE',
      amount: -4.5,
      currency: 'USD',
      kind: 'expense',
      origin: 'manual',
    });

    created.description = 'changed';

    expect((await transactions.findById(created.id))?.description).toBe('COFFEE HOUSE');
  });

  it('should find transactions of one account in a date range, earliest first', async () => {
    const base = {
      description: 'COFFEE HOUSE',
      amount: -4.5,
      currency: 'USD',
      kind: 'expense' as const,
      origin: 'import' as const,
    };
    await transactions.create({ ...base, accountId: 'checking', date: '2025-03-11' });
    await transactions.create({ ...base, accountId: 'checking', date: '2025-03-09' });
    await transactions.create({ ...base, accountId: 'savings', date: '2025-03-10' });
    await transactions.create({ ...base, accountId: 'checking', date: '2025-03-20' });

    const found = await transactions.findByAccountBetween('checking', '2025-03-09', '2025-03-11');

    expect(found.map((transaction) => transaction.date)).toEqual(['2025-03-09', '2025-03-11']);
  });

  it('should return null when updating an unknown transaction', async () => {
    expect(await transactions.update('missing', { description: 'x' })).toBeNull();
  });
});
