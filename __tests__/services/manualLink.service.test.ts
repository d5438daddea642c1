/**
 * Tests for the Manual Link Registry
 */

import { createTolerances, InvalidManualLinkError } from '../../src/matching';
import type { RecurringInstance, Transaction } from '../../src/matching';
import { createInMemoryRepositories, type NewTransaction } from '../../src/repositories';
import { createServices, type Services } from '../../src/services';

const netflix: RecurringInstance = {
  seriesId: 'netflix',
  scheduledDate: '2025-03-09',
  expectedDescription: 'Netflix.com',
  expectedAmount: 15.49,
};

const hulu: RecurringInstance = {
  seriesId: 'hulu',
  scheduledDate: '2025-03-12',
  expectedDescription: 'Hulu',
  expectedAmount: 17.99,
};

describe('ManualLinkService', () => {
  let services: Services;

  const addTransaction = (overrides: Partial<NewTransaction> = {}): Promise<Transaction> =>
    services.repositories.transactions.create({
      accountId: 'checking',
      date: '2025-03-10',
      description: 'NETFLIX.COM 866-579-7172 CA',
      amount: -15.49,
      currency: 'USD',
      kind: 'expense',
      origin: 'import',
      ...overrides,
    });

  beforeEach(async () => {
    services = createServices(createInMemoryRepositories(), createTolerances());
    await services.repositories.instances.upsertMany([netflix, hulu]);
  });

  describe('link', () => {
    it('should create an active manual match', async () => {
      const transaction = await addTransaction({ amount: -14 });

      const match = await services.manualLinks.link(transaction.id, netflix);

      expect(match).toMatchObject({
        transactionId: transaction.id,
        seriesId: 'netflix',
        scheduledDate: '2025-03-09',
        source: 'manual',
        status: 'active',
        amountVariance: 1.49,
        dateOffsetDays: 1,
      });
      expect(match.confidence).toBeUndefined();
    });

    it('should override an auto match of the transaction', async () => {
      const transaction = await addTransaction();
      const evaluated = await services.reconciliation.evaluate(transaction.id);
      expect(evaluated.kind).toBe('matched');

      const match = await services.manualLinks.link(transaction.id, hulu);

      const history = await services.reconciliation.getMatchesForTransaction(transaction.id);
      expect(history.filter((entry) => entry.status === 'active')).toEqual([match]);
      expect(history.find((entry) => entry.seriesId === 'netflix')?.status).toBe('rejected');
    });

    it('should override an auto match held by another transaction on the instance', async () => {
      const first = await addTransaction();
      await services.reconciliation.evaluate(first.id);
      const second = await addTransaction({ date: '2025-03-09', description: 'NETFLIX' });

      await services.manualLinks.link(second.id, netflix);

      expect(await services.repositories.matches.findActiveByTransaction(first.id)).toBeNull();
      expect(await services.repositories.matches.findActiveByInstance(netflix)).toMatchObject({
        transactionId: second.id,
        source: 'manual',
      });
    });

    it('should refuse to take an instance manually linked to another transaction', async () => {
      const first = await addTransaction();
      const second = await addTransaction({ date: '2025-03-09' });
      await services.manualLinks.link(first.id, netflix);

      await expect(services.manualLinks.link(second.id, netflix)).rejects.toThrow(
        InvalidManualLinkError
      );
      await expect(services.manualLinks.link(second.id, netflix)).rejects.toThrow(
        `Recurring instance netflix@2025-03-09 is already linked to transaction ${first.id}; unlink it first`
      );
    });

    it('should refuse to move a manually linked transaction without an unlink', async () => {
      const transaction = await addTransaction();
      await services.manualLinks.link(transaction.id, netflix);

      await expect(services.manualLinks.link(transaction.id, hulu)).rejects.toThrow(
        `Transaction ${transaction.id} is already linked to netflix@2025-03-09; unlink it first`
      );
    });

    it('should return the existing match when re-linking the same pair', async () => {
      const transaction = await addTransaction();
      const first = await services.manualLinks.link(transaction.id, netflix);

      const second = await services.manualLinks.link(transaction.id, netflix);

      expect(second).toEqual(first);
    });

    it('should throw 404 for an unknown transaction or instance', async () => {
      const transaction = await addTransaction();

      await expect(services.manualLinks.link('missing', netflix)).rejects.toMatchObject({
        statusCode: 404,
      });
      await expect(
        services.manualLinks.link(transaction.id, { seriesId: 'gym', scheduledDate: '2025-03-01' })
      ).rejects.toMatchObject({
        statusCode: 404,
        message: 'Recurring instance gym@2025-03-01 not found',
      });
    });
  });

  describe('unlink', () => {
    it('should reject the match and free both sides', async () => {
      const transaction = await addTransaction();
      const match = await services.manualLinks.link(transaction.id, netflix);

      const rejected = await services.manualLinks.unlink(match.id);

      expect(rejected).toMatchObject({ id: match.id, status: 'rejected' });
      expect(rejected.resolvedAt).toBeInstanceOf(Date);
      expect(await services.repositories.matches.findActiveByInstance(netflix)).toBeNull();
    });

    it('should allow the automatic decider to run again after an unlink', async () => {
      const transaction = await addTransaction();
      const match = await services.manualLinks.link(transaction.id, hulu);
      await services.manualLinks.unlink(match.id);

      const result = await services.reconciliation.evaluate(transaction.id);

      expect(result).toMatchObject({ kind: 'matched', match: { seriesId: 'netflix', source: 'auto' } });
    });

    it('should return an already rejected match unchanged', async () => {
      const transaction = await addTransaction();
      const match = await services.manualLinks.link(transaction.id, netflix);
      const first = await services.manualLinks.unlink(match.id);

      expect(await services.manualLinks.unlink(match.id)).toEqual(first);
    });

    it('should throw 404 for an unknown match', async () => {
      await expect(services.manualLinks.unlink('missing')).rejects.toMatchObject({
        statusCode: 404,
        message: 'Match missing not found',
      });
    });
  });
});
