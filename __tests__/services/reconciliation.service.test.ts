/**
 * Tests for the Reconciliation Service
 *
 * Runs the services against the in-memory repositories.
 */

import {
  AmbiguousMatchError,
  ConfigurationError,
  createTolerances,
  MatchConflictError,
} from '../../src/matching';
import type { RecurringInstance, Transaction } from '../../src/matching';
import { createInMemoryRepositories, type NewTransaction } from '../../src/repositories';
import { createServices, type Services } from '../../src/services';
import { AppError } from '../../src/utils';

const netflix: RecurringInstance = {
  seriesId: 'netflix',
  scheduledDate: '2025-03-09',
  expectedDescription: 'Netflix.com',
  expectedAmount: 15.49,
};

const rent: RecurringInstance = {
  seriesId: 'rent',
  scheduledDate: '2025-03-01',
  expectedDescription: 'Monthly Rent',
  expectedAmount: 1500,
};

const netflixApril: RecurringInstance = { ...netflix, scheduledDate: '2025-04-09' };

describe('ReconciliationService', () => {
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
    await services.repositories.instances.upsertMany([netflix, rent, netflixApril]);
  });

  // ============================================
  // evaluate
  // ============================================
  describe('evaluate', () => {
    it('should auto-match the best candidate', async () => {
      const transaction = await addTransaction();

      const result = await services.reconciliation.evaluate(transaction.id);

      expect(result).toMatchObject({
        kind: 'matched',
        match: {
          transactionId: transaction.id,
          seriesId: 'netflix',
          scheduledDate: '2025-03-09',
          source: 'auto',
          status: 'active',
          confidence: 0.9333,
          amountVariance: 0,
          dateOffsetDays: 1,
        },
      });
    });

    it('should keep an existing match that still wins', async () => {
      const transaction = await addTransaction();
      await services.reconciliation.evaluate(transaction.id);
      const before = await services.repositories.matches.findActiveByTransaction(transaction.id);

      const result = await services.reconciliation.evaluate(transaction.id);

      expect(result).toEqual({ kind: 'matched', match: before });
      expect(await services.reconciliation.getMatchesForTransaction(transaction.id)).toHaveLength(1);
    });

    it('should leave a manual match untouched', async () => {
      const transaction = await addTransaction({ description: 'STREAMING SERVICE' });
      const manual = await services.manualLinks.link(transaction.id, netflix);

      const result = await services.reconciliation.evaluate(transaction.id);

      expect(result).toEqual({ kind: 'manual', match: manual });
    });

    it('should supersede an auto match that no longer wins after an edit', async () => {
      const transaction = await addTransaction();
      await services.reconciliation.evaluate(transaction.id);
      const original = await services.repositories.matches.findActiveByTransaction(transaction.id);

      await services.repositories.transactions.update(transaction.id, { description: 'Spotify USA' });
      const result = await services.reconciliation.evaluate(transaction.id);

      expect(result).toMatchObject({
        kind: 'unmatched',
        // 0 + 0.3 + 0.2·(2/3)
        suggestions: [{ seriesId: 'netflix', scheduledDate: '2025-03-09', confidence: 0.4333 }],
        superseded: { id: original?.id, status: 'rejected' },
      });
      expect(await services.repositories.matches.findActiveByTransaction(transaction.id)).toBeNull();
    });

    it('should restore the superseded match when the new candidate is claimed concurrently', async () => {
      const transaction = await addTransaction();
      await services.reconciliation.evaluate(transaction.id);
      const original = await services.repositories.matches.findActiveByTransaction(transaction.id);
      await services.repositories.transactions.update(transaction.id, { date: '2025-04-08' });
      jest
        .spyOn(services.repositories.matches, 'createActive')
        .mockRejectedValueOnce(new MatchConflictError(transaction.id, netflixApril, 'instance'));

      await expect(services.reconciliation.evaluate(transaction.id)).rejects.toThrow(MatchConflictError);

      const active = await services.repositories.matches.findActiveByTransaction(transaction.id);
      expect(active).toMatchObject({
        seriesId: 'netflix',
        scheduledDate: '2025-03-09',
        source: 'auto',
        status: 'active',
        confidence: original?.confidence,
      });
      expect(active?.id).not.toBe(original?.id);
    });

    it('should throw AmbiguousMatchError and write no match on a tie', async () => {
      await services.repositories.instances.upsertMany([
        { seriesId: 'water-a', scheduledDate: '2025-03-09', expectedDescription: 'City Water Utility', expectedAmount: 100 },
        { seriesId: 'water-b', scheduledDate: '2025-03-11', expectedDescription: 'City Water Utility', expectedAmount: 102 },
      ]);
      const transaction = await addTransaction({ description: 'City Water Utility', amount: -100 });

      await expect(services.reconciliation.evaluate(transaction.id)).rejects.toThrow(
        AmbiguousMatchError
      );
      expect(await services.repositories.matches.findActiveByTransaction(transaction.id)).toBeNull();
    });

    it('should supersede a stale auto match when the decision becomes ambiguous', async () => {
      await services.repositories.instances.upsertMany([
        { seriesId: 'water-a', scheduledDate: '2025-03-09', expectedDescription: 'City Water Utility', expectedAmount: 100 },
      ]);
      const transaction = await addTransaction({ description: 'City Water Utility', amount: -100 });
      await services.reconciliation.evaluate(transaction.id);

      await services.repositories.instances.upsertMany([
        { seriesId: 'water-b', scheduledDate: '2025-03-11', expectedDescription: 'City Water Utility', expectedAmount: 102 },
      ]);

      await expect(services.reconciliation.evaluate(transaction.id)).rejects.toMatchObject({
        statusCode: 409,
        report: { transactionId: transaction.id },
      });
      const history = await services.reconciliation.getMatchesForTransaction(transaction.id);
      expect(history.map((match) => match.status)).toEqual(['rejected']);
    });

    it('should evaluate with per-call tolerances', async () => {
      const transaction = await addTransaction();

      const result = await services.reconciliation.evaluate(
        transaction.id,
        createTolerances({ acceptThreshold: 0.95 })
      );

      expect(result).toEqual({
        kind: 'unmatched',
        suggestions: [{ seriesId: 'netflix', scheduledDate: '2025-03-09', confidence: 0.9333 }],
        superseded: undefined,
      });
    });

    it('should throw 404 for an unknown transaction', async () => {
      await expect(services.reconciliation.evaluate('missing')).rejects.toMatchObject({
        statusCode: 404,
        message: 'Transaction missing not found',
      });
    });
  });

  // ============================================
  // sweep
  // ============================================
  describe('sweep', () => {
    it('should evaluate unmatched transactions in the range and skip matched ones', async () => {
      const rentPayment = await addTransaction({
        date: '2025-03-01',
        description: 'RENT PAYMENT',
        amount: -1500,
      });
      await services.manualLinks.link(rentPayment.id, rent);
      await addTransaction();
      await addTransaction({ date: '2025-03-20', description: 'ACE HARDWARE', amount: -20 });

      const report = await services.reconciliation.sweep('2025-03-01', '2025-03-31');

      expect(report).toEqual({
        from: '2025-03-01',
        to: '2025-03-31',
        evaluated: 2,
        skipped: 1,
        matched: 1,
        unmatched: 1,
        ambiguous: 0,
        errored: 0,
      });
    });

    it('should count failures without stopping', async () => {
      await services.repositories.patterns.replaceForSeries('tools', [{ seriesId: 'tools', pattern: 'ACE*' }]);
      await services.repositories.patterns.replaceForSeries('hardware', [
        { seriesId: 'hardware', pattern: '*HARDWARE' },
      ]);
      await addTransaction({ date: '2025-03-20', description: 'ACE HARDWARE', amount: -20 });
      await addTransaction();

      const report = await services.reconciliation.sweep('2025-03-01', '2025-03-31');

      expect(report).toMatchObject({ evaluated: 2, matched: 1, errored: 1 });
    });

    it('should reject an inverted range', async () => {
      await expect(services.reconciliation.sweep('2025-03-31', '2025-03-01')).rejects.toThrow(
        AppError
      );
    });
  });

  // ============================================
  // Monthly status
  // ============================================
  describe('getMonthlyStatus', () => {
    it('should list matched and missing instances of the month', async () => {
      const transaction = await addTransaction();
      await services.reconciliation.evaluate(transaction.id);

      const status = await services.reconciliation.getMonthlyStatus(2025, 3);

      expect(status).toMatchObject({ year: 2025, month: 3, matched: 1, missing: 1 });
      expect(status.instances).toEqual([
        {
          seriesId: 'rent',
          scheduledDate: '2025-03-01',
          expectedDescription: 'Monthly Rent',
          expectedAmount: 1500,
          status: 'missing',
        },
        {
          seriesId: 'netflix',
          scheduledDate: '2025-03-09',
          expectedDescription: 'Netflix.com',
          expectedAmount: 15.49,
          status: 'matched',
          match: {
            id: expect.any(String),
            transactionId: transaction.id,
            source: 'auto',
            confidence: 0.9333,
            amountVariance: 0,
            dateOffsetDays: 1,
          },
        },
      ]);
    });
  });

  describe('configuration errors', () => {
    it('should surface overlapping patterns at evaluation time', async () => {
      await services.repositories.patterns.replaceForSeries('a', [{ seriesId: 'a', pattern: 'NETFLIX*' }]);
      await services.repositories.patterns.replaceForSeries('b', [{ seriesId: 'b', pattern: '*CA' }]);
      const transaction = await addTransaction();

      await expect(services.reconciliation.evaluate(transaction.id)).rejects.toThrow(
        ConfigurationError
      );
    });
  });
});
