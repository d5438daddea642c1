/**
 * Tests for the Automatic Reconciliation Decision
 */

import { ConfigurationError } from '../../src/matching/errors';
import {
  decideReconciliation,
  rankCandidates,
  type ReconciliationInput,
} from '../../src/matching/reconcileTransaction';
import { createTolerances } from '../../src/matching/tolerances';
import type {
  ReconciliationMatch,
  RecurringInstance,
  Transaction,
} from '../../src/matching/types';

const tolerances = createTolerances();

const transaction: Transaction = {
  id: 'tx-1',
  accountId: 'checking',
  date: '2025-03-10',
  description: 'City Water Utility',
  amount: -100,
  currency: 'USD',
  kind: 'expense',
  origin: 'import',
  createdAt: new Date('2025-03-10T08:00:00Z'),
};

const waterA: RecurringInstance = {
  seriesId: 'water-a',
  scheduledDate: '2025-03-09',
  expectedDescription: 'City Water Utility',
  expectedAmount: 100,
};

const waterB: RecurringInstance = {
  seriesId: 'water-b',
  scheduledDate: '2025-03-11',
  expectedDescription: 'City Water Utility',
  expectedAmount: 102,
};

function input(overrides: Partial<ReconciliationInput> = {}): ReconciliationInput {
  return {
    transaction,
    instances: [waterA, waterB],
    activeMatches: [],
    patterns: [],
    tolerances,
    ...overrides,
  };
}

function activeMatch(transactionId: string, instance: RecurringInstance): ReconciliationMatch {
  return {
    id: `match-${transactionId}`,
    transactionId,
    seriesId: instance.seriesId,
    scheduledDate: instance.scheduledDate,
    source: 'auto',
    status: 'active',
    confidence: 0.9,
    amountVariance: 0,
    dateOffsetDays: 0,
    createdAt: new Date('2025-03-01T00:00:00Z'),
  };
}

describe('decideReconciliation', () => {
  // ============================================
  // Ambiguity
  // ============================================
  describe('ambiguity', () => {
    it('should refuse to pick between two near-identical candidates', () => {
      // A: 0.5 + 0.3 + 0.2·(2/3) = 0.9333; B: 0.5 + 0.3·(1 - 2/102) + 0.2·(2/3) = 0.9275
      expect(decideReconciliation(input())).toEqual({
        kind: 'ambiguous',
        report: {
          transactionId: 'tx-1',
          candidates: [
            { seriesId: 'water-a', scheduledDate: '2025-03-09', confidence: 0.9333 },
            { seriesId: 'water-b', scheduledDate: '2025-03-11', confidence: 0.9275 },
          ],
        },
      });
    });

    it('should match the remaining candidate when the other is claimed elsewhere', () => {
      const decision = decideReconciliation(
        input({ activeMatches: [activeMatch('tx-other', waterA)] })
      );

      expect(decision).toMatchObject({
        kind: 'matched',
        candidate: { instance: waterB, confidence: 0.9275, via: 'score' },
      });
    });

    it('should keep its own claimed instance visible', () => {
      const decision = decideReconciliation(
        input({ instances: [waterA], activeMatches: [activeMatch('tx-1', waterA)] })
      );

      expect(decision).toMatchObject({ kind: 'matched', candidate: { instance: waterA } });
    });
  });

  // ============================================
  // Descriptions
  // ============================================
  describe('descriptions', () => {
    it('should match a card purchase whose description starts with boilerplate', () => {
      const coffee: RecurringInstance = {
        seriesId: 'coffee',
        scheduledDate: '2025-03-10',
        expectedDescription: 'Starbucks',
        expectedAmount: 5.75,
      };

      const decision = decideReconciliation(
        input({
          transaction: { ...transaction, description: 'POS PURCHASE STARBUCKS WA', amount: -5.75 },
          instances: [coffee],
        })
      );

      expect(decision).toMatchObject({
        kind: 'matched',
        candidate: { instance: coffee, confidence: 1, via: 'score' },
      });
    });
  });

  // ============================================
  // Import patterns
  // ============================================
  describe('import patterns', () => {
    it('should attribute a pattern hit to the pattern series, skipping scoring', () => {
      const decision = decideReconciliation(
        input({ patterns: [{ seriesId: 'water-b', pattern: 'CITY WATER*' }] })
      );

      expect(decision).toMatchObject({
        kind: 'matched',
        candidate: { instance: waterB, confidence: 1, via: 'pattern' },
      });
    });

    it('should leave the transaction unmatched when the pattern series has no open instance', () => {
      const decision = decideReconciliation(
        input({ patterns: [{ seriesId: 'gas', pattern: 'CITY WATER*' }] })
      );

      expect(decision).toEqual({ kind: 'unmatched', suggestions: [] });
    });

    it('should pick the instance of the series closest to the transaction date', () => {
      const earlier = { ...waterB, scheduledDate: '2025-03-07' };
      const decision = decideReconciliation(
        input({
          instances: [earlier, waterB],
          patterns: [{ seriesId: 'water-b', pattern: 'CITY WATER*' }],
        })
      );

      expect(decision).toMatchObject({ kind: 'matched', candidate: { instance: waterB } });
    });

    it('should throw when patterns of two series match', () => {
      expect(() =>
        decideReconciliation(
          input({
            patterns: [
              { seriesId: 'water-a', pattern: 'CITY*' },
              { seriesId: 'water-b', pattern: '*UTILITY' },
            ],
          })
        )
      ).toThrow(ConfigurationError);
    });
  });

  // ============================================
  // Thresholds and constraints
  // ============================================
  describe('thresholds', () => {
    const far: RecurringInstance = {
      seriesId: 'water-far',
      scheduledDate: '2025-03-08',
      expectedDescription: 'City Water Utility',
      expectedAmount: 40,
    };

    it('should return mid-band candidates as suggestions', () => {
      // 0.5 + 0 + 0.2·(1/3) = 0.5667
      expect(decideReconciliation(input({ instances: [far] }))).toEqual({
        kind: 'unmatched',
        suggestions: [{ seriesId: 'water-far', scheduledDate: '2025-03-08', confidence: 0.5667 }],
      });
    });

    it('should exclude candidates beyond an enforced amount ceiling', () => {
      const enforced = createTolerances({ enforceAmountCeiling: true, amountToleranceCeiling: 0.5 });

      expect(decideReconciliation(input({ instances: [far], tolerances: enforced }))).toEqual({
        kind: 'unmatched',
        suggestions: [],
      });
    });

    it('should skip instances outside the date window', () => {
      const late = { ...waterA, scheduledDate: '2025-03-14' };

      expect(decideReconciliation(input({ instances: [late] }))).toEqual({
        kind: 'unmatched',
        suggestions: [],
      });
    });

    it('should respect account and currency constraints', () => {
      const otherAccount = { ...waterA, accountId: 'savings' };
      const otherCurrency = { ...waterB, currency: 'EUR' };

      expect(decideReconciliation(input({ instances: [otherAccount, otherCurrency] }))).toEqual({
        kind: 'unmatched',
        suggestions: [],
      });
    });
  });
});

describe('rankCandidates', () => {
  it('should drop candidates below the reject threshold and sort best first', () => {
    const unrelated: RecurringInstance = {
      seriesId: 'gym',
      scheduledDate: '2025-03-12',
      expectedDescription: 'Fitness Club',
      expectedAmount: 45,
    };

    const ranked = rankCandidates(transaction, [waterB, unrelated, waterA], tolerances);

    expect(ranked.map((candidate) => candidate.instance.seriesId)).toEqual(['water-a', 'water-b']);
  });
});
