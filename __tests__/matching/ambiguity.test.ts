/**
 * Tests for Ambiguity Resolution
 */

import {
  buildAmbiguityReport,
  compareCandidates,
  resolveAmbiguity,
} from '../../src/matching/ambiguity';
import { createTolerances } from '../../src/matching/tolerances';
import type { ScoredCandidate } from '../../src/matching/types';

const tolerances = createTolerances();

function candidate(
  seriesId: string,
  confidence: number,
  overrides: Partial<ScoredCandidate> & { scheduledDate?: string } = {}
): ScoredCandidate {
  const { scheduledDate = '2025-03-10', ...rest } = overrides;
  return {
    instance: {
      seriesId,
      scheduledDate,
      expectedDescription: seriesId,
      expectedAmount: 10,
    },
    confidence,
    level: 'high',
    breakdown: { descriptionScore: 1, amountScore: 1, dateScore: 1, editDistance: 0, jaccard: 1 },
    amountVariance: 0,
    dateOffsetDays: 0,
    via: 'score',
    explanation: '',
    ...rest,
  };
}

describe('resolveAmbiguity', () => {
  it('should return none when nothing clears the accept threshold', () => {
    const result = resolveAmbiguity([candidate('a', 0.79), candidate('b', 0.5)], tolerances);

    expect(result).toEqual({ kind: 'none' });
  });

  it('should return none for no candidates', () => {
    expect(resolveAmbiguity([], tolerances)).toEqual({ kind: 'none' });
  });

  it('should pick a single eligible candidate', () => {
    const winner = candidate('a', 0.85);
    const result = resolveAmbiguity([candidate('b', 0.7), winner], tolerances);

    expect(result).toEqual({ kind: 'winner', winner });
  });

  it('should report scores within epsilon as ambiguous', () => {
    const result = resolveAmbiguity([candidate('a', 0.81), candidate('b', 0.8)], tolerances);

    expect(result.kind).toBe('ambiguous');
    expect(result.kind === 'ambiguous' && result.tied.map((c) => c.instance.seriesId)).toEqual([
      'a',
      'b',
    ]);
  });

  it('should treat a gap of exactly epsilon as ambiguous', () => {
    const result = resolveAmbiguity([candidate('a', 0.82), candidate('b', 0.8)], tolerances);

    expect(result.kind).toBe('ambiguous');
  });

  it('should pick the top candidate when it is clearly ahead', () => {
    const top = candidate('a', 0.95);
    const result = resolveAmbiguity([candidate('b', 0.82), top], tolerances);

    expect(result).toEqual({ kind: 'winner', winner: top });
  });

  it('should only list candidates within epsilon of the top score', () => {
    const result = resolveAmbiguity(
      [candidate('a', 0.9), candidate('b', 0.89), candidate('c', 0.85)],
      tolerances
    );

    expect(result.kind === 'ambiguous' && result.tied.map((c) => c.instance.seriesId)).toEqual([
      'a',
      'b',
    ]);
  });

  it('should let a pattern-attributed candidate win outright', () => {
    const pattern = candidate('p', 1, { via: 'pattern' });
    const result = resolveAmbiguity([candidate('a', 0.99), pattern], tolerances);

    expect(result).toEqual({ kind: 'winner', winner: pattern });
  });

  it('should honour a custom epsilon', () => {
    const strict = createTolerances({ ambiguityEpsilon: 0 });
    const result = resolveAmbiguity([candidate('a', 0.81), candidate('b', 0.8)], strict);

    expect(result.kind === 'winner' && result.winner.instance.seriesId).toBe('a');
  });
});

describe('compareCandidates', () => {
  it('should order by confidence, then date distance, then date, then series', () => {
    const sorted = [
      candidate('d', 0.9, { dateOffsetDays: 0, scheduledDate: '2025-03-10' }),
      candidate('c', 0.9, { dateOffsetDays: -1, scheduledDate: '2025-03-11' }),
      candidate('b', 0.9, { dateOffsetDays: 1, scheduledDate: '2025-03-09' }),
      candidate('a', 0.9, { dateOffsetDays: 0, scheduledDate: '2025-03-10' }),
      candidate('e', 0.95, { dateOffsetDays: 2, scheduledDate: '2025-03-08' }),
    ].sort(compareCandidates);

    expect(sorted.map((c) => c.instance.seriesId)).toEqual(['e', 'a', 'd', 'b', 'c']);
  });
});

describe('buildAmbiguityReport', () => {
  it('should summarise every tied candidate', () => {
    const report = buildAmbiguityReport('tx-1', [
      candidate('a', 0.81, { scheduledDate: '2025-03-09' }),
      candidate('b', 0.8, { scheduledDate: '2025-03-11' }),
    ]);

    expect(report).toEqual({
      transactionId: 'tx-1',
      candidates: [
        { seriesId: 'a', scheduledDate: '2025-03-09', confidence: 0.81 },
        { seriesId: 'b', scheduledDate: '2025-03-11', confidence: 0.8 },
      ],
    });
  });
});
