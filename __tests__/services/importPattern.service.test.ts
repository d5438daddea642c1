/**
 * Tests for the Import Pattern Service
 */

import { ConfigurationError, createTolerances } from '../../src/matching';
import { createInMemoryRepositories } from '../../src/repositories';
import { createServices, type Services } from '../../src/services';

describe('ImportPatternService', () => {
  let services: Services;

  beforeEach(() => {
    services = createServices(createInMemoryRepositories(), createTolerances());
  });

  it('should store normalized patterns for a series', async () => {
    const stored = await services.importPatterns.replace('netflix', ['netflix*', 'NFLX  DIGITAL*']);

    expect(stored).toEqual([
      { seriesId: 'netflix', pattern: 'NETFLIX*' },
      { seriesId: 'netflix', pattern: 'NFLX DIGITAL*' },
    ]);
    expect(await services.importPatterns.list('netflix')).toEqual(stored);
  });

  it('should replace the previous patterns of the series', async () => {
    await services.importPatterns.replace('netflix', ['NETFLIX*']);
    await services.importPatterns.replace('netflix', ['NFLX*']);

    expect(await services.importPatterns.list('netflix')).toEqual([
      { seriesId: 'netflix', pattern: 'NFLX*' },
    ]);
  });

  it('should clear the patterns with an empty list', async () => {
    await services.importPatterns.replace('netflix', ['NETFLIX*']);

    expect(await services.importPatterns.replace('netflix', [])).toEqual([]);
    expect(await services.importPatterns.list('netflix')).toEqual([]);
  });

  it('should reject patterns overlapping another series and keep the old ones', async () => {
    await services.importPatterns.replace('netflix', ['NETFLIX*']);
    await services.importPatterns.replace('hulu', ['HULU*']);

    await expect(services.importPatterns.replace('hulu', ['*FLIX*'])).rejects.toThrow(
      ConfigurationError
    );
    expect(await services.importPatterns.list('hulu')).toEqual([{ seriesId: 'hulu', pattern: 'HULU*' }]);
  });

  it('should let a series re-save patterns that overlap its own', async () => {
    await services.importPatterns.replace('netflix', ['NETFLIX*']);

    await expect(
      services.importPatterns.replace('netflix', ['NETFLIX*', 'NETFLIX.COM*'])
    ).resolves.toHaveLength(2);
  });

  it('should remember a description as an exact pattern', async () => {
    await services.importPatterns.replace('water', ['CITY WATER*']);

    const patterns = await services.importPatterns.remember('water', 'Municipal Utility  Dept');

    expect(patterns).toEqual([
      { seriesId: 'water', pattern: 'CITY WATER*' },
      { seriesId: 'water', pattern: 'MUNICIPAL UTILITY DEPT' },
    ]);
  });

  it('should refuse to remember a description containing a wildcard', async () => {
    await expect(services.importPatterns.remember('amazon', 'AMZN Mktp US*2K4')).rejects.toThrow(
      ConfigurationError
    );
    expect(await services.importPatterns.list('amazon')).toEqual([]);
  });

  it('should let only one of two concurrent overlapping writes win', async () => {
    const results = await Promise.allSettled([
      services.importPatterns.replace('netflix', ['NETFLIX*']),
      services.importPatterns.replace('streaming', ['*FLIX COM']),
    ]);

    expect(results.map((result) => result.status)).toEqual(['fulfilled', 'rejected']);
    expect(await services.importPatterns.list('netflix')).toEqual([
      { seriesId: 'netflix', pattern: 'NETFLIX*' },
    ]);
    expect(await services.importPatterns.list('streaming')).toEqual([]);
  });

  it('should keep accepting writes after a rejected one', async () => {
    await services.importPatterns.replace('netflix', ['NETFLIX*']);
    await expect(services.importPatterns.replace('streaming', ['*FLIX*'])).rejects.toThrow(
      ConfigurationError
    );

    await expect(services.importPatterns.replace('streaming', ['HULU*'])).resolves.toEqual([
      { seriesId: 'streaming', pattern: 'HULU*' },
    ]);
  });
});
