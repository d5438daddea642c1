/**
 * Import Pattern Service
 *
 * Write path for the per-series wildcard patterns. Every mutation is
 * validated against the patterns of all other series before it is stored,
 * so that at most one series can ever claim a description.
 *
 * "Remember this description" is an explicit, user-triggered write of an
 * exact pattern. The matcher itself never learns.
 *
 * Writes run one at a time: the overlap check reads every other series'
 * patterns and must still hold when the write lands.
 */

import { ConfigurationError, validateImportPatterns } from '../matching';
import type { ImportPattern } from '../matching';
import type { Repositories } from '../repositories';
import { logger } from '../utils';

const WILDCARD = '*';

export class ImportPatternService {
  private writes: Promise<unknown> = Promise.resolve();

  constructor(private readonly repositories: Repositories) {}

  private serialize<T>(write: () => Promise<T>): Promise<T> {
    const next = this.writes.then(write, write);
    this.writes = next.catch(() => undefined);
    return next;
  }

  async list(seriesId: string): Promise<ImportPattern[]> {
    return this.repositories.patterns.findBySeries(seriesId);
  }

  /**
   * Replaces the patterns of one series.
   *
   * @throws ConfigurationError on a malformed pattern or an overlap with another series
   */
  replace(seriesId: string, patterns: string[]): Promise<ImportPattern[]> {
    return this.serialize(() => this.replaceUnlocked(seriesId, patterns));
  }

  /**
   * Adds the description itself as a pattern of the series.
   *
   * @throws ConfigurationError when the description contains `*`, which a
   *         pattern would read as a wildcard
   */
  remember(seriesId: string, description: string): Promise<ImportPattern[]> {
    if (description.includes(WILDCARD)) {
      return Promise.reject(
        new ConfigurationError(
          `Description "${description}" contains "${WILDCARD}"; set the series patterns explicitly instead`
        )
      );
    }
    return this.serialize(async () => {
      const current = await this.list(seriesId);
      return this.replaceUnlocked(seriesId, [...current.map((pattern) => pattern.pattern), description]);
    });
  }

  private async replaceUnlocked(seriesId: string, patterns: string[]): Promise<ImportPattern[]> {
    const all = await this.repositories.patterns.findAll();
    const others = all.filter((pattern) => pattern.seriesId !== seriesId);

    const validated = validateImportPatterns(seriesId, patterns, others);
    const stored = await this.repositories.patterns.replaceForSeries(seriesId, validated);

    logger.info(`Import patterns for series ${seriesId} set to ${stored.length} pattern(s)`);
    return stored;
  }
}

export default ImportPatternService;
