/**
 * Import Batch Progress Module
 *
 * Provides Redis-backed progress tracking for bulk imports.
 *
 * DESIGN PRINCIPLES:
 * - The batch repository remains the SOURCE OF TRUTH
 * - Redis is a FAST MIRROR for UI progress polling while a batch runs
 * - Redis failures do not affect import processing
 * - All reads fall back to the repository if Redis is unavailable
 *
 * KEY FORMAT: import:{batchId}:progress
 */

import { safeRedisOperation, safeRedisWrite } from './client';

// ============================================
// Configuration
// ============================================

const CACHE_KEY_PREFIX = 'import:';
const CACHE_KEY_SUFFIX = ':progress';

/**
 * Cache TTL in seconds (1 hour)
 * Imports should complete well within this time
 */
const CACHE_TTL_SECONDS = 60 * 60;

function getCacheKey(batchId: string): string {
  return `${CACHE_KEY_PREFIX}${batchId}${CACHE_KEY_SUFFIX}`;
}

// ============================================
// Data Structure
// ============================================

export type BatchProgressStatus = 'processing' | 'completed' | 'cancelled' | 'failed';

/**
 * Import progress stored in a Redis hash
 */
export interface BatchProgress {
  totalRows: number;
  processedCount: number;
  createdCount: number;
  duplicateCount: number;
  ambiguousCount: number;
  erroredCount: number;
  autoMatchedCount: number;
  unmatchedCount: number;
  status: BatchProgressStatus | 'unknown';
}

const COUNTER_FIELDS = [
  'totalRows',
  'processedCount',
  'createdCount',
  'duplicateCount',
  'ambiguousCount',
  'erroredCount',
  'autoMatchedCount',
  'unmatchedCount',
] as const;

const STATUSES: readonly BatchProgressStatus[] = ['processing', 'completed', 'cancelled', 'failed'];

function parseStatus(value: string | undefined): BatchProgress['status'] {
  return STATUSES.find((status) => status === value) ?? 'unknown';
}

function parseCounter(value: string | undefined): number {
  const parsed = parseInt(value || '0', 10);
  return Number.isNaN(parsed) ? 0 : parsed;
}

// ============================================
// Cache Operations
// ============================================

/**
 * Gets cached import progress
 *
 * @returns Cached progress or null if not in cache
 */
export async function getCachedBatchProgress(batchId: string): Promise<BatchProgress | null> {
  const cacheKey = getCacheKey(batchId);

  return safeRedisOperation<BatchProgress | null>(
    async (client) => {
      const data = await client.hgetall(cacheKey);

      if (!data || Object.keys(data).length === 0) {
        return null;
      }

      return {
        totalRows: parseCounter(data.totalRows),
        processedCount: parseCounter(data.processedCount),
        createdCount: parseCounter(data.createdCount),
        duplicateCount: parseCounter(data.duplicateCount),
        ambiguousCount: parseCounter(data.ambiguousCount),
        erroredCount: parseCounter(data.erroredCount),
        autoMatchedCount: parseCounter(data.autoMatchedCount),
        unmatchedCount: parseCounter(data.unmatchedCount),
        status: parseStatus(data.status),
      };
    },
    null,
    `Import progress GET (${batchId})`
  );
}

/**
 * Sets the full import progress in cache
 */
export async function setCachedBatchProgress(
  batchId: string,
  progress: BatchProgress
): Promise<void> {
  const cacheKey = getCacheKey(batchId);

  await safeRedisWrite(async (client) => {
    const fields: Record<string, string> = { status: progress.status };
    for (const field of COUNTER_FIELDS) {
      fields[field] = progress[field].toString();
    }

    const multi = client.multi();
    multi.hset(cacheKey, fields);
    multi.expire(cacheKey, CACHE_TTL_SECONDS);
    await multi.exec();
  }, `Import progress SET (${batchId})`);
}

/**
 * Initializes import progress in cache
 *
 * Call this when starting an import
 */
export async function initBatchProgress(batchId: string, totalRows: number = 0): Promise<void> {
  await setCachedBatchProgress(batchId, {
    totalRows,
    processedCount: 0,
    createdCount: 0,
    duplicateCount: 0,
    ambiguousCount: 0,
    erroredCount: 0,
    autoMatchedCount: 0,
    unmatchedCount: 0,
    status: 'processing',
  });
}

/**
 * Updates import status in cache
 */
export async function updateBatchStatus(
  batchId: string,
  status: BatchProgressStatus
): Promise<void> {
  const cacheKey = getCacheKey(batchId);

  await safeRedisWrite(async (client) => {
    await client.hset(cacheKey, 'status', status);
  }, `Import status UPDATE (${batchId})`);
}

export default {
  getCachedBatchProgress,
  setCachedBatchProgress,
  initBatchProgress,
  updateBatchStatus,
};
