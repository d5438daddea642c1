/**
 * Optional Redis layer: the shared client and the import progress mirror.
 * With REDIS_HOST unset both are inert and callers get their fallbacks.
 */

// Client exports
export {
  getRedisClient,
  isRedisEnabled,
  isRedisAvailable,
  disconnectRedis,
  safeRedisOperation,
  safeRedisWrite,
} from './client';

// Import progress exports
export {
  getCachedBatchProgress,
  setCachedBatchProgress,
  initBatchProgress,
  updateBatchStatus,
  type BatchProgress,
  type BatchProgressStatus,
} from './batchProgress';
