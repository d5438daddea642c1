/**
 * Tests for Redis Client
 *
 * Tests Redis client initialization and graceful degradation.
 * Note: These are unit tests that don't require an actual Redis connection;
 * REDIS_HOST is unset in the test environment.
 */

import {
  getRedisClient,
  getRedisConfig,
  isRedisAvailable,
  isRedisEnabled,
  safeRedisOperation,
  safeRedisWrite,
} from '../../src/redis/client';

describe('Redis Client', () => {
  // ============================================
  // Configuration
  // ============================================
  describe('configuration', () => {
    it('should be disabled without REDIS_HOST', () => {
      expect(isRedisEnabled()).toBe(false);
    });

    it('should connect lazily with bounded retries', () => {
      const config = getRedisConfig();

      expect(config.lazyConnect).toBe(true);
      expect(config.maxRetriesPerRequest).toBe(1);
      expect(config.retryStrategy(1)).toBe(100);
      expect(config.retryStrategy(3)).toBe(300);
      expect(config.retryStrategy(4)).toBeNull();
    });
  });

  // ============================================
  // Client availability
  // ============================================
  describe('getRedisClient', () => {
    it('should return null when Redis is not configured', () => {
      expect(getRedisClient()).toBeNull();
      expect(isRedisAvailable()).toBe(false);
    });
  });

  // ============================================
  // Safe operations
  // ============================================
  describe('safeRedisOperation', () => {
    it('should return the fallback without running the operation', async () => {
      const operation = jest.fn().mockResolvedValue('cached');

      const result = await safeRedisOperation(operation, 'fallback', 'test read');

      expect(result).toBe('fallback');
      expect(operation).not.toHaveBeenCalled();
    });
  });

  describe('safeRedisWrite', () => {
    it('should skip the write without throwing', async () => {
      const operation = jest.fn().mockResolvedValue(undefined);

      await expect(safeRedisWrite(operation, 'test write')).resolves.toBeUndefined();
      expect(operation).not.toHaveBeenCalled();
    });
  });
});
