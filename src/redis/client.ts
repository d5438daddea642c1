/**
 * Redis Client Module
 *
 * One lazily created ioredis client shared by the import progress mirror.
 * Redis only mirrors state the repositories already hold, so every failure
 * here is logged and absorbed: a read falls back, a write is dropped.
 *
 * With REDIS_HOST unset no client is ever created.
 */

import Redis from 'ioredis';
import { env } from '../config';
import { logger } from '../utils';

// ============================================
// Configuration
// ============================================

export interface RedisConfig {
  host: string;
  port: number;
  keyPrefix: string;
  maxRetriesPerRequest: number;
  retryStrategy: (times: number) => number | null;
  lazyConnect: boolean;
}

const MAX_RECONNECT_ATTEMPTS = 3;
const RECONNECT_STEP_MS = 100;

export function isRedisEnabled(): boolean {
  return env.REDIS_HOST !== undefined;
}

export function getRedisConfig(): RedisConfig {
  return {
    host: env.REDIS_HOST ?? 'localhost',
    port: env.REDIS_PORT,
    keyPrefix: 'ledger:',
    // A slow Redis must not hold up an import row
    maxRetriesPerRequest: 1,
    // 100ms, 200ms, 300ms, then give up until the next explicit use
    retryStrategy: (times: number) =>
      times > MAX_RECONNECT_ATTEMPTS ? null : times * RECONNECT_STEP_MS,
    lazyConnect: true,
  };
}

// ============================================
// Connection state
// ============================================

type ConnectionState = 'idle' | 'connecting' | 'ready' | 'down';

const connection: { client: Redis | null; state: ConnectionState } = {
  client: null,
  state: 'idle',
};

const describe = (error: unknown): string =>
  error instanceof Error ? error.message : 'Unknown error';

function connect(): Redis {
  const client = new Redis(getRedisConfig());
  connection.state = 'connecting';

  client.on('ready', () => {
    connection.state = 'ready';
    logger.info('📦 Redis ready (import progress mirror enabled)');
  });
  client.on('error', (error: Error) => {
    connection.state = 'down';
    logger.warn(`Redis error (non-fatal): ${error.message}`);
  });
  client.on('end', () => {
    connection.state = 'down';
    logger.debug('Redis connection ended');
  });

  client.connect().catch((error: unknown) => {
    connection.state = 'down';
    logger.warn(`Redis initial connection failed (non-fatal): ${describe(error)}`);
  });

  return client;
}

/**
 * Returns the shared client, creating it on first use.
 * Null when Redis is not configured.
 */
export function getRedisClient(): Redis | null {
  if (!isRedisEnabled()) {
    return null;
  }
  if (connection.client === null) {
    connection.client = connect();
  }
  return connection.client;
}

export function isRedisAvailable(): boolean {
  return connection.client !== null && connection.state === 'ready';
}

/**
 * Closes the shared client during shutdown.
 */
export async function disconnectRedis(): Promise<void> {
  const { client } = connection;
  if (client === null) {
    return;
  }

  try {
    await client.quit();
    logger.info('Redis disconnected');
  } catch (error) {
    logger.warn(`Redis disconnect error (non-fatal): ${describe(error)}`);
  } finally {
    connection.client = null;
    connection.state = 'idle';
  }
}

// ============================================
// Safe operations
// ============================================

function readyClient(operationName: string): Redis | null {
  const client = getRedisClient();
  if (client === null || connection.state !== 'ready') {
    logger.debug(`${operationName}: Redis unavailable`);
    return null;
  }
  return client;
}

/**
 * Runs a read against Redis, returning the fallback when Redis is
 * unavailable or the read fails.
 */
export async function safeRedisOperation<T>(
  operation: (client: Redis) => Promise<T>,
  fallback: T,
  operationName = 'Redis read'
): Promise<T> {
  const client = readyClient(operationName);
  if (client === null) {
    return fallback;
  }

  try {
    return await operation(client);
  } catch (error) {
    logger.warn(`${operationName} failed (non-fatal): ${describe(error)}`);
    return fallback;
  }
}

/**
 * Runs a write against Redis; a failure is logged and dropped.
 */
export async function safeRedisWrite(
  operation: (client: Redis) => Promise<unknown>,
  operationName = 'Redis write'
): Promise<void> {
  await safeRedisOperation(operation, undefined, operationName);
}
