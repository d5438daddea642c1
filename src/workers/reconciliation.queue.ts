import { Queue, Worker, Job, ConnectionOptions } from 'bullmq';
import { env } from '../config';
import { isRedisEnabled } from '../redis';
import { logger } from '../utils';
import type { CalendarDate } from '../matching';
import type { SweepReport } from '../services';

// ============================================
// Redis Connection for BullMQ
// ============================================

function getConnection(): ConnectionOptions {
  return {
    host: env.REDIS_HOST ?? 'localhost',
    port: env.REDIS_PORT,
    // BullMQ requires maxRetriesPerRequest to be null
    maxRetriesPerRequest: null,
  };
}

// ============================================
// Queue Definition
// ============================================

export const SWEEP_QUEUE_NAME = 'reconciliation-sweep';

export interface SweepJobData {
  from: CalendarDate;
  to: CalendarDate;
}

export type SweepJob = Job<SweepJobData, SweepReport>;

let sweepQueue: Queue<SweepJobData, SweepReport> | null = null;

/**
 * The sweep queue, created on first use.
 *
 * @returns null when Redis is not configured; callers then sweep inline
 */
export function getSweepQueue(): Queue<SweepJobData, SweepReport> | null {
  if (!isRedisEnabled()) {
    return null;
  }

  if (!sweepQueue) {
    sweepQueue = new Queue<SweepJobData, SweepReport>(SWEEP_QUEUE_NAME, {
      connection: getConnection(),
      defaultJobOptions: {
        attempts: 3,
        backoff: {
          type: 'exponential',
          delay: 1000,
        },
        removeOnComplete: true,
        removeOnFail: false,
      },
    });
  }

  return sweepQueue;
}

/**
 * Queues a sweep.
 *
 * @returns The job id, or null when there is no queue
 */
export async function enqueueSweep(data: SweepJobData): Promise<string | null> {
  const queue = getSweepQueue();
  if (!queue) {
    return null;
  }

  const job = await queue.add('sweep', data);
  logger.info(`[Job ${job.id ?? 'unknown'}] Sweep ${data.from}..${data.to} queued`);
  return job.id ?? null;
}

export async function closeSweepQueue(): Promise<void> {
  if (sweepQueue) {
    await sweepQueue.close();
    sweepQueue = null;
  }
}

// ============================================
// Worker Setup
// ============================================

export function setupSweepWorker(
  processor: (job: SweepJob) => Promise<SweepReport>
): Worker<SweepJobData, SweepReport> {
  const worker = new Worker<SweepJobData, SweepReport>(SWEEP_QUEUE_NAME, processor, {
    connection: getConnection(),
    // A sweep writes matches; keep them one at a time
    concurrency: 1,
    lockDuration: 60000, // 60 seconds
  });

  worker.on('completed', (job) => {
    logger.info(`[Job ${job.id ?? 'unknown'}] Sweep completed`);
  });

  worker.on('failed', (job, err) => {
    logger.error(`[Job ${job?.id ?? 'unknown'}] Sweep failed: ${err.message}`);
  });

  worker.on('error', (err) => {
    logger.error(`Worker error: ${err.message}`);
  });

  return worker;
}
