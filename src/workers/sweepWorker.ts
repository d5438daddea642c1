/**
 * Reconciliation Sweep Worker
 *
 * Runs date-range sweeps queued through BullMQ. The job payload only
 * carries the range; the services do the work and the report becomes the
 * job's return value.
 */

import type { Services, SweepReport } from '../services';
import { logger } from '../utils';
import type { SweepJob } from './reconciliation.queue';

export function createSweepProcessor(services: Services) {
  return async (job: SweepJob): Promise<SweepReport> => {
    const { from, to } = job.data;
    const startTime = Date.now();

    logger.info(`[Job ${job.id ?? 'direct'}] Sweep ${from}..${to} started`);
    const report = await services.reconciliation.sweep(from, to);
    await job.updateProgress(100);

    logger.info(`[Job ${job.id ?? 'direct'}] ✅ Sweep done in ${Date.now() - startTime}ms`);
    return report;
  };
}

export default createSweepProcessor;
