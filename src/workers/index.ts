/**
 * Workers Module
 *
 * Background processing for reconciliation sweeps. Only active when Redis
 * is configured.
 */

export {
  SWEEP_QUEUE_NAME,
  closeSweepQueue,
  enqueueSweep,
  getSweepQueue,
  setupSweepWorker,
  type SweepJob,
  type SweepJobData,
} from './reconciliation.queue';
export { createSweepProcessor } from './sweepWorker';
