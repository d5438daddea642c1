import { Router } from 'express';
import type { Services } from '../services';
import healthRoutes from './health.routes';
import { createImportRoutes } from './imports.routes';
import { createReconciliationRoutes } from './reconciliation.routes';
import { createRecurringRoutes } from './recurring.routes';
import { createTransactionRoutes } from './transactions.routes';

export function createRoutes(services: Services): Router {
  const router = Router();

  // Health check routes
  router.use('/health', healthRoutes);

  // Bulk import (duplicate detection + reconciliation) and batch status
  router.use('/imports', createImportRoutes(services));

  // Manual entry and edits
  router.use('/transactions', createTransactionRoutes(services));

  // Decider, sweep, monthly status and manual links
  router.use('/reconciliation', createReconciliationRoutes(services));

  // Recurring instances and import patterns
  router.use('/recurring', createRecurringRoutes(services));

  return router;
}

export default createRoutes;
