/**
 * Import API Routes
 *
 * Endpoints for bulk import of parsed statement rows and batch tracking.
 * These routes handle HTTP concerns only - business logic is delegated to services.
 *
 * Endpoints:
 * - POST / - Import rows (duplicate detection + reconciliation)
 * - GET /:batchId - Batch status and report
 * - POST /:batchId/cancel - Cancel a running import
 */

import { Router, Request, Response } from 'express';
import { z } from 'zod';
import { validateRequest } from '../middlewares/validateRequest';
import type { Services } from '../services';
import { AppError, asyncHandler, sendSuccess } from '../utils';

const importBodySchema = z.object({
  // Rows are validated one by one so a bad row does not reject the batch
  rows: z.array(z.unknown()).min(1, 'At least one row is required').max(10000),
  detectDuplicates: z.boolean().optional(),
  defaultCurrency: z
    .string()
    .regex(/^[A-Za-z]{3}$/, 'Expected an ISO 4217 currency code')
    .transform((value) => value.toUpperCase())
    .optional(),
  batchId: z.string().min(1).max(100).optional(),
});

const batchParamsSchema = z.object({
  batchId: z.string().min(1),
});

export function createImportRoutes(services: Services): Router {
  const router = Router();

  /**
   * @route   POST /api/v1/imports
   * @desc    Import parsed rows
   * @access  Public (should be protected in production)
   *
   * Request body:
   * - rows: ParsedRow[] (required)
   * - detectDuplicates: boolean (default: true)
   * - defaultCurrency: string (default: USD)
   * - batchId: string (optional, generated when omitted)
   *
   * Response:
   * - 201 Created: ImportReport (per-row outcomes and counts)
   * - 400 Bad Request: Body is not a list of rows
   */
  router.post(
    '/',
    asyncHandler(async (req: Request, res: Response): Promise<void> => {
      const body = validateRequest(importBodySchema, req.body);

      const existing = body.batchId ? await services.imports.getBatch(body.batchId) : null;
      if (existing) {
        throw AppError.conflict(`Import batch ${existing.id} already exists`);
      }

      const report = await services.imports.importRows(body.rows, {
        batchId: body.batchId,
        detectDuplicates: body.detectDuplicates,
        defaultCurrency: body.defaultCurrency,
      });

      sendSuccess(
        res,
        report,
        report.cancelled
          ? `Import cancelled after ${report.processed} of ${report.totalRows} rows`
          : `Imported ${report.created} of ${report.totalRows} rows`,
        201
      );
    })
  );

  /**
   * @route   GET /api/v1/imports/:batchId
   * @desc    Get batch status and progress
   * @access  Public
   *
   * Response:
   * - 200 OK: { id, status, progress, counts, report }
   * - 404 Not Found: Batch not found
   */
  router.get(
    '/:batchId',
    asyncHandler(async (req: Request, res: Response): Promise<void> => {
      const { batchId } = validateRequest(batchParamsSchema, req.params);

      const batch = await services.imports.getBatch(batchId);
      if (!batch) {
        throw AppError.notFound(`Import batch ${batchId} not found`);
      }

      sendSuccess(res, batch);
    })
  );

  /**
   * @route   POST /api/v1/imports/:batchId/cancel
   * @desc    Cancel a running import; rows already imported stay
   * @access  Public
   *
   * Response:
   * - 202 Accepted: cancellation requested
   * - 404 Not Found: No running import with that id
   */
  router.post(
    '/:batchId/cancel',
    asyncHandler(async (req: Request, res: Response): Promise<void> => {
      const { batchId } = validateRequest(batchParamsSchema, req.params);

      if (!services.imports.cancel(batchId)) {
        throw AppError.notFound(`No running import with id ${batchId}`);
      }

      sendSuccess(res, { batchId }, 'Cancellation requested', 202);
    })
  );

  return router;
}

export default createImportRoutes;
