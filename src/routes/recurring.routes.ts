/**
 * Recurring Series API Routes
 *
 * Boundary with the recurrence configuration and expansion collaborators.
 *
 * Endpoints:
 * - PUT /instances - Register projected instances
 * - GET /:seriesId/import-patterns - List import patterns of a series
 * - PUT /:seriesId/import-patterns - Replace them (validated for overlap)
 * - POST /:seriesId/import-patterns/remember - Add a description as a pattern
 */

import { Router, Request, Response } from 'express';
import { z } from 'zod';
import { commonSchemas, validateRequest } from '../middlewares/validateRequest';
import type { Services } from '../services';
import { asyncHandler, sendSuccess } from '../utils';

const instanceSchema = z.object({
  seriesId: commonSchemas.id,
  scheduledDate: commonSchemas.calendarDate,
  expectedDescription: z.string(),
  expectedAmount: z.number().finite(),
  accountId: z.string().min(1).optional(),
  currency: z
    .string()
    .regex(/^[A-Za-z]{3}$/, 'Expected an ISO 4217 currency code')
    .transform((value) => value.toUpperCase())
    .optional(),
});

const instancesBodySchema = z.object({
  instances: z.array(instanceSchema).max(10000),
});

const seriesParamsSchema = z.object({ seriesId: commonSchemas.id });

const patternsBodySchema = z.object({
  patterns: z.array(z.string()).max(100),
});

const rememberBodySchema = z.object({
  description: z.string().min(1, 'description is required'),
});

export function createRecurringRoutes(services: Services): Router {
  const router = Router();

  /**
   * @route   PUT /api/v1/recurring/instances
   * @desc    Insert or replace projected instances by (seriesId, scheduledDate)
   * @access  Public
   */
  router.put(
    '/instances',
    asyncHandler(async (req: Request, res: Response): Promise<void> => {
      const { instances } = validateRequest(instancesBodySchema, req.body);
      const count = await services.repositories.instances.upsertMany(instances);
      sendSuccess(res, { count }, `Stored ${count} recurring instance(s)`);
    })
  );

  /**
   * @route   GET /api/v1/recurring/:seriesId/import-patterns
   * @desc    List the import patterns of a series
   * @access  Public
   */
  router.get(
    '/:seriesId/import-patterns',
    asyncHandler(async (req: Request, res: Response): Promise<void> => {
      const { seriesId } = validateRequest(seriesParamsSchema, req.params);
      sendSuccess(res, await services.importPatterns.list(seriesId));
    })
  );

  /**
   * @route   PUT /api/v1/recurring/:seriesId/import-patterns
   * @desc    Replace the import patterns of a series
   * @access  Public
   *
   * Response:
   * - 200 OK: stored (normalized) patterns
   * - 400 Bad Request: Malformed pattern, or overlap with another series
   *   (details.conflicts lists the overlapping pairs)
   */
  router.put(
    '/:seriesId/import-patterns',
    asyncHandler(async (req: Request, res: Response): Promise<void> => {
      const { seriesId } = validateRequest(seriesParamsSchema, req.params);
      const { patterns } = validateRequest(patternsBodySchema, req.body);
      sendSuccess(res, await services.importPatterns.replace(seriesId, patterns), 'Import patterns saved');
    })
  );

  /**
   * @route   POST /api/v1/recurring/:seriesId/import-patterns/remember
   * @desc    Remember a description as an import pattern of the series
   * @access  Public
   */
  router.post(
    '/:seriesId/import-patterns/remember',
    asyncHandler(async (req: Request, res: Response): Promise<void> => {
      const { seriesId } = validateRequest(seriesParamsSchema, req.params);
      const { description } = validateRequest(rememberBodySchema, req.body);
      const patterns = await services.importPatterns.remember(seriesId, description);
      sendSuccess(res, patterns, 'Description remembered', 201);
    })
  );

  return router;
}

export default createRecurringRoutes;
