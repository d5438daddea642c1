/**
 * Reconciliation API Routes
 *
 * Endpoints for the automatic decider and the manual link registry.
 * These routes handle HTTP concerns only - business logic is delegated to services.
 *
 * Endpoints:
 * - POST /evaluate/:transactionId - Run the decider for one transaction
 * - POST /sweep - Reconcile unmatched transactions in a date range
 * - GET /status - Matched / Missing instances of a month
 * - GET /instances/:seriesId/:scheduledDate/matches - Match history of an instance
 * - POST /links - Manually link a transaction to an instance
 * - DELETE /links/:matchId - Unlink
 */

import { Router, Request, Response } from 'express';
import { z } from 'zod';
import { createTolerances } from '../matching';
import { commonSchemas, validateRequest } from '../middlewares/validateRequest';
import type { Services } from '../services';
import { asyncHandler, sendSuccess } from '../utils';
import { enqueueSweep } from '../workers';

const { calendarDate } = commonSchemas;

const evaluateBodySchema = z
  .object({
    tolerances: z
      .object({
        editDistanceThreshold: z.number().optional(),
        jaccardThreshold: z.number().optional(),
        amountToleranceCeiling: z.number().optional(),
        enforceAmountCeiling: z.boolean().optional(),
        dateWindowDays: z.number().optional(),
        duplicateWindowDays: z.number().optional(),
        acceptThreshold: z.number().optional(),
        rejectThreshold: z.number().optional(),
        ambiguityEpsilon: z.number().optional(),
      })
      .strict()
      .optional(),
  })
  .default({});

const sweepBodySchema = z
  .object({ from: calendarDate, to: calendarDate })
  .refine((range) => range.from <= range.to, { message: '"from" must not be after "to"' });

const statusQuerySchema = z.object({
  year: z.coerce.number().int().min(1900).max(9999),
  month: z.coerce.number().int().min(1).max(12),
});

const instanceParamsSchema = z.object({
  seriesId: commonSchemas.id,
  scheduledDate: calendarDate,
});

const linkBodySchema = z.object({
  transactionId: commonSchemas.id,
  seriesId: commonSchemas.id,
  scheduledDate: calendarDate,
});

export function createReconciliationRoutes(services: Services): Router {
  const router = Router();

  /**
   * @route   POST /api/v1/reconciliation/evaluate/:transactionId
   * @desc    Run the automatic decider for one transaction
   * @access  Public
   *
   * Request body (optional):
   * - tolerances: partial tolerance overrides for this evaluation
   *
   * Response:
   * - 200 OK: { kind: 'matched' | 'unmatched' | 'manual', ... }
   * - 404 Not Found: Transaction not found
   * - 409 Conflict: Ambiguous candidates (details carry the AmbiguityReport)
   */
  router.post(
    '/evaluate/:transactionId',
    asyncHandler(async (req: Request, res: Response): Promise<void> => {
      const { transactionId } = validateRequest(
        z.object({ transactionId: commonSchemas.id }),
        req.params
      );
      const body = validateRequest(evaluateBodySchema, req.body ?? {});
      const tolerances = createTolerances(body.tolerances, services.tolerances);

      const result = await services.reconciliation.evaluate(transactionId, tolerances);
      sendSuccess(res, result, `Evaluation result: ${result.kind}`);
    })
  );

  /**
   * @route   POST /api/v1/reconciliation/sweep
   * @desc    Reconcile every transaction without an Active match in a date range.
   *          Queued when Redis is configured, run inline otherwise.
   * @access  Public
   *
   * Response:
   * - 202 Accepted: { jobId } when queued
   * - 200 OK: SweepReport when run inline
   */
  router.post(
    '/sweep',
    asyncHandler(async (req: Request, res: Response): Promise<void> => {
      const { from, to } = validateRequest(sweepBodySchema, req.body);

      const jobId = await enqueueSweep({ from, to });
      if (jobId !== null) {
        sendSuccess(res, { jobId, from, to }, 'Sweep queued', 202);
        return;
      }

      const report = await services.reconciliation.sweep(from, to);
      sendSuccess(res, report, 'Sweep completed');
    })
  );

  /**
   * @route   GET /api/v1/reconciliation/status?year=2025&month=3
   * @desc    Matched / Missing status of every instance scheduled in the month
   * @access  Public
   */
  router.get(
    '/status',
    asyncHandler(async (req: Request, res: Response): Promise<void> => {
      const { year, month } = validateRequest(statusQuerySchema, req.query);
      sendSuccess(res, await services.reconciliation.getMonthlyStatus(year, month));
    })
  );

  /**
   * @route   GET /api/v1/reconciliation/instances/:seriesId/:scheduledDate/matches
   * @desc    All matches of a recurring instance, newest first
   * @access  Public
   */
  router.get(
    '/instances/:seriesId/:scheduledDate/matches',
    asyncHandler(async (req: Request, res: Response): Promise<void> => {
      const key = validateRequest(instanceParamsSchema, req.params);
      sendSuccess(res, await services.reconciliation.getMatchesForInstance(key));
    })
  );

  /**
   * @route   POST /api/v1/reconciliation/links
   * @desc    Manually link a transaction to a recurring instance
   * @access  Public
   *
   * Response:
   * - 201 Created: the Active Manual match
   * - 404 Not Found: Transaction or instance not found
   * - 409 Conflict: A side is already manually linked elsewhere
   */
  router.post(
    '/links',
    asyncHandler(async (req: Request, res: Response): Promise<void> => {
      const { transactionId, seriesId, scheduledDate } = validateRequest(linkBodySchema, req.body);
      const match = await services.manualLinks.link(transactionId, { seriesId, scheduledDate });
      sendSuccess(res, match, 'Transaction linked', 201);
    })
  );

  /**
   * @route   DELETE /api/v1/reconciliation/links/:matchId
   * @desc    Reject a match, freeing both sides
   * @access  Public
   */
  router.delete(
    '/links/:matchId',
    asyncHandler(async (req: Request, res: Response): Promise<void> => {
      const { matchId } = validateRequest(z.object({ matchId: commonSchemas.id }), req.params);
      const match = await services.manualLinks.unlink(matchId);
      sendSuccess(res, match, 'Match rejected');
    })
  );

  return router;
}

export default createReconciliationRoutes;
