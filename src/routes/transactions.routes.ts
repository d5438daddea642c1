/**
 * Transaction API Routes
 *
 * Endpoints:
 * - POST / - Manual entry (reconciled like an import)
 * - GET /:id - Get a transaction
 * - PATCH /:id - Edit description, date or amount (re-evaluates its match)
 * - GET /:id/matches - Match history of a transaction
 */

import { Router, Request, Response } from 'express';
import { z } from 'zod';
import { commonSchemas, validateRequest } from '../middlewares/validateRequest';
import type { Services } from '../services';
import { asyncHandler, sendSuccess } from '../utils';

const { calendarDate } = commonSchemas;

const createTransactionSchema = z.object({
  accountId: z.string().min(1),
  date: calendarDate,
  description: z.string().default(''),
  amount: z.number().finite(),
  kind: z.enum(['income', 'expense', 'transfer']),
  currency: z
    .string()
    .regex(/^[A-Za-z]{3}$/, 'Expected an ISO 4217 currency code')
    .transform((value) => value.toUpperCase())
    .default('USD'),
});

const updateTransactionSchema = z
  .object({
    date: calendarDate.optional(),
    description: z.string().optional(),
    amount: z.number().finite().optional(),
  })
  .refine((patch) => Object.values(patch).some((value) => value !== undefined), {
    message: 'At least one of date, description or amount is required',
  });

const idParamsSchema = z.object({ id: commonSchemas.id });

export function createTransactionRoutes(services: Services): Router {
  const router = Router();

  /**
   * @route   POST /api/v1/transactions
   * @desc    Enter a transaction manually
   * @access  Public
   *
   * Response:
   * - 201 Created: { transaction, reconciliation }
   */
  router.post(
    '/',
    asyncHandler(async (req: Request, res: Response): Promise<void> => {
      const input = validateRequest(createTransactionSchema, req.body);
      const result = await services.transactions.createManual(input);
      sendSuccess(res, result, 'Transaction created', 201);
    })
  );

  /**
   * @route   GET /api/v1/transactions/:id
   * @desc    Get a transaction
   * @access  Public
   */
  router.get(
    '/:id',
    asyncHandler(async (req: Request, res: Response): Promise<void> => {
      const { id } = validateRequest(idParamsSchema, req.params);
      sendSuccess(res, await services.transactions.getTransaction(id));
    })
  );

  /**
   * @route   PATCH /api/v1/transactions/:id
   * @desc    Edit a transaction. A stale Auto match is superseded; Manual matches stay.
   * @access  Public
   *
   * Response:
   * - 200 OK: { transaction, reconciliation }
   * - 404 Not Found: Transaction not found
   */
  router.patch(
    '/:id',
    asyncHandler(async (req: Request, res: Response): Promise<void> => {
      const { id } = validateRequest(idParamsSchema, req.params);
      const patch = validateRequest(updateTransactionSchema, req.body);
      const result = await services.transactions.update(id, patch);
      sendSuccess(res, result, 'Transaction updated');
    })
  );

  /**
   * @route   GET /api/v1/transactions/:id/matches
   * @desc    All matches of a transaction, newest first
   * @access  Public
   */
  router.get(
    '/:id/matches',
    asyncHandler(async (req: Request, res: Response): Promise<void> => {
      const { id } = validateRequest(idParamsSchema, req.params);
      await services.transactions.getTransaction(id);
      sendSuccess(res, await services.reconciliation.getMatchesForTransaction(id));
    })
  );

  return router;
}

export default createTransactionRoutes;
