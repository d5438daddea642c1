import { Request, Response } from 'express';
import { healthService } from '../services';
import { sendSuccess, sendError, asyncHandler } from '../utils';

/**
 * Health endpoints of the reconciliation API.
 * Readiness reports Redis only when it is configured; imports and sweeps
 * run without it.
 */
export class HealthController {
  /**
   * GET /health
   */
  getHealth = asyncHandler(async (_req: Request, res: Response): Promise<void> => {
    sendSuccess(res, healthService.getHealthStatus(), 'Service is healthy');
  });

  /**
   * GET /health/ready
   * 503 carries the per-dependency checks so the failing one is visible.
   */
  getReadiness = asyncHandler(async (_req: Request, res: Response): Promise<void> => {
    const { ready, checks } = await healthService.checkReadiness();

    if (!ready) {
      sendError(res, 'Service is not ready', 503, undefined, { checks });
      return;
    }
    sendSuccess(res, { ready, checks }, 'Service is ready');
  });

  /**
   * GET /health/live
   */
  getLiveness = asyncHandler(async (_req: Request, res: Response): Promise<void> => {
    sendSuccess(res, { alive: true, uptime: process.uptime() }, 'Service is alive');
  });
}

export const healthController = new HealthController();

export default healthController;
