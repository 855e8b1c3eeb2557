import { Request, Response } from 'express';
import { healthService } from '../services';
import { sendSuccess, sendError, asyncHandler } from '../utils';

/**
 * Health check controller
 */
export class HealthController {
  /**
   * GET /health
   * Uptime, environment and version
   */
  getHealth = asyncHandler(async (_req: Request, res: Response): Promise<void> => {
    const health = healthService.getHealthStatus();
    sendSuccess(res, health, 'Service is healthy');
  });

  /**
   * GET /health/ready
   * Readiness check endpoint (runs a matcher self-check)
   */
  getReadiness = asyncHandler(async (_req: Request, res: Response): Promise<void> => {
    const { ready, checks } = healthService.checkReadiness();

    if (ready) {
      sendSuccess(res, { ready, checks }, 'Service is ready');
      return;
    }

    const failed = Object.entries(checks)
      .filter(([, ok]) => !ok)
      .map(([name]) => name);
    sendError(res, 'Service is not ready', 503, `Failed checks: ${failed.join(', ')}`);
  });

  /**
   * GET /health/live
   */
  getLiveness = asyncHandler(async (_req: Request, res: Response): Promise<void> => {
    sendSuccess(res, { alive: true }, 'Service is alive');
  });
}

export const healthController = new HealthController();

export default healthController;
