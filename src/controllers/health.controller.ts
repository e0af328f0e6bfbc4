import { Request, Response } from 'express';
import { healthService } from '../services';
import { sendSuccess, sendError, asyncHandler } from '../utils';

/**
 * Health check controller
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
   * 503 names the checks that failed, e.g. an empty DELIVERY_KEYWORDS list
   */
  getReadiness = asyncHandler(async (_req: Request, res: Response): Promise<void> => {
    const { ready, checks } = await healthService.checkReadiness();

    if (!ready) {
      const failing = Object.keys(checks).filter((name) => !checks[name]);
      sendError(res, 'Service is not ready', 503, `Failing checks: ${failing.join(', ')}`);
      return;
    }

    sendSuccess(res, { ready, checks }, 'Service is ready');
  });

  /**
   * GET /health/live
   */
  getLiveness = asyncHandler((_req: Request, res: Response): void => {
    sendSuccess(res, { alive: true }, 'Service is alive');
  });
}

export const healthController = new HealthController();

export default healthController;
