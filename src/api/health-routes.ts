/**
 * Health Check Routes
 *
 * The service is healthy while at least one rotation scheduler is running.
 */

import { Router, Request, Response } from 'express';
import type { RotationHistoryRepository } from '../repositories/rotation-history.repository';
import type { SchedulerRegistry } from '../services/rotation-scheduler';

export interface HealthRouteDeps {
  registry: Pick<SchedulerRegistry, 'runningCount'>;
  history: Pick<RotationHistoryRepository, 'findRecent'>;
  serviceName: string;
}

export function createHealthRoutes({ registry, history, serviceName }: HealthRouteDeps): Router {
  const router = Router();

  router.get('/health', (req: Request, res: Response) => {
    const schedulers = registry.runningCount();
    const [lastPass] = history.findRecent(1);
    const checks = {
      schedulers,
      lastPass: lastPass ? lastPass.status : 'none',
    };

    if (schedulers > 0) {
      res.json({
        status: 'healthy',
        service: serviceName,
        timestamp: new Date().toISOString(),
        checks,
      });
      return;
    }

    res.status(503).json({
      status: 'unhealthy',
      service: serviceName,
      timestamp: new Date().toISOString(),
      error: 'No rotation scheduler is running',
      checks,
    });
  });

  router.get('/health/ready', (req: Request, res: Response) => {
    res.json({
      ready: true,
      timestamp: new Date().toISOString(),
    });
  });

  return router;
}
