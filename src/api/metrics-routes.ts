/**
 * Metrics Routes
 *
 * Prometheus exposition of prom-client's default registry, which carries the
 * rotation counters from services/rotation-metrics.
 */

import { Router, Request, Response } from 'express';
import { register } from 'prom-client';
import '../services/rotation-metrics';

const router = Router();

router.get('/metrics', async (req: Request, res: Response) => {
  res.set('Content-Type', register.contentType);
  res.end(await register.metrics());
});

export { router as metricsRoutes };
