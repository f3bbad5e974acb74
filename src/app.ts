/**
 * HTTP application: health, metrics and rotation routes.
 */

import express from 'express';
import { createHealthRoutes } from './api/health-routes';
import { metricsRoutes } from './api/metrics-routes';
import { createRotationRoutes } from './api/rotation-routes';
import type { RotationHistoryRepository } from './repositories/rotation-history.repository';
import type { SchedulerRegistry } from './services/rotation-scheduler';

export interface AppDeps {
  registry: SchedulerRegistry;
  history: RotationHistoryRepository;
  serviceName: string;
}

export function createApp(deps: AppDeps): express.Application {
  const app = express();

  // Required behind a reverse proxy
  app.set('trust proxy', true);

  // Middleware
  app.use(express.json());

  // Routes
  app.use(createHealthRoutes(deps));
  app.use(metricsRoutes);
  app.use(createRotationRoutes(deps));

  return app;
}
