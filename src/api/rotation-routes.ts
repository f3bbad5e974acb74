/**
 * Rotation Routes
 *
 *   GET  /rotation/status  scheduler snapshots and recent passes
 *   POST /rotation/run     one pass now for every registered directory, queued
 *                          behind any scheduled pass already running there
 */

import { Router, Request, Response } from 'express';
import type { RotationHistoryRepository } from '../repositories/rotation-history.repository';
import type { SchedulerRegistry } from '../services/rotation-scheduler';

const RECENT_PASSES = 20;

export interface RotationRouteDeps {
  registry: Pick<SchedulerRegistry, 'list' | 'runAll'>;
  history: Pick<RotationHistoryRepository, 'findRecent'>;
}

export function createRotationRoutes({ registry, history }: RotationRouteDeps): Router {
  const router = Router();

  router.get('/rotation/status', (req: Request, res: Response) => {
    res.json({
      schedulers: registry.list().map((task) => ({
        directory: task.key,
        running: task.running,
        rollingPolicy: task.policy.rollingPolicy,
        maxSizeMB: task.policy.maxSizeMB,
        maxBackupCount: task.policy.maxBackupCount,
        checkCycleMs: task.policy.checkCycleMs,
        passes: task.passes,
        lastPass: task.lastPass,
      })),
      recentPasses: history.findRecent(RECENT_PASSES),
    });
  });

  router.post('/rotation/run', async (req: Request, res: Response) => {
    res.json({ passes: await registry.runAll() });
  });

  return router;
}
