/**
 * Log Rotation Service
 *
 * Main entry point for the log rotation service.
 *
 * Responsibilities:
 *   - Expose health, metrics and rotation endpoints
 *   - Register the configured log file's directory for background rotation
 *   - One-shot mode: run a single pass and exit (CONTINUOUS_MODE=false)
 *   - Graceful shutdown
 */

import { createApp } from './app';
import { config } from './config';
import { logger } from './config/logger';
import { policyFromConfig } from './config/rotation-policy';
import { RotationHistoryRepository } from './repositories/rotation-history.repository';
import { createRotationOrchestrator } from './services/rotation-orchestrator';
import { SchedulerRegistry } from './services/rotation-scheduler';
import { describeError } from './strategies/rotation-strategy.interface';
import type { RotationPolicy } from './strategies/rotation-strategy.interface';

const history = new RotationHistoryRepository();
const orchestrator = createRotationOrchestrator({
  history,
  recursive: config.rotation.recursive,
});
const registry = new SchedulerRegistry(orchestrator);

const app = createApp({
  registry,
  history,
  serviceName: config.service.name,
});

const policy = policyFromConfig(config.rotation);

async function runOnce(oneShot: RotationPolicy): Promise<void> {
  const result = await orchestrator.logRotate(
    oneShot.target.directory,
    oneShot.maxSizeMB,
    oneShot.maxBackupCount
  );
  logger.info('Log Rotation Service: One-shot rotation complete', {
    passId: result.passId,
    status: result.status,
  });
  process.exit(result.status === 'failed' ? 1 : 0);
}

if (!config.continuousMode) {
  if (!policy) {
    logger.error('Log Rotation Service: LOG_FILE is not set, nothing to rotate');
    process.exit(1);
  } else {
    runOnce(policy).catch((error: unknown) => {
      logger.error('Log Rotation Service: One-shot rotation failed', {
        error: describeError(error),
      });
      process.exit(1);
    });
  }
} else {
  const server = app.listen(config.port, () => {
    logger.info(`Log Rotation Service: Server started on port ${config.port}`);

    if (policy) {
      registry.rotate(policy);
    } else {
      logger.error('Log Rotation Service: LOG_FILE is not set, no scheduler registered');
    }
  });

  // Graceful shutdown
  process.on('SIGTERM', () => {
    logger.info('Log Rotation Service: SIGTERM received, shutting down gracefully');
    registry.stopAll();
    server.close(() => {
      logger.info('Log Rotation Service: Server closed');
      process.exit(0);
    });
  });
}

export { app };
