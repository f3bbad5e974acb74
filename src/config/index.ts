/**
 * Configuration Loader
 *
 * Loads environment variables and provides typed configuration for the service.
 * Uses dotenv for local development.
 *
 * All config is externalized via environment variables; values are parsed here
 * and handed to the rotation core already typed.
 */

import dotenv from 'dotenv';
import type { RollingPolicy } from '../strategies/rotation-strategy.interface';

dotenv.config();

export interface Config {
  // Server
  port: number;
  nodeEnv: string;
  continuousMode: boolean;

  // Rotation
  rotation: {
    logFile?: string;
    rollingPolicy: RollingPolicy;
    rotateSizeMB?: number;
    backupCount?: number;
    rotateDays?: number;
    checkIntervalMs?: number;
    recursive: boolean;
  };

  // Service
  service: {
    name: string;
    version: string;
  };
}

function optionalInt(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') {
    return undefined;
  }
  const parsed = parseInt(value, 10);
  return Number.isNaN(parsed) ? undefined : parsed;
}

export function parseRollingPolicy(value: string | undefined): RollingPolicy {
  return value?.toLowerCase() === 'date' ? 'date' : 'size';
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  return {
    port: parseInt(env.PORT || '3000', 10),
    nodeEnv: env.NODE_ENV || 'development',
    continuousMode: env.CONTINUOUS_MODE !== 'false',

    rotation: {
      logFile: env.LOG_FILE || undefined,
      rollingPolicy: parseRollingPolicy(env.LOG_ROLLING_POLICY),
      rotateSizeMB: optionalInt(env.LOG_ROTATE_SIZE),
      backupCount: optionalInt(env.LOG_BACKUP_COUNT),
      rotateDays: optionalInt(env.LOG_ROTATE_DATE),
      checkIntervalMs: optionalInt(env.LOG_ROTATE_CHECK_INTERVAL_MS),
      recursive: env.LOG_ROTATE_RECURSIVE !== 'false',
    },

    service: {
      name: env.SERVICE_NAME || 'log-rotation-service',
      version: env.npm_package_version || '1.0.0',
    },
  };
}

export const config: Config = loadConfig();
