/**
 * Rotation Policy
 *
 * Turns rotation options into the immutable RotationPolicy a scheduler runs with.
 *
 *   size: roll when the file exceeds rotateSizeMB, checked every 30 seconds
 *   date: roll any non-empty file once per cycle of rotateDays × 24 hours
 */

import { basename, dirname, resolve } from 'path';
import type { Config } from './index';
import type {
  RollingPolicy,
  RotationPolicy,
  RotationTarget,
} from '../strategies/rotation-strategy.interface';

export const DEFAULT_ROTATE_SIZE_MB = 10;
export const DEFAULT_BACKUP_COUNT = 7;
export const SIZE_CHECK_CYCLE_MS = 30 * 1000;
export const DAY_MS = 24 * 60 * 60 * 1000;

export interface RotationOptions {
  logFile: string;
  rollingPolicy?: RollingPolicy;
  rotateSizeMB?: number;
  backupCount?: number;
  rotateDays?: number;
  checkIntervalMs?: number;
}

export function toRotationTarget(logFile: string): RotationTarget {
  const filePath = resolve(logFile);
  return {
    filePath,
    directory: dirname(filePath),
    baseName: basename(filePath),
  };
}

export function newRotationPolicy(options: RotationOptions): RotationPolicy {
  const rollingPolicy = options.rollingPolicy ?? 'size';
  // 0 would prune every rollover copy right after it is made
  const maxBackupCount =
    options.backupCount === undefined || options.backupCount === 0
      ? DEFAULT_BACKUP_COUNT
      : options.backupCount;

  let maxSizeMB: number;
  let checkCycleMs: number;

  if (rollingPolicy === 'size') {
    maxSizeMB =
      options.rotateSizeMB !== undefined && options.rotateSizeMB > 0
        ? options.rotateSizeMB
        : DEFAULT_ROTATE_SIZE_MB;
    checkCycleMs =
      options.checkIntervalMs !== undefined && options.checkIntervalMs > 0
        ? options.checkIntervalMs
        : SIZE_CHECK_CYCLE_MS;
  } else {
    maxSizeMB = 0;
    checkCycleMs =
      options.rotateDays !== undefined && options.rotateDays > 1
        ? DAY_MS * options.rotateDays
        : DAY_MS;
  }

  return Object.freeze({
    target: Object.freeze(toRotationTarget(options.logFile)),
    rollingPolicy,
    maxSizeMB,
    maxBackupCount,
    checkCycleMs,
  });
}

export function policyFromConfig(rotation: Config['rotation']): RotationPolicy | null {
  if (!rotation.logFile) {
    return null;
  }
  return newRotationPolicy({
    logFile: rotation.logFile,
    rollingPolicy: rotation.rollingPolicy,
    rotateSizeMB: rotation.rotateSizeMB,
    backupCount: rotation.backupCount,
    rotateDays: rotation.rotateDays,
    checkIntervalMs: rotation.checkIntervalMs,
  });
}
