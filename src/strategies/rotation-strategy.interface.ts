/**
 * Rotation Strategy Interface
 *
 * Defines the contract for the per-file rotation stages (rollover, backup) and
 * the policy types they run under. Stages never reject on I/O failures: they
 * report through a RotationReporter and describe what happened in their result.
 */

export type RollingPolicy = 'size' | 'date';

export type RotateStage = 'rollover' | 'backup';

export interface RotationTarget {
  filePath: string;
  directory: string;
  baseName: string;
}

export interface RotationPolicy {
  readonly target: Readonly<RotationTarget>;
  readonly rollingPolicy: RollingPolicy;
  /** Rollover threshold in MB; negative disables rollover. */
  readonly maxSizeMB: number;
  /** Retained copies per stage; 0 disables backups, negative never prunes. */
  readonly maxBackupCount: number;
  readonly checkCycleMs: number;
}

export interface RotationLimits {
  maxSizeMB: number;
  maxBackupCount: number;
}

/**
 * Sink for internal failures. The winston logger satisfies it.
 */
export interface RotationReporter {
  info(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
}

export type Clock = () => Date;

export interface PruneResult {
  stage: string;
  removed: string[];
  stoppedEarly: boolean;
}

export interface RolloverResult {
  rotatedFile: string | null;
  truncated: boolean;
  pruned: string[];
  errors: string[];
}

export interface BackupResult {
  archivesCreated: string[];
  pruned: string[];
  errors: string[];
}

export interface RotationStrategy<TResult> {
  readonly name: string;
  execute(filePath: string, limits: RotationLimits): Promise<TResult>;
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
