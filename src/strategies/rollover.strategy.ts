/**
 * RolloverStrategy
 *
 * Copy-truncate rollover for a single active log file.
 *
 * Strategy: when the file is larger than maxSizeMB, copy its bytes to
 * <path>.<timestamp> and truncate the original in place, so a writer holding the
 * file open keeps appending to the same inode. Raw copies beyond maxBackupCount
 * are pruned afterwards.
 *
 * A write landing between the copy and the truncate is lost.
 */

import { copyFile, open, stat } from 'fs/promises';
import { basename, dirname } from 'path';
import { logger } from '../config/logger';
import type { RetentionPruner } from '../services/retention-pruner';
import { formatTimestamp } from '../utils/rotation-names';
import { describeError } from './rotation-strategy.interface';
import type {
  Clock,
  RolloverResult,
  RotationLimits,
  RotationReporter,
  RotationStrategy,
} from './rotation-strategy.interface';

const BYTES_PER_MB = 1024 * 1024;

export class RolloverStrategy implements RotationStrategy<RolloverResult> {
  readonly name = 'RolloverStrategy';

  constructor(
    private pruner: RetentionPruner,
    private reporter: RotationReporter = logger,
    private clock: Clock = () => new Date()
  ) {}

  async execute(filePath: string, limits: RotationLimits): Promise<RolloverResult> {
    const result: RolloverResult = { rotatedFile: null, truncated: false, pruned: [], errors: [] };

    if (!(await this.shouldRollover(filePath, limits.maxSizeMB, result))) {
      return result;
    }

    const rotatedFile = `${filePath}.${formatTimestamp(this.clock())}`;
    try {
      await copyFile(filePath, rotatedFile);
    } catch (error) {
      this.fail(result, 'RolloverStrategy: Copy failed', { filePath, rotatedFile }, error);
      return result;
    }
    result.rotatedFile = rotatedFile;

    try {
      const handle = await open(filePath, 'w', 0o640);
      await handle.close();
    } catch (error) {
      this.fail(result, 'RolloverStrategy: Truncate failed', { filePath }, error);
      return result;
    }
    result.truncated = true;

    this.reporter.info('RolloverStrategy: Rolled over log file', { filePath, rotatedFile });

    const pruned = await this.pruner.prune(
      dirname(filePath),
      basename(filePath),
      limits.maxBackupCount,
      'rollover'
    );
    result.pruned = pruned.removed;
    if (pruned.stoppedEarly) {
      result.errors.push(`prune rollover copies of ${filePath} stopped early`);
    }

    return result;
  }

  private async shouldRollover(
    filePath: string,
    maxSizeMB: number,
    result: RolloverResult
  ): Promise<boolean> {
    if (maxSizeMB < 0) {
      return false;
    }

    try {
      const stats = await stat(filePath);
      return stats.size > maxSizeMB * BYTES_PER_MB;
    } catch (error) {
      this.fail(result, 'RolloverStrategy: Stat failed', { filePath }, error);
      return false;
    }
  }

  private fail(
    result: RolloverResult,
    message: string,
    meta: Record<string, unknown>,
    error: unknown
  ): void {
    const reason = describeError(error);
    this.reporter.error(message, { ...meta, error: reason });
    result.errors.push(`${message}: ${reason}`);
  }
}
