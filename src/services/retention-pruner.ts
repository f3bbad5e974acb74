/**
 * RetentionPruner
 *
 * Deletes the oldest rotated files of a log until at most maxKeptCount remain.
 *
 * Stages:
 *   - rollover: raw copies, svc.log.<1..17 digits>
 *   - backup:   archives,  svc.log.<17 digits>.zip
 *
 * Ordering is lexicographic on the file name. Timestamps are fixed-width, so that
 * is chronological; short numeric suffixes only order correctly within the same
 * digit count (svc.log.10 sorts before svc.log.9).
 */

import { lstat, unlink } from 'fs/promises';
import { basename } from 'path';
import { logger } from '../config/logger';
import { filterFileList } from './file-matcher';
import { backupPattern, rolloverPattern } from '../utils/rotation-names';
import { describeError } from '../strategies/rotation-strategy.interface';
import type { PruneResult, RotationReporter } from '../strategies/rotation-strategy.interface';
import { rotationMetrics } from './rotation-metrics';

export function stagePattern(stage: string, baseName: string): RegExp | null {
  switch (stage) {
    case 'rollover':
      return rolloverPattern(baseName);
    case 'backup':
      return backupPattern(baseName);
    default:
      return null;
  }
}

export class RetentionPruner {
  constructor(private reporter: RotationReporter = logger) {}

  async prune(
    directory: string,
    baseName: string,
    maxKeptCount: number,
    stage: string
  ): Promise<PruneResult> {
    const result: PruneResult = { stage, removed: [], stoppedEarly: false };

    if (maxKeptCount < 0) {
      return result;
    }

    const pattern = stagePattern(stage, baseName);
    if (!pattern) {
      return result;
    }

    let fileList: string[];
    try {
      fileList = await filterFileList(directory, pattern, { recursive: false });
    } catch (error) {
      this.reporter.error('RetentionPruner: Listing rotated files failed', {
        directory,
        stage,
        error: describeError(error),
      });
      result.stoppedEarly = true;
      return result;
    }

    // Sort on base names; all entries share one directory
    fileList.sort((a, b) => {
      const left = basename(a);
      const right = basename(b);
      return left < right ? -1 : left > right ? 1 : 0;
    });

    while (fileList.length > maxKeptCount) {
      const filePath = fileList[0];
      try {
        if (await this.removeFile(filePath)) {
          result.removed.push(filePath);
        }
      } catch (error) {
        this.reporter.error('RetentionPruner: Removing rotated file failed', {
          filePath,
          stage,
          error: describeError(error),
        });
        result.stoppedEarly = true;
        break;
      }
      fileList.shift();
    }

    if (result.removed.length > 0) {
      rotationMetrics.filesPruned.inc({ stage }, result.removed.length);
      this.reporter.info('RetentionPruner: Pruned rotated files', {
        directory,
        baseName,
        stage,
        removed: result.removed.length,
        kept: fileList.length,
      });
    }

    return result;
  }

  /**
   * Returns false when the path turned out to be a directory and was left alone.
   */
  private async removeFile(filePath: string): Promise<boolean> {
    const stats = await lstat(filePath);
    if (stats.isDirectory()) {
      return false;
    }
    await unlink(filePath);
    return true;
  }
}
