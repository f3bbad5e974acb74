/**
 * RotationOrchestrator
 *
 * Service layer that runs one rotation pass over a directory.
 *
 * Responsibilities:
 *   - List *.log, *.trace and *.out files in the directory
 *   - Run the rollover stage, then the backup stage, for each file
 *   - Contain failures at the per-file and per-pass boundaries
 *   - Record the pass in the history (audit trail) and metrics
 *
 * logRotate() never rejects: a failed pass is reported and returned with
 * status 'failed'.
 */

import { v4 as uuidv4 } from 'uuid';
import { logger } from '../config/logger';
import { RotationHistoryRepository } from '../repositories/rotation-history.repository';
import type {
  RotationPassResult,
  RotationPassStatus,
} from '../repositories/rotation-history.repository';
import { BackupStrategy } from '../strategies/backup.strategy';
import { RolloverStrategy } from '../strategies/rollover.strategy';
import { describeError } from '../strategies/rotation-strategy.interface';
import type {
  BackupResult,
  Clock,
  RolloverResult,
  RotationLimits,
  RotationReporter,
  RotationStrategy,
} from '../strategies/rotation-strategy.interface';
import { LOG_FILE_PATTERN } from '../utils/rotation-names';
import { filterFileList } from './file-matcher';
import { RetentionPruner } from './retention-pruner';
import { rotationMetrics } from './rotation-metrics';

export interface RotationOrchestratorOptions {
  recursive?: boolean;
}

interface PassTally {
  filesScanned: number;
  rolledOver: number;
  archivesCreated: number;
  filesPruned: number;
  errors: string[];
}

export class RotationOrchestrator {
  private recursive: boolean;

  constructor(
    private rollover: RotationStrategy<RolloverResult>,
    private backup: RotationStrategy<BackupResult>,
    private history: RotationHistoryRepository,
    options: RotationOrchestratorOptions = {},
    private reporter: RotationReporter = logger
  ) {
    this.recursive = options.recursive ?? true;
  }

  async logRotate(
    directory: string,
    maxSizeMB: number,
    maxBackupCount: number
  ): Promise<RotationPassResult> {
    const passId = uuidv4();
    const startedAt = new Date();
    const tally: PassTally = {
      filesScanned: 0,
      rolledOver: 0,
      archivesCreated: 0,
      filesPruned: 0,
      errors: [],
    };
    let listed = false;

    try {
      const files = await filterFileList(directory, LOG_FILE_PATTERN, {
        recursive: this.recursive,
      });
      listed = true;
      tally.filesScanned = files.length;

      for (const file of files) {
        await this.rotateFile(passId, file, { maxSizeMB, maxBackupCount }, tally);
      }
    } catch (error) {
      const reason = describeError(error);
      this.reporter.error('RotationOrchestrator: Rotation pass failed', {
        passId,
        directory,
        error: reason,
      });
      tally.errors.push(`pass over ${directory} failed: ${reason}`);
    }

    const status: RotationPassStatus = !listed
      ? 'failed'
      : tally.errors.length > 0
        ? 'partial'
        : 'success';

    const result: RotationPassResult = {
      passId,
      directory,
      status,
      ...tally,
      startedAt,
      completedAt: new Date(),
    };

    this.history.record(result);
    rotationMetrics.passes.inc({ status });
    rotationMetrics.rollovers.inc(tally.rolledOver);
    rotationMetrics.archives.inc(tally.archivesCreated);
    rotationMetrics.errors.inc(tally.errors.length);

    if (tally.rolledOver > 0 || tally.archivesCreated > 0 || tally.filesPruned > 0) {
      this.reporter.info('RotationOrchestrator: Rotation pass complete', {
        passId,
        directory,
        status,
        rolledOver: tally.rolledOver,
        archivesCreated: tally.archivesCreated,
        filesPruned: tally.filesPruned,
      });
    }

    return result;
  }

  private async rotateFile(
    passId: string,
    file: string,
    limits: RotationLimits,
    tally: PassTally
  ): Promise<void> {
    try {
      const rolled = await this.rollover.execute(file, limits);
      if (rolled.rotatedFile !== null) {
        tally.rolledOver++;
      }
      tally.filesPruned += rolled.pruned.length;
      tally.errors.push(...rolled.errors);

      const backedUp = await this.backup.execute(file, limits);
      tally.archivesCreated += backedUp.archivesCreated.length;
      tally.filesPruned += backedUp.pruned.length;
      tally.errors.push(...backedUp.errors);
    } catch (error) {
      const reason = describeError(error);
      this.reporter.error('RotationOrchestrator: Rotating file raised an unexpected error', {
        passId,
        file,
        error: reason,
      });
      tally.errors.push(`rotate ${file} failed: ${reason}`);
    }
  }
}

export interface RotationEngineOptions extends RotationOrchestratorOptions {
  reporter?: RotationReporter;
  clock?: Clock;
  history?: RotationHistoryRepository;
}

/**
 * Wires pruner, stages and orchestrator around one reporter and clock.
 */
export function createRotationOrchestrator(
  options: RotationEngineOptions = {}
): RotationOrchestrator {
  const reporter = options.reporter ?? logger;
  const clock = options.clock ?? (() => new Date());
  const pruner = new RetentionPruner(reporter);

  return new RotationOrchestrator(
    new RolloverStrategy(pruner, reporter, clock),
    new BackupStrategy(pruner, reporter, clock),
    options.history ?? new RotationHistoryRepository(),
    { recursive: options.recursive },
    reporter
  );
}
