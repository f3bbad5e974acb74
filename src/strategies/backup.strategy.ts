/**
 * BackupStrategy
 *
 * Compresses rollover copies of a log into single-entry zip archives.
 *
 * Naming:
 *   svc.log.20260102030405006 -> svc.log.20260102030405006.zip (timestamp reused)
 *   svc.log.1                 -> svc.log.<now>.zip
 *
 * The archive holds one entry named after the copy (svc.log.1), is readable by
 * the owner only, and replaces the raw copy once written. An existing archive is
 * only rewritten when it already holds that same copy; any other name clash is
 * reported and the raw copy stays for the next cycle. Archives beyond
 * maxBackupCount are pruned afterwards.
 */

import { chmod, readFile, unlink, writeFile } from 'fs/promises';
import { basename, dirname, join } from 'path';
import AdmZip from 'adm-zip';
import { logger } from '../config/logger';
import { filterFileList } from '../services/file-matcher';
import type { RetentionPruner } from '../services/retention-pruner';
import {
  archiveName,
  canonicalRolloverPattern,
  formatTimestamp,
  rolloverPattern,
} from '../utils/rotation-names';
import { describeError } from './rotation-strategy.interface';
import type {
  BackupResult,
  Clock,
  RotationLimits,
  RotationReporter,
  RotationStrategy,
} from './rotation-strategy.interface';

const ARCHIVE_MODE = 0o600;

export class BackupStrategy implements RotationStrategy<BackupResult> {
  readonly name = 'BackupStrategy';

  constructor(
    private pruner: RetentionPruner,
    private reporter: RotationReporter = logger,
    private clock: Clock = () => new Date()
  ) {}

  async execute(filePath: string, limits: RotationLimits): Promise<BackupResult> {
    const result: BackupResult = { archivesCreated: [], pruned: [], errors: [] };

    if (limits.maxBackupCount <= 0) {
      return result;
    }

    const directory = dirname(filePath);
    const baseName = basename(filePath);

    let rotatedFiles: string[];
    try {
      rotatedFiles = await filterFileList(directory, rolloverPattern(baseName), {
        recursive: false,
      });
    } catch (error) {
      this.fail(result, 'BackupStrategy: Listing rollover copies failed', { filePath }, error);
      return result;
    }

    const canonical = canonicalRolloverPattern(baseName);

    for (const rotatedFile of rotatedFiles) {
      const rotatedName = basename(rotatedFile);
      const reuseTimestamp = canonical.test(rotatedName);
      const timestamp = reuseTimestamp
        ? rotatedName.slice(baseName.length + 1)
        : formatTimestamp(this.clock());
      const archivePath = join(directory, archiveName(baseName, timestamp));

      try {
        await this.compressFile(rotatedFile, archivePath);
      } catch (error) {
        this.fail(result, 'BackupStrategy: Compress failed', { rotatedFile, archivePath }, error);
        continue;
      }
      result.archivesCreated.push(archivePath);

      try {
        await unlink(rotatedFile);
      } catch (error) {
        this.fail(result, 'BackupStrategy: Removing rollover copy failed', { rotatedFile }, error);
      }
    }

    if (result.archivesCreated.length > 0) {
      this.reporter.info('BackupStrategy: Compressed rollover copies', {
        filePath,
        archives: result.archivesCreated.length,
      });
    }

    const pruned = await this.pruner.prune(directory, baseName, limits.maxBackupCount, 'backup');
    result.pruned = pruned.removed;
    if (pruned.stoppedEarly) {
      result.errors.push(`prune backups of ${filePath} stopped early`);
    }

    return result;
  }

  private async compressFile(sourcePath: string, archivePath: string): Promise<void> {
    const entryName = basename(sourcePath);
    const zip = new AdmZip();
    zip.addFile(entryName, await readFile(sourcePath));
    const archive = zip.toBuffer();

    try {
      await writeFile(archivePath, archive, { mode: ARCHIVE_MODE, flag: 'wx' });
    } catch (error) {
      if (!isAlreadyExists(error) || !holdsOnly(archivePath, entryName)) {
        throw error;
      }
      // left by a pass that stopped before removing the raw copy
      await writeFile(archivePath, archive);
      await chmod(archivePath, ARCHIVE_MODE);
    }
  }

  private fail(
    result: BackupResult,
    message: string,
    meta: Record<string, unknown>,
    error: unknown
  ): void {
    const reason = describeError(error);
    this.reporter.error(message, { ...meta, error: reason });
    result.errors.push(`${message}: ${reason}`);
  }
}

function isAlreadyExists(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'EEXIST';
}

function holdsOnly(archivePath: string, entryName: string): boolean {
  const entries = new AdmZip(archivePath).getEntries();
  return entries.length === 1 && entries[0].entryName === entryName;
}
