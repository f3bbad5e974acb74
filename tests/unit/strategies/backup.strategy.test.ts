/**
 * BackupStrategy Unit Tests
 *
 * Zip compression of rollover copies, read back with adm-zip.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { chmod, readdir, stat, writeFile } from 'fs/promises';
import { join } from 'path';
import AdmZip from 'adm-zip';
import { RetentionPruner } from '../../../src/services/retention-pruner';
import { BackupStrategy } from '../../../src/strategies/backup.strategy';
import { createMockReporter, createTempDir } from '../../helpers/temp-dir';

const NOW = new Date(2026, 4, 6, 7, 8, 9, 10);
const NOW_TIMESTAMP = '20260506070809010';

function readEntries(archivePath: string): Array<{ name: string; content: string }> {
  return new AdmZip(archivePath).getEntries().map((entry) => ({
    name: entry.entryName,
    content: entry.getData().toString('utf8'),
  }));
}

describe('BackupStrategy', () => {
  let reporter: ReturnType<typeof createMockReporter>;
  let strategy: BackupStrategy;
  let directory: string;
  let logPath: string;

  beforeEach(async () => {
    reporter = createMockReporter();
    strategy = new BackupStrategy(new RetentionPruner(reporter), reporter, () => NOW);
    directory = await createTempDir();
    logPath = join(directory, 'svc.log');
    await writeFile(logPath, '');
  });

  it('should have name "BackupStrategy"', () => {
    expect(strategy.name).toBe('BackupStrategy');
  });

  it('should reuse a 17-digit timestamp in the archive name', async () => {
    await writeFile(join(directory, 'svc.log.20260102030405006'), 'alpha\n');

    const result = await strategy.execute(logPath, { maxSizeMB: 10, maxBackupCount: 3 });

    const archivePath = join(directory, 'svc.log.20260102030405006.zip');
    expect(result).toEqual({ archivesCreated: [archivePath], pruned: [], errors: [] });
    expect(readEntries(archivePath)).toEqual([
      { name: 'svc.log.20260102030405006', content: 'alpha\n' },
    ]);
    expect((await readdir(directory)).sort()).toEqual(['svc.log', 'svc.log.20260102030405006.zip']);
  });

  it('should give a short numeric copy a fresh timestamp', async () => {
    await writeFile(join(directory, 'svc.log.1'), 'beta\n');

    const result = await strategy.execute(logPath, { maxSizeMB: 10, maxBackupCount: 3 });

    const archivePath = join(directory, `svc.log.${NOW_TIMESTAMP}.zip`);
    expect(result.archivesCreated).toEqual([archivePath]);
    expect(readEntries(archivePath)).toEqual([{ name: 'svc.log.1', content: 'beta\n' }]);
  });

  it('should write archives readable by the owner only', async () => {
    await writeFile(join(directory, 'svc.log.20260102030405006'), 'gamma');

    await strategy.execute(logPath, { maxSizeMB: 10, maxBackupCount: 3 });

    const { mode } = await stat(join(directory, 'svc.log.20260102030405006.zip'));
    expect(mode & 0o777).toBe(0o600);
  });

  it('should keep a copy whose generated archive name is already taken', async () => {
    await writeFile(join(directory, 'svc.log.1'), 'first');
    await writeFile(join(directory, 'svc.log.2'), 'second');

    const result = await strategy.execute(logPath, { maxSizeMB: 10, maxBackupCount: 3 });

    const archivePath = join(directory, `svc.log.${NOW_TIMESTAMP}.zip`);
    expect(result.archivesCreated).toEqual([archivePath]);
    expect(result.errors).toHaveLength(1);
    expect(result.errors[0]).toMatch(/^BackupStrategy: Compress failed: EEXIST/);
    expect(readEntries(archivePath)).toEqual([{ name: 'svc.log.1', content: 'first' }]);
    expect((await readdir(directory)).sort()).toEqual([
      'svc.log',
      'svc.log.2',
      `svc.log.${NOW_TIMESTAMP}.zip`,
    ]);
  });

  it('should not let a reused timestamp replace an archive minted in the same pass', async () => {
    await writeFile(join(directory, 'svc.log.1'), 'short suffix');
    await writeFile(join(directory, `svc.log.${NOW_TIMESTAMP}`), 'full timestamp');

    const result = await strategy.execute(logPath, { maxSizeMB: 10, maxBackupCount: 5 });

    const archivePath = join(directory, `svc.log.${NOW_TIMESTAMP}.zip`);
    expect(result.archivesCreated).toEqual([archivePath]);
    expect(result.errors).toHaveLength(1);
    expect(result.errors[0]).toMatch(/^BackupStrategy: Compress failed: EEXIST/);
    expect(readEntries(archivePath)).toEqual([{ name: 'svc.log.1', content: 'short suffix' }]);
    expect((await readdir(directory)).sort()).toEqual([
      'svc.log',
      `svc.log.${NOW_TIMESTAMP}`,
      `svc.log.${NOW_TIMESTAMP}.zip`,
    ]);
  });

  it('should rewrite an archive that already holds the same copy', async () => {
    const copyName = 'svc.log.20260102030405006';
    const archivePath = join(directory, `${copyName}.zip`);
    const stale = new AdmZip();
    stale.addFile(copyName, Buffer.from('stale'));
    await writeFile(archivePath, stale.toBuffer(), { mode: 0o644 });
    await chmod(archivePath, 0o644);
    await writeFile(join(directory, copyName), 'fresh');

    const result = await strategy.execute(logPath, { maxSizeMB: 10, maxBackupCount: 5 });

    expect(result).toEqual({ archivesCreated: [archivePath], pruned: [], errors: [] });
    expect(readEntries(archivePath)).toEqual([{ name: copyName, content: 'fresh' }]);
    expect((await stat(archivePath)).mode & 0o777).toBe(0o600);
    expect((await readdir(directory)).sort()).toEqual(['svc.log', `${copyName}.zip`]);
  });

  it('should do nothing when backups are disabled', async () => {
    await writeFile(join(directory, 'svc.log.20260102030405006'), 'delta');

    const result = await strategy.execute(logPath, { maxSizeMB: 10, maxBackupCount: 0 });

    expect(result).toEqual({ archivesCreated: [], pruned: [], errors: [] });
    expect((await readdir(directory)).sort()).toEqual(['svc.log', 'svc.log.20260102030405006']);
  });

  it('should prune the oldest archives beyond the limit', async () => {
    await writeFile(join(directory, 'svc.log.20260101000000001.zip'), 'old');
    await writeFile(join(directory, 'svc.log.20260101000000002.zip'), 'newer');
    await writeFile(join(directory, 'svc.log.20260101000000003'), 'newest');

    const result = await strategy.execute(logPath, { maxSizeMB: 10, maxBackupCount: 2 });

    expect(result.pruned).toEqual([join(directory, 'svc.log.20260101000000001.zip')]);
    expect((await readdir(directory)).sort()).toEqual([
      'svc.log',
      'svc.log.20260101000000002.zip',
      'svc.log.20260101000000003.zip',
    ]);
  });

  it('should ignore copies of other logs in the directory', async () => {
    await writeFile(join(directory, 'other.log.20260102030405006'), 'other');

    const result = await strategy.execute(logPath, { maxSizeMB: 10, maxBackupCount: 3 });

    expect(result.archivesCreated).toEqual([]);
    expect((await readdir(directory)).sort()).toEqual(['other.log.20260102030405006', 'svc.log']);
  });
});
