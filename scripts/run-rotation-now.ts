/**
 * Manually run one rotation pass over a log directory
 *
 * Usage: npm run rotate:now -- <directory> [maxSizeMB] [maxBackupCount]
 */

import { resolve } from 'path';
import { DEFAULT_BACKUP_COUNT, DEFAULT_ROTATE_SIZE_MB } from '../src/config/rotation-policy';
import { createRotationOrchestrator } from '../src/services/rotation-orchestrator';

function parseIntArg(value: string | undefined, fallback: number): number {
  if (value === undefined) {
    return fallback;
  }
  const parsed = parseInt(value, 10);
  if (Number.isNaN(parsed)) {
    throw new Error(`Not a number: ${value}`);
  }
  return parsed;
}

async function runRotation() {
  const [directoryArg, sizeArg, backupArg] = process.argv.slice(2);
  if (!directoryArg) {
    console.error('Usage: run-rotation-now <directory> [maxSizeMB] [maxBackupCount]');
    process.exitCode = 1;
    return;
  }

  const directory = resolve(directoryArg);
  const maxSizeMB = parseIntArg(sizeArg, DEFAULT_ROTATE_SIZE_MB);
  const maxBackupCount = parseIntArg(backupArg, DEFAULT_BACKUP_COUNT);

  console.log(`Rotating ${directory} (maxSizeMB=${maxSizeMB}, maxBackupCount=${maxBackupCount})\n`);

  const orchestrator = createRotationOrchestrator({
    reporter: {
      info: (message, meta) => console.log(message, meta ?? ''),
      error: (message, meta) => console.error(message, meta ?? ''),
    },
  });
  const result = await orchestrator.logRotate(directory, maxSizeMB, maxBackupCount);

  console.log(`\n=== PASS ${result.passId}: ${result.status} ===`);
  console.log(`  Files scanned:    ${result.filesScanned}`);
  console.log(`  Rolled over:      ${result.rolledOver}`);
  console.log(`  Archives created: ${result.archivesCreated}`);
  console.log(`  Files pruned:     ${result.filesPruned}`);
  result.errors.forEach((error) => console.log(`  ! ${error}`));

  if (result.status === 'failed') {
    process.exitCode = 1;
  }
}

runRotation().catch((error) => {
  console.error('Error:', error);
  process.exitCode = 1;
});
