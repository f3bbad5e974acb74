/**
 * Rotated file naming.
 *
 * Rollover copies:    svc.log.1, svc.log.20260102030405006
 * Compressed backups: svc.log.20260102030405006.zip
 *
 * Timestamps are fixed-width (17 digits) so lexicographic order of the names is
 * chronological order.
 */

export const TIMESTAMP_LENGTH = 17;

export const LOG_FILE_PATTERN = /.\.(log|trace|out)$/;

function pad(value: number, width: number): string {
  return String(value).padStart(width, '0');
}

/**
 * Local time as YYYYMMDDhhmmssmmm.
 */
export function formatTimestamp(date: Date): string {
  return (
    pad(date.getFullYear(), 4) +
    pad(date.getMonth() + 1, 2) +
    pad(date.getDate(), 2) +
    pad(date.getHours(), 2) +
    pad(date.getMinutes(), 2) +
    pad(date.getSeconds(), 2) +
    pad(date.getMilliseconds(), 3)
  );
}

export function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

export function rolloverPattern(baseName: string): RegExp {
  return new RegExp(`^${escapeRegExp(baseName)}\\.[0-9]{1,${TIMESTAMP_LENGTH}}$`);
}

export function canonicalRolloverPattern(baseName: string): RegExp {
  return new RegExp(`^${escapeRegExp(baseName)}\\.[0-9]{${TIMESTAMP_LENGTH}}$`);
}

export function backupPattern(baseName: string): RegExp {
  return new RegExp(`^${escapeRegExp(baseName)}\\.[0-9]{${TIMESTAMP_LENGTH}}\\.zip$`);
}

export function archiveName(baseName: string, timestamp: string): string {
  return `${baseName}.${timestamp}.zip`;
}
