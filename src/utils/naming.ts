/**
 * Archive and state file naming
 */

// Pattern: <anything without a slash>_YYYYMMDD.zip
export const ARCHIVE_NAME_PATTERN = /^[^/]+_\d{8}\.zip$/;

/**
 * Turn a local path into a flat file name by replacing path separators
 */
export function sanitizePath(localPath: string): string {
  return localPath.replace(/[/\\]/g, "_");
}

/**
 * Local calendar date of `date` as YYYYMMDD
 */
export function formatDateTag(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, "0");
  return `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
}

export function generateArchiveName(localPath: string, dateTag: string): string {
  return `${sanitizePath(localPath)}_${dateTag}.zip`;
}

export function stateFileName(localPath: string): string {
  return `${sanitizePath(localPath)}.last`;
}

export function isArchiveName(name: string): boolean {
  return ARCHIVE_NAME_PATTERN.test(name);
}
