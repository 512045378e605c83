/**
 * Retention policy logic
 */

import type { RemoteEntry } from "../../types";
import { isArchiveName } from "../../utils";

export const DEFAULT_RETENTION_KEEP = 10;

/**
 * Names to delete so that only the newest `keep` archives remain.
 * Entries that don't follow the archive naming convention are never
 * candidates.
 */
export function selectForDeletion(
  entries: readonly Pick<RemoteEntry, "name" | "modTime">[],
  keep: number = DEFAULT_RETENTION_KEEP,
): string[] {
  // Sort by modTime descending (newest first); Array.prototype.sort is stable
  const sorted = entries
    .filter((entry) => isArchiveName(entry.name))
    .sort((a, b) => b.modTime.getTime() - a.modTime.getTime());

  return sorted.slice(Math.max(keep, 0)).map((entry) => entry.name);
}
