/**
 * Remote folder pruning
 */

import type { PruneResult, RemoteEntry, RemoteStore } from "../../types";
import { logger } from "../../utils";
import { errorMessage } from "../errors";
import { selectForDeletion } from "./retention";

export interface PruneOptions {
  keep: number;
  dryRun?: boolean;
  /** Dry run: the artifact a live run would have uploaded before pruning */
  planned?: RemoteEntry;
}

/**
 * Keep the newest `keep` archives in a remote folder. Best effort: a failed
 * listing prunes nothing and a failed delete doesn't stop the others.
 */
export async function pruneRemoteFolder(
  store: RemoteStore,
  remoteFolder: string,
  options: PruneOptions,
): Promise<PruneResult> {
  const result: PruneResult = { deleted: [], failed: [], wouldDelete: [] };

  logger.info(`Cleaning up old backups in ${store.label}${remoteFolder}`);

  let entries: RemoteEntry[];
  try {
    entries = await store.list(remoteFolder);
  } catch (error) {
    logger.error(`Cannot list ${store.label}${remoteFolder}: ${errorMessage(error)}`);
    return result;
  }

  const { planned } = options;
  if (planned) {
    entries = [...entries.filter((entry) => entry.name !== planned.name), planned];
  }

  const candidates = selectForDeletion(entries, options.keep);
  logger.debug(
    `${entries.length} file(s) in ${store.label}${remoteFolder}, ${candidates.length} beyond retention`,
  );

  for (const name of candidates) {
    if (options.dryRun) {
      logger.info(`[DRY RUN] Would remove: ${name}`);
      result.wouldDelete.push(name);
      continue;
    }

    try {
      logger.info(`Removing: ${name}`);
      await store.delete(remoteFolder, name);
      result.deleted.push(name);
    } catch (error) {
      logger.warn(`Failed to remove ${name}: ${errorMessage(error)}`);
      result.failed.push(name);
    }
  }

  return result;
}
