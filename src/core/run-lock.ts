/**
 * Exclusive lock file preventing overlapping runs
 */

import * as fs from "node:fs";
import { readFile, rm, writeFile } from "node:fs/promises";
import * as path from "node:path";
import { logger } from "../utils";
import { PreconditionError } from "./errors";

export const LOCK_FILE_NAME = ".dbshelf.lock";

export interface RunLock {
  readonly path: string;
  release(): Promise<void>;
  releaseSync(): void;
}

function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    // EPERM: the process exists but belongs to someone else
    return error instanceof Error && "code" in error && error.code === "EPERM";
  }
}

async function readOwner(lockPath: string): Promise<number | null> {
  try {
    const pid = Number.parseInt((await readFile(lockPath, "utf8")).trim(), 10);
    return Number.isInteger(pid) && pid > 0 ? pid : null;
  } catch {
    return null;
  }
}

async function createExclusive(lockPath: string, pid: number): Promise<boolean> {
  try {
    await writeFile(lockPath, `${pid}\n`, { flag: "wx" });
    return true;
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "EEXIST") {
      return false;
    }
    throw error;
  }
}

/**
 * Take the run lock in `dir`. A lock whose owner is gone is replaced.
 */
export async function acquireRunLock(dir: string, pid: number = process.pid): Promise<RunLock> {
  const lockPath = path.join(dir, LOCK_FILE_NAME);

  if (!(await createExclusive(lockPath, pid))) {
    const owner = await readOwner(lockPath);
    if (owner !== null && isProcessAlive(owner)) {
      throw new PreconditionError(`Another run is in progress (pid ${owner}, lock ${lockPath})`);
    }

    logger.warn(`Replacing stale lock ${lockPath}`);
    await rm(lockPath, { force: true });
    if (!(await createExclusive(lockPath, pid))) {
      throw new PreconditionError(`Could not take lock ${lockPath}`);
    }
  }

  let released = false;
  return {
    path: lockPath,
    async release() {
      if (released) return;
      released = true;
      await rm(lockPath, { force: true });
    },
    releaseSync() {
      if (released) return;
      released = true;
      fs.rmSync(lockPath, { force: true });
    },
  };
}
