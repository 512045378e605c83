/**
 * Per-object last-run state, one small file per tracked object
 */

import { mkdir, readFile, rename, writeFile } from "node:fs/promises";
import * as path from "node:path";
import { logger, stateFileName } from "../utils";

export class RunStateStore {
  constructor(private readonly stateDir: string) {}

  pathFor(localPath: string): string {
    return path.join(this.stateDir, stateFileName(localPath));
  }

  /**
   * Epoch seconds of the last successful backup, 0 if never run
   */
  async readLastRun(localPath: string): Promise<number> {
    const file = this.pathFor(localPath);

    let content: string;
    try {
      content = await readFile(file, "utf8");
    } catch (error) {
      if (!isNotFound(error)) {
        logger.warn(`Cannot read state file ${file}, treating as never run:`, error);
      }
      return 0;
    }

    const trimmed = content.trim();
    if (!/^\d+$/.test(trimmed)) {
      logger.warn(`Ignoring unreadable state file ${file}: "${trimmed}"`);
      return 0;
    }

    return Number.parseInt(trimmed, 10);
  }

  async writeLastRun(localPath: string, epochSeconds: number): Promise<void> {
    const file = this.pathFor(localPath);
    const tempFile = `${file}.tmp`;

    await mkdir(this.stateDir, { recursive: true });
    await writeFile(tempFile, `${epochSeconds}\n`, "utf8");
    await rename(tempFile, file);

    logger.debug(`Recorded last run ${epochSeconds} in ${file}`);
  }
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}
