/**
 * Run directories and scratch cleanup
 */

import * as fs from "node:fs";
import { mkdir, readdir, rm } from "node:fs/promises";
import * as path from "node:path";
import type { PathsConfig } from "../../types";
import { logger } from "../../utils";

export async function ensureRunDirectories(paths: PathsConfig): Promise<void> {
  await mkdir(paths.stateDir, { recursive: true });
  await mkdir(paths.scratchDir, { recursive: true });
}

function isArtifact(name: string): boolean {
  return name.endsWith(".zip");
}

/**
 * Remove every archive artifact from the scratch directory
 */
export async function cleanupScratch(scratchDir: string): Promise<number> {
  let names: string[];
  try {
    names = await readdir(scratchDir);
  } catch {
    return 0;
  }

  const artifacts = names.filter(isArtifact);
  for (const name of artifacts) {
    await rm(path.join(scratchDir, name), { force: true });
  }

  if (artifacts.length > 0) {
    logger.debug(`Removed ${artifacts.length} artifact(s) from ${scratchDir}`);
  }
  return artifacts.length;
}

/**
 * Synchronous variant for signal handlers, where the process exits right after
 */
export function cleanupScratchSync(scratchDir: string): void {
  let names: string[];
  try {
    names = fs.readdirSync(scratchDir);
  } catch {
    return;
  }

  for (const name of names.filter(isArtifact)) {
    fs.rmSync(path.join(scratchDir, name), { force: true });
  }
}
