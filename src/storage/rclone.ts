/**
 * rclone-backed remote store
 */

import * as path from "node:path";
import { BackupStepError } from "../core/errors";
import type { RemoteEntry, RemoteStore } from "../types";
import { type CommandRunner, logger, normalizeRemoteFolder, runCommand } from "../utils";

const RCLONE = "rclone";

/**
 * Build `remote:folder[/name]`, normalizing slashes on the folder
 */
export function buildRemotePath(remoteName: string, folder: string, name?: string): string {
  const parts: string[] = [];
  const normalized = normalizeRemoteFolder(folder);
  if (normalized) parts.push(normalized);
  if (name) parts.push(name);
  return `${remoteName}:${parts.join("/")}`;
}

interface LsjsonItem {
  Name: string;
  ModTime: string;
  Size?: number;
  IsDir?: boolean;
}

function isLsjsonItem(value: unknown): value is LsjsonItem {
  return (
    typeof value === "object" &&
    value !== null &&
    "Name" in value &&
    typeof value.Name === "string" &&
    "ModTime" in value &&
    typeof value.ModTime === "string"
  );
}

/**
 * Parse `rclone lsjson` output into listing entries
 */
export function parseLsjson(output: string): RemoteEntry[] {
  const parsed: unknown = JSON.parse(output === "" ? "[]" : output);
  if (!Array.isArray(parsed)) {
    throw new Error("expected a JSON array");
  }

  return parsed.map((value: unknown, i) => {
    if (!isLsjsonItem(value)) {
      throw new Error(`entry ${i} lacks Name or ModTime`);
    }
    const modTime = new Date(value.ModTime);
    if (Number.isNaN(modTime.getTime())) {
      throw new Error(`entry ${i} has an invalid ModTime "${value.ModTime}"`);
    }
    return { name: value.Name, modTime, size: typeof value.Size === "number" ? value.Size : 0 };
  });
}

export class RcloneRemoteStore implements RemoteStore {
  readonly label: string;

  constructor(
    private readonly remoteName: string,
    private readonly run: CommandRunner = runCommand,
  ) {
    this.label = `${remoteName}:`;
  }

  async isToolAvailable(): Promise<boolean> {
    const result = await this.run(RCLONE, ["version"]);
    return result.success;
  }

  async isReachable(): Promise<boolean> {
    const result = await this.run(RCLONE, ["lsd", `${this.remoteName}:`]);
    if (!result.success) {
      logger.debug(`rclone lsd ${this.remoteName}: failed: ${result.stderr}`);
    }
    return result.success;
  }

  async upload(localFile: string, remoteFolder: string): Promise<void> {
    const target = buildRemotePath(this.remoteName, remoteFolder, path.basename(localFile));
    const result = await this.run(RCLONE, ["copyto", localFile, target]);

    if (!result.success) {
      throw new BackupStepError(
        "UploadError",
        `rclone copyto to ${target} failed (exit ${result.exitCode}): ${result.stderr}`,
      );
    }

    logger.debug(`Uploaded ${localFile} to ${target}`);
  }

  async list(remoteFolder: string): Promise<RemoteEntry[]> {
    const target = buildRemotePath(this.remoteName, remoteFolder);
    const result = await this.run(RCLONE, ["lsjson", target, "--files-only"]);

    if (!result.success) {
      throw new BackupStepError(
        "ListError",
        `rclone lsjson ${target} failed (exit ${result.exitCode}): ${result.stderr}`,
      );
    }

    try {
      return parseLsjson(result.stdout);
    } catch (error) {
      throw new BackupStepError("ListError", `Malformed listing for ${target}`, { cause: error });
    }
  }

  async delete(remoteFolder: string, name: string): Promise<void> {
    const target = buildRemotePath(this.remoteName, remoteFolder, name);
    const result = await this.run(RCLONE, ["deletefile", target]);

    if (!result.success) {
      throw new BackupStepError(
        "DeleteError",
        `rclone deletefile ${target} failed (exit ${result.exitCode}): ${result.stderr}`,
      );
    }
  }
}
