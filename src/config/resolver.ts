/**
 * Resolution of a validated config document into the immutable ShelfConfig
 */

import * as path from "node:path";
import type {
  AlertCredentials,
  ConfigDocument,
  ObjectEntryDocument,
  ShelfConfig,
  TrackedObject,
} from "../types";
import { normalizeRemoteFolder, resolveConfigPath } from "../utils";
import { DEFAULT_KEEP, DEFAULT_SCRATCH_DIR, DEFAULT_STATE_DIR } from "./defaults";
import { ConfigError } from "./validator";

/**
 * Parse `token:chatId`. Bot tokens contain a colon themselves, so the
 * chat id is whatever follows the last one. Whitespace is ignored.
 */
export function parseTelegramCredentials(value: string): AlertCredentials {
  const compact = value.replace(/\s+/g, "");
  const split = compact.lastIndexOf(":");
  const token = split === -1 ? "" : compact.slice(0, split);
  const chatId = split === -1 ? "" : compact.slice(split + 1);

  if (!token || !chatId) {
    throw new ConfigError("Invalid telegram format in config, expected 'token:chatId'");
  }

  return { token, chatId };
}

/**
 * Parse a compact `path;intervalDays;remoteFolder` entry
 */
export function parseObjectEntry(entry: string): TrackedObject {
  const fields = entry.split(";").map((field) => field.trim());
  const [localPath = "", rawDays = "", rawFolder = ""] = fields;

  if (fields.length !== 3) {
    throw new ConfigError(
      `Invalid object entry "${entry}": expected "path;intervalDays;remoteFolder"`,
    );
  }
  if (!localPath) {
    throw new ConfigError(`Invalid object entry "${entry}": path is empty`);
  }
  if (!/^\d+$/.test(rawDays)) {
    throw new ConfigError(
      `Invalid object entry "${entry}": intervalDays must be an integer >= 0`,
    );
  }

  const remoteFolder = normalizeRemoteFolder(rawFolder);
  if (!remoteFolder) {
    throw new ConfigError(`Invalid object entry "${entry}": remote folder is empty`);
  }

  return { localPath, intervalDays: Number.parseInt(rawDays, 10), remoteFolder };
}

function resolveObject(entry: ObjectEntryDocument): TrackedObject {
  if (typeof entry === "string") {
    return parseObjectEntry(entry);
  }

  const remoteFolder = normalizeRemoteFolder(entry.remoteFolder);
  if (!remoteFolder) {
    throw new ConfigError(`Remote folder for ${entry.path} is empty`);
  }

  return { localPath: entry.path.trim(), intervalDays: entry.intervalDays, remoteFolder };
}

function resolveAlertCredentials(
  telegram: ConfigDocument["cloud"]["telegram"],
): AlertCredentials | undefined {
  if (telegram === undefined) {
    return undefined;
  }
  if (typeof telegram === "string") {
    return parseTelegramCredentials(telegram);
  }
  return { token: telegram.token.trim(), chatId: String(telegram.chatId).trim() };
}

/**
 * Build the run configuration. Relative paths resolve against the config
 * file's directory, tracked paths included.
 */
export function resolveConfig(document: ConfigDocument, configPath: string): ShelfConfig {
  const configDir = path.dirname(path.resolve(configPath));

  const objects = document.objects.map(resolveObject).map((object) => ({
    ...object,
    localPath: resolveConfigPath(object.localPath, configDir),
  }));

  const seen = new Set<string>();
  for (const object of objects) {
    if (seen.has(object.localPath)) {
      throw new ConfigError(`Tracked object listed twice: ${object.localPath}`);
    }
    seen.add(object.localPath);
  }

  const alertCredentials = resolveAlertCredentials(document.cloud.telegram);

  return Object.freeze({
    cloud: Object.freeze({
      remoteName: document.cloud.provider.trim().replace(/:$/, ""),
      ...(alertCredentials && { alertCredentials: Object.freeze(alertCredentials) }),
    }),
    retention: Object.freeze({ keep: document.cloud.keep ?? DEFAULT_KEEP }),
    paths: Object.freeze({
      stateDir: resolveConfigPath(document.paths?.state ?? DEFAULT_STATE_DIR, configDir),
      scratchDir: resolveConfigPath(document.paths?.scratch ?? DEFAULT_SCRATCH_DIR, configDir),
    }),
    objects: Object.freeze(objects.map((object) => Object.freeze(object))),
  });
}
