/**
 * Configuration file loading
 */

import * as fs from "node:fs";
import { readFile } from "node:fs/promises";
import * as path from "node:path";
import * as yaml from "js-yaml";
import { errorMessage } from "../core/errors";
import type { ShelfConfig } from "../types";
import { CONFIG_FILE_NAMES, DEFAULT_DOCUMENT, deepMerge } from "./defaults";
import { iniToDocument, parseIni } from "./ini";
import { resolveConfig } from "./resolver";
import { ConfigError, validateConfig } from "./validator";

export { ConfigError } from "./validator";

/**
 * Load, validate and resolve a config file
 */
export async function loadConfig(configPath: string): Promise<ShelfConfig> {
  const absolutePath = path.resolve(configPath);

  let content: string;
  try {
    content = await readFile(absolutePath, "utf8");
  } catch {
    throw new ConfigError(`Configuration file ${absolutePath} not found`);
  }

  const ext = path.extname(absolutePath).toLowerCase();
  const parsed = parseConfigContent(content, ext);

  const merged = deepMerge(DEFAULT_DOCUMENT, parsed);

  validateConfig(merged);

  return resolveConfig(merged, absolutePath);
}

export function parseConfigContent(content: string, ext: string): unknown {
  if (ext === ".ini") {
    return iniToDocument(parseIni(content));
  }

  if (ext === ".yaml" || ext === ".yml") {
    try {
      return yaml.load(content);
    } catch (e) {
      throw new ConfigError(`Failed to parse YAML: ${errorMessage(e)}`);
    }
  }

  if (ext === ".json") {
    try {
      return JSON.parse(content);
    } catch (e) {
      throw new ConfigError(`Failed to parse JSON: ${errorMessage(e)}`);
    }
  }

  throw new ConfigError(`Unsupported config file format: ${ext}. Use .ini, .yaml, .yml, or .json`);
}

/**
 * Find a config file in the given directory
 */
export function findConfigFile(startDir: string = process.cwd()): string | null {
  for (const name of CONFIG_FILE_NAMES) {
    const configPath = path.join(startDir, name);
    if (fs.existsSync(configPath)) {
      return configPath;
    }
  }

  return null;
}

/**
 * Find and load a config file
 */
export async function findAndLoadConfig(
  configPath?: string,
  startDir?: string,
): Promise<ShelfConfig> {
  if (configPath) {
    return loadConfig(configPath);
  }

  const found = findConfigFile(startDir);
  if (!found) {
    throw new ConfigError(
      `No config file found. Create ${CONFIG_FILE_NAMES[0]} or specify --config path`,
    );
  }

  return loadConfig(found);
}
