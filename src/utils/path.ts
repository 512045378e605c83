/**
 * Path manipulation utilities
 */

import * as os from "node:os";
import * as path from "node:path";

/**
 * Expand a leading `~` to the user's home directory
 */
export function expandHome(filePath: string, homeDir: string = os.homedir()): string {
  if (filePath === "~") return homeDir;
  if (filePath.startsWith("~/")) return path.join(homeDir, filePath.slice(2));
  return filePath;
}

/**
 * Resolve a configured path: `~` expansion, then relative to `baseDir`
 */
export function resolveConfigPath(filePath: string, baseDir: string): string {
  const expanded = expandHome(filePath);
  return path.isAbsolute(expanded) ? expanded : path.resolve(baseDir, expanded);
}

/**
 * Strip leading and trailing slashes from a remote folder
 */
export function normalizeRemoteFolder(folder: string): string {
  return folder.trim().replace(/^\/+/, "").replace(/\/+$/, "");
}
