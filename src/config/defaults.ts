/**
 * Default configuration values
 */

export const DEFAULT_KEEP = 10;
export const DEFAULT_STATE_DIR = "~/.backup_logs";
export const DEFAULT_SCRATCH_DIR = "/tmp/db_backups";

export const CONFIG_FILE_NAMES = [
  "backups.ini",
  "dbshelf.config.yaml",
  "dbshelf.config.yml",
  "dbshelf.config.json",
] as const;

export const DEFAULT_DOCUMENT = {
  cloud: {
    keep: DEFAULT_KEEP,
  },
  paths: {
    state: DEFAULT_STATE_DIR,
    scratch: DEFAULT_SCRATCH_DIR,
  },
};

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Deep merge two plain objects, with source overriding target.
 * Arrays and scalars from source replace the target value.
 */
export function deepMerge(target: unknown, source: unknown): unknown {
  if (!isPlainObject(target) || !isPlainObject(source)) {
    return source === undefined ? target : source;
  }

  const result: Record<string, unknown> = { ...target };

  for (const [key, sourceValue] of Object.entries(source)) {
    if (sourceValue === undefined) continue;
    result[key] = deepMerge(target[key], sourceValue);
  }

  return result;
}
