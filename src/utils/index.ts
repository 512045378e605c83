/**
 * Utility exports
 */

// Formatting utilities
export { formatBytes, formatDuration, formatEpoch } from "./format";
export type { LogLevel } from "./logger";
// Logger
export {
  debug,
  error,
  getLogLevel,
  info,
  initLogLevelFromEnv,
  isLogLevel,
  logger,
  setLogLevel,
  warn,
} from "./logger";
// Naming utilities
export {
  ARCHIVE_NAME_PATTERN,
  formatDateTag,
  generateArchiveName,
  isArchiveName,
  sanitizePath,
  stateFileName,
} from "./naming";
// Path utilities
export { expandHome, normalizeRemoteFolder, resolveConfigPath } from "./path";
// Process utilities
export { type CommandResult, type CommandRunner, runCommand } from "./process";
