/**
 * Core module exports
 */

// Backup
export {
  type BackupDependencies,
  cleanupScratch,
  cleanupScratchSync,
  createArchive,
  ensureRunDirectories,
  formatFailureAlert,
  processObject,
  runBackups,
} from "./backup";

// Cleanup
export {
  DEFAULT_RETENTION_KEEP,
  type PruneOptions,
  pruneRemoteFolder,
  selectForDeletion,
} from "./cleanup";

// Errors
export {
  type BackupErrorKind,
  BackupStepError,
  errorMessage,
  PreconditionError,
} from "./errors";

// Run lock
export { acquireRunLock, LOCK_FILE_NAME, type RunLock } from "./run-lock";

// Scheduler
export { isDue, nextDueAt, SECONDS_PER_DAY, toEpochSeconds } from "./scheduler";
