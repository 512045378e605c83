/**
 * Backup module exports
 */

export { createArchive } from "./archive-creator";
export {
  type BackupDependencies,
  formatFailureAlert,
  processObject,
  runBackups,
} from "./orchestrator";
export { cleanupScratch, cleanupScratchSync, ensureRunDirectories } from "./scratch";
