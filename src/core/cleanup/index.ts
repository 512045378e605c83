/**
 * Cleanup module exports
 */

export { type PruneOptions, pruneRemoteFolder } from "./orchestrator";
export { DEFAULT_RETENTION_KEEP, selectForDeletion } from "./retention";
