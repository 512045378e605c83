/**
 * Centralized type exports for dbshelf
 */

// Backup types
export type {
  ArchiveArtifact,
  ArchiveOptions,
  Archiver,
  BackupOptions,
  BatchReport,
  ObjectResult,
  PipelineStage,
  PruneResult,
} from "./backup";
// Config types
export type {
  AlertCredentials,
  CloudConfig,
  ConfigDocument,
  ObjectEntryDocument,
  PathsConfig,
  RetentionConfig,
  ShelfConfig,
  TrackedObject,
} from "./config";
// Storage types
export type { AlertSink, RemoteEntry, RemoteStore } from "./storage";
