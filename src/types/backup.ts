/**
 * Backup pipeline type definitions
 */

import type { BackupStepError } from "../core/errors";
import type { TrackedObject } from "./config";

export interface ArchiveArtifact {
  archiveName: string;
  archivePath: string;
  /** 0 when the artifact was only planned (dry run) */
  sizeBytes: number;
}

export interface ArchiveOptions {
  scratchDir: string;
  dateTag: string;
  dryRun?: boolean;
}

export type Archiver = (localPath: string, options: ArchiveOptions) => Promise<ArchiveArtifact>;

/** Stages of a due object's pipeline that can end in failure */
export type PipelineStage = "archiving" | "uploading" | "recording";

export interface PruneResult {
  deleted: string[];
  failed: string[];
  /** Names selected in dry-run mode; nothing is deleted */
  wouldDelete: string[];
}

export type ObjectResult =
  | {
      status: "skipped";
      object: TrackedObject;
      nextDueAt: number;
    }
  | {
      status: "done";
      object: TrackedObject;
      artifact: ArchiveArtifact;
      pruned: PruneResult;
    }
  | {
      status: "failed";
      object: TrackedObject;
      stage: PipelineStage;
      error: BackupStepError;
    };

export interface BatchReport {
  results: ObjectResult[];
  done: number;
  skipped: number;
  failed: number;
  dryRun: boolean;
  durationMs: number;
}

export interface BackupOptions {
  /** Start of the run; every object is judged against the same instant */
  now: Date;
  dryRun?: boolean;
}
