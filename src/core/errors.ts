/**
 * Error types raised by the backup pipeline
 */

export type BackupErrorKind =
  | "SourceMissing"
  | "EmptyArchive"
  | "ArchiveError"
  | "UploadError"
  | "ListError"
  | "DeleteError"
  | "StateWriteError";

/**
 * Failure of one step for one tracked object. Never fatal to the batch.
 */
export class BackupStepError extends Error {
  constructor(
    readonly kind: BackupErrorKind,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "BackupStepError";
  }
}

/**
 * Environment problem that makes the whole run impossible
 * (missing rclone, unreachable remote, another run holding the lock).
 */
export class PreconditionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "PreconditionError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
