/**
 * Backup orchestration
 *
 * Tracked objects are processed one at a time. Each due object goes through
 * archiving → uploading → recording → pruning; a failure in the first three
 * stages ends that object's pipeline with a `failed` result, which is logged
 * and alerted before the next object starts. The last-run timestamp only
 * moves after a confirmed upload.
 */

import type { RunStateStore } from "../../state/run-state";
import type {
  AlertSink,
  ArchiveArtifact,
  Archiver,
  BackupOptions,
  BatchReport,
  ObjectResult,
  PipelineStage,
  RemoteStore,
  ShelfConfig,
  TrackedObject,
} from "../../types";
import { formatDateTag, formatDuration, formatEpoch, logger } from "../../utils";
import { pruneRemoteFolder } from "../cleanup/orchestrator";
import { type BackupErrorKind, BackupStepError, errorMessage } from "../errors";
import { isDue, nextDueAt, toEpochSeconds } from "../scheduler/due";
import { createArchive } from "./archive-creator";

export interface BackupDependencies {
  store: RemoteStore;
  alerts: AlertSink;
  state: RunStateStore;
  archiver?: Archiver;
}

interface PipelineContext {
  config: ShelfConfig;
  store: RemoteStore;
  state: RunStateStore;
  archiver: Archiver;
  now: Date;
  nowSeconds: number;
  dateTag: string;
  dryRun: boolean;
}

const DEFAULT_KIND: Record<PipelineStage, BackupErrorKind> = {
  archiving: "ArchiveError",
  uploading: "UploadError",
  recording: "StateWriteError",
};

function toStepError(error: unknown, stage: PipelineStage): BackupStepError {
  if (error instanceof BackupStepError) {
    return error;
  }
  return new BackupStepError(DEFAULT_KIND[stage], errorMessage(error), { cause: error });
}

function failed(object: TrackedObject, stage: PipelineStage, error: unknown): ObjectResult {
  return { status: "failed", object, stage, error: toStepError(error, stage) };
}

/**
 * Alert text for a failed object
 */
export function formatFailureAlert(
  result: Extract<ObjectResult, { status: "failed" }>,
  remoteLabel: string,
): string {
  const { object, error } = result;
  return `❗Error during backup ${object.localPath} → ${remoteLabel}${object.remoteFolder}\n${error.kind}: ${error.message}`;
}

/**
 * Run the pipeline for one tracked object. Never throws.
 */
export async function processObject(
  object: TrackedObject,
  ctx: PipelineContext,
): Promise<ObjectResult> {
  const { store, dryRun } = ctx;
  const target = `${store.label}${object.remoteFolder}/`;

  const lastRun = await ctx.state.readLastRun(object.localPath);
  if (!isDue(ctx.nowSeconds, lastRun, object.intervalDays)) {
    const dueAt = nextDueAt(lastRun, object.intervalDays);
    logger.info(`Skipping ${object.localPath}, not yet due (next backup after ${formatEpoch(dueAt)})`);
    return { status: "skipped", object, nextDueAt: dueAt };
  }

  let artifact: ArchiveArtifact;
  try {
    artifact = await ctx.archiver(object.localPath, {
      scratchDir: ctx.config.paths.scratchDir,
      dateTag: ctx.dateTag,
      dryRun,
    });
  } catch (error) {
    return failed(object, "archiving", error);
  }

  try {
    if (dryRun) {
      logger.info(`[DRY RUN] Would upload ${artifact.archivePath} to ${target}`);
    } else {
      logger.info(`Uploading ${artifact.archiveName} to ${target}`);
      await store.upload(artifact.archivePath, object.remoteFolder);
    }
  } catch (error) {
    return failed(object, "uploading", error);
  }

  try {
    if (dryRun) {
      logger.debug(`[DRY RUN] Would record last run for ${object.localPath}`);
    } else if (ctx.nowSeconds > lastRun) {
      await ctx.state.writeLastRun(object.localPath, ctx.nowSeconds);
    } else {
      logger.warn(
        `Clock is behind the last recorded run of ${object.localPath}, keeping ${lastRun}`,
      );
    }
  } catch (error) {
    return failed(object, "recording", error);
  }

  logger.info(`Backup completed: ${artifact.archiveName}`);

  const pruned = await pruneRemoteFolder(store, object.remoteFolder, {
    keep: ctx.config.retention.keep,
    dryRun,
    planned: dryRun
      ? { name: artifact.archiveName, modTime: ctx.now, size: artifact.sizeBytes }
      : undefined,
  });

  return { status: "done", object, artifact, pruned };
}

/**
 * Back up every due object, sequentially, and report per-object outcomes
 */
export async function runBackups(
  config: ShelfConfig,
  deps: BackupDependencies,
  options: BackupOptions,
): Promise<BatchReport> {
  const startTime = Date.now();
  const dryRun = options.dryRun ?? false;

  const ctx: PipelineContext = {
    config,
    store: deps.store,
    state: deps.state,
    archiver: deps.archiver ?? createArchive,
    now: options.now,
    nowSeconds: toEpochSeconds(options.now),
    dateTag: formatDateTag(options.now),
    dryRun,
  };

  logger.info(
    `Checking ${config.objects.length} tracked object(s) against ${deps.store.label}${dryRun ? " [DRY RUN]" : ""}`,
  );

  const results: ObjectResult[] = [];

  for (const object of config.objects) {
    const result = await processObject(object, ctx);
    results.push(result);

    if (result.status === "failed") {
      logger.error(
        `Error during backup ${object.localPath} → ${deps.store.label}${object.remoteFolder} (${result.stage}): ${result.error.message}`,
      );
      await deps.alerts.notify(formatFailureAlert(result, deps.store.label));
    }
  }

  const report: BatchReport = {
    results,
    done: results.filter((r) => r.status === "done").length,
    skipped: results.filter((r) => r.status === "skipped").length,
    failed: results.filter((r) => r.status === "failed").length,
    dryRun,
    durationMs: Date.now() - startTime,
  };

  logger.info(
    `Run finished in ${formatDuration(report.durationMs)}: ${report.done} done, ${report.skipped} skipped, ${report.failed} failed`,
  );

  return report;
}
