/**
 * Single-file zip archives for backups
 */

import { stat, writeFile } from "node:fs/promises";
import * as path from "node:path";
import AdmZip from "adm-zip";
import type { ArchiveArtifact, ArchiveOptions } from "../../types";
import { formatBytes, generateArchiveName, logger } from "../../utils";
import { BackupStepError } from "../errors";

async function isRegularFile(filePath: string): Promise<boolean> {
  try {
    return (await stat(filePath)).isFile();
  } catch {
    return false;
  }
}

/**
 * Zip one file into `<scratchDir>/<sanitized path>_<dateTag>.zip`.
 * The entry is stored under the file's base name only. An existing artifact
 * with the same name is overwritten; other artifacts are left alone.
 */
export async function createArchive(
  localPath: string,
  options: ArchiveOptions,
): Promise<ArchiveArtifact> {
  if (!(await isRegularFile(localPath))) {
    throw new BackupStepError("SourceMissing", `File not found: ${localPath}`);
  }

  const archiveName = generateArchiveName(localPath, options.dateTag);
  const archivePath = path.join(options.scratchDir, archiveName);

  if (options.dryRun) {
    logger.info(`[DRY RUN] Would archive ${localPath} to ${archivePath}`);
    return { archiveName, archivePath, sizeBytes: 0 };
  }

  logger.info(`Archiving ${localPath} → ${archivePath}`);

  const zip = new AdmZip();
  zip.addLocalFile(localPath);
  await writeFile(archivePath, zip.toBuffer());

  const { size } = await stat(archivePath);
  if (size === 0) {
    throw new BackupStepError("EmptyArchive", `Archive is empty: ${archivePath}`);
  }

  logger.debug(`Archive created: ${archiveName} (${formatBytes(size)})`);

  return { archiveName, archivePath, sizeBytes: size };
}
