/**
 * Archive creation for backups
 */

import { createWriteStream } from "node:fs";
import { mkdir, rename, rm, stat } from "node:fs/promises";
import * as path from "node:path";
import archiver from "archiver";
import { PROGRESS_POLL_INTERVAL_MS } from "../../config/defaults.js";
import type { ArchiveResult, BackupConfig, CollectedFile, Notifier } from "../../types/index.js";
import { computeFileChecksum } from "../../utils/crypto.js";
import { ExternalToolError, errorMessage, isBackupError } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";
import { formatBytes, generateArchiveName, partialArchiveName } from "../../utils/naming.js";
import { trackBackgroundTask } from "../progress/background.js";
import { linearRamp, rampStepForSize } from "../progress/ramp.js";
import { collectFiles } from "./file-collector.js";

export interface CreateArchiveOptions {
  /** Progress tick interval */
  pollIntervalMs?: number;
  /** Timestamp used for the generated archive name */
  now?: Date;
  signal?: AbortSignal;
}

export function partialArchivePath(archiveDir: string, archiveName: string): string {
  return path.join(archiveDir, partialArchiveName(archiveName));
}

async function ensureArchiveDir(archiveDir: string): Promise<void> {
  try {
    await mkdir(archiveDir, { recursive: true });
  } catch (error) {
    throw new ExternalToolError(
      `Cannot create archive directory ${archiveDir}: ${errorMessage(error)}`,
      error,
    );
  }
}

function writeZip(
  files: CollectedFile[],
  targetPath: string,
  compression: number,
  signal?: AbortSignal,
): Promise<void> {
  return new Promise((resolve, reject) => {
    const output = createWriteStream(targetPath);
    const archive = archiver("zip", compression === 0 ? { store: true } : { zlib: { level: compression } });

    // Settle only once the file handle is closed, so the caller can remove it
    let failure: unknown = null;
    const fail = (error: unknown) => {
      if (failure !== null) return;
      failure = error;
      archive.abort();
      output.destroy();
    };

    output.on("close", () => (failure === null ? resolve() : reject(failure)));
    output.on("error", fail);
    archive.on("error", fail);
    archive.on("warning", (warning) => {
      // Raised when a collected file disappears before it is read
      logger.warn(`Skipped during compression: ${warning.message}`);
    });

    if (signal) {
      if (signal.aborted) {
        fail(new ExternalToolError("Backup cancelled"));
        return;
      }
      signal.addEventListener("abort", () => fail(new ExternalToolError("Backup cancelled")), {
        once: true,
      });
    }

    archive.pipe(output);

    for (const file of files) {
      archive.file(file.absolutePath, { name: file.relativePath });
    }

    archive.finalize().catch(fail);
  });
}

/**
 * Collect the configured directories into `<archiveDir>/<name>`.
 *
 * The zip is written beside its final name and renamed once complete, so a
 * failed run leaves nothing behind. Zero existing source directories yield an
 * empty archive, not an error.
 */
export async function createArchive(
  config: BackupConfig,
  notifier: Notifier,
  options: CreateArchiveOptions = {},
): Promise<ArchiveResult> {
  const startTime = Date.now();
  const intervalMs = options.pollIntervalMs ?? PROGRESS_POLL_INTERVAL_MS;
  const archiveName = config.output ?? generateArchiveName(options.now);
  const archivePath = path.join(config.archiveDir, archiveName);
  const partialPath = partialArchivePath(config.archiveDir, archiveName);

  notifier.notify("Backup started", 0);
  logger.info(`Creating archive: ${archiveName}`);

  await ensureArchiveDir(config.archiveDir);

  const { files, sourcePaths, skippedPaths } = await collectFiles(config);

  if (files.length === 0) {
    logger.warn("No files found to archive, writing an empty archive");
  } else {
    logger.info(`Found ${files.length} files to archive`);
  }

  const totalBytes = files.reduce((sum, file) => sum + file.size, 0);
  logger.debug(`Compressing ${formatBytes(totalBytes)} at level ${config.compression}`);

  try {
    await trackBackgroundTask(writeZip(files, partialPath, config.compression, options.signal), {
      intervalMs,
      ramp: linearRamp(rampStepForSize(totalBytes, intervalMs)),
      onProgress: (percent) =>
        notifier.notify(percent === 100 ? "Backup complete" : "Creating archive", percent),
    });
    await rename(partialPath, archivePath);
  } catch (error) {
    await rm(partialPath, { force: true });
    if (isBackupError(error)) throw error;
    throw new ExternalToolError(`Failed to create archive: ${errorMessage(error)}`, error);
  }

  const { size: sizeBytes } = await stat(archivePath);
  const checksum = await computeFileChecksum(archivePath);

  logger.info(`Archive created: ${archivePath} (${formatBytes(sizeBytes)})`);
  notifier.notify(`Backup created: ${archivePath}`);

  return {
    archiveName,
    archivePath,
    sizeBytes,
    filesCount: files.length,
    checksum,
    sourcePaths,
    skippedPaths,
    durationMs: Date.now() - startTime,
  };
}
