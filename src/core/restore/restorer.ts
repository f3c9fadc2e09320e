/**
 * Restore orchestration: stage, count, merge
 */

import { mkdir, mkdtemp, rm } from "node:fs/promises";
import * as path from "node:path";
import type { BackupConfig, Notifier, RestoreResult } from "../../types/index.js";
import { ExternalToolError, errorMessage, isBackupError, NotFoundError } from "../../utils/errors.js";
import { countFiles, isFile } from "../../utils/fs.js";
import { logger } from "../../utils/logger.js";
import { extractArchive } from "./extractor.js";
import { FsMergeEngine, type MergeEngine } from "./merger.js";
import { RestoreProgress } from "./progress.js";

export type RestoreConfig = Pick<BackupConfig, "destination" | "tmpDir">;

export interface RestoreOptions {
  engine?: MergeEngine;
}

async function createStagingDir(tmpDir: string): Promise<string> {
  try {
    await mkdir(tmpDir, { recursive: true });
    return await mkdtemp(path.join(tmpDir, "backup-restore-"));
  } catch (error) {
    throw new ExternalToolError(`Cannot create staging directory in ${tmpDir}: ${errorMessage(error)}`, error);
  }
}

/**
 * Expand `archivePath` into a private staging directory, then merge it into
 * the destination without touching files that already exist there.
 */
export async function restoreArchive(
  archivePath: string,
  config: RestoreConfig,
  notifier: Notifier,
  options: RestoreOptions = {},
): Promise<RestoreResult> {
  const startTime = Date.now();
  const resolvedPath = path.resolve(archivePath);
  const engine = options.engine ?? new FsMergeEngine();

  if (!(await isFile(resolvedPath))) {
    throw new NotFoundError(`Archive not found: ${resolvedPath}`);
  }

  notifier.notify(`Restoring ${path.basename(resolvedPath)}`);
  logger.info(`Restoring ${resolvedPath} into ${config.destination}`);

  const stagingDir = await createStagingDir(config.tmpDir);
  let total = 0;
  let copied = 0;
  let skipped = 0;

  try {
    await extractArchive(resolvedPath, stagingDir);
    total = await countFiles(stagingDir);
    logger.debug(`Staged ${total} files in ${stagingDir}`);

    const progress = new RestoreProgress(total, (percent) =>
      notifier.notify(percent === 100 ? "Restore complete" : "Restoring files", percent),
    );
    progress.start();

    for await (const line of engine.merge(stagingDir, config.destination)) {
      const parsed = progress.observe(line);
      if (!parsed) continue;

      logger.debug(line);
      if (parsed.action === "copy") {
        copied++;
      } else {
        skipped++;
      }
    }

    progress.finish();
  } catch (error) {
    if (isBackupError(error)) throw error;
    throw new ExternalToolError(`Restore failed: ${errorMessage(error)}`, error);
  } finally {
    await rm(stagingDir, { recursive: true, force: true });
  }

  logger.info(`Restore finished: ${copied} copied, ${skipped} already present`);
  notifier.notify(`Restored into ${config.destination}: ${copied} new, ${skipped} kept`);

  return {
    archivePath: resolvedPath,
    destination: config.destination,
    total,
    copied,
    skipped,
    durationMs: Date.now() - startTime,
  };
}
