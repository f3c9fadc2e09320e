/**
 * File collection for backup archives
 */

import type { Dirent, Stats } from "node:fs";
import { readdir, stat } from "node:fs/promises";
import * as path from "node:path";
import type { BackupConfig, CollectedFile, CollectFilesResult } from "../../types/index.js";
import { errorCode } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";
import { isArchiveArtifact } from "../../utils/naming.js";
import { toPosixPath } from "../../utils/path.js";
import { createExclusionMatcher, type ExclusionMatcher } from "./exclusions.js";

export type CollectConfig = Pick<BackupConfig, "root" | "dirs" | "exclude" | "archiveDir">;

interface WalkContext {
  archiveDir: string;
  isExcluded: ExclusionMatcher;
  seen: Set<string>;
  files: CollectedFile[];
}

const MISSING_CODES = new Set(["ENOENT", "ENOTDIR"]);

/**
 * Entry name prefix for a source directory: its path relative to the root,
 * or its base name when it lies outside the root.
 */
export function entryPrefix(root: string, dir: string): string {
  const relative = path.relative(root, dir);
  if (relative === "") return "";
  if (relative.startsWith("..") || path.isAbsolute(relative)) {
    return path.basename(dir);
  }
  return toPosixPath(relative);
}

function joinEntry(prefix: string, name: string): string {
  return prefix === "" ? name : `${prefix}/${name}`;
}

function addFile(ctx: WalkContext, absolutePath: string, relativePath: string, size: number): void {
  if (ctx.seen.has(relativePath)) return;
  ctx.seen.add(relativePath);
  ctx.files.push({ absolutePath, relativePath, size });
}

async function readDirSorted(dir: string): Promise<Dirent[] | null> {
  try {
    const entries = await readdir(dir, { withFileTypes: true });
    return entries.sort((a, b) => a.name.localeCompare(b.name));
  } catch (error) {
    if (errorCode(error) === "EACCES" || errorCode(error) === "EPERM") {
      logger.warn(`Skipping unreadable directory: ${dir}`);
      return null;
    }
    throw error;
  }
}

/**
 * Never archive the archives: prune the archive directory when it lies inside
 * a source, and skip archives sitting directly in it when a source contains
 * or equals it. Other content below the archive directory is still a source.
 */
function isArchiveDirEntry(ctx: WalkContext, parentDir: string, entry: Dirent): boolean {
  if (entry.isDirectory()) {
    return path.join(parentDir, entry.name) === ctx.archiveDir;
  }
  return parentDir === ctx.archiveDir && isArchiveArtifact(entry.name);
}

async function walk(ctx: WalkContext, absoluteDir: string, relativeDir: string): Promise<void> {
  const entries = await readDirSorted(absoluteDir);
  if (!entries) return;

  for (const entry of entries) {
    const absolutePath = path.join(absoluteDir, entry.name);
    const relativePath = joinEntry(relativeDir, entry.name);

    if (isArchiveDirEntry(ctx, absoluteDir, entry)) continue;
    if (ctx.isExcluded(relativePath)) continue;

    if (entry.isDirectory()) {
      await walk(ctx, absolutePath, relativePath);
    } else if (entry.isFile()) {
      const { size } = await stat(absolutePath);
      addFile(ctx, absolutePath, relativePath, size);
    }
  }
}

export async function collectFiles(config: CollectConfig): Promise<CollectFilesResult> {
  const ctx: WalkContext = {
    archiveDir: path.resolve(config.archiveDir),
    isExcluded: createExclusionMatcher(config.exclude),
    seen: new Set(),
    files: [],
  };
  const sourcePaths: string[] = [];
  const skippedPaths: string[] = [];

  for (const dir of config.dirs) {
    const basePath = path.resolve(dir);

    let info: Stats;
    try {
      info = await stat(basePath);
    } catch (error) {
      if (!MISSING_CODES.has(errorCode(error) ?? "")) {
        throw error;
      }
      logger.warn(`Source path does not exist: ${basePath}`);
      skippedPaths.push(basePath);
      continue;
    }

    const prefix = entryPrefix(config.root, basePath);
    const before = ctx.files.length;

    if (info.isDirectory()) {
      sourcePaths.push(basePath);
      await walk(ctx, basePath, prefix);
    } else if (info.isFile()) {
      sourcePaths.push(basePath);
      const name = prefix === "" ? path.basename(basePath) : prefix;
      const isArchive =
        path.dirname(basePath) === ctx.archiveDir && isArchiveArtifact(path.basename(basePath));
      if (!isArchive && !ctx.isExcluded(name)) {
        addFile(ctx, basePath, name, info.size);
      }
    } else {
      logger.warn(`Source path is not a file or directory: ${basePath}`);
      skippedPaths.push(basePath);
      continue;
    }

    logger.debug(`Collected ${ctx.files.length - before} files from ${basePath}`);
  }

  return { files: ctx.files, sourcePaths, skippedPaths };
}
