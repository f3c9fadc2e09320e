/**
 * Local archive directory access
 */

import { readdir, stat } from "node:fs/promises";
import * as path from "node:path";
import type { ArchiveInfo } from "../types/index.js";
import { errorCode, NotFoundError } from "../utils/errors.js";
import { isArchiveFile } from "../utils/naming.js";

function compareByTimeThenName(a: ArchiveInfo, b: ArchiveInfo): number {
  const byTime = a.modifiedAt.getTime() - b.modifiedAt.getTime();
  return byTime !== 0 ? byTime : a.name.localeCompare(b.name);
}

/**
 * Archives in `archiveDir`, oldest first. A missing directory is an empty list.
 */
export async function listArchives(archiveDir: string): Promise<ArchiveInfo[]> {
  let names: string[];
  try {
    names = await readdir(archiveDir);
  } catch (error) {
    if (errorCode(error) === "ENOENT" || errorCode(error) === "ENOTDIR") return [];
    throw error;
  }

  const archives: ArchiveInfo[] = [];
  for (const name of names.filter(isArchiveFile)) {
    const archivePath = path.join(archiveDir, name);
    const info = await stat(archivePath);
    if (!info.isFile()) continue;

    archives.push({
      name,
      path: archivePath,
      sizeBytes: info.size,
      modifiedAt: info.mtime,
    });
  }

  return archives.sort(compareByTimeThenName);
}

/**
 * Most recently modified archive; ties go to the lexically greatest name.
 */
export async function findLatestArchive(archiveDir: string): Promise<ArchiveInfo> {
  const archives = await listArchives(archiveDir);
  const latest = archives.at(-1);

  if (!latest) {
    throw new NotFoundError(`No backups found in ${archiveDir}`);
  }

  return latest;
}

/**
 * Look up one archive by file name, refusing anything that is not a plain
 * archive name inside the directory.
 */
export async function findArchiveByName(archiveDir: string, name: string): Promise<ArchiveInfo | null> {
  if (!isArchiveFile(name) || path.basename(name) !== name) return null;

  const archives = await listArchives(archiveDir);
  return archives.find((archive) => archive.name === name) ?? null;
}
