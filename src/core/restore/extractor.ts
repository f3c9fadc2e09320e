/**
 * Archive extraction into a staging directory
 */

import { createWriteStream } from "node:fs";
import { mkdir } from "node:fs/promises";
import * as path from "node:path";
import { pipeline } from "node:stream/promises";
import { ExternalToolError, errorMessage, isBackupError } from "../../utils/errors.js";
import { joinRelative } from "../../utils/fs.js";
import { logger } from "../../utils/logger.js";
import { isPathWithinDir } from "../../utils/path.js";
import {
  isPathSafe,
  iterateEntries,
  normalizeZipPath,
  openEntryStream,
  openZip,
  type ZipFile,
} from "../../utils/zip.js";

/**
 * Fully decompress `archivePath` into `targetDir`. Returns the number of file
 * entries written.
 *
 * Unreadable archives and unsafe entry names fail the whole extraction.
 */
export async function extractArchive(archivePath: string, targetDir: string): Promise<number> {
  let zip: ZipFile;
  try {
    zip = await openZip(archivePath);
  } catch (error) {
    throw new ExternalToolError(`Cannot read archive ${archivePath}: ${errorMessage(error)}`, error);
  }

  let count = 0;

  try {
    for await (const entry of iterateEntries(zip)) {
      const name = normalizeZipPath(entry.fileName);
      const targetPath = joinRelative(targetDir, name);

      if (!isPathSafe(name) || !isPathWithinDir(targetPath, targetDir)) {
        throw new ExternalToolError(`Unsafe path in archive: "${name}"`);
      }

      if (name.endsWith("/")) {
        await mkdir(targetPath, { recursive: true });
        continue;
      }

      await mkdir(path.dirname(targetPath), { recursive: true });
      const stream = await openEntryStream(zip, entry);
      await pipeline(stream, createWriteStream(targetPath));
      count++;
    }
  } catch (error) {
    if (isBackupError(error)) throw error;
    throw new ExternalToolError(`Failed to extract ${archivePath}: ${errorMessage(error)}`, error);
  }

  logger.debug(`Extracted ${count} files into ${targetDir}`);
  return count;
}
