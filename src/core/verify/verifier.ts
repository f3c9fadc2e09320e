/**
 * Archive integrity verification
 */

import { stat } from "node:fs/promises";
import * as path from "node:path";
import type { VerifyResult } from "../../types/index.js";
import { computeFileChecksum } from "../../utils/crypto.js";
import { errorMessage, NotFoundError } from "../../utils/errors.js";
import { isFile } from "../../utils/fs.js";
import { logger } from "../../utils/logger.js";
import {
  isPathSafe,
  iterateEntries,
  normalizeZipPath,
  openEntryStream,
  openZip,
} from "../../utils/zip.js";

/**
 * Read every entry to the end (yauzl checks the declared sizes) and flag
 * entry names a restore would refuse.
 */
export async function verifyArchive(archivePath: string): Promise<VerifyResult> {
  const resolvedPath = path.resolve(archivePath);

  if (!(await isFile(resolvedPath))) {
    throw new NotFoundError(`Archive not found: ${resolvedPath}`);
  }

  const { size: sizeBytes } = await stat(resolvedPath);
  const issues: string[] = [];
  let entries = 0;

  try {
    const zip = await openZip(resolvedPath);

    for await (const entry of iterateEntries(zip)) {
      entries++;
      const name = normalizeZipPath(entry.fileName);

      if (!isPathSafe(name)) {
        issues.push(`Unsafe entry path: ${name}`);
        continue;
      }
      if (name.endsWith("/")) continue;

      const stream = await openEntryStream(zip, entry);
      let bytesRead = 0;
      for await (const chunk of stream) {
        bytesRead += Buffer.byteLength(chunk);
      }
      logger.debug(`Read ${bytesRead} bytes from ${name}`);
    }
  } catch (error) {
    issues.push(`Archive unreadable: ${errorMessage(error)}`);
  }

  const checksum = await computeFileChecksum(resolvedPath);
  logger.debug(`Verified ${resolvedPath}: ${entries} entries, ${issues.length} issue(s)`);

  return {
    archivePath: resolvedPath,
    ok: issues.length === 0,
    entries,
    sizeBytes,
    checksum,
    issues,
  };
}
