/**
 * Promise wrappers around yauzl's callback API
 */

import type { Readable } from "node:stream";
import yauzl, { type Entry, type ZipFile as YauzlZipFile } from "yauzl";

export type ZipFile = YauzlZipFile;
export type ZipEntry = Entry;

export function normalizeZipPath(p: string): string {
  // ZIP standard uses forward slashes
  return p.replace(/\\/g, "/");
}

/**
 * Reject absolute paths, drive letters, NUL bytes and `..` segments.
 */
export function isPathSafe(zipPath: string): boolean {
  const p = normalizeZipPath(zipPath);

  if (p.startsWith("/") || /^[A-Za-z]:\//.test(p)) return false;
  if (p.includes("\0")) return false;

  return !p.split("/").some((part) => part === "..");
}

export function openZip(archivePath: string): Promise<ZipFile> {
  return new Promise((resolve, reject) => {
    yauzl.open(archivePath, { lazyEntries: true, validateEntrySizes: true }, (err, zipfile) => {
      if (err || !zipfile) return reject(err ?? new Error("Invalid ZIP file"));
      resolve(zipfile);
    });
  });
}

/**
 * Read the next entry, or null at the end of the central directory.
 */
export function nextEntry(zip: ZipFile): Promise<ZipEntry | null> {
  return new Promise((resolve, reject) => {
    const cleanup = () => {
      zip.removeListener("entry", onEntry);
      zip.removeListener("end", onEnd);
      zip.removeListener("error", onError);
    };
    const onEntry = (entry: ZipEntry) => {
      cleanup();
      resolve(entry);
    };
    const onEnd = () => {
      cleanup();
      resolve(null);
    };
    const onError = (err: Error) => {
      cleanup();
      reject(err);
    };

    zip.on("entry", onEntry);
    zip.on("end", onEnd);
    zip.on("error", onError);
    zip.readEntry();
  });
}

export function openEntryStream(zip: ZipFile, entry: ZipEntry): Promise<Readable> {
  return new Promise((resolve, reject) => {
    zip.openReadStream(entry, (err, stream) => {
      if (err || !stream) return reject(err ?? new Error(`Failed to open ZIP stream: ${entry.fileName}`));
      resolve(stream);
    });
  });
}

/**
 * Iterate every entry of an open archive. Closes the archive when done.
 */
export async function* iterateEntries(zip: ZipFile): AsyncGenerator<ZipEntry> {
  try {
    for (let entry = await nextEntry(zip); entry !== null; entry = await nextEntry(zip)) {
      yield entry;
    }
  } finally {
    zip.close();
  }
}
