/**
 * Filesystem helpers
 */

import { readdir, stat } from "node:fs/promises";
import * as path from "node:path";
import { errorCode } from "./errors.js";

/**
 * Yield every regular file below `dir` as a forward-slash relative path,
 * in name order.
 */
export async function* walkFiles(dir: string, prefix: string = ""): AsyncGenerator<string> {
  const entries = await readdir(dir, { withFileTypes: true });
  entries.sort((a, b) => a.name.localeCompare(b.name));

  for (const entry of entries) {
    const relativePath = prefix === "" ? entry.name : `${prefix}/${entry.name}`;
    if (entry.isDirectory()) {
      yield* walkFiles(path.join(dir, entry.name), relativePath);
    } else if (entry.isFile()) {
      yield relativePath;
    }
  }
}

export async function countFiles(dir: string): Promise<number> {
  let count = 0;
  for await (const _ of walkFiles(dir)) {
    count++;
  }
  return count;
}

export async function isFile(filePath: string): Promise<boolean> {
  try {
    return (await stat(filePath)).isFile();
  } catch (error) {
    if (errorCode(error) === "ENOENT" || errorCode(error) === "ENOTDIR") return false;
    throw error;
  }
}

/**
 * Join a forward-slash relative path onto a platform directory.
 */
export function joinRelative(dir: string, relativePath: string): string {
  return path.join(dir, ...relativePath.split("/"));
}
