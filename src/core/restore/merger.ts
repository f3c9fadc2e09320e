/**
 * Additive merge of a staging tree into a destination tree.
 *
 * The merge is exposed as a stream of text lines, one per file, so the
 * progress observer stays independent of how files are moved.
 */

import { constants } from "node:fs";
import { copyFile, mkdir, rm } from "node:fs/promises";
import * as path from "node:path";
import { errorCode } from "../../utils/errors.js";
import { joinRelative, walkFiles } from "../../utils/fs.js";
import { logger } from "../../utils/logger.js";

export type MergeAction = "copy" | "skip";

export interface MergeLine {
  action: MergeAction;
  path: string;
}

export interface MergeEngine {
  /** Yields one line per source file, see formatMergeLine */
  merge(sourceDir: string, destinationDir: string): AsyncIterable<string>;
}

const MERGE_LINE_PATTERN = /^(copy|skip) (.+)$/;

// Existing file, or a directory/file standing where the other is needed
const CONFLICT_CODES = new Set(["EEXIST", "EISDIR", "ENOTDIR"]);

export function formatMergeLine(action: MergeAction, relativePath: string): string {
  return `${action} ${relativePath}`;
}

export function parseMergeLine(line: string): MergeLine | null {
  const match = MERGE_LINE_PATTERN.exec(line.replace(/\r?\n$/, ""));
  if (!match) return null;

  const [, action, relativePath] = match;
  if ((action !== "copy" && action !== "skip") || relativePath === undefined) return null;

  return { action, path: relativePath };
}

/**
 * Copy `source` to `target` unless something already exists there.
 */
async function copyIfAbsent(source: string, target: string): Promise<boolean> {
  try {
    await mkdir(path.dirname(target), { recursive: true });
    await copyFile(source, target, constants.COPYFILE_EXCL);
    return true;
  } catch (error) {
    const code = errorCode(error);
    if (code !== undefined && CONFLICT_CODES.has(code)) {
      logger.debug(`Keeping existing ${target} (${code})`);
      return false;
    }
    throw error;
  }
}

/**
 * Merge engine over the local filesystem. Never overwrites; each source file
 * is deleted as soon as it has been copied.
 */
export class FsMergeEngine implements MergeEngine {
  async *merge(sourceDir: string, destinationDir: string): AsyncGenerator<string> {
    await mkdir(destinationDir, { recursive: true });

    for await (const relativePath of walkFiles(sourceDir)) {
      const source = joinRelative(sourceDir, relativePath);
      const target = joinRelative(destinationDir, relativePath);

      if (await copyIfAbsent(source, target)) {
        await rm(source);
        yield formatMergeLine("copy", relativePath);
      } else {
        yield formatMergeLine("skip", relativePath);
      }
    }
  }
}
