/**
 * Path validation and manipulation utilities
 */

import * as os from "node:os";
import * as path from "node:path";

/**
 * Check if a file path is within an allowed directory.
 * Prevents path traversal attacks.
 */
export function isPathWithinDir(filePath: string, allowedDir: string): boolean {
  const normalizedPath = path.resolve(filePath);
  const normalizedDir = path.resolve(allowedDir);

  return normalizedPath.startsWith(normalizedDir + path.sep) || normalizedPath === normalizedDir;
}

/**
 * Expand a leading ~ to the given home directory.
 */
export function expandHome(input: string, home: string = os.homedir()): string {
  if (input === "~") return home;
  if (input.startsWith("~/")) return path.join(home, input.slice(2));
  return input;
}

/**
 * Resolve a user-supplied path: ~ expansion, then relative to `base`.
 */
export function resolveUserPath(input: string, base: string, home: string = os.homedir()): string {
  return path.resolve(base, expandHome(input, home));
}

/**
 * Convert a platform path to the forward-slash form used inside archives.
 */
export function toPosixPath(filePath: string): string {
  return filePath.split(path.sep).join("/");
}

/**
 * True for a bare file name: no separators, not . or ..
 */
export function isPlainFileName(name: string): boolean {
  return (
    name.length > 0 &&
    name !== "." &&
    name !== ".." &&
    !name.includes("/") &&
    !name.includes("\\") &&
    !name.includes("\0")
  );
}
