/**
 * Exclusion pattern matching
 */

import * as path from "node:path";
import picomatch from "picomatch";

export type ExclusionMatcher = (relativePath: string) => boolean;

/**
 * A path is excluded when any pattern matches either its full relative path
 * or its base name, so `*.log` and `node_modules` apply at any depth while
 * `Documents/private/**` stays anchored. Dotfiles are matched like any other
 * name.
 */
export function createExclusionMatcher(patterns: readonly string[]): ExclusionMatcher {
  if (patterns.length === 0) {
    return () => false;
  }

  const isMatch = picomatch([...patterns], { dot: true });

  return (relativePath) => isMatch(relativePath) || isMatch(path.posix.basename(relativePath));
}
