/**
 * Builds the immutable per-invocation configuration
 */

import * as os from "node:os";
import * as path from "node:path";
import type { BackupConfig, ConfigOverrides } from "../types/index.js";
import { normalizeOutputName } from "../utils/naming.js";
import { resolveUserPath } from "../utils/path.js";
import {
  DEFAULT_ARCHIVE_DIR,
  DEFAULT_COMPRESSION,
  DEFAULT_EXCLUDE_PATTERNS,
  DEFAULT_PORT,
  DEFAULT_SOURCE_DIRS,
} from "./defaults.js";
import { validateConfig } from "./validator.js";

export interface ResolveEnvironment {
  home: string;
  cwd: string;
  tmp: string;
}

export function currentEnvironment(): ResolveEnvironment {
  return { home: os.homedir(), cwd: process.cwd(), tmp: os.tmpdir() };
}

/**
 * Merge overrides onto the defaults, resolve every path to an absolute one,
 * validate, and freeze.
 *
 * Flag paths resolve against the working directory; `dirs` resolve against
 * the root.
 */
export function resolveConfig(
  overrides: ConfigOverrides = {},
  env: ResolveEnvironment = currentEnvironment(),
): BackupConfig {
  const fromCwd = (p: string) => resolveUserPath(p, env.cwd, env.home);

  const root = overrides.root !== undefined ? fromCwd(overrides.root) : env.home;
  const dirNames: readonly string[] = overrides.dirs ?? DEFAULT_SOURCE_DIRS;
  const dirs = dirNames.map((dir) => resolveUserPath(dir, root, env.home));

  const config: BackupConfig = {
    root,
    dirs: Object.freeze(dirs),
    exclude: Object.freeze([...(overrides.exclude ?? DEFAULT_EXCLUDE_PATTERNS)]),
    archiveDir:
      overrides.archiveDir !== undefined
        ? fromCwd(overrides.archiveDir)
        : path.join(env.home, DEFAULT_ARCHIVE_DIR),
    compression: overrides.compression ?? DEFAULT_COMPRESSION,
    destination: overrides.destination !== undefined ? fromCwd(overrides.destination) : env.home,
    tmpDir: overrides.tmpDir !== undefined ? fromCwd(overrides.tmpDir) : env.tmp,
    port: overrides.port ?? DEFAULT_PORT,
    output: overrides.output !== undefined ? normalizeOutputName(overrides.output) : null,
    notify: overrides.notify ?? true,
    verbose: overrides.verbose ?? false,
  };

  return Object.freeze(validateConfig(config));
}
