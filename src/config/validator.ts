/**
 * Configuration validation
 */

import type { BackupConfig } from "../types/index.js";
import { UsageError } from "../utils/errors.js";
import { isPlainFileName } from "../utils/path.js";

type Validator = (config: BackupConfig) => void;

const validators: Record<string, Validator> = {
  compression: (c) => {
    if (!Number.isInteger(c.compression) || c.compression < 0 || c.compression > 9) {
      throw new UsageError(`--compress must be an integer between 0 and 9 (got ${c.compression})`);
    }
  },

  port: (c) => {
    if (!Number.isInteger(c.port) || c.port < 1 || c.port > 65535) {
      throw new UsageError(`--port must be an integer between 1 and 65535 (got ${c.port})`);
    }
  },

  output: (c) => {
    if (c.output !== null && (!isPlainFileName(c.output) || c.output.startsWith("."))) {
      throw new UsageError(`--output must be a visible file name, not a path (got "${c.output}")`);
    }
  },

  dirs: (c) => {
    if (c.dirs.length === 0) {
      throw new UsageError("--dirs must name at least one directory");
    }
  },

  exclude: (c) => {
    for (const pattern of c.exclude) {
      if (pattern.trim() === "") {
        throw new UsageError("--exclude patterns must not be empty");
      }
    }
  },
};

export function validateConfig(config: BackupConfig): BackupConfig {
  for (const validate of Object.values(validators)) {
    validate(config);
  }
  return config;
}
