/**
 * Mapping of CLI flags onto configuration overrides
 */

import type { ConfigOverrides } from "../types/index.js";
import { UsageError } from "../utils/errors.js";

/**
 * CLI option definitions shared by the commands (for parseArgs).
 * Commands pick the subset they accept.
 */
export const INLINE_CONFIG_OPTIONS = {
  root: { type: "string" as const },
  dir: { type: "string" as const },
  dest: { type: "string" as const },
  tmp: { type: "string" as const },
  port: { type: "string" as const },
  output: { type: "string" as const },
  dirs: { type: "string" as const },
  exclude: { type: "string" as const },
  compress: { type: "string" as const },
  "no-notify": { type: "boolean" as const },
};

/**
 * Split a comma separated flag value, dropping blanks.
 */
export function parseList(value: string): string[] {
  return value
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

export function parseInteger(flag: string, value: string): number {
  const trimmed = value.trim();
  if (!/^-?\d+$/.test(trimmed)) {
    throw new UsageError(`--${flag} expects an integer (got "${value}")`);
  }
  return Number.parseInt(trimmed, 10);
}

function stringValue(values: Readonly<Record<string, unknown>>, key: string): string | undefined {
  const value = values[key];
  return typeof value === "string" ? value : undefined;
}

/**
 * Extract configuration overrides from parsed CLI values
 */
export function extractInlineOptions(values: Readonly<Record<string, unknown>>): ConfigOverrides {
  const overrides: ConfigOverrides = {};

  const root = stringValue(values, "root");
  if (root !== undefined) overrides.root = root;

  const archiveDir = stringValue(values, "dir");
  if (archiveDir !== undefined) overrides.archiveDir = archiveDir;

  const destination = stringValue(values, "dest");
  if (destination !== undefined) overrides.destination = destination;

  const tmpDir = stringValue(values, "tmp");
  if (tmpDir !== undefined) overrides.tmpDir = tmpDir;

  const output = stringValue(values, "output");
  if (output !== undefined) overrides.output = output;

  const port = stringValue(values, "port");
  if (port !== undefined) overrides.port = parseInteger("port", port);

  const compress = stringValue(values, "compress");
  if (compress !== undefined) overrides.compression = parseInteger("compress", compress);

  const dirs = stringValue(values, "dirs");
  if (dirs !== undefined) overrides.dirs = parseList(dirs);

  const exclude = stringValue(values, "exclude");
  if (exclude !== undefined) overrides.exclude = parseList(exclude);

  if (values["no-notify"] === true) overrides.notify = false;
  if (values.verbose === true) overrides.verbose = true;

  return overrides;
}
