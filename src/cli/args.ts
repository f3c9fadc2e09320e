/**
 * Argument parsing and failure reporting shared by the commands
 */

import { type ParseArgsConfig, parseArgs } from "node:util";
import { errorMessage, isBackupError, UsageError } from "../utils/errors.js";
import { fail } from "./ui/output.js";

export const COMMON_OPTIONS = {
  verbose: { type: "boolean" as const, short: "v", default: false },
  help: { type: "boolean" as const, short: "h", default: false },
};

/**
 * parseArgs, with unknown flags and bad values reported as UsageError
 */
export function parseCommandArgs<T extends ParseArgsConfig>(config: T): ReturnType<typeof parseArgs<T>> {
  try {
    return parseArgs<T>(config);
  } catch (error) {
    throw new UsageError(errorMessage(error));
  }
}

export interface FailureOptions {
  verbose?: boolean;
  /** Printed after the message for usage errors */
  usage?: () => void;
}

/**
 * Print a failed command's error and return its exit code.
 */
export function reportFailure(error: unknown, options: FailureOptions = {}): number {
  fail(errorMessage(error));

  if (error instanceof UsageError) {
    options.usage?.();
  } else if (options.verbose) {
    console.error(error);
  }

  return isBackupError(error) ? error.exitCode : 1;
}
