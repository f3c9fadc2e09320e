/**
 * Error taxonomy for the backup pipeline.
 *
 * Every error the pipeline raises on purpose is a `BackupError`; the CLI maps
 * them to exit code 1 and a one-line message. Anything else is a bug.
 */

export type BackupErrorKind = "usage" | "not-found" | "external-tool" | "network";

export class BackupError extends Error {
  readonly exitCode = 1;

  constructor(
    readonly kind: BackupErrorKind,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "BackupError";
  }
}

/** Missing or invalid flag. The CLI prints usage text alongside it. */
export class UsageError extends BackupError {
  constructor(message: string) {
    super("usage", message);
    this.name = "UsageError";
  }
}

/** Referenced archive, directory or file is absent. */
export class NotFoundError extends BackupError {
  constructor(message: string) {
    super("not-found", message);
    this.name = "NotFoundError";
  }
}

/** Compression, extraction or filesystem step failed. */
export class ExternalToolError extends BackupError {
  constructor(message: string, cause?: unknown) {
    super("external-tool", message, { cause });
    this.name = "ExternalToolError";
  }
}

/** HTTP transfer failed: refused, timed out or non-2xx. */
export class NetworkError extends BackupError {
  constructor(
    message: string,
    readonly status?: number,
    cause?: unknown,
  ) {
    super("network", message, { cause });
    this.name = "NetworkError";
  }
}

export function isBackupError(error: unknown): error is BackupError {
  return error instanceof BackupError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** Node system error code (ENOENT, EEXIST, ...) when present. */
export function errorCode(error: unknown): string | undefined {
  if (typeof error === "object" && error !== null && "code" in error) {
    const { code } = error;
    return typeof code === "string" ? code : undefined;
  }
  return undefined;
}
