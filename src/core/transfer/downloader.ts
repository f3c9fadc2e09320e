/**
 * Fetch a shared archive from a peer
 */

import { createWriteStream } from "node:fs";
import { mkdir, rm, stat } from "node:fs/promises";
import * as path from "node:path";
import { Readable, Transform } from "node:stream";
import { pipeline } from "node:stream/promises";
import { DOWNLOAD_TIMEOUT_MS } from "../../config/defaults.js";
import type { DownloadResult } from "../../types/index.js";
import { errorMessage, NetworkError, UsageError } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";
import { generateArchiveName, isArchiveFromDay } from "../../utils/naming.js";
import { isPlainFileName } from "../../utils/path.js";

export type FetchLike = (url: string, init: { signal: AbortSignal }) => Promise<Response>;

export interface DownloadOptions {
  ip: string;
  port: number;
  tmpDir: string;
  /** Remote file name; the peer's latest archive when omitted */
  archiveName?: string | null;
  /** Time allowed until response headers arrive, and between body chunks */
  timeoutMs?: number;
  fetch?: FetchLike;
  now?: Date;
}

export function buildDownloadUrl(ip: string, port: number, archiveName?: string | null): string {
  const host = ip.includes(":") && !ip.startsWith("[") ? `[${ip}]` : ip;
  const target = archiveName ? encodeURIComponent(archiveName) : "latest";
  return `http://${host}:${port}/${target}`;
}

/**
 * File name announced by a share server, if it is a safe plain name.
 */
export function archiveNameFromHeaders(headers: Headers): string | null {
  const disposition = headers.get("content-disposition");
  const fromDisposition = disposition?.match(/filename="?([^";]+)"?/i)?.[1];
  const name = headers.get("x-archive-name") ?? fromDisposition ?? null;

  return name !== null && isPlainFileName(name) ? name : null;
}

function describeFetchError(error: unknown): string {
  if (error instanceof Error && error.cause instanceof Error) {
    return error.cause.message;
  }
  return errorMessage(error);
}

async function requestArchive(
  url: string,
  fetchImpl: FetchLike,
  timeoutMs: number,
): Promise<Response> {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), timeoutMs);

  try {
    return await fetchImpl(url, { signal: controller.signal });
  } catch (error) {
    const reason = controller.signal.aborted
      ? `no response within ${timeoutMs}ms`
      : describeFetchError(error);
    throw new NetworkError(`Could not reach ${url}: ${reason}`, undefined, error);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Download one archive into `tmpDir`. On any failure nothing is left at the
 * target path.
 */
export async function downloadArchive(options: DownloadOptions): Promise<DownloadResult> {
  if (!options.ip) {
    throw new UsageError("--ip is required");
  }
  if (options.archiveName != null && !isPlainFileName(options.archiveName)) {
    throw new UsageError(`--zip-name must be a file name (got "${options.archiveName}")`);
  }

  const now = options.now ?? new Date();
  const url = buildDownloadUrl(options.ip, options.port, options.archiveName);
  const timeoutMs = options.timeoutMs ?? DOWNLOAD_TIMEOUT_MS;

  logger.info(`Downloading ${url}`);
  const response = await requestArchive(url, options.fetch ?? fetch, timeoutMs);

  if (!response.ok || !response.body) {
    await response.body?.cancel();
    throw new NetworkError(`Download failed: HTTP ${response.status} from ${url}`, response.status);
  }

  const archiveName =
    options.archiveName ?? archiveNameFromHeaders(response.headers) ?? generateArchiveName(now);

  if (options.archiveName == null && !isArchiveFromDay(archiveName, now)) {
    logger.warn(`Shared archive ${archiveName} was not created today`);
  }

  const archivePath = path.join(options.tmpDir, archiveName);

  // Aborts the transfer when the peer goes quiet mid-body
  const idle = new AbortController();
  const idleTimer = setTimeout(() => idle.abort(), timeoutMs);
  const watchdog = new Transform({
    transform(chunk, _encoding, callback) {
      idleTimer.refresh();
      callback(null, chunk);
    },
  });

  try {
    await mkdir(options.tmpDir, { recursive: true });
    await pipeline(Readable.fromWeb(response.body), watchdog, createWriteStream(archivePath), {
      signal: idle.signal,
    });
  } catch (error) {
    await rm(archivePath, { force: true });
    const reason = idle.signal.aborted ? `no data for ${timeoutMs}ms` : errorMessage(error);
    throw new NetworkError(`Download of ${url} failed: ${reason}`, undefined, error);
  } finally {
    clearTimeout(idleTimer);
  }

  const { size: sizeBytes } = await stat(archivePath);
  logger.info(`Downloaded ${archiveName} (${sizeBytes} bytes)`);

  return { url, archiveName, archivePath, sizeBytes };
}
