/**
 * HTTP share session for the archive directory
 */

import { createReadStream } from "node:fs";
import { createServer, type Server } from "node:http";
import * as os from "node:os";
import { Readable } from "node:stream";
import { getRequestListener } from "@hono/node-server";
import { type Context, Hono } from "hono";
import { findArchiveByName, findLatestArchive, listArchives } from "../../storage/local.js";
import type { ArchiveInfo, BackupConfig } from "../../types/index.js";
import { errorMessage, NetworkError } from "../../utils/errors.js";
import { formatBytes } from "../../utils/format.js";
import { logger } from "../../utils/logger.js";

export const SHARE_HOSTNAME = "0.0.0.0";

export interface ShareSession {
  /** Latest archive at the time the session started */
  latest: ArchiveInfo;
  port: number;
  close(): Promise<void>;
}

function escapeHtml(value: string): string {
  return value
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;");
}

/**
 * Redirect page to the latest archive, with a listing of the others.
 */
export function renderIndexPage(latest: ArchiveInfo, archives: readonly ArchiveInfo[]): string {
  const href = encodeURIComponent(latest.name);
  const items = archives
    .map((archive) => {
      const link = `<a href="${encodeURIComponent(archive.name)}">${escapeHtml(archive.name)}</a>`;
      return `    <li>${link} (${formatBytes(archive.sizeBytes)})</li>`;
    })
    .join("\n");

  return `<!DOCTYPE html>
<html>
<head>
  <meta charset="utf-8">
  <meta http-equiv="refresh" content="0; url=${href}">
  <title>${escapeHtml(latest.name)}</title>
</head>
<body>
  <p>Downloading <a href="${href}">${escapeHtml(latest.name)}</a>...</p>
  <ul>
${items}
  </ul>
</body>
</html>
`;
}

function sendArchive(c: Context, archive: ArchiveInfo): Response {
  const body = Readable.toWeb(createReadStream(archive.path));
  return c.body(body, 200, {
    "Content-Type": "application/zip",
    "Content-Length": String(archive.sizeBytes),
    "Content-Disposition": `attachment; filename="${archive.name}"`,
    "X-Archive-Name": archive.name,
  });
}

/**
 * Routes:
 *   GET /        redirect page to the latest archive
 *   GET /latest  latest archive, name in X-Archive-Name
 *   GET /:name   a named archive from the directory
 */
export function createShareApp(archiveDir: string): Hono {
  const app = new Hono();

  app.use(async (c, next) => {
    await next();
    logger.info(`${c.req.method} ${c.req.path} ${c.res.status}`);
  });

  app.get("/", async (c) => {
    const archives = await listArchives(archiveDir);
    const latest = archives.at(-1);
    if (!latest) return c.text("No backups found", 404);
    return c.html(renderIndexPage(latest, archives));
  });

  app.get("/latest", async (c) => {
    const archives = await listArchives(archiveDir);
    const latest = archives.at(-1);
    if (!latest) return c.text("No backups found", 404);
    return sendArchive(c, latest);
  });

  app.get("/:name", async (c) => {
    const archive = await findArchiveByName(archiveDir, c.req.param("name"));
    if (!archive) return c.text("Not found", 404);
    return sendArchive(c, archive);
  });

  return app;
}

function closeServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((error) => (error ? reject(error) : resolve()));
    server.closeAllConnections();
  });
}

/**
 * Serve the archive directory on every interface. Fails with NotFoundError
 * when there is nothing to share.
 */
export async function startShareServer(
  config: Pick<BackupConfig, "archiveDir" | "port">,
  hostname: string = SHARE_HOSTNAME,
): Promise<ShareSession> {
  const latest = await findLatestArchive(config.archiveDir);
  const app = createShareApp(config.archiveDir);
  const server = createServer(getRequestListener(app.fetch));

  return new Promise((resolve, reject) => {
    server.once("error", (error) => {
      reject(new NetworkError(`Cannot listen on port ${config.port}: ${errorMessage(error)}`, undefined, error));
    });

    server.listen(config.port, hostname, () => {
      const address = server.address();
      const port = typeof address === "object" && address !== null ? address.port : config.port;
      logger.info(`Sharing ${config.archiveDir} on http://${hostname}:${port}`);
      resolve({ latest, port, close: () => closeServer(server) });
    });
  });
}

/**
 * Non-internal IPv4 addresses peers can use to reach this machine.
 */
export function localAddresses(): string[] {
  return Object.values(os.networkInterfaces())
    .flatMap((entries) => entries ?? [])
    .filter((entry) => entry.family === "IPv4" && !entry.internal)
    .map((entry) => entry.address);
}
