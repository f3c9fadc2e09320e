import { existsSync } from "node:fs";
import { mkdir, readdir, readFile, utimes, writeFile } from "node:fs/promises";
import * as path from "node:path";
import { afterAll, afterEach, beforeAll, beforeEach, describe, expect, test, vi } from "vitest";
import {
  archiveNameFromHeaders,
  buildDownloadUrl,
  createShareApp,
  downloadArchive,
  type FetchLike,
  renderIndexPage,
  startShareServer,
} from "../../src/core/transfer/index.js";
import { NetworkError, NotFoundError, UsageError } from "../../src/utils/errors.js";
import { makeTempDir, removeDir } from "../helpers/fs.js";

const OLDER = "backup-20240101000000.zip";
const NEWER = "backup-20240102000000.zip";

describe("share app", () => {
  let tempDir: string;
  let archiveDir: string;
  let emptyDir: string;

  beforeAll(async () => {
    tempDir = await makeTempDir("share");
    archiveDir = path.join(tempDir, "archives");
    emptyDir = path.join(tempDir, "empty");
    await mkdir(archiveDir, { recursive: true });
    await mkdir(emptyDir, { recursive: true });

    await writeFile(path.join(archiveDir, OLDER), "older");
    await writeFile(path.join(archiveDir, NEWER), "newer");
    await writeFile(path.join(archiveDir, "notes.txt"), "not an archive");
    await utimes(path.join(archiveDir, OLDER), 1000, 1000);
    await utimes(path.join(archiveDir, NEWER), 2000, 2000);
  });

  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  afterAll(async () => {
    await removeDir(tempDir);
  });

  test("GET / redirects to the latest archive and lists all of them", async () => {
    const res = await createShareApp(archiveDir).request("/");
    const html = await res.text();

    expect(res.status).toBe(200);
    expect(res.headers.get("content-type")).toContain("text/html");
    expect(html).toContain(`<meta http-equiv="refresh" content="0; url=${NEWER}">`);
    expect(html).toContain(`<li><a href="${OLDER}">${OLDER}</a> (5 B)</li>`);
    expect(html).toContain(`<li><a href="${NEWER}">${NEWER}</a> (5 B)</li>`);
  });

  test("GET /latest serves the newest archive with its name", async () => {
    const res = await createShareApp(archiveDir).request("/latest");

    expect(res.status).toBe(200);
    expect(res.headers.get("x-archive-name")).toBe(NEWER);
    expect(res.headers.get("content-disposition")).toBe(`attachment; filename="${NEWER}"`);
    expect(res.headers.get("content-type")).toBe("application/zip");
    expect(await res.text()).toBe("newer");
  });

  test("GET /:name serves a named archive", async () => {
    const res = await createShareApp(archiveDir).request(`/${OLDER}`);

    expect(res.status).toBe(200);
    expect(await res.text()).toBe("older");
  });

  test("refuses names that are not archives in the directory", async () => {
    const app = createShareApp(archiveDir);

    expect((await app.request("/missing.zip")).status).toBe(404);
    expect((await app.request("/notes.txt")).status).toBe(404);
    expect((await app.request("/..%2Fsecret.zip")).status).toBe(404);
  });

  test("answers 404 when there is nothing to share", async () => {
    const app = createShareApp(emptyDir);

    expect((await app.request("/")).status).toBe(404);
    expect((await app.request("/latest")).status).toBe(404);
  });

  test("renderIndexPage escapes names", () => {
    const archive = { name: "a<b>.zip", path: "/x/a<b>.zip", sizeBytes: 0, modifiedAt: new Date(0) };
    const html = renderIndexPage(archive, [archive]);

    expect(html).toContain('<a href="a%3Cb%3E.zip">a&lt;b&gt;.zip</a>');
    expect(html).not.toContain("<b>");
  });

  test("startShareServer refuses an empty directory", async () => {
    await expect(startShareServer({ archiveDir: emptyDir, port: 0 }, "127.0.0.1")).rejects.toBeInstanceOf(
      NotFoundError,
    );
  });

  test("startShareServer serves over loopback until closed", async () => {
    const session = await startShareServer({ archiveDir, port: 0 }, "127.0.0.1");
    const downloadDir = path.join(tempDir, "loopback");

    try {
      expect(session.latest.name).toBe(NEWER);
      expect(session.port).toBeGreaterThan(0);

      const result = await downloadArchive({ ip: "127.0.0.1", port: session.port, tmpDir: downloadDir });
      expect(result.archiveName).toBe(NEWER);
      expect(await readFile(result.archivePath, "utf8")).toBe("newer");
    } finally {
      await session.close();
    }
  });
});

describe("downloadArchive", () => {
  let tempDir: string;
  let archiveDir: string;
  let tmpDir: string;
  let fetchFromApp: FetchLike;
  const today = new Date(2024, 0, 2, 10, 0, 0);

  beforeAll(async () => {
    tempDir = await makeTempDir("download");
    archiveDir = path.join(tempDir, "archives");
    await mkdir(archiveDir, { recursive: true });
    await writeFile(path.join(archiveDir, OLDER), "older");
    await writeFile(path.join(archiveDir, NEWER), "newer");
    await utimes(path.join(archiveDir, OLDER), 1000, 1000);
    await utimes(path.join(archiveDir, NEWER), 2000, 2000);

    const app = createShareApp(archiveDir);
    fetchFromApp = async (url, init) => app.request(url, init);
  });

  beforeEach(async () => {
    tmpDir = await makeTempDir("download-target");
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await removeDir(tmpDir);
  });

  afterAll(async () => {
    await removeDir(tempDir);
  });

  test("fetches the latest archive under the name the peer announces", async () => {
    const result = await downloadArchive({
      ip: "192.168.1.20",
      port: 8000,
      tmpDir,
      fetch: fetchFromApp,
      now: today,
    });

    expect(result).toEqual({
      url: "http://192.168.1.20:8000/latest",
      archiveName: NEWER,
      archivePath: path.join(tmpDir, NEWER),
      sizeBytes: 5,
    });
    expect(await readFile(result.archivePath, "utf8")).toBe("newer");
    expect(console.warn).not.toHaveBeenCalled();
  });

  test("fetches a named archive", async () => {
    const result = await downloadArchive({
      ip: "192.168.1.20",
      port: 8000,
      tmpDir,
      archiveName: OLDER,
      fetch: fetchFromApp,
    });

    expect(result.url).toBe(`http://192.168.1.20:8000/${OLDER}`);
    expect(await readFile(path.join(tmpDir, OLDER), "utf8")).toBe("older");
  });

  test("warns when the latest archive is not from today", async () => {
    await downloadArchive({
      ip: "192.168.1.20",
      port: 8000,
      tmpDir,
      fetch: fetchFromApp,
      now: new Date(2024, 0, 5, 10, 0, 0),
    });

    expect(String(vi.mocked(console.warn).mock.calls[0]?.[0])).toContain(
      `Shared archive ${NEWER} was not created today`,
    );
  });

  test("falls back to a generated name when the peer sends none", async () => {
    const result = await downloadArchive({
      ip: "192.168.1.20",
      port: 8000,
      tmpDir,
      fetch: async () => new Response("raw bytes"),
      now: today,
    });

    expect(result.archiveName).toBe("backup-20240102100000.zip");
    expect(await readFile(result.archivePath, "utf8")).toBe("raw bytes");
  });

  test("fails with NetworkError on a non-2xx response and leaves nothing", async () => {
    const app = createShareApp(path.join(tempDir, "nothing-here"));

    const error = await downloadArchive({
      ip: "192.168.1.20",
      port: 8000,
      tmpDir,
      fetch: async (url, init) => app.request(url, init),
    }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(NetworkError);
    expect(error).toHaveProperty("status", 404);
    expect(await readdir(tmpDir)).toEqual([]);
  });

  test("fails with NetworkError when the peer is unreachable", async () => {
    const refused: FetchLike = async () => {
      throw new TypeError("fetch failed", { cause: new Error("connect ECONNREFUSED 10.0.0.9:8000") });
    };

    await expect(
      downloadArchive({ ip: "10.0.0.9", port: 8000, tmpDir, fetch: refused }),
    ).rejects.toThrow("Could not reach http://10.0.0.9:8000/latest: connect ECONNREFUSED 10.0.0.9:8000");
    expect(await readdir(tmpDir)).toEqual([]);
  });

  test("times out when no response arrives", async () => {
    const hanging: FetchLike = (_url, { signal }) =>
      new Promise((_resolve, reject) => {
        signal.addEventListener("abort", () => reject(new Error("aborted")));
      });

    await expect(
      downloadArchive({ ip: "10.0.0.9", port: 8000, tmpDir, fetch: hanging, timeoutMs: 20 }),
    ).rejects.toThrow("no response within 20ms");
  });

  test("removes the partial file when the body breaks off", async () => {
    const broken: FetchLike = async () =>
      new Response(
        new ReadableStream<Uint8Array>({
          start(controller) {
            controller.enqueue(new TextEncoder().encode("partial"));
            controller.error(new Error("connection reset"));
          },
        }),
        { headers: { "X-Archive-Name": NEWER } },
      );

    await expect(
      downloadArchive({ ip: "10.0.0.9", port: 8000, tmpDir, fetch: broken }),
    ).rejects.toBeInstanceOf(NetworkError);
    expect(existsSync(path.join(tmpDir, NEWER))).toBe(false);
  });

  test("gives up when the body stalls", async () => {
    const stalled: FetchLike = async () =>
      new Response(
        new ReadableStream<Uint8Array>({
          start(controller) {
            controller.enqueue(new TextEncoder().encode("partial"));
          },
        }),
        { headers: { "X-Archive-Name": NEWER } },
      );

    const error = await downloadArchive({
      ip: "10.0.0.9",
      port: 8000,
      tmpDir,
      fetch: stalled,
      timeoutMs: 20,
    }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(NetworkError);
    expect(error).toHaveProperty("message", "Download of http://10.0.0.9:8000/latest failed: no data for 20ms");
    expect(await readdir(tmpDir)).toEqual([]);
  });

  test("requires an address and a plain archive name", async () => {
    await expect(downloadArchive({ ip: "", port: 8000, tmpDir })).rejects.toBeInstanceOf(UsageError);
    await expect(
      downloadArchive({ ip: "10.0.0.9", port: 8000, tmpDir, archiveName: "../etc/passwd" }),
    ).rejects.toBeInstanceOf(UsageError);
  });

  test("rejects an empty archive name before any request", async () => {
    const fetchSpy = vi.fn(fetchFromApp);

    await expect(
      downloadArchive({ ip: "10.0.0.9", port: 8000, tmpDir, archiveName: "", fetch: fetchSpy }),
    ).rejects.toThrow('--zip-name must be a file name (got "")');
    expect(fetchSpy).not.toHaveBeenCalled();
    expect(await readdir(tmpDir)).toEqual([]);
  });
});

describe("buildDownloadUrl", () => {
  test("targets /latest unless a name is given", () => {
    expect(buildDownloadUrl("192.168.1.20", 8000)).toBe("http://192.168.1.20:8000/latest");
    expect(buildDownloadUrl("192.168.1.20", 9000, "my backup.zip")).toBe(
      "http://192.168.1.20:9000/my%20backup.zip",
    );
  });

  test("brackets IPv6 addresses", () => {
    expect(buildDownloadUrl("fe80::1", 8000)).toBe("http://[fe80::1]:8000/latest");
    expect(buildDownloadUrl("[fe80::1]", 8000)).toBe("http://[fe80::1]:8000/latest");
  });
});

describe("archiveNameFromHeaders", () => {
  test("prefers X-Archive-Name", () => {
    const headers = new Headers({
      "X-Archive-Name": NEWER,
      "Content-Disposition": 'attachment; filename="other.zip"',
    });
    expect(archiveNameFromHeaders(headers)).toBe(NEWER);
  });

  test("falls back to Content-Disposition", () => {
    expect(archiveNameFromHeaders(new Headers({ "Content-Disposition": 'attachment; filename="laptop.zip"' }))).toBe(
      "laptop.zip",
    );
  });

  test("rejects names that are paths", () => {
    expect(archiveNameFromHeaders(new Headers({ "X-Archive-Name": "../evil.zip" }))).toBeNull();
    expect(archiveNameFromHeaders(new Headers())).toBeNull();
  });
});
