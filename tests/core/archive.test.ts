import { existsSync } from "node:fs";
import { readdir, writeFile } from "node:fs/promises";
import * as path from "node:path";
import { afterAll, beforeAll, describe, expect, test } from "vitest";
import { type ResolveEnvironment, resolveConfig } from "../../src/config/index.js";
import { createArchive, partialArchivePath } from "../../src/core/backup/index.js";
import type { ConfigOverrides } from "../../src/types/index.js";
import { computeFileChecksum } from "../../src/utils/crypto.js";
import { ExternalToolError } from "../../src/utils/errors.js";
import { makeTempDir, removeDir, writeTree, zipEntryNames } from "../helpers/fs.js";
import { RecordingNotifier } from "../helpers/notifier.js";

describe("createArchive", () => {
  let tempDir: string;
  let sourceDir: string;
  let env: ResolveEnvironment;

  const configFor = (archiveDir: string, overrides: ConfigOverrides = {}) =>
    resolveConfig(
      { root: sourceDir, dirs: ["."], exclude: ["*.log", "node_modules"], archiveDir, notify: false, ...overrides },
      env,
    );

  beforeAll(async () => {
    tempDir = await makeTempDir("archive");
    sourceDir = path.join(tempDir, "source");
    env = { home: tempDir, cwd: tempDir, tmp: tempDir };

    await writeTree(sourceDir, {
      "file1.txt": "content 1",
      "subdir/nested.txt": "nested content",
      ".hidden": "hidden file",
      "debug.log": "noise",
      "node_modules/package/index.js": "module",
    });
  });

  afterAll(async () => {
    await removeDir(tempDir);
  });

  test("archives every file except excluded paths", async () => {
    const archiveDir = path.join(tempDir, "out-basic");
    const result = await createArchive(configFor(archiveDir), new RecordingNotifier(), {
      pollIntervalMs: 5,
      now: new Date(2024, 0, 2, 3, 4, 5),
    });

    expect(result.archiveName).toBe("backup-20240102030405.zip");
    expect(result.archivePath).toBe(path.join(archiveDir, "backup-20240102030405.zip"));
    expect(result.filesCount).toBe(3);
    expect(result.sourcePaths).toEqual([sourceDir]);
    expect(result.skippedPaths).toEqual([]);
    expect(await zipEntryNames(result.archivePath)).toEqual([".hidden", "file1.txt", "subdir/nested.txt"]);
  });

  test("reports size and checksum of the written file", async () => {
    const result = await createArchive(configFor(path.join(tempDir, "out-checksum")), new RecordingNotifier(), {
      pollIntervalMs: 5,
    });

    expect(result.sizeBytes).toBeGreaterThan(0);
    expect(result.checksum).toBe(await computeFileChecksum(result.archivePath));
  });

  test("uses the output override as the file name", async () => {
    const archiveDir = path.join(tempDir, "out-named");
    const result = await createArchive(configFor(archiveDir, { output: "laptop" }), new RecordingNotifier(), {
      pollIntervalMs: 5,
    });

    expect(result.archivePath).toBe(path.join(archiveDir, "laptop.zip"));
    expect(await readdir(archiveDir)).toEqual(["laptop.zip"]);
  });

  test("stores entries uncompressed at level 0", async () => {
    const result = await createArchive(
      configFor(path.join(tempDir, "out-store"), { compression: 0 }),
      new RecordingNotifier(),
      { pollIntervalMs: 5 },
    );

    expect(await zipEntryNames(result.archivePath)).toEqual([".hidden", "file1.txt", "subdir/nested.txt"]);
  });

  test("succeeds with an empty archive when no source exists", async () => {
    const archiveDir = path.join(tempDir, "out-empty");
    const result = await createArchive(configFor(archiveDir, { dirs: ["missing-a", "missing-b"] }), new RecordingNotifier(), {
      pollIntervalMs: 5,
    });

    expect(result.filesCount).toBe(0);
    expect(result.sourcePaths).toEqual([]);
    expect(result.skippedPaths).toEqual([path.join(sourceDir, "missing-a"), path.join(sourceDir, "missing-b")]);
    expect(existsSync(result.archivePath)).toBe(true);
    expect(await zipEntryNames(result.archivePath)).toEqual([]);
  });

  test("reports monotonic progress ending at 100", async () => {
    const notifier = new RecordingNotifier();
    const result = await createArchive(configFor(path.join(tempDir, "out-progress")), notifier, {
      pollIntervalMs: 5,
    });

    const percents = notifier.percents;
    expect(percents[0]).toBe(0);
    expect(percents.at(-1)).toBe(100);
    for (let i = 1; i < percents.length; i++) {
      expect(percents[i]).toBeGreaterThanOrEqual(percents[i - 1] ?? 0);
    }

    expect(notifier.notifications[0]).toEqual({ message: "Backup started", percent: 0 });
    expect(notifier.notifications).toContainEqual({ message: "Backup complete", percent: 100 });
    expect(notifier.notifications.at(-1)).toEqual({ message: `Backup created: ${result.archivePath}` });
  });

  test("fails before writing when the archive directory cannot be created", async () => {
    const blocker = path.join(tempDir, "blocker");
    await writeFile(blocker, "not a directory");
    const notifier = new RecordingNotifier();

    await expect(createArchive(configFor(path.join(blocker, "backups")), notifier)).rejects.toBeInstanceOf(
      ExternalToolError,
    );
    expect(notifier.messages).toEqual(["Backup started"]);
  });

  test("removes the partial file when compression is cancelled", async () => {
    const archiveDir = path.join(tempDir, "out-cancelled");
    const notifier = new RecordingNotifier();

    await expect(
      createArchive(configFor(archiveDir, { output: "cancelled.zip" }), notifier, {
        pollIntervalMs: 5,
        signal: AbortSignal.abort(),
      }),
    ).rejects.toThrow("Backup cancelled");

    expect(existsSync(partialArchivePath(archiveDir, "cancelled.zip"))).toBe(false);
    expect(await readdir(archiveDir)).toEqual([]);
    expect(notifier.percents).not.toContain(100);
  });

  test("archives sources that live inside the archive directory", async () => {
    const home = path.join(tempDir, "home-archive");
    await writeTree(home, {
      "Documents/a.txt": "aaa",
      "Documents/b.txt": "bb",
      "backup-20240101000000.zip": "previous archive",
    });
    const config = resolveConfig(
      { dirs: ["Documents"], archiveDir: "~", notify: false },
      { home, cwd: home, tmp: tempDir },
    );

    const result = await createArchive(config, new RecordingNotifier(), {
      pollIntervalMs: 5,
      now: new Date(2024, 0, 2, 3, 4, 5),
    });

    expect(result.archivePath).toBe(path.join(home, "backup-20240102030405.zip"));
    expect(result.filesCount).toBe(2);
    expect(await zipEntryNames(result.archivePath)).toEqual(["Documents/a.txt", "Documents/b.txt"]);
  });
});
