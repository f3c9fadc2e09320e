import { writeFile } from "node:fs/promises";
import * as path from "node:path";
import { afterAll, beforeAll, describe, expect, test } from "vitest";
import { computeFileChecksum } from "../../src/utils/crypto.js";
import { makeTempDir, removeDir } from "../helpers/fs.js";

describe("computeFileChecksum", () => {
  let tempDir: string;

  beforeAll(async () => {
    tempDir = await makeTempDir("crypto");
  });

  afterAll(async () => {
    await removeDir(tempDir);
  });

  test("computes the SHA-256 of a file", async () => {
    const file = path.join(tempDir, "hello.txt");
    await writeFile(file, "hello world");

    expect(await computeFileChecksum(file)).toBe(
      "b94d27b9934d3e08a52e52d7da7dabfac484efe37a5380ee9088f7ace2efcde9",
    );
  });

  test("handles an empty file", async () => {
    const file = path.join(tempDir, "empty.txt");
    await writeFile(file, "");

    expect(await computeFileChecksum(file)).toBe(
      "e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855",
    );
  });

  test("differs for different content", async () => {
    const a = path.join(tempDir, "a.txt");
    const b = path.join(tempDir, "b.txt");
    await writeFile(a, "content 1");
    await writeFile(b, "content 2");

    expect(await computeFileChecksum(a)).not.toBe(await computeFileChecksum(b));
  });
});
