import { describe, expect, test } from "vitest";
import { formatBytes, formatDuration } from "../../src/utils/format.js";

describe("formatBytes", () => {
  test("formats zero and small sizes in bytes", () => {
    expect(formatBytes(0)).toBe("0 B");
    expect(formatBytes(512)).toBe("512 B");
  });

  test("scales to larger units", () => {
    expect(formatBytes(1024)).toBe("1.00 KB");
    expect(formatBytes(1536)).toBe("1.50 KB");
    expect(formatBytes(1024 * 1024)).toBe("1.00 MB");
    expect(formatBytes(5 * 1024 ** 3)).toBe("5.00 GB");
  });
});

describe("formatDuration", () => {
  test("formats milliseconds", () => {
    expect(formatDuration(500)).toBe("500ms");
  });

  test("formats seconds with one decimal", () => {
    expect(formatDuration(1500)).toBe("1.5s");
  });

  test("formats minutes and seconds", () => {
    expect(formatDuration(90_000)).toBe("1m 30s");
  });
});
