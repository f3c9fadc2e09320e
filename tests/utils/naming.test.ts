import { describe, expect, test } from "vitest";
import {
  ARCHIVE_NAME_PATTERN,
  formatDateStamp,
  formatTimestamp,
  generateArchiveName,
  isArchiveArtifact,
  isArchiveFile,
  isArchiveFromDay,
  normalizeOutputName,
  parseArchiveName,
  partialArchiveName,
} from "../../src/utils/naming.js";

describe("naming utilities", () => {
  const stamp = new Date(2024, 0, 2, 3, 4, 5);

  describe("formatTimestamp", () => {
    test("formats local time as YYYYMMDDHHMMSS", () => {
      expect(formatTimestamp(stamp)).toBe("20240102030405");
    });

    test("formats the date part as YYYYMMDD", () => {
      expect(formatDateStamp(new Date(2023, 11, 31, 23, 59, 59))).toBe("20231231");
    });
  });

  describe("generateArchiveName", () => {
    test("uses the backup prefix and the timestamp", () => {
      expect(generateArchiveName(stamp)).toBe("backup-20240102030405.zip");
    });

    test("accepts a custom prefix", () => {
      expect(generateArchiveName(stamp, "laptop")).toBe("laptop-20240102030405.zip");
    });

    test("defaults to the current time", () => {
      expect(generateArchiveName()).toMatch(ARCHIVE_NAME_PATTERN);
    });
  });

  describe("parseArchiveName", () => {
    test("splits a generated name", () => {
      expect(parseArchiveName("backup-20240102030405.zip")).toEqual({
        prefix: "backup",
        date: "20240102",
        time: "030405",
      });
    });

    test("returns null for names that were not generated", () => {
      expect(parseArchiveName("backup-2024.zip")).toBeNull();
      expect(parseArchiveName("laptop.zip")).toBeNull();
      expect(parseArchiveName("backup-20240102030405.tar.gz")).toBeNull();
    });
  });

  describe("isArchiveArtifact", () => {
    test("covers finished and in-progress archives", () => {
      expect(partialArchiveName("laptop.zip")).toBe(".laptop.zip.partial");
      expect(isArchiveArtifact("laptop.zip")).toBe(true);
      expect(isArchiveArtifact(partialArchiveName("laptop.zip"))).toBe(true);
    });

    test("ignores everything else", () => {
      expect(isArchiveArtifact("notes.txt")).toBe(false);
      expect(isArchiveArtifact("draft.partial")).toBe(false);
      expect(isArchiveArtifact(".hidden.zip")).toBe(false);
    });
  });

  describe("isArchiveFromDay", () => {
    test("matches the date stamp against the given day", () => {
      expect(isArchiveFromDay("backup-20240102030405.zip", new Date(2024, 0, 2, 23, 0, 0))).toBe(true);
      expect(isArchiveFromDay("backup-20240102030405.zip", new Date(2024, 0, 3, 0, 0, 0))).toBe(false);
    });

    test("is false for names without a stamp", () => {
      expect(isArchiveFromDay("laptop.zip", stamp)).toBe(false);
    });
  });

  describe("isArchiveFile", () => {
    test("accepts visible .zip files in any case", () => {
      expect(isArchiveFile("backup-20240102030405.zip")).toBe(true);
      expect(isArchiveFile("LAPTOP.ZIP")).toBe(true);
    });

    test("rejects partial, hidden and other files", () => {
      expect(isArchiveFile(".backup-20240102030405.zip.partial")).toBe(false);
      expect(isArchiveFile(".hidden.zip")).toBe(false);
      expect(isArchiveFile("backup.tar.gz")).toBe(false);
    });
  });

  describe("normalizeOutputName", () => {
    test("appends .zip when missing", () => {
      expect(normalizeOutputName("laptop")).toBe("laptop.zip");
    });

    test("keeps an existing extension", () => {
      expect(normalizeOutputName("laptop.zip")).toBe("laptop.zip");
      expect(normalizeOutputName("laptop.ZIP")).toBe("laptop.ZIP");
    });
  });
});
