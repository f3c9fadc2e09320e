/**
 * Archive naming utilities
 */

export { formatBytes, formatDuration } from "./format.js";

export const DEFAULT_ARCHIVE_PREFIX = "backup";

export const ARCHIVE_EXTENSION = ".zip";

const PARTIAL_SUFFIX = ".partial";

// Pattern: prefix-YYYYMMDDHHMMSS.zip
export const ARCHIVE_NAME_PATTERN = /^([a-z][a-z0-9_]*)-(\d{8})(\d{6})\.zip$/;

export interface ParsedArchiveName {
  prefix: string;
  date: string;
  time: string;
}

function pad(value: number, width: number = 2): string {
  return String(value).padStart(width, "0");
}

/**
 * Local-time date stamp, YYYYMMDD.
 */
export function formatDateStamp(date: Date): string {
  return `${pad(date.getFullYear(), 4)}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
}

/**
 * Local-time timestamp, YYYYMMDDHHMMSS.
 */
export function formatTimestamp(date: Date): string {
  return `${formatDateStamp(date)}${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
}

export function generateArchiveName(
  date: Date = new Date(),
  prefix: string = DEFAULT_ARCHIVE_PREFIX,
): string {
  return `${prefix}-${formatTimestamp(date)}${ARCHIVE_EXTENSION}`;
}

export function parseArchiveName(archiveName: string): ParsedArchiveName | null {
  const match = archiveName.match(ARCHIVE_NAME_PATTERN);
  if (!match) return null;

  const [, prefix, date, time] = match;
  if (prefix === undefined || date === undefined || time === undefined) return null;

  return { prefix, date, time };
}

/**
 * Whether a generated archive name was stamped on the given day.
 */
export function isArchiveFromDay(archiveName: string, day: Date): boolean {
  return parseArchiveName(archiveName)?.date === formatDateStamp(day);
}

/**
 * Anything ending in .zip counts as an archive for listing and sharing.
 */
export function isArchiveFile(fileName: string): boolean {
  return fileName.toLowerCase().endsWith(ARCHIVE_EXTENSION) && !fileName.startsWith(".");
}

/**
 * Hidden name an archive is written under until it is complete.
 */
export function partialArchiveName(archiveName: string): string {
  return `.${archiveName}${PARTIAL_SUFFIX}`;
}

/**
 * A finished archive or one still being written.
 */
export function isArchiveArtifact(fileName: string): boolean {
  if (isArchiveFile(fileName)) return true;
  const lower = fileName.toLowerCase();
  return fileName.startsWith(".") && lower.endsWith(`${ARCHIVE_EXTENSION}${PARTIAL_SUFFIX}`);
}

/**
 * Normalize a user-supplied output name: plain file name, .zip appended.
 */
export function normalizeOutputName(name: string): string {
  return name.toLowerCase().endsWith(ARCHIVE_EXTENSION) ? name : `${name}${ARCHIVE_EXTENSION}`;
}
