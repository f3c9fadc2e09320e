/**
 * Backup operation type definitions
 */

export interface CollectedFile {
  absolutePath: string;
  /** Forward-slash entry name inside the archive */
  relativePath: string;
  size: number;
}

export interface CollectFilesResult {
  files: CollectedFile[];
  /** Source directories that existed and were walked */
  sourcePaths: string[];
  /** Configured source directories that do not exist */
  skippedPaths: string[];
}

export interface ArchiveResult {
  archiveName: string;
  archivePath: string;
  sizeBytes: number;
  filesCount: number;
  checksum: string;
  sourcePaths: string[];
  skippedPaths: string[];
  durationMs: number;
}

export interface ArchiveInfo {
  name: string;
  path: string;
  sizeBytes: number;
  modifiedAt: Date;
}

export interface RestoreResult {
  archivePath: string;
  destination: string;
  /** Files found in the archive (0 when empty) */
  total: number;
  copied: number;
  skipped: number;
  durationMs: number;
}

export interface DownloadResult {
  url: string;
  archiveName: string;
  archivePath: string;
  sizeBytes: number;
}

export interface VerifyResult {
  archivePath: string;
  ok: boolean;
  entries: number;
  sizeBytes: number;
  checksum: string;
  issues: string[];
}
