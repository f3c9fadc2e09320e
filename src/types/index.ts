/**
 * Centralized type exports
 */

// Backup types
export type {
  ArchiveInfo,
  ArchiveResult,
  CollectedFile,
  CollectFilesResult,
  DownloadResult,
  RestoreResult,
  VerifyResult,
} from "./backup.js";
// Config types
export type { BackupConfig, ConfigOverrides } from "./config.js";
// Notification types
export type { Notifier } from "./notify.js";
