/**
 * Default configuration values
 */

// Relative to the root (home directory by default)
export const DEFAULT_SOURCE_DIRS = ["Documents", "Desktop", "Pictures", ".ssh", ".config"] as const;

export const DEFAULT_EXCLUDE_PATTERNS = ["*.tmp", "*.swp", "node_modules", ".cache"] as const;

// Relative to the home directory
export const DEFAULT_ARCHIVE_DIR = "backups";

export const DEFAULT_PORT = 8000;

export const DEFAULT_COMPRESSION = 6;

export const PROGRESS_POLL_INTERVAL_MS = 1000;

export const DOWNLOAD_TIMEOUT_MS = 30_000;
