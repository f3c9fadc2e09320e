/**
 * Configuration type definitions
 */

export interface BackupConfig {
  /** Fixed root that archive entry names are relative to */
  readonly root: string;
  /** Source directories, absolute after resolution */
  readonly dirs: readonly string[];
  /** Glob patterns matched against relative paths and base names */
  readonly exclude: readonly string[];
  /** Where archives are written, listed and shared from */
  readonly archiveDir: string;
  /** zlib level, 0 (store) to 9 (smallest) */
  readonly compression: number;
  /** Restore root */
  readonly destination: string;
  /** Staging and download directory */
  readonly tmpDir: string;
  /** Share / download port */
  readonly port: number;
  /** Archive file name override */
  readonly output: string | null;
  /** Desktop notifications */
  readonly notify: boolean;
  readonly verbose: boolean;
}

/**
 * Overrides collected from CLI flags. Paths are as typed by the user.
 */
export interface ConfigOverrides {
  root?: string;
  dirs?: string[];
  exclude?: string[];
  archiveDir?: string;
  compression?: number;
  destination?: string;
  tmpDir?: string;
  port?: number;
  output?: string;
  notify?: boolean;
  verbose?: boolean;
}
