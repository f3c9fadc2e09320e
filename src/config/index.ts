/**
 * Configuration module exports
 */

// Defaults
export {
  DEFAULT_ARCHIVE_DIR,
  DEFAULT_COMPRESSION,
  DEFAULT_EXCLUDE_PATTERNS,
  DEFAULT_PORT,
  DEFAULT_SOURCE_DIRS,
  DOWNLOAD_TIMEOUT_MS,
  PROGRESS_POLL_INTERVAL_MS,
} from "./defaults.js";
// Inline (CLI flag) options
export { extractInlineOptions, INLINE_CONFIG_OPTIONS, parseInteger, parseList } from "./inline.js";
// Resolver
export { currentEnvironment, type ResolveEnvironment, resolveConfig } from "./resolver.js";
// Validator
export { validateConfig } from "./validator.js";
