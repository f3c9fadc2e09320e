/**
 * Backup module exports
 */

export { type CreateArchiveOptions, createArchive, partialArchivePath } from "./archive-creator.js";
export { createExclusionMatcher, type ExclusionMatcher } from "./exclusions.js";
export { type CollectConfig, collectFiles, entryPrefix } from "./file-collector.js";
