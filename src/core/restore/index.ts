/**
 * Restore module exports
 */

export { extractArchive } from "./extractor.js";
export {
  FsMergeEngine,
  formatMergeLine,
  type MergeAction,
  type MergeEngine,
  type MergeLine,
  parseMergeLine,
} from "./merger.js";
export { RestoreProgress, type RestoreProgressListener } from "./progress.js";
export { type RestoreConfig, type RestoreOptions, restoreArchive } from "./restorer.js";
