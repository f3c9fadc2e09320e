/**
 * Storage module exports
 */

export { findArchiveByName, findLatestArchive, listArchives } from "./local.js";
