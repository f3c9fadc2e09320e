export {
  archiveNameFromHeaders,
  buildDownloadUrl,
  type DownloadOptions,
  downloadArchive,
  type FetchLike,
} from "./downloader.js";
export {
  createShareApp,
  localAddresses,
  renderIndexPage,
  SHARE_HOSTNAME,
  type ShareSession,
  startShareServer,
} from "./share-server.js";
