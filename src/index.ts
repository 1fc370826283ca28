export {
  enumerateTree,
  type EnumerateOptions,
  type ScanResult,
  type ScanStats,
} from "./enumerate.js";

export {
  resolvePath,
  type FolderCache,
  type FolderInfo,
  type PathResolution,
  type ResolveContext,
  type TruncationReason,
} from "./path-resolver.js";

export {
  CATALOG_FIELDS,
  REQUIRED_CATALOG_FIELDS,
  catalogFromRecords,
  mergeCatalog,
  sortCatalog,
  type Catalog,
  type CatalogField,
  type FileRecord,
} from "./catalog.js";

export {
  CsvCatalogStore,
  formatCatalogCsv,
  parseCatalogCsv,
  validateCatalogHeaders,
  type CatalogStore,
} from "./catalog-store.js";

export {
  AUDIO_MIME_TYPES,
  VIDEO_MIME_TYPES,
  entryKindForMime,
  extractFileRecord,
  type Entry,
  type EntryKind,
} from "./entry.js";

export type { ListOptions, ListPage, RemoteStore } from "./remote-store.js";

export {
  DriveRemoteStore,
  driveFilesClient,
  type DriveFilesClient,
} from "./drive-store.js";

export { authorize, type AuthorizeOptions } from "./drive-auth.js";

export {
  CatalogValidationError,
  CredentialsNotFoundError,
  DriveServiceError,
  FileListError,
  FileMetadataError,
} from "./errors.js";

export { runScan, type ScanOptions } from "./scan.js";

export {
  ConsoleLogger,
  NullLogger,
  parseLogLevel,
  type Logger,
  type LogLevel,
} from "./logger.js";
