export type { FileSystemPort } from './application/ports/file-system.port';
export type { OpenLimiterPort } from './application/ports/open-limiter.port';
export { DirectoryCache } from './application/services/directory-cache';
export type { CreateEntry, ListNames } from './application/services/directory-cache';
export { describeEntries, formatEntryLine } from './application/services/entry-report';
export type { EntryLine } from './application/services/entry-report';
export type { DirectoryEntries, DirectoryListing } from './domain/directory-listing';
export { Entry } from './domain/entry';
export type { KindProbe } from './domain/entry';
export { ENTRY_KIND, ENTRY_KIND_SCHEMA } from './domain/entry-kind';
export type { EntryKind } from './domain/entry-kind';
export {
  FS_ERROR_KIND,
  FS_ERROR_KIND_SCHEMA,
  FileSystemError,
  isFileSystemError,
  isNotFoundError,
  toFileSystemError,
} from './domain/file-system-error';
export type { FsErrorKind, NormalizeOptions } from './domain/file-system-error';
export { ModKeyUnusableError, buildModKey } from './domain/mod-key';
export type { ModKey } from './domain/mod-key';
export { CountingOpenLimiter } from './infrastructure/counting-open-limiter';
export { NodeFileSystem } from './infrastructure/node-file-system';
export type { NodeFileSystemOptions } from './infrastructure/node-file-system';
export { NodePath } from './infrastructure/node-path';
export { getLogger } from './utils/get-logger';
export type { Logger } from './utils/get-logger';
export { DEFAULT_OPEN_FILE_LIMIT, parseOpenFileLimit } from './utils/parse-open-file-limit';
export { withOpenSlot } from './utils/with-open-slot';
