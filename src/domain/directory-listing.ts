import type { Entry } from './entry';
import type { FileSystemError } from './file-system-error';

export type DirectoryEntries = ReadonlyMap<string, Entry>;

/**
 * Outcome of listing one directory. Stored once per path and returned as-is on
 * every later call, failures included.
 */
export type DirectoryListing = {
  readonly entries: DirectoryEntries;
  readonly error: FileSystemError | null;
};
