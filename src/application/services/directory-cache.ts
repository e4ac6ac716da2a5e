import type { DirectoryListing } from '../../domain/directory-listing';
import type { Entry } from '../../domain/entry';
import { toFileSystemError } from '../../domain/file-system-error';

export type ListNames = (dir: string) => Promise<string[]>;
export type CreateEntry = (dir: string, base: string) => Entry;

/**
 * Per-path memo of directory listings.
 *
 * There is no invalidation: a directory that failed to list once stays failed
 * for the life of the cache.
 */
export class DirectoryCache {
  private readonly listings = new Map<string, Promise<DirectoryListing>>();

  public constructor(
    private readonly listNames: ListNames,
    private readonly createEntry: CreateEntry,
  ) { }

  public read(dir: string): Promise<DirectoryListing> {
    const cached = this.listings.get(dir);
    if (cached) {
      return cached;
    }

    // Store the pending listing before awaiting it so parallel callers share it
    const pending = this.load(dir);
    this.listings.set(dir, pending);
    return pending;
  }

  private async load(dir: string): Promise<DirectoryListing> {
    try {
      const names = await this.listNames(dir);
      const entries = new Map<string, Entry>();
      for (const name of names) {
        entries.set(name, this.createEntry(dir, name));
      }
      return { entries, error: null };
    } catch (error) {
      return { entries: new Map(), error: toFileSystemError(error, 'scandir', dir) };
    }
  }
}
