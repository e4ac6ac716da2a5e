import type { DirectoryListing } from '../../domain/directory-listing';
import type { ModKey } from '../../domain/mod-key';

export interface FileSystemPort {
  /**
   * List a directory. The first call per path hits the disk; every later call
   * returns the stored listing, including a stored failure.
   */
  readDirectory(path: string): Promise<DirectoryListing>;
  /** Raw file bytes; decoding is up to the caller */
  readFile(path: string): Promise<Buffer>;
  modKey(path: string): Promise<ModKey>;

  isAbs(path: string): boolean;
  /** `null` when the process working directory is unavailable */
  abs(path: string): string | null;
  dir(path: string): string;
  base(path: string): string;
  ext(path: string): string;
  join(...parts: string[]): string;
  /** `null` when `target` cannot be reached relative to `base` */
  rel(base: string, target: string): string | null;
  cwd(): string;
}
