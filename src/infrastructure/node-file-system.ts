import { promises as fs, realpathSync } from 'node:fs';
import type { BigIntStats } from 'node:fs';
import type { PlatformPath } from 'node:path';

import type { FileSystemPort } from '../application/ports/file-system.port';
import type { OpenLimiterPort } from '../application/ports/open-limiter.port';
import { DirectoryCache } from '../application/services/directory-cache';
import type { DirectoryListing } from '../domain/directory-listing';
import { Entry } from '../domain/entry';
import { ENTRY_KIND } from '../domain/entry-kind';
import type { EntryKind } from '../domain/entry-kind';
import { isErrnoException, toFileSystemError } from '../domain/file-system-error';
import { buildModKey } from '../domain/mod-key';
import type { ModKey } from '../domain/mod-key';
import { getLogger } from '../utils/get-logger';
import type { Logger } from '../utils/get-logger';
import { DEFAULT_OPEN_FILE_LIMIT, parseOpenFileLimit } from '../utils/parse-open-file-limit';
import { withOpenSlot } from '../utils/with-open-slot';
import { CountingOpenLimiter } from './counting-open-limiter';
import { NodePath } from './node-path';

const logger = getLogger();

export type NodeFileSystemOptions = {
  openLimiter?: OpenLimiterPort;
  pathFlavor?: PlatformPath;
  logger?: Logger;
};

export class NodeFileSystem implements FileSystemPort {
  private readonly logger: Logger;
  private readonly openLimiter: OpenLimiterPort;
  private readonly paths: NodePath;
  private readonly directories: DirectoryCache;
  private readonly workingDirectory: string;

  public constructor(options: NodeFileSystemOptions = {}) {
    this.logger = options.logger ?? logger;
    this.openLimiter =
      options.openLimiter ?? new CountingOpenLimiter(parseOpenFileLimit() ?? DEFAULT_OPEN_FILE_LIMIT);
    this.paths = new NodePath(options.pathFlavor);
    this.directories = new DirectoryCache(
      (dir) => this.listNames(dir),
      (dir, base) => new Entry(dir, base, this.paths.join(dir, base), (entry) => this.probeKind(entry)),
    );
    this.workingDirectory = this.resolveWorkingDirectory();
  }

  public readDirectory(dir: string): Promise<DirectoryListing> {
    return this.directories.read(dir);
  }

  public readFile(targetPath: string): Promise<Buffer> {
    return withOpenSlot(this.openLimiter, async () => {
      try {
        return await fs.readFile(targetPath);
      } catch (error) {
        throw toFileSystemError(error, 'open', targetPath, { notDirectoryAsNotFound: true });
      }
    });
  }

  public modKey(targetPath: string): Promise<ModKey> {
    return withOpenSlot(this.openLimiter, async () => {
      let stats: BigIntStats;
      try {
        stats = await fs.stat(targetPath, { bigint: true });
      } catch (error) {
        throw toFileSystemError(error, 'stat', targetPath, { notDirectoryAsNotFound: true });
      }
      return buildModKey(targetPath, stats);
    });
  }

  public isAbs(targetPath: string): boolean {
    return this.paths.isAbs(targetPath);
  }

  public abs(targetPath: string): string | null {
    return this.paths.abs(targetPath);
  }

  public dir(targetPath: string): string {
    return this.paths.dir(targetPath);
  }

  public base(targetPath: string): string {
    return this.paths.base(targetPath);
  }

  public ext(targetPath: string): string {
    return this.paths.ext(targetPath);
  }

  public join(...parts: string[]): string {
    return this.paths.join(...parts);
  }

  public rel(base: string, target: string): string | null {
    return this.paths.rel(base, target);
  }

  public cwd(): string {
    return this.workingDirectory;
  }

  private listNames(dir: string): Promise<string[]> {
    this.logger.debug({ dir }, 'Directory cache miss');
    return withOpenSlot(this.openLimiter, async () => {
      try {
        return await fs.readdir(dir);
      } catch (error) {
        // Node reports ENOTDIR both for a regular file and for a path under one.
        // Only the latter means the directory is missing.
        const missing = isErrnoException(error) && error.code === 'ENOTDIR' && !(await this.pathExists(dir));
        const listingError = toFileSystemError(error, 'scandir', dir, { notDirectoryAsNotFound: missing });
        this.logger.debug({ dir, code: listingError.code }, 'Directory listing failed');
        throw listingError;
      }
    });
  }

  private async pathExists(targetPath: string): Promise<boolean> {
    try {
      await fs.stat(targetPath);
      return true;
    } catch {
      return false;
    }
  }

  private probeKind(entry: Entry): Promise<EntryKind> {
    return withOpenSlot(this.openLimiter, async () => {
      try {
        // stat follows symlinks, so a link is classified by its target
        const stats = await fs.stat(entry.path);
        if (stats.isFile()) {
          return ENTRY_KIND.FILE;
        }
        if (stats.isDirectory()) {
          return ENTRY_KIND.DIRECTORY;
        }
        return ENTRY_KIND.OTHER;
      } catch (error) {
        throw toFileSystemError(error, 'stat', entry.path, { notDirectoryAsNotFound: true });
      }
    });
  }

  private resolveWorkingDirectory(): string {
    let cwd: string;
    try {
      cwd = process.cwd();
    } catch (error) {
      this.logger.debug({ error: error instanceof Error ? error.message : error }, 'Working directory unavailable');
      return '';
    }

    // Best effort: a loop or a vanished directory keeps the unresolved path
    try {
      return realpathSync(cwd);
    } catch (error) {
      this.logger.debug(
        { cwd, error: error instanceof Error ? error.message : error },
        'Keeping unresolved working directory',
      );
      return cwd;
    }
  }
}
