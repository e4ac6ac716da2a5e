import { promises as fs, realpathSync } from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import type { OpenLimiterPort } from '../application/ports/open-limiter.port';
import type { DirectoryListing } from '../domain/directory-listing';
import { FileSystemError } from '../domain/file-system-error';
import { ModKeyUnusableError } from '../domain/mod-key';
import { getLogger } from '../utils/get-logger';
import { NodeFileSystem } from './node-file-system';

vi.mock('../utils/get-logger', async (importOriginal) => {
  const actual = await importOriginal<typeof import('../utils/get-logger')>();
  return { ...actual, getLogger: vi.fn(actual.getLogger) };
});

const logger = getLogger();

class RecordingLimiter implements OpenLimiterPort {
  public readonly events: string[] = [];

  public async acquire(): Promise<void> {
    this.events.push('acquire');
  }

  public release(): void {
    this.events.push('release');
  }
}

const errno = (code: string) => Object.assign(new Error(`${code}: simulated`), { code });

const entryOf = (listing: DirectoryListing, name: string) => {
  const entry = listing.entries.get(name);
  if (!entry) {
    throw new Error(`missing entry ${name}`);
  }
  return entry;
};

const expectFileSystemError = async (promise: Promise<unknown>): Promise<FileSystemError> => {
  const error = await promise.then(
    () => null,
    (reason: unknown) => reason,
  );
  expect(error).toBeInstanceOf(FileSystemError);
  if (!(error instanceof FileSystemError)) {
    throw new Error('expected a FileSystemError');
  }
  return error;
};

describe('NodeFileSystem', () => {
  let root: string;
  let limiter: RecordingLimiter;
  let fileSystem: NodeFileSystem;

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), 'cached-fs-'));
    await fs.mkdir(path.join(root, 'src', 'lib'), { recursive: true });
    await fs.writeFile(path.join(root, 'src', 'index.ts'), 'export {};\n');
    await fs.writeFile(path.join(root, 'readme.md'), 'hello');
    await fs.symlink(path.join(root, 'src'), path.join(root, 'link-to-src'), 'dir');

    limiter = new RecordingLimiter();
    fileSystem = new NodeFileSystem({ logger, openLimiter: limiter });
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.rm(root, { recursive: true, force: true });
  });

  describe('readDirectory', () => {
    it('lists names without probing any entry', async () => {
      const readdir = vi.spyOn(fs, 'readdir');
      const stat = vi.spyOn(fs, 'stat');

      const listing = await fileSystem.readDirectory(root);

      expect(listing.error).toBeNull();
      expect(Array.from(listing.entries.keys()).sort()).toEqual(['link-to-src', 'readme.md', 'src']);
      expect(readdir).toHaveBeenCalledTimes(1);
      expect(stat).not.toHaveBeenCalled();
    });

    it('serves a second listing from the cache', async () => {
      const readdir = vi.spyOn(fs, 'readdir');

      const first = await fileSystem.readDirectory(root);
      await fs.writeFile(path.join(root, 'added-later.ts'), '');
      const second = await fileSystem.readDirectory(root);

      expect(second).toBe(first);
      expect(second.entries.has('added-later.ts')).toBe(false);
      expect(readdir).toHaveBeenCalledTimes(1);
    });

    it('shares one listing between joined paths with and without a trailing separator', async () => {
      const readdir = vi.spyOn(fs, 'readdir');

      const first = await fileSystem.readDirectory(fileSystem.join(root, 'src/'));
      const second = await fileSystem.readDirectory(fileSystem.join(root, 'src'));

      expect(second).toBe(first);
      expect(readdir).toHaveBeenCalledTimes(1);
    });

    it('reports a missing directory as not-found and never retries it', async () => {
      const readdir = vi.spyOn(fs, 'readdir');
      const missing = path.join(root, 'missing');

      const first = await fileSystem.readDirectory(missing);
      await fs.mkdir(missing);
      const second = await fileSystem.readDirectory(missing);

      expect(first.error?.kind).toBe('not-found');
      expect(first.error?.code).toBe('ENOENT');
      expect(first.entries.size).toBe(0);
      expect(second.error).toBe(first.error);
      expect(second.entries).toBe(first.entries);
      expect(readdir).toHaveBeenCalledTimes(1);
    });

    it('reports a path below a regular file as not-found', async () => {
      const listing = await fileSystem.readDirectory(path.join(root, 'readme.md', 'sub'));

      expect(listing.error?.kind).toBe('not-found');
      expect(listing.error?.code).toBe('ENOENT');
    });

    it('rewrites ENOTDIR for an absent directory to not-found', async () => {
      vi.spyOn(fs, 'readdir').mockRejectedValueOnce(errno('ENOTDIR'));

      const listing = await fileSystem.readDirectory(path.join(root, 'absent'));

      expect(listing.error?.kind).toBe('not-found');
      expect(listing.error?.message).toBe(`ENOENT: no such file or directory, scandir '${path.join(root, 'absent')}'`);
    });

    it('keeps not-a-directory when listing a regular file', async () => {
      const listing = await fileSystem.readDirectory(path.join(root, 'readme.md'));

      expect(listing.error?.kind).toBe('not-a-directory');
      expect(listing.error?.code).toBe('ENOTDIR');
    });

    it('holds one limiter slot per listing, including the missing-path probe', async () => {
      await fileSystem.readDirectory(root);
      await fileSystem.readDirectory(root);
      expect(limiter.events).toEqual(['acquire', 'release']);

      await fileSystem.readDirectory(path.join(root, 'readme.md', 'sub'));
      expect(limiter.events).toEqual(['acquire', 'release', 'acquire', 'release']);
    });
  });

  describe('entry kind', () => {
    it('classifies entries and follows symlinks', async () => {
      const listing = await fileSystem.readDirectory(root);

      expect(await entryOf(listing, 'src').kind()).toBe('directory');
      expect(await entryOf(listing, 'readme.md').kind()).toBe('file');
      expect(await entryOf(listing, 'link-to-src').kind()).toBe('directory');
      expect(entryOf(listing, 'readme.md').path).toBe(path.join(root, 'readme.md'));
    });

    it('probes an entry once', async () => {
      const listing = await fileSystem.readDirectory(root);
      const stat = vi.spyOn(fs, 'stat');
      const entry = entryOf(listing, 'readme.md');

      expect(await entry.kind()).toBe('file');
      expect(await entry.kind()).toBe('file');
      expect(stat).toHaveBeenCalledTimes(1);
      expect(limiter.events).toEqual(['acquire', 'release', 'acquire', 'release']);
    });

    it('does not remember a failed probe', async () => {
      const listing = await fileSystem.readDirectory(root);
      const entry = entryOf(listing, 'readme.md');
      await fs.rm(path.join(root, 'readme.md'));

      const error = await expectFileSystemError(entry.kind());
      expect(error.kind).toBe('not-found');

      await fs.writeFile(path.join(root, 'readme.md'), 'back again');
      expect(await entry.kind()).toBe('file');
    });
  });

  describe('readFile', () => {
    it('reads the whole file', async () => {
      expect((await fileSystem.readFile(path.join(root, 'readme.md'))).toString('utf8')).toBe('hello');
      expect(limiter.events).toEqual(['acquire', 'release']);
    });

    it('returns bytes that are not valid UTF-8 unchanged', async () => {
      const file = path.join(root, 'logo.png');
      const bytes = Buffer.from([0x89, 0x50, 0x4e, 0x47, 0xff, 0xfe, 0x00, 0x80]);
      await fs.writeFile(file, bytes);

      const content = await fileSystem.readFile(file);

      expect(content.toString('hex')).toBe('89504e47fffe0080');
    });

    it('re-reads on every call', async () => {
      const file = path.join(root, 'readme.md');

      expect((await fileSystem.readFile(file)).toString('utf8')).toBe('hello');
      await fs.writeFile(file, 'changed');
      expect((await fileSystem.readFile(file)).toString('utf8')).toBe('changed');
    });

    it('reports a path below a regular file as not-found', async () => {
      const error = await expectFileSystemError(fileSystem.readFile(path.join(root, 'readme.md', 'child')));

      expect(error.kind).toBe('not-found');
      expect(error.code).toBe('ENOENT');
      expect(error.syscall).toBe('open');
    });

    it('retries failures instead of caching them, unlike directory listings', async () => {
      const readFile = vi.spyOn(fs, 'readFile');
      const readdir = vi.spyOn(fs, 'readdir');
      const missing = path.join(root, 'missing');

      await expectFileSystemError(fileSystem.readFile(missing));
      await expectFileSystemError(fileSystem.readFile(missing));
      await fileSystem.readDirectory(missing);
      await fileSystem.readDirectory(missing);

      expect(readFile).toHaveBeenCalledTimes(2);
      expect(readdir).toHaveBeenCalledTimes(1);
    });

    it('releases the limiter slot when the read fails', async () => {
      await expectFileSystemError(fileSystem.readFile(path.join(root, 'missing.ts')));

      expect(limiter.events).toEqual(['acquire', 'release']);
    });
  });

  describe('modKey', () => {
    it('is stable for an unchanged file', async () => {
      const file = path.join(root, 'readme.md');

      expect(await fileSystem.modKey(file)).toBe(await fileSystem.modKey(file));
      expect(limiter.events).toEqual(['acquire', 'release', 'acquire', 'release']);
    });

    it('changes when the modification time changes', async () => {
      const file = path.join(root, 'readme.md');
      await fs.utimes(file, new Date('2020-01-01T00:00:00Z'), new Date('2020-01-01T00:00:00Z'));
      const before = await fileSystem.modKey(file);

      await fs.utimes(file, new Date('2021-06-01T00:00:00Z'), new Date('2021-06-01T00:00:00Z'));

      expect(await fileSystem.modKey(file)).not.toBe(before);
    });

    it('changes when the content changes', async () => {
      const file = path.join(root, 'readme.md');
      const pinned = new Date('2020-01-01T00:00:00Z');
      await fs.utimes(file, pinned, pinned);
      const before = await fileSystem.modKey(file);

      await fs.writeFile(file, 'hello, world');
      await fs.utimes(file, pinned, pinned);

      expect(await fileSystem.modKey(file)).not.toBe(before);
    });

    it('fails for a missing file', async () => {
      const error = await expectFileSystemError(fileSystem.modKey(path.join(root, 'missing.ts')));

      expect(error.kind).toBe('not-found');
      expect(error.syscall).toBe('stat');
      expect(limiter.events).toEqual(['acquire', 'release']);
    });

    it('refuses a file without a modification time', async () => {
      const file = path.join(root, 'readme.md');
      await fs.utimes(file, 0, 0);

      await expect(fileSystem.modKey(file)).rejects.toBeInstanceOf(ModKeyUnusableError);
      expect(limiter.events).toEqual(['acquire', 'release']);
    });
  });

  describe('paths', () => {
    it('delegates to the configured path flavor', () => {
      const posix = new NodeFileSystem({ logger, openLimiter: limiter, pathFlavor: path.posix });

      expect(posix.join('a', 'b', '../c')).toBe('a/c');
      expect(posix.isAbs('/a')).toBe(true);
      expect(posix.abs('/a/./b/..')).toBe('/a');
      expect(posix.dir('/a/b.ts')).toBe('/a');
      expect(posix.base('/a/b.ts')).toBe('b.ts');
      expect(posix.ext('/a/b.ts')).toBe('.ts');
      expect(posix.rel('/a', '/a/b/c')).toBe('b/c');
    });

    it('uses the path flavor for entry paths', async () => {
      const win32 = new NodeFileSystem({ logger, openLimiter: limiter, pathFlavor: path.win32 });

      const listing = await win32.readDirectory(root);

      expect(entryOf(listing, 'readme.md').path).toBe(path.win32.join(root, 'readme.md'));
    });
  });

  describe('logging', () => {
    it('shares one default logger between instances', () => {
      const callsBefore = vi.mocked(getLogger).mock.calls.length;

      const first = new NodeFileSystem({ openLimiter: limiter });
      const second = new NodeFileSystem({ openLimiter: limiter });

      expect(first.cwd()).toBe(second.cwd());
      expect(vi.mocked(getLogger).mock.calls.length).toBe(callsBefore);
    });
  });

  describe('cwd', () => {
    it('resolves symlinks in the working directory', () => {
      vi.spyOn(process, 'cwd').mockReturnValue(path.join(root, 'link-to-src'));

      const resolved = new NodeFileSystem({ logger, openLimiter: limiter });

      expect(resolved.cwd()).toBe(realpathSync(path.join(root, 'src')));
    });

    it('keeps the unresolved working directory when it cannot be resolved', () => {
      const missing = path.join(root, 'deleted-workdir');
      vi.spyOn(process, 'cwd').mockReturnValue(missing);

      expect(new NodeFileSystem({ logger, openLimiter: limiter }).cwd()).toBe(missing);
    });

    it('falls back to an empty working directory when none is available', () => {
      vi.spyOn(process, 'cwd').mockImplementation(() => {
        throw new Error('ENOENT: process.cwd failed');
      });

      expect(new NodeFileSystem({ logger, openLimiter: limiter }).cwd()).toBe('');
    });
  });
});
