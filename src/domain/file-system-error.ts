import { z } from 'zod';

import type { ValueOf } from '../types/value-of';

export const FS_ERROR_KIND = {
  NOT_FOUND: 'not-found',
  NOT_A_DIRECTORY: 'not-a-directory',
  PERMISSION_DENIED: 'permission-denied',
  OTHER: 'other',
} as const;

export type FsErrorKind = ValueOf<typeof FS_ERROR_KIND>;

export const FS_ERROR_KIND_SCHEMA = z.enum(
  Object.values(FS_ERROR_KIND) as [FsErrorKind, ...FsErrorKind[]],
);

const DESCRIPTIONS: Record<string, string> = {
  ENOENT: 'no such file or directory',
  ENOTDIR: 'not a directory',
  EACCES: 'permission denied',
  EPERM: 'operation not permitted',
  EISDIR: 'illegal operation on a directory',
  ELOOP: 'too many levels of symbolic links',
  EMFILE: 'too many open files',
  ENAMETOOLONG: 'file name too long',
};

// Node formats errno messages as "CODE: description, syscall 'path'".
const describeErrno = (error: NodeJS.ErrnoException): string =>
  error.message.replace(/^[A-Z0-9_]+: /, '').split(', ')[0] ?? error.message;

const kindForCode = (code: string): FsErrorKind => {
  switch (code) {
    case 'ENOENT':
      return FS_ERROR_KIND.NOT_FOUND;
    case 'ENOTDIR':
      return FS_ERROR_KIND.NOT_A_DIRECTORY;
    case 'EACCES':
    case 'EPERM':
      return FS_ERROR_KIND.PERMISSION_DENIED;
    default:
      return FS_ERROR_KIND.OTHER;
  }
};

/**
 * Error returned by every operation of the file system layer.
 *
 * `kind` is the portable classification callers should branch on; `code` keeps
 * the errno string after normalization (e.g. `ENOENT`).
 */
export class FileSystemError extends Error {
  public readonly kind: FsErrorKind;

  public constructor(
    public readonly code: string,
    public readonly syscall: string,
    public readonly path: string,
    options?: { cause?: unknown; description?: string },
  ) {
    const description = options?.description ?? DESCRIPTIONS[code] ?? 'unknown error';
    super(`${code}: ${description}, ${syscall} '${path}'`, { cause: options?.cause });
    this.name = 'FileSystemError';
    this.kind = kindForCode(code);
  }
}

export const isErrnoException = (error: unknown): error is NodeJS.ErrnoException =>
  error instanceof Error && 'code' in error && typeof error.code === 'string';

export type NormalizeOptions = {
  /**
   * Rewrite ENOTDIR to ENOENT. Some platforms report ENOTDIR when a path
   * component is a regular file, which for the caller means the path is missing.
   */
  notDirectoryAsNotFound?: boolean;
};

export const toFileSystemError = (
  error: unknown,
  syscall: string,
  targetPath: string,
  options: NormalizeOptions = {},
): FileSystemError => {
  if (error instanceof FileSystemError) {
    return error;
  }
  if (!isErrnoException(error) || !error.code) {
    const message = error instanceof Error ? error.message : String(error);
    return new FileSystemError('UNKNOWN', syscall, targetPath, { cause: error, description: message });
  }

  const code = options.notDirectoryAsNotFound && error.code === 'ENOTDIR' ? 'ENOENT' : error.code;
  const description = DESCRIPTIONS[code] ?? describeErrno(error);
  return new FileSystemError(code, syscall, targetPath, { cause: error, description });
};

export const isFileSystemError = (error: unknown): error is FileSystemError =>
  error instanceof FileSystemError;

export const isNotFoundError = (error: unknown): error is FileSystemError =>
  isFileSystemError(error) && error.kind === FS_ERROR_KIND.NOT_FOUND;
