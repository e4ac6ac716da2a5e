import type { BigIntStats } from 'node:fs';

/**
 * Change-detection fingerprint of a file, built from metadata only. Two keys
 * for the same path compare equal with `===` exactly when the file looks
 * unchanged.
 */
export type ModKey = string;

export class ModKeyUnusableError extends Error {
  public constructor(public readonly path: string) {
    super(`cannot compute a modification key for '${path}': the file system does not record modification times`);
    this.name = 'ModKeyUnusableError';
  }
}

type ModKeyStats = Pick<BigIntStats, 'dev' | 'ino' | 'size' | 'mtimeNs' | 'mode' | 'uid'>;

export const buildModKey = (targetPath: string, stats: ModKeyStats): ModKey => {
  // A zeroed mtime would make every revision of the file look the same
  if (stats.mtimeNs === 0n) {
    throw new ModKeyUnusableError(targetPath);
  }

  return [stats.dev, stats.ino, stats.size, stats.mtimeNs, stats.mode, stats.uid]
    .map((value) => value.toString(36))
    .join(':');
};
