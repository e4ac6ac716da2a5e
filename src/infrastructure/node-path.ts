import path from 'node:path';
import type { PlatformPath } from 'node:path';

/**
 * Path operations delegated to Node's `path` module. Pass `path.posix` or
 * `path.win32` to pin a platform's rules instead of the host's.
 */
export class NodePath {
  public constructor(private readonly flavor: PlatformPath = path) { }

  public isAbs(targetPath: string): boolean {
    return this.flavor.isAbsolute(targetPath);
  }

  public abs(targetPath: string): string | null {
    // resolve() throws when process.cwd() does (e.g. the working directory was deleted)
    try {
      return this.flavor.resolve(targetPath);
    } catch {
      return null;
    }
  }

  public dir(targetPath: string): string {
    return this.flavor.dirname(targetPath);
  }

  public base(targetPath: string): string {
    return this.flavor.basename(targetPath);
  }

  public ext(targetPath: string): string {
    return this.flavor.extname(targetPath);
  }

  public join(...parts: string[]): string {
    const joined = this.flavor.join(...parts);
    // join() keeps a trailing separator; only a root may end in one
    const { root } = this.flavor.parse(joined);
    if (joined.length > root.length && joined.endsWith(this.flavor.sep)) {
      return joined.slice(0, -1);
    }
    return joined;
  }

  public rel(base: string, target: string): string | null {
    const relative = this.flavor.relative(base, target);
    // win32 hands back the target itself when it lives on another drive
    return this.flavor.isAbsolute(relative) ? null : relative;
  }
}
