import { lstat, readlink, realpath } from 'node:fs/promises';
import { basename, dirname, isAbsolute, join, relative, resolve, sep } from 'node:path';

import { PathEscapeError } from '../errors.js';

export function errnoCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

export function isNotFound(error: unknown): boolean {
  const code = errnoCode(error);
  return code === 'ENOENT' || code === 'ENOTDIR';
}

const MAX_LINK_HOPS = 40;

function escapes(root: string, target: string): boolean {
  const rel = relative(root, target);
  return rel === '..' || rel.startsWith(`..${sep}`) || isAbsolute(rel);
}

/**
 * Single directory boundary for the file-system tools.
 */
export class WorkspaceSandbox {
  readonly root: string;

  constructor(root: string) {
    this.root = resolve(root);
  }

  /**
   * Resolve `requested` against the root without touching the disk.
   * @throws PathEscapeError when the result lies outside the root
   */
  resolvePath(requested: string): string {
    const target = resolve(this.root, requested);
    if (escapes(this.root, target)) {
      throw new PathEscapeError(requested);
    }
    return target;
  }

  /**
   * Resolve `requested` and also reject paths that I/O would follow out of the
   * root through a symlink, including a dangling one at the leaf or on the way.
   * Only inspects the filesystem.
   */
  async resolveForIo(requested: string): Promise<string> {
    const target = this.resolvePath(requested);

    const realRoot = await this.realpathOrUndefined(this.root);
    if (!realRoot) {
      // nothing exists under a missing root
      return target;
    }

    const landing = await this.landingPath(requested, target, 0);
    if (escapes(realRoot, landing)) {
      throw new PathEscapeError(requested);
    }
    return target;
  }

  /**
   * Physical location an open or create of `path` ends up at: the nearest
   * existing entry is canonicalized and dangling links are followed.
   */
  private async landingPath(requested: string, path: string, hops: number): Promise<string> {
    let current = path;
    let remainder = '';

    for (;;) {
      const stats = await this.lstatOrUndefined(current);
      if (!stats) {
        const parent = dirname(current);
        if (parent === current) {
          return path;
        }
        remainder = join(basename(current), remainder);
        current = parent;
        continue;
      }

      const real = await this.realpathOrUndefined(current);
      if (real !== undefined) {
        return join(real, remainder);
      }

      // dangling symlink: continue from where it points
      if (!stats.isSymbolicLink() || hops >= MAX_LINK_HOPS) {
        throw new PathEscapeError(requested);
      }
      const linkDir = await realpath(dirname(current));
      const linkTarget = resolve(linkDir, await readlink(current));
      return this.landingPath(requested, join(linkTarget, remainder), hops + 1);
    }
  }

  private async lstatOrUndefined(path: string) {
    try {
      return await lstat(path);
    } catch (error) {
      if (isNotFound(error)) {
        return undefined;
      }
      throw error;
    }
  }

  private async realpathOrUndefined(path: string): Promise<string | undefined> {
    try {
      return await realpath(path);
    } catch (error) {
      if (isNotFound(error)) {
        return undefined;
      }
      throw error;
    }
  }
}
