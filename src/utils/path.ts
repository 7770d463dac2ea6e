import path from 'node:path';

const ALLOWED_SUBPATH = /^[\p{L}\p{M}\p{N}_\-./\\]+$/u;

/**
 * Keeps webhook subpaths inside the repository root.
 */
export class PathValidator {
  private root: string;

  constructor(repositoryRoot: string) {
    const resolved = path.resolve(repositoryRoot);
    this.root = resolved.endsWith(path.sep) ? resolved : resolved + path.sep;
  }

  validate(subpath: string): boolean {
    return this.resolve(subpath) !== null;
  }

  /**
   * Absolute target directory for a subpath, or null when the subpath is
   * malformed or lands outside the root.
   */
  resolve(subpath: string): string | null {
    if (!ALLOWED_SUBPATH.test(subpath)) {
      return null;
    }

    if (subpath.split(/[/\\]/).includes('..')) {
      return null;
    }

    const target = path.resolve(path.join(this.root, subpath));
    return this.contains(target) ? target : null;
  }

  /**
   * True when `target` is a strict descendant of the root.
   */
  contains(target: string): boolean {
    return target.startsWith(this.root) && target.length > this.root.length;
  }
}
