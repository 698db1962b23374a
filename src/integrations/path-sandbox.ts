/**
 * Path sandbox.
 *
 * Every tool path is joined to the workspace root, canonicalized
 * (`..` segments, symlinks, missing tails) and then prefix-checked
 * against the canonical root. Anything that lands outside fails with
 * SandboxViolationError before the filesystem is touched.
 */

import { lstatSync, readlinkSync, realpathSync } from 'node:fs';
import { basename, dirname, join, relative, resolve, sep } from 'node:path';
import { SandboxViolationError, errorCode } from '../errors/index.js';

/** Symlink hops followed before a path is treated as a loop */
const MAX_LINK_DEPTH = 40;

/**
 * Canonical absolute form of `target`, whether or not it exists.
 *
 * Existing paths go through realpath. For a missing path the nearest
 * existing ancestor is canonicalized and the missing tail re-appended;
 * a dangling symlink is followed to where it points.
 */
export function canonicalizePath(target: string, depth = 0): string {
  const absolute = resolve(target);
  if (depth > MAX_LINK_DEPTH) {
    throw new Error(`Too many levels of symbolic links: ${absolute}`);
  }

  try {
    return realpathSync.native(absolute);
  } catch (err) {
    const code = errorCode(err);
    if (code !== 'ENOENT' && code !== 'ENOTDIR') {
      throw err;
    }
  }

  const link = readLinkIfSymlink(absolute);
  if (link !== undefined) {
    return canonicalizePath(resolve(dirname(absolute), link), depth + 1);
  }

  const parent = dirname(absolute);
  if (parent === absolute) {
    return absolute;
  }
  return join(canonicalizePath(parent, depth), basename(absolute));
}

function readLinkIfSymlink(path: string): string | undefined {
  try {
    return lstatSync(path).isSymbolicLink() ? readlinkSync(path) : undefined;
  } catch (err) {
    const code = errorCode(err);
    if (code === 'ENOENT' || code === 'ENOTDIR') {
      return undefined;
    }
    throw err;
  }
}

/**
 * Inclusive prefix check: the root itself counts as inside.
 * Both arguments must already be canonical.
 */
export function isWithinRoot(target: string, root: string): boolean {
  if (target === root) return true;
  const prefix = root.endsWith(sep) ? root : root + sep;
  return target.startsWith(prefix);
}

export class PathSandbox {
  /** Canonical workspace root */
  readonly root: string;

  constructor(workspaceRoot: string) {
    this.root = canonicalizePath(workspaceRoot);
  }

  /**
   * Resolve a caller-supplied path to a canonical absolute path inside
   * the workspace, or throw SandboxViolationError.
   */
  resolve(rawPath: string): string {
    let canonical: string;
    try {
      canonical = canonicalizePath(resolve(this.root, rawPath));
    } catch (err) {
      // Unresolvable (symlink loop, unreadable parent): refuse it.
      const reason = err instanceof Error ? err.message : String(err);
      throw new SandboxViolationError(rawPath, `an unresolvable path (${reason})`, this.root);
    }

    if (!isWithinRoot(canonical, this.root)) {
      throw new SandboxViolationError(rawPath, canonical, this.root);
    }
    return canonical;
  }

  contains(absolutePath: string): boolean {
    return isWithinRoot(canonicalizePath(absolutePath), this.root);
  }

  /** Workspace-relative display form with `/` separators; the root is `.` */
  relative(absolutePath: string): string {
    const rel = relative(this.root, absolutePath);
    return rel === '' ? '.' : rel.split(sep).join('/');
  }
}
