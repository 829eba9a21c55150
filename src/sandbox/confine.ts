/**
 * Workspace confinement
 *
 * Resolves a plan path against a workspace root and canonicalizes it
 * (`..`, symlinks, and symlinks that point at nothing yet). The result
 * must be the root itself or live under it.
 */

import fs from 'node:fs';
import path from 'node:path';

const MAX_LINK_DEPTH = 40;

/**
 * Returns the canonical absolute target, or null when `relPath`
 * escapes `root`. Touches the filesystem only to read.
 */
export function resolveInside(root: string, relPath: string): string | null {
  const canonicalRoot = canonicalize(path.resolve(root));
  const target = canonicalize(path.resolve(canonicalRoot, relPath));
  return isWithin(canonicalRoot, target) ? target : null;
}

/**
 * The directory entry `relPath` names, without following a symlink at the
 * leaf: the canonical parent joined with the last segment. Null when
 * either the entry or what it resolves to escapes `root`.
 */
export function resolveEntryInside(root: string, relPath: string): string | null {
  const canonicalRoot = canonicalize(path.resolve(root));
  if (resolveInside(canonicalRoot, relPath) === null) return null;

  const named = path.resolve(canonicalRoot, relPath);
  if (named === canonicalRoot) return canonicalRoot;
  const entry = path.join(canonicalize(path.dirname(named)), path.basename(named));
  return isWithin(canonicalRoot, entry) ? entry : null;
}

export function isWithin(root: string, target: string): boolean {
  if (target === root) return true;
  const prefix = root.endsWith(path.sep) ? root : root + path.sep;
  return target.startsWith(prefix);
}

/**
 * Real path of `p`. For paths that do not exist yet, the real path of
 * the deepest existing ancestor joined with the rest. A dangling symlink
 * is resolved to where it points.
 */
export function canonicalize(p: string, depth = 0): string {
  if (depth > MAX_LINK_DEPTH) {
    throw new Error(`Too many symbolic links: ${p}`);
  }

  try {
    return fs.realpathSync.native(p);
  } catch (err) {
    if (!isErrno(err, 'ENOENT')) throw err;
  }

  const parent = path.dirname(p);
  if (parent === p) return p;

  const link = readLinkOrNull(p);
  if (link !== null) {
    return canonicalize(path.resolve(canonicalize(parent, depth + 1), link), depth + 1);
  }

  return path.join(canonicalize(parent, depth), path.basename(p));
}

function readLinkOrNull(p: string): string | null {
  try {
    return fs.readlinkSync(p);
  } catch {
    return null;
  }
}

export function isErrno(err: unknown, code: string): boolean {
  return err instanceof Error && 'code' in err && err.code === code;
}
