/**
 * @fileoverview Path primitives used by root discovery.
 *
 * Unlike `node:path`, these helpers work on a single separator per platform
 * and never normalize `.`/`..` segments; callers pass absolute, clean
 * segments. Two ascent primitives are provided:
 *
 * - `traverseParents` calls a visitor for each parent and stops at the first
 *   truthy result. The filesystem root is visited once, then traversal stops.
 * - `iterateParents` yields parents lazily and never yields the root.
 *
 * Both start from the real (symlink-free) form of the given path and give up
 * after MAX_PARENT_ASCENTS steps. A start path that cannot be resolved
 * (missing, looping symlinks, no permission) has no parents.
 *
 * @module utils/path-utils
 */

import { PathIOError } from '../errors.js';
import { nodeFilesystem, type FilesystemDriver } from '../fs-driver.js';
import { MAX_PARENT_ASCENTS } from '../config/traversal-limits.js';
import type { ParentVisitor, PathKind, PathPlatform } from '../types.js';

/** Nested groups of segments are flattened by `join`. */
export type PathPart = string | readonly PathPart[];

/** Result of a successful `traverseParents`. */
export interface TraversalMatch {
  /** The accepted ancestor */
  dir: string;
  /** The real-resolved starting path */
  path: string;
}

export interface PathUtils {
  readonly platform: PathPlatform;
  readonly sep: string;
  readonly fs: FilesystemDriver;
  isFsRoot(path: string): boolean;
  exists(path: string): PathKind;
  isDir(path: string): boolean;
  isFile(path: string): boolean;
  dirname(path: string | null | undefined): string | null;
  join(...parts: PathPart[]): string;
  realpath(path: string): string | null;
  traverseParents(path: string, visit: ParentVisitor): TraversalMatch | null;
  iterateParents(path: string): IterableIterator<string>;
}

export interface PathUtilsOptions {
  /** Separator and root rules (default: derived from process.platform) */
  platform?: PathPlatform;
  /** Filesystem access (default: node:fs) */
  fs?: FilesystemDriver;
}

const WIN32_ROOT_PATTERN = /^(?:[A-Za-z]:[\\/]?|[\\/])$/;

function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function flatten(parts: readonly PathPart[], out: string[] = []): string[] {
  for (const part of parts) {
    if (typeof part === 'string') {
      out.push(part);
    } else {
      flatten(part, out);
    }
  }
  return out;
}

export function detectPlatform(): PathPlatform {
  return process.platform === 'win32' ? 'win32' : 'posix';
}

/**
 * Create a set of path helpers bound to one platform flavor and filesystem.
 *
 * @example
 * ```typescript
 * const paths = createPathUtils({ platform: 'posix' });
 * paths.join('/proj', ['src', 'index.ts']); // '/proj/src/index.ts'
 * paths.dirname('/proj/src/');              // '/proj'
 * ```
 */
export function createPathUtils(options: PathUtilsOptions = {}): PathUtils {
  const platform = options.platform ?? detectPlatform();
  const fs = options.fs ?? nodeFilesystem;
  const sep = platform === 'win32' ? '\\' : '/';

  const escapedSep = escapeRegExp(sep);
  const trailingSepPattern = new RegExp(`${escapedSep}$`);
  const lastSegmentPattern = new RegExp(`${escapedSep}[^${escapedSep}]+$`);
  const repeatedSepPattern = new RegExp(`${escapedSep}+`, 'g');

  const isFsRoot = (path: string): boolean =>
    platform === 'win32' ? WIN32_ROOT_PATTERN.test(path) : path === '/';

  const exists = (path: string): PathKind => fs.stat(path)?.type ?? 'none';

  const dirname = (path: string | null | undefined): string | null => {
    if (path === null || path === undefined) return null;
    const result = path.replace(trailingSepPattern, '').replace(lastSegmentPattern, '');
    return result.length === 0 ? sep : result;
  };

  const join = (...parts: PathPart[]): string =>
    flatten(parts).join(sep).replace(repeatedSepPattern, sep);

  const warnBoundExceeded = (start: string): void => {
    console.warn(`[PathUtils] Stopped ascending from ${start} after ${MAX_PARENT_ASCENTS} steps`);
  };

  const resolveStart = (path: string): string | null => {
    try {
      return fs.realpath(path);
    } catch (err) {
      if (err instanceof PathIOError) {
        console.warn(`[PathUtils] Cannot resolve ${path}: ${err.message}`);
        return null;
      }
      throw err;
    }
  };

  const traverseParents = (path: string, visit: ParentVisitor): TraversalMatch | null => {
    const resolved = resolveStart(path);
    if (resolved === null) return null;

    let dir: string | null = resolved;
    for (let step = 0; step < MAX_PARENT_ASCENTS; step++) {
      dir = dirname(dir);
      if (dir === null) return null;
      if (visit(dir, resolved)) {
        return { dir, path: resolved };
      }
      if (isFsRoot(dir)) return null;
    }
    warnBoundExceeded(resolved);
    return null;
  };

  function* iterateParents(path: string): IterableIterator<string> {
    const resolved = resolveStart(path);
    if (resolved === null) return;

    let current = resolved;
    for (let step = 0; step < MAX_PARENT_ASCENTS; step++) {
      if (isFsRoot(current)) return;
      const parent = dirname(current);
      if (parent === null || isFsRoot(parent)) return;
      yield parent;
      current = parent;
    }
    warnBoundExceeded(resolved);
  }

  return {
    platform,
    sep,
    fs,
    isFsRoot,
    exists,
    isDir: (path) => exists(path) === 'directory',
    isFile: (path) => exists(path) === 'file',
    dirname,
    join,
    realpath: (path) => fs.realpath(path),
    traverseParents,
    iterateParents,
  };
}

/** Helpers for the current platform on the real filesystem. */
export const pathUtils: PathUtils = createPathUtils();

export const {
  sep,
  isFsRoot,
  exists,
  isDir,
  isFile,
  dirname,
  join,
  traverseParents,
  iterateParents,
} = pathUtils;
