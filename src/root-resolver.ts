/**
 * @fileoverview Project root discovery.
 *
 * A root is the nearest directory, starting at the path itself and walking
 * up, that a predicate accepts. `rootPattern` builds the common predicate
 * "contains one of these marker files or directories".
 *
 * The filesystem root is never produced by the parent walk, so it is only
 * considered when the start path is the filesystem root itself.
 *
 * @module root-resolver
 */

import { PathIOError } from './errors.js';
import { pathUtils, type PathUtils } from './utils/path-utils.js';
import type { MarkerInput, PathKind, RootPredicate, RootResolver } from './types.js';

function flattenMarkers(markers: readonly MarkerInput[], out: string[] = []): string[] {
  for (const marker of markers) {
    if (typeof marker === 'string') {
      out.push(marker);
    } else {
      flattenMarkers(marker, out);
    }
  }
  return out;
}

/**
 * Stat a candidate without letting I/O faults escape a predicate.
 * Unreadable entries count as absent.
 */
function kindOrNone(paths: PathUtils, path: string): PathKind {
  try {
    return paths.exists(path);
  } catch (err) {
    if (err instanceof PathIOError) {
      console.warn(`[RootResolver] Treating ${path} as absent: ${err.message}`);
      return 'none';
    }
    throw err;
  }
}

function realpathOrNull(paths: PathUtils, path: string): string | null {
  try {
    return paths.realpath(path);
  } catch (err) {
    if (err instanceof PathIOError) {
      console.warn(`[RootResolver] Cannot resolve ${path}: ${err.message}`);
      return null;
    }
    throw err;
  }
}

/**
 * Return the first of `startPath` and its ancestors accepted by `predicate`.
 *
 * The start path is resolved to its real form first; a path that does not
 * exist or cannot be resolved has no root and yields `null`.
 *
 * @param startPath - File or directory to start from
 * @param predicate - Pure test applied to each candidate directory
 * @param paths - Path helpers (default: current platform, real filesystem)
 */
export function searchAncestors(
  startPath: string,
  predicate: RootPredicate,
  paths: PathUtils = pathUtils,
): string | null {
  if (typeof predicate !== 'function') {
    throw new TypeError('searchAncestors: predicate must be a function');
  }

  const resolved = realpathOrNull(paths, startPath);
  if (resolved === null) return null;

  if (predicate(resolved)) return resolved;
  for (const dir of paths.iterateParents(resolved)) {
    if (predicate(dir)) return dir;
  }
  return null;
}

/**
 * Build a resolver that finds the nearest directory containing any of the
 * given markers. Markers are tried in the order given for each directory
 * before moving up a level.
 *
 * @example
 * ```typescript
 * const findRoot = rootPattern('package.json', ['tsconfig.json', '.git']);
 * findRoot('/work/app/src/index.ts'); // '/work/app' or null
 * ```
 */
export function rootPattern(...markers: MarkerInput[]): RootResolver {
  return rootPatternWith(pathUtils, ...markers);
}

/** `rootPattern` against explicit path helpers. */
export function rootPatternWith(paths: PathUtils, ...markers: MarkerInput[]): RootResolver {
  const patterns = flattenMarkers(markers);
  const matcher = (dir: string): boolean =>
    patterns.some((pattern) => kindOrNone(paths, paths.join(dir, pattern)) !== 'none');

  return (startPath) => searchAncestors(startPath, matcher, paths);
}

/** Nearest ancestor holding a `.git` directory. */
export function findGitAncestor(startPath: string, paths: PathUtils = pathUtils): string | null {
  return searchAncestors(
    startPath,
    (dir) => kindOrNone(paths, paths.join(dir, '.git')) === 'directory',
    paths,
  );
}

/** Nearest ancestor holding a `node_modules` directory. */
export function findNodeModulesAncestor(startPath: string, paths: PathUtils = pathUtils): string | null {
  return searchAncestors(
    startPath,
    (dir) => kindOrNone(paths, paths.join(dir, 'node_modules')) === 'directory',
    paths,
  );
}

/** Nearest ancestor holding a `package.json` file. */
export function findPackageJsonAncestor(startPath: string, paths: PathUtils = pathUtils): string | null {
  return searchAncestors(
    startPath,
    (dir) => kindOrNone(paths, paths.join(dir, 'package.json')) === 'file',
    paths,
  );
}
