/**
 * @fileoverview Locate backend executables on PATH.
 *
 * Scans `PATH` (and `PATHEXT` on Windows) through the filesystem driver,
 * then any extra install directories the caller knows about. Lookups are
 * cached per resolver instance; there is no process-wide cache.
 *
 * @module utils/bin-resolver
 */

import { pathUtils, type PathUtils } from './path-utils.js';

/** Extensions tried on Windows when PATHEXT is unset */
const DEFAULT_PATHEXT = '.COM;.EXE;.BAT;.CMD';

export interface BinResolverOptions {
  /** Environment to read PATH/PATHEXT from (default: process.env) */
  env?: NodeJS.ProcessEnv;
  /** Path helpers and filesystem (default: current platform, real filesystem) */
  paths?: PathUtils;
  /** Directories searched after PATH, e.g. an installer's bin directory */
  extraDirs?: string[];
}

export interface BinResolver {
  /** Full path of `name`, or null when it is nowhere to be found. */
  find(name: string): string | null;
  /** True when every name resolves. */
  hasBins(...names: string[]): boolean;
  /** PATH with the directory containing `name` prepended (unchanged if not found or already present). */
  augmentedPath(name: string): string;
  /** Forget cached lookups. */
  reset(): void;
}

export function createBinResolver(options: BinResolverOptions = {}): BinResolver {
  const env = options.env ?? process.env;
  const paths = options.paths ?? pathUtils;
  const extraDirs = options.extraDirs ?? [];
  const delimiter = paths.platform === 'win32' ? ';' : ':';
  const cache = new Map<string, string | null>();

  const currentPath = (): string => env.PATH ?? env.Path ?? '';

  const candidateNames = (name: string): string[] => {
    if (paths.platform !== 'win32') return [name];
    const exts = (env.PATHEXT ?? DEFAULT_PATHEXT).split(';').filter(Boolean);
    const lower = name.toLowerCase();
    if (exts.some((ext) => lower.endsWith(ext.toLowerCase()))) return [name];
    return [name, ...exts.map((ext) => name + ext)];
  };

  const lookup = (name: string): string | null => {
    // Names with a separator are checked as given
    if (name.includes(paths.sep) || name.includes('/')) {
      return paths.fs.isExecutable(name) ? name : null;
    }

    const dirs = [...currentPath().split(delimiter).filter(Boolean), ...extraDirs];
    for (const dir of dirs) {
      for (const candidate of candidateNames(name)) {
        const full = paths.join(dir, candidate);
        if (paths.fs.isExecutable(full)) return full;
      }
    }
    return null;
  };

  const find = (name: string): string | null => {
    const cached = cache.get(name);
    if (cached !== undefined) return cached;
    const found = lookup(name);
    cache.set(name, found);
    return found;
  };

  return {
    find,
    hasBins: (...names) => names.every((name) => find(name) !== null),
    augmentedPath(name) {
      const path = currentPath();
      const found = find(name);
      if (found === null) return path;
      const dir = paths.dirname(found);
      if (dir === null || path.split(delimiter).includes(dir)) return path;
      return path ? `${dir}${delimiter}${path}` : dir;
    },
    reset: () => cache.clear(),
  };
}

/** One-off check that every binary is reachable, without caching. */
export function hasBins(names: string[], options: BinResolverOptions = {}): boolean {
  return createBinResolver(options).hasBins(...names);
}
