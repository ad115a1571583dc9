/**
 * @fileoverview Filesystem driver seam.
 *
 * Everything that touches the disk goes through a FilesystemDriver so the
 * path layer can run against the real filesystem or an in-memory stand-in.
 * Missing paths come back as `null`; every other failure is a PathIOError.
 *
 * @module fs-driver
 */

import { accessSync, constants, realpathSync, statSync, type Stats } from 'node:fs';
import { isNotFoundError, getErrorMessage, PathIOError } from './errors.js';
import type { PathKind } from './types.js';

/** Minimal stat result the path layer needs. */
export interface FileStat {
  type: Exclude<PathKind, 'none'>;
}

export interface FilesystemDriver {
  /** Stat a path (following symlinks). `null` when it does not exist. */
  stat(path: string): FileStat | null;
  /** Resolve symlinks and relative segments. `null` when the path does not exist. */
  realpath(path: string): string | null;
  /** True when the path is a regular file the current user may execute. */
  isExecutable(path: string): boolean;
}

function kindOf(stats: Stats): FileStat['type'] {
  if (stats.isFile()) return 'file';
  if (stats.isDirectory()) return 'directory';
  return 'other';
}

/** FilesystemDriver backed by synchronous `node:fs` calls. */
export const nodeFilesystem: FilesystemDriver = {
  stat(path) {
    try {
      return { type: kindOf(statSync(path)) };
    } catch (err) {
      if (isNotFoundError(err)) return null;
      throw new PathIOError(`stat failed for ${path}: ${getErrorMessage(err)}`, path, { cause: err });
    }
  },

  realpath(path) {
    try {
      return realpathSync(path);
    } catch (err) {
      if (isNotFoundError(err)) return null;
      throw new PathIOError(`realpath failed for ${path}: ${getErrorMessage(err)}`, path, { cause: err });
    }
  },

  isExecutable(path) {
    const stat = nodeFilesystem.stat(path);
    if (stat?.type !== 'file') return false;
    try {
      accessSync(path, constants.X_OK);
      return true;
    } catch {
      // Not executable by this user
      return false;
    }
  },
};
