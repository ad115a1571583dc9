/**
 * @fileoverview Utility module exports.
 *
 * This module re-exports all utility classes and functions for easy import.
 *
 * @module utils
 */

export {
  createPathUtils,
  detectPlatform,
  pathUtils,
  sep,
  isFsRoot,
  exists,
  isDir,
  isFile,
  dirname,
  join,
  traverseParents,
  iterateParents,
  type PathPart,
  type PathUtils,
  type PathUtilsOptions,
  type TraversalMatch,
} from './path-utils.js';
export { HookList, addHookBefore, addHookAfter, type Hook } from './hooks.js';
export { deepExtend, isPlainObject, lookupSection, type SettingsTree } from './settings-tree.js';
export { createBinResolver, hasBins, type BinResolver, type BinResolverOptions } from './bin-resolver.js';
