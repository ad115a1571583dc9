/**
 * @fileoverview rootbound public API.
 *
 * Root discovery (`rootPattern`, `searchAncestors`, ...), the per-root
 * session registry (`RootSessionManager`) and the helpers around them.
 *
 * @module index
 */

export {
  PathIOError,
  SessionConfigError,
  SessionStartError,
  InstallerConfigError,
  isNotFoundError,
} from './errors.js';
export { nodeFilesystem, type FileStat, type FilesystemDriver } from './fs-driver.js';
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
  HookList,
  addHookBefore,
  addHookAfter,
  deepExtend,
  isPlainObject,
  lookupSection,
  createBinResolver,
  hasBins,
  type PathPart,
  type PathUtils,
  type PathUtilsOptions,
  type TraversalMatch,
  type Hook,
  type SettingsTree,
  type BinResolver,
  type BinResolverOptions,
} from './utils/index.js';
export {
  searchAncestors,
  rootPattern,
  rootPatternWith,
  findGitAncestor,
  findNodeModulesAncestor,
  findPackageJsonAncestor,
} from './root-resolver.js';
export {
  RootSessionManager,
  createRootSessionManager,
  type RootSessionManagerOptions,
} from './root-session-manager.js';
export { FileSessionRouter, type RoutedFile } from './file-session-router.js';
export { withSessionDefaults, getSessionSetting, type SessionDefaults } from './session-factory.js';
export {
  createNpmInstallerInfo,
  formatVsPackageUrl,
  type InstallInfo,
  type NpmInstaller,
  type NpmInstallerConfig,
} from './installer-info.js';
export { INSTALL_DIR_NAME, loadSettings, resolveBaseInstallDir, type Settings } from './config/settings.js';
export { MAX_PARENT_ASCENTS } from './config/traversal-limits.js';
export type * from './types.js';
