/**
 * @fileoverview Environment-driven settings.
 *
 * Settings are parsed once per call into a plain frozen object and passed
 * explicitly to whatever needs them. Nothing here is cached at module level.
 *
 * Recognized variables:
 * - `ROOTBOUND_DEBUG`       - "1"/"true" enables debug logging
 * - `ROOTBOUND_INSTALL_DIR` - overrides the base install directory
 * - `XDG_CACHE_HOME`        - host cache directory (posix)
 * - `LOCALAPPDATA`          - host cache directory (win32)
 *
 * @module config/settings
 */

import { homedir } from 'node:os';
import { z } from 'zod';
import { createPathUtils, type PathUtils } from '../utils/path-utils.js';

/** Installer subdirectory created under the host cache directory. */
export const INSTALL_DIR_NAME = 'rootbound';

const booleanFlagSchema = z
  .string()
  .trim()
  .toLowerCase()
  .transform((v) => v === '1' || v === 'true' || v === 'yes');

const nonEmptyPathSchema = z.string().trim().min(1);

const envSchema = z.object({
  ROOTBOUND_DEBUG: booleanFlagSchema.optional(),
  ROOTBOUND_INSTALL_DIR: nonEmptyPathSchema.optional().catch(undefined),
  XDG_CACHE_HOME: nonEmptyPathSchema.optional().catch(undefined),
  LOCALAPPDATA: nonEmptyPathSchema.optional().catch(undefined),
});

export interface Settings {
  /** Emit debug-level log lines */
  debug: boolean;
  /** Base directory installers place backend binaries under */
  baseInstallDir: string;
}

export interface LoadSettingsOptions {
  /** Home directory fallback (default: os.homedir()) */
  home?: string;
  /** Path flavor used to build directories (default: current platform) */
  paths?: PathUtils;
}

/**
 * Compute the base install directory from the host's cache-directory
 * convention: `$XDG_CACHE_HOME`, then `%LOCALAPPDATA%` on Windows, then
 * `~/.cache`.
 */
export function resolveBaseInstallDir(
  env: NodeJS.ProcessEnv = process.env,
  options: LoadSettingsOptions = {},
): string {
  const parsed = envSchema.parse(env);
  const paths = options.paths ?? createPathUtils();
  if (parsed.ROOTBOUND_INSTALL_DIR) return parsed.ROOTBOUND_INSTALL_DIR;

  const cacheDir =
    parsed.XDG_CACHE_HOME ??
    (paths.platform === 'win32' ? parsed.LOCALAPPDATA : undefined) ??
    paths.join(options.home ?? homedir(), '.cache');
  return paths.join(cacheDir, INSTALL_DIR_NAME);
}

/** Parse settings from an environment map. */
export function loadSettings(
  env: NodeJS.ProcessEnv = process.env,
  options: LoadSettingsOptions = {},
): Readonly<Settings> {
  const parsed = envSchema.parse(env);
  return Object.freeze({
    debug: parsed.ROOTBOUND_DEBUG ?? false,
    baseInstallDir: resolveBaseInstallDir(env, options),
  });
}
