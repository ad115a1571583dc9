/**
 * @fileoverview Helpers for building session factories.
 *
 * @module session-factory
 */

import { HookList } from './utils/hooks.js';
import { deepExtend, lookupSection } from './utils/settings-tree.js';
import type { ExitCallback, SessionConfig, SessionFactory } from './types.js';

/** Values applied under every config a factory returns. */
export type SessionDefaults = Partial<SessionConfig>;

/**
 * Wrap `factory` so each config it returns is layered over `defaults`.
 *
 * - `settings` are deep-merged (factory wins)
 * - `cmdEnv` is shallow-merged (factory wins)
 * - both `onExit` callbacks run: defaults first, then the factory's
 * - every other field from the factory replaces the default
 */
export function withSessionDefaults(defaults: SessionDefaults, factory: SessionFactory): SessionFactory {
  return (rootDir) => {
    const config = factory(rootDir);

    const exitHooks = new HookList<unknown[]>().append(defaults.onExit).append(config.onExit);
    const onExit: ExitCallback | undefined = exitHooks.size > 0 ? exitHooks.toCallback() : undefined;

    return {
      ...defaults,
      ...config,
      cmdEnv: { ...defaults.cmdEnv, ...config.cmdEnv },
      settings: deepExtend({}, defaults.settings ?? {}, config.settings ?? {}),
      onExit,
    };
  };
}

/**
 * Answer a backend's request for one settings section (e.g.
 * `"typescript.format"`). Missing sections come back as `null`, which is
 * what configuration requests expect for "no value".
 */
export function getSessionSetting(config: Pick<SessionConfig, 'settings'>, section: string): unknown {
  return lookupSection(config.settings ?? {}, section) ?? null;
}
