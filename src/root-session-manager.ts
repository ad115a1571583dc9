/**
 * @fileoverview One session per project root.
 *
 * RootSessionManager maps root directories to session ids. The first `add`
 * for a root builds a config through the injected factory and starts a
 * session through the transport; later `add` calls for the same root reuse
 * that session until it exits. Exit notifications remove the entry before
 * any exit callback the factory supplied runs.
 *
 * All methods are synchronous and expect to be called from the event loop
 * that also delivers exit notifications, so no locking is needed.
 *
 * @module root-session-manager
 */

import { EventEmitter } from 'node:events';
import { z } from 'zod';
import { loadSettings, type Settings } from './config/settings.js';
import { SessionConfigError, SessionStartError, getErrorMessage } from './errors.js';
import { addHookBefore } from './utils/hooks.js';
import type {
  ExitCallback,
  SessionConfig,
  SessionEntryEvent,
  SessionFactory,
  SessionId,
  SessionTransport,
  StartSessionConfig,
} from './types.js';

export type { RootSessionManagerEvents } from './types.js';

/** Fields every factory config must carry. Unknown fields pass through. */
const sessionConfigSchema = z
  .object({
    name: z.string().trim().min(1),
    cmd: z.array(z.string().min(1)).nonempty(),
    cmdEnv: z.record(z.string(), z.string()).optional(),
    settings: z.record(z.string(), z.unknown()).optional(),
    onExit: z
      .custom<ExitCallback>((value) => typeof value === 'function', { message: 'Expected a function' })
      .optional(),
  })
  .passthrough();

export interface RootSessionManagerOptions<THandle> {
  /** Builds the session config for a root directory */
  factory: SessionFactory;
  /** Starts sessions and looks them up by id */
  transport: SessionTransport<THandle>;
  /** Log every add/remove (default: `settings.debug`) */
  debug?: boolean;
  /** Source of defaults (default: loaded from process.env) */
  settings?: Pick<Settings, 'debug'>;
}

/**
 * Registry of live sessions keyed by root directory.
 *
 * @example
 * ```typescript
 * const manager = new RootSessionManager({
 *   factory: (rootDir) => ({ name: 'tsserver', cmd: ['tsserver', '--stdio'] }),
 *   transport,
 * });
 * const root = findGitAncestor(file);
 * const sessionId = manager.add(root); // null when no root was found
 * ```
 *
 * @fires RootSessionManager#sessionAdded - A session was started for a root
 * @fires RootSessionManager#sessionRemoved - A root's session exited
 */
export class RootSessionManager<THandle> extends EventEmitter {
  private readonly sessions = new Map<string, SessionId>();
  private readonly factory: SessionFactory;
  private readonly transport: SessionTransport<THandle>;
  private readonly debugMode: boolean;

  constructor(options: RootSessionManagerOptions<THandle>) {
    super();
    this.factory = options.factory;
    this.transport = options.transport;
    this.debugMode = options.debug ?? (options.settings ?? loadSettings()).debug;
  }

  /** Number of roots with a live entry. */
  get size(): number {
    return this.sessions.size;
  }

  /**
   * Return the session for `rootDir`, starting one if none is live.
   *
   * Returns `null` without side effects when `rootDir` is missing or empty,
   * so a resolver result can be passed straight in.
   *
   * @throws SessionConfigError when the factory throws or returns an invalid config
   * @throws SessionStartError when the transport fails to start the session
   */
  add(rootDir: string | null | undefined): SessionId | null {
    if (!rootDir) return null;

    const existing = this.sessions.get(rootDir);
    if (existing !== undefined) return existing;

    const config = this.buildConfig(rootDir);

    let sessionId: SessionId | undefined;
    let exitedDuringStart = false;
    const cleanup = (): void => {
      if (sessionId === undefined) {
        exitedDuringStart = true;
        return;
      }
      this.remove(rootDir, sessionId);
    };

    const startConfig: StartSessionConfig = {
      ...config,
      rootDir,
      onExit: addHookBefore(config.onExit, cleanup),
    };

    try {
      sessionId = this.transport.startSession(startConfig);
    } catch (err) {
      throw new SessionStartError(
        `Failed to start ${config.name} for ${rootDir}: ${getErrorMessage(err)}`,
        rootDir,
        { cause: err },
      );
    }

    if (exitedDuringStart) {
      console.warn(`[RootSessionManager] ${config.name} for ${rootDir} exited during startup`);
      return null;
    }

    this.sessions.set(rootDir, sessionId);
    this.debug(`Started ${config.name} (${sessionId}) for ${rootDir}`);
    this.emit('sessionAdded', { rootDir, sessionId } satisfies SessionEntryEvent);
    return sessionId;
  }

  /**
   * Live session handles. Ids the transport no longer knows are skipped;
   * they belong to sessions whose exit notification has not arrived yet.
   */
  clients(): THandle[] {
    const handles: THandle[] = [];
    for (const sessionId of this.sessions.values()) {
      const handle = this.transport.getSessionById(sessionId);
      if (handle !== undefined) {
        handles.push(handle);
      }
    }
    return handles;
  }

  /** Session id recorded for `rootDir`, if any. */
  get(rootDir: string): SessionId | undefined {
    return this.sessions.get(rootDir);
  }

  /** Live handle for `rootDir`, resolved through the transport. */
  getHandle(rootDir: string): THandle | undefined {
    const sessionId = this.sessions.get(rootDir);
    return sessionId === undefined ? undefined : this.transport.getSessionById(sessionId);
  }

  has(rootDir: string): boolean {
    return this.sessions.has(rootDir);
  }

  /** Root directories with a live entry, in insertion order. */
  roots(): string[] {
    return Array.from(this.sessions.keys());
  }

  private buildConfig(rootDir: string): SessionConfig {
    let raw: unknown;
    try {
      raw = this.factory(rootDir);
    } catch (err) {
      throw new SessionConfigError(
        `Session factory failed for ${rootDir}: ${getErrorMessage(err)}`,
        rootDir,
        [],
        { cause: err },
      );
    }

    const result = sessionConfigSchema.safeParse(raw);
    if (!result.success) {
      const issues = result.error.issues.map((issue) =>
        issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message,
      );
      throw new SessionConfigError(
        `Invalid session config for ${rootDir}: ${issues.join('; ')}`,
        rootDir,
        issues,
      );
    }
    return result.data;
  }

  /** Drop the entry for `rootDir` if it still belongs to `sessionId`. */
  private remove(rootDir: string, sessionId: SessionId): void {
    if (this.sessions.get(rootDir) !== sessionId) {
      this.debug(`Ignoring exit of ${sessionId}: ${rootDir} has moved on`);
      return;
    }
    this.sessions.delete(rootDir);
    this.debug(`Session ${sessionId} for ${rootDir} exited`);
    this.emit('sessionRemoved', { rootDir, sessionId } satisfies SessionEntryEvent);
  }

  private debug(message: string): void {
    if (this.debugMode) {
      console.log(`[RootSessionManager] ${message}`);
    }
  }
}

/** Function-style constructor for callers that prefer closures over classes. */
export function createRootSessionManager<THandle>(
  factory: SessionFactory,
  transport: SessionTransport<THandle>,
  options: Pick<RootSessionManagerOptions<THandle>, 'debug' | 'settings'> = {},
): RootSessionManager<THandle> {
  return new RootSessionManager({ factory, transport, ...options });
}
