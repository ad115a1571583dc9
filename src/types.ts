/** What a single `stat` says about a path. */
export type PathKind = 'none' | 'file' | 'directory' | 'other';

/** Path flavor used for separators and root detection. */
export type PathPlatform = 'posix' | 'win32';

/** Opaque identifier handed out by a session transport. */
export type SessionId = string;

/**
 * Candidate test used while ascending. Returning the directory itself (or
 * any other truthy value) accepts it.
 */
export type RootPredicate = (dir: string) => boolean | string | null | undefined;

/** Callback form used by `traverseParents`. */
export type ParentVisitor = (dir: string, startPath: string) => unknown;

/** Finds the root directory for a path, or `null` when none applies. */
export type RootResolver = (startPath: string) => string | null;

/** Marker list accepted by `rootPattern`: names or nested groups of names. */
export type MarkerInput = string | readonly MarkerInput[];

/** Listener invoked when a session terminates. Payload is transport-defined. */
export type ExitCallback = (...args: unknown[]) => void;

/**
 * Configuration a factory produces for one root. Only `name` and `cmd` are
 * required; everything else passes through to the transport untouched.
 */
export interface SessionConfig {
  /** Display name of the backend (e.g. "tsserver") */
  name: string;
  /** Command line used to launch the backend */
  cmd: string[];
  /** Extra environment for the backend process */
  cmdEnv?: Record<string, string>;
  /** Backend-specific settings blob */
  settings?: Record<string, unknown>;
  /** Called after the manager's own cleanup when the session exits */
  onExit?: ExitCallback;
  [extra: string]: unknown;
}

/** What the transport receives: the factory config with the root and composed exit hook filled in. */
export interface StartSessionConfig extends SessionConfig {
  rootDir: string;
  onExit: ExitCallback;
}

/** Builds the session config for a root directory. */
export type SessionFactory = (rootDir: string) => SessionConfig;

/**
 * The external collaborator that actually runs sessions.
 *
 * A transport must eventually invoke `config.onExit` for every session it
 * started, including ones that fail during startup.
 */
export interface SessionTransport<THandle> {
  startSession(config: StartSessionConfig): SessionId;
  getSessionById(id: SessionId): THandle | undefined;
}

/** Payload of `sessionAdded` / `sessionRemoved` events. */
export interface SessionEntryEvent {
  rootDir: string;
  sessionId: SessionId;
}

/** Events emitted by RootSessionManager. */
export interface RootSessionManagerEvents {
  sessionAdded: (event: SessionEntryEvent) => void;
  sessionRemoved: (event: SessionEntryEvent) => void;
}
