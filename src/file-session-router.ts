/**
 * @fileoverview Route an edited file to the session for its project root.
 *
 * Joins a root resolver and a RootSessionManager: resolve the file's root,
 * then `add` it. Files without a root get no session.
 *
 * @module file-session-router
 */

import type { RootSessionManager } from './root-session-manager.js';
import type { RootResolver, SessionId } from './types.js';

export interface RoutedFile {
  filePath: string;
  rootDir: string;
  sessionId: SessionId;
}

export class FileSessionRouter<THandle> {
  constructor(
    private readonly resolveRoot: RootResolver,
    private readonly manager: RootSessionManager<THandle>,
  ) {}

  /**
   * Find or start the session that should service `filePath`.
   * Returns null when the file has no root or its session died during startup.
   */
  route(filePath: string): RoutedFile | null {
    const rootDir = this.resolveRoot(filePath);
    if (rootDir === null) return null;

    const sessionId = this.manager.add(rootDir);
    if (sessionId === null) return null;
    return { filePath, rootDir, sessionId };
  }

  /** Live session handle for `filePath`, without starting anything. */
  handleFor(filePath: string): THandle | undefined {
    const rootDir = this.resolveRoot(filePath);
    if (rootDir === null) return undefined;
    return this.manager.getHandle(rootDir);
  }
}
