/**
 * @fileoverview Error types raised by rootbound.
 *
 * "Not found" is never an error here: lookups that find nothing return
 * `null` (or `'none'` from `exists`). Only faults the caller has to act on
 * are thrown.
 *
 * @module errors
 */

/**
 * A filesystem call failed for a reason other than the path not existing
 * (permission denied, I/O error, too many symlinks, ...).
 */
export class PathIOError extends Error {
  readonly code = 'E_PATH_IO';

  constructor(
    message: string,
    public readonly path: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'PathIOError';
  }
}

/**
 * The session factory threw, or returned a config missing required fields.
 * Raised before any session is started.
 */
export class SessionConfigError extends Error {
  readonly code = 'E_SESSION_CONFIG';

  constructor(
    message: string,
    public readonly rootDir: string,
    public readonly issues: string[] = [],
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'SessionConfigError';
  }
}

/** The session transport refused to start a session. */
export class SessionStartError extends Error {
  readonly code = 'E_SESSION_START';

  constructor(
    message: string,
    public readonly rootDir: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'SessionStartError';
  }
}

/** Installer description failed validation. */
export class InstallerConfigError extends Error {
  readonly code = 'E_INSTALLER_CONFIG';

  constructor(
    message: string,
    public readonly issues: string[] = [],
  ) {
    super(message);
    this.name = 'InstallerConfigError';
  }
}

/** Node errno codes that mean "the path is not there". */
const NOT_FOUND_CODES = new Set(['ENOENT', 'ENOTDIR']);

/** True for an fs error whose code reports a missing path. */
export function isNotFoundError(err: unknown): boolean {
  if (!(err instanceof Error)) return false;
  const code = (err as NodeJS.ErrnoException).code;
  return code !== undefined && NOT_FOUND_CODES.has(code);
}

/** Extract a printable message from an unknown thrown value. */
export function getErrorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
