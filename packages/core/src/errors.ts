/**
 * Custom error classes for @tunnelkit/core and the session engine.
 *
 * Every error carries a stable `code` so callers can branch without
 * matching on message text.
 */

/** Thrown when schema validation fails on input data. */
export class ValidationError extends Error {
  constructor(
    message: string,
    public readonly path: string,
    public readonly details: unknown[] = [],
  ) {
    super(message);
    this.name = 'ValidationError';
  }
}

/** Thrown when a file system read/write operation fails. */
export class FileSystemError extends Error {
  constructor(
    message: string,
    public readonly filePath: string,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = 'FileSystemError';
  }
}

/** Thrown when a file lock cannot be acquired after retries. */
export class LockTimeoutError extends Error {
  constructor(
    message: string,
    public readonly filePath: string,
  ) {
    super(message);
    this.name = 'LockTimeoutError';
  }
}

/** Thrown by the instance guard when another instance holds the lease. */
export class AlreadyRunningError extends Error {
  constructor(
    message: string,
    public readonly lockPath: string,
  ) {
    super(message);
    this.name = 'AlreadyRunningError';
  }
}

// ── Session engine taxonomy ─────────────────────────────────────────

export type LoginErrorCode =
  | 'Timeout'
  | 'PageUnrecognized'
  | 'BrowserLaunchFailed'
  | 'BrowserLost'
  | 'AuthenticationFailed'
  | 'Cancelled';

/** Failure of one Login Driver run. */
export class LoginError extends Error {
  constructor(
    public readonly code: LoginErrorCode,
    message: string,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = 'LoginError';
  }
}

export type TunnelErrorCode =
  | 'SpawnError'
  | 'RejectedCredential'
  | 'UnexpectedExit'
  | 'EstablishTimeout'
  | 'TeardownError'
  | 'Cancelled';

/** Failure reported by the Tunnel Supervisor. */
export class TunnelError extends Error {
  constructor(
    public readonly code: TunnelErrorCode,
    message: string,
    public readonly exitCode: number | null = null,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = 'TunnelError';
  }
}

export type CoordinatorErrorCode =
  | 'AlreadyConnecting'
  | 'NotConnected'
  | 'Busy'
  | 'NoPendingPrompt';

/** Rejected Session Coordinator request. */
export class CoordinatorError extends Error {
  constructor(
    public readonly code: CoordinatorErrorCode,
    message: string,
  ) {
    super(message);
    this.name = 'CoordinatorError';
  }
}

/** True for the `Cancelled` variant of either sub-component error. */
export function isCancellation(error: unknown): boolean {
  return (
    (error instanceof LoginError || error instanceof TunnelError) &&
    error.code === 'Cancelled'
  );
}

/** Stable reason code plus free-text detail for a terminal state. */
export interface FailureReason {
  code: string;
  detail: string;
  cause?: unknown;
}

const LOGIN_REASON_CODES: Record<LoginErrorCode, string> = {
  Timeout: 'login.timeout',
  PageUnrecognized: 'login.page-unrecognized',
  BrowserLaunchFailed: 'login.browser-launch-failed',
  BrowserLost: 'login.browser-lost',
  AuthenticationFailed: 'login.authentication-failed',
  Cancelled: 'login.cancelled',
};

const TUNNEL_REASON_CODES: Record<TunnelErrorCode, string> = {
  SpawnError: 'tunnel.spawn-error',
  RejectedCredential: 'tunnel.rejected-credential',
  UnexpectedExit: 'tunnel.unexpected-exit',
  EstablishTimeout: 'tunnel.establish-timeout',
  TeardownError: 'tunnel.teardown-error',
  Cancelled: 'tunnel.cancelled',
};

/** Maps any thrown value to a displayable failure reason. */
export function toFailureReason(error: unknown): FailureReason {
  if (error instanceof LoginError) {
    return { code: LOGIN_REASON_CODES[error.code], detail: error.message, cause: error };
  }
  if (error instanceof TunnelError) {
    return { code: TUNNEL_REASON_CODES[error.code], detail: error.message, cause: error };
  }
  if (error instanceof Error) {
    return { code: 'internal', detail: error.message, cause: error };
  }
  return { code: 'internal', detail: String(error), cause: error };
}
