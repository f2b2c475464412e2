import type {
  CancellationToken,
  FailureReason,
  LoginMode,
  SessionCookie,
} from '@tunnelkit/core';

// ── Session state ───────────────────────────────────────────────────

/** One run of the browser automation. */
export interface LoginAttempt {
  id: string;
  mode: LoginMode;
  /** Epoch ms after which the run fails with Timeout */
  deadline: number;
  /** Page resets performed so far */
  retryCount: number;
  /** `<handler>@<url>` of the last page a handler acted on */
  lastHandledPage: string | null;
}

/**
 * Connection lifecycle phase. Written only by the Session Coordinator.
 * `Failed` is a resting state: it accepts `connect()` like `Idle`.
 */
export type SessionState =
  | { tag: 'Idle'; warning?: string }
  | { tag: 'LoggingIn'; attempt: LoginAttempt }
  | { tag: 'StartingTunnel'; interfaceName: string }
  | { tag: 'Connected'; interfaceName: string; since: string }
  | { tag: 'Disconnecting' }
  | { tag: 'Failed'; reason: FailureReason };

export type SessionStateTag = SessionState['tag'];

// ── Page handlers ───────────────────────────────────────────────────

/** Narrow view of the current browser page handed to page handlers. */
export interface PageSnapshot {
  readonly url: string;
  readonly title: string;
  isVisible(selector: string): Promise<boolean>;
  /** Trimmed inner text of the first match, or null if nothing matches */
  textOf(selector: string): Promise<string | null>;
  /** False when nothing matches */
  isChecked(selector: string): Promise<boolean>;
  fill(selector: string, value: string): Promise<void>;
  click(selector: string): Promise<void>;
}

export type PageOutcome =
  | { kind: 'NotApplicable' }
  | { kind: 'Handled'; note?: string }
  | { kind: 'TerminalSuccess'; cookie: SessionCookie }
  | { kind: 'TerminalFailure'; reason: string };

export const PageOutcome = {
  notApplicable: (): PageOutcome => ({ kind: 'NotApplicable' }),
  handled: (note?: string): PageOutcome => ({ kind: 'Handled', note }),
  success: (cookie: SessionCookie): PageOutcome => ({ kind: 'TerminalSuccess', cookie }),
  failure: (reason: string): PageOutcome => ({ kind: 'TerminalFailure', reason }),
} as const;

/** User interaction available to page handlers during a login run. */
export interface LoginPrompter {
  /** Returns null when the prompt was dismissed or the run cancelled. */
  requestText(message: string, token: CancellationToken): Promise<string | null>;
  requestSecret(message: string, token: CancellationToken): Promise<string | null>;
  /** Number-matching MFA: show the code the user must enter on their device. */
  showMfaCode(code: string): void;
}

export interface HandlerContext {
  email: string | null;
  prompter: LoginPrompter;
  token: CancellationToken;
  log(message: string): void;
}

export interface PageHandler {
  readonly name: string;
  /** May act again on the same URL (e.g. a page that stays up while waiting) */
  readonly repeatable?: boolean;
  inspect(snapshot: PageSnapshot, context: HandlerContext): Promise<PageOutcome>;
}

// ── Tunnel ──────────────────────────────────────────────────────────

/** A running VPN binary instance. */
export interface TunnelHandle {
  readonly id: string;
  readonly pid: number | null;
  readonly interfaceName: string;
  /** Spawned command line with the cookie value redacted */
  readonly command: { file: string; args: string[] };
  readonly startedAt: string;
}

export type TunnelStatus =
  | { kind: 'Starting' }
  | { kind: 'Up' }
  | { kind: 'Down' }
  | { kind: 'Exited'; code: number | null };

/** Why a connected tunnel stopped being watched. */
export type TunnelDown =
  | { reason: 'cancelled' }
  | { reason: 'exited'; code: number | null; signal: string | null }
  | { reason: 'interface-down' };

// ── Prompts and notifications ───────────────────────────────────────

export type PromptKind = 'login-text' | 'login-secret' | 'escalation-password' | 'mfa';

/** Interactive request surfaced to the caller; at most one is pending. */
export interface CredentialPrompt {
  readonly id: string;
  readonly kind: PromptKind;
  readonly text: string;
  /** Input should be masked */
  readonly secret: boolean;
  respond(value: string): void;
  cancel(): void;
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogLine {
  level: LogLevel;
  message: string;
  source: 'coordinator' | 'login' | 'tunnel';
  timestamp: string;
}

export type CoordinatorEvent =
  | { type: 'state'; state: SessionState; operationId: string | null }
  | { type: 'log'; line: LogLine }
  | { type: 'prompt'; prompt: CredentialPrompt }
  | { type: 'prompt-settled'; promptId: string }
  | { type: 'mfa-code'; code: string }
  | { type: 'cookie-purged' };

export type CoordinatorListener = (event: CoordinatorEvent) => void;

/** Handle returned by `connect()` / `disconnect()`; never rejects. */
export interface SessionOperation {
  readonly id: string;
  readonly kind: 'connect' | 'disconnect';
  /** Settles with the state the operation ended in */
  readonly done: Promise<SessionState>;
}
