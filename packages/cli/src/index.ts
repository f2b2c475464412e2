// @tunnelkit/cli: barrel export

// ── Commands ────────────────────────────────────────────────────────
export { createProgram, toOverrides, VERSION } from './program.js';
export type { SessionFlags } from './program.js';
export { runConnect, formatDuration } from './commands/connect.js';
export type { ConnectCommandOptions, ConnectDeps, SignalSource } from './commands/connect.js';
export { runGetCookie } from './commands/get-cookie.js';
export type { GetCookieCommandOptions, GetCookieDeps } from './commands/get-cookie.js';
export { runClean } from './commands/clean.js';
export type { CleanResult } from './commands/clean.js';
export { runStatus, collectStatus } from './commands/status.js';
export type { StatusReport } from './commands/status.js';
export { runInit } from './commands/init.js';

// ── Terminal ────────────────────────────────────────────────────────
export { attachRenderer, describeState } from './utils/session-renderer.js';
export type { Notice } from './utils/session-renderer.js';
export { TerminalPromptIO } from './utils/terminal-prompt.js';
export type { PromptIO, AskOptions, TerminalPromptOptions } from './utils/terminal-prompt.js';

// ── Utilities ───────────────────────────────────────────────────────
export { CLIError, ExitCode, exitCodeFor, exitCodeForReason, handleError } from './utils/error-handler.js';
export { logger, setVerbose, isVerbose } from './utils/logger.js';
