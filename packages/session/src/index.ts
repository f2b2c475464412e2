/**
 * @tunnelkit/session, the session engine: Login Driver, Tunnel
 * Supervisor and the Session Coordinator that sequences them.
 */

// ── Types ────────────────────────────────────────────────────────────
export { PageOutcome } from './types/index.js';
export type {
  SessionState,
  SessionStateTag,
  LoginAttempt,
  PageSnapshot,
  PageHandler,
  HandlerContext,
  LoginPrompter,
  TunnelHandle,
  TunnelStatus,
  TunnelDown,
  PromptKind,
  CredentialPrompt,
  LogLevel,
  LogLine,
  CoordinatorEvent,
  CoordinatorListener,
  SessionOperation,
} from './types/index.js';

// ── Login Driver ─────────────────────────────────────────────────────
export { LoginDriver } from './login/login-driver.js';
export type { LoginDriverOptions, LoginDriverConfig, LoginRunner } from './login/login-driver.js';
export { PlaywrightBrowserEngine } from './login/browser.js';
export type {
  BrowserEngine,
  BrowserSession,
  BrowserCookie,
  BrowserLaunchOptions,
} from './login/browser.js';
export {
  createDefaultHandlers,
  createNumberMatchHandler,
  createNgcPushHandler,
  sessionConflictHandler,
  pickAccountHandler,
  errorBannerHandler,
  emailHandler,
  passwordHandler,
  keepSignedInHandler,
  remoteNgcDeniedHandler,
  ngcErrorUsePasswordHandler,
  useAppInsteadHandler,
  verificationCodeChoiceHandler,
  otpEntryHandler,
} from './login/handlers.js';
export { createHttpCookieProbe } from './login/cookie-probe.js';
export type { CookieProbe, HttpCookieProbeOptions } from './login/cookie-probe.js';

// ── Tunnel Supervisor ────────────────────────────────────────────────
export { TunnelSupervisor } from './tunnel/supervisor.js';
export type { TunnelHooks, TunnelTiming, TunnelSupervisorOptions } from './tunnel/supervisor.js';
export {
  buildTunnelCommand,
  findExecutable,
  locateOpenconnect,
  resolveEscalationTool,
  findAskpass,
  needsPasswordPrompt,
  redactArgs,
  elevatedKillCommands,
} from './tunnel/escalation.js';
export type {
  TunnelCommand,
  TunnelCommandOptions,
  ResolveEnvironment,
  Elevation,
  HelperCommand,
  TeardownSignal,
} from './tunnel/escalation.js';
export {
  createInterfaceProbe,
  parseActiveUtun,
  SysfsInterfaceProbe,
  IfconfigInterfaceProbe,
  OsInterfaceProbe,
} from './tunnel/interface-probe.js';
export type { InterfaceProbe } from './tunnel/interface-probe.js';
export { ExecaProcessLauncher } from './tunnel/process-launcher.js';
export type { ProcessLauncher, TunnelProcess, ProcessExit } from './tunnel/process-launcher.js';
export {
  classifyLine,
  LineSplitter,
  OUTPUT_MARKERS,
  MARKER_SET_VERSION,
  ESCALATION_PROMPT,
  ELEVATED_PID_MARKER,
  parseElevatedPid,
} from './tunnel/markers.js';
export type { OutputMarker, MarkerKind } from './tunnel/markers.js';

// ── Session Coordinator ──────────────────────────────────────────────
export { SessionCoordinator } from './coordinator/session-coordinator.js';
export type {
  SessionCoordinatorOptions,
  TunnelRunner,
  LoginRunnerContext,
  ConnectOptions,
} from './coordinator/session-coordinator.js';
export { createSessionCoordinator, createLoginDriver } from './coordinator/factory.js';
export type { SessionDependencies } from './coordinator/factory.js';
export { PromptBroker } from './prompts/prompt-broker.js';

// ── Journal ──────────────────────────────────────────────────────────
export { createJournalSink, toJournalEvent } from './utils/session-journal.js';
export type { JournalSinkOptions } from './utils/session-journal.js';
