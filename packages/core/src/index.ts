/**
 * @tunnelkit/core: Foundational library for the tunnelkit session engine.
 *
 * Provides configuration, the credential store, the single-instance
 * guard, cancellation primitives, the session journal and the error
 * taxonomy used by all downstream packages.
 */

// ── Configuration Subsystem ──────────────────────────────────────────
export {
  VpnConfigSchema,
  TimingConfigSchema,
  LoginModeSchema,
  loadConfig,
  readConfigFile,
  resolveConfig,
  saveConfig,
} from './config/index.js';
export type {
  VpnConfig,
  VpnConfigInput,
  TimingConfig,
  LoginMode,
  ConfigOverrides,
} from './config/index.js';

// ── Credential Store ─────────────────────────────────────────────────
export {
  SessionCookieSchema,
  FileCredentialStore,
  MemoryCredentialStore,
} from './credential-store/index.js';
export type { SessionCookie, CredentialStore } from './credential-store/index.js';

// ── Instance Guard ───────────────────────────────────────────────────
export { acquireInstanceLease, withInstanceLease } from './instance-guard.js';
export type { Lease, InstanceGuardOptions } from './instance-guard.js';

// ── Cancellation ─────────────────────────────────────────────────────
export { CancellationToken, sleep } from './cancellation.js';

// ── Session Journal ──────────────────────────────────────────────────
export {
  SessionEventSchema,
  SessionEventType,
  appendSessionEvent,
  createSessionEvent,
  readSessionEvents,
} from './events/index.js';
export type { SessionEvent, EventFilters } from './events/index.js';

// ── Error Classes ───────────────────────────────────────────────────
export {
  ValidationError,
  FileSystemError,
  LockTimeoutError,
  AlreadyRunningError,
  LoginError,
  TunnelError,
  CoordinatorError,
  isCancellation,
  toFailureReason,
} from './errors.js';
export type {
  LoginErrorCode,
  TunnelErrorCode,
  CoordinatorErrorCode,
  FailureReason,
} from './errors.js';

// ── Utility Functions ───────────────────────────────────────────────
export { atomicWrite, removeFile } from './utils/atomic-write.js';
export {
  getDataDir,
  getCookiePath,
  getInstanceLockPath,
  getBrowserProfileDir,
  getConfigPath,
  getEventsPath,
} from './utils/paths.js';
