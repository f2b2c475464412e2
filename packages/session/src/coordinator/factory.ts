import { FileCredentialStore, getBrowserProfileDir } from '@tunnelkit/core';
import type { CredentialStore, VpnConfig } from '@tunnelkit/core';
import { PlaywrightBrowserEngine } from '../login/browser.js';
import type { BrowserEngine } from '../login/browser.js';
import { createHttpCookieProbe } from '../login/cookie-probe.js';
import { createDefaultHandlers } from '../login/handlers.js';
import { LoginDriver } from '../login/login-driver.js';
import type { LoginRunner } from '../login/login-driver.js';
import { TunnelSupervisor } from '../tunnel/supervisor.js';
import type { PageHandler } from '../types/index.js';
import { SessionCoordinator } from './session-coordinator.js';
import type { LoginRunnerContext, TunnelRunner } from './session-coordinator.js';

export interface SessionDependencies {
  store?: CredentialStore;
  engine?: BrowserEngine;
  tunnel?: TunnelRunner;
  handlers?: PageHandler[];
}

/**
 * Builds the Login Driver with the production browser, the default
 * handler list and (if enabled) the stored-cookie probe.
 */
export function createLoginDriver(
  config: VpnConfig,
  dataDir: string,
  context: LoginRunnerContext,
  deps: SessionDependencies = {},
): LoginRunner {
  return new LoginDriver({
    config,
    engine: deps.engine ?? new PlaywrightBrowserEngine(),
    store: deps.store ?? new FileCredentialStore(dataDir),
    handlers: deps.handlers ?? createDefaultHandlers(),
    prompter: context.prompter,
    profileDir: getBrowserProfileDir(dataDir),
    probe: config.probeStoredCookie
      ? createHttpCookieProbe({ portalUrl: config.portalUrl, userAgent: config.userAgent })
      : undefined,
    onLog: context.onLog,
    onAttempt: context.onAttempt,
  });
}

/** Wires a Session Coordinator over the real store, browser and tunnel. */
export function createSessionCoordinator(
  config: VpnConfig,
  dataDir: string,
  deps: SessionDependencies = {},
): SessionCoordinator {
  const store = deps.store ?? new FileCredentialStore(dataDir);
  return new SessionCoordinator({
    config,
    store,
    tunnel: deps.tunnel ?? new TunnelSupervisor({ timing: config.timing }),
    createLogin: (context) => createLoginDriver(config, dataDir, context, { ...deps, store }),
  });
}
