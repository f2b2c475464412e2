import {
  CancellationToken,
  FileCredentialStore,
  loadConfig,
  withInstanceLease,
} from '@tunnelkit/core';
import type { ConfigOverrides, SessionCookie } from '@tunnelkit/core';
import { createLoginDriver } from '@tunnelkit/session';
import type { SessionDependencies } from '@tunnelkit/session';
import { logger } from '../utils/logger.js';
import { TerminalPromptIO } from '../utils/terminal-prompt.js';
import type { PromptIO } from '../utils/terminal-prompt.js';
import type { SignalSource } from './connect.js';

export interface GetCookieCommandOptions {
  dataDir: string;
  overrides?: ConfigOverrides;
}

export interface GetCookieDeps {
  session?: SessionDependencies;
  io?: PromptIO;
  signals?: SignalSource;
}

/**
 * Signs in (or reuses a stored cookie the portal still accepts) and
 * prints the cookie value on stdout without starting a tunnel.
 *
 * @throws {LoginError} When sign-in fails or is interrupted
 */
export async function runGetCookie(
  options: GetCookieCommandOptions,
  deps: GetCookieDeps = {},
): Promise<SessionCookie> {
  const config = await loadConfig(options.dataDir, options.overrides);

  return withInstanceLease(options.dataDir, async () => {
    const store = deps.session?.store ?? new FileCredentialStore(options.dataDir);
    const token = new CancellationToken();
    const interrupt = (): void => token.cancel('interrupted');
    const io = deps.io ?? new TerminalPromptIO({ onInterrupt: interrupt });
    const signals = deps.signals ?? process;

    const driver = createLoginDriver(
      config,
      options.dataDir,
      {
        prompter: {
          requestText: (message, t) => io.ask(`${message}:`, { secret: false, signal: t.signal }),
          requestSecret: (message, t) => io.ask(`${message}:`, { secret: true, signal: t.signal }),
          showMfaCode: (code) => logger.info(`Approve the sign-in in your authenticator app by entering ${code}`),
        },
        onLog: (level, message) => logger.engine({ level, message, source: 'login', timestamp: new Date().toISOString() }),
        onAttempt: (attempt) => {
          if (attempt.retryCount > 0) logger.warn(`Login page not recognised; reloading (retry ${attempt.retryCount})`);
        },
      },
      { ...deps.session, store },
    );

    signals.on('SIGINT', interrupt);
    try {
      const cookie = await driver.run(config.loginMode, await store.load(), token);
      logger.info(cookie.value);
      return cookie;
    } finally {
      signals.off('SIGINT', interrupt);
    }
  });
}
