/**
 * Login Driver: drives the portal's SSO flow in a browser until the
 * session cookie appears.
 *
 * The poll loop:
 *   1. Check the browser's cookie jar (the success condition in every mode)
 *   2. In automated modes, run the first applicable page handler
 *   3. Count polls where nothing applied; past the threshold, reload the
 *      portal; past the reset budget, fail with PageUnrecognized
 *   4. Sleep one poll interval (cancellable)
 *
 * The browser is closed on every exit path, including cancellation,
 * before run() settles.
 */

import { v4 as uuidv4 } from 'uuid';
import { LoginError, sleep } from '@tunnelkit/core';
import type { CancellationToken, CredentialStore, LoginMode, SessionCookie, VpnConfig } from '@tunnelkit/core';
import type {
  HandlerContext,
  LoginAttempt,
  LoginPrompter,
  LogLevel,
  PageHandler,
  PageOutcome,
} from '../types/index.js';
import type { BrowserCookie, BrowserEngine, BrowserSession } from './browser.js';
import type { CookieProbe } from './cookie-probe.js';

export type LoginDriverConfig = Pick<
  VpnConfig,
  'portalUrl' | 'cookieName' | 'cookieDomain' | 'email' | 'userAgent' | 'browserExecutablePath' | 'timing'
>;

export interface LoginDriverOptions {
  config: LoginDriverConfig;
  engine: BrowserEngine;
  store: CredentialStore;
  handlers: PageHandler[];
  prompter: LoginPrompter;
  profileDir: string;
  /** Checks a stored cookie before a browser is launched (full-auto only) */
  probe?: CookieProbe;
  onLog?(level: LogLevel, message: string): void;
  /**
   * Called when the driver opens an attempt of its own, and whenever the
   * attempt's bookkeeping changes
   */
  onAttempt?(attempt: LoginAttempt): void;
}

/** Contract the Session Coordinator depends on. */
export interface LoginRunner {
  /** `attempt` is the caller's already-announced attempt, continued by the run */
  run(
    mode: LoginMode,
    existingCookie: SessionCookie | null,
    token: CancellationToken,
    attempt?: LoginAttempt,
  ): Promise<SessionCookie>;
}

interface PollState {
  lastUrl: string | null;
  /** Non-repeatable handlers that already acted on the current URL */
  handled: Set<string>;
  stuckPolls: number;
}

function cancelledError(): LoginError {
  return new LoginError('Cancelled', 'Login cancelled');
}

export class LoginDriver implements LoginRunner {
  constructor(private readonly options: LoginDriverOptions) {}

  /**
   * Produces a session cookie and saves it to the credential store.
   *
   * @throws {LoginError} Timeout, PageUnrecognized, BrowserLaunchFailed,
   *   BrowserLost, AuthenticationFailed or Cancelled
   */
  async run(
    mode: LoginMode,
    existingCookie: SessionCookie | null,
    token: CancellationToken,
    announced?: LoginAttempt,
  ): Promise<SessionCookie> {
    const { config, probe, store } = this.options;
    token.throwIfCancelled(cancelledError);

    if (existingCookie && mode === 'full-auto' && probe) {
      if (await probe(existingCookie, token)) {
        this.log('info', 'Stored session cookie is still accepted by the portal');
        await store.save(existingCookie);
        return existingCookie;
      }
      token.throwIfCancelled(cancelledError);
      this.log('info', 'Stored session cookie was not accepted; signing in');
    }

    const attempt: LoginAttempt = announced
      ? { ...announced }
      : {
          id: uuidv4(),
          mode,
          deadline: Date.now() + config.timing.loginDeadlineMs,
          retryCount: 0,
          lastHandledPage: null,
        };
    if (!announced) this.options.onAttempt?.({ ...attempt });

    let session: BrowserSession;
    try {
      session = await this.options.engine.launch({
        headless: mode === 'full-auto',
        profileDir: this.options.profileDir,
        userAgent: config.userAgent,
        executablePath: config.browserExecutablePath,
      });
    } catch (err) {
      throw new LoginError(
        'BrowserLaunchFailed',
        `Could not launch the browser: ${err instanceof Error ? err.message : String(err)}`,
        err,
      );
    }

    // Closing early unblocks any in-flight browser call
    const unsubscribe = token.onCancel(() => {
      session.close().catch((err: unknown) => {
        this.log('debug', `Browser close after cancel failed: ${err instanceof Error ? err.message : String(err)}`);
      });
    });

    try {
      const cookie = await this.drive(session, attempt, token);
      await store.save(cookie);
      this.log('info', 'Session cookie obtained');
      return cookie;
    } finally {
      unsubscribe();
      await session.close();
    }
  }

  private async drive(
    session: BrowserSession,
    attempt: LoginAttempt,
    token: CancellationToken,
  ): Promise<SessionCookie> {
    const { config } = this.options;
    const { timing } = config;
    const state: PollState = { lastUrl: null, handled: new Set(), stuckPolls: 0 };

    await this.openPortal(session, token);

    for (;;) {
      if (token.isCancelled) throw cancelledError();
      if (Date.now() >= attempt.deadline) {
        throw new LoginError(
          'Timeout',
          `No session cookie within ${Math.round(timing.loginDeadlineMs / 1000)}s`,
        );
      }

      const cookie = await this.findCookie(session, token);
      if (cookie) return cookie;

      if (attempt.mode !== 'manual') {
        const url = session.currentUrl();
        if (url !== state.lastUrl) {
          state.lastUrl = url;
          state.handled.clear();
          state.stuckPolls = 0;
          this.log('debug', `Page: ${url}`);
        }

        const result = await this.runHandlers(session, state, token);
        if (result) {
          const { handler, outcome } = result;
          switch (outcome.kind) {
            case 'TerminalSuccess':
              return outcome.cookie;
            case 'TerminalFailure':
              throw new LoginError('AuthenticationFailed', outcome.reason);
            case 'Handled':
              state.stuckPolls = 0;
              if (!handler.repeatable) state.handled.add(handler.name);
              attempt.lastHandledPage = `${handler.name}@${url}`;
              this.options.onAttempt?.({ ...attempt });
              if (outcome.note) this.log('debug', `${handler.name}: ${outcome.note}`);
              break;
          }
        } else if (++state.stuckPolls > timing.stuckThreshold) {
          if (attempt.retryCount >= timing.maxPageResets) {
            throw new LoginError('PageUnrecognized', `No handler recognised ${url}`);
          }
          attempt.retryCount++;
          this.options.onAttempt?.({ ...attempt });
          this.log('warn', `Stuck on ${url}; reloading the portal (${attempt.retryCount}/${timing.maxPageResets})`);
          state.lastUrl = null;
          await this.openPortal(session, token);
        }
      }

      if (!(await sleep(timing.loginPollIntervalMs, token))) throw cancelledError();
    }
  }

  private async openPortal(session: BrowserSession, token: CancellationToken): Promise<void> {
    try {
      await session.goto(this.options.config.portalUrl);
    } catch (err) {
      if (token.isCancelled) throw cancelledError();
      // Slow redirects time out here but often finish on their own
      this.log('warn', `Navigation did not complete: ${err instanceof Error ? err.message : String(err)}`);
    }
  }

  private async findCookie(session: BrowserSession, token: CancellationToken): Promise<SessionCookie | null> {
    const { cookieName, cookieDomain } = this.options.config;
    let cookies: BrowserCookie[];
    try {
      cookies = await session.cookies();
    } catch (err) {
      if (token.isCancelled) throw cancelledError();
      throw new LoginError(
        'BrowserLost',
        `The browser went away: ${err instanceof Error ? err.message : String(err)}`,
        err,
      );
    }

    const match = cookies.find(
      (cookie) => cookie.name === cookieName && cookie.domain.includes(cookieDomain) && cookie.value,
    );
    if (!match) return null;
    return {
      name: match.name,
      value: match.value,
      domain: match.domain,
      obtainedAt: new Date().toISOString(),
    };
  }

  /** First handler whose outcome is not NotApplicable, or null. */
  private async runHandlers(
    session: BrowserSession,
    state: PollState,
    token: CancellationToken,
  ): Promise<{ handler: PageHandler; outcome: PageOutcome } | null> {
    const context: HandlerContext = {
      email: this.options.config.email,
      prompter: this.options.prompter,
      token,
      log: (message) => this.log('info', message),
    };

    try {
      const snapshot = await session.snapshot();
      for (const handler of this.options.handlers) {
        if (state.handled.has(handler.name)) continue;
        const outcome = await handler.inspect(snapshot, context);
        if (token.isCancelled) throw cancelledError();
        if (outcome.kind !== 'NotApplicable') return { handler, outcome };
      }
    } catch (err) {
      if (token.isCancelled) throw cancelledError();
      // The page usually navigated mid-inspection; the next poll sees the new one
      this.log('debug', `Page inspection failed: ${err instanceof Error ? err.message : String(err)}`);
    }
    return null;
  }

  private log(level: LogLevel, message: string): void {
    this.options.onLog?.(level, message);
  }
}
