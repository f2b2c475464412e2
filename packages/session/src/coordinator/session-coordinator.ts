/**
 * Session Coordinator: the connection state machine.
 *
 *   Idle|Failed --connect--> LoggingIn ----cookie----> StartingTunnel
 *   Idle|Failed --connect (stored cookie)-----------> StartingTunnel
 *   StartingTunnel --interface up--> Connected
 *   StartingTunnel --rejected cookie--> LoggingIn  (purge; bounded re-login)
 *   StartingTunnel --rejected cookie, teardown failed--> Failed
 *   Connected --disconnect--> Disconnecting --> Idle
 *   Connected --unexpected exit--> Failed
 *   LoggingIn|StartingTunnel --disconnect/cancel--> Disconnecting --> Idle
 *   LoggingIn|StartingTunnel --failure--> Failed
 *
 * One operation is in flight at a time and owns the only live
 * CancellationToken. Callers never see a sub-component's intermediate
 * state; subscribers see every transition in order.
 */

import { v4 as uuidv4 } from 'uuid';
import {
  CancellationToken,
  CoordinatorError,
  isCancellation,
  LoginError,
  toFailureReason,
  TunnelError,
} from '@tunnelkit/core';
import type { CredentialStore, LoginMode, SessionCookie, VpnConfig } from '@tunnelkit/core';
import type { LoginRunner } from '../login/login-driver.js';
import { PromptBroker } from '../prompts/prompt-broker.js';
import type { TunnelHooks } from '../tunnel/supervisor.js';
import type { TunnelCommandOptions } from '../tunnel/escalation.js';
import type {
  CoordinatorEvent,
  CoordinatorListener,
  CredentialPrompt,
  LoginAttempt,
  LoginPrompter,
  LogLevel,
  LogLine,
  SessionOperation,
  SessionState,
  TunnelDown,
  TunnelHandle,
} from '../types/index.js';

// ─── Interfaces ──────────────────────────────────────────────────────────

/** What the coordinator needs from the Tunnel Supervisor. */
export interface TunnelRunner {
  start(
    cookie: SessionCookie,
    options: TunnelCommandOptions,
    token: CancellationToken,
    hooks?: TunnelHooks,
  ): Promise<TunnelHandle>;
  waitUntilUp(handle: TunnelHandle, token: CancellationToken): Promise<void>;
  watch(handle: TunnelHandle, token: CancellationToken): Promise<TunnelDown>;
  stop(handle: TunnelHandle): Promise<void>;
}

/** Hooks handed to the login runner factory. */
export interface LoginRunnerContext {
  prompter: LoginPrompter;
  onLog(level: LogLevel, message: string): void;
  onAttempt(attempt: LoginAttempt): void;
}

export interface SessionCoordinatorOptions {
  config: VpnConfig;
  store: CredentialStore;
  tunnel: TunnelRunner;
  createLogin(context: LoginRunnerContext): LoginRunner;
}

export interface ConnectOptions {
  /** Overrides config.loginMode for this connect */
  mode?: LoginMode;
}

/** The one in-flight operation. */
interface ActiveTask {
  id: string;
  token: CancellationToken;
  mode: LoginMode;
  handle: TunnelHandle | null;
  connect: SessionOperation;
  disconnect: SessionOperation | null;
  finished: Promise<void>;
  /** Settles `connect.done` */
  settleConnect(state: SessionState): void;
}

function cancelledError(): LoginError {
  return new LoginError('Cancelled', 'Connect cancelled');
}

// ─── Coordinator ─────────────────────────────────────────────────────────

export class SessionCoordinator {
  private readonly config: VpnConfig;
  private readonly store: CredentialStore;
  private readonly tunnel: TunnelRunner;
  private readonly login: LoginRunner;
  private readonly broker: PromptBroker;
  private readonly listeners = new Set<CoordinatorListener>();
  private state: SessionState = { tag: 'Idle' };
  private task: ActiveTask | null = null;

  constructor(options: SessionCoordinatorOptions) {
    this.config = options.config;
    this.store = options.store;
    this.tunnel = options.tunnel;
    this.broker = new PromptBroker({
      onIssued: (prompt) => this.emit({ type: 'prompt', prompt }),
      onSettled: (promptId) => this.emit({ type: 'prompt-settled', promptId }),
    });
    this.login = options.createLogin({
      prompter: {
        requestText: (message, token) => this.broker.ask('login-text', message, token),
        requestSecret: (message, token) => this.broker.ask('login-secret', message, token),
        showMfaCode: (code) => this.emit({ type: 'mfa-code', code }),
      },
      onLog: (level, message) => this.log(level, message, 'login'),
      onAttempt: (attempt) => this.onAttempt(attempt),
    });
  }

  // ─── Public API ─────────────────────────────────────────────────────

  getState(): SessionState {
    return this.state;
  }

  /** True while an operation (connect, session, teardown) is in flight. */
  get busy(): boolean {
    return this.task !== null;
  }

  /** The pending prompt, if any. */
  get pendingPrompt(): CredentialPrompt | null {
    return this.broker.current;
  }

  /**
   * Starts connecting. While a connect is already in progress the same
   * operation is returned.
   *
   * @throws {CoordinatorError} `AlreadyConnecting` when connected,
   *   `Busy` while disconnecting
   */
  connect(options: ConnectOptions = {}): SessionOperation {
    if (this.state.tag === 'Connected') {
      throw new CoordinatorError('AlreadyConnecting', 'Already connected; disconnect first');
    }
    if (this.task) {
      if (this.task.disconnect) {
        throw new CoordinatorError('Busy', 'A disconnect is in progress');
      }
      return this.task.connect;
    }

    const id = uuidv4();
    let settleConnect: (state: SessionState) => void = () => undefined;
    const done = new Promise<SessionState>((resolve) => {
      settleConnect = resolve;
    });

    const task: ActiveTask = {
      id,
      token: new CancellationToken(),
      mode: options.mode ?? this.config.loginMode,
      handle: null,
      connect: { id, kind: 'connect', done },
      disconnect: null,
      finished: Promise.resolve(),
      settleConnect,
    };
    this.task = task;
    task.finished = this.runSession(task);
    return task.connect;
  }

  /**
   * Cancels the in-flight connect or tears the tunnel down. Repeated
   * calls return the same operation.
   *
   * @throws {CoordinatorError} `NotConnected` when nothing is running
   */
  disconnect(): SessionOperation {
    const task = this.task;
    if (!task) {
      throw new CoordinatorError('NotConnected', 'Not connected');
    }
    if (task.disconnect) return task.disconnect;

    const op: SessionOperation = {
      id: uuidv4(),
      kind: 'disconnect',
      done: task.finished.then(() => this.state),
    };
    task.disconnect = op;
    this.setState({ tag: 'Disconnecting' }, task.id);
    task.token.cancel('disconnect');
    return op;
  }

  /** Same as {@link disconnect}, but a no-op when nothing is running. */
  cancel(): SessionOperation | null {
    return this.task ? this.disconnect() : null;
  }

  /** @throws {CoordinatorError} `NoPendingPrompt` */
  respondToPrompt(value: string): void {
    if (!this.broker.respond(value)) {
      throw new CoordinatorError('NoPendingPrompt', 'There is no pending prompt');
    }
  }

  /** @throws {CoordinatorError} `NoPendingPrompt` */
  dismissPrompt(): void {
    if (!this.broker.dismiss()) {
      throw new CoordinatorError('NoPendingPrompt', 'There is no pending prompt');
    }
  }

  /**
   * Registers a listener for state, log and prompt events.
   *
   * @returns A function that removes the listener
   */
  subscribe(listener: CoordinatorListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  // ─── Session flow ──────────────────────────────────────────────────

  /** Runs one connect to completion. Never rejects. */
  private async runSession(task: ActiveTask): Promise<void> {
    let final: SessionState;
    try {
      await this.establish(task);
      task.settleConnect(this.state);
      const down = await this.tunnel.watch(this.requireHandle(task), task.token);
      final = await this.afterDown(task, down);
    } catch (err) {
      final = await this.afterError(task, err);
    }

    this.broker.dismiss();
    if (this.task === task) this.task = null;
    this.setState(final, task.id);
    task.settleConnect(final);
  }

  /** Logs in (when needed) and brings the tunnel up; ends Connected. */
  private async establish(task: ActiveTask): Promise<void> {
    const { config } = this;
    let cookie = await this.store.load();
    let relogins = 0;

    for (;;) {
      if (cookie) {
        this.log('info', 'Using stored session cookie', 'coordinator');
      } else {
        cookie = await this.runLogin(task);
      }

      this.advance(task, { tag: 'StartingTunnel', interfaceName: config.interfaceName });
      const used = cookie;
      cookie = null;

      try {
        task.handle = await this.tunnel.start(used, this.tunnelOptions(), task.token, this.tunnelHooks());
        await this.tunnel.waitUntilUp(task.handle, task.token);
        break;
      } catch (err) {
        const warning = await this.stopTunnel(task);
        if (!(err instanceof TunnelError) || err.code !== 'RejectedCredential') throw err;

        await this.store.purge();
        this.emit({ type: 'cookie-purged' });
        // A leftover process or interface would only fail the next start
        if (warning) throw new TunnelError('TeardownError', warning, err.exitCode, err);
        if (relogins >= config.timing.maxRelogins || task.token.isCancelled) throw err;
        relogins++;
        this.log('warn', 'The VPN server rejected the stored cookie; signing in again', 'coordinator');
      }
    }

    this.advance(task, {
      tag: 'Connected',
      interfaceName: config.interfaceName,
      since: new Date().toISOString(),
    });
  }

  private async runLogin(task: ActiveTask): Promise<SessionCookie> {
    const attempt: LoginAttempt = {
      id: uuidv4(),
      mode: task.mode,
      deadline: Date.now() + this.config.timing.loginDeadlineMs,
      retryCount: 0,
      lastHandledPage: null,
    };
    this.advance(task, { tag: 'LoggingIn', attempt });
    // The stored cookie was either absent or just purged
    return this.login.run(task.mode, null, task.token, attempt);
  }

  private async afterDown(task: ActiveTask, down: TunnelDown): Promise<SessionState> {
    const warning = await this.stopTunnel(task);
    if (down.reason === 'cancelled' || task.token.isCancelled) {
      return warning ? { tag: 'Idle', warning } : { tag: 'Idle' };
    }

    const error =
      down.reason === 'exited'
        ? new TunnelError(
            'UnexpectedExit',
            `The VPN process exited (${down.signal ? `signal ${down.signal}` : `code ${down.code ?? 'unknown'}`})`,
            down.code,
          )
        : new TunnelError('UnexpectedExit', `Interface ${this.config.interfaceName} went down`);
    this.log('error', error.message, 'tunnel');
    return { tag: 'Failed', reason: toFailureReason(error) };
  }

  private async afterError(task: ActiveTask, err: unknown): Promise<SessionState> {
    const warning = await this.stopTunnel(task);
    if (task.token.isCancelled || isCancellation(err)) {
      return warning ? { tag: 'Idle', warning } : { tag: 'Idle' };
    }
    const reason = toFailureReason(err);
    this.log('error', reason.detail, 'coordinator');
    return { tag: 'Failed', reason };
  }

  /**
   * Stops the task's tunnel if one was started.
   *
   * @returns A warning when teardown could not be confirmed
   */
  private async stopTunnel(task: ActiveTask): Promise<string | null> {
    const handle = task.handle;
    if (!handle) return null;
    try {
      await this.tunnel.stop(handle);
      task.handle = null;
      return null;
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      this.log('warn', `Tunnel teardown incomplete: ${message}`, 'tunnel');
      return message;
    }
  }

  private tunnelOptions(): TunnelCommandOptions {
    const { config } = this;
    return {
      portalUrl: config.portalUrl,
      interfaceName: config.interfaceName,
      escalationTool: config.escalationTool,
      openconnectPath: config.openconnectPath,
    };
  }

  private tunnelHooks(): TunnelHooks {
    return {
      onLine: (line) => this.log('debug', line, 'tunnel'),
      onLog: (level, message) => this.log(level, message, 'tunnel'),
      requestCredential: (kind, text, token) => this.broker.ask(kind, text, token),
    };
  }

  private requireHandle(task: ActiveTask): TunnelHandle {
    if (!task.handle) {
      throw new TunnelError('UnexpectedExit', 'Connected without a tunnel handle');
    }
    return task.handle;
  }

  // ─── State and events ──────────────────────────────────────────────

  /** Progress transition; refused once the task's token has fired. */
  private advance(task: ActiveTask, state: SessionState): void {
    task.token.throwIfCancelled(cancelledError);
    this.setState(state, task.id);
  }

  private onAttempt(attempt: LoginAttempt): void {
    const task = this.task;
    if (!task || task.token.isCancelled || this.state.tag !== 'LoggingIn') return;
    this.setState({ tag: 'LoggingIn', attempt }, task.id);
  }

  private setState(state: SessionState, operationId: string | null): void {
    this.state = state;
    this.emit({ type: 'state', state, operationId });
  }

  private log(level: LogLevel, message: string, source: LogLine['source']): void {
    this.emit({
      type: 'log',
      line: { level, message, source, timestamp: new Date().toISOString() },
    });
  }

  private emit(event: CoordinatorEvent): void {
    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (err) {
        process.emitWarning(
          `Session listener failed: ${err instanceof Error ? err.message : String(err)}`,
        );
      }
    }
  }
}
