/**
 * Tunnel Supervisor: owns the privileged openconnect process.
 *
 * Lifecycle:
 *   start() -> waitUntilUp() -> watch() -> stop()
 *
 * At most one process exists per supervisor: start() refuses while the
 * previous process has not been reaped. stop() sends SIGTERM, escalates
 * to a forced kill after the grace period, then waits for the interface
 * to disappear before returning. Each signal also goes through the
 * escalation tool, since the user cannot signal a root-owned openconnect
 * (and sudo does not forward SIGKILL).
 */

import type { Readable } from 'node:stream';
import { v4 as uuidv4 } from 'uuid';
import { sleep, TunnelError } from '@tunnelkit/core';
import type { CancellationToken, SessionCookie, TimingConfig } from '@tunnelkit/core';
import type { LogLevel, PromptKind, TunnelDown, TunnelHandle, TunnelStatus } from '../types/index.js';
import { buildTunnelCommand, elevatedKillCommands, redactArgs } from './escalation.js';
import type { TeardownSignal, TunnelCommand, TunnelCommandOptions } from './escalation.js';
import { createInterfaceProbe } from './interface-probe.js';
import type { InterfaceProbe } from './interface-probe.js';
import { classifyLine, LineSplitter, MARKER_SET_VERSION, parseElevatedPid } from './markers.js';
import { ExecaProcessLauncher } from './process-launcher.js';
import type { ProcessExit, ProcessLauncher, TunnelProcess } from './process-launcher.js';

// ─── Interfaces ──────────────────────────────────────────────────────────

/** Callbacks for one tunnel run. */
export interface TunnelHooks {
  /** Every stdout/stderr line of the child */
  onLine?(line: string, stream: 'stdout' | 'stderr'): void;
  onLog?(level: LogLevel, message: string): void;
  /**
   * Asks the user for input the child is waiting on (sudo password,
   * server-side MFA). Resolves null when dismissed or cancelled.
   */
  requestCredential?(kind: PromptKind, text: string, token: CancellationToken): Promise<string | null>;
}

export type TunnelTiming = Pick<
  TimingConfig,
  'livenessPollIntervalMs' | 'establishTimeoutMs' | 'teardownGraceMs'
>;

export interface TunnelSupervisorOptions {
  launcher?: ProcessLauncher;
  probe?: InterfaceProbe;
  buildCommand?: (cookie: SessionCookie, options: TunnelCommandOptions) => Promise<TunnelCommand>;
  timing?: Partial<TunnelTiming>;
}

/** Tracks the supervised process. */
interface ActiveTunnel {
  handle: TunnelHandle;
  command: TunnelCommand;
  process: TunnelProcess;
  token: CancellationToken;
  hooks: TunnelHooks;
  /** PID reported by the Windows elevation wrapper */
  elevatedPid: number | null;
  exit: ProcessExit | null;
  exited: Promise<ProcessExit>;
  wasUp: boolean;
  rejected: boolean;
  denied: string | null;
  promptPending: boolean;
  stopping: Promise<void> | null;
  /** Last output lines, for diagnostics */
  tail: string[];
}

// ─── Defaults ────────────────────────────────────────────────────────────

const DEFAULT_TIMING: TunnelTiming = {
  livenessPollIntervalMs: 1_000,
  establishTimeoutMs: 30_000,
  teardownGraceMs: 5_000,
};

const TAIL_LINES = 5;

/** Upper bound on waiting for buffered output after the process exits */
const DRAIN_TIMEOUT_MS = 500;

function describeExit(exit: ProcessExit): string {
  if (exit.signal) return `signal ${exit.signal}`;
  return `code ${exit.code ?? 'unknown'}`;
}

function cancelledError(): TunnelError {
  return new TunnelError('Cancelled', 'Tunnel operation cancelled');
}

function waitFor<T>(promise: Promise<T>, ms: number): Promise<T | null> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<null>((resolve) => {
    timer = setTimeout(() => resolve(null), ms);
  });
  return Promise.race([promise, timeout]).finally(() => clearTimeout(timer));
}

/** Resolves when the stream has delivered all its data. */
function drained(stream: Readable | null): Promise<void> {
  if (!stream || stream.readableEnded || stream.destroyed) return Promise.resolve();
  return new Promise((resolve) => {
    stream.once('end', () => resolve());
    stream.once('close', () => resolve());
  });
}

// ─── Supervisor ──────────────────────────────────────────────────────────

export class TunnelSupervisor {
  private readonly launcher: ProcessLauncher;
  private readonly probe: InterfaceProbe;
  private readonly buildCommand: (cookie: SessionCookie, options: TunnelCommandOptions) => Promise<TunnelCommand>;
  private readonly timing: TunnelTiming;
  private active: ActiveTunnel | null = null;

  constructor(options: TunnelSupervisorOptions = {}) {
    this.launcher = options.launcher ?? new ExecaProcessLauncher();
    this.probe = options.probe ?? createInterfaceProbe();
    this.buildCommand = options.buildCommand ?? ((cookie, opts) => buildTunnelCommand(cookie, opts));
    this.timing = { ...DEFAULT_TIMING, ...options.timing };
  }

  /** Handle of the process that has not been reaped yet, if any. */
  get current(): TunnelHandle | null {
    return this.active && this.active.exit === null ? this.active.handle : null;
  }

  /**
   * Spawns openconnect with the cookie. Returns once the process exists;
   * use {@link waitUntilUp} to wait for the interface.
   *
   * @throws {TunnelError} `SpawnError` if a previous process is still
   *   alive, the interface already exists, or the binary cannot start
   */
  async start(
    cookie: SessionCookie,
    options: TunnelCommandOptions,
    token: CancellationToken,
    hooks: TunnelHooks = {},
  ): Promise<TunnelHandle> {
    if (this.active && this.active.exit === null) {
      throw new TunnelError(
        'SpawnError',
        `A tunnel process (pid ${this.active.handle.pid ?? 'unknown'}) is still running; stop it first`,
      );
    }
    token.throwIfCancelled(cancelledError);

    if (await this.probe.isUp(options.interfaceName)) {
      throw new TunnelError(
        'SpawnError',
        `Interface ${options.interfaceName} is already up; is another VPN connected?`,
      );
    }

    const command = await this.buildCommand(cookie, options);
    token.throwIfCancelled(cancelledError);

    const args = redactArgs(command.args, command.redactions);
    hooks.onLog?.('info', `Starting ${command.file} ${args.join(' ')} (markers v${MARKER_SET_VERSION})`);

    let child: TunnelProcess;
    try {
      child = this.launcher.spawn(command);
    } catch (err) {
      throw new TunnelError(
        'SpawnError',
        `Failed to start ${command.file}: ${err instanceof Error ? err.message : String(err)}`,
        null,
        err,
      );
    }

    const handle: TunnelHandle = {
      id: uuidv4(),
      pid: child.pid,
      interfaceName: options.interfaceName,
      command: { file: command.file, args },
      startedAt: new Date().toISOString(),
    };

    const active: ActiveTunnel = {
      handle,
      command,
      process: child,
      token,
      hooks,
      elevatedPid: null,
      exit: null,
      // Output is drained first so exit markers are seen before the exit
      exited: child.exited.then(async (exit) => {
        await waitFor(Promise.all([drained(child.stdout), drained(child.stderr)]), DRAIN_TIMEOUT_MS);
        active.exit = exit;
        hooks.onLog?.('debug', `${command.file} exited with ${describeExit(exit)}`);
        return exit;
      }),
      wasUp: false,
      rejected: false,
      denied: null,
      promptPending: false,
      stopping: null,
      tail: [],
    };
    this.active = active;
    this.attachOutput(active, hooks);

    return handle;
  }

  /**
   * Polls until the interface is up.
   *
   * @throws {TunnelError} `RejectedCredential`, `SpawnError` or
   *   `UnexpectedExit` if the process exits first, `EstablishTimeout`
   *   past the deadline, `Cancelled` when the token fires
   */
  async waitUntilUp(handle: TunnelHandle, token: CancellationToken): Promise<void> {
    const active = this.require(handle);
    const deadline = Date.now() + this.timing.establishTimeoutMs;

    for (;;) {
      if (token.isCancelled) throw cancelledError();
      if (active.exit) throw this.exitError(active, active.exit);
      if (await this.probe.isUp(handle.interfaceName)) {
        active.wasUp = true;
        return;
      }
      if (Date.now() >= deadline) {
        throw new TunnelError(
          'EstablishTimeout',
          `Interface ${handle.interfaceName} did not come up within ${this.timing.establishTimeoutMs} ms`,
        );
      }
      await this.pause(active, token);
    }
  }

  /** Returns once the tunnel drops, or with `cancelled` when the token fires. */
  async watch(handle: TunnelHandle, token: CancellationToken): Promise<TunnelDown> {
    const active = this.require(handle);

    for (;;) {
      if (token.isCancelled) return { reason: 'cancelled' };
      if (active.exit) {
        return { reason: 'exited', code: active.exit.code, signal: active.exit.signal };
      }
      if (!(await this.probe.isUp(handle.interfaceName))) {
        // The process usually exits alongside the interface
        const exit = await waitFor(active.exited, this.timing.livenessPollIntervalMs);
        return exit
          ? { reason: 'exited', code: exit.code, signal: exit.signal }
          : { reason: 'interface-down' };
      }
      await this.pause(active, token);
    }
  }

  async status(handle: TunnelHandle): Promise<TunnelStatus> {
    const active = this.active?.handle.id === handle.id ? this.active : null;
    if (!active) return { kind: 'Exited', code: null };
    if (active.exit) return { kind: 'Exited', code: active.exit.code };
    if (await this.probe.isUp(handle.interfaceName)) return { kind: 'Up' };
    return active.wasUp ? { kind: 'Down' } : { kind: 'Starting' };
  }

  /**
   * Terminates the process and confirms the interface is gone.
   * Concurrent calls share one teardown. Unknown handles are ignored.
   *
   * @throws {TunnelError} `TeardownError` if the process survives the
   *   forced kill or the interface lingers
   */
  stop(handle: TunnelHandle): Promise<void> {
    const active = this.active;
    if (!active || active.handle.id !== handle.id) return Promise.resolve();
    if (!active.stopping) {
      active.stopping = this.terminate(active).finally(() => {
        active.stopping = null;
      });
    }
    return active.stopping;
  }

  // ─── Internals ───────────────────────────────────────────────────────

  private require(handle: TunnelHandle): ActiveTunnel {
    if (!this.active || this.active.handle.id !== handle.id) {
      throw new TunnelError('UnexpectedExit', `Unknown tunnel handle ${handle.id}`);
    }
    return this.active;
  }

  /** One poll interval, cut short by process exit or cancellation. */
  private async pause(active: ActiveTunnel, token: CancellationToken): Promise<void> {
    await Promise.race([sleep(this.timing.livenessPollIntervalMs, token), active.exited]);
  }

  private async terminate(active: ActiveTunnel): Promise<void> {
    const { handle } = active;
    const grace = this.timing.teardownGraceMs;

    if (!active.exit) {
      await this.signal(active, 'SIGTERM');
      if (!(await waitFor(active.exited, grace))) {
        await this.signal(active, 'SIGKILL');
        if (!(await waitFor(active.exited, grace))) {
          throw new TunnelError(
            'TeardownError',
            `${handle.command.file} (pid ${handle.pid ?? 'unknown'}) did not exit after a forced kill`,
          );
        }
      }
    }

    const deadline = Date.now() + grace;
    while (await this.probe.isUp(handle.interfaceName)) {
      if (Date.now() >= deadline) {
        throw new TunnelError(
          'TeardownError',
          `Interface ${handle.interfaceName} is still present after the tunnel process exited`,
          active.exit?.code ?? null,
        );
      }
      await sleep(Math.min(this.timing.livenessPollIntervalMs, 250));
    }
  }

  /**
   * Delivers `signal` through the escalation tool first, then directly.
   * sudo's children must be reached before sudo itself dies.
   */
  private async signal(active: ActiveTunnel, signal: TeardownSignal): Promise<void> {
    if (active.exit) return;
    const helpers = elevatedKillCommands(
      active.command.elevation,
      active.handle.pid,
      active.elevatedPid,
      signal,
    );
    for (const helper of helpers) {
      const ok = await this.launcher.run(helper);
      active.hooks.onLog?.('debug', `${helper.file} ${helper.args.join(' ')} ${ok ? 'succeeded' : 'failed'}`);
    }
    if (active.exit) return;
    if (!(await active.process.kill(signal))) {
      active.hooks.onLog?.('debug', `Could not send ${signal} to pid ${active.handle.pid ?? 'unknown'}`);
    }
  }

  private exitError(active: ActiveTunnel, exit: ProcessExit): TunnelError {
    const file = active.handle.command.file;
    if (exit.spawnError) {
      return new TunnelError('SpawnError', `Failed to start ${file}: ${exit.spawnError}`);
    }
    if (active.rejected) {
      return new TunnelError('RejectedCredential', 'The VPN server rejected the session cookie', exit.code);
    }
    if (active.denied) {
      return new TunnelError('SpawnError', `Privilege escalation failed: ${active.denied}`, exit.code);
    }
    const last = active.tail.length > 0 ? ` (last output: ${active.tail[active.tail.length - 1]})` : '';
    return new TunnelError(
      'UnexpectedExit',
      `${file} exited with ${describeExit(exit)} before the tunnel came up${last}`,
      exit.code,
    );
  }

  private attachOutput(active: ActiveTunnel, hooks: TunnelHooks): void {
    const pipe = (stream: Readable | null, name: 'stdout' | 'stderr'): void => {
      if (!stream) return;
      const splitter = new LineSplitter();
      stream.setEncoding('utf-8');
      stream.on('data', (chunk: string) => {
        for (const line of splitter.push(chunk)) this.handleLine(active, line, name, hooks);
      });
      stream.on('end', () => {
        const rest = splitter.flush();
        if (rest) this.handleLine(active, rest, name, hooks);
      });
    };

    pipe(active.process.stdout, 'stdout');
    pipe(active.process.stderr, 'stderr');
    active.process.stdin?.on('error', (err: Error) => {
      hooks.onLog?.('debug', `stdin closed: ${err.message}`);
    });
  }

  private handleLine(
    active: ActiveTunnel,
    line: string,
    stream: 'stdout' | 'stderr',
    hooks: TunnelHooks,
  ): void {
    active.tail.push(line);
    if (active.tail.length > TAIL_LINES) active.tail.shift();
    hooks.onLine?.(line, stream);

    const marker = classifyLine(line);
    if (!marker) return;
    switch (marker.kind) {
      case 'rejected-credential':
        active.rejected = true;
        break;
      case 'escalation-denied':
        active.denied = line.trim();
        break;
      case 'elevated-pid':
        active.elevatedPid = parseElevatedPid(line);
        break;
      case 'prompt':
        void this.relayPrompt(active, marker.promptKind ?? 'escalation-password', line.trim(), hooks);
        break;
    }
  }

  /** Forwards a prompt to the user and writes the answer to stdin. */
  private async relayPrompt(
    active: ActiveTunnel,
    kind: PromptKind,
    text: string,
    hooks: TunnelHooks,
  ): Promise<void> {
    if (active.promptPending) return;
    active.promptPending = true;
    try {
      const answer = hooks.requestCredential
        ? await hooks.requestCredential(kind, text, active.token)
        : null;
      if (active.exit || active.token.isCancelled) return;
      if (answer === null) {
        active.denied = `${kind} prompt was dismissed`;
        await this.signal(active, 'SIGTERM');
        return;
      }
      active.process.stdin?.write(`${answer}\n`);
    } catch (err) {
      active.denied = `${kind} prompt failed: ${err instanceof Error ? err.message : String(err)}`;
      await this.signal(active, 'SIGTERM');
    } finally {
      active.promptPending = false;
    }
  }
}
