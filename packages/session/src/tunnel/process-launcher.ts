import type { Readable, Writable } from 'node:stream';
import { execa } from 'execa';
import type { HelperCommand, TeardownSignal, TunnelCommand } from './escalation.js';

/** How a child process ended. */
export interface ProcessExit {
  code: number | null;
  signal: string | null;
  /** Set when the process could not be started at all */
  spawnError: string | null;
}

/** Running child as seen by the Tunnel Supervisor. */
export interface TunnelProcess {
  readonly pid: number | null;
  readonly stdout: Readable | null;
  readonly stderr: Readable | null;
  readonly stdin: Writable | null;
  /** Settles once the process has been reaped; never rejects */
  readonly exited: Promise<ProcessExit>;
  /**
   * Signals the spawned process directly. Resolves false when the
   * signal could not be delivered (e.g. EPERM on a root-owned child);
   * a failed delivery never settles {@link exited}.
   */
  kill(signal: TeardownSignal): Promise<boolean>;
}

/** Seam for spawning the tunnel, replaced by an in-process fake in tests. */
export interface ProcessLauncher {
  spawn(command: TunnelCommand): TunnelProcess;
  /** Runs a helper to completion; resolves true on exit code 0. Never rejects. */
  run(command: HelperCommand): Promise<boolean>;
}

/** Upper bound on an elevated helper, which may be waiting on a UAC or polkit dialog */
const HELPER_TIMEOUT_MS = 30_000;

function toExit(error: unknown): ProcessExit {
  const err = error as {
    code?: string;
    exitCode?: number;
    signal?: string;
    message?: string;
  };
  const exitCode = typeof err.exitCode === 'number' ? err.exitCode : null;
  const signal = typeof err.signal === 'string' ? err.signal : null;
  const spawnError =
    exitCode === null && signal === null ? (err.message ?? err.code ?? 'spawn failed') : null;
  return { code: exitCode, signal, spawnError };
}

/** {@link ProcessLauncher} backed by execa. */
export class ExecaProcessLauncher implements ProcessLauncher {
  constructor(private readonly platform: NodeJS.Platform = process.platform) {}

  spawn(command: TunnelCommand): TunnelProcess {
    const child = execa(command.file, command.args, {
      env: command.env,
      stdin: 'pipe',
      stdout: 'pipe',
      stderr: 'pipe',
      buffer: false,
      windowsHide: true,
    });

    const exited: Promise<ProcessExit> = child.then(
      (result) => ({ code: result.exitCode, signal: result.signal ?? null, spawnError: null }),
      (error: unknown) => toExit(error),
    );

    const platform = this.platform;
    const pid = child.pid ?? null;
    return {
      pid,
      stdout: child.stdout,
      stderr: child.stderr,
      stdin: child.stdin,
      exited,
      // process.kill throws instead of emitting 'error' on the child, which
      // execa would report as the process ending
      async kill(signal) {
        if (pid === null) return false;
        if (platform === 'win32' && signal === 'SIGKILL') {
          const result = await execa('taskkill', ['/F', '/T', '/PID', String(pid)], { reject: false });
          return result.exitCode === 0;
        }
        try {
          process.kill(pid, signal);
          return true;
        } catch {
          return false;
        }
      },
    };
  }

  async run(command: HelperCommand): Promise<boolean> {
    const result = await execa(command.file, command.args, {
      reject: false,
      stdin: 'ignore',
      timeout: HELPER_TIMEOUT_MS,
      windowsHide: true,
    });
    return result.exitCode === 0;
  }
}
