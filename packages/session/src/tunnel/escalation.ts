/**
 * Locating openconnect and the privilege-escalation tool, and building
 * the tunnel command line.
 *
 * Unix command shape:
 *
 *   <tool> [-S -p <prompt> | -A] <openconnect> --protocol nc
 *          [--interface <name>] -C <cookieName>=<value> <portalUrl>
 *
 * macOS omits `--interface`: utun devices are numbered by the kernel.
 *
 * Windows without a configured shim runs openconnect elevated through
 * PowerShell (`Start-Process -Verb RunAs`); the wrapper prints the
 * elevated PID and waits for it, so teardown can target that PID.
 */

import { constants, promises as fs } from 'node:fs';
import path from 'node:path';
import type { SessionCookie } from '@tunnelkit/core';
import { TunnelError } from '@tunnelkit/core';
import { ELEVATED_PID_MARKER, ESCALATION_PROMPT } from './markers.js';

/**
 * How openconnect was elevated. Decides how teardown reaches a process
 * the launching user may not be allowed to signal.
 */
export type Elevation =
  | { kind: 'sudo'; tool: string }
  | { kind: 'pkexec'; tool: string }
  | { kind: 'shim'; tool: string; platform: NodeJS.Platform }
  | { kind: 'runas'; shell: string };

export interface TunnelCommand {
  file: string;
  args: string[];
  /** Extra environment for the child (merged over process.env) */
  env: Record<string, string>;
  /** Substrings to mask before the command is logged */
  redactions: string[];
  elevation: Elevation;
}

/** A one-shot helper command, e.g. an elevated kill. */
export interface HelperCommand {
  file: string;
  args: string[];
}

export type TeardownSignal = 'SIGTERM' | 'SIGKILL';

export interface TunnelCommandOptions {
  portalUrl: string;
  interfaceName: string;
  /** Preferred escalation tool; auto-detected when null */
  escalationTool: string | null;
  /** Binary name or path of openconnect */
  openconnectPath: string;
}

export interface ResolveEnvironment {
  env?: NodeJS.ProcessEnv;
  platform?: NodeJS.Platform;
}

const UNIX_ESCALATION_TOOLS = ['sudo', 'sudo-rs', 'pkexec'];
const DARWIN_ESCALATION_TOOLS = ['sudo', 'sudo-rs'];

const ASKPASS_CANDIDATES = [
  'ssh-askpass',
  'ksshaskpass',
  'lxqt-openssh-askpass',
  'x11-ssh-askpass',
  'gnome-ssh-askpass',
];

const OPENCONNECT_FALLBACK_DIRS = [
  '/sbin',
  '/usr/sbin',
  '/usr/local/sbin',
  '/usr/local/bin',
  '/opt/homebrew/bin',
];

const WINDOWS_OPENCONNECT_PATHS = [
  'C:\\Program Files\\OpenConnect\\openconnect.exe',
  'C:\\Program Files (x86)\\OpenConnect\\openconnect.exe',
];

async function isExecutable(candidate: string, platform: NodeJS.Platform): Promise<boolean> {
  try {
    const stat = await fs.stat(candidate);
    if (!stat.isFile()) return false;
    if (platform !== 'win32') await fs.access(candidate, constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Resolves a command name against PATH (and PATHEXT on Windows). A name
 * containing a path separator is checked as-is.
 */
export async function findExecutable(
  name: string,
  { env = process.env, platform = process.platform }: ResolveEnvironment = {},
): Promise<string | null> {
  const pathApi = platform === 'win32' ? path.win32 : path.posix;

  if (name.includes('/') || (platform === 'win32' && name.includes('\\'))) {
    return (await isExecutable(name, platform)) ? name : null;
  }

  const dirs = (env.PATH ?? env.Path ?? '').split(pathApi.delimiter).filter(Boolean);
  const extensions =
    platform === 'win32' ? ['', ...(env.PATHEXT ?? '.EXE;.CMD;.BAT').split(';')] : [''];

  for (const dir of dirs) {
    for (const ext of extensions) {
      const candidate = pathApi.join(dir, name + ext.toLowerCase());
      if (await isExecutable(candidate, platform)) return candidate;
    }
  }
  return null;
}

/**
 * Locates openconnect: the configured name/path first, then the usual
 * install directories (sbin is often missing from a desktop user's PATH).
 */
export async function locateOpenconnect(
  configured: string,
  resolveEnv: ResolveEnvironment = {},
): Promise<string | null> {
  const platform = resolveEnv.platform ?? process.platform;
  const found = await findExecutable(configured, resolveEnv);
  if (found) return found;

  const fallbacks =
    platform === 'win32'
      ? WINDOWS_OPENCONNECT_PATHS
      : OPENCONNECT_FALLBACK_DIRS.map((dir) => path.posix.join(dir, 'openconnect'));
  for (const candidate of fallbacks) {
    if (await isExecutable(candidate, platform)) return candidate;
  }
  return null;
}

/**
 * Picks the escalation tool. On Windows only an explicitly configured
 * shim is used; elsewhere the preference comes first, then the platform
 * defaults in order.
 */
export async function resolveEscalationTool(
  preferred: string | null,
  resolveEnv: ResolveEnvironment = {},
): Promise<string | null> {
  const platform = resolveEnv.platform ?? process.platform;
  if (preferred) return findExecutable(preferred, resolveEnv);
  if (platform === 'win32') return null;

  const candidates = platform === 'darwin' ? DARWIN_ESCALATION_TOOLS : UNIX_ESCALATION_TOOLS;
  for (const tool of candidates) {
    const found = await findExecutable(tool, resolveEnv);
    if (found) return found;
  }
  return null;
}

/** True for tools that ask for the user's password on the terminal. */
export function needsPasswordPrompt(tool: string): boolean {
  const base = path.basename(tool).replace(/\.exe$/i, '');
  return base === 'sudo' || base === 'sudo-rs';
}

function classifyTool(tool: string, platform: NodeJS.Platform): Elevation {
  if (needsPasswordPrompt(tool)) return { kind: 'sudo', tool };
  if (path.basename(tool) === 'pkexec') return { kind: 'pkexec', tool };
  return { kind: 'shim', tool, platform };
}

/** Finds a graphical askpass helper: $SUDO_ASKPASS first, then the known ones. */
export async function findAskpass(resolveEnv: ResolveEnvironment = {}): Promise<string | null> {
  const env = resolveEnv.env ?? process.env;
  const platform = resolveEnv.platform ?? process.platform;
  if (env.SUDO_ASKPASS && (await isExecutable(env.SUDO_ASKPASS, platform))) {
    return env.SUDO_ASKPASS;
  }
  for (const candidate of ASKPASS_CANDIDATES) {
    const found = await findExecutable(candidate, resolveEnv);
    if (found) return found;
  }
  return null;
}

/**
 * Builds the command that runs openconnect with the session cookie.
 *
 * @throws {TunnelError} `SpawnError` when openconnect, or on Unix an
 *   escalation tool, cannot be found
 */
export async function buildTunnelCommand(
  cookie: SessionCookie,
  options: TunnelCommandOptions,
  resolveEnv: ResolveEnvironment = {},
): Promise<TunnelCommand> {
  const platform = resolveEnv.platform ?? process.platform;

  const openconnect = await locateOpenconnect(options.openconnectPath, resolveEnv);
  if (!openconnect) {
    throw new TunnelError(
      'SpawnError',
      `openconnect not found (looked for "${options.openconnectPath}" on PATH and in the usual install directories)`,
    );
  }

  const credential = `${cookie.name}=${cookie.value}`;
  const ocArgs = ['--protocol', 'nc'];
  if (platform !== 'darwin') ocArgs.push('--interface', options.interfaceName);
  ocArgs.push('-C', credential, options.portalUrl);

  const tool = await resolveEscalationTool(options.escalationTool, resolveEnv);
  const redactions = [cookie.value];

  if (!tool) {
    if (platform !== 'win32') {
      throw new TunnelError(
        'SpawnError',
        'No privilege escalation tool found (tried sudo, sudo-rs, pkexec); set escalationTool in config.yaml',
      );
    }
    const script = [
      `$p = Start-Process -FilePath ${psQuote(openconnect)} -ArgumentList ${psArgumentList(ocArgs)}` +
        ' -Verb RunAs -WindowStyle Hidden -PassThru',
      `Write-Output "${ELEVATED_PID_MARKER} $($p.Id)"`,
      '$p.WaitForExit()',
      'exit $p.ExitCode',
    ].join('; ');
    return {
      file: POWERSHELL,
      args: [...POWERSHELL_FLAGS, script],
      env: {},
      redactions,
      elevation: { kind: 'runas', shell: POWERSHELL },
    };
  }

  const env: Record<string, string> = {};
  const toolArgs: string[] = [];
  if (needsPasswordPrompt(tool)) {
    const askpass = await findAskpass(resolveEnv);
    if (askpass) {
      toolArgs.push('-A');
      env.SUDO_ASKPASS = askpass;
    } else {
      toolArgs.push('-S', '-p', ESCALATION_PROMPT);
    }
  }

  return {
    file: tool,
    args: [...toolArgs, openconnect, ...ocArgs],
    env,
    redactions,
    elevation: classifyTool(tool, platform),
  };
}

// ─── Elevated teardown ───────────────────────────────────────────────────

const POWERSHELL = 'powershell.exe';
const POWERSHELL_FLAGS = ['-NoProfile', '-NonInteractive', '-Command'];

/** Single-quoted PowerShell literal. */
function psQuote(value: string): string {
  return `'${value.replace(/'/g, "''")}'`;
}

/**
 * `-ArgumentList` joins its items with spaces unquoted, so items with
 * whitespace or quotes are wrapped for the Windows command-line parser.
 */
function psArgumentList(args: string[]): string {
  return args
    .map((arg) => (/[\s"]/.test(arg) ? `"${arg.replace(/"/g, '\\"')}"` : arg))
    .map(psQuote)
    .join(',');
}

/**
 * Commands that deliver `signal` to the elevated openconnect with the
 * same privileges it was started with.
 *
 * `wrapperPid` is the process that was spawned (sudo, pkexec, the shim or
 * the PowerShell wrapper). `elevatedPid` is the PID reported by the
 * Windows wrapper, when known. sudo keeps openconnect as a child, which
 * `pkill -P` reaches before sudo itself is signalled; pkexec execs
 * openconnect in place.
 */
export function elevatedKillCommands(
  elevation: Elevation,
  wrapperPid: number | null,
  elevatedPid: number | null,
  signal: TeardownSignal,
): HelperCommand[] {
  const sig = signal === 'SIGKILL' ? '-KILL' : '-TERM';

  switch (elevation.kind) {
    case 'sudo':
      if (wrapperPid === null) return [];
      return [
        { file: elevation.tool, args: ['-n', 'pkill', sig, '-P', String(wrapperPid)] },
        { file: elevation.tool, args: ['-n', 'kill', sig, String(wrapperPid)] },
      ];
    case 'pkexec':
      if (wrapperPid === null) return [];
      return [{ file: elevation.tool, args: ['kill', sig, String(wrapperPid)] }];
    case 'shim': {
      if (wrapperPid === null) return [];
      if (elevation.platform === 'win32') {
        const force = signal === 'SIGKILL' ? ['/F'] : [];
        return [{ file: elevation.tool, args: ['taskkill', ...force, '/T', '/PID', String(wrapperPid)] }];
      }
      return [{ file: elevation.tool, args: ['kill', sig, String(wrapperPid)] }];
    }
    case 'runas': {
      // A windowless openconnect ignores a polite taskkill, so both signals force
      const target = elevatedPid === null ? ['/IM', 'openconnect.exe'] : ['/PID', String(elevatedPid)];
      const script =
        `Start-Process -FilePath 'taskkill.exe' -ArgumentList ${['/F', '/T', ...target].map(psQuote).join(',')}` +
        ' -Verb RunAs -WindowStyle Hidden -Wait';
      return [{ file: elevation.shell, args: [...POWERSHELL_FLAGS, script] }];
    }
  }
}

/** Masks every redaction in an argument list. */
export function redactArgs(args: string[], redactions: string[]): string[] {
  return args.map((arg) =>
    redactions.reduce((masked, secret) => (secret ? masked.split(secret).join('***') : masked), arg),
  );
}
