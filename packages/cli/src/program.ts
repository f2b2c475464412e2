import { Command, Option } from 'commander';
import { getDataDir, LoginModeSchema } from '@tunnelkit/core';
import type { ConfigOverrides } from '@tunnelkit/core';
import { runClean } from './commands/clean.js';
import { runConnect } from './commands/connect.js';
import { runGetCookie } from './commands/get-cookie.js';
import { runInit } from './commands/init.js';
import { runStatus } from './commands/status.js';
import { setVerbose } from './utils/logger.js';

export const VERSION = '0.1.0';

interface GlobalFlags {
  dataDir?: string;
  verbose?: boolean;
}

/** Flags shared by the commands that sign in. */
export interface SessionFlags {
  url?: string;
  domain?: string;
  email?: string;
  mode?: string;
  interface?: string;
  escalationTool?: string;
  openconnect?: string;
  browser?: string;
  probe?: boolean;
}

/** Turns command-line flags into config overrides; unset flags stay unset. */
export function toOverrides(flags: SessionFlags): ConfigOverrides {
  return {
    portalUrl: flags.url,
    cookieDomain: flags.domain,
    email: flags.email,
    loginMode: flags.mode === undefined ? undefined : LoginModeSchema.parse(flags.mode),
    interfaceName: flags.interface,
    escalationTool: flags.escalationTool,
    openconnectPath: flags.openconnect,
    browserExecutablePath: flags.browser,
    probeStoredCookie: flags.probe === false ? false : undefined,
  };
}

function withSessionFlags(command: Command): Command {
  return command
    .option('--url <url>', 'portal URL to sign in to')
    .option('--domain <domain>', 'domain the session cookie is issued for')
    .option('--email <email>', 'account email filled in on the sign-in page')
    .addOption(
      new Option('--mode <mode>', 'how much of the sign-in is automated').choices(LoginModeSchema.options),
    )
    .option('--browser <path>', 'Chrome/Chromium executable to drive');
}

/** Builds the `tunnelkit` command tree. */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('tunnelkit')
    .description('Sign in to an SSO-protected VPN portal and run openconnect with the session cookie')
    .version(VERSION)
    .option('--data-dir <dir>', 'data directory (default: platform data dir or $TUNNELKIT_HOME)')
    .option('-v, --verbose', 'show engine and VPN client output')
    .hook('preAction', () => {
      setVerbose(program.opts<GlobalFlags>().verbose === true);
    });

  const dataDir = (): string => program.opts<GlobalFlags>().dataDir ?? getDataDir();

  withSessionFlags(program.command('connect'))
    .description('sign in if needed, start the tunnel and stay connected until Ctrl+C')
    .option('--interface <name>', 'tunnel interface name')
    .option('--escalation-tool <tool>', 'privilege escalation tool (sudo, doas, pkexec, ...)')
    .option('--openconnect <path>', 'openconnect executable')
    .action(async (flags: SessionFlags) => {
      await runConnect({ dataDir: dataDir(), overrides: toOverrides(flags) });
    });

  withSessionFlags(program.command('get-cookie'))
    .description('sign in and print the session cookie without starting a tunnel')
    .option('--no-probe', 'do not check whether a stored cookie is still accepted')
    .action(async (flags: SessionFlags) => {
      await runGetCookie({ dataDir: dataDir(), overrides: toOverrides(flags) });
    });

  program
    .command('clean')
    .description('remove the stored cookie and the browser profile')
    .action(async () => {
      await runClean(dataDir());
    });

  program
    .command('status')
    .description('show the stored cookie and the last recorded session state')
    .option('--json', 'print as JSON')
    .action(async (flags: { json?: boolean }) => {
      await runStatus(dataDir(), flags);
    });

  program
    .command('init')
    .description('write config.yaml')
    .requiredOption('--url <url>', 'portal URL to sign in to')
    .requiredOption('--domain <domain>', 'domain the session cookie is issued for')
    .option('--email <email>', 'account email filled in on the sign-in page')
    .option('--force', 'overwrite an existing config.yaml')
    .action(async (flags: { url: string; domain: string; email?: string; force?: boolean }) => {
      await runInit(
        dataDir(),
        { portalUrl: flags.url, cookieDomain: flags.domain, email: flags.email ?? null },
        { force: flags.force },
      );
    });

  return program;
}
