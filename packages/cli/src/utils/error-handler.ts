import chalk from 'chalk';
import {
  AlreadyRunningError,
  LoginError,
  TunnelError,
  ValidationError,
} from '@tunnelkit/core';
import type { FailureReason } from '@tunnelkit/core';

/** Exit codes for the CLI. */
export const ExitCode = {
  Success: 0,
  GeneralError: 1,
  ValidationError: 2,
  AlreadyRunning: 3,
  LoginFailed: 4,
  TunnelFailed: 5,
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];

/** CLI-specific error with exit code. */
export class CLIError extends Error {
  constructor(
    message: string,
    public readonly exitCode: ExitCode = ExitCode.GeneralError,
  ) {
    super(message);
    this.name = 'CLIError';
  }
}

/** Exit code for a session that ended Failed. */
export function exitCodeForReason(reason: FailureReason): ExitCode {
  if (reason.code.startsWith('login.')) return ExitCode.LoginFailed;
  if (reason.code.startsWith('tunnel.')) return ExitCode.TunnelFailed;
  return ExitCode.GeneralError;
}

/** Maps an error thrown out of a command to its exit code. */
export function exitCodeFor(error: unknown): ExitCode {
  if (error instanceof CLIError) return error.exitCode;
  if (error instanceof ValidationError) return ExitCode.ValidationError;
  if (error instanceof AlreadyRunningError) return ExitCode.AlreadyRunning;
  if (error instanceof LoginError) return ExitCode.LoginFailed;
  if (error instanceof TunnelError) return ExitCode.TunnelFailed;
  return ExitCode.GeneralError;
}

/** Handles errors at the top level and exits with the appropriate code. */
export function handleError(error: unknown): never {
  const exitCode = exitCodeFor(error);

  if (error instanceof Error) {
    if (process.env['TUNNELKIT_VERBOSE'] === '1' && !(error instanceof CLIError)) {
      console.error(chalk.red(error.stack ?? error.message));
    } else {
      console.error(chalk.red(`Error: ${error.message}`));
    }
    process.exit(exitCode);
  }

  console.error(chalk.red(`Error: ${String(error)}`));
  process.exit(exitCode);
}
