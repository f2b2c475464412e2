import chalk from 'chalk';
import type { LogLine } from '@tunnelkit/session';

let verbose = false;

/** Enable or disable verbose logging. */
export function setVerbose(enabled: boolean): void {
  verbose = enabled;
  if (enabled) {
    process.env['TUNNELKIT_VERBOSE'] = '1';
  }
}

/** Returns whether verbose mode is active. */
export function isVerbose(): boolean {
  return verbose;
}

const SOURCE_LABEL: Record<LogLine['source'], string> = {
  coordinator: 'session',
  login: 'login',
  tunnel: 'vpn',
};

export const logger = {
  debug(message: string): void {
    if (verbose) {
      console.error(chalk.gray(`[debug] ${message}`));
    }
  },

  info(message: string): void {
    console.log(message);
  },

  warn(message: string): void {
    console.error(chalk.yellow(`Warning: ${message}`));
  },

  error(message: string): void {
    console.error(chalk.red(`Error: ${message}`));
  },

  success(message: string): void {
    console.log(chalk.green(message));
  },

  /** Renders a log line published by the session engine. */
  engine(line: LogLine): void {
    const text = `[${SOURCE_LABEL[line.source]}] ${line.message}`;
    switch (line.level) {
      case 'debug':
        if (verbose) console.error(chalk.gray(text));
        break;
      case 'info':
        if (verbose) console.error(text);
        break;
      case 'warn':
        console.error(chalk.yellow(text));
        break;
      case 'error':
        console.error(chalk.red(text));
        break;
    }
  },
};
