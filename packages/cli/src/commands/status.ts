import chalk from 'chalk';
import {
  acquireInstanceLease,
  AlreadyRunningError,
  FileCredentialStore,
  readSessionEvents,
  SessionEventType,
} from '@tunnelkit/core';
import { logger } from '../utils/logger.js';

export interface StatusReport {
  dataDir: string;
  /** Another instance holds the lease */
  running: boolean;
  cookie: { name: string; domain: string; obtainedAt: string } | null;
  /** Most recent journaled state */
  lastState: { state: string; timestamp: string; detail: string | null } | null;
}

async function isRunning(dataDir: string): Promise<boolean> {
  try {
    const lease = await acquireInstanceLease(dataDir);
    await lease.release();
    return false;
  } catch (err) {
    if (err instanceof AlreadyRunningError) return true;
    throw err;
  }
}

export async function collectStatus(dataDir: string): Promise<StatusReport> {
  const running = await isRunning(dataDir);
  const cookie = await new FileCredentialStore(dataDir).load();
  const [last] = await readSessionEvents(dataDir, { eventType: SessionEventType.StateChanged, limit: 1 });

  let lastState: StatusReport['lastState'] = null;
  const state = last?.data?.['state'];
  if (last && typeof state === 'string') {
    const detail = last.data?.['detail'] ?? last.data?.['warning'];
    lastState = {
      state,
      timestamp: last.timestamp,
      detail: typeof detail === 'string' ? detail : null,
    };
  }

  return {
    dataDir,
    running,
    cookie: cookie ? { name: cookie.name, domain: cookie.domain, obtainedAt: cookie.obtainedAt } : null,
    lastState,
  };
}

/** Prints what is known about the session without touching it. */
export async function runStatus(dataDir: string, options: { json?: boolean } = {}): Promise<StatusReport> {
  const report = await collectStatus(dataDir);
  if (options.json) {
    logger.info(JSON.stringify(report, null, 2));
    return report;
  }

  logger.info(`${chalk.bold('Data directory:')} ${report.dataDir}`);
  logger.info(`${chalk.bold('Instance:')}       ${report.running ? chalk.green('running') : 'not running'}`);
  logger.info(
    `${chalk.bold('Cookie:')}         ${
      report.cookie ? `${report.cookie.name} for ${report.cookie.domain}, saved ${report.cookie.obtainedAt}` : 'none'
    }`,
  );
  if (report.lastState) {
    const detail = report.lastState.detail ? ` (${report.lastState.detail})` : '';
    logger.info(`${chalk.bold('Last state:')}     ${report.lastState.state}${detail} at ${report.lastState.timestamp}`);
  }
  return report;
}
