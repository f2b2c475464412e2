import { loadConfig, withInstanceLease } from '@tunnelkit/core';
import type { ConfigOverrides } from '@tunnelkit/core';
import { createJournalSink, createSessionCoordinator } from '@tunnelkit/session';
import type { SessionCoordinator, SessionDependencies, SessionState } from '@tunnelkit/session';
import { CLIError, exitCodeForReason } from '../utils/error-handler.js';
import { logger } from '../utils/logger.js';
import { attachRenderer } from '../utils/session-renderer.js';
import { TerminalPromptIO } from '../utils/terminal-prompt.js';
import type { PromptIO } from '../utils/terminal-prompt.js';

export interface ConnectCommandOptions {
  dataDir: string;
  overrides?: ConfigOverrides;
}

/** Emits the signals that end the session (process in production). */
export type SignalSource = Pick<NodeJS.EventEmitter, 'on' | 'off'>;

export interface ConnectDeps {
  session?: SessionDependencies;
  io?: PromptIO;
  signals?: SignalSource;
  now?: () => number;
  /** Age in ms after which the instance lock counts as stale */
  leaseStaleMs?: number;
}

/** Formats a duration as `1h 2m 3s`, dropping leading zero units. */
export function formatDuration(ms: number): string {
  const total = Math.max(0, Math.floor(ms / 1000));
  const h = Math.floor(total / 3600);
  const m = Math.floor((total % 3600) / 60);
  const s = total % 60;
  if (h > 0) return `${h}h ${m}m ${s}s`;
  if (m > 0) return `${m}m ${s}s`;
  return `${s}s`;
}

/** Resolves with the first Idle or Failed state the coordinator publishes. */
function untilAtRest(coordinator: SessionCoordinator): { ended: Promise<SessionState>; dispose(): void } {
  let dispose: () => void = () => undefined;
  const ended = new Promise<SessionState>((resolve) => {
    dispose = coordinator.subscribe((event) => {
      if (event.type !== 'state') return;
      if (event.state.tag === 'Idle' || event.state.tag === 'Failed') resolve(event.state);
    });
  });
  return { ended, dispose: () => dispose() };
}

/**
 * Connects and stays in the foreground until the tunnel goes down or
 * SIGINT/SIGTERM arrives. Holds the instance lease for the whole run
 * and journals every state change. Losing the lease disconnects.
 *
 * @throws {CLIError} When the session ends Failed
 * @throws {LockTimeoutError} When the instance lock was lost during the run
 */
export async function runConnect(options: ConnectCommandOptions, deps: ConnectDeps = {}): Promise<SessionState> {
  const config = await loadConfig(options.dataDir, options.overrides);
  const now = deps.now ?? Date.now;

  return withInstanceLease(
    options.dataDir,
    async (lease) => {
      const coordinator = createSessionCoordinator(config, options.dataDir, deps.session);
      const unsubscribeLease = lease.onCompromised((err) => {
        logger.warn(`Instance lock lost (${err.message}); disconnecting`);
        coordinator.cancel();
      });
      const signals = deps.signals ?? process;
      const interrupt = (): void => {
        if (coordinator.cancel()) logger.debug('Interrupt received; disconnecting');
      };
      const io = deps.io ?? new TerminalPromptIO({ onInterrupt: interrupt });

      const journal = createJournalSink(options.dataDir);
      const unsubscribeJournal = coordinator.subscribe(journal);
      const detachRenderer = attachRenderer(coordinator, io);
      const rest = untilAtRest(coordinator);
      const connectedAt: number[] = [];
      const unsubscribeClock = coordinator.subscribe((event) => {
        if (event.type === 'state' && event.state.tag === 'Connected') connectedAt.push(now());
      });

      signals.on('SIGINT', interrupt);
      signals.on('SIGTERM', interrupt);
      try {
        logger.debug(`Portal ${config.portalUrl}, login mode ${config.loginMode}`);
        coordinator.connect();
        const final = await rest.ended;

        if (final.tag === 'Failed') {
          throw new CLIError(final.reason.detail, exitCodeForReason(final.reason));
        }
        if (connectedAt.length > 0) {
          logger.success(`Disconnected after ${formatDuration(now() - connectedAt[0])}`);
        } else {
          logger.info('Connect cancelled');
        }
        return final;
      } finally {
        unsubscribeLease();
        signals.off('SIGINT', interrupt);
        signals.off('SIGTERM', interrupt);
        rest.dispose();
        unsubscribeClock();
        detachRenderer();
        unsubscribeJournal();
        await journal.flush();
      }
    },
    { stale: deps.leaseStaleMs },
  );
}
