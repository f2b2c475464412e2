/**
 * Session journal sink.
 *
 * Subscribes to a Session Coordinator and appends state transitions,
 * issued prompts, cookie purges and teardown warnings to events.jsonl
 * via @tunnelkit/core. Log lines are not journaled.
 */

import { appendSessionEvent, createSessionEvent, SessionEventType } from '@tunnelkit/core';
import type { SessionEvent } from '@tunnelkit/core';
import type { CoordinatorEvent, CoordinatorListener, SessionState } from '../types/index.js';

/** Flattens a state into journal `data`; the failure cause is dropped. */
function stateData(state: SessionState): Record<string, unknown> {
  switch (state.tag) {
    case 'Idle':
      return state.warning ? { state: 'Idle', warning: state.warning } : { state: 'Idle' };
    case 'LoggingIn':
      return {
        state: 'LoggingIn',
        attempt_id: state.attempt.id,
        mode: state.attempt.mode,
        retry_count: state.attempt.retryCount,
      };
    case 'StartingTunnel':
      return { state: 'StartingTunnel', interface: state.interfaceName };
    case 'Connected':
      return { state: 'Connected', interface: state.interfaceName, since: state.since };
    case 'Disconnecting':
      return { state: 'Disconnecting' };
    case 'Failed':
      return { state: 'Failed', code: state.reason.code, detail: state.reason.detail };
  }
}

/** Journal entries for a coordinator event; log lines map to none. */
export function toJournalEvent(event: CoordinatorEvent): SessionEvent[] {
  switch (event.type) {
    case 'state': {
      const entries = [
        createSessionEvent(SessionEventType.StateChanged, stateData(event.state), event.operationId),
      ];
      if (event.state.tag === 'Idle' && event.state.warning) {
        entries.push(
          createSessionEvent(
            SessionEventType.TeardownWarning,
            { warning: event.state.warning },
            event.operationId,
          ),
        );
      }
      return entries;
    }
    case 'prompt':
      // Only the kind: prompt text may name the user
      return [createSessionEvent(SessionEventType.PromptIssued, { kind: event.prompt.kind })];
    case 'cookie-purged':
      return [createSessionEvent(SessionEventType.CookiePurged)];
    default:
      return [];
  }
}

export interface JournalSinkOptions {
  /** Called when an append fails (default: a process warning) */
  onError?(err: unknown): void;
}

/**
 * Builds a listener that journals coordinator events. Appends are
 * chained so entries land in emission order.
 */
export function createJournalSink(
  dataDir: string,
  options: JournalSinkOptions = {},
): CoordinatorListener & { flush(): Promise<void> } {
  let chain: Promise<void> = Promise.resolve();
  const onError =
    options.onError ??
    ((err: unknown) =>
      process.emitWarning(`Journal append failed: ${err instanceof Error ? err.message : String(err)}`));

  const listener = (event: CoordinatorEvent): void => {
    for (const entry of toJournalEvent(event)) {
      chain = chain
        .then(() => appendSessionEvent(dataDir, entry))
        .catch(onError);
    }
  };

  return Object.assign(listener, { flush: () => chain });
}
