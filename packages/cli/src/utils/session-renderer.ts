import chalk from 'chalk';
import type { CredentialPrompt, SessionCoordinator, SessionState } from '@tunnelkit/session';
import { logger } from './logger.js';
import type { PromptIO } from './terminal-prompt.js';

export type Notice = { level: 'info' | 'success' | 'warn'; message: string };

/** What the terminal shows for a state, or null when it shows nothing. */
export function describeState(state: SessionState, previous: SessionState | null): Notice | null {
  switch (state.tag) {
    case 'LoggingIn': {
      const { attempt } = state;
      if (previous?.tag === 'LoggingIn' && previous.attempt.id === attempt.id) {
        if (previous.attempt.retryCount === attempt.retryCount) return null;
        return { level: 'warn', message: `Login page not recognised; reloading (retry ${attempt.retryCount})` };
      }
      return attempt.mode === 'manual'
        ? { level: 'info', message: 'Complete the sign-in in the browser window' }
        : { level: 'info', message: `Signing in (${attempt.mode})` };
    }
    case 'StartingTunnel':
      return { level: 'info', message: `Starting the VPN tunnel on ${state.interfaceName}` };
    case 'Connected':
      return {
        level: 'success',
        message: `Connected on ${state.interfaceName}. Press Ctrl+C to disconnect.`,
      };
    case 'Disconnecting':
      return { level: 'info', message: 'Disconnecting' };
    case 'Idle':
      return state.warning ? { level: 'warn', message: state.warning } : null;
    case 'Failed':
      return null;
  }
}

function questionFor(prompt: CredentialPrompt): string {
  switch (prompt.kind) {
    case 'escalation-password':
      return 'Password for privilege escalation:';
    case 'mfa':
      return `${prompt.text.replace(/:\s*$/, '')}:`;
    default:
      return `${prompt.text}:`;
  }
}

/**
 * Renders coordinator events on the terminal and answers prompts
 * through `io`. An open question is withdrawn when its prompt settles
 * elsewhere (cancellation, a newer prompt).
 *
 * @returns A function that stops rendering
 */
export function attachRenderer(
  coordinator: Pick<SessionCoordinator, 'subscribe'>,
  io: PromptIO,
): () => void {
  const open = new Map<string, AbortController>();
  let previous: SessionState | null = null;

  const answer = (prompt: CredentialPrompt): void => {
    const controller = new AbortController();
    open.set(prompt.id, controller);
    void io.ask(questionFor(prompt), { secret: prompt.secret, signal: controller.signal }).then(
      (value) => {
        open.delete(prompt.id);
        if (value === null) prompt.cancel();
        else prompt.respond(value);
      },
      (err: unknown) => {
        open.delete(prompt.id);
        logger.error(`Could not read the answer: ${err instanceof Error ? err.message : String(err)}`);
        prompt.cancel();
      },
    );
  };

  const unsubscribe = coordinator.subscribe((event) => {
    switch (event.type) {
      case 'state': {
        const notice = describeState(event.state, previous);
        previous = event.state;
        if (notice) logger[notice.level](notice.message);
        break;
      }
      case 'log':
        logger.engine(event.line);
        break;
      case 'mfa-code':
        logger.info(chalk.bold(`Approve the sign-in in your authenticator app by entering ${event.code}`));
        break;
      case 'cookie-purged':
        logger.warn('The stored session cookie was rejected and has been removed');
        break;
      case 'prompt':
        answer(event.prompt);
        break;
      case 'prompt-settled':
        open.get(event.promptId)?.abort();
        open.delete(event.promptId);
        break;
    }
  });

  return () => {
    unsubscribe();
    for (const controller of open.values()) controller.abort();
    open.clear();
  };
}
