import { v4 as uuidv4 } from 'uuid';
import type { CancellationToken } from '@tunnelkit/core';
import type { CredentialPrompt, PromptKind } from '../types/index.js';

interface PendingPrompt {
  prompt: CredentialPrompt;
  settle(value: string | null): void;
}

export interface PromptBrokerCallbacks {
  onIssued(prompt: CredentialPrompt): void;
  onSettled(promptId: string): void;
}

/**
 * Holds the single pending {@link CredentialPrompt}. A new request
 * dismisses the previous one; cancellation of the requesting token
 * dismisses it too.
 */
export class PromptBroker {
  private pending: PendingPrompt | null = null;

  constructor(private readonly callbacks: PromptBrokerCallbacks) {}

  get current(): CredentialPrompt | null {
    return this.pending?.prompt ?? null;
  }

  /** Resolves with the user's answer, or null when dismissed/cancelled. */
  ask(kind: PromptKind, text: string, token: CancellationToken): Promise<string | null> {
    if (token.isCancelled) return Promise.resolve(null);
    this.dismiss();

    return new Promise((resolve) => {
      const id = uuidv4();
      let unsubscribe: () => void = () => undefined;

      const settle = (value: string | null): void => {
        if (this.pending?.prompt.id !== id) return;
        this.pending = null;
        unsubscribe();
        resolve(value);
        this.callbacks.onSettled(id);
      };

      const prompt: CredentialPrompt = {
        id,
        kind,
        text,
        secret: kind !== 'login-text',
        respond: (value) => settle(value),
        cancel: () => settle(null),
      };

      this.pending = { prompt, settle };
      unsubscribe = token.onCancel(() => settle(null));
      this.callbacks.onIssued(prompt);
    });
  }

  /** @returns false when no prompt is pending */
  respond(value: string): boolean {
    if (!this.pending) return false;
    this.pending.settle(value);
    return true;
  }

  /** @returns false when no prompt is pending */
  dismiss(): boolean {
    if (!this.pending) return false;
    this.pending.settle(null);
    return true;
  }
}
