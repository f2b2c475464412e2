import { describe, it, expect, beforeEach } from 'vitest';
import { CancellationToken } from '@tunnelkit/core';
import { PromptBroker } from '../../src/prompts/prompt-broker.js';
import type { CredentialPrompt } from '../../src/types/index.js';

describe('PromptBroker', () => {
  let issued: CredentialPrompt[];
  let settled: string[];
  let broker: PromptBroker;
  let token: CancellationToken;

  beforeEach(() => {
    issued = [];
    settled = [];
    broker = new PromptBroker({
      onIssued: (prompt) => issued.push(prompt),
      onSettled: (id) => settled.push(id),
    });
    token = new CancellationToken();
  });

  it('resolves with the response', async () => {
    const answer = broker.ask('escalation-password', 'Password:', token);

    expect(broker.current?.kind).toBe('escalation-password');
    expect(issued[0].secret).toBe(true);
    expect(broker.respond('test-password')).toBe(true);
    expect(await answer).toBe('test-password');
    expect(broker.current).toBeNull();
    expect(settled).toEqual([issued[0].id]);
  });

  it('resolves null when dismissed', async () => {
    const answer = broker.ask('login-text', 'Email address', token);

    expect(issued[0].secret).toBe(false);
    expect(broker.dismiss()).toBe(true);
    expect(await answer).toBeNull();
  });

  it('resolves null when the token fires', async () => {
    const answer = broker.ask('mfa', 'Token code:', token);
    token.cancel();

    expect(await answer).toBeNull();
    expect(broker.current).toBeNull();
  });

  it('supersedes the previous prompt', async () => {
    const first = broker.ask('login-text', 'Email address', token);
    const second = broker.ask('login-secret', 'Password', token);

    expect(await first).toBeNull();
    issued[1].respond('test-password');
    expect(await second).toBe('test-password');
  });

  it('reports false when nothing is pending', () => {
    expect(broker.respond('x')).toBe(false);
    expect(broker.dismiss()).toBe(false);
  });

  it('answers null immediately for a fired token', async () => {
    token.cancel();
    expect(await broker.ask('mfa', 'Token code:', token)).toBeNull();
    expect(issued).toHaveLength(0);
  });
});
