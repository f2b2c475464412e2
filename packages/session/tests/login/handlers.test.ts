import { describe, it, expect, vi } from 'vitest';
import { CancellationToken } from '@tunnelkit/core';
import {
  createDefaultHandlers,
  createNgcPushHandler,
  errorBannerHandler,
  keepSignedInHandler,
  ngcErrorUsePasswordHandler,
  otpEntryHandler,
  pickAccountHandler,
  remoteNgcDeniedHandler,
  sessionConflictHandler,
  useAppInsteadHandler,
  verificationCodeChoiceHandler,
} from '../../src/login/handlers.js';
import type { HandlerContext, PageSnapshot } from '../../src/types/index.js';

function makePage(
  visible: string[],
  texts: Record<string, string> = {},
  checked: string[] = [],
): PageSnapshot & { clicks: string[]; fills: Array<[string, string]> } {
  const clicks: string[] = [];
  const fills: Array<[string, string]> = [];
  return {
    url: 'https://login.example.com/',
    title: '',
    clicks,
    fills,
    isVisible: async (selector) => visible.includes(selector),
    textOf: async (selector) => texts[selector] ?? null,
    isChecked: async (selector) => checked.includes(selector),
    fill: async (selector, value) => {
      fills.push([selector, value]);
    },
    click: async (selector) => {
      clicks.push(selector);
    },
  };
}

const context: HandlerContext = {
  email: null,
  prompter: {
    requestText: vi.fn().mockResolvedValue(null),
    requestSecret: vi.fn().mockResolvedValue(null),
    showMfaCode: vi.fn(),
  },
  token: new CancellationToken(),
  log: vi.fn(),
};

describe('page handlers', () => {
  it('continues an existing portal session', async () => {
    const page = makePage(['#DSIDConfirmForm']);

    const outcome = await sessionConflictHandler.inspect(page, context);

    expect(outcome.kind).toBe('Handled');
    expect(page.clicks).toEqual(['#btnContinue']);
  });

  it('is not applicable on unrelated pages', async () => {
    const page = makePage([]);

    expect(await sessionConflictHandler.inspect(page, context)).toEqual({ kind: 'NotApplicable' });
    expect(await pickAccountHandler.inspect(page, context)).toEqual({ kind: 'NotApplicable' });
    expect(await errorBannerHandler.inspect(page, context)).toEqual({ kind: 'NotApplicable' });
  });

  it('picks the first remembered account', async () => {
    const page = makePage(['#tilesHolder']);

    await pickAccountHandler.inspect(page, context);

    expect(page.clicks).toEqual(['#tilesHolder .table[role="button"]']);
  });

  it('turns a username error into a terminal failure', async () => {
    const page = makePage(['#usernameError'], { '#usernameError': 'We could not find an account.' });

    expect(await errorBannerHandler.inspect(page, context)).toEqual({
      kind: 'TerminalFailure',
      reason: 'We could not find an account.',
    });
  });

  it('lists error banners before the input pages', () => {
    const names = createDefaultHandlers().map((handler) => handler.name);

    expect(names).toEqual([
      'session-conflict',
      'pick-account',
      'error-banner',
      'remote-ngc-denied',
      'email',
      'ngc-error-use-password',
      'use-app-instead',
      'ngc-push',
      'password',
      'number-match',
      'kmsi',
      'verification-code-choice',
      'otp-entry',
    ]);
  });

  it('ticks "stay signed in" before confirming', async () => {
    const page = makePage(['#KmsiCheckboxField']);

    await keepSignedInHandler.inspect(page, context);

    expect(page.clicks).toEqual(['#KmsiCheckboxField', '#idSIButton9']);
  });

  it('leaves an already ticked "stay signed in" box alone', async () => {
    const page = makePage(['#KmsiCheckboxField'], {}, ['#KmsiCheckboxField']);

    await keepSignedInHandler.inspect(page, context);

    expect(page.clicks).toEqual(['#idSIButton9']);
  });
});

describe('MFA handlers', () => {
  it('moves on after a denied passwordless request', async () => {
    const page = makePage([], {
      '#loginHeader': 'Request denied',
      '#idDiv_RemoteNGC_PageDescription': 'We sent a sign-in request, but you denied it.',
    });

    const outcome = await remoteNgcDeniedHandler.inspect(page, context);

    expect(outcome).toEqual({ kind: 'Handled', note: 'passwordless request was denied' });
    expect(page.clicks).toEqual(['#idSIButton9']);
    expect(remoteNgcDeniedHandler.repeatable).toBe(true);
  });

  it('ignores other pages under a "Request denied" header', async () => {
    const page = makePage([], { '#loginHeader': 'Request denied' });

    expect(await remoteNgcDeniedHandler.inspect(page, context)).toEqual({ kind: 'NotApplicable' });
    expect(page.clicks).toEqual([]);
  });

  it('falls back to the password when the passwordless request was not sent', async () => {
    const page = makePage(['#idA_PWD_SwitchToPassword'], { '#loginHeader': "Request wasn't sent" });

    const outcome = await ngcErrorUsePasswordHandler.inspect(page, context);

    expect(outcome.kind).toBe('Handled');
    expect(page.clicks).toEqual(['#idA_PWD_SwitchToPassword']);
  });

  it('recognises the "couldn\'t send" description as well', async () => {
    const page = makePage(['#idA_PWD_SwitchToPassword'], {
      '#idDiv_RemoteNGC_PageDescription': "We couldn't send a notification to your app.",
    });

    expect((await ngcErrorUsePasswordHandler.inspect(page, context)).kind).toBe('Handled');
  });

  it('needs the switch link before falling back to the password', async () => {
    const page = makePage([], { '#loginHeader': "Request wasn't sent" });

    expect(await ngcErrorUsePasswordHandler.inspect(page, context)).toEqual({ kind: 'NotApplicable' });
  });

  it('switches to the authenticator app when offered', async () => {
    const page = makePage(['#idA_PWD_SwitchToRemoteNGC', 'input[name="passwd"]']);

    const outcome = await useAppInsteadHandler.inspect(page, context);

    expect(outcome).toEqual({ kind: 'Handled', note: 'switched to the authenticator app' });
    expect(page.clicks).toEqual(['#idA_PWD_SwitchToRemoteNGC']);
  });

  it('shows the authenticator push number once while waiting', async () => {
    const showMfaCode = vi.fn();
    const ctx: HandlerContext = { ...context, prompter: { ...context.prompter, showMfaCode } };
    const handler = createNgcPushHandler();
    const page = makePage([], {
      '#loginHeader': 'Approve sign in request',
      '#idDiv_RemoteNGC_PollingDescription': 'Open your Authenticator app, and enter the number shown.',
      '#idRemoteNGC_DisplaySign': '42',
    });

    const first = await handler.inspect(page, ctx);
    const second = await handler.inspect(page, ctx);

    expect(first).toEqual({ kind: 'Handled', note: 'waiting for authenticator approval' });
    expect(second).toEqual(first);
    expect(showMfaCode).toHaveBeenCalledTimes(1);
    expect(showMfaCode).toHaveBeenCalledWith('42');
    expect(handler.repeatable).toBe(true);
  });

  it('does not treat other approval pages as an authenticator push', async () => {
    const page = makePage([], { '#loginHeader': 'Approve sign in request' });

    expect(await createNgcPushHandler().inspect(page, context)).toEqual({ kind: 'NotApplicable' });
  });

  it('chooses the authenticator app on the verification method page', async () => {
    const appButton = '[role="button"]:has-text("Authenticator"), [role="button"]:has-text("mobile app")';
    const page = makePage([appButton], { '#idDiv_SAOTCS_Title': 'Verify your identity' });

    const outcome = await verificationCodeChoiceHandler.inspect(page, context);

    expect(outcome.kind).toBe('Handled');
    expect(page.clicks).toEqual([appButton]);
  });

  it('submits the one-time code the user enters', async () => {
    const requestText = vi.fn().mockResolvedValue(' 123456 ');
    const ctx: HandlerContext = { ...context, prompter: { ...context.prompter, requestText } };
    const page = makePage(['#idTxtBx_SAOTCC_OTC']);

    const outcome = await otpEntryHandler.inspect(page, ctx);

    expect(outcome).toEqual({ kind: 'Handled', note: 'submitted verification code' });
    expect(requestText).toHaveBeenCalledWith('Verification code', ctx.token);
    expect(page.fills).toEqual([['#idTxtBx_SAOTCC_OTC', '123456']]);
    expect(page.clicks).toEqual(['#idSubmit_SAOTCC_Continue']);
  });

  it('fails when the one-time code prompt is dismissed', async () => {
    const page = makePage(['#idTxtBx_SAOTCC_OTC']);

    expect(await otpEntryHandler.inspect(page, context)).toEqual({
      kind: 'TerminalFailure',
      reason: 'Verification code prompt was dismissed',
    });
  });
});
