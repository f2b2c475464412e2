/**
 * Page handlers for the Microsoft Entra sign-in pages in front of the
 * Ivanti/Pulse portal. Each one recognises exactly one page and acts
 * on it; the Login Driver tries them in list order on every poll.
 */

import { PageOutcome } from '../types/index.js';
import type { HandlerContext, PageHandler, PageSnapshot } from '../types/index.js';

// ─── Selectors ───────────────────────────────────────────────────────────

const SELECTORS = {
  sessionConflictForm: '#DSIDConfirmForm',
  sessionConflictContinue: '#btnContinue',
  emailInput: 'input[name="loginfmt"]',
  passwordInput: 'input[name="passwd"]',
  primaryButton: '#idSIButton9',
  kmsiCheckbox: '#KmsiCheckboxField',
  mfaTitle: '#idDiv_SAOTCAS_Title',
  mfaNumber: '#idRichContext_DisplaySign',
  usernameError: '#usernameError',
  passwordError: '#passwordError',
  accountTiles: '#tilesHolder',
  firstAccountTile: '#tilesHolder .table[role="button"]',
  loginHeader: '#loginHeader',
  remoteNgcDescription: '#idDiv_RemoteNGC_PageDescription',
  remoteNgcPolling: '#idDiv_RemoteNGC_PollingDescription',
  remoteNgcNumber: '#idRemoteNGC_DisplaySign',
  switchToPassword: '#idA_PWD_SwitchToPassword',
  switchToApp: '#idA_PWD_SwitchToRemoteNGC',
  proofChoiceTitle: '#idDiv_SAOTCS_Title',
  proofChoiceApp: '[role="button"]:has-text("Authenticator"), [role="button"]:has-text("mobile app")',
  otpInput: '#idTxtBx_SAOTCC_OTC',
  otpSubmit: '#idSubmit_SAOTCC_Continue',
} as const;

async function lowerText(page: PageSnapshot, selector: string): Promise<string> {
  return ((await page.textOf(selector)) ?? '').trim().toLowerCase();
}

// ─── Handlers ────────────────────────────────────────────────────────────

/** "You already have an active session": keep going with this one. */
export const sessionConflictHandler: PageHandler = {
  name: 'session-conflict',
  async inspect(page) {
    if (!(await page.isVisible(SELECTORS.sessionConflictForm))) return PageOutcome.notApplicable();
    await page.click(SELECTORS.sessionConflictContinue);
    return PageOutcome.handled('continued existing session');
  },
};

/** "Pick an account": take the first remembered account. */
export const pickAccountHandler: PageHandler = {
  name: 'pick-account',
  async inspect(page) {
    if (!(await page.isVisible(SELECTORS.accountTiles))) return PageOutcome.notApplicable();
    await page.click(SELECTORS.firstAccountTile);
    return PageOutcome.handled();
  },
};

/** Username/password error banners end the run: retrying would lock the account. */
export const errorBannerHandler: PageHandler = {
  name: 'error-banner',
  repeatable: true,
  async inspect(page) {
    for (const selector of [SELECTORS.usernameError, SELECTORS.passwordError]) {
      if (await page.isVisible(selector)) {
        const text = await page.textOf(selector);
        return PageOutcome.failure(text || 'The identity provider rejected the credentials');
      }
    }
    return PageOutcome.notApplicable();
  },
};

async function submitField(
  page: PageSnapshot,
  selector: string,
  value: string,
  button: string,
): Promise<void> {
  await page.fill(selector, value);
  await page.click(button);
}

export const emailHandler: PageHandler = {
  name: 'email',
  async inspect(page, ctx: HandlerContext) {
    if (!(await page.isVisible(SELECTORS.emailInput))) return PageOutcome.notApplicable();

    const email = ctx.email ?? (await ctx.prompter.requestText('Email address', ctx.token));
    if (email === null) return PageOutcome.failure('Email prompt was dismissed');

    await submitField(page, SELECTORS.emailInput, email, SELECTORS.primaryButton);
    return PageOutcome.handled('submitted email');
  },
};

export const passwordHandler: PageHandler = {
  name: 'password',
  async inspect(page, ctx) {
    if (!(await page.isVisible(SELECTORS.passwordInput))) return PageOutcome.notApplicable();

    const password = await ctx.prompter.requestSecret('Password', ctx.token);
    if (password === null) return PageOutcome.failure('Password prompt was dismissed');

    await submitField(page, SELECTORS.passwordInput, password, SELECTORS.primaryButton);
    return PageOutcome.handled('submitted password');
  },
};

/**
 * Number-matching push approval. The page stays up until the user
 * approves on their phone, so the handler is repeatable and keeps the
 * run from counting as stuck.
 */
export function createNumberMatchHandler(): PageHandler {
  let shownCode: string | null = null;
  return {
    name: 'number-match',
    repeatable: true,
    async inspect(page, ctx) {
      if (!(await page.isVisible(SELECTORS.mfaTitle))) {
        shownCode = null;
        return PageOutcome.notApplicable();
      }
      const code = await page.textOf(SELECTORS.mfaNumber);
      if (code && code !== shownCode) {
        shownCode = code;
        ctx.prompter.showMfaCode(code);
        ctx.log(`Approve the sign-in on your device by entering ${code}`);
      }
      return PageOutcome.handled('waiting for MFA approval');
    },
  };
}

/** "Request denied" after rejecting a passwordless push: move on to the next page. */
export const remoteNgcDeniedHandler: PageHandler = {
  name: 'remote-ngc-denied',
  repeatable: true,
  async inspect(page) {
    if ((await lowerText(page, SELECTORS.loginHeader)) !== 'request denied') {
      return PageOutcome.notApplicable();
    }
    if (!(await lowerText(page, SELECTORS.remoteNgcDescription)).includes('but you denied it')) {
      return PageOutcome.notApplicable();
    }
    await page.click(SELECTORS.primaryButton);
    return PageOutcome.handled('passwordless request was denied');
  },
};

/** The passwordless request could not be sent: fall back to the password. */
export const ngcErrorUsePasswordHandler: PageHandler = {
  name: 'ngc-error-use-password',
  async inspect(page) {
    const header = await lowerText(page, SELECTORS.loginHeader);
    const description = await lowerText(page, SELECTORS.remoteNgcDescription);
    if (!header.includes("request wasn't sent") && !description.includes("couldn't send")) {
      return PageOutcome.notApplicable();
    }
    if (!(await page.isVisible(SELECTORS.switchToPassword))) return PageOutcome.notApplicable();
    await page.click(SELECTORS.switchToPassword);
    return PageOutcome.handled('switched to password');
  },
};

/** Password page that offers the authenticator app instead. */
export const useAppInsteadHandler: PageHandler = {
  name: 'use-app-instead',
  async inspect(page) {
    if (!(await page.isVisible(SELECTORS.switchToApp))) return PageOutcome.notApplicable();
    await page.click(SELECTORS.switchToApp);
    return PageOutcome.handled('switched to the authenticator app');
  },
};

/** Passwordless "Approve sign in request" push, waiting on the authenticator app. */
export function createNgcPushHandler(): PageHandler {
  let shownCode: string | null = null;
  return {
    name: 'ngc-push',
    repeatable: true,
    async inspect(page, ctx) {
      const header = await lowerText(page, SELECTORS.loginHeader);
      const polling = await lowerText(page, SELECTORS.remoteNgcPolling);
      if (!header.includes('approve sign in') || !polling.includes('authenticator app')) {
        shownCode = null;
        return PageOutcome.notApplicable();
      }
      const code = ((await page.textOf(SELECTORS.remoteNgcNumber)) ?? '').trim();
      if (code && code !== shownCode) {
        shownCode = code;
        ctx.prompter.showMfaCode(code);
        ctx.log(`Approve the sign-in in the authenticator app by entering ${code}`);
      } else if (!code && shownCode === null) {
        shownCode = '';
        ctx.log('Approve the sign-in in the authenticator app');
      }
      return PageOutcome.handled('waiting for authenticator approval');
    },
  };
}

/** "Verify your identity": choose the authenticator app. */
export const verificationCodeChoiceHandler: PageHandler = {
  name: 'verification-code-choice',
  async inspect(page) {
    if (!(await lowerText(page, SELECTORS.proofChoiceTitle)).includes('verify your identity')) {
      return PageOutcome.notApplicable();
    }
    if (!(await page.isVisible(SELECTORS.proofChoiceApp))) return PageOutcome.notApplicable();
    await page.click(SELECTORS.proofChoiceApp);
    return PageOutcome.handled('chose the authenticator app');
  },
};

/** One-time code from the authenticator app. */
export const otpEntryHandler: PageHandler = {
  name: 'otp-entry',
  async inspect(page, ctx) {
    if (!(await page.isVisible(SELECTORS.otpInput))) return PageOutcome.notApplicable();

    const code = await ctx.prompter.requestText('Verification code', ctx.token);
    if (code === null) return PageOutcome.failure('Verification code prompt was dismissed');

    await submitField(page, SELECTORS.otpInput, code.trim(), SELECTORS.otpSubmit);
    return PageOutcome.handled('submitted verification code');
  },
};

/** "Stay signed in?": yes. */
export const keepSignedInHandler: PageHandler = {
  name: 'kmsi',
  async inspect(page) {
    if (!(await page.isVisible(SELECTORS.kmsiCheckbox))) return PageOutcome.notApplicable();
    if (!(await page.isChecked(SELECTORS.kmsiCheckbox))) await page.click(SELECTORS.kmsiCheckbox);
    await page.click(SELECTORS.primaryButton);
    return PageOutcome.handled();
  },
};

/**
 * Default handler list. Order matters: error banners are checked before
 * the input pages they appear on, and the switch to the authenticator
 * app before the password field on the same page.
 */
export function createDefaultHandlers(): PageHandler[] {
  return [
    sessionConflictHandler,
    pickAccountHandler,
    errorBannerHandler,
    remoteNgcDeniedHandler,
    emailHandler,
    ngcErrorUsePasswordHandler,
    useAppInsteadHandler,
    createNgcPushHandler(),
    passwordHandler,
    createNumberMatchHandler(),
    keepSignedInHandler,
    verificationCodeChoiceHandler,
    otpEntryHandler,
  ];
}
