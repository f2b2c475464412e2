/**
 * Browser Engine: the seam between the Login Driver and a real browser.
 *
 * The Playwright implementation runs a persistent Chromium context on
 * the profile directory, so identity-provider cookies ("stay signed in")
 * survive between runs. playwright-core is loaded lazily and never
 * downloads a browser: it drives an installed Chrome/Chromium.
 */

import type { BrowserContext, Page } from 'playwright-core';
import type { PageSnapshot } from '../types/index.js';

export interface BrowserLaunchOptions {
  headless: boolean;
  profileDir: string;
  userAgent: string;
  /** Chromium-family binary; the installed Google Chrome when null */
  executablePath: string | null;
}

export interface BrowserCookie {
  name: string;
  value: string;
  domain: string;
}

/** One running browser instance. */
export interface BrowserSession {
  goto(url: string): Promise<void>;
  currentUrl(): string;
  cookies(): Promise<BrowserCookie[]>;
  snapshot(): Promise<PageSnapshot>;
  /**
   * Closes the browser and resolves once its process is gone.
   * Safe to call more than once.
   */
  close(): Promise<void>;
}

export interface BrowserEngine {
  launch(options: BrowserLaunchOptions): Promise<BrowserSession>;
}

const ACTION_TIMEOUT_MS = 5_000;
const NAVIGATION_TIMEOUT_MS = 30_000;

class PlaywrightPageSnapshot implements PageSnapshot {
  constructor(
    private readonly page: Page,
    readonly url: string,
    readonly title: string,
  ) {}

  async isVisible(selector: string): Promise<boolean> {
    return this.page.locator(selector).first().isVisible();
  }

  async textOf(selector: string): Promise<string | null> {
    const locator = this.page.locator(selector).first();
    if ((await locator.count()) === 0) return null;
    const text = await locator.innerText({ timeout: ACTION_TIMEOUT_MS });
    return text.trim();
  }

  async isChecked(selector: string): Promise<boolean> {
    const locator = this.page.locator(selector).first();
    if ((await locator.count()) === 0) return false;
    return locator.isChecked({ timeout: ACTION_TIMEOUT_MS });
  }

  async fill(selector: string, value: string): Promise<void> {
    await this.page.locator(selector).first().fill(value, { timeout: ACTION_TIMEOUT_MS });
  }

  async click(selector: string): Promise<void> {
    await this.page.locator(selector).first().click({ timeout: ACTION_TIMEOUT_MS });
  }
}

class PlaywrightBrowserSession implements BrowserSession {
  private closing: Promise<void> | null = null;

  constructor(
    private readonly context: BrowserContext,
    private readonly page: Page,
  ) {}

  async goto(url: string): Promise<void> {
    await this.page.goto(url, { waitUntil: 'domcontentloaded', timeout: NAVIGATION_TIMEOUT_MS });
  }

  currentUrl(): string {
    return this.page.url();
  }

  async cookies(): Promise<BrowserCookie[]> {
    const cookies = await this.context.cookies();
    return cookies.map(({ name, value, domain }) => ({ name, value, domain }));
  }

  async snapshot(): Promise<PageSnapshot> {
    const title = await this.page.title();
    return new PlaywrightPageSnapshot(this.page, this.page.url(), title);
  }

  close(): Promise<void> {
    if (!this.closing) {
      this.closing = this.context.close();
    }
    return this.closing;
  }
}

/** {@link BrowserEngine} over playwright-core. */
export class PlaywrightBrowserEngine implements BrowserEngine {
  async launch(options: BrowserLaunchOptions): Promise<BrowserSession> {
    const { chromium } = await import('playwright-core');
    const context = await chromium.launchPersistentContext(options.profileDir, {
      headless: options.headless,
      userAgent: options.userAgent,
      viewport: { width: 800, height: 800 },
      ...(options.executablePath
        ? { executablePath: options.executablePath }
        : { channel: 'chrome' }),
    });

    try {
      const page = context.pages()[0] ?? (await context.newPage());
      return new PlaywrightBrowserSession(context, page);
    } catch (err) {
      await context.close();
      throw err;
    }
  }
}
