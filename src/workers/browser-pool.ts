import { chromium } from 'playwright-core';
import { statusError } from '../errors.js';
import type { ReadinessCondition } from '../types/fetch.js';
import { logger } from '../utils/logger.js';

/*
 * The slice of the Playwright API the session relies on. Playwright's own
 * Browser satisfies it; tests supply fakes.
 */
export interface NavigationResponse {
  status(): number;
}

export interface RenderPage {
  /** Null when the navigation produced no response (same-document or about:blank) */
  goto(
    url: string,
    options: { waitUntil: 'domcontentloaded' | 'networkidle'; timeout: number },
  ): Promise<NavigationResponse | null>;
  waitForSelector(selector: string, options: { timeout: number }): Promise<unknown>;
  waitForTimeout(timeout: number): Promise<void>;
  content(): Promise<string>;
}

export interface RenderContext {
  newPage(): Promise<RenderPage>;
  close(): Promise<void>;
}

export interface RenderBrowser {
  isConnected(): boolean;
  newContext(options: { userAgent: string; viewport: { width: number; height: number } }): Promise<RenderContext>;
  close(): Promise<void>;
}

export type BrowserLauncher = () => Promise<RenderBrowser>;

export interface RenderOptions {
  timeoutMs: number;
  readiness: ReadinessCondition;
}

export const launchChromium: BrowserLauncher = () =>
  chromium.launch({
    headless: true,
    args: ['--no-sandbox', '--disable-setuid-sandbox'],
  });

/**
 * Long-lived browser shared by every browser-mode fetch of one run.
 * Relaunched when the previous instance has disconnected. A navigation
 * answered with HTTP 400 or above fails with the same FetchError as the
 * HTTP client gives.
 */
export class BrowserSession {
  private browser: RenderBrowser | null = null;
  private launching: Promise<RenderBrowser> | null = null;
  private launches = 0;

  constructor(private readonly launcher: BrowserLauncher = launchChromium) {}

  get launchCount(): number {
    return this.launches;
  }

  async render(url: string, options: RenderOptions): Promise<string> {
    const b = await this.getBrowser();
    const context = await b.newContext({
      userAgent:
        'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36',
      viewport: { width: 1280, height: 800 },
    });

    try {
      const page = await context.newPage();
      const response = await page.goto(url, { waitUntil: 'domcontentloaded', timeout: options.timeoutMs });
      // An error page never shows the readiness selector
      const status = response?.status() ?? null;
      if (status !== null && status >= 400) throw statusError(status, url);

      const { selector, settleMs } = options.readiness;
      if (selector) {
        await page.waitForSelector(selector, { timeout: options.timeoutMs });
      }
      if (settleMs) {
        await page.waitForTimeout(settleMs);
      }

      return await page.content();
    } finally {
      await this.closeContext(context);
    }
  }

  async close(): Promise<void> {
    const b = this.browser;
    this.browser = null;
    if (b) {
      await b.close();
    }
  }

  private async getBrowser(): Promise<RenderBrowser> {
    if (this.browser && this.browser.isConnected()) return this.browser;

    if (this.browser) {
      logger.warn('Browser disconnected, relaunching');
      this.browser = null;
    }

    // Concurrent callers share a single launch
    if (!this.launching) {
      this.launching = this.launcher()
        .then((b) => {
          this.browser = b;
          this.launches++;
          logger.info({ launches: this.launches }, 'Playwright browser launched');
          return b;
        })
        .finally(() => {
          this.launching = null;
        });
    }
    return this.launching;
  }

  private async closeContext(context: RenderContext): Promise<void> {
    try {
      await context.close();
    } catch (err) {
      // A crashed browser takes its contexts with it
      logger.debug({ err }, 'Browser context close failed');
    }
  }
}
