import { chromium, type Browser, type BrowserContext, type Page } from 'playwright-core';
import type { AppConfig } from '../config';
import type { BrowserSession, BrowserSessionFactory, FetchOptions, RenderedPage } from '../types';
import { errorMessage, FetchError } from '../utils/errors';
import { createLogger } from '../utils/logger';

const logger = createLogger('browser');

type BrowserConfig = AppConfig['browser'];

export interface PlaywrightSessionOptions extends BrowserConfig {
  fetchTimeoutMs: number;
}

/**
 * One browser context and page. The context keeps the cookies that hold
 * the selected currency, so a session must not be shared between workers.
 */
class PlaywrightSession implements BrowserSession {
  constructor(
    readonly id: string,
    private readonly context: BrowserContext,
    private readonly page: Page,
    private readonly timeoutMs: number
  ) {}

  async fetchRendered(url: string, options: FetchOptions = {}): Promise<RenderedPage> {
    try {
      await this.page.goto(url, { waitUntil: 'domcontentloaded', timeout: this.timeoutMs });

      for (const step of options.interaction ?? []) {
        const locator = this.page.locator(step.selector);
        const target = step.nth === undefined ? locator.first() : locator.nth(step.nth);
        await target.click({ timeout: this.timeoutMs });
      }

      const html = await this.page.innerHTML(options.scope ?? 'body', { timeout: this.timeoutMs });
      return { requestedUrl: url, finalUrl: this.page.url(), html };
    } catch (error) {
      throw new FetchError(`Failed to fetch ${url}: ${errorMessage(error)}`, url, { cause: error });
    }
  }

  async close(): Promise<void> {
    await this.context.close();
    logger.debug(`Session ${this.id} closed`);
  }
}

/**
 * PlaywrightSessionFactory
 * Launches Chromium lazily and hands out one isolated session per worker
 */
export class PlaywrightSessionFactory implements BrowserSessionFactory {
  // Shared by concurrent openSession() calls so Chromium launches once
  private launching: Promise<Browser> | null = null;
  private sessionCount = 0;

  constructor(private readonly options: PlaywrightSessionOptions) {}

  private getBrowser(): Promise<Browser> {
    this.launching ??= this.launch().catch((error: unknown) => {
      this.launching = null;
      throw error;
    });
    return this.launching;
  }

  private async launch(): Promise<Browser> {
    logger.info('Launching Chromium...');
    const browser = await chromium.launch({
      headless: this.options.headless,
      executablePath: this.options.executablePath,
      args: ['--no-sandbox', '--disable-dev-shm-usage'],
    });
    logger.info('Browser launched successfully');
    return browser;
  }

  async openSession(): Promise<BrowserSession> {
    const browser = await this.getBrowser();
    const context = await browser.newContext({
      viewport: { width: 1920, height: 1080 },
    });
    const page = await context.newPage();

    this.sessionCount++;
    const id = `session-${this.sessionCount}`;
    logger.debug(`Opened ${id}`);
    return new PlaywrightSession(id, context, page, this.options.fetchTimeoutMs);
  }

  async close(): Promise<void> {
    const launching = this.launching;
    if (!launching) return;
    this.launching = null;

    // A failed launch has already been reported to the session that asked for it
    const browser = await launching.catch(() => null);
    if (browser) {
      await browser.close();
      logger.info('Browser closed');
    }
  }
}
