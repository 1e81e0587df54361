import { chromium, type Browser } from 'playwright';

import type { ScraperConfig } from '../config';
import { errorMessage } from '../errors';
import type { Logger } from '../logger';
import type { PageAccessor } from '../types';
import { DealerPage } from './dealerPage';
import { Semaphore } from './semaphore';

/** Hands out isolated browsing contexts to dealership pipelines. */
export interface PageProvider {
  withDealerPage<T>(url: string, delaySec: number, fn: (page: PageAccessor) => Promise<T>): Promise<T>;
}

export class BrowserManager implements PageProvider {
  private browser: Browser | null = null;
  private readonly slots: Semaphore;

  constructor(
    private readonly config: ScraperConfig,
    private readonly logger: Logger
  ) {
    this.slots = new Semaphore(config.maxConcurrent);
  }

  async start(): Promise<void> {
    if (this.browser) return;
    this.browser = await chromium.launch({
      headless: this.config.headless,
      args: ['--disable-blink-features=AutomationControlled', '--no-sandbox', '--disable-dev-shm-usage'],
    });
    this.logger.info(`Browser launched (headless=${this.config.headless})`);
  }

  async stop(): Promise<void> {
    if (!this.browser) return;
    try {
      await this.browser.close();
    } catch (err) {
      this.logger.warn(`Error closing browser: ${errorMessage(err)}`);
    }
    this.browser = null;
    this.logger.info('Browser stopped');
  }

  /** One context per dealership; the slot and the context are always released. */
  async withDealerPage<T>(
    url: string,
    delaySec: number,
    fn: (page: PageAccessor) => Promise<T>
  ): Promise<T> {
    const browser = this.browser;
    if (!browser) throw new Error('Browser not started');

    return this.slots.use(async () => {
      const context = await browser.newContext({
        userAgent: this.config.userAgent,
        viewport: { width: 1920, height: 1080 },
        locale: this.config.locale,
        timezoneId: this.config.timezone,
        acceptDownloads: false,
      });
      context.setDefaultTimeout(this.config.pageTimeoutMs);

      const page = new DealerPage(
        context,
        url,
        {
          pageTimeoutMs: this.config.pageTimeoutMs,
          retryAttempts: this.config.retryAttempts,
          delaySec,
          debug: {
            enabled: this.config.debugMode,
            saveScreenshots: this.config.debugSaveScreenshots,
            saveHtml: this.config.debugSaveHtml,
            logNetwork: this.config.debugLogNetwork,
            dir: './debug',
          },
        },
        this.logger
      );

      try {
        return await fn(page);
      } finally {
        await page.close();
        await context.close().catch((err: unknown) => {
          this.logger.warn(`Error closing context: ${errorMessage(err)}`);
        });
      }
    });
  }
}
