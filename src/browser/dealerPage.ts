import { mkdirSync, writeFileSync } from 'node:fs';
import path from 'node:path';

import type { BrowserContext, Page } from 'playwright';

import { errorMessage } from '../errors';
import type { Logger } from '../logger';
import type { PageAccessor, PageVisit } from '../types';
import { retryWithBackoff, sleep } from './retry';
import { VisitCache } from './visitCache';

export type DealerPageOptions = {
  pageTimeoutMs: number;
  retryAttempts: number;
  delaySec: number;
  debug: {
    enabled: boolean;
    saveScreenshots: boolean;
    saveHtml: boolean;
    logNetwork: boolean;
    dir: string;
  };
};

const BLOCKED_RESOURCES = new Set(['image', 'media', 'font']);

/** Status codes that mean the page is not there; retrying would not help. */
const MISSING = new Set([404, 410]);

class HttpStatusError extends Error {
  constructor(readonly status: number, url: string) {
    super(`HTTP ${status} for ${url}`);
    this.name = 'HttpStatusError';
  }
}

export function debugFileStem(dealerUrl: string, url: string, reason: string): string {
  const host = new URL(dealerUrl).hostname.replace(/^www\./, '');
  const page = new URL(url).pathname.replace(/^\/+|\/+$/g, '').replace(/\//g, '_') || 'homepage';
  return `${host}_${page}_${reason}`;
}

/**
 * Playwright-backed page accessor for one dealership. A single tab is reused
 * for every navigation, so callers must not navigate concurrently. Each URL
 * is loaded at most once; later requests get the cached visit.
 */
export class DealerPage implements PageAccessor {
  private tab: Page | null = null;
  private readonly visits = new VisitCache((url) => this.load(url));

  constructor(
    private readonly context: BrowserContext,
    readonly dealerUrl: string,
    private readonly opts: DealerPageOptions,
    private readonly logger: Logger
  ) {}

  homepage(): Promise<PageVisit | null> {
    return this.visits.get(this.dealerUrl);
  }

  navigate(url: string): Promise<PageVisit | null> {
    return this.visits.get(url);
  }

  private async load(url: string): Promise<PageVisit | null> {
    const tab = await this.openTab();

    try {
      const visit = await retryWithBackoff(
        async (attempt) => {
          this.logger.debug(`Navigating to ${url} (attempt ${attempt})`);
          const response = await tab.goto(url, {
            waitUntil: 'domcontentloaded',
            timeout: this.opts.pageTimeoutMs,
          });
          const status = response?.status() ?? null;
          if (status !== null && status >= 400) throw new HttpStatusError(status, url);
          return { requestedUrl: url, url: tab.url(), status, html: await tab.content() };
        },
        {
          attempts: this.opts.retryAttempts,
          shouldRetry: (err) => !(err instanceof HttpStatusError && MISSING.has(err.status)),
          onRetry: (err, attempt, delayMs) =>
            this.logger.warn(`${errorMessage(err)} (attempt ${attempt}), retrying in ${delayMs}ms`),
        }
      );

      this.logger.debug(`Loaded ${visit.url}`);
      if (this.opts.delaySec > 0) await sleep(this.opts.delaySec * 1000);
      return visit;
    } catch (err) {
      if (err instanceof HttpStatusError && MISSING.has(err.status)) {
        this.logger.debug(errorMessage(err));
        return null;
      }
      this.logger.warn(`Giving up on ${url}: ${errorMessage(err)}`);
      await this.saveDebugInfo(tab, url, err instanceof HttpStatusError ? 'http' : 'error');
      return null;
    }
  }

  async close(): Promise<void> {
    if (!this.tab) return;
    try {
      await this.tab.close();
    } catch (err) {
      this.logger.warn(`Error closing page: ${errorMessage(err)}`);
    }
    this.tab = null;
  }

  private async openTab(): Promise<Page> {
    if (this.tab) return this.tab;

    const tab = await this.context.newPage();
    await tab.route('**/*', (route) =>
      BLOCKED_RESOURCES.has(route.request().resourceType()) ? route.abort() : route.continue()
    );
    if (this.opts.debug.enabled && this.opts.debug.logNetwork) {
      tab.on('request', (req) => this.logger.debug(`→ ${req.method()} ${req.url()}`));
    }
    this.tab = tab;
    return tab;
  }

  private async saveDebugInfo(tab: Page, url: string, reason: string): Promise<void> {
    const { debug } = this.opts;
    if (!debug.enabled) return;

    const stem = debugFileStem(this.dealerUrl, url, reason);
    try {
      if (debug.saveScreenshots) {
        const dir = path.join(debug.dir, 'screenshots');
        mkdirSync(dir, { recursive: true });
        await tab.screenshot({ path: path.join(dir, `${stem}.png`), fullPage: true });
      }
      if (debug.saveHtml) {
        const dir = path.join(debug.dir, 'html');
        mkdirSync(dir, { recursive: true });
        writeFileSync(path.join(dir, `${stem}.html`), await tab.content(), 'utf-8');
      }
    } catch (err) {
      this.logger.warn(`Could not save debug info for ${url}: ${errorMessage(err)}`);
    }
  }
}
