import robotsParser from 'robots-parser';

import { errorMessage } from '../errors';
import { fetchText, type TextFetcher } from '../http';
import type { Logger } from '../logger';

export type RobotsVerdict = {
  allowed: boolean;
  crawlDelaySec: number | null;
};

type Robots = ReturnType<typeof robotsParser>;

const ROBOTS_TIMEOUT_MS = 10_000;

const ALLOW_ALL: RobotsVerdict = { allowed: true, crawlDelaySec: null };

/**
 * robots.txt politeness check. One fetch per origin; anything that goes wrong
 * while fetching counts as "allowed".
 */
export class RobotsTxtChecker {
  private readonly cache = new Map<string, Robots | null>();

  constructor(
    private readonly opts: { userAgent: string; respect: boolean; logger: Logger },
    private readonly fetcher: TextFetcher = fetchText
  ) {}

  async check(url: string): Promise<RobotsVerdict> {
    if (!this.opts.respect) {
      this.opts.logger.debug(`robots.txt check bypassed for ${url}`);
      return ALLOW_ALL;
    }

    let origin: string;
    try {
      origin = new URL(url).origin;
    } catch {
      return ALLOW_ALL;
    }

    const robots = await this.robotsFor(origin);
    if (!robots) return ALLOW_ALL;

    const allowed = robots.isAllowed(url, this.opts.userAgent) ?? true;
    const crawlDelaySec = robots.getCrawlDelay(this.opts.userAgent) ?? null;

    if (!allowed) this.opts.logger.warn(`robots.txt disallows ${url} for "${this.opts.userAgent}"`);
    if (crawlDelaySec) this.opts.logger.info(`robots.txt crawl-delay ${crawlDelaySec}s for ${origin}`);

    return { allowed, crawlDelaySec };
  }

  clearCache(): void {
    this.cache.clear();
  }

  private async robotsFor(origin: string): Promise<Robots | null> {
    const cached = this.cache.get(origin);
    if (cached !== undefined) return cached;

    const robotsUrl = `${origin}/robots.txt`;
    let robots: Robots | null = null;
    try {
      const res = await this.fetcher(robotsUrl, {
        timeoutMs: ROBOTS_TIMEOUT_MS,
        userAgent: this.opts.userAgent,
        accept: 'text/plain',
      });
      if (res.status === 200) robots = robotsParser(robotsUrl, res.body);
      else if (res.status !== 404) this.opts.logger.warn(`HTTP ${res.status} fetching ${robotsUrl}`);
    } catch (err) {
      this.opts.logger.warn(`Could not fetch ${robotsUrl}: ${errorMessage(err)}`);
    }

    this.cache.set(origin, robots);
    return robots;
  }
}
