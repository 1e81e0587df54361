import { describe, expect, it } from 'vitest';

import { retryWithBackoff } from '../src/browser/retry';
import { RobotsTxtChecker } from '../src/browser/robots';
import { Semaphore } from '../src/browser/semaphore';
import { VisitCache, visitKey } from '../src/browser/visitCache';
import type { GetOptions, HttpResponse } from '../src/http';
import { noopLogger } from '../src/logger';
import type { PageVisit } from '../src/types';
import { recordingLogger } from './support/fakes';

describe('retry with backoff', () => {
  it('doubles the delay between attempts and returns the first success', async () => {
    const delays: number[] = [];
    const attempts: number[] = [];

    const value = await retryWithBackoff(
      async (attempt) => {
        attempts.push(attempt);
        if (attempt < 3) throw new Error(`attempt ${attempt} failed`);
        return 'loaded';
      },
      { attempts: 3, baseDelayMs: 100, sleep: async (ms) => void delays.push(ms) }
    );

    expect(value).toBe('loaded');
    expect(attempts).toEqual([1, 2, 3]);
    expect(delays).toEqual([100, 200]);
  });

  it('rethrows the last error once attempts run out', async () => {
    const retried: Array<[string, number, number]> = [];
    await expect(
      retryWithBackoff(
        async (attempt) => {
          throw new Error(`timeout ${attempt}`);
        },
        {
          attempts: 3,
          sleep: async () => {},
          onRetry: (err, attempt, delayMs) => {
            retried.push([err instanceof Error ? err.message : '', attempt, delayMs]);
          },
        }
      )
    ).rejects.toThrow('timeout 3');
    expect(retried).toEqual([
      ['timeout 1', 1, 1000],
      ['timeout 2', 2, 2000],
    ]);
  });

  it('stops early when the error is not retryable', async () => {
    let calls = 0;
    await expect(
      retryWithBackoff(
        async () => {
          calls++;
          throw new Error('HTTP 404');
        },
        { attempts: 5, sleep: async () => {}, shouldRetry: () => false }
      )
    ).rejects.toThrow('HTTP 404');
    expect(calls).toBe(1);
  });
});

describe('semaphore', () => {
  it('admits at most the configured number of holders', async () => {
    const gate = new Semaphore(2);
    let active = 0;
    let peak = 0;

    const task = (ms: number) =>
      gate.use(async () => {
        active++;
        peak = Math.max(peak, active);
        await new Promise((resolve) => setTimeout(resolve, ms));
        active--;
        return ms;
      });

    const results = await Promise.all([task(20), task(5), task(10), task(1)]);
    expect(results).toEqual([20, 5, 10, 1]);
    expect(peak).toBe(2);
    expect(gate.free).toBe(2);
  });

  it('releases the slot when the task throws', async () => {
    const gate = new Semaphore(1);
    await expect(gate.use(async () => Promise.reject(new Error('boom')))).rejects.toThrow('boom');
    expect(gate.free).toBe(1);
  });

  it('needs at least one slot', () => {
    expect(() => new Semaphore(0)).toThrow(RangeError);
  });
});

describe('visit cache', () => {
  const loader = () => {
    const loads: string[] = [];
    const load = async (url: string): Promise<PageVisit | null> => {
      loads.push(url);
      if (url.includes('missing')) return null;
      return { requestedUrl: url, url, status: 200, html: `<p>${url}</p>` };
    };
    return { loads, load };
  };

  it('loads each page once however often it is asked for', async () => {
    const { loads, load } = loader();
    const cache = new VisitCache(load);

    const first = await cache.get('https://dealer.test/contact');
    const again = await cache.get('https://dealer.test/contact/');
    await cache.get('https://dealer.test/contact#map');
    await cache.get('https://dealer.test/about');

    expect(again).toBe(first);
    expect(loads).toEqual(['https://dealer.test/contact', 'https://dealer.test/about']);
    expect(cache.size).toBe(2);
  });

  it('remembers pages that failed to load', async () => {
    const { loads, load } = loader();
    const cache = new VisitCache(load);

    expect(await cache.get('https://dealer.test/missing')).toBeNull();
    expect(await cache.get('https://dealer.test/missing')).toBeNull();
    expect(loads).toEqual(['https://dealer.test/missing']);
  });

  it('shares one load between concurrent requests', async () => {
    const { loads, load } = loader();
    const cache = new VisitCache(load);
    await Promise.all([cache.get('https://dealer.test/'), cache.get('https://dealer.test')]);
    expect(loads).toEqual(['https://dealer.test/']);
  });

  it('keys pages without fragment or trailing slash', () => {
    expect(visitKey('https://dealer.test/hours/#sales')).toBe('https://dealer.test/hours');
    expect(visitKey('https://dealer.test/')).toBe('https://dealer.test');
  });
});

describe('robots.txt checker', () => {
  const ROBOTS = ['User-agent: testbot', 'Disallow: /private', 'Crawl-delay: 5', '', 'User-agent: *', 'Disallow:'].join(
    '\n'
  );

  const fetcherFor = (response: HttpResponse | Error) => {
    const urls: string[] = [];
    const fetcher = async (url: string, _opts: GetOptions): Promise<HttpResponse> => {
      urls.push(url);
      if (response instanceof Error) throw response;
      return response;
    };
    return { urls, fetcher };
  };

  it('applies rules and crawl-delay for our user agent, fetching once per origin', async () => {
    const { urls, fetcher } = fetcherFor({ status: 200, body: ROBOTS });
    const checker = new RobotsTxtChecker({ userAgent: 'TestBot/1.0', respect: true, logger: noopLogger }, fetcher);

    expect(await checker.check('https://dealer.test/private/inventory')).toEqual({
      allowed: false,
      crawlDelaySec: 5,
    });
    expect(await checker.check('https://dealer.test/')).toEqual({ allowed: true, crawlDelaySec: 5 });
    expect(urls).toEqual(['https://dealer.test/robots.txt']);

    checker.clearCache();
    await checker.check('https://dealer.test/');
    expect(urls).toHaveLength(2);
  });

  it('allows everything when robots.txt is absent', async () => {
    const logger = recordingLogger();
    const { fetcher } = fetcherFor({ status: 404, body: '' });
    const checker = new RobotsTxtChecker({ userAgent: 'TestBot/1.0', respect: true, logger }, fetcher);
    expect(await checker.check('https://dealer.test/')).toEqual({ allowed: true, crawlDelaySec: null });
    expect(logger.lines.filter((line) => line.level === 'warn')).toEqual([]);
  });

  it('allows and warns when robots.txt cannot be fetched', async () => {
    const logger = recordingLogger();
    const { fetcher } = fetcherFor(new Error('ECONNRESET'));
    const checker = new RobotsTxtChecker({ userAgent: 'TestBot/1.0', respect: true, logger }, fetcher);
    expect((await checker.check('https://dealer.test/')).allowed).toBe(true);
    expect(logger.lines).toContainEqual({
      level: 'warn',
      message: 'Could not fetch https://dealer.test/robots.txt: ECONNRESET',
    });
  });

  it('skips the fetch entirely when robots.txt is not respected', async () => {
    const { urls, fetcher } = fetcherFor({ status: 200, body: ROBOTS });
    const checker = new RobotsTxtChecker({ userAgent: 'TestBot/1.0', respect: false, logger: noopLogger }, fetcher);
    expect((await checker.check('https://dealer.test/private')).allowed).toBe(true);
    expect(urls).toEqual([]);
  });
});
