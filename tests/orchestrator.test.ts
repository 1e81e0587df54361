import path from 'node:path';

import { describe, expect, it } from 'vitest';

import type { PageProvider } from '../src/browser/manager';
import type { RobotsVerdict } from '../src/browser/robots';
import { CheckpointManager } from '../src/checkpoint';
import { ConfigFileSchema, buildScraperConfig, type ScraperConfig } from '../src/config';
import { createExtractors } from '../src/extractors';
import { noopLogger } from '../src/logger';
import { processDealership, runBatch, type DealershipDeps } from '../src/orchestrator';
import { MarkdownWriter } from '../src/output/writer';
import type { GeocodeMatch, Geocoder } from '../src/services/census';
import { CountyLookupService } from '../src/services/countyLookup';
import { creditFingerprints, providerFingerprints } from '../src/services/fingerprints';
import type { PageAccessor } from '../src/types';
import { FakeDealerPage, tempDir, writeJson, type FakePage } from './support/fakes';

const NOW = new Date('2026-10-18T17:05:00.000Z');
const DEALER = 'https://example-motors.test/';

const dealerSite: Record<string, FakePage> = {
  [DEALER]:
    '<html><head><title>Example Motors</title>' +
    '<script type="application/ld+json">' +
    JSON.stringify({
      '@type': 'AutoDealer',
      address: {
        streetAddress: '123 Main Street',
        addressLocality: 'Springfield',
        addressRegion: 'IL',
        postalCode: '62701',
      },
      geo: { latitude: 39.78, longitude: -89.65 },
    }) +
    '</script></head><body>' +
    '<header>Call (217) 555-0142</header>' +
    '<nav><a href="/service-appointment">Schedule Service</a><a href="/finance/apply">Get Pre-Approved</a></nav>' +
    '<footer>© Example Motors · Powered by ExampleCMS</footer>' +
    '</body></html>',
  'https://example-motors.test/hours':
    '<html><body><h2>Sales Hours</h2><p>Mon-Fri: 9:00 AM - 6:00 PM</p>' +
    '<p>Saturday: 10am-4pm</p><p>Sunday: Closed</p></body></html>',
  'https://example-motors.test/finance/apply':
    '<html><body><iframe src="https://apply.lendco.test/form"></iframe></body></html>',
};

const multiSite: Record<string, FakePage> = {
  'https://multi.test/':
    '<html><head><title>Multi Auto Group</title><script type="application/ld+json">' +
    JSON.stringify([
      {
        '@type': 'AutoDealer',
        address: { streetAddress: '123 Main Street', addressLocality: 'Springfield', addressRegion: 'IL', postalCode: '62701' },
      },
      {
        '@type': 'AutoDealer',
        address: { streetAddress: '9 Elm Road', addressLocality: 'Austin', addressRegion: 'TX', postalCode: '78701' },
      },
    ]) +
    '</script></head><body><p>Two stores</p></body></html>',
};

class FakePages implements PageProvider {
  readonly delays: number[] = [];

  constructor(private readonly sites: Record<string, Record<string, FakePage>>) {}

  async withDealerPage<T>(url: string, delaySec: number, fn: (page: PageAccessor) => Promise<T>): Promise<T> {
    this.delays.push(delaySec);
    return fn(new FakeDealerPage(url, this.sites[url] ?? {}));
  }
}

class SangamonGeocoder implements Geocoder {
  private readonly match: GeocodeMatch = {
    name: 'Sangamon County',
    stateFips: '17',
    countyFips: '167',
    verificationUrl: 'https://www.census.gov/quickfacts/fact/table/17167',
  };

  async byAddress() {
    return this.match;
  }

  async byCoordinates() {
    return this.match;
  }
}

const robots = {
  async check(url: string): Promise<RobotsVerdict> {
    if (url.includes('blocked')) return { allowed: false, crawlDelaySec: null };
    return { allowed: true, crawlDelaySec: 10 };
  },
};

function setup(overrides: Partial<ScraperConfig> = {}) {
  const dir = tempDir();
  const config: ScraperConfig = {
    ...buildScraperConfig(ConfigFileSchema.parse({}), {}, {}),
    maxConcurrent: 2,
    outputFile: path.join(dir, 'report.md'),
    checkpointDir: path.join(dir, 'checkpoints'),
    ...overrides,
  };
  const extractors = createExtractors({
    logger: noopLogger,
    providerFingerprints: providerFingerprints(
      noopLogger,
      writeJson(dir, 'providers.json', {
        example_cms: { displayName: 'ExampleCMS', footerTextContains: ['powered by examplecms'] },
      })
    ),
    creditFingerprints: creditFingerprints(
      noopLogger,
      writeJson(dir, 'credit.json', { lendco: { displayName: 'LendCo', domains: ['lendco.test'] } })
    ),
  });
  const pages = new FakePages({ [DEALER]: dealerSite, 'https://multi.test/': multiSite });
  const deps: DealershipDeps = {
    config,
    logger: noopLogger,
    extractors,
    county: new CountyLookupService(new SangamonGeocoder(), noopLogger),
    robots,
    pages,
    now: () => NOW,
  };
  return { config, deps, pages };
}

describe('processing one dealership', () => {
  it('fills every field from the site and records evidence', async () => {
    const { deps, pages } = setup();
    const outcome = await processDealership(DEALER, deps);
    expect(outcome.ok).toBe(true);

    const { dealer } = outcome;
    expect(dealer.name).toBe('Example Motors');
    expect(dealer.address?.fullAddress).toBe('123 Main Street, Springfield, IL 62701');
    expect(dealer.county?.fullName).toBe('Sangamon County');
    expect(dealer.phone?.pretty).toBe('(217) 555-0142');
    expect(dealer.hours?.service?.days.saturday).toBe('10:00 AM – 4:00 PM');
    expect(dealer.urls.serviceScheduler).toBe('https://example-motors.test/service-appointment');
    expect(dealer.urls.creditApp).toBe('https://example-motors.test/finance/apply');
    expect(dealer.websiteProvider?.displayName).toBe('ExampleCMS');
    expect(dealer.creditAppProvider?.displayName).toBe('LendCo');
    expect(dealer.evidence.addressSource).toBe('https://example-motors.test/ (JSON-LD AutoDealer) [schema_org]');
    expect(dealer.evidence.confidenceScores).toBe(
      'address=high, county=high, phone=high, hours=low, urls=medium, provider=high, credit_provider=high'
    );
    expect(dealer.evidence.capturedAt).toBe('2026-10-18 12:05 (America/Chicago)');
    expect(dealer.evidence.notes).toEqual([]);
    expect(dealer.locationsFound).toBe(1);
    expect(dealer.processedAt).toBe('2026-10-18T17:05:00.000Z');
    expect(pages.delays).toEqual([10]);
  });

  it('notes additional locations and marks the county Unsure when lookups are off', async () => {
    const { deps } = setup();
    const outcome = await processDealership('https://multi.test/', { ...deps, county: null });

    expect(outcome.dealer.locationsFound).toBe(2);
    expect(outcome.dealer.county?.fullName).toBe('Unsure');
    expect(outcome.dealer.county?.source).toBe('Census lookup disabled');
    expect(outcome.dealer.evidence.notes).toEqual(['Additional locations: 9 Elm Road, Austin, TX 78701']);
  });

  it('fails without visiting a site robots.txt disallows', async () => {
    const { deps, pages } = setup();
    const outcome = await processDealership('https://blocked.test/', deps);
    expect(outcome).toMatchObject({ ok: false, error: 'Disallowed by robots.txt' });
    expect(pages.delays).toEqual([]);
  });

  it('fails when the homepage does not load', async () => {
    const { deps } = setup();
    const outcome = await processDealership('https://down.test/', deps);
    expect(outcome.ok).toBe(false);
    expect(outcome.dealer.evidence.notes).toEqual(['Processing failed: Failed to load homepage: https://down.test/']);
  });
});

describe('batch runs', () => {
  const urls = [DEALER, 'https://blocked.test/', 'https://down.test/'];

  it('writes a block per dealership and records each outcome', async () => {
    const { config, deps } = setup();
    const checkpoint = new CheckpointManager({ dir: config.checkpointDir, logger: noopLogger, sessionId: 'batch' });
    const writer = new MarkdownWriter(config.outputFile, { timezone: config.timezone }, noopLogger);
    checkpoint.addPending(urls);
    writer.startRun();

    const counts = await runBatch(urls, { ...deps, checkpoint, writer });

    expect(counts).toEqual({ completed: 1, failed: 2, skipped: 0 });
    expect(checkpoint.completedUrls()).toEqual([DEALER]);
    expect([...checkpoint.failedUrls()].sort()).toEqual(['https://blocked.test/', 'https://down.test/']);
    expect(checkpoint.pendingUrls()).toEqual([]);
    expect(checkpoint.data.completed[0].locations_found).toBe(1);

    const blocks = writer.content().split('```markdown\n').slice(1);
    expect(blocks).toHaveLength(3);
    expect(blocks.some((block) => block.startsWith('Example Motors\n'))).toBe(true);
  });

  it('leaves everything pending once aborted', async () => {
    const { config, deps } = setup();
    const checkpoint = new CheckpointManager({ dir: config.checkpointDir, logger: noopLogger, sessionId: 'stop' });
    const writer = new MarkdownWriter(config.outputFile, { timezone: config.timezone }, noopLogger);
    checkpoint.addPending(urls);

    const controller = new AbortController();
    controller.abort();
    const counts = await runBatch(urls, { ...deps, checkpoint, writer, signal: controller.signal });

    expect(counts).toEqual({ completed: 0, failed: 0, skipped: 3 });
    expect(checkpoint.pendingUrls()).toEqual(urls);
    expect(writer.content()).toBe('');
  });
});
