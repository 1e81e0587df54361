import { utimesSync, writeFileSync } from 'node:fs';
import path from 'node:path';

import { describe, expect, it } from 'vitest';

import { createCreditProviderDetector } from '../src/extractors/creditProvider';
import { UNSURE_PROVIDER, createProviderDetector } from '../src/extractors/provider';
import { ConfigError } from '../src/errors';
import { noopLogger } from '../src/logger';
import {
  DEFAULT_PROVIDER_FINGERPRINTS,
  creditFingerprints,
  providerFingerprints,
} from '../src/services/fingerprints';
import { FakeDealerPage, recordingLogger, tempDir, writeJson } from './support/fakes';

const DEALER = 'https://example-motors.test/';
const CREDIT_URL = 'https://example-motors.test/finance/apply';

function providerStore() {
  const file = writeJson(tempDir(), 'providers.json', {
    example_cms: {
      displayName: 'ExampleCMS',
      footerTextContains: ['powered by examplecms'],
      structuredDataClues: ['examplecms sites'],
      domainClues: ['cdn.examplecms.test'],
    },
  });
  return providerFingerprints(noopLogger, file);
}

function creditStore() {
  const file = writeJson(tempDir(), 'credit.json', {
    lendco: { displayName: 'LendCo', domains: ['lendco.test'] },
  });
  return creditFingerprints(noopLogger, file);
}

describe('website provider detection', () => {
  const detector = createProviderDetector({ logger: noopLogger, fingerprints: providerStore() });

  it('matches footer text with high confidence', async () => {
    const page = new FakeDealerPage(DEALER, {
      [DEALER]: '<html><body><footer>© 2026 Example Motors. Powered by ExampleCMS</footer></body></html>',
    });
    const result = await detector.extract(page);
    const evidence = 'https://example-motors.test/ (footer: "powered by examplecms")';
    expect(result.confidence).toBe('high');
    expect(result.evidence).toBe(evidence);
    expect(result.value).toEqual({
      name: 'example_cms',
      displayName: 'ExampleCMS',
      detectionMethod: 'footer',
      confidence: 'high',
      evidence,
    });
  });

  it('matches meta tags', async () => {
    const page = new FakeDealerPage(DEALER, {
      [DEALER]:
        '<html><head><meta name="generator" content="ExampleCMS Sites 4.2"></head><body></body></html>',
    });
    const result = await detector.extract(page);
    expect(result.value?.detectionMethod).toBe('meta_tags');
    expect(result.confidence).toBe('medium');
    expect(result.evidence).toBe('https://example-motors.test/ (meta: "examplecms sites")');
  });

  it('matches asset domains', async () => {
    const page = new FakeDealerPage(DEALER, {
      [DEALER]:
        '<html><head><script src="https://cdn.examplecms.test/site.js"></script></head><body></body></html>',
    });
    const result = await detector.extract(page);
    expect(result.value?.detectionMethod).toBe('domain');
    expect(result.evidence).toBe('https://cdn.examplecms.test/site.js');
  });

  it('returns the explicit Unsure provider on a miss', async () => {
    const page = new FakeDealerPage(DEALER, { [DEALER]: '<html><body><footer>Hi</footer></body></html>' });
    const result = await detector.extract(page);
    expect(result.value).toEqual(UNSURE_PROVIDER);
    expect(result.confidence).toBe('unsure');
    expect(result.error).toBe('No provider fingerprint matched');
  });
});

describe('credit app provider detection', () => {
  const detector = createCreditProviderDetector({ logger: noopLogger, fingerprints: creditStore() });

  it('prefers an embedded iframe', async () => {
    const page = new FakeDealerPage(DEALER, {
      [CREDIT_URL]:
        '<html><body><script src="https://widgets.lendco.test/w.js"></script>' +
        '<iframe src="https://apply.lendco.test/form?d=1"></iframe></body></html>',
    });
    const result = await detector.detect(page, CREDIT_URL);
    expect(result.value).toEqual({
      name: 'lendco',
      displayName: 'LendCo',
      detectionMethod: 'iframe',
      confidence: 'high',
      evidence: 'https://apply.lendco.test/form?d=1',
    });
  });

  it('falls back to script sources', async () => {
    const page = new FakeDealerPage(DEALER, {
      [CREDIT_URL]: '<html><body><script src="https://widgets.lendco.test/w.js"></script></body></html>',
    });
    const result = await detector.detect(page, CREDIT_URL);
    expect(result.strategy).toBe('script_src');
    expect(result.confidence).toBe('medium');
  });

  it('uses a page-source mention as low-confidence evidence', async () => {
    const html = '<html><body><p>Financing partner: lendco.test network</p></body></html>';
    const page = new FakeDealerPage(DEALER, { [CREDIT_URL]: html });
    const result = await detector.detect(page, CREDIT_URL);
    expect(result.strategy).toBe('page_source');
    expect(result.confidence).toBe('low');
    expect(result.evidence).toBe(html);
  });

  it('is unsure without a credit app URL', async () => {
    const page = new FakeDealerPage(DEALER, {});
    const result = await detector.detect(page, null);
    expect(result.value).toEqual(UNSURE_PROVIDER);
    expect(result.error).toBe('No credit app URL');
    expect(page.visited).toEqual([]);
  });

  it('is unsure when the credit page does not load', async () => {
    const result = await detector.detect(new FakeDealerPage(DEALER, {}), CREDIT_URL);
    expect(result.error).toBe(`Credit app page not available: ${CREDIT_URL}`);
  });
});

describe('fingerprint store', () => {
  it('loads the bundled tables', () => {
    const store = providerFingerprints(noopLogger);
    expect(store.get('dealer_com')?.displayName).toBe('Dealer.com');
    expect(path.basename(DEFAULT_PROVIDER_FINGERPRINTS)).toBe('provider-fingerprints.json');
  });

  it('fills omitted clue lists with empty arrays', () => {
    const file = writeJson(tempDir(), 'fp.json', { bare: { displayName: 'Bare' } });
    expect(providerFingerprints(noopLogger, file).get('bare')).toEqual({
      displayName: 'Bare',
      footerTextContains: [],
      structuredDataClues: [],
      domainClues: [],
    });
  });

  it('reloads when the file changes', () => {
    const file = writeJson(tempDir(), 'credit.json', { a: { displayName: 'A', domains: ['a.test'] } });
    const store = creditFingerprints(noopLogger, file);
    expect(store.entries().map(([key]) => key)).toEqual(['a']);

    writeFileSync(file, JSON.stringify({ b: { displayName: 'B', domains: ['b.test'] } }));
    const later = new Date(Date.now() + 60_000);
    utimesSync(file, later, later);
    expect(store.entries().map(([key]) => key)).toEqual(['b']);
  });

  it('keeps the previous table when a reload fails', () => {
    const logger = recordingLogger();
    const file = writeJson(tempDir(), 'credit.json', { a: { displayName: 'A', domains: ['a.test'] } });
    const store = creditFingerprints(logger, file);
    store.entries();

    writeFileSync(file, '{ not json');
    const later = new Date(Date.now() + 60_000);
    utimesSync(file, later, later);
    expect(store.get('a')?.displayName).toBe('A');
    expect(logger.lines.some((line) => line.level === 'warn')).toBe(true);
  });

  it('raises a config error when the first load fails', () => {
    const store = creditFingerprints(noopLogger, path.join(tempDir(), 'missing.json'));
    expect(() => store.entries()).toThrow(ConfigError);
  });
});
