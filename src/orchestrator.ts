import { BrowserManager, type PageProvider } from './browser/manager';
import { RobotsTxtChecker, type RobotsVerdict } from './browser/robots';
import { CheckpointManager } from './checkpoint';
import type { ScraperConfig } from './config';
import { errorMessage } from './errors';
import { assembleEvidence, enforceEvidence, failedDealer, findMissingEvidence } from './evidence';
import { structuredAddresses } from './extractors/address';
import { createExtractors, type Extractors } from './extractors';
import { isSuccess, loadHomepage } from './extractors/types';
import type { Logger } from './logger';
import { formatTimestamp } from './output/template';
import { MarkdownWriter } from './output/writer';
import { CensusGeocoder } from './services/census';
import { CountyLookupService, UNSURE_COUNTY } from './services/countyLookup';
import { creditFingerprints, providerFingerprints } from './services/fingerprints';
import { emptyUrlDiscovery, type County, type DealerData } from './types';
import { pageTitle } from './utils/html';

export type DealershipDeps = {
  config: ScraperConfig;
  logger: Logger;
  extractors: Extractors;
  county: CountyLookupService | null;
  robots: { check(url: string): Promise<RobotsVerdict> };
  pages: PageProvider;
  now?: () => Date;
};

export type DealershipOutcome =
  | { ok: true; dealer: DealerData }
  | { ok: false; dealer: DealerData; error: string };

class DealershipError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'DealershipError';
  }
}

/**
 * Runs every extractor for one dealership, one after another on a single
 * browsing context. Faults are converted to a failed outcome, never thrown.
 */
export async function processDealership(url: string, deps: DealershipDeps): Promise<DealershipOutcome> {
  const { config, logger, extractors } = deps;
  const now = deps.now ?? (() => new Date());
  const started = Date.now();
  const captured = () => formatTimestamp(now(), config.timezone);

  const fail = (error: string): DealershipOutcome => ({
    ok: false,
    error,
    dealer: failedDealer(url, error, captured(), now().toISOString()),
  });

  const robots = await deps.robots.check(url);
  if (!robots.allowed) return fail('Disallowed by robots.txt');

  let delaySec = config.delayBetweenPagesSec;
  if (robots.crawlDelaySec && robots.crawlDelaySec > delaySec) {
    logger.info(`Applying robots.txt crawl-delay of ${robots.crawlDelaySec}s`);
    delaySec = robots.crawlDelaySec;
  }

  try {
    const dealer = await deps.pages.withDealerPage(url, delaySec, async (page) => {
      const homepage = await loadHomepage(page);
      if (!homepage) throw new DealershipError(`Failed to load homepage: ${url}`);

      const name = pageTitle(homepage.doc);
      logger.info(`Processing: ${name ?? url}`);

      const phone = await extractors.phone.extract(page);
      const address = await extractors.address.extract(page);

      let county: County | null = null;
      if (isSuccess(address) && deps.county) {
        county = await deps.county.lookupCounty(address.value);
      } else if (isSuccess(address)) {
        county = { ...UNSURE_COUNTY, source: 'Census lookup disabled' };
      }

      const hours = await extractors.hours.extract(page);
      const urls = await extractors.urls.extract(page);
      const provider = await extractors.provider.extract(page);

      const creditUrl = urls.value?.creditApp ?? null;
      const creditProvider = creditUrl
        ? await extractors.creditProvider.detect(page, creditUrl)
        : null;

      const evidence = assembleEvidence(
        { address, county, phone, hours, urls, provider, creditProvider },
        { capturedAt: captured(), captureConfidenceScores: config.captureConfidenceScores }
      );

      let locationsFound = 1;
      if (config.multiLocationEnabled) {
        const locations = structuredAddresses(homepage.doc, config.maxLocationsPerSite);
        locationsFound = Math.max(1, locations.length);
        if (locations.length > 1) {
          evidence.notes.push(
            `Additional locations: ${locations.slice(1).map((l) => l.fullAddress).join('; ')}`
          );
        }
      }

      for (const [field, result] of Object.entries({ phone, address, hours, urls, provider })) {
        if (result.error) logger.debug(`${field}: ${result.error}`);
      }

      const record: DealerData = {
        name,
        website: url,
        address: isSuccess(address) ? address.value : null,
        county,
        phone: phone.value,
        hours: isSuccess(hours) ? hours.value : null,
        urls: urls.value ?? emptyUrlDiscovery(),
        websiteProvider: provider.value,
        creditAppProvider: creditProvider?.value ?? null,
        evidence,
        locationsFound,
        processedAt: now().toISOString(),
        processingTimeSec: (Date.now() - started) / 1000,
      };
      return record;
    });

    if (!config.evidenceLinksRequired) return { ok: true, dealer };

    const missing = findMissingEvidence(dealer);
    if (missing.length) logger.warn(`${url}: no evidence for ${missing.join(', ')}; marking Unsure`);
    return { ok: true, dealer: enforceEvidence(dealer) };
  } catch (err) {
    logger.error(`Error processing ${url}: ${errorMessage(err)}`);
    return fail(errorMessage(err));
  }
}

export type BatchDeps = DealershipDeps & {
  checkpoint: CheckpointManager;
  writer: MarkdownWriter;
  signal?: AbortSignal;
};

export type BatchCounts = {
  completed: number;
  failed: number;
  skipped: number;
};

/**
 * Pulls URLs from a shared queue with up to `maxConcurrent` workers. Aborting
 * stops new URLs from starting; in-flight dealerships run to completion.
 */
export async function runBatch(urls: string[], deps: BatchDeps): Promise<BatchCounts> {
  const { checkpoint, writer, logger, signal } = deps;
  const queue = [...urls];
  const counts: BatchCounts = { completed: 0, failed: 0, skipped: 0 };

  const worker = async () => {
    for (let url = queue.shift(); url !== undefined; url = queue.shift()) {
      if (signal?.aborted) {
        counts.skipped++;
        continue;
      }

      logger.info(`\n→ ${url}`);
      const outcome = await processDealership(url, deps);
      writer.appendDealer(outcome.dealer);

      if (outcome.ok) {
        checkpoint.markCompleted(url, outcome.dealer.locationsFound);
        counts.completed++;
        logger.success(`Completed: ${outcome.dealer.name ?? url}`);
      } else {
        checkpoint.markFailed(url, outcome.error);
        counts.failed++;
        logger.error(`Failed: ${url} (${outcome.error})`);
      }
    }
  };

  const workers = Math.max(1, Math.min(deps.config.maxConcurrent, queue.length));
  await Promise.all(Array.from({ length: workers }, () => worker()));

  if (counts.skipped) logger.warn(`Run interrupted; ${counts.skipped} URL(s) left pending`);
  return counts;
}

export type RunOptions = {
  logger: Logger;
  resume?: boolean;
  sessionId?: string;
  signal?: AbortSignal;
};

export type RunSummary = {
  total: number;
  completed: number;
  failed: number;
  durationSec: number;
  outputFile: string;
};

export async function runScraper(config: ScraperConfig, urls: string[], opts: RunOptions): Promise<RunSummary> {
  const { logger } = opts;
  const started = Date.now();

  logger.header('Dealership Data + URL Discovery');

  const checkpoint = new CheckpointManager({ dir: config.checkpointDir, logger, sessionId: opts.sessionId });
  const writer = new MarkdownWriter(
    config.outputFile,
    { timezone: config.timezone, normalizePhone: config.normalizePhone },
    logger
  );

  let toProcess: string[];
  if (opts.resume && checkpoint.resumeLatest()) {
    toProcess = checkpoint.pendingUrls();
    logger.info(`Resuming session ${checkpoint.sessionId} with ${toProcess.length} pending URL(s)`);
  } else {
    if (opts.resume) logger.warn('Starting fresh');
    checkpoint.addPending(urls);
    toProcess = checkpoint.pendingUrls();
    writer.startRun();
  }

  const summary = (completed: number, failed: number): RunSummary => ({
    total: completed + failed,
    completed,
    failed,
    durationSec: (Date.now() - started) / 1000,
    outputFile: config.outputFile,
  });

  if (!toProcess.length) {
    logger.warn('No URLs to process');
    return summary(0, 0);
  }

  const browser = new BrowserManager(config, logger);
  const county = config.censusEnabled
    ? new CountyLookupService(new CensusGeocoder(logger, config.censusApiUrl), logger)
    : null;
  const extractors = createExtractors({
    logger,
    providerFingerprints: providerFingerprints(logger),
    creditFingerprints: creditFingerprints(logger),
    normalizeHours: config.normalizeHours,
    normalizeUrls: config.normalizeUrls,
  });
  const robots = new RobotsTxtChecker({
    userAgent: config.userAgent,
    respect: config.respectRobotsTxt,
    logger,
  });

  logger.section('Processing Dealerships');
  await browser.start();
  let counts: BatchCounts;
  try {
    counts = await runBatch(toProcess, {
      config,
      logger,
      extractors,
      county,
      robots,
      pages: browser,
      checkpoint,
      writer,
      signal: opts.signal,
    });
  } finally {
    await browser.stop();
  }

  const result = summary(counts.completed, counts.failed);
  logger.section('Run Summary');
  logger.info(`  Processed: ${result.total}`);
  logger.info(`  Completed: ${result.completed}`);
  logger.info(`  Failed: ${result.failed}`);
  logger.info(`  Duration: ${result.durationSec.toFixed(1)}s`);

  checkpoint.logSummary();
  checkpoint.cleanupOldCheckpoints(config.keepSessions);
  logger.info(`Output written to: ${config.outputFile}`);
  return result;
}
