import type { Confidence } from '../confidence';
import { errorMessage } from '../errors';
import type { Logger } from '../logger';
import type { PageAccessor, PageVisit, StrategyTag } from '../types';
import { parseHtml } from '../utils/html';

export type ExtractionResult<T> = {
  value: T | null;
  confidence: Confidence;
  /** Which strategy in the chain produced the value. */
  strategy: StrategyTag | null;
  /** URL or locator the value was read from. */
  evidence: string | null;
  error: string | null;
};

export function isSuccess<T>(
  result: ExtractionResult<T>
): result is ExtractionResult<T> & { value: T } {
  return result.value !== null && result.confidence !== 'unsure';
}

export function unsureResult<T>(
  error: string,
  value: T | null = null,
  evidence: string | null = null
): ExtractionResult<T> {
  return { value, confidence: 'unsure', strategy: null, evidence, error };
}

export type Candidate<T> = {
  value: T;
  evidence: string;
};

/**
 * One step of a fallback chain. Returning null means "nothing here, try the
 * next strategy"; throwing is treated the same way after being logged.
 */
export interface Strategy<T, C> {
  readonly id: StrategyTag;
  readonly confidence: Confidence;
  attempt(ctx: C): Promise<Candidate<T> | null>;
}

export type ParsedPage = {
  url: string;
  html: string;
  doc: Document;
};

export type PageContext = {
  page: PageAccessor;
  homepage: ParsedPage;
  logger: Logger;
};

export interface FieldExtractor<T> {
  readonly field: string;
  extract(page: PageAccessor): Promise<ExtractionResult<T>>;
}

export type ChainOptions<T> = {
  /** Message carried by the unsure result when every strategy misses. */
  missMessage: string;
  validate?: (value: T) => boolean;
};

export async function runChain<T, C extends { logger: Logger }>(
  field: string,
  strategies: ReadonlyArray<Strategy<T, C>>,
  ctx: C,
  opts: ChainOptions<T>
): Promise<ExtractionResult<T>> {
  for (const strategy of strategies) {
    let candidate: Candidate<T> | null;
    try {
      candidate = await strategy.attempt(ctx);
    } catch (err) {
      ctx.logger.warn(`${field}: ${strategy.id} failed: ${errorMessage(err)}`);
      continue;
    }

    if (!candidate) {
      ctx.logger.debug(`${field}: ${strategy.id} found nothing`);
      continue;
    }
    if (opts.validate && !opts.validate(candidate.value)) {
      ctx.logger.debug(`${field}: ${strategy.id} candidate rejected by validator`);
      continue;
    }

    ctx.logger.debug(`${field}: ${strategy.id} accepted (${strategy.confidence})`);
    return {
      value: candidate.value,
      confidence: strategy.confidence,
      strategy: strategy.id,
      evidence: candidate.evidence,
      error: null,
    };
  }

  return unsureResult(opts.missMessage);
}

export const CONTACT_PATHS = ['/contact', '/contact-us', '/about/contact'];

export function joinUrl(base: string, path: string): string {
  return `${base.replace(/\/+$/, '')}${path}`;
}

const parsed = new WeakMap<PageVisit, ParsedPage>();

export function parseVisit(visit: PageVisit): ParsedPage {
  const cached = parsed.get(visit);
  if (cached) return cached;
  const page = { url: visit.url, html: visit.html, doc: parseHtml(visit.html, visit.url) };
  parsed.set(visit, page);
  return page;
}

export async function loadHomepage(page: PageAccessor): Promise<ParsedPage | null> {
  const visit = await page.homepage();
  return visit ? parseVisit(visit) : null;
}

export async function loadPage(page: PageAccessor, url: string): Promise<ParsedPage | null> {
  const visit = await page.navigate(url);
  return visit ? parseVisit(visit) : null;
}
