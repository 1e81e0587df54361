import type { Logger } from '../logger';
import type { CreditFingerprint, FingerprintStore } from '../services/fingerprints';
import type { CreditAppProvider, PageAccessor } from '../types';
import {
  loadPage,
  runChain,
  unsureResult,
  type ExtractionResult,
  type ParsedPage,
  type Strategy,
} from './types';
import { UNSURE_PROVIDER, type FingerprintMatch } from './provider';

type CreditContext = {
  parsed: ParsedPage;
  logger: Logger;
  fingerprints: Array<[string, CreditFingerprint]>;
};

type CreditStrategy = Strategy<FingerprintMatch, CreditContext>;

const SNIPPET_RADIUS = 40;

function matchDomain(
  value: string,
  fingerprints: Array<[string, CreditFingerprint]>
): { match: FingerprintMatch; domain: string; index: number } | null {
  const lower = value.toLowerCase();
  for (const [key, fp] of fingerprints) {
    for (const domain of fp.domains) {
      const index = lower.indexOf(domain.toLowerCase());
      if (index >= 0) return { match: { key, displayName: fp.displayName }, domain, index };
    }
  }
  return null;
}

function srcMatch(selector: string, { parsed, fingerprints }: CreditContext) {
  for (const el of Array.from(parsed.doc.querySelectorAll(selector))) {
    const src = el.getAttribute('src') ?? '';
    const hit = matchDomain(src, fingerprints);
    if (hit) return { value: hit.match, evidence: src };
  }
  return null;
}

export const iframeCreditStrategy: CreditStrategy = {
  id: 'iframe',
  confidence: 'high',
  async attempt(ctx) {
    return srcMatch('iframe[src]', ctx);
  },
};

export const scriptCreditStrategy: CreditStrategy = {
  id: 'script_src',
  confidence: 'medium',
  async attempt(ctx) {
    return srcMatch('script[src]', ctx);
  },
};

/** Any mention of a provider domain in the page source. Competitor mentions can false-positive. */
export const pageSourceCreditStrategy: CreditStrategy = {
  id: 'page_source',
  confidence: 'low',
  async attempt({ parsed, fingerprints }) {
    const hit = matchDomain(parsed.html, fingerprints);
    if (!hit) return null;
    const start = Math.max(0, hit.index - SNIPPET_RADIUS);
    const end = hit.index + hit.domain.length + SNIPPET_RADIUS;
    const snippet = parsed.html.slice(start, end).replace(/\s+/g, ' ').trim();
    return { value: hit.match, evidence: snippet };
  },
};

export const CREDIT_PROVIDER_STRATEGIES: ReadonlyArray<CreditStrategy> = [
  iframeCreditStrategy,
  scriptCreditStrategy,
  pageSourceCreditStrategy,
];

export interface CreditProviderDetector {
  readonly field: string;
  detect(page: PageAccessor, creditAppUrl: string | null): Promise<ExtractionResult<CreditAppProvider>>;
}

/** Runs against the credit application page, not the homepage. */
export function createCreditProviderDetector(deps: {
  logger: Logger;
  fingerprints: FingerprintStore<CreditFingerprint>;
}): CreditProviderDetector {
  return {
    field: 'credit_provider',
    async detect(page, creditAppUrl) {
      if (!creditAppUrl) return unsureResult('No credit app URL', UNSURE_PROVIDER);

      const parsed = await loadPage(page, creditAppUrl);
      if (!parsed) return unsureResult(`Credit app page not available: ${creditAppUrl}`, UNSURE_PROVIDER);

      const result = await runChain(
        'credit_provider',
        CREDIT_PROVIDER_STRATEGIES,
        { parsed, logger: deps.logger, fingerprints: deps.fingerprints.entries() },
        { missMessage: `No provider detected on ${creditAppUrl}` }
      );
      if (!result.value) return { ...result, value: UNSURE_PROVIDER };

      return {
        ...result,
        value: {
          name: result.value.key,
          displayName: result.value.displayName,
          detectionMethod: result.strategy,
          confidence: result.confidence,
          evidence: result.evidence,
        },
      };
    },
  };
}
