import type { Logger } from '../logger';
import type { FingerprintStore, ProviderFingerprint } from '../services/fingerprints';
import type { PageAccessor, WebsiteProvider } from '../types';
import { findFooter, flatText } from '../utils/html';
import {
  loadHomepage,
  runChain,
  unsureResult,
  type ExtractionResult,
  type FieldExtractor,
  type PageContext,
  type Strategy,
} from './types';

export type FingerprintMatch = {
  key: string;
  displayName: string;
};

type ProviderContext = PageContext & {
  fingerprints: Array<[string, ProviderFingerprint]>;
};

type ProviderStrategy = Strategy<FingerprintMatch, ProviderContext>;

export const UNSURE_PROVIDER: WebsiteProvider = {
  name: 'unsure',
  displayName: 'Unsure',
  detectionMethod: null,
  confidence: 'unsure',
  evidence: null,
};

function matchClue(
  haystack: string,
  fingerprints: Array<[string, ProviderFingerprint]>,
  clues: (fp: ProviderFingerprint) => string[]
): { match: FingerprintMatch; clue: string } | null {
  const lower = haystack.toLowerCase();
  for (const [key, fp] of fingerprints) {
    const clue = clues(fp).find((c) => lower.includes(c.toLowerCase()));
    if (clue) return { match: { key, displayName: fp.displayName }, clue };
  }
  return null;
}

export const footerProviderStrategy: ProviderStrategy = {
  id: 'footer',
  confidence: 'high',
  async attempt({ homepage, fingerprints }) {
    const footer = findFooter(homepage.doc);
    if (!footer) return null;
    const hit = matchClue(flatText(footer), fingerprints, (fp) => fp.footerTextContains);
    return hit ? { value: hit.match, evidence: `${homepage.url} (footer: "${hit.clue}")` } : null;
  },
};

export const metaTagProviderStrategy: ProviderStrategy = {
  id: 'meta_tags',
  confidence: 'medium',
  async attempt({ homepage, fingerprints }) {
    const meta = Array.from(homepage.doc.querySelectorAll('meta'))
      .map((el) => `${el.getAttribute('name') ?? ''} ${el.getAttribute('content') ?? ''}`)
      .join('\n');
    const hit = matchClue(meta, fingerprints, (fp) => fp.structuredDataClues);
    return hit ? { value: hit.match, evidence: `${homepage.url} (meta: "${hit.clue}")` } : null;
  },
};

export const assetDomainProviderStrategy: ProviderStrategy = {
  id: 'domain',
  confidence: 'medium',
  async attempt({ homepage, fingerprints }) {
    const assets = Array.from(homepage.doc.querySelectorAll('script[src], link[href]')).map(
      (el) => el.getAttribute('src') ?? el.getAttribute('href') ?? ''
    );
    for (const asset of assets) {
      const hit = matchClue(asset, fingerprints, (fp) => fp.domainClues);
      if (hit) return { value: hit.match, evidence: asset };
    }
    return null;
  },
};

export const PROVIDER_STRATEGIES: ReadonlyArray<ProviderStrategy> = [
  footerProviderStrategy,
  metaTagProviderStrategy,
  assetDomainProviderStrategy,
];

/** Website platform detection. A miss still yields the explicit Unsure provider. */
export function createProviderDetector(deps: {
  logger: Logger;
  fingerprints: FingerprintStore<ProviderFingerprint>;
}): FieldExtractor<WebsiteProvider> {
  return {
    field: 'provider',
    async extract(page: PageAccessor): Promise<ExtractionResult<WebsiteProvider>> {
      const homepage = await loadHomepage(page);
      if (!homepage) return unsureResult('Homepage not available', UNSURE_PROVIDER);

      const result = await runChain(
        'provider',
        PROVIDER_STRATEGIES,
        { page, homepage, logger: deps.logger, fingerprints: deps.fingerprints.entries() },
        { missMessage: 'No provider fingerprint matched' }
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
