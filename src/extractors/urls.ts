import { maxConfidence } from '../confidence';
import type { Logger } from '../logger';
import {
  cleanFacebookUrl,
  facebookPageId,
  isDealerDomain,
  normalizeUrl,
} from '../services/urlNormalizer';
import { emptyUrlDiscovery, type PageAccessor, type UrlDiscovery } from '../types';
import { collectLinks } from '../utils/html';
import { CREDIT_URL_PATTERNS, SERVICE_URL_PATTERNS } from '../utils/patterns';
import {
  joinUrl,
  loadHomepage,
  runChain,
  unsureResult,
  type ExtractionResult,
  type FieldExtractor,
  type PageContext,
  type Strategy,
} from './types';

type UrlContext = PageContext & {
  tidy: (url: string) => string;
};

export type DiscoveredUrl = {
  url: string;
  /** Where the chain started: the matched href or the tried path URL. */
  start: string;
};

type UrlStrategy = Strategy<DiscoveredUrl, UrlContext>;

const SERVICE_KEYWORDS = ['service', 'appointment'];
const CREDIT_KEYWORDS = ['apply', 'credit', 'financing'];

const SERVICE_PROBE_PATHS = [
  '/service-appointment',
  '/schedule-service',
  '/service/schedule',
  '/book-service',
];

const CREDIT_PROBE_PATHS = [
  '/finance/apply-for-financing',
  '/finance/apply',
  '/apply-for-financing',
  '/credit-application',
];

// share widgets and embeds, not the dealer's own page
const FACEBOOK_SKIP = /facebook\.com\/(?:sharer|share\.php|plugins|dialog|tr\b)/i;

export function linkScanStrategy(patterns: RegExp[], keywords: string[]): UrlStrategy {
  return {
    id: 'link_scan',
    confidence: 'medium',
    async attempt({ homepage, page, tidy }) {
      for (const link of collectLinks(homepage.doc, homepage.url)) {
        const absolute = link.absolute;
        if (!absolute) continue;
        const text = link.text.toLowerCase();
        const matches =
          patterns.some((pattern) => pattern.test(absolute)) ||
          keywords.some((keyword) => text.includes(keyword));
        if (matches && isDealerDomain(absolute, page.dealerUrl)) {
          return { value: { url: tidy(absolute), start: absolute }, evidence: homepage.url };
        }
      }
      return null;
    },
  };
}

export function pathProbeStrategy(paths: string[]): UrlStrategy {
  return {
    id: 'common_paths',
    confidence: 'low',
    async attempt({ page, tidy }) {
      for (const path of paths) {
        const target = joinUrl(page.dealerUrl, path);
        const visit = await page.navigate(target);
        if (!visit || !isDealerDomain(visit.url, page.dealerUrl)) continue;
        // unknown paths that bounce to the homepage prove nothing
        if (new URL(visit.url).pathname === '/') continue;
        return { value: { url: tidy(visit.url), start: target }, evidence: target };
      }
      return null;
    },
  };
}

export const facebookLinkStrategy: UrlStrategy = {
  id: 'link_scan',
  confidence: 'medium',
  async attempt({ homepage, tidy }) {
    const links = collectLinks(homepage.doc, homepage.url);
    const byClass = links.filter((link) => link.className.toLowerCase().includes('facebook'));
    // icon links marked with a facebook class come before incidental mentions
    for (const link of [...byClass, ...links]) {
      const absolute = link.absolute;
      if (!absolute || FACEBOOK_SKIP.test(absolute)) continue;
      if (!absolute.toLowerCase().includes('facebook.com')) continue;
      return { value: { url: tidy(absolute), start: absolute }, evidence: homepage.url };
    }
    return null;
  },
};

export const SERVICE_STRATEGIES: ReadonlyArray<UrlStrategy> = [
  linkScanStrategy(SERVICE_URL_PATTERNS, SERVICE_KEYWORDS),
  pathProbeStrategy(SERVICE_PROBE_PATHS),
];

export const CREDIT_STRATEGIES: ReadonlyArray<UrlStrategy> = [
  linkScanStrategy(CREDIT_URL_PATTERNS, CREDIT_KEYWORDS),
  pathProbeStrategy(CREDIT_PROBE_PATHS),
];

export const FACEBOOK_STRATEGIES: ReadonlyArray<UrlStrategy> = [facebookLinkStrategy];

export function createUrlDiscoverer(deps: {
  logger: Logger;
  normalizeUrls?: boolean;
}): FieldExtractor<UrlDiscovery> {
  const normalizeUrls = deps.normalizeUrls ?? true;

  return {
    field: 'urls',
    async extract(page: PageAccessor): Promise<ExtractionResult<UrlDiscovery>> {
      const homepage = await loadHomepage(page);
      if (!homepage) return unsureResult('Homepage not available', emptyUrlDiscovery());

      const ctx = (tidy: (url: string) => string): UrlContext => ({
        page,
        homepage,
        logger: deps.logger,
        tidy: normalizeUrls ? tidy : (url) => url,
      });

      const service = await runChain('service_scheduler', SERVICE_STRATEGIES, ctx(normalizeUrl), {
        missMessage: 'No service scheduler URL found',
      });
      const credit = await runChain('credit_app', CREDIT_STRATEGIES, ctx(normalizeUrl), {
        missMessage: 'No credit application URL found',
      });
      const facebook = await runChain('facebook', FACEBOOK_STRATEGIES, ctx(cleanFacebookUrl), {
        missMessage: 'No Facebook URL found',
      });

      const fb = facebook.value;
      const urls: UrlDiscovery = {
        serviceScheduler: service.value?.url ?? null,
        serviceSchedulerSource: service.evidence,
        creditApp: credit.value?.url ?? null,
        creditAppSource: credit.evidence,
        facebook: fb?.url ?? null,
        facebookStart: fb?.start ?? null,
        facebookSource: fb ? `${fb.start} → ${fb.url}` : null,
        facebookPageId: fb ? facebookPageId(fb.url) : null,
      };

      const found = [service, credit, facebook].filter((result) => result.value !== null);
      if (!found.length) return unsureResult('No service, credit or Facebook URLs found', urls);

      return {
        value: urls,
        confidence: maxConfidence(...found.map((result) => result.confidence)),
        strategy: found[0].strategy,
        evidence: homepage.url,
        error: null,
      };
    },
  };
}
