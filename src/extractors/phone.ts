import type { Logger } from '../logger';
import { extractDigits, normalizePhone } from '../services/phoneNormalizer';
import type { PageAccessor, Phone } from '../types';
import { findFooter, findHeader, flatText } from '../utils/html';
import { PHONE_CANDIDATE_PATTERN, PLACEHOLDER_AREA_CODES } from '../utils/patterns';
import {
  CONTACT_PATHS,
  joinUrl,
  loadHomepage,
  loadPage,
  runChain,
  unsureResult,
  type ExtractionResult,
  type FieldExtractor,
  type PageContext,
  type Strategy,
} from './types';

type PhoneStrategy = Strategy<string, PageContext>;

/** Raw phone strings in reading order, placeholders and duplicates dropped. */
export function findPhoneNumbers(text: string): string[] {
  const seen = new Set<string>();
  const out: string[] = [];
  for (const match of text.matchAll(PHONE_CANDIDATE_PATTERN)) {
    const [raw, area, exchange, line] = match;
    if (PLACEHOLDER_AREA_CODES.has(area)) continue;
    const digits = `${area}${exchange}${line}`;
    if (seen.has(digits)) continue;
    seen.add(digits);
    out.push(raw.trim());
  }
  return out;
}

function phoneText(el: Element): string {
  const tel = Array.from(el.querySelectorAll('a[href^="tel:"]')).map((a) =>
    (a.getAttribute('href') ?? '').replace(/^tel:/i, '')
  );
  return [flatText(el), ...tel].join('\n');
}

function firstPhoneIn(el: Element | null): string | null {
  if (!el) return null;
  return findPhoneNumbers(phoneText(el))[0] ?? null;
}

export const headerPhoneStrategy: PhoneStrategy = {
  id: 'header',
  confidence: 'high',
  async attempt({ homepage }) {
    const value = firstPhoneIn(findHeader(homepage.doc));
    return value ? { value, evidence: homepage.url } : null;
  },
};

export const footerPhoneStrategy: PhoneStrategy = {
  id: 'footer',
  confidence: 'high',
  async attempt({ homepage }) {
    const value = firstPhoneIn(findFooter(homepage.doc));
    return value ? { value, evidence: homepage.url } : null;
  },
};

export const contactPagePhoneStrategy: PhoneStrategy = {
  id: 'contact_page',
  confidence: 'medium',
  async attempt({ page }) {
    for (const path of CONTACT_PATHS) {
      const contact = await loadPage(page, joinUrl(page.dealerUrl, path));
      const value = firstPhoneIn(contact?.doc.body ?? null);
      if (contact && value) return { value, evidence: contact.url };
    }
    return null;
  },
};

export const PHONE_STRATEGIES: ReadonlyArray<PhoneStrategy> = [
  headerPhoneStrategy,
  footerPhoneStrategy,
  contactPagePhoneStrategy,
];

export function createPhoneExtractor(deps: { logger: Logger }): FieldExtractor<Phone> {
  return {
    field: 'phone',
    async extract(page: PageAccessor): Promise<ExtractionResult<Phone>> {
      const homepage = await loadHomepage(page);
      if (!homepage) return unsureResult('Homepage not available');

      const result = await runChain(
        'phone',
        PHONE_STRATEGIES,
        { page, homepage, logger: deps.logger },
        { missMessage: 'No phone number found', validate: (raw) => extractDigits(raw) !== null }
      );
      const phone = result.value ? normalizePhone(result.value, result.strategy, result.confidence) : null;
      return { ...result, value: phone };
    },
  };
}
