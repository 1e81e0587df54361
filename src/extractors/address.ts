import type { Logger } from '../logger';
import { cleanGoogleMapsUrl } from '../services/urlNormalizer';
import type { Address, PageAccessor } from '../types';
import { findFooter, findHeader, flatText } from '../utils/html';
import { ADDRESS_PATTERN, GOOGLE_MAPS_PATTERN } from '../utils/patterns';
import {
  extractLdGeo,
  isRecord,
  ldString,
  ldTypes,
  readLdJson,
  type LdObject,
} from '../utils/structuredData';
import { isValidAddress, type AddressParts } from '../utils/validators';
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

export type AddressCandidate = Omit<Address, 'source' | 'confidence'>;

type AddressStrategy = Strategy<AddressCandidate, PageContext>;

const BUSINESS_TYPES = new Set(['LocalBusiness', 'Organization', 'AutomotiveBusiness', 'AutoDealer']);

export function buildAddress(
  parts: AddressParts,
  geo: { latitude: number | null; longitude: number | null } = { latitude: null, longitude: null }
): AddressCandidate {
  const clean = (s: string) => s.replace(/\s+/g, ' ').trim();
  const street = clean(parts.street);
  const city = clean(parts.city);
  const state = clean(parts.state).toUpperCase();
  const zip = clean(parts.zip);
  return {
    street,
    city,
    state,
    zip,
    fullAddress: `${street}, ${city}, ${state} ${zip}`,
    latitude: geo.latitude,
    longitude: geo.longitude,
  };
}

/** First address-shaped run in free text; only that first match is considered. */
export function parseAddressFromText(text: string): AddressCandidate | null {
  const match = ADDRESS_PATTERN.exec(text.replace(/\s+/g, ' '));
  if (!match) return null;
  return buildAddress({ street: match[1], city: match[2], state: match[3], zip: match[4] });
}

function addressFromLd(item: LdObject): AddressCandidate | null {
  const raw = Array.isArray(item.address) ? item.address[0] : item.address;
  if (!isRecord(raw)) return null;
  return buildAddress(
    {
      street: ldString(raw.streetAddress),
      city: ldString(raw.addressLocality),
      state: ldString(raw.addressRegion),
      zip: ldString(raw.postalCode),
    },
    extractLdGeo(item)
  );
}

function businessObjects(objects: LdObject[]): LdObject[] {
  return objects.filter((item) => ldTypes(item).some((type) => BUSINESS_TYPES.has(type)));
}

/** Distinct valid structured-data addresses on a page, for multi-location sites. */
export function structuredAddresses(doc: Document, max: number): AddressCandidate[] {
  const seen = new Set<string>();
  const out: AddressCandidate[] = [];
  for (const item of businessObjects(readLdJson(doc).objects)) {
    const address = addressFromLd(item);
    if (!address || !isValidAddress(address)) continue;
    const key = address.fullAddress.toLowerCase();
    if (seen.has(key)) continue;
    seen.add(key);
    out.push(address);
    if (out.length >= max) break;
  }
  return out;
}

export const googleMapsStrategy: AddressStrategy = {
  id: 'google_maps',
  confidence: 'high',
  async attempt({ homepage, logger }) {
    const links = Array.from(homepage.doc.querySelectorAll('a[href], iframe[src]'))
      .map((el) => el.getAttribute('href') ?? el.getAttribute('src') ?? '')
      .filter((href) => GOOGLE_MAPS_PATTERN.test(href));
    if (links.length) {
      // Maps pages are not scraped; the link only marks where the source of truth lives.
      logger.debug(`Google Maps link on homepage: ${cleanGoogleMapsUrl(links[0])}`);
    }
    return null;
  },
};

export const schemaOrgStrategy: AddressStrategy = {
  id: 'schema_org',
  confidence: 'high',
  async attempt({ homepage, logger }) {
    const { objects, errors } = readLdJson(homepage.doc);
    for (const error of errors) logger.warn(`Malformed JSON-LD on ${homepage.url}: ${error}`);

    for (const item of businessObjects(objects)) {
      const value = addressFromLd(item);
      if (value) return { value, evidence: `${homepage.url} (JSON-LD ${ldTypes(item).join('/')})` };
    }
    return null;
  },
};

export const microdataStrategy: AddressStrategy = {
  id: 'microdata',
  confidence: 'high',
  async attempt({ homepage }) {
    const prop = (name: string) =>
      homepage.doc.querySelector(`[itemprop="${name}"]`)?.textContent?.trim() ?? '';
    const street = prop('streetAddress');
    const city = prop('addressLocality');
    if (!street || !city) return null;
    return {
      value: buildAddress({
        street,
        city,
        state: prop('addressRegion'),
        zip: prop('postalCode'),
      }),
      evidence: `${homepage.url} (microdata)`,
    };
  },
};

export const contactPageStrategy: AddressStrategy = {
  id: 'contact_page',
  confidence: 'medium',
  async attempt({ page }) {
    for (const path of CONTACT_PATHS) {
      const contact = await loadPage(page, joinUrl(page.dealerUrl, path));
      if (!contact?.doc.body) continue;
      const value = parseAddressFromText(flatText(contact.doc.body));
      if (value && isValidAddress(value)) return { value, evidence: contact.url };
    }
    return null;
  },
};

export const footerStrategy: AddressStrategy = {
  id: 'footer',
  confidence: 'medium',
  async attempt({ homepage }) {
    const footer = findFooter(homepage.doc);
    const value = footer ? parseAddressFromText(flatText(footer)) : null;
    return value ? { value, evidence: `${homepage.url} (footer)` } : null;
  },
};

export const headerStrategy: AddressStrategy = {
  id: 'header',
  confidence: 'low',
  async attempt({ homepage }) {
    const header = findHeader(homepage.doc);
    const value = header ? parseAddressFromText(flatText(header)) : null;
    return value ? { value, evidence: `${homepage.url} (header)` } : null;
  },
};

export const ADDRESS_STRATEGIES: ReadonlyArray<AddressStrategy> = [
  googleMapsStrategy,
  schemaOrgStrategy,
  microdataStrategy,
  contactPageStrategy,
  footerStrategy,
  headerStrategy,
];

export function createAddressExtractor(deps: { logger: Logger }): FieldExtractor<Address> {
  return {
    field: 'address',
    async extract(page: PageAccessor): Promise<ExtractionResult<Address>> {
      const homepage = await loadHomepage(page);
      if (!homepage) return unsureResult('Homepage not available');

      const result = await runChain(
        'address',
        ADDRESS_STRATEGIES,
        { page, homepage, logger: deps.logger },
        { missMessage: 'No valid address found', validate: isValidAddress }
      );
      if (!result.value || !result.strategy) return { ...result, value: null };
      return {
        ...result,
        value: { ...result.value, source: result.strategy, confidence: result.confidence },
      };
    },
  };
}
