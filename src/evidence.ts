import type { Confidence } from './confidence';
import type { ExtractionResult } from './extractors/types';
import {
  emptyEvidence,
  emptyUrlDiscovery,
  type Address,
  type CreditAppProvider,
  type County,
  type DealerData,
  type DepartmentHours,
  type Evidence,
  type Phone,
  type UrlDiscovery,
  type WebsiteProvider,
} from './types';

export type FieldResults = {
  address: ExtractionResult<Address>;
  county: County | null;
  phone: ExtractionResult<Phone>;
  hours: ExtractionResult<DepartmentHours>;
  urls: ExtractionResult<UrlDiscovery>;
  provider: ExtractionResult<WebsiteProvider>;
  creditProvider: ExtractionResult<CreditAppProvider> | null;
};

function withStrategy(result: ExtractionResult<unknown>): string | null {
  if (!result.value || !result.evidence) return null;
  return result.strategy ? `${result.evidence} [${result.strategy}]` : result.evidence;
}

function scores(results: FieldResults): string {
  const entries: Array<[string, Confidence]> = [
    ['address', results.address.confidence],
    ['county', results.county?.confidence ?? 'unsure'],
    ['phone', results.phone.confidence],
    ['hours', results.hours.confidence],
    ['urls', results.urls.confidence],
    ['provider', results.provider.confidence],
    ['credit_provider', results.creditProvider?.confidence ?? 'unsure'],
  ];
  return entries.map(([field, level]) => `${field}=${level}`).join(', ');
}

export function assembleEvidence(
  results: FieldResults,
  opts: { capturedAt: string; captureConfidenceScores: boolean }
): Evidence {
  const urls = results.urls.value ?? emptyUrlDiscovery();
  const provider = results.provider.value;
  const credit = results.creditProvider?.value ?? null;

  return {
    addressSource: withStrategy(results.address),
    countyVerification: results.county?.verificationUrl ?? null,
    phoneSource: results.phone.value?.pretty ? withStrategy(results.phone) : null,
    hoursPage: results.hours.value ? results.hours.evidence : null,
    serviceVerifiedOn: urls.serviceScheduler ? urls.serviceSchedulerSource : null,
    creditAppVerifiedOn: urls.creditApp ? urls.creditAppSource : null,
    creditAppEmbeddedEvidence:
      credit && credit.confidence !== 'unsure' ? credit.evidence : null,
    facebookStart: urls.facebook ? urls.facebookStart : null,
    facebookFinal: urls.facebook,
    providerVerification:
      provider && provider.confidence !== 'unsure' ? provider.evidence : null,
    confidenceScores: opts.captureConfidenceScores ? scores(results) : null,
    capturedAt: opts.capturedAt,
    notes: [],
  };
}

type EvidenceRule = {
  field: string;
  populated: (d: DealerData) => boolean;
  evidenced: (e: Evidence) => boolean;
  clear: (d: DealerData) => DealerData;
};

const known = (p: { confidence: Confidence } | null) => p !== null && p.confidence !== 'unsure';

const RULES: EvidenceRule[] = [
  {
    field: 'address',
    populated: (d) => d.address !== null,
    evidenced: (e) => Boolean(e.addressSource),
    clear: (d) => ({ ...d, address: null, county: null }),
  },
  {
    field: 'county',
    populated: (d) => known(d.county),
    evidenced: (e) => Boolean(e.countyVerification),
    clear: (d) => ({ ...d, county: null }),
  },
  {
    field: 'phone',
    populated: (d) => d.phone?.pretty != null,
    evidenced: (e) => Boolean(e.phoneSource),
    clear: (d) => ({ ...d, phone: null }),
  },
  {
    field: 'hours',
    populated: (d) => d.hours !== null,
    evidenced: (e) => Boolean(e.hoursPage),
    clear: (d) => ({ ...d, hours: null }),
  },
  {
    field: 'service scheduler',
    populated: (d) => d.urls.serviceScheduler !== null,
    evidenced: (e) => Boolean(e.serviceVerifiedOn),
    clear: (d) => ({ ...d, urls: { ...d.urls, serviceScheduler: null, serviceSchedulerSource: null } }),
  },
  {
    field: 'credit app',
    populated: (d) => d.urls.creditApp !== null,
    evidenced: (e) => Boolean(e.creditAppVerifiedOn),
    clear: (d) => ({
      ...d,
      urls: { ...d.urls, creditApp: null, creditAppSource: null },
      creditAppProvider: null,
    }),
  },
  {
    field: 'credit app provider',
    populated: (d) => known(d.creditAppProvider),
    evidenced: (e) => Boolean(e.creditAppEmbeddedEvidence),
    clear: (d) => ({ ...d, creditAppProvider: null }),
  },
  {
    field: 'facebook',
    populated: (d) => d.urls.facebook !== null,
    evidenced: (e) => Boolean(e.facebookFinal),
    clear: (d) => ({
      ...d,
      urls: { ...d.urls, facebook: null, facebookStart: null, facebookSource: null, facebookPageId: null },
    }),
  },
  {
    field: 'website provider',
    populated: (d) => known(d.websiteProvider),
    evidenced: (e) => Boolean(e.providerVerification),
    clear: (d) => ({ ...d, websiteProvider: null }),
  },
];

/** Names of populated fields that carry no evidence. */
export function findMissingEvidence(dealer: DealerData): string[] {
  return RULES.filter((r) => r.populated(dealer) && !r.evidenced(dealer.evidence)).map((r) => r.field);
}

/** Clears every populated field without evidence back to Unsure and notes why. */
export function enforceEvidence(dealer: DealerData): DealerData {
  let out = dealer;
  for (const rule of RULES) {
    if (!rule.populated(out) || rule.evidenced(out.evidence)) continue;
    out = rule.clear(out);
    out = {
      ...out,
      evidence: { ...out.evidence, notes: [...out.evidence.notes, `Cleared ${rule.field}: no evidence recorded`] },
    };
  }
  return out;
}

/** All-Unsure record for a dealership that could not be processed. */
export function failedDealer(website: string, error: string, capturedAt: string, processedAt: string): DealerData {
  return {
    name: null,
    website,
    address: null,
    county: null,
    phone: null,
    hours: null,
    urls: emptyUrlDiscovery(),
    websiteProvider: null,
    creditAppProvider: null,
    evidence: { ...emptyEvidence(), capturedAt, notes: [`Processing failed: ${error}`] },
    locationsFound: 0,
    processedAt,
    processingTimeSec: 0,
  };
}
