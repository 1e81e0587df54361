import type { Confidence } from './confidence';

export type StrategyTag =
  | 'google_maps'
  | 'schema_org'
  | 'microdata'
  | 'contact_page'
  | 'footer'
  | 'header'
  | 'department_sections'
  | 'general_hours'
  | 'link_scan'
  | 'common_paths'
  | 'meta_tags'
  | 'domain'
  | 'iframe'
  | 'script_src'
  | 'page_source';

export type PageVisit = {
  requestedUrl: string;
  /** Final URL after redirects. */
  url: string;
  status: number | null;
  html: string;
};

/**
 * What extractors may do with a dealership's browsing context. Retries,
 * backoff and timeouts stay behind this interface.
 */
export interface PageAccessor {
  readonly dealerUrl: string;
  homepage(): Promise<PageVisit | null>;
  navigate(url: string): Promise<PageVisit | null>;
}

export type Address = {
  street: string;
  city: string;
  state: string;
  zip: string;
  fullAddress: string;
  latitude: number | null;
  longitude: number | null;
  source: StrategyTag;
  confidence: Confidence;
};

export type JurisdictionLabel = 'County' | 'Parish' | 'Borough' | 'Independent City';

export type County = {
  name: string | null;
  label: JurisdictionLabel | null;
  fullName: string;
  source: string;
  verificationUrl: string | null;
  confidence: Confidence;
};

export type Phone = {
  raw: string;
  source: StrategyTag | null;
  confidence: Confidence;
} & ({ pretty: string; digits: string } | { pretty: null; digits: null });

export const WEEKDAYS = [
  'monday',
  'tuesday',
  'wednesday',
  'thursday',
  'friday',
  'saturday',
  'sunday',
] as const;

export type Weekday = (typeof WEEKDAYS)[number];

export type WeekSchedule = Record<Weekday, string>;

export type Hours = {
  days: WeekSchedule;
  sourceUrl: string | null;
  confidence: Confidence;
};

export const DEPARTMENTS = ['sales', 'service', 'parts'] as const;

export type Department = (typeof DEPARTMENTS)[number];

export type DepartmentHours = Record<Department, Hours | null>;

export type UrlDiscovery = {
  serviceScheduler: string | null;
  serviceSchedulerSource: string | null;
  creditApp: string | null;
  creditAppSource: string | null;
  facebook: string | null;
  /** Link the Facebook URL was discovered from, before normalization. */
  facebookStart: string | null;
  /** "start → final" link chain. */
  facebookSource: string | null;
  facebookPageId: string | null;
};

export type WebsiteProvider = {
  name: string;
  displayName: string;
  detectionMethod: StrategyTag | null;
  confidence: Confidence;
  evidence: string | null;
};

export type CreditAppProvider = WebsiteProvider;

export type Evidence = {
  addressSource: string | null;
  countyVerification: string | null;
  phoneSource: string | null;
  hoursPage: string | null;
  serviceVerifiedOn: string | null;
  creditAppVerifiedOn: string | null;
  creditAppEmbeddedEvidence: string | null;
  facebookStart: string | null;
  facebookFinal: string | null;
  providerVerification: string | null;
  confidenceScores: string | null;
  capturedAt: string | null;
  notes: string[];
};

export type DealerData = {
  name: string | null;
  website: string;
  address: Address | null;
  county: County | null;
  phone: Phone | null;
  hours: DepartmentHours | null;
  urls: UrlDiscovery;
  websiteProvider: WebsiteProvider | null;
  creditAppProvider: CreditAppProvider | null;
  evidence: Evidence;
  locationsFound: number;
  processedAt: string;
  processingTimeSec: number;
};

export function emptyUrlDiscovery(): UrlDiscovery {
  return {
    serviceScheduler: null,
    serviceSchedulerSource: null,
    creditApp: null,
    creditAppSource: null,
    facebook: null,
    facebookStart: null,
    facebookSource: null,
    facebookPageId: null,
  };
}

export function emptyEvidence(): Evidence {
  return {
    addressSource: null,
    countyVerification: null,
    phoneSource: null,
    hoursPage: null,
    serviceVerifiedOn: null,
    creditAppVerifiedOn: null,
    creditAppEmbeddedEvidence: null,
    facebookStart: null,
    facebookFinal: null,
    providerVerification: null,
    confidenceScores: null,
    capturedAt: null,
    notes: [],
  };
}
