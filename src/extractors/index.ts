import type { Logger } from '../logger';
import type { CreditFingerprint, FingerprintStore, ProviderFingerprint } from '../services/fingerprints';
import type { Address, DepartmentHours, Phone, UrlDiscovery, WebsiteProvider } from '../types';
import { createAddressExtractor } from './address';
import { createCreditProviderDetector, type CreditProviderDetector } from './creditProvider';
import { createHoursExtractor } from './hours';
import { createPhoneExtractor } from './phone';
import { createProviderDetector } from './provider';
import type { FieldExtractor } from './types';
import { createUrlDiscoverer } from './urls';

export type Extractors = {
  phone: FieldExtractor<Phone>;
  address: FieldExtractor<Address>;
  hours: FieldExtractor<DepartmentHours>;
  urls: FieldExtractor<UrlDiscovery>;
  provider: FieldExtractor<WebsiteProvider>;
  creditProvider: CreditProviderDetector;
};

export type ExtractorDeps = {
  logger: Logger;
  providerFingerprints: FingerprintStore<ProviderFingerprint>;
  creditFingerprints: FingerprintStore<CreditFingerprint>;
  normalizeHours?: boolean;
  normalizeUrls?: boolean;
};

export function createExtractors(deps: ExtractorDeps): Extractors {
  const { logger } = deps;
  return {
    phone: createPhoneExtractor({ logger }),
    address: createAddressExtractor({ logger }),
    hours: createHoursExtractor({ logger, normalize: deps.normalizeHours }),
    urls: createUrlDiscoverer({ logger, normalizeUrls: deps.normalizeUrls }),
    provider: createProviderDetector({ logger, fingerprints: deps.providerFingerprints }),
    creditProvider: createCreditProviderDetector({ logger, fingerprints: deps.creditFingerprints }),
  };
}

export { isSuccess, runChain, unsureResult } from './types';
export type { Candidate, ExtractionResult, FieldExtractor, Strategy } from './types';
