import { z } from 'zod';

import type { Logger } from '../logger';
import type { County, JurisdictionLabel } from '../types';
import { dataPath, readJsonFile } from '../utils/data';
import type { GeocodeMatch, Geocoder } from './census';

const VA_INDEPENDENT_CITIES = new Set(
  readJsonFile(dataPath('va-independent-cities.json'), z.array(z.string().min(1)))
);

const COUNTY_SOURCE = 'Census Bureau Geocoder';

export const UNSURE_COUNTY: County = {
  name: null,
  label: null,
  fullName: 'Unsure',
  source: 'Not found',
  verificationUrl: null,
  confidence: 'unsure',
};

/** Jurisdiction word the geocoder put on the name, if any. */
export type UpstreamSuffix = 'County' | 'Parish' | 'Borough' | 'city' | null;

/**
 * Virginia has counties and independent cities sharing a name (Fairfax,
 * Franklin, Richmond, Roanoke), so an upstream "County" keeps County.
 */
export function determineCountySuffix(
  name: string,
  state: string | null,
  upstream: UpstreamSuffix = null
): JurisdictionLabel {
  const st = state?.toUpperCase();
  if (st === 'LA') return 'Parish';
  if (st === 'AK') return 'Borough';
  if (st === 'VA' && upstream !== 'County' && VA_INDEPENDENT_CITIES.has(name)) {
    return 'Independent City';
  }
  return 'County';
}

/**
 * Splits the upstream name into its bare name and jurisdiction word.
 * Virginia independent cities come back as "<Name> city".
 */
export function splitJurisdiction(
  name: string,
  state: string | null
): { name: string; suffix: UpstreamSuffix } {
  const trimmed = name.trim();
  const county = /^(.+?)\s+(County|Parish|Borough)$/.exec(trimmed);
  if (county) return { name: county[1], suffix: toUpstreamSuffix(county[2]) };
  if (state?.toUpperCase() === 'VA') {
    const city = /^(.+?)\s+city$/.exec(trimmed);
    if (city) return { name: city[1], suffix: 'city' };
  }
  return { name: trimmed, suffix: null };
}

function toUpstreamSuffix(word: string): UpstreamSuffix {
  switch (word) {
    case 'County':
    case 'Parish':
    case 'Borough':
      return word;
    default:
      return null;
  }
}

export function stripJurisdictionSuffix(name: string, state: string | null): string {
  return splitJurisdiction(name, state).name;
}

export function toCounty(match: GeocodeMatch, state: string | null): County {
  const { name, suffix } = splitJurisdiction(match.name, state);
  const label = determineCountySuffix(name, state, suffix);
  return {
    name,
    label,
    fullName: `${name} ${label}`,
    source: COUNTY_SOURCE,
    verificationUrl: match.verificationUrl,
    confidence: 'high',
  };
}

export type CountyQuery = {
  street?: string | null;
  city?: string | null;
  state?: string | null;
  zip?: string | null;
  latitude?: number | null;
  longitude?: number | null;
};

export class CountyLookupService {
  constructor(
    private readonly geocoder: Geocoder,
    private readonly logger: Logger
  ) {}

  /** Address first, then coordinates. Never returns null; a miss is the Unsure county. */
  async lookupCounty(query: CountyQuery): Promise<County> {
    const state = query.state ?? null;

    if (query.street && query.city && state) {
      const address = [query.street, query.city, state, query.zip].filter(Boolean).join(', ');
      this.logger.debug(`County lookup by address: ${address}`);
      const match = await this.geocoder.byAddress(address);
      if (match) return this.found(match, state);
    }

    if (query.latitude != null && query.longitude != null) {
      this.logger.debug(`County lookup by coordinates: (${query.latitude}, ${query.longitude})`);
      const match = await this.geocoder.byCoordinates(query.latitude, query.longitude);
      if (match) return this.found(match, state);
    }

    this.logger.warn('County lookup failed, marking as Unsure');
    return { ...UNSURE_COUNTY };
  }

  private found(match: GeocodeMatch, state: string | null): County {
    const county = toCounty(match, state);
    this.logger.debug(`County: ${county.fullName}`);
    return county;
  }
}
