import { z } from 'zod';

import { errorMessage } from '../errors';
import { fetchText, type TextFetcher } from '../http';
import type { Logger } from '../logger';

export const DEFAULT_CENSUS_API_URL = 'https://geocoding.geo.census.gov/geocoder';

const CENSUS_TIMEOUT_MS = 30_000;

export type GeocodeMatch = {
  /** County name as reported upstream, suffix and all. */
  name: string;
  stateFips: string | null;
  countyFips: string | null;
  verificationUrl: string;
};

/** Resolves an address or a coordinate pair to its county-level jurisdiction. */
export interface Geocoder {
  byAddress(address: string): Promise<GeocodeMatch | null>;
  byCoordinates(latitude: number, longitude: number): Promise<GeocodeMatch | null>;
}

const CountySchema = z
  .object({
    NAME: z.string().optional(),
    BASENAME: z.string().optional(),
    STATE: z.string().optional(),
    COUNTY: z.string().optional(),
  })
  .passthrough();

const GeographiesSchema = z
  .object({ Counties: z.array(CountySchema).optional() })
  .passthrough();

const AddressResponseSchema = z.object({
  result: z.object({
    addressMatches: z.array(z.object({ geographies: GeographiesSchema }).passthrough()).default([]),
  }),
});

const CoordinatesResponseSchema = z.object({
  result: z.object({ geographies: GeographiesSchema }),
});

type CensusCounty = z.infer<typeof CountySchema>;

export function quickFactsUrl(stateFips: string, countyFips: string): string {
  return `https://www.census.gov/quickfacts/fact/table/${stateFips}${countyFips}`;
}

function toMatch(county: CensusCounty | undefined, requestUrl: string): GeocodeMatch | null {
  const name = county?.NAME ?? county?.BASENAME;
  if (!county || !name) return null;
  const stateFips = county.STATE ?? null;
  const countyFips = county.COUNTY ?? null;
  return {
    name,
    stateFips,
    countyFips,
    verificationUrl:
      stateFips && countyFips ? quickFactsUrl(stateFips, countyFips) : requestUrl,
  };
}

/**
 * Client for the Census Bureau "Find Geographies" endpoints. Failures are
 * logged and reported as no match.
 */
export class CensusGeocoder implements Geocoder {
  constructor(
    private readonly logger: Logger,
    private readonly apiUrl: string = DEFAULT_CENSUS_API_URL,
    private readonly fetcher: TextFetcher = fetchText
  ) {}

  async byAddress(address: string): Promise<GeocodeMatch | null> {
    const url = this.endpoint('geographies/onelineaddress', { address });
    const body = await this.get(url);
    if (body === null) return null;

    const parsed = AddressResponseSchema.safeParse(body);
    if (!parsed.success) {
      this.logger.warn(`Census address response not understood: ${parsed.error.message}`);
      return null;
    }
    const first = parsed.data.result.addressMatches[0];
    return toMatch(first?.geographies.Counties?.[0], url);
  }

  async byCoordinates(latitude: number, longitude: number): Promise<GeocodeMatch | null> {
    const url = this.endpoint('geographies/coordinates', {
      x: String(longitude),
      y: String(latitude),
    });
    const body = await this.get(url);
    if (body === null) return null;

    const parsed = CoordinatesResponseSchema.safeParse(body);
    if (!parsed.success) {
      this.logger.warn(`Census coordinates response not understood: ${parsed.error.message}`);
      return null;
    }
    return toMatch(parsed.data.result.geographies.Counties?.[0], url);
  }

  private endpoint(path: string, params: Record<string, string>): string {
    const url = new URL(`${this.apiUrl.replace(/\/+$/, '')}/${path}`);
    for (const [key, value] of Object.entries(params)) url.searchParams.set(key, value);
    url.searchParams.set('benchmark', 'Public_AR_Current');
    url.searchParams.set('vintage', 'Current_Current');
    url.searchParams.set('format', 'json');
    return url.toString();
  }

  private async get(url: string): Promise<unknown> {
    try {
      const res = await this.fetcher(url, { timeoutMs: CENSUS_TIMEOUT_MS, accept: 'application/json' });
      if (res.status !== 200) {
        this.logger.warn(`Census API returned HTTP ${res.status}`);
        return null;
      }
      return JSON.parse(res.body);
    } catch (err) {
      this.logger.warn(`Census API request failed: ${errorMessage(err)}`);
      return null;
    }
  }
}
