import type { PageVisit } from '../types';

export type PageLoader = (url: string) => Promise<PageVisit | null>;

/** "https://a.test/contact/" and "https://a.test/contact#map" are one page. */
export function visitKey(url: string): string {
  return url.replace(/#.*$/, '').replace(/\/+$/, '');
}

/**
 * One load per page for the life of a dealership. Misses are remembered too,
 * so a page that failed after its retries is not fetched again.
 */
export class VisitCache {
  private readonly visits = new Map<string, Promise<PageVisit | null>>();

  constructor(private readonly load: PageLoader) {}

  get size(): number {
    return this.visits.size;
  }

  get(url: string): Promise<PageVisit | null> {
    const key = visitKey(url);
    let visit = this.visits.get(key);
    if (!visit) {
      visit = this.load(url);
      this.visits.set(key, visit);
    }
    return visit;
  }
}
