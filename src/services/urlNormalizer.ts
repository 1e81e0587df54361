const TRACKING_PARAMS = new Set([
  'gclid',
  'fbclid',
  'mc_cid',
  'mc_eid',
  '_ga',
  '_gl',
  '_gac',
  'msclkid',
  'twclid',
  '_kx',
]);

const FACEBOOK_PARAMS = new Set(['ref', 'fref', 'hc_location', '__tn__', '__cft__']);

const GOOGLE_MAPS_KEEP = new Set(['cid', 'place_id', 'q', 'll', 'z']);

function isTrackingParam(key: string): boolean {
  return key.toLowerCase().startsWith('utm_') || TRACKING_PARAMS.has(key);
}

function parse(raw: string): URL | null {
  try {
    return new URL(raw.trim());
  } catch {
    return null;
  }
}

function dropParams(url: URL, shouldDrop: (key: string) => boolean) {
  for (const key of Array.from(new Set(url.searchParams.keys()))) {
    if (shouldDrop(key)) url.searchParams.delete(key);
  }
  // leave no dangling "?"
  if (!url.searchParams.toString()) url.search = '';
}

function canonical(url: URL, shouldDrop: (key: string) => boolean = isTrackingParam): URL {
  url.protocol = 'https:';
  url.hash = '';
  dropParams(url, shouldDrop);
  return url;
}

/**
 * https scheme, no tracking parameters, no fragment. Unparseable input is
 * returned unchanged.
 */
export function normalizeUrl(raw: string): string {
  const url = parse(raw);
  if (!url) return raw;
  return canonical(url).toString();
}

/** Domain roots always end in "/". */
export function normalizeDealerUrl(raw: string): string {
  const url = parse(raw);
  if (!url) return raw;
  // WHATWG serialization already renders an empty path as "/"
  return canonical(url).toString();
}

export function cleanFacebookUrl(raw: string): string {
  if (!raw.toLowerCase().includes('facebook.com')) return raw;
  const url = parse(raw);
  if (!url) return raw;
  canonical(url, (key) => isTrackingParam(key) || FACEBOOK_PARAMS.has(key));
  const path = url.pathname.replace(/\/+$/, '');
  url.pathname = path || '/';
  const out = url.toString();
  return path ? out : out.replace(/\/(?=\?|$)/, '');
}

export function cleanGoogleMapsUrl(raw: string): string {
  const url = parse(raw);
  if (!url) return raw;
  return canonical(url, (key) => !GOOGLE_MAPS_KEEP.has(key) && isTrackingParam(key)).toString();
}

function bareHost(raw: string): string | null {
  const url = parse(raw);
  if (!url) return null;
  return url.hostname.toLowerCase().replace(/^www\./, '');
}

export function isDealerDomain(url: string, dealerUrl: string): boolean {
  const host = bareHost(url);
  return host !== null && host === bareHost(dealerUrl);
}

/** Numeric page id from profile.php?id=N or /pages/<name>/<N> URLs. */
export function facebookPageId(raw: string): string | null {
  const url = parse(raw);
  if (!url) return null;
  const id = url.searchParams.get('id');
  if (url.pathname.startsWith('/profile.php') && id && /^\d+$/.test(id)) return id;
  const match = url.pathname.match(/^\/pages\/[^/]+\/(\d+)/);
  return match ? match[1] : null;
}
