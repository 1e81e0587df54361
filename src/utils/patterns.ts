const STREET_SUFFIX =
  '(?:Street|St|Avenue|Ave|Road|Rd|Drive|Dr|Boulevard|Blvd|Lane|Ln|Way|Court|Ct|Circle|Cir|' +
  'Parkway|Pkwy|Place|Pl|Highway|Hwy|Freeway|Fwy|Expressway|Expy|Pike|Trail|Trl|Loop|Square|Sq)';

/**
 * "<number> <words> <suffix>[ Suite X], <city>, <ST> <zip>" in flattened page text.
 * Groups: street, city, state, zip.
 */
export const ADDRESS_PATTERN = new RegExp(
  `(?<!\\S)(\\d+[A-Za-z]?(?:\\s+(?!\\d+\\b)[A-Za-z0-9.'-]+){0,5}?\\s+${STREET_SUFFIX}\\.?` +
    `(?:\\s+(?:Suite|Ste|Unit|#)\\.?\\s*[A-Za-z0-9-]+)?)` +
    `\\s*,?\\s+([A-Za-z][A-Za-z .-]*?)\\s*,\\s*([A-Z]{2})\\s+(\\d{5}(?:-\\d{4})?)\\b`
);

export const ZIP_PATTERN = /^\d{5}(?:-\d{4})?$/;

/** North-American number with optional leading 1 and common separators. */
export const PHONE_CANDIDATE_PATTERN = /(?<!\d)(?:\+?1[\s.-]*)?\(?(\d{3})\)?[\s.-]*(\d{3})[\s.-]*(\d{4})(?!\d)/g;

export const PLACEHOLDER_AREA_CODES = new Set(['000', '111', '555']);

const DAY_TOKEN =
  '(Monday|Tuesday|Wednesday|Thursday|Friday|Saturday|Sunday|Mon|Tues|Tue|Wed|Thurs|Thur|Thu|Fri|Sat|Sun)';

export const DAY_PATTERN = new RegExp(`\\b${DAY_TOKEN}\\b`, 'i');

export const DAY_RANGE_PATTERN = new RegExp(
  `\\b${DAY_TOKEN}\\.?\\s*(?:[-–—]|to|through|thru)\\s*${DAY_TOKEN}\\b`,
  'i'
);

/** Groups: start hour, start minutes, start meridiem, end hour, end minutes, end meridiem. */
export const TIME_RANGE_PATTERN =
  /(\d{1,2})(?::(\d{2}))?\s*([ap])\.?m\.?\s*(?:[-–—]|to)\s*(\d{1,2})(?::(\d{2}))?\s*([ap])\.?m\.?/i;

export const CLOSED_PATTERN = /\b(?:closed|by\s+appointment)\b/i;

export const OPEN_24_PATTERN = /\b(?:24\s*hours?|open\s*24)\b/i;

export const SERVICE_URL_PATTERNS = [
  /\/service[-_]?(?:appointment|scheduler?|booking)/i,
  /\/schedule[-_]?service/i,
  /\/book[-_]?(?:service|appointment)/i,
];

export const CREDIT_URL_PATTERNS = [
  /\/finance\/apply/i,
  /\/apply[-_]?(?:for[-_])?financing/i,
  /\/credit[-_]?(?:app|application)/i,
  /\/finance[-_]?application/i,
];

export const GOOGLE_MAPS_PATTERN =
  /^https?:\/\/(?:www\.)?(?:google\.com\/maps|maps\.google\.com|goo\.gl\/maps|maps\.app\.goo\.gl)/i;
