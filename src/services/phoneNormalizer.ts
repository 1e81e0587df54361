import type { Confidence } from '../confidence';
import type { Phone, StrategyTag } from '../types';

/** Ten NANP digits, with a leading country code 1 dropped; null otherwise. */
export function extractDigits(raw: string): string | null {
  let digits = raw.replace(/\D/g, '');
  if (digits.length === 11 && digits.startsWith('1')) digits = digits.slice(1);
  return digits.length === 10 ? digits : null;
}

export function formatPretty(digits: string): string {
  return `(${digits.slice(0, 3)}) ${digits.slice(3, 6)}-${digits.slice(6)}`;
}

/**
 * Both display forms come from one digit string, so they cannot diverge.
 * Input that does not reduce to ten digits is kept as an unsure record.
 */
export function normalizePhone(
  raw: string,
  source: StrategyTag | null = null,
  confidence: Confidence = 'high'
): Phone | null {
  const trimmed = raw.trim();
  if (!trimmed) return null;

  const digits = extractDigits(trimmed);
  if (!digits) {
    return { raw: trimmed, pretty: null, digits: null, source, confidence: 'unsure' };
  }
  return { raw: trimmed, pretty: formatPretty(digits), digits, source, confidence };
}

/** First input that normalizes wins; otherwise the first input as an unsure placeholder. */
export function normalizeMultiplePhones(
  raws: string[],
  source: StrategyTag | null = null,
  confidence: Confidence = 'high'
): Phone | null {
  for (const raw of raws) {
    const phone = normalizePhone(raw, source, confidence);
    if (phone?.digits) return phone;
  }
  const first = raws.find((raw) => raw.trim());
  if (first === undefined) return null;
  return { raw: first.trim(), pretty: null, digits: null, source, confidence: 'unsure' };
}
