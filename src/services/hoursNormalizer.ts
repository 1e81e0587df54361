import { maxConfidence, type Confidence } from '../confidence';
import { WEEKDAYS, type Hours, type WeekSchedule, type Weekday } from '../types';

export const CLOSED = 'Closed';
export const OPEN_24_HOURS = 'Open 24 hours';

export function mapWeek(fn: (day: Weekday) => string): WeekSchedule {
  return {
    monday: fn('monday'),
    tuesday: fn('tuesday'),
    wednesday: fn('wednesday'),
    thursday: fn('thursday'),
    friday: fn('friday'),
    saturday: fn('saturday'),
    sunday: fn('sunday'),
  };
}

export function normalizeDayName(day: string): Weekday | null {
  const key = day.trim().toLowerCase().slice(0, 3);
  if (key.length < 3) return null;
  return WEEKDAYS.find((weekday) => weekday.startsWith(key)) ?? null;
}

export function normalizeTimeRange(value: string | null | undefined): string {
  const text = (value ?? '').trim();
  if (!text) return CLOSED;

  const lower = text.toLowerCase();
  if (lower.includes('closed') || lower.includes('by appointment')) return CLOSED;
  if (lower.includes('24') && lower.includes('hour')) return OPEN_24_HOURS;

  return text
    .replace(/\s*[-–—]\s*/g, ' – ')
    .replace(/\s+/g, ' ')
    .trim();
}

/** "9:00 AM - 12:00 PM, 1:00 PM - 5:00 PM" style lunch-break schedules. */
export function normalizeSplitHours(value: string): string {
  const whole = normalizeTimeRange(value);
  if (whole === CLOSED || whole === OPEN_24_HOURS) return whole;
  const parts = value
    .split(',')
    .map((part) => part.trim())
    .filter(Boolean);
  if (parts.length <= 1) return whole;
  return parts.map((part) => normalizeTimeRange(part)).join(', ');
}

export type NormalizeHoursOptions = {
  /** When false, values are only trimmed. */
  normalize?: boolean;
};

/** Every weekday is populated; anything missing is Closed. */
export function normalizeHoursDict(
  raw: Record<string, string>,
  opts: NormalizeHoursOptions = {}
): WeekSchedule {
  const normalize = opts.normalize ?? true;
  const keys = Object.keys(raw);

  return mapWeek((day) => {
    const key = keys.find((k) => k.trim().toLowerCase().startsWith(day.slice(0, 3)));
    const value = key === undefined ? '' : raw[key];
    return normalize ? normalizeSplitHours(value) : value.trim() || CLOSED;
  });
}

export function createEmptyHours(
  confidence: Confidence = 'unsure',
  sourceUrl: string | null = null
): Hours {
  return { days: normalizeHoursDict({}), sourceUrl, confidence };
}

/** Per day, the override wins unless it only carries the Closed default. */
export function mergeHours(base: Hours, override: Hours): Hours {
  return {
    days: mapWeek((day) => (override.days[day] === CLOSED ? base.days[day] : override.days[day])),
    sourceUrl: override.sourceUrl ?? base.sourceUrl,
    confidence: maxConfidence(base.confidence, override.confidence),
  };
}
