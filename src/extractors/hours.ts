import type { Logger } from '../logger';
import {
  CLOSED,
  OPEN_24_HOURS,
  mergeHours,
  normalizeDayName,
  normalizeHoursDict,
} from '../services/hoursNormalizer';
import {
  DEPARTMENTS,
  WEEKDAYS,
  type Department,
  type DepartmentHours,
  type Hours,
  type PageAccessor,
  type WeekSchedule,
  type Weekday,
} from '../types';
import { blockText, isElement, singleString } from '../utils/html';
import {
  CLOSED_PATTERN,
  DAY_PATTERN,
  DAY_RANGE_PATTERN,
  OPEN_24_PATTERN,
  TIME_RANGE_PATTERN,
} from '../utils/patterns';
import {
  joinUrl,
  loadHomepage,
  loadPage,
  runChain,
  unsureResult,
  type ExtractionResult,
  type FieldExtractor,
  type ParsedPage,
  type Strategy,
} from './types';

const HOURS_PATHS = ['/hours', '/contact', '/about'];

const DEPARTMENT_KEYWORDS: Record<Department, string[]> = {
  sales: ['sales', 'showroom'],
  service: ['service', 'repair'],
  parts: ['parts', 'accessories'],
};

const HEADING_SELECTOR = 'h1, h2, h3, h4, h5, h6, div, span, p, strong, b, dt, th, li';

const TEXT_AFTER_LIMIT = 1000;

type HoursContext = {
  parsed: ParsedPage;
  logger: Logger;
  normalize: boolean;
};

export type HoursFindings = {
  sections: Record<Department, WeekSchedule | null>;
  /** Schedule under a heading that names no department. */
  general: WeekSchedule | null;
};

type HoursStrategy = Strategy<HoursFindings, HoursContext>;

function formatTime(hour: string, minutes: string, meridiem: string): string {
  return `${Number(hour)}:${minutes || '00'} ${meridiem.toUpperCase()}M`;
}

export function formatTimeRange(match: RegExpExecArray): string {
  return `${formatTime(match[1], match[2], match[3])} - ${formatTime(match[4], match[5], match[6])}`;
}

/** Weekdays named by a line, with ranges like "Sat-Mon" wrapping around the week. */
export function expandDays(line: string): Weekday[] {
  const range = DAY_RANGE_PATTERN.exec(line);
  if (range) {
    const start = normalizeDayName(range[1]);
    const end = normalizeDayName(range[2]);
    if (start && end) {
      const days: Weekday[] = [];
      let i = WEEKDAYS.indexOf(start);
      for (;;) {
        days.push(WEEKDAYS[i]);
        if (WEEKDAYS[i] === end) break;
        i = (i + 1) % WEEKDAYS.length;
      }
      return days;
    }
  }
  const single = DAY_PATTERN.exec(line);
  const day = single ? normalizeDayName(single[1]) : null;
  return day ? [day] : [];
}

/** Day-name + time-range lines into a raw day → value map. Later lines win. */
export function parseHoursText(text: string): Record<string, string> {
  const out: Record<string, string> = {};
  const lines = text
    // "Mon-Fri 9am-6pm Sat 10am-4pm" → one entry per line
    .replace(/([ap]\.?m\.?|closed)\s*[,;|]?\s+(?=(?:mon|tue|wed|thu|fri|sat|sun))/gi, '$1\n')
    .split('\n');

  for (const line of lines) {
    const days = expandDays(line);
    if (!days.length) continue;

    const time = TIME_RANGE_PATTERN.exec(line);
    let value: string | null = null;
    if (time) value = formatTimeRange(time);
    else if (OPEN_24_PATTERN.test(line)) value = OPEN_24_HOURS;
    else if (CLOSED_PATTERN.test(line)) value = CLOSED;
    if (!value) continue;

    for (const day of days) out[day] = value;
  }

  return out;
}

function isSectionBoundary(el: Element): boolean {
  if (/^h[1-6]$/i.test(el.tagName)) return true;
  const text = blockText(el).toLowerCase();
  return text.includes('hour') && !DAY_PATTERN.test(text);
}

/** The heading's own text plus following siblings, or the parent's text when there are none. */
export function textAfterHeading(heading: Element): string {
  const lines = [blockText(heading)];
  let length = 0;

  for (let node = heading.nextSibling; node && length < TEXT_AFTER_LIMIT; node = node.nextSibling) {
    if (isElement(node) && isSectionBoundary(node)) break;
    const text = isElement(node) ? blockText(node) : (node.textContent ?? '').trim();
    if (!text) continue;
    lines.push(text);
    length += text.length;
  }

  if (lines.length === 1 && heading.parentElement) return blockText(heading.parentElement);
  return lines.join('\n');
}

/** Candidate headings in document order. Menu entries and link text never count. */
function findHeadings(doc: Document, matches: (text: string) => boolean): Element[] {
  return Array.from(doc.querySelectorAll(HEADING_SELECTOR)).filter((el) => {
    if (el.closest('nav, a') || el.querySelector('a')) return false;
    const text = singleString(el)?.toLowerCase();
    return !!text && text.includes('hour') && matches(text);
  });
}

function scheduleUnder(heading: Element, normalize: boolean): WeekSchedule | null {
  const raw = parseHoursText(textAfterHeading(heading));
  if (!Object.keys(raw).length) return null;
  return normalizeHoursDict(raw, { normalize });
}

function firstSchedule(headings: Element[], normalize: boolean): WeekSchedule | null {
  for (const heading of headings) {
    const schedule = scheduleUnder(heading, normalize);
    if (schedule) return schedule;
  }
  return null;
}

function departmentSections(
  doc: Document,
  normalize: boolean
): Record<Department, WeekSchedule | null> {
  const find = (dept: Department) => {
    // keywords are tried in priority order
    for (const keyword of DEPARTMENT_KEYWORDS[dept]) {
      const schedule = firstSchedule(findHeadings(doc, (text) => text.includes(keyword)), normalize);
      if (schedule) return schedule;
    }
    return null;
  };
  return { sales: find('sales'), service: find('service'), parts: find('parts') };
}

function generalSchedule(doc: Document, normalize: boolean): WeekSchedule | null {
  const keywords = Object.values(DEPARTMENT_KEYWORDS).flat();
  return firstSchedule(
    findHeadings(doc, (text) => !keywords.some((k) => text.includes(k))),
    normalize
  );
}

function foundDepartments(sections: Record<Department, WeekSchedule | null>): Department[] {
  return DEPARTMENTS.filter((dept) => sections[dept] !== null);
}

export const departmentSectionsStrategy: HoursStrategy = {
  id: 'department_sections',
  confidence: 'medium',
  async attempt({ parsed, normalize }) {
    const sections = departmentSections(parsed.doc, normalize);
    if (foundDepartments(sections).length < 2) return null;
    return {
      value: { sections, general: generalSchedule(parsed.doc, normalize) },
      evidence: parsed.url,
    };
  },
};

/** One schedule for every department: a lone department section, or a generic hours heading. */
export const generalHoursStrategy: HoursStrategy = {
  id: 'general_hours',
  confidence: 'low',
  async attempt({ parsed, normalize }) {
    const sections = departmentSections(parsed.doc, normalize);
    const found = foundDepartments(sections);
    const schedule = found.length === 1 ? sections[found[0]] : generalSchedule(parsed.doc, normalize);
    if (!schedule) return null;
    return {
      value: { sections: { sales: schedule, service: schedule, parts: schedule }, general: null },
      evidence: parsed.url,
    };
  },
};

export const HOURS_STRATEGIES: ReadonlyArray<HoursStrategy> = [
  departmentSectionsStrategy,
  generalHoursStrategy,
];

function toDepartmentHours(
  findings: HoursFindings,
  sourceUrl: string,
  confidence: Hours['confidence']
): DepartmentHours {
  const wrap = (days: WeekSchedule): Hours => ({ days, sourceUrl, confidence });
  const general = findings.general ? wrap(findings.general) : null;
  const layer = (dept: Department): Hours | null => {
    const section = findings.sections[dept];
    if (!section) return general;
    return general ? mergeHours(general, wrap(section)) : wrap(section);
  };
  return { sales: layer('sales'), service: layer('service'), parts: layer('parts') };
}

function looksLikeHoursPage(html: string): boolean {
  const lower = html.toLowerCase();
  return lower.includes('hours') || lower.includes('open');
}

export function createHoursExtractor(deps: {
  logger: Logger;
  normalize?: boolean;
}): FieldExtractor<DepartmentHours> {
  const normalize = deps.normalize ?? true;

  return {
    field: 'hours',
    async extract(page: PageAccessor): Promise<ExtractionResult<DepartmentHours>> {
      const candidates: Array<() => Promise<ParsedPage | null>> = [
        ...HOURS_PATHS.map((path) => () => loadPage(page, joinUrl(page.dealerUrl, path))),
        () => loadHomepage(page),
      ];

      for (const load of candidates) {
        const parsed = await load();
        if (!parsed || !looksLikeHoursPage(parsed.html)) continue;

        const result = await runChain(
          'hours',
          HOURS_STRATEGIES,
          { parsed, logger: deps.logger, normalize },
          { missMessage: `No hours found on ${parsed.url}` }
        );
        if (result.value) {
          return {
            ...result,
            value: toDepartmentHours(result.value, parsed.url, result.confidence),
          };
        }
      }

      return unsureResult('No hours found');
    },
  };
}
