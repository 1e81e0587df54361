import type { DealerData, Department, Evidence, Hours } from '../types';
import { DEPARTMENTS, WEEKDAYS } from '../types';

export type TemplateOptions = {
  timezone: string;
  /** When false the raw scraped phone text is printed instead of the pretty form. */
  normalizePhone?: boolean;
  now?: () => Date;
};

const UNSURE = 'Unsure';

const SECTION_TITLES: Record<Department, string> = {
  sales: 'Sales Hours',
  service: 'Service Hours',
  parts: 'Parts Hours',
};

function capitalize(s: string): string {
  return s.charAt(0).toUpperCase() + s.slice(1);
}

/** `YYYY-MM-DD HH:mm (<zone>)`; an unknown zone falls back to UTC. */
export function formatTimestamp(date: Date, timezone: string): string {
  let parts: Intl.DateTimeFormatPart[];
  try {
    parts = new Intl.DateTimeFormat('en-US', {
      timeZone: timezone,
      year: 'numeric',
      month: '2-digit',
      day: '2-digit',
      hour: '2-digit',
      minute: '2-digit',
      hourCycle: 'h23',
    }).formatToParts(date);
  } catch {
    return `${date.toISOString().slice(0, 16).replace('T', ' ')} (UTC)`;
  }

  const get = (type: Intl.DateTimeFormatPartTypes) =>
    parts.find((p) => p.type === type)?.value ?? '00';
  return `${get('year')}-${get('month')}-${get('day')} ${get('hour')}:${get('minute')} (${timezone})`;
}

export function buildRunHeader(opts: TemplateOptions): string {
  const now = opts.now?.() ?? new Date();
  return `# Dealership Data + URL Discovery — Run started at ${formatTimestamp(now, opts.timezone)}\n`;
}

function hoursSection(title: string, hours: Hours | null): string[] {
  const lines = [title];
  for (const day of WEEKDAYS) {
    lines.push(`${capitalize(day)}: ${hours?.days[day] || 'Closed'}`);
  }
  lines.push('');
  return lines;
}

function evidenceLines(evidence: Evidence, captured: string): string[] {
  const lines: string[] = [];
  const bullet = (label: string, value: string | null) => {
    if (value) lines.push(`- ${label}: ${value}`);
  };

  bullet('Address source', evidence.addressSource);
  bullet('County verification', evidence.countyVerification);
  bullet('Phone source', evidence.phoneSource);
  bullet('Hours page', evidence.hoursPage);
  bullet('Service verified on', evidence.serviceVerifiedOn);
  bullet('Credit app verified on', evidence.creditAppVerifiedOn);
  bullet('Credit app embedded provider evidence', evidence.creditAppEmbeddedEvidence);
  if (evidence.facebookStart && evidence.facebookFinal) {
    lines.push(`- Facebook start: ${evidence.facebookStart} → final FB: ${evidence.facebookFinal}`);
  } else {
    bullet('Facebook', evidence.facebookFinal);
  }
  bullet('Provider verification', evidence.providerVerification);
  bullet('Confidence', evidence.confidenceScores);
  for (const note of evidence.notes) lines.push(`- Note: ${note}`);
  lines.push(`- Captured: ${evidence.capturedAt ?? captured}`);
  return lines;
}

/** One dealership as a fenced markdown block. Every field prints, as "Unsure" when unknown. */
export function buildDealerBlock(dealer: DealerData, opts: TemplateOptions): string {
  const normalizePhone = opts.normalizePhone ?? true;
  const lines: string[] = [];

  lines.push(dealer.name || UNSURE);
  lines.push(dealer.address?.fullAddress || UNSURE);
  lines.push(`County: ${dealer.county?.fullName || UNSURE}`);

  const phone = dealer.phone;
  if (phone && phone.pretty !== null) {
    lines.push(`Phone: ${normalizePhone ? phone.pretty : phone.raw}`);
    lines.push(`Phone (no dashes): ${phone.digits}`);
  } else {
    lines.push(`Phone: ${UNSURE}`);
    lines.push(`Phone (no dashes): ${UNSURE}`);
  }

  lines.push(`Website: ${dealer.website}`);
  lines.push(`Provider: ${dealer.websiteProvider?.displayName || UNSURE}`);
  lines.push('');

  for (const department of DEPARTMENTS) {
    lines.push(...hoursSection(SECTION_TITLES[department], dealer.hours?.[department] ?? null));
  }

  const { urls } = dealer;
  lines.push(`Schedule Service: ${urls.serviceScheduler || UNSURE}`);
  lines.push(`Credit App: ${urls.creditApp || UNSURE}`);

  const credit = dealer.creditAppProvider;
  const embedded = credit && credit.confidence !== 'unsure' ? credit.displayName : '';
  lines.push(`  • Embedded provider (if any):${embedded ? ` ${embedded}` : ''}`);
  lines.push(`Facebook: ${urls.facebook ?? ''}`.trimEnd());
  lines.push(`Facebook Page ID:${urls.facebookPageId ? ` ${urls.facebookPageId}` : ''}`);
  lines.push('');

  lines.push('Evidence');
  const captured = formatTimestamp(opts.now?.() ?? new Date(), opts.timezone);
  lines.push(...evidenceLines(dealer.evidence, captured));

  return `\`\`\`markdown\n${lines.join('\n')}\n\`\`\``;
}
