export type LdObject = Record<string, unknown>;

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Flattens top-level arrays and `@graph` members, in document order. */
export function collectLdObjects(input: unknown): LdObject[] {
  const out: LdObject[] = [];
  const queue: unknown[] = [input];

  while (queue.length) {
    const item = queue.shift();
    if (!item) continue;
    if (Array.isArray(item)) {
      queue.unshift(...item);
      continue;
    }
    if (isRecord(item)) {
      out.push(item);
      const graph = item['@graph'];
      if (graph) queue.unshift(graph);
    }
  }

  return out;
}

export type LdParseResult = {
  objects: LdObject[];
  /** One message per ld+json block that failed to parse. */
  errors: string[];
};

export function readLdJson(doc: Document): LdParseResult {
  const objects: LdObject[] = [];
  const errors: string[] = [];

  const scripts = Array.from(doc.querySelectorAll('script[type="application/ld+json"]'));
  scripts.forEach((script, index) => {
    const raw = (script.textContent ?? '').trim();
    if (!raw) return;
    try {
      objects.push(...collectLdObjects(JSON.parse(raw)));
    } catch (err) {
      errors.push(`ld+json block ${index + 1}: ${err instanceof Error ? err.message : String(err)}`);
    }
  });

  return { objects, errors };
}

export function ldTypes(item: LdObject): string[] {
  const type = item['@type'];
  if (typeof type === 'string') return [type];
  if (Array.isArray(type)) return type.filter((t): t is string => typeof t === 'string');
  return [];
}

export function toNumber(value: unknown): number | null {
  if (typeof value === 'number' && Number.isFinite(value)) return value;
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number.parseFloat(value);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

export function ldString(value: unknown): string {
  if (typeof value === 'string') return value.trim();
  if (typeof value === 'number') return String(value);
  // addressRegion / addressCountry sometimes arrive as { name: ... }
  if (isRecord(value) && typeof value.name === 'string') return value.name.trim();
  return '';
}

export function extractLdGeo(item: LdObject): { latitude: number | null; longitude: number | null } {
  const geo = item.geo;
  if (isRecord(geo)) {
    return {
      latitude: toNumber(geo.latitude ?? geo.lat),
      longitude: toNumber(geo.longitude ?? geo.lng ?? geo.lon),
    };
  }
  return { latitude: null, longitude: null };
}
