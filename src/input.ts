import { existsSync, readFileSync } from 'node:fs';

import Papa from 'papaparse';

import { InputError } from './errors';

function dedupeKey(url: string): string {
  return url.toLowerCase().replace(/\/+$/, '');
}

function withScheme(url: string): string {
  return /^https?:\/\//i.test(url) ? url : `https://${url}`;
}

function readInputFile(filePath: string, kind: string): string {
  if (!existsSync(filePath)) throw new InputError(`${kind} not found: ${filePath}`);
  return readFileSync(filePath, 'utf-8');
}

/**
 * Ordered, de-duplicated dealership URLs gathered from every input source.
 * The first spelling seen of a URL is the one kept.
 */
export class UrlInputCollector {
  private readonly list: string[] = [];
  private readonly seen = new Set<string>();
  private readonly sources: string[] = [];

  add(raw: string, source = 'CLI'): void {
    const trimmed = raw.trim();
    if (!trimmed) return;

    const url = withScheme(trimmed);
    const key = dedupeKey(url);
    if (this.seen.has(key)) return;

    this.seen.add(key);
    this.list.push(url);
    if (!this.sources.includes(source)) this.sources.push(source);
  }

  addMany(urls: Iterable<string>, source = 'CLI'): void {
    for (const url of urls) this.add(url, source);
  }

  /** One URL per line; blank lines and `#` comments are skipped. */
  addFromTextFile(filePath: string): void {
    const lines = readInputFile(filePath, 'URL file').split(/\r?\n/);
    for (const line of lines) {
      const url = line.trim();
      if (url && !url.startsWith('#')) this.add(url, `file:${filePath}`);
    }
  }

  addFromCsv(filePath: string, column = 'url'): void {
    const parsed = Papa.parse<Record<string, string | undefined>>(readInputFile(filePath, 'CSV file'), {
      header: true,
      skipEmptyLines: true,
    });

    const fields = parsed.meta.fields ?? [];
    if (!fields.includes(column)) {
      throw new InputError(
        `Column '${column}' not found in ${filePath}. Available columns: ${fields.join(', ') || '(none)'}`
      );
    }

    for (const row of parsed.data) {
      const url = row[column]?.trim();
      if (url) this.add(url, `csv:${filePath}`);
    }
  }

  urls(): string[] {
    return [...this.list];
  }

  get size(): number {
    return this.list.length;
  }

  summary(): string {
    return `Loaded ${this.list.length} unique URL(s) from ${this.sources.length} source(s): ${this.sources.join(', ')}`;
  }
}
