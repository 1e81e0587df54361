import { writeFileSync } from 'node:fs';
import path from 'node:path';

import { describe, expect, it } from 'vitest';

import { InputError } from '../src/errors';
import { UrlInputCollector } from '../src/input';
import { tempDir } from './support/fakes';

describe('url input collector', () => {
  it('adds a scheme and keeps the first spelling of duplicates', () => {
    const collector = new UrlInputCollector();
    collector.addMany(['example-motors.test', ' https://Example-Motors.test/ ', 'http://other.test/', ''], 'CLI:--url');
    expect(collector.urls()).toEqual(['https://example-motors.test', 'http://other.test/']);
    expect(collector.size).toBe(2);
  });

  it('reads text files, skipping blanks and comments', () => {
    const file = path.join(tempDir(), 'urls.txt');
    writeFileSync(file, '# dealers\nhttps://a.test/\n\n  b.test  \r\n#https://c.test/\n');

    const collector = new UrlInputCollector();
    collector.addFromTextFile(file);
    expect(collector.urls()).toEqual(['https://a.test/', 'https://b.test']);
    expect(collector.summary()).toBe(`Loaded 2 unique URL(s) from 1 source(s): file:${file}`);
  });

  it('reads a named CSV column', () => {
    const file = path.join(tempDir(), 'dealers.csv');
    writeFileSync(file, 'name,website\nExample Motors,https://a.test/\nNo Site,\nOther,b.test\n');

    const collector = new UrlInputCollector();
    collector.add('https://a.test');
    collector.addFromCsv(file, 'website');
    expect(collector.urls()).toEqual(['https://a.test', 'https://b.test']);
    expect(collector.summary()).toBe(`Loaded 2 unique URL(s) from 2 source(s): CLI, csv:${file}`);
  });

  it('names the available columns when the requested one is missing', () => {
    const file = path.join(tempDir(), 'dealers.csv');
    writeFileSync(file, 'name,website\nExample Motors,https://a.test/\n');

    const collector = new UrlInputCollector();
    expect(() => collector.addFromCsv(file)).toThrow(
      new InputError(`Column 'url' not found in ${file}. Available columns: name, website`)
    );
  });

  it('rejects missing files', () => {
    const collector = new UrlInputCollector();
    const missing = path.join(tempDir(), 'nope.txt');
    expect(() => collector.addFromTextFile(missing)).toThrow(`URL file not found: ${missing}`);
    expect(() => collector.addFromCsv(missing)).toThrow(`CSV file not found: ${missing}`);
  });
});
