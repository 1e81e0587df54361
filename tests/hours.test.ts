import { describe, expect, it } from 'vitest';

import { createHoursExtractor, expandDays, parseHoursText } from '../src/extractors/hours';
import { noopLogger } from '../src/logger';
import { FakeDealerPage } from './support/fakes';

const DEALER = 'https://example-motors.test/';
const HOURS_URL = 'https://example-motors.test/hours';

describe('hours text parsing', () => {
  it('expands day ranges, wrapping around the week', () => {
    expect(expandDays('Mon-Wed 9am-5pm')).toEqual(['monday', 'tuesday', 'wednesday']);
    expect(expandDays('Sat through Mon')).toEqual(['saturday', 'sunday', 'monday']);
    expect(expandDays('Thursday: 9am-5pm')).toEqual(['thursday']);
    expect(expandDays('Call for an appointment')).toEqual([]);
  });

  it('splits run-together entries and formats times', () => {
    expect(parseHoursText('Mon-Fri 9am-6pm Sat 10am-4pm Sun closed')).toEqual({
      monday: '9:00 AM - 6:00 PM',
      tuesday: '9:00 AM - 6:00 PM',
      wednesday: '9:00 AM - 6:00 PM',
      thursday: '9:00 AM - 6:00 PM',
      friday: '9:00 AM - 6:00 PM',
      saturday: '10:00 AM - 4:00 PM',
      sunday: 'Closed',
    });
  });

  it('lets later lines override earlier ones', () => {
    expect(parseHoursText('Mon-Sat: 9am-5pm\nSaturday: 9am-1pm')).toMatchObject({
      friday: '9:00 AM - 5:00 PM',
      saturday: '9:00 AM - 1:00 PM',
    });
  });
});

describe('hours extraction', () => {
  const extractor = createHoursExtractor({ logger: noopLogger });

  it('uses a lone department section for every department at low confidence', async () => {
    const page = new FakeDealerPage(DEALER, {
      [HOURS_URL]:
        '<html><body><h2>Sales Hours</h2><p>Mon-Fri: 9:00 AM - 6:00 PM</p>' +
        '<p>Saturday: 10am-4pm</p><p>Sunday: Closed</p></body></html>',
    });

    const result = await extractor.extract(page);
    expect(result.strategy).toBe('general_hours');
    expect(result.confidence).toBe('low');
    expect(result.evidence).toBe(HOURS_URL);

    const sales = result.value?.sales;
    expect(sales).toEqual({
      days: {
        monday: '9:00 AM – 6:00 PM',
        tuesday: '9:00 AM – 6:00 PM',
        wednesday: '9:00 AM – 6:00 PM',
        thursday: '9:00 AM – 6:00 PM',
        friday: '9:00 AM – 6:00 PM',
        saturday: '10:00 AM – 4:00 PM',
        sunday: 'Closed',
      },
      sourceUrl: HOURS_URL,
      confidence: 'low',
    });
    expect(result.value?.service).toEqual(sales);
    expect(result.value?.parts).toEqual(sales);
  });

  it('keeps separate department schedules at medium confidence', async () => {
    const page = new FakeDealerPage(DEALER, {
      [HOURS_URL]:
        '<html><body>' +
        '<h2>Sales Hours</h2><p>Mon-Sat: 9am-8pm</p><p>Sun: Closed</p>' +
        '<h2>Service Hours</h2><p>Mon-Fri: 7:30am-6pm</p><p>Sat: 8am-2pm</p>' +
        '</body></html>',
    });

    const result = await extractor.extract(page);
    expect(result.strategy).toBe('department_sections');
    expect(result.confidence).toBe('medium');
    expect(result.value?.sales?.days).toMatchObject({
      monday: '9:00 AM – 8:00 PM',
      saturday: '9:00 AM – 8:00 PM',
      sunday: 'Closed',
    });
    expect(result.value?.service?.days).toMatchObject({
      monday: '7:30 AM – 6:00 PM',
      saturday: '8:00 AM – 2:00 PM',
      sunday: 'Closed',
    });
    expect(result.value?.parts).toBeNull();
  });

  it('skips menu links that mention hours', async () => {
    const page = new FakeDealerPage(DEALER, {
      [HOURS_URL]:
        '<html><body>' +
        '<nav><ul><li><a href="/hours">Hours &amp; Directions</a></li><li><a href="/specials">Specials</a></li></ul></nav>' +
        '<h2>Store Hours</h2><p>Mon-Fri: 9am-6pm</p>' +
        '</body></html>',
    });

    const result = await extractor.extract(page);
    expect(result.strategy).toBe('general_hours');
    expect(result.value?.sales?.days.monday).toBe('9:00 AM – 6:00 PM');
    expect(result.value?.sales?.days.saturday).toBe('Closed');
  });

  it('finds department sections below a menu naming the same departments', async () => {
    const page = new FakeDealerPage(DEALER, {
      [HOURS_URL]:
        '<html><body>' +
        '<ul class="menu"><li><a href="/sales">Sales Hours</a></li><li><a href="/service">Service Hours</a></li></ul>' +
        '<h2>Sales Hours</h2><p>Mon-Sat: 9am-8pm</p>' +
        '<h2>Service Hours</h2><p>Mon-Fri: 7am-6pm</p>' +
        '</body></html>',
    });

    const result = await extractor.extract(page);
    expect(result.strategy).toBe('department_sections');
    expect(result.confidence).toBe('medium');
    expect(result.value?.sales?.days.monday).toBe('9:00 AM – 8:00 PM');
    expect(result.value?.service?.days.monday).toBe('7:00 AM – 6:00 PM');
  });

  it('falls back to the next department keyword when a heading holds no schedule', async () => {
    const page = new FakeDealerPage(DEALER, {
      [HOURS_URL]:
        '<html><body>' +
        '<h2>Sales Hours</h2><p>Call for details</p>' +
        '<h2>Showroom Hours</h2><p>Mon-Sat: 9am-7pm</p>' +
        '<h2>Repair Hours</h2><p>Mon-Fri: 7am-5pm</p>' +
        '</body></html>',
    });

    const result = await extractor.extract(page);
    expect(result.strategy).toBe('department_sections');
    expect(result.value?.sales?.days.saturday).toBe('9:00 AM – 7:00 PM');
    expect(result.value?.service?.days.monday).toBe('7:00 AM – 5:00 PM');
    expect(result.value?.parts).toBeNull();
  });

  it('keeps raw text when normalization is off', async () => {
    const raw = createHoursExtractor({ logger: noopLogger, normalize: false });
    const page = new FakeDealerPage(DEALER, {
      [HOURS_URL]: '<html><body><h3>Store Hours</h3><p>Mon-Fri 8am-5pm</p></body></html>',
    });

    const result = await raw.extract(page);
    expect(result.strategy).toBe('general_hours');
    expect(result.value?.sales?.days.monday).toBe('8:00 AM - 5:00 PM');
    expect(result.value?.sales?.days.saturday).toBe('Closed');
  });

  it('tries the hours, contact and about pages before the homepage', async () => {
    const page = new FakeDealerPage(DEALER, {
      [DEALER]: '<html><body><p>Welcome to Example Motors</p></body></html>',
    });

    const result = await extractor.extract(page);
    expect(result.confidence).toBe('unsure');
    expect(result.error).toBe('No hours found');
    expect(page.visited).toEqual([
      'https://example-motors.test/hours',
      'https://example-motors.test/contact',
      'https://example-motors.test/about',
      DEALER,
    ]);
  });
});
