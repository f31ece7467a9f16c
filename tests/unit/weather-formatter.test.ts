import { describe, expect, it } from '@jest/globals';
import { formatForLlm } from '@/utils/weather-formatter';
import { YESTERDAY } from '../fixtures/fakes';
import { NOW, WIND_ADVISORY, buildSnapshot } from '../fixtures/snapshot';

describe('formatForLlm', () => {
  it('renders every section in order', () => {
    expect(formatForLlm(buildSnapshot(), null, { now: NOW })).toBe(
      [
        'Current Date and Time: Monday, October 19, 2026 at 01:00 PM',
        "\nTODAY'S FORECAST:",
        '  Right Now: clear sky at 73°F',
        '  Current Precipitation: none.',
        '  Current Wind: Light winds around 8 mph.',
        '  Current UV Index: 5.2 (moderate)',
        '  Sunrise: 07:20 AM, Sunset: 06:25 PM.',
        '\n  Overall for Today (Monday): Sunny and mild',
        '  High: 78°F, Low for tonight: 65°F.',
        '  Precipitation: Low chance of precipitation.',
        '  Day Wind: Light winds around 7 mph.',
        '\nNEXT 8 HOURS:',
        '  02:00 PM: clear sky at 74°F (UV 6.5 - Mention sunscreen)',
        '  03:00 PM: few clouds at 75°F (25% chance precip, 0.4mm rain)',
        '\nNEXT FEW DAYS (for daily_forecasts - use these exact day names):',
        '\n  Tuesday:',
        '    Summary: Rain in the afternoon',
        '    High: 70°F, Low: 58°F.',
        '    Precipitation: 60% chance of precipitation (3mm moderate rain).',
        '    Wind: Windy, around 16 mph. Gusts up to 30 mph.',
        '\n  Wednesday:',
        '    Summary: Cool and breezy',
        '    High: 62°F, Low: 50°F.',
        '    Precipitation: Low chance of precipitation.',
        '    Wind: Light winds around 12 mph.',
      ].join('\n'),
    );
  });

  it('adds yesterday and alerts ahead of today', () => {
    const text = formatForLlm(buildSnapshot({ alerts: [WIND_ADVISORY] }), YESTERDAY, {
      now: NOW,
    });
    const lines = text.split('\n');

    expect(lines.slice(0, 9)).toEqual([
      'Current Date and Time: Monday, October 19, 2026 at 01:00 PM',
      '',
      "YESTERDAY'S WEATHER (Sunday, October 18):",
      '  Average Temperature: 66°F (felt like 66°F)',
      '  High: 66°F, Low: 66°F',
      '  Main Condition: Clouds',
      '',
      'ACTIVE WEATHER ALERTS:',
      '- Wind Advisory from NWS Sterling VA: Gusty winds expected. ' +
        '(Effective: 2026-10-19 03:00 PM to 2026-10-20 12:00 PM)',
    ]);
  });

  it('mentions feels-like only for a large gap', () => {
    const snapshot = buildSnapshot();
    const chilly = buildSnapshot({ current: { ...snapshot.current, temp: 40, feels_like: 33.6 } });
    expect(formatForLlm(chilly, null, { now: NOW })).toContain(
      '  Right Now: clear sky at 40°F (feels like 34°F)',
    );
  });

  it('reports current rain or snow', () => {
    const snapshot = buildSnapshot();
    const wet = buildSnapshot({ current: { ...snapshot.current, rain: { '1h': 1.2 } } });
    const snowy = buildSnapshot({ current: { ...snapshot.current, snow: { '1h': 0.8 } } });
    expect(formatForLlm(wet, null, { now: NOW })).toContain(
      '  Current Precipitation: raining (1.2 mm/hr).',
    );
    expect(formatForLlm(snowy, null, { now: NOW })).toContain(
      '  Current Precipitation: snowing (0.8 mm/hr).',
    );
  });

  it('limits the hourly section to eight entries', () => {
    const hourly = Array.from({ length: 12 }, (_, i) => ({ dt: 1792432800 + i * 3600, temp: 70 }));
    const lines = formatForLlm(buildSnapshot({ hourly }), null, { now: NOW }).split('\n');
    const start = lines.indexOf('NEXT 8 HOURS:');
    expect(lines.slice(start + 1, start + 9).every((line) => line.endsWith('at 70°F'))).toBe(true);
    expect(lines[start + 9]).toBe('');
  });

  it('says so when there is no extended forecast', () => {
    const snapshot = buildSnapshot();
    const text = formatForLlm(buildSnapshot({ daily: snapshot.daily?.slice(0, 1) }), null, {
      now: NOW,
    });
    expect(text.endsWith(
      '\nNEXT FEW DAYS (for daily_forecasts - use these exact day names):\n' +
        '  No extended forecast available.',
    )).toBe(true);
  });

  it('degrades missing fields to N/A', () => {
    const text = formatForLlm({}, null, { now: NOW, unitSymbol: '°C' });
    expect(text).toBe(
      [
        'Current Date and Time: Monday, October 19, 2026 at 05:00 PM',
        "\nTODAY'S FORECAST:",
        '  Right Now: Not available at N/A',
        '  Current Precipitation: none.',
        '  Current Wind: Wind data not available.',
        '  Current UV Index: N/A',
        '  Sunrise: N/A, Sunset: N/A.',
        '\nNEXT FEW DAYS (for daily_forecasts - use these exact day names):',
        '  No extended forecast available.',
      ].join('\n'),
    );
  });

  it('keeps the clock line stable within a quarter hour', () => {
    const a = formatForLlm(buildSnapshot(), null, { now: new Date('2026-10-19T17:00:00Z') });
    const b = formatForLlm(buildSnapshot(), null, { now: new Date('2026-10-19T17:14:59Z') });
    expect(a).toBe(b);
  });
});
