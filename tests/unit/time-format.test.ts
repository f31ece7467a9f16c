import { describe, expect, it } from '@jest/globals';
import {
  clockTime,
  dayName,
  floorToQuarterHour,
  hourOnly,
  isoDateTime,
  lastUpdatedLabel,
  longDate,
  longDateTime,
  sameCalendarDay,
  shortClockTime,
  toLocalDate,
} from '@/utils/time-format';

// 2026-10-05 17:30 UTC is 1:30 PM at UTC-4.
const local = toLocalDate(Date.UTC(2026, 9, 5, 17, 30) / 1000, -14400);

describe('time formatting in a fixed offset', () => {
  it('formats clocks', () => {
    expect(clockTime(local)).toBe('01:30 PM');
    expect(shortClockTime(local)).toBe('1:30 PM');
    expect(hourOnly(local)).toBe('1PM');
    expect(clockTime(new Date(Date.UTC(2026, 0, 1, 0, 5)))).toBe('12:05 AM');
    expect(clockTime(new Date(Date.UTC(2026, 0, 1, 12, 0)))).toBe('12:00 PM');
  });

  it('formats dates', () => {
    expect(dayName(local)).toBe('Monday');
    expect(isoDateTime(local)).toBe('2026-10-05 01:30 PM');
    expect(longDateTime(local)).toBe('Monday, October 05, 2026 at 01:30 PM');
    expect(longDate(local)).toBe('Monday, October 05');
    expect(lastUpdatedLabel(local)).toBe('Monday, October 5 at 1:30 PM');
  });

  it('floors to the quarter hour', () => {
    expect(floorToQuarterHour(new Date(Date.UTC(2026, 9, 5, 13, 44, 59, 999))).toISOString()).toBe(
      '2026-10-05T13:30:00.000Z',
    );
    expect(floorToQuarterHour(new Date(Date.UTC(2026, 9, 5, 13, 45))).toISOString()).toBe(
      '2026-10-05T13:45:00.000Z',
    );
  });

  it('compares calendar days', () => {
    const late = new Date(Date.UTC(2026, 9, 5, 23, 59));
    const next = new Date(Date.UTC(2026, 9, 6, 0, 1));
    expect(sameCalendarDay(local, late)).toBe(true);
    expect(sameCalendarDay(late, next)).toBe(false);
  });
});
