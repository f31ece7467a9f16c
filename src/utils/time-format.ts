// Provider timestamps are UTC seconds plus a fixed offset for the location.
// Every helper here shifts into that offset and reads the UTC fields back,
// so output never depends on the host's time zone or locale.

const DAY_NAMES = [
  'Sunday',
  'Monday',
  'Tuesday',
  'Wednesday',
  'Thursday',
  'Friday',
  'Saturday',
];

const MONTH_NAMES = [
  'January',
  'February',
  'March',
  'April',
  'May',
  'June',
  'July',
  'August',
  'September',
  'October',
  'November',
  'December',
];

const pad2 = (n: number) => String(n).padStart(2, '0');

export function toLocalDate(timestampSeconds: number, offsetSeconds = 0): Date {
  return new Date((timestampSeconds + offsetSeconds) * 1000);
}

export function shiftDate(date: Date, offsetSeconds = 0): Date {
  return new Date(date.getTime() + offsetSeconds * 1000);
}

function hour12(date: Date): { hour: number; meridiem: 'AM' | 'PM' } {
  const h = date.getUTCHours();
  return { hour: h % 12 === 0 ? 12 : h % 12, meridiem: h < 12 ? 'AM' : 'PM' };
}

export function dayName(date: Date): string {
  return DAY_NAMES[date.getUTCDay()];
}

export function shortDayName(date: Date): string {
  return dayName(date).slice(0, 3);
}

/** `01:30 PM` */
export function clockTime(date: Date): string {
  const { hour, meridiem } = hour12(date);
  return `${pad2(hour)}:${pad2(date.getUTCMinutes())} ${meridiem}`;
}

/** `1:30 PM` */
export function shortClockTime(date: Date): string {
  const { hour, meridiem } = hour12(date);
  return `${hour}:${pad2(date.getUTCMinutes())} ${meridiem}`;
}

/** `3PM` */
export function hourOnly(date: Date): string {
  const { hour, meridiem } = hour12(date);
  return `${hour}${meridiem}`;
}

/** `2026-10-19 01:30 PM` */
export function isoDateTime(date: Date): string {
  const ymd = `${date.getUTCFullYear()}-${pad2(date.getUTCMonth() + 1)}-${pad2(date.getUTCDate())}`;
  return `${ymd} ${clockTime(date)}`;
}

/** `Monday, October 05, 2026 at 01:30 PM` */
export function longDateTime(date: Date): string {
  return (
    `${dayName(date)}, ${MONTH_NAMES[date.getUTCMonth()]} ${pad2(date.getUTCDate())}, ` +
    `${date.getUTCFullYear()} at ${clockTime(date)}`
  );
}

/** `Monday, October 05` */
export function longDate(date: Date): string {
  return `${dayName(date)}, ${MONTH_NAMES[date.getUTCMonth()]} ${pad2(date.getUTCDate())}`;
}

/** `Monday, October 5 at 1:30 PM` */
export function lastUpdatedLabel(date: Date): string {
  return `${dayName(date)}, ${MONTH_NAMES[date.getUTCMonth()]} ${date.getUTCDate()} at ${shortClockTime(date)}`;
}

export function sameCalendarDay(a: Date, b: Date): boolean {
  return (
    a.getUTCFullYear() === b.getUTCFullYear() &&
    a.getUTCMonth() === b.getUTCMonth() &&
    a.getUTCDate() === b.getUTCDate()
  );
}

export function floorToQuarterHour(date: Date): Date {
  const floored = new Date(date.getTime());
  floored.setUTCMinutes(Math.floor(date.getUTCMinutes() / 15) * 15, 0, 0);
  return floored;
}

export function toUnixSeconds(date: Date): number {
  return Math.floor(date.getTime() / 1000);
}
