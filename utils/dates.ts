import {
  addDays,
  differenceInCalendarDays,
  format,
  isValid,
  parse,
  parseISO,
  startOfMonth,
} from 'date-fns';

/** Calendar dates cross the store boundary as `yyyy-MM-dd` in local time. */
export const DATE_KEY_FORMAT = 'yyyy-MM-dd';

const DATE_KEY_PATTERN = /^\d{4}-\d{2}-\d{2}$/;
const TIME_PATTERN = /^([01]?\d|2[0-3]):[0-5]\d(:[0-5]\d)?$/;

/** Source of "now"; injected so that date-dependent scoring is reproducible. */
export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

export function toDateKey(date: Date): string {
  return format(date, DATE_KEY_FORMAT);
}

export function parseDateKey(key: string): Date {
  return parseISO(key);
}

export function isDateKey(value: string): boolean {
  return DATE_KEY_PATTERN.test(value) && isValid(parse(value, DATE_KEY_FORMAT, new Date()));
}

export function isTimeOfDay(value: string): boolean {
  return TIME_PATTERN.test(value);
}

/**
 * Canonical `HH:mm` form of a time accepted by isTimeOfDay: '7:30' and
 * '07:30:00' both become '07:30'.
 */
export function normalizeTimeOfDay(value: string): string {
  const [hours = '', minutes = ''] = value.split(':');
  return `${hours.padStart(2, '0')}:${minutes}`;
}

export function isIsoTimestamp(value: string): boolean {
  return isValid(parseISO(value));
}

/** Local calendar date of an ISO timestamp. */
export function timestampToDateKey(timestamp: string): string {
  return toDateKey(parseISO(timestamp));
}

/** Whole calendar days from `fromKey` to `toKey` (negative when `toKey` is earlier). */
export function daysBetween(fromKey: string, toKey: string): number {
  return differenceInCalendarDays(parseDateKey(toKey), parseDateKey(fromKey));
}

export function shiftDateKey(key: string, days: number): string {
  return toDateKey(addDays(parseDateKey(key), days));
}

export function firstOfMonthKey(key: string): string {
  return toDateKey(startOfMonth(parseDateKey(key)));
}

export function monthLabel(key: string): string {
  return format(parseDateKey(key), 'yyyy-MM');
}

/** Weekday name of a date key, e.g. "Monday". */
export function weekdayName(key: string): string {
  return format(parseDateKey(key), 'EEEE');
}

/**
 * Hour component of a free-form `HH:mm[:ss]` string, or null when the leading
 * segment is not an integer.
 */
export function hourOf(time: string): number | null {
  const head = time.split(':')[0]?.trim() ?? '';
  if (!/^\d+$/.test(head)) {
    return null;
  }
  return Number.parseInt(head, 10);
}
