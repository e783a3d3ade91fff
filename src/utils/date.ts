/**
 * Calendar-date helpers. Deadlines are kept as `YYYY-MM-DD` strings, which sort
 * chronologically as plain strings.
 */

const DATE_REGEX = /^(\d{4})-(\d{2})-(\d{2})$/;

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

const WEEKDAY_NAMES = ['Sunday', 'Monday', 'Tuesday', 'Wednesday', 'Thursday', 'Friday', 'Saturday'];

/**
 * Parse a date string in YYYY-MM-DD format. Returns null unless the date
 * exists (e.g. not Feb 30).
 */
export function parseIsoDate(dateStr: string): Date | null {
  const match = dateStr.match(DATE_REGEX);
  if (!match) {
    return null;
  }
  const [, year, month, day] = match;
  const date = new Date(Date.UTC(Number(year), Number(month) - 1, Number(day)));
  if (
    date.getUTCFullYear() !== Number(year) ||
    date.getUTCMonth() !== Number(month) - 1 ||
    date.getUTCDate() !== Number(day)
  ) {
    return null;
  }
  return date;
}

export function isIsoDate(dateStr: string): boolean {
  return parseIsoDate(dateStr) !== null;
}

// `2020-02-01` -> `2020-02`
export function monthKey(dateStr: string): string {
  return dateStr.slice(0, 7);
}

// `2020-02-01` -> `February 2020`
export function formatMonth(dateStr: string): string {
  const date = parseIsoDate(dateStr);
  if (!date) return dateStr;
  return `${MONTH_NAMES[date.getUTCMonth()] ?? ''} ${date.getUTCFullYear()}`;
}

export function weekdayName(dateStr: string): string {
  const date = parseIsoDate(dateStr);
  if (!date) return '';
  return WEEKDAY_NAMES[date.getUTCDay()] ?? '';
}
