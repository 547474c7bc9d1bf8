/**
 * Calendar helpers. All values use the process's local time zone.
 */

const WEEKDAYS = ['Sunday', 'Monday', 'Tuesday', 'Wednesday', 'Thursday', 'Friday', 'Saturday'];
const MONTHS = [
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

const pad = (n: number) => n.toString().padStart(2, '0');

/**
 * History key for a day, e.g. 2026-01-28
 */
export function toDateKey(date: Date): string {
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
}

/**
 * The same wall-clock time `days` calendar days earlier
 */
export function subtractDays(date: Date, days: number): Date {
  const result = new Date(date.getTime());
  result.setDate(result.getDate() - days);
  return result;
}

/** January 05, 2026 */
export function formatMonthDayYear(date: Date): string {
  return `${MONTHS[date.getMonth()]} ${pad(date.getDate())}, ${date.getFullYear()}`;
}

/** Monday, January 05, 2026 */
export function formatLongDate(date: Date): string {
  return `${WEEKDAYS[date.getDay()]}, ${formatMonthDayYear(date)}`;
}
