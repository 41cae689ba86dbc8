/**
 * Date Utilities
 *
 * StudyDesk stores wall-clock local time so that SQLite's DATE() and the
 * streak walk agree on what "today" means for the user.
 *
 * - Timestamps: `YYYY-MM-DD HH:MM:SS` (SQLite datetime format, sortable)
 * - Date keys:  `YYYY-MM-DD`
 */

/** Source of the current time. Injected so tests can pin "now". */
export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

const DATE_KEY_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

function pad(n: number): string {
  return String(n).padStart(2, '0');
}

/**
 * Format a Date as a local `YYYY-MM-DD` key.
 */
export function toDateKey(date: Date): string {
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
}

/**
 * Format a Date as a local `YYYY-MM-DD HH:MM:SS` timestamp.
 */
export function toTimestamp(date: Date): string {
  return (
    `${toDateKey(date)} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

/**
 * Check that a string is a real calendar date in `YYYY-MM-DD` form.
 * Rejects shapes like `2024-02-30`.
 */
export function isValidDateKey(value: string): boolean {
  const match = DATE_KEY_PATTERN.exec(value);
  if (!match) return false;
  const [, y, m, d] = match;
  const date = new Date(Number(y), Number(m) - 1, Number(d));
  return toDateKey(date) === value;
}

/**
 * Parse a `YYYY-MM-DD` key into a Date at local midnight.
 *
 * @throws Error if the key is not a valid date
 */
export function parseDateKey(key: string): Date {
  if (!isValidDateKey(key)) {
    throw new Error(`Invalid date: ${key}`);
  }
  const [y, m, d] = key.split('-').map(Number);
  return new Date(y ?? 0, (m ?? 1) - 1, d ?? 1);
}

/**
 * Shift a date key by a number of calendar days (negative goes back).
 *
 * Works on calendar fields, so daylight-saving changes never skip a day.
 */
export function addDays(key: string, days: number): string {
  const date = parseDateKey(key);
  date.setDate(date.getDate() + days);
  return toDateKey(date);
}
