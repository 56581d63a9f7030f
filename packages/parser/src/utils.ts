/**
 * Shared helpers for grammars, the normalizer, and serialization.
 */

// ============================================================================
// ANSI Escape Code Handling
// ============================================================================

/**
 * Pattern matching ANSI escape sequences for terminal output.
 * Covers CSI sequences (\x1b[31m), OSC sequences (\x1b]0;title\x07) and
 * simple two-byte escapes (\x1b7).
 *
 * ReDoS safety: the OSC branch consumes non-terminator chars then the terminator.
 */
// biome-ignore lint/suspicious/noControlCharactersInRegex: intentional ANSI escape sequence matching
const ansiEscapePattern =
  /\x1b\[[0-9;:?]*[A-Za-z]|\x1b\][^\x07\x1b]*(?:\x07|\x1b\\)?|\x1b[()][AB012]|\x1b[@-_]/g;

/**
 * Remove ANSI escape sequences from a string.
 * Colored service output often ends up in log files verbatim.
 */
export const stripAnsi = (s: string): string =>
  s.replace(ansiEscapePattern, "");

// ============================================================================
// Number Parsing
// ============================================================================

/**
 * Safely parse a non-negative decimal integer.
 * Returns undefined for empty, non-numeric, or out-of-range input.
 */
export const safeParseInt = (s: string | undefined): number | undefined => {
  if (!s) {
    return undefined;
  }
  const n = Number.parseInt(s, 10);
  if (Number.isNaN(n) || n < 0 || n > Number.MAX_SAFE_INTEGER) {
    return undefined;
  }
  return n;
};

/** Digits kept from a sub-second fraction (nanosecond precision) */
const MAX_FRACTION_DIGITS = 9;

/**
 * Convert fraction digits ("003", "1234567") to nanoseconds.
 * Digits past the ninth are truncated.
 */
export const parseFraction = (digits: string | undefined): number | undefined => {
  if (!digits) {
    return undefined;
  }
  const kept = digits.slice(0, MAX_FRACTION_DIGITS).padEnd(MAX_FRACTION_DIGITS, "0");
  return safeParseInt(kept);
};

// ============================================================================
// Month and Weekday Names
// ============================================================================

export const MONTH_ABBREVIATIONS = [
  "Jan",
  "Feb",
  "Mar",
  "Apr",
  "May",
  "Jun",
  "Jul",
  "Aug",
  "Sep",
  "Oct",
  "Nov",
  "Dec",
] as const;

const monthIndex: ReadonlyMap<string, number> = new Map(
  MONTH_ABBREVIATIONS.map((name, i) => [name, i + 1])
);

/**
 * Map an English month abbreviation to 1-12 (case-sensitive).
 */
export const monthFromAbbreviation = (name: string | undefined): number | undefined =>
  name === undefined ? undefined : monthIndex.get(name);

// ============================================================================
// Calendar
// ============================================================================

export const isLeapYear = (year: number): boolean =>
  (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;

const DAYS_IN_MONTH = [31, 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31] as const;

/**
 * Number of days in a month. When the year is unknown, February has 29 days
 * so that a yearless Feb 29 can still be attributed to a leap year later.
 */
export const daysInMonth = (month: number, year?: number): number => {
  if (month === 2) {
    return year === undefined || isLeapYear(year) ? 29 : 28;
  }
  return DAYS_IN_MONTH[month - 1] ?? 0;
};

/**
 * Check a date triple. The year is optional (see daysInMonth).
 */
export const isValidDate = (
  month: number,
  day: number,
  year?: number
): boolean =>
  Number.isInteger(month) &&
  Number.isInteger(day) &&
  month >= 1 &&
  month <= 12 &&
  day >= 1 &&
  day <= daysInMonth(month, year);

/**
 * Check a wall-clock time. Leap seconds (second 60) are rejected.
 */
export const isValidTimeOfDay = (
  hour: number,
  minute: number,
  second: number
): boolean =>
  Number.isInteger(hour) &&
  Number.isInteger(minute) &&
  Number.isInteger(second) &&
  hour >= 0 &&
  hour <= 23 &&
  minute >= 0 &&
  minute <= 59 &&
  second >= 0 &&
  second <= 59;

const MS_PER_MINUTE = 60_000;

/**
 * Milliseconds since the epoch for a wall-clock reading taken as UTC.
 * Out-of-range fields roll over (Feb 29 2025 becomes Mar 1 2025).
 * Uses setUTCFullYear so that years 0-99 are not mapped to 19xx.
 */
export const wallClockMillis = (
  year: number,
  month: number,
  day: number,
  hour: number,
  minute: number,
  second: number
): number => {
  const d = new Date(0);
  d.setUTCFullYear(year, month - 1, day);
  d.setUTCHours(hour, minute, second, 0);
  return d.getTime();
};

/**
 * Shift an instant by an offset so that getUTC* accessors read the wall clock
 * of that offset.
 */
export const toWallClock = (epochMillis: number, offsetMinutes: number): Date =>
  new Date(epochMillis + offsetMinutes * MS_PER_MINUTE);

export const offsetToMillis = (offsetMinutes: number): number =>
  offsetMinutes * MS_PER_MINUTE;
