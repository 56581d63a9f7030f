/**
 * Timestamp normalizer: turns a RawTimestamp into an absolute instant.
 *
 * Rules:
 * - Offset present: used verbatim, the fallback is ignored.
 * - Offset absent: the caller's fallback offset applies (never UTC by
 *   assumption, never the ambient zone).
 * - Year absent: the reference year at the effective offset, rolled back one
 *   year when that would put the timestamp more than
 *   YEAR_ROLLBACK_TOLERANCE_MS after the reference time.
 * - Date absent (time-of-day grammars): the reference date at the effective
 *   offset.
 * - Fraction absent: exactly zero.
 */

import { InvalidReferenceTimeError, invalidCalendarDate } from "./errors.js";
import { assertUtcOffset } from "./offset.js";
import type { RawTimestamp, ResolvedTimestamp, UtcOffset } from "./types.js";
import {
  isValidDate,
  isValidTimeOfDay,
  offsetToMillis,
  toWallClock,
  wallClockMillis,
} from "./utils.js";

// ============================================================================
// Constants
// ============================================================================

const MS_PER_DAY = 24 * 60 * 60 * 1000;

/**
 * How far past the reference time a yearless timestamp may fall before it is
 * attributed to the previous year.
 */
export const YEAR_ROLLBACK_TOLERANCE_MS = 3 * MS_PER_DAY;

const NANOS_PER_MILLI = 1_000_000;

// ============================================================================
// Helpers
// ============================================================================

/**
 * Reference time as epoch milliseconds.
 */
export type ReferenceTime = Date | number;

const toEpochMillis = (referenceNow: ReferenceTime): number => {
  const millis =
    typeof referenceNow === "number" ? referenceNow : referenceNow.getTime();
  if (!Number.isFinite(millis)) {
    throw new InvalidReferenceTimeError(referenceNow);
  }
  return millis;
};

/**
 * Instant for a wall-clock reading at a given offset.
 */
const instantAt = (
  year: number,
  month: number,
  day: number,
  raw: RawTimestamp,
  offsetMinutes: UtcOffset
): number =>
  wallClockMillis(year, month, day, raw.hour, raw.minute, raw.second) -
  offsetToMillis(offsetMinutes);

/**
 * Pick the year for a yearless timestamp.
 * The candidate is computed before calendar validation: Feb 29 in a non-leap
 * reference year rolls over to Mar 1 for the comparison only.
 */
export const inferYear = (
  raw: RawTimestamp & { readonly month: number; readonly day: number },
  nowMillis: number,
  offsetMinutes: UtcOffset
): number => {
  const referenceYear = toWallClock(nowMillis, offsetMinutes).getUTCFullYear();
  const candidate = instantAt(
    referenceYear,
    raw.month,
    raw.day,
    raw,
    offsetMinutes
  );
  if (candidate - nowMillis > YEAR_ROLLBACK_TOLERANCE_MS) {
    return referenceYear - 1;
  }
  return referenceYear;
};

// ============================================================================
// Resolve
// ============================================================================

/**
 * Resolve a raw timestamp against a reference time and fallback offset.
 * Throws InvalidCalendarDateError when the final fields are not a real
 * date-time, InvalidOffsetError for an unusable fallback offset and
 * InvalidReferenceTimeError for a reference time that is not an instant.
 */
export const resolve = (
  raw: RawTimestamp,
  referenceNow: ReferenceTime,
  fallbackOffset: UtcOffset
): ResolvedTimestamp => {
  const offsetMinutes =
    raw.offsetMinutes ?? assertUtcOffset(fallbackOffset);
  const nowMillis = toEpochMillis(referenceNow);

  let year: number;
  let month: number;
  let day: number;

  if (raw.month === undefined || raw.day === undefined) {
    const today = toWallClock(nowMillis, offsetMinutes);
    year = today.getUTCFullYear();
    month = today.getUTCMonth() + 1;
    day = today.getUTCDate();
  } else {
    month = raw.month;
    day = raw.day;
    year =
      raw.year ??
      inferYear({ ...raw, month: raw.month, day: raw.day }, nowMillis, offsetMinutes);
  }

  if (
    !isValidDate(month, day, year) ||
    !isValidTimeOfDay(raw.hour, raw.minute, raw.second)
  ) {
    throw invalidCalendarDate(raw, year, month, day);
  }

  const nanosecond = raw.nanosecond ?? 0;
  const epochMillis =
    instantAt(year, month, day, raw, offsetMinutes) +
    Math.floor(nanosecond / NANOS_PER_MILLI);

  return Object.freeze({ epochMillis, nanosecond, offsetMinutes });
};
