/**
 * UTC offset codec.
 *
 * Accepted text: "Z", "z", "UTC", "GMT", "+HH", "+HHMM", "+HH:MM" (and "-").
 * Output text is always "+HH:MM".
 */

import { InvalidOffsetError } from "./errors.js";
import type { UtcOffset } from "./types.js";
import { safeParseInt } from "./utils.js";

/** Largest representable offset magnitude in minutes (just under 24h) */
export const MAX_OFFSET_MINUTES = 24 * 60 - 1;

const offsetPattern = /^(?:([Zz]|UTC|GMT)|([+-])(\d{2})(?::?(\d{2}))?)$/;

/**
 * Check that a numeric offset is an integer within ±24h.
 */
export const isValidUtcOffset = (minutes: number): boolean =>
  Number.isInteger(minutes) && Math.abs(minutes) <= MAX_OFFSET_MINUTES;

/**
 * Parse offset text, returning undefined when it is malformed or out of range.
 * Used by grammars, where a bad offset is a failed match.
 */
export const tryParseUtcOffset = (text: string | undefined): UtcOffset | undefined => {
  if (text === undefined) {
    return undefined;
  }
  const match = offsetPattern.exec(text);
  if (!match) {
    return undefined;
  }
  if (match[1]) {
    return 0;
  }

  const hours = safeParseInt(match[3]);
  const minutes = match[4] === undefined ? 0 : safeParseInt(match[4]);
  if (hours === undefined || minutes === undefined || minutes > 59) {
    return undefined;
  }

  const total = hours * 60 + minutes;
  if (total > MAX_OFFSET_MINUTES) {
    return undefined;
  }
  if (total === 0) {
    return 0;
  }
  return match[2] === "-" ? -total : total;
};

/**
 * Parse offset text, throwing InvalidOffsetError when it cannot be used.
 */
export const parseUtcOffset = (text: string): UtcOffset => {
  const parsed = tryParseUtcOffset(text.trim());
  if (parsed === undefined) {
    throw new InvalidOffsetError(text);
  }
  return parsed;
};

/**
 * Throw InvalidOffsetError unless the offset is usable.
 */
export const assertUtcOffset = (minutes: number): UtcOffset => {
  if (!isValidUtcOffset(minutes)) {
    throw new InvalidOffsetError(minutes);
  }
  return minutes;
};

/**
 * Format an offset as "+HH:MM".
 */
export const formatUtcOffset = (minutes: UtcOffset): string => {
  const sign = minutes < 0 ? "-" : "+";
  const abs = Math.abs(minutes);
  const hh = String(Math.floor(abs / 60)).padStart(2, "0");
  const mm = String(abs % 60).padStart(2, "0");
  return `${sign}${hh}:${mm}`;
};
