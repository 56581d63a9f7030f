/**
 * Error classes raised by the timestamp core.
 *
 * An unmatched line is never an error; these cover impossible field values
 * that survive matching, bad offsets or reference times supplied by callers,
 * and catalog misuse.
 */

import type { RawTimestamp } from "./types.js";

/**
 * Base error class for all logstamp failures.
 */
export class LogstampError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "LogstampError";
    Object.setPrototypeOf(this, LogstampError.prototype);
  }
}

/**
 * Calendar fields that were rejected by the normalizer.
 */
export interface CalendarFields {
  readonly year: number;
  readonly month: number;
  readonly day: number;
  readonly hour: number;
  readonly minute: number;
  readonly second: number;
}

/**
 * Thrown by resolve() when the final year/month/day/time do not form a
 * real calendar date, e.g. Feb 29 attributed to a non-leap year.
 */
export class InvalidCalendarDateError extends LogstampError {
  readonly fields: CalendarFields;

  constructor(fields: CalendarFields) {
    const pad = (n: number, width = 2): string =>
      String(n).padStart(width, "0");
    super(
      `invalid calendar date: ${pad(fields.year, 4)}-${pad(fields.month)}-${pad(fields.day)} ${pad(fields.hour)}:${pad(fields.minute)}:${pad(fields.second)}`
    );
    this.name = "InvalidCalendarDateError";
    this.fields = fields;
    Object.setPrototypeOf(this, InvalidCalendarDateError.prototype);
  }
}

/**
 * Thrown when an offset is malformed or outside ±24h.
 */
export class InvalidOffsetError extends LogstampError {
  constructor(value: string | number) {
    super(`invalid UTC offset: ${String(value)}`);
    this.name = "InvalidOffsetError";
    Object.setPrototypeOf(this, InvalidOffsetError.prototype);
  }
}

/**
 * Thrown when the reference time is not a finite instant (e.g. an Invalid Date).
 */
export class InvalidReferenceTimeError extends LogstampError {
  constructor(value: Date | number) {
    super(`invalid reference time: ${String(value)}`);
    this.name = "InvalidReferenceTimeError";
    Object.setPrototypeOf(this, InvalidReferenceTimeError.prototype);
  }
}

/**
 * Thrown when registering into a catalog that has been frozen.
 */
export class CatalogFrozenError extends LogstampError {
  constructor(grammarID: string) {
    super(`cannot register grammar "${grammarID}": catalog is frozen`);
    this.name = "CatalogFrozenError";
    Object.setPrototypeOf(this, CatalogFrozenError.prototype);
  }
}

/**
 * Thrown when a grammar ID is registered twice in the same catalog.
 */
export class DuplicateGrammarError extends LogstampError {
  constructor(grammarID: string) {
    super(`grammar "${grammarID}" is already registered`);
    this.name = "DuplicateGrammarError";
    Object.setPrototypeOf(this, DuplicateGrammarError.prototype);
  }
}

/**
 * Build the error for a raw timestamp resolved into an impossible date.
 */
export const invalidCalendarDate = (
  raw: RawTimestamp,
  year: number,
  month: number,
  day: number
): InvalidCalendarDateError =>
  new InvalidCalendarDateError({
    year,
    month,
    day,
    hour: raw.hour,
    minute: raw.minute,
    second: raw.second,
  });
