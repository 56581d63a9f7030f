/**
 * Core data model for timestamp extraction.
 *
 * Every value here is created fresh per call and owned by the caller.
 * The only long-lived state is the grammar catalog (see catalog.ts).
 */

// ============================================================================
// Offsets
// ============================================================================

/**
 * UTC offset expressed as minutes east of UTC.
 * Valid range is strictly within ±24h (-1439..1439).
 */
export type UtcOffset = number;

// ============================================================================
// Grammar Identity
// ============================================================================

/**
 * Identifiers of the built-in grammars, in no particular order.
 * Custom grammars registered into a custom catalog may use any string.
 */
export type BuiltinGrammarID =
  | "engine-bracket"
  | "common-log"
  | "rfc5424"
  | "iso8601"
  | "iso-spaced-offset"
  | "ctime"
  | "month-day-year"
  | "syslog"
  | "iso-local"
  | "time-of-day";

export type GrammarID = BuiltinGrammarID | (string & {});

// ============================================================================
// Raw Timestamp
// ============================================================================

/**
 * Partially specified time fields as read from the line, before any
 * year, date, or zone inference.
 *
 * month and day are absent together only for time-of-day grammars.
 */
export interface RawTimestamp {
  /** Absent for conventions that omit it (syslog) */
  readonly year?: number;
  /** 1-12 */
  readonly month?: number;
  /** 1-31, valid for the month */
  readonly day?: number;
  /** 0-23 */
  readonly hour: number;
  /** 0-59 */
  readonly minute: number;
  /** 0-59, leap seconds are not modeled */
  readonly second: number;
  /** Sub-second fraction in nanoseconds; absent means exactly zero */
  readonly nanosecond?: number;
  /** Explicit offset from the line; absent means the fallback offset applies */
  readonly offsetMinutes?: UtcOffset;
}

// ============================================================================
// Resolved Timestamp
// ============================================================================

/**
 * Fully disambiguated absolute instant with its UTC offset.
 * Instances are frozen.
 */
export interface ResolvedTimestamp {
  /** Milliseconds since the Unix epoch, sub-millisecond digits truncated */
  readonly epochMillis: number;
  /** Full sub-second fraction (0-999_999_999) */
  readonly nanosecond: number;
  /** Offset the timestamp is expressed in */
  readonly offsetMinutes: UtcOffset;
}

// ============================================================================
// Log Record
// ============================================================================

/**
 * Result of splitting one log line.
 *
 * Invariant: prefix + separator + message === the original line.
 * When no grammar matched, timestamp and grammar are null, prefix and
 * separator are empty, and message is the whole line.
 */
export interface LogRecord {
  readonly timestamp: ResolvedTimestamp | null;
  readonly message: string;
  readonly grammar: GrammarID | null;
  /** Exact timestamp text consumed from the start of the line */
  readonly prefix: string;
  /** Exact separator text between prefix and message */
  readonly separator: string;
}

/**
 * Create the record for a line with no detectable timestamp.
 */
export const createUntimestampedRecord = (line: string): LogRecord => ({
  timestamp: null,
  message: line,
  grammar: null,
  prefix: "",
  separator: "",
});

/**
 * Check whether a record carries a timestamp.
 */
export const hasTimestamp = (
  record: LogRecord
): record is LogRecord & { readonly timestamp: ResolvedTimestamp } =>
  record.timestamp !== null;
