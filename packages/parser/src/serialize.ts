/**
 * Serialization helpers for parsed records.
 * Provides RFC 3339 timestamp text, JSON/NDJSON output and a compact
 * one-line form.
 */

import { formatUtcOffset } from "./offset.js";
import type { LogRecord, ResolvedTimestamp } from "./types.js";
import { stripAnsi, toWallClock } from "./utils.js";

// ============================================================================
// Timestamp Formatting
// ============================================================================

const pad = (n: number, width = 2): string => String(n).padStart(width, "0");

/**
 * Format the sub-second part: "" for zero, otherwise "." followed by the
 * nanosecond digits with trailing zeros removed.
 */
const formatFraction = (nanosecond: number): string => {
  if (nanosecond === 0) {
    return "";
  }
  return `.${pad(nanosecond, 9).replace(/0+$/, "")}`;
};

/**
 * Format a resolved timestamp as RFC 3339 in its own offset.
 * Example: 2024-06-01T12:00:00+02:00, 2003-10-11T22:14:15.003+00:00
 */
export const formatTimestamp = (ts: ResolvedTimestamp): string => {
  const wall = toWallClock(ts.epochMillis, ts.offsetMinutes);
  const date = `${pad(wall.getUTCFullYear(), 4)}-${pad(wall.getUTCMonth() + 1)}-${pad(wall.getUTCDate())}`;
  const time = `${pad(wall.getUTCHours())}:${pad(wall.getUTCMinutes())}:${pad(wall.getUTCSeconds())}`;
  return `${date}T${time}${formatFraction(ts.nanosecond)}${formatUtcOffset(ts.offsetMinutes)}`;
};

/**
 * The instant as a Date (millisecond precision).
 */
export const toDate = (ts: ResolvedTimestamp): Date => new Date(ts.epochMillis);

// ============================================================================
// JSON Serialization
// ============================================================================

/**
 * Options for JSON serialization.
 */
export interface SerializeOptions {
  /** Strip ANSI codes from the message (default: false) */
  readonly stripAnsi?: boolean;
  /** Include prefix and separator fields (default: false) */
  readonly includePrefix?: boolean;
  /** Pretty print with indentation (default: false) */
  readonly pretty?: boolean;
  /** Indentation for pretty printing (default: 2) */
  readonly indent?: number;
}

/**
 * JSON shape of a record.
 */
export interface SerializedRecord {
  timestamp: string | null;
  epochMillis: number | null;
  offset: string | null;
  grammar: string | null;
  message: string;
  prefix?: string;
  separator?: string;
}

/**
 * Convert a record to its JSON shape.
 */
export const toSerializedRecord = (
  record: LogRecord,
  opts: SerializeOptions = {}
): SerializedRecord => {
  const { stripAnsi: doStripAnsi = false, includePrefix = false } = opts;
  const ts = record.timestamp;

  const result: SerializedRecord = {
    timestamp: ts ? formatTimestamp(ts) : null,
    epochMillis: ts ? ts.epochMillis : null,
    offset: ts ? formatUtcOffset(ts.offsetMinutes) : null,
    grammar: record.grammar,
    message: doStripAnsi ? stripAnsi(record.message) : record.message,
  };

  if (includePrefix) {
    result.prefix = record.prefix;
    result.separator = record.separator;
  }

  return result;
};

/**
 * Serialize a single record to JSON.
 */
export const serializeRecord = (
  record: LogRecord,
  opts: SerializeOptions = {}
): string => {
  const { pretty = false, indent = 2 } = opts;
  const result = toSerializedRecord(record, opts);
  return pretty ? JSON.stringify(result, null, indent) : JSON.stringify(result);
};

/**
 * Serialize records to line-delimited JSON (NDJSON).
 * Each record is on its own line; pretty printing is ignored.
 */
export const serializeRecordsNDJSON = (
  records: readonly LogRecord[],
  opts: SerializeOptions = {}
): string =>
  records
    .map((record) => JSON.stringify(toSerializedRecord(record, opts)))
    .join("\n");

// ============================================================================
// Compact Output
// ============================================================================

/** Placeholder printed in place of a missing timestamp */
const NO_TIMESTAMP = "-";

/**
 * Options for compact output.
 */
export type CompactOptions = Pick<SerializeOptions, "stripAnsi">;

/**
 * Format a record as a single line: "<timestamp>\t<message>".
 * Lines without a timestamp use "-".
 */
export const formatRecordCompact = (
  record: LogRecord,
  opts: CompactOptions = {}
): string => {
  const ts = record.timestamp ? formatTimestamp(record.timestamp) : NO_TIMESTAMP;
  const message = opts.stripAnsi ? stripAnsi(record.message) : record.message;
  return `${ts}\t${message}`;
};

/**
 * Format records as compact lines.
 */
export const formatRecordsCompact = (
  records: readonly LogRecord[],
  opts: CompactOptions = {}
): string => records.map((record) => formatRecordCompact(record, opts)).join("\n");
