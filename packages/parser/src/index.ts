/**
 * @logstamp/parser - split log lines into timestamp and message
 *
 * Architecture:
 * - grammars/     : one unit per timestamp convention
 * - catalog.ts    : priority-ordered, frozen set of grammars
 * - matcher.ts    : first grammar that recognises a line wins
 * - normalizer.ts : year/zone inference into an absolute instant
 */

// ============================================================================
// Core Types
// ============================================================================

export type {
  BuiltinGrammarID,
  GrammarID,
  LogRecord,
  RawTimestamp,
  ResolvedTimestamp,
  UtcOffset,
} from "./types.js";
export { createUntimestampedRecord, hasTimestamp } from "./types.js";
export type { GrammarMatch, TimestampGrammar } from "./grammar-types.js";
export { consumedLength, PatternGrammar } from "./grammar-types.js";
export type { CalendarFields } from "./errors.js";
export {
  CatalogFrozenError,
  DuplicateGrammarError,
  InvalidCalendarDateError,
  InvalidOffsetError,
  InvalidReferenceTimeError,
  LogstampError,
} from "./errors.js";

// ============================================================================
// Grammars and Catalog
// ============================================================================

export {
  createCommonLogGrammar,
  createCtimeGrammar,
  createEngineBracketGrammar,
  createIso8601Grammar,
  createIsoLocalGrammar,
  createIsoSpacedOffsetGrammar,
  createMonthDayYearGrammar,
  createRfc5424Grammar,
  createSyslogGrammar,
  createTimeOfDayGrammar,
} from "./grammars/index.js";
export {
  createCatalog,
  createDefaultCatalog,
  GrammarCatalog,
  getDefaultCatalog,
} from "./catalog.js";

// ============================================================================
// Matching and Normalization
// ============================================================================

export { matchAllGrammars, matchLine } from "./matcher.js";
export type { ReferenceTime } from "./normalizer.js";
export { inferYear, resolve, YEAR_ROLLBACK_TOLERANCE_MS } from "./normalizer.js";
export type { Clock, LineParserOptions } from "./line-parser.js";
export {
  createLineParser,
  getDefaultFallbackOffset,
  LineParser,
  setDefaultFallbackOffset,
} from "./line-parser.js";

// ============================================================================
// Offsets and Output
// ============================================================================

export {
  assertUtcOffset,
  formatUtcOffset,
  isValidUtcOffset,
  MAX_OFFSET_MINUTES,
  parseUtcOffset,
  tryParseUtcOffset,
} from "./offset.js";
export type {
  CompactOptions,
  SerializedRecord,
  SerializeOptions,
} from "./serialize.js";
export {
  formatRecordCompact,
  formatRecordsCompact,
  formatTimestamp,
  serializeRecord,
  serializeRecordsNDJSON,
  toDate,
  toSerializedRecord,
} from "./serialize.js";
export { stripAnsi } from "./utils.js";

// ============================================================================
// Convenience API for Simple Usage
// ============================================================================

import { createLineParser, type LineParser } from "./line-parser.js";
import type { ReferenceTime } from "./normalizer.js";
import type { LogRecord, UtcOffset } from "./types.js";

/**
 * Singleton parser with the default catalog, Date.now, and the process
 * default fallback offset. Created lazily on first use.
 */
let defaultParser: LineParser | undefined;

const getDefaultParser = (): LineParser => {
  if (!defaultParser) {
    defaultParser = createLineParser();
  }
  return defaultParser;
};

/**
 * Split a line using the current time and the default fallback offset.
 *
 * @example
 * ```typescript
 * import { parse, setDefaultFallbackOffset } from "@logstamp/parser";
 *
 * setDefaultFallbackOffset(120);
 * const record = parse("Jun  1 12:00:00 host app[123]: boot ok");
 * record.message; // "host app[123]: boot ok"
 * ```
 */
export const parse = (line: string): LogRecord => getDefaultParser().parse(line);

/**
 * Split a line with an explicit reference time and fallback offset.
 * Deterministic: the result depends only on the arguments.
 *
 * @example
 * ```typescript
 * import { formatTimestamp, parseWith } from "@logstamp/parser";
 *
 * const record = parseWith(
 *   "Jun  1 12:00:00 host app[123]: boot ok",
 *   new Date("2024-06-02T00:00:00Z"),
 *   120
 * );
 * record.timestamp && formatTimestamp(record.timestamp); // "2024-06-01T12:00:00+02:00"
 * ```
 */
export const parseWith = (
  line: string,
  referenceNow: ReferenceTime,
  fallbackOffset: UtcOffset
): LogRecord => getDefaultParser().parseWith(line, referenceNow, fallbackOffset);
