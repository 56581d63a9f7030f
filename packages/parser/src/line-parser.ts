/**
 * Line parser: matcher + normalizer, producing a LogRecord per line.
 */

import type { GrammarCatalog } from "./catalog.js";
import { getDefaultCatalog } from "./catalog.js";
import { consumedLength } from "./grammar-types.js";
import { matchLine } from "./matcher.js";
import { type ReferenceTime, resolve } from "./normalizer.js";
import { assertUtcOffset } from "./offset.js";
import type { LogRecord, UtcOffset } from "./types.js";
import { createUntimestampedRecord } from "./types.js";

// ============================================================================
// Default Fallback Offset
// ============================================================================

/**
 * Caller-configured default fallback offset for parse(). Starts at UTC.
 * The core never derives it from the host zone.
 */
let defaultFallbackOffset: UtcOffset = 0;

/**
 * Set the fallback offset used when none is given explicitly.
 * Throws InvalidOffsetError for values outside ±24h.
 */
export const setDefaultFallbackOffset = (offset: UtcOffset): void => {
  defaultFallbackOffset = assertUtcOffset(offset);
};

export const getDefaultFallbackOffset = (): UtcOffset => defaultFallbackOffset;

// ============================================================================
// Line Parser
// ============================================================================

/**
 * Clock returning the current time in epoch milliseconds.
 */
export type Clock = () => number;

export interface LineParserOptions {
  /** Catalog to match against (default: the built-in catalog) */
  readonly catalog?: GrammarCatalog;
  /** Fallback offset (default: the process default at call time) */
  readonly fallbackOffset?: UtcOffset;
  /** Reference clock for parse() (default: Date.now) */
  readonly clock?: Clock;
}

/**
 * LineParser splits lines into timestamp and message using fixed
 * collaborators. It holds no per-line state.
 */
export class LineParser {
  private readonly catalog: GrammarCatalog;
  private readonly fallbackOffset: UtcOffset | undefined;
  private readonly clock: Clock;

  constructor(options: LineParserOptions = {}) {
    this.catalog = options.catalog ?? getDefaultCatalog();
    this.fallbackOffset =
      options.fallbackOffset === undefined
        ? undefined
        : assertUtcOffset(options.fallbackOffset);
    this.clock = options.clock ?? Date.now;
  }

  /**
   * Parse using the configured clock and fallback offset.
   */
  parse(line: string): LogRecord {
    return this.parseWith(
      line,
      this.clock(),
      this.fallbackOffset ?? defaultFallbackOffset
    );
  }

  /**
   * Parse with an explicit reference time and fallback offset.
   * Throws InvalidCalendarDateError when a matched timestamp resolves to an
   * impossible date.
   */
  parseWith(
    line: string,
    referenceNow: ReferenceTime,
    fallbackOffset: UtcOffset
  ): LogRecord {
    const match = matchLine(line, this.catalog);
    if (!match) {
      return createUntimestampedRecord(line);
    }

    return {
      timestamp: resolve(match.raw, referenceNow, fallbackOffset),
      message: line.slice(consumedLength(match)),
      grammar: match.grammar.id,
      prefix: match.prefix,
      separator: match.separator,
    };
  }
}

/**
 * Create a line parser bound to explicit collaborators.
 */
export const createLineParser = (options: LineParserOptions = {}): LineParser =>
  new LineParser(options);
