/**
 * Grammar interface types for timestamp recognition.
 *
 * A grammar recognises one textual timestamp convention at the start of a
 * line. Failure is silent: tryParse returns null and has no side effects.
 */

import { tryParseUtcOffset } from "./offset.js";
import type { GrammarID, RawTimestamp, UtcOffset } from "./types.js";
import {
  isValidDate,
  isValidTimeOfDay,
  monthFromAbbreviation,
  parseFraction,
  safeParseInt,
} from "./utils.js";

// ============================================================================
// Match Result
// ============================================================================

/**
 * A successful grammar attempt.
 * The message starts at prefix.length + separator.length.
 */
export interface GrammarMatch {
  readonly grammar: TimestampGrammar;
  readonly raw: RawTimestamp;
  /** Exact timestamp text consumed from the start of the line */
  readonly prefix: string;
  /** Exact separator text the grammar defines ("" when none) */
  readonly separator: string;
}

/**
 * Number of characters a match consumed, separator included.
 */
export const consumedLength = (match: GrammarMatch): number =>
  match.prefix.length + match.separator.length;

// ============================================================================
// Grammar Interface
// ============================================================================

/**
 * TimestampGrammar describes one timestamp convention.
 * Grammars are immutable once constructed.
 */
export interface TimestampGrammar {
  /** Unique identifier (e.g., "syslog", "iso8601") */
  readonly id: GrammarID;

  /**
   * Priority in the catalog. Higher values are tried first.
   * Recommended ranges:
   *   90-100: Fully qualified, explicit zone (can't be confused with anything)
   *   70-89:  Named-month conventions
   *   50-69:  Zoneless numeric dates
   *   0-49:   Fallbacks (time of day only)
   */
  readonly priority: number;

  /** One-line human description */
  readonly description: string;

  /** A representative line prefix recognised by this grammar */
  readonly example: string;

  /**
   * Recognise a timestamp at the start of the line.
   * Returns null when the line does not follow this convention or the
   * captured fields are out of range.
   */
  tryParse(line: string): GrammarMatch | null;
}

// ============================================================================
// Pattern-Based Grammar
// ============================================================================

/**
 * Named capture groups understood by PatternGrammar.
 *
 * - year, month (numeric), mon (English abbreviation), day
 * - hour, minute, second, fraction (digits after "." or ",")
 * - offset (any text accepted by tryParseUtcOffset)
 * - open / close: optional "[" and "]"; must appear together
 * - sep: the separator between timestamp and message
 */
type TimestampGroups = Partial<Record<string, string>>;

/**
 * Base class for grammars defined by a single anchored regex with named
 * groups. Subclasses supply the pattern; field conversion and range checks
 * are shared.
 */
export abstract class PatternGrammar implements TimestampGrammar {
  abstract readonly id: GrammarID;
  abstract readonly priority: number;
  abstract readonly description: string;
  abstract readonly example: string;

  /** Anchored pattern; must not carry the g or y flag */
  protected abstract readonly pattern: RegExp;

  /**
   * Offset implied by the convention itself when the text carries none.
   * Undefined means the fallback offset applies.
   */
  protected readonly impliedOffset: UtcOffset | undefined = undefined;

  tryParse(line: string): GrammarMatch | null {
    const match = this.pattern.exec(line);
    if (!match) {
      return null;
    }

    const groups: TimestampGroups = match.groups ?? {};
    if ((groups.open === undefined) !== (groups.close === undefined)) {
      return null;
    }

    const raw = this.toRawTimestamp(groups);
    if (!raw) {
      return null;
    }

    const separator = groups.sep ?? "";
    const consumed = match[0] ?? "";
    const prefix = consumed.slice(0, consumed.length - separator.length);
    return { grammar: this, raw, prefix, separator };
  }

  /**
   * Convert captured groups into a RawTimestamp, or null when any field is
   * out of range.
   */
  protected toRawTimestamp(groups: TimestampGroups): RawTimestamp | null {
    const hour = safeParseInt(groups.hour);
    const minute = safeParseInt(groups.minute);
    const second = safeParseInt(groups.second);
    if (hour === undefined || minute === undefined || second === undefined) {
      return null;
    }
    if (!isValidTimeOfDay(hour, minute, second)) {
      return null;
    }

    const year = safeParseInt(groups.year);
    const month =
      groups.mon === undefined
        ? safeParseInt(groups.month)
        : monthFromAbbreviation(groups.mon);
    const day = safeParseInt(groups.day);

    if ((month === undefined) !== (day === undefined)) {
      return null;
    }
    if (
      month !== undefined &&
      day !== undefined &&
      !isValidDate(month, day, year)
    ) {
      return null;
    }

    let offsetMinutes = this.impliedOffset;
    if (groups.offset !== undefined) {
      offsetMinutes = tryParseUtcOffset(groups.offset);
      if (offsetMinutes === undefined) {
        return null;
      }
    }

    return {
      year,
      month,
      day,
      hour,
      minute,
      second,
      nanosecond: parseFraction(groups.fraction),
      offsetMinutes,
    };
  }
}
