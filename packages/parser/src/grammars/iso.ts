/**
 * ISO-8601 family grammars.
 *
 * Four shapes share the same date/time core and differ in how the zone is
 * written, which is what makes their order matter:
 *   rfc5424            <34>1 2003-10-11T22:14:15.003Z host ...
 *   iso8601            2024-01-15T10:30:45.1234567Z msg
 *   iso-spaced-offset  2015-05-13 17:39:16 +0200: msg
 *   iso-local          2024-01-15 10:30:45,123 msg   (no zone)
 * iso-local is a structural prefix of the other two, so it must rank below them.
 */

import { PatternGrammar } from "../grammar-types.js";

// ============================================================================
// RFC 5424
// ============================================================================

/**
 * RFC 5424 syslog header: <PRI>VERSION SP TIMESTAMP SP.
 * The PRI and VERSION fields are consumed with the timestamp.
 * The NILVALUE timestamp ("-") is not a match.
 */
class Rfc5424Grammar extends PatternGrammar {
  readonly id = "rfc5424";
  readonly priority = 92;
  readonly description = "RFC 5424 syslog header with ISO timestamp";
  readonly example = "<34>1 2003-10-11T22:14:15.003Z";

  protected readonly pattern =
    /^<\d{1,3}>\d{1,2} (?<year>\d{4})-(?<month>\d{2})-(?<day>\d{2})T(?<hour>\d{2}):(?<minute>\d{2}):(?<second>\d{2})(?:\.(?<fraction>\d+))?(?<offset>Z|[+-]\d{2}:\d{2})(?<sep>[\t ]|$)/;
}

// ============================================================================
// ISO 8601 with attached zone
// ============================================================================

/**
 * ISO 8601 / RFC 3339 with an explicit zone designator attached to the time.
 * Optionally bracketed. Date/time separator may be "T" or a space.
 */
class Iso8601Grammar extends PatternGrammar {
  readonly id = "iso8601";
  readonly priority = 90;
  readonly description = "ISO 8601 date-time with Z or numeric offset";
  readonly example = "2024-01-15T10:30:45.1234567Z";

  protected readonly pattern =
    /^(?<open>\[)?(?<year>\d{4})-(?<month>\d{2})-(?<day>\d{2})[Tt ](?<hour>\d{2}):(?<minute>\d{2}):(?<second>\d{2})(?:[.,](?<fraction>\d+))?(?<offset>[Zz]|[+-]\d{2}(?::?\d{2})?)(?<close>\])?(?<sep>[\t ]|$)/;
}

// ============================================================================
// ISO date-time, space, offset
// ============================================================================

/**
 * Date-time followed by a space and a numeric offset or UTC marker,
 * optionally followed by a colon ("+0200:").
 */
class IsoSpacedOffsetGrammar extends PatternGrammar {
  readonly id = "iso-spaced-offset";
  readonly priority = 85;
  readonly description = "ISO date-time followed by a spaced offset";
  readonly example = "2015-05-13 17:39:16 +0200:";

  protected readonly pattern =
    /^(?<open>\[)?(?<year>\d{4})-(?<month>\d{2})-(?<day>\d{2})[Tt ](?<hour>\d{2}):(?<minute>\d{2}):(?<second>\d{2})(?:[.,](?<fraction>\d+))? (?<offset>[+-]\d{2}:?\d{2}|UTC|GMT|Z):?(?<close>\])?(?<sep>[\t ]|$)/;
}

// ============================================================================
// ISO date-time without zone
// ============================================================================

/**
 * Zoneless date-time as written by most application loggers
 * ("2024-01-15 10:30:45,123", "2009/11/10 23:00:00").
 * The fallback offset applies.
 */
class IsoLocalGrammar extends PatternGrammar {
  readonly id = "iso-local";
  readonly priority = 60;
  readonly description = "Zoneless ISO-style date-time";
  readonly example = "2024-01-15 10:30:45,123";

  protected readonly pattern =
    /^(?<open>\[)?(?<year>\d{4})(?<dateSep>[-/])(?<month>\d{2})\k<dateSep>(?<day>\d{2})[Tt ](?<hour>\d{2}):(?<minute>\d{2}):(?<second>\d{2})(?:[.,](?<fraction>\d+))?(?<close>\])?(?<sep>[\t ]|$)/;
}

// ============================================================================
// Factories
// ============================================================================

export const createRfc5424Grammar = (): PatternGrammar => new Rfc5424Grammar();

export const createIso8601Grammar = (): PatternGrammar => new Iso8601Grammar();

export const createIsoSpacedOffsetGrammar = (): PatternGrammar =>
  new IsoSpacedOffsetGrammar();

export const createIsoLocalGrammar = (): PatternGrammar =>
  new IsoLocalGrammar();
