/**
 * Named-month grammars: BSD syslog and the C library's ctime() layouts.
 *
 *   ctime           Tue Nov 21 00:30:05 2017 msg
 *   month-day-year  Jan 03, 2016 22:29:55 msg
 *   syslog          Jun  1 12:00:00 msg
 *
 * syslog has no year, so it also matches the start of every ctime line
 * ("Tue Nov 21 00:30:05" followed by " 2017 msg"). ctime must rank above it.
 */

import { PatternGrammar } from "../grammar-types.js";

// ============================================================================
// ctime
// ============================================================================

/**
 * asctime()/ctime() layout with the year after the time.
 * Also covers Apache error logs ("[Sun Feb 25 06:11:12.043123448 2018]").
 */
class CtimeGrammar extends PatternGrammar {
  readonly id = "ctime";
  readonly priority = 80;
  readonly description = "ctime layout with trailing year";
  readonly example = "Tue Nov 21 00:30:05 2017";

  protected readonly pattern =
    /^(?<open>\[)?(?:(?:Mon|Tue|Wed|Thu|Fri|Sat|Sun) )?(?<mon>Jan|Feb|Mar|Apr|May|Jun|Jul|Aug|Sep|Oct|Nov|Dec) {1,2}(?<day>\d{1,2}) (?<hour>\d{2}):(?<minute>\d{2}):(?<second>\d{2})(?:\.(?<fraction>\d+))? (?<year>\d{4})(?<close>\])?(?<sep>[\t ]|$)/;
}

// ============================================================================
// Month day, year
// ============================================================================

/**
 * "Mon DD, YYYY HH:MM:SS" as written by Java and several macOS services.
 * The comma after the day is optional.
 */
class MonthDayYearGrammar extends PatternGrammar {
  readonly id = "month-day-year";
  readonly priority = 75;
  readonly description = "Month name, day, year, then time";
  readonly example = "Jan 03, 2016 22:29:55";

  protected readonly pattern =
    /^(?<open>\[)?(?:(?:Mon|Tue|Wed|Thu|Fri|Sat|Sun) )?(?<mon>Jan|Feb|Mar|Apr|May|Jun|Jul|Aug|Sep|Oct|Nov|Dec) {1,2}(?<day>\d{1,2}),? (?<year>\d{4}) (?<hour>\d{2}):(?<minute>\d{2}):(?<second>\d{2})(?:\.(?<fraction>\d+))?(?<close>\])?(?<sep>[\t ]|$)/;
}

// ============================================================================
// BSD syslog
// ============================================================================

/**
 * RFC 3164 style "Mon DD HH:MM:SS" with a space-padded day.
 * Accepts an optional <PRI> header, brackets, leading weekday and fraction.
 * No year and no zone.
 */
class SyslogGrammar extends PatternGrammar {
  readonly id = "syslog";
  readonly priority = 70;
  readonly description = "BSD syslog timestamp (no year, no zone)";
  readonly example = "Jun  1 12:00:00";

  protected readonly pattern =
    /^(?:<\d{1,3}>)?(?<open>\[)?(?:(?:Mon|Tue|Wed|Thu|Fri|Sat|Sun) )?(?<mon>Jan|Feb|Mar|Apr|May|Jun|Jul|Aug|Sep|Oct|Nov|Dec) {1,2}(?<day>\d{1,2}) (?<hour>\d{2}):(?<minute>\d{2}):(?<second>\d{2})(?:\.(?<fraction>\d+))?(?<close>\])?(?<sep>[\t ]|$)/;
}

// ============================================================================
// Factories
// ============================================================================

export const createCtimeGrammar = (): PatternGrammar => new CtimeGrammar();

export const createMonthDayYearGrammar = (): PatternGrammar =>
  new MonthDayYearGrammar();

export const createSyslogGrammar = (): PatternGrammar => new SyslogGrammar();
