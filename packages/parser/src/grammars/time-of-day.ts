/**
 * Bare time of day ("22:07:10 server | listening").
 * Last-resort grammar: the date comes from the reference time.
 */

import { PatternGrammar } from "../grammar-types.js";

class TimeOfDayGrammar extends PatternGrammar {
  readonly id = "time-of-day";
  readonly priority = 10;
  readonly description = "Time of day only (date taken from reference time)";
  readonly example = "22:07:10";

  protected readonly pattern =
    /^(?<open>\[)?(?<hour>\d{2}):(?<minute>\d{2}):(?<second>\d{2})(?:[.,](?<fraction>\d+))?(?<close>\])?(?<sep>[\t ]|$)/;
}

export const createTimeOfDayGrammar = (): PatternGrammar =>
  new TimeOfDayGrammar();
