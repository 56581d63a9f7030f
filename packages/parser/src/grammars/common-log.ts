/**
 * NCSA common log format timestamp, as used by Apache and nginx access logs:
 * [10/Oct/2000:13:55:36 -0700]
 */

import { PatternGrammar } from "../grammar-types.js";

class CommonLogGrammar extends PatternGrammar {
  readonly id = "common-log";
  readonly priority = 95;
  readonly description = "Common log format bracketed timestamp";
  readonly example = "[10/Oct/2000:13:55:36 -0700]";

  protected readonly pattern =
    /^(?<open>\[)(?<day>\d{2})\/(?<mon>Jan|Feb|Mar|Apr|May|Jun|Jul|Aug|Sep|Oct|Nov|Dec)\/(?<year>\d{4}):(?<hour>\d{2}):(?<minute>\d{2}):(?<second>\d{2}) (?<offset>[+-]\d{4})(?<close>\])(?<sep>[\t ]|$)/;
}

export const createCommonLogGrammar = (): PatternGrammar =>
  new CommonLogGrammar();
