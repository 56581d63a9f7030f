/**
 * Game engine log prefix:
 * [2018.10.29-16.56.37:542][  0]LogInit: Selected Device Profile
 *
 * The timestamp is UTC, the sub-second digits follow the colon, and the bracketed
 * frame counter is consumed with it. The message follows without a separator.
 */

import { PatternGrammar } from "../grammar-types.js";

class EngineBracketGrammar extends PatternGrammar {
  readonly id = "engine-bracket";
  readonly priority = 100;
  readonly description = "Engine log prefix with frame counter (UTC)";
  readonly example = "[2018.10.29-16.56.37:542][  0]";

  protected readonly pattern =
    /^(?<open>\[)(?<year>\d{4})\.(?<month>\d{2})\.(?<day>\d{2})-(?<hour>\d{2})\.(?<minute>\d{2})\.(?<second>\d{2}):(?<fraction>\d+)(?<close>\])\[ *\d+\]/;

  protected override readonly impliedOffset = 0;
}

export const createEngineBracketGrammar = (): PatternGrammar =>
  new EngineBracketGrammar();
