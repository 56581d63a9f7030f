/**
 * Built-in timestamp grammars.
 *
 * Grammar priorities (higher = tried first):
 * - engine-bracket (100), common-log (95), rfc5424 (92), iso8601 (90)
 * - iso-spaced-offset (85)
 * - ctime (80), month-day-year (75), syslog (70)
 * - iso-local (60)
 * - time-of-day (10)
 */

export { createCommonLogGrammar } from "./common-log.js";
export { createEngineBracketGrammar } from "./engine.js";
export {
  createIso8601Grammar,
  createIsoLocalGrammar,
  createIsoSpacedOffsetGrammar,
  createRfc5424Grammar,
} from "./iso.js";
export {
  createCtimeGrammar,
  createMonthDayYearGrammar,
  createSyslogGrammar,
} from "./syslog.js";
export { createTimeOfDayGrammar } from "./time-of-day.js";
