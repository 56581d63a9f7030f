import type { GrammarCatalog, GrammarID, UtcOffset } from "@logstamp/parser";
import type { OutputFormat } from "../lib/config.js";
import type { DebugLogger } from "../utils/debug-logger.js";

/**
 * Configuration for processing a stream of log lines.
 */
export interface ProcessorConfig {
  /**
   * Fallback offset for timestamps that carry none.
   */
  readonly fallbackOffset: UtcOffset;

  /**
   * Output shape: NDJSON records or "<timestamp>\t<message>" lines.
   */
  readonly format: OutputFormat;

  /**
   * Drop lines no grammar recognised instead of emitting them untimestamped.
   */
  readonly skipUnmatched?: boolean;

  /**
   * Remove ANSI escape sequences from messages when writing output.
   * Parsed records are never altered.
   */
  readonly stripAnsi?: boolean;

  /**
   * Reference clock in epoch milliseconds (default: Date.now).
   * A fixed clock makes output reproducible.
   */
  readonly clock?: () => number;

  /**
   * Catalog to match against (default: the built-in catalog).
   */
  readonly catalog?: GrammarCatalog;

  /**
   * Optional debug logger for troubleshooting
   */
  readonly debugLogger?: DebugLogger;
}

/**
 * Counts gathered while processing a stream.
 */
export interface ProcessStats {
  /** Input lines read */
  lines: number;
  /** Lines that produced a timestamp */
  timestamped: number;
  /** Lines no grammar recognised */
  unmatched: number;
  /** Lines whose timestamp resolved to an impossible date */
  failed: number;
  /** Timestamped lines per grammar, in catalog order */
  readonly byGrammar: Map<GrammarID, number>;
}
