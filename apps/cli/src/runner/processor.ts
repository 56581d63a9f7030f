import { once } from "node:events";
import { createInterface } from "node:readline";
import type { Readable, Writable } from "node:stream";
import {
  createLineParser,
  createUntimestampedRecord,
  formatRecordCompact,
  type GrammarID,
  getDefaultCatalog,
  type LineParser,
  type LogRecord,
  serializeRecord,
} from "@logstamp/parser";
import type { OutputFormat } from "../lib/config.js";
import type { DebugLogger } from "../utils/debug-logger.js";
import { formatError } from "../utils/error.js";
import type { ProcessorConfig, ProcessStats } from "./types.js";

const PHASE = "Parse";

/**
 * Result of a single line: the record to emit, or null when it is skipped.
 */
interface LineOutcome {
  readonly record: LogRecord | null;
  readonly failure?: string;
}

/**
 * Processes a stream of log lines into timestamped records.
 *
 * Responsibilities:
 * - Splits input into lines and strips a trailing carriage return
 * - Parses each line against the catalog
 * - Reports lines whose timestamp cannot be resolved and keeps going
 * - Writes one output line per emitted record
 */
export class RecordProcessor {
  private readonly parser: LineParser;
  private readonly format: OutputFormat;
  private readonly skipUnmatched: boolean;
  private readonly stripAnsi: boolean;
  private readonly grammarIDs: readonly GrammarID[];
  private readonly debugLogger?: DebugLogger;

  constructor(config: ProcessorConfig) {
    const catalog = config.catalog ?? getDefaultCatalog();
    this.parser = createLineParser({
      catalog,
      fallbackOffset: config.fallbackOffset,
      clock: config.clock,
    });
    this.format = config.format;
    this.skipUnmatched = config.skipUnmatched ?? false;
    this.stripAnsi = config.stripAnsi ?? false;
    this.grammarIDs = catalog.grammarIDs();
    this.debugLogger = config.debugLogger;
  }

  /**
   * Reads every line of input and writes the records to output.
   * Failed lines are reported on stderr; they never abort the stream.
   */
  async process(input: Readable, output: Writable): Promise<ProcessStats> {
    this.debugLogger?.startPhase(PHASE);

    const stats: ProcessStats = {
      lines: 0,
      timestamped: 0,
      unmatched: 0,
      failed: 0,
      byGrammar: new Map(this.grammarIDs.map((id) => [id, 0])),
    };

    const lines = createInterface({
      input,
      crlfDelay: Number.POSITIVE_INFINITY,
    });

    for await (const line of lines) {
      stats.lines += 1;
      const outcome = this.processLine(line, stats.lines);

      if (outcome.failure !== undefined) {
        stats.failed += 1;
        console.error(`warning: ${outcome.failure}`);
        this.debugLogger?.logPhase(PHASE, outcome.failure);
      }

      const record = outcome.record;
      if (record?.grammar) {
        stats.timestamped += 1;
        stats.byGrammar.set(
          record.grammar,
          (stats.byGrammar.get(record.grammar) ?? 0) + 1
        );
      } else if (outcome.failure === undefined) {
        stats.unmatched += 1;
      }

      if (record) {
        await this.write(output, this.formatRecord(record));
      }
    }

    this.debugLogger?.logPhase(
      PHASE,
      `Read ${stats.lines} line(s), ${stats.timestamped} timestamped`
    );
    this.debugLogger?.endPhase(PHASE);
    return stats;
  }

  /**
   * Parses one line. lineNumber is 1-based and only used in messages.
   */
  processLine(line: string, lineNumber: number): LineOutcome {
    const text = line.endsWith("\r") ? line.slice(0, -1) : line;

    try {
      const record = this.parser.parse(text);
      if (!record.timestamp && this.skipUnmatched) {
        return { record: null };
      }
      return { record };
    } catch (error) {
      return {
        record: createUntimestampedRecord(text),
        failure: `line ${lineNumber}: ${formatError(error)}`,
      };
    }
  }

  private formatRecord(record: LogRecord): string {
    const opts = { stripAnsi: this.stripAnsi };
    return this.format === "json"
      ? serializeRecord(record, opts)
      : formatRecordCompact(record, opts);
  }

  private async write(output: Writable, text: string): Promise<void> {
    if (!output.write(`${text}\n`)) {
      await once(output, "drain");
    }
  }
}
