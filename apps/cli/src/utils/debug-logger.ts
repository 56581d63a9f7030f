/**
 * Debug logger for per-run troubleshooting.
 * Writes to the file named by --debug-log.
 *
 * Features:
 * - Timestamped entries (UTC, from an injectable clock)
 * - Phase timings
 * - Per-line failures and a per-grammar match summary
 */

import { appendFileSync, writeFileSync } from "node:fs";
import { formatTimestamp } from "@logstamp/parser";
import type { ProcessStats } from "../runner/types.js";
import { formatError } from "./error.js";

const RULE = "=".repeat(80);

export interface DebugLoggerOptions {
  /** Epoch-milliseconds clock for entry timestamps (default: Date.now) */
  readonly clock?: () => number;
}

/**
 * Settings recorded at the top of a run.
 */
export interface DebugRunHeader {
  readonly input: string;
  readonly fallbackOffset: string;
  readonly format: string;
  readonly skipUnmatched: boolean;
  readonly referenceTime: string;
}

/**
 * Per-run debug logger. A log that cannot be written disables itself; it
 * never throws into the command.
 */
export class DebugLogger {
  private readonly logPath: string;
  private readonly clock: () => number;
  private closed = false;
  private phaseStartTimes = new Map<string, number>();

  constructor(logPath: string, options: DebugLoggerOptions = {}) {
    this.logPath = logPath;
    this.clock = options.clock ?? Date.now;
    this.initializeLogFile();
  }

  private initializeLogFile(): void {
    const header = `${RULE}\nlogstamp debug log\nStarted: ${this.formatTimestamp()}\n${RULE}\n\n`;
    try {
      writeFileSync(this.logPath, header, { mode: 0o600 });
    } catch (error) {
      console.error(
        `warning: debug log disabled, cannot write ${this.logPath}: ${formatError(error)}`
      );
      this.closed = true;
    }
  }

  private formatTimestamp(): string {
    const epochMillis = this.clock();
    return formatTimestamp({
      epochMillis,
      nanosecond: (epochMillis % 1000) * 1_000_000,
      offsetMinutes: 0,
    });
  }

  /**
   * Logs a message with timestamp.
   */
  log(message: string): void {
    if (this.closed) {
      return;
    }

    try {
      appendFileSync(this.logPath, `${this.formatTimestamp()} ${message}\n`);
    } catch (error) {
      console.error(
        `warning: debug log disabled, cannot append to ${this.logPath}: ${formatError(error)}`
      );
      this.closed = true;
    }
  }

  /**
   * Logs a phase-scoped message (e.g., "[Parse] line 3: ...").
   */
  logPhase(phase: string, message: string): void {
    this.log(`[${phase}] ${message}`);
  }

  /**
   * Logs an error with stack trace.
   */
  logError(error: unknown, context?: string): void {
    const prefix = context ? `[${context}] ` : "";

    if (error instanceof Error) {
      this.log(`${prefix}Error: ${error.message}`);
      if (error.stack) {
        this.log(`Stack trace:\n${error.stack}`);
      }
    } else {
      this.log(`${prefix}Error: ${String(error)}`);
    }
  }

  /**
   * Logs the effective settings at the start of a run.
   */
  logHeader(header: DebugRunHeader): void {
    this.log(RULE);
    this.log("Configuration:");
    this.log(`  Input: ${header.input}`);
    this.log(`  Fallback offset: ${header.fallbackOffset}`);
    this.log(`  Format: ${header.format}`);
    this.log(`  Skip unmatched: ${header.skipUnmatched}`);
    this.log(`  Reference time: ${header.referenceTime}`);
    this.log(RULE);
  }

  /**
   * Logs line counts and matches per grammar, in catalog order.
   */
  logSummary(stats: ProcessStats): void {
    this.log("Summary:");
    this.log(`  Lines: ${stats.lines}`);
    this.log(`  Timestamped: ${stats.timestamped}`);
    this.log(`  Unmatched: ${stats.unmatched}`);
    this.log(`  Failed: ${stats.failed}`);
    for (const [grammar, count] of stats.byGrammar) {
      this.log(`  ${grammar}: ${count}`);
    }
  }

  /**
   * Starts timing a phase.
   */
  startPhase(phase: string): void {
    this.phaseStartTimes.set(phase, this.clock());
    this.logPhase(phase, "Starting");
  }

  /**
   * Ends timing a phase and logs the duration.
   */
  endPhase(phase: string): void {
    const start = this.phaseStartTimes.get(phase);
    if (start !== undefined) {
      this.logPhase(phase, `Completed in ${this.clock() - start}ms`);
      this.phaseStartTimes.delete(phase);
    }
  }

  close(): void {
    if (this.closed) {
      return;
    }

    this.log("DebugLogger closed");
    this.closed = true;
  }

  /**
   * Gets the path to the log file.
   */
  get path(): string {
    return this.logPath;
  }
}
