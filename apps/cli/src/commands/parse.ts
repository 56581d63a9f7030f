import { createReadStream, existsSync, statSync } from "node:fs";
import type { Readable } from "node:stream";
import { formatUtcOffset } from "@logstamp/parser";
import { defineCommand } from "citty";
import { applyOverrides, loadConfig } from "../lib/config.js";
import { RecordProcessor } from "../runner/processor.js";
import { colors, paint } from "../tui/styles.js";
import { DebugLogger } from "../utils/debug-logger.js";
import { formatError } from "../utils/error.js";

/**
 * Parses --now into epoch milliseconds, or undefined when it is not a date.
 */
export const parseReferenceTime = (text: string): number | undefined => {
  const millis = Date.parse(text);
  return Number.isNaN(millis) ? undefined : millis;
};

const openInput = (file: string | undefined): Readable => {
  if (!file || file === "-") {
    return process.stdin;
  }
  if (!existsSync(file)) {
    throw new Error(`file not found: ${file}`);
  }
  if (statSync(file).isDirectory()) {
    throw new Error(`not a file: ${file}`);
  }
  return createReadStream(file, { encoding: "utf-8" });
};

export const parseCommand = defineCommand({
  meta: {
    name: "parse",
    description: "Split each line of a log into timestamp and message",
  },
  args: {
    file: {
      type: "positional",
      description: "Log file to read (stdin when omitted or -)",
      required: false,
    },
    offset: {
      type: "string",
      description: "Fallback UTC offset for timestamps without one (e.g. +02:00)",
    },
    format: {
      type: "string",
      description: "Output format: json (NDJSON) or text",
    },
    now: {
      type: "string",
      description: "Reference time for year and date inference (ISO 8601)",
    },
    "skip-unmatched": {
      type: "boolean",
      description: "Drop lines without a recognised timestamp",
      default: false,
    },
    "strip-ansi": {
      type: "boolean",
      description: "Remove ANSI color codes from messages in the output",
      default: false,
    },
    "debug-log": {
      type: "string",
      description: "Write a debug log to this file",
    },
  },
  run: async ({ args }) => {
    const file: string | undefined = args.file;
    const nowText: string | undefined = args.now;
    const debugLogPath: string | undefined = args["debug-log"];

    const resolved = applyOverrides(loadConfig(), {
      offset: args.offset,
      format: args.format,
      skipUnmatched: args["skip-unmatched"],
    });
    if (!resolved.ok) {
      console.error(`Error: ${resolved.error}`);
      process.exit(1);
    }
    const config = resolved.config;

    let clock: (() => number) | undefined;
    if (nowText !== undefined) {
      const referenceNow = parseReferenceTime(nowText);
      if (referenceNow === undefined) {
        console.error(`Error: invalid --now value: ${nowText}`);
        process.exit(1);
      }
      clock = () => referenceNow;
    }

    const debugLogger = debugLogPath ? new DebugLogger(debugLogPath) : undefined;
    debugLogger?.logHeader({
      input: file ?? "stdin",
      fallbackOffset: formatUtcOffset(config.fallbackOffset),
      format: config.format,
      skipUnmatched: config.skipUnmatched,
      referenceTime: nowText ?? "clock",
    });

    try {
      const processor = new RecordProcessor({
        fallbackOffset: config.fallbackOffset,
        format: config.format,
        skipUnmatched: config.skipUnmatched,
        stripAnsi: args["strip-ansi"],
        clock,
        debugLogger,
      });
      const stats = await processor.process(openInput(file), process.stdout);
      debugLogger?.logSummary(stats);

      if (stats.failed > 0) {
        console.error(
          paint(
            `${stats.failed} line(s) had an unresolvable timestamp`,
            colors.warn,
            process.stderr
          )
        );
        process.exitCode = 1;
      }
    } catch (error) {
      debugLogger?.logError(error, "parse");
      console.error(`Error: ${formatError(error)}`);
      process.exitCode = 1;
    } finally {
      debugLogger?.close();
    }
  },
});
