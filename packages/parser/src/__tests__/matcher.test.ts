import { describe, expect, it } from "vitest";
import { createCatalog, getDefaultCatalog } from "../catalog.js";
import { consumedLength } from "../grammar-types.js";
import {
  createCtimeGrammar,
  createIso8601Grammar,
  createSyslogGrammar,
} from "../grammars/index.js";
import { matchAllGrammars, matchLine } from "../matcher.js";

const SAMPLES: Array<[string, string]> = [
  ["[2018.10.29-16.56.37:542][  0]LogInit: Display: Starting", "engine-bracket"],
  ['[10/Oct/2000:13:55:36 -0700] "GET / HTTP/1.0" 200 2326', "common-log"],
  ["<34>1 2003-10-11T22:14:15.003Z mymachine su - - failed", "rfc5424"],
  ["2024-01-15T10:30:45.1234567Z Starting job", "iso8601"],
  ["2015-05-13 17:39:16 +0200: Repaired 'Library/Printers'", "iso-spaced-offset"],
  ["Tue Nov 21 00:30:05 2017 More stuff here", "ctime"],
  ["Jan 03, 2016 22:29:55 [0x70000073b000] DEBUG - Responding", "month-day-year"],
  ["Jun  1 12:00:00 host app[123]: boot ok", "syslog"],
  ["2024-01-15 10:30:45,123 INFO worker started", "iso-local"],
  ["22:07:10 server  | listening", "time-of-day"],
];

describe("matchLine", () => {
  it.each(SAMPLES)("%s -> %s", (line, expected) => {
    expect(matchLine(line)?.grammar.id).toBe(expected);
  });

  it.each(SAMPLES)(
    "no grammar ranked above the winner matches %s",
    (line, expected) => {
      const catalog = getDefaultCatalog();
      const rank = catalog.rankOf(expected);
      for (const grammar of catalog.allGrammars().slice(0, rank)) {
        expect(grammar.tryParse(line)).toBeNull();
      }
    }
  );

  it.each(SAMPLES)("consumes a prefix of %s", (line) => {
    const match = matchLine(line);
    expect(match).not.toBeNull();
    if (match) {
      expect(line.startsWith(match.prefix + match.separator)).toBe(true);
      expect(consumedLength(match)).toBeLessThanOrEqual(line.length);
    }
  });

  it("returns null for lines without a leading timestamp", () => {
    expect(matchLine("no timestamp here at all")).toBeNull();
    expect(matchLine("")).toBeNull();
    expect(matchLine(" 2024-01-15T10:30:45Z leading space")).toBeNull();
  });

  it("returns the same match for the same line", () => {
    const line = "Jun  1 12:00:00 host app[123]: boot ok";
    expect(matchLine(line)).toEqual(matchLine(line));
  });

  it("uses a caller-supplied catalog", () => {
    const catalog = createCatalog().register(createIso8601Grammar()).freeze();
    expect(matchLine("Jun  1 12:00:00 host", catalog)).toBeNull();
    expect(matchLine("2024-01-15T10:30:45Z x", catalog)?.grammar.id).toBe(
      "iso8601"
    );
  });
});

describe("matchAllGrammars", () => {
  it("lists overlapping grammars in try order", () => {
    const matches = matchAllGrammars("Tue Nov 21 00:30:05 2017 More stuff here");

    expect(matches.map((m) => m.grammar.id)).toEqual(["ctime", "syslog"]);
    expect(matches.map((m) => m.prefix)).toEqual([
      "Tue Nov 21 00:30:05 2017",
      "Tue Nov 21 00:30:05",
    ]);
  });

  it("prefers the zoned ISO grammar over the zoneless one", () => {
    const matches = matchAllGrammars("2015-05-13 17:39:16 +0200: Repaired");
    expect(matches.map((m) => m.grammar.id)).toEqual([
      "iso-spaced-offset",
      "iso-local",
    ]);
  });

  it("shows what a catalog without ctime would lose", () => {
    const catalog = createCatalog()
      .register(createSyslogGrammar())
      .freeze();
    const line = "Tue Nov 21 00:30:05 2017 More stuff here";
    const match = matchLine(line, catalog);

    expect(match?.grammar.id).toBe("syslog");
    expect(match && line.slice(consumedLength(match))).toBe(
      "2017 More stuff here"
    );

    const full = createCatalog()
      .register(createSyslogGrammar())
      .register(createCtimeGrammar())
      .freeze();
    expect(matchLine(line, full)?.grammar.id).toBe("ctime");
  });
});
