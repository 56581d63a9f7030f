import { getDefaultCatalog } from "@logstamp/parser";
import { describe, expect, it } from "vitest";
import { formatGrammarRow } from "./formats.js";

describe("formatGrammarRow", () => {
  it("aligns rank, id and priority", () => {
    const catalog = getDefaultCatalog();
    const syslog = catalog.get("syslog");
    expect(syslog).toBeDefined();
    if (!syslog) {
      return;
    }

    const row = formatGrammarRow(syslog, catalog.rankOf("syslog"), 17, {
      isTTY: false,
    });

    expect(row).toBe(
      " 8. syslog             70  BSD syslog timestamp (no year, no zone)\n    Jun  1 12:00:00"
    );
  });

  it("colors the example on a terminal", () => {
    const catalog = getDefaultCatalog();
    const grammar = catalog.allGrammars()[0];
    expect(grammar).toBeDefined();
    if (!grammar) {
      return;
    }

    const row = formatGrammarRow(grammar, 0, 14, { isTTY: true });
    expect(row.endsWith(`\x1b[38;2;88;88;88m${grammar.example}\x1b[0m`)).toBe(true);
  });
});
