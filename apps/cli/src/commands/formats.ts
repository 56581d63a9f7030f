import { getDefaultCatalog, type TimestampGrammar } from "@logstamp/parser";
import { defineCommand } from "citty";
import { printHeader } from "../tui/header.js";
import { colors, paint } from "../tui/styles.js";

/**
 * One row per grammar: rank, id, priority, description and example.
 */
export const formatGrammarRow = (
  grammar: TimestampGrammar,
  rank: number,
  idWidth: number,
  stream: { isTTY?: boolean } = process.stdout
): string =>
  `${String(rank + 1).padStart(2)}. ${grammar.id.padEnd(idWidth)} ${String(grammar.priority).padStart(3)}  ${grammar.description}\n    ${paint(grammar.example, colors.muted, stream)}`;

export const formatsCommand = defineCommand({
  meta: {
    name: "formats",
    description: "List recognised timestamp formats in the order they are tried",
  },
  run: () => {
    const grammars = getDefaultCatalog().allGrammars();
    const idWidth = Math.max(...grammars.map((g) => g.id.length));

    printHeader("formats");
    for (const [rank, grammar] of grammars.entries()) {
      console.log(formatGrammarRow(grammar, rank, idWidth));
    }
    console.log();
  },
});
