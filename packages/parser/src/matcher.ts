/**
 * Line matcher: tries catalog grammars in order and returns the first match.
 * Pure: the same line and catalog always give the same result.
 */

import type { GrammarCatalog } from "./catalog.js";
import { getDefaultCatalog } from "./catalog.js";
import type { GrammarMatch } from "./grammar-types.js";

/**
 * Find the timestamp prefix of a line.
 * Returns null when no grammar recognises the line; that is an expected
 * outcome, not an error.
 */
export const matchLine = (
  line: string,
  catalog: GrammarCatalog = getDefaultCatalog()
): GrammarMatch | null => {
  for (const grammar of catalog.allGrammars()) {
    const match = grammar.tryParse(line);
    if (match) {
      return match;
    }
  }
  return null;
};

/**
 * Every grammar that recognises the line, in try order.
 * Diagnostic helper for checking precedence; matchLine returns the first.
 */
export const matchAllGrammars = (
  line: string,
  catalog: GrammarCatalog = getDefaultCatalog()
): GrammarMatch[] => {
  const matches: GrammarMatch[] = [];
  for (const grammar of catalog.allGrammars()) {
    const match = grammar.tryParse(line);
    if (match) {
      matches.push(match);
    }
  }
  return matches;
};
