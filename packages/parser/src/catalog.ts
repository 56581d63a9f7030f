/**
 * Grammar catalog: the ordered, read-only set of grammars tried per line.
 *
 * Order is a hand-curated priority, never inferred from input. Grammars are
 * sorted by priority (highest first); equal priorities keep registration
 * order. Once frozen a catalog never changes and can be shared freely.
 */

import { CatalogFrozenError, DuplicateGrammarError } from "./errors.js";
import type { TimestampGrammar } from "./grammar-types.js";
import {
  createCommonLogGrammar,
  createCtimeGrammar,
  createEngineBracketGrammar,
  createIso8601Grammar,
  createIsoLocalGrammar,
  createIsoSpacedOffsetGrammar,
  createMonthDayYearGrammar,
  createRfc5424Grammar,
  createSyslogGrammar,
  createTimeOfDayGrammar,
} from "./grammars/index.js";
import type { GrammarID } from "./types.js";

// ============================================================================
// Grammar Catalog
// ============================================================================

/**
 * GrammarCatalog holds grammars in priority order.
 */
export class GrammarCatalog {
  private readonly grammars: TimestampGrammar[] = [];
  private readonly byID: Map<GrammarID, TimestampGrammar> = new Map();
  private frozen = false;

  /**
   * Register a grammar. Grammars are kept sorted by priority (highest first).
   * Throws CatalogFrozenError after freeze() and DuplicateGrammarError on a
   * repeated ID.
   */
  register(grammar: TimestampGrammar): this {
    if (this.frozen) {
      throw new CatalogFrozenError(grammar.id);
    }
    if (this.byID.has(grammar.id)) {
      throw new DuplicateGrammarError(grammar.id);
    }

    this.grammars.push(grammar);
    this.byID.set(grammar.id, grammar);

    // Array.prototype.sort is stable, so ties keep registration order
    this.grammars.sort((a, b) => b.priority - a.priority);
    return this;
  }

  /**
   * Make the catalog read-only. Idempotent.
   */
  freeze(): this {
    this.frozen = true;
    Object.freeze(this.grammars);
    return this;
  }

  isFrozen(): boolean {
    return this.frozen;
  }

  /**
   * Get a grammar by ID, or undefined if not found.
   */
  get(id: GrammarID): TimestampGrammar | undefined {
    return this.byID.get(id);
  }

  /**
   * Position of a grammar in try order (0 = tried first), or -1.
   */
  rankOf(id: GrammarID): number {
    return this.grammars.findIndex((g) => g.id === id);
  }

  /**
   * All grammars in try order.
   * Returns the internal array directly (readonly prevents mutation).
   */
  allGrammars(): readonly TimestampGrammar[] {
    return this.grammars;
  }

  /**
   * Registered grammar IDs in try order.
   */
  grammarIDs(): GrammarID[] {
    return this.grammars.map((g) => g.id);
  }

  get size(): number {
    return this.grammars.length;
  }
}

// ============================================================================
// Factories
// ============================================================================

/**
 * Create a new empty, unfrozen catalog.
 */
export const createCatalog = (): GrammarCatalog => new GrammarCatalog();

/**
 * Create a frozen catalog with every built-in grammar.
 *
 * Priority order (highest to lowest):
 * - Explicit zone, unambiguous shape (100-85): engine-bracket, common-log,
 *   rfc5424, iso8601, iso-spaced-offset
 * - Named month (80-70): ctime, month-day-year, syslog
 * - Zoneless ISO (60): iso-local
 * - Time of day only (10): time-of-day
 */
export const createDefaultCatalog = (): GrammarCatalog =>
  createCatalog()
    .register(createEngineBracketGrammar())
    .register(createCommonLogGrammar())
    .register(createRfc5424Grammar())
    .register(createIso8601Grammar())
    .register(createIsoSpacedOffsetGrammar())
    .register(createCtimeGrammar())
    .register(createMonthDayYearGrammar())
    .register(createSyslogGrammar())
    .register(createIsoLocalGrammar())
    .register(createTimeOfDayGrammar())
    .freeze();

/**
 * Process-wide default catalog. Created lazily on first use.
 */
let defaultCatalog: GrammarCatalog | undefined;

/**
 * Get the default catalog (creates it on first call).
 */
export const getDefaultCatalog = (): GrammarCatalog => {
  if (!defaultCatalog) {
    defaultCatalog = createDefaultCatalog();
  }
  return defaultCatalog;
};
