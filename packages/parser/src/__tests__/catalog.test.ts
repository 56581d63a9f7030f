/**
 * Tests for GrammarCatalog ordering and lifecycle.
 */

import { beforeEach, describe, expect, it } from "vitest";
import {
  createCatalog,
  createDefaultCatalog,
  GrammarCatalog,
  getDefaultCatalog,
} from "../catalog.js";
import { CatalogFrozenError, DuplicateGrammarError } from "../errors.js";
import type { GrammarMatch, TimestampGrammar } from "../grammar-types.js";

// ============================================================================
// Test Fixtures - Mock Grammars
// ============================================================================

class MockGrammar implements TimestampGrammar {
  readonly id: string;
  readonly priority: number;
  readonly description = "mock grammar";
  readonly example = "00:00:00";
  private readonly token: string;

  constructor(id: string, priority: number, token = id) {
    this.id = id;
    this.priority = priority;
    this.token = token;
  }

  tryParse(line: string): GrammarMatch | null {
    if (!line.startsWith(this.token)) {
      return null;
    }
    return {
      grammar: this,
      raw: { hour: 0, minute: 0, second: 0 },
      prefix: this.token,
      separator: "",
    };
  }
}

describe("GrammarCatalog", () => {
  let catalog: GrammarCatalog;

  beforeEach(() => {
    catalog = createCatalog();
  });

  describe("register", () => {
    it("sorts grammars by priority, highest first", () => {
      catalog
        .register(new MockGrammar("low", 10))
        .register(new MockGrammar("high", 90))
        .register(new MockGrammar("mid", 50));

      expect(catalog.grammarIDs()).toEqual(["high", "mid", "low"]);
    });

    it("keeps registration order for equal priorities", () => {
      catalog
        .register(new MockGrammar("first", 50))
        .register(new MockGrammar("second", 50))
        .register(new MockGrammar("third", 50));

      expect(catalog.grammarIDs()).toEqual(["first", "second", "third"]);
    });

    it("rejects a duplicate ID", () => {
      catalog.register(new MockGrammar("dup", 10));
      expect(() => catalog.register(new MockGrammar("dup", 20))).toThrow(
        DuplicateGrammarError
      );
      expect(catalog.size).toBe(1);
    });
  });

  describe("freeze", () => {
    it("rejects registration after freezing", () => {
      catalog.register(new MockGrammar("a", 10)).freeze();

      expect(catalog.isFrozen()).toBe(true);
      expect(() => catalog.register(new MockGrammar("b", 20))).toThrow(
        CatalogFrozenError
      );
      expect(() => catalog.register(new MockGrammar("b", 20))).toThrow(
        'cannot register grammar "b": catalog is frozen'
      );
      expect(catalog.grammarIDs()).toEqual(["a"]);
    });

    it("is idempotent", () => {
      catalog.freeze();
      expect(catalog.freeze().isFrozen()).toBe(true);
    });
  });

  describe("lookup", () => {
    beforeEach(() => {
      catalog
        .register(new MockGrammar("a", 30))
        .register(new MockGrammar("b", 20));
    });

    it("gets a grammar by ID", () => {
      expect(catalog.get("b")?.priority).toBe(20);
      expect(catalog.get("missing")).toBeUndefined();
    });

    it("reports try-order rank", () => {
      expect(catalog.rankOf("a")).toBe(0);
      expect(catalog.rankOf("b")).toBe(1);
      expect(catalog.rankOf("missing")).toBe(-1);
    });
  });
});

describe("default catalog", () => {
  it("orders the built-in grammars", () => {
    expect(createDefaultCatalog().grammarIDs()).toEqual([
      "engine-bracket",
      "common-log",
      "rfc5424",
      "iso8601",
      "iso-spaced-offset",
      "ctime",
      "month-day-year",
      "syslog",
      "iso-local",
      "time-of-day",
    ]);
  });

  it("is frozen and shared", () => {
    const catalog = getDefaultCatalog();
    expect(catalog.isFrozen()).toBe(true);
    expect(getDefaultCatalog()).toBe(catalog);
  });

  it("ranks ctime above syslog", () => {
    const catalog = getDefaultCatalog();
    expect(catalog.rankOf("ctime")).toBeLessThan(catalog.rankOf("syslog"));
  });
});
