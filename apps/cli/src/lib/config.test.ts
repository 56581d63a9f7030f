import { mkdirSync, rmSync, writeFileSync } from "node:fs";
import { homedir, tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import {
  applyOverrides,
  type Config,
  getConfigPath,
  getLogstampDir,
  loadGlobalConfigSafe,
  mergeConfig,
  parseBoolean,
  saveConfig,
  validateFallbackOffset,
  validateFormat,
} from "./config.js";

// ============================================================================
// Test Fixtures
// ============================================================================

let testDir: string;
let previousHome: string | undefined;
let consoleErrorSpy: ReturnType<typeof vi.spyOn>;

beforeEach(() => {
  testDir = join(
    tmpdir(),
    `logstamp-test-${Date.now()}-${Math.random().toString(36).slice(2)}`
  );
  mkdirSync(testDir, { recursive: true });
  previousHome = process.env.LOGSTAMP_HOME;
  process.env.LOGSTAMP_HOME = testDir;
  consoleErrorSpy = vi.spyOn(console, "error").mockImplementation(() => undefined);
});

afterEach(() => {
  if (previousHome === undefined) {
    delete process.env.LOGSTAMP_HOME;
  } else {
    process.env.LOGSTAMP_HOME = previousHome;
  }
  consoleErrorSpy.mockRestore();
  rmSync(testDir, { recursive: true, force: true });
});

const writeConfig = (content: string): void => {
  writeFileSync(join(testDir, "config.json"), content);
};

// ============================================================================
// Paths
// ============================================================================

describe("getLogstampDir", () => {
  it("uses LOGSTAMP_HOME when it is absolute", () => {
    expect(getLogstampDir()).toBe(testDir);
    expect(getConfigPath()).toBe(join(testDir, "config.json"));
  });

  it("ignores relative or traversing overrides", () => {
    process.env.LOGSTAMP_HOME = "relative/dir";
    expect(getLogstampDir()).toBe(join(homedir(), ".logstamp"));

    process.env.LOGSTAMP_HOME = "/tmp/../etc";
    expect(getLogstampDir()).toBe(join(homedir(), ".logstamp"));
  });
});

// ============================================================================
// Loading and Saving
// ============================================================================

describe("loadGlobalConfigSafe", () => {
  it("returns empty config for missing file", () => {
    expect(loadGlobalConfigSafe()).toEqual({ config: {} });
  });

  it("returns empty config for whitespace-only file", () => {
    writeConfig("   \n  ");
    expect(loadGlobalConfigSafe()).toEqual({ config: {} });
  });

  it("reports invalid JSON", () => {
    writeConfig("{ not json");
    expect(loadGlobalConfigSafe()).toEqual({
      config: {},
      error: `config file is corrupted: ${join(testDir, "config.json")} (invalid JSON)`,
    });
  });

  it("reports a non-object document", () => {
    writeConfig("[1, 2]");
    expect(loadGlobalConfigSafe().error).toBe(
      `config file is corrupted: ${join(testDir, "config.json")} (expected an object)`
    );
  });

  it("reports a directory in place of the file", () => {
    mkdirSync(join(testDir, "config.json"));
    expect(loadGlobalConfigSafe().error).toBe(
      `config path is a directory: ${join(testDir, "config.json")}`
    );
  });

  it("drops keys with the wrong type", () => {
    writeConfig(JSON.stringify({ fallbackOffset: 120, format: "text", extra: 1 }));
    expect(loadGlobalConfigSafe()).toEqual({ config: { format: "text" } });
  });

  it("reads back what saveConfig wrote", () => {
    saveConfig({ fallbackOffset: "+02:00", skipUnmatched: true });

    expect(loadGlobalConfigSafe()).toEqual({
      config: {
        fallbackOffset: "+02:00",
        skipUnmatched: true,
      },
    });
  });

  it("creates the directory when saving", () => {
    const nested = join(testDir, "nested");
    process.env.LOGSTAMP_HOME = nested;

    saveConfig({ format: "json" });

    expect(loadGlobalConfigSafe().config.format).toBe("json");
  });
});

// ============================================================================
// Merging
// ============================================================================

describe("mergeConfig", () => {
  it("uses defaults for an empty config", () => {
    expect(mergeConfig({}, {})).toEqual({
      fallbackOffset: 0,
      format: "json",
      skipUnmatched: false,
    });
  });

  it("applies file values", () => {
    expect(
      mergeConfig({ fallbackOffset: "+02:00", format: "text", skipUnmatched: true }, {})
    ).toEqual({ fallbackOffset: 120, format: "text", skipUnmatched: true });
  });

  it("lets the environment override the file", () => {
    const config = mergeConfig(
      { fallbackOffset: "+02:00", format: "text" },
      { LOGSTAMP_FALLBACK_OFFSET: "-05:00", LOGSTAMP_FORMAT: "json" }
    );

    expect(config.fallbackOffset).toBe(-300);
    expect(config.format).toBe("json");
  });

  it("warns about and skips invalid values", () => {
    const config = mergeConfig(
      { fallbackOffset: "+25:00" },
      { LOGSTAMP_FORMAT: "xml" }
    );

    expect(config).toEqual({ fallbackOffset: 0, format: "json", skipUnmatched: false });
    expect(consoleErrorSpy).toHaveBeenCalledWith(
      'warning: ignoring invalid fallbackOffset "+25:00" (config file)'
    );
    expect(consoleErrorSpy).toHaveBeenCalledWith(
      'warning: ignoring invalid format "xml" (LOGSTAMP_FORMAT)'
    );
  });
});

describe("applyOverrides", () => {
  const base: Config = { fallbackOffset: 120, format: "json", skipUnmatched: false };

  it("lets flags win", () => {
    expect(
      applyOverrides(base, { offset: "Z", format: "text", skipUnmatched: true })
    ).toEqual({
      ok: true,
      config: { fallbackOffset: 0, format: "text", skipUnmatched: true },
    });
  });

  it("keeps config values when no flag is given", () => {
    expect(applyOverrides(base, {})).toEqual({ ok: true, config: base });
  });

  it("fails on an invalid flag", () => {
    expect(applyOverrides(base, { offset: "bogus" })).toEqual({
      ok: false,
      error: 'Invalid offset "bogus". Expected Z, UTC, +HH:MM, +HHMM or +HH within ±23:59',
    });
    expect(applyOverrides(base, { format: "xml" })).toEqual({
      ok: false,
      error: 'Invalid format "xml". Must be one of: json, text',
    });
  });
});

// ============================================================================
// Validation Helpers
// ============================================================================

describe("validators", () => {
  it("validateFallbackOffset", () => {
    expect(validateFallbackOffset("+05:30")).toEqual({ valid: true });
    expect(validateFallbackOffset("")).toEqual({
      valid: false,
      error: "Offset is required",
    });
    expect(validateFallbackOffset("+24:00").valid).toBe(false);
  });

  it("validateFormat", () => {
    expect(validateFormat("text")).toEqual({ valid: true });
    expect(validateFormat("xml").valid).toBe(false);
  });

  it("parseBoolean", () => {
    expect(parseBoolean("true")).toBe(true);
    expect(parseBoolean(" False ")).toBe(false);
    expect(parseBoolean("1")).toBeUndefined();
  });
});
