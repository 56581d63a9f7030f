/**
 * Config management for the logstamp CLI
 *
 * Settings live in ~/.logstamp/config.json (LOGSTAMP_HOME overrides the
 * directory). Precedence: CLI flag > environment > config file > defaults.
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { homedir } from "node:os";
import { join } from "node:path";
import { type UtcOffset, tryParseUtcOffset } from "@logstamp/parser";

// ============================================================================
// Types
// ============================================================================

export const OUTPUT_FORMATS = ["json", "text"] as const;

export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

/**
 * GlobalConfig is the raw structure that gets persisted to disk
 */
export interface GlobalConfig {
  fallbackOffset?: string;
  format?: string;
  skipUnmatched?: boolean;
}

/**
 * Config is the merged, resolved config used by the commands
 */
export interface Config {
  fallbackOffset: UtcOffset;
  format: OutputFormat;
  skipUnmatched: boolean;
}

/**
 * Per-invocation overrides taken from command-line flags
 */
export interface ConfigOverrides {
  offset?: string;
  format?: string;
  skipUnmatched?: boolean;
}

export interface ValidationResult {
  valid: boolean;
  error?: string;
}

export interface ConfigLoadResult {
  config: GlobalConfig;
  error?: string;
}

export type ResolveResult =
  | { ok: true; config: Config }
  | { ok: false; error: string };

// ============================================================================
// Constants
// ============================================================================

const LOGSTAMP_DIR_NAME = ".logstamp";
const CONFIG_FILE = "config.json";

const DEFAULT_FALLBACK_OFFSET: UtcOffset = 0;
const DEFAULT_FORMAT: OutputFormat = "json";

const ENV_HOME = "LOGSTAMP_HOME";
const ENV_FALLBACK_OFFSET = "LOGSTAMP_FALLBACK_OFFSET";
const ENV_FORMAT = "LOGSTAMP_FORMAT";

const WINDOWS_DRIVE_PATTERN = /^[A-Za-z]:\\/;

// ============================================================================
// Path Helpers
// ============================================================================

const validateOverridePath = (path: string): string | null => {
  if (path.includes("..")) {
    return null;
  }
  if (!(path.startsWith("/") || WINDOWS_DRIVE_PATTERN.test(path))) {
    return null;
  }
  return path;
};

/**
 * Gets the logstamp directory path (~/.logstamp)
 */
export const getLogstampDir = (): string => {
  const override = process.env[ENV_HOME];
  if (override) {
    const validated = validateOverridePath(override);
    if (validated) {
      return validated;
    }
  }
  return join(homedir(), LOGSTAMP_DIR_NAME);
};

export const getConfigPath = (): string => join(getLogstampDir(), CONFIG_FILE);

// ============================================================================
// Validation Helpers
// ============================================================================

/**
 * Validates offset text such as "+02:00", "-0700" or "Z".
 */
export const validateFallbackOffset = (value: string): ValidationResult => {
  if (!value || value.trim() === "") {
    return { valid: false, error: "Offset is required" };
  }
  if (tryParseUtcOffset(value.trim()) === undefined) {
    return {
      valid: false,
      error: `Invalid offset "${value}". Expected Z, UTC, +HH:MM, +HHMM or +HH within ±23:59`,
    };
  }
  return { valid: true };
};

export const isOutputFormat = (value: string): value is OutputFormat =>
  OUTPUT_FORMATS.some((format) => format === value);

export const validateFormat = (value: string): ValidationResult => {
  if (!isOutputFormat(value.trim())) {
    return {
      valid: false,
      error: `Invalid format "${value}". Must be one of: ${OUTPUT_FORMATS.join(", ")}`,
    };
  }
  return { valid: true };
};

/**
 * Parses "true"/"false" (case-insensitive).
 */
export const parseBoolean = (value: string): boolean | undefined => {
  const normalized = value.trim().toLowerCase();
  if (normalized === "true") {
    return true;
  }
  if (normalized === "false") {
    return false;
  }
  return undefined;
};

// ============================================================================
// Config Loading
// ============================================================================

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const isErrnoException = (error: unknown): error is NodeJS.ErrnoException =>
  error instanceof Error && "code" in error;

/**
 * Keeps the known keys of a parsed config file whose types match.
 * Values of the wrong type are dropped here; their content is checked in
 * mergeConfig.
 */
const toGlobalConfig = (value: Record<string, unknown>): GlobalConfig => {
  const config: GlobalConfig = {};
  if (typeof value.fallbackOffset === "string") {
    config.fallbackOffset = value.fallbackOffset;
  }
  if (typeof value.format === "string") {
    config.format = value.format;
  }
  if (typeof value.skipUnmatched === "boolean") {
    config.skipUnmatched = value.skipUnmatched;
  }
  return config;
};

/**
 * Loads config with detailed error information.
 * Missing and empty files are an empty config, not an error.
 */
export const loadGlobalConfigSafe = (): ConfigLoadResult => {
  const configPath = getConfigPath();

  if (!existsSync(configPath)) {
    return { config: {} };
  }

  try {
    const data = readFileSync(configPath, "utf-8");
    if (!data.trim()) {
      return { config: {} };
    }
    const parsed: unknown = JSON.parse(data);
    if (!isRecord(parsed)) {
      return {
        config: {},
        error: `config file is corrupted: ${configPath} (expected an object)`,
      };
    }
    return { config: toGlobalConfig(parsed) };
  } catch (error) {
    if (error instanceof SyntaxError) {
      return {
        config: {},
        error: `config file is corrupted: ${configPath} (invalid JSON)`,
      };
    }

    if (isErrnoException(error) && error.code === "EACCES") {
      return {
        config: {},
        error: `cannot read config at ${configPath}: permission denied`,
      };
    }

    if (isErrnoException(error) && error.code === "EISDIR") {
      return {
        config: {},
        error: `config path is a directory: ${configPath}`,
      };
    }

    return {
      config: {},
      error: `failed to load config: ${error instanceof Error ? error.message : String(error)}`,
    };
  }
};

/**
 * Loads the config file, warning on stderr when it cannot be used.
 */
export const loadGlobalConfig = (): GlobalConfig => {
  const result = loadGlobalConfigSafe();
  if (result.error) {
    console.error(`warning: ${result.error}`);
  }
  return result.config;
};

/**
 * Loads and merges the config file with environment overrides.
 */
export const loadConfig = (env: NodeJS.ProcessEnv = process.env): Config =>
  mergeConfig(loadGlobalConfig(), env);

// ============================================================================
// Config Merging
// ============================================================================

/**
 * Applies file values, then environment values, on top of the defaults.
 * Invalid values are skipped with a warning.
 */
export const mergeConfig = (
  global: GlobalConfig,
  env: NodeJS.ProcessEnv = process.env
): Config => {
  const config: Config = {
    fallbackOffset: DEFAULT_FALLBACK_OFFSET,
    format: DEFAULT_FORMAT,
    skipUnmatched: false,
  };

  const applyOffset = (value: string, source: string): void => {
    const offset = tryParseUtcOffset(value.trim());
    if (offset === undefined) {
      console.error(`warning: ignoring invalid fallbackOffset "${value}" (${source})`);
      return;
    }
    config.fallbackOffset = offset;
  };

  const applyFormat = (value: string, source: string): void => {
    const format = value.trim();
    if (!isOutputFormat(format)) {
      console.error(`warning: ignoring invalid format "${value}" (${source})`);
      return;
    }
    config.format = format;
  };

  if (global.fallbackOffset !== undefined) {
    applyOffset(global.fallbackOffset, "config file");
  }
  if (global.format !== undefined) {
    applyFormat(global.format, "config file");
  }
  if (global.skipUnmatched !== undefined) {
    config.skipUnmatched = global.skipUnmatched;
  }

  const envOffset = env[ENV_FALLBACK_OFFSET];
  if (envOffset) {
    applyOffset(envOffset, ENV_FALLBACK_OFFSET);
  }
  const envFormat = env[ENV_FORMAT];
  if (envFormat) {
    applyFormat(envFormat, ENV_FORMAT);
  }

  return config;
};

/**
 * Applies command-line overrides. Unlike file and environment values, an
 * invalid flag is an error.
 */
export const applyOverrides = (
  config: Config,
  overrides: ConfigOverrides
): ResolveResult => {
  const resolved: Config = { ...config };

  if (overrides.offset !== undefined) {
    const offset = tryParseUtcOffset(overrides.offset.trim());
    if (offset === undefined) {
      return {
        ok: false,
        error: validateFallbackOffset(overrides.offset).error ?? "Invalid offset",
      };
    }
    resolved.fallbackOffset = offset;
  }

  if (overrides.format !== undefined) {
    const format = overrides.format.trim();
    if (!isOutputFormat(format)) {
      return {
        ok: false,
        error: validateFormat(overrides.format).error ?? "Invalid format",
      };
    }
    resolved.format = format;
  }

  if (overrides.skipUnmatched) {
    resolved.skipUnmatched = true;
  }

  return { ok: true, config: resolved };
};

// ============================================================================
// Config Saving
// ============================================================================

/**
 * Saves config to ~/.logstamp/config.json
 */
export const saveConfig = (config: GlobalConfig): void => {
  const dir = getLogstampDir();

  if (!existsSync(dir)) {
    mkdirSync(dir, { mode: 0o700, recursive: true });
  }

  const data = `${JSON.stringify(config, null, 2)}\n`;
  writeFileSync(join(dir, CONFIG_FILE), data, { mode: 0o600 });
};
