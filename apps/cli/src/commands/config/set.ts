import { defineCommand } from "citty";
import {
  type GlobalConfig,
  loadGlobalConfig,
  parseBoolean,
  saveConfig,
  validateFallbackOffset,
  validateFormat,
} from "../../lib/config.js";
import { formatError } from "../../utils/error.js";
import { CONFIG_KEYS, type ConfigKey, isConfigKey } from "./constants.js";

/**
 * Validates a raw command-line value and returns the config fields to write.
 * Throws with a user-facing message when the value is invalid.
 */
const validators: Record<ConfigKey, (value: string) => Partial<GlobalConfig>> = {
  fallbackOffset: (v) => {
    const result = validateFallbackOffset(v);
    if (!result.valid) {
      throw new Error(result.error ?? "Invalid offset");
    }
    return { fallbackOffset: v.trim() };
  },
  format: (v) => {
    const result = validateFormat(v);
    if (!result.valid) {
      throw new Error(result.error ?? "Invalid format");
    }
    return { format: v.trim() };
  },
  skipUnmatched: (v) => {
    const parsed = parseBoolean(v);
    if (parsed === undefined) {
      throw new Error(`Invalid boolean: ${v} (use true or false)`);
    }
    return { skipUnmatched: parsed };
  },
};

/**
 * Returns the config with one key replaced by a validated value.
 */
export const applyConfigValue = (
  config: GlobalConfig,
  key: ConfigKey,
  value: string
): GlobalConfig => ({ ...config, ...validators[key](value) });

export const configSetCommand = defineCommand({
  meta: {
    name: "set",
    description: "Set a configuration value",
  },
  args: {
    key: {
      type: "positional",
      description: `Configuration key (${CONFIG_KEYS.join(", ")})`,
      required: true,
    },
    value: {
      type: "positional",
      description: "Value to set",
      required: true,
    },
  },
  run: ({ args }) => {
    const key = args.key;

    if (!isConfigKey(key)) {
      console.error(`Unknown key: ${key}`);
      console.error(`Valid keys: ${CONFIG_KEYS.join(", ")}`);
      process.exit(1);
    }

    try {
      saveConfig(applyConfigValue(loadGlobalConfig(), key, args.value));
      console.log("ok");
    } catch (error) {
      console.error(formatError(error));
      process.exit(1);
    }
  },
});
