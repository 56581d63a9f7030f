import { formatUtcOffset } from "@logstamp/parser";
import type { Config } from "../../lib/config.js";
import type { ConfigKey } from "./constants.js";

/**
 * Display text for a resolved config value.
 */
export const formatConfigValue = (config: Config, key: ConfigKey): string => {
  switch (key) {
    case "fallbackOffset":
      return formatUtcOffset(config.fallbackOffset);
    case "format":
      return config.format;
    case "skipUnmatched":
      return String(config.skipUnmatched);
    default: {
      const exhaustive: never = key;
      return exhaustive;
    }
  }
};
