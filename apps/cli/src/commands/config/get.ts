import { defineCommand } from "citty";
import { loadConfig } from "../../lib/config.js";
import { formatError } from "../../utils/error.js";
import { CONFIG_KEYS, isConfigKey } from "./constants.js";
import { formatConfigValue } from "./format.js";

export const configGetCommand = defineCommand({
  meta: {
    name: "get",
    description: "Get a resolved configuration value (for scripting)",
  },
  args: {
    key: {
      type: "positional",
      description: `Configuration key (${CONFIG_KEYS.join(", ")})`,
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
      console.log(formatConfigValue(loadConfig(), key));
    } catch (error) {
      console.error(`Error loading config: ${formatError(error)}`);
      process.exit(1);
    }
  },
});
