import { defineCommand } from "citty";
import { getConfigPath, loadConfig } from "../../lib/config.js";
import { printHeader } from "../../tui/header.js";
import { CONFIG_ENV_VARS, CONFIG_KEYS } from "./constants.js";
import { formatConfigValue } from "./format.js";

export const configListCommand = defineCommand({
  meta: {
    name: "list",
    description: "List all configuration values",
  },
  run: () => {
    const config = loadConfig();

    printHeader("config list");

    console.log(`Config file: ${getConfigPath()}`);
    console.log();
    for (const key of CONFIG_KEYS) {
      const envVar = CONFIG_ENV_VARS[key];
      const fromEnv = envVar && process.env[envVar] ? ` (from ${envVar})` : "";
      console.log(`${key}: ${formatConfigValue(config, key)}${fromEnv}`);
    }
    console.log();
  },
});
