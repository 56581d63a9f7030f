import { defineCommand } from "citty";
import { getVersion } from "../utils/version.js";

export const main = defineCommand({
  meta: {
    name: "logstamp",
    version: getVersion(),
    description: "Split log lines into absolute timestamps and messages",
  },
  subCommands: {
    parse: () => import("./parse.js").then((m) => m.parseCommand),
    formats: () => import("./formats.js").then((m) => m.formatsCommand),
    config: () => import("./config/index.js").then((m) => m.configCommand),
    version: () => import("./version.js").then((m) => m.versionCommand),
  },
});
