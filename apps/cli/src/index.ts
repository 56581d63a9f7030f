#!/usr/bin/env node
import { runMain } from "citty";
import { config } from "dotenv";
import { main } from "./commands/index.js";

// .env in the working directory; variables already set take precedence
config();

await runMain(main);
