#!/usr/bin/env node

import { createCliOptions, parseGlobalOptions } from "./bootstrap.js";
import { runCli } from "./cli/index.js";
import { formatCliError } from "./cli/utils.js";

const { configPath, filteredArgs } = parseGlobalOptions(process.argv.slice(2));

try {
  await runCli(filteredArgs, createCliOptions(configPath));
} catch (err) {
  console.error(formatCliError(err));
  process.exit(1);
}
