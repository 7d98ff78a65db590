import * as fs from "node:fs";
import * as path from "node:path";
import * as readline from "node:readline";
import { DEFAULT_CONFIG_TOML, getConfigPath, loadConfig } from "../core/config.js";
import { colors, marks } from "./colors.js";
import { getBooleanFlag, getStringFlag, parseArgs } from "./args.js";
import { setupCommand } from "./setup.js";
import type { CliOptions } from "./utils.js";

async function promptYesNo(question: string): Promise<boolean> {
  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
  });

  return new Promise((resolve) => {
    rl.question(question, (answer) => {
      rl.close();
      const normalized = answer.toLowerCase().trim();
      resolve(normalized === "y" || normalized === "yes" || normalized === "");
    });
  });
}

export async function initCommand(args: string[], options: CliOptions): Promise<void> {
  const { flags } = parseArgs(args, {
    yes: { short: "y", hasValue: false },
    "no-setup": { hasValue: false },
    "config-dir": { hasValue: true },
    help: { short: "h", hasValue: false },
  }, "init");

  if (getBooleanFlag(flags, "help")) {
    console.log(`${colors.bold}wasmedge-env init${colors.reset} - Create the wasmedge-env config file

${colors.bold}USAGE:${colors.reset}
  wasmedge-env init [options]

${colors.bold}OPTIONS:${colors.reset}
  -y, --yes           Run shell setup without asking
  --no-setup          Only write the config file
  --config-dir PATH   Override config directory (default: ~/.config/wasmedge-env)
  -h, --help          Show this help message
`);
    return;
  }

  const configDir = getStringFlag(flags, "config-dir");
  const configPath = configDir
    ? path.join(configDir, "config.toml")
    : options.configPath ?? getConfigPath();

  if (fs.existsSync(configPath)) {
    console.error(`${colors.red}Error:${colors.reset} Config file already exists at ${configPath}`);
    console.error(`Edit the file directly or delete it to reinitialize.`);
    process.exit(1);
  }

  fs.mkdirSync(path.dirname(configPath), { recursive: true });
  fs.writeFileSync(configPath, DEFAULT_CONFIG_TOML, "utf-8");

  console.log(`${marks.ok} Created config file at ${colors.cyan}${configPath}${colors.reset}`);

  if (getBooleanFlag(flags, "no-setup")) {
    return;
  }

  const shouldSetup =
    getBooleanFlag(flags, "yes") ||
    (await promptYesNo(`Set up your shell profiles now? [Y/n] `));

  if (!shouldSetup) {
    console.log(`${colors.dim}Run 'wasmedge-env setup' when you're ready.${colors.reset}`);
    return;
  }

  console.log();
  await setupCommand([], { config: loadConfig({ configPath }), configPath });
}
