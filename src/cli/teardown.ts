import * as os from "node:os";
import { getConfigHome, resolveInstallDirs } from "../core/config.js";
import { teardownShell } from "../core/shell-setup.js";
import { colors, marks } from "./colors.js";
import { getBooleanFlag, getStringFlag, parseArgs } from "./args.js";
import { type CliOptions, displayPath, formatCliError, pluralize } from "./utils.js";

export async function teardownCommand(args: string[], options: CliOptions): Promise<void> {
  const { flags } = parseArgs(args, {
    dir: { hasValue: true },
    help: { short: "h", hasValue: false },
  }, "teardown");

  if (getBooleanFlag(flags, "help")) {
    console.log(`${colors.bold}wasmedge-env teardown${colors.reset} - Undo shell setup

${colors.bold}USAGE:${colors.reset}
  wasmedge-env teardown [options]

${colors.bold}OPTIONS:${colors.reset}
  --dir <path>               Install directory (default: install.dir from config)
  -h, --help                 Show this help message

${colors.bold}DESCRIPTION:${colors.reset}
  Removes the wasmedge-env block from every configured profile and from
  fish/conf.d/wasmedge.fish, then deletes the env files in the install
  directory. The rest of the install is left alone.
`);
    return;
  }

  try {
    const { installDir } = resolveInstallDirs(options.config, getStringFlag(flags, "dir"));
    const { removed } = await teardownShell({
      installDir,
      homeDir: os.homedir(),
      configHome: getConfigHome(),
      profiles: options.config.shell.profiles,
    });

    if (removed.length === 0) {
      console.log("Nothing to remove.");
      return;
    }
    for (const file of removed) {
      console.log(`${marks.ok} Cleaned ${colors.cyan}${displayPath(file)}${colors.reset}`);
    }
    console.log(`Removed wasmedge-env from ${removed.length} ${pluralize(removed.length, "file")}.`);
  } catch (err) {
    console.error(formatCliError(err));
    process.exit(1);
  }
}
