import * as os from "node:os";
import * as path from "node:path";
import { getConfigHome, resolveInstallDirs } from "../core/config.js";
import { envFileName, sourceLine } from "../core/fragments/index.js";
import { setupShell } from "../core/shell-setup.js";
import { colors, marks } from "./colors.js";
import { getBooleanFlag, getStringFlag, parseArgs } from "./args.js";
import { type CliOptions, displayPath, formatCliError } from "./utils.js";

export async function setupCommand(args: string[], options: CliOptions): Promise<void> {
  const { flags } = parseArgs(args, {
    dir: { hasValue: true },
    "dry-run": { short: "n", hasValue: false },
    help: { short: "h", hasValue: false },
  }, "setup");

  if (getBooleanFlag(flags, "help")) {
    console.log(`${colors.bold}wasmedge-env setup${colors.reset} - Hook an install into your shell profiles

${colors.bold}USAGE:${colors.reset}
  wasmedge-env setup [options]

${colors.bold}OPTIONS:${colors.reset}
  --dir <path>               Install directory (default: install.dir from config)
  -n, --dry-run              Show what would change without writing anything
  -h, --help                 Show this help message

${colors.bold}DESCRIPTION:${colors.reset}
  Writes "env" (POSIX sh) and "env.fish" into the install directory, adds a
  line sourcing "env" to each configured profile that exists (creating the
  first one if none do), and adds fish/conf.d/wasmedge.fish when fish is
  configured. Running it again changes nothing.
`);
    return;
  }

  const dryRun = getBooleanFlag(flags, "dry-run");

  try {
    const dirs = resolveInstallDirs(options.config, getStringFlag(flags, "dir"));
    const result = await setupShell({
      ...dirs,
      homeDir: os.homedir(),
      configHome: getConfigHome(),
      profiles: options.config.shell.profiles,
      dialects: options.config.shell.dialects,
      dryRun,
    });

    for (const file of result.written) {
      console.log(`${marks.ok} ${dryRun ? "Would write" : "Wrote"} ${colors.cyan}${displayPath(file)}${colors.reset}`);
    }
    for (const file of result.updated) {
      console.log(`${marks.ok} ${dryRun ? "Would update" : "Updated"} ${colors.cyan}${displayPath(file)}${colors.reset}`);
    }
    for (const file of result.unchanged) {
      console.log(`${marks.same} ${colors.dim}Unchanged ${displayPath(file)}${colors.reset}`);
    }
    if (result.skipped.includes("fish")) {
      const fishDir = path.join(getConfigHome(), "fish");
      console.error(`${marks.warn} ${colors.yellow}Skipped fish: ${displayPath(fishDir)} not found${colors.reset}`);
    }

    const changed = result.written.length + result.updated.length;
    if (changed === 0) {
      console.log("Shell setup is already up to date.");
      return;
    }
    if (!dryRun && options.config.shell.dialects.includes("posix")) {
      const envFile = path.join(dirs.installDir, envFileName("posix"));
      console.log();
      console.log(
        `${colors.dim}Restart your shell or run '${sourceLine("posix", envFile)}' to use WasmEdge now.${colors.reset}`,
      );
    }
  } catch (err) {
    console.error(formatCliError(err));
    process.exit(1);
  }
}
