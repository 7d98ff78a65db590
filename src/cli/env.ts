import { resolveInstallDirs } from "../core/config.js";
import {
  DIALECTS,
  getFragmentTemplate,
  isDialect,
  renderFragment,
} from "../core/fragments/index.js";
import { colors } from "./colors.js";
import { getBooleanFlag, getStringFlag, parseArgs } from "./args.js";
import { type CliOptions, formatCliError } from "./utils.js";

export async function envCommand(args: string[], options: CliOptions): Promise<void> {
  const { flags } = parseArgs(args, {
    shell: { short: "s", hasValue: true },
    dir: { hasValue: true },
    template: { short: "t", hasValue: false },
    help: { short: "h", hasValue: false },
  }, "env");

  if (getBooleanFlag(flags, "help")) {
    console.log(`${colors.bold}wasmedge-env env${colors.reset} - Print the shell fragment for an install

${colors.bold}USAGE:${colors.reset}
  wasmedge-env env [options]

${colors.bold}OPTIONS:${colors.reset}
  -s, --shell <dialect>      Fragment dialect: ${DIALECTS.join(", ")} (default: posix)
  --dir <path>               Install directory (default: install.dir from config)
  -t, --template             Print the template with its placeholders unfilled
  -h, --help                 Show this help message

${colors.bold}EXAMPLE:${colors.reset}
  eval "$(wasmedge-env env)"
  wasmedge-env env --shell fish | source
`);
    return;
  }

  const shell = getStringFlag(flags, "shell") ?? "posix";
  if (!isDialect(shell)) {
    console.error(`${colors.red}Error:${colors.reset} Unsupported shell: ${shell}`);
    console.error(`Supported shells: ${DIALECTS.join(", ")}`);
    process.exit(1);
  }

  if (getBooleanFlag(flags, "template")) {
    console.log(getFragmentTemplate(shell).trimEnd());
    return;
  }

  try {
    const { binDir, libDir } = resolveInstallDirs(options.config, getStringFlag(flags, "dir"));
    console.log(renderFragment(shell, { binDir, libDir }).trimEnd());
  } catch (err) {
    console.error(formatCliError(err));
    process.exit(1);
  }
}
