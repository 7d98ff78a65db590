import * as path from "node:path";
import { ensureRegistered } from "../core/path-registrar.js";
import { PATH_VARIABLE } from "../core/environment.js";
import { colors } from "./colors.js";
import { getBooleanFlag, getStringFlag, parseArgs } from "./args.js";

export function registerCommand(args: string[]): void {
  const { positional, flags } = parseArgs(args, {
    var: { hasValue: true },
    value: { hasValue: true },
    delimiter: { short: "d", hasValue: true },
    help: { short: "h", hasValue: false },
  }, "register");

  if (getBooleanFlag(flags, "help")) {
    console.log(`${colors.bold}wasmedge-env register${colors.reset} - Prepend a directory to a path list unless already present

${colors.bold}USAGE:${colors.reset}
  wasmedge-env register <dir> [options]

${colors.bold}ARGUMENTS:${colors.reset}
  <dir>                      Directory to register (matched exactly, not normalized)

${colors.bold}OPTIONS:${colors.reset}
  --var <name>               Variable to read the current value from (default: PATH)
  --value <list>             Use this value instead of reading the variable
  -d, --delimiter <char>     Path-list delimiter (default: "${path.delimiter}")
  -h, --help                 Show this help message

${colors.bold}EXAMPLE:${colors.reset}
  export PATH="$(wasmedge-env register "$HOME/.wasmedge/bin")"
  wasmedge-env register /opt/wasmedge/bin --value /usr/bin
`);
    return;
  }

  const directory = positional[0];
  if (!directory) {
    console.error(`${colors.red}Error:${colors.reset} Directory is required`);
    console.error(`Usage: wasmedge-env register <dir> [--var <name>] [--value <list>]`);
    process.exit(1);
  }

  const variable = getStringFlag(flags, "var") ?? PATH_VARIABLE;
  const delimiter = getStringFlag(flags, "delimiter") ?? path.delimiter;
  // --value "" is a legitimate empty list, so check presence rather than content
  const explicitValue = flags.value;
  const currentValue =
    typeof explicitValue === "string" ? explicitValue : (process.env[variable] ?? "");

  console.log(ensureRegistered(currentValue, directory, delimiter));
}
