import { colors } from "./colors.js";
import { getSuggestion } from "./args.js";
import type { CliOptions } from "./utils.js";
import { registerCommand } from "./register.js";
import { envCommand } from "./env.js";
import { setupCommand } from "./setup.js";
import { teardownCommand } from "./teardown.js";
import { initCommand } from "./init.js";
import { helpCommand } from "./help.js";
import { versionCommand } from "./version.js";

export type { CliOptions } from "./utils.js";

export async function runCli(
  args: string[],
  options: CliOptions,
): Promise<void> {
  const command = args[0];

  switch (command) {
    case "register":
      return registerCommand(args.slice(1));
    case "env":
      return await envCommand(args.slice(1), options);
    case "setup":
    case "install":
      return await setupCommand(args.slice(1), options);
    case "teardown":
    case "uninstall":
      return await teardownCommand(args.slice(1), options);
    case "init":
      return await initCommand(args.slice(1), options);
    case "version":
    case "--version":
    case "-v":
      return versionCommand();
    case "help":
    case "--help":
    case "-h":
      return helpCommand();
    default:
      if (!command) {
        return helpCommand();
      }
      console.error(
        `${colors.red}Error:${colors.reset} Unknown command: ${command}`,
      );
      const suggestion = getSuggestion(command);
      if (suggestion) {
        console.error(
          `Did you mean "${colors.cyan}${suggestion}${colors.reset}"?`,
        );
      }
      console.error(
        `Run ${colors.cyan}wasmedge-env help${colors.reset} for usage information.`,
      );
      process.exit(1);
  }
}
