import { loadConfig } from "./core/config.js";
import type { CliOptions } from "./cli/utils.js";

export interface ParsedGlobalOptions {
  configPath?: string;
  filteredArgs: string[];
}

/**
 * Parse a global option flag. Handles both "--flag value" and "--flag=value" formats.
 */
function parseGlobalOption(
  args: string[],
  index: number,
  flagName: string,
): { value: string; skip: number } | null {
  const arg = args[index];
  const flagWithEquals = `--${flagName}=`;

  if (arg === `--${flagName}`) {
    const nextArg = args[index + 1];
    if (!nextArg || nextArg.startsWith("-")) {
      console.error(`Error: --${flagName} requires a value`);
      process.exit(1);
    }
    return { value: nextArg, skip: 1 };
  }

  if (arg.startsWith(flagWithEquals)) {
    const value = arg.slice(flagWithEquals.length);
    if (!value) {
      console.error(`Error: --${flagName} requires a value`);
      process.exit(1);
    }
    return { value, skip: 0 };
  }

  return null;
}

export function parseGlobalOptions(args: string[]): ParsedGlobalOptions {
  let configPath: string | undefined;
  const filteredArgs: string[] = [];

  for (let i = 0; i < args.length; i++) {
    const configResult = parseGlobalOption(args, i, "config");
    if (configResult) {
      configPath = configResult.value;
      i += configResult.skip;
      continue;
    }

    filteredArgs.push(args[i]);
  }

  return { configPath, filteredArgs };
}

export function createCliOptions(configPath?: string): CliOptions {
  return { config: loadConfig({ configPath }), configPath };
}
