import { colors } from "./colors.js";

export interface ParsedArgs {
  positional: string[];
  flags: Record<string, string | boolean>;
}

export interface FlagConfig {
  short?: string;
  hasValue: boolean;
}

// Available commands for suggestions
export const COMMANDS = [
  "register",
  "env",
  "setup",
  "teardown",
  "install",
  "uninstall",
  "init",
  "help",
  "version",
];

// Levenshtein distance for command and flag suggestions
export function levenshtein(a: string, b: string): number {
  const matrix: number[][] = [];
  for (let i = 0; i <= b.length; i++) {
    matrix[i] = [i];
  }
  for (let j = 0; j <= a.length; j++) {
    matrix[0][j] = j;
  }
  for (let i = 1; i <= b.length; i++) {
    for (let j = 1; j <= a.length; j++) {
      if (b.charAt(i - 1) === a.charAt(j - 1)) {
        matrix[i][j] = matrix[i - 1][j - 1];
      } else {
        matrix[i][j] = Math.min(
          matrix[i - 1][j - 1] + 1,
          matrix[i][j - 1] + 1,
          matrix[i - 1][j] + 1,
        );
      }
    }
  }
  return matrix[b.length][a.length];
}

/**
 * Closest candidate within an edit distance of 2, if any.
 */
export function closestMatch(input: string, candidates: readonly string[]): string | null {
  let bestMatch: string | null = null;
  let bestDistance = Infinity;

  for (const candidate of candidates) {
    const distance = levenshtein(input.toLowerCase(), candidate.toLowerCase());
    if (distance < bestDistance && distance <= 2) {
      bestDistance = distance;
      bestMatch = candidate;
    }
  }

  return bestMatch;
}

export function getSuggestion(input: string): string | null {
  return closestMatch(input, COMMANDS);
}

export function getStringFlag(
  flags: ParsedArgs["flags"],
  name: string,
): string | undefined {
  const value = flags[name];
  // A value flag at the end of args parses as ""
  if (typeof value === "string" && value.length > 0) {
    return value;
  }
  return undefined;
}

export function getBooleanFlag(
  flags: ParsedArgs["flags"],
  name: string,
): boolean {
  return flags[name] === true;
}

export function parseArgs(
  args: string[],
  flagDefs: Record<string, FlagConfig>,
  commandName?: string,
): ParsedArgs {
  const positional: string[] = [];
  const flags: Record<string, string | boolean> = {};
  const unknownFlags: string[] = [];

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg === "--") {
      positional.push(...args.slice(i + 1));
      break;
    }

    if (arg.startsWith("--")) {
      const [flagName, inlineValue] = splitInlineValue(arg.slice(2));
      const flagConfig = flagDefs[flagName];

      if (!flagConfig) {
        unknownFlags.push(arg);
        continue;
      }

      if (flagConfig.hasValue) {
        flags[flagName] = inlineValue ?? args[++i] ?? "";
      } else {
        flags[flagName] = true;
      }
      continue;
    }

    if (arg.startsWith("-") && arg.length === 2) {
      const shortFlag = arg.slice(1);
      const flagEntry = Object.entries(flagDefs).find(
        ([, config]) => config.short === shortFlag,
      );

      if (!flagEntry) {
        unknownFlags.push(arg);
        continue;
      }

      const [flagName, flagConfig] = flagEntry;
      if (flagConfig.hasValue) {
        flags[flagName] = args[++i] ?? "";
      } else {
        flags[flagName] = true;
      }
      continue;
    }

    if (arg.startsWith("-") && arg.length > 2) {
      unknownFlags.push(arg);
      continue;
    }

    positional.push(arg);
  }

  if (unknownFlags.length > 0) {
    const flag = unknownFlags[0];
    const flagName = splitInlineValue(flag.replace(/^-+/, ""))[0];
    const suggestion = closestMatch(flagName, Object.keys(flagDefs));

    let errorMsg = `${colors.red}Error:${colors.reset} Unknown option: ${flag}`;
    if (suggestion) {
      errorMsg += `\nDid you mean "--${suggestion}"?`;
    }

    const cmd = commandName ? `wasmedge-env ${commandName}` : "wasmedge-env <command>";
    errorMsg += `\nRun ${colors.cyan}${cmd} --help${colors.reset} for usage.`;

    console.error(errorMsg);
    process.exit(1);
  }

  return { positional, flags };
}

// "--flag=value" -> ["flag", "value"]; "--flag" -> ["flag", undefined]
function splitInlineValue(arg: string): [string, string | undefined] {
  const eq = arg.indexOf("=");
  if (eq < 0) return [arg, undefined];
  return [arg.slice(0, eq), arg.slice(eq + 1)];
}
