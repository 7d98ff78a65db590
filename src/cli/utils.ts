import * as os from "node:os";
import * as path from "node:path";
import type { Config } from "../core/config.js";
import { extractErrorInfo } from "../errors.js";
import { colors } from "./colors.js";

export interface CliOptions {
  config: Config;
  /** Config file the options were loaded from, if given with --config */
  configPath?: string;
}

/**
 * Format an error for CLI output with proper coloring and suggestions.
 */
export function formatCliError(err: unknown): string {
  const { message, suggestion } = extractErrorInfo(err);
  let output = `${colors.red}Error:${colors.reset} ${message}`;
  if (suggestion) {
    output += `\n${colors.dim}Hint: ${suggestion}${colors.reset}`;
  }
  return output;
}

/**
 * Simple pluralization helper.
 */
export function pluralize(count: number, singular: string, plural?: string): string {
  return count === 1 ? singular : (plural ?? singular + "s");
}

/**
 * Shorten paths under the home directory to "~/..." for display.
 */
export function displayPath(p: string): string {
  const home = os.homedir();
  if (p === home) return "~";
  if (p.startsWith(home + path.sep)) return "~" + p.slice(home.length);
  return p;
}
