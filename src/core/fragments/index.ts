import { substitutePlaceholders, type TemplateValues } from "../template.js";
import { generateFishFragment } from "./fish.js";
import { generatePosixFragment } from "./posix.js";

const FRAGMENT_GENERATORS = {
  posix: generatePosixFragment,
  fish: generateFishFragment,
} as const;

export type Dialect = keyof typeof FRAGMENT_GENERATORS;

export const DIALECTS: readonly Dialect[] = ["posix", "fish"];

const ENV_FILE_NAMES: Record<Dialect, string> = {
  posix: "env",
  fish: "env.fish",
};

export function isDialect(value: string): value is Dialect {
  return Object.hasOwn(FRAGMENT_GENERATORS, value);
}

/**
 * The fragment for a dialect with its placeholders still in place.
 */
export function getFragmentTemplate(dialect: Dialect): string {
  return FRAGMENT_GENERATORS[dialect]();
}

/**
 * The fragment for a dialect with the install's directories substituted.
 */
export function renderFragment(dialect: Dialect, values: TemplateValues): string {
  return substitutePlaceholders(getFragmentTemplate(dialect), values);
}

/**
 * Name of the file a rendered fragment is written to inside the install dir.
 */
export function envFileName(dialect: Dialect): string {
  return ENV_FILE_NAMES[dialect];
}

/**
 * The profile line that sources an env file in the given dialect.
 */
export function sourceLine(dialect: Dialect, file: string): string {
  switch (dialect) {
    case "posix":
      return `. "${file}"`;
    case "fish":
      return `source "${file}"`;
  }
}
