import * as path from "node:path";
import { InvalidPathError, MissingSubstitutionError } from "../errors.js";

export const BIN_DIR_PLACEHOLDER = "{WASMEDGE_BIN_DIR}";
export const LIB_DIR_PLACEHOLDER = "{WASMEDGE_LIB_DIR}";

export const PLACEHOLDERS = [BIN_DIR_PLACEHOLDER, LIB_DIR_PLACEHOLDER] as const;

export type Placeholder = (typeof PLACEHOLDERS)[number];

/**
 * Values substituted into a fragment template.
 */
export interface TemplateValues {
  binDir?: string;
  libDir?: string;
}

// Characters that change meaning inside a double-quoted shell word
const UNSAFE_CHARACTERS = /["$`\\\n]/;
const PATH_LIST_DELIMITER = ":";

function valueFor(placeholder: Placeholder, values: TemplateValues): string | undefined {
  switch (placeholder) {
    case BIN_DIR_PLACEHOLDER:
      return values.binDir;
    case LIB_DIR_PLACEHOLDER:
      return values.libDir;
  }
}

/**
 * List the placeholders a template uses, in declaration order.
 */
export function findPlaceholders(template: string): Placeholder[] {
  return PLACEHOLDERS.filter((placeholder) => template.includes(placeholder));
}

/**
 * Check that a directory can be written into a fragment verbatim.
 * Throws InvalidPathError when it cannot.
 */
export function validateDirectory(directory: string): void {
  if (!path.isAbsolute(directory)) {
    throw new InvalidPathError(
      directory,
      "must be an absolute path",
      "Resolve the directory against the install location first",
    );
  }
  if (UNSAFE_CHARACTERS.test(directory)) {
    throw new InvalidPathError(
      directory,
      "contains a quote, backslash, dollar sign, backtick or newline",
      "Install to a directory whose path has no shell metacharacters",
    );
  }
  if (directory.includes(PATH_LIST_DELIMITER)) {
    throw new InvalidPathError(
      directory,
      "contains a colon, which separates PATH entries",
      "Install to a directory whose path has no colon",
    );
  }
}

/**
 * Replace every placeholder the template uses with its directory.
 * Placeholders the template does not use need no value.
 */
export function substitutePlaceholders(
  template: string,
  values: TemplateValues,
): string {
  let rendered = template;

  for (const placeholder of findPlaceholders(template)) {
    const value = valueFor(placeholder, values);
    if (!value) {
      throw new MissingSubstitutionError(placeholder);
    }
    validateDirectory(value);
    rendered = rendered.split(placeholder).join(value);
  }

  return rendered;
}
