/**
 * Custom error classes for consistent error handling across the codebase.
 *
 * The path registration core is total and never throws. Everything here
 * belongs to the generator side: substituting directories into fragment
 * templates, reading configuration and editing shell profiles.
 */

/**
 * Base error class for all wasmedge-env errors.
 * Carries an optional suggestion that the CLI prints as a hint.
 */
export class WasmEdgeEnvError extends Error {
  /** A suggestion for the user on how to resolve the error */
  readonly suggestion?: string;

  constructor(message: string, suggestion?: string) {
    super(message);
    this.name = "WasmEdgeEnvError";
    this.suggestion = suggestion;
  }
}

/**
 * Error thrown when a template uses a placeholder that has no value.
 */
export class MissingSubstitutionError extends WasmEdgeEnvError {
  /** The placeholder token, e.g. "{WASMEDGE_BIN_DIR}" */
  readonly placeholder: string;

  constructor(placeholder: string) {
    super(
      `No value supplied for placeholder ${placeholder}`,
      "Pass both the binary and library directories when rendering a fragment",
    );
    this.name = "MissingSubstitutionError";
    this.placeholder = placeholder;
  }
}

/**
 * Error thrown when a directory cannot be written into a shell fragment.
 */
export class InvalidPathError extends WasmEdgeEnvError {
  readonly path: string;
  readonly reason: string;

  constructor(path: string, reason: string, suggestion?: string) {
    super(`Invalid path ${path}: ${reason}`, suggestion);
    this.name = "InvalidPathError";
    this.path = path;
    this.reason = reason;
  }
}

/**
 * Error thrown when a config file cannot be parsed or fails validation.
 */
export class ConfigError extends WasmEdgeEnvError {
  /** Path to the offending config file */
  readonly filePath: string;

  constructor(filePath: string, details: string) {
    super(
      `Invalid config file at ${filePath}: ${details}`,
      "Fix the file by hand or delete it and run \"wasmedge-env init\"",
    );
    this.name = "ConfigError";
    this.filePath = filePath;
  }
}

/**
 * Error thrown when a shell profile or env file cannot be updated.
 */
export class ProfileError extends WasmEdgeEnvError {
  /** The file that was being edited */
  readonly filePath: string;
  /** The underlying system error, if any */
  readonly cause?: Error;

  constructor(filePath: string, message: string, cause?: Error, suggestion?: string) {
    super(message, suggestion ?? "Check file permissions and disk space");
    this.name = "ProfileError";
    this.filePath = filePath;
    this.cause = cause;
  }
}

export interface ErrorInfo {
  message: string;
  suggestion?: string;
}

/**
 * Normalize any thrown value into a message and optional suggestion.
 */
export function extractErrorInfo(err: unknown): ErrorInfo {
  if (err instanceof WasmEdgeEnvError) {
    return { message: err.message, suggestion: err.suggestion };
  }
  if (err instanceof Error) {
    return { message: err.message };
  }
  return { message: String(err) };
}
