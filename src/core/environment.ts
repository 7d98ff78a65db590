import * as path from "node:path";
import { ensureRegistered } from "./path-registrar.js";

export const PATH_VARIABLE = "PATH";
export const LIBRARY_PATH_VARIABLE = "LD_LIBRARY_PATH";

/**
 * A set of environment variables, shaped like process.env.
 * A missing key and an undefined value both mean the variable is unset.
 */
export type EnvironmentSnapshot = Record<string, string | undefined>;

/**
 * The directories to register and the delimiter that joins path lists.
 */
export interface RegistrationConfig {
  /** Directory prepended to PATH */
  binDir: string;
  /** Directory prepended to LD_LIBRARY_PATH */
  libDir: string;
  /** Path-list delimiter (default: the platform delimiter) */
  delimiter?: string;
}

/**
 * Return a copy of `env` with the binary directory registered in PATH and
 * the library directory registered in LD_LIBRARY_PATH.
 *
 * The input snapshot is not modified. Callers apply the result to whatever
 * they control: process.env, a child process, or a generated file.
 */
export function applyRegistrations(
  env: EnvironmentSnapshot,
  config: RegistrationConfig,
): EnvironmentSnapshot {
  const delimiter = config.delimiter ?? path.delimiter;

  return {
    ...env,
    [PATH_VARIABLE]: ensureRegistered(
      env[PATH_VARIABLE] ?? "",
      config.binDir,
      delimiter,
    ),
    [LIBRARY_PATH_VARIABLE]: ensureRegistered(
      env[LIBRARY_PATH_VARIABLE] ?? "",
      config.libDir,
      delimiter,
    ),
  };
}
