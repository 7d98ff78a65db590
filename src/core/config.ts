import * as fs from "node:fs";
import * as path from "node:path";
import * as os from "node:os";
import { parse as parseToml } from "smol-toml";
import { z } from "zod";
import { ConfigError } from "../errors.js";
import type { Dialect } from "./fragments/index.js";

const InstallConfigSchema = z
  .object({
    dir: z.string().min(1, "install.dir cannot be empty").optional(),
    bin_dir: z.string().min(1, "install.bin_dir cannot be empty").optional(),
    lib_dir: z.string().min(1, "install.lib_dir cannot be empty").optional(),
  })
  .strict();

const ShellConfigSchema = z
  .object({
    dialects: z.array(z.enum(["posix", "fish"])).optional(),
    profiles: z.array(z.string().min(1)).optional(),
  })
  .strict();

const ConfigFileSchema = z
  .object({
    install: InstallConfigSchema.optional(),
    shell: ShellConfigSchema.optional(),
  })
  .strict();

export type ConfigFile = z.infer<typeof ConfigFileSchema>;

/**
 * Where WasmEdge is installed
 */
export interface InstallConfig {
  /** Install root; a leading ~ is expanded (default: ~/.wasmedge) */
  dir: string;
  /** Binary directory (default: <dir>/bin) */
  bin_dir?: string;
  /** Library directory (default: <dir>/lib) */
  lib_dir?: string;
}

/**
 * Which shells get set up
 */
export interface ShellConfig {
  /** Fragment dialects to write */
  dialects: Dialect[];
  /** POSIX profiles, relative to the home directory */
  profiles: string[];
}

export interface Config {
  install: InstallConfig;
  shell: ShellConfig;
}

export const DEFAULT_PROFILES = [".profile", ".bashrc", ".bash_profile", ".zshenv"];

const DEFAULT_CONFIG: Config = {
  install: {
    dir: "~/.wasmedge",
  },
  shell: {
    dialects: ["posix", "fish"],
    profiles: DEFAULT_PROFILES,
  },
};

/**
 * Get the wasmedge-env home directory.
 * Priority: WASMEDGE_ENV_HOME env var > XDG_CONFIG_HOME/wasmedge-env > ~/.config/wasmedge-env
 */
export function getEnvHome(): string {
  if (process.env.WASMEDGE_ENV_HOME) {
    return process.env.WASMEDGE_ENV_HOME;
  }
  return path.join(getConfigHome(), "wasmedge-env");
}

/**
 * XDG_CONFIG_HOME, falling back to ~/.config
 */
export function getConfigHome(): string {
  return process.env.XDG_CONFIG_HOME || path.join(os.homedir(), ".config");
}

/**
 * Get the config file path
 * @returns Path to config file (~/.config/wasmedge-env/config.toml)
 */
export function getConfigPath(): string {
  return path.join(getEnvHome(), "config.toml");
}

/**
 * Expand a leading "~" to the home directory.
 */
export function expandHome(p: string): string {
  if (p === "~") return os.homedir();
  if (p.startsWith("~/")) return path.join(os.homedir(), p.slice(2));
  return p;
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const key = issue.path.join(".");
      return key ? `${key}: ${issue.message}` : issue.message;
    })
    .join("; ");
}

/**
 * Parse and validate a TOML config file. Returns null if it doesn't exist.
 */
function parseConfigFile(configPath: string): ConfigFile | null {
  if (!fs.existsSync(configPath)) {
    return null;
  }

  const content = fs.readFileSync(configPath, "utf-8");
  let parsed: unknown;
  try {
    parsed = parseToml(content);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ConfigError(configPath, message);
  }

  const result = ConfigFileSchema.safeParse(parsed);
  if (!result.success) {
    throw new ConfigError(configPath, formatIssues(result.error));
  }
  return result.data;
}

/**
 * Merge a config file over a config, with the file taking precedence.
 */
function mergeConfig(a: Config, b: ConfigFile | null): Config {
  return {
    install: { ...a.install, ...b?.install },
    shell: {
      dialects: [...(b?.shell?.dialects ?? a.shell.dialects)],
      profiles: [...(b?.shell?.profiles ?? a.shell.profiles)],
    },
  };
}

export interface LoadConfigOptions {
  /** Custom config file path (overrides the default location) */
  configPath?: string;
}

/**
 * Load configuration with precedence: config file > defaults
 */
export function loadConfig(options?: LoadConfigOptions): Config {
  const configPath = options?.configPath ?? getConfigPath();
  return mergeConfig(DEFAULT_CONFIG, parseConfigFile(configPath));
}

export interface InstallDirs {
  installDir: string;
  binDir: string;
  libDir: string;
}

/**
 * Resolve the install, binary and library directories to absolute paths.
 * An explicit install dir replaces the configured one along with any
 * configured bin_dir and lib_dir.
 */
export function resolveInstallDirs(config: Config, installDirOverride?: string): InstallDirs {
  if (installDirOverride) {
    const installDir = path.resolve(expandHome(installDirOverride));
    return {
      installDir,
      binDir: path.join(installDir, "bin"),
      libDir: path.join(installDir, "lib"),
    };
  }

  const installDir = path.resolve(expandHome(config.install.dir));
  return {
    installDir,
    binDir: config.install.bin_dir
      ? path.resolve(expandHome(config.install.bin_dir))
      : path.join(installDir, "bin"),
    libDir: config.install.lib_dir
      ? path.resolve(expandHome(config.install.lib_dir))
      : path.join(installDir, "lib"),
  };
}

/**
 * Default config file contents, written by `wasmedge-env init`.
 */
export const DEFAULT_CONFIG_TOML = `# wasmedge-env configuration file

[install]
# Install root; "~" expands to your home directory
dir = "~/.wasmedge"
# bin_dir = "/custom/bin"   # default: <dir>/bin
# lib_dir = "/custom/lib"   # default: <dir>/lib

[shell]
# Fragments to write next to the install: "posix" (env) and "fish" (env.fish)
dialects = ["posix", "fish"]
# POSIX profiles (relative to your home directory) that source the env file
profiles = [".profile", ".bashrc", ".bash_profile", ".zshenv"]
`;
