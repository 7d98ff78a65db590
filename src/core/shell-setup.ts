import * as fs from "node:fs";
import * as path from "node:path";
import { ProfileError } from "../errors.js";
import {
  DIALECTS,
  envFileName,
  renderFragment,
  sourceLine,
  type Dialect,
} from "./fragments/index.js";
import { managedLinesMatch, manageLinesInFile } from "./managed-block.js";

export const FISH_CONF_FILE = "wasmedge.fish";

export interface ShellSetupOptions {
  installDir: string;
  binDir: string;
  libDir: string;
  /** Base for relative profile paths */
  homeDir: string;
  /** XDG config home; fish is set up only if <configHome>/fish exists */
  configHome: string;
  /** POSIX profiles, relative to homeDir */
  profiles: string[];
  dialects: readonly Dialect[];
  /** Report what would change without touching any file */
  dryRun?: boolean;
}

export interface ShellSetupResult {
  /** Env files written next to the install */
  written: string[];
  /** Profiles whose managed block was added or replaced */
  updated: string[];
  /** Files that already had the right content */
  unchanged: string[];
  /** Configured dialects whose shell is not installed */
  skipped: Dialect[];
}

export type ShellTeardownOptions = Omit<ShellSetupOptions, "binDir" | "libDir" | "dialects" | "dryRun">;

export interface ShellTeardownResult {
  removed: string[];
}

export function fishConfPath(configHome: string): string {
  return path.join(configHome, "fish", "conf.d", FISH_CONF_FILE);
}

function profilePaths(homeDir: string, profiles: string[]): string[] {
  return profiles.map((profile) => path.resolve(homeDir, profile));
}

function readIfExists(file: string): string | null {
  return fs.existsSync(file) ? fs.readFileSync(file, "utf-8") : null;
}

async function ensureBlock(
  file: string,
  lines: string[],
  dryRun: boolean,
  result: ShellSetupResult,
): Promise<void> {
  const changed = dryRun
    ? !(await managedLinesMatch(file, lines))
    : await manageLinesInFile(file, lines, true);
  (changed ? result.updated : result.unchanged).push(file);
}

/**
 * Write the rendered env files into the install directory and hook them
 * into the user's shell profiles. Safe to run repeatedly.
 */
export async function setupShell(options: ShellSetupOptions): Promise<ShellSetupResult> {
  const { installDir, binDir, libDir, homeDir, configHome, profiles, dialects } = options;
  const dryRun = options.dryRun ?? false;
  const result: ShellSetupResult = { written: [], updated: [], unchanged: [], skipped: [] };

  if (!fs.existsSync(installDir)) {
    throw new ProfileError(
      installDir,
      `Install directory not found: ${installDir}`,
      undefined,
      "Install WasmEdge first, or pass --dir to point at an existing install",
    );
  }

  for (const dialect of dialects) {
    const envFile = path.join(installDir, envFileName(dialect));
    const content = renderFragment(dialect, { binDir, libDir });

    if (readIfExists(envFile) === content) {
      result.unchanged.push(envFile);
      continue;
    }
    if (!dryRun) {
      try {
        fs.writeFileSync(envFile, content, { encoding: "utf-8", mode: 0o644 });
      } catch (err) {
        throw new ProfileError(
          envFile,
          `Failed to write ${envFile}`,
          err instanceof Error ? err : undefined,
        );
      }
    }
    result.written.push(envFile);
  }

  if (dialects.includes("posix") && profiles.length > 0) {
    const line = sourceLine("posix", path.join(installDir, envFileName("posix")));
    const candidates = profilePaths(homeDir, profiles);
    const existing = candidates.filter((file) => fs.existsSync(file));
    // With no profile at all, create the first configured one
    const targets = existing.length > 0 ? existing : candidates.slice(0, 1);

    for (const profile of targets) {
      await ensureBlock(profile, [line], dryRun, result);
    }
  }

  const fishDir = path.join(configHome, "fish");
  if (dialects.includes("fish") && !fs.existsSync(fishDir)) {
    result.skipped.push("fish");
  } else if (dialects.includes("fish")) {
    const confFile = fishConfPath(configHome);
    const line = sourceLine("fish", path.join(installDir, envFileName("fish")));

    if (!dryRun) {
      fs.mkdirSync(path.dirname(confFile), { recursive: true });
    }
    await ensureBlock(confFile, [line], dryRun, result);
  }

  return result;
}

/**
 * Undo setupShell: remove the managed blocks from every configured profile
 * and the fish conf.d file, then delete the env files. Safe to run repeatedly.
 */
export async function teardownShell(options: ShellTeardownOptions): Promise<ShellTeardownResult> {
  const removed: string[] = [];

  const files = [...profilePaths(options.homeDir, options.profiles), fishConfPath(options.configHome)];
  for (const file of files) {
    if (await manageLinesInFile(file, [], false)) {
      removed.push(file);
    }
  }

  for (const dialect of DIALECTS) {
    const envFile = path.join(options.installDir, envFileName(dialect));
    if (fs.existsSync(envFile)) {
      fs.rmSync(envFile);
      removed.push(envFile);
    }
  }

  return { removed };
}
