/**
 * Shared test utilities for CLI command tests.
 */

import * as fs from "node:fs";
import * as path from "node:path";
import { vi, type MockInstance } from "vitest";
import { loadConfig, type Config } from "../core/config.js";
import { testEnv } from "../test-utils/test-env.js";
import type { CliOptions } from "./utils.js";

export interface CapturedOutput {
  stdout: string[];
  stderr: string[];
  restore: () => void;
}

export function captureOutput(): CapturedOutput {
  const stdout: string[] = [];
  const stderr: string[] = [];

  const originalLog = console.log;
  const originalError = console.error;

  console.log = (...args: unknown[]) => stdout.push(args.map(String).join(" "));
  console.error = (...args: unknown[]) =>
    stderr.push(args.map(String).join(" "));

  return {
    stdout,
    stderr,
    restore: () => {
      console.log = originalLog;
      console.error = originalError;
    },
  };
}

/**
 * Create an install directory with bin/ and lib/ under the test home.
 */
export function createInstallDir(name = ".wasmedge"): string {
  const installDir = path.join(testEnv.home, name);
  fs.mkdirSync(path.join(installDir, "bin"), { recursive: true });
  fs.mkdirSync(path.join(installDir, "lib"), { recursive: true });
  return installDir;
}

export interface CliTestFixture {
  options: CliOptions;
  output: CapturedOutput;
  mockExit: MockInstance<typeof process.exit>;
  cleanup: () => void;
}

export function createCliTestFixture(config: Config = loadConfig()): CliTestFixture {
  const output = captureOutput();
  const mockExit = vi.spyOn(process, "exit").mockImplementation((() => {
    throw new Error("process.exit called");
  }) as () => never);

  return {
    options: { config },
    output,
    mockExit,
    cleanup: () => {
      output.restore();
      mockExit.mockRestore();
    },
  };
}
