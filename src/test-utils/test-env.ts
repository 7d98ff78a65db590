/**
 * Global test environment configuration.
 *
 * Provides isolated temp directories for tests and is initialized by
 * vitest.setup.ts before any tests run. HOME is redirected as well, so
 * shell profiles written by setup tests never touch the real ones.
 *
 * Usage:
 *   import { testEnv } from "../test-utils/test-env.js";
 *   const bashrc = path.join(testEnv.home, ".bashrc");
 */

import * as fs from "node:fs";
import * as path from "node:path";
import * as os from "node:os";
import {
  describe,
  it,
  expect,
  beforeEach,
  afterEach,
  vi,
} from "vitest";

export interface TestEnv {
  /** Base temp directory for all test isolation */
  tempBase: string;
  /** HOME equivalent */
  home: string;
  /** XDG_CONFIG_HOME equivalent */
  configHome: string;
  /** WASMEDGE_ENV_HOME equivalent */
  envHome: string;
  /** Path to the config.toml file */
  configPath: string;
}

const ISOLATED_VARIABLES = ["HOME", "XDG_CONFIG_HOME", "WASMEDGE_ENV_HOME"] as const;

let _testEnv: TestEnv | null = null;
let _originalEnv: Partial<Record<(typeof ISOLATED_VARIABLES)[number], string>> | null = null;

/**
 * Initialize the test environment. Called by vitest.setup.ts.
 * Creates temp directories and sets environment variables.
 */
export function initTestEnv(): TestEnv {
  if (_testEnv) {
    return _testEnv;
  }

  _originalEnv = {};
  for (const name of ISOLATED_VARIABLES) {
    _originalEnv[name] = process.env[name];
  }

  const tempBase = fs.mkdtempSync(path.join(os.tmpdir(), "wasmedge-env-test-"));
  const home = path.join(tempBase, "home");
  const configHome = path.join(home, ".config");
  const envHome = path.join(configHome, "wasmedge-env");

  fs.mkdirSync(envHome, { recursive: true });

  process.env.HOME = home;
  process.env.XDG_CONFIG_HOME = configHome;
  process.env.WASMEDGE_ENV_HOME = envHome;

  _testEnv = {
    tempBase,
    home,
    configHome,
    envHome,
    configPath: path.join(envHome, "config.toml"),
  };

  return _testEnv;
}

/**
 * Clean up the test environment. Called by vitest.setup.ts after all tests.
 */
export function cleanupTestEnv(): void {
  if (_originalEnv) {
    for (const name of ISOLATED_VARIABLES) {
      const original = _originalEnv[name];
      if (original !== undefined) {
        process.env[name] = original;
      } else {
        delete process.env[name];
      }
    }
    _originalEnv = null;
  }

  if (_testEnv) {
    fs.rmSync(_testEnv.tempBase, { recursive: true, force: true });
    _testEnv = null;
  }
}

/**
 * Remove everything tests wrote under the temp home, keeping the
 * directory layout initTestEnv created.
 */
export function resetTestHome(): void {
  const env = getTestEnv();
  fs.rmSync(env.home, { recursive: true, force: true });
  fs.mkdirSync(env.envHome, { recursive: true });
}

function getTestEnv(): TestEnv {
  if (!_testEnv) {
    throw new Error(
      "Test environment not initialized. This should be set up by vitest.setup.ts",
    );
  }
  return _testEnv;
}

/**
 * Convenience export for direct access to the test environment.
 */
export const testEnv: TestEnv = {
  get tempBase() {
    return getTestEnv().tempBase;
  },
  get home() {
    return getTestEnv().home;
  },
  get configHome() {
    return getTestEnv().configHome;
  },
  get envHome() {
    return getTestEnv().envHome;
  },
  get configPath() {
    return getTestEnv().configPath;
  },
};

// Re-export vitest utilities for convenience
export { describe, it, expect, beforeEach, afterEach, vi };
