/**
 * Global test setup - ensures all tests run in isolation from the real environment.
 *
 * This file runs before any test file and:
 * - Redirects HOME to a temp directory (protects ~/.bashrc, ~/.profile, ...)
 * - Redirects XDG_CONFIG_HOME and WASMEDGE_ENV_HOME beneath it
 * - Cleans up temp directories after all tests complete
 */

import { beforeAll, afterAll } from "vitest";
import { initTestEnv, cleanupTestEnv } from "./src/test-utils/test-env.js";

beforeAll(() => {
  initTestEnv();
});

afterAll(() => {
  cleanupTestEnv();
});
