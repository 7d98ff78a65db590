import * as fs from "node:fs";
import * as path from "node:path";
import { runCli } from "./index.js";
import {
  createCliTestFixture,
  createInstallDir,
  type CliTestFixture,
} from "./test-helpers.js";
import { START_LINE } from "../core/managed-block.js";
import {
  describe,
  it,
  expect,
  beforeEach,
  afterEach,
  resetTestHome,
  testEnv,
} from "../test-utils/test-env.js";

describe("setup and teardown commands", () => {
  let fixture: CliTestFixture;
  let installDir: string;

  beforeEach(() => {
    installDir = createInstallDir();
    fixture = createCliTestFixture();
  });

  afterEach(() => {
    fixture.cleanup();
    resetTestHome();
  });

  function getStdout(): string {
    return fixture.output.stdout.join("\n");
  }

  describe("setup", () => {
    it("writes env files and hooks the shell profile", async () => {
      fs.writeFileSync(path.join(testEnv.home, ".bashrc"), "alias ll='ls -l'\n");

      await runCli(["setup"], fixture.options);

      expect(fixture.output.stdout.slice(0, 3)).toEqual([
        "✓ Wrote ~/.wasmedge/env",
        "✓ Wrote ~/.wasmedge/env.fish",
        "✓ Updated ~/.bashrc",
      ]);
      expect(getStdout()).toContain(
        `Restart your shell or run '. "${path.join(installDir, "env")}"' to use WasmEdge now.`,
      );
      expect(fs.readFileSync(path.join(testEnv.home, ".bashrc"), "utf-8")).toContain(
        `. "${path.join(installDir, "env")}"`,
      );
    });

    it("reports when nothing needs to change", async () => {
      await runCli(["setup"], fixture.options);
      fixture.output.stdout.length = 0;

      await runCli(["setup"], fixture.options);

      expect(fixture.output.stdout).toEqual([
        "· Unchanged ~/.wasmedge/env",
        "· Unchanged ~/.wasmedge/env.fish",
        "· Unchanged ~/.profile",
        "Shell setup is already up to date.",
      ]);
    });

    it("writes nothing with --dry-run", async () => {
      await runCli(["setup", "--dry-run"], fixture.options);

      expect(fixture.output.stdout).toEqual([
        "✓ Would write ~/.wasmedge/env",
        "✓ Would write ~/.wasmedge/env.fish",
        "✓ Would update ~/.profile",
      ]);
      expect(fs.existsSync(path.join(installDir, "env"))).toBe(false);
      expect(fs.existsSync(path.join(testEnv.home, ".profile"))).toBe(false);
    });

    it("warns when fish is configured but not installed", async () => {
      await runCli(["setup"], fixture.options);

      expect(fixture.output.stderr).toEqual(["! Skipped fish: ~/.config/fish not found"]);
    });

    it("does not warn about fish once its config directory exists", async () => {
      fs.mkdirSync(path.join(testEnv.configHome, "fish"), { recursive: true });

      await runCli(["setup"], fixture.options);

      expect(fixture.output.stderr).toEqual([]);
      expect(fixture.output.stdout).toContain("✓ Updated ~/.config/fish/conf.d/wasmedge.fish");
    });

    it("sets up an install given with --dir", async () => {
      const otherInstall = createInstallDir("wasmedge-0.14");

      await runCli(["setup", "--dir", otherInstall], fixture.options);

      expect(fs.existsSync(path.join(otherInstall, "env"))).toBe(true);
      expect(fs.existsSync(path.join(installDir, "env"))).toBe(false);
    });

    it("fails for a missing install directory", async () => {
      await expect(
        runCli(["setup", "--dir", path.join(testEnv.home, "missing")], fixture.options),
      ).rejects.toThrow("process.exit");

      const err = fixture.output.stderr.join("\n");
      expect(err).toContain("Error: Install directory not found");
      expect(err).toContain("Hint: Install WasmEdge first");
    });

    it("fails on a profile with a broken managed block", async () => {
      fs.writeFileSync(path.join(testEnv.home, ".profile"), `${START_LINE}\n`);

      await expect(runCli(["setup"], fixture.options)).rejects.toThrow("process.exit");
      expect(fixture.output.stderr.join("\n")).toContain(
        "Only one of the wasmedge-env marker lines is present",
      );
    });
  });

  describe("teardown", () => {
    it("removes what setup added", async () => {
      fs.writeFileSync(path.join(testEnv.home, ".bashrc"), "alias ll='ls -l'\n");
      await runCli(["setup"], fixture.options);
      fixture.output.stdout.length = 0;

      await runCli(["teardown"], fixture.options);

      expect(fixture.output.stdout).toEqual([
        "✓ Cleaned ~/.bashrc",
        "✓ Cleaned ~/.wasmedge/env",
        "✓ Cleaned ~/.wasmedge/env.fish",
        "Removed wasmedge-env from 3 files.",
      ]);
      expect(fs.readFileSync(path.join(testEnv.home, ".bashrc"), "utf-8")).toBe(
        "alias ll='ls -l'\n",
      );
    });

    it("reports when there is nothing to remove", async () => {
      await runCli(["uninstall"], fixture.options);

      expect(fixture.output.stdout).toEqual(["Nothing to remove."]);
    });
  });
});
