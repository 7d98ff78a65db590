import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { runCli } from "./index.js";
import { createCliTestFixture, type CliTestFixture } from "./test-helpers.js";

describe("register command", () => {
  let fixture: CliTestFixture;
  let originalLibraryPath: string | undefined;

  beforeEach(() => {
    fixture = createCliTestFixture();
    originalLibraryPath = process.env.LD_LIBRARY_PATH;
  });

  afterEach(() => {
    fixture.cleanup();
    if (originalLibraryPath === undefined) {
      delete process.env.LD_LIBRARY_PATH;
    } else {
      process.env.LD_LIBRARY_PATH = originalLibraryPath;
    }
  });

  it("prepends a directory to an explicit value", async () => {
    await runCli(
      ["register", "/opt/wasmedge/bin", "--value", "/usr/bin", "--delimiter", ":"],
      fixture.options,
    );

    expect(fixture.output.stdout).toEqual(["/opt/wasmedge/bin:/usr/bin"]);
  });

  it("leaves a value that already holds the directory unchanged", async () => {
    await runCli(
      ["register", "/opt/wasmedge/bin", "--value", "/opt/wasmedge/bin:/usr/bin", "-d", ":"],
      fixture.options,
    );

    expect(fixture.output.stdout).toEqual(["/opt/wasmedge/bin:/usr/bin"]);
  });

  it("treats an explicit empty value as an empty list", async () => {
    await runCli(["register", "/opt/wasmedge/bin", "--value="], fixture.options);

    expect(fixture.output.stdout).toEqual(["/opt/wasmedge/bin"]);
  });

  it("reads the named variable from the environment", async () => {
    process.env.LD_LIBRARY_PATH = "/usr/lib";

    await runCli(
      ["register", "/opt/wasmedge/lib", "--var", "LD_LIBRARY_PATH", "--delimiter=:"],
      fixture.options,
    );

    expect(fixture.output.stdout).toEqual(["/opt/wasmedge/lib:/usr/lib"]);
  });

  it("treats an unset variable as empty", async () => {
    delete process.env.LD_LIBRARY_PATH;

    await runCli(
      ["register", "/opt/wasmedge/lib", "--var", "LD_LIBRARY_PATH"],
      fixture.options,
    );

    expect(fixture.output.stdout).toEqual(["/opt/wasmedge/lib"]);
  });

  it("requires a directory", async () => {
    await expect(runCli(["register"], fixture.options)).rejects.toThrow("process.exit");
    expect(fixture.output.stderr[0]).toBe("Error: Directory is required");
  });

  it("suggests a close flag for a typo", async () => {
    await expect(
      runCli(["register", "/opt/wasmedge/bin", "--vaule", "/usr/bin"], fixture.options),
    ).rejects.toThrow("process.exit");

    const err = fixture.output.stderr.join("\n");
    expect(err).toContain("Unknown option: --vaule");
    expect(err).toContain('Did you mean "--value"?');
  });

  it("displays help with --help", async () => {
    await runCli(["register", "--help"], fixture.options);

    const out = fixture.output.stdout.join("\n");
    expect(out).toContain("wasmedge-env register");
    expect(out).toContain("USAGE");
  });
});
