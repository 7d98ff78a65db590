import * as fs from "node:fs";
import * as path from "node:path";
import { createCliOptions, parseGlobalOptions } from "../src/bootstrap.js";
import { ConfigError } from "../src/errors.js";
import { describe, it, expect, testEnv } from "../src/test-utils/test-env.js";

describe("parseGlobalOptions", () => {
  it("extracts --config in both forms", () => {
    expect(parseGlobalOptions(["--config", "/tmp/a.toml", "setup"])).toEqual({
      configPath: "/tmp/a.toml",
      filteredArgs: ["setup"],
    });
    expect(parseGlobalOptions(["env", "--config=/tmp/b.toml", "--shell", "fish"])).toEqual({
      configPath: "/tmp/b.toml",
      filteredArgs: ["env", "--shell", "fish"],
    });
  });

  it("passes everything else through", () => {
    expect(parseGlobalOptions(["register", "/opt/w/bin"])).toEqual({
      configPath: undefined,
      filteredArgs: ["register", "/opt/w/bin"],
    });
  });
});

describe("createCliOptions", () => {
  it("loads the given config file", () => {
    const configPath = path.join(testEnv.tempBase, "bootstrap.toml");
    fs.writeFileSync(configPath, `[install]\ndir = "/opt/wasmedge"\n`);

    try {
      const options = createCliOptions(configPath);
      expect(options.configPath).toBe(configPath);
      expect(options.config.install.dir).toBe("/opt/wasmedge");
    } finally {
      fs.unlinkSync(configPath);
    }
  });

  it("surfaces config errors", () => {
    const configPath = path.join(testEnv.tempBase, "broken.toml");
    fs.writeFileSync(configPath, `[shell]\nprofiles = "not-a-list"\n`);

    try {
      expect(() => createCliOptions(configPath)).toThrow(ConfigError);
    } finally {
      fs.unlinkSync(configPath);
    }
  });
});
