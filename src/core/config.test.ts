import * as fs from "node:fs";
import * as path from "node:path";
import {
  DEFAULT_CONFIG_TOML,
  DEFAULT_PROFILES,
  expandHome,
  getConfigPath,
  getEnvHome,
  loadConfig,
  resolveInstallDirs,
} from "./config.js";
import { ConfigError } from "../errors.js";
import {
  describe,
  it,
  expect,
  afterEach,
  testEnv,
} from "../test-utils/test-env.js";

describe("Config", () => {
  describe("getConfigPath", () => {
    it("returns path within WASMEDGE_ENV_HOME", () => {
      expect(getConfigPath()).toBe(path.join(testEnv.envHome, "config.toml"));
    });

    it("uses XDG_CONFIG_HOME when WASMEDGE_ENV_HOME is not set", () => {
      const original = process.env.WASMEDGE_ENV_HOME;
      delete process.env.WASMEDGE_ENV_HOME;

      try {
        expect(getEnvHome()).toBe(path.join(testEnv.configHome, "wasmedge-env"));
      } finally {
        process.env.WASMEDGE_ENV_HOME = original;
      }
    });

    it("falls back to ~/.config", () => {
      const originalEnvHome = process.env.WASMEDGE_ENV_HOME;
      const originalXdg = process.env.XDG_CONFIG_HOME;
      delete process.env.WASMEDGE_ENV_HOME;
      delete process.env.XDG_CONFIG_HOME;

      try {
        expect(getEnvHome()).toBe(path.join(testEnv.home, ".config", "wasmedge-env"));
      } finally {
        process.env.WASMEDGE_ENV_HOME = originalEnvHome;
        process.env.XDG_CONFIG_HOME = originalXdg;
      }
    });
  });

  describe("expandHome", () => {
    it("expands a leading tilde", () => {
      expect(expandHome("~")).toBe(testEnv.home);
      expect(expandHome("~/.wasmedge")).toBe(path.join(testEnv.home, ".wasmedge"));
    });

    it("leaves other paths alone", () => {
      expect(expandHome("/opt/wasmedge")).toBe("/opt/wasmedge");
      expect(expandHome("~other/.wasmedge")).toBe("~other/.wasmedge");
    });
  });

  describe("loadConfig", () => {
    afterEach(() => {
      if (fs.existsSync(testEnv.configPath)) {
        fs.unlinkSync(testEnv.configPath);
      }
    });

    it("returns default config when file doesn't exist", () => {
      const config = loadConfig();

      expect(config.install.dir).toBe("~/.wasmedge");
      expect(config.install.bin_dir).toBeUndefined();
      expect(config.shell.dialects).toEqual(["posix", "fish"]);
      expect(config.shell.profiles).toEqual(DEFAULT_PROFILES);
    });

    it("loads install and shell settings", () => {
      fs.writeFileSync(
        testEnv.configPath,
        `[install]
dir = "/opt/wasmedge"
lib_dir = "/opt/wasmedge/lib64"

[shell]
dialects = ["fish"]
profiles = [".bashrc"]
`,
      );

      const config = loadConfig();

      expect(config.install).toEqual({ dir: "/opt/wasmedge", lib_dir: "/opt/wasmedge/lib64" });
      expect(config.shell).toEqual({ dialects: ["fish"], profiles: [".bashrc"] });
    });

    it("keeps defaults for sections the file leaves out", () => {
      fs.writeFileSync(testEnv.configPath, `[shell]\nprofiles = [".zshenv"]\n`);

      const config = loadConfig();

      expect(config.install.dir).toBe("~/.wasmedge");
      expect(config.shell.dialects).toEqual(["posix", "fish"]);
      expect(config.shell.profiles).toEqual([".zshenv"]);
    });

    it("reads a custom config path", () => {
      const customPath = path.join(testEnv.tempBase, "custom.toml");
      fs.writeFileSync(customPath, `[install]\ndir = "/srv/wasmedge"\n`);

      try {
        expect(loadConfig({ configPath: customPath }).install.dir).toBe("/srv/wasmedge");
      } finally {
        fs.unlinkSync(customPath);
      }
    });

    it("parses the default config file", () => {
      fs.writeFileSync(testEnv.configPath, DEFAULT_CONFIG_TOML);

      const config = loadConfig();

      expect(config.install).toEqual({ dir: "~/.wasmedge" });
      expect(config.shell.dialects).toEqual(["posix", "fish"]);
      expect(config.shell.profiles).toEqual(DEFAULT_PROFILES);
    });

    it("throws ConfigError on malformed TOML", () => {
      fs.writeFileSync(testEnv.configPath, "invalid toml [[[");

      expect(() => loadConfig()).toThrow(ConfigError);
      expect(() => loadConfig()).toThrow(`Invalid config file at ${testEnv.configPath}`);
    });

    it("throws ConfigError naming the bad key", () => {
      fs.writeFileSync(testEnv.configPath, `[shell]\ndialects = ["tcsh"]\n`);

      expect(() => loadConfig()).toThrow("shell.dialects.0");
    });

    it("rejects unknown install keys", () => {
      fs.writeFileSync(testEnv.configPath, `[install]\ndirectory = "/opt/wasmedge"\n`);

      expect(() => loadConfig()).toThrow(ConfigError);
    });

    it("rejects a misspelled section", () => {
      fs.writeFileSync(testEnv.configPath, `[instal]\ndir = "/opt/wasmedge"\n`);

      expect(() => loadConfig()).toThrow(ConfigError);
      expect(() => loadConfig()).toThrow("Unrecognized key(s) in object: 'instal'");
    });
  });

  describe("resolveInstallDirs", () => {
    it("derives bin and lib from the install dir", () => {
      const dirs = resolveInstallDirs(loadConfig());

      const installDir = path.join(testEnv.home, ".wasmedge");
      expect(dirs).toEqual({
        installDir,
        binDir: path.join(installDir, "bin"),
        libDir: path.join(installDir, "lib"),
      });
    });

    it("honors configured bin and lib directories", () => {
      const config = loadConfig();
      config.install = { dir: "/opt/wasmedge", bin_dir: "/usr/local/bin", lib_dir: "~/lib" };

      expect(resolveInstallDirs(config)).toEqual({
        installDir: "/opt/wasmedge",
        binDir: "/usr/local/bin",
        libDir: path.join(testEnv.home, "lib"),
      });
    });

    it("ignores configured bin and lib directories for an explicit install dir", () => {
      const config = loadConfig();
      config.install = { dir: "/opt/wasmedge", bin_dir: "/usr/local/bin" };

      expect(resolveInstallDirs(config, "/srv/wasmedge")).toEqual({
        installDir: "/srv/wasmedge",
        binDir: "/srv/wasmedge/bin",
        libDir: "/srv/wasmedge/lib",
      });
    });
  });
});
