/**
 * Configuration loading tests
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import {
  DEFAULT_CONFIG,
  expandPath,
  getProjectConfigPath,
  loadConfig,
  loadConfigFile,
  mergeConfigs,
  parseConfigContent,
} from "../src/utils/config.js";
import { CliError } from "../src/errors.js";

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  return undefined;
}

describe("parseConfigContent", () => {
  it("reads every known key from YAML", () => {
    const config = parseConfigContent(
      [
        "dataDir: ./logs",
        "outputDir: ./tables",
        "grammar: iter-v1",
        "logExtensions: [.txt, .log]",
        "configExtensions: [.ini]",
        "bucketWidth: 5000",
        "successThreshold: 80",
        "logLevel: warn",
        "color: false",
      ].join("\n"),
      "test"
    );

    expect(config).toEqual({
      dataDir: "./logs",
      outputDir: "./tables",
      grammar: "iter-v1",
      logExtensions: [".txt", ".log"],
      configExtensions: [".ini"],
      bucketWidth: 5000,
      successThreshold: 80,
      logLevel: "warn",
      color: false,
    });
  });

  it("accepts JSON content", () => {
    expect(parseConfigContent('{"dataDir": "runs"}', "test").dataDir).toBe("runs");
  });

  it("treats an empty file as no settings", () => {
    expect(mergeConfigs(parseConfigContent("", "test"))).toEqual({});
  });

  it("rejects a value of the wrong type", () => {
    const err = captureError(() => parseConfigContent("bucketWidth: wide", "test"));

    expect(err).toBeInstanceOf(CliError);
    if (err instanceof CliError) {
      expect(err.message).toBe("'bucketWidth' must be a number in test");
      expect(err.code).toBe("CONFIG_ERROR");
      expect(err.exitCode).toBe(3);
    }
  });

  it("rejects a bucket width that is not positive", () => {
    for (const content of ["bucketWidth: 0", "bucketWidth: -10"]) {
      const err = captureError(() => parseConfigContent(content, "test"));

      expect(err).toBeInstanceOf(CliError);
      if (err instanceof CliError) {
        expect(err.message).toBe("'bucketWidth' must be a positive number in test");
        expect(err.code).toBe("CONFIG_ERROR");
        expect(err.exitCode).toBe(3);
      }
    }
  });

  it("rejects an unknown log level", () => {
    expect(() => parseConfigContent("logLevel: loud", "test")).toThrow(
      "'logLevel' must be one of debug, info, warn, error in test"
    );
  });

  it("rejects a list of non-strings", () => {
    expect(() => parseConfigContent("logExtensions: [1, 2]", "test")).toThrow(
      "'logExtensions' must be a list of strings in test"
    );
  });

  it("rejects content that is not a mapping", () => {
    expect(() => parseConfigContent("- a\n- b", "test")).toThrow("Configuration must be an object in test");
  });

  it("reports YAML syntax errors", () => {
    expect(() => parseConfigContent("dataDir: [", "test")).toThrow(/^Invalid configuration syntax in test: /);
  });
});

describe("mergeConfigs", () => {
  it("lets later configs win and skips undefined values", () => {
    expect(
      mergeConfigs(
        { dataDir: "a", outputDir: "b", bucketWidth: 10 },
        undefined,
        { dataDir: "c", outputDir: undefined },
        { bucketWidth: 20 }
      )
    ).toEqual({ dataDir: "c", outputDir: "b", bucketWidth: 20 });
  });
});

describe("expandPath", () => {
  it("expands a leading tilde", () => {
    expect(expandPath("~/runs", "/home/test")).toBe(path.join("/home/test", "runs"));
    expect(expandPath("~", "/home/test")).toBe("/home/test");
    expect(expandPath("runs/~", "/home/test")).toBe("runs/~");
  });
});

describe("loadConfig", () => {
  let tempDir: string;
  let homeDir: string;
  let projectDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "trainlog-config-"));
    homeDir = path.join(tempDir, "home");
    projectDir = path.join(tempDir, "project");
    fs.mkdirSync(homeDir);
    fs.mkdirSync(path.join(projectDir, "nested"), { recursive: true });
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it("returns the defaults when no config exists", async () => {
    const config = await loadConfig({ homeDir, cwd: projectDir, env: {} });

    expect(config).toEqual(DEFAULT_CONFIG);
  });

  it("layers global, project and environment settings", async () => {
    fs.writeFileSync(path.join(homeDir, ".trainlogrc"), "dataDir: ~/runs\nbucketWidth: 500\n");
    fs.writeFileSync(path.join(projectDir, ".trainlogrc"), "bucketWidth: 2000\nsuccessThreshold: 50\n");

    const config = await loadConfig({
      homeDir,
      cwd: path.join(projectDir, "nested"),
      env: { TRAINLOG_OUTPUT_DIR: "/srv/tables", TRAINLOG_LOG_LEVEL: "DEBUG", NO_COLOR: "1" },
    });

    expect(config).toEqual({
      ...DEFAULT_CONFIG,
      dataDir: path.join(homeDir, "runs"),
      outputDir: "/srv/tables",
      bucketWidth: 2000,
      successThreshold: 50,
      logLevel: "debug",
      color: false,
    });
  });

  it("prefers an explicit config file over the project search", async () => {
    fs.writeFileSync(path.join(projectDir, ".trainlogrc"), "grammar: from-project\n");
    const explicit = path.join(tempDir, "custom.yaml");
    fs.writeFileSync(explicit, "grammar: from-flag\n");

    const config = await loadConfig({ homeDir, cwd: projectDir, configPath: explicit, env: {} });

    expect(config.grammar).toBe("from-flag");
  });

  it("fails when the explicit config file is missing", async () => {
    const missing = path.join(tempDir, "missing.yaml");

    await expect(loadConfig({ homeDir, configPath: missing, env: {} })).rejects.toThrow(
      `Configuration file not found: ${missing}`
    );
  });

  it("ignores an unknown environment log level", async () => {
    const config = await loadConfig({ homeDir, cwd: projectDir, env: { TRAINLOG_LOG_LEVEL: "loud" } });

    expect(config.logLevel).toBe("info");
  });
});

describe("getProjectConfigPath", () => {
  it("finds the nearest rc file walking upward", () => {
    const tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "trainlog-rc-"));
    try {
      const nested = path.join(tempDir, "a", "b");
      fs.mkdirSync(nested, { recursive: true });
      fs.writeFileSync(path.join(tempDir, "a", ".trainlogrc"), "dataDir: x\n");

      expect(getProjectConfigPath(nested)).toBe(path.join(tempDir, "a", ".trainlogrc"));
    } finally {
      fs.rmSync(tempDir, { recursive: true, force: true });
    }
  });
});

describe("loadConfigFile", () => {
  it("returns undefined for a missing file", async () => {
    expect(await loadConfigFile(path.join(os.tmpdir(), "trainlog-no-such-rc"))).toBeUndefined();
  });
});
