// test/core/config/config.spec.ts
// Tests for configuration system

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import {
  configFromEnv,
  configFromFile,
  configFromObject,
  loadConfig,
  mergeConfigs,
  validateConfig,
  DEFAULT_CONFIG,
} from "../../../src/core/config/config";

const KNOT_VARS = ["KNOT_TRACE", "KNOT_ENTRY", "KNOT_MAX_CALL_DEPTH"];

describe("configFromEnv", () => {
  const originalEnv = process.env;

  beforeEach(() => {
    // Create a fresh copy
    process.env = { ...originalEnv };
    for (const name of KNOT_VARS) delete process.env[name];
  });

  afterEach(() => {
    process.env = originalEnv;
  });

  it("returns defaults when no env vars set", () => {
    const config = configFromEnv();
    expect(config).toEqual(DEFAULT_CONFIG);
    expect(config.runtime.entry).toBe("main");
    expect(config.runtime.maxCallDepth).toBe(400);
    expect(config.parser.trace).toBe(false);
  });

  it("reads the trace flag", () => {
    process.env.KNOT_TRACE = "yes";
    expect(configFromEnv().parser.trace).toBe(true);
    process.env.KNOT_TRACE = "0";
    expect(configFromEnv().parser.trace).toBe(false);
  });

  it("reads runtime settings", () => {
    process.env.KNOT_ENTRY = "start";
    process.env.KNOT_MAX_CALL_DEPTH = "250";
    const config = configFromEnv();
    expect(config.runtime).toEqual({ entry: "start", maxCallDepth: 250 });
  });

  it("ignores a call depth that is not a number", () => {
    process.env.KNOT_MAX_CALL_DEPTH = "deep";
    expect(configFromEnv().runtime.maxCallDepth).toBe(400);
  });

  it("keeps a zero call depth so validation can reject it", () => {
    process.env.KNOT_MAX_CALL_DEPTH = "0";
    const config = configFromEnv();
    expect(config.runtime.maxCallDepth).toBe(0);
    expect(validateConfig(config).errors).toEqual(["maxCallDepth must be a positive integer"]);
  });

  it("honours a custom prefix", () => {
    process.env.LANG_TEST_ENTRY = "begin";
    expect(configFromEnv("LANG_TEST").runtime.entry).toBe("begin");
  });
});

describe("configFromObject", () => {
  it("parses basic config object", () => {
    const config = configFromObject({
      parser: { trace: true },
      runtime: { entry: "start", maxCallDepth: 64 },
    });
    expect(config).toEqual({ parser: { trace: true }, runtime: { entry: "start", maxCallDepth: 64 } });
  });

  it("handles snake_case keys", () => {
    expect(configFromObject({ runtime: { max_call_depth: 32 } }).runtime.maxCallDepth).toBe(32);
  });

  it("uses defaults for missing or mistyped fields", () => {
    const config = configFromObject({ parser: { trace: "sometimes" }, runtime: "fast" });
    expect(config).toEqual(DEFAULT_CONFIG);
  });
});

describe("mergeConfigs", () => {
  it("starts from the defaults", () => {
    expect(mergeConfigs()).toEqual(DEFAULT_CONFIG);
  });

  it("later configs override earlier ones", () => {
    const config = mergeConfigs(
      { runtime: { entry: "first", maxCallDepth: 10 } },
      { runtime: { entry: "second" } },
      { parser: { trace: true } }
    );
    expect(config).toEqual({ parser: { trace: true }, runtime: { entry: "second", maxCallDepth: 10 } });
  });

  it("does not modify the defaults", () => {
    mergeConfigs({ runtime: { maxCallDepth: 3 } });
    expect(DEFAULT_CONFIG.runtime.maxCallDepth).toBe(400);
  });
});

describe("configuration files", () => {
  const originalEnv = process.env;
  let dir: string;

  beforeEach(() => {
    process.env = { ...originalEnv };
    for (const name of KNOT_VARS) delete process.env[name];
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "knot-config-"));
  });

  afterEach(() => {
    process.env = originalEnv;
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("reads only the keys a JSON file sets", () => {
    const file = path.join(dir, "settings.json");
    fs.writeFileSync(file, JSON.stringify({ runtime: { entry: "start" } }));
    expect(configFromFile(file)).toEqual({ parser: {}, runtime: { entry: "start" } });
  });

  it("reads YAML files", () => {
    const file = path.join(dir, "settings.yaml");
    fs.writeFileSync(file, "parser:\n  trace: true\nruntime:\n  max_call_depth: 99\n");
    expect(configFromFile(file)).toEqual({ parser: { trace: true }, runtime: { maxCallDepth: 99 } });
  });

  it("rejects missing files and unknown formats", () => {
    const missing = path.join(dir, "absent.json");
    expect(() => configFromFile(missing)).toThrow(`Config file not found: ${missing}`);
    const toml = path.join(dir, "settings.toml");
    fs.writeFileSync(toml, "entry = 'main'\n");
    expect(() => configFromFile(toml)).toThrow("Unsupported config file format: .toml");
  });

  it("rejects a file that is not a mapping", () => {
    const file = path.join(dir, "list.yml");
    fs.writeFileSync(file, "- one\n- two\n");
    expect(() => configFromFile(file)).toThrow(`Config file must contain an object: ${file}`);
  });

  it("finds the default config file in the working directory", () => {
    fs.writeFileSync(path.join(dir, "knot.config.yaml"), "runtime:\n  entry: start\n");
    expect(loadConfig({ cwd: dir }).runtime.entry).toBe("start");
  });

  it("layers defaults, environment, file and overrides", () => {
    process.env.KNOT_TRACE = "1";
    process.env.KNOT_ENTRY = "fromEnv";
    const file = path.join(dir, "custom.json");
    fs.writeFileSync(file, JSON.stringify({ runtime: { entry: "fromFile", maxCallDepth: 80 } }));

    const config = loadConfig({ configFile: file, overrides: { runtime: { maxCallDepth: 10 } } });
    expect(config).toEqual({ parser: { trace: true }, runtime: { entry: "fromFile", maxCallDepth: 10 } });
  });

  it("uses the environment when there is no file", () => {
    process.env.KNOT_ENTRY = "fromEnv";
    expect(loadConfig({ cwd: dir }).runtime.entry).toBe("fromEnv");
  });
});

describe("validateConfig", () => {
  it("accepts the defaults", () => {
    expect(validateConfig(DEFAULT_CONFIG)).toEqual({ valid: true, errors: [], warnings: [] });
  });

  it("errors on an entry that is not an identifier", () => {
    const result = validateConfig(mergeConfigs({ runtime: { entry: "1abc" } }));
    expect(result.valid).toBe(false);
    expect(result.errors).toEqual(["entry must be an identifier, got '1abc'"]);
  });

  it("errors on a non-positive call depth", () => {
    const result = validateConfig(mergeConfigs({ runtime: { maxCallDepth: 0 } }));
    expect(result.errors).toEqual(["maxCallDepth must be a positive integer"]);
  });

  it("warns on a very deep call limit", () => {
    const result = validateConfig(mergeConfigs({ runtime: { maxCallDepth: 5000 } }));
    expect(result.valid).toBe(true);
    expect(result.warnings).toEqual([
      "maxCallDepth above 2000 may overflow the host stack before the limit is reached",
    ]);
  });
});
