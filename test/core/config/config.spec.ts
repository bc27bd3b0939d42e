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
  mergeConfigs,
  loadConfig,
  validateConfig,
  resolveConfig,
  DEFAULT_CONFIG,
} from "../../../src/core/config/config";
import { isFail } from "../../../src/outcome/outcome";
import { unwrap } from "../../../src/outcome/matchers";

describe("configFromEnv", () => {
  it("returns defaults when no env vars set", () => {
    expect(configFromEnv("TAPEWORM", {})).toEqual(DEFAULT_CONFIG);
  });

  it("reads engine and native settings", () => {
    const config = configFromEnv("TAPEWORM", {
      TAPEWORM_TAPE_SIZE: "100",
      TAPEWORM_INPUT_MAX: "64",
      TAPEWORM_EOF: "unchanged",
      TAPEWORM_EXTENDED: "0",
      TAPEWORM_DEBUG: "true",
      TAPEWORM_INLINE_INPUT: "yes",
      TAPEWORM_CC: "clang",
      TAPEWORM_CFLAGS: "-O2",
    });
    expect(config).toEqual({
      engine: {
        tapeSize: 100,
        inputMax: 64,
        eofBehavior: "unchanged",
        extendedInstructions: false,
        debug: true,
        repl: false,
        inlineInput: true,
      },
      native: { compiler: "clang", flags: "-O2" },
    });
  });

  it("falls back to defaults for values it cannot parse", () => {
    const config = configFromEnv("TAPEWORM", {
      TAPEWORM_TAPE_SIZE: "lots",
      TAPEWORM_EOF: "explode",
      TAPEWORM_DEBUG: "maybe",
    });
    expect(config.engine.tapeSize).toBe(30000);
    expect(config.engine.eofBehavior).toBe("zero");
    expect(config.engine.debug).toBe(false);
  });

  it("honours a custom prefix", () => {
    expect(configFromEnv("BF", { BF_TAPE_SIZE: "9" }).engine.tapeSize).toBe(9);
  });
});

describe("configFromObject", () => {
  it("parses camelCase keys", () => {
    const overrides = configFromObject({
      engine: { tapeSize: 500, eofBehavior: "decrement" },
      native: { compiler: "tcc" },
    });
    expect(overrides).toEqual({
      engine: { tapeSize: 500, eofBehavior: "decrement" },
      native: { compiler: "tcc" },
    });
  });

  it("accepts snake_case keys", () => {
    const overrides = configFromObject({ engine: { tape_size: 10, extended_instructions: false, inline_input: true } });
    expect(overrides.engine).toEqual({ tapeSize: 10, extendedInstructions: false, inlineInput: true });
  });

  it("drops values of the wrong type", () => {
    const overrides = configFromObject({ engine: { tapeSize: "big", eofBehavior: "explode" }, native: "gcc" });
    expect(overrides).toEqual({ engine: {}, native: {} });
  });
});

describe("mergeConfigs", () => {
  it("applies overrides in order", () => {
    const merged = mergeConfigs(
      DEFAULT_CONFIG,
      { engine: { tapeSize: 10, debug: true } },
      { engine: { tapeSize: 20 }, native: { flags: "" } }
    );
    expect(merged.engine.tapeSize).toBe(20);
    expect(merged.engine.debug).toBe(true);
    expect(merged.native).toEqual({ compiler: "gcc", flags: "" });
  });

  it("does not mutate the base config", () => {
    mergeConfigs(DEFAULT_CONFIG, { engine: { tapeSize: 1 } });
    expect(DEFAULT_CONFIG.engine.tapeSize).toBe(30000);
  });
});

describe("config files", () => {
  let dir: string;
  const originalEnv = process.env;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "tapeworm-config-"));
    process.env = { ...originalEnv };
    for (const key of Object.keys(process.env)) {
      if (key.startsWith("TAPEWORM_")) delete process.env[key];
    }
  });

  afterEach(() => {
    process.env = originalEnv;
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("reads JSON", () => {
    const file = path.join(dir, "bf.json");
    fs.writeFileSync(file, JSON.stringify({ engine: { tapeSize: 64 } }));
    expect(configFromFile(file)).toEqual({ engine: { tapeSize: 64 }, native: {} });
  });

  it("reads simple YAML", () => {
    const file = path.join(dir, "bf.yaml");
    fs.writeFileSync(
      file,
      ["# tapeworm", "engine:", "  tape_size: 64", "  eof_behavior: decrement", "native:", "  compiler: clang", ""].join("\n")
    );
    expect(configFromFile(file)).toEqual({
      engine: { tapeSize: 64, eofBehavior: "decrement" },
      native: { compiler: "clang" },
    });
  });

  it("rejects missing files and unknown formats", () => {
    expect(() => configFromFile(path.join(dir, "nope.json"))).toThrow("Config file not found");
    const toml = path.join(dir, "bf.toml");
    fs.writeFileSync(toml, "");
    expect(() => configFromFile(toml)).toThrow("Unsupported config file format: .toml");
  });

  it("finds a config file in the working directory", () => {
    fs.writeFileSync(path.join(dir, "tapeworm.config.json"), JSON.stringify({ engine: { tapeSize: 77 } }));
    const config = loadConfig({ cwd: dir });
    expect(config.engine.tapeSize).toBe(77);
  });

  it("resolves a valid configuration with its warnings", () => {
    const resolved = unwrap(resolveConfig({ cwd: dir, overrides: { engine: { tapeSize: 2_000_000 } } }));
    expect(resolved.config.engine.tapeSize).toBe(2_000_000);
    expect(resolved.warnings).toEqual(["tapeSize 2000000 is very large; the tape is allocated up front"]);
  });

  it("fails with invalid-config when validation fails", () => {
    const outcome = resolveConfig({ cwd: dir, overrides: { engine: { tapeSize: 0, inputMax: 0 } } });
    if (!isFail(outcome)) throw new Error("expected failure");
    expect(outcome.failure.reason).toBe("invalid-config");
    expect(outcome.failure.message).toBe("Invalid configuration: tapeSize must be a positive integer");
    expect(outcome.failure.diagnostics.map((d) => d.message)).toEqual([
      "Invalid configuration: tapeSize must be a positive integer",
      "Invalid configuration: inputMax must be a positive integer",
    ]);
    expect(outcome.failure.diagnostics.map((d) => d.code)).toEqual(["E0400", "E0400"]);
  });

  it("fails with invalid-config when the config file cannot be loaded", () => {
    const broken = path.join(dir, "broken.json");
    fs.writeFileSync(broken, "{ not json");
    const outcome = resolveConfig({ configFile: broken });
    if (!isFail(outcome)) throw new Error("expected failure");
    expect(outcome.failure.reason).toBe("invalid-config");
    expect(outcome.failure.diagnostics[0].code).toBe("E0400");
    expect(outcome.failure.diagnostics[0].message.startsWith("Invalid configuration: ")).toBe(true);
  });

  it("lets overrides win over file and environment", () => {
    process.env.TAPEWORM_EOF = "decrement";
    process.env.TAPEWORM_TAPE_SIZE = "5";
    const file = path.join(dir, "custom.json");
    fs.writeFileSync(file, JSON.stringify({ engine: { tapeSize: 77 } }));

    const config = loadConfig({ configFile: file, overrides: { engine: { tapeSize: 3 } } });
    expect(config.engine.tapeSize).toBe(3);
    expect(config.engine.eofBehavior).toBe("decrement");
  });
});

describe("validateConfig", () => {
  it("accepts the defaults", () => {
    expect(validateConfig(DEFAULT_CONFIG)).toEqual({ valid: true, errors: [], warnings: [] });
  });

  it("rejects non-positive sizes and an empty compiler", () => {
    const result = validateConfig(
      mergeConfigs(DEFAULT_CONFIG, { engine: { tapeSize: 0, inputMax: -1 }, native: { compiler: "  " } })
    );
    expect(result.valid).toBe(false);
    expect(result.errors).toEqual([
      "tapeSize must be a positive integer",
      "inputMax must be a positive integer",
      "native.compiler must not be empty",
    ]);
  });

  it("warns about very large tapes", () => {
    const result = validateConfig(mergeConfigs(DEFAULT_CONFIG, { engine: { tapeSize: 2_000_000 } }));
    expect(result.valid).toBe(true);
    expect(result.warnings).toEqual(["tapeSize 2000000 is very large; the tape is allocated up front"]);
  });
});
