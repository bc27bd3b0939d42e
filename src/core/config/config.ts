// src/core/config/config.ts
// Configuration system for tapeworm
// Priority: CLI overrides > config file > environment > defaults

import * as fs from "fs";
import * as path from "path";

import { describeError } from "../errors";
import { makeDiagnostic } from "../../outcome/codes";
import { failure, type Failure } from "../../outcome/failure";
import type { Outcome } from "../../outcome/outcome";
import { done, fail } from "../../outcome/constructors";

// =========================================================================
// Configuration Types
// =========================================================================

export const EOF_BEHAVIORS = ["zero", "decrement", "unchanged"] as const;

/** What ',' does once the input source is exhausted. */
export type EofBehavior = (typeof EOF_BEHAVIORS)[number];

export type EngineConfig = {
  /** Number of cells on the tape */
  tapeSize: number;
  /** Initial capacity of the REPL source buffer; it doubles from here */
  inputMax: number;
  eofBehavior: EofBehavior;
  /** Enables '#' (debug dump) and '@' (REPL reset) */
  extendedInstructions: boolean;
  debug: boolean;
  repl: boolean;
  /** Program input follows the first '!' in the source file */
  inlineInput: boolean;
};

export type NativeConfig = {
  /** C compiler executable */
  compiler: string;
  /** Flags passed before `-o <output> <source>` */
  flags: string;
};

export type TapewormConfig = {
  engine: EngineConfig;
  native: NativeConfig;
};

export type ConfigOverrides = {
  engine?: Partial<EngineConfig>;
  native?: Partial<NativeConfig>;
};

// =========================================================================
// Default Configuration
// =========================================================================

export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
  tapeSize: 30_000,
  inputMax: 1024,
  eofBehavior: "zero",
  extendedInstructions: true,
  debug: false,
  repl: false,
  inlineInput: false,
};

export const DEFAULT_NATIVE_CONFIG: NativeConfig = {
  compiler: "gcc",
  flags: "-O3 -s -ffast-math",
};

export const DEFAULT_CONFIG: TapewormConfig = {
  engine: DEFAULT_ENGINE_CONFIG,
  native: DEFAULT_NATIVE_CONFIG,
};

export const DEFAULT_CONFIG_FILES = ["tapeworm.config.json", "tapeworm.config.yaml", "tapeworm.config.yml"];

const MAX_SENSIBLE_TAPE = 1 << 20;

// =========================================================================
// Value Coercion
// =========================================================================

export function isEofBehavior(value: unknown): value is EofBehavior {
  return EOF_BEHAVIORS.some((b) => b === value);
}

function parseBool(raw: string | undefined): boolean | undefined {
  if (raw === undefined || raw === "") return undefined;
  const v = raw.trim().toLowerCase();
  if (v === "1" || v === "true" || v === "yes" || v === "on") return true;
  if (v === "0" || v === "false" || v === "no" || v === "off") return false;
  return undefined;
}

function parseIntOr(raw: string | undefined, fallback: number): number {
  const n = parseInt(raw || "", 10);
  return Number.isNaN(n) ? fallback : n;
}

function pick(data: Record<string, unknown>, camel: string, snake: string): unknown {
  return data[camel] ?? data[snake];
}

function numberField(data: Record<string, unknown>, camel: string, snake: string): number | undefined {
  const v = pick(data, camel, snake);
  return typeof v === "number" ? v : undefined;
}

function boolField(data: Record<string, unknown>, camel: string, snake: string): boolean | undefined {
  const v = pick(data, camel, snake);
  return typeof v === "boolean" ? v : undefined;
}

function stringField(data: Record<string, unknown>, camel: string, snake: string): string | undefined {
  const v = pick(data, camel, snake);
  return typeof v === "string" ? v : undefined;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function section(data: Record<string, unknown>, key: string): Record<string, unknown> {
  const v = data[key];
  return isRecord(v) ? v : {};
}

// =========================================================================
// Configuration Loading
// =========================================================================

/**
 * Load configuration from environment variables.
 * Unparseable values fall back to the defaults.
 */
export function configFromEnv(prefix = "TAPEWORM", env: NodeJS.ProcessEnv = process.env): TapewormConfig {
  const eof = env[`${prefix}_EOF`];

  return {
    engine: {
      tapeSize: parseIntOr(env[`${prefix}_TAPE_SIZE`], DEFAULT_ENGINE_CONFIG.tapeSize),
      inputMax: parseIntOr(env[`${prefix}_INPUT_MAX`], DEFAULT_ENGINE_CONFIG.inputMax),
      eofBehavior: isEofBehavior(eof) ? eof : DEFAULT_ENGINE_CONFIG.eofBehavior,
      extendedInstructions: parseBool(env[`${prefix}_EXTENDED`]) ?? DEFAULT_ENGINE_CONFIG.extendedInstructions,
      debug: parseBool(env[`${prefix}_DEBUG`]) ?? DEFAULT_ENGINE_CONFIG.debug,
      repl: DEFAULT_ENGINE_CONFIG.repl,
      inlineInput: parseBool(env[`${prefix}_INLINE_INPUT`]) ?? DEFAULT_ENGINE_CONFIG.inlineInput,
    },
    native: {
      compiler: env[`${prefix}_CC`] || DEFAULT_NATIVE_CONFIG.compiler,
      flags: env[`${prefix}_CFLAGS`] ?? DEFAULT_NATIVE_CONFIG.flags,
    },
  };
}

/**
 * Load configuration overrides from a JSON or YAML file.
 * Only keys present in the file are returned.
 */
export function configFromFile(filePath: string): ConfigOverrides {
  if (!fs.existsSync(filePath)) {
    throw new Error(`Config file not found: ${filePath}`);
  }

  const content = fs.readFileSync(filePath, "utf8");
  const ext = path.extname(filePath).toLowerCase();

  let data: unknown;

  if (ext === ".json") {
    data = JSON.parse(content);
  } else if (ext === ".yaml" || ext === ".yml") {
    // Simple YAML parser for basic configs
    data = parseSimpleYaml(content);
  } else {
    throw new Error(`Unsupported config file format: ${ext}`);
  }

  if (!isRecord(data)) {
    throw new Error(`Config file must contain an object: ${filePath}`);
  }
  return configFromObject(data);
}

/**
 * Create configuration overrides from a plain object (e.g., from parsed JSON/YAML).
 * Accepts camelCase and snake_case keys; values of the wrong type are ignored.
 */
export function configFromObject(data: Record<string, unknown>): ConfigOverrides {
  const engineData = section(data, "engine");
  const nativeData = section(data, "native");
  const eof = pick(engineData, "eofBehavior", "eof_behavior");

  const engine: Partial<EngineConfig> = {
    tapeSize: numberField(engineData, "tapeSize", "tape_size"),
    inputMax: numberField(engineData, "inputMax", "input_max"),
    eofBehavior: isEofBehavior(eof) ? eof : undefined,
    extendedInstructions: boolField(engineData, "extendedInstructions", "extended_instructions"),
    debug: boolField(engineData, "debug", "debug"),
    inlineInput: boolField(engineData, "inlineInput", "inline_input"),
  };
  const native: Partial<NativeConfig> = {
    compiler: stringField(nativeData, "compiler", "compiler"),
    flags: stringField(nativeData, "flags", "flags"),
  };

  return { engine: definedOnly(engine), native: definedOnly(native) };
}

function definedOnly<T extends object>(obj: Partial<T>): Partial<T> {
  const out: Partial<T> = {};
  for (const key in obj) {
    if (obj[key] !== undefined) out[key] = obj[key];
  }
  return out;
}

/**
 * Merge configs with later ones overriding earlier ones.
 */
export function mergeConfigs(base: TapewormConfig, ...overrides: ConfigOverrides[]): TapewormConfig {
  let result: TapewormConfig = { engine: { ...base.engine }, native: { ...base.native } };

  for (const cfg of overrides) {
    result = {
      engine: { ...result.engine, ...definedOnly(cfg.engine ?? {}) },
      native: { ...result.native, ...definedOnly(cfg.native ?? {}) },
    };
  }

  return result;
}

/**
 * Auto-detect and load configuration.
 * Priority: overrides > config file > environment > defaults
 */
export type LoadConfigOptions = {
  configFile?: string;
  overrides?: ConfigOverrides;
  cwd?: string;
};

export function loadConfig(options?: LoadConfigOptions): TapewormConfig {
  let config = configFromEnv();

  if (options?.configFile) {
    config = mergeConfigs(config, configFromFile(options.configFile));
  } else {
    const cwd = options?.cwd ?? process.cwd();
    for (const name of DEFAULT_CONFIG_FILES) {
      const p = path.join(cwd, name);
      if (fs.existsSync(p)) {
        config = mergeConfigs(config, configFromFile(p));
        break;
      }
    }
  }

  if (options?.overrides) {
    config = mergeConfigs(config, options.overrides);
  }

  return config;
}

// =========================================================================
// Simple YAML Parser (for basic configs only)
// =========================================================================

function parseSimpleYaml(content: string): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  const stack: Array<{ obj: Record<string, unknown>; indent: number }> = [{ obj: result, indent: -1 }];

  for (const rawLine of content.split("\n")) {
    const trimmed = rawLine.trim();
    if (!trimmed || trimmed.startsWith("#")) continue;

    const indent = rawLine.search(/\S/);

    while (stack.length > 1 && stack[stack.length - 1].indent >= indent) {
      stack.pop();
    }

    const parent = stack[stack.length - 1].obj;

    const colonIdx = trimmed.indexOf(":");
    if (colonIdx < 0) continue;

    const key = trimmed.slice(0, colonIdx).trim();
    const value = trimmed.slice(colonIdx + 1).trim();

    if (value === "") {
      const nested: Record<string, unknown> = {};
      parent[key] = nested;
      stack.push({ obj: nested, indent });
    } else if (value === "true") {
      parent[key] = true;
    } else if (value === "false") {
      parent[key] = false;
    } else if (value === "null") {
      parent[key] = null;
    } else if (/^-?\d+$/.test(value)) {
      parent[key] = parseInt(value, 10);
    } else if (/^-?\d+\.\d+$/.test(value)) {
      parent[key] = parseFloat(value);
    } else if ((value.startsWith('"') && value.endsWith('"')) || (value.startsWith("'") && value.endsWith("'"))) {
      parent[key] = value.slice(1, -1);
    } else {
      parent[key] = value;
    }
  }

  return result;
}

// =========================================================================
// Config Validation
// =========================================================================

export type ConfigValidation = {
  valid: boolean;
  errors: string[];
  warnings: string[];
};

export function validateConfig(config: TapewormConfig): ConfigValidation {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (!Number.isInteger(config.engine.tapeSize) || config.engine.tapeSize < 1) {
    errors.push("tapeSize must be a positive integer");
  } else if (config.engine.tapeSize > MAX_SENSIBLE_TAPE) {
    warnings.push(`tapeSize ${config.engine.tapeSize} is very large; the tape is allocated up front`);
  }
  if (!Number.isInteger(config.engine.inputMax) || config.engine.inputMax < 1) {
    errors.push("inputMax must be a positive integer");
  }
  if (!isEofBehavior(config.engine.eofBehavior)) {
    errors.push(`eofBehavior must be one of: ${EOF_BEHAVIORS.join(", ")}`);
  }
  if (config.native.compiler.trim() === "") {
    errors.push("native.compiler must not be empty");
  }

  return {
    valid: errors.length === 0,
    errors,
    warnings,
  };
}

// =========================================================================
// Resolution
// =========================================================================

export type ResolvedConfig = {
  config: TapewormConfig;
  warnings: string[];
};

function configFailure(reasons: string[]): Failure {
  const diagnostics = reasons.map((reason) => makeDiagnostic("E0400", { reason }));
  return failure("invalid-config", diagnostics.length > 0 ? diagnostics[0].message : "Invalid configuration", {
    diagnostics,
  });
}

/**
 * Load and validate in one step. An unreadable config file or a failed
 * validation comes back as an invalid-config Failure, one E0400 per problem.
 */
export function resolveConfig(options?: LoadConfigOptions): Outcome<ResolvedConfig> {
  let config: TapewormConfig;
  try {
    config = loadConfig(options);
  } catch (e) {
    return fail(configFailure([describeError(e)]));
  }

  const validation = validateConfig(config);
  if (!validation.valid) {
    return fail(configFailure(validation.errors));
  }
  return done({ config, warnings: validation.warnings });
}
