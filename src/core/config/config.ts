// src/core/config/config.ts
// Configuration system for the Knot toolchain

import * as fs from "fs";
import * as path from "path";
import { parse as parseYAML } from "yaml";
import { DEFAULT_ENTRY, DEFAULT_MAX_CALL_DEPTH } from "../eval/run";

// =========================================================================
// Configuration Types
// =========================================================================

export type ParserConfig = {
  /** Emit a parser trace (every parser attempt and its result) */
  trace: boolean;
};

export type RuntimeConfig = {
  /** Zero-argument function that starts a program */
  entry: string;
  /** Maximum nested function activations before the run aborts */
  maxCallDepth: number;
};

export type KnotConfig = {
  parser: ParserConfig;
  runtime: RuntimeConfig;
};

export type PartialKnotConfig = {
  parser?: Partial<ParserConfig>;
  runtime?: Partial<RuntimeConfig>;
};

// =========================================================================
// Default Configuration
// =========================================================================

export const DEFAULT_PARSER_CONFIG: ParserConfig = {
  trace: false,
};

export const DEFAULT_RUNTIME_CONFIG: RuntimeConfig = {
  entry: DEFAULT_ENTRY,
  maxCallDepth: DEFAULT_MAX_CALL_DEPTH,
};

export const DEFAULT_CONFIG: KnotConfig = {
  parser: DEFAULT_PARSER_CONFIG,
  runtime: DEFAULT_RUNTIME_CONFIG,
};

export const DEFAULT_CONFIG_FILES = ["knot.config.json", "knot.config.yaml", "knot.config.yml"];

// =========================================================================
// Configuration Loading
// =========================================================================

function parseFlag(raw: string | undefined): boolean | undefined {
  if (raw === undefined || raw === "") return undefined;
  return raw === "1" || raw.toLowerCase() === "true" || raw.toLowerCase() === "yes";
}

/**
 * Load configuration from environment variables. Unset variables keep the defaults.
 */
export function configFromEnv(prefix = "KNOT"): KnotConfig {
  const trace = parseFlag(process.env[`${prefix}_TRACE`]) ?? DEFAULT_PARSER_CONFIG.trace;
  const entry = process.env[`${prefix}_ENTRY`] || DEFAULT_RUNTIME_CONFIG.entry;
  const depth = parseInt(process.env[`${prefix}_MAX_CALL_DEPTH`] ?? "", 10);
  const maxCallDepth = Number.isNaN(depth) ? DEFAULT_RUNTIME_CONFIG.maxCallDepth : depth;

  return {
    parser: { trace },
    runtime: { entry, maxCallDepth },
  };
}

/**
 * Load configuration from a JSON or YAML file. Only the keys present in the file are set.
 */
export function configFromFile(filePath: string): PartialKnotConfig {
  if (!fs.existsSync(filePath)) {
    throw new Error(`Config file not found: ${filePath}`);
  }

  const content = fs.readFileSync(filePath, "utf8");
  const ext = path.extname(filePath).toLowerCase();

  let data: unknown;

  if (ext === ".json") {
    data = JSON.parse(content);
  } else if (ext === ".yaml" || ext === ".yml") {
    data = parseYAML(content) ?? {};
  } else {
    throw new Error(`Unsupported config file format: ${ext}`);
  }

  if (!isRecord(data)) {
    throw new Error(`Config file must contain an object: ${filePath}`);
  }
  return partialConfigFromObject(data);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function pick<T>(record: Record<string, unknown>, keys: string[], guard: (v: unknown) => v is T): T | undefined {
  for (const key of keys) {
    const value = record[key];
    if (guard(value)) return value;
  }
  return undefined;
}

const isBoolean = (v: unknown): v is boolean => typeof v === "boolean";
const isString = (v: unknown): v is string => typeof v === "string" && v !== "";
const isNumber = (v: unknown): v is number => typeof v === "number" && Number.isFinite(v);

/**
 * Read the recognised keys of a plain object (e.g., parsed JSON/YAML).
 * Accepts camelCase and snake_case keys; absent or mistyped keys are left out.
 */
export function partialConfigFromObject(data: Record<string, unknown>): PartialKnotConfig {
  const parserData = isRecord(data.parser) ? data.parser : {};
  const runtimeData = isRecord(data.runtime) ? data.runtime : {};

  const parser: Partial<ParserConfig> = {};
  const trace = pick(parserData, ["trace"], isBoolean);
  if (trace !== undefined) parser.trace = trace;

  const runtime: Partial<RuntimeConfig> = {};
  const entry = pick(runtimeData, ["entry"], isString);
  if (entry !== undefined) runtime.entry = entry;
  const maxCallDepth = pick(runtimeData, ["maxCallDepth", "max_call_depth"], isNumber);
  if (maxCallDepth !== undefined) runtime.maxCallDepth = maxCallDepth;

  return { parser, runtime };
}

/**
 * Create a complete configuration from a plain object, defaults filling the gaps.
 */
export function configFromObject(data: Record<string, unknown>): KnotConfig {
  return mergeConfigs(partialConfigFromObject(data));
}

/**
 * Merge configs with later ones overriding earlier ones.
 */
export function mergeConfigs(...configs: PartialKnotConfig[]): KnotConfig {
  const result: KnotConfig = {
    parser: { ...DEFAULT_CONFIG.parser },
    runtime: { ...DEFAULT_CONFIG.runtime },
  };

  for (const cfg of configs) {
    if (cfg.parser) {
      result.parser = { ...result.parser, ...cfg.parser };
    }
    if (cfg.runtime) {
      result.runtime = { ...result.runtime, ...cfg.runtime };
    }
  }

  return result;
}

/**
 * Auto-detect and load configuration.
 * Priority: overrides > config file > environment > defaults
 */
export function loadConfig(options?: {
  configFile?: string;
  overrides?: PartialKnotConfig;
  cwd?: string;
}): KnotConfig {
  let config = configFromEnv();

  if (options?.configFile) {
    config = mergeConfigs(config, configFromFile(options.configFile));
  } else {
    const cwd = options?.cwd ?? process.cwd();
    for (const name of DEFAULT_CONFIG_FILES) {
      const candidate = path.join(cwd, name);
      if (fs.existsSync(candidate)) {
        config = mergeConfigs(config, configFromFile(candidate));
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
// Config Validation
// =========================================================================

export type ConfigValidation = {
  valid: boolean;
  errors: string[];
  warnings: string[];
};

export function validateConfig(config: KnotConfig): ConfigValidation {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (!/^\p{L}[\p{L}0-9]*$/u.test(config.runtime.entry)) {
    errors.push(`entry must be an identifier, got '${config.runtime.entry}'`);
  }
  if (!Number.isInteger(config.runtime.maxCallDepth) || config.runtime.maxCallDepth < 1) {
    errors.push("maxCallDepth must be a positive integer");
  } else if (config.runtime.maxCallDepth > 2000) {
    warnings.push("maxCallDepth above 2000 may overflow the host stack before the limit is reached");
  }

  return {
    valid: errors.length === 0,
    errors,
    warnings,
  };
}
