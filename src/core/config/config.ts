// src/core/config/config.ts
// Configuration for the lsys CLI and runners

import * as fs from "fs";
import * as path from "path";
import { failure, LSystemError } from "../../outcome/failure";
import { makeDiagnostic } from "../../outcome/codes";
import type { Diagnostic } from "../../outcome/diagnostic";
import { isSequenceFormat, type SequenceFormat } from "../lsystem/format";
import { PRESETS } from "../../presets";

// =========================================================================
// Configuration Types
// =========================================================================

export type RunConfig = {
  /** Preset name, or "all" for the four demonstration systems */
  preset: string;
  /** Number of generations to print, starting with the axiom */
  generations: number;
  /** Seed for the random source; omitted means non-reproducible */
  seed?: number;
};

export type OutputConfig = {
  format: SequenceFormat;
  /** Separator for the "joined" format */
  separator: string;
};

export type TraceConfig = {
  /** Log one line per generation to stderr */
  verbose: boolean;
  /** Also log every rule application */
  rules: boolean;
};

export type LSystemConfig = {
  run: RunConfig;
  output: OutputConfig;
  trace: TraceConfig;
};

export type PartialConfig = {
  run?: Partial<RunConfig>;
  output?: Partial<OutputConfig>;
  trace?: Partial<TraceConfig>;
};

// =========================================================================
// Default Configuration
// =========================================================================

export const DEFAULT_RUN_CONFIG: RunConfig = {
  preset: "all",
  generations: 7,
};

export const DEFAULT_OUTPUT_CONFIG: OutputConfig = {
  format: "debug",
  separator: "",
};

export const DEFAULT_TRACE_CONFIG: TraceConfig = {
  verbose: false,
  rules: false,
};

export const DEFAULT_CONFIG: LSystemConfig = {
  run: DEFAULT_RUN_CONFIG,
  output: DEFAULT_OUTPUT_CONFIG,
  trace: DEFAULT_TRACE_CONFIG,
};

export const DEFAULT_CONFIG_FILES = ["lsys.config.json", "lsys.config.yaml", "lsys.config.yml"];

// =========================================================================
// Value coercion
// =========================================================================

function isRecord(x: unknown): x is Record<string, unknown> {
  return !!x && typeof x === "object" && !Array.isArray(x);
}

/** Copy the defined values of `source` over `target`. */
function assignDefined<T extends object>(target: T, source: Partial<T>): T {
  const out = { ...target };
  for (const key in source) {
    const value = source[key];
    if (value !== undefined) out[key] = value;
  }
  return out;
}

function parseIntOrUndefined(raw: string | undefined): number | undefined {
  if (raw === undefined || raw.trim() === "") return undefined;
  const n = Number(raw);
  return Number.isInteger(n) ? n : undefined;
}

function parseBool(raw: string | undefined): boolean | undefined {
  if (raw === undefined) return undefined;
  const v = raw.trim().toLowerCase();
  if (v === "1" || v === "true" || v === "yes") return true;
  if (v === "0" || v === "false" || v === "no") return false;
  return undefined;
}

function pick(data: Record<string, unknown>, ...keys: string[]): unknown {
  for (const k of keys) {
    if (data[k] !== undefined) return data[k];
  }
  return undefined;
}

function asNumber(v: unknown): number | undefined {
  if (typeof v === "number") return v;
  if (typeof v === "string") return parseIntOrUndefined(v);
  return undefined;
}

function asString(v: unknown): string | undefined {
  return typeof v === "string" ? v : undefined;
}

function asBool(v: unknown): boolean | undefined {
  if (typeof v === "boolean") return v;
  if (typeof v === "string") return parseBool(v);
  return undefined;
}

function asFormat(v: unknown): SequenceFormat | undefined {
  return typeof v === "string" && isSequenceFormat(v) ? v : undefined;
}

// =========================================================================
// Configuration Loading
// =========================================================================

/**
 * Load configuration from environment variables.
 * Variables that are unset or fail to parse come back undefined.
 */
export function configFromEnv(prefix = "LSYS", env: NodeJS.ProcessEnv = process.env): PartialConfig {
  return {
    run: {
      preset: env[`${prefix}_PRESET`] || undefined,
      generations: parseIntOrUndefined(env[`${prefix}_GENERATIONS`]),
      seed: parseIntOrUndefined(env[`${prefix}_SEED`]),
    },
    output: {
      format: asFormat(env[`${prefix}_FORMAT`]),
      separator: env[`${prefix}_SEPARATOR`],
    },
    trace: {
      verbose: parseBool(env[`${prefix}_VERBOSE`]),
      rules: parseBool(env[`${prefix}_TRACE_RULES`]),
    },
  };
}

/**
 * Load configuration from a JSON or YAML file.
 */
export function configFromFile(filePath: string): PartialConfig {
  if (!fs.existsSync(filePath)) {
    throw new LSystemError(
      failure("config-error", `Config file not found: ${filePath}`, {
        diagnostics: [makeDiagnostic("E0500", { file: filePath })],
      })
    );
  }

  const content = fs.readFileSync(filePath, "utf8");
  const ext = path.extname(filePath).toLowerCase();

  let data: unknown;

  if (ext === ".json") {
    data = JSON.parse(content);
  } else if (ext === ".yaml" || ext === ".yml") {
    data = parseSimpleYaml(content);
  } else {
    throw new LSystemError(
      failure("config-error", `Unsupported config file format: ${ext}`, {
        diagnostics: [makeDiagnostic("E0501", { ext })],
      })
    );
  }

  return configFromObject(isRecord(data) ? data : {});
}

/**
 * Create configuration from a plain object (e.g., from parsed JSON/YAML).
 * Accepts camelCase and snake_case keys.
 */
export function configFromObject(data: Record<string, unknown>): PartialConfig {
  const runData: Record<string, unknown> = isRecord(data.run) ? data.run : {};
  const outputData: Record<string, unknown> = isRecord(data.output) ? data.output : {};
  const traceData: Record<string, unknown> = isRecord(data.trace) ? data.trace : {};

  return {
    run: {
      preset: asString(runData.preset),
      generations: asNumber(runData.generations),
      seed: asNumber(runData.seed),
    },
    output: {
      format: asFormat(outputData.format),
      separator: asString(outputData.separator),
    },
    trace: {
      verbose: asBool(traceData.verbose),
      rules: asBool(pick(traceData, "rules", "trace_rules", "traceRules")),
    },
  };
}

/**
 * Merge configs with later ones overriding earlier ones.
 */
export function mergeConfigs(...configs: PartialConfig[]): LSystemConfig {
  const result: LSystemConfig = { ...DEFAULT_CONFIG };

  for (const cfg of configs) {
    if (cfg.run) {
      result.run = assignDefined(result.run, cfg.run);
    }
    if (cfg.output) {
      result.output = assignDefined(result.output, cfg.output);
    }
    if (cfg.trace) {
      result.trace = assignDefined(result.trace, cfg.trace);
    }
  }

  return result;
}

/**
 * Auto-detect and load configuration.
 * Priority: CLI args > config file > environment > defaults
 */
export function loadConfig(options?: {
  configFile?: string;
  overrides?: PartialConfig;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
}): LSystemConfig {
  const layers: PartialConfig[] = [configFromEnv("LSYS", options?.env)];

  if (options?.configFile) {
    layers.push(configFromFile(options.configFile));
  } else {
    const cwd = options?.cwd ?? process.cwd();
    for (const name of DEFAULT_CONFIG_FILES) {
      const p = path.join(cwd, name);
      if (fs.existsSync(p)) {
        layers.push(configFromFile(p));
        break;
      }
    }
  }

  if (options?.overrides) {
    layers.push(options.overrides);
  }

  return mergeConfigs(...layers);
}

// =========================================================================
// Simple YAML Parser (for basic configs only)
// =========================================================================

export function parseSimpleYaml(content: string): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  const stack: Array<{ obj: Record<string, unknown>; indent: number }> = [{ obj: result, indent: -1 }];

  for (const rawLine of content.split("\n")) {
    const trimmed = rawLine.trim();
    if (!trimmed || trimmed.startsWith("#")) continue;

    const indent = rawLine.search(/\S/);

    // Pop stack to find parent at correct indent level
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
  warnings: Diagnostic[];
};

/** Above this many generations the demonstration systems print very long lines. */
export const LARGE_GENERATION_COUNT = 24;

export function validateConfig(config: LSystemConfig): ConfigValidation {
  const errors: string[] = [];
  const warnings: Diagnostic[] = [];

  const { preset, generations, seed } = config.run;

  if (preset !== "all" && !PRESETS.some((p) => p.name === preset)) {
    errors.push(`Unknown preset: ${preset}`);
  }
  if (!Number.isInteger(generations) || generations < 0) {
    errors.push("generations must be a non-negative integer");
  } else if (generations > LARGE_GENERATION_COUNT) {
    warnings.push(makeDiagnostic("W0001", { generations }));
  }
  if (seed !== undefined && !Number.isInteger(seed)) {
    errors.push("seed must be an integer");
  }
  if (!isSequenceFormat(config.output.format)) {
    errors.push(`Unknown output format: ${config.output.format}`);
  }

  return {
    valid: errors.length === 0,
    errors,
    warnings,
  };
}
