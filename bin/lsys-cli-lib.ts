// bin/lsys-cli-lib.ts
// Argument parsing and run logic for the lsys command
// Exported functions for testing

import { loadConfig, validateConfig, type LSystemConfig, type PartialConfig } from "../src/core/config/config";
import { formatSequence, isSequenceFormat, type SequenceFormat } from "../src/core/lsystem/format";
import { generations } from "../src/core/lsystem/system";
import { DEMO_PRESETS, PRESETS, findPreset } from "../src/presets";
import { seededRng, mathRng } from "../src/adapters/rng";
import { consoleTraceSink, loggingRng } from "../src/adapters/logging";
import type { RngPort } from "../src/ports/rng";
import { nullTraceSink, type TraceSink } from "../src/ports/types";
import { done, failFromError, validationFailed } from "../src/outcome/constructors";
import type { Outcome } from "../src/outcome/outcome";

// ═══════════════════════════════════════════════════════════════════════════════
// TYPE DEFINITIONS
// ═══════════════════════════════════════════════════════════════════════════════

export type CliArgs = {
  help?: boolean;
  list?: boolean;
  preset?: string;
  generations?: number;
  seed?: number;
  format?: SequenceFormat;
  separator?: string;
  config?: string;
  verbose?: boolean;
  traceRules?: boolean;
  /** Problems found while parsing; non-empty means the run should not start */
  errors: string[];
};

export type RunDeps = {
  /** Overrides the rng derived from the config seed */
  rng?: RngPort;
  /** Overrides the stderr trace sink derived from the config */
  trace?: TraceSink;
};

// ═══════════════════════════════════════════════════════════════════════════════
// ARGUMENT PARSING
// ═══════════════════════════════════════════════════════════════════════════════

function parseValueArg(flag: string, raw: string | undefined, errors: string[]): string | undefined {
  if (raw === undefined) {
    errors.push(`${flag} expects a value`);
  }
  return raw;
}

function parseIntArg(flag: string, raw: string | undefined, errors: string[]): number | undefined {
  const n = Number(raw);
  if (raw === undefined || raw.trim() === "" || !Number.isInteger(n)) {
    errors.push(`${flag} expects an integer, got ${raw ?? "nothing"}`);
    return undefined;
  }
  return n;
}

export function parseCliArgs(args: string[]): CliArgs {
  const result: CliArgs = { errors: [] };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg === "--help" || arg === "-h") {
      result.help = true;
    } else if (arg === "--list" || arg === "-l") {
      result.list = true;
    } else if (arg === "--verbose" || arg === "-v") {
      result.verbose = true;
    } else if (arg === "--trace-rules") {
      result.verbose = true;
      result.traceRules = true;
    } else if (arg === "--generations" || arg === "-n") {
      result.generations = parseIntArg(arg, args[++i], result.errors);
    } else if (arg === "--seed" || arg === "-s") {
      result.seed = parseIntArg(arg, args[++i], result.errors);
    } else if (arg === "--format" || arg === "-f") {
      const format = args[++i] ?? "";
      if (isSequenceFormat(format)) {
        result.format = format;
      } else {
        result.errors.push(`Unknown format: ${format}`);
      }
    } else if (arg === "--separator") {
      result.separator = parseValueArg(arg, args[++i], result.errors);
    } else if (arg === "--config" || arg === "-c") {
      result.config = parseValueArg(arg, args[++i], result.errors);
    } else if (arg === "--preset" || arg === "-p") {
      result.preset = parseValueArg(arg, args[++i], result.errors);
    } else if (!arg.startsWith("-")) {
      // First non-flag argument is the preset
      if (!result.preset) {
        result.preset = arg;
      }
    } else {
      result.errors.push(`Unknown option: ${arg}`);
    }
  }

  return result;
}

// ═══════════════════════════════════════════════════════════════════════════════
// HELP TEXT
// ═══════════════════════════════════════════════════════════════════════════════

export function getHelpText(): string {
  return `
lsys - Print the generations of an L-system

USAGE:
  lsys [options]                     Run the four demonstration systems side by side
  lsys [options] <preset>            Run a single preset

OPTIONS:
  -h, --help                         Show this help message
  -l, --list                         List available presets
  -p, --preset <name>                Preset to run (default: all)
  -n, --generations <n>              Generations to print, axiom included (default: 7)
  -s, --seed <n>                     Seed the random source for reproducible output
  -f, --format <debug|joined|json>   Output format (default: debug)
  --separator <text>                 Separator for the joined format
  -c, --config <file>                Load settings from a .json or .yaml file
  -v, --verbose                      Log each generation to stderr
  --trace-rules                      Also log every rule application and random draw

ENVIRONMENT:
  LSYS_PRESET, LSYS_GENERATIONS, LSYS_SEED, LSYS_FORMAT, LSYS_SEPARATOR,
  LSYS_VERBOSE, LSYS_TRACE_RULES

EXAMPLES:
  lsys                               # algae in all four engines
  lsys koch -n 3 -f joined           # F+F-F-F+F...
  lsys algae-stochastic --seed 7     # same output on every run
`.trim();
}

export function listPresets(): string[] {
  const width = Math.max(...PRESETS.map((p) => p.name.length));
  return PRESETS.map((p) => `${p.name.padEnd(width)}  ${p.description}`);
}

// ═══════════════════════════════════════════════════════════════════════════════
// CONFIGURATION BUILDING
// ═══════════════════════════════════════════════════════════════════════════════

export function buildOverrides(args: CliArgs): PartialConfig {
  return {
    run: { preset: args.preset, generations: args.generations, seed: args.seed },
    output: { format: args.format, separator: args.separator },
    trace: { verbose: args.verbose, rules: args.traceRules },
  };
}

/**
 * Layer env, config file and CLI flags, then validate.
 */
export function resolveConfig(
  args: CliArgs,
  options: { env?: NodeJS.ProcessEnv; cwd?: string } = {}
): Outcome<LSystemConfig> {
  if (args.errors.length > 0) {
    return validationFailed(args.errors.join("; "), { errors: args.errors });
  }
  try {
    const config = loadConfig({ configFile: args.config, overrides: buildOverrides(args), ...options });
    const validation = validateConfig(config);
    if (!validation.valid) {
      return validationFailed(validation.errors.join("; "), { errors: validation.errors, warnings: validation.warnings });
    }
    return done(config, validation.warnings.length > 0 ? { diagnostics: validation.warnings } : {});
  } catch (e) {
    return failFromError(e);
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// RUN
// ═══════════════════════════════════════════════════════════════════════════════

function traceFor(config: LSystemConfig): TraceSink {
  if (!config.trace.verbose && !config.trace.rules) return nullTraceSink;
  return consoleTraceSink(config.trace.rules ? "all" : "generations");
}

/**
 * Produce the output lines for a resolved config.
 * With preset "all", generation n of each demonstration system is printed
 * before generation n + 1 of any of them.
 */
export function executeRun(config: LSystemConfig, deps: RunDeps = {}): Outcome<string[]> {
  const start = Date.now();
  try {
    const trace = deps.trace ?? traceFor(config);
    const baseRng = deps.rng ?? (config.run.seed !== undefined ? seededRng(config.run.seed) : mathRng());
    const rng = config.trace.rules ? loggingRng(baseRng, trace) : baseRng;
    const options = { rng, trace, traceRules: config.trace.rules };

    const names: readonly string[] = config.run.preset === "all" ? DEMO_PRESETS : [config.run.preset];
    const runs = names.map((name) => generations(findPreset(name).build(rng), config.run.generations, options));

    const lines: string[] = [];
    for (let n = 0; n < config.run.generations; n++) {
      for (const run of runs) {
        lines.push(formatSequence(run[n], config.output.format, config.output.separator));
      }
    }
    return done(lines, { durationMs: Date.now() - start, generations: config.run.generations });
  } catch (e) {
    return failFromError(e, { durationMs: Date.now() - start });
  }
}
