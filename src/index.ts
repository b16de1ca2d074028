// src/index.ts
// lindenmayer - Public API

// ═══════════════════════════════════════════════════════════════════════════════
// REWRITE ENGINES
// ═══════════════════════════════════════════════════════════════════════════════

export {
  rewriteSymbols,
  rewritePatterns,
  rewriteStochastic,
  rewriteFunctional,
  rewrite,
  rewriteFrom,
  generations,
  runSystem,
  matchesAt,
  assertIterations,
  assertPatterns,
  type LSystem,
  type SystemOptions,
  type RewriteOptions,
  type Sequence,
  type SymbolAlgebra,
  type SymbolRule,
  type PatternRule,
  type StochasticRule,
  type FunctionRule,
  type Transform,
} from "./core/lsystem";

// ═══════════════════════════════════════════════════════════════════════════════
// RULES & SYMBOLS
// ═══════════════════════════════════════════════════════════════════════════════

export {
  chars,
  symbolRule,
  patternRule,
  stochasticRule,
  functionRule,
  toPatternRules,
  structuralAlgebra,
  identityAlgebra,
  structuralEquals,
  structuralClone,
  formatSequence,
  type SequenceFormat,
} from "./core/lsystem";

export { PRESETS, DEMO_PRESETS, findPreset, echoTransform, type Preset } from "./presets";

// ═══════════════════════════════════════════════════════════════════════════════
// PORTS & ADAPTERS
// ═══════════════════════════════════════════════════════════════════════════════

export type { RngPort, TraceEvent, TraceSink, EngineKind } from "./ports";
export { nullTraceSink } from "./ports";
export { seededRng, mathRng } from "./adapters/rng";
export { replayRng, rngValuesFromTrace } from "./adapters/replay";
export { loggingRng, collectingTraceSink, consoleTraceSink, teeTraceSink, formatTraceEvent } from "./adapters/logging";

// ═══════════════════════════════════════════════════════════════════════════════
// OUTCOMES & CONFIG
// ═══════════════════════════════════════════════════════════════════════════════

export {
  LSystemError,
  isLSystemError,
  isDone,
  isFail,
  match,
  unwrap,
  unwrapOr,
  mapOutcome,
  type Outcome,
  type Failure,
  type Diagnostic,
} from "./outcome";

export { loadConfig, mergeConfigs, validateConfig, type LSystemConfig } from "./core/config";
