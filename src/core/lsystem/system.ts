// src/core/lsystem/system.ts
// A complete L-system (axiom + rules) and the entry points that dispatch
// it to the matching engine.

import type { RngPort } from "../../ports/rng";
import type { EngineKind } from "../../ports/types";
import { failure, LSystemError } from "../../outcome/failure";
import { makeDiagnostic } from "../../outcome/codes";
import { done, failFromError } from "../../outcome/constructors";
import type { Outcome } from "../../outcome/outcome";
import { rewriteSymbols } from "./symbolEngine";
import { rewritePatterns } from "./patternEngine";
import { rewriteStochastic } from "./stochasticEngine";
import { rewriteFunctional } from "./functionEngine";
import { assertIterations } from "./validate";
import type {
  FunctionRule,
  PatternRule,
  RewriteOptions,
  Sequence,
  StochasticRule,
  SymbolRule,
} from "./types";

export type LSystem<T> =
  | { kind: "symbol"; axiom: Sequence<T>; rules: readonly SymbolRule<T>[] }
  | { kind: "pattern"; axiom: Sequence<T>; rules: readonly PatternRule<T>[] }
  | { kind: "stochastic"; axiom: Sequence<T>; rules: readonly StochasticRule<T>[] }
  | { kind: "functional"; axiom: Sequence<T>; rules: readonly FunctionRule<T>[] };

export type SystemOptions<T> = RewriteOptions<T> & {
  /** Required for stochastic systems. */
  rng?: RngPort;
};

function requireRng(kind: EngineKind, rng: RngPort | undefined): RngPort {
  if (!rng) {
    throw new LSystemError(
      failure("precondition-failed", `A ${kind} system requires a random source`, {
        diagnostics: [makeDiagnostic("E0413", { kind })],
      })
    );
  }
  return rng;
}

/**
 * Rewrite `input` for `iterations` generations with the system's rules.
 * The system's own axiom is ignored; see {@link rewrite} to start from it.
 */
export function rewriteFrom<T>(
  system: LSystem<T>,
  input: Sequence<T>,
  iterations: number,
  options: SystemOptions<T> = {}
): T[] {
  switch (system.kind) {
    case "symbol":
      return rewriteSymbols(input, system.rules, iterations, options);
    case "pattern":
      return rewritePatterns(input, system.rules, iterations, options);
    case "stochastic":
      return rewriteStochastic(input, system.rules, iterations, requireRng(system.kind, options.rng), options);
    case "functional":
      return rewriteFunctional(input, system.rules, iterations, options);
  }
}

export function rewrite<T>(system: LSystem<T>, iterations: number, options: SystemOptions<T> = {}): T[] {
  return rewriteFrom(system, system.axiom, iterations, options);
}

/**
 * Generations 0 through `count - 1`, each derived from the previous one by a
 * single pass. Stochastic systems keep drawing from the same rng throughout.
 */
export function generations<T>(system: LSystem<T>, count: number, options: SystemOptions<T> = {}): T[][] {
  assertIterations(count);
  const out: T[][] = [];
  let current: T[] = system.axiom.slice();
  for (let n = 0; n < count; n++) {
    if (n > 0) current = rewriteFrom(system, current, 1, { ...options, firstIteration: n });
    out.push(current);
  }
  return out;
}

/**
 * Like {@link rewrite}, but reports validation problems as a Fail outcome
 * instead of throwing.
 */
export function runSystem<T>(
  system: LSystem<T>,
  iterations: number,
  options: SystemOptions<T> = {}
): Outcome<T[]> {
  const start = Date.now();
  try {
    const value = rewrite(system, iterations, options);
    return done(value, { durationMs: Date.now() - start, generations: iterations });
  } catch (e) {
    return failFromError(e, { durationMs: Date.now() - start });
  }
}
