// src/core/lsystem/scan.ts
// The left-to-right, first-match-wins scan shared by the pattern engines,
// and the generation loop shared by all of them.

import { nullTraceSink } from "../../ports/types";
import type { EngineKind, TraceSink } from "../../ports/types";
import { ruleLabel } from "./rules";
import type { RewriteOptions, Sequence, SymbolAlgebra } from "./types";

export type PassContext = {
  engine: EngineKind;
  /** 1-based generation number */
  iteration: number;
  trace: TraceSink;
  traceRules: boolean;
};

export type PassResult<T> = {
  output: T[];
  /** Number of rule applications during the pass */
  applied: number;
};

export type Pass<T> = (input: Sequence<T>, ctx: PassContext) => PassResult<T>;

/**
 * True if `pattern` fits in the remaining input and equals the run starting at `cursor`.
 */
export function matchesAt<T>(
  input: Sequence<T>,
  cursor: number,
  pattern: Sequence<T>,
  algebra: SymbolAlgebra<T>
): boolean {
  if (cursor + pattern.length > input.length) return false;
  for (let k = 0; k < pattern.length; k++) {
    if (!algebra.equals(input[cursor + k], pattern[k])) return false;
  }
  return true;
}

/**
 * One pattern pass. `produce` returns the replacement for a matching rule,
 * or null to decline it and let the next rule be tried.
 */
export function scanPass<T, R extends { pattern: Sequence<T>; name?: string }>(
  input: Sequence<T>,
  rules: readonly R[],
  algebra: SymbolAlgebra<T>,
  ctx: PassContext,
  produce: (rule: R, cursor: number) => T[] | null
): PassResult<T> {
  const output: T[] = [];
  let applied = 0;
  let cursor = 0;

  outer: while (cursor < input.length) {
    for (let r = 0; r < rules.length; r++) {
      const rule = rules[r];
      if (!matchesAt(input, cursor, rule.pattern, algebra)) continue;
      const replacement = produce(rule, cursor);
      if (replacement === null) continue;

      if (ctx.traceRules) {
        ctx.trace.emit({
          tag: "E_RuleApplied",
          engine: ctx.engine,
          iteration: ctx.iteration,
          position: cursor,
          rule: ruleLabel(rule, r),
        });
      }
      for (const symbol of replacement) output.push(symbol);
      applied++;
      cursor += rule.pattern.length;
      continue outer;
    }
    output.push(algebra.clone(input[cursor]));
    cursor++;
  }

  return { output, applied };
}

/**
 * Apply `pass` `iterations` times, feeding each output into the next pass.
 * Zero iterations returns a copy of the axiom.
 */
export function runGenerations<T>(
  axiom: Sequence<T>,
  iterations: number,
  engine: EngineKind,
  options: RewriteOptions<T>,
  pass: Pass<T>
): T[] {
  const trace = options.trace ?? nullTraceSink;
  const traceRules = options.traceRules ?? false;
  const first = options.firstIteration ?? 1;
  let current: T[] = axiom.slice();

  for (let iteration = first; iteration < first + iterations; iteration++) {
    const { output, applied } = pass(current, { engine, iteration, trace, traceRules });
    trace.emit({
      tag: "E_Generation",
      engine,
      iteration,
      inputLength: current.length,
      outputLength: output.length,
      applied,
    });
    current = output;
  }

  return current;
}
