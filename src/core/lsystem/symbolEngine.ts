import { structuralAlgebra, copySequence } from "./symbols";
import { ruleLabel } from "./rules";
import { runGenerations } from "./scan";
import { assertIterations } from "./validate";
import type { RewriteOptions, Sequence, SymbolRule } from "./types";

/**
 * Deterministic context-free L-system: every symbol is rewritten by the first
 * rule naming it, or copied through unchanged when no rule does.
 *
 * @example
 * rewriteSymbols(["A"], [symbolRule("A", ["A", "B"]), symbolRule("B", ["A"])], 3)
 * // => ["A", "B", "A", "A", "B"]
 */
export function rewriteSymbols<T>(
  axiom: Sequence<T>,
  rules: readonly SymbolRule<T>[],
  iterations: number,
  options: RewriteOptions<T> = {}
): T[] {
  assertIterations(iterations);
  const algebra = options.algebra ?? structuralAlgebra<T>();

  return runGenerations(axiom, iterations, "symbol", options, (input, ctx) => {
    const output: T[] = [];
    let applied = 0;

    input.forEach((symbol, position) => {
      const index = rules.findIndex((rule) => algebra.equals(symbol, rule.symbol));
      if (index < 0) {
        output.push(algebra.clone(symbol));
        return;
      }
      const rule = rules[index];
      if (ctx.traceRules) {
        ctx.trace.emit({
          tag: "E_RuleApplied",
          engine: ctx.engine,
          iteration: ctx.iteration,
          position,
          rule: ruleLabel(rule, index),
        });
      }
      for (const s of copySequence(rule.replacement, algebra)) output.push(s);
      applied++;
    });

    return { output, applied };
  });
}
