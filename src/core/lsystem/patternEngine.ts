import { structuralAlgebra, copySequence } from "./symbols";
import { runGenerations, scanPass } from "./scan";
import { assertIterations, assertPatterns } from "./validate";
import type { PatternRule, RewriteOptions, Sequence } from "./types";

/**
 * Deterministic L-system over sub-sequence patterns.
 *
 * At each scan position the first rule (in list order, not by pattern length)
 * whose pattern matches is applied and the cursor skips past the whole match.
 * Unmatched symbols are copied through one at a time. Multi-symbol patterns
 * express left/right context.
 */
export function rewritePatterns<T>(
  axiom: Sequence<T>,
  rules: readonly PatternRule<T>[],
  iterations: number,
  options: RewriteOptions<T> = {}
): T[] {
  assertIterations(iterations);
  assertPatterns(rules);
  const algebra = options.algebra ?? structuralAlgebra<T>();

  return runGenerations(axiom, iterations, "pattern", options, (input, ctx) =>
    scanPass(input, rules, algebra, ctx, (rule) => copySequence(rule.replacement, algebra))
  );
}
