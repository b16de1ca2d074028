import { structuralAlgebra, copySequence } from "./symbols";
import { runGenerations, scanPass } from "./scan";
import { assertIterations, assertPatterns } from "./validate";
import type { FunctionRule, RewriteOptions, Sequence } from "./types";

/**
 * Fully general L-system: a matching rule's `transform` receives a fresh copy
 * of the rule's pattern and returns the replacement, which may be empty,
 * longer than the match, or randomized.
 */
export function rewriteFunctional<T>(
  axiom: Sequence<T>,
  rules: readonly FunctionRule<T>[],
  iterations: number,
  options: RewriteOptions<T> = {}
): T[] {
  assertIterations(iterations);
  assertPatterns(rules);
  const algebra = options.algebra ?? structuralAlgebra<T>();

  return runGenerations(axiom, iterations, "functional", options, (input, ctx) =>
    scanPass(input, rules, algebra, ctx, (rule) =>
      copySequence(rule.transform(copySequence(rule.pattern, algebra)), algebra)
    )
  );
}
