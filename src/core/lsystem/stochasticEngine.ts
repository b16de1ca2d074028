import type { RngPort } from "../../ports/rng";
import { structuralAlgebra, copySequence } from "./symbols";
import { runGenerations, scanPass } from "./scan";
import { assertIterations, assertPatterns } from "./validate";
import type { RewriteOptions, Sequence, StochasticRule } from "./types";

/**
 * Non-deterministic L-system.
 *
 * Scans like {@link rewritePatterns}; once a rule's pattern matches, one sample
 * is drawn from `rng.uniformReal(0, 1)` and the rule applies iff
 * `sample <= probability`. A rejected rule falls through to the next one.
 *
 * Probabilities are independent per rule. To pick B or C for `A` with equal
 * odds, write `[A]->[B] @ 0.5` followed by `[A]->[C] @ 1.0`.
 */
export function rewriteStochastic<T>(
  axiom: Sequence<T>,
  rules: readonly StochasticRule<T>[],
  iterations: number,
  rng: RngPort,
  options: RewriteOptions<T> = {}
): T[] {
  assertIterations(iterations);
  assertPatterns(rules);
  const algebra = options.algebra ?? structuralAlgebra<T>();

  return runGenerations(axiom, iterations, "stochastic", options, (input, ctx) =>
    scanPass(input, rules, algebra, ctx, (rule) => {
      const sample = rng.uniformReal(0, 1);
      return sample <= rule.probability ? copySequence(rule.replacement, algebra) : null;
    })
  );
}
