import { failure, LSystemError } from "../../outcome/failure";
import { makeDiagnostic } from "../../outcome/codes";
import type { Sequence } from "./types";

export function assertIterations(iterations: number): void {
  if (!Number.isInteger(iterations) || iterations < 0) {
    throw new LSystemError(
      failure("validation-failed", `Iteration count must be a non-negative integer, got ${iterations}`, {
        diagnostics: [makeDiagnostic("E0411", { iterations: String(iterations) })],
        context: { iterations },
      })
    );
  }
}

/**
 * Reject empty patterns. An empty pattern matches everywhere without
 * consuming input, so the scan would never advance.
 */
export function assertPatterns(rules: readonly { pattern: Sequence<unknown>; name?: string }[]): void {
  rules.forEach((rule, index) => {
    if (rule.pattern.length === 0) {
      throw new LSystemError(
        failure("validation-failed", `Rule ${rule.name ?? index} has an empty pattern`, {
          diagnostics: [makeDiagnostic("E0410", { index })],
          context: { index, name: rule.name },
        })
      );
    }
  });
}
