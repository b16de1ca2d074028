import type { Done, Fail, OutcomeMeta } from "./outcome";
import { failure, LSystemError, type Failure } from "./failure";
import { makeDiagnostic } from "./codes";

export function done<A>(value: A, meta: OutcomeMeta = {}): Done<A> {
  return { tag: "Done", value, meta };
}

export function fail(f: Failure, meta: OutcomeMeta = {}): Fail {
  return { tag: "Fail", failure: f, meta };
}

export function validationFailed(
  message: string,
  context?: Record<string, unknown>,
  meta: OutcomeMeta = {}
): Fail {
  return fail(
    failure("validation-failed", message, {
      diagnostics: [makeDiagnostic("E0400")],
      context,
      recoverable: true,
    }),
    meta
  );
}

/**
 * Convert a thrown value into a Fail outcome.
 * LSystemErrors keep their structured failure; anything else becomes internal-error.
 */
export function failFromError(e: unknown, meta: OutcomeMeta = {}): Fail {
  if (e instanceof LSystemError) {
    return fail(e.failure, meta);
  }
  const message = e instanceof Error ? e.message : String(e);
  return fail(failure("internal-error", message), meta);
}
