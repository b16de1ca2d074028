import type { Diagnostic } from "./diagnostic";

export type FailureReason =
  | "validation-failed"
  | "config-error"
  | "precondition-failed"
  | "invariant-violated"
  | "internal-error"
  | `custom:${string}`;

export interface Failure {
  reason: FailureReason;
  message: string;
  context?: Record<string, unknown>;
  diagnostics: Diagnostic[];
  cause?: Failure;
  recoverable: boolean;
}

export function failure(
  reason: FailureReason,
  message: string,
  opts?: Partial<Omit<Failure, "reason" | "message">>
): Failure {
  return {
    reason,
    message,
    diagnostics: opts?.diagnostics ?? [],
    recoverable: opts?.recoverable ?? false,
    context: opts?.context,
    cause: opts?.cause,
  };
}

export function allDiagnostics(f: Failure, seen = new Set<Diagnostic>()): Diagnostic[] {
  const collected: Diagnostic[] = [];
  for (const diag of f.diagnostics) {
    if (!seen.has(diag)) {
      seen.add(diag);
      collected.push(diag);
    }
  }
  if (f.cause) {
    collected.push(...allDiagnostics(f.cause, seen));
  }
  return collected;
}

/**
 * Thrown by the rewrite engines and config loaders.
 * Carries a structured Failure so callers can turn it back into an Outcome.
 */
export class LSystemError extends Error {
  constructor(public readonly failure: Failure) {
    super(failure.message);
    this.name = "LSystemError";
  }

  get code(): string | undefined {
    return this.failure.diagnostics[0]?.code;
  }
}

export function isLSystemError(e: unknown): e is LSystemError {
  return e instanceof LSystemError;
}
