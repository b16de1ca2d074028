import type { RngPort } from "../ports/rng";
import type { TraceEvent } from "../ports/types";
import { failure, LSystemError } from "../outcome/failure";
import { makeDiagnostic } from "../outcome/codes";

/**
 * Create a replay RNG that returns the given values in order.
 * Bounds passed by the caller are ignored: the logged value is returned as-is.
 */
export function replayRng(values: readonly number[]): RngPort & { readonly draws: number } {
  let index = 0;

  const take = (): number => {
    const value = values[index];
    if (value === undefined) {
      throw new LSystemError(
        failure("precondition-failed", `Replay log exhausted after ${index} draws`, {
          diagnostics: [makeDiagnostic("E0412", { draws: index })],
        })
      );
    }
    index++;
    return value;
  };

  return {
    uniformReal: () => take(),
    uniformInt: () => take(),
    get draws() {
      return index;
    },
  };
}

/**
 * Extract the RNG values recorded by loggingRng, in draw order.
 */
export function rngValuesFromTrace(events: readonly TraceEvent[]): number[] {
  const values: number[] = [];
  for (const event of events) {
    if (event.tag === "E_RngRead") {
      values.push(event.value);
    }
  }
  return values;
}
