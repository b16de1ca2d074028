/**
 * Which rewrite engine produced an event.
 */
export type EngineKind = "symbol" | "pattern" | "stochastic" | "functional";

/**
 * Trace event types emitted while rewriting.
 */
export type TraceEvent =
  | {
      tag: "E_Generation";
      engine: EngineKind;
      iteration: number;
      inputLength: number;
      outputLength: number;
      applied: number;
    }
  | { tag: "E_RuleApplied"; engine: EngineKind; iteration: number; position: number; rule: string }
  | { tag: "E_RngRead"; id: string; kind: "real" | "int"; value: number };

/**
 * Trace sink for logging events.
 */
export interface TraceSink {
  emit(event: TraceEvent): void;
}

export const nullTraceSink: TraceSink = {
  emit: () => undefined,
};
