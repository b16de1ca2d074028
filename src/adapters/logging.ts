import type { RngPort } from "../ports/rng";
import type { TraceEvent, TraceSink } from "../ports/types";

/**
 * Wrap RNG port with logging.
 */
export function loggingRng(inner: RngPort, trace: TraceSink): RngPort {
  let reads = 0;
  return {
    uniformReal(low: number, high: number): number {
      const value = inner.uniformReal(low, high);
      trace.emit({ tag: "E_RngRead", id: `rng:${reads++}`, kind: "real", value });
      return value;
    },
    uniformInt(low: number, high: number): number {
      const value = inner.uniformInt(low, high);
      trace.emit({ tag: "E_RngRead", id: `rng:${reads++}`, kind: "int", value });
      return value;
    },
  };
}

/**
 * Trace sink that keeps every event in memory.
 */
export function collectingTraceSink(): TraceSink & { readonly events: TraceEvent[] } {
  const events: TraceEvent[] = [];
  return {
    events,
    emit: (event: TraceEvent) => {
      events.push(event);
    },
  };
}

/**
 * Fan a single event stream out to several sinks.
 */
export function teeTraceSink(...sinks: TraceSink[]): TraceSink {
  return {
    emit(event: TraceEvent): void {
      for (const sink of sinks) sink.emit(event);
    },
  };
}

export type TraceLevel = "generations" | "rules" | "all";

export function formatTraceEvent(event: TraceEvent): string {
  switch (event.tag) {
    case "E_Generation":
      return `[${event.engine}] generation ${event.iteration}: ${event.inputLength} -> ${event.outputLength} symbols (${event.applied} rewrites)`;
    case "E_RuleApplied":
      return `[${event.engine}] generation ${event.iteration} @${event.position}: ${event.rule}`;
    case "E_RngRead":
      return `[rng] ${event.id} ${event.kind}=${event.value}`;
  }
}

function admits(level: TraceLevel, event: TraceEvent): boolean {
  switch (level) {
    case "all":
      return true;
    case "rules":
      return event.tag !== "E_RngRead";
    case "generations":
      return event.tag === "E_Generation";
  }
}

/**
 * Trace sink that prints events, one line each.
 * Writes to stderr by default so stdout stays clean for generated sequences.
 */
export function consoleTraceSink(
  level: TraceLevel = "generations",
  write: (line: string) => void = (line) => console.error(line)
): TraceSink {
  return {
    emit(event: TraceEvent): void {
      if (admits(level, event)) {
        write(formatTraceEvent(event));
      }
    },
  };
}
