export type { RngPort } from "./rng";
export type { EngineKind, TraceEvent, TraceSink } from "./types";
export { nullTraceSink } from "./types";
