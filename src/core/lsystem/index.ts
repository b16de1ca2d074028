export * from "./types";
export * from "./symbols";
export * from "./rules";
export { matchesAt } from "./scan";
export { assertIterations, assertPatterns } from "./validate";
export { rewriteSymbols } from "./symbolEngine";
export { rewritePatterns } from "./patternEngine";
export { rewriteStochastic } from "./stochasticEngine";
export { rewriteFunctional } from "./functionEngine";
export * from "./system";
export * from "./format";
