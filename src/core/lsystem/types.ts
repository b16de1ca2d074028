// src/core/lsystem/types.ts
// Rule and sequence types shared by every rewrite engine.

import type { TraceSink } from "../../ports/types";

/**
 * An ordered, indexable run of symbols. Engines never mutate their input.
 */
export type Sequence<T> = readonly T[];

/**
 * Equality and copying for a symbol alphabet.
 * Symbols are compared and duplicated by value, never by reference identity.
 */
export interface SymbolAlgebra<T> {
  equals(a: T, b: T): boolean;
  clone(value: T): T;
}

/** Single-symbol production: `symbol -> replacement`. */
export type SymbolRule<T> = {
  name?: string;
  symbol: T;
  replacement: Sequence<T>;
};

/** Sub-sequence production. Patterns longer than one symbol carry context. */
export type PatternRule<T> = {
  name?: string;
  pattern: Sequence<T>;
  replacement: Sequence<T>;
};

/**
 * Pattern production gated by an acceptance probability.
 * Each candidate match draws its own sample; rules sharing a pattern are not renormalized.
 */
export type StochasticRule<T> = PatternRule<T> & {
  probability: number;
};

/** Computes a replacement from the matched sub-sequence. */
export type Transform<T> = (matched: T[]) => T[];

export type FunctionRule<T> = {
  name?: string;
  pattern: Sequence<T>;
  transform: Transform<T>;
};

export type RewriteOptions<T> = {
  /** Defaults to structural equality and deep copy. */
  algebra?: SymbolAlgebra<T>;
  /** Receives one E_Generation event per pass. */
  trace?: TraceSink;
  /** Also emit E_RuleApplied for every rewrite. */
  traceRules?: boolean;
  /** Generation number reported for the first pass. Defaults to 1. */
  firstIteration?: number;
};
