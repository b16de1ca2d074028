import type { FunctionRule, PatternRule, Sequence, StochasticRule, SymbolRule, Transform } from "./types";

/** Split a string into single-character symbols. */
export function chars(s: string): string[] {
  return Array.from(s);
}

export function symbolRule<T>(symbol: T, replacement: Sequence<T>, name?: string): SymbolRule<T> {
  return { name, symbol, replacement };
}

export function patternRule<T>(pattern: Sequence<T>, replacement: Sequence<T>, name?: string): PatternRule<T> {
  return { name, pattern, replacement };
}

export function stochasticRule<T>(
  pattern: Sequence<T>,
  replacement: Sequence<T>,
  probability: number,
  name?: string
): StochasticRule<T> {
  return { name, pattern, replacement, probability };
}

export function functionRule<T>(pattern: Sequence<T>, transform: Transform<T>, name?: string): FunctionRule<T> {
  return { name, pattern, transform };
}

/**
 * Lift single-symbol rules into equivalent one-symbol patterns.
 */
export function toPatternRules<T>(rules: readonly SymbolRule<T>[]): PatternRule<T>[] {
  return rules.map((r) => ({ name: r.name, pattern: [r.symbol], replacement: r.replacement }));
}

/**
 * Label used in trace output: the rule's name, or `#index` when unnamed.
 */
export function ruleLabel(rule: { name?: string }, index: number): string {
  return rule.name ?? `#${index}`;
}
