// src/presets.ts
// Built-in L-systems used by the CLI.

import type { RngPort } from "./ports/rng";
import type { LSystem } from "./core/lsystem/system";
import { chars, functionRule, patternRule, stochasticRule, symbolRule } from "./core/lsystem/rules";
import { failure, LSystemError } from "./outcome/failure";
import { makeDiagnostic } from "./outcome/codes";

export type Preset = {
  name: string;
  description: string;
  /** Randomized presets draw from `rng`; the others ignore it. */
  build(rng: RngPort): LSystem<string>;
};

/**
 * Repeat the matched symbols between zero and three times.
 */
export function echoTransform(rng: RngPort): (matched: string[]) => string[] {
  return (matched) => {
    const times = rng.uniformInt(0, 3);
    const out: string[] = [];
    for (let i = 0; i < times; i++) out.push(...matched);
    return out;
  };
}

export const PRESETS: readonly Preset[] = [
  {
    name: "algae",
    description: "Lindenmayer's algae: A -> AB, B -> A",
    build: () => ({
      kind: "symbol",
      axiom: ["A"],
      rules: [symbolRule("A", chars("AB"), "A->AB"), symbolRule("B", ["A"], "B->A")],
    }),
  },
  {
    name: "algae-pattern",
    description: "algae written as one-symbol pattern rules",
    build: () => ({
      kind: "pattern",
      axiom: ["A"],
      rules: [patternRule(["A"], chars("AB"), "A->AB"), patternRule(["B"], ["A"], "B->A")],
    }),
  },
  {
    name: "algae-stochastic",
    description: "A -> AB with p=0.5, B -> A with p=0.75",
    build: () => ({
      kind: "stochastic",
      axiom: ["A"],
      rules: [stochasticRule(["A"], chars("AB"), 0.5, "A->AB"), stochasticRule(["B"], ["A"], 0.75, "B->A")],
    }),
  },
  {
    name: "echo-random",
    description: "A is repeated 0 to 3 times each generation",
    build: (rng) => ({
      kind: "functional",
      axiom: ["A"],
      rules: [functionRule(["A"], echoTransform(rng), "A->A*n")],
    }),
  },
  {
    name: "cantor",
    description: "Cantor set: A -> ABA, B -> BBB",
    build: () => ({
      kind: "symbol",
      axiom: ["A"],
      rules: [symbolRule("A", chars("ABA")), symbolRule("B", chars("BBB"))],
    }),
  },
  {
    name: "koch",
    description: "Koch curve: F -> F+F-F-F+F",
    build: () => ({
      kind: "symbol",
      axiom: ["F"],
      rules: [symbolRule("F", chars("F+F-F-F+F"))],
    }),
  },
];

/** The presets that mirror the four engines, run together by `--preset all`. */
export const DEMO_PRESETS = ["algae", "algae-pattern", "algae-stochastic", "echo-random"] as const;

export function findPreset(name: string): Preset {
  const preset = PRESETS.find((p) => p.name === name);
  if (!preset) {
    throw new LSystemError(
      failure("config-error", `Unknown preset: ${name}`, {
        diagnostics: [makeDiagnostic("E0502", { name })],
        context: { available: PRESETS.map((p) => p.name) },
      })
    );
  }
  return preset;
}
