// test/lsystem/symbolEngine.spec.ts
// Single-symbol deterministic rewriting

import { describe, it, expect } from "vitest";
import { rewriteSymbols } from "../../src/core/lsystem/symbolEngine";
import { chars, symbolRule } from "../../src/core/lsystem/rules";
import type { SymbolAlgebra } from "../../src/core/lsystem/types";
import { collectingTraceSink } from "../../src/adapters/logging";
import { LSystemError } from "../../src/outcome/failure";

const algae = [symbolRule("A", chars("AB"), "A->AB"), symbolRule("B", ["A"], "B->A")];

describe("rewriteSymbols", () => {
  it("grows Lindenmayer's algae", () => {
    expect(rewriteSymbols(["A"], algae, 1)).toEqual(["A", "B"]);
    expect(rewriteSymbols(["A"], algae, 2)).toEqual(["A", "B", "A"]);
    expect(rewriteSymbols(["A"], algae, 3)).toEqual(["A", "B", "A", "A", "B"]);
    expect(rewriteSymbols(["A"], algae, 5).join("")).toBe("ABAABABAABAAB");
  });

  it("returns an equal copy of the axiom for zero iterations", () => {
    const axiom = chars("ABBA");
    const out = rewriteSymbols(axiom, algae, 0);
    expect(out).toEqual(axiom);
    expect(out).not.toBe(axiom);
  });

  it("is the identity for an empty rule set", () => {
    expect(rewriteSymbols(chars("ABC"), [], 4)).toEqual(["A", "B", "C"]);
  });

  it("leaves an empty axiom empty", () => {
    expect(rewriteSymbols([], algae, 6)).toEqual([]);
  });

  it("passes symbols without a rule through unchanged", () => {
    expect(rewriteSymbols(chars("AXB"), algae, 1)).toEqual(["A", "B", "X", "A"]);
  });

  it("applies only the first of several rules for the same symbol", () => {
    const rules = [symbolRule("A", ["X"]), symbolRule("A", ["Y"])];
    expect(rewriteSymbols(["A", "A"], rules, 1)).toEqual(["X", "X"]);
  });

  it("deletes symbols with an empty replacement", () => {
    expect(rewriteSymbols(chars("ABAB"), [symbolRule("B", [])], 1)).toEqual(["A", "A"]);
  });

  it("is deterministic", () => {
    expect(rewriteSymbols(["A"], algae, 7)).toEqual(rewriteSymbols(["A"], algae, 7));
  });

  it("does not mutate its inputs", () => {
    const axiom = ["A"];
    rewriteSymbols(axiom, algae, 4);
    expect(axiom).toEqual(["A"]);
    expect(algae[0].replacement).toEqual(["A", "B"]);
  });

  it("compares structured symbols by value and copies replacements", () => {
    const replacement = [{ t: "B", n: 1 }];
    const rules = [symbolRule<{ t: string; n?: number }>({ t: "A" }, replacement)];
    const out = rewriteSymbols([{ t: "A" }], rules, 1);

    expect(out).toEqual([{ t: "B", n: 1 }]);
    expect(out[0]).not.toBe(replacement[0]);
  });

  it("uses a caller-supplied algebra", () => {
    const caseless: SymbolAlgebra<string> = {
      equals: (a, b) => a.toLowerCase() === b.toLowerCase(),
      clone: (s) => s,
    };
    expect(rewriteSymbols(["a", "b"], [symbolRule("A", ["C"])], 1, { algebra: caseless })).toEqual(["C", "b"]);
  });

  it("rejects negative and fractional iteration counts", () => {
    expect(() => rewriteSymbols(["A"], algae, -1)).toThrow(LSystemError);
    try {
      rewriteSymbols(["A"], algae, 1.5);
      expect.unreachable();
    } catch (e) {
      expect(e).toBeInstanceOf(LSystemError);
      if (e instanceof LSystemError) {
        expect(e.code).toBe("E0411");
        expect(e.failure.reason).toBe("validation-failed");
      }
    }
  });

  it("emits one generation event per pass", () => {
    const sink = collectingTraceSink();
    rewriteSymbols(["A"], algae, 3, { trace: sink });

    expect(sink.events).toEqual([
      { tag: "E_Generation", engine: "symbol", iteration: 1, inputLength: 1, outputLength: 2, applied: 1 },
      { tag: "E_Generation", engine: "symbol", iteration: 2, inputLength: 2, outputLength: 3, applied: 2 },
      { tag: "E_Generation", engine: "symbol", iteration: 3, inputLength: 3, outputLength: 5, applied: 3 },
    ]);
  });

  it("emits rule events when asked", () => {
    const sink = collectingTraceSink();
    rewriteSymbols(chars("AB"), algae, 1, { trace: sink, traceRules: true });

    expect(sink.events).toEqual([
      { tag: "E_RuleApplied", engine: "symbol", iteration: 1, position: 0, rule: "A->AB" },
      { tag: "E_RuleApplied", engine: "symbol", iteration: 1, position: 1, rule: "B->A" },
      { tag: "E_Generation", engine: "symbol", iteration: 1, inputLength: 2, outputLength: 3, applied: 2 },
    ]);
  });

  it("labels unnamed rules by index", () => {
    const sink = collectingTraceSink();
    rewriteSymbols(["B"], [symbolRule("A", ["B"]), symbolRule("B", ["C"])], 1, { trace: sink, traceRules: true });
    expect(sink.events[0]).toEqual({ tag: "E_RuleApplied", engine: "symbol", iteration: 1, position: 0, rule: "#1" });
  });
});
