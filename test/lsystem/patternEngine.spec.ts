// test/lsystem/patternEngine.spec.ts
// Multi-symbol pattern rewriting

import { describe, it, expect } from "vitest";
import { rewritePatterns } from "../../src/core/lsystem/patternEngine";
import { rewriteSymbols } from "../../src/core/lsystem/symbolEngine";
import { chars, patternRule, symbolRule, toPatternRules } from "../../src/core/lsystem/rules";
import { matchesAt } from "../../src/core/lsystem/scan";
import { structuralAlgebra } from "../../src/core/lsystem/symbols";
import { collectingTraceSink } from "../../src/adapters/logging";
import { LSystemError } from "../../src/outcome/failure";

const algae = [patternRule(["A"], chars("AB")), patternRule(["B"], ["A"])];

describe("matchesAt", () => {
  const eq = structuralAlgebra<string>();

  it("matches a run starting at the cursor", () => {
    expect(matchesAt(chars("XAB"), 1, chars("AB"), eq)).toBe(true);
    expect(matchesAt(chars("XAB"), 0, chars("AB"), eq)).toBe(false);
  });

  it("fails when the pattern runs past the end", () => {
    expect(matchesAt(chars("XA"), 1, chars("AB"), eq)).toBe(false);
  });
});

describe("rewritePatterns", () => {
  it("rewrites one-symbol patterns like the symbol engine", () => {
    expect(rewritePatterns(["A"], algae, 2)).toEqual(["A", "B", "A"]);

    const symbolRules = [symbolRule("A", chars("AB")), symbolRule("B", ["A"])];
    for (let n = 0; n <= 6; n++) {
      expect(rewritePatterns(["A"], toPatternRules(symbolRules), n)).toEqual(rewriteSymbols(["A"], symbolRules, n));
    }
  });

  it("returns the axiom for zero iterations and empty rules", () => {
    expect(rewritePatterns(chars("AB"), algae, 0)).toEqual(["A", "B"]);
    expect(rewritePatterns(chars("AB"), [], 3)).toEqual(["A", "B"]);
  });

  it("leaves an empty axiom empty", () => {
    expect(rewritePatterns([], algae, 4)).toEqual([]);
  });

  it("prefers rule order over pattern length", () => {
    const shortFirst = [patternRule(["A"], ["X"]), patternRule(chars("AB"), ["Y"])];
    const longFirst = [patternRule(chars("AB"), ["Y"]), patternRule(["A"], ["X"])];

    expect(rewritePatterns(chars("AB"), shortFirst, 1)).toEqual(["X", "B"]);
    expect(rewritePatterns(chars("AB"), longFirst, 1)).toEqual(["Y"]);
  });

  it("never lets two rewrites share a symbol", () => {
    const sink = collectingTraceSink();
    const out = rewritePatterns(chars("AAA"), [patternRule(chars("AA"), ["B"])], 1, { trace: sink, traceRules: true });

    expect(out).toEqual(["B", "A"]);
    expect(sink.events.filter((e) => e.tag === "E_RuleApplied")).toEqual([
      { tag: "E_RuleApplied", engine: "pattern", iteration: 1, position: 0, rule: "#0" },
    ]);
  });

  it("advances the cursor by the pattern length after a match", () => {
    const sink = collectingTraceSink();
    rewritePatterns(chars("ABCAB"), [patternRule(chars("AB"), ["X"])], 1, { trace: sink, traceRules: true });

    const positions = sink.events.flatMap((e) => (e.tag === "E_RuleApplied" ? [e.position] : []));
    expect(positions).toEqual([0, 3]);
  });

  it("skips patterns longer than the remaining input", () => {
    expect(rewritePatterns(["A"], [patternRule(chars("AB"), ["X"])], 1)).toEqual(["A"]);
  });

  it("expresses left context with longer patterns", () => {
    // B turns into C only when it follows an A
    const rules = [patternRule(chars("AB"), chars("AC"))];
    expect(rewritePatterns(chars("BABAB"), rules, 1)).toEqual(chars("BACAC"));
  });

  it("deletes matches with an empty replacement", () => {
    expect(rewritePatterns(chars("ABAB"), [patternRule(["B"], [])], 1)).toEqual(["A", "A"]);
  });

  it("copies structured replacements", () => {
    const replacement = [{ kind: "leaf" }];
    const out = rewritePatterns([{ kind: "bud" }], [patternRule([{ kind: "bud" }], replacement)], 1);
    expect(out).toEqual([{ kind: "leaf" }]);
    expect(out[0]).not.toBe(replacement[0]);
  });

  it("rejects empty patterns before rewriting", () => {
    const rules = [patternRule(["A"], ["B"]), patternRule([], ["C"], "empty")];
    for (const iterations of [0, 1]) {
      try {
        rewritePatterns(["A"], rules, iterations);
        expect.unreachable();
      } catch (e) {
        expect(e).toBeInstanceOf(LSystemError);
        if (e instanceof LSystemError) {
          expect(e.code).toBe("E0410");
          expect(e.message).toBe("Rule empty has an empty pattern");
          expect(e.failure.context).toEqual({ index: 1, name: "empty" });
        }
      }
    }
  });
});
