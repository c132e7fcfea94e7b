import { describe, it, expect } from "vitest";
import { analyzePattern } from "../src/pattern-complexity";

describe("analyzePattern", () => {
  it("scores a literal as a substring search", () => {
    expect(analyzePattern("error")).toEqual({
      pattern: "error",
      score: 0.5,
      level: "very-simple",
      risk: "Very low: essentially a substring search",
      warnings: [],
      details: { characterClasses: 0, quantifiers: 0, anchors: 0, literals: 0.5 },
      patternLength: 5,
    });
  });

  it("counts anchors and quantifiers", () => {
    const result = analyzePattern("^ERROR \\d+$");
    expect(result.details).toEqual({
      characterClasses: 0,
      quantifiers: 3,
      anchors: 2,
      literals: 0.7,
    });
    expect(result.score).toBe(5.7);
  });

  it("flags a nested quantifier", () => {
    const result = analyzePattern("(a+)+");
    expect(result.score).toBe(56.1);
    expect(result.level).toBe("moderate");
    expect(result.details.nestedQuantifiers).toBe(50);
    expect(result.warnings).toEqual([
      "Found 1 nested quantifier(s): catastrophic backtracking risk",
    ]);
  });

  it("flags a backreference", () => {
    const result = analyzePattern("(\\w+) \\1");
    expect(result.score).toBe(23.3);
    expect(result.level).toBe("simple");
    expect(result.warnings).toEqual(["Found 1 backreference(s): matching is no longer regular"]);
  });

  it("rates stacked wildcards as dangerous", () => {
    const result = analyzePattern(".*.*.*.*");
    expect(result.score).toBe(262);
    expect(result.level).toBe("dangerous");
    expect(result.details.greedySequences).toBe(250);
    expect(result.warnings).toEqual([
      "Found 4 adjacent greedy quantifier(s), 4 .* pattern(s), 4 bare * quantifier(s): " +
        "catastrophic backtracking risk",
      "This pattern may cause catastrophic backtracking",
    ]);
  });

  it("scales long patterns by their length", () => {
    const result = analyzePattern("timeout while connecting");
    expect(result.patternLength).toBe(24);
    expect(result.details.lengthMultiplier).toBe(0.32);
    expect(result.score).toBe(0.8);
  });
});
