import { describe, it, expect } from "vitest";
import { defaultConfig } from "../../src/config.js";
import { compileSignals, scoreKeywords } from "../../src/curator/keywords.js";

const signals = compileSignals(defaultConfig().scoring.keywords);

describe("scoreKeywords", () => {
  it("adds the tier weight once per matching pattern", () => {
    expect(scoreKeywords("Great for cold email and SDR teams", signals, 0.4)).toEqual({
      score: 0.3,
      reasons: ["'SDR': +0.15", "'cold email': +0.15"],
    });
  });

  it("matches case-insensitively and reports the text as written", () => {
    const result = scoreKeywords("our sdr loved it", signals, 0.4);
    expect(result.reasons).toEqual(["'sdr': +0.15"]);
  });

  it("caps the total and lists at most three high-tier matches", () => {
    const result = scoreKeywords("SDR BDR prospecting outreach cold call", signals, 0.4);
    expect(result.score).toBe(0.4);
    expect(result.reasons).toEqual(["'SDR': +0.15", "'BDR': +0.15", "'cold call': +0.15"]);
  });

  it("scores lower tiers without listing them", () => {
    const result = scoreKeywords("A CRM with AI", signals, 0.4);
    expect(result.score).toBeCloseTo(0.11, 10);
    expect(result.reasons).toEqual([]);
  });

  it("needs a word boundary", () => {
    expect(scoreKeywords("Book meetings faster", signals, 0.4).score).toBe(0);
  });

  it("is zero for empty text", () => {
    expect(scoreKeywords("", signals, 0.4)).toEqual({ score: 0, reasons: [] });
  });
});

describe("compileSignals", () => {
  it("drops repeated patterns within a tier", () => {
    const compiled = compileSignals({
      high: { weight: 0.15, patterns: ["\\bSDR\\b", "\\bSDR\\b"] },
      medium: { weight: 0.08, patterns: [] },
      low: { weight: 0.03, patterns: [] },
    });
    expect(compiled.high.patterns).toHaveLength(1);
    expect(scoreKeywords("SDR", compiled, 0.4).score).toBe(0.15);
  });
});
