import type { ScoringConfig } from "../config.js";

type Tier = "high" | "medium" | "low";

const TIERS: Tier[] = ["high", "medium", "low"];

// Only the first few high-value hits are spelled out in score reasons.
const MAX_KEYWORD_REASONS = 3;

export interface CompiledTier {
  weight: number;
  patterns: RegExp[];
}

export type KeywordSignals = Record<Tier, CompiledTier>;

export interface KeywordScore {
  score: number;
  reasons: string[];
}

export function compileSignals(keywords: ScoringConfig["keywords"]): KeywordSignals {
  const compile = (tier: Tier): CompiledTier => ({
    weight: keywords[tier].weight,
    patterns: [...new Set(keywords[tier].patterns)].map((p) => new RegExp(p, "i")),
  });
  return { high: compile("high"), medium: compile("medium"), low: compile("low") };
}

/**
 * Each distinct pattern that matches adds its tier weight once; the total
 * for one blob of text never exceeds `cap`.
 */
export function scoreKeywords(
  text: string,
  signals: KeywordSignals,
  cap: number
): KeywordScore {
  if (!text) return { score: 0, reasons: [] };

  let score = 0;
  const reasons: string[] = [];

  for (const tier of TIERS) {
    const { weight, patterns } = signals[tier];
    for (const pattern of patterns) {
      const match = pattern.exec(text);
      if (!match) continue;
      score += weight;
      if (tier === "high" && reasons.length < MAX_KEYWORD_REASONS) {
        reasons.push(`'${match[0]}': +${weight.toFixed(2)}`);
      }
    }
  }

  return { score: Math.min(score, cap), reasons };
}
