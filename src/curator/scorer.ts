import * as core from "@actions/core";
import type { ScoringConfig } from "../config.js";
import { NotFoundError, ValidationError } from "../errors.js";
import type { Store } from "../store/types.js";
import type { Candidate, Claim } from "../types.js";
import { compileSignals, scoreKeywords, type KeywordSignals } from "./keywords.js";

export interface ScoringResult {
  candidateId: number;
  score: number;
  /** Contributions in the order the rules ran, not by size. */
  reasons: string[];
  claimCount: number;
  feedCount: number;
}

const plus = (value: number) => `+${value.toFixed(2)}`;

export function computeScore(
  candidate: Pick<Candidate, "id" | "category" | "description">,
  claims: Pick<Claim, "content" | "confidence" | "feedId">[],
  config: ScoringConfig,
  signals: KeywordSignals = compileSignals(config.keywords)
): ScoringResult {
  const reasons: string[] = [];
  let score = 0;

  const category = candidate.category ?? "other";
  const categoryWeight =
    config.category_weights[category] ?? config.category_weights.other ?? 0;
  const categoryScore = categoryWeight * config.category_factor;
  score += categoryScore;
  reasons.push(`Category '${category}': ${plus(categoryScore)}`);

  if (claims.length > 0) {
    const claimBonus = Math.min(
      claims.length * config.claim_bonus_per_claim,
      config.claim_bonus_cap
    );
    score += claimBonus;
    reasons.push(`${claims.length} claims: ${plus(claimBonus)}`);

    const claimKeywords = scoreKeywords(
      claims.map((c) => c.content).join(" "),
      signals,
      config.keyword_cap
    );
    score += claimKeywords.score;
    reasons.push(...claimKeywords.reasons);

    const avgConfidence =
      claims.reduce((sum, c) => sum + c.confidence, 0) / claims.length;
    const confidenceBonus = avgConfidence * config.confidence_weight;
    score += confidenceBonus;
    reasons.push(`Avg confidence ${avgConfidence.toFixed(2)}: ${plus(confidenceBonus)}`);
  }

  if (candidate.description) {
    const descKeywords = scoreKeywords(candidate.description, signals, config.keyword_cap);
    const descScore = descKeywords.score * config.description_weight;
    score += descScore;
    if (descScore > 0) {
      reasons.push(`Description keywords: ${plus(descScore)}`);
    }
  }

  const feedCount = new Set(claims.map((c) => c.feedId)).size;
  if (feedCount > 1) {
    const sourceBonus = Math.min(
      feedCount * config.source_bonus_per_feed,
      config.source_bonus_cap
    );
    score += sourceBonus;
    reasons.push(`${feedCount} sources: ${plus(sourceBonus)}`);
  }

  return {
    candidateId: candidate.id,
    score: Math.min(Math.max(score, 0), 1),
    reasons,
    claimCount: claims.length,
    feedCount,
  };
}

export async function scoreCandidate(
  store: Store,
  candidateId: number,
  config: ScoringConfig
): Promise<ScoringResult> {
  const candidate = await store.getCandidate(candidateId);
  if (!candidate) throw new NotFoundError("Candidate", candidateId);

  const claims = await store.listClaims(candidateId);
  const result = computeScore(candidate, claims, config);
  core.debug(
    `Scored #${candidateId} "${candidate.name}" ${result.score.toFixed(3)}: ${result.reasons.join("; ")}`
  );
  return result;
}

export async function persistScore(store: Store, result: ScoringResult): Promise<void> {
  if (!Number.isFinite(result.score) || result.score < 0 || result.score > 1) {
    throw new ValidationError(`Score ${result.score} is outside [0, 1]`, {
      candidateId: result.candidateId,
    });
  }
  await store.setScore(result.candidateId, result.score);
}
