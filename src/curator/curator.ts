import * as core from "@actions/core";
import type { DedupConfig, ScoringConfig } from "../config.js";
import { ValidationError } from "../errors.js";
import type { Store } from "../store/types.js";
import { runDeduplication } from "./dedup.js";
import { compileSignals } from "./keywords.js";
import { computeScore, persistScore, type ScoringResult } from "./scorer.js";

export interface CurationOptions {
  minRelevance: number;
  autoMerge: boolean;
  maxReviewQueue: number;
}

export interface CurationSummary {
  scored: number;
  promoted: number;
  belowThreshold: number;
  duplicatesFound: number;
  duplicatesMerged: number;
  minScore: number;
  maxScore: number;
  avgScore: number;
}

export interface CurationSettings {
  scoring: ScoringConfig;
  dedup: DedupConfig;
}

function validateOptions(options: CurationOptions): void {
  const { minRelevance, maxReviewQueue } = options;
  if (!Number.isFinite(minRelevance) || minRelevance < 0 || minRelevance > 1) {
    throw new ValidationError(`min_relevance must be within [0, 1], got ${minRelevance}`);
  }
  if (!Number.isInteger(maxReviewQueue) || maxReviewQueue < 0) {
    throw new ValidationError(
      `max_review_queue must be a non-negative integer, got ${maxReviewQueue}`
    );
  }
}

/**
 * Dedup, then score everything in `analyzing`, then promote the best
 * qualifying candidates into `review` while the review queue has room.
 * Candidates that qualify but find no slot stay in `analyzing` for the next run.
 */
export async function runCuration(
  store: Store,
  options: CurationOptions,
  settings: CurationSettings,
  signal?: AbortSignal
): Promise<CurationSummary> {
  validateOptions(options);

  core.info("Stage 1/3: Detecting duplicates...");
  const dedup = await runDeduplication(store, {
    autoMerge: options.autoMerge,
    thresholds: settings.dedup,
  });

  const candidates = await store.listCandidatesByStatus("analyzing");
  const summary: CurationSummary = {
    scored: 0,
    promoted: 0,
    belowThreshold: 0,
    duplicatesFound: dedup.duplicatesFound,
    duplicatesMerged: dedup.merged,
    minScore: 0,
    maxScore: 0,
    avgScore: 0,
  };
  if (candidates.length === 0) {
    core.info("No candidates in analyzing, nothing to score");
    return summary;
  }

  core.info(`Stage 2/3: Scoring ${candidates.length} candidates...`);
  const signals = compileSignals(settings.scoring.keywords);
  const results: ScoringResult[] = [];
  // Scores come from the records listed above; a candidate removed meanwhile
  // is still scored and the next run reconciles.
  for (const candidate of candidates) {
    signal?.throwIfAborted();
    const claims = await store.listClaims(candidate.id);
    const result = computeScore(candidate, claims, settings.scoring, signals);
    core.debug(
      `Scored #${candidate.id} "${candidate.name}" ${result.score.toFixed(3)}: ${result.reasons.join("; ")}`
    );
    await persistScore(store, result);
    results.push(result);
  }

  signal?.throwIfAborted();
  const inReview = await store.countCandidatesByStatus("review");
  let availableSlots = Math.max(0, options.maxReviewQueue - inReview);
  core.info(
    `Stage 3/3: Promoting (${inReview} in review, ${availableSlots} slots available)...`
  );

  // Array.prototype.sort is stable, so equal scores keep fetch order.
  const ranked = [...results].sort((a, b) => b.score - a.score);
  for (const result of ranked) {
    if (result.score < options.minRelevance) {
      summary.belowThreshold++;
      continue;
    }
    if (availableSlots === 0) continue;

    signal?.throwIfAborted();
    await store.setStatus(result.candidateId, "review");
    availableSlots--;
    summary.promoted++;
  }

  const scores = results.map((r) => r.score);
  summary.scored = results.length;
  summary.minScore = scores.reduce((min, s) => Math.min(min, s), Infinity);
  summary.maxScore = scores.reduce((max, s) => Math.max(max, s), -Infinity);
  summary.avgScore = scores.reduce((sum, s) => sum + s, 0) / scores.length;

  core.info(
    `Curation: ${summary.scored} scored, ${summary.promoted} promoted, ${summary.belowThreshold} below threshold`
  );
  return summary;
}
