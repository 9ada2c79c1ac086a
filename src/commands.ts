import * as core from "@actions/core";
import type { ShortlistConfig } from "./config.js";
import { runCuration } from "./curator/curator.js";
import { runDeduplication } from "./curator/dedup.js";
import { scoreCandidate } from "./curator/scorer.js";
import { ValidationError } from "./errors.js";
import { analyzeMentions } from "./intake/analyzer.js";
import { collectMentions } from "./intake/rss.js";
import { setStatus } from "./lifecycle/status.js";
import {
  writeChangelogSummary,
  writeCurationSummary,
  writeDedupSummary,
  writeIntakeSummary,
  writeScoreSummary,
  writeStatusSummary,
  writeUpdateSummary,
  type ChangelogEntry,
} from "./output/summary.js";
import { runIntake, type IntakeDeps } from "./pipeline.js";
import type { Store } from "./store/types.js";
import { HttpPageFetcher, type PageFetcher } from "./tracker/fetcher.js";
import { UpdateTracker, runUpdateCheck } from "./tracker/tracker.js";
import { CANDIDATE_STATUSES, type CandidateStatus } from "./types.js";

export const COMMANDS = [
  "intake",
  "curate",
  "dedup",
  "track",
  "score",
  "set_status",
  "changelog",
  "status",
] as const;
export type Command = (typeof COMMANDS)[number];

export function isCommand(value: string): value is Command {
  return COMMANDS.some((command) => command === value);
}

export interface CommandInputs {
  candidateId?: string;
  status?: string;
  reason?: string;
  days?: string;
}

export interface CommandContext {
  store: Store;
  config: ShortlistConfig;
  inputs: CommandInputs;
  fetcher?: PageFetcher;
  intake?: IntakeDeps;
  signal?: AbortSignal;
}

export type CommandOutputs = Record<string, string | number>;

function parseCandidateId(raw: string | undefined): number {
  const id = Number(raw);
  if (!raw || !Number.isInteger(id) || id <= 0) {
    throw new ValidationError(`candidate_id must be a positive integer, got "${raw ?? ""}"`);
  }
  return id;
}

function parseDays(raw: string | undefined): number {
  if (!raw) return 7;
  const days = Number(raw);
  if (!Number.isInteger(days) || days <= 0) {
    throw new ValidationError(`days must be a positive integer, got "${raw}"`);
  }
  return days;
}

const defaultIntake: IntakeDeps = {
  collect: (store, config) => collectMentions(store, config),
  analyze: (store, config) => analyzeMentions(store, config),
};

/** Runs one command against the store and returns the Action outputs it sets. */
export async function runCommand(
  command: Command,
  ctx: CommandContext
): Promise<CommandOutputs> {
  const { store, config, inputs } = ctx;

  switch (command) {
    case "intake": {
      const result = await runIntake(store, config.intake, ctx.intake ?? defaultIntake);
      await writeIntakeSummary(result);
      return {
        mentions_collected: result.mentionsCollected,
        candidates_extracted: result.candidatesExtracted,
      };
    }

    case "curate": {
      const summary = await runCuration(
        store,
        {
          minRelevance: config.curation.min_relevance,
          autoMerge: config.curation.auto_merge,
          maxReviewQueue: config.curation.max_review_queue,
        },
        { scoring: config.scoring, dedup: config.dedup },
        ctx.signal
      );
      await writeCurationSummary(summary);
      return {
        scored: summary.scored,
        promoted: summary.promoted,
        below_threshold: summary.belowThreshold,
        duplicates_found: summary.duplicatesFound,
        duplicates_merged: summary.duplicatesMerged,
      };
    }

    case "dedup": {
      const result = await runDeduplication(store, {
        autoMerge: false,
        thresholds: config.dedup,
      });
      await writeDedupSummary(result);
      return { duplicates_found: result.duplicatesFound, duplicates_merged: 0 };
    }

    case "track": {
      const fetcher =
        ctx.fetcher ??
        new HttpPageFetcher({
          timeoutMs: config.tracker.timeout_ms,
          userAgent: config.tracker.user_agent,
        });
      const tracker = new UpdateTracker(store, fetcher, config.tracker);
      const result = await runUpdateCheck(store, tracker, ctx.signal);
      await writeUpdateSummary(result);
      return {
        checked: result.checked,
        changes_detected: result.recorded,
        failures: result.failures.length,
      };
    }

    case "score": {
      const candidateId = parseCandidateId(inputs.candidateId);
      const result = await scoreCandidate(store, candidateId, config.scoring);
      const candidate = await store.getCandidate(candidateId);
      await writeScoreSummary(candidate?.name ?? `#${candidateId}`, result);
      core.info(`Candidate #${candidateId} scores ${result.score.toFixed(3)}`);
      return { score: result.score.toFixed(3) };
    }

    case "set_status": {
      const candidateId = parseCandidateId(inputs.candidateId);
      const change = await setStatus(
        store,
        candidateId,
        inputs.status ?? "",
        inputs.reason
      );
      return { status: change.candidate.status, previous_status: change.previousStatus };
    }

    case "changelog": {
      const days = parseDays(inputs.days);
      const events = await store.listRecentChanges(days);
      const names = new Map<number, string>();
      const entries: ChangelogEntry[] = [];
      for (const event of events) {
        let name = names.get(event.candidateId);
        if (name === undefined) {
          const candidate = await store.getCandidate(event.candidateId);
          name = candidate?.name ?? `#${event.candidateId}`;
          names.set(event.candidateId, name);
        }
        entries.push({ ...event, candidateName: name });
      }
      await writeChangelogSummary(days, entries);
      return { changes: entries.length };
    }

    case "status": {
      const counts: Array<[CandidateStatus, number]> = [];
      for (const status of CANDIDATE_STATUSES) {
        counts.push([status, await store.countCandidatesByStatus(status)]);
      }
      await writeStatusSummary(counts);
      const outputs: CommandOutputs = {};
      for (const [status, count] of counts) outputs[`${status}_count`] = count;
      return outputs;
    }
  }
}
