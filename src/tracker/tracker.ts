import * as core from "@actions/core";
import type { TrackerConfig } from "../config.js";
import { ExternalFetchError, errorMessage } from "../errors.js";
import type { Store } from "../store/types.js";
import type { Candidate, ChangeType, Snapshot } from "../types.js";
import type { PageFetcher } from "./fetcher.js";
import { fingerprintPage, type PageFingerprint } from "./page.js";

export interface DetectedChange {
  candidateId: number;
  candidateName: string;
  changeType: Exclude<ChangeType, "new">;
  description: string;
  sourceUrl: string | null;
}

export interface CheckFailure {
  candidateId: number;
  candidateName: string;
  error: ExternalFetchError;
}

export interface BatchCheckResult {
  checked: number;
  changes: DetectedChange[];
  failures: CheckFailure[];
}

export interface UpdateCheckResult extends BatchCheckResult {
  recorded: number;
}

const excerpt = (text: string, length: number) => text.slice(0, length);

export function detectChanges(
  candidate: Pick<Candidate, "id" | "name">,
  url: string,
  previous: Pick<Snapshot, "title" | "contentHash" | "pricingText" | "featuresText">,
  current: PageFingerprint
): DetectedChange[] {
  const changes: DetectedChange[] = [];
  const change = (changeType: DetectedChange["changeType"], description: string) =>
    changes.push({
      candidateId: candidate.id,
      candidateName: candidate.name,
      changeType,
      description,
      sourceUrl: url,
    });

  if (previous.contentHash !== current.contentHash) {
    const before = previous.pricingText;
    const after = current.pricingText;
    if (before !== after) {
      if (after && !before) change("pricing_change", `Pricing info added: ${excerpt(after, 100)}`);
      else if (before && !after) change("pricing_change", "Pricing info removed");
      else change("pricing_change", `Pricing updated: ${excerpt(after ?? "", 100)}`);
    }

    if (previous.featuresText !== current.featuresText) {
      if (current.featuresText && !previous.featuresText) {
        change("feature_added", "Features section added");
      } else if (previous.featuresText && !current.featuresText) {
        change("feature_added", "Features section removed");
      } else {
        change("feature_added", "Features updated");
      }
    }

    if (changes.length === 0) {
      change("content_change", "Website content updated");
    }
  }

  if (previous.title && current.title && previous.title !== current.title) {
    change("news", `Title changed: '${excerpt(current.title, 50)}'`);
  }

  return changes;
}

/**
 * Compares each approved candidate's page against its latest snapshot.
 * Detection only: returned changes are written to the changelog by
 * `runUpdateCheck`, never by the tracker.
 */
export class UpdateTracker {
  constructor(
    private readonly store: Store,
    private readonly fetcher: PageFetcher,
    private readonly config: TrackerConfig,
    private readonly now: () => Date = () => new Date()
  ) {}

  /**
   * @throws ExternalFetchError when the page cannot be fetched; no snapshot
   *   is written and the previous one stays the baseline.
   */
  async check(candidate: Candidate): Promise<DetectedChange[]> {
    if (!candidate.url) return [];

    let html: string;
    try {
      html = await this.fetcher.fetchPage(candidate.url);
    } catch (error) {
      if (error instanceof ExternalFetchError) throw error;
      throw new ExternalFetchError(candidate.url, errorMessage(error), error);
    }
    const current = fingerprintPage(html, this.config.max_matches);

    const previous = await this.store.getLatestSnapshot(candidate.id);
    const changes = previous
      ? detectChanges(candidate, candidate.url, previous, current)
      : [];

    await this.store.appendSnapshot({
      candidateId: candidate.id,
      url: candidate.url,
      ...current,
      fetchedAt: this.now(),
    });

    return changes;
  }

  /**
   * Checks approved candidates in chunks of `concurrency`. `onChanges` runs
   * for each successful check before the next chunk starts, so an abort
   * between chunks never leaves a written snapshot without its events.
   */
  async checkAllApproved(
    signal?: AbortSignal,
    onChanges?: (changes: DetectedChange[]) => Promise<void>
  ): Promise<BatchCheckResult> {
    const candidates = await this.store.listCandidatesByStatus("approved");
    const result: BatchCheckResult = { checked: 0, changes: [], failures: [] };

    for (let i = 0; i < candidates.length; i += this.config.concurrency) {
      signal?.throwIfAborted();
      const batch = candidates.slice(i, i + this.config.concurrency);
      const settled = await Promise.allSettled(batch.map((c) => this.check(c)));

      let fatal: { error: unknown } | undefined;
      for (const [index, outcome] of settled.entries()) {
        const candidate = batch[index];
        result.checked++;
        if (outcome.status === "fulfilled") {
          result.changes.push(...outcome.value);
          if (onChanges && outcome.value.length > 0) await onChanges(outcome.value);
          continue;
        }
        if (!(outcome.reason instanceof ExternalFetchError)) {
          fatal ??= { error: outcome.reason };
          continue;
        }
        core.warning(`Error checking "${candidate.name}": ${outcome.reason.message}`);
        result.failures.push({
          candidateId: candidate.id,
          candidateName: candidate.name,
          error: outcome.reason,
        });
      }
      if (fatal) throw fatal.error;
    }

    return result;
  }
}

export async function runUpdateCheck(
  store: Store,
  tracker: UpdateTracker,
  signal?: AbortSignal
): Promise<UpdateCheckResult> {
  let recorded = 0;
  const result = await tracker.checkAllApproved(signal, async (changes) => {
    for (const change of changes) {
      await store.appendChangeEvent({
        candidateId: change.candidateId,
        changeType: change.changeType,
        description: change.description,
        sourceUrl: change.sourceUrl,
      });
      recorded++;
    }
  });

  core.info(
    `Update check: ${result.checked} checked, ${recorded} changes, ${result.failures.length} failures`
  );
  return { ...result, recorded };
}
