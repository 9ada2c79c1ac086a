import * as core from "@actions/core";
import type { DedupConfig } from "../config.js";
import { MergeConflictError } from "../errors.js";
import type { Store } from "../store/types.js";
import type { Candidate } from "../types.js";
import { similarity } from "./similarity.js";

export interface DuplicateGroup {
  canonicalId: number;
  canonicalName: string;
  duplicateIds: number[];
  duplicateNames: string[];
  similarityScores: number[];
}

export interface DedupResult {
  groups: DuplicateGroup[];
  groupsFound: number;
  duplicatesFound: number;
  merged: number;
  conflicts: MergeConflictError[];
}

type DedupSubject = Pick<Candidate, "id" | "name" | "url">;

export function normalizeName(name: string): string {
  return name
    .toLowerCase()
    .trim()
    .replace(/\.(io|ai|com|co|app)$/, "")
    .replace(/[^a-z0-9]/g, "");
}

export function normalizeUrl(url: string): string {
  return url
    .toLowerCase()
    .trim()
    .replace(/^https?:\/\//, "")
    .replace(/^www\./, "")
    .replace(/\/+$/, "");
}

/**
 * Single greedy pass in id order: the first ungrouped candidate becomes
 * canonical and absorbs every later ungrouped candidate that matches it.
 * Grouped candidates are never compared again, so A~B and B~C does not put
 * A and C together unless A~C.
 */
export function findDuplicates(
  candidates: DedupSubject[],
  thresholds: DedupConfig
): DuplicateGroup[] {
  const ordered = [...candidates].sort((x, y) => x.id - y.id);
  if (ordered.length < 2) return [];

  const normalized = ordered.map((c) => ({
    ...c,
    name: normalizeName(c.name),
    url: normalizeUrl(c.url),
  }));
  const grouped = new Set<number>();
  const groups: DuplicateGroup[] = [];

  for (let i = 0; i < normalized.length; i++) {
    const canonical = normalized[i];
    if (grouped.has(canonical.id)) continue;

    const group: DuplicateGroup = {
      canonicalId: canonical.id,
      canonicalName: ordered[i].name,
      duplicateIds: [],
      duplicateNames: [],
      similarityScores: [],
    };

    for (let j = i + 1; j < normalized.length; j++) {
      const other = normalized[j];
      if (grouped.has(other.id)) continue;

      const nameSim = similarity(canonical.name, other.name);
      const urlSim =
        canonical.url && other.url ? similarity(canonical.url, other.url) : 0;

      if (nameSim >= thresholds.name_threshold || urlSim >= thresholds.url_threshold) {
        group.duplicateIds.push(other.id);
        group.duplicateNames.push(ordered[j].name);
        group.similarityScores.push(Math.max(nameSim, urlSim));
        grouped.add(other.id);
      }
    }

    if (group.duplicateIds.length > 0) {
      grouped.add(canonical.id);
      groups.push(group);
    }
  }

  return groups;
}

/**
 * Moves claims and mentions of every duplicate onto the canonical candidate
 * and deletes the duplicates, all in one transaction.
 */
export async function mergeGroup(store: Store, group: DuplicateGroup): Promise<void> {
  try {
    await store.transaction(async (tx) => {
      for (const duplicateId of group.duplicateIds) {
        await tx.reparentClaims(duplicateId, group.canonicalId);
        await tx.reparentMentions(duplicateId, group.canonicalId);
        await tx.deleteCandidate(duplicateId);
      }
    });
  } catch (error) {
    throw new MergeConflictError(group.canonicalId, group.duplicateIds, error);
  }
}

export async function runDeduplication(
  store: Store,
  options: { autoMerge: boolean; thresholds: DedupConfig }
): Promise<DedupResult> {
  const candidates = await store.listCandidates();
  const groups = findDuplicates(candidates, options.thresholds);
  const conflicts: MergeConflictError[] = [];
  let merged = 0;

  for (const group of groups) {
    core.info(
      `Duplicate group: "${group.canonicalName}" (#${group.canonicalId}) <- ${group.duplicateNames
        .map((name, i) => `"${name}" (#${group.duplicateIds[i]})`)
        .join(", ")}`
    );
    if (!options.autoMerge) continue;

    try {
      await mergeGroup(store, group);
      merged += group.duplicateIds.length;
    } catch (error) {
      if (!(error instanceof MergeConflictError)) throw error;
      core.warning(error.message);
      conflicts.push(error);
    }
  }

  const duplicatesFound = groups.reduce((sum, g) => sum + g.duplicateIds.length, 0);
  core.info(
    `Dedup: ${groups.length} groups, ${duplicatesFound} duplicates, ${merged} merged`
  );

  return {
    groups,
    groupsFound: groups.length,
    duplicatesFound,
    merged,
    conflicts,
  };
}
