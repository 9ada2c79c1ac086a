import * as core from "@actions/core";
import type { CurationSummary } from "../curator/curator.js";
import type { DedupResult } from "../curator/dedup.js";
import type { ScoringResult } from "../curator/scorer.js";
import type { IntakeResult } from "../pipeline.js";
import type { CandidateStatus, ChangeEvent } from "../types.js";
import type { UpdateCheckResult } from "../tracker/tracker.js";

export function escapeTableCell(text: string): string {
  return text.replace(/\|/g, "\\|").replace(/\r?\n/g, " ");
}

export function markdownTable(headers: string[], rows: Array<Array<string | number>>): string {
  const line = (cells: Array<string | number>) =>
    `| ${cells.map((cell) => escapeTableCell(String(cell))).join(" | ")} |`;
  return [line(headers), line(headers.map(() => "---")), ...rows.map(line)].join("\n");
}

async function writeSection(heading: string, table: string): Promise<void> {
  await core.summary.addHeading(heading, 2).addRaw(table, true).write();
}

export function buildCurationTable(summary: CurationSummary): string {
  return markdownTable(
    ["Metric", "Value"],
    [
      ["Scored", summary.scored],
      ["Promoted to review", summary.promoted],
      ["Below threshold", summary.belowThreshold],
      ["Duplicates found", summary.duplicatesFound],
      ["Duplicates merged", summary.duplicatesMerged],
      ["Min score", summary.minScore.toFixed(3)],
      ["Max score", summary.maxScore.toFixed(3)],
      ["Avg score", summary.avgScore.toFixed(3)],
    ]
  );
}

export function buildDedupTable(result: DedupResult): string {
  return markdownTable(
    ["Canonical", "Duplicates", "Similarity"],
    result.groups.map((group) => [
      `${group.canonicalName} (#${group.canonicalId})`,
      group.duplicateNames
        .map((name, i) => `${name} (#${group.duplicateIds[i]})`)
        .join(", "),
      group.similarityScores.map((s) => s.toFixed(2)).join(", "),
    ])
  );
}

export function buildUpdateTable(result: UpdateCheckResult): string {
  const rows: string[][] = result.changes.map((change) => [
    change.candidateName,
    change.changeType,
    change.description,
  ]);
  for (const failure of result.failures) {
    rows.push([failure.candidateName, "fetch_failed", failure.error.message]);
  }
  return markdownTable(["Candidate", "Change", "Description"], rows);
}

export function buildScoreTable(name: string, result: ScoringResult): string {
  return markdownTable(
    ["Candidate", "Score", "Reasons"],
    [[name, result.score.toFixed(3), result.reasons.join("; ")]]
  );
}

export function buildIntakeTable(result: IntakeResult): string {
  return markdownTable(
    ["Metric", "Value"],
    [
      ["Mentions collected", result.mentionsCollected],
      ["Mentions processed", result.mentionsProcessed],
      ["Mentions failed", result.mentionsFailed],
      ["Candidates extracted", result.candidatesExtracted],
      ["Claims extracted", result.claimsExtracted],
    ]
  );
}

export interface ChangelogEntry extends ChangeEvent {
  candidateName: string;
}

export function buildChangelogTable(entries: ChangelogEntry[]): string {
  return markdownTable(
    ["Date", "Candidate", "Change", "Description"],
    entries.map((entry) => [
      entry.detectedAt.toISOString().slice(0, 10),
      entry.candidateName,
      entry.changeType,
      entry.description,
    ])
  );
}

export function buildStatusTable(counts: Array<[CandidateStatus, number]>): string {
  return markdownTable(["Status", "Candidates"], counts);
}

export async function writeCurationSummary(summary: CurationSummary): Promise<void> {
  await writeSection("Curation run", buildCurationTable(summary));
}

export async function writeDedupSummary(result: DedupResult): Promise<void> {
  if (result.groups.length === 0) {
    await core.summary.addHeading("Duplicate check", 2).addRaw("No duplicates found.", true).write();
    return;
  }
  await writeSection("Duplicate check", buildDedupTable(result));
}

export async function writeUpdateSummary(result: UpdateCheckResult): Promise<void> {
  await core.summary
    .addHeading("Update check", 2)
    .addRaw(
      `${result.checked} checked, ${result.recorded} changes recorded, ${result.failures.length} failures`,
      true
    )
    .addRaw(buildUpdateTable(result), true)
    .write();
}

export async function writeScoreSummary(name: string, result: ScoringResult): Promise<void> {
  await writeSection("Relevance score", buildScoreTable(name, result));
}

export async function writeIntakeSummary(result: IntakeResult): Promise<void> {
  await writeSection("Intake run", buildIntakeTable(result));
}

export async function writeChangelogSummary(days: number, entries: ChangelogEntry[]): Promise<void> {
  const heading = `Changes in the last ${days} days`;
  if (entries.length === 0) {
    await core.summary.addHeading(heading, 2).addRaw("No changes recorded.", true).write();
    return;
  }
  await writeSection(heading, buildChangelogTable(entries));
}

export async function writeStatusSummary(counts: Array<[CandidateStatus, number]>): Promise<void> {
  await writeSection("Pipeline status", buildStatusTable(counts));
}
