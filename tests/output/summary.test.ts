import { describe, it, expect, vi, beforeEach } from "vitest";
import { ExternalFetchError } from "../../src/errors.js";
import {
  buildCurationTable,
  buildDedupTable,
  buildScoreTable,
  buildUpdateTable,
  escapeTableCell,
  markdownTable,
  writeChangelogSummary,
  writeCurationSummary,
  writeDedupSummary,
} from "../../src/output/summary.js";

const summary = vi.hoisted(() => {
  const chain = {
    addHeading: vi.fn(),
    addRaw: vi.fn(),
    write: vi.fn(),
  };
  chain.addHeading.mockReturnValue(chain);
  chain.addRaw.mockReturnValue(chain);
  chain.write.mockResolvedValue(chain);
  return chain;
});

vi.mock("@actions/core", () => ({ summary }));

beforeEach(() => {
  summary.addHeading.mockClear();
  summary.addRaw.mockClear();
  summary.write.mockClear();
});

describe("escapeTableCell", () => {
  it("escapes pipe characters", () => {
    expect(escapeTableCell("a|b|c")).toBe("a\\|b\\|c");
  });

  it("replaces newlines with spaces", () => {
    expect(escapeTableCell("line1\nline2\r\nline3")).toBe("line1 line2 line3");
  });
});

describe("markdownTable", () => {
  it("renders a header, a separator and one line per row", () => {
    expect(markdownTable(["Name", "Score"], [["Clay | Co", 0.8]])).toBe(
      ["| Name | Score |", "| --- | --- |", "| Clay \\| Co | 0.8 |"].join("\n")
    );
  });
});

describe("table builders", () => {
  it("lists the curation counts and score range", () => {
    const table = buildCurationTable({
      scored: 3,
      promoted: 2,
      belowThreshold: 1,
      duplicatesFound: 0,
      duplicatesMerged: 0,
      minScore: 0.2,
      maxScore: 0.8,
      avgScore: 0.5,
    });
    expect(table.split("\n")).toEqual([
      "| Metric | Value |",
      "| --- | --- |",
      "| Scored | 3 |",
      "| Promoted to review | 2 |",
      "| Below threshold | 1 |",
      "| Duplicates found | 0 |",
      "| Duplicates merged | 0 |",
      "| Min score | 0.200 |",
      "| Max score | 0.800 |",
      "| Avg score | 0.500 |",
    ]);
  });

  it("lists one row per duplicate group", () => {
    const table = buildDedupTable({
      groups: [
        {
          canonicalId: 1,
          canonicalName: "Apollo.io",
          duplicateIds: [2],
          duplicateNames: ["Apollo"],
          similarityScores: [1],
        },
      ],
      groupsFound: 1,
      duplicatesFound: 1,
      merged: 0,
      conflicts: [],
    });
    expect(table.split("\n")[2]).toBe("| Apollo.io (#1) | Apollo (#2) | 1.00 |");
  });

  it("lists changes then failures", () => {
    const table = buildUpdateTable({
      checked: 2,
      recorded: 1,
      changes: [
        {
          candidateId: 1,
          candidateName: "Acme CRM",
          changeType: "pricing_change",
          description: "Pricing updated: $59/mo | Starter plan",
          sourceUrl: "https://acme.example",
        },
      ],
      failures: [
        {
          candidateId: 2,
          candidateName: "Beta Dialer",
          error: new ExternalFetchError("https://beta.example", "HTTP 503"),
        },
      ],
    });
    expect(table.split("\n").slice(2)).toEqual([
      "| Acme CRM | pricing_change | Pricing updated: $59/mo \\| Starter plan |",
      "| Beta Dialer | fetch_failed | Failed to fetch https://beta.example: HTTP 503 |",
    ]);
  });

  it("joins score reasons", () => {
    const table = buildScoreTable("Clay", {
      candidateId: 4,
      score: 0.27,
      reasons: ["Category 'enrichment': +0.27"],
      claimCount: 0,
      feedCount: 0,
    });
    expect(table.split("\n")[2]).toBe("| Clay | 0.270 | Category 'enrichment': +0.27 |");
  });
});

describe("job summary writers", () => {
  it("writes the curation table under a heading", async () => {
    await writeCurationSummary({
      scored: 0,
      promoted: 0,
      belowThreshold: 0,
      duplicatesFound: 0,
      duplicatesMerged: 0,
      minScore: 0,
      maxScore: 0,
      avgScore: 0,
    });
    expect(summary.addHeading).toHaveBeenCalledWith("Curation run", 2);
    expect(summary.addRaw).toHaveBeenCalledTimes(1);
    expect(summary.write).toHaveBeenCalledTimes(1);
  });

  it("says so when there are no duplicates", async () => {
    await writeDedupSummary({
      groups: [],
      groupsFound: 0,
      duplicatesFound: 0,
      merged: 0,
      conflicts: [],
    });
    expect(summary.addRaw).toHaveBeenCalledWith("No duplicates found.", true);
  });

  it("says so when the changelog window is empty", async () => {
    await writeChangelogSummary(7, []);
    expect(summary.addHeading).toHaveBeenCalledWith("Changes in the last 7 days", 2);
    expect(summary.addRaw).toHaveBeenCalledWith("No changes recorded.", true);
  });
});
