import * as core from "@actions/core";
import type { IntakeConfig } from "./config.js";
import type { AnalysisSummary } from "./intake/analyzer.js";
import type { Store } from "./store/types.js";

export interface IntakeResult {
  mentionsCollected: number;
  mentionsProcessed: number;
  mentionsFailed: number;
  candidatesExtracted: number;
  claimsExtracted: number;
}

export interface IntakeDeps {
  collect: (store: Store, config: IntakeConfig) => Promise<number>;
  analyze: (store: Store, config: IntakeConfig) => Promise<AnalysisSummary>;
}

export async function runIntake(
  store: Store,
  config: IntakeConfig,
  deps: IntakeDeps
): Promise<IntakeResult> {
  core.info("Stage 1/2: Collecting mentions...");
  const collected = await deps.collect(store, config);
  core.info(`  Recorded ${collected} new mentions`);

  core.info("Stage 2/2: Extracting candidates...");
  const analysis = await deps.analyze(store, config);
  core.info(
    `  ${analysis.candidatesStored} candidates and ${analysis.claimsStored} claims from ${analysis.processed} mentions`
  );

  return {
    mentionsCollected: collected,
    mentionsProcessed: analysis.processed,
    mentionsFailed: analysis.failed,
    candidatesExtracted: analysis.candidatesStored,
    claimsExtracted: analysis.claimsStored,
  };
}
