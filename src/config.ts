import { readFileSync } from "node:fs";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import { FEED_RELIABILITIES } from "./types.js";

const DEFAULT_CATEGORY_WEIGHTS = {
  prospecting: 1.0,
  outreach: 1.0,
  enrichment: 0.9,
  conversation: 0.8,
  crm: 0.7,
  scheduling: 0.6,
  analytics: 0.5,
  coaching: 0.5,
  other: 0.3,
};

const DEFAULT_HIGH_PATTERNS = [
  "\\bSDR\\b",
  "\\bBDR\\b",
  "\\bsales\\s*rep\\b",
  "\\bcold\\s*(email|outreach|call)",
  "\\bprospecting\\b",
  "\\blead\\s*(gen|generation)\\b",
  "\\boutreach\\b",
  "\\bsales\\s*automation\\b",
  "\\bsales\\s*engagement\\b",
];

const DEFAULT_MEDIUM_PATTERNS = [
  "\\bCRM\\b",
  "\\bpipeline\\b",
  "\\bquota\\b",
  "\\bconversion\\b",
  "\\bresponse\\s*rate\\b",
  "\\bemail\\s*(sequence|campaign)\\b",
  "\\bLinkedIn\\b",
  "\\bmeeting\\b",
  "\\bdemo\\b",
  "\\bclose\\b",
];

const DEFAULT_LOW_PATTERNS = [
  "\\bAI\\b",
  "\\bautomation\\b",
  "\\bproductivity\\b",
  "\\bworkflow\\b",
  "\\bintegration\\b",
  "\\banalytics\\b",
];

const Ratio = z.number().min(0).max(1);

const RegexPattern = z.string().refine((pattern) => {
  try {
    new RegExp(pattern, "i");
    return true;
  } catch {
    return false;
  }
}, "Must be a valid regular expression");

const keywordTier = (weight: number, patterns: string[]) =>
  z
    .object({
      weight: Ratio.default(weight),
      patterns: z.array(RegexPattern).default(patterns),
    })
    .default({});

const CurationSchema = z.object({
  min_relevance: Ratio.default(0.3),
  auto_merge: z.boolean().default(true),
  max_review_queue: z.number().int().nonnegative().default(50),
});

const DedupSchema = z.object({
  name_threshold: Ratio.default(0.85),
  url_threshold: Ratio.default(0.9),
});

const ScoringSchema = z.object({
  category_weights: z.record(z.string(), Ratio).default(DEFAULT_CATEGORY_WEIGHTS),
  category_factor: Ratio.default(0.3),
  claim_bonus_per_claim: Ratio.default(0.05),
  claim_bonus_cap: Ratio.default(0.2),
  confidence_weight: Ratio.default(0.15),
  source_bonus_per_feed: Ratio.default(0.05),
  source_bonus_cap: Ratio.default(0.15),
  keyword_cap: Ratio.default(0.4),
  description_weight: Ratio.default(0.5),
  keywords: z
    .object({
      high: keywordTier(0.15, DEFAULT_HIGH_PATTERNS),
      medium: keywordTier(0.08, DEFAULT_MEDIUM_PATTERNS),
      low: keywordTier(0.03, DEFAULT_LOW_PATTERNS),
    })
    .default({}),
});

const TrackerSchema = z.object({
  timeout_ms: z.number().int().positive().default(30_000),
  user_agent: z
    .string()
    .default(
      "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko)"
    ),
  concurrency: z.number().int().positive().default(4),
  max_matches: z.number().int().positive().default(10),
});

const FeedSchema = z.object({
  name: z.string().min(1),
  url: z.string().url(),
  reliability: z.enum(FEED_RELIABILITIES).default("unrated"),
  keywords: z.array(z.string()).optional(),
});

const IntakeSchema = z.object({
  feeds: z.array(FeedSchema).default([]),
  model: z.string().default("claude-sonnet-4-20250514"),
  max_tokens: z.number().int().positive().default(2000),
  batch_limit: z.number().int().positive().default(10),
});

export const ShortlistConfigSchema = z.object({
  curation: CurationSchema.default({}),
  dedup: DedupSchema.default({}),
  scoring: ScoringSchema.default({}),
  tracker: TrackerSchema.default({}),
  intake: IntakeSchema.default({}),
});

export type ShortlistConfig = z.infer<typeof ShortlistConfigSchema>;
export type ScoringConfig = ShortlistConfig["scoring"];
export type DedupConfig = ShortlistConfig["dedup"];
export type TrackerConfig = ShortlistConfig["tracker"];
export type IntakeConfig = ShortlistConfig["intake"];
export type FeedConfig = IntakeConfig["feeds"][number];

export function parseConfig(yamlContent: string): ShortlistConfig {
  const raw: unknown = parseYaml(yamlContent);
  return ShortlistConfigSchema.parse(raw ?? {});
}

export function loadConfig(filePath: string): ShortlistConfig {
  const content = readFileSync(filePath, "utf-8");
  return parseConfig(content);
}

export const defaultConfig = (): ShortlistConfig => ShortlistConfigSchema.parse({});
