export const CANDIDATE_STATUSES = [
  "inbox",
  "analyzing",
  "review",
  "approved",
  "rejected",
] as const;
export type CandidateStatus = (typeof CANDIDATE_STATUSES)[number];

export const CATEGORIES = [
  "prospecting",
  "enrichment",
  "outreach",
  "conversation",
  "crm",
  "scheduling",
  "analytics",
  "coaching",
  "other",
] as const;
export type Category = (typeof CATEGORIES)[number];

export const CLAIM_TYPES = [
  "feature",
  "pricing",
  "integration",
  "limitation",
  "comparison",
  "use_case",
  "audience",
] as const;
export type ClaimType = (typeof CLAIM_TYPES)[number];

export const CHANGE_TYPES = [
  "new",
  "pricing_change",
  "feature_added",
  "content_change",
  "news",
] as const;
export type ChangeType = (typeof CHANGE_TYPES)[number];

export const FEED_RELIABILITIES = [
  "authoritative",
  "high",
  "medium",
  "low",
  "unrated",
] as const;
export type FeedReliability = (typeof FEED_RELIABILITIES)[number];

/** A product record moving through the review pipeline. */
export interface Candidate {
  id: number;
  name: string;
  /** Natural key: intake resolves a repeated URL to the existing candidate. */
  url: string;
  description: string | null;
  category: Category | null;
  status: CandidateStatus;
  relevanceScore: number | null;
  rejectionReason: string | null;
  createdAt: Date;
  updatedAt: Date;
  reviewedAt: Date | null;
}

export interface NewCandidate {
  name: string;
  url: string;
  description: string | null;
  category: Category | null;
  status: CandidateStatus;
}

export interface Claim {
  id: number;
  candidateId: number;
  feedId: number;
  claimType: ClaimType;
  content: string;
  confidence: number;
}

export type NewClaim = Omit<Claim, "id">;

export interface Feed {
  id: number;
  name: string;
  url: string | null;
  reliability: FeedReliability;
  totalMentions: number;
  usefulMentions: number;
}

export interface NewFeed {
  name: string;
  url: string | null;
  reliability: FeedReliability;
}

/** A raw finding from a feed, before extraction. */
export interface Mention {
  id: number;
  feedId: number;
  sourceUrl: string;
  rawText: string;
  metadata: Record<string, string>;
  processed: boolean;
  candidateId: number | null;
  createdAt: Date;
}

export type NewMention = Pick<Mention, "feedId" | "sourceUrl" | "rawText" | "metadata">;

export interface Snapshot {
  id: number;
  candidateId: number;
  url: string;
  title: string | null;
  contentHash: string;
  pricingText: string | null;
  featuresText: string | null;
  fetchedAt: Date;
}

export type NewSnapshot = Omit<Snapshot, "id">;

export interface ChangeEvent {
  id: number;
  candidateId: number;
  changeType: ChangeType;
  description: string;
  sourceUrl: string | null;
  detectedAt: Date;
}

export type NewChangeEvent = Omit<ChangeEvent, "id" | "detectedAt">;

export function isCandidateStatus(value: string): value is CandidateStatus {
  return CANDIDATE_STATUSES.some((entry) => entry === value);
}

export function isCategory(value: string): value is Category {
  return CATEGORIES.some((entry) => entry === value);
}

export function isClaimType(value: string): value is ClaimType {
  return CLAIM_TYPES.some((entry) => entry === value);
}

export function isChangeType(value: string): value is ChangeType {
  return CHANGE_TYPES.some((entry) => entry === value);
}

export function isFeedReliability(value: string): value is FeedReliability {
  return FEED_RELIABILITIES.some((entry) => entry === value);
}
