import type {
  Candidate,
  CandidateStatus,
  ChangeEvent,
  Claim,
  Feed,
  Mention,
  NewCandidate,
  NewChangeEvent,
  NewClaim,
  NewFeed,
  NewMention,
  NewSnapshot,
  Snapshot,
} from "../types.js";

/**
 * Persistence boundary for the engine. Every method is atomic on its own;
 * sequences that must commit together run inside `transaction`.
 */
export interface Store {
  /** All candidates, ordered by id. */
  listCandidates(): Promise<Candidate[]>;
  /** Candidates in one status, ordered by id. */
  listCandidatesByStatus(status: CandidateStatus): Promise<Candidate[]>;
  countCandidatesByStatus(status: CandidateStatus): Promise<number>;
  getCandidate(id: number): Promise<Candidate | null>;
  /** Inserts, or returns the id of the candidate already holding this URL. */
  upsertCandidate(candidate: NewCandidate): Promise<number>;
  /**
   * Approved and rejected stamp the review time; rejected keeps the reason,
   * every other status clears it.
   */
  setStatus(id: number, status: CandidateStatus, reason?: string | null): Promise<void>;
  setScore(id: number, score: number): Promise<void>;
  deleteCandidate(id: number): Promise<void>;

  listClaims(candidateId: number): Promise<Claim[]>;
  addClaim(claim: NewClaim): Promise<number>;
  reparentClaims(fromId: number, toId: number): Promise<number>;

  upsertFeed(feed: NewFeed): Promise<Feed>;
  getFeed(id: number): Promise<Feed | null>;
  recordFeedMention(feedId: number, useful: boolean): Promise<void>;

  /** Returns null when a mention with the same source URL already exists. */
  addMention(mention: NewMention): Promise<number | null>;
  listUnprocessedMentions(limit: number): Promise<Mention[]>;
  markMentionProcessed(id: number, candidateId: number | null): Promise<void>;
  reparentMentions(fromId: number, toId: number): Promise<number>;

  appendChangeEvent(event: NewChangeEvent): Promise<number>;
  listRecentChanges(days: number): Promise<ChangeEvent[]>;

  getLatestSnapshot(candidateId: number): Promise<Snapshot | null>;
  appendSnapshot(snapshot: NewSnapshot): Promise<number>;

  /** Runs `fn` against a store bound to one transaction; rolls back if it throws. */
  transaction<T>(fn: (tx: Store) => Promise<T>): Promise<T>;
}
