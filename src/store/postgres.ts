import { readFile } from "node:fs/promises";
import type { Pool, PoolClient, QueryResult, QueryResultRow } from "pg";
import * as core from "@actions/core";
import type { Store } from "./types.js";
import {
  isCandidateStatus,
  isCategory,
  isChangeType,
  isClaimType,
  isFeedReliability,
  type Candidate,
  type CandidateStatus,
  type ChangeEvent,
  type Claim,
  type Feed,
  type Mention,
  type NewCandidate,
  type NewChangeEvent,
  type NewClaim,
  type NewFeed,
  type NewMention,
  type NewSnapshot,
  type Snapshot,
} from "../types.js";

const SCHEMA_FILE = new URL("../../sql/schema.sql", import.meta.url);

interface CandidateRow {
  id: number;
  name: string;
  url: string;
  description: string | null;
  category: string | null;
  status: string;
  relevance_score: number | null;
  rejection_reason: string | null;
  created_at: Date;
  updated_at: Date;
  reviewed_at: Date | null;
}

interface ClaimRow {
  id: number;
  candidate_id: number;
  feed_id: number;
  claim_type: string;
  content: string;
  confidence: number;
}

interface FeedRow {
  id: number;
  name: string;
  url: string | null;
  reliability: string;
  total_mentions: number;
  useful_mentions: number;
}

interface MentionRow {
  id: number;
  feed_id: number;
  source_url: string;
  raw_text: string;
  metadata: Record<string, string> | null;
  processed: boolean;
  candidate_id: number | null;
  created_at: Date;
}

interface SnapshotRow {
  id: number;
  candidate_id: number;
  url: string;
  title: string | null;
  content_hash: string;
  pricing_text: string | null;
  features_text: string | null;
  fetched_at: Date;
}

interface ChangeEventRow {
  id: number;
  candidate_id: number;
  change_type: string;
  description: string;
  source_url: string | null;
  detected_at: Date;
}

interface IdRow {
  id: number;
}

interface CountRow {
  count: number;
}

const CANDIDATE_COLUMNS = `id, name, url, description, category, status, relevance_score,
  rejection_reason, created_at, updated_at, reviewed_at`;

function toCandidate(row: CandidateRow): Candidate {
  if (!isCandidateStatus(row.status)) {
    throw new Error(`Candidate ${row.id} has unknown status "${row.status}"`);
  }
  return {
    id: row.id,
    name: row.name,
    url: row.url,
    description: row.description,
    category: row.category !== null && isCategory(row.category) ? row.category : null,
    status: row.status,
    relevanceScore: row.relevance_score,
    rejectionReason: row.rejection_reason,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
    reviewedAt: row.reviewed_at,
  };
}

function toClaim(row: ClaimRow): Claim {
  return {
    id: row.id,
    candidateId: row.candidate_id,
    feedId: row.feed_id,
    claimType: isClaimType(row.claim_type) ? row.claim_type : "feature",
    content: row.content,
    confidence: row.confidence,
  };
}

function toFeed(row: FeedRow): Feed {
  return {
    id: row.id,
    name: row.name,
    url: row.url,
    reliability: isFeedReliability(row.reliability) ? row.reliability : "unrated",
    totalMentions: row.total_mentions,
    usefulMentions: row.useful_mentions,
  };
}

function toMention(row: MentionRow): Mention {
  return {
    id: row.id,
    feedId: row.feed_id,
    sourceUrl: row.source_url,
    rawText: row.raw_text,
    metadata: row.metadata ?? {},
    processed: row.processed,
    candidateId: row.candidate_id,
    createdAt: row.created_at,
  };
}

function toSnapshot(row: SnapshotRow): Snapshot {
  return {
    id: row.id,
    candidateId: row.candidate_id,
    url: row.url,
    title: row.title,
    contentHash: row.content_hash,
    pricingText: row.pricing_text,
    featuresText: row.features_text,
    fetchedAt: row.fetched_at,
  };
}

function toChangeEvent(row: ChangeEventRow): ChangeEvent {
  if (!isChangeType(row.change_type)) {
    throw new Error(`Change event ${row.id} has unknown type "${row.change_type}"`);
  }
  return {
    id: row.id,
    candidateId: row.candidate_id,
    changeType: row.change_type,
    description: row.description,
    sourceUrl: row.source_url,
    detectedAt: row.detected_at,
  };
}

function firstId(result: QueryResult<IdRow>, what: string): number {
  const row = result.rows[0];
  if (!row) throw new Error(`Insert into ${what} returned no id`);
  return row.id;
}

export async function ensureSchema(pool: Pool): Promise<void> {
  const ddl = await readFile(SCHEMA_FILE, "utf-8");
  await pool.query(ddl);
  core.debug("Candidate store schema is up to date");
}

export class PostgresStore implements Store {
  /**
   * @param client - set on the store handed to a `transaction` callback;
   *   every query then runs on that connection instead of the pool.
   */
  constructor(
    private readonly pool: Pool,
    private readonly client: PoolClient | null = null
  ) {}

  private run<R extends QueryResultRow>(
    text: string,
    values: unknown[] = []
  ): Promise<QueryResult<R>> {
    return this.client
      ? this.client.query<R>(text, values)
      : this.pool.query<R>(text, values);
  }

  async listCandidates(): Promise<Candidate[]> {
    const { rows } = await this.run<CandidateRow>(
      `SELECT ${CANDIDATE_COLUMNS} FROM candidates ORDER BY id`
    );
    return rows.map(toCandidate);
  }

  async listCandidatesByStatus(status: CandidateStatus): Promise<Candidate[]> {
    const { rows } = await this.run<CandidateRow>(
      `SELECT ${CANDIDATE_COLUMNS} FROM candidates WHERE status = $1 ORDER BY id`,
      [status]
    );
    return rows.map(toCandidate);
  }

  async countCandidatesByStatus(status: CandidateStatus): Promise<number> {
    const { rows } = await this.run<CountRow>(
      "SELECT COUNT(*)::int AS count FROM candidates WHERE status = $1",
      [status]
    );
    return rows[0]?.count ?? 0;
  }

  async getCandidate(id: number): Promise<Candidate | null> {
    const { rows } = await this.run<CandidateRow>(
      `SELECT ${CANDIDATE_COLUMNS} FROM candidates WHERE id = $1`,
      [id]
    );
    const row = rows[0];
    return row ? toCandidate(row) : null;
  }

  async upsertCandidate(candidate: NewCandidate): Promise<number> {
    const result = await this.run<IdRow>(
      `INSERT INTO candidates (name, url, description, category, status)
       VALUES ($1, $2, $3, $4, $5)
       ON CONFLICT (url) DO UPDATE SET updated_at = NOW()
       RETURNING id`,
      [
        candidate.name,
        candidate.url,
        candidate.description,
        candidate.category,
        candidate.status,
      ]
    );
    return firstId(result, "candidates");
  }

  async setStatus(
    id: number,
    status: CandidateStatus,
    reason: string | null = null
  ): Promise<void> {
    const reviewed = status === "approved" || status === "rejected";
    await this.run(
      `UPDATE candidates SET
         status = $1,
         rejection_reason = $2,
         reviewed_at = CASE WHEN $3 THEN NOW() ELSE reviewed_at END,
         updated_at = NOW()
       WHERE id = $4`,
      [status, status === "rejected" ? reason : null, reviewed, id]
    );
  }

  async setScore(id: number, score: number): Promise<void> {
    await this.run(
      "UPDATE candidates SET relevance_score = $1, updated_at = NOW() WHERE id = $2",
      [score, id]
    );
  }

  async deleteCandidate(id: number): Promise<void> {
    await this.run("DELETE FROM candidates WHERE id = $1", [id]);
  }

  async listClaims(candidateId: number): Promise<Claim[]> {
    const { rows } = await this.run<ClaimRow>(
      `SELECT id, candidate_id, feed_id, claim_type, content, confidence
       FROM claims WHERE candidate_id = $1 ORDER BY id`,
      [candidateId]
    );
    return rows.map(toClaim);
  }

  async addClaim(claim: NewClaim): Promise<number> {
    const result = await this.run<IdRow>(
      `INSERT INTO claims (candidate_id, feed_id, claim_type, content, confidence)
       VALUES ($1, $2, $3, $4, $5)
       RETURNING id`,
      [claim.candidateId, claim.feedId, claim.claimType, claim.content, claim.confidence]
    );
    return firstId(result, "claims");
  }

  async reparentClaims(fromId: number, toId: number): Promise<number> {
    const result = await this.run(
      "UPDATE claims SET candidate_id = $1 WHERE candidate_id = $2",
      [toId, fromId]
    );
    return result.rowCount ?? 0;
  }

  async upsertFeed(feed: NewFeed): Promise<Feed> {
    const { rows } = await this.run<FeedRow>(
      `INSERT INTO feeds (name, url, reliability)
       VALUES ($1, $2, $3)
       ON CONFLICT (name) DO UPDATE SET url = EXCLUDED.url, updated_at = NOW()
       RETURNING id, name, url, reliability, total_mentions, useful_mentions`,
      [feed.name, feed.url, feed.reliability]
    );
    const row = rows[0];
    if (!row) throw new Error(`Upsert of feed "${feed.name}" returned no row`);
    return toFeed(row);
  }

  async getFeed(id: number): Promise<Feed | null> {
    const { rows } = await this.run<FeedRow>(
      `SELECT id, name, url, reliability, total_mentions, useful_mentions
       FROM feeds WHERE id = $1`,
      [id]
    );
    const row = rows[0];
    return row ? toFeed(row) : null;
  }

  async recordFeedMention(feedId: number, useful: boolean): Promise<void> {
    await this.run(
      `UPDATE feeds SET
         total_mentions = total_mentions + 1,
         useful_mentions = useful_mentions + CASE WHEN $1 THEN 1 ELSE 0 END,
         updated_at = NOW()
       WHERE id = $2`,
      [useful, feedId]
    );
  }

  async addMention(mention: NewMention): Promise<number | null> {
    const { rows } = await this.run<IdRow>(
      `INSERT INTO mentions (feed_id, source_url, raw_text, metadata)
       VALUES ($1, $2, $3, $4)
       ON CONFLICT (source_url) DO NOTHING
       RETURNING id`,
      [mention.feedId, mention.sourceUrl, mention.rawText, JSON.stringify(mention.metadata)]
    );
    return rows[0]?.id ?? null;
  }

  async listUnprocessedMentions(limit: number): Promise<Mention[]> {
    const { rows } = await this.run<MentionRow>(
      `SELECT id, feed_id, source_url, raw_text, metadata, processed, candidate_id, created_at
       FROM mentions WHERE processed = FALSE
       ORDER BY created_at, id
       LIMIT $1`,
      [limit]
    );
    return rows.map(toMention);
  }

  async markMentionProcessed(id: number, candidateId: number | null): Promise<void> {
    await this.run(
      "UPDATE mentions SET processed = TRUE, candidate_id = $1 WHERE id = $2",
      [candidateId, id]
    );
  }

  async reparentMentions(fromId: number, toId: number): Promise<number> {
    const result = await this.run(
      "UPDATE mentions SET candidate_id = $1 WHERE candidate_id = $2",
      [toId, fromId]
    );
    return result.rowCount ?? 0;
  }

  async appendChangeEvent(event: NewChangeEvent): Promise<number> {
    const result = await this.run<IdRow>(
      `INSERT INTO change_events (candidate_id, change_type, description, source_url)
       VALUES ($1, $2, $3, $4)
       RETURNING id`,
      [event.candidateId, event.changeType, event.description, event.sourceUrl]
    );
    return firstId(result, "change_events");
  }

  async listRecentChanges(days: number): Promise<ChangeEvent[]> {
    const { rows } = await this.run<ChangeEventRow>(
      `SELECT id, candidate_id, change_type, description, source_url, detected_at
       FROM change_events
       WHERE detected_at >= NOW() - make_interval(days => $1)
       ORDER BY detected_at DESC, id DESC`,
      [days]
    );
    return rows.map(toChangeEvent);
  }

  async getLatestSnapshot(candidateId: number): Promise<Snapshot | null> {
    const { rows } = await this.run<SnapshotRow>(
      `SELECT id, candidate_id, url, title, content_hash, pricing_text, features_text, fetched_at
       FROM snapshots WHERE candidate_id = $1
       ORDER BY fetched_at DESC, id DESC
       LIMIT 1`,
      [candidateId]
    );
    const row = rows[0];
    return row ? toSnapshot(row) : null;
  }

  async appendSnapshot(snapshot: NewSnapshot): Promise<number> {
    const result = await this.run<IdRow>(
      `INSERT INTO snapshots
         (candidate_id, url, title, content_hash, pricing_text, features_text, fetched_at)
       VALUES ($1, $2, $3, $4, $5, $6, $7)
       RETURNING id`,
      [
        snapshot.candidateId,
        snapshot.url,
        snapshot.title,
        snapshot.contentHash,
        snapshot.pricingText,
        snapshot.featuresText,
        snapshot.fetchedAt,
      ]
    );
    return firstId(result, "snapshots");
  }

  async transaction<T>(fn: (tx: Store) => Promise<T>): Promise<T> {
    if (this.client) return fn(this);

    const client = await this.pool.connect();
    try {
      await client.query("BEGIN");
      const result = await fn(new PostgresStore(this.pool, client));
      await client.query("COMMIT");
      return result;
    } catch (error) {
      await client.query("ROLLBACK");
      throw error;
    } finally {
      client.release();
    }
  }
}
