import { describe, it, expect, vi } from "vitest";
import type { Pool } from "pg";
import { PostgresStore, ensureSchema } from "../../src/store/postgres.js";

vi.mock("@actions/core", () => ({
  debug: vi.fn(),
}));

interface Call {
  on: "pool" | "client";
  text: string;
  values: unknown[];
}

type Responder = (text: string, values: unknown[]) => { rows: unknown[]; rowCount?: number };

function fakePool(respond: Responder = () => ({ rows: [] })) {
  const calls: Call[] = [];
  const released = vi.fn();
  const query = (on: Call["on"]) =>
    vi.fn(async (text: string, values: unknown[] = []) => {
      calls.push({ on, text, values });
      const result = respond(text, values);
      return { rowCount: result.rows.length, ...result };
    });
  const client = { query: query("client"), release: released };
  const pool = {
    query: query("pool"),
    connect: vi.fn(async () => client),
  };
  return { pool: pool as unknown as Pool, calls, released };
}

const sql = (calls: Call[]) => calls.map((c) => c.text.replace(/\s+/g, " ").trim());

describe("PostgresStore", () => {
  it("maps candidate rows to camelCase records", async () => {
    const createdAt = new Date("2026-01-02T00:00:00Z");
    const { pool } = fakePool(() => ({
      rows: [
        {
          id: 3,
          name: "Clay",
          url: "https://clay.com",
          description: null,
          category: "enrichment",
          status: "review",
          relevance_score: 0.72,
          rejection_reason: null,
          created_at: createdAt,
          updated_at: createdAt,
          reviewed_at: null,
        },
      ],
    }));

    const candidate = await new PostgresStore(pool).getCandidate(3);

    expect(candidate).toEqual({
      id: 3,
      name: "Clay",
      url: "https://clay.com",
      description: null,
      category: "enrichment",
      status: "review",
      relevanceScore: 0.72,
      rejectionReason: null,
      createdAt,
      updatedAt: createdAt,
      reviewedAt: null,
    });
  });

  it("returns null for a missing candidate", async () => {
    const { pool } = fakePool();
    expect(await new PostgresStore(pool).getCandidate(99)).toBeNull();
  });

  it("keeps the reason only for rejected", async () => {
    const { pool, calls } = fakePool();
    const store = new PostgresStore(pool);

    await store.setStatus(1, "rejected", "Not relevant");
    await store.setStatus(1, "review", "ignored");

    expect(calls[0].values).toEqual(["rejected", "Not relevant", true, 1]);
    expect(calls[1].values).toEqual(["review", null, false, 1]);
  });

  it("reports null when a mention URL already exists", async () => {
    const { pool, calls } = fakePool();
    const id = await new PostgresStore(pool).addMention({
      feedId: 1,
      sourceUrl: "https://forum.example.org/t/1",
      rawText: "text",
      metadata: { title: "A post" },
    });

    expect(id).toBeNull();
    expect(calls[0].values[3]).toBe('{"title":"A post"}');
  });

  it("runs a transaction on one client and commits", async () => {
    const { pool, calls, released } = fakePool((text) =>
      text.includes("RETURNING id") ? { rows: [{ id: 11 }] } : { rows: [], rowCount: 2 }
    );
    const store = new PostgresStore(pool);

    const moved = await store.transaction(async (tx) => {
      const count = await tx.reparentClaims(2, 1);
      await tx.deleteCandidate(2);
      return count;
    });

    expect(moved).toBe(2);
    expect(calls.every((c) => c.on === "client")).toBe(true);
    expect(sql(calls)).toEqual([
      "BEGIN",
      "UPDATE claims SET candidate_id = $1 WHERE candidate_id = $2",
      "DELETE FROM candidates WHERE id = $1",
      "COMMIT",
    ]);
    expect(released).toHaveBeenCalledTimes(1);
  });

  it("rolls back and rethrows when the callback fails", async () => {
    const { pool, calls, released } = fakePool();
    const store = new PostgresStore(pool);

    await expect(
      store.transaction(async (tx) => {
        await tx.deleteCandidate(2);
        throw new Error("foreign key violation");
      })
    ).rejects.toThrow("foreign key violation");

    expect(sql(calls)).toEqual([
      "BEGIN",
      "DELETE FROM candidates WHERE id = $1",
      "ROLLBACK",
    ]);
    expect(released).toHaveBeenCalledTimes(1);
  });

  it("reuses the open transaction for a nested call", async () => {
    const { pool, calls } = fakePool();
    const store = new PostgresStore(pool);

    await store.transaction((tx) => tx.transaction((inner) => inner.deleteCandidate(5)));

    expect(sql(calls)).toEqual(["BEGIN", "DELETE FROM candidates WHERE id = $1", "COMMIT"]);
  });
});

describe("ensureSchema", () => {
  it("runs the bundled schema file", async () => {
    const { pool, calls } = fakePool();
    await ensureSchema(pool);
    expect(calls[0].text).toContain("CREATE TABLE IF NOT EXISTS candidates");
  });
});
