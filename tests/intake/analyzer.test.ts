import { describe, it, expect, vi, beforeEach } from "vitest";
import * as core from "@actions/core";
import { defaultConfig } from "../../src/config.js";
import {
  analyzeMentions,
  buildUserPrompt,
  extractFirstJson,
  parseExtractionResponse,
  sanitize,
  type MessagesClient,
} from "../../src/intake/analyzer.js";
import { MemoryStore } from "../helpers/memoryStore.js";

vi.mock("@actions/core", () => ({
  info: vi.fn(),
  warning: vi.fn(),
  getInput: vi.fn(() => "test-secret"),
}));

vi.mock("@anthropic-ai/sdk", () => ({
  default: vi.fn(),
}));

const intake = defaultConfig().intake;

const reply = (text: string) => ({ content: [{ type: "text", text }] });

const mockClient = (...texts: string[]) => {
  const create = vi.fn();
  for (const text of texts) create.mockResolvedValueOnce(reply(text));
  const client: MessagesClient = { messages: { create } };
  return { client, create };
};

const EXTRACTION = JSON.stringify({
  products: [
    {
      name: "Apollo",
      url: "https://apollo.io",
      description: "Sales intelligence platform",
      category: "prospecting",
    },
    { name: "Some Spreadsheet", url: null, description: null, category: "other" },
  ],
  claims: [
    { product_name: "apollo", claim_type: "feature", content: "Huge contact database", confidence: 0.9 },
    { product_name: "Apollo", claim_type: "vibe", content: "Feels fast", confidence: 0.7 },
    { product_name: "Some Spreadsheet", claim_type: "pricing", content: "Free", confidence: 0.5 },
  ],
});

beforeEach(() => {
  vi.clearAllMocks();
});

describe("extractFirstJson", () => {
  it("pulls the first balanced object out of surrounding text", () => {
    expect(extractFirstJson('Sure! {"a": {"b": 1}} trailing {"c": 2}')).toBe('{"a": {"b": 1}}');
  });

  it("throws when there is no object", () => {
    expect(() => extractFirstJson("no json")).toThrow("No JSON found in LLM response");
  });
});

describe("sanitize", () => {
  it("truncates and strips control characters", () => {
    expect(sanitize("ab\x00cd\x07ef", 5)).toBe("abcd");
  });
});

describe("buildUserPrompt", () => {
  it("wraps each field in its tag", () => {
    const prompt = buildUserPrompt(
      {
        id: 1,
        feedId: 2,
        sourceUrl: "https://forum.example.org/t/1",
        rawText: "Apollo saved my quarter",
        metadata: { title: "Tools that work" },
        processed: false,
        candidateId: null,
        createdAt: new Date("2026-01-01T00:00:00Z"),
      },
      null
    );

    expect(prompt).toBe(
      [
        "<source_name>unknown</source_name>",
        "<source_url>https://forum.example.org/t/1</source_url>",
        "<post_title>Tools that work</post_title>",
        "<post>Apollo saved my quarter</post>",
      ].join("\n")
    );
  });
});

describe("parseExtractionResponse", () => {
  it("maps unknown categories to other and drops unknown claim types", () => {
    const extraction = parseExtractionResponse(
      JSON.stringify({
        products: [{ name: "Gong", url: "https://gong.io", category: "revenue-intel" }],
        claims: [
          { product_name: "Gong", claim_type: "feature", content: "Call recording", confidence: 1.4 },
          { product_name: "Gong", claim_type: "rumor", content: "Acquired soon" },
        ],
      })
    );

    expect(extraction).toEqual({
      products: [{ name: "Gong", url: "https://gong.io", description: null, category: "other" }],
      claims: [
        { productName: "Gong", claimType: "feature", content: "Call recording", confidence: 1 },
      ],
    });
  });

  it("defaults missing lists to empty", () => {
    expect(parseExtractionResponse("{}")).toEqual({ products: [], claims: [] });
  });

  it("rejects a product without a name", () => {
    expect(() =>
      parseExtractionResponse('{"products": [{"name": "", "url": "https://x.example"}]}')
    ).toThrow("Invalid extraction response");
  });
});

describe("analyzeMentions", () => {
  async function seedMention(store: MemoryStore, sourceUrl: string) {
    const feed = store.seedFeed("Revenue Ops Forum");
    const id = await store.addMention({
      feedId: feed.id,
      sourceUrl,
      rawText: "Apollo is great for prospecting",
      metadata: { title: "Prospecting stack" },
    });
    if (id === null) throw new Error("mention not stored");
    return { feed, id };
  }

  it("stores candidates with URLs and their matching claims", async () => {
    const store = new MemoryStore();
    const { feed, id } = await seedMention(store, "https://forum.example.org/t/1");
    const { client, create } = mockClient(EXTRACTION);

    const summary = await analyzeMentions(store, intake, client);

    expect(summary).toEqual({ processed: 1, failed: 0, candidatesStored: 1, claimsStored: 1 });
    expect(create).toHaveBeenCalledWith(
      expect.objectContaining({ model: intake.model, max_tokens: intake.max_tokens })
    );

    const [apollo] = await store.listCandidates();
    expect(apollo).toMatchObject({
      name: "Apollo",
      url: "https://apollo.io",
      description: "Sales intelligence platform",
      category: "prospecting",
      status: "analyzing",
    });
    const claims = await store.listClaims(apollo.id);
    expect(claims).toEqual([
      {
        id: expect.any(Number),
        candidateId: apollo.id,
        feedId: feed.id,
        claimType: "feature",
        content: "Huge contact database",
        confidence: 0.9,
      },
    ]);

    const mention = store.state.mentions.get(id);
    expect(mention?.processed).toBe(true);
    expect(mention?.candidateId).toBe(apollo.id);
    expect(await store.getFeed(feed.id)).toMatchObject({ totalMentions: 1, usefulMentions: 1 });
  });

  it("resolves a repeated URL to the existing candidate", async () => {
    const store = new MemoryStore();
    const existing = store.seedCandidate({
      name: "Apollo.io",
      url: "https://apollo.io",
      status: "review",
    });
    await seedMention(store, "https://forum.example.org/t/1");
    const { client } = mockClient(EXTRACTION);

    await analyzeMentions(store, intake, client);

    expect(await store.listCandidates()).toHaveLength(1);
    expect(await store.listClaims(existing.id)).toHaveLength(1);
    expect((await store.getCandidate(existing.id))?.status).toBe("review");
  });

  it("leaves a mention unprocessed when extraction fails", async () => {
    const store = new MemoryStore();
    const { feed, id } = await seedMention(store, "https://forum.example.org/t/1");
    const { client } = mockClient("I could not find any products.");

    const summary = await analyzeMentions(store, intake, client);

    expect(summary).toEqual({ processed: 0, failed: 1, candidatesStored: 0, claimsStored: 0 });
    expect(store.state.mentions.get(id)?.processed).toBe(false);
    expect(await store.getFeed(feed.id)).toMatchObject({ totalMentions: 0 });
    expect(core.warning).toHaveBeenCalledWith(
      "Extraction failed for https://forum.example.org/t/1: No JSON found in LLM response"
    );
  });

  it("counts a mention with no products as processed but not useful", async () => {
    const store = new MemoryStore();
    const { feed, id } = await seedMention(store, "https://forum.example.org/t/1");
    const { client } = mockClient('{"products": [], "claims": []}');

    await analyzeMentions(store, intake, client);

    expect(store.state.mentions.get(id)).toMatchObject({ processed: true, candidateId: null });
    expect(await store.getFeed(feed.id)).toMatchObject({ totalMentions: 1, usefulMentions: 0 });
  });

  it("does not call the client when nothing is waiting", async () => {
    const { client, create } = mockClient();
    const summary = await analyzeMentions(new MemoryStore(), intake, client);
    expect(summary.processed).toBe(0);
    expect(create).not.toHaveBeenCalled();
  });
});
