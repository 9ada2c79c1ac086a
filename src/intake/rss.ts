import * as core from "@actions/core";
import Parser from "rss-parser";
import type { IntakeConfig } from "../config.js";
import type { Store } from "../store/types.js";

const MAX_RAW_TEXT_LENGTH = 4000;

export interface FeedItem {
  title?: string;
  link?: string;
  content?: string;
  contentSnippet?: string;
  creator?: string;
  isoDate?: string;
  pubDate?: string;
}

export interface FeedParser {
  parseURL(url: string): Promise<{ title?: string; items: FeedItem[] }>;
}

function matchesKeywords(text: string, keywords: string[]): boolean {
  const lower = text.toLowerCase();
  return keywords.some((kw) => lower.includes(kw.toLowerCase()));
}

function itemMetadata(item: FeedItem, feedTitle: string | undefined): Record<string, string> {
  const entries: Array<[string, string | undefined]> = [
    ["title", item.title],
    ["author", item.creator],
    ["publishedAt", item.isoDate ?? item.pubDate],
    ["feedTitle", feedTitle],
  ];
  const metadata: Record<string, string> = {};
  for (const [key, value] of entries) {
    if (value) metadata[key] = value;
  }
  return metadata;
}

/**
 * Records one raw mention per feed item that has a link (and matches the
 * feed's keywords, when it has any). Returns how many new mentions were stored.
 */
export async function collectMentions(
  store: Store,
  config: IntakeConfig,
  parser: FeedParser = new Parser()
): Promise<number> {
  if (config.feeds.length === 0) {
    core.info("No feeds configured, skipping collection");
    return 0;
  }

  const results = await Promise.allSettled(
    config.feeds.map(async (feedConfig) => {
      core.info(`Fetching feed: ${feedConfig.url}`);
      const feed = await store.upsertFeed({
        name: feedConfig.name,
        url: feedConfig.url,
        reliability: feedConfig.reliability,
      });
      return { feedConfig, feed, parsed: await parser.parseURL(feedConfig.url) };
    })
  );

  let recorded = 0;

  for (const result of results) {
    if (result.status === "rejected") {
      core.warning(`Failed to fetch feed: ${result.reason}`);
      continue;
    }

    const { feedConfig, feed, parsed } = result.value;

    for (const item of parsed.items) {
      if (!item.link || !item.title) continue;

      const body = item.contentSnippet ?? item.content ?? "";
      const text = `${item.title}\n\n${body}`.trim();

      if (feedConfig.keywords && feedConfig.keywords.length > 0) {
        if (!matchesKeywords(text, feedConfig.keywords)) continue;
      }

      const id = await store.addMention({
        feedId: feed.id,
        sourceUrl: item.link,
        rawText: text.slice(0, MAX_RAW_TEXT_LENGTH),
        metadata: itemMetadata(item, parsed.title),
      });
      if (id !== null) recorded++;
    }
  }

  core.info(`Collected ${recorded} new mentions from ${config.feeds.length} feeds`);
  return recorded;
}

export { matchesKeywords };
