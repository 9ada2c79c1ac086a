export interface PageFingerprint {
  title: string | null;
  contentHash: string;
  pricingText: string | null;
  featuresText: string | null;
}

const PRICING_PATTERNS = [
  /\$[\d,]+(?:\.\d{2})?(?:\s*\/?(?:mo|month|yr|year|user))?/gi,
  /\b(?:free|starter|pro|enterprise|business|team)(?:\s+(?:plan|tier))?\b/gi,
  /\b(?:pricing|plans?|subscriptions?)\b/gi,
];

// Patterns with a capture group contribute the group, not the whole match.
const FEATURE_PATTERNS = [
  /\b(?:features?|capabilities|includes?):?\s*([^\n.]+)/gi,
  /(?:✓|✔|•)\s*([^\n]+)/gi,
];

export function extractTitle(html: string): string | null {
  const match = /<title[^>]*>([^<]+)<\/title>/i.exec(html);
  const title = match?.[1]?.trim();
  return title ? title : null;
}

export function pageText(html: string): string {
  let text = html;

  text = text.replace(/<script[\s\S]*?<\/script>/gi, "");
  text = text.replace(/<style[\s\S]*?<\/style>/gi, "");

  // Strip remaining HTML tags
  text = text.replace(/<[^>]+>/g, " ");

  // Normalize whitespace
  return text.replace(/\s+/g, " ").trim();
}

/** 32-bit FNV-1a over the UTF-8 bytes, as 8 hex digits. */
export function contentHash(text: string): string {
  let hash = 0x811c9dc5;
  for (const byte of new TextEncoder().encode(text)) {
    hash ^= byte;
    hash = Math.imul(hash, 0x01000193) >>> 0;
  }
  return hash.toString(16).padStart(8, "0");
}

function collectMatches(text: string, patterns: RegExp[], maxMatches: number): string | null {
  const matches: string[] = [];
  for (const pattern of patterns) {
    for (const match of text.matchAll(pattern)) {
      matches.push((match[1] ?? match[0]).trim());
    }
  }
  const unique = [...new Set(matches.slice(0, maxMatches).filter(Boolean))];
  return unique.length > 0 ? unique.join(" | ") : null;
}

export function extractPricing(text: string, maxMatches: number): string | null {
  return collectMatches(text, PRICING_PATTERNS, maxMatches);
}

export function extractFeatures(text: string, maxMatches: number): string | null {
  return collectMatches(text, FEATURE_PATTERNS, maxMatches);
}

export function fingerprintPage(html: string, maxMatches: number): PageFingerprint {
  const text = pageText(html);
  return {
    title: extractTitle(html),
    contentHash: contentHash(text),
    pricingText: extractPricing(text, maxMatches),
    featuresText: extractFeatures(text, maxMatches),
  };
}
