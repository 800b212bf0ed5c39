import type { FeedSource, FeedEntry } from "../rss";

/**
 * Global keywords followed by the source's own.
 */
export function keywordsFor(source: FeedSource, globalKeywords: readonly string[]): string[] {
  return [...globalKeywords, ...source.extraKeywords];
}

/**
 * Plain case-insensitive substring test on title + summary (description when
 * there is no summary). No word boundaries: "pasy" also hits "zápasy".
 */
export function matchesKeywords(entry: FeedEntry, keywords: readonly string[]): boolean {
  const summary = entry.summary || entry.description || "";
  const haystack = `${entry.title ?? ""} ${summary}`.toLowerCase();

  return keywords.some((kw) => haystack.includes(kw.toLowerCase()));
}
