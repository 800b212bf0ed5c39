import type { FeedSource, FeedEntry } from "../rss";
import { ensureSource, type SeenState } from "../store/seen";
import { matchesKeywords } from "./matcher";

export interface Match {
  source: string;
  title: string;
  link: string;
  summary: string;
  published: string;
}

/**
 * Dedup key: link, then feed id, then title. Empty when the entry has none.
 */
export function entryId(entry: FeedEntry): string {
  return entry.link || entry.id || entry.title || "";
}

/**
 * Walk one source's entries in feed order, mark every unseen entry as seen
 * and return the unseen ones that hit a keyword.
 *
 * An entry is marked seen before the keyword test, so non-matching articles
 * are never evaluated again even if the keyword list changes later.
 * Mutates `seen[source.name]`, creating it when missing.
 */
export function collectMatches(
  source: FeedSource,
  entries: Iterable<FeedEntry>,
  keywords: readonly string[],
  seen: SeenState
): Match[] {
  const ids = ensureSource(seen, source.name)[source.name];
  const known = new Set(ids);
  const matches: Match[] = [];

  for (const entry of entries) {
    const id = entryId(entry);
    if (!id) continue;
    if (known.has(id)) continue;

    ids.push(id);
    known.add(id);

    if (!matchesKeywords(entry, keywords)) continue;

    matches.push({
      source: source.name,
      title: (entry.title ?? "").trim(),
      link: entry.link ?? "",
      summary: (entry.summary || entry.description || "").trim(),
      published: entry.published || entry.updated || "",
    });
  }

  return matches;
}
