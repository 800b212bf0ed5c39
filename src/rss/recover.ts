import * as cheerio from "cheerio";
import type { FeedEntry } from "./parser";

/**
 * Lenient entry scan for feeds the strict parser rejects.
 * htmlparser2 in XML mode keeps going past unescaped `&`, unclosed tags and
 * truncated documents, so every <item>/<entry> it saw comes back.
 */
export function recoverEntries(xml: string): FeedEntry[] {
  const $ = cheerio.load(xml, { xml: true });

  return $("item, entry")
    .toArray()
    .map((el) => {
      const node = $(el);

      // first non-empty child text among the given tag names
      const field = (...names: string[]): string | undefined => {
        for (const name of names) {
          const value = node.children(name).first().text().trim();
          if (value) return value;
        }
        return undefined;
      };

      // RSS carries the URL as text, Atom as href
      const linkEl = node.children("link").first();
      const link = linkEl.text().trim() || linkEl.attr("href")?.trim() || undefined;

      return {
        title: field("title"),
        summary: field("summary"),
        description: field("description"),
        link,
        id: field("guid", "id"),
        published: field("published", "pubDate"),
        updated: field("updated"),
      };
    });
}
