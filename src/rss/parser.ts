import RssParser from "rss-parser";
import type { FeedSource } from "./feeds";
import { recoverEntries } from "./recover";

/**
 * Entry fields rss-parser does not map on its own (Atom id/published/updated,
 * raw RSS description, raw Atom summary). Values may arrive as xml2js nodes,
 * hence `unknown`.
 */
interface ExtraItemFields {
  id?: unknown;
  published?: unknown;
  updated?: unknown;
  description?: unknown;
  summaryNode?: unknown;
}

const rssParser = new RssParser<Record<string, unknown>, ExtraItemFields>({
  customFields: {
    item: ["id", "published", "updated", "description", ["summary", "summaryNode"]],
  },
});

export interface FeedEntry {
  title?: string;
  summary?: string;
  description?: string;
  link?: string;
  id?: string;
  published?: string;
  updated?: string;
}

/**
 * Outcome of reading one feed. `wellFormed: false` means the strict parse
 * failed; `entries` then holds whatever the lenient scan recovered.
 */
export interface FeedResult {
  entries: FeedEntry[];
  wellFormed: boolean;
  diagnostic?: string;
}

export interface FetchFeedOptions {
  userAgent?: string;
  fetchImpl?: typeof fetch;
}

type ParsedItem = RssParser.Item & ExtraItemFields;

/**
 * True for an xml2js node that has child elements (mixed content such as
 * `Nové <b>pasy</b>`), whose `_` holds only the text between them.
 */
function hasChildElements(value: unknown): boolean {
  if (!value || typeof value !== "object" || Array.isArray(value)) return false;
  return Object.keys(value).some((key) => key !== "_" && key !== "$");
}

/**
 * Text of an xml2js value: own text first, then child element text.
 * Attributes (`$`) are skipped.
 */
function nodeText(value: unknown): string | undefined {
  if (typeof value === "string") return value;
  if (Array.isArray(value)) return joinText(value.map(nodeText));
  if (!value || typeof value !== "object") return undefined;

  const own = "_" in value ? nodeText(value._) : undefined;
  const children = Object.entries(value)
    .filter(([key]) => key !== "_" && key !== "$")
    .map(([, child]) => nodeText(child));
  return joinText([own, ...children]);
}

function joinText(parts: (string | undefined)[]): string | undefined {
  const present = parts.filter((part): part is string => part !== undefined && part !== "");
  return present.length > 0 ? present.join(" ") : undefined;
}

function toEntry(item: ParsedItem): FeedEntry {
  return {
    title: nodeText(item.title),
    summary: nodeText(item.summaryNode) ?? nodeText(item.summary),
    description: nodeText(item.description),
    link: nodeText(item.link),
    id: nodeText(item.guid) ?? nodeText(item.id),
    published: nodeText(item.published) ?? nodeText(item.pubDate),
    updated: nodeText(item.updated),
  };
}

/**
 * xml2js loses the order of mixed content, so summaries and descriptions with
 * inline markup are re-read from a document-order scan. Only applied when the
 * scan sees the same number of entries, otherwise the flattened text stays.
 */
function withMarkupText(xml: string, items: ParsedItem[], entries: FeedEntry[]): FeedEntry[] {
  const marked = items.map(
    (item) => hasChildElements(item.description) || hasChildElements(item.summaryNode)
  );
  if (!marked.includes(true)) return entries;

  const scanned = recoverEntries(xml);
  if (scanned.length !== entries.length) return entries;

  return entries.map((entry, i) => {
    if (!marked[i]) return entry;
    return {
      ...entry,
      summary: hasChildElements(items[i].summaryNode) ? scanned[i].summary : entry.summary,
      description: hasChildElements(items[i].description) ? scanned[i].description : entry.description,
    };
  });
}

/**
 * Charset from the Content-Type header, else the XML declaration, else UTF-8.
 */
function detectCharset(contentType: string | null, bytes: Uint8Array): string {
  const fromHeader = /charset\s*=\s*["']?([\w.:-]+)/i.exec(contentType ?? "")?.[1];
  if (fromHeader) return fromHeader;

  // the declaration itself is ASCII whatever the document encoding is
  const head = new TextDecoder("latin1").decode(bytes.subarray(0, 256));
  const fromDecl = /^\s*<\?xml[^>]*encoding\s*=\s*["']([\w.:-]+)["']/i.exec(head)?.[1];
  return fromDecl ?? "utf-8";
}

export function decodeFeed(bytes: Uint8Array, contentType: string | null): string {
  const charset = detectCharset(contentType, bytes);
  let decoder: InstanceType<typeof TextDecoder>;
  try {
    decoder = new TextDecoder(charset);
  } catch (err) {
    console.warn(`[rss] unknown charset "${charset}", decoding as UTF-8:`, describeError(err));
    decoder = new TextDecoder("utf-8");
  }
  return decoder.decode(bytes);
}

function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Parse a feed document. Strict first; on failure fall back to a lenient scan
 * so outlets with slightly broken XML still yield their entries.
 */
export async function parseFeedXml(xml: string): Promise<FeedResult> {
  try {
    const feed = await rssParser.parseString(xml);
    const entries = withMarkupText(xml, feed.items, feed.items.map(toEntry));
    return { entries, wellFormed: true };
  } catch (err) {
    return {
      entries: recoverEntries(xml),
      wellFormed: false,
      diagnostic: describeError(err),
    };
  }
}

/**
 * Download and parse one source. Never throws: network and HTTP failures come
 * back as an empty, not well-formed result.
 */
export async function fetchFeed(
  feed: FeedSource,
  opts: FetchFeedOptions = {}
): Promise<FeedResult> {
  const { userAgent = "news-keyword-monitor/0.1", fetchImpl = fetch } = opts;
  console.log(`[rss] ${feed.name}: ${feed.url}`);

  let result: FeedResult;
  try {
    const res = await fetchImpl(feed.url, {
      headers: {
        "User-Agent": userAgent,
        Accept: "application/rss+xml, application/atom+xml, application/xml, text/xml",
      },
    });

    if (!res.ok) {
      await res.body?.cancel();
      result = { entries: [], wellFormed: false, diagnostic: `HTTP ${res.status}` };
      console.warn(`[rss] ${feed.name}: request failed (HTTP ${res.status})`);
    } else {
      const bytes = new Uint8Array(await res.arrayBuffer());
      result = await parseFeedXml(decodeFeed(bytes, res.headers.get("content-type")));
      if (!result.wellFormed) {
        console.warn(
          `[rss] ${feed.name}: malformed feed (${result.diagnostic}), recovered ${result.entries.length} entries`
        );
      }
    }
  } catch (err) {
    result = { entries: [], wellFormed: false, diagnostic: describeError(err) };
    console.warn(`[rss] ${feed.name}: request failed:`, result.diagnostic);
  }

  if (result.entries.length === 0) {
    console.log(`[rss] ${feed.name}: no entries (empty feed or nothing could be read)`);
  }

  return result;
}
