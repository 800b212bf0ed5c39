/**
 * Monitored news sources and keywords.
 * To watch another outlet, add an entry to FEED_SOURCES.
 */
export interface FeedSource {
  name: string;            // display name, also the seen-state key
  url: string;             // RSS/Atom feed URL
  extraKeywords: string[]; // added to KEYWORDS for this source only
}

/**
 * Case-insensitive substrings matched against title + summary.
 */
export const KEYWORDS: readonly string[] = [
  "ministerstvo vnútra",
  "minister vnútra",
  "cestovný pas",
  "pasy",
  "doklady",
  "eDoklady",
  "krízová situácia",
  "mimoriadna situácia",
  "bezpečnosť",
  "útok",
  "atentát",
  // FIXME: missing comma upstream makes this one term ("šutaj eštokeštok"); confirm with the list owner
  "šutaj eštok" +
  "eštok",
  "hamran",
];

export const FEED_SOURCES: readonly FeedSource[] = [
  {
    name: "DennikN",
    url: "https://dennikn.sk/feed",
    extraKeywords: [],
  },
  {
    name: "Aktuality",
    url: "https://www.aktuality.sk/rss/",
    extraKeywords: [],
  },
  {
    name: "Pravda",
    // domestic news
    url: "https://spravy.pravda.sk/domace/rss/xml",
    extraKeywords: [],
  },
  {
    name: "SME",
    // legacy endpoint, drop it if it starts returning junk
    url: "http://rss.sme.sk/rss/rss.asp?sek=spravy",
    extraKeywords: [],
  },
  {
    name: "Plus1Den",
    url: "https://www1.pluska.sk/rss.xml",
    extraKeywords: [],
  },
];
