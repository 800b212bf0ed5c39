/**
 * Feed reading entry point
 */
export { FEED_SOURCES, KEYWORDS } from "./feeds";
export type { FeedSource } from "./feeds";
export { fetchFeed, parseFeedXml } from "./parser";
export type { FeedEntry, FeedResult } from "./parser";
