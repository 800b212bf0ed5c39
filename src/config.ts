import { FEED_SOURCES, KEYWORDS, type FeedSource } from "./rss";

export interface MonitorConfig {
  readonly sources: readonly FeedSource[];
  readonly keywords: readonly string[];
  readonly seenFile: string;
  readonly alertLogFile: string;
  readonly subjectPrefix: string;
  readonly userAgent: string;
}

/**
 * Build the run configuration from the static source list and the environment.
 * The result is frozen; nothing changes it during a run.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): MonitorConfig {
  return Object.freeze({
    sources: FEED_SOURCES,
    keywords: KEYWORDS,
    seenFile: env.SEEN_FILE || "data/seen_articles.json",
    alertLogFile: env.ALERT_LOG_FILE || "data/alerts_log.csv",
    subjectPrefix: env.SUBJECT_PREFIX || "[NEWS MONITOR]",
    userAgent: env.FEED_USER_AGENT || "news-keyword-monitor/0.1",
  });
}
