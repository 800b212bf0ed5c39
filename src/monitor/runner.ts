import type { MonitorConfig } from "../config";
import { fetchFeed } from "../rss";
import { loadSeen, saveSeen, ensureSource, type SeenState } from "../store/seen";
import { appendAlertLog } from "../store/alertLog";
import { buildSubject, renderBody, emitNotification } from "../notify";
import { formatTimestamp } from "../utils/time";
import { collectMatches, type Match } from "./collector";
import { keywordsFor } from "./matcher";

export interface RunnerDeps {
  fetchImpl?: typeof fetch;
  now?: () => Date;
}

export interface RunResult {
  runTime: string;
  matches: Match[];
  seen: SeenState;
}

/**
 * One full pass: read every source in order → dedup + match → save the seen
 * state → log and announce the matches.
 * Persistence errors are not caught; they end the run.
 */
export async function runMonitor(config: MonitorConfig, deps: RunnerDeps = {}): Promise<RunResult> {
  const now = deps.now ?? (() => new Date());
  const startedAt = now();
  const runTime = formatTimestamp(startedAt);

  console.log("=".repeat(80));
  console.log("[monitor] starting news monitoring");
  console.log(`[monitor] run time: ${runTime}`);

  const seen = loadSeen(config.seenFile);
  const matches: Match[] = [];

  // sequential on purpose: one source at a time, in configuration order
  for (const source of config.sources) {
    ensureSource(seen, source.name);

    const { entries } = await fetchFeed(source, {
      userAgent: config.userAgent,
      fetchImpl: deps.fetchImpl,
    });
    const found = collectMatches(source, entries, keywordsFor(source, config.keywords), seen);

    console.log(`[monitor] ${source.name}: ${found.length} new matching articles`);
    matches.push(...found);
  }

  saveSeen(seen, config.seenFile);

  if (matches.length === 0) {
    console.log("[monitor] no new articles with watched keywords");
  } else {
    appendAlertLog(matches, config.alertLogFile, runTime);

    const subject = buildSubject(config.subjectPrefix, matches.length, now());
    emitNotification(subject, renderBody(matches, startedAt));
  }

  console.log("[monitor] done");
  return { runTime, matches, seen };
}
