import fs from "node:fs";
import path from "node:path";
import type { Match } from "../monitor/collector";

export const ALERT_LOG_HEADER = "run_time;source;published;title;link";

/**
 * `;` is the column separator, so it becomes `,` inside a value.
 * Line breaks would split a record and are folded to a space.
 */
export function escapeField(value: string | undefined): string {
  return (value ?? "").replace(/;/g, ",").replace(/\r?\n|\r/g, " ");
}

export function formatAlertLine(match: Match, runTime: string): string {
  return [runTime, match.source, match.published, match.title, match.link]
    .map(escapeField)
    .join(";");
}

/**
 * Append one line per match, all with the same run time.
 * The header goes in only when the file is created.
 */
export function appendAlertLog(matches: Match[], filePath: string, runTime: string): void {
  const exists = fs.existsSync(filePath);
  const lines = matches.map((m) => formatAlertLine(m, runTime) + "\n");

  if (!exists) {
    fs.mkdirSync(path.dirname(path.resolve(filePath)), { recursive: true });
    lines.unshift(ALERT_LOG_HEADER + "\n");
  }

  fs.appendFileSync(filePath, lines.join(""), "utf-8");
  console.log(`[alert-log] ${matches.length} articles written to ${filePath}`);
}
