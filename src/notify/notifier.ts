import type { Match } from "../monitor/collector";
import { formatTimestamp } from "../utils/time";

const RULE = "-".repeat(80);
const FRAME = "=".repeat(80);

export function buildSubject(prefix: string, count: number, now: Date): string {
  return `${prefix} ${formatTimestamp(now, false)} – ${count} articles`;
}

/**
 * Plain-text notification body, one block per match.
 */
export function renderBody(matches: Match[], now: Date): string {
  const lines: string[] = [
    "News monitoring – new articles matching the watched keywords",
    `Run time: ${formatTimestamp(now)}`,
    "",
  ];

  for (const m of matches) {
    lines.push(`Source: ${m.source}`);
    lines.push(`Title: ${m.title}`);
    if (m.published) lines.push(`Published: ${m.published}`);
    lines.push(`Link: ${m.link}`);
    if (m.summary) {
      lines.push("", "Summary:", m.summary);
    }
    lines.push(RULE);
  }

  return lines.join("\n");
}

/**
 * Stand-in for delivery: the notification only goes to stdout.
 */
export function emitNotification(subject: string, body: string): void {
  console.log(
    ["", FRAME, "NOTIFICATION (log only, nothing sent)", `SUBJECT: ${subject}`, RULE, body, FRAME, ""].join("\n")
  );
}
