import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { vi } from "vitest";

export function makeTempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), "news-monitor-"));
}

export function silenceConsole() {
  return {
    log: vi.spyOn(console, "log").mockImplementation(() => {}),
    warn: vi.spyOn(console, "warn").mockImplementation(() => {}),
  };
}

/** fetch stand-in that serves a fixed body per URL; unknown URLs get a 404 */
export function fakeFetch(bodies: Record<string, string>): typeof fetch {
  return async (input) => {
    const url = typeof input === "string" ? input : input instanceof URL ? input.href : input.url;
    const body = bodies[url];
    return body === undefined
      ? new Response("not found", { status: 404 })
      : new Response(body, { status: 200 });
  };
}

export function rss(items: string): string {
  return `<?xml version="1.0" encoding="UTF-8"?>
<rss version="2.0">
  <channel>
    <title>Test feed</title>
    <link>https://example.sk</link>
    <description>test</description>
${items}
  </channel>
</rss>`;
}
