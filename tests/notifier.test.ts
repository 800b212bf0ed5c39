import { describe, it, expect, afterEach, vi } from "vitest";
import { buildSubject, renderBody, emitNotification } from "../src/notify";

const now = new Date(2026, 9, 19, 8, 5, 9);
const RULE = "-".repeat(80);

describe("notifier", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("builds the subject from prefix, time and count", () => {
    expect(buildSubject("[NEWS MONITOR]", 2, now)).toBe("[NEWS MONITOR] 19.10.2026 08:05 – 2 articles");
  });

  it("renders optional fields only when present", () => {
    const body = renderBody(
      [
        {
          source: "DennikN",
          title: "Nové pasy",
          link: "https://dennikn.sk/1",
          summary: "Ministerstvo mení doklady.",
          published: "Mon, 19 Oct 2026 08:00:00 +0200",
        },
        { source: "SME", title: "Útok", link: "https://sme.sk/2", summary: "", published: "" },
      ],
      now
    );

    expect(body.split("\n")).toEqual([
      "News monitoring – new articles matching the watched keywords",
      "Run time: 19.10.2026 08:05:09",
      "",
      "Source: DennikN",
      "Title: Nové pasy",
      "Published: Mon, 19 Oct 2026 08:00:00 +0200",
      "Link: https://dennikn.sk/1",
      "",
      "Summary:",
      "Ministerstvo mení doklady.",
      RULE,
      "Source: SME",
      "Title: Útok",
      "Link: https://sme.sk/2",
      RULE,
    ]);
  });

  it("prints the notification instead of sending it", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    emitNotification("[TEST] subject", "body");

    expect(log).toHaveBeenCalledTimes(1);
    const printed = String(log.mock.calls[0][0]);
    expect(printed.split("\n")).toContain("SUBJECT: [TEST] subject");
    expect(printed.split("\n")).toContain("body");
  });
});
