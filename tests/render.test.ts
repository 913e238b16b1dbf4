import { describe, it, expect } from "vitest";
import type { Alert } from "../src/news/pipeline.js";
import { renderAlert, timeAgo } from "../src/news/render.js";

const NOW = Date.UTC(2026, 9, 5, 12, 0, 0);

function alert(overrides: Partial<Alert> = {}): Alert {
  return {
    key: "rss:a-1",
    kind: "news",
    urgency: "normal",
    sourceKind: "rss",
    sourceLabel: "Test Feed",
    category: "nigeria",
    text: "CBN holds rate at 27.5%",
    url: "https://news.example.test/a",
    score: 0.75,
    reasoning: "Rate decision",
    suggestedContent: null,
    publishedAtMs: NOW - 12 * 60_000,
    ...overrides
  };
}

describe("timeAgo", () => {
  it("buckets elapsed time", () => {
    expect(timeAgo(NOW - 30_000, NOW)).toBe("just now");
    expect(timeAgo(NOW - 59 * 60_000, NOW)).toBe("59 min ago");
    expect(timeAgo(NOW - 3 * 3_600_000, NOW)).toBe("3h ago");
    expect(timeAgo(NOW - 50 * 3_600_000, NOW)).toBe("2d ago");
  });

  it("treats future timestamps as just now", () => {
    expect(timeAgo(NOW + 60_000, NOW)).toBe("just now");
  });
});

describe("renderAlert", () => {
  it("renders a news alert without a suggestion", () => {
    expect(renderAlert(alert(), NOW)).toBe(
      [
        "📰 *News* from Test Feed · 12 min ago",
        "> CBN holds rate at 27.5%",
        "Score 0.75 · nigeria · Rate decision",
        "https://news.example.test/a"
      ].join("\n")
    );
  });

  it("renders a high-urgency reply opportunity with its suggested post", () => {
    const text = renderAlert(
      alert({
        kind: "reply_opportunity",
        urgency: "high",
        sourceKind: "tweet",
        sourceLabel: "@centralbank",
        text: "Line one\nLine two",
        url: null,
        score: 0.9,
        suggestedContent: "Our take on the hold.",
        publishedAtMs: null
      }),
      NOW
    );
    expect(text).toBe(
      [
        "🚨 *Reply opportunity* from @centralbank",
        "> Line one",
        "> Line two",
        "Score 0.90 · nigeria · Rate decision",
        "",
        "*Suggested:*",
        "Our take on the hold.",
        "",
        "_Reply in thread to revise, or react ✅ to approve._"
      ].join("\n")
    );
  });

  it("clips long quotes", () => {
    const text = renderAlert(alert({ text: "x".repeat(800) }), NOW);
    const quoteLine = text.split("\n")[1] ?? "";
    expect(quoteLine).toBe(`> ${"x".repeat(499)}…`);
  });
});
