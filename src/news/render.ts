import type { Alert } from "./pipeline.js";

const QUOTE_LIMIT = 500;

/** "just now", "12 min ago", "3h ago", "2d ago". */
export function timeAgo(thenMs: number, nowMs: number): string {
  const mins = Math.floor(Math.max(0, nowMs - thenMs) / 60_000);
  if (mins < 1) return "just now";
  if (mins < 60) return `${mins} min ago`;
  const hours = Math.floor(mins / 60);
  if (hours < 24) return `${hours}h ago`;
  return `${Math.floor(hours / 24)}d ago`;
}

function quote(text: string): string {
  const clipped = text.length > QUOTE_LIMIT ? `${text.slice(0, QUOTE_LIMIT - 1)}…` : text;
  return clipped
    .split("\n")
    .map((l) => `> ${l}`)
    .join("\n");
}

export function renderAlert(alert: Alert, nowMs: number): string {
  const icon = alert.urgency === "high" ? "🚨" : alert.kind === "news" ? "📰" : "💬";
  const label = alert.kind === "news" ? "News" : "Reply opportunity";
  const age = alert.publishedAtMs !== null ? ` · ${timeAgo(alert.publishedAtMs, nowMs)}` : "";

  const lines = [
    `${icon} *${label}* from ${alert.sourceLabel}${age}`,
    quote(alert.text),
    `Score ${alert.score.toFixed(2)} · ${alert.category} · ${alert.reasoning}`
  ];
  if (alert.url) lines.push(alert.url);
  if (alert.suggestedContent) {
    lines.push("", "*Suggested:*", alert.suggestedContent, "", "_Reply in thread to revise, or react ✅ to approve._");
  }
  return lines.join("\n");
}
