import type { Pillar } from "../domain.js";
import type { FeedbackStore } from "../store/types.js";

/** Confirmed learnings for a pillar, newest first, deduplicated. */
export async function learningsForPrompt(store: FeedbackStore, pillar: Pillar, limit = 10): Promise<string[]> {
  const records = await store.recentFeedback(pillar, limit);
  const out: string[] = [];
  const seen = new Set<string>();
  for (const r of records) {
    for (const l of r.learnings) {
      const key = l.trim().toLowerCase();
      if (!key || seen.has(key)) continue;
      seen.add(key);
      out.push(l.trim());
      if (out.length >= limit) return out;
    }
  }
  return out;
}

export function formatLearnings(learnings: readonly string[]): string {
  if (learnings.length === 0) return "";
  return ["Confirmed style preferences (follow these):", ...learnings.map((l) => `- ${l}`)].join("\n");
}
