import { readFile } from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import type { Pillar } from "../domain.js";
import type { ContentHistoryEntry, HistoryStore } from "../store/types.js";
import { systemClock, type Clock } from "../utils.js";

const DAY_MS = 24 * 60 * 60 * 1000;

const TopicList = z.array(z.string()).min(1);

const TopicsFileSchema = z.object({
  pools: z.object({
    market_commentary: TopicList,
    education: TopicList,
    product: TopicList,
    social_proof: TopicList
  }),
  angles: z.array(z.string()).min(1)
});

export type TopicPools = z.infer<typeof TopicsFileSchema>;

export async function loadTopicPools(filePath: string): Promise<TopicPools> {
  const p = path.resolve(process.cwd(), filePath);
  const parsed = TopicsFileSchema.safeParse(JSON.parse(await readFile(p, "utf8")));
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new Error(`invalid topics file ${p}: ${issue ? `${issue.path.join(".")}: ${issue.message}` : "unknown"}`);
  }
  return parsed.data;
}

export const WEEKLY_SCHEDULE: ReadonlyArray<{ day: string; pillar: Pillar }> = [
  { day: "Monday", pillar: "market_commentary" },
  { day: "Tuesday", pillar: "education" },
  { day: "Wednesday", pillar: "product" },
  { day: "Thursday", pillar: "education" },
  { day: "Friday", pillar: "social_proof" },
  { day: "Saturday", pillar: "market_commentary" },
  { day: "Sunday", pillar: "education" }
];

export type TopicChoice = { topic: string; angle: string };

export type Exclusions = { topics?: readonly string[]; angles?: readonly string[] };

const norm = (s: string) => s.trim().toLowerCase();

/**
 * First candidate not used yet; when all were used, the one whose last use is
 * oldest (never-seen entries in `lastUse` count as oldest).
 */
function pickFresh(candidates: readonly string[], lastUse: Map<string, number>, excluded: Set<string>): string {
  const fresh = candidates.find((c) => !lastUse.has(norm(c)) && !excluded.has(norm(c)));
  if (fresh) return fresh;
  const pool = candidates.filter((c) => !excluded.has(norm(c)));
  const ranked = (pool.length > 0 ? pool : [...candidates]).sort(
    (a, b) => (lastUse.get(norm(a)) ?? 0) - (lastUse.get(norm(b)) ?? 0)
  );
  return ranked[0] ?? candidates[0] ?? "";
}

/** Keeps topics and angles from repeating within the lookback window. */
export class VarietyPlanner {
  constructor(
    private readonly pools: TopicPools,
    private readonly history: HistoryStore,
    private readonly now: Clock = systemClock,
    private readonly lookbackDays = 30
  ) {}

  private async recent(): Promise<ContentHistoryEntry[]> {
    return await this.history.recentHistory(this.now() - this.lookbackDays * DAY_MS);
  }

  /** Topics and angles generated in the window, newest first. */
  async topicsToAvoid(pillar?: Pillar): Promise<{ topics: string[]; angles: string[] }> {
    const rows = (await this.recent()).filter((h) => !pillar || h.pillar === pillar).reverse();
    const topics = [...new Set(rows.map((h) => h.topic))];
    const angles = [...new Set(rows.flatMap((h) => (h.angle ? [h.angle] : [])))];
    return { topics, angles };
  }

  async suggest(pillar: Pillar, exclude: Exclusions = {}): Promise<TopicChoice> {
    const rows = await this.recent();
    const topicUse = new Map<string, number>();
    const angleUse = new Map<string, number>();
    for (const h of rows) {
      const t = Date.parse(h.createdAt);
      topicUse.set(norm(h.topic), Math.max(topicUse.get(norm(h.topic)) ?? 0, t));
      if (h.angle && h.pillar === pillar) angleUse.set(norm(h.angle), Math.max(angleUse.get(norm(h.angle)) ?? 0, t));
    }
    return {
      topic: pickFresh(this.pools.pools[pillar], topicUse, new Set((exclude.topics ?? []).map(norm))),
      angle: pickFresh(this.pools.angles, angleUse, new Set((exclude.angles ?? []).map(norm)))
    };
  }

  /** One pillar, topic and angle per day; no topic repeats within the week. */
  async weeklyPlan(): Promise<Array<{ day: string; pillar: Pillar } & TopicChoice>> {
    const usedTopics: string[] = [];
    const usedAngles: string[] = [];
    const plan: Array<{ day: string; pillar: Pillar } & TopicChoice> = [];
    for (const slot of WEEKLY_SCHEDULE) {
      const choice = await this.suggest(slot.pillar, { topics: usedTopics, angles: usedAngles });
      usedTopics.push(choice.topic);
      usedAngles.push(choice.angle);
      plan.push({ ...slot, ...choice });
    }
    return plan;
  }
}
