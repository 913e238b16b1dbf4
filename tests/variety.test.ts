import { describe, it, expect } from "vitest";
import { loadTopicPools, VarietyPlanner, WEEKLY_SCHEDULE, type TopicPools } from "../src/agent/variety.js";
import type { Pillar } from "../src/domain.js";
import { FileStore } from "../src/store/fileStore.js";

const DAY = 24 * 60 * 60 * 1000;

const POOLS: TopicPools = {
  pools: {
    market_commentary: ["NGN weekly", "ARS weekly", "COP weekly"],
    education: ["Leverage", "Funding rates"],
    product: ["Launch"],
    social_proof: ["Volume milestone"]
  },
  angles: ["data-first", "contrarian", "question"]
};

function setup() {
  let clock = Date.UTC(2026, 9, 1);
  const store = FileStore.inMemory(() => clock);
  const planner = new VarietyPlanner(POOLS, store, () => clock);
  return {
    store,
    planner,
    advance(ms: number) {
      clock += ms;
    },
    async used(pillar: Pillar, topic: string, angle: string | null) {
      await store.addHistory({ pillar, kind: "post", topic, angle, content: `${topic} post` });
    }
  };
}

describe("VarietyPlanner", () => {
  it("starts with the first topic and angle", async () => {
    const { planner } = setup();
    expect(await planner.suggest("market_commentary")).toEqual({ topic: "NGN weekly", angle: "data-first" });
  });

  it("skips topics used under any pillar and angles used under this pillar", async () => {
    const { planner, used, advance } = setup();
    await used("market_commentary", "NGN weekly", "data-first");
    advance(1000);
    await used("education", "ARS weekly", "contrarian");

    expect(await planner.suggest("market_commentary")).toEqual({ topic: "COP weekly", angle: "contrarian" });
  });

  it("reuses the least recently used topic once the pool is exhausted", async () => {
    const { planner, used, advance } = setup();
    await used("market_commentary", "ARS weekly", null);
    advance(1000);
    await used("market_commentary", "NGN weekly", null);
    advance(1000);
    await used("market_commentary", "COP weekly", null);

    expect((await planner.suggest("market_commentary")).topic).toBe("ARS weekly");
  });

  it("forgets history outside the lookback window", async () => {
    const { planner, used, advance } = setup();
    await used("market_commentary", "NGN weekly", "data-first");
    advance(31 * DAY);
    expect(await planner.suggest("market_commentary")).toEqual({ topic: "NGN weekly", angle: "data-first" });
  });

  it("honours explicit exclusions", async () => {
    const { planner } = setup();
    expect((await planner.suggest("market_commentary", { topics: ["ngn WEEKLY"] })).topic).toBe("ARS weekly");
  });

  it("lists topics and angles to avoid, newest first", async () => {
    const { planner, used, advance } = setup();
    await used("market_commentary", "NGN weekly", "data-first");
    advance(1000);
    await used("education", "Leverage", "contrarian");

    expect(await planner.topicsToAvoid()).toEqual({ topics: ["Leverage", "NGN weekly"], angles: ["contrarian", "data-first"] });
    expect(await planner.topicsToAvoid("education")).toEqual({ topics: ["Leverage"], angles: ["contrarian"] });
  });

  it("plans a week without repeating a topic while the pool lasts", async () => {
    const { planner } = setup();
    const plan = await planner.weeklyPlan();
    expect(plan.map((p) => p.day)).toEqual(WEEKLY_SCHEDULE.map((s) => s.day));
    expect(plan.map((p) => p.topic)).toEqual([
      "NGN weekly",
      "Leverage",
      "Launch",
      "Funding rates",
      "Volume milestone",
      "ARS weekly",
      "Leverage"
    ]);
    expect(plan.slice(0, 3).map((p) => p.angle)).toEqual(["data-first", "contrarian", "question"]);
  });

  it("loads the bundled topic pools", async () => {
    const pools = await loadTopicPools("data/topics.json");
    expect(pools.pools.market_commentary).toContain("NGN weekly performance");
    expect(pools.angles.length).toBeGreaterThan(0);
  });
});
