import { describe, it, expect } from "vitest";
import { SAMPLES_PER_ACCOUNT, VoiceSampler } from "../src/agent/voice.js";
import { FileStore } from "../src/store/fileStore.js";
import { FakeX, xTweet } from "./helpers.js";

describe("VoiceSampler", () => {
  it("keeps the most-liked posts and counts only new ones", async () => {
    const tweets = Array.from({ length: 25 }, (_, i) => xTweet(String(100 + i), `post ${i}`, i));
    const x = new FakeX({}, { "9": { tweets, newestId: "124" } });
    const store = FileStore.inMemory();
    const account = await store.addAccount({ handle: "KobeissiLetter", userId: "9", category: "global_macro", isVoiceReference: true, voicePillars: ["market_commentary"] });
    const sampler = new VoiceSampler(store, x);

    expect(await sampler.refresh(account)).toBe(SAMPLES_PER_ACCOUNT);
    expect(await sampler.refresh(account)).toBe(0);
    expect(x.timelineCalls[0]).toEqual({ userId: "9", query: { maxResults: 100 } });

    const top = await store.samplesFor(account.id, 3);
    expect(top.map((s) => s.likes)).toEqual([24, 23, 22]);
  });

  it("resolves a missing user id and stores it", async () => {
    const x = new FakeX({ cbngov: { id: "55", username: "CBNgov", name: "Central Bank", followersCount: 900 } });
    const store = FileStore.inMemory();
    const account = await store.addAccount({ handle: "CBNgov", category: "nigeria", isVoiceReference: true, voicePillars: ["education"] });

    await new VoiceSampler(store, x).refresh(account);

    expect(await store.findAccount("CBNgov")).toMatchObject({ userId: "55", displayName: "Central Bank", followerCount: 900 });
  });

  it("formats samples for the pillar's voices only", async () => {
    const x = new FakeX({}, { "9": { tweets: [xTweet("1", "Rates  up\nagain", 3)], newestId: "1" } });
    const store = FileStore.inMemory();
    const sampler = new VoiceSampler(store, x);
    const voice = await store.addAccount({ handle: "KobeissiLetter", userId: "9", category: "global_macro", isVoiceReference: true, voicePillars: ["market_commentary"] });
    await sampler.refresh(voice);

    expect(await sampler.samplesForPrompt("market_commentary")).toBe(
      "Voice reference examples (match the style, never copy):\n\nFrom @KobeissiLetter:\n- Rates up again"
    );
    expect(await sampler.samplesForPrompt("education")).toBe("");
  });

  it("reports sample counts per voice reference", async () => {
    const x = new FakeX({}, { "9": { tweets: [xTweet("1", "a", 3), xTweet("2", "b", 7), xTweet("3", "c", 5)], newestId: "3" } });
    const store = FileStore.inMemory();
    const sampler = new VoiceSampler(store, x, () => Date.UTC(2026, 9, 5));
    const voice = await store.addAccount({ handle: "KobeissiLetter", userId: "9", category: "global_macro", isVoiceReference: true, voicePillars: ["market_commentary"] });
    await store.addAccount({ handle: "quietvoice", category: "nigeria", isVoiceReference: true, voicePillars: ["education"] });
    await store.addAccount({ handle: "CBNgov", category: "nigeria" });
    await sampler.refresh(voice);

    expect(await sampler.stats()).toEqual([
      { handle: "KobeissiLetter", pillars: ["market_commentary"], samples: 3, topLikes: 7, lastFetchedAt: "2026-10-05T00:00:00.000Z" },
      { handle: "quietvoice", pillars: ["education"], samples: 0, topLikes: null, lastFetchedAt: null }
    ]);
  });

  it("throws without an X reader", async () => {
    const store = FileStore.inMemory();
    const account = await store.addAccount({ handle: "CBNgov", category: "nigeria" });
    await expect(new VoiceSampler(store, null).refresh(account)).rejects.toThrow("X reader not configured");
  });
});
