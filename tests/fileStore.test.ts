import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { DuplicateError, StoreUnavailableError } from "../src/errors.js";
import { FileStore, migrateStoreData, STORE_SCHEMA_VERSION } from "../src/store/fileStore.js";
import type { VoiceSample } from "../src/store/types.js";

function sample(tweetId: string, likes: number): VoiceSample {
  return {
    tweetId,
    accountId: "acct-1",
    handle: "voicedesk",
    text: `sample ${tweetId}`,
    likes,
    retweets: 0,
    postedAt: null,
    fetchedAt: "2026-01-01T00:00:00.000Z"
  };
}

describe("FileStore dedup", () => {
  it("claims a key exactly once under concurrent callers", async () => {
    const store = FileStore.inMemory();
    const results = await Promise.all(Array.from({ length: 10 }, () => store.claim("tweet:100")));
    expect(results.filter(Boolean)).toHaveLength(1);
    expect(await store.has("tweet:100")).toBe(true);
    expect(await store.has("rss:100")).toBe(false);
  });

  it("keeps tweet and rss namespaces apart", async () => {
    const store = FileStore.inMemory();
    expect(await store.claim("tweet:7")).toBe(true);
    expect(await store.claim("rss:7")).toBe(true);
    expect(await store.claim("tweet:7")).toBe(false);
  });
});

describe("FileStore records", () => {
  it("rejects a duplicate handle regardless of case", async () => {
    const store = FileStore.inMemory();
    await store.addAccount({ handle: "DeskWatcher", category: "nigeria" });
    await expect(store.addAccount({ handle: "@deskwatcher", category: "argentina" })).rejects.toBeInstanceOf(DuplicateError);
    const found = await store.findAccount("@DESKWATCHER");
    expect(found?.handle).toBe("DeskWatcher");
    expect(found?.priority).toBe(2);
  });

  it("rejects a duplicate feed url", async () => {
    const store = FileStore.inMemory();
    await store.addRssSource({ name: "A", url: "https://a.example.test/rss", category: "colombia" });
    await expect(
      store.addRssSource({ name: "B", url: "https://a.example.test/rss", category: "colombia" })
    ).rejects.toThrow("duplicate key: url:https://a.example.test/rss");
  });

  it("filters accounts by activity, category and voice flag", async () => {
    const store = FileStore.inMemory();
    const a = await store.addAccount({ handle: "one", category: "nigeria" });
    await store.addAccount({ handle: "two", category: "argentina", isVoiceReference: true, voicePillars: ["education"] });
    await store.updateAccount(a.id, { active: false });

    expect((await store.listAccounts()).map((x) => x.handle)).toEqual(["one", "two"]);
    expect((await store.listAccounts({ activeOnly: true })).map((x) => x.handle)).toEqual(["two"]);
    expect((await store.listAccounts({ category: "nigeria" })).map((x) => x.handle)).toEqual(["one"]);
    expect((await store.listAccounts({ voiceOnly: true })).map((x) => x.handle)).toEqual(["two"]);
  });

  it("stores voice samples once per tweet id and returns the most liked first", async () => {
    const store = FileStore.inMemory();
    expect(await store.addSamples([sample("1", 5), sample("2", 50)])).toBe(2);
    expect(await store.addSamples([sample("2", 50), sample("3", 20)])).toBe(1);
    expect((await store.samplesFor("acct-1", 2)).map((s) => s.tweetId)).toEqual(["2", "3"]);
  });

  it("returns feedback for one pillar, newest first", async () => {
    const store = FileStore.inMemory();
    await store.addFeedback({ pillar: "education", originalContent: "a", learnings: ["first"] });
    await store.addFeedback({ pillar: "product", originalContent: "b", learnings: ["other"] });
    await store.addFeedback({ pillar: "education", originalContent: "c", learnings: ["second"] });

    const rows = await store.recentFeedback("education", 10);
    expect(rows.map((r) => r.learnings[0])).toEqual(["second", "first"]);
    expect(rows[0]?.finalContent).toBeNull();
  });

  it("marks items notified and actioned", async () => {
    const store = FileStore.inMemory();
    await store.saveItem({
      key: "rss:g1",
      kind: "rss",
      externalId: "g1",
      sourceId: "feed-1",
      sourceLabel: "Feed",
      text: "NGN update",
      url: null,
      publishedAt: null,
      fetchedAt: "2026-01-01T00:00:00.000Z",
      relevanceScore: 0.8,
      relevanceType: "news",
      reasoning: "r",
      suggestedContent: null,
      notified: false,
      notifiedMessageId: null,
      actioned: false
    });
    await store.markNotified("rss:g1", "msg-1");
    await store.markActioned("rss:g1");
    const [item] = await store.recentItems(1);
    expect(item?.notified).toBe(true);
    expect(item?.notifiedMessageId).toBe("msg-1");
    expect(item?.actioned).toBe(true);
  });
});

describe("FileStore persistence", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "store-test-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("creates a fresh file and reloads what was written", async () => {
    const file = join(dir, "store.json");
    const store = await FileStore.open(file);
    await store.claim("rss:abc");
    await store.addAccount({ handle: "reloaded", category: "crypto_defi" });

    const onDisk: unknown = JSON.parse(await readFile(file, "utf8"));
    expect(onDisk).toMatchObject({ schemaVersion: STORE_SCHEMA_VERSION });

    const again = await FileStore.open(file);
    expect(await again.has("rss:abc")).toBe(true);
    expect((await again.findAccount("reloaded"))?.category).toBe("crypto_defi");
  });

  it("fails closed on a corrupt file", async () => {
    const file = join(dir, "store.json");
    await writeFile(file, "{not json", "utf8");
    await expect(FileStore.open(file)).rejects.toBeInstanceOf(StoreUnavailableError);
  });

  it("migrates v1 feeds to carry a priority", () => {
    const migrated = migrateStoreData({
      schemaVersion: 1,
      rssSources: [{ id: "f", name: "F", url: "https://f.example.test", category: "nigeria", keywords: [], active: true, lastFetchedAt: null, createdAt: "x" }]
    });
    expect(migrated).toMatchObject({ schemaVersion: STORE_SCHEMA_VERSION, rssSources: [{ priority: 2 }], accounts: [] });
  });
});
