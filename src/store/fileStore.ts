import { randomUUID } from "node:crypto";
import { mkdir, readFile, rename, writeFile } from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import type { Pillar } from "../domain.js";
import { DuplicateError, StoreUnavailableError } from "../errors.js";
import { errMessage, logger } from "../logger.js";
import { KeyedMutex, systemClock, type Clock } from "../utils.js";
import {
  ContentHistorySchema,
  MonitoredAccountSchema,
  RssSourceSchema,
  ScoredItemSchema,
  VoiceFeedbackSchema,
  VoiceSampleSchema,
  type AccountFilter,
  type AccountPatch,
  type ContentHistoryEntry,
  type MonitoredAccount,
  type NewAccount,
  type NewFeedback,
  type NewHistory,
  type NewRssSource,
  type RssSource,
  type RssSourcePatch,
  type ScoredItem,
  type Store,
  type VoiceFeedback,
  type VoiceSample
} from "./types.js";

export const STORE_SCHEMA_VERSION = 2;

const MAX_ITEMS = 5000;
const MAX_HISTORY = 2000;

const StoreDataSchema = z.object({
  schemaVersion: z.number(),
  accounts: z.array(MonitoredAccountSchema),
  rssSources: z.array(RssSourceSchema),
  seen: z.record(z.string()),
  items: z.array(ScoredItemSchema),
  history: z.array(ContentHistorySchema),
  feedback: z.array(VoiceFeedbackSchema),
  voiceSamples: z.array(VoiceSampleSchema)
});
type StoreData = z.infer<typeof StoreDataSchema>;

function emptyData(): StoreData {
  return {
    schemaVersion: STORE_SCHEMA_VERSION,
    accounts: [],
    rssSources: [],
    seen: {},
    items: [],
    history: [],
    feedback: [],
    voiceSamples: []
  };
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

/**
 * Bring an older file up to the current shape before validation.
 * v1 had no per-feed priority.
 */
export function migrateStoreData(raw: unknown): unknown {
  if (!isRecord(raw)) return raw;
  const version = typeof raw.schemaVersion === "number" ? raw.schemaVersion : 0;
  const out: Record<string, unknown> = { ...emptyData(), ...raw };

  if (version < 2 && Array.isArray(raw.rssSources)) {
    out.rssSources = raw.rssSources.map((s) => (isRecord(s) && s.priority === undefined ? { ...s, priority: 2 } : s));
  }

  out.schemaVersion = STORE_SCHEMA_VERSION;
  return out;
}

function sameHandle(a: string, b: string): boolean {
  return a.replace(/^@/, "").toLowerCase() === b.replace(/^@/, "").toLowerCase();
}

/**
 * JSON-file store for every persisted record. All mutations go through one
 * writer; each write lands via temp file + rename. `inMemory()` skips disk.
 */
export class FileStore implements Store {
  private readonly writer = new KeyedMutex();

  private constructor(
    private data: StoreData,
    private readonly filePath: string | null,
    private readonly now: Clock
  ) {}

  static inMemory(now: Clock = systemClock): FileStore {
    return new FileStore(emptyData(), null, now);
  }

  static async open(filePath: string, now: Clock = systemClock): Promise<FileStore> {
    const p = path.resolve(process.cwd(), filePath);
    let raw: string;
    try {
      raw = await readFile(p, "utf8");
    } catch (err) {
      if (isRecord(err) && err.code === "ENOENT") {
        const store = new FileStore(emptyData(), p, now);
        await store.persist();
        logger.info("store.initialized", { path: p, version: STORE_SCHEMA_VERSION });
        return store;
      }
      throw new StoreUnavailableError(`cannot read store at ${p}: ${errMessage(err)}`, err);
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (err) {
      throw new StoreUnavailableError(`store at ${p} is not valid JSON: ${errMessage(err)}`, err);
    }
    const parsed = StoreDataSchema.safeParse(migrateStoreData(json));
    if (!parsed.success) {
      throw new StoreUnavailableError(`store at ${p} failed validation: ${parsed.error.issues[0]?.message ?? "unknown"}`);
    }
    return new FileStore(parsed.data, p, now);
  }

  private iso(): string {
    return new Date(this.now()).toISOString();
  }

  private async persist(): Promise<void> {
    if (!this.filePath) return;
    const tmp = `${this.filePath}.tmp`;
    try {
      await mkdir(path.dirname(this.filePath), { recursive: true });
      await writeFile(tmp, JSON.stringify(this.data, null, 2), "utf8");
      await rename(tmp, this.filePath);
    } catch (err) {
      throw new StoreUnavailableError(`cannot write store: ${errMessage(err)}`, err);
    }
  }

  private mutate<T>(fn: (data: StoreData) => T): Promise<T> {
    return this.writer.run("store", async () => {
      const out = fn(this.data);
      await this.persist();
      return out;
    });
  }

  // Dedup

  async claim(key: string): Promise<boolean> {
    return this.writer.run("store", async () => {
      if (this.data.seen[key] !== undefined) return false;
      this.data.seen[key] = this.iso();
      try {
        await this.persist();
      } catch (err) {
        delete this.data.seen[key];
        throw err;
      }
      return true;
    });
  }

  async has(key: string): Promise<boolean> {
    return this.data.seen[key] !== undefined;
  }

  // Sources

  async listAccounts(filter: AccountFilter = {}): Promise<MonitoredAccount[]> {
    return this.data.accounts.filter(
      (a) =>
        (!filter.activeOnly || a.active) &&
        (!filter.category || a.category === filter.category) &&
        (!filter.voiceOnly || a.isVoiceReference)
    );
  }

  async findAccount(handle: string): Promise<MonitoredAccount | undefined> {
    return this.data.accounts.find((a) => sameHandle(a.handle, handle));
  }

  addAccount(input: NewAccount): Promise<MonitoredAccount> {
    return this.mutate((data) => {
      const handle = input.handle.replace(/^@/, "");
      if (data.accounts.some((a) => sameHandle(a.handle, handle))) throw new DuplicateError(`handle:${handle}`);
      const account: MonitoredAccount = {
        id: randomUUID(),
        handle,
        userId: input.userId ?? null,
        displayName: input.displayName ?? null,
        category: input.category,
        subcategory: input.subcategory ?? null,
        priority: input.priority ?? 2,
        active: true,
        isVoiceReference: input.isVoiceReference ?? false,
        voicePillars: input.voicePillars ?? [],
        followerCount: input.followerCount ?? null,
        lastTweetId: null,
        lastCheckedAt: null,
        createdAt: this.iso()
      };
      data.accounts.push(account);
      return account;
    });
  }

  updateAccount(id: string, patch: AccountPatch): Promise<MonitoredAccount> {
    return this.mutate((data) => {
      const idx = data.accounts.findIndex((a) => a.id === id);
      const current = data.accounts[idx];
      if (!current) throw new Error(`account not found: ${id}`);
      const next = { ...current, ...patch };
      data.accounts[idx] = next;
      return next;
    });
  }

  async listRssSources(activeOnly = false): Promise<RssSource[]> {
    return this.data.rssSources.filter((s) => !activeOnly || s.active);
  }

  addRssSource(input: NewRssSource): Promise<RssSource> {
    return this.mutate((data) => {
      if (data.rssSources.some((s) => s.url === input.url)) throw new DuplicateError(`url:${input.url}`);
      const source: RssSource = {
        id: randomUUID(),
        name: input.name,
        url: input.url,
        category: input.category,
        priority: input.priority ?? 2,
        keywords: input.keywords ?? [],
        active: true,
        lastFetchedAt: null,
        createdAt: this.iso()
      };
      data.rssSources.push(source);
      return source;
    });
  }

  updateRssSource(id: string, patch: RssSourcePatch): Promise<RssSource> {
    return this.mutate((data) => {
      const idx = data.rssSources.findIndex((s) => s.id === id);
      const current = data.rssSources[idx];
      if (!current) throw new Error(`rss source not found: ${id}`);
      const next = { ...current, ...patch };
      data.rssSources[idx] = next;
      return next;
    });
  }

  // Items

  saveItem(item: ScoredItem): Promise<void> {
    return this.mutate((data) => {
      if (data.items.some((i) => i.key === item.key)) throw new DuplicateError(item.key);
      data.items.push(item);
      if (data.items.length > MAX_ITEMS) data.items.splice(0, data.items.length - MAX_ITEMS);
    });
  }

  markNotified(key: string, messageId: string | null): Promise<void> {
    return this.mutate((data) => {
      const item = data.items.find((i) => i.key === key);
      if (!item) return;
      item.notified = true;
      item.notifiedMessageId = messageId;
    });
  }

  markActioned(key: string): Promise<void> {
    return this.mutate((data) => {
      const item = data.items.find((i) => i.key === key);
      if (item) item.actioned = true;
    });
  }

  async recentItems(limit: number): Promise<ScoredItem[]> {
    return this.data.items.slice(-limit).reverse();
  }

  // Feedback

  addFeedback(input: NewFeedback): Promise<VoiceFeedback> {
    return this.mutate((data) => {
      const record: VoiceFeedback = {
        id: randomUUID(),
        pillar: input.pillar,
        originalContent: input.originalContent,
        finalContent: input.finalContent ?? null,
        feedbackText: input.feedbackText ?? null,
        learnings: input.learnings ?? [],
        threadId: input.threadId ?? null,
        sessionCreatedAt: input.sessionCreatedAt ?? null,
        createdAt: this.iso()
      };
      data.feedback.push(record);
      return record;
    });
  }

  async recentFeedback(pillar: Pillar, limit: number): Promise<VoiceFeedback[]> {
    return this.data.feedback.filter((f) => f.pillar === pillar).slice(-limit).reverse();
  }

  // History

  addHistory(entry: NewHistory): Promise<ContentHistoryEntry> {
    return this.mutate((data) => {
      const record: ContentHistoryEntry = { ...entry, id: randomUUID(), createdAt: this.iso() };
      data.history.push(record);
      if (data.history.length > MAX_HISTORY) data.history.splice(0, data.history.length - MAX_HISTORY);
      return record;
    });
  }

  async recentHistory(sinceMs: number): Promise<ContentHistoryEntry[]> {
    return this.data.history.filter((h) => Date.parse(h.createdAt) >= sinceMs);
  }

  // Voice samples

  addSamples(samples: VoiceSample[]): Promise<number> {
    return this.mutate((data) => {
      const known = new Set(data.voiceSamples.map((s) => s.tweetId));
      let added = 0;
      for (const s of samples) {
        if (known.has(s.tweetId)) continue;
        known.add(s.tweetId);
        data.voiceSamples.push(s);
        added++;
      }
      return added;
    });
  }

  async samplesFor(accountId: string, limit: number): Promise<VoiceSample[]> {
    return this.data.voiceSamples
      .filter((s) => s.accountId === accountId)
      .sort((a, b) => b.likes - a.likes)
      .slice(0, limit);
  }
}
