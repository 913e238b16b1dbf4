import { z } from "zod";
import {
  CategorySchema,
  PillarSchema,
  PrioritySchema,
  RelevanceTypeSchema,
  type Category,
  type Pillar,
  type Priority
} from "../domain.js";

export const MonitoredAccountSchema = z.object({
  id: z.string(),
  handle: z.string(),
  userId: z.string().nullable(),
  displayName: z.string().nullable(),
  category: CategorySchema,
  subcategory: z.string().nullable(),
  priority: PrioritySchema,
  active: z.boolean(),
  isVoiceReference: z.boolean(),
  voicePillars: z.array(PillarSchema),
  followerCount: z.number().nullable(),
  lastTweetId: z.string().nullable(),
  lastCheckedAt: z.string().nullable(),
  createdAt: z.string()
});
export type MonitoredAccount = z.infer<typeof MonitoredAccountSchema>;

export const RssSourceSchema = z.object({
  id: z.string(),
  name: z.string(),
  url: z.string(),
  category: CategorySchema,
  priority: PrioritySchema,
  keywords: z.array(z.string()),
  active: z.boolean(),
  lastFetchedAt: z.string().nullable(),
  createdAt: z.string()
});
export type RssSource = z.infer<typeof RssSourceSchema>;

export const ScoredItemSchema = z.object({
  key: z.string(),
  kind: z.enum(["tweet", "rss"]),
  externalId: z.string(),
  sourceId: z.string(),
  sourceLabel: z.string(),
  text: z.string(),
  url: z.string().nullable(),
  publishedAt: z.string().nullable(),
  fetchedAt: z.string(),
  relevanceScore: z.number().min(0).max(1),
  relevanceType: RelevanceTypeSchema,
  reasoning: z.string(),
  suggestedContent: z.string().nullable(),
  notified: z.boolean(),
  notifiedMessageId: z.string().nullable(),
  actioned: z.boolean()
});
export type ScoredItem = z.infer<typeof ScoredItemSchema>;

export const ContentHistorySchema = z.object({
  id: z.string(),
  pillar: PillarSchema,
  kind: z.enum(["post", "weekly", "news_reaction"]),
  topic: z.string(),
  angle: z.string().nullable(),
  content: z.string(),
  createdAt: z.string()
});
export type ContentHistoryEntry = z.infer<typeof ContentHistorySchema>;

export const VoiceFeedbackSchema = z.object({
  id: z.string(),
  pillar: PillarSchema,
  originalContent: z.string(),
  finalContent: z.string().nullable(),
  feedbackText: z.string().nullable(),
  learnings: z.array(z.string()),
  threadId: z.string().nullable(),
  sessionCreatedAt: z.string().nullable(),
  createdAt: z.string()
});
export type VoiceFeedback = z.infer<typeof VoiceFeedbackSchema>;

export const VoiceSampleSchema = z.object({
  tweetId: z.string(),
  accountId: z.string(),
  handle: z.string(),
  text: z.string(),
  likes: z.number(),
  retweets: z.number(),
  postedAt: z.string().nullable(),
  fetchedAt: z.string()
});
export type VoiceSample = z.infer<typeof VoiceSampleSchema>;

export type NewAccount = {
  handle: string;
  category: Category;
  priority?: Priority;
  subcategory?: string | null;
  userId?: string | null;
  displayName?: string | null;
  followerCount?: number | null;
  isVoiceReference?: boolean;
  voicePillars?: Pillar[];
};

export type AccountPatch = Partial<Omit<MonitoredAccount, "id" | "handle" | "createdAt">>;

export type NewRssSource = {
  name: string;
  url: string;
  category: Category;
  priority?: Priority;
  keywords?: string[];
};

export type RssSourcePatch = Partial<Pick<RssSource, "active" | "lastFetchedAt" | "keywords" | "priority">>;

export type NewFeedback = {
  pillar: Pillar;
  originalContent: string;
  finalContent?: string | null;
  feedbackText?: string | null;
  learnings?: string[];
  threadId?: string | null;
  sessionCreatedAt?: string | null;
};

export type NewHistory = Omit<ContentHistoryEntry, "id" | "createdAt">;

export type AccountFilter = {
  activeOnly?: boolean;
  category?: Category;
  voiceOnly?: boolean;
};

/**
 * Insert-if-new over namespaced external ids (`tweet:<id>`, `rss:<guid>`).
 * `claim` returns true exactly once per key, even under concurrent callers.
 */
export interface DedupStore {
  claim(key: string): Promise<boolean>;
  has(key: string): Promise<boolean>;
}

export interface SourceStore {
  listAccounts(filter?: AccountFilter): Promise<MonitoredAccount[]>;
  findAccount(handle: string): Promise<MonitoredAccount | undefined>;
  addAccount(input: NewAccount): Promise<MonitoredAccount>;
  updateAccount(id: string, patch: AccountPatch): Promise<MonitoredAccount>;
  listRssSources(activeOnly?: boolean): Promise<RssSource[]>;
  addRssSource(input: NewRssSource): Promise<RssSource>;
  updateRssSource(id: string, patch: RssSourcePatch): Promise<RssSource>;
}

export interface ItemStore {
  saveItem(item: ScoredItem): Promise<void>;
  markNotified(key: string, messageId: string | null): Promise<void>;
  markActioned(key: string): Promise<void>;
  recentItems(limit: number): Promise<ScoredItem[]>;
}

export interface FeedbackStore {
  addFeedback(input: NewFeedback): Promise<VoiceFeedback>;
  recentFeedback(pillar: Pillar, limit: number): Promise<VoiceFeedback[]>;
}

export interface HistoryStore {
  addHistory(entry: NewHistory): Promise<ContentHistoryEntry>;
  recentHistory(sinceMs: number): Promise<ContentHistoryEntry[]>;
}

export interface VoiceSampleStore {
  /** Returns how many samples were new. */
  addSamples(samples: VoiceSample[]): Promise<number>;
  samplesFor(accountId: string, limit: number): Promise<VoiceSample[]>;
}

export type Store = DedupStore & SourceStore & ItemStore & FeedbackStore & HistoryStore & VoiceSampleStore;
