import { containsKeyword, skipResult, type RelevanceResult, type RelevanceScorer } from "../agent/relevance.js";
import type { Category, Priority, SourceKind } from "../domain.js";
import { DuplicateError, StoreUnavailableError } from "../errors.js";
import { errMessage, logger } from "../logger.js";
import type { DedupStore, ItemStore, ScoredItem, SourceStore } from "../store/types.js";
import { systemClock, type Clock } from "../utils.js";
import { dedupKey, type FetchResult, type PollTarget, type RawItem, type SourceFetcher } from "./types.js";

export type AlertKind = "news" | "reply_opportunity";

export type Alert = {
  key: string;
  kind: AlertKind;
  urgency: "high" | "normal";
  sourceKind: SourceKind;
  sourceLabel: string;
  category: Category;
  text: string;
  url: string | null;
  score: number;
  reasoning: string;
  suggestedContent: string | null;
  publishedAtMs: number | null;
};

/** Where alerts go. Returns the id of the message that carried the alert, if any. */
export interface AlertSink {
  emit(alert: Alert): Promise<string | null>;
}

export type PipelineThresholds = {
  alert: number;
  priority1: number;
  highUrgency: number;
};

export type SourceSummary = {
  source: string;
  failed: boolean;
  fetched: number;
  duplicates: number;
  scored: number;
  alerts: number;
  storeFailure: boolean;
};

export type CycleSummary = {
  loop: SourceKind;
  sources: number;
  failedSources: number;
  fetched: number;
  duplicates: number;
  scored: number;
  alerts: number;
  storeFailure: boolean;
};

export type IngestionDeps = {
  dedup: DedupStore;
  items: ItemStore;
  scorer: Pick<RelevanceScorer, "score">;
  alerts: AlertSink;
  thresholds: PipelineThresholds;
  advanceCursor: (target: PollTarget, cursor: string) => Promise<void>;
};

type ItemOutcome = "duplicate" | "stored" | "alerted";

export function alertThresholdFor(priority: Priority, t: PipelineThresholds): number {
  return priority === 1 ? t.priority1 : t.alert;
}

export function shouldAlert(result: RelevanceResult, priority: Priority, t: PipelineThresholds): boolean {
  return result.relevanceType !== "skip" && result.relevanceScore >= alertThresholdFor(priority, t);
}

export function buildAlert(target: PollTarget, item: RawItem, result: RelevanceResult, t: PipelineThresholds): Alert {
  const kind: AlertKind = item.kind === "rss" || result.relevanceType === "news" ? "news" : "reply_opportunity";
  return {
    key: dedupKey(item.kind, item.externalId),
    kind,
    urgency: target.priority === 1 || result.relevanceScore >= t.highUrgency ? "high" : "normal",
    sourceKind: item.kind,
    sourceLabel: target.label,
    category: target.category,
    text: item.text,
    url: item.url,
    score: result.relevanceScore,
    reasoning: result.reasoning,
    suggestedContent: result.suggestedContent,
    publishedAtMs: item.publishedAtMs
  };
}

/** Oldest first, so alerts go out in publication order. */
function chronological(a: RawItem, b: RawItem): number {
  if (a.kind === "tweet" && b.kind === "tweet" && /^\d+$/.test(a.externalId) && /^\d+$/.test(b.externalId)) {
    const x = BigInt(a.externalId);
    const y = BigInt(b.externalId);
    return x === y ? 0 : x < y ? -1 : 1;
  }
  return (a.publishedAtMs ?? 0) - (b.publishedAtMs ?? 0);
}

/**
 * fetch → dedup → score → persist → alert, per source. Sources run
 * concurrently and fail independently; a store failure stops the source
 * without emitting (fail closed).
 */
export class IngestionPipeline {
  constructor(private readonly deps: IngestionDeps) {}

  async runCycle(loop: SourceKind, targets: PollTarget[], fetcher: SourceFetcher): Promise<CycleSummary> {
    const results = await Promise.allSettled(targets.map((t) => this.processSource(t, fetcher)));

    const summary: CycleSummary = {
      loop,
      sources: targets.length,
      failedSources: 0,
      fetched: 0,
      duplicates: 0,
      scored: 0,
      alerts: 0,
      storeFailure: false
    };
    for (const r of results) {
      if (r.status === "rejected") {
        summary.failedSources++;
        logger.warn("ingest.source.crashed", { loop, error: errMessage(r.reason) });
        continue;
      }
      const s = r.value;
      if (s.failed) summary.failedSources++;
      summary.fetched += s.fetched;
      summary.duplicates += s.duplicates;
      summary.scored += s.scored;
      summary.alerts += s.alerts;
      summary.storeFailure ||= s.storeFailure;
    }

    logger.info("ingest.cycle", summary);
    return summary;
  }

  /** One source on its own, as a polling loop schedules it. */
  async runSource(target: PollTarget, fetcher: SourceFetcher): Promise<SourceSummary> {
    const summary = await this.processSource(target, fetcher);
    logger.info("ingest.source", { kind: target.kind, ...summary });
    return summary;
  }

  async processSource(target: PollTarget, fetcher: SourceFetcher): Promise<SourceSummary> {
    const out: SourceSummary = {
      source: target.label,
      failed: false,
      fetched: 0,
      duplicates: 0,
      scored: 0,
      alerts: 0,
      storeFailure: false
    };

    let batch: FetchResult;
    try {
      batch = await fetcher.fetch(target);
    } catch (err) {
      logger.warn("ingest.fetch.failed", { kind: target.kind, source: target.label, error: errMessage(err) });
      return { ...out, failed: true };
    }
    out.fetched = batch.items.length;

    for (const item of [...batch.items].sort(chronological)) {
      try {
        const outcome = await this.processItem(target, item);
        if (outcome === "duplicate") out.duplicates++;
        else out.scored++;
        if (outcome === "alerted") out.alerts++;
      } catch (err) {
        if (err instanceof StoreUnavailableError) {
          logger.error("ingest.store.unavailable", { source: target.label, error: err.message });
          return { ...out, storeFailure: true };
        }
        logger.warn("ingest.item.failed", { source: target.label, id: item.externalId, error: errMessage(err) });
      }
    }

    // Advance even when scoring degraded, so the same items are not refetched.
    if (batch.nextCursor && batch.nextCursor !== target.cursor) {
      try {
        await this.deps.advanceCursor(target, batch.nextCursor);
      } catch (err) {
        logger.error("ingest.cursor.failed", { source: target.label, error: errMessage(err) });
        return { ...out, storeFailure: true };
      }
    }
    return out;
  }

  private async claim(key: string): Promise<boolean> {
    try {
      return await this.deps.dedup.claim(key);
    } catch (err) {
      if (err instanceof StoreUnavailableError) throw err;
      throw new StoreUnavailableError(`dedup claim failed: ${errMessage(err)}`, err);
    }
  }

  async processItem(target: PollTarget, item: RawItem): Promise<ItemOutcome> {
    const key = dedupKey(item.kind, item.externalId);
    if (!(await this.claim(key))) return "duplicate";

    const result =
      target.keywords.length > 0 && !containsKeyword(item.text, target.keywords)
        ? skipResult("feed keyword filter", true)
        : await this.deps.scorer.score(item.text, {
            kind: item.kind,
            sourceLabel: target.label,
            category: target.category,
            priority: target.priority,
            followerCount: target.followerCount
          });

    const scored: ScoredItem = {
      key,
      kind: item.kind,
      externalId: item.externalId,
      sourceId: target.id,
      sourceLabel: target.label,
      text: item.text,
      url: item.url,
      publishedAt: item.publishedAtMs !== null ? new Date(item.publishedAtMs).toISOString() : null,
      fetchedAt: new Date(item.fetchedAtMs).toISOString(),
      relevanceScore: result.relevanceScore,
      relevanceType: result.relevanceType,
      reasoning: result.reasoning,
      suggestedContent: result.suggestedContent,
      notified: false,
      notifiedMessageId: null,
      actioned: false
    };
    try {
      await this.deps.items.saveItem(scored);
    } catch (err) {
      if (err instanceof DuplicateError) return "duplicate";
      throw err;
    }

    if (!shouldAlert(result, target.priority, this.deps.thresholds)) return "stored";

    const alert = buildAlert(target, item, result, this.deps.thresholds);
    let messageId: string | null;
    try {
      messageId = await this.deps.alerts.emit(alert);
    } catch (err) {
      logger.warn("ingest.alert.failed", { key, error: errMessage(err) });
      return "stored";
    }
    await this.deps.items.markNotified(key, messageId);
    logger.info("ingest.alerted", { key, score: result.relevanceScore, type: result.relevanceType, urgency: alert.urgency });
    return "alerted";
  }
}

// Poll targets and cursors over the source store.

export async function tweetTargets(store: SourceStore): Promise<PollTarget[]> {
  const accounts = await store.listAccounts({ activeOnly: true });
  return accounts.map((a): PollTarget => ({
    kind: "tweet",
    id: a.id,
    label: `@${a.handle}`,
    locator: a.handle,
    userId: a.userId,
    category: a.category,
    priority: a.priority,
    cursor: a.lastTweetId,
    keywords: [],
    followerCount: a.followerCount
  }));
}

export async function rssTargets(store: SourceStore): Promise<PollTarget[]> {
  const feeds = await store.listRssSources(true);
  return feeds.map((f): PollTarget => ({
    kind: "rss",
    id: f.id,
    label: f.name,
    locator: f.url,
    userId: null,
    category: f.category,
    priority: f.priority,
    cursor: f.lastFetchedAt,
    keywords: f.keywords,
    followerCount: null
  }));
}

export function cursorWriter(store: SourceStore, now: Clock = systemClock): IngestionDeps["advanceCursor"] {
  return async (target, cursor) => {
    if (target.kind === "tweet") {
      await store.updateAccount(target.id, { lastTweetId: cursor, lastCheckedAt: new Date(now()).toISOString() });
    } else {
      await store.updateRssSource(target.id, { lastFetchedAt: cursor });
    }
  };
}
