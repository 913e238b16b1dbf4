import { ContentBrain } from "./agent/brain.js";
import { IntentRouter } from "./agent/intent.js";
import { LearningExtractor } from "./agent/learnings.js";
import { callOptionsFromConfig, createLlmClient, type LlmClient } from "./agent/llm.js";
import { loadKeywordSets, RelevanceScorer } from "./agent/relevance.js";
import { SessionManager } from "./agent/session.js";
import { loadTopicPools, VarietyPlanner } from "./agent/variety.js";
import { VoiceSampler } from "./agent/voice.js";
import { minutesToMs, type AppConfig } from "./config.js";
import { logger } from "./logger.js";
import { loadBrandContext, MarketApiClient } from "./news/market.js";
import { IngestionPipeline, cursorWriter, rssTargets, tweetTargets, type Alert, type AlertSink, type CycleSummary } from "./news/pipeline.js";
import type { SourceRunner } from "./news/poller.js";
import { RssFetcher } from "./news/providers/rssAtom.js";
import { XTimelineFetcher } from "./news/providers/xTimeline.js";
import { renderAlert } from "./news/render.js";
import { FileStore } from "./store/fileStore.js";
import type { Store } from "./store/types.js";
import { AccountActions } from "./social/actions.js";
import { ContentBot } from "./social/bot.js";
import type { ChatSurface } from "./social/chat.js";
import { XApiClient, type XReader } from "./social/x_api.js";
import { systemClock, type Clock } from "./utils.js";

/** Alert sink for runs without a chat surface: prints the rendered alert. */
export class ConsoleAlertSink implements AlertSink {
  constructor(private readonly now: Clock = systemClock) {}

  async emit(alert: Alert): Promise<string | null> {
    // eslint-disable-next-line no-console
    console.log(`${renderAlert(alert, this.now())}\n`);
    return null;
  }
}

export type AppOverrides = {
  store?: Store;
  llm?: LlmClient;
  x?: XReader | null;
  now?: Clock;
};

/** Everything wired once from config. The chat bot is attached later, when a surface exists. */
export type App = {
  cfg: AppConfig;
  store: Store;
  llm: LlmClient;
  x: XReader | null;
  scorer: RelevanceScorer;
  brain: ContentBrain;
  planner: VarietyPlanner;
  voice: VoiceSampler;
  sessions: SessionManager;
  actions: AccountActions;
  runTweetCycle: (alerts: AlertSink) => Promise<CycleSummary>;
  runRssCycle: (alerts: AlertSink) => Promise<CycleSummary>;
  /** Per-source runners for the polling loops; null when X is not configured. */
  tweetRunner: (alerts: AlertSink) => SourceRunner | null;
  rssRunner: (alerts: AlertSink) => SourceRunner;
  createBot: (chat: ChatSurface, channelId: string) => ContentBot;
};

export async function buildApp(cfg: AppConfig, overrides: AppOverrides = {}): Promise<App> {
  const now = overrides.now ?? systemClock;
  const store = overrides.store ?? (await FileStore.open(cfg.STORE_PATH, now));
  const llm = overrides.llm ?? createLlmClient(cfg);
  const callOpts = callOptionsFromConfig(cfg);
  const fetchOpts = { timeoutMs: cfg.HTTP_TIMEOUT_MS, retries: cfg.HTTP_RETRIES };
  const x =
    overrides.x !== undefined
      ? overrides.x
      : cfg.TWITTER_BEARER_TOKEN
        ? new XApiClient(cfg.TWITTER_BEARER_TOKEN, fetchOpts)
        : null;

  const [keywords, pools, brandContext] = await Promise.all([
    loadKeywordSets(cfg.KEYWORDS_PATH),
    loadTopicPools(cfg.TOPICS_PATH),
    loadBrandContext(cfg.BRAND_CONTEXT_PATH)
  ]);
  const market = cfg.MARKET_API_URL ? new MarketApiClient(cfg.MARKET_API_URL, cfg.MARKET_PAIRS, fetchOpts, now) : null;
  const scorer = new RelevanceScorer(llm, keywords, callOpts);
  const voice = new VoiceSampler(store, x, now);
  const planner = new VarietyPlanner(pools, store, now);
  const brain = new ContentBrain({
    llm,
    callOpts,
    brand: cfg.BRAND_NAME,
    planner,
    voice,
    feedback: store,
    history: store,
    brandContext,
    market
  });
  const sessions = new SessionManager(brain, new LearningExtractor(llm, callOpts), store, {
    maxVersions: cfg.MAX_DRAFT_VERSIONS,
    retentionMs: cfg.SESSION_RETENTION_HOURS * 60 * 60 * 1000,
    now
  });
  const actions = new AccountActions({ store, x, voice });
  const thresholds = {
    alert: cfg.RELEVANCE_THRESHOLD,
    priority1: cfg.PRIORITY1_THRESHOLD,
    highUrgency: cfg.HIGH_URGENCY_SCORE
  };

  const pipelineFor = (alerts: AlertSink) =>
    new IngestionPipeline({ dedup: store, items: store, scorer, alerts, thresholds, advanceCursor: cursorWriter(store, now) });

  const rssFetcher = new RssFetcher(fetchOpts, now);
  const tweetFetcher = x
    ? new XTimelineFetcher(
        x,
        async (accountId, user) => {
          await store.updateAccount(accountId, { userId: user.id, displayName: user.name, followerCount: user.followersCount });
        },
        now
      )
    : null;

  return {
    cfg,
    store,
    llm,
    x,
    scorer,
    brain,
    planner,
    voice,
    sessions,
    actions,
    async runTweetCycle(alerts) {
      if (!tweetFetcher) {
        logger.warn("ingest.twitter.disabled", { reason: "TWITTER_BEARER_TOKEN not set" });
        return { loop: "tweet", sources: 0, failedSources: 0, fetched: 0, duplicates: 0, scored: 0, alerts: 0, storeFailure: false };
      }
      return await pipelineFor(alerts).runCycle("tweet", await tweetTargets(store), tweetFetcher);
    },
    async runRssCycle(alerts) {
      return await pipelineFor(alerts).runCycle("rss", await rssTargets(store), rssFetcher);
    },
    tweetRunner(alerts) {
      if (!tweetFetcher) return null;
      const pipeline = pipelineFor(alerts);
      return {
        listTargets: () => tweetTargets(store),
        runSource: (target) => pipeline.runSource(target, tweetFetcher)
      };
    },
    rssRunner(alerts) {
      const pipeline = pipelineFor(alerts);
      return {
        listTargets: () => rssTargets(store),
        runSource: (target) => pipeline.runSource(target, rssFetcher)
      };
    },
    createBot(chat, channelId) {
      return new ContentBot({
        chat,
        router: new IntentRouter(llm, callOpts, async () => (await store.listAccounts()).map((a) => a.handle)),
        sessions,
        brain,
        actions,
        items: store,
        history: store,
        thresholds: {
          execute: cfg.INTENT_EXECUTE_THRESHOLD,
          confirm: cfg.INTENT_CONFIRM_THRESHOLD,
          destructiveExecute: cfg.DESTRUCTIVE_EXECUTE_THRESHOLD
        },
        alertChannelId: channelId,
        pendingTtlMs: minutesToMs(cfg.CONFIRMATION_TTL_MINUTES),
        retentionMs: cfg.SESSION_RETENTION_HOURS * 60 * 60 * 1000,
        now
      });
    }
  };
}
