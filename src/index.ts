import { z } from "zod";
import { buildApp, ConsoleAlertSink } from "./app.js";
import { loadConfig, minutesToMs } from "./config.js";
import { errMessage, logger, setLogLevel } from "./logger.js";
import type { AlertSink } from "./news/pipeline.js";
import { PollingLoop } from "./news/poller.js";
import { loadSourcesFile, seedSources } from "./news/seed.js";
import type { ContentBot } from "./social/bot.js";
import { SlackAdapter } from "./social/slack.js";

const ModeSchema = z.enum(["full", "twitter", "rss", "bot"]);
type Mode = z.infer<typeof ModeSchema>;

type WorkerArgs = { mode: Mode; once: boolean };

function parseWorkerArgs(argv: readonly string[]): WorkerArgs {
  let mode: Mode = "full";
  let once = false;
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i] ?? "";
    if (arg === "--once") once = true;
    else if (arg === "--mode" || arg.startsWith("--mode=")) {
      const value = arg === "--mode" ? argv[++i] : arg.slice("--mode=".length);
      const parsed = ModeSchema.safeParse(value);
      if (!parsed.success) throw new Error(`--mode must be one of ${ModeSchema.options.join(", ")}`);
      mode = parsed.data;
    } else {
      throw new Error(`unknown argument: ${arg}`);
    }
  }
  return { mode, once };
}

async function main(): Promise<void> {
  const args = parseWorkerArgs(process.argv.slice(2));
  const cfg = loadConfig();
  setLogLevel(cfg.LOG_LEVEL);

  if (!cfg.CONTENT_AGENT_ENABLED) {
    logger.info("content agent disabled (CONTENT_AGENT_ENABLED=false)");
    return;
  }

  logger.info("content agent starting", {
    mode: args.mode,
    once: args.once,
    chat: cfg.CHAT_MODE,
    llm: cfg.LLM_PROVIDER,
    tweetPollMinutes: cfg.TWEET_POLL_MINUTES,
    rssPollMinutes: cfg.RSS_POLL_MINUTES
  });

  const app = await buildApp(cfg);
  await seedSources(app.store, await loadSourcesFile(cfg.SOURCES_PATH));

  const slack =
    cfg.CHAT_MODE === "slack" && cfg.SLACK_BOT_TOKEN && cfg.SLACK_APP_TOKEN
      ? new SlackAdapter({ botToken: cfg.SLACK_BOT_TOKEN, appToken: cfg.SLACK_APP_TOKEN })
      : null;
  const bot: ContentBot | null = slack && cfg.SLACK_CHANNEL_ID ? app.createBot(slack, cfg.SLACK_CHANNEL_ID) : null;
  const alerts: AlertSink = bot ?? new ConsoleAlertSink();

  const runTweets = args.mode === "full" || args.mode === "twitter";
  const runRss = args.mode === "full" || args.mode === "rss";

  if (args.once) {
    if (runTweets) await app.runTweetCycle(alerts);
    if (runRss) await app.runRssCycle(alerts);
    logger.info("content agent single run complete");
    return;
  }

  const loops: PollingLoop[] = [];
  if (runTweets) {
    const tweets = app.tweetRunner(alerts);
    if (tweets) loops.push(new PollingLoop({ name: "tweet", intervalMs: minutesToMs(cfg.TWEET_POLL_MINUTES) }, tweets));
    else logger.warn("ingest.twitter.disabled", { reason: "TWITTER_BEARER_TOKEN not set" });
  }
  if (runRss) {
    loops.push(new PollingLoop({ name: "rss", intervalMs: minutesToMs(cfg.RSS_POLL_MINUTES) }, app.rssRunner(alerts)));
  }

  const sweep = setInterval(() => {
    app.sessions.evictExpired();
    bot?.sweep();
  }, minutesToMs(cfg.SESSION_SWEEP_MINUTES));
  sweep.unref();

  if (bot && slack && (args.mode === "full" || args.mode === "bot")) {
    await slack.start((msg) => bot.handle(msg));
  }

  const shutdown = (signal: string) => {
    logger.info("content agent stopping", { signal });
    clearInterval(sweep);
    for (const loop of loops) loop.stop();
    if (slack) {
      slack.stop().catch((err: unknown) => logger.warn("slack stop failed", { error: errMessage(err) }));
    }
  };
  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));

  // Loops run independently; a halted loop does not stop the others.
  await Promise.all(loops.map((l) => l.start()));
}

main().catch((err) => {
  logger.error("fatal", { error: errMessage(err) });
  process.exitCode = 1;
});
