import { buildApp, ConsoleAlertSink, type App } from "../app.js";
import { loadConfig } from "../config.js";
import { isCategory, pillarLabel, PILLARS, CATEGORIES, type Category, type Priority } from "../domain.js";
import { cleanHandle, isValidHandle, normalizeCategory, normalizePillar, normalizePriority } from "../agent/normalize.js";
import { errMessage, logger, setLogLevel } from "../logger.js";
import { loadSourcesFile, seedSources } from "../news/seed.js";

const DAY_MS = 24 * 60 * 60 * 1000;

function print(text: string): void {
  // eslint-disable-next-line no-console
  console.log(text);
}

async function cmdGenerate(app: App, pillarArg: string | undefined, topic: string): Promise<void> {
  const pillar = pillarArg ? normalizePillar(pillarArg) : null;
  if (!pillar) throw new Error(`usage: generate <pillar> [topic]  (pillars: ${PILLARS.join(", ")})`);
  const post = await app.brain.generatePost({ pillar, topic: topic || undefined });
  print([`[${pillarLabel(pillar)}] ${post.topic} · ${post.angle}`, "", post.content].join("\n"));
}

async function cmdWeekly(app: App): Promise<void> {
  const batch = await app.brain.generateWeeklyBatch();
  for (const item of batch.items) {
    print([`=== ${item.day} · ${pillarLabel(item.pillar)} ===`, `${item.topic} · ${item.angle}`, "", item.content, ""].join("\n"));
  }
  for (const f of batch.failed) print(`!! ${f.day} (${f.pillar}) failed: ${f.error}`);
}

async function cmdSeed(app: App): Promise<void> {
  const res = await seedSources(app.store, await loadSourcesFile(app.cfg.SOURCES_PATH));
  print(`seeded ${res.accountsAdded} accounts, ${res.feedsAdded} feeds`);
}

async function cmdAccounts(app: App, categoryArg: string | undefined): Promise<void> {
  if (categoryArg && !isCategory(categoryArg)) throw new Error(`unknown category: ${categoryArg} (${CATEGORIES.join(", ")})`);
  const accounts = await app.store.listAccounts({ category: categoryArg && isCategory(categoryArg) ? categoryArg : undefined });
  if (accounts.length === 0) return print("no accounts");
  for (const a of accounts) {
    const flags = [a.active ? "" : "inactive", a.isVoiceReference ? `voice:${a.voicePillars.join("+") || "-"}` : ""].filter(Boolean);
    print(`@${a.handle.padEnd(16)} ${a.category.padEnd(13)} p${a.priority} ${flags.join(" ")}`.trimEnd());
  }
}

async function cmdFeeds(app: App): Promise<void> {
  const feeds = await app.store.listRssSources();
  if (feeds.length === 0) return print("no feeds");
  for (const f of feeds) {
    print(`${f.name.padEnd(22)} ${f.category.padEnd(13)} p${f.priority} ${f.active ? "" : "(inactive) "}${f.url}`);
  }
}

async function cmdRefreshVoices(app: App): Promise<void> {
  const results = await app.voice.refreshAll();
  const entries = Object.entries(results);
  if (entries.length === 0) return print("no voice references");
  for (const [handle, r] of entries) print(`@${handle}: ${typeof r === "number" ? `${r} new samples` : r}`);
}

async function cmdHistory(app: App, daysArg: string | undefined): Promise<void> {
  const days = daysArg ? Number(daysArg) : 7;
  if (!Number.isFinite(days) || days <= 0) throw new Error("usage: history [days]");
  const rows = await app.store.recentHistory(Date.now() - days * DAY_MS);
  if (rows.length === 0) return print(`no content in the last ${days} days`);
  for (const h of rows) {
    print(`${h.createdAt.slice(0, 16)}  ${h.kind.padEnd(13)} ${pillarLabel(h.pillar).padEnd(17)} ${h.topic}${h.angle ? ` · ${h.angle}` : ""}`);
  }
}

function parseCategory(raw: string | undefined): Category {
  const c = normalizeCategory(raw ?? "");
  if (c.kind !== "ok") throw new Error(`category must be one of ${CATEGORIES.join(", ")}`);
  return c.value;
}

function parsePriority(raw: string | undefined): Priority | undefined {
  if (raw === undefined) return undefined;
  const p = normalizePriority(raw);
  if (p.kind !== "ok") throw new Error("priority must be 1, 2 or 3");
  return p.value;
}

/** Splits `--flag value` pairs out of the positional arguments. */
function splitFlags(args: readonly string[]): { positional: string[]; flags: Map<string, string> } {
  const positional: string[] = [];
  const flags = new Map<string, string>();
  for (let i = 0; i < args.length; i++) {
    const arg = args[i] ?? "";
    if (!arg.startsWith("--")) {
      positional.push(arg);
      continue;
    }
    const value = args[i + 1];
    if (value === undefined || value.startsWith("--")) throw new Error(`${arg} needs a value`);
    flags.set(arg.slice(2), value);
    i++;
  }
  return { positional, flags };
}

async function cmdAddAccount(app: App, args: readonly string[]): Promise<void> {
  const handle = cleanHandle(args[0] ?? "");
  if (!isValidHandle(handle)) throw new Error("usage: add-account <handle> <category> [priority]");
  print(await app.actions.addMonitor(handle, parseCategory(args[1]), parsePriority(args[2]) ?? 2));
}

async function cmdAddRss(app: App, args: readonly string[]): Promise<void> {
  const { positional, flags } = splitFlags(args);
  const [url, category] = positional;
  if (!url) throw new Error("usage: add-rss <url> <category> [--name N] [--priority 1-3] [--keywords a,b]");
  print(
    await app.actions.addFeed({
      url,
      category: parseCategory(category),
      name: flags.get("name"),
      priority: parsePriority(flags.get("priority")),
      keywords: flags.get("keywords")?.split(",") ?? []
    })
  );
}

async function cmdVarietyCheck(app: App): Promise<void> {
  for (const pillar of PILLARS) {
    const [next, avoid] = await Promise.all([app.planner.suggest(pillar), app.planner.topicsToAvoid(pillar)]);
    print(`${pillarLabel(pillar)}: next "${next.topic}" · ${next.angle}`);
    print(`  recent topics: ${avoid.topics.join("; ") || "none"}`);
    print(`  recent angles: ${avoid.angles.join("; ") || "none"}`);
  }
}

async function cmdVoiceStats(app: App): Promise<void> {
  const stats = await app.voice.stats();
  if (stats.length === 0) return print("no voice references");
  for (const v of stats) {
    const pillars = v.pillars.map(pillarLabel).join(", ") || "no pillars";
    const top = v.topLikes === null ? "" : `, top ${v.topLikes} likes`;
    const fetched = v.lastFetchedAt ? `, fetched ${v.lastFetchedAt.slice(0, 16)}` : "";
    print(`@${v.handle.padEnd(16)} ${String(v.samples).padStart(3)} samples${top}${fetched} (${pillars})`);
  }
}

async function main(): Promise<void> {
  const [, , command, ...rest] = process.argv;

  if (!command || command === "help" || command === "--help" || command === "-h") {
    print(
      [
        "Usage:",
        "  content generate <pillar> [topic]",
        "  content weekly-batch",
        "  content check-twitter   # one tweet cycle, alerts printed",
        "  content check-rss       # one RSS cycle, alerts printed",
        "  content seed            # add accounts and feeds from SOURCES_PATH",
        "  content accounts [category]",
        "  content add-account <handle> <category> [priority]",
        "  content feeds",
        "  content add-rss <url> <category> [--name N] [--priority 1-3] [--keywords a,b]",
        "  content variety-check   # next topic and recent history per pillar",
        "  content voice-sample-stats",
        "  content refresh-voices",
        "  content history [days]"
      ].join("\n")
    );
    return;
  }

  const cfg = loadConfig();
  setLogLevel(cfg.LOG_LEVEL);
  const app = await buildApp(cfg);

  if (command === "generate") return await cmdGenerate(app, rest[0], rest.slice(1).join(" "));
  if (command === "weekly-batch") return await cmdWeekly(app);
  if (command === "check-twitter") {
    const s = await app.runTweetCycle(new ConsoleAlertSink());
    return print(`tweets: ${s.sources} accounts, ${s.fetched} fetched, ${s.scored} scored, ${s.alerts} alerts`);
  }
  if (command === "check-rss") {
    const s = await app.runRssCycle(new ConsoleAlertSink());
    return print(`rss: ${s.sources} feeds, ${s.fetched} fetched, ${s.scored} scored, ${s.alerts} alerts`);
  }
  if (command === "seed") return await cmdSeed(app);
  if (command === "accounts") return await cmdAccounts(app, rest[0]);
  if (command === "add-account") return await cmdAddAccount(app, rest);
  if (command === "feeds") return await cmdFeeds(app);
  if (command === "add-rss") return await cmdAddRss(app, rest);
  if (command === "variety-check") return await cmdVarietyCheck(app);
  if (command === "voice-sample-stats") return await cmdVoiceStats(app);
  if (command === "refresh-voices") return await cmdRefreshVoices(app);
  if (command === "history") return await cmdHistory(app, rest[0]);

  throw new Error(`unknown command: ${command}`);
}

main().catch((err) => {
  logger.error("content.cli failed", { error: errMessage(err) });
  process.exit(1);
});
