import { z } from "zod";
import { CATEGORIES, PILLARS, pillarLabel, type Category, type Pillar, type Priority } from "../domain.js";
import { ValidationError } from "../errors.js";
import { errMessage, logger } from "../logger.js";
import type { MonitoredAccount, SourceStore } from "../store/types.js";
import type { VoiceSampler } from "../agent/voice.js";
import type { XReader } from "./x_api.js";

export const HELP_TEXT = [
  "*Content agent commands*",
  "",
  "*Voice references* (accounts whose style we learn from):",
  "• `!add-voice @handle pillars` add a voice reference",
  "• `!tag-voice @handle pillars` change its pillars",
  "• `!list-voices` list voice references",
  "• `!refresh-voices` refresh voice samples",
  "",
  "*Monitored accounts* (accounts we watch for signals):",
  "• `!add-monitor @handle category [priority]` start monitoring",
  "• `!list-monitors [category]` list monitored accounts",
  "• `!remove @handle` stop monitoring",
  "",
  "*Drafts:*",
  "• `!generate pillar [topic]` draft a post",
  "• `!weekly` draft a week of posts",
  "Reply in a draft's thread to revise it; say \"perfect\" or react ✅ to approve.",
  "",
  `*Pillars:* ${PILLARS.join(", ")}`,
  `*Categories:* ${CATEGORIES.join(", ")}`,
  "*Priority:* 1 (high), 2 (medium), 3 (low)",
  "",
  "Plain language works too, e.g. \"add kobeissi as a voice for market commentary\"."
].join("\n");

const PRIORITY_LABEL: Record<Priority, string> = { 1: "high", 2: "medium", 3: "low" };
const PRIORITY_ICON: Record<Priority, string> = { 1: "🔴", 2: "🟡", 3: "🟢" };

function pillarsText(pillars: readonly Pillar[]): string {
  return pillars.map(pillarLabel).join(", ");
}

function followersText(n: number | null): string {
  return n === null ? "?" : n.toLocaleString("en-US");
}

const FeedUrlSchema = z
  .string()
  .url()
  .refine((u) => /^https?:\/\//i.test(u), "feed URL must be http(s)");

export type NewFeedInput = {
  url: string;
  category: Category;
  name?: string;
  priority?: Priority;
  keywords?: readonly string[];
};

export type ActionDeps = {
  store: SourceStore;
  x: XReader | null;
  voice: Pick<VoiceSampler, "refresh" | "refreshAll">;
};

/** Account management behind both the `!` commands and classified intents. Each returns the chat reply. */
export class AccountActions {
  constructor(private readonly deps: ActionDeps) {}

  private async requireAccount(handle: string): Promise<MonitoredAccount> {
    const account = await this.deps.store.findAccount(handle);
    if (!account) throw new ValidationError(`Account @${handle} not found.`);
    return account;
  }

  /** New accounts are looked up on X when a reader is configured. */
  private async createAccount(
    handle: string,
    fields: { category: Category; priority?: Priority; isVoiceReference?: boolean; voicePillars?: Pillar[] }
  ): Promise<MonitoredAccount> {
    if (!this.deps.x) return await this.deps.store.addAccount({ handle, ...fields });
    const user = await this.deps.x.lookupUser(handle);
    if (!user) throw new ValidationError(`Could not find X user @${handle}.`);
    return await this.deps.store.addAccount({
      handle: user.username,
      userId: user.id,
      displayName: user.name,
      followerCount: user.followersCount,
      ...fields
    });
  }

  async addVoice(handle: string, pillars: Pillar[]): Promise<string> {
    if (pillars.length === 0) throw new ValidationError("Give at least one pillar for a voice reference.");
    const existing = await this.deps.store.findAccount(handle);

    let account: MonitoredAccount;
    let head: string;
    if (existing) {
      account = await this.deps.store.updateAccount(existing.id, { isVoiceReference: true, voicePillars: pillars, active: true });
      head = `✅ Marked @${account.handle} as a voice reference for ${pillarsText(pillars)}.`;
    } else {
      account = await this.createAccount(handle, { category: "global_macro", isVoiceReference: true, voicePillars: pillars });
      head = `✅ Added @${account.handle} as a voice reference for ${pillarsText(pillars)} (${followersText(account.followerCount)} followers).`;
    }
    logger.info("actions.add_voice", { handle: account.handle, pillars });

    if (!this.deps.x) return `${head}\nSamples will be fetched once an X token is configured.`;
    try {
      const added = await this.deps.voice.refresh(account);
      return `${head}\n📝 Fetched ${added} sample posts.`;
    } catch (err) {
      logger.warn("actions.add_voice.samples_failed", { handle: account.handle, error: errMessage(err) });
      return `${head}\n⚠️ Couldn't fetch samples yet: ${errMessage(err)}`;
    }
  }

  async addMonitor(handle: string, category: Category, priority: Priority): Promise<string> {
    const existing = await this.deps.store.findAccount(handle);
    if (existing?.active) return `⚠️ @${existing.handle} is already being monitored (${existing.category}).`;

    const account = existing
      ? await this.deps.store.updateAccount(existing.id, { active: true, category, priority })
      : await this.createAccount(handle, { category, priority });
    logger.info("actions.add_monitor", { handle: account.handle, category, priority, reactivated: Boolean(existing) });
    return `✅ Now monitoring @${account.handle} (${category}, ${PRIORITY_LABEL[priority]} priority, ${followersText(account.followerCount)} followers).`;
  }

  /** Deactivates; accounts are never deleted. */
  async removeAccount(handle: string): Promise<string> {
    const account = await this.requireAccount(handle);
    if (!account.active) return `@${account.handle} is already inactive.`;
    await this.deps.store.updateAccount(account.id, { active: false });
    logger.info("actions.remove_account", { handle: account.handle });
    return `✅ Stopped monitoring @${account.handle}.`;
  }

  /** Adds an RSS/Atom feed, or reactivates one that was turned off. */
  async addFeed(input: NewFeedInput): Promise<string> {
    const parsed = FeedUrlSchema.safeParse(input.url.trim());
    if (!parsed.success) throw new ValidationError(`Not a feed URL: ${input.url}`);
    const url = parsed.data;
    const keywords = [...new Set((input.keywords ?? []).map((k) => k.trim().toLowerCase()).filter(Boolean))];
    const priority = input.priority ?? 2;
    const keywordText = keywords.length > 0 ? `, keywords: ${keywords.join(", ")}` : "";

    const existing = (await this.deps.store.listRssSources()).find((f) => f.url === url);
    if (existing?.active) return `⚠️ ${existing.name} is already a feed (${existing.category}).`;
    if (existing) {
      await this.deps.store.updateRssSource(existing.id, { active: true, priority, keywords });
      logger.info("actions.add_feed", { name: existing.name, url, reactivated: true });
      return `✅ Reactivated feed ${existing.name} (${existing.category}, ${PRIORITY_LABEL[priority]} priority${keywordText}).`;
    }

    const name = input.name?.trim() || new URL(url).hostname.replace(/^www\./, "");
    const feed = await this.deps.store.addRssSource({ name, url, category: input.category, priority, keywords });
    logger.info("actions.add_feed", { name: feed.name, url, category: feed.category, priority });
    return `✅ Added feed ${feed.name} (${feed.category}, ${PRIORITY_LABEL[priority]} priority${keywordText}).`;
  }

  async listVoices(): Promise<string> {
    const voices = await this.deps.store.listAccounts({ activeOnly: true, voiceOnly: true });
    if (voices.length === 0) return "No voice references yet. Add one with `!add-voice @handle pillars`.";
    return [
      "*Voice references:*",
      ...voices.map((v) => `• @${v.handle} (${followersText(v.followerCount)} followers) → ${pillarsText(v.voicePillars) || "no pillars"}`)
    ].join("\n");
  }

  async listMonitors(category?: Category): Promise<string> {
    const accounts = await this.deps.store.listAccounts({ activeOnly: true, category });
    if (accounts.length === 0) {
      return `No accounts monitored${category ? ` in ${category}` : ""}. Add one with \`!add-monitor @handle category\`.`;
    }
    const lines = ["*Monitored accounts:*"];
    for (const cat of CATEGORIES) {
      const group = accounts.filter((a) => a.category === cat);
      if (group.length === 0) continue;
      lines.push(`*${cat}*`);
      for (const a of group) lines.push(`  ${PRIORITY_ICON[a.priority]} @${a.handle}${a.isVoiceReference ? " 🎤" : ""}`);
    }
    return lines.join("\n");
  }

  async tagVoice(handle: string, pillars: Pillar[]): Promise<string> {
    if (pillars.length === 0) throw new ValidationError("Give at least one pillar.");
    const account = await this.requireAccount(handle);
    if (!account.isVoiceReference) {
      throw new ValidationError(`@${account.handle} is not a voice reference. Add it first with \`!add-voice @${account.handle} pillars\`.`);
    }
    await this.deps.store.updateAccount(account.id, { voicePillars: pillars });
    logger.info("actions.tag_voice", { handle: account.handle, pillars });
    return `✅ @${account.handle} now covers ${pillarsText(pillars)}.`;
  }

  async refreshVoices(): Promise<string> {
    if (!this.deps.x) throw new ValidationError("Voice samples need TWITTER_BEARER_TOKEN.");
    const results = await this.deps.voice.refreshAll();
    const entries = Object.entries(results);
    if (entries.length === 0) return "No voice references to refresh.";
    let total = 0;
    const lines = ["*Voice samples refreshed:*"];
    for (const [handle, r] of entries) {
      if (typeof r === "number") {
        total += r;
        lines.push(`• @${handle}: ${r} new samples`);
      } else {
        lines.push(`• @${handle}: ${r}`);
      }
    }
    lines.push(`*Total:* ${total} new samples`);
    return lines.join("\n");
  }
}
