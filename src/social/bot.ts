import { isApprovalReaction, isApprovalText } from "../agent/approval.js";
import type { ContentBrain, GeneratedPost } from "../agent/brain.js";
import { decide, type ClassifyContext, type DecisionThresholds, type IntentResult, type IntentRouter } from "../agent/intent.js";
import { isNegativeReply, type DraftSession, type SessionManager } from "../agent/session.js";
import { pillarLabel, type Pillar } from "../domain.js";
import { StateConflictError, ValidationError } from "../errors.js";
import { errMessage, logger } from "../logger.js";
import type { Alert, AlertSink } from "../news/pipeline.js";
import { renderAlert } from "../news/render.js";
import type { HistoryStore, ItemStore } from "../store/types.js";
import { systemClock, TTLCache, type Clock } from "../utils.js";
import { AccountActions, HELP_TEXT } from "./actions.js";
import type { ChatSurface, InboundMessage } from "./chat.js";
import { parseCommand, type Command } from "./commands.js";

const AFFIRMATIVE = /^\s*(y|yes|yep|yeah|yup|sure|ok|okay|confirm|do it|go ahead)\b/i;

export type ContentBotDeps = {
  chat: ChatSurface;
  router: Pick<IntentRouter, "classify">;
  sessions: SessionManager;
  brain: Pick<ContentBrain, "generatePost" | "generateWeeklyBatch">;
  actions: AccountActions;
  items: ItemStore;
  history: HistoryStore;
  thresholds: DecisionThresholds;
  /** Where alerts are posted. */
  alertChannelId: string;
  /** How long a pending confirmation or clarification stays open. */
  pendingTtlMs: number;
  /** How long an alert thread remembers its item. */
  retentionMs: number;
  now?: Clock;
};

type Pending = { result: IntentResult; text: string };

function describeIntent(r: IntentResult): string {
  const e = r.entities;
  const handle = e.handle ? `@${e.handle}` : "the account";
  const pillars = e.pillars?.map(pillarLabel).join(", ") ?? "";
  switch (r.intent) {
    case "add_voice":
      return `add ${handle} as a voice reference for ${pillars}`;
    case "add_monitor":
      return `start monitoring ${handle} under ${e.category ?? "?"} (priority ${e.priority ?? 2})`;
    case "remove_account":
      return `stop monitoring ${handle}`;
    case "list_voices":
      return "list the voice references";
    case "list_monitors":
      return e.category ? `list monitored accounts in ${e.category}` : "list monitored accounts";
    case "tag_voice":
      return `set ${handle}'s pillars to ${pillars}`;
    case "refresh_voices":
      return "refresh voice samples";
    case "generate_post":
      return `draft a ${pillars} post${e.topic ? ` about ${e.topic}` : ""}`;
    default:
      return "show help";
  }
}

function draftText(version: number, content: string, header?: string): string {
  return [header, `*v${version}*`, content].filter((p) => p !== undefined).join("\n");
}

/**
 * Routes chat traffic: draft-thread replies and reactions to the session
 * manager, `!` commands straight to actions, everything else through intent
 * classification. Also the alert sink that posts alerts and opens their drafts.
 */
export class ContentBot implements AlertSink {
  private readonly confirmations: TTLCache<string, Pending>;
  private readonly clarifications: TTLCache<string, Pending>;
  private readonly alertByThread: TTLCache<string, string>;
  private readonly now: Clock;

  constructor(private readonly deps: ContentBotDeps) {
    this.now = deps.now ?? systemClock;
    this.confirmations = new TTLCache(deps.pendingTtlMs, this.now);
    this.clarifications = new TTLCache(deps.pendingTtlMs, this.now);
    this.alertByThread = new TTLCache(deps.retentionMs, this.now);
  }

  private async reply(msg: InboundMessage, text: string, threadId?: string): Promise<string | null> {
    return await this.deps.chat.send({ channelId: msg.channelId, text, threadId: threadId ?? msg.threadId ?? undefined });
  }

  async handle(msg: InboundMessage): Promise<void> {
    try {
      await this.route(msg);
    } catch (err) {
      if (err instanceof ValidationError || err instanceof StateConflictError) {
        await this.reply(msg, `⚠️ ${err.message}`);
        return;
      }
      logger.error("bot.handle.failed", { user: msg.userId, error: errMessage(err) });
      await this.reply(msg, `❌ Error: ${errMessage(err)}`);
    }
  }

  private async route(msg: InboundMessage): Promise<void> {
    if (msg.reaction !== undefined) {
      await this.onReaction(msg, msg.reaction);
      return;
    }

    const text = msg.text.trim();
    if (!text) return;

    if (msg.threadId) {
      const session = this.deps.sessions.get(msg.threadId);
      if (session && session.status !== "complete") {
        await this.onSessionReply(session, msg, text);
        return;
      }
    }

    const parsed = parseCommand(text);
    if (parsed) {
      if (!parsed.ok) await this.reply(msg, parsed.usage);
      else await this.runCommand(parsed.command, msg);
      return;
    }

    const pendingConfirm = this.confirmations.take(msg.userId);
    if (pendingConfirm) {
      if (AFFIRMATIVE.test(text)) {
        await this.execute(pendingConfirm.result, msg);
        return;
      }
      if (isNegativeReply(text) || /^\s*(n|cancel)\b/i.test(text)) {
        await this.reply(msg, "Okay, cancelled.");
        return;
      }
      // Anything else is a new request; the pending one lapses.
    }

    const pendingClarify = this.clarifications.take(msg.userId);
    const context: ClassifyContext | undefined = pendingClarify
      ? { previous: pendingClarify.result, previousText: pendingClarify.text }
      : undefined;
    const result = await this.deps.router.classify(text, context);
    const combinedText = pendingClarify ? `${pendingClarify.text}\n${text}` : text;
    await this.act(result, combinedText, msg);
  }

  private async act(result: IntentResult, text: string, msg: InboundMessage): Promise<void> {
    const decision = decide(result, this.deps.thresholds);
    switch (decision.kind) {
      case "execute":
        await this.execute(result, msg);
        return;
      case "clarify":
        this.clarifications.set(msg.userId, { result, text });
        await this.reply(msg, decision.question);
        return;
      case "confirm":
        this.confirmations.set(msg.userId, { result, text });
        await this.reply(msg, `Just to confirm: ${describeIntent(result)}? (yes/no)`);
        return;
      case "help":
        await this.reply(msg, result.intent === "help" ? HELP_TEXT : `I'm not sure what you mean.\n\n${HELP_TEXT}`);
        return;
    }
  }

  /** Run a classified intent. Entities were checked by the router; a gap here is answered, not guessed. */
  async execute(result: IntentResult, msg: InboundMessage): Promise<void> {
    const { handle, pillars, category, priority, topic } = result.entities;
    const { actions } = this.deps;
    logger.info("bot.execute", { intent: result.intent, user: msg.userId });

    switch (result.intent) {
      case "add_voice":
        if (!handle || !pillars) throw new ValidationError("I need a handle and at least one pillar.");
        await this.reply(msg, await actions.addVoice(handle, pillars));
        return;
      case "add_monitor":
        if (!handle || !category) throw new ValidationError("I need a handle and a category.");
        await this.reply(msg, await actions.addMonitor(handle, category, priority ?? 2));
        return;
      case "remove_account":
        if (!handle) throw new ValidationError("Which account should I remove?");
        await this.reply(msg, await actions.removeAccount(handle));
        return;
      case "list_voices":
        await this.reply(msg, await actions.listVoices());
        return;
      case "list_monitors":
        await this.reply(msg, await actions.listMonitors(category));
        return;
      case "tag_voice":
        if (!handle || !pillars) throw new ValidationError("I need a handle and at least one pillar.");
        await this.reply(msg, await actions.tagVoice(handle, pillars));
        return;
      case "refresh_voices":
        await this.reply(msg, await actions.refreshVoices());
        return;
      case "generate_post": {
        const pillar = pillars?.[0];
        if (!pillar) throw new ValidationError("Which pillar should the post be for?");
        await this.startDraft(msg, pillar, topic);
        return;
      }
      default:
        await this.reply(msg, HELP_TEXT);
    }
  }

  private async runCommand(cmd: Command, msg: InboundMessage): Promise<void> {
    const { actions } = this.deps;
    switch (cmd.name) {
      case "add-voice":
        await this.reply(msg, await actions.addVoice(cmd.handle, cmd.pillars));
        return;
      case "add-monitor":
        await this.reply(msg, await actions.addMonitor(cmd.handle, cmd.category, cmd.priority));
        return;
      case "remove":
        await this.reply(msg, await actions.removeAccount(cmd.handle));
        return;
      case "list-voices":
        await this.reply(msg, await actions.listVoices());
        return;
      case "list-monitors":
        await this.reply(msg, await actions.listMonitors(cmd.category));
        return;
      case "tag-voice":
        await this.reply(msg, await actions.tagVoice(cmd.handle, cmd.pillars));
        return;
      case "refresh-voices":
        await this.reply(msg, await actions.refreshVoices());
        return;
      case "generate":
        await this.startDraft(msg, cmd.pillar, cmd.topic);
        return;
      case "weekly":
        await this.runWeekly(msg);
        return;
      case "help":
        await this.reply(msg, HELP_TEXT);
        return;
    }
  }

  /** Draft a post in a thread under the request; the requester owns the session. */
  private async startDraft(msg: InboundMessage, pillar: Pillar, topic?: string): Promise<void> {
    const threadId = msg.threadId ?? msg.messageId;
    const post = await this.deps.brain.generatePost({ pillar, topic });
    this.deps.sessions.create({
      threadId,
      channelId: msg.channelId,
      pillar,
      topic: post.topic,
      prompt: post.prompt,
      content: post.content,
      ownerId: msg.userId
    });
    const header = `📝 *${pillarLabel(pillar)}* · ${post.topic} · _${post.angle}_`;
    const sent = await this.reply(msg, `${draftText(0, post.content, header)}\n\n_Reply here to revise; say "perfect" or react ✅ to approve._`, threadId);
    if (sent) this.deps.sessions.attachMessage(threadId, 0, sent);
  }

  private async newsContext(): Promise<string | undefined> {
    const recent = await this.deps.items.recentItems(50);
    const headlines = recent
      .filter((i) => i.relevanceType === "news")
      .slice(0, 5)
      .map((i) => `- ${(i.text.split("\n")[0] ?? "").slice(0, 200)}`);
    return headlines.length > 0 ? headlines.join("\n") : undefined;
  }

  /** Each weekly item is its own top-level message and unowned session. */
  private async runWeekly(msg: InboundMessage): Promise<void> {
    await this.reply(msg, "Drafting the weekly batch…");
    const batch = await this.deps.brain.generateWeeklyBatch(await this.newsContext());
    for (const item of batch.items) {
      await this.postUnownedDraft(msg.channelId, item, `🗓️ *${item.day}* · ${pillarLabel(item.pillar)} · ${item.topic} · _${item.angle}_`);
    }
    const failed = batch.failed.map((f) => `${f.day} (${f.error})`).join(", ");
    await this.reply(msg, `Weekly batch: ${batch.items.length} drafts posted.${failed ? ` Failed: ${failed}` : ""}`);
  }

  private async postUnownedDraft(channelId: string, post: Pick<GeneratedPost, "pillar" | "topic" | "prompt" | "content">, header: string): Promise<void> {
    const id = await this.deps.chat.send({ channelId, text: draftText(0, post.content, header) });
    if (!id) return;
    this.deps.sessions.create({
      threadId: id,
      channelId,
      pillar: post.pillar,
      topic: post.topic,
      prompt: post.prompt,
      content: post.content,
      ownerId: null
    });
    this.deps.sessions.attachMessage(id, 0, id);
  }

  // Draft threads

  private async onReaction(msg: InboundMessage, name: string): Promise<void> {
    if (!isApprovalReaction(name)) return;
    const threadId = this.deps.sessions.threadForMessage(msg.messageId);
    if (!threadId) return;
    const session = this.deps.sessions.get(threadId);
    if (!session || session.status !== "iterating") return;
    try {
      await this.approve(session, msg, msg.messageId);
    } catch (err) {
      if (!(err instanceof StateConflictError)) throw err;
      await this.deps.chat.send({ channelId: session.channelId, threadId, text: "React on the latest version to approve it." });
    }
  }

  private async onSessionReply(session: DraftSession, msg: InboundMessage, text: string): Promise<void> {
    if (session.status === "learnings_pending") {
      await this.confirm(session, msg, text);
      return;
    }
    if (session.status !== "iterating") return;
    if (isApprovalText(text)) {
      await this.approve(session, msg);
      return;
    }

    const threadId = session.threadId;
    const outcome = await this.deps.sessions.revise(threadId, msg.userId, text);
    switch (outcome.kind) {
      case "revised": {
        const sent = await this.reply(msg, draftText(outcome.version.version, outcome.version.content), threadId);
        if (sent) this.deps.sessions.attachMessage(threadId, outcome.version.version, sent);
        return;
      }
      case "cap_reached":
        await this.reply(msg, `This draft already has ${outcome.maxVersions} versions. Approve it or start a new draft.`, threadId);
        return;
      case "not_owner":
        await this.reply(msg, `Only <@${outcome.ownerId}> can revise this draft.`, threadId);
        return;
    }
  }

  private async approve(session: DraftSession, msg: InboundMessage, viaMessageId?: string): Promise<void> {
    const threadId = session.threadId;
    const say = (text: string) => this.deps.chat.send({ channelId: session.channelId, threadId, text });
    const outcome = await this.deps.sessions.approve(threadId, msg.userId, viaMessageId);

    if (outcome.kind === "not_owner") {
      await say(`Only <@${outcome.ownerId}> can approve this draft.`);
      return;
    }
    await this.markAlertActioned(threadId);

    if (outcome.kind === "complete") {
      await say("✅ Approved.");
      return;
    }
    if (outcome.learnings.length === 0) {
      await this.deps.sessions.confirmLearnings(threadId, msg.userId, "no");
      await say("✅ Approved. No new style preferences this time.");
      return;
    }
    await say(
      [
        "✅ Approved. From your edits I picked up:",
        ...outcome.learnings.map((l, i) => `${i + 1}. ${l}`),
        "",
        "Save these for future drafts? Reply *yes*, *no*, or *yes except …*"
      ].join("\n")
    );
  }

  private async confirm(session: DraftSession, msg: InboundMessage, text: string): Promise<void> {
    const threadId = session.threadId;
    const outcome = await this.deps.sessions.confirmLearnings(threadId, msg.userId, text);
    switch (outcome.kind) {
      case "not_owner":
        await this.reply(msg, `Only <@${outcome.ownerId}> can confirm these.`, threadId);
        return;
      case "discarded":
        await this.reply(msg, "👍 Discarded. Nothing saved.", threadId);
        return;
      case "persisted":
        await this.reply(
          msg,
          outcome.learnings.length > 0
            ? `💾 Saved ${outcome.learnings.length} preference(s) for ${pillarLabel(session.pillar)}.`
            : "👍 Nothing saved.",
          threadId
        );
        return;
    }
  }

  private async markAlertActioned(threadId: string): Promise<void> {
    const key = this.alertByThread.take(threadId);
    if (!key) return;
    try {
      await this.deps.items.markActioned(key);
    } catch (err) {
      logger.warn("bot.mark_actioned.failed", { key, error: errMessage(err) });
    }
  }

  // AlertSink

  async emit(alert: Alert): Promise<string | null> {
    const id = await this.deps.chat.send({ channelId: this.deps.alertChannelId, text: renderAlert(alert, this.now()) });
    if (!id || !alert.suggestedContent) return id;

    const session = this.deps.sessions.create({
      threadId: id,
      channelId: this.deps.alertChannelId,
      pillar: "market_commentary",
      topic: alert.sourceLabel,
      prompt: `React to this ${alert.sourceKind === "rss" ? "news item" : "post"} from ${alert.sourceLabel}:\n${alert.text}`,
      content: alert.suggestedContent,
      ownerId: null
    });
    this.deps.sessions.attachMessage(id, 0, id);
    this.alertByThread.set(id, alert.key);
    try {
      await this.deps.history.addHistory({
        pillar: session.pillar,
        kind: "news_reaction",
        topic: alert.sourceLabel,
        angle: alert.kind === "news" ? "breaking news" : "reply",
        content: alert.suggestedContent
      });
    } catch (err) {
      logger.warn("bot.history.failed", { key: alert.key, error: errMessage(err) });
    }
    return id;
  }

  /** Drop expired pending prompts and alert-thread links. */
  sweep(): void {
    this.confirmations.evictExpired();
    this.clarifications.evictExpired();
    this.alertByThread.evictExpired();
  }
}
