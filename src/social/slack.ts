import { SocketModeClient } from "@slack/socket-mode";
import { LogLevel, WebClient } from "@slack/web-api";
import { z } from "zod";
import { errMessage, logger } from "../logger.js";
import type { ChatSurface, InboundMessage, OutboundMessage } from "./chat.js";

const MessageEventSchema = z.object({
  type: z.literal("message"),
  channel: z.string(),
  user: z.string().optional(),
  text: z.string().optional(),
  ts: z.string(),
  thread_ts: z.string().optional(),
  subtype: z.string().optional(),
  bot_id: z.string().optional()
});

const ReactionEventSchema = z.object({
  type: z.literal("reaction_added"),
  user: z.string(),
  reaction: z.string(),
  item: z.object({ type: z.string(), channel: z.string().optional(), ts: z.string().optional() })
});

const EnvelopeSchema = z.object({
  event: z.unknown(),
  ack: z.function()
});

export type SlackConfig = {
  botToken: string;
  appToken: string;
};

/** Slack-formatted text to plain text: mentions dropped, links unwrapped. */
export function plainText(text: string): string {
  return text
    .replace(/<@[A-Za-z0-9]+>/g, "")
    .replace(/<[^>|]+\|([^>]+)>/g, "$1")
    .replace(/<([^>]+)>/g, "$1")
    .trim();
}

export function toInboundMessage(event: unknown, botUserId: string | null): InboundMessage | null {
  const msg = MessageEventSchema.safeParse(event);
  if (msg.success) {
    const m = msg.data;
    if (m.subtype || m.bot_id || !m.user || !m.text) return null;
    if (botUserId && m.user === botUserId) return null;
    return {
      channelId: m.channel,
      userId: m.user,
      text: plainText(m.text),
      messageId: m.ts,
      threadId: m.thread_ts && m.thread_ts !== m.ts ? m.thread_ts : null
    };
  }

  const reaction = ReactionEventSchema.safeParse(event);
  if (reaction.success) {
    const r = reaction.data;
    if (r.item.type !== "message" || !r.item.channel || !r.item.ts) return null;
    if (botUserId && r.user === botUserId) return null;
    return { channelId: r.item.channel, userId: r.user, text: "", messageId: r.item.ts, threadId: null, reaction: r.reaction };
  }
  return null;
}

/** Socket Mode in, Web API out. */
export class SlackAdapter implements ChatSurface {
  private readonly web: WebClient;
  private readonly socket: SocketModeClient;
  private botUserId: string | null = null;

  constructor(cfg: SlackConfig) {
    this.web = new WebClient(cfg.botToken, { logLevel: LogLevel.WARN });
    this.socket = new SocketModeClient({ appToken: cfg.appToken, logLevel: LogLevel.WARN });
  }

  async send(msg: OutboundMessage): Promise<string | null> {
    const res = await this.web.chat.postMessage({
      channel: msg.channelId,
      text: msg.text,
      ...(msg.threadId ? { thread_ts: msg.threadId } : {})
    });
    return res.ts ?? null;
  }

  async start(handler: (msg: InboundMessage) => Promise<void>): Promise<void> {
    try {
      const auth = await this.web.auth.test();
      this.botUserId = auth.user_id ?? null;
    } catch (err) {
      logger.warn("slack.auth_test.failed", { error: errMessage(err) });
    }

    const dispatch = async (payload: unknown) => {
      const envelope = EnvelopeSchema.safeParse(payload);
      if (!envelope.success) return;
      await envelope.data.ack();
      const inbound = toInboundMessage(envelope.data.event, this.botUserId);
      if (!inbound) return;
      try {
        await handler(inbound);
      } catch (err) {
        logger.error("slack.handler.failed", { error: errMessage(err) });
      }
    };

    const listener = (payload: unknown) => {
      dispatch(payload).catch((err: unknown) => logger.error("slack.dispatch.failed", { error: errMessage(err) }));
    };
    this.socket.on("message", listener);
    this.socket.on("reaction_added", listener);
    await this.socket.start();
    logger.info("slack.started", { botUserId: this.botUserId });
  }

  async stop(): Promise<void> {
    await this.socket.disconnect();
    logger.info("slack.stopped");
  }
}
