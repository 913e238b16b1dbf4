import { z } from "zod";
import { PILLAR_GUIDE, pillarLabel, type Pillar } from "../domain.js";
import { MalformedResponseError } from "../errors.js";
import { errMessage, logger } from "../logger.js";
import { marketContext, type MarketDataProvider } from "../news/market.js";
import type { ContentHistoryEntry, FeedbackStore, HistoryStore } from "../store/types.js";
import { formatLearnings, learningsForPrompt } from "./feedback.js";
import { formatVersionHistory } from "./learnings.js";
import { callLlm, parseJsonReply, type CallOptions, type LlmClient } from "./llm.js";
import { generateSystemPrompt, reviseSystemPrompt } from "./prompt.js";
import type { DraftReviser, DraftSession } from "./session.js";
import type { VarietyPlanner } from "./variety.js";
import type { VoiceSampler } from "./voice.js";

export type GenerateRequest = {
  pillar: Pillar;
  topic?: string;
  angle?: string;
  /** Recent headlines, for market commentary. */
  newsContext?: string;
  kind?: ContentHistoryEntry["kind"];
};

export type GeneratedPost = {
  pillar: Pillar;
  topic: string;
  angle: string;
  content: string;
  /** The brief the model was given; revisions start from it. */
  prompt: string;
};

export type WeeklyItem = GeneratedPost & { day: string };

export type WeeklyBatch = {
  items: WeeklyItem[];
  failed: Array<{ day: string; pillar: Pillar; error: string }>;
};

export type BrainDeps = {
  llm: LlmClient;
  callOpts: CallOptions;
  brand: string;
  planner: Pick<VarietyPlanner, "suggest" | "topicsToAvoid" | "weeklyPlan">;
  voice: Pick<VoiceSampler, "samplesForPrompt">;
  feedback: FeedbackStore;
  history: HistoryStore;
  /** Brand background placed in every brief. */
  brandContext?: string;
  market?: MarketDataProvider | null;
};

const GeneratedReplySchema = z.object({
  topic: z.string().nullish(),
  angle: z.string().nullish(),
  content: z.string().min(1)
});

/** Strip code fences and wrapping quotes a model sometimes adds around plain text. */
export function cleanPostText(text: string): string {
  let t = text.trim();
  const fenced = /^```[a-z]*\s*([\s\S]*?)```$/i.exec(t);
  if (fenced?.[1] !== undefined) t = fenced[1].trim();
  if (t.length >= 2 && t.startsWith('"') && t.endsWith('"')) t = t.slice(1, -1).trim();
  return t;
}

/**
 * Turns pillars, topics, voice samples and confirmed learnings into drafts,
 * and revises drafts from their full history.
 */
export class ContentBrain implements DraftReviser {
  constructor(private readonly deps: BrainDeps) {}

  async buildBrief(req: GenerateRequest, topic: string, angle: string): Promise<string> {
    const guide = PILLAR_GUIDE[req.pillar];
    const market = this.deps.market;
    const [samples, learnings, avoid, marketData] = await Promise.all([
      this.deps.voice.samplesForPrompt(req.pillar),
      learningsForPrompt(this.deps.feedback, req.pillar),
      this.deps.planner.topicsToAvoid(req.pillar),
      market ? marketContext(market) : Promise.resolve(null)
    ]);

    const parts = [
      `Pillar: ${pillarLabel(req.pillar)}`,
      `Goal: ${guide.goal}`,
      `Tone: ${guide.tone}`,
      `Topic: ${topic}`,
      `Angle: ${angle}`
    ];
    if (this.deps.brandContext) parts.push(this.deps.brandContext);
    if (marketData) parts.push(marketData);
    if (req.newsContext?.trim()) parts.push(`Recent news:\n${req.newsContext.trim()}`);
    if (avoid.topics.length > 0) parts.push(`Recently covered (do not repeat): ${avoid.topics.slice(0, 10).join("; ")}`);
    if (avoid.angles.length > 0) parts.push(`Recently used angles: ${avoid.angles.slice(0, 5).join("; ")}`);
    const learned = formatLearnings(learnings);
    if (learned) parts.push(learned);
    if (samples) parts.push(samples);
    return parts.join("\n\n");
  }

  async generatePost(req: GenerateRequest): Promise<GeneratedPost> {
    const suggestion = req.topic && req.angle ? null : await this.deps.planner.suggest(req.pillar);
    const topic = req.topic?.trim() || suggestion?.topic || pillarLabel(req.pillar);
    const angle = req.angle ?? suggestion?.angle ?? "single insight";
    const prompt = await this.buildBrief(req, topic, angle);

    const reply = await callLlm(
      this.deps.llm,
      { purpose: "generate", system: generateSystemPrompt(this.deps.brand), user: prompt, maxTokens: 800, temperature: 0.7 },
      this.deps.callOpts
    );

    // Read as JSON only when the reply opens with an object or a fence.
    let json: unknown = null;
    const opening = reply.trimStart();
    if (opening.startsWith("{") || opening.startsWith("```")) {
      try {
        json = parseJsonReply(reply);
      } catch (err) {
        logger.debug("generate.reply.not_json", { error: errMessage(err) });
      }
    }

    let content = cleanPostText(reply);
    let finalTopic = topic;
    let finalAngle = angle;
    if (json !== null) {
      const parsed = GeneratedReplySchema.safeParse(json);
      if (!parsed.success) throw new MalformedResponseError("generation reply failed schema", reply.slice(0, 200));
      content = cleanPostText(parsed.data.content);
      finalTopic = parsed.data.topic?.trim() || topic;
      finalAngle = parsed.data.angle?.trim() || angle;
    }
    if (!content) throw new MalformedResponseError("empty draft from model", reply.slice(0, 200));

    await this.deps.history.addHistory({
      pillar: req.pillar,
      kind: req.kind ?? "post",
      topic: finalTopic,
      angle: finalAngle,
      content
    });
    logger.info("generate.done", { pillar: req.pillar, topic: finalTopic, angle: finalAngle, chars: content.length });
    return { pillar: req.pillar, topic: finalTopic, angle: finalAngle, content, prompt };
  }

  /** Regenerate from the original brief, every earlier version and the newest request. */
  async revise(session: DraftSession, request: string): Promise<string> {
    const user = [
      `Original brief:\n${session.prompt || `Pillar: ${pillarLabel(session.pillar)}\nTopic: ${session.topic}`}`,
      `Versions so far:\n${formatVersionHistory(session.versions)}`,
      `Newest feedback: ${request}`
    ].join("\n\n");

    const reply = await callLlm(
      this.deps.llm,
      { purpose: "revise", system: reviseSystemPrompt(this.deps.brand), user, maxTokens: 800, temperature: 0.5 },
      this.deps.callOpts
    );
    const content = cleanPostText(reply);
    if (!content) throw new MalformedResponseError("empty revision from model", reply.slice(0, 200));
    return content;
  }

  /** One draft per day of the fixed schedule; a failed day is reported, not fatal. */
  async generateWeeklyBatch(newsContext?: string): Promise<WeeklyBatch> {
    const plan = await this.deps.planner.weeklyPlan();
    const batch: WeeklyBatch = { items: [], failed: [] };
    for (const slot of plan) {
      try {
        const post = await this.generatePost({
          pillar: slot.pillar,
          topic: slot.topic,
          angle: slot.angle,
          newsContext: slot.pillar === "market_commentary" ? newsContext : undefined,
          kind: "weekly"
        });
        batch.items.push({ ...post, day: slot.day });
      } catch (err) {
        logger.warn("weekly.item.failed", { day: slot.day, pillar: slot.pillar, error: errMessage(err) });
        batch.failed.push({ day: slot.day, pillar: slot.pillar, error: errMessage(err) });
      }
    }
    logger.info("weekly.done", { generated: batch.items.length, failed: batch.failed.length });
    return batch;
  }
}
