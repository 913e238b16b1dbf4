import { z } from "zod";
import { CATEGORIES, PILLARS, type Category, type Pillar, type Priority } from "../domain.js";
import { errMessage, logger } from "../logger.js";
import { clamp } from "../utils.js";
import { callLlm, parseJsonReply, type CallOptions, type LlmClient } from "./llm.js";
import {
  extractPillarsFromText,
  isValidHandle,
  normalizeCategory,
  normalizePillars,
  normalizePriority,
  resolveHandle
} from "./normalize.js";
import { INTENT_SYSTEM_PROMPT } from "./prompt.js";

export const INTENTS = [
  "add_voice",
  "add_monitor",
  "remove_account",
  "list_voices",
  "list_monitors",
  "tag_voice",
  "refresh_voices",
  "generate_post",
  "help",
  "unknown"
] as const;
export type Intent = (typeof INTENTS)[number];

export const DESTRUCTIVE_INTENTS: ReadonlySet<Intent> = new Set<Intent>(["remove_account"]);

export type IntentEntities = {
  handle?: string;
  pillars?: Pillar[];
  category?: Category;
  priority?: Priority;
  topic?: string;
};

export type IntentResult = {
  intent: Intent;
  confidence: number;
  entities: IntentEntities;
  clarificationNeeded: string | null;
};

/** A suspended classification, re-entered with the user's next message. */
export type ClassifyContext = {
  previous: IntentResult;
  previousText: string;
};

const RawEntitiesSchema = z.object({
  handle: z.string().nullish(),
  pillars: z.union([z.array(z.string()), z.string()]).nullish(),
  category: z.string().nullish(),
  priority: z.union([z.number(), z.string()]).nullish(),
  topic: z.string().nullish()
});
type RawEntities = z.infer<typeof RawEntitiesSchema>;

const IntentReplySchema = z.object({
  intent: z.string(),
  confidence: z.number(),
  entities: RawEntitiesSchema.nullish(),
  clarification_needed: z.string().nullish()
});

export type RawIntent = {
  intent: Intent;
  confidence: number;
  entities: RawEntities;
  clarification: string | null;
};

export const UNKNOWN_INTENT: IntentResult = {
  intent: "unknown",
  confidence: 0,
  entities: {},
  clarificationNeeded: null
};

function isIntent(v: string): v is Intent {
  return INTENTS.some((i) => i === v);
}

/** Parse and schema-check a model reply; null when it does not fit. */
export function parseIntentReply(text: string): RawIntent | null {
  let json: unknown;
  try {
    json = parseJsonReply(text);
  } catch {
    return null;
  }
  const parsed = IntentReplySchema.safeParse(json);
  if (!parsed.success) return null;

  const { intent, confidence, entities, clarification_needed } = parsed.data;
  return {
    intent: isIntent(intent) ? intent : "unknown",
    confidence: Number.isFinite(confidence) ? clamp(confidence, 0, 1) : 0,
    entities: entities ?? {},
    clarification: clarification_needed?.trim() || null
  };
}

const USES_HANDLE: ReadonlySet<Intent> = new Set<Intent>(["add_voice", "add_monitor", "remove_account", "tag_voice"]);
const NEEDS_EXISTING_HANDLE: ReadonlySet<Intent> = new Set<Intent>(["remove_account", "tag_voice"]);
const USES_PILLARS: ReadonlySet<Intent> = new Set<Intent>(["add_voice", "tag_voice", "generate_post"]);
const USES_CATEGORY: ReadonlySet<Intent> = new Set<Intent>(["add_monitor", "list_monitors"]);

function pillarList(raw: RawEntities["pillars"]): string[] {
  if (!raw) return [];
  return Array.isArray(raw) ? raw : raw.split(/,|\band\b/);
}

/**
 * Normalize entities against the closed vocabularies and the known-account
 * set, then check the intent's required entities. The first problem found
 * becomes the clarification question.
 */
export function finalizeIntent(raw: RawIntent, knownHandles: readonly string[], messageText = ""): IntentResult {
  if (raw.intent === "unknown") return { ...UNKNOWN_INTENT, confidence: raw.confidence };

  const intent = raw.intent;
  const entities: IntentEntities = {};
  const problems: string[] = [];

  if (USES_HANDLE.has(intent) && raw.entities.handle?.trim()) {
    const res = resolveHandle(raw.entities.handle, knownHandles);
    if (res.kind === "exact" || res.kind === "fuzzy") {
      entities.handle = res.handle;
    } else if (res.kind === "ambiguous") {
      problems.push(`Did you mean @${res.candidates[0]} or @${res.candidates[1]}?`);
    } else if (NEEDS_EXISTING_HANDLE.has(intent)) {
      problems.push(`I couldn't find @${res.handle} among the tracked accounts. Which account did you mean?`);
    } else if (!isValidHandle(res.handle)) {
      problems.push(`"${raw.entities.handle.trim()}" doesn't look like an X handle. What's the exact @handle?`);
    } else {
      entities.handle = res.handle;
    }
  }

  if (USES_PILLARS.has(intent)) {
    const { pillars, unknown } = normalizePillars(pillarList(raw.entities.pillars));
    const found = pillars.length > 0 ? pillars : extractPillarsFromText(messageText);
    if (unknown.length > 0 && found.length === 0) {
      problems.push(`I don't know the pillar "${unknown[0]}". Pillars: ${PILLARS.join(", ")}.`);
    }
    if (found.length > 0) entities.pillars = intent === "generate_post" ? found.slice(0, 1) : found;
  }

  if (USES_CATEGORY.has(intent)) {
    const cat = normalizeCategory(raw.entities.category);
    if (cat.kind === "ok") entities.category = cat.value;
    else if (cat.kind === "invalid") problems.push(`"${cat.raw}" isn't a category I know. Categories: ${CATEGORIES.join(", ")}.`);
  }

  if (intent === "add_monitor") {
    const prio = normalizePriority(raw.entities.priority);
    if (prio.kind === "ok") entities.priority = prio.value;
    else if (prio.kind === "invalid") problems.push("Priority should be high, medium or low (1-3).");
    else entities.priority = 2;
  }

  if (intent === "generate_post" && raw.entities.topic?.trim()) {
    entities.topic = raw.entities.topic.trim();
  }

  // Required entities, asked in a fixed order.
  const handleLabel = entities.handle ? `@${entities.handle}` : "that account";
  if (problems.length === 0) {
    if (USES_HANDLE.has(intent) && !entities.handle) {
      problems.push(
        intent === "add_voice"
          ? "Which account should I add as a voice? Send the @handle."
          : intent === "add_monitor"
            ? "What's the @handle of the account to monitor?"
            : intent === "remove_account"
              ? "Which account should I remove?"
              : "Which voice should I retag?"
      );
    } else if ((intent === "add_voice" || intent === "tag_voice") && !entities.pillars) {
      problems.push(`Which pillars should ${handleLabel} cover?`);
    } else if (intent === "add_monitor" && !entities.category) {
      problems.push(`Which category should ${handleLabel} go under? (${CATEGORIES.join(", ")})`);
    } else if (intent === "generate_post" && !entities.pillars) {
      problems.push(`Which pillar should the post be for? (${PILLARS.join(", ")})`);
    }
  }

  return {
    intent,
    confidence: raw.confidence,
    entities,
    clarificationNeeded: problems[0] ?? raw.clarification
  };
}

function toRawEntities(e: IntentEntities): RawEntities {
  return {
    handle: e.handle ?? null,
    pillars: e.pillars ?? null,
    category: e.category ?? null,
    priority: e.priority ?? null,
    topic: e.topic ?? null
  };
}

function present<T>(v: T | null | undefined): v is T {
  if (v === null || v === undefined) return false;
  if (typeof v === "string") return v.trim().length > 0;
  if (Array.isArray(v)) return v.length > 0;
  return true;
}

/**
 * Fold a follow-up reply into the suspended intent: same-intent or
 * unclassifiable replies inherit the earlier entities; new values win.
 */
export function mergeWithContext(next: RawIntent | null, ctx: ClassifyContext): RawIntent {
  const prev = ctx.previous;
  if (next && next.intent !== "unknown" && next.intent !== prev.intent) return next;

  const base = toRawEntities(prev.entities);
  const incoming = next?.entities ?? {};
  return {
    intent: prev.intent,
    confidence: Math.max(prev.confidence, next && next.intent === prev.intent ? next.confidence : 0),
    entities: {
      handle: present(incoming.handle) ? incoming.handle : base.handle,
      pillars: present(incoming.pillars) ? incoming.pillars : base.pillars,
      category: present(incoming.category) ? incoming.category : base.category,
      priority: present(incoming.priority) ? incoming.priority : base.priority,
      topic: present(incoming.topic) ? incoming.topic : base.topic
    },
    clarification: null
  };
}

/** A bare "@handle" reply to a handle question. */
function handleFromReply(text: string): string | null {
  const m = /^@?([A-Za-z0-9_]{1,15})$/.exec(text.trim());
  return m?.[1] ?? null;
}

export class IntentRouter {
  constructor(
    private readonly llm: LlmClient,
    private readonly callOpts: CallOptions,
    private readonly knownHandles: () => Promise<string[]>
  ) {}

  async classify(message: string, context?: ClassifyContext): Promise<IntentResult> {
    const text = message.trim();
    if (!text) return UNKNOWN_INTENT;

    const user = context
      ? [
          `Earlier message: ${context.previousText}`,
          `Assistant asked: ${context.previous.clarificationNeeded ?? ""}`,
          `User's answer: ${text}`,
          "Classify the combined request."
        ].join("\n")
      : text;

    let raw: RawIntent | null = null;
    try {
      const reply = await callLlm(this.llm, { purpose: "intent", system: INTENT_SYSTEM_PROMPT, user, maxTokens: 400, temperature: 0 }, this.callOpts);
      raw = parseIntentReply(reply);
      if (!raw) logger.warn("intent.malformed", { preview: reply.slice(0, 200) });
    } catch (err) {
      logger.warn("intent.degraded", { error: errMessage(err) });
    }

    if (context) {
      raw = mergeWithContext(raw, context);
      if (!present(raw.entities.handle) && USES_HANDLE.has(raw.intent)) {
        raw.entities.handle = handleFromReply(text);
      }
    }
    if (!raw) return UNKNOWN_INTENT;

    const known = await this.knownHandles();
    const result = finalizeIntent(raw, known, text);
    logger.info("intent.classified", {
      intent: result.intent,
      confidence: result.confidence,
      clarification: result.clarificationNeeded
    });
    return result;
  }
}

export type DecisionThresholds = {
  execute: number;
  confirm: number;
  destructiveExecute: number;
};

export type Decision =
  | { kind: "execute" }
  | { kind: "clarify"; question: string }
  | { kind: "confirm" }
  | { kind: "help" };

/**
 * Caller-side policy over an IntentResult. Only a result with no open
 * question and confidence at or above the execute bar runs directly;
 * destructive intents use the higher bar.
 */
export function decide(result: IntentResult, t: DecisionThresholds): Decision {
  if (result.clarificationNeeded) return { kind: "clarify", question: result.clarificationNeeded };
  if (result.intent === "unknown" || result.confidence < t.confirm) return { kind: "help" };
  const bar = DESTRUCTIVE_INTENTS.has(result.intent) ? Math.max(t.destructiveExecute, t.execute) : t.execute;
  return result.confidence >= bar ? { kind: "execute" } : { kind: "confirm" };
}
