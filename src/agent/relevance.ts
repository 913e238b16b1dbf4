import { readFile } from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import { CategorySchema, RelevanceTypeSchema, type Category, type Priority, type RelevanceType, type SourceKind } from "../domain.js";
import { errMessage, logger } from "../logger.js";
import { callLlm, parseJsonReply, type CallOptions, type LlmClient } from "./llm.js";
import { RELEVANCE_SYSTEM_PROMPT } from "./prompt.js";

export type SourceMeta = {
  kind: SourceKind;
  sourceLabel: string;
  category: Category;
  priority: Priority;
  followerCount?: number | null;
};

export type RelevanceResult = {
  relevanceScore: number;
  relevanceType: RelevanceType;
  reasoning: string;
  suggestedContent: string | null;
  /** True when the keyword pre-filter decided without calling the model. */
  prefiltered: boolean;
};

const KeywordFileSchema = z.object({
  common: z.array(z.string()),
  categories: z.record(CategorySchema, z.array(z.string())).default({})
});

export type KeywordSets = z.infer<typeof KeywordFileSchema>;

export async function loadKeywordSets(filePath: string): Promise<KeywordSets> {
  const p = path.resolve(process.cwd(), filePath);
  const raw = await readFile(p, "utf8");
  const parsed = KeywordFileSchema.safeParse(JSON.parse(raw));
  if (!parsed.success) {
    throw new Error(`invalid keyword file ${p}: ${parsed.error.issues[0]?.message ?? "unknown"}`);
  }
  return parsed.data;
}

function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Case-insensitive keyword test. Short alphanumeric tokens (tickers like
 * "FX", "ARS") must match as whole words; longer ones match as substrings.
 */
export function containsKeyword(text: string, keywords: readonly string[]): boolean {
  const lower = text.toLowerCase();
  return keywords.some((k) => {
    const kw = k.trim().toLowerCase();
    if (!kw) return false;
    if (kw.length <= 4 && /^[a-z0-9]+$/.test(kw)) {
      return new RegExp(`\\b${escapeRegExp(kw)}\\b`).test(lower);
    }
    return lower.includes(kw);
  });
}

const RelevanceReplySchema = z.object({
  score: z.number(),
  type: z.string(),
  reasoning: z.string().nullish(),
  suggested_content: z.string().nullish()
});

export function skipResult(reasoning: string, prefiltered = false): RelevanceResult {
  return { relevanceScore: 0, relevanceType: "skip", reasoning, suggestedContent: null, prefiltered };
}

/**
 * Validate a raw model reply. Anything outside the contract (unparseable,
 * score outside [0,1], unknown type) becomes skip/0.
 */
export function coerceRelevanceReply(text: string): RelevanceResult {
  let json: unknown;
  try {
    json = parseJsonReply(text);
  } catch {
    return skipResult("malformed reply");
  }

  const parsed = RelevanceReplySchema.safeParse(json);
  if (!parsed.success) return skipResult("reply failed schema");

  const { score, type, reasoning, suggested_content } = parsed.data;
  if (!Number.isFinite(score) || score < 0 || score > 1) return skipResult(`score out of range: ${score}`);

  const relevanceType = RelevanceTypeSchema.safeParse(type);
  if (!relevanceType.success) return skipResult(`unknown type: ${type}`);

  const suggestion = suggested_content?.trim();
  return {
    relevanceScore: score,
    relevanceType: relevanceType.data,
    reasoning: reasoning?.trim() || "",
    suggestedContent: relevanceType.data === "skip" || !suggestion ? null : suggestion,
    prefiltered: false
  };
}

export class RelevanceScorer {
  constructor(
    private readonly llm: LlmClient,
    private readonly keywords: KeywordSets,
    private readonly callOpts: CallOptions
  ) {}

  /** The keyword list that gates the model call for a category (empty = no gate). */
  keywordsFor(category: Category): string[] {
    return [...this.keywords.common, ...(this.keywords.categories[category] ?? [])];
  }

  async score(text: string, meta: SourceMeta): Promise<RelevanceResult> {
    if (!text.trim()) return skipResult("empty text", true);

    const gate = this.keywordsFor(meta.category);
    if (gate.length > 0 && !containsKeyword(text, gate)) {
      logger.debug("relevance.prefiltered", { source: meta.sourceLabel, category: meta.category });
      return skipResult("no relevant keywords", true);
    }

    const user = [
      `Source: ${meta.sourceLabel} (${meta.kind === "tweet" ? "X post" : "RSS item"})`,
      `Category: ${meta.category}`,
      `Priority: ${meta.priority}`,
      meta.followerCount != null ? `Followers: ${meta.followerCount}` : null,
      "",
      "Content:",
      text
    ]
      .filter((l): l is string => l !== null)
      .join("\n");

    let reply: string;
    try {
      reply = await callLlm(this.llm, { purpose: "relevance", system: RELEVANCE_SYSTEM_PROMPT, user, maxTokens: 600 }, this.callOpts);
    } catch (err) {
      logger.warn("relevance.degraded", { source: meta.sourceLabel, error: errMessage(err) });
      return skipResult("scoring unavailable");
    }

    const result = coerceRelevanceReply(reply);
    logger.info("relevance.scored", {
      source: meta.sourceLabel,
      score: result.relevanceScore,
      type: result.relevanceType
    });
    return result;
  }
}
