import { z } from "zod";
import { pillarLabel, type Pillar } from "../domain.js";
import { errMessage, logger } from "../logger.js";
import { normalizeText, significantWords, wordSimilarity } from "../text.js";
import { callLlm, parseJsonReply, type CallOptions, type LlmClient } from "./llm.js";
import { LEARNINGS_FILTER_SYSTEM_PROMPT, LEARNINGS_SYSTEM_PROMPT } from "./prompt.js";

export const MAX_LEARNINGS = 5;
const MAX_LEARNING_LENGTH = 200;
/** A learning this close to a revision request is an echo, not a generalization. */
const ECHO_SIMILARITY = 0.8;

export type VersionLike = {
  version: number;
  content: string;
  revisionRequest: string | null;
};

const LearningsReplySchema = z.object({ learnings: z.array(z.unknown()) });
const ExcludeReplySchema = z.object({ exclude: z.array(z.number()) });

/**
 * Clean model output into learning statements: strings only, bullets
 * stripped, echoes of a literal revision request dropped, deduped, capped.
 */
export function sanitizeLearnings(items: readonly unknown[], revisionRequests: readonly string[]): string[] {
  const out: string[] = [];
  const seen = new Set<string>();
  const requests = revisionRequests.map(normalizeText).filter(Boolean);

  for (const item of items) {
    if (typeof item !== "string") continue;
    const text = item.replace(/^\s*(?:[-*•]|\d+[.)])\s*/, "").trim();
    if (text.length < 3 || text.length > MAX_LEARNING_LENGTH) continue;

    const norm = normalizeText(text);
    if (seen.has(norm)) continue;
    if (requests.some((r) => r === norm || wordSimilarity(r, norm) >= ECHO_SIMILARITY)) continue;

    seen.add(norm);
    out.push(text);
    if (out.length >= MAX_LEARNINGS) break;
  }
  return out;
}

/** Text after the word "except", or null when there is none. */
export function exceptClause(response: string): string | null {
  const m = /\bexcept\b([\s\S]*)$/i.exec(response);
  return m ? (m[1] ?? "").trim() : null;
}

function wordsOverlap(a: Set<string>, b: Set<string>): boolean {
  for (const x of a) {
    for (const y of b) {
      if (x === y) return true;
      const [short, long] = x.length <= y.length ? [x, y] : [y, x];
      if (short.length >= 4 && long.startsWith(short)) return true;
    }
  }
  return false;
}

/**
 * Deterministic exclusion for "except ..." replies: item numbers when the
 * clause names them, otherwise word overlap with the clause.
 */
export function localExclusions(learnings: readonly string[], clause: string): Set<number> {
  const numbers = [...clause.matchAll(/\b(\d+)\b/g)].map((m) => Number(m[1]));
  if (numbers.length > 0) {
    return new Set(numbers.filter((n) => n >= 1 && n <= learnings.length).map((n) => n - 1));
  }
  const clauseWords = significantWords(clause);
  const out = new Set<number>();
  learnings.forEach((l, i) => {
    if (wordsOverlap(significantWords(l), clauseWords)) out.add(i);
  });
  return out;
}

export function formatVersionHistory(versions: readonly VersionLike[]): string {
  return versions
    .map((v) =>
      v.revisionRequest
        ? `v${v.version} (after feedback: "${v.revisionRequest}"):\n${v.content}`
        : `v${v.version} (first draft):\n${v.content}`
    )
    .join("\n\n");
}

export class LearningExtractor {
  constructor(
    private readonly llm: LlmClient,
    private readonly callOpts: CallOptions
  ) {}

  /** Never throws: any failure yields an empty list. */
  async extract(pillar: Pillar, versions: readonly VersionLike[]): Promise<string[]> {
    if (versions.length < 2) return [];
    const requests = versions.flatMap((v) => (v.revisionRequest ? [v.revisionRequest] : []));

    try {
      const reply = await callLlm(
        this.llm,
        {
          purpose: "learnings",
          system: LEARNINGS_SYSTEM_PROMPT,
          user: `Pillar: ${pillarLabel(pillar)}\n\n${formatVersionHistory(versions)}`,
          maxTokens: 500,
          temperature: 0
        },
        this.callOpts
      );
      const parsed = LearningsReplySchema.safeParse(parseJsonReply(reply));
      if (!parsed.success) {
        logger.warn("learnings.malformed", { pillar });
        return [];
      }
      const learnings = sanitizeLearnings(parsed.data.learnings, requests);
      logger.info("learnings.extracted", { pillar, count: learnings.length });
      return learnings;
    } catch (err) {
      logger.warn("learnings.degraded", { pillar, error: errMessage(err) });
      return [];
    }
  }

  /** Learnings the user keeps after an "except ..." reply. */
  async filterExcept(learnings: readonly string[], response: string): Promise<string[]> {
    const clause = exceptClause(response) ?? response;
    if (/\b\d+\b/.test(clause)) {
      const drop = localExclusions(learnings, clause);
      return learnings.filter((_, i) => !drop.has(i));
    }

    try {
      const numbered = learnings.map((l, i) => `${i + 1}. ${l}`).join("\n");
      const reply = await callLlm(
        this.llm,
        {
          purpose: "learnings.filter",
          system: LEARNINGS_FILTER_SYSTEM_PROMPT,
          user: `Proposed learnings:\n${numbered}\n\nUser replied: ${response}`,
          maxTokens: 100,
          temperature: 0
        },
        this.callOpts
      );
      const parsed = ExcludeReplySchema.safeParse(parseJsonReply(reply));
      if (parsed.success) {
        const drop = new Set(parsed.data.exclude.map((n) => n - 1));
        return learnings.filter((_, i) => !drop.has(i));
      }
      logger.warn("learnings.filter.malformed", {});
    } catch (err) {
      logger.warn("learnings.filter.degraded", { error: errMessage(err) });
    }

    const drop = localExclusions(learnings, clause);
    return learnings.filter((_, i) => !drop.has(i));
  }
}
