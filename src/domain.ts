import { z } from "zod";

export const PILLARS = ["market_commentary", "education", "product", "social_proof"] as const;
export type Pillar = (typeof PILLARS)[number];
export const PillarSchema = z.enum(PILLARS);

export const CATEGORIES = ["nigeria", "argentina", "colombia", "global_macro", "crypto_defi", "reply_target"] as const;
export type Category = (typeof CATEGORIES)[number];
export const CategorySchema = z.enum(CATEGORIES);

export const RELEVANCE_TYPES = ["news", "reply_opportunity", "skip"] as const;
export type RelevanceType = (typeof RELEVANCE_TYPES)[number];
export const RelevanceTypeSchema = z.enum(RELEVANCE_TYPES);

export type Priority = 1 | 2 | 3;
export const PrioritySchema = z.union([z.literal(1), z.literal(2), z.literal(3)]);

export type SourceKind = "tweet" | "rss";

export function isPillar(v: string): v is Pillar {
  return PILLARS.some((p) => p === v);
}

export function isCategory(v: string): v is Category {
  return CATEGORIES.some((c) => c === v);
}

export function pillarLabel(p: Pillar): string {
  return p.replace(/_/g, " ");
}

export const PILLAR_GUIDE: Record<Pillar, { goal: string; tone: string }> = {
  market_commentary: {
    goal: "Relevance: show we understand the markets our traders live in",
    tone: "Observational, data-driven, not predictive"
  },
  education: {
    goal: "Understanding: reduce friction by teaching how the product works",
    tone: "Simple, clear, no jargon assumed"
  },
  product: {
    goal: "Credibility: prove the product works",
    tone: "Demonstrative, not salesy"
  },
  social_proof: {
    goal: "Momentum: create legitimacy",
    tone: "Celebratory but not exaggerated"
  }
};
