import { isCategory, isPillar, type Category, type Pillar, type Priority } from "../domain.js";
import { diceCoefficient } from "../text.js";

/** Free-text pillar names, lowercased with `_`/`-` read as spaces. */
const PILLAR_ALIASES: Record<string, Pillar> = {
  "market commentary": "market_commentary",
  "market": "market_commentary",
  "markets": "market_commentary",
  "commentary": "market_commentary",
  "education": "education",
  "educational": "education",
  "edu": "education",
  "explainer": "education",
  "explainers": "education",
  "product": "product",
  "product update": "product",
  "product updates": "product",
  "feature": "product",
  "features": "product",
  "social proof": "social_proof",
  "social": "social_proof",
  "proof": "social_proof",
  "testimonial": "social_proof",
  "testimonials": "social_proof"
};

const CATEGORY_ALIASES: Record<string, Category> = {
  "nigeria": "nigeria",
  "nigerian": "nigeria",
  "ngn": "nigeria",
  "naira": "nigeria",
  "argentina": "argentina",
  "argentine": "argentina",
  "ars": "argentina",
  "peso": "argentina",
  "pesos": "argentina",
  "colombia": "colombia",
  "colombian": "colombia",
  "cop": "colombia",
  "global": "global_macro",
  "macro": "global_macro",
  "global macro": "global_macro",
  "fx": "global_macro",
  "crypto": "crypto_defi",
  "defi": "crypto_defi",
  "crypto defi": "crypto_defi",
  "stablecoins": "crypto_defi",
  "reply": "reply_target",
  "replies": "reply_target",
  "reply target": "reply_target",
  "reply targets": "reply_target"
};

const PRIORITY_WORDS: Record<string, Priority> = {
  "1": 1,
  "p1": 1,
  "high": 1,
  "urgent": 1,
  "top": 1,
  "critical": 1,
  "2": 2,
  "p2": 2,
  "medium": 2,
  "normal": 2,
  "default": 2,
  "mid": 2,
  "3": 3,
  "p3": 3,
  "low": 3,
  "minor": 3
};

export type Normalized<T> = { kind: "ok"; value: T } | { kind: "missing" } | { kind: "invalid"; raw: string };

function aliasKey(raw: string): string {
  return raw.toLowerCase().replace(/[_-]+/g, " ").replace(/\s+/g, " ").trim();
}

export function normalizePillar(raw: string): Pillar | null {
  const lower = raw.trim().toLowerCase();
  if (isPillar(lower)) return lower;
  return PILLAR_ALIASES[aliasKey(raw)] ?? null;
}

/** Canonical pillars in input order, plus the inputs that matched nothing. */
export function normalizePillars(raw: readonly unknown[]): { pillars: Pillar[]; unknown: string[] } {
  const pillars: Pillar[] = [];
  const unknown: string[] = [];
  for (const item of raw) {
    if (typeof item !== "string" || !item.trim()) continue;
    const p = normalizePillar(item);
    if (!p) unknown.push(item.trim());
    else if (!pillars.includes(p)) pillars.push(p);
  }
  return { pillars, unknown };
}

function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Pillars mentioned anywhere in a free-text message, in order of appearance.
 * Longer aliases win over their prefixes ("market commentary" before "market").
 */
export function extractPillarsFromText(text: string): Pillar[] {
  const haystack = aliasKey(text);
  const hits: Array<{ at: number; pillar: Pillar }> = [];
  const taken: Array<[number, number]> = [];

  const aliases = Object.keys(PILLAR_ALIASES).sort((a, b) => b.length - a.length);
  for (const alias of aliases) {
    const re = new RegExp(`\\b${escapeRegExp(alias)}\\b`, "g");
    for (const m of haystack.matchAll(re)) {
      const start = m.index ?? 0;
      const end = start + alias.length;
      if (taken.some(([s, e]) => start < e && end > s)) continue;
      taken.push([start, end]);
      const pillar = PILLAR_ALIASES[alias];
      if (pillar) hits.push({ at: start, pillar });
    }
  }

  const out: Pillar[] = [];
  for (const h of hits.sort((a, b) => a.at - b.at)) {
    if (!out.includes(h.pillar)) out.push(h.pillar);
  }
  return out;
}

export function normalizeCategory(raw: unknown): Normalized<Category> {
  if (raw === undefined || raw === null || (typeof raw === "string" && !raw.trim())) return { kind: "missing" };
  if (typeof raw !== "string") return { kind: "invalid", raw: String(raw) };
  const lower = raw.trim().toLowerCase();
  if (isCategory(lower)) return { kind: "ok", value: lower };
  const alias = CATEGORY_ALIASES[aliasKey(raw)];
  return alias ? { kind: "ok", value: alias } : { kind: "invalid", raw: raw.trim() };
}

export function normalizePriority(raw: unknown): Normalized<Priority> {
  if (raw === undefined || raw === null || (typeof raw === "string" && !raw.trim())) return { kind: "missing" };
  const key = typeof raw === "number" ? String(raw) : typeof raw === "string" ? aliasKey(raw).replace(/\s*priority$/, "") : "";
  const value = PRIORITY_WORDS[key];
  return value ? { kind: "ok", value } : { kind: "invalid", raw: String(raw) };
}

// Handles

const HANDLE_RE = /^[A-Za-z0-9_]{1,15}$/;
export const FUZZY_MIN_SCORE = 0.6;
export const AMBIGUITY_MARGIN = 0.1;

export type HandleResolution =
  | { kind: "exact"; handle: string }
  | { kind: "fuzzy"; handle: string; score: number }
  | { kind: "ambiguous"; candidates: [string, string] }
  | { kind: "unknown"; handle: string };

/** Strip `@`, a leading "the", spaces and URL prefixes from a user-typed handle. */
export function cleanHandle(raw: string): string {
  return raw
    .trim()
    .replace(/^https?:\/\/(www\.)?(x|twitter)\.com\//i, "")
    .replace(/^@/, "")
    .replace(/^the\s+/i, "")
    .replace(/\s+/g, "");
}

export function isValidHandle(handle: string): boolean {
  return HANDLE_RE.test(handle);
}

function handleKey(h: string): string {
  return h.toLowerCase().replace(/[^a-z0-9]/g, "");
}

/** 0-1 closeness of a typed handle to a known one. */
export function handleSimilarity(query: string, candidate: string): number {
  const q = handleKey(query);
  const c = handleKey(candidate);
  if (!q || !c) return 0;
  if (q === c) return 1;

  let containment = 0;
  const [short, long] = q.length <= c.length ? [q, c] : [c, q];
  if (short.length >= 3 && long.includes(short)) {
    containment = 0.6 + 0.4 * (short.length / long.length);
  }
  return Math.max(containment, diceCoefficient(q, c));
}

/**
 * Map a typed handle to a known account handle. Exact (case-insensitive)
 * matches win; otherwise the best fuzzy candidate above FUZZY_MIN_SCORE,
 * unless the runner-up is within AMBIGUITY_MARGIN of it.
 */
export function resolveHandle(raw: string, known: readonly string[]): HandleResolution {
  const cleaned = cleanHandle(raw);
  const key = handleKey(cleaned);

  const exact = known.find((k) => handleKey(k) === key);
  if (exact) return { kind: "exact", handle: exact };

  const ranked = known
    .map((handle) => ({ handle, score: handleSimilarity(cleaned, handle) }))
    .filter((c) => c.score >= FUZZY_MIN_SCORE)
    .sort((a, b) => b.score - a.score);

  const [best, second] = ranked;
  if (!best) return { kind: "unknown", handle: cleaned };
  if (second && best.score - second.score < AMBIGUITY_MARGIN) {
    return { kind: "ambiguous", candidates: [best.handle, second.handle] };
  }
  return { kind: "fuzzy", handle: best.handle, score: best.score };
}
