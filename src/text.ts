/**
 * Text comparison helpers shared by handle resolution and learning filters.
 */

/**
 * Normalize text for comparison:
 * - Lowercase
 * - Remove URLs
 * - Remove common punctuation
 * - Collapse whitespace
 */
export function normalizeText(text: string): string {
  return text
    .toLowerCase()
    .replace(/https?:\/\/[^\s]+/g, "")
    .replace(/[.,!?;:'"()\[\]{}]/g, " ")
    .replace(/\s+/g, " ")
    .trim();
}

const STOPWORDS = new Set([
  "the", "and", "for", "with", "that", "this", "from", "into", "about", "more", "less",
  "use", "using", "keep", "make", "should", "than", "them", "they", "your", "our", "its"
]);

/** Words of 3+ letters that carry meaning. */
export function significantWords(text: string): Set<string> {
  return new Set(
    normalizeText(text)
      .split(" ")
      .filter((w) => w.length >= 3 && !STOPWORDS.has(w))
  );
}

/**
 * Word-set similarity (0-1 scale).
 * 1 = identical, 0 = completely different
 */
export function wordSimilarity(text1: string, text2: string): number {
  const a = normalizeText(text1);
  const b = normalizeText(text2);
  if (a === b) return 1.0;

  const words1 = new Set(a.split(" ").filter(Boolean));
  const words2 = new Set(b.split(" ").filter(Boolean));
  const intersection = [...words1].filter((w) => words2.has(w));
  const union = new Set([...words1, ...words2]);

  if (union.size === 0) return 0;
  return intersection.length / union.size;
}

function bigrams(s: string): Map<string, number> {
  const out = new Map<string, number>();
  for (let i = 0; i < s.length - 1; i++) {
    const bg = s.slice(i, i + 2);
    out.set(bg, (out.get(bg) ?? 0) + 1);
  }
  return out;
}

/** Sørensen-Dice coefficient over character bigrams. */
export function diceCoefficient(a: string, b: string): number {
  if (a === b) return 1;
  if (a.length < 2 || b.length < 2) return 0;
  const ba = bigrams(a);
  const bb = bigrams(b);
  let overlap = 0;
  for (const [bg, n] of ba) overlap += Math.min(n, bb.get(bg) ?? 0);
  return (2 * overlap) / (a.length - 1 + (b.length - 1));
}
