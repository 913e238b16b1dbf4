/**
 * Closed approval vocabulary for draft threads. Text approves a draft when it
 * contains any phrase below (case-insensitive substring match); a reaction
 * approves when its name is in APPROVAL_REACTIONS.
 */
export const APPROVAL_PHRASES: readonly string[] = [
  "perfect",
  "done",
  "approved",
  "approve",
  "looks good",
  "lgtm",
  "ship it",
  "lock it",
  "good to go",
  "that's the one",
  "👍",
  "✅",
  "✔️",
  "☑️"
];

/** Reaction names as chat platforms report them (no colons). */
export const APPROVAL_REACTIONS: readonly string[] = [
  "+1",
  "thumbsup",
  "white_check_mark",
  "heavy_check_mark",
  "ballot_box_with_check",
  "100",
  "rocket"
];

export function isApprovalText(text: string): boolean {
  const haystack = text.toLowerCase();
  return APPROVAL_PHRASES.some((p) => haystack.includes(p));
}

export function isApprovalReaction(name: string): boolean {
  const bare = name.replace(/^:|:$/g, "").replace(/::skin-tone-\d$/, "").toLowerCase();
  return APPROVAL_REACTIONS.includes(bare);
}
