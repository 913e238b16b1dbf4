import { CATEGORIES, PILLARS, type Category, type Pillar, type Priority } from "../domain.js";
import {
  cleanHandle,
  extractPillarsFromText,
  isValidHandle,
  normalizeCategory,
  normalizePillars,
  normalizePriority
} from "../agent/normalize.js";

export type Command =
  | { name: "add-voice"; handle: string; pillars: Pillar[] }
  | { name: "add-monitor"; handle: string; category: Category; priority: Priority }
  | { name: "remove"; handle: string }
  | { name: "list-voices" }
  | { name: "list-monitors"; category?: Category }
  | { name: "tag-voice"; handle: string; pillars: Pillar[] }
  | { name: "refresh-voices" }
  | { name: "generate"; pillar: Pillar; topic?: string }
  | { name: "weekly" }
  | { name: "help" };

export type ParsedCommand = { ok: true; command: Command } | { ok: false; usage: string };

const USAGE = {
  "add-voice": `Usage: \`!add-voice @handle pillar[, pillar]\` (pillars: ${PILLARS.join(", ")})`,
  "add-monitor": `Usage: \`!add-monitor @handle category [priority]\` (categories: ${CATEGORIES.join(", ")}; priority 1-3)`,
  remove: "Usage: `!remove @handle`",
  "list-monitors": `Usage: \`!list-monitors [category]\` (categories: ${CATEGORIES.join(", ")})`,
  "tag-voice": `Usage: \`!tag-voice @handle pillar[, pillar]\` (pillars: ${PILLARS.join(", ")})`,
  generate: `Usage: \`!generate pillar [topic]\` (pillars: ${PILLARS.join(", ")})`
} as const;

const ALIASES: Record<string, string> = {
  "list-voice": "list-voices",
  "refresh-voice": "refresh-voices",
  "list-monitor": "list-monitors",
  gen: "generate",
  "weekly-batch": "weekly"
};

function parseHandle(raw: string | undefined): string | null {
  if (!raw) return null;
  const h = cleanHandle(raw);
  return isValidHandle(h) ? h : null;
}

/** Comma-separated canonical names or aliases; falls back to scanning the words. */
function parsePillars(rest: string): Pillar[] {
  const { pillars, unknown } = normalizePillars(rest.split(","));
  if (unknown.length === 0) return pillars;
  const scanned = extractPillarsFromText(rest);
  return scanned.length > 0 ? scanned : [];
}

function pillarCommand(name: "add-voice" | "tag-voice", rawHandle: string | undefined, rest: string): ParsedCommand {
  const handle = parseHandle(rawHandle);
  const pillars = parsePillars(rest);
  if (!handle || pillars.length === 0) return { ok: false, usage: USAGE[name] };
  return { ok: true, command: { name, handle, pillars } };
}

/** Parse a `!command`. Returns null when the text is not a command at all. */
export function parseCommand(text: string): ParsedCommand | null {
  const trimmed = text.trim();
  if (!trimmed.startsWith("!")) return null;

  const [rawName = "", ...args] = trimmed.slice(1).trim().split(/\s+/);
  const lower = rawName.toLowerCase();
  const name = ALIASES[lower] ?? lower;
  const rest = args.slice(1).join(" ");

  switch (name) {
    case "add-voice":
      return pillarCommand("add-voice", args[0], rest);
    case "tag-voice":
      return pillarCommand("tag-voice", args[0], rest);
    case "add-monitor": {
      const handle = parseHandle(args[0]);
      const category = normalizeCategory(args[1]);
      const priority = normalizePriority(args[2]);
      if (!handle || category.kind !== "ok" || priority.kind === "invalid") return { ok: false, usage: USAGE["add-monitor"] };
      return {
        ok: true,
        command: { name: "add-monitor", handle, category: category.value, priority: priority.kind === "ok" ? priority.value : 2 }
      };
    }
    case "remove": {
      const handle = parseHandle(args[0]);
      return handle ? { ok: true, command: { name: "remove", handle } } : { ok: false, usage: USAGE.remove };
    }
    case "list-monitors": {
      if (args.length === 0) return { ok: true, command: { name: "list-monitors" } };
      const category = normalizeCategory(args.join(" "));
      return category.kind === "ok"
        ? { ok: true, command: { name: "list-monitors", category: category.value } }
        : { ok: false, usage: USAGE["list-monitors"] };
    }
    case "generate": {
      // Pillar may be one or two words ("market commentary").
      for (const take of [2, 1]) {
        if (args.length < take) continue;
        const { pillars, unknown } = normalizePillars([args.slice(0, take).join(" ")]);
        const pillar = pillars[0];
        if (pillar && unknown.length === 0) {
          const topic = args.slice(take).join(" ").trim();
          return { ok: true, command: topic ? { name: "generate", pillar, topic } : { name: "generate", pillar } };
        }
      }
      return { ok: false, usage: USAGE.generate };
    }
    case "list-voices":
      return { ok: true, command: { name: "list-voices" } };
    case "refresh-voices":
      return { ok: true, command: { name: "refresh-voices" } };
    case "weekly":
      return { ok: true, command: { name: "weekly" } };
    case "help":
      return { ok: true, command: { name: "help" } };
    default:
      return { ok: false, usage: `Unknown command \`!${rawName}\`. Try \`!help\`.` };
  }
}
