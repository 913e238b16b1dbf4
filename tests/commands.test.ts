import { describe, it, expect } from "vitest";
import { parseCommand } from "../src/social/commands.js";

describe("parseCommand", () => {
  it("ignores text that is not a command", () => {
    expect(parseCommand("add kobeissi as a voice")).toBeNull();
  });

  it("parses add-voice with several pillars", () => {
    expect(parseCommand("!add-voice @KobeissiLetter market commentary, education")).toEqual({
      ok: true,
      command: { name: "add-voice", handle: "KobeissiLetter", pillars: ["market_commentary", "education"] }
    });
  });

  it("rejects add-voice without pillars", () => {
    expect(parseCommand("!add-voice @KobeissiLetter")).toEqual({
      ok: false,
      usage: "Usage: `!add-voice @handle pillar[, pillar]` (pillars: market_commentary, education, product, social_proof)"
    });
  });

  it("defaults add-monitor priority to 2", () => {
    expect(parseCommand("!add-monitor @naira_watch nigeria")).toEqual({
      ok: true,
      command: { name: "add-monitor", handle: "naira_watch", category: "nigeria", priority: 2 }
    });
    expect(parseCommand("!add-monitor naira_watch naira high")).toEqual({
      ok: true,
      command: { name: "add-monitor", handle: "naira_watch", category: "nigeria", priority: 1 }
    });
  });

  it("rejects an unknown category", () => {
    expect(parseCommand("!add-monitor @naira_watch sports")?.ok).toBe(false);
  });

  it("parses generate with a two-word pillar and a topic", () => {
    expect(parseCommand("!gen market commentary naira outlook")).toEqual({
      ok: true,
      command: { name: "generate", pillar: "market_commentary", topic: "naira outlook" }
    });
    expect(parseCommand("!generate education")).toEqual({ ok: true, command: { name: "generate", pillar: "education" } });
    expect(parseCommand("!generate memes")?.ok).toBe(false);
  });

  it("accepts aliases and any case", () => {
    expect(parseCommand("!LIST-MONITORS crypto")).toEqual({ ok: true, command: { name: "list-monitors", category: "crypto_defi" } });
    expect(parseCommand("!list-voice")).toEqual({ ok: true, command: { name: "list-voices" } });
    expect(parseCommand("!weekly-batch")).toEqual({ ok: true, command: { name: "weekly" } });
  });

  it("gives usage for a missing handle and a hint for unknown commands", () => {
    expect(parseCommand("!remove")).toEqual({ ok: false, usage: "Usage: `!remove @handle`" });
    expect(parseCommand("!frobnicate now")).toEqual({ ok: false, usage: "Unknown command `!frobnicate`. Try `!help`." });
  });
});
