import { describe, it, expect } from "vitest";
import { decide, finalizeIntent, IntentRouter, parseIntentReply, type IntentResult } from "../src/agent/intent.js";
import { NO_RETRY, ScriptedLlm } from "./helpers.js";

const KNOWN = ["KobeissiLetter", "CBNgov", "CBNnews"];

function router(llm: ScriptedLlm): IntentRouter {
  return new IntentRouter(llm, NO_RETRY, async () => KNOWN);
}

function reply(intent: string, confidence: number, entities: Record<string, unknown> = {}): string {
  return JSON.stringify({ intent, confidence, entities });
}

describe("parseIntentReply", () => {
  it("clamps confidence and maps unknown intent names", () => {
    expect(parseIntentReply(reply("delete_everything", 1.4))).toEqual({
      intent: "unknown",
      confidence: 1,
      entities: {},
      clarification: null
    });
  });

  it("returns null for prose", () => {
    expect(parseIntentReply("I think they want to add a voice")).toBeNull();
  });
});

describe("IntentRouter.classify", () => {
  it("resolves a fuzzy handle and canonical pillars", async () => {
    const llm = new ScriptedLlm([
      reply("add_voice", 0.9, { handle: "kobeissi", pillars: ["market commentary"] })
    ]);
    const result = await router(llm).classify("add kobeissi as a voice for market commentary");
    expect(result).toEqual({
      intent: "add_voice",
      confidence: 0.9,
      entities: { handle: "KobeissiLetter", pillars: ["market_commentary"] },
      clarificationNeeded: null
    });
  });

  it("asks for missing pillars, then merges the follow-up", async () => {
    const llm = new ScriptedLlm([
      reply("add_voice", 0.85, { handle: "@KobeissiLetter" }),
      reply("unknown", 0.2)
    ]);
    const r = router(llm);

    const first = await r.classify("add @KobeissiLetter as a voice");
    expect(first.clarificationNeeded).toBe("Which pillars should @KobeissiLetter cover?");

    const second = await r.classify("market commentary", { previous: first, previousText: "add @KobeissiLetter as a voice" });
    expect(second).toEqual({
      intent: "add_voice",
      confidence: 0.85,
      entities: { handle: "KobeissiLetter", pillars: ["market_commentary"] },
      clarificationNeeded: null
    });
    expect(llm.calls[1]?.user).toContain("Assistant asked: Which pillars should @KobeissiLetter cover?");
  });

  it("asks which account when a handle is ambiguous", async () => {
    const llm = new ScriptedLlm([reply("remove_account", 0.9, { handle: "cbn" })]);
    const result = await router(llm).classify("stop watching cbn");
    expect(result.clarificationNeeded).toBe("Did you mean @CBNgov or @CBNnews?");
    expect(result.entities.handle).toBeUndefined();
  });

  it("requires an existing account for removal", async () => {
    const llm = new ScriptedLlm([reply("remove_account", 0.9, { handle: "nobody" })]);
    const result = await router(llm).classify("remove nobody");
    expect(result.clarificationNeeded).toBe("I couldn't find @nobody among the tracked accounts. Which account did you mean?");
  });

  it("normalizes monitor category and priority", async () => {
    const llm = new ScriptedLlm([
      reply("add_monitor", 0.9, { handle: "naira_watch", category: "naira", priority: "high" })
    ]);
    const result = await router(llm).classify("monitor naira_watch, high priority, nigeria");
    expect(result.entities).toEqual({ handle: "naira_watch", category: "nigeria", priority: 1 });
    expect(result.clarificationNeeded).toBeNull();
  });

  it("defaults monitor priority and asks for a missing category", async () => {
    const llm = new ScriptedLlm([reply("add_monitor", 0.9, { handle: "naira_watch" })]);
    const result = await router(llm).classify("monitor naira_watch");
    expect(result.entities.priority).toBe(2);
    expect(result.clarificationNeeded).toBe(
      "Which category should @naira_watch go under? (nigeria, argentina, colombia, global_macro, crypto_defi, reply_target)"
    );
  });

  it("flags an invalid priority", async () => {
    const llm = new ScriptedLlm([
      reply("add_monitor", 0.9, { handle: "naira_watch", category: "nigeria", priority: "urgent-ish" })
    ]);
    const result = await router(llm).classify("monitor naira_watch");
    expect(result.clarificationNeeded).toBe("Priority should be high, medium or low (1-3).");
  });

  it("falls back to unknown on a malformed reply or a failed call", async () => {
    const prose = await router(new ScriptedLlm(["Sure! Adding that voice now."])).classify("add a voice");
    expect(prose.intent).toBe("unknown");
    expect(prose.confidence).toBe(0);

    const failed = await router(new ScriptedLlm([new Error("rate limited")])).classify("add a voice");
    expect(failed.intent).toBe("unknown");
  });

  it("returns unknown for an empty message without calling the model", async () => {
    const llm = new ScriptedLlm();
    expect((await router(llm).classify("   ")).intent).toBe("unknown");
    expect(llm.calls).toHaveLength(0);
  });
});

describe("finalizeIntent", () => {
  it("keeps only one pillar for generate_post and carries the topic", () => {
    const result = finalizeIntent(
      { intent: "generate_post", confidence: 0.8, entities: { pillars: ["education", "product"], topic: " FX spreads " }, clarification: null },
      KNOWN
    );
    expect(result.entities).toEqual({ pillars: ["education"], topic: "FX spreads" });
  });
});

describe("decide", () => {
  const t = { execute: 0.7, confirm: 0.5, destructiveExecute: 0.8 };
  const r = (intent: IntentResult["intent"], confidence: number, clarificationNeeded: string | null = null): IntentResult => ({
    intent,
    confidence,
    entities: {},
    clarificationNeeded
  });

  it("maps confidence bands to actions", () => {
    expect(decide(r("add_voice", 0.7), t)).toEqual({ kind: "execute" });
    expect(decide(r("add_voice", 0.69), t)).toEqual({ kind: "confirm" });
    expect(decide(r("add_voice", 0.49), t)).toEqual({ kind: "help" });
    expect(decide(r("unknown", 0.95), t)).toEqual({ kind: "help" });
  });

  it("holds destructive intents to the higher bar", () => {
    expect(decide(r("remove_account", 0.75), t)).toEqual({ kind: "confirm" });
    expect(decide(r("remove_account", 0.8), t)).toEqual({ kind: "execute" });
  });

  it("asks the open question before anything else", () => {
    expect(decide(r("add_voice", 0.95, "Which pillars?"), t)).toEqual({ kind: "clarify", question: "Which pillars?" });
  });
});
