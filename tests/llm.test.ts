import { describe, expect, it } from "vitest";
import { callLlm, parseJsonReply, type LlmClient, type LlmRequest } from "../src/agent/llm.js";
import { MalformedResponseError, TransientUpstreamError, UpstreamRejectedError } from "../src/errors.js";
import { ScriptedLlm } from "./helpers.js";

const REQ: LlmRequest = { purpose: "intent", system: "sys", user: "hello" };
const ONE_RETRY = { timeoutMs: 1_000, retries: 1, backoffMs: 0 };

describe("callLlm", () => {
  it("does not retry a refused call", async () => {
    const llm = new ScriptedLlm([new Error("401 Incorrect API key provided"), "unused"]);

    const err = await callLlm(llm, REQ, ONE_RETRY).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(UpstreamRejectedError);
    expect(err).toHaveProperty("message", "intent: 401 Incorrect API key provided");
    expect(llm.calls).toHaveLength(1);
  });

  it("retries a transient failure once", async () => {
    const llm = new ScriptedLlm([new Error("fetch failed"), "ok"]);
    await expect(callLlm(llm, REQ, ONE_RETRY)).resolves.toBe("ok");
    expect(llm.calls).toHaveLength(2);
  });

  it("gives up after the retry with a transient error", async () => {
    const llm = new ScriptedLlm([new Error("read ECONNRESET"), new Error("read ECONNRESET")]);

    const err = await callLlm(llm, { ...REQ, purpose: "relevance" }, ONE_RETRY).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(TransientUpstreamError);
    expect(err).toHaveProperty("message", "relevance: read ECONNRESET");
    expect(llm.calls).toHaveLength(2);
  });

  it("times out a call that never answers", async () => {
    const hanging: LlmClient = { complete: () => new Promise<string>(() => undefined) };

    const err = await callLlm(hanging, { ...REQ, purpose: "generate" }, { timeoutMs: 20, retries: 0 }).catch(
      (e: unknown) => e
    );

    expect(err).toBeInstanceOf(TransientUpstreamError);
    expect(err).toHaveProperty("message", "generate: LLM timeout after 20ms");
  });
});

describe("parseJsonReply", () => {
  it("reads a fenced object", () => {
    expect(parseJsonReply('```json\n{"intent": "help"}\n```')).toEqual({ intent: "help" });
  });

  it("reads an object wrapped in prose", () => {
    expect(parseJsonReply('Sure: {"score": 0.4} hope that helps')).toEqual({ score: 0.4 });
  });

  it("rejects plain text", () => {
    expect(() => parseJsonReply("no json here")).toThrow(MalformedResponseError);
  });
});
