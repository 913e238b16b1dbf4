import { describe, it, expect, vi } from "vitest";
import { LearningExtractor } from "../src/agent/learnings.js";
import { isNegativeReply, SessionManager, type DraftSession, type NewSession } from "../src/agent/session.js";
import { StateConflictError } from "../src/errors.js";
import { FileStore } from "../src/store/fileStore.js";
import { NO_RETRY, ScriptedLlm } from "./helpers.js";

const LEARNINGS_REPLY = '{"learnings": ["Lead with the number", "Avoid hype words"]}';

function draft(overrides: Partial<NewSession> = {}): NewSession {
  return {
    threadId: "t-1",
    channelId: "C1",
    pillar: "market_commentary",
    topic: "naira",
    prompt: "Write about the naira",
    content: "first draft",
    ownerId: "U1",
    ...overrides
  };
}

function setup(opts: { maxVersions?: number; retentionMs?: number; llmReplies?: string[] } = {}) {
  let clock = 1_000_000;
  const store = FileStore.inMemory(() => clock);
  const reviser = {
    revise: vi.fn(async (session: DraftSession, request: string) => `v${session.versions.length}: ${request}`)
  };
  const llm = new ScriptedLlm(opts.llmReplies ?? [], { learnings: LEARNINGS_REPLY });
  const sessions = new SessionManager(reviser, new LearningExtractor(llm, NO_RETRY), store, {
    maxVersions: opts.maxVersions ?? 10,
    retentionMs: opts.retentionMs ?? 60_000,
    now: () => clock
  });
  return {
    store,
    reviser,
    llm,
    sessions,
    advance(ms: number) {
      clock += ms;
    }
  };
}

describe("isNegativeReply", () => {
  it("recognizes refusals", () => {
    expect(isNegativeReply("no")).toBe(true);
    expect(isNegativeReply("Nope, none of them")).toBe(true);
    expect(isNegativeReply("yes")).toBe(false);
    expect(isNegativeReply("know what, save them")).toBe(false);
  });
});

describe("SessionManager", () => {
  it("starts at version 0 and refuses a second active draft in the thread", () => {
    const { sessions } = setup();
    const s = sessions.create(draft());
    expect(s.status).toBe("iterating");
    expect(s.versions.map((v) => v.version)).toEqual([0]);
    expect(() => sessions.create(draft())).toThrow(StateConflictError);
  });

  it("appends contiguous versions with their requests", async () => {
    const { sessions } = setup();
    sessions.create(draft());
    await sessions.revise("t-1", "U1", "shorter");
    const out = await sessions.revise("t-1", "U1", "add a number");

    expect(out).toMatchObject({ kind: "revised", version: { version: 2, content: "v2: add a number", revisionRequest: "add a number" } });
    expect(sessions.get("t-1")?.versions.map((v) => v.version)).toEqual([0, 1, 2]);
  });

  it("refuses revisions from someone other than the owner", async () => {
    const { sessions, reviser } = setup();
    sessions.create(draft());
    expect(await sessions.revise("t-1", "U2", "shorter")).toEqual({ kind: "not_owner", ownerId: "U1" });
    expect(reviser.revise).not.toHaveBeenCalled();
  });

  it("gives an unowned draft to the first responder", async () => {
    const { sessions } = setup();
    sessions.create(draft({ ownerId: null }));
    expect((await sessions.revise("t-1", "U2", "shorter")).kind).toBe("revised");
    expect(sessions.get("t-1")?.ownerId).toBe("U2");
    expect(await sessions.revise("t-1", "U3", "longer")).toEqual({ kind: "not_owner", ownerId: "U2" });
  });

  it("stops at the version cap", async () => {
    const { sessions, reviser } = setup({ maxVersions: 3 });
    sessions.create(draft());
    await sessions.revise("t-1", "U1", "a");
    await sessions.revise("t-1", "U1", "b");
    expect(await sessions.revise("t-1", "U1", "c")).toEqual({ kind: "cap_reached", maxVersions: 3 });
    expect(reviser.revise).toHaveBeenCalledTimes(2);
    expect(sessions.get("t-1")?.versions).toHaveLength(3);
  });

  it("completes a single-version approval without extracting learnings", async () => {
    const { sessions, llm } = setup();
    sessions.create(draft());
    expect(await sessions.approve("t-1", "U1")).toEqual({ kind: "complete" });
    expect(sessions.get("t-1")?.status).toBe("complete");
    expect(llm.calls).toHaveLength(0);
  });

  it("stages learnings after a revised draft is approved", async () => {
    const { sessions } = setup();
    sessions.create(draft());
    await sessions.revise("t-1", "U1", "shorter");
    expect(await sessions.approve("t-1", "U1")).toEqual({
      kind: "learnings_pending",
      learnings: ["Lead with the number", "Avoid hype words"]
    });
    expect(sessions.get("t-1")?.status).toBe("learnings_pending");
  });

  it("discards staged learnings on a negative reply", async () => {
    const { sessions, store } = setup();
    sessions.create(draft());
    await sessions.revise("t-1", "U1", "shorter");
    await sessions.approve("t-1", "U1");

    expect(await sessions.confirmLearnings("t-1", "U1", "no thanks")).toEqual({ kind: "discarded", count: 2 });
    expect(sessions.get("t-1")?.status).toBe("complete");
    expect(await store.recentFeedback("market_commentary", 10)).toEqual([]);
  });

  it("persists confirmed learnings with the first and final drafts", async () => {
    const { sessions, store } = setup();
    sessions.create(draft());
    await sessions.revise("t-1", "U1", "shorter");
    await sessions.approve("t-1", "U1");

    expect(await sessions.confirmLearnings("t-1", "U1", "yes")).toEqual({
      kind: "persisted",
      learnings: ["Lead with the number", "Avoid hype words"]
    });
    const [saved] = await store.recentFeedback("market_commentary", 10);
    expect(saved).toMatchObject({
      pillar: "market_commentary",
      originalContent: "first draft",
      finalContent: "v1: shorter",
      learnings: ["Lead with the number", "Avoid hype words"],
      threadId: "t-1"
    });
  });

  it("drops the learnings named in an except reply", async () => {
    const { sessions, store } = setup();
    sessions.create(draft());
    await sessions.revise("t-1", "U1", "shorter");
    await sessions.approve("t-1", "U1");

    const out = await sessions.confirmLearnings("t-1", "U1", "yes except 2");
    expect(out).toEqual({ kind: "persisted", learnings: ["Lead with the number"] });
    expect((await store.recentFeedback("market_commentary", 10))[0]?.learnings).toEqual(["Lead with the number"]);
  });

  it("serializes concurrent revise and approve calls on one thread", async () => {
    const { sessions, reviser } = setup();
    let active = 0;
    let maxActive = 0;
    reviser.revise.mockImplementation(async (session: DraftSession, request: string) => {
      active++;
      maxActive = Math.max(maxActive, active);
      await new Promise((resolve) => setTimeout(resolve, 10));
      active--;
      return `v${session.versions.length}: ${request}`;
    });
    sessions.create(draft());

    const [first, second, approval] = await Promise.all([
      sessions.revise("t-1", "U1", "shorter"),
      sessions.revise("t-1", "U1", "add a number"),
      sessions.approve("t-1", "U1")
    ]);

    expect(maxActive).toBe(1);
    expect(first).toMatchObject({ kind: "revised", version: { version: 1, content: "v1: shorter" } });
    expect(second).toMatchObject({ kind: "revised", version: { version: 2, content: "v2: add a number" } });
    expect(approval.kind).toBe("learnings_pending");
    const session = sessions.get("t-1");
    expect(session?.versions.map((v) => v.version)).toEqual([0, 1, 2]);
    expect(session?.status).toBe("learnings_pending");
  });

  it("keeps other threads moving while one revision is slow", async () => {
    const { sessions, reviser } = setup();
    const order: string[] = [];
    reviser.revise.mockImplementation(async (session: DraftSession, request: string) => {
      if (session.threadId === "t-slow") await new Promise((resolve) => setTimeout(resolve, 30));
      order.push(session.threadId);
      return `v${session.versions.length}: ${request}`;
    });
    sessions.create(draft({ threadId: "t-slow" }));
    sessions.create(draft({ threadId: "t-fast" }));

    await Promise.all([sessions.revise("t-slow", "U1", "a"), sessions.revise("t-fast", "U1", "b")]);

    expect(order).toEqual(["t-fast", "t-slow"]);
  });

  it("approves by reaction only on the latest version", async () => {
    const { sessions } = setup();
    sessions.create(draft());
    sessions.attachMessage("t-1", 0, "m-0");
    await sessions.revise("t-1", "U1", "shorter");
    sessions.attachMessage("t-1", 1, "m-1");

    expect(sessions.threadForMessage("m-0")).toBe("t-1");
    await expect(sessions.approve("t-1", "U1", "m-0")).rejects.toThrow(StateConflictError);
    expect((await sessions.approve("t-1", "U1", "m-1")).kind).toBe("learnings_pending");
  });

  it("rejects operations in the wrong state", async () => {
    const { sessions } = setup();
    await expect(sessions.revise("missing", "U1", "x")).rejects.toThrow("no active draft in this thread");
    sessions.create(draft());
    await sessions.approve("t-1", "U1");
    await expect(sessions.revise("t-1", "U1", "x")).rejects.toThrow("draft is complete, expected iterating");
    await expect(sessions.confirmLearnings("t-1", "U1", "yes")).rejects.toThrow(StateConflictError);
  });

  it("allows a new draft in a thread once the previous one is complete", async () => {
    const { sessions } = setup();
    sessions.create(draft());
    await sessions.approve("t-1", "U1");
    expect(sessions.create(draft({ content: "second" })).versions[0]?.content).toBe("second");
  });

  it("evicts complete and expired sessions", async () => {
    const { sessions, advance } = setup({ retentionMs: 60_000 });
    sessions.create(draft({ threadId: "done" }));
    await sessions.approve("done", "U1");
    sessions.create(draft({ threadId: "old" }));
    sessions.attachMessage("old", 0, "m-old");
    advance(30_000);
    sessions.create(draft({ threadId: "fresh" }));
    advance(30_001);

    expect(sessions.evictExpired()).toBe(2);
    expect(sessions.get("fresh")?.status).toBe("iterating");
    expect(sessions.get("old")).toBeUndefined();
    expect(sessions.threadForMessage("m-old")).toBeUndefined();
    expect(sessions.size).toBe(1);
  });
});
