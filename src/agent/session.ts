import type { Pillar } from "../domain.js";
import { StateConflictError } from "../errors.js";
import { logger } from "../logger.js";
import type { FeedbackStore } from "../store/types.js";
import { KeyedMutex, systemClock, type Clock } from "../utils.js";
import type { LearningExtractor } from "./learnings.js";

export type SessionStatus = "iterating" | "approved" | "learnings_pending" | "complete";

export type DraftVersion = {
  version: number;
  content: string;
  revisionRequest: string | null;
  createdAt: number;
  /** Chat message that displayed this version, once sent. */
  messageId: string | null;
};

export type DraftSession = {
  threadId: string;
  channelId: string;
  pillar: Pillar;
  topic: string;
  /** The brief the first version was generated from. */
  prompt: string;
  versions: DraftVersion[];
  status: SessionStatus;
  /** Null until someone claims the thread (alert and batch drafts). */
  ownerId: string | null;
  createdAt: number;
  approvedAt: number | null;
  pendingLearnings: string[];
};

export type NewSession = {
  threadId: string;
  channelId: string;
  pillar: Pillar;
  topic: string;
  prompt: string;
  content: string;
  ownerId: string | null;
};

/** Produces the next draft from the session's full history plus the newest request. */
export interface DraftReviser {
  revise(session: DraftSession, request: string): Promise<string>;
}

export type ReviseOutcome =
  | { kind: "revised"; version: DraftVersion }
  | { kind: "cap_reached"; maxVersions: number }
  | { kind: "not_owner"; ownerId: string };

export type ApproveOutcome =
  | { kind: "complete" }
  | { kind: "learnings_pending"; learnings: string[] }
  | { kind: "not_owner"; ownerId: string };

export type ConfirmOutcome =
  | { kind: "discarded"; count: number }
  | { kind: "persisted"; learnings: string[] }
  | { kind: "not_owner"; ownerId: string };

export type SessionManagerOptions = {
  maxVersions: number;
  retentionMs: number;
  now?: Clock;
};

const NEGATIVE_REPLY = /^\s*(no|nope|nah|none|discard|skip|don't|do not)\b/i;

export function isNegativeReply(text: string): boolean {
  return NEGATIVE_REPLY.test(text);
}

/**
 * Owns every draft session, keyed by chat thread. Mutations of one thread run
 * one at a time; different threads proceed independently.
 *
 *   iterating ──revise──▶ iterating
 *   iterating ──approve──▶ approved ──▶ complete             (one version)
 *                                  └──▶ learnings_pending ──confirm──▶ complete
 */
export class SessionManager {
  private readonly sessions = new Map<string, DraftSession>();
  private readonly threadByMessage = new Map<string, string>();
  private readonly locks = new KeyedMutex();
  private readonly now: Clock;

  constructor(
    private readonly reviser: DraftReviser,
    private readonly extractor: Pick<LearningExtractor, "extract" | "filterExcept">,
    private readonly feedback: FeedbackStore,
    private readonly opts: SessionManagerOptions
  ) {
    this.now = opts.now ?? systemClock;
  }

  get size(): number {
    return this.sessions.size;
  }

  get(threadId: string): DraftSession | undefined {
    return this.sessions.get(threadId);
  }

  /** Thread of the draft whose version was shown in `messageId`. */
  threadForMessage(messageId: string): string | undefined {
    return this.threadByMessage.get(messageId);
  }

  create(input: NewSession): DraftSession {
    const existing = this.sessions.get(input.threadId);
    if (existing && existing.status !== "complete") {
      throw new StateConflictError("a draft is already active in this thread");
    }
    const t = this.now();
    const session: DraftSession = {
      threadId: input.threadId,
      channelId: input.channelId,
      pillar: input.pillar,
      topic: input.topic,
      prompt: input.prompt,
      versions: [{ version: 0, content: input.content, revisionRequest: null, createdAt: t, messageId: null }],
      status: "iterating",
      ownerId: input.ownerId,
      createdAt: t,
      approvedAt: null,
      pendingLearnings: []
    };
    this.sessions.set(input.threadId, session);
    logger.info("session.created", { threadId: input.threadId, pillar: input.pillar, owner: input.ownerId });
    return session;
  }

  /** Remember which chat message shows a version so reactions can find it. */
  attachMessage(threadId: string, version: number, messageId: string): void {
    const session = this.sessions.get(threadId);
    const v = session?.versions[version];
    if (!v) return;
    v.messageId = messageId;
    this.threadByMessage.set(messageId, threadId);
  }

  private require(threadId: string): DraftSession {
    const session = this.sessions.get(threadId);
    if (!session) throw new StateConflictError("no active draft in this thread");
    return session;
  }

  private requireStatus(session: DraftSession, status: SessionStatus): void {
    if (session.status !== status) {
      throw new StateConflictError(`draft is ${session.status}, expected ${status}`);
    }
  }

  /** First responder wins: an unowned session is claimed by the first user to act on it. */
  private claim(session: DraftSession, userId: string): { ok: true } | { ok: false; ownerId: string } {
    if (session.ownerId === null) {
      session.ownerId = userId;
      logger.info("session.claimed", { threadId: session.threadId, owner: userId });
      return { ok: true };
    }
    return session.ownerId === userId ? { ok: true } : { ok: false, ownerId: session.ownerId };
  }

  revise(threadId: string, userId: string, request: string): Promise<ReviseOutcome> {
    return this.locks.run(threadId, async () => {
      const session = this.require(threadId);
      this.requireStatus(session, "iterating");

      const owner = this.claim(session, userId);
      if (!owner.ok) return { kind: "not_owner", ownerId: owner.ownerId };

      if (session.versions.length >= this.opts.maxVersions) {
        logger.info("session.revision_cap", { threadId, versions: session.versions.length });
        return { kind: "cap_reached", maxVersions: this.opts.maxVersions };
      }

      const content = await this.reviser.revise(session, request);
      const version: DraftVersion = {
        version: session.versions.length,
        content,
        revisionRequest: request,
        createdAt: this.now(),
        messageId: null
      };
      session.versions.push(version);
      logger.info("session.revised", { threadId, version: version.version });
      return { kind: "revised", version };
    });
  }

  /**
   * Approve the latest version. `viaMessageId` is set for reaction approvals
   * and must point at the latest version.
   */
  approve(threadId: string, userId: string, viaMessageId?: string): Promise<ApproveOutcome> {
    return this.locks.run(threadId, async () => {
      const session = this.require(threadId);
      this.requireStatus(session, "iterating");

      const latest = session.versions[session.versions.length - 1];
      if (viaMessageId !== undefined && latest?.messageId !== viaMessageId) {
        throw new StateConflictError("reaction is not on the latest version");
      }

      const owner = this.claim(session, userId);
      if (!owner.ok) return { kind: "not_owner", ownerId: owner.ownerId };

      session.status = "approved";
      session.approvedAt = this.now();

      if (session.versions.length <= 1) {
        session.status = "complete";
        logger.info("session.approved", { threadId, versions: 1 });
        return { kind: "complete" };
      }

      const learnings = await this.extractor.extract(session.pillar, session.versions);
      session.pendingLearnings = learnings;
      session.status = "learnings_pending";
      logger.info("session.approved", { threadId, versions: session.versions.length, learnings: learnings.length });
      return { kind: "learnings_pending", learnings };
    });
  }

  /**
   * Resolve staged learnings: a negative reply discards them, "except ..."
   * drops the named ones, anything else keeps all. Ends in complete.
   */
  confirmLearnings(threadId: string, userId: string, response: string): Promise<ConfirmOutcome> {
    return this.locks.run(threadId, async () => {
      const session = this.require(threadId);
      this.requireStatus(session, "learnings_pending");

      const owner = this.claim(session, userId);
      if (!owner.ok) return { kind: "not_owner", ownerId: owner.ownerId };

      const pending = session.pendingLearnings;
      if (isNegativeReply(response)) {
        session.pendingLearnings = [];
        session.status = "complete";
        logger.info("session.learnings_discarded", { threadId, count: pending.length });
        return { kind: "discarded", count: pending.length };
      }

      const kept = /\bexcept\b/i.test(response) ? await this.extractor.filterExcept(pending, response) : [...pending];

      if (kept.length > 0) {
        const first = session.versions[0];
        const last = session.versions[session.versions.length - 1];
        await this.feedback.addFeedback({
          pillar: session.pillar,
          originalContent: first?.content ?? "",
          finalContent: last?.content ?? null,
          learnings: kept,
          threadId: session.threadId,
          sessionCreatedAt: new Date(session.createdAt).toISOString()
        });
      }

      session.pendingLearnings = [];
      session.status = "complete";
      logger.info("session.learnings_persisted", { threadId, count: kept.length, proposed: pending.length });
      return { kind: "persisted", learnings: kept };
    });
  }

  /**
   * Drop complete sessions and any session older than the retention window.
   * Staged learnings of an evicted session are discarded, never persisted.
   */
  evictExpired(): number {
    const cutoff = this.now() - this.opts.retentionMs;
    let removed = 0;
    for (const [threadId, session] of this.sessions) {
      if (session.status !== "complete" && session.createdAt >= cutoff) continue;
      if (session.status === "learnings_pending" && session.pendingLearnings.length > 0) {
        logger.info("session.evicted_with_pending", { threadId, discarded: session.pendingLearnings.length });
      }
      this.sessions.delete(threadId);
      for (const v of session.versions) {
        if (v.messageId) this.threadByMessage.delete(v.messageId);
      }
      removed++;
    }
    if (removed > 0) logger.info("session.evicted", { removed, remaining: this.sessions.size });
    return removed;
  }
}
