import type { CallOptions, LlmClient, LlmRequest } from "../src/agent/llm.js";
import type { PollTarget } from "../src/news/types.js";
import type { Timeline, TimelineQuery, XReader, XTweet, XUser } from "../src/social/x_api.js";

/** No retries, so failing calls return at once. */
export const NO_RETRY: CallOptions = { timeoutMs: 1_000, retries: 0 };

type Reply = string | Error | ((req: LlmRequest) => string);

/**
 * Fake LLM answering from a queue, or per purpose when given a map.
 * Records every request.
 */
export class ScriptedLlm implements LlmClient {
  readonly calls: LlmRequest[] = [];
  private readonly queue: Reply[];

  constructor(
    replies: Reply[] = [],
    private readonly byPurpose: Record<string, Reply> = {}
  ) {
    this.queue = [...replies];
  }

  async complete(req: LlmRequest): Promise<string> {
    this.calls.push(req);
    const reply = this.byPurpose[req.purpose] ?? this.queue.shift();
    if (reply === undefined) throw new Error(`no scripted reply for ${req.purpose}`);
    if (reply instanceof Error) throw reply;
    return typeof reply === "function" ? reply(req) : reply;
  }

  purposes(): string[] {
    return this.calls.map((c) => c.purpose);
  }
}

export function rssTarget(overrides: Partial<PollTarget> = {}): PollTarget {
  return {
    kind: "rss",
    id: "feed-1",
    label: "Test Feed",
    locator: "https://feeds.example.test/rss",
    userId: null,
    category: "nigeria",
    priority: 2,
    cursor: null,
    keywords: [],
    followerCount: null,
    ...overrides
  };
}

export function tweetTarget(overrides: Partial<PollTarget> = {}): PollTarget {
  return {
    kind: "tweet",
    id: "acct-1",
    label: "@testdesk",
    locator: "testdesk",
    userId: "42",
    category: "nigeria",
    priority: 2,
    cursor: null,
    keywords: [],
    followerCount: 1000,
    ...overrides
  };
}

export function xTweet(id: string, text: string, likes = 0): XTweet {
  return { id, text, createdAt: null, likes, retweets: 0, url: `https://x.com/test/status/${id}` };
}

/** In-process X reader: users by lowercase handle, timelines by user id. */
export class FakeX implements XReader {
  readonly timelineCalls: Array<{ userId: string; query: TimelineQuery | undefined }> = [];

  constructor(
    private readonly users: Record<string, XUser> = {},
    private readonly timelines: Record<string, Timeline> = {}
  ) {}

  async lookupUser(handle: string): Promise<XUser | null> {
    return this.users[handle.replace(/^@/, "").toLowerCase()] ?? null;
  }

  async userTweets(userId: string, _username: string, query?: TimelineQuery): Promise<Timeline> {
    this.timelineCalls.push({ userId, query });
    return this.timelines[userId] ?? { tweets: [], newestId: null };
  }
}
