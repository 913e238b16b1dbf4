import { z } from "zod";
import { MalformedResponseError } from "../errors.js";
import { logger } from "../logger.js";
import { discardBody, fetchWithRetry, USER_AGENT, type FetchOptions } from "../news/http.js";

const API_BASE = "https://api.twitter.com/2";

export type XUser = {
  id: string;
  username: string;
  name: string | null;
  followersCount: number | null;
};

export type XTweet = {
  id: string;
  text: string;
  createdAt: string | null;
  likes: number;
  retweets: number;
  url: string;
};

export type TimelineQuery = {
  sinceId?: string | null;
  /** 5-100, as the API requires. */
  maxResults?: number;
};

/** Read-only slice of the X API the agent needs. */
export interface XReader {
  lookupUser(handle: string): Promise<XUser | null>;
  userTweets(userId: string, username: string, query?: TimelineQuery): Promise<Timeline>;
}

export type Timeline = {
  /** Original posts only (retweets dropped). */
  tweets: XTweet[];
  /** Highest id the API returned, retweets included; the next since_id. */
  newestId: string | null;
};

const UserResponseSchema = z.object({
  data: z
    .object({
      id: z.string(),
      username: z.string(),
      name: z.string().optional(),
      public_metrics: z.object({ followers_count: z.number() }).partial().optional()
    })
    .optional()
});

const TweetSchema = z.object({
  id: z.string(),
  text: z.string(),
  created_at: z.string().optional(),
  public_metrics: z.object({ like_count: z.number(), retweet_count: z.number() }).partial().optional(),
  referenced_tweets: z.array(z.object({ type: z.string() })).optional()
});

const TimelineResponseSchema = z.object({
  data: z.array(TweetSchema).optional()
});

/** Numeric comparison of tweet ids (snowflakes exceed 2^53). */
export function compareTweetIds(a: string, b: string): number {
  const x = BigInt(a);
  const y = BigInt(b);
  return x === y ? 0 : x > y ? 1 : -1;
}

/**
 * App-only (bearer token) X API v2 reader.
 */
export class XApiClient implements XReader {
  constructor(
    private readonly bearerToken: string,
    private readonly fetchOpts: FetchOptions = {}
  ) {}

  private async getJson(url: string): Promise<unknown> {
    const res = await fetchWithRetry(
      url,
      {
        headers: {
          Authorization: `Bearer ${this.bearerToken}`,
          "User-Agent": USER_AGENT
        }
      },
      { retries: this.fetchOpts.retries ?? 1, timeoutMs: this.fetchOpts.timeoutMs ?? 15000 }
    );
    if (!res.ok) await discardBody(res);
    if (res.status === 404) return null;
    if (!res.ok) throw new Error(`X API HTTP ${res.status}`);
    return await res.json();
  }

  async lookupUser(handle: string): Promise<XUser | null> {
    const username = handle.replace(/^@/, "");
    const json = await this.getJson(
      `${API_BASE}/users/by/username/${encodeURIComponent(username)}?user.fields=public_metrics,name`
    );
    if (json === null) return null;

    const parsed = UserResponseSchema.safeParse(json);
    if (!parsed.success) throw new MalformedResponseError("unexpected user lookup shape");
    const u = parsed.data.data;
    if (!u) return null;

    return {
      id: u.id,
      username: u.username,
      name: u.name ?? null,
      followersCount: u.public_metrics?.followers_count ?? null
    };
  }

  async userTweets(userId: string, username: string, query: TimelineQuery = {}): Promise<Timeline> {
    const max = Math.min(100, Math.max(5, query.maxResults ?? 10));
    let url =
      `${API_BASE}/users/${encodeURIComponent(userId)}/tweets?max_results=${max}` +
      "&tweet.fields=created_at,public_metrics,referenced_tweets&exclude=replies,retweets";
    // Only tweets newer than the cursor.
    if (query.sinceId) url += `&since_id=${encodeURIComponent(query.sinceId)}`;

    const json = await this.getJson(url);
    if (json === null) return { tweets: [], newestId: null };
    const parsed = TimelineResponseSchema.safeParse(json);
    if (!parsed.success) throw new MalformedResponseError("unexpected timeline shape");

    const raw = parsed.data.data ?? [];
    let newestId: string | null = null;
    for (const t of raw) {
      if (!newestId || compareTweetIds(t.id, newestId) > 0) newestId = t.id;
    }

    const tweets = raw
      .filter((t) => !t.text.startsWith("RT ") && !(t.referenced_tweets ?? []).some((r) => r.type === "retweeted"))
      .map((t) => ({
        id: t.id,
        text: t.text,
        createdAt: t.created_at ?? null,
        likes: t.public_metrics?.like_count ?? 0,
        retweets: t.public_metrics?.retweet_count ?? 0,
        url: `https://x.com/${username}/status/${t.id}`
      }));

    logger.debug("x.timeline.fetched", { username, count: tweets.length, sinceId: query.sinceId ?? "none", newestId });
    return { tweets, newestId };
  }
}
