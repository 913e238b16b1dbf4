import type { XReader, XUser } from "../../social/x_api.js";
import type { FetchResult, PollTarget, RawItem, SourceFetcher } from "../types.js";

/**
 * Pulls an account's new original posts since its cursor (the last seen
 * tweet id). Resolves and reports the X user id the first time round.
 */
export class XTimelineFetcher implements SourceFetcher {
  constructor(
    private readonly x: XReader,
    private readonly onUserResolved: (targetId: string, user: XUser) => Promise<void>,
    private readonly now: () => number = Date.now,
    private readonly maxResults = 10
  ) {}

  async fetch(target: PollTarget): Promise<FetchResult> {
    let userId = target.userId;
    if (!userId) {
      const user = await this.x.lookupUser(target.locator);
      if (!user) throw new Error(`X account not found: @${target.locator}`);
      userId = user.id;
      await this.onUserResolved(target.id, user);
    }

    const fetchedAtMs = this.now();
    const timeline = await this.x.userTweets(userId, target.locator, {
      sinceId: target.cursor,
      maxResults: this.maxResults
    });

    const items = timeline.tweets.map((t): RawItem => {
      const publishedAtMs = t.createdAt ? Date.parse(t.createdAt) : NaN;
      return {
        kind: "tweet",
        externalId: t.id,
        sourceId: target.id,
        sourceLabel: target.label,
        text: t.text,
        url: t.url,
        publishedAtMs: Number.isFinite(publishedAtMs) ? publishedAtMs : null,
        fetchedAtMs
      };
    });

    return { items, nextCursor: timeline.newestId };
  }
}
