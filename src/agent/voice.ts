import type { Pillar } from "../domain.js";
import { errMessage, logger } from "../logger.js";
import type { MonitoredAccount, SourceStore, VoiceSample, VoiceSampleStore } from "../store/types.js";
import { systemClock, type Clock } from "../utils.js";
import type { XReader } from "../social/x_api.js";

export const SAMPLES_PER_ACCOUNT = 20;

export type VoiceStats = {
  handle: string;
  pillars: Pillar[];
  samples: number;
  topLikes: number | null;
  lastFetchedAt: string | null;
};

/** Collects top-performing posts from voice reference accounts as style exemplars. */
export class VoiceSampler {
  constructor(
    private readonly store: SourceStore & VoiceSampleStore,
    private readonly x: XReader | null,
    private readonly now: Clock = systemClock
  ) {}

  /** Fetch recent original posts and keep the most-liked ones. Returns how many were new. */
  async refresh(account: MonitoredAccount): Promise<number> {
    if (!this.x) throw new Error("X reader not configured (TWITTER_BEARER_TOKEN)");

    let userId = account.userId;
    if (!userId) {
      const user = await this.x.lookupUser(account.handle);
      if (!user) throw new Error(`X account not found: @${account.handle}`);
      userId = user.id;
      await this.store.updateAccount(account.id, {
        userId,
        displayName: user.name,
        followerCount: user.followersCount
      });
    }

    const timeline = await this.x.userTweets(userId, account.handle, { maxResults: 100 });
    const fetchedAt = new Date(this.now()).toISOString();
    const top = [...timeline.tweets].sort((a, b) => b.likes - a.likes).slice(0, SAMPLES_PER_ACCOUNT);
    const samples = top.map(
      (t): VoiceSample => ({
        tweetId: t.id,
        accountId: account.id,
        handle: account.handle,
        text: t.text,
        likes: t.likes,
        retweets: t.retweets,
        postedAt: t.createdAt,
        fetchedAt
      })
    );
    const added = await this.store.addSamples(samples);
    logger.info("voice.refreshed", { handle: account.handle, fetched: timeline.tweets.length, added });
    return added;
  }

  /** Refresh every active voice reference; one failing account does not stop the rest. */
  async refreshAll(): Promise<Record<string, number | string>> {
    const voices = await this.store.listAccounts({ activeOnly: true, voiceOnly: true });
    const out: Record<string, number | string> = {};
    for (const v of voices) {
      try {
        out[v.handle] = await this.refresh(v);
      } catch (err) {
        out[v.handle] = `failed: ${errMessage(err)}`;
        logger.warn("voice.refresh.failed", { handle: v.handle, error: errMessage(err) });
      }
    }
    return out;
  }

  /** Sample counts per active voice reference, for operators. */
  async stats(): Promise<VoiceStats[]> {
    const voices = await this.store.listAccounts({ activeOnly: true, voiceOnly: true });
    const out: VoiceStats[] = [];
    for (const v of voices) {
      const samples = await this.store.samplesFor(v.id, Number.POSITIVE_INFINITY);
      out.push({
        handle: v.handle,
        pillars: v.voicePillars,
        samples: samples.length,
        topLikes: samples[0]?.likes ?? null,
        lastFetchedAt: samples.reduce<string | null>((max, s) => (max === null || s.fetchedAt > max ? s.fetchedAt : max), null)
      });
    }
    return out;
  }

  async samplesForPrompt(pillar: Pillar, perAccount = 5): Promise<string> {
    const voices = (await this.store.listAccounts({ activeOnly: true, voiceOnly: true })).filter((a) =>
      a.voicePillars.includes(pillar)
    );
    const blocks: string[] = [];
    for (const v of voices) {
      const samples = await this.store.samplesFor(v.id, perAccount);
      if (samples.length === 0) continue;
      blocks.push([`From @${v.handle}:`, ...samples.map((s) => `- ${s.text.replace(/\s+/g, " ").trim()}`)].join("\n"));
    }
    if (blocks.length === 0) return "";
    return ["Voice reference examples (match the style, never copy):", ...blocks].join("\n\n");
  }
}
