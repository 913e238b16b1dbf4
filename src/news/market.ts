import { readFile } from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import { errMessage, logger } from "../logger.js";
import { systemClock, type Clock } from "../utils.js";
import { discardBody, fetchWithRetry, USER_AGENT, type FetchOptions } from "./http.js";

export const MARKET_DATA_UNAVAILABLE = "Market data unavailable";

export type PairSnapshot = {
  pair: string;
  currentPrice: number | null;
  weeklyChangePct: number | null;
  weeklyHigh: number | null;
  weeklyLow: number | null;
};

export type PlatformMetrics = {
  weeklyVolume: number | null;
  activeUsers: number | null;
  totalTrades: number | null;
};

export type WeeklySummary = {
  generatedAt: string;
  pairs: PairSnapshot[];
  platform: PlatformMetrics | null;
};

/** Prices and platform numbers that ground generated posts. */
export interface MarketDataProvider {
  weeklySummary(): Promise<WeeklySummary>;
}

const PriceSchema = z.object({ price: z.number() });

const ChangeSchema = z.object({
  change_pct: z.number().nullish(),
  high: z.number().nullish(),
  low: z.number().nullish()
});

const MetricsSchema = z.object({
  weekly_volume: z.number().nullish(),
  active_users: z.number().nullish(),
  total_trades: z.number().nullish()
});

/**
 * Read-only client of the exchange's market API. Each endpoint fails on its
 * own: a missing price or metric leaves its field null.
 */
export class MarketApiClient implements MarketDataProvider {
  private readonly baseUrl: string;

  constructor(
    baseUrl: string,
    private readonly pairs: readonly string[],
    private readonly fetchOpts: FetchOptions = {},
    private readonly now: Clock = systemClock
  ) {
    this.baseUrl = baseUrl.replace(/\/+$/, "");
  }

  private async getJson<T>(pathname: string, schema: z.ZodType<T>): Promise<T | null> {
    try {
      const res = await fetchWithRetry(
        `${this.baseUrl}${pathname}`,
        { headers: { Accept: "application/json", "User-Agent": USER_AGENT } },
        { retries: this.fetchOpts.retries ?? 1, timeoutMs: this.fetchOpts.timeoutMs ?? 15000 }
      );
      if (!res.ok) {
        await discardBody(res);
        logger.warn("market.http.failed", { path: pathname, status: res.status });
        return null;
      }
      const parsed = schema.safeParse(await res.json());
      if (!parsed.success) {
        logger.warn("market.response.malformed", { path: pathname });
        return null;
      }
      return parsed.data;
    } catch (err) {
      logger.warn("market.fetch.failed", { path: pathname, error: errMessage(err) });
      return null;
    }
  }

  private async pair(pair: string): Promise<PairSnapshot> {
    const encoded = encodeURIComponent(pair);
    const [price, change] = await Promise.all([
      this.getJson(`/price/${encoded}`, PriceSchema),
      this.getJson(`/price/${encoded}/change?period=7d`, ChangeSchema)
    ]);
    return {
      pair,
      currentPrice: price?.price ?? null,
      weeklyChangePct: change?.change_pct ?? null,
      weeklyHigh: change?.high ?? null,
      weeklyLow: change?.low ?? null
    };
  }

  async platformMetrics(): Promise<PlatformMetrics | null> {
    const m = await this.getJson("/metrics", MetricsSchema);
    if (!m) return null;
    return {
      weeklyVolume: m.weekly_volume ?? null,
      activeUsers: m.active_users ?? null,
      totalTrades: m.total_trades ?? null
    };
  }

  async weeklySummary(): Promise<WeeklySummary> {
    const [pairs, platform] = await Promise.all([Promise.all(this.pairs.map((p) => this.pair(p))), this.platformMetrics()]);
    return { generatedAt: new Date(this.now()).toISOString(), pairs, platform };
  }
}

function formatNumber(n: number, digits: number): string {
  return n.toLocaleString("en-US", { minimumFractionDigits: digits, maximumFractionDigits: digits });
}

/** Prompt section for the week's prices; pairs without a price are left out. */
export function formatMarketData(summary: WeeklySummary): string {
  const lines: string[] = [];
  for (const p of summary.pairs) {
    if (p.currentPrice === null) continue;
    lines.push(`**${p.pair}**:`, `  - Current: ${formatNumber(p.currentPrice, 2)}`);
    if (p.weeklyChangePct !== null) {
      lines.push(`  - Weekly change: ${p.weeklyChangePct >= 0 ? "+" : ""}${p.weeklyChangePct.toFixed(2)}%`);
    }
    if (p.weeklyHigh !== null && p.weeklyLow !== null) {
      lines.push(`  - Range: ${formatNumber(p.weeklyLow, 2)} - ${formatNumber(p.weeklyHigh, 2)}`);
    }
  }
  return lines.length > 0 ? ["## Current Market Data", ...lines].join("\n") : MARKET_DATA_UNAVAILABLE;
}

export function formatPlatformMetrics(metrics: PlatformMetrics | null): string | null {
  if (!metrics) return null;
  const lines: string[] = [];
  if (metrics.weeklyVolume) lines.push(`- Weekly volume: $${formatNumber(metrics.weeklyVolume, 0)}`);
  if (metrics.activeUsers) lines.push(`- Active users: ${formatNumber(metrics.activeUsers, 0)}`);
  if (metrics.totalTrades) lines.push(`- Total trades: ${formatNumber(metrics.totalTrades, 0)}`);
  return lines.length > 0 ? ["## Platform Metrics", ...lines].join("\n") : null;
}

/** Market section of a generation brief. A failing provider yields the unavailable marker. */
export async function marketContext(provider: MarketDataProvider): Promise<string> {
  try {
    const summary = await provider.weeklySummary();
    const metrics = formatPlatformMetrics(summary.platform);
    const prices = formatMarketData(summary);
    return metrics ? `${prices}\n\n${metrics}` : prices;
  } catch (err) {
    logger.warn("market.summary.failed", { error: errMessage(err) });
    return MARKET_DATA_UNAVAILABLE;
  }
}

/** Brand background for every brief; a missing file means none. */
export async function loadBrandContext(filePath: string): Promise<string> {
  const p = path.resolve(process.cwd(), filePath);
  try {
    return (await readFile(p, "utf8")).trim();
  } catch (err) {
    logger.warn("brand_context.unreadable", { path: p, error: errMessage(err) });
    return "";
  }
}
