import { describe, it, expect, vi } from "vitest";
import { StoreUnavailableError } from "../src/errors.js";
import type { SourceSummary } from "../src/news/pipeline.js";
import { PollingLoop, type SourceRunner } from "../src/news/poller.js";
import type { PollTarget } from "../src/news/types.js";
import { rssTarget } from "./helpers.js";

function summary(storeFailure: boolean, failed = false): SourceSummary {
  return { source: "Test Feed", failed, fetched: 0, duplicates: 0, scored: 0, alerts: 0, storeFailure };
}

function runner(targets: PollTarget[], runSource: SourceRunner["runSource"]): SourceRunner {
  return { listTargets: async () => targets, runSource };
}

describe("PollingLoop", () => {
  it("halts after three consecutive store failures", async () => {
    const loop = new PollingLoop({ name: "rss", intervalMs: 1 }, runner([rssTarget()], async () => summary(true)));
    for (let i = 0; i < 3; i++) {
      expect(await loop.tick()).toBe(true);
      await loop.settled();
    }
    expect(loop.isHalted).toBe(true);
    expect(await loop.tick()).toBe(false);
  });

  it("resets the failure count after a healthy run", async () => {
    const results = [true, true, false, true, true];
    const loop = new PollingLoop(
      { name: "rss", intervalMs: 1 },
      runner([rssTarget()], async () => summary(results.shift() ?? false))
    );
    for (let i = 0; i < 5; i++) {
      await loop.tick();
      await loop.settled();
    }
    expect(loop.isHalted).toBe(false);
  });

  it("does not reset the count on a failed fetch", async () => {
    const results = [summary(true), summary(false, true), summary(true)];
    const loop = new PollingLoop(
      { name: "rss", intervalMs: 1, maxStoreFailures: 2 },
      runner([rssTarget()], async () => results.shift() ?? summary(false))
    );
    for (let i = 0; i < 3; i++) {
      await loop.tick();
      await loop.settled();
    }
    expect(loop.isHalted).toBe(true);
  });

  it("counts a StoreUnavailableError from the target listing but not other errors", async () => {
    const errors: Error[] = [new Error("boom"), new StoreUnavailableError("down"), new StoreUnavailableError("down")];
    const loop = new PollingLoop(
      { name: "tweet", intervalMs: 1, maxStoreFailures: 2 },
      {
        listTargets: async () => {
          const err = errors.shift();
          if (err) throw err;
          return [];
        },
        runSource: async () => summary(false)
      }
    );
    expect(await loop.tick()).toBe(true);
    expect(await loop.tick()).toBe(true);
    expect(await loop.tick()).toBe(false);
  });

  it("counts a StoreUnavailableError thrown by a source run", async () => {
    const loop = new PollingLoop(
      { name: "rss", intervalMs: 1, maxStoreFailures: 1 },
      runner([rssTarget()], async () => {
        throw new StoreUnavailableError("disk unavailable");
      })
    );
    await loop.tick();
    await loop.settled();
    expect(loop.isHalted).toBe(true);
  });

  it("start resolves once the loop halts", async () => {
    const runSource = vi.fn(async () => summary(true));
    const loop = new PollingLoop({ name: "rss", intervalMs: 1 }, runner([rssTarget()], runSource));
    await loop.start();
    expect(runSource).toHaveBeenCalledTimes(3);
    expect(loop.isRunning).toBe(false);
  });

  it("keeps polling fast sources while a slow one is still running", async () => {
    const fast = rssTarget({ id: "feed-fast", label: "Fast Feed" });
    const slow = rssTarget({ id: "feed-slow", label: "Slow Feed" });
    let releaseSlow: () => void = () => undefined;
    const slowDone = new Promise<void>((resolve) => {
      releaseSlow = resolve;
    });
    const calls = { fast: 0, slow: 0 };

    const loop = new PollingLoop(
      { name: "rss", intervalMs: 10 },
      runner([fast, slow], async (target) => {
        if (target.id === "feed-slow") {
          calls.slow++;
          await slowDone;
        } else {
          calls.fast++;
        }
        return summary(false);
      })
    );

    const done = loop.start();
    await vi.waitFor(() => expect(calls.fast).toBeGreaterThanOrEqual(5));
    expect(calls.slow).toBe(1);
    expect(loop.inFlightCount).toBeGreaterThanOrEqual(1);

    loop.stop();
    releaseSlow();
    await done;
    expect(calls.slow).toBe(1);
    expect(loop.inFlightCount).toBe(0);
  });

  it("stop wakes a sleeping loop", async () => {
    const runSource = vi.fn(async () => summary(false));
    const loop = new PollingLoop({ name: "rss", intervalMs: 60_000 }, runner([rssTarget()], runSource));
    const done = loop.start();
    await vi.waitFor(() => expect(runSource).toHaveBeenCalledTimes(1));
    loop.stop();
    await done;
    expect(runSource).toHaveBeenCalledTimes(1);
    expect(loop.isRunning).toBe(false);
  });
});
