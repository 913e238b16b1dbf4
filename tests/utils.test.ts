import { describe, it, expect } from "vitest";
import { clamp, KeyedMutex, sleep, TTLCache, withTimeout } from "../src/utils.js";

describe("TTLCache", () => {
  it("expires entries by the injected clock", () => {
    let t = 1_000;
    const cache = new TTLCache<string, number>(100, () => t);
    cache.set("a", 1);
    cache.set("b", 2, 500);
    t = 1_100;
    expect(cache.get("a")).toBe(1);
    t = 1_101;
    expect(cache.get("a")).toBeUndefined();
    expect(cache.size).toBe(1);
    t = 1_601;
    expect(cache.evictExpired()).toBe(1);
    expect(cache.size).toBe(0);
  });

  it("take removes the entry", () => {
    const cache = new TTLCache<string, string>(1_000, () => 0);
    cache.set("k", "v");
    expect(cache.take("k")).toBe("v");
    expect(cache.get("k")).toBeUndefined();
  });
});

describe("KeyedMutex", () => {
  it("runs same-key work in arrival order", async () => {
    const mutex = new KeyedMutex();
    const log: string[] = [];
    await Promise.all([
      mutex.run("t1", async () => {
        await sleep(20);
        log.push("first");
      }),
      mutex.run("t1", async () => {
        log.push("second");
      })
    ]);
    expect(log).toEqual(["first", "second"]);
    expect(mutex.activeKeys).toBe(0);
  });

  it("lets different keys proceed independently", async () => {
    const mutex = new KeyedMutex();
    const log: string[] = [];
    await Promise.all([
      mutex.run("t1", async () => {
        await sleep(20);
        log.push("slow");
      }),
      mutex.run("t2", async () => {
        log.push("fast");
      })
    ]);
    expect(log).toEqual(["fast", "slow"]);
  });

  it("releases the key when the work throws", async () => {
    const mutex = new KeyedMutex();
    await expect(mutex.run("t1", async () => Promise.reject(new Error("nope")))).rejects.toThrow("nope");
    expect(await mutex.run("t1", async () => "ok")).toBe("ok");
  });
});

describe("helpers", () => {
  it("clamp bounds a value", () => {
    expect(clamp(1.4, 0, 1)).toBe(1);
    expect(clamp(-2, 0, 1)).toBe(0);
  });

  it("withTimeout rejects a slow promise", async () => {
    await expect(withTimeout(sleep(50), 5, () => new Error("too slow"))).rejects.toThrow("too slow");
  });
});
