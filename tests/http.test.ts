import { afterEach, describe, expect, it, vi } from "vitest";
import { TransientUpstreamError } from "../src/errors.js";
import { fetchWithRetry } from "../src/news/http.js";

describe("fetchWithRetry", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("retries a 503 and returns the next response", async () => {
    const fetchMock = vi
      .fn()
      .mockResolvedValueOnce(new Response("busy", { status: 503 }))
      .mockResolvedValueOnce(new Response("ok", { status: 200 }));
    vi.stubGlobal("fetch", fetchMock);

    const res = await fetchWithRetry("https://feeds.example.test/a", undefined, { retries: 1, timeoutMs: 1000 });

    expect(res.status).toBe(200);
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it("releases the body of a response it retries past", async () => {
    let cancelled = false;
    const body = new ReadableStream<Uint8Array>({
      cancel() {
        cancelled = true;
      }
    });
    vi.stubGlobal("fetch", vi.fn(async () => new Response(body, { status: 503 })));

    await expect(fetchWithRetry("https://feeds.example.test/a", undefined, { retries: 0, timeoutMs: 1000 })).rejects.toThrow(
      "HTTP 503"
    );
    expect(cancelled).toBe(true);
  });

  it("returns other error statuses without retrying", async () => {
    const fetchMock = vi.fn(async () => new Response("missing", { status: 404 }));
    vi.stubGlobal("fetch", fetchMock);

    const res = await fetchWithRetry("https://feeds.example.test/a", undefined, { retries: 2, timeoutMs: 1000 });

    expect(res.status).toBe(404);
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it("rethrows a non-transient failure at once", async () => {
    const fetchMock = vi.fn(async () => {
      throw new Error("invalid header value");
    });
    vi.stubGlobal("fetch", fetchMock);

    await expect(fetchWithRetry("https://feeds.example.test/a", undefined, { retries: 2, timeoutMs: 1000 })).rejects.toThrow(
      "invalid header value"
    );
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it("gives up with a transient error once retries run out", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => new Response("busy", { status: 429 })));

    const err = await fetchWithRetry("https://feeds.example.test/a", undefined, { retries: 0, timeoutMs: 1000 }).catch(
      (e: unknown) => e
    );

    expect(err).toBeInstanceOf(TransientUpstreamError);
    expect(err).toHaveProperty("message", "HTTP 429");
  });
});
