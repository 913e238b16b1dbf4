import { isTransient, TransientUpstreamError } from "../errors.js";
import { errMessage, logger } from "../logger.js";
import { sleep } from "../utils.js";

export const USER_AGENT = "signal-desk/0.1";

export type FetchOptions = {
  retries?: number;
  timeoutMs?: number;
};

export async function fetchWithTimeout(url: string, init?: RequestInit, timeoutMs = 15000): Promise<Response> {
  const controller = new AbortController();
  const t = setTimeout(() => controller.abort(), timeoutMs);
  try {
    return await fetch(url, { ...init, signal: controller.signal });
  } finally {
    clearTimeout(t);
  }
}

/** Release the connection of a response whose body will not be read. */
export async function discardBody(res: Response): Promise<void> {
  await res.body?.cancel().catch((err: unknown) => {
    logger.debug("http.body.cancel_failed", { error: errMessage(err) });
  });
}

/**
 * Fetch with exponential backoff on network errors, 429 and 5xx. Anything
 * else that throws is rethrown at once.
 * Other statuses are returned to the caller as-is.
 */
export async function fetchWithRetry(url: string, init?: RequestInit, opts?: FetchOptions): Promise<Response> {
  const retries = opts?.retries ?? 2;
  const timeoutMs = opts?.timeoutMs ?? 15000;

  let lastErr: unknown = null;
  for (let attempt = 0; attempt <= retries; attempt++) {
    try {
      const res = await fetchWithTimeout(url, init, timeoutMs);
      // Retry common transient statuses.
      if (res.status === 429 || (res.status >= 500 && res.status <= 599)) {
        await discardBody(res);
        throw new TransientUpstreamError(`HTTP ${res.status}`);
      }
      return res;
    } catch (err) {
      lastErr = err;
      if (!isTransient(err)) throw err;
      if (attempt >= retries) break;
      // Exponential backoff: 0.5s, 1s, 2s...
      await sleep(500 * Math.pow(2, attempt));
    }
  }
  if (lastErr instanceof TransientUpstreamError) throw lastErr;
  throw new TransientUpstreamError(lastErr instanceof Error ? lastErr.message : String(lastErr), lastErr);
}

const MAX_BODY_BYTES = 5_000_000;

/** GET a text body with a body timeout and a size guard. */
export async function fetchText(url: string, opts?: FetchOptions & { accept?: string }): Promise<string> {
  const timeoutMs = opts?.timeoutMs ?? 15000;
  const res = await fetchWithRetry(
    url,
    {
      method: "GET",
      headers: {
        Accept: opts?.accept ?? "application/rss+xml,application/atom+xml,text/xml,application/xml,*/*",
        "User-Agent": USER_AGENT
      }
    },
    opts
  );
  if (!res.ok) {
    await discardBody(res);
    throw new Error(`HTTP ${res.status}`);
  }

  // Body timeout: prevent hanging on slow/chunked responses
  let timer: NodeJS.Timeout | undefined;
  const text = await Promise.race([
    res.text(),
    new Promise<never>((_, reject) => {
      timer = setTimeout(() => reject(new TransientUpstreamError(`body timeout after ${timeoutMs}ms`)), timeoutMs);
    })
  ]).finally(() => clearTimeout(timer));

  if (text.length > MAX_BODY_BYTES) throw new Error(`body too large: ${text.length} bytes`);
  return text;
}
