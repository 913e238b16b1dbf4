/**
 * Error taxonomy shared by every component. Boundaries catch these by class
 * and apply their own fallback; only StoreUnavailableError may stop a loop.
 */

/** Network failure or timeout talking to the LLM, a feed or the X API. */
export class TransientUpstreamError extends Error {
  readonly name = "TransientUpstreamError";
  constructor(message: string, readonly cause?: unknown) {
    super(message);
  }
}

/** Upstream refused the call (auth, quota, bad request). Not retried. */
export class UpstreamRejectedError extends Error {
  readonly name = "UpstreamRejectedError";
  constructor(message: string, readonly cause?: unknown) {
    super(message);
  }
}

/** Upstream reply that does not parse as the expected JSON or schema. */
export class MalformedResponseError extends Error {
  readonly name = "MalformedResponseError";
  constructor(message: string, readonly raw?: string) {
    super(message);
  }
}

/** User-supplied value outside the domain. `message` is shown to the user. */
export class ValidationError extends Error {
  readonly name = "ValidationError";
}

/** Action requested against a draft session in an incompatible state. */
export class StateConflictError extends Error {
  readonly name = "StateConflictError";
}

/** A unique key (external id, handle, url) already exists in the store. */
export class DuplicateError extends Error {
  readonly name = "DuplicateError";
  constructor(readonly key: string) {
    super(`duplicate key: ${key}`);
  }
}

/** The persisted store could not be read or written. */
export class StoreUnavailableError extends Error {
  readonly name = "StoreUnavailableError";
  constructor(message: string, readonly cause?: unknown) {
    super(message);
  }
}

export function isTransient(err: unknown): boolean {
  if (err instanceof TransientUpstreamError) return true;
  if (!(err instanceof Error)) return false;
  if (err.name === "AbortError" || err.name === "TimeoutError") return true;
  return /timeout|ECONNRESET|ECONNREFUSED|ETIMEDOUT|ENOTFOUND|fetch failed|HTTP (429|5\d\d)/i.test(err.message);
}
