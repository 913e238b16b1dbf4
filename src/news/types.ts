import type { Category, Priority, SourceKind } from "../domain.js";

/** One fetched tweet or feed entry, before scoring. */
export type RawItem = {
  kind: SourceKind;
  externalId: string;
  sourceId: string;
  sourceLabel: string;
  text: string;
  url: string | null;
  publishedAtMs: number | null;
  fetchedAtMs: number;
};

/** A polled source as the pipeline sees it, whichever loop owns it. */
export type PollTarget = {
  kind: SourceKind;
  id: string;
  label: string;
  /** Handle for an account, URL for a feed. */
  locator: string;
  /** X user id, once resolved (accounts only). */
  userId: string | null;
  category: Category;
  priority: Priority;
  /** Last tweet id, or ISO time of the last fetch. */
  cursor: string | null;
  /** Feed-level filter; empty means every item is scored. */
  keywords: string[];
  followerCount: number | null;
};

export type FetchResult = {
  items: RawItem[];
  /** Cursor to store once the batch has been processed; null keeps the old one. */
  nextCursor: string | null;
};

export interface SourceFetcher {
  fetch(target: PollTarget): Promise<FetchResult>;
}

/** Namespaced dedup key: tweet ids and feed guids never share a key space. */
export function dedupKey(kind: SourceKind, externalId: string): string {
  return `${kind}:${externalId}`;
}
