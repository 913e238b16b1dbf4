import type { FetchOptions } from "../http.js";
import { fetchText } from "../http.js";
import type { FetchResult, PollTarget, RawItem, SourceFetcher } from "../types.js";

export type FeedEntry = {
  guid: string;
  title: string;
  url: string | null;
  summary: string;
  publishedAtMs?: number;
};

const MAX_SUMMARY_CHARS = 1000;
/** Feeds publish late; entries this far behind the cursor still get a dedup check. */
export const FEED_GRACE_MS = 6 * 60 * 60 * 1000;

function firstMatch(text: string, re: RegExp): string | null {
  const m = re.exec(text);
  return m?.[1]?.trim() ?? null;
}

function unwrapCdata(s: string): string {
  return s.replace(/^<!\[CDATA\[([\s\S]*?)\]\]>$/, "$1");
}

/** Out-of-range references become U+FFFD. */
function codePoint(n: number): string {
  return Number.isInteger(n) && n >= 0 && n <= 0x10ffff ? String.fromCodePoint(n) : "\uFFFD";
}

export function decodeBasicXmlEntities(s: string): string {
  return s
    .replace(/&#(\d+);/g, (_, n: string) => codePoint(Number(n)))
    .replace(/&#x([0-9a-f]+);/gi, (_, n: string) => codePoint(parseInt(n, 16)))
    .replaceAll("&lt;", "<")
    .replaceAll("&gt;", ">")
    .replaceAll("&quot;", '"')
    .replaceAll("&apos;", "'")
    .replaceAll("&nbsp;", " ")
    .replaceAll("&amp;", "&")
    .replace(/\s+/g, " ")
    .trim();
}

function stripTags(html: string): string {
  return html.replace(/<[^>]*>/g, " ");
}

/** Tag body with CDATA unwrapped, entities decoded and markup removed. */
function tagText(xml: string, tag: string): string | null {
  const raw = firstMatch(xml, new RegExp(`<${tag}(?:\\s[^>]*)?>([\\s\\S]*?)<\\/${tag}>`, "i"));
  if (raw === null) return null;
  // Entities first so escaped markup (&lt;p&gt;) is stripped too.
  return decodeBasicXmlEntities(stripTags(decodeBasicXmlEntities(unwrapCdata(raw)))) || null;
}

function parseDate(raw: string | null): number | undefined {
  if (!raw) return undefined;
  const ms = Date.parse(raw);
  return Number.isFinite(ms) ? ms : undefined;
}

function truncate(s: string, max: number): string {
  return s.length <= max ? s : s.slice(0, max - 1).trimEnd() + "…";
}

export function parseRss(xml: string): FeedEntry[] {
  const out: FeedEntry[] = [];
  const items = xml.split(/<item\b/i).slice(1);

  for (const chunk of items) {
    const itemXml = "<item" + chunk.split(/<\/item>/i)[0];

    const title = tagText(itemXml, "title");
    const link = tagText(itemXml, "link");
    const guid = tagText(itemXml, "guid") ?? link;
    if (!title || !guid) continue;

    const summary = tagText(itemXml, "description") ?? tagText(itemXml, "content:encoded") ?? "";
    out.push({
      guid,
      title,
      url: link,
      summary: truncate(summary, MAX_SUMMARY_CHARS),
      publishedAtMs: parseDate(tagText(itemXml, "pubDate") ?? tagText(itemXml, "dc:date"))
    });
  }

  return out;
}

function atomLink(entryXml: string): string | null {
  // Prefer rel="alternate", fall back to any <link href="...">
  const href =
    firstMatch(entryXml, /<link[^>]+rel=["']alternate["'][^>]+href=["']([^"']+)["']/i) ??
    firstMatch(entryXml, /<link[^>]+href=["']([^"']+)["']/i);
  return href ? decodeBasicXmlEntities(href) : null;
}

export function parseAtom(xml: string): FeedEntry[] {
  const out: FeedEntry[] = [];
  const entries = xml.split(/<entry\b/i).slice(1);

  for (const chunk of entries) {
    const entryXml = "<entry" + chunk.split(/<\/entry>/i)[0];

    const title = tagText(entryXml, "title");
    const url = atomLink(entryXml);
    const guid = tagText(entryXml, "id") ?? url;
    if (!title || !guid) continue;

    const summary = tagText(entryXml, "summary") ?? tagText(entryXml, "content") ?? "";
    out.push({
      guid,
      title,
      url,
      summary: truncate(summary, MAX_SUMMARY_CHARS),
      publishedAtMs: parseDate(tagText(entryXml, "updated") ?? tagText(entryXml, "published"))
    });
  }

  return out;
}

export function isAtom(xml: string): boolean {
  return /<feed\b/i.test(xml) && /xmlns=["']http:\/\/www\.w3\.org\/2005\/Atom["']/i.test(xml);
}

export function parseFeed(xml: string): FeedEntry[] {
  return isAtom(xml) ? parseAtom(xml) : parseRss(xml);
}

/**
 * RSS/Atom poller. The cursor is the time of the last fetch: entries
 * published more than FEED_GRACE_MS before it are dropped up front, the
 * rest (and undated ones) rely on dedup.
 */
export class RssFetcher implements SourceFetcher {
  constructor(
    private readonly fetchOpts: FetchOptions = {},
    private readonly now: () => number = Date.now
  ) {}

  async fetch(target: PollTarget): Promise<FetchResult> {
    const fetchedAtMs = this.now();
    const xml = await fetchText(target.locator, this.fetchOpts);
    const cutoffMs = target.cursor ? Date.parse(target.cursor) - FEED_GRACE_MS : NaN;

    const items: RawItem[] = parseFeed(xml)
      .filter((e) => e.publishedAtMs === undefined || !Number.isFinite(cutoffMs) || e.publishedAtMs > cutoffMs)
      .map((e): RawItem => ({
        kind: "rss",
        externalId: e.guid,
        sourceId: target.id,
        sourceLabel: target.label,
        text: e.summary ? `${e.title}\n\n${e.summary}` : e.title,
        url: e.url,
        publishedAtMs: e.publishedAtMs ?? null,
        fetchedAtMs
      }));

    return { items, nextCursor: new Date(fetchedAtMs).toISOString() };
  }
}
