import Parser from "rss-parser";
import type { Logger } from "../logger";
import { errorMessage } from "../logger";
import { computeScore, DEFAULT_SCORING } from "../scorer";
import { fingerprint } from "../storage";
import type { FeedEntry, NewsItem, ScoringConfig, SourceDescriptor } from "../types";

const USER_AGENT = "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0 Safari/537.36";

interface EntryExtras {
    updated?: string;
    dcDate?: string;
}

const parser = new Parser<Record<string, unknown>, EntryExtras>({
    customFields: {
        item: ["updated", ["dc:date", "dcDate"]],
    },
});

type ParsedItem = Parser.Item & EntryExtras;

/** Parse an RSS or Atom document; throws on malformed XML. */
export async function parseFeed(xml: string): Promise<ParsedItem[]> {
    const feed = await parser.parseString(xml);
    return feed.items;
}

export interface FetchSourceOptions {
    /** Read-only view of already delivered fingerprints. */
    seen: ReadonlySet<string>;
    cutoff: Date;
    now: Date;
    timeout: number;
    maxEntries: number;
    summaryLength: number;
    includeUndated: boolean;
    scoring?: ScoringConfig;
    logger: Logger;
}

/** Request options shared by the fetcher and `check`. */
export function feedRequestInit(timeout: number): RequestInit {
    return {
        headers: {
            "User-Agent": USER_AGENT,
            Accept: "application/rss+xml, application/atom+xml, application/xml, text/xml, */*",
        },
        signal: AbortSignal.timeout(timeout),
    };
}

function decodeCodePoint(match: string, code: number): string {
    return Number.isInteger(code) && code > 0 && code <= 0x10ffff ? String.fromCodePoint(code) : match;
}

export function stripHTML(s: string): string {
    return s.replace(/<[^>]+>/g, " ")
        .replace(/&nbsp;/g, " ")
        .replace(/&quot;/g, '"').replace(/&apos;/g, "'")
        .replace(/&#(\d+);/g, (m, dec: string) => decodeCodePoint(m, parseInt(dec, 10)))
        .replace(/&#x([0-9a-f]+);/gi, (m, hex: string) => decodeCodePoint(m, parseInt(hex, 16)))
        .replace(/&lt;/g, "<").replace(/&gt;/g, ">").replace(/&amp;/g, "&")
        .replace(/\s+/g, " ")
        .trim();
}

/** Plain-text summary capped at maxLen code points; "..." marks a cut. */
export function toSummary(body: string, maxLen: number): string {
    const text = stripHTML(body);
    const chars = Array.from(text);
    if (chars.length <= maxLen) return text;
    return chars.slice(0, maxLen).join("").trimEnd() + "...";
}

function parseDate(raw: string | undefined): Date | null {
    if (!raw || !raw.trim()) return null;
    const d = new Date(raw.trim());
    return isNaN(d.getTime()) ? null : d;
}

function isHttpUrl(raw: string): boolean {
    try {
        const u = new URL(raw);
        return u.protocol === "http:" || u.protocol === "https:";
    } catch {
        return false;
    }
}

export function toFeedEntry(item: ParsedItem): FeedEntry {
    return {
        title: item.title,
        link: item.link,
        published: item.isoDate ?? item.pubDate,
        updated: item.updated ?? item.dcDate,
        body: item.content ?? item.summary ?? item.contentSnippet,
    };
}

/**
 * Turn one entry into a NewsItem, or null when it is stale, incomplete or already seen.
 * Undated entries count as published `now` unless `includeUndated` is off.
 */
export function buildItem(
    entry: FeedEntry,
    source: SourceDescriptor,
    opts: Omit<FetchSourceOptions, "logger" | "timeout" | "maxEntries">,
): NewsItem | null {
    const publishedAt = parseDate(entry.published) ?? parseDate(entry.updated)
        ?? (opts.includeUndated ? opts.now : null);
    if (!publishedAt || publishedAt < opts.cutoff) return null;

    const title = (entry.title ?? "").trim();
    const url = (entry.link ?? "").trim();
    if (!title || !url || !isHttpUrl(url)) return null;

    const fp = fingerprint(url);
    if (opts.seen.has(fp)) return null;

    return {
        title,
        summaryText: toSummary(entry.body ?? "", opts.summaryLength),
        url,
        fingerprint: fp,
        sourceName: source.name,
        publishedAt,
        category: source.category,
        score: computeScore(title, source.keywords, opts.scoring ?? DEFAULT_SCORING),
    };
}

/**
 * Fetch one feed and emit its fresh, unseen entries.
 * Transport, HTTP and parse failures are logged and yield []; a bad entry is skipped.
 */
export async function fetchSource(source: SourceDescriptor, opts: FetchSourceOptions): Promise<NewsItem[]> {
    const log = opts.logger.child(source.name);
    log.info(`Fetching ${source.feedUrl}`);

    let xml: string;
    try {
        const resp = await fetch(source.feedUrl, feedRequestInit(opts.timeout));
        if (!resp.ok) {
            log.error(`HTTP ${resp.status} ${resp.statusText}`);
            return [];
        }
        xml = await resp.text();
    } catch (err) {
        log.error("Fetch failed", err);
        return [];
    }

    let entries: ParsedItem[];
    try {
        entries = await parseFeed(xml);
    } catch (err) {
        log.error("Feed parse failed", err);
        return [];
    }

    const items: NewsItem[] = [];
    for (const raw of entries.slice(0, opts.maxEntries)) {
        try {
            const item = buildItem(toFeedEntry(raw), source, opts);
            if (item) items.push(item);
        } catch (err) {
            log.debug(`Skipped entry: ${errorMessage(err)}`);
        }
    }

    log.info(`${items.length} fresh items (of ${entries.length} entries)`);
    return items;
}
