import { createLogger } from "./logger";
import { fingerprint } from "./storage";
import type { NewsItem, SourceDescriptor } from "./types";

export const NOW = new Date("2026-10-17T12:00:00Z");
export const CUTOFF = new Date("2026-10-16T12:00:00Z");

export const silentLogger = createLogger({ level: "silent" });

export function makeItem(overrides: Partial<NewsItem> = {}): NewsItem {
    const url = overrides.url ?? "https://example.com/a";
    return {
        title: "Untitled",
        summaryText: "",
        sourceName: "Example",
        publishedAt: NOW,
        category: "general",
        score: 1,
        ...overrides,
        url,
        fingerprint: overrides.fingerprint ?? fingerprint(url),
    };
}

export function makeSource(overrides: Partial<SourceDescriptor> = {}): SourceDescriptor {
    return {
        name: "Example",
        feedUrl: "https://feeds.example.com/rss",
        category: "general",
        keywords: [],
        ...overrides,
    };
}

export interface RssEntry {
    title?: string;
    link?: string;
    pubDate?: string;
    description?: string;
}

export function rssFeed(entries: RssEntry[]): string {
    const items = entries.map((e) => [
        "    <item>",
        e.title !== undefined ? `      <title>${e.title}</title>` : "",
        e.link !== undefined ? `      <link>${e.link}</link>` : "",
        e.pubDate !== undefined ? `      <pubDate>${e.pubDate}</pubDate>` : "",
        e.description !== undefined ? `      <description><![CDATA[${e.description}]]></description>` : "",
        "    </item>",
    ].filter(Boolean).join("\n"));

    return [
        `<?xml version="1.0" encoding="UTF-8"?>`,
        `<rss version="2.0">`,
        "  <channel>",
        "    <title>Test Feed</title>",
        "    <link>https://feeds.example.com</link>",
        ...items,
        "  </channel>",
        "</rss>",
    ].join("\n");
}

/** Stand-in for global fetch: URL → feed body, HTTP status or thrown error. */
export function feedServer(routes: Record<string, string | number | Error>) {
    return async (input: string | URL | Request, _init?: RequestInit): Promise<Response> => {
        const url = typeof input === "string" ? input : input instanceof URL ? input.href : input.url;
        const route = routes[url];
        if (route === undefined) return new Response("not found", { status: 404 });
        if (route instanceof Error) throw route;
        if (typeof route === "number") return new Response("error", { status: route });
        return new Response(route, { status: 200, headers: { "Content-Type": "application/rss+xml" } });
    };
}
