import { describe, expect, it } from "vitest";
import { fetchAll, type FetchAllOptions, type SourceFetcher } from "./fetcher";
import { CUTOFF, makeItem, makeSource, NOW, silentLogger } from "./test-fixtures";
import type { NewsItem } from "./types";

function options(concurrency: number): FetchAllOptions {
    return {
        concurrency,
        seen: new Set(),
        cutoff: CUTOFF,
        now: NOW,
        timeout: 1000,
        maxEntries: 50,
        summaryLength: 250,
        includeUndated: true,
        logger: silentLogger,
    };
}

const tick = (ms: number) => new Promise<void>((r) => setTimeout(r, ms));

const sources = ["a", "b", "c", "d", "e", "f", "g"].map((name) => makeSource({ name, feedUrl: `https://${name}.example/rss` }));

function itemsFor(name: string, n: number): NewsItem[] {
    return Array.from({ length: n }, (_, i) => makeItem({ url: `https://${name}.example/${i}`, sourceName: name }));
}

describe("fetchAll", () => {
    it("never runs more than `concurrency` fetches at once", async () => {
        let inFlight = 0;
        let peak = 0;
        const fetchOne: SourceFetcher = async (source) => {
            inFlight++;
            peak = Math.max(peak, inFlight);
            await tick(source.name.charCodeAt(0) % 3 * 5);
            inFlight--;
            return itemsFor(source.name, 1);
        };

        const { items } = await fetchAll(sources, options(3), fetchOne);

        expect(peak).toBe(3);
        expect(items).toHaveLength(sources.length);
    });

    it("returns items in source order whatever order fetches finish in", async () => {
        const delays: Record<string, number> = { a: 30, b: 0, c: 15 };
        const fetchOne: SourceFetcher = async (source) => {
            await tick(delays[source.name] ?? 0);
            return itemsFor(source.name, 2);
        };

        const { items } = await fetchAll(sources.slice(0, 3), options(3), fetchOne);

        expect(items.map((i) => i.url)).toEqual([
            "https://a.example/0", "https://a.example/1",
            "https://b.example/0", "https://b.example/1",
            "https://c.example/0", "https://c.example/1",
        ]);
    });

    it("isolates a failing source from the others", async () => {
        const fetchOne: SourceFetcher = async (source) => {
            if (source.name === "b") throw new Error("timeout");
            return itemsFor(source.name, 2);
        };

        const { items, reports } = await fetchAll(sources.slice(0, 3), options(2), fetchOne);

        expect(items.filter((i) => i.sourceName === "a")).toHaveLength(2);
        expect(items.filter((i) => i.sourceName === "c")).toHaveLength(2);
        expect(reports).toEqual([
            { source: "a", category: "general", items: 2 },
            { source: "b", category: "general", items: 0, error: "timeout" },
            { source: "c", category: "general", items: 2 },
        ]);
    });

    it("passes the shared options through without the pool size", async () => {
        const seen = new Set(["abc"]);
        const received: unknown[] = [];
        const fetchOne: SourceFetcher = async (_source, opts) => {
            received.push(opts);
            return [];
        };

        await fetchAll(sources.slice(0, 2), { ...options(4), seen }, fetchOne);

        expect(received).toHaveLength(2);
        for (const opts of received) {
            expect(opts).not.toHaveProperty("concurrency");
            expect(opts).toHaveProperty("seen", seen);
        }
    });

    it("handles an empty source list", async () => {
        const result = await fetchAll([], options(3), async () => []);
        expect(result).toEqual({ items: [], reports: [] });
    });
});
