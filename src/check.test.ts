import { afterEach, describe, expect, it, vi } from "vitest";
import { runChecks } from "./check";
import { DEFAULT_SCORING } from "./scorer";
import { feedRequestInit } from "./sources/rss";
import { feedServer, makeSource, rssFeed, silentLogger } from "./test-fixtures";
import type { AppConfig, SourceDescriptor } from "./types";

const WEBHOOK = "https://oapi.example/robot/send?access_token=test-token";

function makeConfig(sources: SourceDescriptor[], webhook = WEBHOOK): AppConfig {
    return {
        dingtalk: { webhook, secret: "", timeout: 1000 },
        settings: {
            maxNews: 10,
            windowHours: 24,
            maxEntriesPerSource: 50,
            summaryLength: 250,
            concurrency: 2,
            fetchTimeout: 1000,
            includeUndated: true,
            timezone: "UTC",
            seenFile: "/unused/seen.json",
        },
        scoring: DEFAULT_SCORING,
        ai: { enabled: false, provider: "openai", apiKey: "", model: "m", baseUrl: "", delay: 0, language: "English" },
        sources,
    };
}

const GOOD = makeSource({ name: "Good", feedUrl: "https://good.example/rss" });
const EMPTY = makeSource({ name: "Empty", feedUrl: "https://empty.example/rss" });
const DOWN = makeSource({ name: "Down", feedUrl: "https://down.example/rss" });

describe("runChecks", () => {
    afterEach(() => {
        vi.unstubAllGlobals();
    });

    it("passes sources when at least one feed has entries", async () => {
        vi.stubGlobal("fetch", feedServer({
            [GOOD.feedUrl]: rssFeed([{ title: "Hello", link: "https://good.example/1" }]),
            [EMPTY.feedUrl]: rssFeed([]),
            [DOWN.feedUrl]: 503,
        }));

        const reports = await runChecks(makeConfig([GOOD, EMPTY, DOWN]), silentLogger, { webhook: false });

        expect(reports).toEqual([
            { name: "config", passed: true },
            { name: "sources", passed: true },
        ]);
    });

    it("probes feeds with the same request headers as the fetcher", async () => {
        const fetchMock = vi.fn(feedServer({ [GOOD.feedUrl]: rssFeed([{ title: "Hello", link: "https://good.example/1" }]) }));
        vi.stubGlobal("fetch", fetchMock);

        await runChecks(makeConfig([GOOD]), silentLogger, { webhook: false });

        const headers = new Headers(fetchMock.mock.calls[0]?.[1]?.headers);
        expect(headers.get("User-Agent")).toBe(new Headers(feedRequestInit(1000).headers).get("User-Agent"));
        expect(headers.get("Accept")).toBe("application/rss+xml, application/atom+xml, application/xml, text/xml, */*");
    });

    it("fails config and sources when nothing usable is configured", async () => {
        vi.stubGlobal("fetch", feedServer({}));

        const reports = await runChecks(makeConfig([], ""), silentLogger, { webhook: false });

        expect(reports).toEqual([
            { name: "config", passed: false },
            { name: "sources", passed: false },
        ]);
    });

    it("sends a test message when asked", async () => {
        const server = feedServer({ [GOOD.feedUrl]: rssFeed([{ title: "Hello", link: "https://good.example/1" }]) });
        const fetchMock = vi.fn(async (input: string | URL | Request, init?: RequestInit) => {
            if (String(input) === WEBHOOK) return new Response(JSON.stringify({ errcode: 0 }), { status: 200 });
            return server(input, init);
        });
        vi.stubGlobal("fetch", fetchMock);

        const reports = await runChecks(makeConfig([GOOD]), silentLogger, {
            webhook: true,
            now: () => new Date("2026-10-17T12:00:00Z"),
        });

        expect(reports.find((r) => r.name === "webhook")).toEqual({ name: "webhook", passed: true });
        const body = JSON.parse(String(fetchMock.mock.calls.find((c) => String(c[0]) === WEBHOOK)?.[1]?.body));
        expect(body).toEqual({
            msgtype: "text",
            text: { content: "🤖 rss-brief config check\n⏰ 2026-10-17T12:00:00.000Z\n✅ webhook reachable" },
        });
    });

    it("fails the ai check when it is enabled without a key", async () => {
        vi.stubGlobal("fetch", feedServer({ [GOOD.feedUrl]: rssFeed([{ title: "Hello", link: "https://good.example/1" }]) }));
        const base = makeConfig([GOOD]);
        const config: AppConfig = { ...base, ai: { ...base.ai, enabled: true } };

        const reports = await runChecks(config, silentLogger, { webhook: false });

        expect(reports.find((r) => r.name === "ai")).toEqual({ name: "ai", passed: false });
    });
});
