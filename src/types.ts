// ── News item ──

export interface NewsItem {
    readonly title: string;
    readonly summaryText: string;   // plain text, bounded length
    readonly url: string;           // canonical link, identity for dedup
    readonly fingerprint: string;   // md5(url)
    readonly sourceName: string;
    readonly publishedAt: Date;
    readonly category: string;
    readonly score: number;
}

export interface SourceDescriptor {
    readonly name: string;
    readonly feedUrl: string;
    readonly category: string;
    readonly keywords: readonly string[];
}

/** One parsed feed entry, before any filtering. Every field may be missing. */
export interface FeedEntry {
    title?: string;
    link?: string;
    published?: string;
    updated?: string;
    body?: string;
}

export interface SourceReport {
    source: string;
    category: string;
    items: number;
    error?: string;
}

export interface RunResult {
    readonly items: readonly NewsItem[];
    readonly label: string;
}

export type RunState =
    | "idle"
    | "fetching"
    | "selecting"
    | "transforming"
    | "dispatching"
    | "committing"
    | "done"
    | "failed";

export type RunOutcome =
    | { ok: true; state: "done"; result: RunResult; reports: SourceReport[] }
    | { ok: false; state: "failed"; failedAt: "fetching" | "dispatching"; reason: string; reports: SourceReport[] };

// ── Collaborators ──

export interface Dispatcher {
    /** Deliver the digest. Resolves false on any failure, never rejects. */
    send(items: readonly NewsItem[], label: string): Promise<boolean>;
}

/** Returns replacement summary text, or the item's own summary on failure. */
export type SummaryHook = (item: NewsItem) => Promise<string>;

// ── Config ──

export interface ScoringConfig {
    readonly base: number;
    readonly keywordWeight: number;
    readonly termWeight: number;
    readonly terms: readonly string[];
}

export interface AppConfig {
    readonly dingtalk: {
        readonly webhook: string;
        readonly secret: string;
        readonly timeout: number;
    };
    readonly settings: {
        readonly maxNews: number;
        readonly windowHours: number;
        readonly maxEntriesPerSource: number;
        readonly summaryLength: number;
        readonly concurrency: number;
        readonly fetchTimeout: number;
        readonly includeUndated: boolean;
        readonly timezone: string;
        readonly seenFile: string;
    };
    readonly scoring: ScoringConfig;
    readonly ai: {
        readonly enabled: boolean;
        readonly provider: "openai" | "anthropic";
        readonly apiKey: string;
        readonly model: string;
        readonly baseUrl: string;
        readonly delay: number;
        readonly language: string;
    };
    readonly sources: readonly SourceDescriptor[];
}
