import type { Logger } from "./logger";
import { errorMessage } from "./logger";
import { fetchSource, type FetchSourceOptions } from "./sources/rss";
import type { NewsItem, SourceDescriptor, SourceReport } from "./types";

export interface FetchAllOptions extends FetchSourceOptions {
    concurrency: number;
}

export type SourceFetcher = (source: SourceDescriptor, opts: FetchSourceOptions) => Promise<NewsItem[]>;

export interface FetchAllResult {
    /** Source-config order, each source's items in feed order. */
    items: NewsItem[];
    reports: SourceReport[];
}

/**
 * Run every source through `fetchOne` with at most `concurrency` in flight.
 * A source that rejects contributes nothing and is reported; the batch carries on.
 */
export async function fetchAll(
    sources: readonly SourceDescriptor[],
    opts: FetchAllOptions,
    fetchOne: SourceFetcher = fetchSource,
): Promise<FetchAllResult> {
    const results: NewsItem[][] = sources.map(() => []);
    const reports: SourceReport[] = sources.map((s) => ({ source: s.name, category: s.category, items: 0 }));
    if (sources.length === 0) return { items: [], reports };

    const { concurrency, ...sourceOpts } = opts;
    let cursor = 0;

    async function worker() {
        while (true) {
            const idx = cursor++;
            const source = sources[idx];
            const report = reports[idx];
            if (!source || !report) break;
            try {
                const items = await fetchOne(source, sourceOpts);
                results[idx] = items;
                report.items = items.length;
            } catch (err) {
                report.error = errorMessage(err);
                opts.logger.error(`Source ${source.name} failed`, err);
            }
        }
    }

    await Promise.all(
        Array.from({ length: Math.min(Math.max(1, concurrency), sources.length) }, () => worker()),
    );

    return { items: results.flat(), reports };
}

export function summarizeReports(reports: readonly SourceReport[], logger: Logger): void {
    const ok = reports.filter((r) => !r.error && r.items > 0).length;
    const failed = reports.filter((r) => r.error).map((r) => r.source);
    logger.info(`${ok}/${reports.length} sources returned items`);
    if (failed.length > 0) logger.warn(`Failed sources: ${failed.join(", ")}`);
}
