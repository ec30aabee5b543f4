import { fetchAll, summarizeReports, type SourceFetcher } from "./fetcher";
import type { Logger } from "./logger";
import { formatRunLabel } from "./renderer";
import { rankAndSelect } from "./scorer";
import { fetchSource } from "./sources/rss";
import type { SeenSetStore } from "./storage";
import { applySummaries, sleep } from "./summarizer";
import type { AppConfig, Dispatcher, NewsItem, RunOutcome, RunState, SourceReport, SummaryHook } from "./types";

export interface RunControllerDeps {
    config: AppConfig;
    logger: Logger;
    store: SeenSetStore;
    dispatcher: Dispatcher;
    /** Optional per-item summary rewrite, applied after selection. */
    summarize?: SummaryHook;
    fetchOne?: SourceFetcher;
    now?: () => Date;
    wait?: (ms: number) => Promise<void>;
    /** false: deliver but leave the seen-set untouched (dry run). */
    commit?: boolean;
}

/**
 * One digest run:
 *
 *   idle → fetching → selecting → transforming → dispatching → committing → done
 *
 * `failed` is reachable from fetching (nothing fetched at all) and from
 * dispatching (delivery not confirmed). The seen-set is only written in committing.
 */
export class RunController {
    private _state: RunState = "idle";
    private readonly log: Logger;

    constructor(private deps: RunControllerDeps) {
        this.log = deps.logger.child("run");
    }

    get state(): RunState {
        return this._state;
    }

    private enter(state: RunState): void {
        this.log.debug(`${this._state} → ${state}`);
        this._state = state;
    }

    async run(): Promise<RunOutcome> {
        if (this._state !== "idle") throw new Error(`RunController already used (state: ${this._state})`);

        const { config, store, dispatcher } = this.deps;
        const now = (this.deps.now ?? (() => new Date()))();
        const label = formatRunLabel(now, config.settings.timezone);
        this.log.info(`🚀 Digest run ${label}`);

        // ── fetching ──
        this.enter("fetching");
        store.load();
        const seen = store.snapshot();
        const cutoff = new Date(now.getTime() - config.settings.windowHours * 3_600_000);

        const { items, reports } = await fetchAll(
            config.sources,
            {
                concurrency: config.settings.concurrency,
                seen,
                cutoff,
                now,
                timeout: config.settings.fetchTimeout,
                maxEntries: config.settings.maxEntriesPerSource,
                summaryLength: config.settings.summaryLength,
                includeUndated: config.settings.includeUndated,
                scoring: config.scoring,
                logger: this.deps.logger,
            },
            this.deps.fetchOne ?? fetchSource,
        );
        summarizeReports(reports, this.log);

        if (items.length === 0) {
            return this.fail("fetching", "no items fetched from any source", reports);
        }
        this.log.info(`📊 ${items.length} candidate items`);

        // ── selecting ──
        this.enter("selecting");
        let selected: NewsItem[] = rankAndSelect(items, config.settings.maxNews);
        this.log.info(`✅ Selected ${selected.length} items`);

        // ── transforming ──
        this.enter("transforming");
        if (this.deps.summarize) {
            selected = await applySummaries(selected, this.deps.summarize, {
                delay: config.ai.delay,
                logger: this.log,
                wait: this.deps.wait ?? sleep,
            });
        }

        // ── dispatching ──
        this.enter("dispatching");
        let delivered: boolean;
        try {
            delivered = await dispatcher.send(selected, label);
        } catch (err) {
            this.log.error("Dispatcher threw", err);
            delivered = false;
        }
        if (!delivered) {
            return this.fail("dispatching", "digest delivery failed", reports);
        }

        // ── committing ──
        if (this.deps.commit === false) {
            this.log.info("Dry run, seen-set left untouched");
        } else {
            this.enter("committing");
            for (const item of selected) store.add(item.fingerprint);
            store.flush(now);
            this.log.info(`💾 Seen-set now holds ${store.size} fingerprints`);
        }

        this.enter("done");
        this.log.info("🎉 Done!");
        return { ok: true, state: "done", result: { items: selected, label }, reports };
    }

    private fail(failedAt: "fetching" | "dispatching", reason: string, reports: SourceReport[]): RunOutcome {
        this.enter("failed");
        this.log.error(`❌ Run failed while ${failedAt}: ${reason}`);
        return { ok: false, state: "failed", failedAt, reason, reports };
    }
}
