import { DingTalkDispatcher } from "./dispatcher";
import type { Logger } from "./logger";
import { feedRequestInit, parseFeed } from "./sources/rss";
import { Summarizer } from "./summarizer";
import type { AppConfig, SourceDescriptor } from "./types";

export interface CheckOptions {
    /** Also push a text message to the webhook. */
    webhook: boolean;
    now?: () => Date;
}

export interface CheckReport {
    name: string;
    passed: boolean;
}

async function probeSource(source: SourceDescriptor, timeout: number): Promise<number> {
    const resp = await fetch(source.feedUrl, feedRequestInit(timeout));
    if (!resp.ok) throw new Error(`HTTP ${resp.status}`);
    const entries = await parseFeed(await resp.text());
    return entries.length;
}

/**
 * Config sanity check: every source must parse with entries, the webhook must accept
 * a test message (when asked), the LLM must answer (when enabled).
 */
export async function runChecks(config: AppConfig, logger: Logger, opts: CheckOptions): Promise<CheckReport[]> {
    const reports: CheckReport[] = [];
    const now = (opts.now ?? (() => new Date()))();

    // ── config ──
    const configOk = config.sources.length > 0 && Boolean(config.dingtalk.webhook);
    if (config.sources.length === 0) logger.error("No news_sources configured");
    if (!config.dingtalk.webhook) logger.error("No DingTalk webhook configured (dingtalk.webhook or DINGTALK_WEBHOOK)");
    if (configOk) logger.info(`✅ Config: ${config.sources.length} sources`);
    reports.push({ name: "config", passed: configOk });

    // ── sources ──
    let working = 0;
    for (const source of config.sources) {
        try {
            const count = await probeSource(source, config.settings.fetchTimeout);
            if (count > 0) {
                working++;
                logger.info(`  ✅ ${source.name} [${source.category}]: ${count} entries`);
            } else {
                logger.warn(`  ❌ ${source.name} [${source.category}]: feed has no entries`);
            }
        } catch (err) {
            logger.error(`  ❌ ${source.name} [${source.category}]`, err);
        }
    }
    logger.info(`📈 Sources: ${working}/${config.sources.length} working`);
    reports.push({ name: "sources", passed: working > 0 });

    // ── webhook ──
    if (opts.webhook) {
        const dispatcher = new DingTalkDispatcher(config.dingtalk, logger);
        const ok = await dispatcher.sendText(`🤖 rss-brief config check\n⏰ ${now.toISOString()}\n✅ webhook reachable`);
        reports.push({ name: "webhook", passed: ok });
    }

    // ── ai ──
    if (config.ai.enabled) {
        if (!config.ai.apiKey) {
            logger.error("ai.enabled is set but no API key is configured");
            reports.push({ name: "ai", passed: false });
        } else {
            const summarizer = new Summarizer(config.ai, logger);
            try {
                await summarizer.ping();
                logger.info(`✅ AI: ${config.ai.provider}/${config.ai.model}`);
                reports.push({ name: "ai", passed: true });
            } catch (err) {
                logger.error(`❌ AI: ${config.ai.provider}/${config.ai.model}`, err);
                reports.push({ name: "ai", passed: false });
            }
        }
    }

    const passed = reports.filter((r) => r.passed).length;
    logger.info(`📋 ${passed}/${reports.length} checks passed`);
    return reports;
}
