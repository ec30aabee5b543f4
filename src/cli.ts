import { runChecks } from "./check";
import { ConfigError, loadConfig } from "./config";
import { DingTalkDispatcher, StdoutDispatcher } from "./dispatcher";
import type { Logger } from "./logger";
import { RunController } from "./pipeline";
import { SeenSetStore } from "./storage";
import { Summarizer } from "./summarizer";
import type { AppConfig } from "./types";

export type RunOptions = {
    config?: string;
    maxNews?: number;
    dryRun?: boolean;
    ai: boolean;
};

export type CheckCommandOptions = {
    config?: string;
    webhook?: boolean;
};

function withMaxNews(config: AppConfig, maxNews: number | undefined): AppConfig {
    if (maxNews === undefined) return config;
    return { ...config, settings: { ...config.settings, maxNews } };
}

/** Run an action and map it to a process exit code; any throw is logged and becomes 1. */
export async function execute(logger: Logger, action: () => Promise<number>): Promise<number> {
    try {
        return await action();
    } catch (err) {
        if (err instanceof ConfigError) logger.error(err.message);
        else logger.error("❌ Unexpected error", err);
        return 1;
    }
}

export async function runDigest(baseConfig: AppConfig, opts: RunOptions, logger: Logger): Promise<boolean> {
    const config = withMaxNews(baseConfig, opts.maxNews);

    if (config.sources.length === 0) {
        logger.warn("No news_sources configured");
    }

    const dispatcher = opts.dryRun
        ? new StdoutDispatcher()
        : new DingTalkDispatcher(config.dingtalk, logger.child("dingtalk"));

    let summarizer: Summarizer | null = null;
    if (opts.ai && config.ai.enabled) {
        if (config.ai.apiKey) {
            summarizer = new Summarizer(config.ai, logger.child("ai"));
        } else {
            logger.warn("ai.enabled is set but no API key found, using extracted summaries");
        }
    }

    logger.info(`   Sources: ${config.sources.length}, max news: ${config.settings.maxNews}`);
    logger.info(`   AI: ${summarizer ? `${config.ai.provider}/${config.ai.model}` : "disabled"}`);

    const controller = new RunController({
        config,
        logger,
        store: new SeenSetStore(config.settings.seenFile, logger.child("seen")),
        dispatcher,
        summarize: summarizer?.hook(),
        commit: !opts.dryRun,
    });
    const outcome = await controller.run();
    return outcome.ok;
}

// ── commands ─────────────────────────────────────────────

/** `run`: 0 only when the digest was delivered. */
export function runCommand(opts: RunOptions, logger: Logger, env: NodeJS.ProcessEnv = process.env): Promise<number> {
    return execute(logger, async () => {
        const ok = await runDigest(loadConfig(opts.config, env), opts, logger);
        return ok ? 0 : 1;
    });
}

/** `check`: 0 only when every check passed. */
export function checkCommand(opts: CheckCommandOptions, logger: Logger, env: NodeJS.ProcessEnv = process.env): Promise<number> {
    return execute(logger, async () => {
        const reports = await runChecks(loadConfig(opts.config, env), logger, { webhook: Boolean(opts.webhook) });
        return reports.every((r) => r.passed) ? 0 : 1;
    });
}
