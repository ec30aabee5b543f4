#!/usr/bin/env tsx
import { Command, InvalidArgumentError } from "commander";
import { checkCommand, runCommand } from "./cli";
import { createLogger, isLogLevel, type LogLevel } from "./logger";

type GlobalOptions = {
    config?: string;
    logLevel: LogLevel;
};

type RunFlags = {
    maxNews?: number;
    dryRun?: boolean;
    ai: boolean;
};

function parsePositiveInt(raw: string): number {
    const n = Number(raw);
    if (!Number.isInteger(n) || n <= 0) throw new InvalidArgumentError("Not a positive integer.");
    return n;
}

function parseLogLevel(raw: string): LogLevel {
    if (isLogLevel(raw)) return raw;
    throw new InvalidArgumentError("Use debug | info | warn | error | silent.");
}

const program = new Command();

program
    .name("rss-brief")
    .description("RSS 新闻日报 — 抓取、去重、评分并推送到钉钉")
    .version("0.1.0")
    .option("-c, --config <path>", "config.yaml 路径")
    .option("-l, --log-level <level>", "debug | info | warn | error | silent", parseLogLevel, "info");

program
    .command("run", { isDefault: true })
    .description("执行一次日报任务（抓取 → 评分 → 推送 → 记录已发送）")
    .option("-n, --max-news <number>", "覆盖 settings.max_news", parsePositiveInt)
    .option("--dry-run", "打印日报而不推送，也不写入已发送记录")
    .option("--no-ai", "跳过 AI 摘要")
    .action(async (flags: RunFlags) => {
        const globals = program.opts<GlobalOptions>();
        const logger = createLogger({ level: globals.logLevel });
        process.exitCode = await runCommand({ ...flags, config: globals.config }, logger);
    });

program
    .command("check")
    .description("检查配置、新闻源、钉钉 Webhook 与 AI 接口")
    .option("--webhook", "向钉钉发送一条测试消息")
    .action(async (flags: { webhook?: boolean }) => {
        const globals = program.opts<GlobalOptions>();
        const logger = createLogger({ level: globals.logLevel });
        process.exitCode = await checkCommand({ ...flags, config: globals.config }, logger);
    });

await program.parseAsync();
