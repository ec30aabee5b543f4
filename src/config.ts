import { existsSync, readFileSync } from "node:fs";
import { dirname, isAbsolute, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import YAML from "yaml";
import { z } from "zod";
import { errorMessage } from "./logger";
import { DEFAULT_SCORING } from "./scorer";
import type { AppConfig, SourceDescriptor } from "./types";

const ROOT_DIR = resolve(dirname(fileURLToPath(import.meta.url)), "..");

export class ConfigError extends Error {
    constructor(message: string) {
        super(message);
        this.name = "ConfigError";
    }
}

function localTimeZone(): string {
    return Intl.DateTimeFormat().resolvedOptions().timeZone || "UTC";
}

const DEFAULTS = {
    dingtalk: {
        webhook: "",
        secret: "",
        timeout: 30000,
    },
    settings: {
        maxNews: 10,
        windowHours: 24,
        maxEntriesPerSource: 50,
        summaryLength: 250,
        concurrency: 4,
        fetchTimeout: 15000,
        includeUndated: true,
        timezone: "",
        seenFile: "data/seen.json",
    },
    scoring: {
        base: DEFAULT_SCORING.base,
        keywordWeight: DEFAULT_SCORING.keywordWeight,
        termWeight: DEFAULT_SCORING.termWeight,
        terms: [...DEFAULT_SCORING.terms],
    },
    ai: {
        enabled: false,
        provider: "openai",
        apiKey: "",
        model: "gpt-4o-mini",
        baseUrl: "",
        delay: 1000,
        language: "Chinese",
    },
};

function isValidTimeZone(tz: string): boolean {
    try {
        new Intl.DateTimeFormat("en-US", { timeZone: tz });
        return true;
    } catch {
        return false;
    }
}

const positiveInt = z.number().int().positive();

const configSchema = z.object({
    dingtalk: z.object({
        webhook: z.string(),
        secret: z.string(),
        timeout: positiveInt,
    }),
    settings: z.object({
        maxNews: positiveInt,
        windowHours: z.number().positive(),
        maxEntriesPerSource: positiveInt,
        summaryLength: positiveInt,
        concurrency: positiveInt,
        fetchTimeout: positiveInt,
        includeUndated: z.boolean(),
        timezone: z.string().refine((tz) => tz === "" || isValidTimeZone(tz), "unknown time zone"),
        seenFile: z.string().min(1),
    }),
    scoring: z.object({
        base: z.number().nonnegative(),
        keywordWeight: z.number().nonnegative(),
        termWeight: z.number().nonnegative(),
        terms: z.array(z.string()),
    }),
    ai: z.object({
        enabled: z.boolean(),
        provider: z.enum(["openai", "anthropic"]),
        apiKey: z.string(),
        model: z.string().min(1),
        baseUrl: z.string(),
        delay: z.number().int().nonnegative(),
        language: z.string().min(1),
    }),
});

const sourceSchema = z.object({
    name: z.string().trim().min(1),
    url: z.string().url(),
    keywords: z.array(z.string()).nullish(),
});

const sourcesSchema = z.record(z.array(sourceSchema).nullish());

function isRecord(v: unknown): v is Record<string, unknown> {
    return v !== null && typeof v === "object" && !Array.isArray(v);
}

function snakeToCamel(obj: unknown): unknown {
    if (Array.isArray(obj)) return obj.map(snakeToCamel);
    if (isRecord(obj)) {
        const result: Record<string, unknown> = {};
        for (const [key, value] of Object.entries(obj)) {
            const camelKey = key.replace(/_([a-z])/g, (_, c: string) => c.toUpperCase());
            result[camelKey] = snakeToCamel(value);
        }
        return result;
    }
    return obj;
}

function deepMerge(target: Record<string, unknown>, source: Record<string, unknown>): Record<string, unknown> {
    const result = { ...target };
    for (const [key, sv] of Object.entries(source)) {
        const tv = result[key];
        if (isRecord(sv) && isRecord(tv)) {
            result[key] = deepMerge(tv, sv);
        } else if (sv !== undefined && sv !== null) {
            result[key] = sv;
        }
    }
    return result;
}

function deepFreeze<T>(value: T): T {
    if (value && typeof value === "object") {
        for (const v of Object.values(value)) deepFreeze(v);
        Object.freeze(value);
    }
    return value;
}

function formatIssues(prefix: string, err: z.ZodError): string {
    return err.issues
        .map((i) => `${[prefix, ...i.path].filter((p) => p !== "").join(".")}: ${i.message}`)
        .join("; ");
}

/** Grouped `news_sources` → one new descriptor per source, category attached. */
function flattenSources(raw: unknown): SourceDescriptor[] {
    if (raw === undefined || raw === null) return [];
    const parsed = sourcesSchema.safeParse(raw);
    if (!parsed.success) throw new ConfigError(`Invalid config: ${formatIssues("news_sources", parsed.error)}`);

    const out: SourceDescriptor[] = [];
    for (const [category, list] of Object.entries(parsed.data)) {
        for (const src of list ?? []) {
            out.push({
                name: src.name,
                feedUrl: src.url,
                category,
                keywords: (src.keywords ?? []).map((k) => k.trim()).filter(Boolean),
            });
        }
    }
    return out;
}

function readYaml(path: string): Record<string, unknown> {
    let parsed: unknown;
    try {
        parsed = YAML.parse(readFileSync(path, "utf-8"));
    } catch (err) {
        throw new ConfigError(`Cannot parse ${path}: ${errorMessage(err)}`);
    }
    if (parsed === null || parsed === undefined) return {};
    if (!isRecord(parsed)) throw new ConfigError(`${path} must contain a mapping at the top level`);
    return parsed;
}

/**
 * Load config.yaml (or `configPath`) over the built-in defaults.
 * Secrets left blank fall back to env vars. The result is deep-frozen.
 */
export function loadConfig(configPath?: string, env: NodeJS.ProcessEnv = process.env): AppConfig {
    const path = configPath ? resolve(configPath) : resolve(ROOT_DIR, "config.yaml");
    if (configPath && !existsSync(path)) throw new ConfigError(`Config file not found: ${path}`);

    const raw: Record<string, unknown> = existsSync(path) ? readYaml(path) : {};
    // Category names under news_sources are user data, keep them verbatim
    const { news_sources: rawSources, ...rest } = raw;
    const normalized = snakeToCamel(rest);
    const merged = deepMerge(DEFAULTS, isRecord(normalized) ? normalized : {});

    const parsed = configSchema.safeParse(merged);
    if (!parsed.success) throw new ConfigError(`Invalid config: ${formatIssues("", parsed.error)}`);
    const c = parsed.data;

    // Env fallbacks
    const apiKey = c.ai.apiKey || (c.ai.provider === "anthropic"
        ? env.ANTHROPIC_API_KEY
        : env.OPENAI_API_KEY) || "";

    const seenFile = isAbsolute(c.settings.seenFile)
        ? c.settings.seenFile
        : resolve(dirname(path), c.settings.seenFile);

    return deepFreeze({
        dingtalk: {
            webhook: c.dingtalk.webhook || env.DINGTALK_WEBHOOK || "",
            secret: c.dingtalk.secret || env.DINGTALK_SECRET || "",
            timeout: c.dingtalk.timeout,
        },
        settings: {
            ...c.settings,
            timezone: c.settings.timezone || localTimeZone(),
            seenFile,
        },
        scoring: c.scoring,
        ai: { ...c.ai, apiKey },
        sources: flattenSources(rawSources),
    });
}

export { ROOT_DIR };
