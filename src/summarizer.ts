import OpenAI from "openai";
import type { Logger } from "./logger";
import { errorMessage } from "./logger";
import type { NewsItem, SummaryHook } from "./types";

interface SummarizerConfig {
    provider: "openai" | "anthropic";
    apiKey: string;
    model: string;
    baseUrl?: string;
    language?: string;
}

export const sleep = (ms: number) => new Promise<void>((r) => setTimeout(r, ms));

function anthropicText(data: unknown): string {
    if (!data || typeof data !== "object" || !("content" in data) || !Array.isArray(data.content)) return "";
    const blocks: unknown[] = data.content;
    for (const block of blocks) {
        if (!block || typeof block !== "object" || !("type" in block) || !("text" in block)) continue;
        if (block.type === "text" && typeof block.text === "string") return block.text.trim();
    }
    return "";
}

export class Summarizer {
    private client?: OpenAI;
    private config: SummarizerConfig;

    constructor(config: SummarizerConfig, private logger: Logger) {
        this.config = config;
        if (config.provider !== "anthropic") {
            this.client = new OpenAI({
                apiKey: config.apiKey,
                baseURL: config.baseUrl || "https://api.openai.com/v1",
            });
        }
    }

    /** Rewritten summary, or the item's own summary when the model fails or returns nothing. */
    async summarizeItem(item: NewsItem): Promise<string> {
        const language = this.config.language ?? "Chinese";
        const system = `Rewrite the news into a concise summary in ${language}. Return 1–2 sentences, at most 120 words. Keep names, numbers and the main conclusion.`;
        const user = `Title: ${item.title}\nSource: ${item.sourceName}\nContent: ${item.summaryText || item.title}`;
        const text = await this.chat(system, user);
        return text || item.summaryText;
    }

    /** Bound hook for the run controller. */
    hook(): SummaryHook {
        return (item) => this.summarizeItem(item);
    }

    /** Minimal round-trip used by `check`. Throws on failure. */
    async ping(): Promise<void> {
        const reply = await this.request("Reply with the single word: ok", "ping");
        if (!reply) throw new Error("empty reply");
    }

    private async chat(system: string, user: string): Promise<string> {
        try {
            return await this.request(system, user);
        } catch (err) {
            this.logger.error("Chat failed", err);
            return "";
        }
    }

    private request(system: string, user: string): Promise<string> {
        if (this.config.provider === "anthropic") return this.chatAnthropic(system, user);
        return this.chatOpenAI(system, user);
    }

    private async chatOpenAI(system: string, user: string): Promise<string> {
        if (!this.client) throw new Error("OpenAI client not initialised");
        const resp = await this.client.chat.completions.create({
            model: this.config.model,
            messages: [
                { role: "system", content: system },
                { role: "user", content: user },
            ],
            temperature: 0.4,
        });
        return resp.choices[0]?.message?.content?.trim() ?? "";
    }

    private async chatAnthropic(system: string, user: string): Promise<string> {
        const baseUrl = (this.config.baseUrl || "https://api.anthropic.com").replace(/\/+$/, "");
        const resp = await fetch(`${baseUrl}/v1/messages`, {
            method: "POST",
            headers: {
                "Content-Type": "application/json",
                "x-api-key": this.config.apiKey,
                "anthropic-version": "2023-06-01",
            },
            body: JSON.stringify({
                model: this.config.model,
                max_tokens: 512,
                system,
                messages: [{ role: "user", content: user }],
            }),
        });
        if (!resp.ok) throw new Error(`Anthropic error ${resp.status}: ${await resp.text()}`);
        return anthropicText(await resp.json());
    }
}

/**
 * Run the hook over each item in order, one call at a time, pausing `delay` ms between calls.
 * A throwing hook or a blank reply leaves that item's summary as it was.
 */
export async function applySummaries(
    items: readonly NewsItem[],
    hook: SummaryHook,
    opts: { delay: number; logger: Logger; wait?: (ms: number) => Promise<void> },
): Promise<NewsItem[]> {
    const wait = opts.wait ?? sleep;
    const out: NewsItem[] = [];

    for (let i = 0; i < items.length; i++) {
        const item = items[i];
        if (!item) continue;
        if (i > 0 && opts.delay > 0) await wait(opts.delay);
        try {
            const text = (await hook(item)).trim();
            if (text && text !== item.summaryText) {
                out.push({ ...item, summaryText: text });
                opts.logger.debug(`Summarised: ${item.title.slice(0, 40)}`);
                continue;
            }
        } catch (err) {
            opts.logger.warn(`Summary hook failed for ${item.url}, keeping extracted text: ${errorMessage(err)}`);
        }
        out.push(item);
    }
    return out;
}
