import { createHmac } from "node:crypto";
import type { Logger } from "./logger";
import { DIGEST_TITLE, renderDigest } from "./renderer";
import type { Dispatcher, NewsItem } from "./types";

interface DingTalkConfig {
    webhook: string;
    secret: string;
    timeout: number;
}

/** `&timestamp=..&sign=..` for a DingTalk robot with "加签" enabled. */
export function signQuery(secret: string, timestamp: number): string {
    const signature = createHmac("sha256", secret)
        .update(`${timestamp}\n${secret}`)
        .digest("base64");
    return `&timestamp=${timestamp}&sign=${encodeURIComponent(signature)}`;
}

function errcodeOf(data: unknown): unknown {
    return data && typeof data === "object" && "errcode" in data ? data.errcode : undefined;
}

export class DingTalkDispatcher implements Dispatcher {
    constructor(
        private config: DingTalkConfig,
        private logger: Logger,
        private clock: () => number = Date.now,
    ) {}

    async send(items: readonly NewsItem[], label: string): Promise<boolean> {
        return this.post({
            msgtype: "markdown",
            markdown: {
                title: `${DIGEST_TITLE} | ${label}`,
                text: renderDigest(items, label),
            },
        });
    }

    /** Plain text message, used by `check`. */
    async sendText(content: string): Promise<boolean> {
        return this.post({ msgtype: "text", text: { content } });
    }

    private url(): string {
        if (!this.config.secret) return this.config.webhook;
        return this.config.webhook + signQuery(this.config.secret, this.clock());
    }

    private async post(payload: Record<string, unknown>): Promise<boolean> {
        if (!this.config.webhook) {
            this.logger.error("No DingTalk webhook configured");
            return false;
        }
        try {
            const resp = await fetch(this.url(), {
                method: "POST",
                headers: { "Content-Type": "application/json" },
                body: JSON.stringify(payload),
                signal: AbortSignal.timeout(this.config.timeout),
            });
            if (!resp.ok) {
                this.logger.error(`DingTalk HTTP ${resp.status}: ${await resp.text()}`);
                return false;
            }
            const data: unknown = await resp.json();
            if (errcodeOf(data) === 0) {
                this.logger.info("✅ DingTalk message delivered");
                return true;
            }
            this.logger.error(`❌ DingTalk rejected message: ${JSON.stringify(data)}`);
            return false;
        } catch (err) {
            this.logger.error("❌ DingTalk request failed", err);
            return false;
        }
    }
}

/** `--dry-run`: print the digest instead of delivering it. */
export class StdoutDispatcher implements Dispatcher {
    constructor(private write: (text: string) => void = (t) => { process.stdout.write(t); }) {}

    async send(items: readonly NewsItem[], label: string): Promise<boolean> {
        this.write(renderDigest(items, label) + "\n");
        return true;
    }
}
