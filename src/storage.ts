import { createHash } from "node:crypto";
import { existsSync, mkdirSync, readFileSync, renameSync, rmSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";
import type { Logger } from "./logger";

interface SeenFile {
    fingerprints: string[];
    updatedAt: string;
}

/** Dedup key for an article: md5 of its URL. */
export function fingerprint(url: string): string {
    return createHash("md5").update(url).digest("hex");
}

function parseSeenFile(raw: string): string[] | null {
    let data: unknown;
    try {
        data = JSON.parse(raw);
    } catch {
        return null;
    }
    if (!data || typeof data !== "object" || !("fingerprints" in data)) return null;
    const list = data.fingerprints;
    if (!Array.isArray(list)) return null;
    return list.filter((fp): fp is string => typeof fp === "string" && fp.length > 0);
}

/**
 * Fingerprints of items already delivered, persisted as one JSON file.
 * The set only grows; `flush` rewrites the whole file through a temp file + rename.
 */
export class SeenSetStore {
    private seen = new Set<string>();

    constructor(private path: string, private logger: Logger) {}

    /** Missing, unreadable or malformed state loads as an empty set. */
    load(): ReadonlySet<string> {
        this.seen = new Set();
        if (!existsSync(this.path)) {
            this.logger.info(`No seen-set at ${this.path}, starting empty`);
            return this.seen;
        }

        let raw: string;
        try {
            raw = readFileSync(this.path, "utf-8");
        } catch (err) {
            this.logger.error(`Cannot read seen-set ${this.path}, starting empty`, err);
            return this.seen;
        }

        const list = parseSeenFile(raw);
        if (list === null) {
            this.logger.warn(`Seen-set ${this.path} is malformed, starting empty`);
            return this.seen;
        }
        this.seen = new Set(list);
        this.logger.debug(`Loaded ${this.seen.size} fingerprints`);
        return this.seen;
    }

    contains(fp: string): boolean {
        return this.seen.has(fp);
    }

    add(fp: string): void {
        this.seen.add(fp);
    }

    get size(): number {
        return this.seen.size;
    }

    /** Copy that later `add` calls do not touch. */
    snapshot(): ReadonlySet<string> {
        return new Set(this.seen);
    }

    flush(now: Date = new Date()): void {
        const data: SeenFile = { fingerprints: Array.from(this.seen), updatedAt: now.toISOString() };
        mkdirSync(dirname(this.path), { recursive: true });
        const tmp = `${this.path}.${process.pid}.tmp`;
        try {
            writeFileSync(tmp, JSON.stringify(data, null, 2), "utf-8");
            renameSync(tmp, this.path);
        } catch (err) {
            rmSync(tmp, { force: true });
            throw err;
        }
        this.logger.debug(`Flushed ${this.seen.size} fingerprints to ${this.path}`);
    }
}
