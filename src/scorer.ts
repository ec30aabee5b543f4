import type { NewsItem, ScoringConfig } from "./types";

/** Flagship AI vendors and products, funding-round terms, compute and chip terms. */
export const DEFAULT_TERMS: readonly string[] = [
    "openai", "anthropic", "deepmind", "meta ai", "claude",
    "gpt-5", "gpt-4", "sora", "gemini", "llama", "mistral",
    "world model", "funding", "series a", "series b", "series c", "raises",
    "ai compute", "ai chips", "gpu", "nvidia", "data center",
    "data annotation", "ai startup",
];

export const DEFAULT_SCORING: ScoringConfig = {
    base: 1.0,
    keywordWeight: 2.0,
    termWeight: 3.0,
    terms: DEFAULT_TERMS,
};

function countMatches(haystack: string, needles: readonly string[]): number {
    let n = 0;
    for (const needle of needles) {
        const term = needle.trim().toLowerCase();
        if (term && haystack.includes(term)) n++;
    }
    return n;
}

/**
 * Relevance of a title.
 *
 * score = base + keywordWeight × (source keywords found) + termWeight × (terms found)
 *
 * Plain substring containment after lower-casing, so "gpt-4" also hits "gpt-4o".
 * Every match counts; there is no cap.
 */
export function computeScore(
    title: string,
    keywords: readonly string[] = [],
    scoring: ScoringConfig = DEFAULT_SCORING,
): number {
    const t = title.toLowerCase();
    return scoring.base
        + scoring.keywordWeight * countMatches(t, keywords)
        + scoring.termWeight * countMatches(t, scoring.terms);
}

/**
 * Collapse same-URL items (first arrival wins), sort by score → top N.
 * Array.prototype.sort is stable, so equal scores keep arrival order.
 */
export function rankAndSelect(items: readonly NewsItem[], maxNews: number): NewsItem[] {
    const seen = new Set<string>();
    const unique: NewsItem[] = [];

    for (const item of items) {
        if (seen.has(item.fingerprint)) continue;
        seen.add(item.fingerprint);
        unique.push(item);
    }

    return unique
        .sort((a, b) => b.score - a.score)
        .slice(0, Math.max(0, maxNews));
}
