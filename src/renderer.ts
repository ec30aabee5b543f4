import type { NewsItem } from "./types";

const CATEGORY_EMOJI: Record<string, string> = {
    ai_research: "🔬",
    ai_funding: "💰",
    ai_compute: "⚡",
    ai_data: "📊",
    ai_product: "🚀",
    general: "📰",
};

const CATEGORY_NAMES: Record<string, string> = {
    ai_research: "头部公司研发",
    ai_funding: "融资动态",
    ai_compute: "算力市场",
    ai_data: "数据标注",
    ai_product: "AI应用",
    general: "综合资讯",
};

export const DIGEST_TITLE = "🤖 AI Daily Brief";

export function categoryEmoji(category: string): string {
    return CATEGORY_EMOJI[category] ?? "📰";
}

export function categoryName(category: string): string {
    return CATEGORY_NAMES[category] ?? category;
}

/** Run label: YYYY.MM.DD in the given zone. */
export function formatRunLabel(now: Date, timeZone: string): string {
    return new Intl.DateTimeFormat("en-CA", {
        timeZone,
        year: "numeric", month: "2-digit", day: "2-digit",
    }).format(now).replace(/-/g, ".");
}

/** Keep one-line fields from breaking the markdown structure. */
function inline(s: string): string {
    return s.replace(/\s*\r?\n\s*/g, " ").trim();
}

export function renderDigest(items: readonly NewsItem[], label: string): string {
    const lines: string[] = [];

    lines.push(`## ${DIGEST_TITLE}`);
    lines.push(`### 📅 ${label}`);
    lines.push("");
    lines.push("---");
    lines.push(`📈 **今日精选 ${items.length} 条核心资讯**`);
    lines.push("");

    // Per-category counts, in order of first appearance
    const counts = new Map<string, number>();
    for (const item of items) counts.set(item.category, (counts.get(item.category) ?? 0) + 1);
    const stats = Array.from(counts, ([cat, n]) => `${categoryEmoji(cat)} ${categoryName(cat)}: ${n}`);
    lines.push(stats.join(" | "));
    lines.push("");
    lines.push("---");
    lines.push("");

    lines.push("### 📰 **今日要闻**");
    lines.push("");

    for (const item of items) {
        lines.push(`#### ${categoryEmoji(item.category)} **${inline(item.title)}**`);
        if (item.summaryText) lines.push(`> ${inline(item.summaryText)}`);
        lines.push(`> 📍 **${inline(item.sourceName)}** | 🔗 [阅读原文](${item.url})`);
        lines.push("");
    }

    lines.push("---");
    lines.push("");
    lines.push("💡 **聚焦领域**: 世界模型 | AI算力 | 数据标注 | 头部公司动态 | 融资资讯");

    return lines.join("\n");
}
