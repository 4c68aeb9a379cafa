import type { AnalysisRecord, NudgeDecision, ReadingStats } from "./types";

interface RenderData {
    title: string;
    record: AnalysisRecord;
    readingMinutes: number;
}

export function sentimentLabel(score: number): string {
    if (score >= 0.5) return "Very positive";
    if (score >= 0.2) return "Slightly positive";
    if (score >= -0.2) return "Neutral";
    if (score >= -0.5) return "Slightly negative";
    return "Very negative";
}

function bar(value: number, width = 10): string {
    const filled = Math.round(Math.min(1, Math.max(0, value)) * width);
    return "█".repeat(filled) + "░".repeat(width - filled);
}

/**
 * Render an analysis record to Markdown. The TL;DR comes first so it is
 * read before anything else about the article.
 */
export function renderAnalysis(data: RenderData): string {
    const { record } = data;
    const lines: string[] = [];

    lines.push(`## ${data.title}`);
    lines.push("");

    if (record.tldr) {
        lines.push(`> **TL;DR** ${record.tldr}`);
        lines.push("");
    }

    lines.push(`- Signal: ${bar(record.signal)} ${record.signal.toFixed(2)}`);
    lines.push(`- Sentiment: ${sentimentLabel(record.sentiment)} (${record.sentiment.toFixed(2)})`);
    lines.push(`- Topics: ${record.topics.join(", ")}`);
    lines.push(`- Reading time: ~${data.readingMinutes} min`);
    lines.push("");

    return lines.join("\n");
}

/** Diversification nudge text; empty when nothing triggered */
export function renderNudge(decision: NudgeDecision): string {
    if (!decision.triggered || decision.dominantTopic === null) return "";

    const pct = Math.round(decision.dominantFraction * 100);
    const lines = [`🧭 ${pct}% of your recent reads are about "${decision.dominantTopic}".`];
    if (decision.suggestedTopics.length > 0) {
        lines.push(`   Maybe try: ${decision.suggestedTopics.join(", ")}`);
    }
    return lines.join("\n");
}

export function renderStats(stats: ReadingStats): string {
    const lines: string[] = [];
    lines.push(`Last ${stats.periodDays} days: ${stats.totalArticles} articles (${stats.articlesPerDay.toFixed(1)}/day)`);
    for (const { topic, count } of stats.topTopics) {
        lines.push(`  ${topic.padEnd(14)} ${count}`);
    }
    return lines.join("\n");
}
