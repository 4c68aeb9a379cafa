import { readFileSync, writeFileSync, appendFileSync, existsSync, mkdirSync } from "node:fs";
import { join } from "node:path";
import type { AnalysisRecord, ReadEvent, ReadingStats, StoredAnalysis } from "./types";

/** Append-only log of read events. */
export interface ReadEventLog {
    append(event: ReadEvent): void;
    /** Most recent `limit` events, newest first */
    recent(limit: number): ReadEvent[];
}

interface ReadEventRow {
    articleId: string;
    topics: string[];
    timestamp: string;
}

interface StoredAnalysisRow {
    articleId: string;
    title: string;
    analyzedAt: string;
    record: AnalysisRecord;
}

function isReadEventRow(value: unknown): value is ReadEventRow {
    return (
        typeof value === "object" &&
        value !== null &&
        "articleId" in value &&
        typeof value.articleId === "string" &&
        "timestamp" in value &&
        typeof value.timestamp === "string" &&
        "topics" in value &&
        Array.isArray(value.topics) &&
        value.topics.every((t: unknown) => typeof t === "string")
    );
}

function isAnalysisRecord(value: unknown): value is AnalysisRecord {
    return (
        typeof value === "object" &&
        value !== null &&
        "sentiment" in value &&
        typeof value.sentiment === "number" &&
        "signal" in value &&
        typeof value.signal === "number" &&
        "tldr" in value &&
        typeof value.tldr === "string" &&
        "topics" in value &&
        Array.isArray(value.topics) &&
        value.topics.every((t: unknown) => typeof t === "string")
    );
}

function isStoredAnalysisRow(value: unknown): value is StoredAnalysisRow {
    return (
        typeof value === "object" &&
        value !== null &&
        "articleId" in value &&
        typeof value.articleId === "string" &&
        "title" in value &&
        typeof value.title === "string" &&
        "analyzedAt" in value &&
        typeof value.analyzedAt === "string" &&
        !Number.isNaN(Date.parse(value.analyzedAt)) &&
        "record" in value &&
        isAnalysisRecord(value.record)
    );
}

/**
 * Simple file-based storage.
 * - `reads.jsonl`: one ReadEvent per line, only ever appended to
 * - `analyses.json`: latest analysis record per article id
 */
export class Storage implements ReadEventLog {
    private dataDir: string;

    constructor(dataDir: string) {
        this.dataDir = dataDir;
        if (!existsSync(this.dataDir)) {
            mkdirSync(this.dataDir, { recursive: true });
        }
    }

    private get readsPath(): string {
        return join(this.dataDir, "reads.jsonl");
    }

    private get analysesPath(): string {
        return join(this.dataDir, "analyses.json");
    }

    append(event: ReadEvent): void {
        const row: ReadEventRow = {
            articleId: event.articleId,
            topics: [...event.topics],
            timestamp: event.timestamp.toISOString(),
        };
        appendFileSync(this.readsPath, JSON.stringify(row) + "\n", "utf-8");
    }

    /** Every logged event in file order. Corrupt lines are skipped. */
    allEvents(): ReadEvent[] {
        if (!existsSync(this.readsPath)) return [];

        const events: ReadEvent[] = [];
        const lines = readFileSync(this.readsPath, "utf-8").split("\n");
        for (const [i, line] of lines.entries()) {
            if (!line.trim()) continue;
            let parsed: unknown;
            try {
                parsed = JSON.parse(line);
            } catch {
                console.warn(`⚠️  Skipping corrupt line ${i + 1} in ${this.readsPath}`);
                continue;
            }
            if (!isReadEventRow(parsed) || Number.isNaN(Date.parse(parsed.timestamp))) {
                console.warn(`⚠️  Skipping malformed event on line ${i + 1} in ${this.readsPath}`);
                continue;
            }
            events.push({ articleId: parsed.articleId, topics: parsed.topics, timestamp: new Date(parsed.timestamp) });
        }
        return events;
    }

    recent(limit: number): ReadEvent[] {
        return this.allEvents()
            .sort((a, b) => b.timestamp.getTime() - a.timestamp.getTime())
            .slice(0, Math.max(limit, 0));
    }

    /** Every valid stored analysis. A corrupt file reads as empty; malformed rows are skipped. */
    private loadAnalyses(): Record<string, StoredAnalysisRow> {
        if (!existsSync(this.analysesPath)) return {};

        let parsed: unknown;
        try {
            parsed = JSON.parse(readFileSync(this.analysesPath, "utf-8"));
        } catch {
            console.warn(`⚠️  Ignoring corrupt ${this.analysesPath}`);
            return {};
        }
        if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
            console.warn(`⚠️  Ignoring malformed ${this.analysesPath}`);
            return {};
        }

        const rows: Record<string, StoredAnalysisRow> = {};
        for (const [articleId, row] of Object.entries(parsed)) {
            if (isStoredAnalysisRow(row)) {
                rows[articleId] = row;
            } else {
                console.warn(`⚠️  Skipping malformed analysis "${articleId}" in ${this.analysesPath}`);
            }
        }
        return rows;
    }

    /** Store an analysis, replacing any earlier record for the same article */
    saveAnalysis(entry: StoredAnalysis): void {
        const all = this.loadAnalyses();
        all[entry.articleId] = {
            articleId: entry.articleId,
            title: entry.title,
            analyzedAt: entry.analyzedAt.toISOString(),
            record: entry.record,
        };
        writeFileSync(this.analysesPath, JSON.stringify(all, null, 2), "utf-8");
    }

    /** Load an article's analysis (undefined if never analyzed) */
    loadAnalysis(articleId: string): StoredAnalysis | undefined {
        const row = this.loadAnalyses()[articleId];
        if (!row) return undefined;
        // Restore Date objects
        return { ...row, analyzedAt: new Date(row.analyzedAt) };
    }

    /** Reading statistics for the `days` before `now` */
    readingStats(days: number, now: Date = new Date()): ReadingStats {
        const cutoff = now.getTime() - days * 24 * 60 * 60 * 1000;
        const recent = this.allEvents().filter((e) => e.timestamp.getTime() >= cutoff);

        const counts = new Map<string, number>();
        for (const event of recent) {
            for (const topic of new Set(event.topics)) {
                counts.set(topic, (counts.get(topic) ?? 0) + 1);
            }
        }

        return {
            periodDays: days,
            totalArticles: recent.length,
            articlesPerDay: days > 0 ? recent.length / days : 0,
            topTopics: [...counts.entries()]
                .sort((a, b) => b[1] - a[1] || a[0].localeCompare(b[0]))
                .slice(0, 10)
                .map(([topic, count]) => ({ topic, count })),
        };
    }
}
