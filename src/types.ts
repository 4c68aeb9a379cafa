// Chain model

/** N-gram context (joined by a single space) → observed next tokens, duplicates kept */
export interface Chain {
    n: number;
    transitions: Map<string, string[]>;
}

/** Uniform random source in [0, 1) */
export type Rng = () => number;

// Summaries

export interface Sentence {
    text: string;
    index: number;
    score: number;
}

export type SummaryMethod = "extractive" | "generative" | "verbatim";

export interface SummaryResult {
    tldr: string;
    method: SummaryMethod;
}

// Analysis

export interface AnalysisRecord {
    readonly sentiment: number;
    readonly signal: number;
    readonly topics: readonly string[];
    readonly tldr: string;
}

export interface StoredAnalysis {
    articleId: string;
    title: string;
    analyzedAt: Date;
    record: AnalysisRecord;
}

// Consumption tracking

export interface ReadEvent {
    articleId: string;
    topics: readonly string[];
    timestamp: Date;
}

export interface NudgeDecision {
    triggered: boolean;
    dominantTopic: string | null;
    dominantFraction: number;
    suggestedTopics: string[];
}

export interface ReadingStats {
    periodDays: number;
    totalArticles: number;
    articlesPerDay: number;
    topTopics: Array<{ topic: string; count: number }>;
}
