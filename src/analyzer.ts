import { mulberry32, seedFromText } from "./random";
import { signalScore } from "./scorer";
import { summarize } from "./summarizer";
import { tagTopics } from "./topics";
import type { AnalysisConfig } from "./config";
import type { SentimentScorer } from "./sentiment";
import type { AnalysisRecord } from "./types";

export interface AnalyzeOptions {
    /** Score from the sentiment collaborator, clamped to [-1, 1] */
    sentiment: number;
    /** PRNG seed for the generative TL;DR; derived from the text when omitted */
    seed?: number;
}

/**
 * Analyze cleaned article text. Pure: the same text, config and seed always
 * give the same record. The record is frozen; re-analysis builds a new one.
 */
export function analyze(text: string, config: AnalysisConfig, options: AnalyzeOptions): AnalysisRecord {
    const rng = mulberry32(options.seed ?? seedFromText(text));
    const sentiment = Number.isNaN(options.sentiment) ? 0 : Math.min(1, Math.max(-1, options.sentiment));

    return Object.freeze({
        sentiment,
        signal: signalScore(text, config.signal.weights),
        topics: Object.freeze(tagTopics(text, config.topics.maxTopics)),
        tldr: summarize(text, config.summary, rng).tldr,
    });
}

/** Await the sentiment collaborator, then run the pure analysis. */
export async function analyzeArticle(
    text: string,
    config: AnalysisConfig,
    scorer: SentimentScorer,
    seed?: number
): Promise<AnalysisRecord> {
    const sentiment = await scorer.score(text);
    return analyze(text, config, { sentiment, seed });
}
