import highSignalList from "./lexicons/high-signal.json";
import lowSignalList from "./lexicons/low-signal.json";
import { alphaWords, clamp01, contentWords, lengthFit, splitSentences, STOP_WORDS, wordCount } from "./text";
import type { SignalWeights } from "./config";
import type { AnalysisRecord } from "./types";

const HIGH_SIGNAL: ReadonlySet<string> = new Set(highSignalList);
const LOW_SIGNAL: ReadonlySet<string> = new Set(lowSignalList);

/** One lexicon hit per ten tokens saturates the term */
const LEXICON_DENSITY_SCALE = 10;
/** Mean content-word length at which the word-length term saturates */
const WORD_LENGTH_CAP = 10;

export interface SignalBreakdown {
    richness: number;
    wordLength: number;
    highSignal: number;
    lowSignal: number;
    sentenceFit: number;
    contentRatio: number;
}

/** The six sub-scores, each already clamped to [0, 1]. */
export function signalBreakdown(text: string): SignalBreakdown {
    const tokens = alphaWords(text);
    const content = contentWords(text);

    if (tokens.length === 0) {
        return { richness: 0, wordLength: 0, highSignal: 0, lowSignal: 0, sentenceFit: 0, contentRatio: 0 };
    }

    const richness = content.length > 0 ? new Set(content).size / content.length : 0;
    const avgLength = content.length > 0
        ? content.reduce((sum, w) => sum + w.length, 0) / content.length
        : 0;

    const highHits = tokens.filter((w) => HIGH_SIGNAL.has(w)).length;
    const lowHits = tokens.filter((w) => LOW_SIGNAL.has(w)).length;

    const sentences = splitSentences(text);
    const meanSentenceWords = sentences.length > 0
        ? sentences.reduce((sum, s) => sum + wordCount(s), 0) / sentences.length
        : 0;

    return {
        richness: clamp01(richness),
        wordLength: clamp01(avgLength / WORD_LENGTH_CAP),
        highSignal: clamp01((highHits / tokens.length) * LEXICON_DENSITY_SCALE),
        lowSignal: clamp01((lowHits / tokens.length) * LEXICON_DENSITY_SCALE),
        sentenceFit: clamp01(lengthFit(meanSentenceWords)),
        contentRatio: clamp01(content.length / tokens.length),
    };
}

/**
 * Information-density score in [0, 1]. The filler-lexicon term is
 * subtracted; every other term adds. Text without words scores 0.
 */
export function signalScore(text: string, weights: SignalWeights): number {
    const b = signalBreakdown(text);
    return clamp01(
        b.richness * weights.richness +
        b.wordLength * weights.wordLength +
        b.highSignal * weights.highSignal -
        b.lowSignal * weights.lowSignal +
        b.sentenceFit * weights.sentenceFit +
        b.contentRatio * weights.contentRatio
    );
}

/** Estimated reading time in minutes (minimum 1) */
export function readingTimeMinutes(text: string, wpm = 200): number {
    return Math.max(1, Math.round(wordCount(text) / wpm));
}

/** Most frequent content words, highest first; ties keep first-seen order */
export function wordFrequency(text: string, limit = 50): Array<[string, number]> {
    const freq = new Map<string, number>();
    for (const w of alphaWords(text)) {
        if (STOP_WORDS.has(w)) continue;
        freq.set(w, (freq.get(w) ?? 0) + 1);
    }
    return [...freq.entries()].sort((a, b) => b[1] - a[1]).slice(0, limit);
}

/**
 * Drop records below `minSignal` and sort the rest by signal, densest first.
 */
export function rankBySignal<T extends { record: AnalysisRecord }>(
    items: readonly T[],
    minSignal = 0
): T[] {
    return items
        .filter((it) => it.record.signal >= minSignal)
        .sort((a, b) => b.record.signal - a.record.signal);
}
