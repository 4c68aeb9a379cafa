import { contentWords, lengthFit, splitSentences, wordCount } from "./text";
import type { Sentence } from "./types";

const KEYWORD_WEIGHT = 0.7;
const LENGTH_WEIGHT = 0.3;
const LEAD_BONUS = 1.5;

export interface ExtractiveOptions {
    /** Sentences to keep (K) */
    sentenceCount: number;
    /** Shorter sentences are treated as fragments and never selected */
    minSentenceWords: number;
}

/**
 * Score sentences against the document's content-word frequencies.
 *
 * score = (0.7 · keyword + 0.3 · lengthFit) × 1.5 for the lead sentence,
 * where keyword is the sentence's mean content-word frequency divided by
 * the most frequent content word of the document.
 */
export function scoreSentences(sentences: readonly string[]): Sentence[] {
    const keywords = sentences.map((s) => contentWords(s));

    const freq = new Map<string, number>();
    for (const kws of keywords) {
        for (const kw of kws) freq.set(kw, (freq.get(kw) ?? 0) + 1);
    }
    const maxFreq = Math.max(0, ...freq.values());

    return sentences.map((text, index) => {
        const kws = keywords[index];
        if (kws.length === 0 || maxFreq === 0) return { text, index, score: 0 };

        const mean = kws.reduce((sum, kw) => sum + (freq.get(kw) ?? 0), 0) / kws.length;
        const base = KEYWORD_WEIGHT * (mean / maxFreq) + LENGTH_WEIGHT * lengthFit(wordCount(text));
        return { text, index, score: index === 0 ? base * LEAD_BONUS : base };
    });
}

/**
 * Pick the top-K sentences by score and join them in document order.
 * Returns "" when the text has no usable sentence.
 */
export function extractiveSummary(text: string, options: ExtractiveOptions): string {
    const sentences = splitSentences(text, options.minSentenceWords);
    if (sentences.length === 0) return "";

    const top = scoreSentences(sentences)
        .sort((a, b) => b.score - a.score || a.index - b.index)
        .slice(0, Math.max(options.sentenceCount, 0));

    return top
        .sort((a, b) => a.index - b.index)
        .map((s) => s.text)
        .join(" ");
}
