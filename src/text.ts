import stopWordList from "./lexicons/stop-words.json";

export const STOP_WORDS: ReadonlySet<string> = new Set(stopWordList);

export function tokenize(text: string): string[] {
    return text.split(/\s+/).filter((t) => t.length > 0);
}

export function wordCount(text: string): number {
    return tokenize(text).length;
}

/** Lowercase alphabetic runs, e.g. "Don't panic!" → ["don", "t", "panic"] */
export function alphaWords(text: string): string[] {
    return text.toLowerCase().match(/[a-z]+/g) ?? [];
}

/** Alphabetic words that carry content: not a stop word and longer than two letters */
export function contentWords(text: string): string[] {
    return alphaWords(text).filter((w) => w.length > 2 && !STOP_WORDS.has(w));
}

/**
 * Split on terminal punctuation followed by whitespace.
 * Sentences shorter than `minWords` are dropped as fragments.
 */
export function splitSentences(text: string, minWords = 1): string[] {
    return text
        .split(/(?<=[.!?])\s+/)
        .map((s) => s.trim())
        .filter((s) => s.length > 0 && wordCount(s) >= minWords);
}

/** 1.0 inside the 15–25 word band, linear ramp below, slow decay above (floor 0.25) */
export function lengthFit(words: number): number {
    if (words <= 0) return 0;
    if (words < 15) return words / 15;
    if (words <= 25) return 1;
    return Math.max(0.25, 1 - (words - 25) / 50);
}

export function clamp01(x: number): number {
    if (Number.isNaN(x)) return 0;
    return Math.min(1, Math.max(0, x));
}

/** Keep at most `max` whitespace tokens; "..." marks a cut. */
export function truncateWords(text: string, max: number): string {
    const words = tokenize(text);
    if (words.length <= max) return words.join(" ");
    return words.slice(0, max).join(" ") + "...";
}
