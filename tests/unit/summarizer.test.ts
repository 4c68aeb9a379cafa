import { describe, it, expect } from "vitest";
import { summarize } from "../../src/summarizer";
import { extractiveSummary } from "../../src/extractive";
import { DEFAULTS } from "../../src/config";
import { mulberry32 } from "../../src/random";
import { wordCount } from "../../src/text";

const CONFIG = DEFAULTS.summary;
const CYCLE = "alpha bravo charlie delta echo foxtrot golf hotel india juliet kilo lima";
const LONG_CYCLIC = Array(10).fill(CYCLE).join(" "); // 120 words, 12 distinct bigrams

describe("summarize", () => {
    it("returns nothing for blank text", () => {
        expect(summarize("  ", CONFIG, mulberry32(1))).toEqual({ tldr: "", method: "extractive" });
    });

    it("uses extraction below the length threshold", () => {
        const text = "The council approved the budget on Monday. Critics said the vote was rushed. Officials plan a review next year.";
        const result = summarize(text, CONFIG, mulberry32(1));

        expect(result.method).toBe("extractive");
        expect(result.tldr).toBe(extractiveSummary(text, { sentenceCount: 2, minSentenceWords: 3 }));
    });

    it("uses generation for long text with a dense chain", () => {
        const result = summarize(LONG_CYCLIC, CONFIG, mulberry32(7));

        expect(result.method).toBe("generative");
        expect(wordCount(result.tldr)).toBe(50);
        const vocabulary = new Set(CYCLE.split(" "));
        for (const token of result.tldr.split(" ")) {
            expect(vocabulary.has(token)).toBe(true);
        }
    });

    it("falls back to extraction when the chain is sparse", () => {
        const text = Array(120).fill("spam").join(" "); // one distinct bigram
        const result = summarize(text, CONFIG, mulberry32(1));

        expect(result.method).toBe("extractive");
        expect(result.tldr).toBe(Array(50).fill("spam").join(" ") + "...");
    });

    it("falls back to extraction when the generated text is too short", () => {
        const config = { ...CONFIG, minGeneratedWords: 60 };
        const result = summarize(LONG_CYCLIC, config, mulberry32(7));

        expect(result.method).toBe("extractive");
        expect(result.tldr).toBe(LONG_CYCLIC.split(" ").slice(0, 50).join(" ") + "...");
    });

    it("returns truncated verbatim text when no sentence qualifies", () => {
        expect(summarize("Yes. No. Maybe so.", CONFIG, mulberry32(1)))
            .toEqual({ tldr: "Yes. No. Maybe so.", method: "verbatim" });
    });

    it("truncates extractive output to the word budget", () => {
        const text = Array(60).fill("word").join(" ");
        const result = summarize(text, CONFIG, mulberry32(1));

        expect(result.method).toBe("extractive");
        expect(wordCount(result.tldr)).toBe(50);
        expect(result.tldr.endsWith("...")).toBe(true);
    });

    it("is reproducible for a fixed seed", () => {
        const text = Array(15).fill("the market rose and the market fell and traders watched the market").join(" ");
        expect(summarize(text, CONFIG, mulberry32(99))).toEqual(summarize(text, CONFIG, mulberry32(99)));
    });
});
