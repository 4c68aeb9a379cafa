import { EmptyChainError, InputTooShortError } from "./errors";
import { extractiveSummary } from "./extractive";
import { buildChain, generate } from "./markov";
import { truncateWords, wordCount } from "./text";
import type { SummaryConfig } from "./config";
import type { Rng, SummaryResult } from "./types";

/**
 * Generative TL;DR from the text's own chain. Throws when the chain is too
 * sparse to be worth showing; only observable once the chain exists.
 */
function generativeSummary(text: string, config: SummaryConfig, rng: Rng): string {
    const chain = buildChain(text, config.ngramSize);
    if (chain.transitions.size < config.minChainKeys) {
        throw new InputTooShortError(chain.transitions.size, config.minChainKeys);
    }

    const output = generate(chain, { maxWords: config.maxWords, rng });
    const words = wordCount(output);
    if (words < config.minGeneratedWords) {
        throw new InputTooShortError(words, config.minGeneratedWords);
    }
    return output;
}

function extractive(text: string, config: SummaryConfig): SummaryResult {
    const summary = extractiveSummary(text, {
        sentenceCount: config.sentenceCount,
        minSentenceWords: config.minSentenceWords,
    });
    if (summary) {
        return { tldr: truncateWords(summary, config.maxWords), method: "extractive" };
    }
    // No sentence survived the fragment filter: show the text itself
    return { tldr: truncateWords(text, config.maxWords), method: "verbatim" };
}

/**
 * TL;DR dispatcher.
 *
 * Short texts (< lengthThreshold words) go straight to extraction. Longer
 * texts try the generative path first and fall back to extraction when the
 * chain turns out sparse. Output never exceeds `maxWords` words.
 */
export function summarize(text: string, config: SummaryConfig, rng: Rng): SummaryResult {
    if (!text.trim()) return { tldr: "", method: "extractive" };

    if (wordCount(text) < config.lengthThreshold) {
        return extractive(text, config);
    }

    try {
        const tldr = generativeSummary(text, config, rng);
        return { tldr: truncateWords(tldr, config.maxWords), method: "generative" };
    } catch (err) {
        if (err instanceof EmptyChainError || err instanceof InputTooShortError) {
            return extractive(text, config);
        }
        throw err;
    }
}
