import valences from "./lexicons/sentiment.json";
import { createChatClient } from "./llm";
import { alphaWords } from "./text";
import type { ChatClient } from "./llm";
import type { SentimentConfig } from "./config";

const LEXICON: ReadonlyMap<string, number> = new Map(Object.entries(valences));
const NEGATIONS: ReadonlySet<string> = new Set(["not", "no", "never", "without", "hardly", "isn", "don", "doesn", "didn", "wasn"]);
/** Normalisation constant: s / sqrt(s² + α) */
const ALPHA = 15;

/** Scores text in [-1, 1]: negative to positive. */
export interface SentimentScorer {
    score(text: string): Promise<number>;
}

function clampSentiment(x: number): number {
    if (Number.isNaN(x)) return 0;
    return Math.min(1, Math.max(-1, x));
}

/**
 * Valence-lexicon sentiment. A negation word directly before a lexicon
 * word flips its sign.
 */
export function lexiconSentiment(text: string): number {
    const words = alphaWords(text);
    let sum = 0;
    for (let i = 0; i < words.length; i++) {
        const valence = LEXICON.get(words[i]);
        if (valence === undefined) continue;
        sum += i > 0 && NEGATIONS.has(words[i - 1]) ? -valence : valence;
    }
    if (sum === 0) return 0;
    return clampSentiment(sum / Math.sqrt(sum * sum + ALPHA));
}

export class LexiconSentimentScorer implements SentimentScorer {
    async score(text: string): Promise<number> {
        return lexiconSentiment(text);
    }
}

const SYSTEM_PROMPT = `You rate the sentiment of news text.
Reply with a single number between -1 (very negative) and 1 (very positive), nothing else.`;

/**
 * Asks a chat model for a sentiment number; any failure or unparsable
 * reply falls back to the lexicon score.
 */
export class ChatSentimentScorer implements SentimentScorer {
    constructor(
        private client: ChatClient,
        private fallback: SentimentScorer = new LexiconSentimentScorer(),
        private maxChars = 1500
    ) {}

    async score(text: string): Promise<number> {
        if (!text.trim()) return 0;

        const chars = [...text.trim()];
        const truncated = chars.length > this.maxChars ? chars.slice(0, this.maxChars).join("") : text.trim();

        let reply: string;
        try {
            reply = await this.client.complete(SYSTEM_PROMPT, truncated);
        } catch (err) {
            console.warn("[sentiment] Chat failed, using lexicon:", err);
            return this.fallback.score(text);
        }

        const match = reply.match(/-?(?:\d+(?:\.\d*)?|\.\d+)/);
        if (!match) {
            console.warn(`[sentiment] Unparsable reply "${reply.slice(0, 40)}", using lexicon`);
            return this.fallback.score(text);
        }
        return clampSentiment(Number(match[0]));
    }
}

/** Lexicon scorer unless a chat provider is configured with a key */
export function createSentimentScorer(config: SentimentConfig): SentimentScorer {
    if (config.provider === "lexicon" || !config.apiKey) {
        return new LexiconSentimentScorer();
    }
    return new ChatSentimentScorer(
        createChatClient({
            provider: config.provider,
            apiKey: config.apiKey,
            model: config.model,
            baseUrl: config.baseUrl || undefined,
        })
    );
}
