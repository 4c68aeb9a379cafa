import { EmptyChainError } from "./errors";
import { pick } from "./random";
import { tokenize } from "./text";
import type { Chain, Rng } from "./types";

/**
 * N-gram chains for impressionistic TL;DRs.
 *
 * Tokens are whitespace-delimited and kept verbatim, so a key is simply its
 * tokens joined by one space and every generated token comes from the
 * training text.
 */

function keyOf(ngram: readonly string[]): string {
    return ngram.join(" ");
}

/**
 * Build an n-gram chain: each n-gram maps to every token seen right after it.
 * Repeated continuations are appended, not merged, so they weigh more when sampled.
 * Text with n tokens or fewer yields an empty chain.
 */
export function buildChain(text: string, n = 2): Chain {
    if (!Number.isInteger(n) || n < 1) {
        throw new RangeError(`n-gram size must be a positive integer, got ${n}`);
    }

    const transitions = new Map<string, string[]>();
    const tokens = tokenize(text);

    for (let i = 0; i + n < tokens.length; i++) {
        const key = keyOf(tokens.slice(i, i + n));
        const next = tokens[i + n];
        const list = transitions.get(key);
        if (list) {
            list.push(next);
        } else {
            transitions.set(key, [next]);
        }
    }

    return { n, transitions };
}

export function isEmptyChain(chain: Chain): boolean {
    return chain.transitions.size === 0;
}

/** Keys as token arrays, in first-seen order */
export function chainKeys(chain: Chain): string[][] {
    return [...chain.transitions.keys()].map((k) => k.split(" "));
}

/** Candidate next tokens for an n-gram; empty when the n-gram is a dead end */
export function continuations(chain: Chain, ngram: readonly string[]): string[] {
    return [...(chain.transitions.get(keyOf(ngram)) ?? [])];
}

export interface GenerateOptions {
    /** Starting n-gram; a uniformly random key when omitted */
    seed?: readonly string[];
    maxWords: number;
    rng: Rng;
}

/**
 * Random walk over the chain. Stops at `maxWords` tokens (seed included)
 * or at the first n-gram with no recorded continuation.
 */
export function generate(chain: Chain, options: GenerateOptions): string {
    if (isEmptyChain(chain)) throw new EmptyChainError();

    const { n } = chain;
    const { maxWords, rng } = options;

    let words: string[];
    if (options.seed) {
        if (options.seed.length !== n) {
            throw new RangeError(`Seed must have ${n} tokens, got ${options.seed.length}`);
        }
        words = [...options.seed];
    } else {
        words = pick(rng, [...chain.transitions.keys()]).split(" ");
    }

    while (words.length < maxWords) {
        const candidates = chain.transitions.get(keyOf(words.slice(-n)));
        if (!candidates) break;
        words.push(pick(rng, candidates));
    }

    return words.slice(0, Math.max(maxWords, 0)).join(" ");
}

/** Combine chains built with the same n, e.g. every article of one source. */
export function mergeChains(chains: readonly Chain[]): Chain {
    if (chains.length === 0) return { n: 2, transitions: new Map() };

    const n = chains[0].n;
    const transitions = new Map<string, string[]>();
    for (const chain of chains) {
        if (chain.n !== n) {
            throw new RangeError(`Cannot merge chains of different sizes (${n} and ${chain.n})`);
        }
        for (const [key, next] of chain.transitions) {
            transitions.set(key, [...(transitions.get(key) ?? []), ...next]);
        }
    }
    return { n, transitions };
}

/**
 * Mean Shannon entropy (bits) of the continuation lists.
 * Higher means less predictable output; 0 for an empty chain.
 */
export function chainEntropy(chain: Chain): number {
    if (isEmptyChain(chain)) return 0;

    let total = 0;
    for (const next of chain.transitions.values()) {
        if (next.length <= 1) continue;

        const counts = new Map<string, number>();
        for (const w of next) counts.set(w, (counts.get(w) ?? 0) + 1);

        for (const count of counts.values()) {
            const p = count / next.length;
            total -= p * Math.log2(p);
        }
    }
    return total / chain.transitions.size;
}
