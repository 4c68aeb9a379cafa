import type { Rng } from "./types";

/** Mulberry32: seeded PRNG, uniform in [0, 1) */
export function mulberry32(seed: number): Rng {
    let s = seed >>> 0;
    return () => {
        s |= 0;
        s = (s + 0x6d2b79f5) | 0;
        let t = Math.imul(s ^ (s >>> 15), 1 | s);
        t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
        return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    };
}

/** FNV-1a hash of a string, used as a uint32 seed */
export function seedFromText(text: string): number {
    let h = 2166136261;
    for (let i = 0; i < text.length; i++) {
        h = Math.imul(h ^ text.charCodeAt(i), 16777619);
    }
    return h >>> 0;
}

/** Pick one element uniformly. Caller guarantees a non-empty list. */
export function pick<T>(rng: Rng, items: readonly T[]): T {
    const i = Math.min(Math.floor(rng() * items.length), items.length - 1);
    return items[i];
}
