import topicKeywords from "./lexicons/topics.json";

export const UNCATEGORIZED = "uncategorized";

const TOPIC_KEYWORDS: Readonly<Record<string, readonly string[]>> = topicKeywords;

function escapeRegExp(s: string): string {
    return s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

// One whole-word, case-insensitive pattern per trigger phrase
const TOPIC_PATTERNS: Array<{ topic: string; patterns: RegExp[] }> = Object.entries(TOPIC_KEYWORDS).map(
    ([topic, phrases]) => ({
        topic,
        patterns: phrases.map((p) => new RegExp(`\\b${escapeRegExp(p)}\\b`, "gi")),
    })
);

/** Every label the tagger can assign, sorted */
export function topicCatalog(): string[] {
    return Object.keys(TOPIC_KEYWORDS).sort();
}

/**
 * Keyword-membership tagging. A topic is assigned when any of its trigger
 * phrases occurs; labels are ordered by number of hits (ties alphabetical).
 * Never returns an empty list: no match yields ["uncategorized"].
 */
export function tagTopics(text: string, maxTopics = 5): string[] {
    const hits = new Map<string, number>();

    for (const { topic, patterns } of TOPIC_PATTERNS) {
        let count = 0;
        for (const re of patterns) {
            count += text.match(re)?.length ?? 0;
        }
        if (count > 0) hits.set(topic, count);
    }

    if (hits.size === 0) return [UNCATEGORIZED];

    return [...hits.entries()]
        .sort((a, b) => b[1] - a[1] || a[0].localeCompare(b[0]))
        .slice(0, maxTopics)
        .map(([topic]) => topic);
}

/** Jaccard similarity of two topic sets */
export function topicOverlap(a: readonly string[], b: readonly string[]): number {
    if (a.length === 0 && b.length === 0) return 1;
    if (a.length === 0 || b.length === 0) return 0;

    const setA = new Set(a);
    const setB = new Set(b);
    const intersection = [...setA].filter((t) => setB.has(t)).length;
    const union = new Set([...setA, ...setB]).size;
    return intersection / union;
}
