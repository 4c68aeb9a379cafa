import { topicCatalog, UNCATEGORIZED } from "./topics";
import type { DriftConfig } from "./config";
import type { NudgeDecision, ReadEvent } from "./types";

function byAlpha(a: string, b: string): number {
    return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * The most recent W read events, newest first.
 *
 * A derived view: it can be rebuilt from the event log at any time, and
 * `push` returns a new window instead of changing this one.
 */
export class ConsumptionWindow {
    private constructor(
        private readonly items: readonly ReadEvent[],
        readonly capacity: number
    ) {}

    static empty(capacity: number): ConsumptionWindow {
        return new ConsumptionWindow([], capacity);
    }

    /** Build from events in any order; keeps the `capacity` newest */
    static fromEvents(events: readonly ReadEvent[], capacity: number): ConsumptionWindow {
        const newestFirst = [...events].sort((a, b) => b.timestamp.getTime() - a.timestamp.getTime());
        return new ConsumptionWindow(newestFirst.slice(0, capacity), capacity);
    }

    /** Add a newer event; the oldest one is evicted once the window is full */
    push(event: ReadEvent): ConsumptionWindow {
        return new ConsumptionWindow([event, ...this.items].slice(0, this.capacity), this.capacity);
    }

    get size(): number {
        return this.items.length;
    }

    events(): ReadEvent[] {
        return [...this.items];
    }

    /** Number of events carrying each topic; an event counts once per distinct topic */
    topicCounts(): Map<string, number> {
        const counts = new Map<string, number>();
        for (const event of this.items) {
            for (const topic of new Set(event.topics)) {
                counts.set(topic, (counts.get(topic) ?? 0) + 1);
            }
        }
        return counts;
    }
}

/**
 * Topics to read next: everything known or seen except the dominant topic,
 * least read first, ties alphabetical.
 */
function suggestTopics(
    counts: Map<string, number>,
    dominant: string,
    catalog: readonly string[],
    limit: number
): string[] {
    const candidates = new Set([...catalog, ...counts.keys()]);
    candidates.delete(dominant);
    candidates.delete(UNCATEGORIZED);

    return [...candidates]
        .sort((a, b) => (counts.get(a) ?? 0) - (counts.get(b) ?? 0) || byAlpha(a, b))
        .slice(0, limit);
}

/** Evaluate a window against the drift threshold. */
export function evaluateWindow(
    window: ConsumptionWindow,
    config: DriftConfig,
    catalog: readonly string[] = topicCatalog()
): NudgeDecision {
    const counts = window.topicCounts();
    if (window.size === 0 || counts.size === 0) {
        return { triggered: false, dominantTopic: null, dominantFraction: 0, suggestedTopics: [] };
    }

    const [dominantTopic, dominantCount] = [...counts.entries()].sort(
        (a, b) => b[1] - a[1] || byAlpha(a[0], b[0])
    )[0];
    const dominantFraction = dominantCount / window.size;

    // Below minSamples there is not enough history to call it drift
    const triggered = window.size >= config.minSamples && dominantFraction > config.threshold;

    return {
        triggered,
        dominantTopic,
        dominantFraction,
        suggestedTopics: triggered
            ? suggestTopics(counts, dominantTopic, catalog, config.maxSuggestions)
            : [],
    };
}

/**
 * Drift decision for the most recent `windowSize` events.
 * `triggered` iff window size ≥ minSamples and the dominant fraction exceeds the threshold.
 */
export function evaluateDrift(
    events: readonly ReadEvent[],
    config: DriftConfig,
    catalog: readonly string[] = topicCatalog()
): NudgeDecision {
    return evaluateWindow(ConsumptionWindow.fromEvents(events, config.windowSize), config, catalog);
}
