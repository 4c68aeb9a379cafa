import { ConsumptionWindow, evaluateWindow } from "./drift";
import { topicCatalog, UNCATEGORIZED } from "./topics";
import type { DriftConfig } from "./config";
import type { ReadEventLog } from "./storage";
import type { NudgeDecision } from "./types";

/**
 * Tracks "mark as read" events. The window is rebuilt from the log on every
 * call, so the log is the only state; drift is re-evaluated per event.
 */
export class ReadingTracker {
    private config: DriftConfig;
    private log: ReadEventLog;
    private catalog: readonly string[];

    constructor(log: ReadEventLog, config: DriftConfig, catalog: readonly string[] = topicCatalog()) {
        this.log = log;
        this.config = config;
        this.catalog = catalog;
    }

    window(): ConsumptionWindow {
        return ConsumptionWindow.fromEvents(this.log.recent(this.config.windowSize), this.config.windowSize);
    }

    /** Record a read and return the fresh nudge decision */
    markRead(articleId: string, topics: readonly string[], at: Date = new Date()): NudgeDecision {
        const unique = [...new Set(topics.map((t) => t.trim().toLowerCase()).filter(Boolean))];
        this.log.append({
            articleId,
            topics: unique.length > 0 ? unique : [UNCATEGORIZED],
            timestamp: at,
        });
        return this.check();
    }

    /** Evaluate the current window without recording anything */
    check(): NudgeDecision {
        return evaluateWindow(this.window(), this.config, this.catalog);
    }
}
