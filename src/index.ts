#!/usr/bin/env node
import { Command } from "commander";
import { readFileSync } from "node:fs";
import { loadConfig } from "./config";
import { integerOption } from "./options";
import { analyzeArticle } from "./analyzer";
import { readingTimeMinutes } from "./scorer";
import { createSentimentScorer } from "./sentiment";
import { Storage } from "./storage";
import { ReadingTracker } from "./tracker";
import { renderAnalysis, renderNudge, renderStats } from "./renderer";

interface AnalyzeOpts {
    config?: string;
    id?: string;
    title?: string;
    seed?: number;
}

interface ReadOpts {
    config?: string;
    topics?: string[];
}

interface CommonOpts {
    config?: string;
}

interface StatsOpts extends CommonOpts {
    days: number;
}

const program = new Command();

program
    .name("signal-reader")
    .description("Score, summarize and track news articles before you read them")
    .version("0.1.0");

function run(action: () => Promise<void> | void): Promise<void> {
    return Promise.resolve()
        .then(action)
        .catch((err: unknown) => {
            console.error("❌ Error:", err instanceof Error ? err.message : err);
            process.exit(1);
        });
}

// ── analyze ───────────────────────────────────────────────
program
    .command("analyze <file>")
    .description("Analyze a cleaned article text file")
    .option("-c, --config <path>", "config file path")
    .option("--id <articleId>", "store the analysis under this article id")
    .option("--title <title>", "article title for the report")
    .option("--seed <number>", "seed for the generated TL;DR", integerOption(0))
    .action((file: string, opts: AnalyzeOpts) => run(() => runAnalyze(file, opts)));

// ── read ──────────────────────────────────────────────────
program
    .command("read <articleId>")
    .description("Mark an article as read and check topic drift")
    .option("-c, --config <path>", "config file path")
    .option("--topics <topics...>", "topics of the article (defaults to its stored analysis)")
    .action((articleId: string, opts: ReadOpts) => run(() => runRead(articleId, opts)));

// ── drift ─────────────────────────────────────────────────
program
    .command("drift")
    .description("Evaluate the recent reading window")
    .option("-c, --config <path>", "config file path")
    .action((opts: CommonOpts) => run(() => runDrift(opts)));

// ── stats ─────────────────────────────────────────────────
program
    .command("stats")
    .description("Reading statistics")
    .option("-c, --config <path>", "config file path")
    .option("-d, --days <number>", "period in days", integerOption(1), 7)
    .action((opts: StatsOpts) => run(() => runStats(opts)));

// ── implementations ───────────────────────────────────────
async function runAnalyze(file: string, opts: AnalyzeOpts): Promise<void> {
    const config = loadConfig(opts.config);
    const text = readFileSync(file, "utf-8");
    const scorer = createSentimentScorer(config.sentiment);

    const record = await analyzeArticle(text, config, scorer, opts.seed);
    const title = opts.title ?? opts.id ?? file;

    console.log(renderAnalysis({ title, record, readingMinutes: readingTimeMinutes(text) }));

    if (opts.id) {
        const storage = new Storage(config.storage.dataDir);
        storage.saveAnalysis({ articleId: opts.id, title, analyzedAt: new Date(), record });
        console.log(`💾 Analysis saved for ${opts.id}`);
    }
}

function runRead(articleId: string, opts: ReadOpts): void {
    const config = loadConfig(opts.config);
    const storage = new Storage(config.storage.dataDir);

    let topics = opts.topics ?? [];
    if (topics.length === 0) {
        const stored = storage.loadAnalysis(articleId);
        if (stored) {
            topics = [...stored.record.topics];
        } else {
            console.warn(`⚠️  No analysis stored for ${articleId}, recording as uncategorized`);
        }
    }

    const tracker = new ReadingTracker(storage, config.drift);
    const decision = tracker.markRead(articleId, topics);
    console.log(`✓ Marked ${articleId} as read (${topics.join(", ") || "uncategorized"})`);

    const nudge = renderNudge(decision);
    if (nudge) console.log(nudge);
}

function runDrift(opts: CommonOpts): void {
    const config = loadConfig(opts.config);
    const tracker = new ReadingTracker(new Storage(config.storage.dataDir), config.drift);
    const window = tracker.window();
    const decision = tracker.check();

    console.log(`📚 Window: ${window.size}/${config.drift.windowSize} reads`);
    if (decision.dominantTopic !== null) {
        console.log(`   Dominant: ${decision.dominantTopic} (${Math.round(decision.dominantFraction * 100)}%)`);
    }
    if (window.size < config.drift.minSamples) {
        console.log(`   Need ${config.drift.minSamples} reads before drift is checked`);
    }
    console.log(renderNudge(decision) || "   No drift detected");
}

function runStats(opts: StatsOpts): void {
    const config = loadConfig(opts.config);
    const storage = new Storage(config.storage.dataDir);
    console.log(renderStats(storage.readingStats(opts.days)));
}

program.parseAsync().catch((err: unknown) => {
    console.error("❌ Error:", err);
    process.exit(1);
});
