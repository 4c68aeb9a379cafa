import { readFileSync, existsSync } from "node:fs";
import { resolve } from "node:path";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import { ConfigurationError } from "./errors";

const unit = z.number().min(0).max(1);
const positiveInt = z.number().int().min(1);

const configSchema = z.object({
    summary: z
        .object({
            ngramSize: positiveInt.max(5),
            sentenceCount: positiveInt,
            lengthThreshold: positiveInt,
            maxWords: positiveInt,
            minChainKeys: z.number().int().min(0),
            minGeneratedWords: z.number().int().min(0),
            minSentenceWords: positiveInt,
        })
        .refine((s) => s.minGeneratedWords <= s.maxWords, {
            message: "minGeneratedWords cannot exceed maxWords",
            path: ["minGeneratedWords"],
        }),
    signal: z.object({
        weights: z.object({
            richness: unit,
            wordLength: unit,
            highSignal: unit,
            lowSignal: unit,
            sentenceFit: unit,
            contentRatio: unit,
        }),
    }),
    topics: z.object({
        maxTopics: positiveInt,
    }),
    drift: z
        .object({
            windowSize: positiveInt.max(1000),
            threshold: unit,
            minSamples: positiveInt,
            maxSuggestions: positiveInt,
        })
        .refine((d) => d.minSamples <= d.windowSize, {
            message: "minSamples cannot exceed windowSize",
            path: ["minSamples"],
        }),
    sentiment: z.object({
        provider: z.enum(["lexicon", "openai", "anthropic"]),
        apiKey: z.string(),
        model: z.string(),
        baseUrl: z.string(),
    }),
    storage: z.object({
        dataDir: z.string().min(1),
    }),
});

export type AppConfig = z.infer<typeof configSchema>;
export type SummaryConfig = AppConfig["summary"];
export type SignalWeights = AppConfig["signal"]["weights"];
export type DriftConfig = AppConfig["drift"];
export type SentimentConfig = AppConfig["sentiment"];
export type AnalysisConfig = Pick<AppConfig, "summary" | "signal" | "topics">;

export type ConfigOverrides = { [K in keyof AppConfig]?: Partial<AppConfig[K]> };

export const DEFAULTS: AppConfig = {
    summary: {
        ngramSize: 2,
        sentenceCount: 2,
        lengthThreshold: 100,
        maxWords: 50,
        minChainKeys: 3,
        minGeneratedWords: 10,
        minSentenceWords: 3,
    },
    signal: {
        weights: {
            richness: 0.25,
            wordLength: 0.15,
            highSignal: 0.2,
            lowSignal: 0.15,
            sentenceFit: 0.15,
            contentRatio: 0.1,
        },
    },
    topics: {
        maxTopics: 5,
    },
    drift: {
        windowSize: 10,
        threshold: 0.6,
        minSamples: 5,
        maxSuggestions: 3,
    },
    sentiment: {
        provider: "lexicon",
        apiKey: "",
        model: "gpt-4o-mini",
        baseUrl: "",
    },
    storage: {
        dataDir: "./data",
    },
};

type PlainObject = Record<string, unknown>;

function isPlainObject(value: unknown): value is PlainObject {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Convert snake_case keys to camelCase recursively */
function snakeToCamel(value: unknown): unknown {
    if (Array.isArray(value)) return value.map(snakeToCamel);
    if (isPlainObject(value)) {
        const result: PlainObject = {};
        for (const [key, v] of Object.entries(value)) {
            const camelKey = key.replace(/_([a-z])/g, (_, c: string) => c.toUpperCase());
            result[camelKey] = snakeToCamel(v);
        }
        return result;
    }
    return value;
}

/** Deep merge source into target (source wins) */
function deepMerge(target: PlainObject, source: PlainObject): PlainObject {
    const result: PlainObject = { ...target };
    for (const [key, sv] of Object.entries(source)) {
        const tv = result[key];
        if (isPlainObject(sv) && isPlainObject(tv)) {
            result[key] = deepMerge(tv, sv);
        } else if (sv !== undefined) {
            result[key] = sv;
        }
    }
    return result;
}

/**
 * Validate a fully merged config object.
 * @throws ConfigurationError listing every invalid field
 */
export function validateConfig(raw: unknown): AppConfig {
    const parsed = configSchema.safeParse(raw);
    if (!parsed.success) {
        throw new ConfigurationError(
            parsed.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
        );
    }
    return parsed.data;
}

/**
 * Load config from YAML file, then overlay CLI options.
 * Validated once here; callers never recheck values.
 */
export function loadConfig(configPath?: string, cliOverrides?: ConfigOverrides): AppConfig {
    let fileConfig: PlainObject = {};

    // Search order: explicit path → ./config.yaml → ./config.yml
    const candidates = configPath
        ? [configPath]
        : [resolve("config.yaml"), resolve("config.yml")];

    if (configPath && !existsSync(configPath)) {
        throw new ConfigurationError([`config file not found: ${configPath}`]);
    }

    for (const p of candidates) {
        if (existsSync(p)) {
            const parsed: unknown = parseYaml(readFileSync(p, "utf-8")) ?? {};
            // YAML uses snake_case, TypeScript uses camelCase
            const converted = snakeToCamel(parsed);
            if (!isPlainObject(converted)) {
                throw new ConfigurationError([`${p}: expected a mapping at the top level`]);
            }
            fileConfig = converted;
            break;
        }
    }

    // Merge: defaults ← file ← CLI overrides
    let merged = deepMerge(DEFAULTS, fileConfig);
    if (cliOverrides) {
        merged = deepMerge(merged, cliOverrides);
    }

    const config = validateConfig(merged);

    // Env fallbacks
    if (!config.sentiment.apiKey) {
        config.sentiment.apiKey =
            (config.sentiment.provider === "anthropic"
                ? process.env.ANTHROPIC_API_KEY
                : process.env.OPENAI_API_KEY) ?? "";
    }

    return config;
}
