import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { DEFAULTS, loadConfig, validateConfig } from "../../src/config";
import { ConfigurationError } from "../../src/errors";

let dir: string;

beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "signal-reader-config-"));
});

afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
    vi.unstubAllEnvs();
});

function writeConfig(yaml: string): string {
    const path = join(dir, "config.yaml");
    writeFileSync(path, yaml, "utf-8");
    return path;
}

function issuesOf(fn: () => unknown): string[] {
    try {
        fn();
    } catch (err) {
        if (err instanceof ConfigurationError) return err.issues;
        throw err;
    }
    return [];
}

describe("validateConfig", () => {
    it("accepts the defaults", () => {
        expect(validateConfig(DEFAULTS)).toEqual(DEFAULTS);
    });

    it("rejects an out-of-range threshold", () => {
        const raw = { ...DEFAULTS, drift: { ...DEFAULTS.drift, threshold: 1.5 } };
        const issues = issuesOf(() => validateConfig(raw));

        expect(issues).toHaveLength(1);
        expect(issues[0]).toMatch(/^drift\.threshold: /);
    });

    it("rejects a minimum sample count above the window size", () => {
        const raw = { ...DEFAULTS, drift: { ...DEFAULTS.drift, windowSize: 4, minSamples: 5 } };
        expect(issuesOf(() => validateConfig(raw))).toEqual(["drift.minSamples: minSamples cannot exceed windowSize"]);
    });

    it("rejects a minimum generated length above the word budget", () => {
        const raw = { ...DEFAULTS, summary: { ...DEFAULTS.summary, maxWords: 20, minGeneratedWords: 25 } };
        expect(issuesOf(() => validateConfig(raw))).toEqual([
            "summary.minGeneratedWords: minGeneratedWords cannot exceed maxWords",
        ]);
    });

    it("lists every invalid weight", () => {
        const raw = {
            ...DEFAULTS,
            signal: { weights: { ...DEFAULTS.signal.weights, richness: -0.1, contentRatio: 2 } },
        };
        const issues = issuesOf(() => validateConfig(raw));

        expect(issues).toHaveLength(2);
        expect(issues[0]).toMatch(/^signal\.weights\.richness: /);
        expect(issues[1]).toMatch(/^signal\.weights\.contentRatio: /);
    });

    it("rejects a zero window size", () => {
        const raw = { ...DEFAULTS, drift: { ...DEFAULTS.drift, windowSize: 0, minSamples: 1 } };
        expect(issuesOf(() => validateConfig(raw))[0]).toMatch(/^drift\.windowSize: /);
    });
});

describe("loadConfig", () => {
    it("reads snake_case YAML over the defaults", () => {
        const path = writeConfig("drift:\n  window_size: 20\n  min_samples: 8\nsummary:\n  max_words: 30\n");
        const config = loadConfig(path);

        expect(config.drift).toEqual({ windowSize: 20, threshold: 0.6, minSamples: 8, maxSuggestions: 3 });
        expect(config.summary.maxWords).toBe(30);
        expect(config.summary.ngramSize).toBe(2);
    });

    it("lets overrides win over the file", () => {
        const path = writeConfig("drift:\n  threshold: 0.7\n");
        expect(loadConfig(path, { drift: { threshold: 0.8 } }).drift.threshold).toBe(0.8);
    });

    it("fails eagerly on invalid file values", () => {
        const path = writeConfig("drift:\n  threshold: 3\n");
        expect(() => loadConfig(path)).toThrow(ConfigurationError);
    });

    it("fails when an explicit path does not exist", () => {
        expect(() => loadConfig(join(dir, "missing.yaml"))).toThrow(ConfigurationError);
    });

    it("takes the API key from the environment", () => {
        vi.stubEnv("OPENAI_API_KEY", "test-key");
        const path = writeConfig("sentiment:\n  provider: openai\n");
        expect(loadConfig(path).sentiment.apiKey).toBe("test-key");
    });

    it("does not mutate the defaults", () => {
        vi.stubEnv("OPENAI_API_KEY", "test-key");
        loadConfig(writeConfig("sentiment:\n  provider: openai\n"));
        expect(DEFAULTS.sentiment.apiKey).toBe("");
    });
});
