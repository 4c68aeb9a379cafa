/** Text is below the minimum token count for the requested summary path. */
export class InputTooShortError extends Error {
    constructor(
        public readonly wordCount: number,
        public readonly required: number
    ) {
        super(`Input too short: ${wordCount} words, need at least ${required}`);
        this.name = "InputTooShortError";
    }
}

/** Generation was requested on a chain with no entries. */
export class EmptyChainError extends Error {
    constructor() {
        super("Cannot generate from an empty chain");
        this.name = "EmptyChainError";
    }
}

/**
 * Invalid configuration value. Raised once, when the config is loaded;
 * every offending path is listed in `issues`.
 */
export class ConfigurationError extends Error {
    constructor(public readonly issues: string[]) {
        super(`Invalid configuration:\n${issues.map((i) => `  - ${i}`).join("\n")}`);
        this.name = "ConfigurationError";
    }
}
