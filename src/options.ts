import { InvalidArgumentError } from "commander";

/**
 * Commander argument parser for whole-number options. Rejects anything that
 * is not a plain integer, or that falls below `min`.
 */
export function integerOption(min = Number.MIN_SAFE_INTEGER): (value: string) => number {
    return (value: string) => {
        if (!/^-?\d+$/.test(value.trim())) {
            throw new InvalidArgumentError(`Not an integer: "${value}"`);
        }
        const parsed = Number.parseInt(value, 10);
        if (parsed < min) {
            throw new InvalidArgumentError(`Must be at least ${min}, got ${parsed}`);
        }
        return parsed;
    };
}
