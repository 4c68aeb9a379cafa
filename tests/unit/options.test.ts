import { describe, it, expect } from "vitest";
import { InvalidArgumentError } from "commander";
import { integerOption } from "../../src/options";

describe("integerOption", () => {
    it("parses whole numbers", () => {
        expect(integerOption()("42")).toBe(42);
        expect(integerOption()("-3")).toBe(-3);
        expect(integerOption(1)(" 7 ")).toBe(7);
    });

    it("rejects values that are not integers", () => {
        const parse = integerOption(1);
        expect(() => parse("abc")).toThrow(InvalidArgumentError);
        expect(() => parse("7days")).toThrow('Not an integer: "7days"');
        expect(() => parse("1.5")).toThrow(InvalidArgumentError);
        expect(() => parse("")).toThrow(InvalidArgumentError);
    });

    it("enforces the lower bound", () => {
        expect(() => integerOption(1)("0")).toThrow("Must be at least 1, got 0");
        expect(integerOption(0)("0")).toBe(0);
    });
});
