import { describe, it, expect } from "vitest";
import { mulberry32, pick, seedFromText } from "../../src/random";

describe("mulberry32", () => {
    it("produces the same sequence for the same seed", () => {
        const a = mulberry32(123);
        const b = mulberry32(123);
        for (let i = 0; i < 50; i++) expect(a()).toBe(b());
    });

    it("stays in [0, 1)", () => {
        const rng = mulberry32(7);
        for (let i = 0; i < 1000; i++) {
            const x = rng();
            expect(x).toBeGreaterThanOrEqual(0);
            expect(x).toBeLessThan(1);
        }
    });
});

describe("seedFromText", () => {
    it("hashes deterministically to a uint32", () => {
        expect(seedFromText("")).toBe(2166136261);
        expect(seedFromText("article")).toBe(seedFromText("article"));
        expect(seedFromText("article")).not.toBe(seedFromText("articles"));
    });
});

describe("pick", () => {
    it("maps the unit interval onto indices", () => {
        expect(pick(() => 0, ["a", "b", "c"])).toBe("a");
        expect(pick(() => 0.999, ["a", "b", "c"])).toBe("c");
    });
});
