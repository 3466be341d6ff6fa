/**
 * Similarity Tests — Tokenisation and the overlap measures built on it.
 */
import { describe, it, expect } from "vitest";
import { findingStatement, jaccard, objectiveRelevance, textSimilarity, tokenize } from "../similarity.js";

describe("tokenize()", () => {
    it("lowercases and drops stop words and bare numbers", () => {
        expect([...tokenize("The Quicksort of 1000 items, in-place")]).toEqual(["quicksort", "items", "place"]);
    });
});

describe("jaccard()", () => {
    it("is zero when either side is empty", () => {
        expect(jaccard(new Set(), new Set(["a"]))).toBe(0);
    });

    it("divides shared tokens by the union", () => {
        expect(jaccard(new Set(["a", "b", "c"]), new Set(["b", "c", "d"]))).toBe(0.5);
    });
});

describe("textSimilarity()", () => {
    it("ignores case, punctuation and stop words", () => {
        expect(textSimilarity("Merge sort is stable.", "merge-sort, stable")).toBe(1);
    });
});

describe("objectiveRelevance()", () => {
    it("is 1 for the same objective regardless of case and padding", () => {
        expect(objectiveRelevance("  Sort an Array ", "sort an array")).toBe(1);
    });

    it("falls back to token overlap for related objectives", () => {
        expect(objectiveRelevance("sort an array", "sort an array quickly")).toBeCloseTo(2 / 3);
        expect(objectiveRelevance("sort an array", "parse json")).toBe(0);
    });
});

describe("findingStatement()", () => {
    it("keeps the first sentence and leaves decimals alone", () => {
        expect(findingStatement('"Quicksort" succeeded: ops = 0.9 (maximize). First positive result.')).toBe(
            '"Quicksort" succeeded: ops = 0.9 (maximize)',
        );
    });

    it("returns the whole text when there is no sentence break", () => {
        expect(findingStatement("no full stop here")).toBe("no full stop here");
    });
});
