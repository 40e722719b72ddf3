import { describe, expect, it } from "vitest";
import { closeMatches, matchRatio } from "./similarity.js";

describe("matchRatio", () => {
	it("should score identical words 1 and disjoint words 0", () => {
		expect(matchRatio("fraud", "fraud")).toBe(1);
		expect(matchRatio("abc", "xyz")).toBe(0);
		expect(matchRatio("", "abc")).toBe(0);
		expect(matchRatio("", "")).toBe(1);
	});

	it("should count characters of every common run", () => {
		// "fraud" + "lent" out of 19 characters
		expect(matchRatio("fraudlent", "fraudulent")).toBeCloseTo(18 / 19, 10);
		// "fr" + "a"
		expect(matchRatio("frawd", "friday")).toBeCloseTo(6 / 11, 10);
	});

	it("should not count characters out of run order", () => {
		// "bc" leaves nothing matchable on either side
		expect(matchRatio("abc", "bca")).toBeCloseTo(4 / 6, 10);
	});

	it("should keep a shared prefix alone below the default cutoff", () => {
		expect(matchRatio("fraud", "frank")).toBeCloseTo(0.6, 10);
		expect(matchRatio("fraud", "fraudulent")).toBeLessThan(0.7);
	});
});

describe("closeMatches", () => {
	it("should return the best matches first", () => {
		expect(
			closeMatches("fraud", ["fraudulent", "energy", "frauds", "fraud"], {
				cutoff: 0.7,
				limit: 3,
			}),
		).toEqual(["fraud", "frauds"]);
	});

	it("should respect the limit and the cutoff", () => {
		const words = ["fraud", "frauds", "fraudsters"];

		expect(closeMatches("fraud", words, { cutoff: 0.7, limit: 1 })).toEqual([
			"fraud",
		]);
		expect(closeMatches("fraud", words, { cutoff: 0.95, limit: 3 })).toEqual([
			"fraud",
		]);
		expect(closeMatches("fraud", words, { cutoff: 0.9, limit: 3 })).toEqual([
			"fraud",
			"frauds",
		]);
	});

	it("should order equal scores by edit distance", () => {
		// both 4/6; zbc is one substitution away, cab two edits
		expect(
			closeMatches("abc", ["cab", "zbc"], { cutoff: 0.6, limit: 3 }),
		).toEqual(["zbc", "cab"]);
	});

	it("should order equal scores and distances alphabetically", () => {
		expect(
			closeMatches("cat", ["hat", "bat"], { cutoff: 0.6, limit: 3 }),
		).toEqual(["bat", "hat"]);
	});

	it("should return nothing for an empty vocabulary", () => {
		expect(closeMatches("fraud", [], { cutoff: 0.7, limit: 3 })).toEqual([]);
	});
});
