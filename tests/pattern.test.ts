import { describe, expect, it } from "vitest";
import {
	WILDCARD,
	isLiteralPattern,
	literal,
	tokenizePath,
	tokenizeValue,
	wildcard,
} from "../src/pattern.ts";

describe("tokenizePath", () => {
	it("splits on slashes with an empty leading segment", () => {
		expect(tokenizePath("/a/b")).toEqual([literal(""), literal("a"), literal("b")]);
	});

	it("marks {} segments as wildcards", () => {
		expect(tokenizePath("/a/{}/{}/c")).toEqual([
			literal(""),
			literal("a"),
			wildcard(),
			wildcard(),
			literal("c"),
		]);
	});

	it("root pattern is two empty segments", () => {
		expect(tokenizePath("/")).toEqual([literal(""), literal("")]);
	});

	it("keeps a trailing empty segment", () => {
		expect(tokenizePath("/a/")).toEqual([literal(""), literal("a"), literal("")]);
	});

	it("only a whole {} segment is a wildcard", () => {
		expect(tokenizePath("/a{}")).toEqual([literal(""), literal("a{}")]);
	});

	it("empty pattern has no tokens", () => {
		expect(tokenizePath("")).toEqual([]);
	});

	it("relative pattern has no leading empty segment", () => {
		expect(tokenizePath("this/is")).toEqual([literal("this"), literal("is")]);
	});
});

describe("tokenizeValue", () => {
	it("single wildcard", () => {
		expect(tokenizeValue(WILDCARD)).toEqual([wildcard()]);
	});

	it("literal followed by wildcard", () => {
		expect(tokenizeValue("Bearer {}")).toEqual([literal("Bearer "), wildcard()]);
	});

	it("wildcard between literals", () => {
		expect(tokenizeValue("a{}b")).toEqual([literal("a"), wildcard(), literal("b")]);
	});

	it("does not split on slashes", () => {
		expect(tokenizeValue("text/{}")).toEqual([literal("text/"), wildcard()]);
	});

	it("collapses adjacent wildcards", () => {
		expect(tokenizeValue("{}{}x")).toEqual([wildcard(), literal("x")]);
	});

	it("empty pattern has no tokens", () => {
		expect(tokenizeValue("")).toEqual([]);
	});

	it("plain value is one literal", () => {
		expect(tokenizeValue("yes")).toEqual([literal("yes")]);
	});
});

describe("isLiteralPattern", () => {
	it("true without wildcards", () => {
		expect(isLiteralPattern(tokenizePath("/a/b"))).toBe(true);
	});

	it("false with a wildcard", () => {
		expect(isLiteralPattern(tokenizeValue("a{}"))).toBe(false);
	});

	it("empty pattern is literal", () => {
		expect(isLiteralPattern([])).toBe(true);
	});
});
