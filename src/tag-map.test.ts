import { describe, it, expect } from "vitest";
import { MarkupInconsistencyError } from "./errors.js";
import { createTagMap } from "./tag-map.js";
import { CLOSE1, CLOSE2, ISO1, OPEN1, OPEN2, toks } from "./test-utils.js";

describe("createTagMap", () => {
	it("pairs nested tags", () => {
		const tagMap = createTagMap(toks("x OPEN1 y OPEN2 z CLOSE2 CLOSE1 ISO1"));
		expect(tagMap.size).toBe(2);
		expect(tagMap.closingOf(OPEN1)).toBe(CLOSE1);
		expect(tagMap.openingOf(CLOSE2)).toBe(OPEN2);
		expect(tagMap.closingOf(ISO1)).toBeUndefined();
	});

	it("lists pairs in closing order", () => {
		const tagMap = createTagMap(toks("OPEN1 OPEN2 x CLOSE2 CLOSE1"));
		expect(tagMap.entries()).toEqual([
			[OPEN2, CLOSE2],
			[OPEN1, CLOSE1],
		]);
	});

	it("returns an empty map for untagged sentences", () => {
		expect(createTagMap(["a", "b"]).size).toBe(0);
	});

	it("throws on a closing tag without opening tag", () => {
		expect(() => createTagMap(toks("x CLOSE1 y"))).toThrow(MarkupInconsistencyError);
		expect(() => createTagMap(toks("x CLOSE1 y"))).toThrow("Closing tag without opening tag in: x </1> y");
	});

	it("throws on an opening tag that is never closed", () => {
		expect(() => createTagMap(toks("OPEN1 x"))).toThrow("1 opening tag(s) never closed in: <0> x");
	});
});
