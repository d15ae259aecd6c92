import { describe, it, expect, vi } from "vitest";
import { ExactAlignment, ProbabilisticAlignment } from "./alignment.js";
import { mergeSubwordFragments, repairInvertedTags } from "./cleanup.js";
import { MarkupInconsistencyError } from "./errors.js";
import { cleanUpTags, createSentenceAlignmentTable, insertMarkup } from "./markup-inserter.js";
import { MARKUP_STRATEGIES } from "./strategies.js";
import { createTagMap } from "./tag-map.js";
import { isTag } from "./tags.js";
import { ALL_PAIRS, CLOSE1, OPEN1, toks } from "./test-utils.js";

describe("insertMarkup", () => {
	it("keeps the wrapping of content that survives translation", () => {
		const result = insertMarkup(toks("x OPEN1 y CLOSE1 z"), ["Y"], new ExactAlignment("1-0"));
		expect(result).toEqual([OPEN1, "Y", CLOSE1]);
	});

	it("accepts space separated sentences", () => {
		const source = `x ${OPEN1} y ${CLOSE1} z`;
		expect(insertMarkup(source, "a b c", new ExactAlignment("0-0 1-1 2-2"))).toEqual(toks("a OPEN1 b CLOSE1 c"));
	});

	it.each(MARKUP_STRATEGIES)("reinserts a simple pair with %s", (strategy) => {
		const result = insertMarkup(toks("x OPEN1 y CLOSE1 z"), ["a", "b", "c"], new ExactAlignment("0-0 1-1 2-2"), {
			strategy,
		});
		expect(result).toEqual(toks("a OPEN1 b CLOSE1 c"));
	});

	it("merges neighboring pairs produced by complete mapping", () => {
		const source = toks("ISO1 OPEN1 This CLOSE1 is a OPEN2 test . CLOSE2 ISO2");
		const result = insertMarkup(source, "Das ist ein Test .", new ExactAlignment("0-0 1-1 2-2 3-3 4-4 5-5"));
		expect(result).toEqual(toks("ISO1 OPEN1 Das CLOSE1 ist ein OPEN2 Test . CLOSE2 ISO2"));
	});

	it("gives the same result for an equivalent probabilistic alignment", () => {
		const source = toks("ISO1 OPEN1 This CLOSE1 is a OPEN2 test . CLOSE2 ISO2");
		const rows = [0, 1, 2, 3, 4, 5].map((row) =>
			[0, 1, 2, 3, 4, 5].map((column) => (row === column ? "0.9" : "0.02")).join(","),
		);
		const result = insertMarkup(source, "Das ist ein Test .", new ProbabilisticAlignment(rows.join(" ")));
		expect(result).toEqual(toks("ISO1 OPEN1 Das CLOSE1 ist ein OPEN2 Test . CLOSE2 ISO2"));
	});

	it("removes repeated pairs with IMPROVED", () => {
		const result = insertMarkup(
			toks("OPEN1 x y z CLOSE1 a b c"),
			"X1 N Z X2 N N",
			new ExactAlignment("0-0 0-3 2-2"),
			{ strategy: "IMPROVED" },
		);
		expect(result).toEqual(toks("OPEN1 X1 N Z CLOSE1 X2 N N"));
	});

	it("repairs closing tags placed before their opening tag with BASELINE", () => {
		const result = insertMarkup(toks("x OPEN1 y CLOSE1 z"), "a b c", new ExactAlignment("0-0 2-2"), {
			strategy: "BASELINE",
		});
		expect(result).toEqual(toks("a b OPEN1 c CLOSE1"));
	});

	it.each(["IMPROVED", "COMPLETE_MAPPING"] as const)("restores empty tag pairs with %s", (strategy) => {
		const result = insertMarkup(toks("x OPEN1 CLOSE1 y"), "a b", new ExactAlignment("0-0 1-1"), { strategy });
		expect(result).toEqual(toks("a OPEN1 CLOSE1 b"));
	});

	it("appends tags that found no place", () => {
		const result = insertMarkup(toks("x ISO1 y"), "a", new ExactAlignment("0-0"));
		expect(result).toEqual(toks("a ISO1"));
	});

	it.each(MARKUP_STRATEGIES)("keeps every source tag exactly once with %s", (strategy) => {
		const cases: Array<[string, string, string]> = [
			["ISO1 OPEN1 Zum Inhalt ISO2 springen CLOSE1 end", "aller au contenu", "0-0 1-2 2-3"],
			["x ISO1 ISO2 OPEN1 y z CLOSE1", "a b c", "1-0 2-0 2-2"],
			["OPEN1 x OPEN2 y CLOSE2 z CLOSE1 a", "p q", "3-0"],
			["x OPEN1 y OPEN2 z CLOSE2 CLOSE1", "c b a", "2-0 1-1 0-2"],
			["x OPEN1 y CLOSE1 z", "a b c", "1-0 2-1 1-2"],
		];
		vi.spyOn(console, "warn").mockImplementation(() => {});
		for (const [source, target, alignment] of cases) {
			const sourceTokens = toks(source);
			const result = insertMarkup(sourceTokens, target, new ExactAlignment(alignment), { strategy });
			expect(result.filter(isTag).sort()).toEqual(sourceTokens.filter(isTag).sort());
		}
		vi.restoreAllMocks();
	});

	it.each([
		["BASELINE", "OPEN1 a CLOSE1 b c"],
		["IMPROVED", "OPEN1 a b c CLOSE1"],
		["COMPLETE_MAPPING", "OPEN1 a b c CLOSE1"],
	] as const)("wraps target tokens aligned to one tagged word once with %s", (strategy, expected) => {
		const result = insertMarkup(toks("x OPEN1 y CLOSE1 z"), "a b c", new ExactAlignment("1-0 2-1 1-2"), { strategy });
		expect(result).toEqual(toks(expected));
	});

	it("appends tags dropped while moving them to pointed tokens", () => {
		const result = insertMarkup(toks("OPEN1 x OPEN2 y CLOSE2 z CLOSE1 a"), "p q", new ExactAlignment("3-0"), {
			strategy: "IMPROVED",
		});
		expect(result).toEqual(toks("p q OPEN1 OPEN2 CLOSE2 CLOSE1"));
	});

	it("throws on unbalanced source markup", () => {
		expect(() => insertMarkup(toks("x OPEN1 y"), "a b", new ExactAlignment("0-0 1-1"))).toThrow(
			MarkupInconsistencyError,
		);
	});

	it("rejects a negative maxGapSize", () => {
		expect(() => insertMarkup(["x"], ["a"], new ExactAlignment("0-0"), { maxGapSize: -1 })).toThrow(
			"maxGapSize must be a non-negative integer, got -1",
		);
	});

	it("reports the alignment table and intermediate results", () => {
		const onDebug = vi.fn();
		insertMarkup(toks("x OPEN1 y CLOSE1"), "a b", new ExactAlignment("0-0 1-1"), { onDebug });
		expect(onDebug).toHaveBeenCalledTimes(3);
		expect(onDebug.mock.calls[0][0]).toBe(
			createSentenceAlignmentTable(toks("x OPEN1 y CLOSE1"), ["a", "b"], new ExactAlignment("0-0 1-1")),
		);
		expect(onDebug.mock.calls[2][0]).toBe('target sentence with cleaned tags: "a <0> b </1>"');
	});
});

describe("cleanUpTags", () => {
	const tagMap = createTagMap(ALL_PAIRS);

	it("repairs inverted tags", () => {
		expect(repairInvertedTags(toks("x CLOSE1 y OPEN1 z"), tagMap)).toEqual(toks("x OPEN1 y CLOSE1 z"));
	});

	it("moves tags out of words before merging fragments", () => {
		expect(mergeSubwordFragments(["fo@@", "o"])).toEqual(["foo"]);
		expect(cleanUpTags(toks("fo@@ OPEN1 o"), tagMap, false)).toEqual([OPEN1, "foo"]);
	});

	it("is idempotent", () => {
		const outputs = [
			toks("ISO1 OPEN1 Das CLOSE1 ist ein OPEN2 Test . CLOSE2 ISO2"),
			toks("ISO1 OPEN2 Test CLOSE2 ein ist OPEN1 das CLOSE1 OPEN2 . CLOSE2 ISO2"),
			toks("x OPEN1 y OPEN2 z CLOSE2 CLOSE1 OPEN2 a CLOSE2"),
		];
		for (const output of outputs) {
			for (const removeRedundant of [true, false]) {
				const once = cleanUpTags(output, tagMap, removeRedundant);
				expect(cleanUpTags(once, tagMap, removeRedundant)).toEqual(once);
			}
		}
	});
});

describe("createSentenceAlignmentTable", () => {
	it("lists target and source tokens side by side", () => {
		const table = createSentenceAlignmentTable(toks("x OPEN1 y CLOSE1"), ["a", "b"], new ExactAlignment("1-1 0-0"));
		expect(table.split("\n")).toEqual([
			"0-0 1-1",
			"TARGET:      SOURCE:",
			"      a  0    0       x",
			"      b  1    1       y",
		]);
	});
});
