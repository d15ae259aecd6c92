import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { ExactAlignment, ProbabilisticAlignment, parseAlignment } from "./alignment.js";
import { MalformedAlignmentError } from "./errors.js";

beforeEach(() => {
	vi.spyOn(console, "warn").mockImplementation(() => {});
});

afterEach(() => {
	vi.restoreAllMocks();
});

describe("ExactAlignment", () => {
	it("collects all source indexes of a target token", () => {
		expect(new ExactAlignment("1-1 2-1 3-1").sourceIndexesFor(1)).toEqual([1, 2, 3]);
		expect(new ExactAlignment("3-1 2-1 1-1").sourceIndexesFor(1)).toEqual([1, 2, 3]);
		expect(new ExactAlignment("1-1").sourceIndexesFor(5)).toEqual([]);
	});

	it("ignores duplicate links and warns about entries that are not pairs", () => {
		const alignment = new ExactAlignment("0-0 0-0 x 1-2-3 1-1");
		expect(alignment.toString()).toBe("0-0 1-1");
		expect(console.warn).toHaveBeenCalledTimes(2);
		expect(console.warn).toHaveBeenCalledWith('Skipping alignment entry "1-2-3": not a source-target pair');
	});

	it("accepts an empty alignment", () => {
		expect(new ExactAlignment("").toString()).toBe("");
		expect(console.warn).not.toHaveBeenCalled();
	});

	it("throws on non-numeric entries", () => {
		expect(() => new ExactAlignment("ab-cd")).toThrow(MalformedAlignmentError);
		expect(() => new ExactAlignment("0-")).toThrow('Invalid alignment entry "0-"');
	});

	it("lists pointed source tokens once", () => {
		expect(new ExactAlignment("1-1 1-2 1-3").pointedSourceTokens()).toEqual([1]);
		expect(new ExactAlignment("1-1 1-2 3-3").pointedSourceTokens()).toEqual([1, 3]);
	});

	it("renders both orders", () => {
		const alignment = new ExactAlignment("2-0 0-1 1-1");
		expect(alignment.toString()).toBe("0-1 1-1 2-0");
		expect(alignment.toTargetSourceString()).toBe("0-2 1-0 1-1");
	});

	it("shifts source indexes and drops negative links", () => {
		const alignment = new ExactAlignment("1-1 2-2 3-3");
		alignment.shiftSource(-1);
		expect(alignment.toTargetSourceString()).toBe("1-0 2-1 3-2");
		alignment.shiftSource(2);
		expect(alignment.toTargetSourceString()).toBe("1-2 2-3 3-4");
		alignment.shiftSource(-3);
		expect(alignment.toTargetSourceString()).toBe("2-0 3-1");
		expect(console.warn).toHaveBeenCalledTimes(1);
	});

	it("shifts target indexes and drops negative links", () => {
		const alignment = new ExactAlignment("1-1 2-2 3-3");
		alignment.shiftTarget(-1);
		expect(alignment.toTargetSourceString()).toBe("0-1 1-2 2-3");
		alignment.shiftTarget(2);
		expect(alignment.toTargetSourceString()).toBe("2-1 3-2 4-3");
		alignment.shiftTarget(-3);
		expect(alignment.toTargetSourceString()).toBe("0-2 1-3");
	});
});

describe("ProbabilisticAlignment", () => {
	const raw = "0.1,0.2,0.3 0.6,0.4,0.5";

	it("finds the best source index above a threshold", () => {
		const alignment = new ProbabilisticAlignment(raw);
		expect(alignment.bestSourceIndex(0)).toBe(2);
		expect(alignment.bestSourceIndex(1)).toBe(0);
		expect(alignment.bestSourceIndex(0, 0.5)).toBe(-1);
		expect(alignment.bestSourceIndex(2)).toBe(-1);
		expect(alignment.sourceIndexesFor(1)).toEqual([0]);
	});

	it("breaks ties by the lowest source index", () => {
		expect(new ProbabilisticAlignment("0.5,0.5,0.1").bestSourceIndex(0)).toBe(0);
		expect(new ProbabilisticAlignment("0.1,0.5,0.5").bestSourceIndex(0)).toBe(1);
		expect(new ProbabilisticAlignment("0.3,0.5,0.5").bestSourceIndex(0, 0.5)).toBe(1);
		expect(new ProbabilisticAlignment("0.5,0.5").sourceIndexesFor(0)).toEqual([0]);
	});

	it("lists source indexes above a threshold", () => {
		const alignment = new ProbabilisticAlignment(raw);
		expect(alignment.sourceIndexesAbove(0, 0.2)).toEqual([1, 2]);
		expect(alignment.sourceIndexesAbove(0, 0.3)).toEqual([2]);
		expect(alignment.sourceIndexesAbove(0, 0.5)).toEqual([]);
	});

	it("converts to exact alignments", () => {
		const alignment = new ProbabilisticAlignment(raw);
		expect(alignment.toExactAlignment(0.1).toString()).toBe("0-0 0-1 1-0 1-1 2-0 2-1");
		expect(alignment.toExactAlignment(0.2).toString()).toBe("0-1 1-0 1-1 2-0 2-1");
		expect(alignment.toExactAlignment(0.3).toString()).toBe("0-1 1-1 2-0 2-1");
		expect(alignment.toExactAlignment(0.4).toString()).toBe("0-1 1-1 2-1");
		expect(alignment.toBestAlignment().toString()).toBe("0-1 2-0");
	});

	it("shifts source indexes lazily", () => {
		const alignment = new ProbabilisticAlignment(raw);
		alignment.shiftSource(1);
		expect(alignment.toExactAlignment(0.4).toString()).toBe("1-1 2-1 3-1");
		alignment.shiftSource(-1);
		expect(alignment.toExactAlignment(0.4).toString()).toBe("0-1 1-1 2-1");
		alignment.shiftSource(-1);
		expect(alignment.toExactAlignment(0.4).toString()).toBe("0-1 1-1");
		expect(console.warn).toHaveBeenCalledTimes(1);
	});

	it("shifts target indexes lazily", () => {
		const alignment = new ProbabilisticAlignment(raw);
		alignment.shiftTarget(1);
		expect(alignment.toExactAlignment(0.4).toString()).toBe("0-2 1-2 2-2");
		alignment.shiftTarget(-1);
		expect(alignment.toExactAlignment(0.4).toString()).toBe("0-1 1-1 2-1");
		alignment.shiftTarget(-2);
		expect(alignment.toExactAlignment(0.4).toString()).toBe("");
	});

	it("lists pointed source tokens", () => {
		expect(new ProbabilisticAlignment("1.0,0.0,0.0 1.0,0.0,0.0 1.0,0.0,0.0").pointedSourceTokens()).toEqual([0]);
		expect(
			new ProbabilisticAlignment("0.3,0.2,0.1 0.6,0.4,0.5 0.7,0.8,0.9").pointedSourceTokens(),
		).toEqual([0, 2]);
	});

	it("keeps the score matrix in its string form", () => {
		expect(new ProbabilisticAlignment(raw).toString()).toBe(raw);
	});

	it("writes shifted indexes into its string form", () => {
		const alignment = new ProbabilisticAlignment(raw);
		alignment.shiftSource(1);
		alignment.shiftTarget(1);
		expect(alignment.toString()).toBe("0,0,0,0 0,0.1,0.2,0.3 0,0.6,0.4,0.5");
		const reparsed = new ProbabilisticAlignment(alignment.toString());
		expect(reparsed.toExactAlignment(0.4).toString()).toBe(alignment.toExactAlignment(0.4).toString());
		expect(reparsed.pointedSourceTokens()).toEqual(alignment.pointedSourceTokens());
	});

	it("leaves indexes shifted below zero out of its string form", () => {
		const alignment = new ProbabilisticAlignment(raw);
		alignment.shiftSource(-1);
		alignment.shiftTarget(-1);
		expect(alignment.toString()).toBe("0.4,0.5");
	});

	it("throws on invalid scores and ragged rows", () => {
		expect(() => new ProbabilisticAlignment("0.1,x")).toThrow(MalformedAlignmentError);
		expect(() => new ProbabilisticAlignment("0.1,,0.2")).toThrow('Invalid alignment score ""');
		expect(() => new ProbabilisticAlignment("0.1,0.2 0.3")).toThrow("Alignment rows differ in length");
	});
});

describe("parseAlignment", () => {
	it("picks the alignment kind from the format", () => {
		expect(parseAlignment("0-0 1-1")).toBeInstanceOf(ExactAlignment);
		expect(parseAlignment("0.5,0.5 0.2,0.8")).toBeInstanceOf(ProbabilisticAlignment);
	});
});
