import { createClosingTag, createIsolatedTag, createOpeningTag, tokenize } from "./tags.js";

export const OPEN1 = createOpeningTag(0);
export const CLOSE1 = createClosingTag(1);
export const OPEN2 = createOpeningTag(2);
export const CLOSE2 = createClosingTag(3);
export const OPEN3 = createOpeningTag(4);
export const CLOSE3 = createClosingTag(5);
export const ISO1 = createIsolatedTag(6);
export const ISO2 = createIsolatedTag(7);

const NAMED_TAGS = new Map<string, string>([
	["OPEN1", OPEN1],
	["CLOSE1", CLOSE1],
	["OPEN2", OPEN2],
	["CLOSE2", CLOSE2],
	["OPEN3", OPEN3],
	["CLOSE3", CLOSE3],
	["ISO1", ISO1],
	["ISO2", ISO2],
]);

/** "x OPEN1 y CLOSE1" -> tokens with real tag tokens */
export function toks(text: string): string[] {
	return tokenize(text).map((token) => NAMED_TAGS.get(token) ?? token);
}

/** Source containing all three pairs, used to build a tag map */
export const ALL_PAIRS = toks("OPEN1 CLOSE1 OPEN2 CLOSE2 OPEN3 CLOSE3");
