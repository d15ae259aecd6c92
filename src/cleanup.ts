/**
 * Cleanup passes run on the target tokens after tags have been reinserted.
 *
 * Reinsertion works token by token and knows nothing about nesting, so its
 * output can split words, cross tag pairs or repeat the same pair many
 * times. The passes below repair that, in the order markup-inserter.ts
 * applies them. Each pass leaves clean input untouched.
 */

import type { TagMap } from "./tag-map.js";
import {
	createIsolatedTag,
	getTagId,
	isClosingTag,
	isForwardTag,
	isIsolatedTag,
	isOpeningTag,
	isSubwordFragment,
	isTag,
	SUBWORD_SUFFIX,
} from "./tags.js";

/**
 * Hoist tags out of sub-word fragment runs: forward tags go in front of the
 * first fragment, closing tags after the final piece of the word, the
 * closing tags of hoisted opening tags innermost first.
 *
 *   a b@@ </b> c   =>   a b@@ c </b>
 */
export function moveTagsFromBetweenFragments(tokens: readonly string[], tagMap: TagMap): string[] {
	const result: string[] = [];

	for (let i = 0; i < tokens.length; i++) {
		if (!isSubwordFragment(tokens[i])) {
			result.push(tokens[i]);
			continue;
		}

		// forward tags right before the run belong to it
		let start = i;
		for (let j = i - 1; j >= 0 && isForwardTag(tokens[j]); j--) {
			start = j;
			result.pop();
		}

		// run ends at the first complete token, plus the closing tags after it
		let end = -1;
		for (let j = i + 1; j < tokens.length; j++) {
			if (isTag(tokens[j]) || isSubwordFragment(tokens[j])) continue;
			end = j;
			for (let k = j + 1; k < tokens.length && isClosingTag(tokens[k]); k++) {
				end = k;
			}
			break;
		}
		if (end === -1) end = tokens.length - 1;

		const fragments: string[] = [];
		const before: string[] = [];
		const after: string[] = [];
		for (const token of tokens.slice(start, end + 1)) {
			if (isForwardTag(token)) {
				if (!before.includes(token)) before.push(token);
			} else if (isClosingTag(token)) {
				if (!after.includes(token)) after.push(token);
			} else {
				fragments.push(token);
			}
		}

		result.push(...before, ...fragments);
		for (const tag of [...before].reverse()) {
			if (isIsolatedTag(tag)) continue;
			const closing = tagMap.closingOf(tag);
			const position = closing === undefined ? -1 : after.indexOf(closing);
			if (position !== -1) {
				result.push(after[position]);
				after.splice(position, 1);
			}
		}
		result.push(...after);

		i = end;
	}

	return result;
}

/**
 * Join sub-word fragment chains into words. A tag that interrupts a chain
 * ends it.
 *
 *   fo@@ o   =>   foo
 */
export function mergeSubwordFragments(tokens: readonly string[]): string[] {
	const result: string[] = [];
	let current = "";

	for (const token of tokens) {
		if (isSubwordFragment(token)) {
			current += token.slice(0, -SUBWORD_SUFFIX.length);
		} else if (current === "") {
			result.push(token);
		} else if (!isTag(token)) {
			result.push(current + token);
			current = "";
		} else {
			result.push(current, token);
			current = "";
		}
	}
	if (current !== "") result.push(current);

	return result;
}

function swap(tokens: string[], a: number, b: number): void {
	const tmp = tokens[a];
	tokens[a] = tokens[b];
	tokens[b] = tmp;
}

/**
 * Swap closing tags that precede their opening tag.
 *
 *   x </b> y <b> z   =>   x <b> y </b> z
 *
 * When the swapped pair would wrap no content, the opening tag slides left
 * and the closing tag right until each has passed one content token.
 * A closing tag with no opening tag after it is dropped.
 */
export function repairInvertedTags(tokens: readonly string[], tagMap: TagMap): string[] {
	const result = [...tokens];

	for (const [opening, closing] of tagMap.entries()) {
		let betweenTags = false;

		for (let i = 0; i < result.length; i++) {
			const token = result[i];
			if (token !== opening && token !== closing) continue;

			if (token === opening) {
				betweenTags = true;
				continue;
			}
			if (betweenTags) {
				betweenTags = false;
				continue;
			}

			const j = result.indexOf(opening, i + 1);
			if (j === -1) {
				result.splice(i, 1);
				i--;
				continue;
			}

			swap(result, i, j);
			if (result.slice(i + 1, j).some((t) => !isTag(t))) {
				i = j;
				continue;
			}

			let left = i;
			while (left > 0) {
				swap(result, left - 1, left);
				left--;
				if (!isTag(result[left + 1])) break;
			}
			let right = j;
			while (right < result.length - 1) {
				swap(result, right, right + 1);
				right++;
				if (!isTag(result[right - 1])) break;
			}
			i = right;
		}
	}

	return result;
}

/**
 * Reduce a pair placed more than once to one span, from its first opening
 * tag to its last closing tag. Several target tokens aligned to one tagged
 * source token each receive the pair, and the copies may be separated by
 * untagged content.
 *
 *   x <b> y </b> z <b> a </b>   =>   x <b> y z a </b>
 *
 * A pair whose last closing tag comes before its first opening tag is left
 * to repairInvertedTags.
 */
export function collapseRepeatedTagPairs(tokens: readonly string[], tagMap: TagMap): string[] {
	let result = [...tokens];

	for (const [opening, closing] of tagMap.entries()) {
		const occurrences = result.filter((token) => token === opening || token === closing).length;
		if (occurrences <= 2) continue;
		const first = result.indexOf(opening);
		const last = result.lastIndexOf(closing);
		if (first === -1 || last < first) continue;
		result = result.filter((token, i) => i === first || i === last || (token !== opening && token !== closing));
	}

	return result;
}

/**
 * Keep only the outermost opening and closing tag of a pair repeated in
 * sequence. An opening tag that is never closed is removed.
 *
 *   x <b> y <b> z </b> a </b> c   =>   x <b> y z a </b> c
 */
export function removeRedundantTags(tokens: readonly string[], tagMap: TagMap): string[] {
	const result = [...tokens];

	for (const [opening, closing] of tagMap.entries()) {
		let betweenTags = false;
		let previousClosing = -1;

		for (let i = 0; i < result.length; i++) {
			const token = result[i];
			if (token !== opening && token !== closing) continue;

			if (betweenTags) {
				if (token === opening) {
					result.splice(i, 1);
					i--;
				} else {
					betweenTags = false;
					previousClosing = i;
				}
			} else if (token === opening) {
				betweenTags = true;
				previousClosing = -1;
			} else if (previousClosing !== -1) {
				result.splice(previousClosing, 1);
				i--;
				previousClosing = i;
			}
		}

		if (betweenTags) {
			result.splice(result.lastIndexOf(opening), 1);
		}
	}

	return result;
}

/** Order a run of opening tags by the reverse order of their later closing tags */
function sortOpeningRun(tokens: string[], start: number, end: number, tagMap: TagMap): void {
	const pending = tokens.slice(start, end);
	const sorted: string[] = [];
	for (let i = end; i < tokens.length && pending.length > 0; i++) {
		if (!isClosingTag(tokens[i])) continue;
		const opening = tagMap.openingOf(tokens[i]);
		const position = opening === undefined ? -1 : pending.indexOf(opening);
		if (position !== -1) {
			sorted.unshift(pending[position]);
			pending.splice(position, 1);
		}
	}
	tokens.splice(start, end - start, ...pending, ...sorted);
}

/** Order a run of closing tags by the reverse order of their earlier opening tags */
function sortClosingRun(tokens: string[], start: number, end: number, tagMap: TagMap): void {
	const pending = tokens.slice(start, end);
	const sorted: string[] = [];
	for (let i = start - 1; i >= 0 && pending.length > 0; i--) {
		if (!isOpeningTag(tokens[i])) continue;
		const closing = tagMap.closingOf(tokens[i]);
		const position = closing === undefined ? -1 : pending.indexOf(closing);
		if (position !== -1) {
			sorted.push(pending[position]);
			pending.splice(position, 1);
		}
	}
	tokens.splice(start, end - start, ...sorted, ...pending);
}

function sortRuns(
	tokens: string[],
	inRun: (token: string) => boolean,
	sort: (tokens: string[], start: number, end: number, tagMap: TagMap) => void,
	tagMap: TagMap,
): void {
	let start = -1;
	for (let i = 0; i <= tokens.length; i++) {
		if (i < tokens.length && inRun(tokens[i])) {
			if (start === -1) start = i;
			continue;
		}
		if (start !== -1 && i - start > 1) sort(tokens, start, i, tagMap);
		start = -1;
	}
}

interface BalanceSlot {
	token: string;
	keep: boolean;
	before: string[];
	after: string[];
}

/**
 * Make the tags nest properly.
 *
 * Runs of opening and closing tags are sorted first. Then every closing tag
 * whose opening tag is not the innermost open one closes the tags opened
 * after it and reopens them right after itself:
 *
 *   x <a> y <b> z </a> w </b>   =>   x <a> y <b> z </b> </a> <b> w </b>
 *
 * Insertions are collected per slot and flattened at the end. A closing tag
 * whose opening tag is not open is dropped.
 */
export function balanceTags(tokens: readonly string[], tagMap: TagMap): string[] {
	const sorted = [...tokens];
	sortRuns(sorted, isOpeningTag, sortOpeningRun, tagMap);
	sortRuns(sorted, isClosingTag, sortClosingRun, tagMap);

	const slots: BalanceSlot[] = sorted.map((token) => ({ token, keep: true, before: [], after: [] }));
	const open: string[] = [];

	for (const slot of slots) {
		if (isOpeningTag(slot.token)) {
			open.push(slot.token);
			continue;
		}
		if (!isClosingTag(slot.token)) continue;

		const opening = tagMap.openingOf(slot.token);
		if (opening === undefined || !open.includes(opening)) {
			slot.keep = false;
			continue;
		}

		// innermost first
		const interrupted: string[] = [];
		let top = open.pop();
		while (top !== undefined && top !== opening) {
			interrupted.push(top);
			top = open.pop();
		}
		for (const tag of interrupted) {
			const closing = tagMap.closingOf(tag);
			if (closing !== undefined) slot.before.push(closing);
		}
		slot.after.push(...[...interrupted].reverse());
		open.push(...[...interrupted].reverse());
	}

	return slots.flatMap((slot) => [...slot.before, ...(slot.keep ? [slot.token] : []), ...slot.after]);
}

/**
 * Remove a closing tag immediately followed by the opening tag of the same
 * pair, repeatedly.
 *
 *   x <b> y </b> <b> z </b>   =>   x <b> y z </b>
 */
export function mergeNeighborTagPairs(tokens: readonly string[], tagMap: TagMap): string[] {
	const result: string[] = [];
	for (const token of tokens) {
		const previous = result[result.length - 1];
		if (previous !== undefined && isOpeningTag(token) && tagMap.closingOf(token) === previous) {
			result.pop();
			continue;
		}
		result.push(token);
	}
	return result;
}

/** Source tags that do not occur in the target, in source order */
export function collectUnusedTags(source: readonly string[], target: readonly string[]): string[] {
	const targetTags = new Set(target.filter(isTag));
	return source.filter((token) => isTag(token) && !targetTags.has(token));
}

export function appendTags(tokens: readonly string[], tags: readonly string[]): string[] {
	return [...tokens, ...tags];
}

/** Synthetic isolated tag -> the tags it stands for */
export type EmptyPairReplacements = Map<string, string[]>;

/**
 * Replace every opening tag followed only by tags up to its closing tag
 * with a new isolated tag, so the empty pair travels as a single token.
 * New ids start above the highest id in the sentence.
 *
 *   x <b> </b> y   =>   x <7/> y
 */
export function replaceEmptyTagPairs(
	tokens: readonly string[],
	tagMap: TagMap,
): { tokens: string[]; replacements: EmptyPairReplacements } {
	const replacements: EmptyPairReplacements = new Map();
	const ids = tokens.filter(isTag).map(getTagId);
	let nextId = ids.length > 0 ? Math.max(...ids) + 1 : 0;
	const result: string[] = [];

	for (let i = 0; i < tokens.length; i++) {
		const token = tokens[i];
		if (!isOpeningTag(token)) {
			result.push(token);
			continue;
		}

		const closing = tagMap.closingOf(token);
		let covered: string[] = [token];
		let end = -1;
		for (let j = i + 1; j < tokens.length; j++) {
			if (!isTag(tokens[j])) break;
			covered.push(tokens[j]);
			if (tokens[j] === closing) {
				end = j;
				break;
			}
		}
		if (end === -1) covered = [];

		if (covered.length === 0) {
			result.push(token);
			continue;
		}
		const isolated = createIsolatedTag(nextId++);
		replacements.set(isolated, covered);
		result.push(isolated);
		i = end;
	}

	return { tokens: result, replacements };
}

export function restoreEmptyTagPairs(
	tokens: readonly string[],
	replacements: EmptyPairReplacements,
): string[] {
	return tokens.flatMap((token) => (isIsolatedTag(token) ? replacements.get(token) ?? [token] : [token]));
}
