/**
 * The three markup reinsertion strategies.
 *
 * Each strategy maps source tags onto source token indexes (buildIndex) and
 * then walks the target tokens, pulling in the tags of the aligned source
 * tokens (reinsert). Everything before and after is shared, see
 * markup-inserter.ts.
 */

import type { Alignment } from "./alignment.js";
import { getNeighborTags, interpolateForTaglessToken, interpolateForUnalignedToken } from "./interpolation.js";
import type { InterpolationContext } from "./interpolation.js";
import type { SplitSentence } from "./split-sentence.js";
import type { TagMap } from "./tag-map.js";
import {
	isBackwardTag,
	isClosingTag,
	isForwardTag,
	isIsolatedTag,
	isOpeningTag,
	isSubwordFragment,
	isTag,
} from "./tags.js";
import { TokenTagIndex } from "./token-tag-index.js";

export const MARKUP_STRATEGIES = ["BASELINE", "IMPROVED", "COMPLETE_MAPPING"] as const;
export type MarkupStrategy = (typeof MARKUP_STRATEGIES)[number];

/** Appended to the target while reinserting; never part of the output */
export const END_OF_SENTENCE = "\uE100EOS";

export interface ReinsertionStrategy {
	readonly name: MarkupStrategy;
	/** Split boundary tags and replace empty tag pairs before indexing */
	readonly handlesBoundaries: boolean;
	/** Run redundant tag removal during cleanup */
	readonly removesRedundantTags: boolean;
	buildIndex(sentence: SplitSentence, tagMap: TagMap, alignment: Alignment): TokenTagIndex;
	reinsert(
		sentence: SplitSentence,
		index: TokenTagIndex,
		targetTokens: readonly string[],
		alignment: Alignment,
		maxGapSize: number,
	): string[];
}

// ---------------------------------------------------------------------------
// Index construction
// ---------------------------------------------------------------------------

/** Every tag binds to the next content token, closing tags included */
export function createBaselineIndex(tokensWithTags: readonly string[]): TokenTagIndex {
	const index = new TokenTagIndex();
	let offset = 0;
	for (let i = 0; i < tokensWithTags.length; i++) {
		if (isTag(tokensWithTags[i])) {
			index.add(i - offset, tokensWithTags[i]);
			offset++;
		}
	}
	return index;
}

/**
 * Direction aware single assignment: opening and isolated tags bind to the
 * next content token, closing tags to the previous one.
 */
export function createDirectionalIndex(sentence: SplitSentence): TokenTagIndex {
	const index = new TokenTagIndex();
	const tokens = sentence.tokensWithTags;
	let offset = 0;
	for (let i = 0; i < tokens.length; i++) {
		const token = tokens[i];
		if (!isTag(token)) continue;
		const position = isBackwardTag(token) ? i - offset - 1 : i - offset;
		index.add(position, token);
		offset++;
	}
	return index;
}

/**
 * Complete coverage: every content token gets all currently open tags plus
 * their closing tags in reverse order. Isolated tags go to the next content
 * token only.
 *
 *   x <a> y <b> z </b> w </a>   =>   y: <a> </a>   z: <a> <b> </b> </a>   w: <a> </a>
 */
export function createCompleteIndex(sentence: SplitSentence, tagMap: TagMap): TokenTagIndex {
	const index = new TokenTagIndex();
	let open: string[] = [];
	let offset = 0;

	sentence.tokensWithTags.forEach((token, i) => {
		if (isTag(token)) {
			offset++;
			if (isOpeningTag(token) || isIsolatedTag(token)) {
				open.push(token);
			} else {
				const opening = tagMap.openingOf(token);
				open = open.filter((tag) => tag !== opening);
			}
			return;
		}
		if (open.length === 0) return;

		const position = i - offset;
		index.add(position, ...open);
		for (const tag of [...open].reverse()) {
			const closing = tagMap.closingOf(tag);
			if (closing !== undefined) index.add(position, closing);
		}
		open = open.filter((tag) => !isIsolatedTag(tag));
	});

	return index;
}

function nextPointed(from: number, pointed: ReadonlySet<number>, sourceLength: number): number {
	for (let i = from + 1; i < sourceLength; i++) {
		if (pointed.has(i)) return i;
	}
	return -1;
}

function previousPointed(from: number, pointed: ReadonlySet<number>): number {
	for (let i = from - 1; i >= 0; i--) {
		if (pointed.has(i)) return i;
	}
	return -1;
}

/**
 * Relocate tags sitting on source tokens no target token points to.
 *
 * 1. Tag pairs with no pointed token inside their span are dropped.
 * 2. Opening and isolated tags move forward to the next pointed token,
 *    closing tags back to the previous one.
 *
 * Tags that cannot be placed leave the index; the unused-tag flush after
 * cleanup appends them to the target.
 */
export function moveSourceTagsToPointedTokens(
	index: TokenTagIndex,
	tagMap: TagMap,
	pointedSourceTokens: readonly number[],
	sourceLength: number,
): void {
	const pointed = new Set(pointedSourceTokens);

	// Step 1: drop pairs without a pointed token in between
	for (const sourceIndex of index.indexes()) {
		if (pointed.has(sourceIndex)) continue;
		for (const tag of index.tagsAt(sourceIndex)) {
			if (!isClosingTag(tag)) continue;
			const opening = tagMap.openingOf(tag);
			if (opening === undefined) continue;

			let openingIndex = -1;
			for (let i = sourceIndex; i >= 0; i--) {
				if (index.has(i, opening)) {
					openingIndex = i;
					break;
				}
			}
			if (openingIndex === -1) continue;

			let pointedInside = false;
			for (let i = openingIndex; i <= sourceIndex; i++) {
				if (pointed.has(i)) {
					pointedInside = true;
					break;
				}
			}
			if (!pointedInside) {
				index.remove(sourceIndex, tag);
				index.remove(openingIndex, opening);
			}
		}
	}

	// Step 2a: forward tags, last index first so moved tags keep source order
	for (const sourceIndex of index.indexes().reverse()) {
		if (pointed.has(sourceIndex)) continue;
		const forward = index.tagsAt(sourceIndex).filter(isForwardTag);
		if (forward.length === 0) continue;

		for (const tag of forward) index.remove(sourceIndex, tag);
		const target = nextPointed(sourceIndex, pointed, sourceLength);
		if (target !== -1) index.prepend(target, ...forward);
	}

	// Step 2b: closing tags, first index first
	for (const sourceIndex of index.indexes()) {
		if (pointed.has(sourceIndex)) continue;
		const target = previousPointed(sourceIndex, pointed);
		if (target === -1) continue;
		for (const tag of index.tagsAt(sourceIndex).filter(isClosingTag)) {
			index.remove(sourceIndex, tag);
			index.add(target, tag);
		}
	}
}

/**
 * Move isolated tags on unpointed source tokens forward to the next pointed
 * token. Tags with no pointed token after them leave the index.
 */
export function moveIsoTagsToPointedTokens(
	index: TokenTagIndex,
	pointedSourceTokens: readonly number[],
	sourceLength: number,
): void {
	const pointed = new Set(pointedSourceTokens);

	for (const sourceIndex of index.indexes().reverse()) {
		if (pointed.has(sourceIndex)) continue;
		const isolated = index.tagsAt(sourceIndex).filter(isIsolatedTag);
		if (isolated.length === 0) continue;

		for (const tag of isolated) index.remove(sourceIndex, tag);
		const target = nextPointed(sourceIndex, pointed, sourceLength);
		if (target !== -1) index.prepend(target, ...isolated);
	}
}

/**
 * Tags of a source token. For a sub-word fragment the tags of every
 * fragment of the word are collected, so a target token aligned to any
 * piece of a word receives the word's markup.
 */
export function getTagsForSourceTokenIndex(
	sourceIndex: number,
	index: TokenTagIndex,
	sourceTokensWithoutTags: readonly string[],
): string[] {
	// the source end-of-sentence position has no token
	if (sourceIndex === sourceTokensWithoutTags.length) {
		return index.tagsAt(sourceIndex);
	}
	if (sourceIndex < 0 || sourceIndex > sourceTokensWithoutTags.length) return [];

	let current = -1;
	if (isSubwordFragment(sourceTokensWithoutTags[sourceIndex])) {
		current = sourceIndex;
	} else if (sourceIndex > 0 && isSubwordFragment(sourceTokensWithoutTags[sourceIndex - 1])) {
		current = sourceIndex - 1;
	}
	if (current === -1) return index.tagsAt(sourceIndex);

	while (current >= 0 && isSubwordFragment(sourceTokensWithoutTags[current])) current--;
	current++;

	const tags: string[] = [];
	for (let i = current; i < sourceTokensWithoutTags.length; i++) {
		tags.push(...index.tagsAt(i));
		if (!isSubwordFragment(sourceTokensWithoutTags[i])) break;
	}
	return tags;
}

// ---------------------------------------------------------------------------
// Reinsertion
// ---------------------------------------------------------------------------

/**
 * Emit the tags of all aligned source tokens in front of each target token,
 * consuming them. Tags at the end-of-sentence index and tags never
 * consumed are appended.
 */
export function reinsertTagsBaseline(
	index: TokenTagIndex,
	targetTokens: readonly string[],
	alignment: Alignment,
): string[] {
	const result: string[] = [];
	targetTokens.forEach((token, targetIndex) => {
		for (const sourceIndex of alignment.sourceIndexesFor(targetIndex)) {
			result.push(...index.take(sourceIndex));
		}
		result.push(token);
	});
	result.push(...index.take(targetTokens.length));
	result.push(...index.remaining());
	return result;
}

/**
 * Emit forward tags before and backward tags after each target token.
 * Isolated tags are emitted once even when several aligned tokens carry
 * them.
 */
export function reinsertTags(
	sentence: SplitSentence,
	index: TokenTagIndex,
	targetTokens: readonly string[],
	alignment: Alignment,
): string[] {
	const target = [...targetTokens, END_OF_SENTENCE];
	const result: string[] = [...sentence.beginningTags];
	const usedIsolatedTags = new Set<string>();

	target.forEach((token, targetIndex) => {
		const before: string[] = [];
		const after: string[] = [];
		for (const sourceIndex of alignment.sourceIndexesFor(targetIndex)) {
			for (const tag of getTagsForSourceTokenIndex(sourceIndex, index, sentence.tokensWithoutTags)) {
				if (isBackwardTag(tag)) {
					after.push(tag);
					continue;
				}
				if (isIsolatedTag(tag)) {
					if (usedIsolatedTags.has(tag)) continue;
					usedIsolatedTags.add(tag);
				}
				before.push(tag);
			}
		}
		result.push(...before);
		if (token !== END_OF_SENTENCE) result.push(token);
		result.push(...after);
	});

	result.push(...sentence.endTags);
	return result;
}

/**
 * Complete mapping reinsertion with gap interpolation. Target tokens aligned
 * to the source end-of-sentence position count as unaligned. Only isolated
 * tags attach to the target end-of-sentence marker.
 */
export function reinsertTagsComplete(
	sentence: SplitSentence,
	index: TokenTagIndex,
	targetTokens: readonly string[],
	alignment: Alignment,
	maxGapSize: number,
): string[] {
	const target = [...targetTokens, END_OF_SENTENCE];
	const sourceLength = sentence.tokensWithoutTags.length;
	const result: string[] = [...sentence.beginningTags];
	const ctx: InterpolationContext = {
		alignment,
		index,
		maxGapSize,
		targetLength: target.length,
		usedIsolatedTags: new Set(),
	};

	target.forEach((token, targetIndex) => {
		const sourceIndexes = alignment
			.sourceIndexesFor(targetIndex)
			.filter((sourceIndex) => sourceIndex !== sourceLength);
		let neighborTags = getNeighborTags(sourceIndexes, index, ctx.usedIsolatedTags);

		if (
			(sourceIndexes.length === 0 || neighborTags.isEmpty()) &&
			targetIndex < target.length - 1 &&
			maxGapSize > 0
		) {
			neighborTags =
				sourceIndexes.length === 0
					? interpolateForUnalignedToken(targetIndex, ctx)
					: interpolateForTaglessToken(targetIndex, ctx);
		}

		if (token === END_OF_SENTENCE) {
			result.push(...neighborTags.before.filter(isIsolatedTag));
			result.push(...neighborTags.after.filter(isIsolatedTag));
		} else {
			result.push(...neighborTags.before, token, ...neighborTags.after);
		}
	});

	result.push(...sentence.endTags);
	return result;
}

// ---------------------------------------------------------------------------
// Strategy table
// ---------------------------------------------------------------------------

const baseline: ReinsertionStrategy = {
	name: "BASELINE",
	handlesBoundaries: false,
	removesRedundantTags: true,
	buildIndex: (sentence) => createBaselineIndex(sentence.tokensWithTags),
	reinsert: (_sentence, index, targetTokens, alignment) =>
		reinsertTagsBaseline(index, targetTokens, alignment),
};

const improved: ReinsertionStrategy = {
	name: "IMPROVED",
	handlesBoundaries: true,
	removesRedundantTags: true,
	buildIndex: (sentence, tagMap, alignment) => {
		const index = createDirectionalIndex(sentence);
		moveSourceTagsToPointedTokens(
			index,
			tagMap,
			alignment.pointedSourceTokens(),
			sentence.tokensWithoutTags.length,
		);
		return index;
	},
	reinsert: (sentence, index, targetTokens, alignment) =>
		reinsertTags(sentence, index, targetTokens, alignment),
};

const completeMapping: ReinsertionStrategy = {
	name: "COMPLETE_MAPPING",
	handlesBoundaries: true,
	removesRedundantTags: false,
	buildIndex: (sentence, tagMap, alignment) => {
		const index = createCompleteIndex(sentence, tagMap);
		moveIsoTagsToPointedTokens(index, alignment.pointedSourceTokens(), sentence.tokensWithoutTags.length);
		return index;
	},
	reinsert: (sentence, index, targetTokens, alignment, maxGapSize) =>
		reinsertTagsComplete(sentence, index, targetTokens, alignment, maxGapSize),
};

const STRATEGIES: Record<MarkupStrategy, ReinsertionStrategy> = {
	BASELINE: baseline,
	IMPROVED: improved,
	COMPLETE_MAPPING: completeMapping,
};

export function getStrategy(name: MarkupStrategy): ReinsertionStrategy {
	return STRATEGIES[name];
}

export function isMarkupStrategy(value: string): value is MarkupStrategy {
	return MARKUP_STRATEGIES.some((name) => name === value);
}
