/**
 * Markup reinsertion pipeline.
 *
 * Steps:
 * 1. Pair the source tags (TagMap)
 * 2. Replace empty tag pairs and split off boundary tags (IMPROVED, COMPLETE_MAPPING)
 * 3. Map source tags onto source token indexes and move them along the
 *    alignment into the target (strategy specific)
 * 4. Clean up: fragments, repeated pairs, inversions, redundant pairs,
 *    nesting, neighbor pairs, unused tags
 */

import type { Alignment } from "./alignment.js";
import {
	appendTags,
	balanceTags,
	collapseRepeatedTagPairs,
	collectUnusedTags,
	mergeNeighborTagPairs,
	mergeSubwordFragments,
	moveTagsFromBetweenFragments,
	removeRedundantTags,
	repairInvertedTags,
	replaceEmptyTagPairs,
	restoreEmptyTagPairs,
} from "./cleanup.js";
import type { EmptyPairReplacements } from "./cleanup.js";
import { SplitSentence } from "./split-sentence.js";
import { getStrategy } from "./strategies.js";
import type { MarkupStrategy } from "./strategies.js";
import { createTagMap } from "./tag-map.js";
import type { TagMap } from "./tag-map.js";
import { removeTags, tokenize, toReadable } from "./tags.js";

export interface InsertMarkupOptions {
	strategy?: MarkupStrategy;
	/** Largest gap of untagged target tokens bridged by interpolation (COMPLETE_MAPPING) */
	maxGapSize?: number;
	/** Receives the alignment table and the intermediate token sequences */
	onDebug?: (message: string) => void;
}

const DEFAULT_STRATEGY: MarkupStrategy = "COMPLETE_MAPPING";

function asTokens(sentence: string | readonly string[]): string[] {
	return typeof sentence === "string" ? tokenize(sentence) : [...sentence];
}

/**
 * Run the shared cleanup passes on reinserted target tokens.
 * Redundant tag removal only applies to single-assignment strategies.
 */
export function cleanUpTags(
	tokens: readonly string[],
	tagMap: TagMap,
	removeRedundant: boolean,
): string[] {
	let result = moveTagsFromBetweenFragments(tokens, tagMap);
	result = mergeSubwordFragments(result);
	result = collapseRepeatedTagPairs(result, tagMap);
	result = repairInvertedTags(result, tagMap);
	if (removeRedundant) {
		result = removeRedundantTags(result, tagMap);
	}
	result = balanceTags(result, tagMap);
	return mergeNeighborTagPairs(result, tagMap);
}

/**
 * Insert the markup of a tagged source sentence into its untagged
 * translation.
 *
 * @param source - preprocessed source sentence with tag tokens, space separated or as tokens
 * @param target - translation without tags, space separated or as tokens
 * @param alignment - source/target token alignment of the untagged sentences
 * @returns the target tokens with tags; sub-word fragments are merged
 */
export function insertMarkup(
	source: string | readonly string[],
	target: string | readonly string[],
	alignment: Alignment,
	options: InsertMarkupOptions = {},
): string[] {
	const strategy = getStrategy(options.strategy ?? DEFAULT_STRATEGY);
	const maxGapSize = options.maxGapSize ?? 0;
	if (!Number.isInteger(maxGapSize) || maxGapSize < 0) {
		throw new Error(`maxGapSize must be a non-negative integer, got ${maxGapSize}`);
	}

	const originalSourceTokens = asTokens(source);
	const targetTokens = asTokens(target);
	options.onDebug?.(createSentenceAlignmentTable(originalSourceTokens, targetTokens, alignment));

	// Step 1: pair tags
	const tagMap = createTagMap(originalSourceTokens);

	// Step 2: empty pairs and boundary tags
	let sourceTokens = originalSourceTokens;
	let replacements: EmptyPairReplacements = new Map();
	let sentence: SplitSentence;
	if (strategy.handlesBoundaries) {
		({ tokens: sourceTokens, replacements } = replaceEmptyTagPairs(originalSourceTokens, tagMap));
		sentence = new SplitSentence(sourceTokens, tagMap);
	} else {
		sentence = SplitSentence.whole(sourceTokens);
	}

	// Step 3: reinsert
	const index = strategy.buildIndex(sentence, tagMap, alignment);
	const reinserted = strategy.reinsert(sentence, index, targetTokens, alignment, maxGapSize);
	options.onDebug?.(`target sentence with inserted tags: "${toReadable(reinserted)}"`);

	// Step 4: clean up
	let result = cleanUpTags(reinserted, tagMap, strategy.removesRedundantTags);
	result = appendTags(result, collectUnusedTags(sourceTokens, result));
	result = restoreEmptyTagPairs(result, replacements);
	options.onDebug?.(`target sentence with cleaned tags: "${toReadable(result)}"`);

	return result;
}

/**
 * Two-column table of target and source tokens with their indexes,
 * preceded by the alignment itself.
 */
export function createSentenceAlignmentTable(
	sourceTokens: readonly string[],
	targetTokens: readonly string[],
	alignment: Alignment,
): string {
	const source = removeTags(sourceTokens);
	const sourceWidth = Math.max("SOURCE:".length, ...source.map((t) => t.length));
	const targetWidth = Math.max("TARGET:".length, ...targetTokens.map((t) => t.length));

	const lines = [alignment.toString(), `${"TARGET:".padStart(targetWidth)}      ${"SOURCE:".padStart(sourceWidth)}`];
	for (let i = 0; i < Math.max(source.length, targetTokens.length); i++) {
		const left = i < targetTokens.length
			? `${targetTokens[i].padStart(targetWidth)} ${String(i).padStart(2)}`
			: " ".repeat(targetWidth + 3);
		const right = i < source.length ? `${String(i).padStart(2)} ${source[i].padStart(sourceWidth)}` : "";
		lines.push(`${left}   ${right}`.trimEnd());
	}
	return lines.join("\n");
}
