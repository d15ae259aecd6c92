/**
 * Gap interpolation for the complete mapping strategy.
 *
 * A target token without alignment, or aligned only to source tokens that
 * carry no tags, borrows the tags shared by its nearest tag-bearing
 * neighbors, as long as the gap between those neighbors is at most
 * maxGapSize tokens.
 */

import type { Alignment } from "./alignment.js";
import { isBackwardTag, isIsolatedTag } from "./tags.js";
import type { TokenTagIndex } from "./token-tag-index.js";

/** Tags to emit before and after one target token */
export class NeighborTags {
	readonly before: string[] = [];
	readonly after: string[] = [];

	addBefore(tag: string): void {
		if (!this.before.includes(tag)) this.before.push(tag);
	}

	addAfter(tag: string): void {
		if (!this.after.includes(tag)) this.after.push(tag);
	}

	isEmpty(): boolean {
		return this.before.length === 0 && this.after.length === 0;
	}

	/** Keep only the tags the other side carries as well */
	intersect(other: NeighborTags): NeighborTags {
		const result = new NeighborTags();
		for (const tag of this.before) {
			if (other.before.includes(tag)) result.addBefore(tag);
		}
		for (const tag of this.after) {
			if (other.after.includes(tag)) result.addAfter(tag);
		}
		return result;
	}
}

/**
 * Collect the tags of the given source indexes. Isolated tags are handed
 * out once per sentence through usedIsolatedTags, or skipped entirely when
 * ignoreIsolated is set.
 */
export function getNeighborTags(
	sourceIndexes: readonly number[],
	index: TokenTagIndex,
	usedIsolatedTags: Set<string>,
	ignoreIsolated = false,
): NeighborTags {
	const neighborTags = new NeighborTags();
	for (const sourceIndex of sourceIndexes) {
		for (const tag of index.tagsAt(sourceIndex)) {
			if (isBackwardTag(tag)) {
				neighborTags.addAfter(tag);
			} else if (isIsolatedTag(tag)) {
				if (ignoreIsolated || usedIsolatedTags.has(tag)) continue;
				usedIsolatedTags.add(tag);
				neighborTags.addBefore(tag);
			} else {
				neighborTags.addBefore(tag);
			}
		}
	}
	return neighborTags;
}

export interface InterpolationContext {
	alignment: Alignment;
	index: TokenTagIndex;
	maxGapSize: number;
	/** Number of target tokens including the end-of-sentence marker */
	targetLength: number;
	usedIsolatedTags: Set<string>;
}

/**
 * Tags for a target token that is aligned, but only to source tokens
 * without tags. Interpolates only between a preceding and a following
 * token with tags; the end-of-sentence marker is never a neighbor.
 */
export function interpolateForTaglessToken(
	targetIndex: number,
	ctx: InterpolationContext,
): NeighborTags {
	let previous: { at: number; tags: NeighborTags } | undefined;
	for (let i = targetIndex - 1; i >= 0; i--) {
		const tags = getNeighborTags(ctx.alignment.sourceIndexesFor(i), ctx.index, ctx.usedIsolatedTags, true);
		if (!tags.isEmpty()) {
			previous = { at: i, tags };
			break;
		}
	}

	let following: { at: number; tags: NeighborTags } | undefined;
	for (let i = targetIndex + 1; i < ctx.targetLength - 1; i++) {
		const tags = getNeighborTags(ctx.alignment.sourceIndexesFor(i), ctx.index, ctx.usedIsolatedTags, true);
		if (!tags.isEmpty()) {
			following = { at: i, tags };
			break;
		}
	}

	if (previous === undefined || following === undefined) return new NeighborTags();
	if (following.at - previous.at - 1 > ctx.maxGapSize) return new NeighborTags();
	return previous.tags.intersect(following.tags);
}

/**
 * Tags for a target token without any alignment, taken from the nearest
 * aligned neighbors. Falls back to the tagless-token interpolation when
 * that yields nothing.
 */
export function interpolateForUnalignedToken(
	targetIndex: number,
	ctx: InterpolationContext,
): NeighborTags {
	let previous: { at: number; sources: number[] } | undefined;
	for (let i = targetIndex - 1; i >= 0; i--) {
		const sources = ctx.alignment.sourceIndexesFor(i);
		if (sources.length > 0) {
			previous = { at: i, sources };
			break;
		}
	}

	let following: { at: number; sources: number[] } | undefined;
	for (let i = targetIndex + 1; i < ctx.targetLength - 1; i++) {
		const sources = ctx.alignment.sourceIndexesFor(i);
		if (sources.length > 0) {
			following = { at: i, sources };
			break;
		}
	}

	const tagsOf = (sources: number[]) =>
		getNeighborTags(sources, ctx.index, ctx.usedIsolatedTags, true);

	let neighborTags = new NeighborTags();
	if (previous === undefined && following !== undefined) {
		if (following.at <= ctx.maxGapSize) {
			neighborTags = tagsOf(following.sources);
		}
	} else if (previous !== undefined && following === undefined) {
		if (ctx.targetLength - previous.at - 2 <= ctx.maxGapSize) {
			neighborTags = tagsOf(previous.sources);
		}
	} else if (previous !== undefined && following !== undefined) {
		if (following.at - previous.at - 1 <= ctx.maxGapSize) {
			neighborTags = tagsOf(previous.sources).intersect(tagsOf(following.sources));
		}
	}

	if (neighborTags.isEmpty()) {
		return interpolateForTaglessToken(targetIndex, ctx);
	}
	return neighborTags;
}
