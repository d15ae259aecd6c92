import type { TagMap } from "./tag-map.js";
import { isClosingTag, isOpeningTag, isTag, removeTags } from "./tags.js";

/**
 * A source sentence with its boundary tags split off.
 *
 * Tags that wrap the whole sentence (or sit at its very start or end) carry
 * no positional information, so they are emitted around the translation
 * as-is instead of being mapped through the alignment.
 */
export class SplitSentence {
	/** Interior tokens, tags included */
	readonly tokensWithTags: string[];
	readonly beginningTags: string[];
	readonly endTags: string[];
	private withoutTags: string[] | undefined;

	/** Without a tag map nothing is split off */
	constructor(tokens: readonly string[], tagMap?: TagMap) {
		if (tagMap === undefined) {
			this.tokensWithTags = [...tokens];
			this.beginningTags = [];
			this.endTags = [];
			return;
		}

		const beginningTags: string[] = [];
		for (const token of tokens) {
			if (!isTag(token)) break;
			beginningTags.push(token);
		}

		const endTags: string[] = [];
		if (beginningTags.length < tokens.length) {
			for (let i = tokens.length - 1; i >= 0; i--) {
				if (!isTag(tokens[i])) break;
				endTags.unshift(tokens[i]);
			}
		}

		// Keep only boundary tags whose partner is on a boundary as well
		const keptClosing = new Set<string>();
		this.beginningTags = beginningTags.filter((tag) => {
			if (!isOpeningTag(tag)) return true;
			const closing = tagMap.closingOf(tag);
			if (closing === undefined) return false;
			if (endTags.includes(closing)) {
				keptClosing.add(closing);
				return true;
			}
			return beginningTags.includes(closing);
		});
		this.endTags = endTags.filter((tag) => {
			if (!isClosingTag(tag)) return true;
			if (keptClosing.has(tag)) return true;
			const opening = tagMap.openingOf(tag);
			return opening !== undefined && endTags.includes(opening);
		});

		const boundary = new Set([...this.beginningTags, ...this.endTags]);
		this.tokensWithTags = tokens.filter((token) => !boundary.has(token));
	}

	/** An unsplit sentence: every token is interior */
	static whole(tokens: readonly string[]): SplitSentence {
		return new SplitSentence(tokens);
	}

	get tokensWithoutTags(): string[] {
		if (this.withoutTags === undefined) {
			this.withoutTags = removeTags(this.tokensWithTags);
		}
		return this.withoutTags;
	}
}
