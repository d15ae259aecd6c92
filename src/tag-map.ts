import { MarkupInconsistencyError } from "./errors.js";
import { isClosingTag, isOpeningTag, toReadable } from "./tags.js";

/** Bidirectional map between opening tags and their closing tags */
export class TagMap {
	private readonly closingByOpening = new Map<string, string>();
	private readonly openingByClosing = new Map<string, string>();

	put(opening: string, closing: string): void {
		this.closingByOpening.set(opening, closing);
		this.openingByClosing.set(closing, opening);
	}

	closingOf(opening: string): string | undefined {
		return this.closingByOpening.get(opening);
	}

	openingOf(closing: string): string | undefined {
		return this.openingByClosing.get(closing);
	}

	get size(): number {
		return this.closingByOpening.size;
	}

	/** Pairs as [opening, closing], in the order they were closed */
	entries(): Array<[string, string]> {
		return [...this.closingByOpening.entries()];
	}
}

/**
 * Pair opening and closing tags of a source sentence with a stack.
 * Throws MarkupInconsistencyError for a closing tag without an open tag
 * or an opening tag that is never closed.
 */
export function createTagMap(tokens: readonly string[]): TagMap {
	const tagMap = new TagMap();
	const stack: string[] = [];

	for (const token of tokens) {
		if (isOpeningTag(token)) {
			stack.push(token);
		} else if (isClosingTag(token)) {
			const opening = stack.pop();
			if (opening === undefined) {
				throw new MarkupInconsistencyError(
					`Closing tag without opening tag in: ${toReadable(tokens)}`,
					tokens,
				);
			}
			tagMap.put(opening, token);
		}
	}

	if (stack.length > 0) {
		throw new MarkupInconsistencyError(
			`${stack.length} opening tag(s) never closed in: ${toReadable(tokens)}`,
			tokens,
		);
	}

	return tagMap;
}
