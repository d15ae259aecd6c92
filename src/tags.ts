/**
 * Tag token encoding.
 *
 * Markup travels through the pipeline as two-character tokens taken from the
 * Unicode private use area: a kind marker followed by a character that
 * encodes the tag id. Keeping tags as single tokens lets alignments and
 * token indexes treat them like words without ever colliding with text.
 *
 *   OPENING_MARKER + chr(TAG_ID_BASE + id)   e.g. <b> from <b>...</b>
 *   CLOSING_MARKER + chr(TAG_ID_BASE + id)   e.g. </b>
 *   ISOLATED_MARKER + chr(TAG_ID_BASE + id)  e.g. <br/>
 */

import type { TagMap } from "./tag-map.js";

export const OPENING_MARKER = "\uE101";
export const CLOSING_MARKER = "\uE102";
export const ISOLATED_MARKER = "\uE103";
export const TAG_ID_BASE = 0xe110;

/** Suffix carried by every non-final sub-word fragment */
export const SUBWORD_SUFFIX = "@@";

export function isTag(token: string): boolean {
	return isOpeningTag(token) || isClosingTag(token) || isIsolatedTag(token);
}

export function isOpeningTag(token: string): boolean {
	return token.length === 2 && token[0] === OPENING_MARKER;
}

export function isClosingTag(token: string): boolean {
	return token.length === 2 && token[0] === CLOSING_MARKER;
}

export function isIsolatedTag(token: string): boolean {
	return token.length === 2 && token[0] === ISOLATED_MARKER;
}

/** Forward tags attach to the next content token */
export function isForwardTag(token: string): boolean {
	return isOpeningTag(token) || isIsolatedTag(token);
}

/** Backward tags attach to the previous content token */
export function isBackwardTag(token: string): boolean {
	return isClosingTag(token);
}

/** Numeric id of a tag token, -1 for anything else */
export function getTagId(token: string): number {
	if (!isTag(token)) return -1;
	return token.charCodeAt(1) - TAG_ID_BASE;
}

function createTag(marker: string, id: number): string {
	if (!Number.isInteger(id) || id < 0 || TAG_ID_BASE + id > 0xf8ff) {
		throw new Error(`Tag id out of range: ${id}`);
	}
	return marker + String.fromCharCode(TAG_ID_BASE + id);
}

export function createOpeningTag(id: number): string {
	return createTag(OPENING_MARKER, id);
}

export function createClosingTag(id: number): string {
	return createTag(CLOSING_MARKER, id);
}

export function createIsolatedTag(id: number): string {
	return createTag(ISOLATED_MARKER, id);
}

/** A sub-word fragment is a non-tag token ending with "@@" */
export function isSubwordFragment(token: string): boolean {
	return !isTag(token) && token.endsWith(SUBWORD_SUFFIX);
}

/** Split a space separated sentence into tokens, dropping empty ones */
export function tokenize(sentence: string): string[] {
	return sentence.split(" ").filter((token) => token.length > 0);
}

export function removeTags(tokens: readonly string[]): string[] {
	return tokens.filter((token) => !isTag(token));
}

/**
 * Remove tags from coded text. Each tag is dropped together with the single
 * space that follows it.
 */
export function removeTagsFromText(text: string): string {
	let result = "";
	for (let i = 0; i < text.length; i++) {
		const c = text[i];
		if (c === OPENING_MARKER || c === CLOSING_MARKER || c === ISOLATED_MARKER) {
			// skip marker and id, then one trailing space
			i++;
			if (text[i + 1] === " ") i++;
			continue;
		}
		result += c;
	}
	return result.trim();
}

/**
 * Render tokens with tags in readable notation: `<3>` opening,
 * `</3>` closing, `<3/>` isolated.
 */
export function toReadable(tokens: readonly string[]): string {
	return tokens
		.map((token) => {
			const id = getTagId(token);
			if (isOpeningTag(token)) return `<${id}>`;
			if (isClosingTag(token)) return `</${id}>`;
			if (isIsolatedTag(token)) return `<${id}/>`;
			return token;
		})
		.join(" ");
}

/** Parse readable notation back into tokens */
export function fromReadable(text: string): string[] {
	return tokenize(text).map((token) => {
		let match = /^<(\d+)>$/.exec(token);
		if (match) return createOpeningTag(parseInt(match[1], 10));
		match = /^<\/(\d+)>$/.exec(token);
		if (match) return createClosingTag(parseInt(match[1], 10));
		match = /^<(\d+)\/>$/.exec(token);
		if (match) return createIsolatedTag(parseInt(match[1], 10));
		return token;
	});
}

function escapeXml(text: string): string {
	return text
		.replace(/&/g, "&amp;")
		.replace(/</g, "&lt;")
		.replace(/>/g, "&gt;");
}

/**
 * Render a tagged token sequence as an XML document. Closing tags are named
 * after the id of their opening tag so the result parses when the markup is
 * well formed.
 */
export function asXml(tokens: readonly string[], tagMap: TagMap): string {
	const parts: string[] = [];
	for (const token of tokens) {
		if (isOpeningTag(token)) {
			parts.push(`<u${getTagId(token)}>`);
		} else if (isClosingTag(token)) {
			const opening = tagMap.openingOf(token);
			const id = opening === undefined ? getTagId(token) : getTagId(opening);
			parts.push(`</u${id}>`);
		} else if (isIsolatedTag(token)) {
			parts.push(`<iso${getTagId(token)}/>`);
		} else {
			parts.push(escapeXml(token));
		}
	}
	return `<?xml version="1.0" encoding="UTF-8"?>\n<body>${parts.join(" ")}</body>`;
}
