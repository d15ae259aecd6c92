/**
 * Tag masking around an external whitespace based detokenizer.
 *
 * The detokenizer decides about spaces by looking at neighboring
 * characters. Surrounding each tag with the first character of the next
 * word and the last character of the previous word makes it treat the tag
 * like the word boundary it sits on. Unmasking strips those characters
 * again; detokenizeTags then removes the spaces tags keep on their inner
 * side.
 */

import { isTag } from "./tags.js";

const MASKED_TAG = /\S?([\uE101\uE102\uE103].)\S?/g;
const OPENING_FOLLOWED_BY_SPACE = /(\uE101.)( )+/g;
const SPACE_BEFORE_CLOSING = /( )+(\uE102.)/g;
const ISOLATED_FOLLOWED_BY_SPACE = /(\uE103.)( )+/g;

/**
 *   a b c <1> x y z   =>   a b c x<1>c x y z
 */
export function maskTags(tokens: readonly string[]): string {
	return tokens
		.map((token, i) => {
			if (!isTag(token)) return token;

			let masked = token;
			for (let j = i - 1; j >= 0; j--) {
				if (!isTag(tokens[j])) {
					masked = masked + tokens[j].slice(-1);
					break;
				}
			}
			for (let j = i + 1; j < tokens.length; j++) {
				if (!isTag(tokens[j])) {
					masked = tokens[j].charAt(0) + masked;
					break;
				}
			}
			return masked;
		})
		.join(" ");
}

export function unmaskTags(text: string): string {
	return text.replace(MASKED_TAG, "$1");
}

/** Remove spaces after opening and isolated tags and before closing tags */
export function detokenizeTags(text: string): string {
	return text
		.replace(OPENING_FOLLOWED_BY_SPACE, "$1")
		.replace(SPACE_BEFORE_CLOSING, "$2")
		.replace(ISOLATED_FOLLOWED_BY_SPACE, "$1");
}
