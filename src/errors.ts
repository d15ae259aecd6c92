/** Raised when an alignment string cannot be parsed */
export class MalformedAlignmentError extends Error {
	readonly alignment: string;

	constructor(message: string, alignment: string) {
		super(message);
		this.name = "MalformedAlignmentError";
		this.alignment = alignment;
	}
}

/** Raised when the source markup does not nest (unmatched closing or opening tag) */
export class MarkupInconsistencyError extends Error {
	readonly tokens: readonly string[];

	constructor(message: string, tokens: readonly string[]) {
		super(message);
		this.name = "MarkupInconsistencyError";
		this.tokens = tokens;
	}
}
