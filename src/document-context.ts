/**
 * Per-document state for batch translation.
 *
 * Translated sentences are cached per document so a sentence that occurs
 * several times is sent to the engine once. Contexts live in a registry the
 * caller owns; nothing here is module level state.
 */

export interface DocumentStats {
	documentId: string;
	inputSentences: number;
	resultTranslations: number;
	duplicates: number;
}

export class DocumentContext {
	readonly documentId: string;
	private readonly inputs: string[] = [];
	private readonly results = new Map<string, string>();
	private duplicates = 0;

	constructor(documentId: string) {
		this.documentId = documentId;
	}

	addInput(sentence: string): void {
		this.inputs.push(sentence);
	}

	get batchInput(): readonly string[] {
		return this.inputs;
	}

	/** Store the translation of a source sentence; a repeated source counts as duplicate */
	setResult(source: string, translation: string): void {
		if (this.results.has(source)) this.duplicates++;
		this.results.set(source, translation);
	}

	getResult(source: string): string | undefined {
		return this.results.get(source);
	}

	stats(): DocumentStats {
		return {
			documentId: this.documentId,
			inputSentences: this.inputs.length,
			resultTranslations: this.results.size,
			duplicates: this.duplicates,
		};
	}
}

export class DocumentContextRegistry {
	private readonly contexts = new Map<string, DocumentContext>();

	/** Return the context of a document, creating it on first use */
	open(documentId: string): DocumentContext {
		let context = this.contexts.get(documentId);
		if (context === undefined) {
			context = new DocumentContext(documentId);
			this.contexts.set(documentId, context);
		}
		return context;
	}

	get(documentId: string): DocumentContext | undefined {
		return this.contexts.get(documentId);
	}

	close(documentId: string): boolean {
		return this.contexts.delete(documentId);
	}

	stats(documentId: string): DocumentStats | undefined {
		return this.contexts.get(documentId)?.stats();
	}
}
