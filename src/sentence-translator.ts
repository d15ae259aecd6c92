import { parseAlignment } from "./alignment.js";
import type { AlignmentProvider } from "./alignment-provider.js";
import type { DocumentContext } from "./document-context.js";
import { MalformedAlignmentError, MarkupInconsistencyError } from "./errors.js";
import { insertMarkup } from "./markup-inserter.js";
import { detokenizeTags, maskTags, unmaskTags } from "./masking.js";
import type { MarkupStrategy } from "./strategies.js";
import { isTag, removeTagsFromText, tokenize } from "./tags.js";

const MAX_RETRIES = 2;
const ALIGNMENT_SEPARATOR = " ||| ";

/** Translates preprocessed, untagged sentences; one response per input */
export interface TranslationEngine {
	translate(inputs: string[], signal?: AbortSignal): Promise<string[]>;
}

/** Tokenization, sub-word encoding and their inverse */
export interface PrePostProcessor {
	preprocess(language: string, sentences: string[]): Promise<string[]>;
	postprocess(language: string, sentences: string[]): Promise<string[]>;
}

export interface TranslateSentencesOptions {
	sourceLanguage: string;
	targetLanguage: string;
	engine: TranslationEngine;
	processor: PrePostProcessor;
	strategy?: MarkupStrategy;
	maxGapSize?: number;
	/** Prefix engine input with "<toXX>" and compensate in the alignment */
	useTargetLanguageToken?: boolean;
	/** Precomputed alignments, preferred over the engine's */
	alignmentProvider?: AlignmentProvider;
	context?: DocumentContext;
	concurrency: number;
	batchSize?: number;
	signal?: AbortSignal;
	onProgress?: (message: string) => void;
}

export interface SentenceItem {
	index: number;
	source: string;
	preprocessed: string;
	engineInput: string;
	hasMarkup: boolean;
	rawTranslation?: string;
}

interface BatchResult {
	translated: SentenceItem[];
	missing: SentenceItem[];
}

/**
 * Send one batch to the engine. Items the engine gave no answer for are
 * returned as missing.
 */
async function translateBatch(
	batch: SentenceItem[],
	options: TranslateSentencesOptions,
): Promise<BatchResult> {
	if (batch.length === 0) return { translated: [], missing: [] };

	let responses: string[];
	try {
		responses = await options.engine.translate(
			batch.map((item) => item.engineInput),
			options.signal,
		);
	} catch (e) {
		console.error("Batch translation failed:", e);
		return { translated: [], missing: batch };
	}

	const translated: SentenceItem[] = [];
	const missing: SentenceItem[] = [];
	batch.forEach((item, i) => {
		const response = responses[i];
		if (response === undefined || response.trim() === "") {
			missing.push(item);
		} else {
			translated.push({ ...item, rawTranslation: response });
		}
	});
	return { translated, missing };
}

async function translateInBatches(
	batches: SentenceItem[][],
	options: TranslateSentencesOptions,
	results: SentenceItem[],
): Promise<SentenceItem[]> {
	const missing: SentenceItem[] = [];
	for (let i = 0; i < batches.length; i += options.concurrency) {
		if (options.signal?.aborted) {
			throw new Error("Translation aborted");
		}

		const currentBatches = batches.slice(i, i + options.concurrency);
		const batchResults = await Promise.all(
			currentBatches.map((batch) => translateBatch(batch, options)),
		);

		for (const { translated, missing: batchMissing } of batchResults) {
			for (const item of translated) {
				results[item.index] = item;
			}
			missing.push(...batchMissing);
		}
	}
	return missing;
}

/**
 * Turn an engine response into the text handed to postprocessing: the
 * translation with reinserted, masked tags when the sentence has markup and
 * an alignment is available, the bare translation otherwise.
 */
export function processRawTranslation(
	item: SentenceItem,
	options: Pick<
		TranslateSentencesOptions,
		"strategy" | "maxGapSize" | "useTargetLanguageToken" | "alignmentProvider"
	>,
): string {
	const raw = item.rawTranslation ?? "";
	const separator = raw.indexOf(ALIGNMENT_SEPARATOR);
	const translation = (separator === -1 ? raw : raw.slice(0, separator)).trim();
	if (!item.hasMarkup) return translation;

	const untaggedSource = removeTagsFromText(item.preprocessed);
	let rawAlignment = options.alignmentProvider?.get(untaggedSource, translation);
	const fromProvider = rawAlignment !== undefined;
	if (rawAlignment === undefined && separator !== -1) {
		rawAlignment = raw.slice(separator + ALIGNMENT_SEPARATOR.length).trim();
	}
	if (rawAlignment === undefined) return translation;

	try {
		const alignment = parseAlignment(rawAlignment);
		if (options.useTargetLanguageToken && !fromProvider) {
			alignment.shiftSource(-1);
		}
		const tagged = insertMarkup(item.preprocessed, translation, alignment, {
			strategy: options.strategy,
			maxGapSize: options.maxGapSize,
		});
		return maskTags(tagged);
	} catch (e) {
		if (e instanceof MalformedAlignmentError || e instanceof MarkupInconsistencyError) {
			console.warn(`Sentence ${item.index}: ${e.message}. Keeping translation without markup.`);
			return translation;
		}
		throw e;
	}
}

/** Undo masking after postprocessing and attach tags to their words */
export function cleanPostprocessedSentence(sentence: string): string {
	return detokenizeTags(unmaskTags(sentence)) + " ";
}

/**
 * Translate sentences with markup.
 *
 * Sentences are preprocessed, stripped of tags, translated in batches with
 * bounded concurrency (retrying sentences the engine skipped), get their
 * tags back through the alignment and are postprocessed. Sentences that
 * still fail after all retries keep their source text.
 */
export async function translateSentences(
	sentences: string[],
	options: TranslateSentencesOptions,
): Promise<string[]> {
	const batchSize = options.batchSize ?? 50;
	const output: string[] = new Array(sentences.length);

	// Step 1: reuse cached results, preprocess the rest
	const pending: number[] = [];
	sentences.forEach((source, index) => {
		const cached = options.context?.getResult(source);
		if (cached !== undefined) {
			output[index] = cached;
		} else if (source.trim() === "") {
			output[index] = source;
		} else {
			options.context?.addInput(source);
			pending.push(index);
		}
	});
	if (pending.length === 0) return output;

	options.onProgress?.(`Preprocessing ${pending.length} sentences...`);
	const preprocessed = await options.processor.preprocess(
		options.sourceLanguage,
		pending.map((index) => sentences[index]),
	);

	const items: SentenceItem[] = pending.map((index, i) => {
		const pre = preprocessed[i] ?? sentences[index];
		const untagged = removeTagsFromText(pre);
		return {
			index,
			source: sentences[index],
			preprocessed: pre,
			engineInput: options.useTargetLanguageToken
				? `<to${options.targetLanguage}> ${untagged}`
				: untagged,
			hasMarkup: tokenize(pre).some(isTag),
		};
	});

	// Step 2: translate in batches
	const results: SentenceItem[] = new Array(sentences.length);
	const batches: SentenceItem[][] = [];
	for (let i = 0; i < items.length; i += batchSize) {
		batches.push(items.slice(i, i + batchSize));
	}
	options.onProgress?.(`Translating ${items.length} sentences to ${options.targetLanguage}...`);
	let allMissing = await translateInBatches(batches, options, results);

	// Retry missing sentences one per batch
	for (let retry = 1; retry <= MAX_RETRIES && allMissing.length > 0; retry++) {
		const missingIds = allMissing.map((item) => item.index).join(", ");
		options.onProgress?.(
			`Retry ${retry}/${MAX_RETRIES}: ${allMissing.length} sentences missing (ids: ${missingIds}), retranslating...`,
		);
		console.warn(
			`Retry ${retry}/${MAX_RETRIES}: sentences [${missingIds}] missing from translation output, retrying...`,
		);
		allMissing = await translateInBatches(
			allMissing.map((item) => [item]),
			options,
			results,
		);
	}

	if (allMissing.length > 0) {
		const missingIds = allMissing.map((item) => item.index).join(", ");
		options.onProgress?.(
			`Warning: ${allMissing.length} sentences could not be translated after ${MAX_RETRIES} retries (ids: ${missingIds}). Keeping original text.`,
		);
		console.warn(
			`${allMissing.length} sentences could not be translated after ${MAX_RETRIES} retries (ids: ${missingIds}). Keeping original text.`,
		);
		for (const item of allMissing) {
			output[item.index] = item.source;
		}
	}

	// Step 3: reinsert markup and postprocess
	const translated = items
		.map((item) => results[item.index])
		.filter((item): item is SentenceItem => item !== undefined);
	if (translated.length === 0) return output;

	const postInput = translated.map((item) => processRawTranslation(item, options));
	options.onProgress?.(`Postprocessing ${translated.length} sentences...`);
	const postprocessed = await options.processor.postprocess(options.targetLanguage, postInput);

	translated.forEach((item, i) => {
		const post = postprocessed[i] ?? postInput[i];
		const sentence = item.hasMarkup ? cleanPostprocessedSentence(post) : post;
		output[item.index] = sentence;
		options.context?.setResult(item.source, sentence);
	});

	return output;
}
