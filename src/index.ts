export type { Alignment } from "./alignment.js";
export { ExactAlignment, ProbabilisticAlignment, parseAlignment } from "./alignment.js";
export { AlignmentProvider } from "./alignment-provider.js";
export {
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
export type { EmptyPairReplacements } from "./cleanup.js";
export { ReinsertConfigSchema, loadConfig, parseConfig } from "./config.js";
export type { ReinsertConfig } from "./config.js";
export { DocumentContext, DocumentContextRegistry } from "./document-context.js";
export type { DocumentStats } from "./document-context.js";
export { MalformedAlignmentError, MarkupInconsistencyError } from "./errors.js";
export { cleanUpTags, createSentenceAlignmentTable, insertMarkup } from "./markup-inserter.js";
export type { InsertMarkupOptions } from "./markup-inserter.js";
export { detokenizeTags, maskTags, unmaskTags } from "./masking.js";
export { ReinsertRecordSchema, ReinsertRecordsSchema, parseRecords, processRecords } from "./records.js";
export type { ProcessRecordsOptions, RecordResult, ReinsertRecord } from "./records.js";
export {
	cleanPostprocessedSentence,
	processRawTranslation,
	translateSentences,
} from "./sentence-translator.js";
export type {
	PrePostProcessor,
	SentenceItem,
	TranslateSentencesOptions,
	TranslationEngine,
} from "./sentence-translator.js";
export { SplitSentence } from "./split-sentence.js";
export { END_OF_SENTENCE, MARKUP_STRATEGIES, getStrategy, isMarkupStrategy } from "./strategies.js";
export type { MarkupStrategy, ReinsertionStrategy } from "./strategies.js";
export { TagMap, createTagMap } from "./tag-map.js";
export {
	asXml,
	createClosingTag,
	createIsolatedTag,
	createOpeningTag,
	fromReadable,
	getTagId,
	isClosingTag,
	isIsolatedTag,
	isOpeningTag,
	isTag,
	removeTags,
	removeTagsFromText,
	toReadable,
	tokenize,
} from "./tags.js";
export { TokenTagIndex } from "./token-tag-index.js";
