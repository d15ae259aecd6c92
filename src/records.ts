import { Type } from "@sinclair/typebox";
import type { Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { parseAlignment } from "./alignment.js";
import type { AlignmentProvider } from "./alignment-provider.js";
import type { ReinsertConfig } from "./config.js";
import { insertMarkup } from "./markup-inserter.js";
import { fromReadable, removeTags, toReadable } from "./tags.js";

export const ReinsertRecordSchema = Type.Object({
	source: Type.String({ description: "Preprocessed source sentence with tags in readable notation" }),
	target: Type.String({ description: "Translation without tags" }),
	alignment: Type.Optional(Type.String({ description: "Exact or probabilistic alignment" })),
});
export const ReinsertRecordsSchema = Type.Array(ReinsertRecordSchema);

export type ReinsertRecord = Static<typeof ReinsertRecordSchema>;

export interface RecordResult {
	index: number;
	target?: string;
	error?: string;
}

export interface ProcessRecordsOptions {
	/** Looked up for records without an alignment */
	provider?: AlignmentProvider;
	/** Keep tag characters instead of rendering readable notation */
	coded?: boolean;
	onDebug?: (message: string) => void;
}

/** Validate parsed JSON input, throwing on the first problem */
export function parseRecords(raw: unknown): ReinsertRecord[] {
	if (Value.Check(ReinsertRecordsSchema, raw)) return raw;
	const first = Value.Errors(ReinsertRecordsSchema, raw).First();
	throw new Error(`Invalid input: ${first ? `${first.path || "/"}: ${first.message}` : "unknown error"}`);
}

/**
 * Reinsert markup into every record. A record that fails is reported on
 * stderr and gets an error entry; the others are unaffected.
 */
export function processRecords(
	records: readonly ReinsertRecord[],
	config: Pick<ReinsertConfig, "strategy" | "maxGapSize">,
	options: ProcessRecordsOptions = {},
): RecordResult[] {
	return records.map((record, index) => {
		try {
			const sourceTokens = fromReadable(record.source);
			const rawAlignment =
				record.alignment ??
				options.provider?.get(removeTags(sourceTokens).join(" "), record.target);
			if (rawAlignment === undefined) {
				throw new Error("No alignment given and none found in the alignment file");
			}

			const tokens = insertMarkup(sourceTokens, record.target, parseAlignment(rawAlignment), {
				strategy: config.strategy,
				maxGapSize: config.maxGapSize,
				onDebug: options.onDebug,
			});
			return { index, target: options.coded ? tokens.join(" ") : toReadable(tokens) };
		} catch (e) {
			const message = e instanceof Error ? e.message : String(e);
			console.error(`Record ${index}: ${message}`);
			return { index, error: message };
		}
	});
}
