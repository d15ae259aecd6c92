import { readFile } from "node:fs/promises";
import { Type } from "@sinclair/typebox";
import type { Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";

export const ReinsertConfigSchema = Type.Object({
	strategy: Type.Union(
		[Type.Literal("BASELINE"), Type.Literal("IMPROVED"), Type.Literal("COMPLETE_MAPPING")],
		{ default: "COMPLETE_MAPPING", description: "Markup reinsertion strategy" },
	),
	maxGapSize: Type.Integer({
		minimum: 0,
		default: 0,
		description: "Largest run of untagged target tokens bridged by interpolation (COMPLETE_MAPPING)",
	}),
	useTargetLanguageToken: Type.Boolean({
		default: false,
		description: "Prefix engine input with a <toXX> target language token",
	}),
	concurrency: Type.Integer({
		minimum: 1,
		maximum: 20,
		default: 5,
		description: "Max parallel translation requests",
	}),
	batchSize: Type.Integer({ minimum: 1, default: 50, description: "Sentences per engine request" }),
});

export type ReinsertConfig = Static<typeof ReinsertConfigSchema>;

/**
 * Fill in defaults and validate a raw configuration object.
 * Throws with one line per problem.
 */
export function parseConfig(raw: unknown): ReinsertConfig {
	const value = Value.Default(ReinsertConfigSchema, Value.Clone(raw ?? {}));
	if (Value.Check(ReinsertConfigSchema, value)) {
		return value;
	}
	const problems = [...Value.Errors(ReinsertConfigSchema, value)].map(
		(error) => `  ${error.path || "/"}: ${error.message}`,
	);
	throw new Error(`Invalid configuration:\n${problems.join("\n")}`);
}

/** Load a JSON configuration file; without a path the defaults are used */
export async function loadConfig(path?: string): Promise<ReinsertConfig> {
	if (path === undefined) return parseConfig({});

	let raw: unknown;
	try {
		raw = JSON.parse(await readFile(path, "utf-8"));
	} catch (e) {
		const message = e instanceof Error ? e.message : String(e);
		throw new Error(`Could not read configuration "${path}": ${message}`);
	}
	return parseConfig(raw);
}
