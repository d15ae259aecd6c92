#!/usr/bin/env node

/**
 * CLI entry point for markup-reinsert.
 * Reads a JSON array of { source, target, alignment? } records with tags in
 * readable notation (<0> opening, </0> closing, <0/> isolated), reinserts
 * the source markup into each target and prints the results as JSON.
 */

import { readFile, writeFile } from "node:fs/promises";
import { AlignmentProvider } from "./alignment-provider.js";
import { loadConfig } from "./config.js";
import type { ReinsertConfig } from "./config.js";
import { parseRecords, processRecords } from "./records.js";
import { isMarkupStrategy } from "./strategies.js";

function usage(): never {
	console.error(`Usage: markup-reinsert --input <records.json> [options]

Options:
  --input, -i       JSON array of { source, target, alignment? } records (required)
  --output, -o      Write results to this file instead of stdout
  --strategy, -s    BASELINE, IMPROVED or COMPLETE_MAPPING (default: COMPLETE_MAPPING)
  --max-gap         Max gap size for interpolation (default: 0)
  --alignments, -a  Alignment file used for records without alignment
  --config, -c      JSON configuration file
  --coded           Print tags as tag characters instead of readable notation
  --verbose, -v     Print alignment tables and intermediate results
  --help, -h        Show this help`);
	process.exit(1);
}

function parseArgs(argv: string[]): Record<string, string> {
	const args: Record<string, string> = {};
	for (let i = 0; i < argv.length; i++) {
		const arg = argv[i];
		if (arg === "--help" || arg === "-h") usage();
		if (arg === "--coded") {
			args.coded = "true";
			continue;
		}
		if (arg === "--verbose" || arg === "-v") {
			args.verbose = "true";
			continue;
		}

		const flags: Record<string, string> = {
			"--input": "input", "-i": "input",
			"--output": "output", "-o": "output",
			"--strategy": "strategy", "-s": "strategy",
			"--max-gap": "maxGap",
			"--alignments": "alignments", "-a": "alignments",
			"--config": "config", "-c": "config",
		};

		const key = flags[arg];
		if (key && i + 1 < argv.length) {
			args[key] = argv[++i];
		}
	}
	return args;
}

/** Apply command line overrides on top of the loaded configuration */
function resolveConfig(config: ReinsertConfig, args: Record<string, string>): ReinsertConfig {
	const resolved = { ...config };
	if (args.strategy !== undefined) {
		if (!isMarkupStrategy(args.strategy)) {
			throw new Error(`Unknown strategy "${args.strategy}"`);
		}
		resolved.strategy = args.strategy;
	}
	if (args.maxGap !== undefined) {
		const maxGap = parseInt(args.maxGap, 10);
		if (!Number.isInteger(maxGap) || maxGap < 0) {
			throw new Error(`--max-gap must be a non-negative integer, got "${args.maxGap}"`);
		}
		resolved.maxGapSize = maxGap;
	}
	return resolved;
}

async function main() {
	const args = parseArgs(process.argv.slice(2));

	if (!args.input) {
		console.error("Error: --input is required.\n");
		usage();
	}

	const config = resolveConfig(await loadConfig(args.config), args);
	const provider = args.alignments ? await AlignmentProvider.fromFile(args.alignments) : undefined;

	const records = parseRecords(JSON.parse(await readFile(args.input, "utf-8")));

	const results = processRecords(records, config, {
		provider,
		coded: args.coded === "true",
		onDebug: args.verbose === "true" ? (msg) => console.error(msg) : undefined,
	});
	const json = JSON.stringify(results, null, 2);

	if (args.output) {
		await writeFile(args.output, json + "\n", "utf-8");
		console.error(`Wrote ${results.length} results to ${args.output}`);
	} else {
		// Output result as JSON on stdout for machine consumption
		console.log(json);
	}

	if (results.some((result) => result.error !== undefined)) {
		process.exit(1);
	}
}

main().catch((err) => {
	console.error(`Fatal: ${err instanceof Error ? err.message : String(err)}`);
	process.exit(1);
});
