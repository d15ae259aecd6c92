import { readFile } from "node:fs/promises";

/**
 * Precomputed alignments, looked up by source sentence and translation.
 *
 * File format: blocks of three lines (source sentence, translation,
 * alignment). Blank lines and lines starting with "###" are ignored.
 */
export class AlignmentProvider {
	private readonly alignments = new Map<string, string>();

	static async fromFile(path: string): Promise<AlignmentProvider> {
		const provider = new AlignmentProvider();
		provider.load(await readFile(path, "utf-8"));
		return provider;
	}

	/** Add the alignment blocks of a file's content; an incomplete last block is ignored */
	load(content: string): void {
		let block: string[] = [];
		for (const rawLine of content.split(/\r?\n/)) {
			const line = rawLine.trim();
			if (line === "" || line.startsWith("###")) continue;

			block.push(line);
			if (block.length === 3) {
				const [source, translation, alignment] = block;
				this.alignments.set(source + translation, alignment);
				block = [];
			}
		}
	}

	get size(): number {
		return this.alignments.size;
	}

	get(source: string, translation: string): string | undefined {
		return this.alignments.get(source.trim() + translation.trim());
	}
}
