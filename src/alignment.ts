/**
 * Source/target token alignments as produced by the translation engine.
 *
 * Two wire formats exist:
 * - exact:          "0-0 1-2 2-1"        (sourceIndex-targetIndex pairs)
 * - probabilistic:  "0.9,0.1 0.2,0.8"    (one score row per target token)
 */

import { MalformedAlignmentError } from "./errors.js";

export interface Alignment {
	/** Source indexes aligned to a target index, ascending; empty when unaligned */
	sourceIndexesFor(targetIndex: number): number[];
	/** Every source index that some target token points to, ascending and unique */
	pointedSourceTokens(): number[];
	/** Add offset to every source index; links that become negative are dropped */
	shiftSource(offset: number): void;
	/** Add offset to every target index; links that become negative are dropped */
	shiftTarget(offset: number): void;
	toString(): string;
}

function sortedUnique(values: Iterable<number>): number[] {
	return [...new Set(values)].sort((a, b) => a - b);
}

export class ExactAlignment implements Alignment {
	/** targetIndex -> ascending source indexes */
	private links = new Map<number, number[]>();

	constructor(raw: string) {
		for (const entry of raw.trim().split(" ")) {
			if (entry === "") continue;
			const parts = entry.split("-");
			if (parts.length !== 2) {
				console.warn(`Skipping alignment entry "${entry}": not a source-target pair`);
				continue;
			}

			const source = Number(parts[0]);
			const target = Number(parts[1]);
			if (
				parts[0] === "" ||
				parts[1] === "" ||
				!Number.isInteger(source) ||
				!Number.isInteger(target)
			) {
				throw new MalformedAlignmentError(`Invalid alignment entry "${entry}"`, raw);
			}
			this.addLink(source, target);
		}
	}

	private addLink(source: number, target: number): void {
		const sources = this.links.get(target);
		if (sources === undefined) {
			this.links.set(target, [source]);
			return;
		}
		if (sources.includes(source)) return;
		sources.push(source);
		sources.sort((a, b) => a - b);
	}

	sourceIndexesFor(targetIndex: number): number[] {
		return [...(this.links.get(targetIndex) ?? [])];
	}

	pointedSourceTokens(): number[] {
		return sortedUnique([...this.links.values()].flat());
	}

	shiftSource(offset: number): void {
		this.rebuild((source, target) => [source + offset, target]);
	}

	shiftTarget(offset: number): void {
		this.rebuild((source, target) => [source, target + offset]);
	}

	private rebuild(shift: (source: number, target: number) => [number, number]): void {
		const previous = this.links;
		this.links = new Map();
		for (const [target, sources] of previous) {
			for (const source of sources) {
				const [newSource, newTarget] = shift(source, target);
				if (newSource < 0 || newTarget < 0) {
					console.warn(
						`Dropping alignment link ${source}-${target}: shifted to ${newSource}-${newTarget}`,
					);
					continue;
				}
				this.addLink(newSource, newTarget);
			}
		}
	}

	private pairs(): Array<[number, number]> {
		const pairs: Array<[number, number]> = [];
		for (const [target, sources] of this.links) {
			for (const source of sources) pairs.push([source, target]);
		}
		return pairs;
	}

	/** "s-t" pairs sorted by source, then target */
	toString(): string {
		return this.pairs()
			.sort((a, b) => a[0] - b[0] || a[1] - b[1])
			.map(([s, t]) => `${s}-${t}`)
			.join(" ");
	}

	/** "t-s" pairs sorted by target, then source */
	toTargetSourceString(): string {
		return this.pairs()
			.sort((a, b) => a[1] - b[1] || a[0] - b[0])
			.map(([s, t]) => `${t}-${s}`)
			.join(" ");
	}
}

export class ProbabilisticAlignment implements Alignment {
	/** scores[targetIndex][sourceIndex] */
	private readonly scores: number[][];
	private sourceOffset = 0;
	private targetOffset = 0;

	constructor(raw: string) {
		const rows = raw.trim().split(" ").filter((row) => row !== "");
		this.scores = rows.map((row) =>
			row.split(",").map((value) => {
				const score = Number(value);
				if (value.trim() === "" || !Number.isFinite(score)) {
					throw new MalformedAlignmentError(`Invalid alignment score "${value}"`, raw);
				}
				return score;
			}),
		);

		const width = this.scores[0]?.length ?? 0;
		if (this.scores.some((row) => row.length !== width)) {
			throw new MalformedAlignmentError("Alignment rows differ in length", raw);
		}
	}

	private rowFor(targetIndex: number): number[] | undefined {
		return this.scores[targetIndex - this.targetOffset];
	}

	/**
	 * Source index with the highest score for a target token, considering
	 * only scores >= threshold. Returns -1 when no score qualifies.
	 */
	bestSourceIndex(targetIndex: number, threshold = 0): number {
		const row = this.rowFor(targetIndex);
		if (row === undefined) return -1;

		let max = 0;
		let best = -1;
		for (let i = 0; i < row.length; i++) {
			const score = row[i];
			if (score >= threshold && score > max && i + this.sourceOffset >= 0) {
				max = score;
				best = i + this.sourceOffset;
			}
		}
		return best;
	}

	/** Every source index whose score is >= threshold, ascending */
	sourceIndexesAbove(targetIndex: number, threshold: number): number[] {
		const row = this.rowFor(targetIndex);
		if (row === undefined) return [];

		const indexes: number[] = [];
		for (let i = 0; i < row.length; i++) {
			if (row[i] >= threshold && i + this.sourceOffset >= 0) {
				indexes.push(i + this.sourceOffset);
			}
		}
		return indexes;
	}

	sourceIndexesFor(targetIndex: number): number[] {
		const best = this.bestSourceIndex(targetIndex);
		return best === -1 ? [] : [best];
	}

	private targetIndexes(): number[] {
		const indexes: number[] = [];
		for (let row = 0; row < this.scores.length; row++) {
			const target = row + this.targetOffset;
			if (target >= 0) indexes.push(target);
		}
		return indexes;
	}

	pointedSourceTokens(): number[] {
		return sortedUnique(
			this.targetIndexes()
				.map((target) => this.bestSourceIndex(target))
				.filter((source) => source !== -1),
		);
	}

	shiftSource(offset: number): void {
		this.sourceOffset += offset;
		const width = this.scores[0]?.length ?? 0;
		const dropped = Math.min(width, Math.max(0, -this.sourceOffset));
		if (offset < 0 && dropped > 0) {
			console.warn(`Source shift by ${offset}: ${dropped} source column(s) now below index 0 are ignored`);
		}
	}

	shiftTarget(offset: number): void {
		this.targetOffset += offset;
		const dropped = Math.min(this.scores.length, Math.max(0, -this.targetOffset));
		if (offset < 0 && dropped > 0) {
			console.warn(`Target shift by ${offset}: ${dropped} target row(s) now below index 0 are ignored`);
		}
	}

	/** Exact alignment keeping every link whose score is >= threshold */
	toExactAlignment(threshold: number): ExactAlignment {
		const pairs: string[] = [];
		for (const target of this.targetIndexes()) {
			for (const source of this.sourceIndexesAbove(target, threshold)) {
				pairs.push(`${source}-${target}`);
			}
		}
		return new ExactAlignment(pairs.join(" "));
	}

	/** Exact alignment keeping only the best link per target token */
	toBestAlignment(): ExactAlignment {
		const pairs: string[] = [];
		for (const target of this.targetIndexes()) {
			const best = this.bestSourceIndex(target);
			if (best !== -1) pairs.push(`${best}-${target}`);
		}
		return new ExactAlignment(pairs.join(" "));
	}

	/**
	 * Score rows as indexed after any shifts: positions shifted in get a
	 * score of 0, rows and columns shifted below index 0 are left out.
	 */
	toString(): string {
		const width = Math.max(0, (this.scores[0]?.length ?? 0) + this.sourceOffset);
		const shiftRow = (row: number[]): number[] =>
			this.sourceOffset >= 0
				? [...new Array<number>(this.sourceOffset).fill(0), ...row]
				: row.slice(-this.sourceOffset);
		const rows = [
			...Array.from({ length: Math.max(0, this.targetOffset) }, () => new Array<number>(width).fill(0)),
			...this.scores.slice(Math.max(0, -this.targetOffset)).map(shiftRow),
		];
		return rows.map((row) => row.join(",")).join(" ");
	}
}

/** Pick the alignment kind from the wire format */
export function parseAlignment(raw: string): Alignment {
	if (/\d-\d/.test(raw)) {
		return new ExactAlignment(raw);
	}
	return new ProbabilisticAlignment(raw);
}
