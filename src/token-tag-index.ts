/**
 * Source token index -> tags, stored as an arena of tag slots.
 *
 * Every tag placement gets a slot id; an index owns an ordered list of slot
 * ids. Consuming an index flips the consumed flag of its slots instead of
 * deleting entries, so iteration never races with removal and leftover tags
 * can be listed at the end.
 */
export class TokenTagIndex {
	private readonly slotTags: string[] = [];
	private readonly consumed: boolean[] = [];
	private readonly slotsByIndex = new Map<number, number[]>();

	private newSlot(tag: string): number {
		this.slotTags.push(tag);
		this.consumed.push(false);
		return this.slotTags.length - 1;
	}

	private slotsAt(index: number): number[] {
		let slots = this.slotsByIndex.get(index);
		if (slots === undefined) {
			slots = [];
			this.slotsByIndex.set(index, slots);
		}
		return slots;
	}

	private liveSlotsAt(index: number): number[] {
		return (this.slotsByIndex.get(index) ?? []).filter((slot) => !this.consumed[slot]);
	}

	add(index: number, ...tags: string[]): void {
		const slots = this.slotsAt(index);
		for (const tag of tags) slots.push(this.newSlot(tag));
	}

	/** Insert tags in front of the tags already at index, keeping their order */
	prepend(index: number, ...tags: string[]): void {
		const slots = this.slotsAt(index);
		slots.unshift(...tags.map((tag) => this.newSlot(tag)));
	}

	tagsAt(index: number): string[] {
		return this.liveSlotsAt(index).map((slot) => this.slotTags[slot]);
	}

	has(index: number, tag: string): boolean {
		return this.tagsAt(index).includes(tag);
	}

	/** Remove the first occurrence of tag at index; returns whether it was there */
	remove(index: number, tag: string): boolean {
		const slots = this.slotsByIndex.get(index);
		if (slots === undefined) return false;
		const position = slots.findIndex((slot) => !this.consumed[slot] && this.slotTags[slot] === tag);
		if (position === -1) return false;
		slots.splice(position, 1);
		if (slots.length === 0) this.slotsByIndex.delete(index);
		return true;
	}

	/** Return the live tags at index and mark them consumed */
	take(index: number): string[] {
		const slots = this.liveSlotsAt(index);
		for (const slot of slots) this.consumed[slot] = true;
		return slots.map((slot) => this.slotTags[slot]);
	}

	/** Indexes that still carry live tags, ascending */
	indexes(): number[] {
		return [...this.slotsByIndex.keys()]
			.filter((index) => this.liveSlotsAt(index).length > 0)
			.sort((a, b) => a - b);
	}

	/** Live tags of every index, in index order */
	remaining(): string[] {
		return this.indexes().flatMap((index) => this.tagsAt(index));
	}

	toRecord(): Record<number, string[]> {
		const record: Record<number, string[]> = {};
		for (const index of this.indexes()) {
			record[index] = this.tagsAt(index);
		}
		return record;
	}
}
