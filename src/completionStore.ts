import type { Completion } from "./types";
import { MenuIndexError } from "./utils/errorUtils";

/**
 * Fixed-length arena of completion candidates shared between a menu and the
 * provider resolving them. Entries address candidates by index, so a slot
 * replacement is visible to every entry without re-filtering.
 */
export class CompletionStore {
	private readonly slots: Completion[];

	constructor(completions: readonly Completion[]) {
		this.slots = [...completions];
	}

	get length(): number {
		return this.slots.length;
	}

	get(index: number): Completion | undefined {
		return this.slots[index];
	}

	/**
	 * Swap one candidate. The length of the store never changes.
	 */
	replace(index: number, completion: Completion): void {
		if (!Number.isInteger(index) || index < 0 || index >= this.slots.length) {
			throw new MenuIndexError(index, this.slots.length);
		}
		this.slots[index] = completion;
	}

	/**
	 * Merge resolved fields into a slot and mark it resolved.
	 * Returns true when anything visible changed.
	 */
	applyResolved(index: number, patch: Partial<Omit<Completion, "resolved">>): boolean {
		const current = this.get(index);
		if (!current) {
			throw new MenuIndexError(index, this.slots.length);
		}
		const next: Completion = { ...current, ...patch, resolved: true };
		const changed =
			JSON.stringify({ ...current, resolved: true }) !== JSON.stringify(next);
		this.replace(index, next);
		return changed;
	}

	*[Symbol.iterator](): IterableIterator<Completion> {
		yield* this.slots;
	}

	toArray(): readonly Completion[] {
		return [...this.slots];
	}
}

/**
 * Text a completion is filtered and tie-broken by.
 */
export const filterText = (completion: Completion): string => {
	const { text, filterRange } = completion.label;
	if (!filterRange || filterRange.end <= filterRange.start) {
		return text;
	}
	return text.slice(filterRange.start, filterRange.end);
};
