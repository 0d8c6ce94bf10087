import type { ChangeDesc, EditorState, SelectionRange } from "@codemirror/state";
import type {
	Completion,
	CompletionEntry,
	CompletionProvider,
	ContextMenuOrigin,
	InlineCompletionMenuHint,
	MenuHost,
	StringMatch,
	StringMatchCandidate,
} from "./types";
import { CompletionStore, filterText } from "./completionStore";
import { rankCompletionMatches } from "./completionRanker";
import {
	DEFAULT_MATCH_LIMIT,
	matchStrings,
	queryIsCaseSensitive,
	startsAtWordBoundary,
	unscoredMatches,
	type BackgroundScheduler,
} from "./fuzzyMatcher";
import { MenuLogger } from "./logger";
import { startTimer } from "./telemetry";
import { getErrorMessage } from "./utils/errorUtils";
import { mapAnchor } from "./utils/queryContext";

export const SNIPPET_CHOICE_SOURCE = "snippet-choice";

export interface CompletionsMenuOptions {
	logger?: MenuLogger;
	resultLimit?: number;
}

export type SelectedDocumentation =
	| { kind: "plainText"; text: string }
	| { kind: "markdown"; text: string }
	| { kind: "inlineEdit"; text: string; highlights: { from: number; to: number }[] }
	| { kind: "inlineMove"; text: string };

export type ConfirmedCompletion =
	| { kind: "completion"; candidateId: number; completion: Completion }
	| { kind: "inlineHint"; hint: InlineCompletionMenuHint };

type MatchEntry = Extract<CompletionEntry, { kind: "match" }>;

const charCount = (text: string): number => Array.from(text).length;

export class CompletionsMenu {
	private entryList: CompletionEntry[] = [];

	selectedItem = 0;

	private readonly matchCandidates: readonly StringMatchCandidate[];

	private readonly logger: MenuLogger;

	private readonly resultLimit: number;

	private dismissed = false;

	private filterSequence = 0;
	private appliedSequence = 0;

	private readonly inFlight = new Map<number, Promise<void>>();

	readonly completions: CompletionStore;

	constructor(
		readonly id: number,
		readonly sortCompletions: boolean,
		readonly showCompletionDocumentation: boolean,
		public initialPosition: number,
		readonly buffer: EditorState,
		completions: readonly Completion[],
		options: CompletionsMenuOptions = {},
		private readonly resolveCompletions = true
	) {
		this.completions = new CompletionStore(completions);
		this.matchCandidates = Object.freeze(
			completions.map((completion, id) => ({ id, string: filterText(completion) }))
		);
		this.logger = options.logger ?? new MenuLogger();
		this.resultLimit = options.resultLimit ?? DEFAULT_MATCH_LIMIT;
	}

	/**
	 * Menu over the literal alternatives of a snippet tab stop. Every choice
	 * is already resolved and listed in order with a perfect score.
	 */
	static snippetChoices(
		id: number,
		sortCompletions: boolean,
		choices: readonly string[],
		selection: SelectionRange,
		buffer: EditorState,
		options: CompletionsMenuOptions = {}
	): CompletionsMenu {
		const completions: Completion[] = choices.map((choice) => ({
			label: { text: choice },
			newText: choice,
			oldRange: { from: selection.from, to: selection.to },
			sourceId: SNIPPET_CHOICE_SOURCE,
			resolved: true,
		}));
		const menu = new CompletionsMenu(
			id,
			sortCompletions,
			false,
			selection.from,
			buffer,
			completions,
			options,
			false
		);
		menu.entryList = choices.map((choice, candidateId): CompletionEntry => ({
			kind: "match",
			candidateId,
			score: 1,
			positions: [],
			string: choice,
		}));
		return menu;
	}

	get entries(): readonly CompletionEntry[] {
		return this.entryList;
	}

	get resolvesOnSelect(): boolean {
		return this.resolveCompletions;
	}

	get isDismissed(): boolean {
		return this.dismissed;
	}

	visible(): boolean {
		return this.entryList.length > 0;
	}

	origin(cursorPosition: number): ContextMenuOrigin {
		return { kind: "editorPoint", position: cursorPosition };
	}

	selectFirst(provider: CompletionProvider | null, host: MenuHost): void {
		if (this.entryList.length === 0) return;
		this.selectedItem = 0;
		this.afterSelection(provider, host);
	}

	selectPrev(provider: CompletionProvider | null, host: MenuHost): void {
		if (this.entryList.length === 0) return;
		this.selectedItem =
			this.selectedItem > 0 ? this.selectedItem - 1 : this.entryList.length - 1;
		this.afterSelection(provider, host);
	}

	selectNext(provider: CompletionProvider | null, host: MenuHost): void {
		if (this.entryList.length === 0) return;
		this.selectedItem =
			this.selectedItem + 1 < this.entryList.length ? this.selectedItem + 1 : 0;
		this.afterSelection(provider, host);
	}

	selectLast(provider: CompletionProvider | null, host: MenuHost): void {
		if (this.entryList.length === 0) return;
		this.selectedItem = this.entryList.length - 1;
		this.afterSelection(provider, host);
	}

	private afterSelection(provider: CompletionProvider | null, host: MenuHost): void {
		host.scrollToItem(this.selectedItem);
		this.resolveSelectedCompletion(provider, host);
		host.notify();
	}

	showInlineCompletionHint(hint: InlineCompletionMenuHint): void {
		const entry: CompletionEntry = { kind: "inlineHint", hint };
		if (this.entryList[0]?.kind === "inlineHint") {
			this.entryList = [entry, ...this.entryList.slice(1)];
		} else {
			this.entryList = [entry, ...this.entryList];
		}
		this.selectedItem = 0;
	}

	selectedEntry(): CompletionEntry | null {
		return this.entryList[this.selectedItem] ?? null;
	}

	private selectedCandidateId(): number | null {
		const entry = this.selectedEntry();
		return entry?.kind === "match" ? entry.candidateId : null;
	}

	/**
	 * Ask the provider for the selected candidate's detail. Issues nothing
	 * for hints, resolved candidates, or candidates already in flight.
	 */
	resolveSelectedCompletion(provider: CompletionProvider | null, host: MenuHost): void {
		if (!this.resolveCompletions || this.dismissed) return;
		if (!provider) {
			this.logger.debug("resolve", `[CompletionsMenu ${this.id}] no provider attached`);
			return;
		}

		const candidateId = this.selectedCandidateId();
		if (candidateId === null) return;
		const completion = this.completions.get(candidateId);
		if (!completion || completion.resolved || this.inFlight.has(candidateId)) {
			return;
		}

		this.logger.debug("resolve", `[CompletionsMenu ${this.id}] resolving ${candidateId}`);
		const task = this.runResolve(provider, host, candidateId).finally(() => {
			this.inFlight.delete(candidateId);
		});
		this.inFlight.set(candidateId, task);
	}

	private async runResolve(
		provider: CompletionProvider,
		host: MenuHost,
		candidateId: number
	): Promise<void> {
		let changed: boolean;
		try {
			changed = await provider.resolveCompletions(
				this.buffer,
				[candidateId],
				this.completions
			);
		} catch (error) {
			this.logger.error(
				"resolve",
				`Failed to resolve completion ${candidateId}: ${getErrorMessage(error)}`
			);
			return;
		}

		if (this.dismissed || this.selectedCandidateId() !== candidateId) {
			this.logger.debug(
				"resolve",
				`[CompletionsMenu ${this.id}] ignoring resolve of ${candidateId}`
			);
			return;
		}
		if (changed && host.isAlive()) {
			host.notify();
		}
	}

	/**
	 * Resolves once every resolve request issued so far has finished.
	 */
	async settled(): Promise<void> {
		await Promise.all(Array.from(this.inFlight.values()));
	}

	hasPendingResolve(candidateId: number): boolean {
		return this.inFlight.has(candidateId);
	}

	/**
	 * Re-filter the candidates for `query`. Resolves to false when the
	 * result was dropped because a newer filter pass already landed.
	 */
	async filter(query: string | null, scheduler: BackgroundScheduler): Promise<boolean> {
		const sequence = ++this.filterSequence;
		const elapsed = startTimer();
		const effectiveQuery = query && query.length > 0 ? query : null;
		const isStale = () => this.dismissed || sequence < this.appliedSequence;

		let matches: StringMatch[];
		let caseSensitive = false;
		if (effectiveQuery) {
			caseSensitive = queryIsCaseSensitive(effectiveQuery);
			matches = await matchStrings(this.matchCandidates, effectiveQuery, {
				caseSensitive,
				limit: this.resultLimit,
				scheduler,
				isCancelled: isStale,
			});
		} else {
			matches = unscoredMatches(this.matchCandidates);
		}

		if (isStale()) {
			this.logger.debug(
				"matcher",
				`[CompletionsMenu ${this.id}] dropped stale filter #${sequence} (applied #${this.appliedSequence})`
			);
			return false;
		}

		if (effectiveQuery) {
			matches = matches.filter((match) =>
				startsAtWordBoundary(match.string, effectiveQuery, caseSensitive)
			);
		}
		if (this.sortCompletions) {
			matches = rankCompletionMatches(matches, (id) => this.completions.get(id));
		}

		const entries = matches.map((match): CompletionEntry => ({
			kind: "match",
			...match,
		}));
		const hint = this.entryList[0];
		if (hint?.kind === "inlineHint") {
			entries.unshift(hint);
		}

		this.entryList = entries;
		this.selectedItem = 0;
		this.appliedSequence = sequence;
		this.logger.debug(
			"matcher",
			`[CompletionsMenu ${this.id}] filter #${sequence} "${effectiveQuery ?? ""}" -> ${entries.length} entries in ${elapsed()}`
		);
		return true;
	}

	/**
	 * Multi-line documentation for the aside panel, or the preview of a
	 * selected inline hint.
	 */
	selectedDocumentation(): SelectedDocumentation | null {
		if (!this.showCompletionDocumentation) return null;
		const entry = this.selectedEntry();
		if (!entry) return null;

		switch (entry.kind) {
			case "match": {
				const documentation = this.completions.get(entry.candidateId)?.documentation;
				if (!documentation) return null;
				switch (documentation.kind) {
					case "multiLinePlainText":
						return { kind: "plainText", text: documentation.text };
					case "multiLineMarkdown":
						return documentation.text.length > 0
							? { kind: "markdown", text: documentation.text }
							: null;
					case "singleLine":
					case "undocumented":
						return null;
				}
			}
			case "inlineHint": {
				const { text } = entry.hint;
				switch (text.kind) {
					case "edit":
						return { kind: "inlineEdit", text: text.text, highlights: text.highlights };
					case "move":
						return { kind: "inlineMove", text: text.text };
				}
			}
		}
	}

	/**
	 * Single-line documentation shown beside a match's label.
	 */
	documentationLabel(entry: CompletionEntry): string | null {
		if (!this.showCompletionDocumentation || entry.kind !== "match") return null;
		const documentation = this.completions.get(entry.candidateId)?.documentation;
		if (documentation?.kind !== "singleLine") return null;
		return documentation.text.trim().length > 0 ? documentation.text : null;
	}

	/**
	 * Highlight ranges in label coordinates for a match's matched characters.
	 */
	highlightRanges(entry: MatchEntry): { from: number; to: number }[] {
		const completion = this.completions.get(entry.candidateId);
		const offset = completion?.label.filterRange?.start ?? 0;
		const ranges: { from: number; to: number }[] = [];
		for (const position of entry.positions) {
			const codePoint = entry.string.codePointAt(position);
			const width = codePoint !== undefined && codePoint > 0xffff ? 2 : 1;
			const from = offset + position;
			const last = ranges[ranges.length - 1];
			if (last && from < last.to) continue;
			if (last && last.to === from) {
				last.to = from + width;
			} else {
				ranges.push({ from, to: from + width });
			}
		}
		return ranges;
	}

	/**
	 * Index of the entry with the longest rendered text; the last one wins ties.
	 */
	widestEntryIndex(): number | null {
		let widest: number | null = null;
		let widestLength = -1;
		for (const [index, entry] of this.entryList.entries()) {
			let length: number;
			if (entry.kind === "match") {
				const completion = this.completions.get(entry.candidateId);
				length = charCount(completion?.label.text ?? entry.string);
				const docs = this.documentationLabel(entry);
				if (docs) length += charCount(docs);
			} else {
				length = charCount(entry.hint.providerName);
			}
			if (length >= widestLength) {
				widest = index;
				widestLength = length;
			}
		}
		return widest;
	}

	/**
	 * Take the entry at `itemIndex` (the selection by default) and close
	 * the menu. Never issues a resolve.
	 */
	confirm(itemIndex: number = this.selectedItem): ConfirmedCompletion | null {
		const entry = this.entryList[itemIndex];
		if (!entry) return null;
		this.dismiss();
		if (entry.kind === "inlineHint") {
			return { kind: "inlineHint", hint: entry.hint };
		}
		const completion = this.completions.get(entry.candidateId);
		if (!completion) return null;
		return { kind: "completion", candidateId: entry.candidateId, completion };
	}

	dismiss(): void {
		if (this.dismissed) return;
		this.dismissed = true;
		this.logger.debug("menu", `[CompletionsMenu ${this.id}] dismissed`);
	}

	mapPosition(changes: ChangeDesc): void {
		this.initialPosition = mapAnchor(this.initialPosition, changes);
	}
}
