import type { EditorState } from "@codemirror/state";
import type { CompletionStore } from "./completionStore";
import type { DebugCategory } from "./logger";

/**
 * Label shown for a completion. `filterRange` selects the part of `text`
 * that fuzzy matching runs against; the whole text is used when absent.
 */
export interface CodeLabel {
	text: string;
	filterRange?: { start: number; end: number };
}

export type Documentation =
	| { kind: "undocumented" }
	| { kind: "singleLine"; text: string }
	| { kind: "multiLinePlainText"; text: string }
	| { kind: "multiLineMarkdown"; text: string };

export type CompletionKind = "keyword" | "variable" | "other";

/**
 * A completion candidate as delivered by a source (language server,
 * snippet choices). Mutated in place when resolved.
 */
export interface Completion {
	label: CodeLabel;
	newText: string;
	oldRange: { from: number; to: number };
	sortText?: string;
	kind?: CompletionKind;
	deprecated?: boolean;
	documentation?: Documentation;
	sourceId: string;
	resolved: boolean;
}

export interface StringMatchCandidate {
	id: number;
	string: string;
}

export interface StringMatch {
	candidateId: number;
	score: number;
	positions: number[];
	string: string;
}

export type InlineCompletionText =
	| { kind: "edit"; text: string; highlights: { from: number; to: number }[] }
	| { kind: "move"; text: string };

export interface InlineCompletionMenuHint {
	providerName: string;
	text: InlineCompletionText;
}

export type CompletionEntry =
	| ({ kind: "match" } & StringMatch)
	| { kind: "inlineHint"; hint: InlineCompletionMenuHint };

export interface CodeAction {
	title: string;
	kind?: string;
	payload?: unknown;
}

export interface CodeActionProvider {
	id: string;
	applyCodeAction(buffer: EditorState, action: CodeAction): Promise<void>;
}

export interface AvailableCodeAction {
	excerptId: number;
	action: CodeAction;
	provider: CodeActionProvider;
}

export type TaskSourceKind =
	| { kind: "userInput" }
	| { kind: "abs"; absPath: string; idBase: string }
	| { kind: "worktree"; id: number; directoryInWorktree: string; idBase: string }
	| { kind: "language"; name: string };

export interface ResolvedTask {
	id: string;
	resolvedLabel: string;
	command: string;
	args: string[];
}

export interface ResolvedTasks {
	templates: [TaskSourceKind, ResolvedTask][];
}

export type ContextMenuOrigin =
	| { kind: "editorPoint"; position: number }
	| { kind: "gutterIndicator"; row: number };

/**
 * Callbacks the rendering layer hands to the menus.
 */
export interface MenuHost {
	scrollToItem(index: number): void;
	notify(): void;
	/** False once the owning editor is gone. */
	isAlive(): boolean;
}

export interface MenuKeymap {
	first: string;
	prev: string;
	next: string;
	last: string;
	accept: string;
	dismiss: string;
}

export interface MenuSettings {
	sortCompletions: boolean;
	showCompletionDocumentation: boolean;
	resolveCompletions: boolean;
	resultLimit: number;
	enableDebugLogs: boolean;
	debugCategories: DebugCategory[];
	menuKeymap: MenuKeymap;
}

export interface CompletionProvider {
	/**
	 * Resolve the given candidates in place inside `completions`.
	 * Resolves to true when any candidate changed.
	 */
	resolveCompletions(
		buffer: EditorState,
		completionIndices: number[],
		completions: CompletionStore
	): Promise<boolean>;
}
