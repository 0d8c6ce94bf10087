import type { EditorState } from "@codemirror/state";
import type {
	AvailableCodeAction,
	CodeAction,
	CodeActionProvider,
	ContextMenuOrigin,
	MenuHost,
	ResolvedTask,
	ResolvedTasks,
	TaskSourceKind,
} from "./types";
import { MenuLogger } from "./logger";

export type CodeActionsItem =
	| { kind: "task"; sourceKind: TaskSourceKind; task: ResolvedTask }
	| {
			kind: "codeAction";
			excerptId: number;
			action: CodeAction;
			provider: CodeActionProvider;
	  };

export const codeActionsItemLabel = (item: CodeActionsItem): string => {
	switch (item.kind) {
		case "task":
			return item.task.resolvedLabel;
		case "codeAction":
			return item.action.title;
	}
};

/** Label as rendered on a single line. */
export const codeActionsItemDisplayLabel = (item: CodeActionsItem): string =>
	codeActionsItemLabel(item).replace(/\r?\n/g, "");

export const asTask = (item: CodeActionsItem): ResolvedTask | null =>
	item.kind === "task" ? item.task : null;

export const asCodeAction = (item: CodeActionsItem): CodeAction | null =>
	item.kind === "codeAction" ? item.action : null;

const actionItem = (available: AvailableCodeAction): CodeActionsItem => ({
	kind: "codeAction",
	excerptId: available.excerptId,
	action: available.action,
	provider: available.provider,
});

/**
 * Tasks followed by code actions, addressed through one index space
 * without copying either list: index `i < tasks` is task `i`, anything
 * after is action `i - tasks`.
 */
export class CodeActionContents {
	constructor(
		readonly tasks: ResolvedTasks | null = null,
		readonly actions: readonly AvailableCodeAction[] | null = null
	) {}

	private get taskCount(): number {
		return this.tasks?.templates.length ?? 0;
	}

	get length(): number {
		return this.taskCount + (this.actions?.length ?? 0);
	}

	isEmpty(): boolean {
		return this.length === 0;
	}

	get(index: number): CodeActionsItem | null {
		if (!Number.isInteger(index) || index < 0) return null;
		const taskCount = this.taskCount;
		if (index < taskCount) {
			const template = this.tasks?.templates[index];
			if (!template) return null;
			const [sourceKind, task] = template;
			return { kind: "task", sourceKind, task };
		}
		const available = this.actions?.[index - taskCount];
		return available ? actionItem(available) : null;
	}

	*[Symbol.iterator](): IterableIterator<CodeActionsItem> {
		for (const [sourceKind, task] of this.tasks?.templates ?? []) {
			yield { kind: "task", sourceKind, task };
		}
		for (const available of this.actions ?? []) {
			yield actionItem(available);
		}
	}
}

export interface CodeActionsMenuOptions {
	logger?: MenuLogger;
	deployedFromIndicator?: number | null;
}

export class CodeActionsMenu {
	selectedItem = 0;

	deployedFromIndicator: number | null;

	private readonly logger: MenuLogger;

	constructor(
		readonly actions: CodeActionContents,
		readonly buffer: EditorState,
		options: CodeActionsMenuOptions = {}
	) {
		this.deployedFromIndicator = options.deployedFromIndicator ?? null;
		this.logger = options.logger ?? new MenuLogger();
	}

	visible(): boolean {
		return !this.actions.isEmpty();
	}

	selectFirst(host: MenuHost): void {
		if (!this.visible()) return;
		this.selectedItem = 0;
		this.afterSelection(host);
	}

	selectPrev(host: MenuHost): void {
		if (!this.visible()) return;
		this.selectedItem =
			this.selectedItem > 0 ? this.selectedItem - 1 : this.actions.length - 1;
		this.afterSelection(host);
	}

	selectNext(host: MenuHost): void {
		if (!this.visible()) return;
		this.selectedItem =
			this.selectedItem + 1 < this.actions.length ? this.selectedItem + 1 : 0;
		this.afterSelection(host);
	}

	selectLast(host: MenuHost): void {
		if (!this.visible()) return;
		this.selectedItem = this.actions.length - 1;
		this.afterSelection(host);
	}

	private afterSelection(host: MenuHost): void {
		this.logger.debug("actions", `[CodeActionsMenu] selected ${this.selectedItem}`);
		host.scrollToItem(this.selectedItem);
		host.notify();
	}

	selectedAction(): CodeActionsItem | null {
		return this.actions.get(this.selectedItem);
	}

	origin(cursorPosition: number): ContextMenuOrigin {
		if (this.deployedFromIndicator !== null) {
			return { kind: "gutterIndicator", row: this.deployedFromIndicator };
		}
		return { kind: "editorPoint", position: cursorPosition };
	}

	/**
	 * Index of the item with the longest label; the last one wins ties.
	 */
	widestItemIndex(): number | null {
		let widest: number | null = null;
		let widestLength = -1;
		let index = 0;
		for (const item of this.actions) {
			const length = Array.from(codeActionsItemLabel(item)).length;
			if (length >= widestLength) {
				widest = index;
				widestLength = length;
			}
			index++;
		}
		return widest;
	}
}
