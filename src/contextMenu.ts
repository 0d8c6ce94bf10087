import type { CompletionProvider, ContextMenuOrigin, MenuHost } from "./types";
import { CompletionsMenu, type ConfirmedCompletion } from "./completionsMenu";
import { CodeActionsMenu, type CodeActionsItem } from "./codeActionsMenu";
import { MenuLogger } from "./logger";
import { getErrorMessage } from "./utils/errorUtils";

export type CodeContextMenu =
	| { kind: "completions"; menu: CompletionsMenu }
	| { kind: "codeActions"; menu: CodeActionsMenu };

export type ConfirmedItem =
	| ConfirmedCompletion
	| { kind: "task"; item: Extract<CodeActionsItem, { kind: "task" }> }
	| { kind: "codeAction"; item: Extract<CodeActionsItem, { kind: "codeAction" }> };

export interface ContextMenuControllerOptions {
	host: MenuHost;
	provider?: CompletionProvider | null;
	logger?: MenuLogger;
}

/**
 * Owns whichever menu is currently deployed. Navigation reports whether
 * it was handled so callers can fall back to plain cursor movement.
 */
export class ContextMenuController {
	private active: CodeContextMenu | null = null;

	private lastCompletionId = 0;

	private readonly host: MenuHost;

	private readonly logger: MenuLogger;

	provider: CompletionProvider | null;

	constructor(options: ContextMenuControllerOptions) {
		this.host = options.host;
		this.provider = options.provider ?? null;
		this.logger = options.logger ?? new MenuLogger();
	}

	get current(): CodeContextMenu | null {
		return this.active;
	}

	/** Id for the next completion request; strictly increasing. */
	nextCompletionId(): number {
		this.lastCompletionId += 1;
		return this.lastCompletionId;
	}

	/**
	 * Deploy a completions menu. It only replaces nothing or an older
	 * completions menu; an open code-actions menu stays.
	 */
	showCompletions(menu: CompletionsMenu): boolean {
		const current = this.active;
		if (current?.kind === "codeActions") {
			this.logger.debug("menu", `[ContextMenu] dropped completions ${menu.id}, code actions open`);
			menu.dismiss();
			return false;
		}
		if (current?.kind === "completions" && current.menu.id > menu.id) {
			this.logger.debug(
				"menu",
				`[ContextMenu] dropped completions ${menu.id}, showing ${current.menu.id}`
			);
			menu.dismiss();
			return false;
		}
		this.replace({ kind: "completions", menu });
		return true;
	}

	showCodeActions(menu: CodeActionsMenu): void {
		this.replace({ kind: "codeActions", menu });
	}

	private replace(next: CodeContextMenu): void {
		const previous = this.active;
		if (previous && previous.menu !== next.menu) {
			this.dismissMenu(previous);
		}
		this.active = next;
		this.host.notify();
	}

	private dismissMenu(menu: CodeContextMenu): void {
		if (menu.kind === "completions") {
			menu.menu.dismiss();
		}
	}

	/** Close the active menu. Returns false when nothing was on screen. */
	dismiss(): boolean {
		const previous = this.active;
		if (!previous) return false;
		const wasVisible = previous.menu.visible();
		this.dismissMenu(previous);
		this.active = null;
		this.host.notify();
		return wasVisible;
	}

	visible(): boolean {
		const active = this.active;
		if (!active) return false;
		return active.menu.visible();
	}

	origin(cursorPosition: number): ContextMenuOrigin | null {
		const active = this.active;
		if (!active) return null;
		return active.menu.origin(cursorPosition);
	}

	selectFirst(): boolean {
		return this.navigate(
			(menu) => menu.selectFirst(this.provider, this.host),
			(menu) => menu.selectFirst(this.host)
		);
	}

	selectPrev(): boolean {
		return this.navigate(
			(menu) => menu.selectPrev(this.provider, this.host),
			(menu) => menu.selectPrev(this.host)
		);
	}

	selectNext(): boolean {
		return this.navigate(
			(menu) => menu.selectNext(this.provider, this.host),
			(menu) => menu.selectNext(this.host)
		);
	}

	selectLast(): boolean {
		return this.navigate(
			(menu) => menu.selectLast(this.provider, this.host),
			(menu) => menu.selectLast(this.host)
		);
	}

	private navigate(
		onCompletions: (menu: CompletionsMenu) => void,
		onCodeActions: (menu: CodeActionsMenu) => void
	): boolean {
		const active = this.active;
		if (!active || !active.menu.visible()) return false;
		switch (active.kind) {
			case "completions":
				onCompletions(active.menu);
				break;
			case "codeActions":
				onCodeActions(active.menu);
				break;
		}
		return true;
	}

	/**
	 * Accept the selected entry and close the menu. Code actions are handed
	 * to their provider before this resolves; tasks are returned for the
	 * host to run.
	 */
	async confirm(): Promise<ConfirmedItem | null> {
		const active = this.active;
		if (!active || !active.menu.visible()) return null;

		if (active.kind === "completions") {
			const confirmed = active.menu.confirm();
			this.dismiss();
			return confirmed;
		}

		const { menu } = active;
		const item = menu.selectedAction();
		this.dismiss();
		if (!item) return null;
		if (item.kind === "task") {
			return { kind: "task", item };
		}
		try {
			await item.provider.applyCodeAction(menu.buffer, item.action);
		} catch (error) {
			this.logger.error(
				"actions",
				`Failed to apply code action "${item.action.title}": ${getErrorMessage(error)}`
			);
			throw error;
		}
		return { kind: "codeAction", item };
	}
}
