import type { ChangeDesc, EditorState, Extension, SelectionRange } from "@codemirror/state";
import type {
	Completion,
	CompletionProvider,
	MenuHost,
	MenuSettings,
} from "./src/types";
import { MenuLogger } from "./src/logger";
import { ensureMenuSettings } from "./src/config/defaults";
import { CompletionsMenu, type CompletionsMenuOptions } from "./src/completionsMenu";
import { CodeActionContents, CodeActionsMenu } from "./src/codeActionsMenu";
import { ContextMenuController } from "./src/contextMenu";
import { immediateScheduler, type BackgroundScheduler } from "./src/fuzzyMatcher";
import { buildMenuKeymapExtension, type MenuKeymapConfig } from "./src/utils/keymap";
import { getCompletionQuery } from "./src/utils/queryContext";

export interface ContextMenuEngineOptions {
	host: MenuHost;
	provider?: CompletionProvider | null;
	settings?: Partial<MenuSettings>;
	scheduler?: BackgroundScheduler;
}

/**
 * Wires settings, logging and the menu controller together and drives
 * the keystroke → filter → select flow for one editor.
 */
export class ContextMenuEngine {
	settings: MenuSettings;
	readonly logger = new MenuLogger();
	readonly controller: ContextMenuController;
	private readonly host: MenuHost;
	private readonly scheduler: BackgroundScheduler;

	constructor(options: ContextMenuEngineOptions) {
		this.settings = ensureMenuSettings(options.settings);
		this.host = options.host;
		this.scheduler = options.scheduler ?? immediateScheduler;
		this.controller = new ContextMenuController({
			host: options.host,
			provider: options.provider ?? null,
			logger: this.logger,
		});
		this.applyRuntimeSettings();
	}

	updateSettings(raw: Partial<MenuSettings>): void {
		this.settings = ensureMenuSettings({ ...this.settings, ...raw });
		this.applyRuntimeSettings();
	}

	private applyRuntimeSettings(): void {
		this.logger.setEnabled(this.settings.enableDebugLogs);
		this.logger.setCategories(this.settings.debugCategories);
	}

	private get menuOptions(): CompletionsMenuOptions {
		return { logger: this.logger, resultLimit: this.settings.resultLimit };
	}

	private activeCompletions(): CompletionsMenu | null {
		const active = this.controller.current;
		return active?.kind === "completions" ? active.menu : null;
	}

	/**
	 * Build a menu for a fresh completion response, filter it by what was
	 * typed since `anchor`, and deploy it. Resolves to null when nothing
	 * matched or a newer request won.
	 */
	async openCompletions(
		state: EditorState,
		anchor: number,
		completions: readonly Completion[]
	): Promise<CompletionsMenu | null> {
		const menu = new CompletionsMenu(
			this.controller.nextCompletionId(),
			this.settings.sortCompletions,
			this.settings.showCompletionDocumentation,
			anchor,
			state,
			completions,
			this.menuOptions,
			this.settings.resolveCompletions
		);
		await menu.filter(getCompletionQuery(state, anchor), this.scheduler);
		if (!menu.visible()) {
			this.logger.debug("menu", `[Engine] completions ${menu.id} empty`);
			menu.dismiss();
			const active = this.activeCompletions();
			if (active && active.id < menu.id) {
				this.controller.dismiss();
			}
			return null;
		}
		if (!this.controller.showCompletions(menu)) {
			return null;
		}
		menu.resolveSelectedCompletion(this.controller.provider, this.host);
		return menu;
	}

	openSnippetChoices(
		state: EditorState,
		choices: readonly string[],
		selection: SelectionRange
	): CompletionsMenu | null {
		const menu = CompletionsMenu.snippetChoices(
			this.controller.nextCompletionId(),
			this.settings.sortCompletions,
			choices,
			selection,
			state,
			this.menuOptions
		);
		if (!menu.visible() || !this.controller.showCompletions(menu)) {
			return null;
		}
		return menu;
	}

	openCodeActions(
		state: EditorState,
		contents: CodeActionContents,
		deployedFromIndicator: number | null = null
	): CodeActionsMenu | null {
		const menu = new CodeActionsMenu(contents, state, {
			logger: this.logger,
			deployedFromIndicator,
		});
		if (!menu.visible()) return null;
		this.controller.showCodeActions(menu);
		return menu;
	}

	/**
	 * Keep the completion anchor in step with edits to the document.
	 */
	mapChanges(changes: ChangeDesc): void {
		this.activeCompletions()?.mapPosition(changes);
	}

	/**
	 * Re-filter the open completions menu after the document or cursor
	 * changed. Closes the menu once the cursor leaves the query range or
	 * nothing matches any more.
	 */
	async updateQuery(state: EditorState): Promise<void> {
		const menu = this.activeCompletions();
		if (!menu) return;

		const query = getCompletionQuery(state, menu.initialPosition);
		if (query === null) {
			this.controller.dismiss();
			return;
		}

		const applied = await menu.filter(query, this.scheduler);
		if (!applied || this.activeCompletions() !== menu) return;
		if (!menu.visible()) {
			this.controller.dismiss();
			return;
		}
		menu.resolveSelectedCompletion(this.controller.provider, this.host);
		this.host.notify();
	}

	keymapExtension(onConfirm: MenuKeymapConfig["onConfirm"]): Extension {
		return buildMenuKeymapExtension({
			controller: this.controller,
			menuKeymap: this.settings.menuKeymap,
			onConfirm,
		});
	}
}

export * from "./src/types";
export { MenuLogger, type DebugCategory } from "./src/logger";
export { DEFAULT_SETTINGS, ensureMenuSettings } from "./src/config/defaults";
export { CompletionStore, filterText } from "./src/completionStore";
export {
	CompletionsMenu,
	SNIPPET_CHOICE_SOURCE,
	type ConfirmedCompletion,
	type SelectedDocumentation,
} from "./src/completionsMenu";
export {
	CodeActionContents,
	CodeActionsMenu,
	asCodeAction,
	asTask,
	codeActionsItemDisplayLabel,
	codeActionsItemLabel,
	type CodeActionsItem,
} from "./src/codeActionsMenu";
export {
	ContextMenuController,
	type CodeContextMenu,
	type ConfirmedItem,
} from "./src/contextMenu";
export {
	immediateScheduler,
	matchStrings,
	queryIsCaseSensitive,
	scoreMatch,
	startsAtWordBoundary,
	type BackgroundScheduler,
} from "./src/fuzzyMatcher";
export {
	STRONG_MATCH_THRESHOLD,
	matchBucket,
	rankCompletionMatches,
} from "./src/completionRanker";
export { splitWords } from "./src/utils/wordSplitter";
export { getCompletionQuery, mapAnchor } from "./src/utils/queryContext";
export { buildMenuKeyBindings, buildMenuKeymapExtension } from "./src/utils/keymap";
