import type { DebugCategory } from "../logger";
import type { MenuKeymap, MenuSettings } from "../types";
import { DEFAULT_MATCH_LIMIT } from "../fuzzyMatcher";

export const DEBUG_CATEGORIES: DebugCategory[] = [
	"general",
	"matcher",
	"ranker",
	"menu",
	"resolve",
	"actions",
];

export const DEFAULT_MENU_KEYMAP: MenuKeymap = {
	first: "PageUp",
	prev: "ArrowUp",
	next: "ArrowDown",
	last: "PageDown",
	accept: "Enter",
	dismiss: "Escape",
};

export const DEFAULT_SETTINGS: MenuSettings = {
	sortCompletions: true,
	showCompletionDocumentation: true,
	resolveCompletions: true,
	resultLimit: DEFAULT_MATCH_LIMIT,
	enableDebugLogs: false,
	debugCategories: [],
	menuKeymap: { ...DEFAULT_MENU_KEYMAP },
};

const KEYMAP_ACTIONS: (keyof MenuKeymap)[] = [
	"first",
	"prev",
	"next",
	"last",
	"accept",
	"dismiss",
];

const isDebugCategory = (value: unknown): value is DebugCategory =>
	typeof value === "string" &&
	DEBUG_CATEGORIES.some((category) => category === value);

const normalizeKeymap = (raw?: Partial<MenuKeymap>): MenuKeymap => {
	const keymap: MenuKeymap = { ...DEFAULT_MENU_KEYMAP };
	if (!raw) return keymap;
	for (const action of KEYMAP_ACTIONS) {
		const value = raw[action];
		if (typeof value === "string" && value.trim().length > 0) {
			keymap[action] = value.trim();
		}
	}
	return keymap;
};

const pickBoolean = (value: unknown, fallback: boolean): boolean =>
	typeof value === "boolean" ? value : fallback;

export const ensureMenuSettings = (
	raw?: Partial<MenuSettings>
): MenuSettings => {
	const limit = raw?.resultLimit;
	const categories = raw?.debugCategories;
	return {
		sortCompletions: pickBoolean(raw?.sortCompletions, DEFAULT_SETTINGS.sortCompletions),
		showCompletionDocumentation: pickBoolean(
			raw?.showCompletionDocumentation,
			DEFAULT_SETTINGS.showCompletionDocumentation
		),
		resolveCompletions: pickBoolean(
			raw?.resolveCompletions,
			DEFAULT_SETTINGS.resolveCompletions
		),
		resultLimit:
			typeof limit === "number" && Number.isInteger(limit) && limit > 0
				? limit
				: DEFAULT_SETTINGS.resultLimit,
		enableDebugLogs: pickBoolean(raw?.enableDebugLogs, DEFAULT_SETTINGS.enableDebugLogs),
		debugCategories: Array.isArray(categories)
			? Array.from(new Set(categories.filter(isDebugCategory)))
			: [],
		menuKeymap: normalizeKeymap(raw?.menuKeymap),
	};
};
