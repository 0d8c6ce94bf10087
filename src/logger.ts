export type DebugCategory =
	| "general"
	| "matcher"
	| "ranker"
	| "menu"
	| "resolve"
	| "actions";

export class MenuLogger {
	private enabled = false;
	private allowedCategories: Set<DebugCategory> | null = null;

	setEnabled(enabled: boolean): void {
		this.enabled = enabled;
	}

	setCategories(categories: DebugCategory[] | null): void {
		if (!categories || categories.length === 0) {
			this.allowedCategories = null;
		} else {
			this.allowedCategories = new Set(categories);
		}
	}

	isEnabled(category: DebugCategory): boolean {
		if (!this.enabled) return false;
		return !this.allowedCategories || this.allowedCategories.has(category);
	}

	debug(category: DebugCategory, ...data: unknown[]): void {
		if (!this.isEnabled(category)) return;
		console.log(`[${category}]`, ...data);
	}

	error(category: DebugCategory, message: string, error?: unknown): void {
		if (error === undefined) {
			console.error(`[${category}] ${message}`);
			return;
		}
		console.error(`[${category}] ${message}`, error);
	}
}
