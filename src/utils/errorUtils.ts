/**
 * Extract error message from unknown error type
 */
export function getErrorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}

/**
 * Raised by menu operations that receive an index outside the entry range
 */
export class MenuIndexError extends RangeError {
	constructor(public readonly index: number, public readonly length: number) {
		super(`Menu index ${index} out of range (length ${length})`);
		this.name = "MenuIndexError";
	}
}
