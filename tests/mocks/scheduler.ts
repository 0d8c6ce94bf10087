import type { BackgroundScheduler } from '../../src/fuzzyMatcher';

export const inlineScheduler: BackgroundScheduler = {
	yield: () => Promise.resolve(),
};

/**
 * Scheduler whose yields stay pending until the test releases them,
 * so filter passes can be completed in any order.
 */
export class ManualScheduler implements BackgroundScheduler {
	private pending: (() => void)[] = [];

	yield(): Promise<void> {
		return new Promise<void>((resolve) => {
			this.pending.push(resolve);
		});
	}

	get pendingCount(): number {
		return this.pending.length;
	}

	release(index: number): void {
		const resolve = this.pending[index];
		if (!resolve) {
			throw new Error(`No pending yield at ${index}`);
		}
		this.pending[index] = () => {};
		resolve();
	}
}
