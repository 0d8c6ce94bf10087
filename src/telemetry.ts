/**
 * Start a monotonic timer; the returned function formats the time elapsed
 * since the call, e.g. `"3.2ms"`.
 */
export const startTimer = (): (() => string) => {
	const start = performance.now();
	return () => `${(performance.now() - start).toFixed(1)}ms`;
};
