/**
 * Backoff helpers for the bridge's retry loops
 */

/**
 * Calculate exponential backoff delay
 *
 * @param attempt Current attempt number (1-based)
 * @param baseDelayMs Initial delay in milliseconds
 * @param multiplier Exponential backoff multiplier (typically 2)
 * @param maxDelayMs Maximum delay cap
 */
export function calculateBackoff(
	attempt: number,
	baseDelayMs: number,
	multiplier: number,
	maxDelayMs: number
): number {
	const exponentialDelay = baseDelayMs * Math.pow(multiplier, attempt - 1);
	return Math.min(exponentialDelay, maxDelayMs);
}

export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>;

/**
 * Resolves after `ms`, or as soon as `signal` aborts. Never rejects.
 */
export const sleep: SleepFn = (ms, signal) => {
	return new Promise((resolve) => {
		if (signal?.aborted) {
			resolve();
			return;
		}

		const onAbort = () => {
			clearTimeout(timer);
			resolve();
		};
		const timer = setTimeout(() => {
			signal?.removeEventListener('abort', onAbort);
			resolve();
		}, ms);

		signal?.addEventListener('abort', onAbort, { once: true });
	});
};
