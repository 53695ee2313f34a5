/**
 * Retry Handler Module
 *
 * Delay primitives shared by the HTTP retry loop and the dashboard's tick loop.
 *
 * - `sleep()` is a plain non-blocking delay, used between rate-limited retries.
 * - `waitUnlessAborted()` is the tick loop's delay: it resolves early when the
 *   cancellation signal fires and reports which of the two happened.
 */

/**
 * Asynchronous sleep utility.
 *
 * @example
 * ```typescript
 * const retryAfterMs = extractRetryAfter(response.headers);
 * if (retryAfterMs !== null) {
 *   await sleep(retryAfterMs);
 * }
 * ```
 */
export function sleep(ms: number): Promise<void> {
	return new Promise((resolve) => setTimeout(resolve, ms));
}

/** Signature of an injectable sleep, so tests can record delays instead of waiting */
export type SleepFn = (ms: number) => Promise<void>;

/**
 * Wait for `ms`, or until `signal` aborts, whichever comes first.
 *
 * @returns true when the full delay elapsed, false when the wait was cut short
 *   (or the signal had already fired)
 */
export function waitUnlessAborted(ms: number, signal: AbortSignal): Promise<boolean> {
	if (signal.aborted) return Promise.resolve(false);

	return new Promise((resolve) => {
		const onAbort = (): void => {
			clearTimeout(timer);
			resolve(false);
		};
		const timer = setTimeout(() => {
			signal.removeEventListener("abort", onAbort);
			resolve(true);
		}, Math.max(0, ms));
		signal.addEventListener("abort", onAbort, { once: true });
	});
}

/** Signature of an injectable interruptible wait */
export type WaitFn = (ms: number, signal: AbortSignal) => Promise<boolean>;
