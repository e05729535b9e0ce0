/**
 * Retry with exponential backoff.
 *
 * The transport layer uses this to retry transient network failures and
 * gateway statuses. Delays are purely time based; jitter is opt-in.
 */

/** Options for {@link retry} */
export interface RetryOptions {
	/** Maximum number of attempts, including the first (default: 4) */
	maxAttempts?: number
	/** Delay before the second attempt in ms (default: 500) */
	initialDelay?: number
	/** Maximum delay between attempts in ms (default: 10000) */
	maxDelay?: number
	/** Backoff multiplier (default: 2) */
	backoff?: number
	/** Add up to 20% random jitter to each delay (default: false) */
	jitter?: boolean
	/** Predicate to determine if error should be retried */
	shouldRetry?: (error: Error, attempt: number) => boolean
	/** Callback before each retry, with the delay about to be slept */
	onRetry?: (error: Error, attempt: number, delayMs: number) => void
	/** Sleep implementation (tests pass a no-op) */
	sleep?: (ms: number) => Promise<void>
}

/**
 * Promise-based sleep.
 *
 * @param ms - Milliseconds to wait
 */
export function sleep(ms: number): Promise<void> {
	return new Promise((resolve) => setTimeout(resolve, ms))
}

/**
 * Retry a function with exponential backoff.
 *
 * @param fn - Async function to retry, called with the 1-based attempt number
 * @param options - Retry options
 * @returns Result of the first successful call
 * @throws The last error once attempts are exhausted or `shouldRetry` declines
 *
 * @example
 * ```ts
 * const data = await retry(() => fetchJson(url), {
 *   maxAttempts: 4,
 *   initialDelay: 500,
 *   shouldRetry: (err) => err instanceof TransientError,
 * })
 * ```
 */
export async function retry<T>(
	fn: (attempt: number) => Promise<T>,
	options?: RetryOptions,
): Promise<T> {
	const {
		maxAttempts = 4,
		initialDelay = 500,
		maxDelay = 10000,
		backoff = 2,
		jitter = false,
		shouldRetry = () => true,
		onRetry,
		sleep: wait = sleep,
	} = options ?? {}

	let delay = initialDelay

	for (let attempt = 1; ; attempt++) {
		try {
			return await fn(attempt)
		} catch (error) {
			const lastError = error instanceof Error ? error : new Error(String(error))

			if (attempt >= maxAttempts || !shouldRetry(lastError, attempt)) {
				throw lastError
			}

			const jitterAmount = jitter ? Math.random() * delay * 0.2 : 0
			onRetry?.(lastError, attempt, delay + jitterAmount)
			await wait(delay + jitterAmount)

			delay = Math.min(delay * backoff, maxDelay)
		}
	}
}
