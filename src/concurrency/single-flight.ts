/**
 * Single-flight execution.
 *
 * Collapses concurrent calls for the same key into one execution: the first
 * caller runs the factory, every caller that arrives while it is pending
 * receives the same promise. Nothing is cached once the call settles, so the
 * next call after completion runs the factory again.
 *
 * The session uses this around its "expired → refresh → persist" sequence so
 * overlapping requests never perform a double refresh.
 *
 * @example
 * ```typescript
 * import { SingleFlight } from 'garmin-connect-kit/concurrency'
 *
 * const flight = new SingleFlight<string, Token>()
 *
 * // Both calls share one refresh
 * const [a, b] = await Promise.all([
 *   flight.run('oauth2', () => refreshToken()),
 *   flight.run('oauth2', () => refreshToken()),
 * ])
 * ```
 *
 * @module concurrency/single-flight
 */

export class SingleFlight<K, V> {
	private pending = new Map<K, Promise<V>>()

	/**
	 * Run the factory for a key, or join the execution already in flight.
	 *
	 * @param key - Execution key
	 * @param factory - Work to run if nothing is pending for the key
	 * @returns Result of the shared execution
	 */
	run(key: K, factory: (key: K) => Promise<V>): Promise<V> {
		const inFlight = this.pending.get(key)
		if (inFlight) {
			return inFlight
		}

		// Deferred so the entry exists before the factory can settle
		const promise = Promise.resolve()
			.then(() => factory(key))
			.finally(() => {
				this.pending.delete(key)
			})
		this.pending.set(key, promise)
		return promise
	}

	/**
	 * Check whether an execution is pending for a key.
	 */
	isPending(key: K): boolean {
		return this.pending.has(key)
	}

	/**
	 * Number of keys with an execution in flight.
	 */
	get size(): number {
		return this.pending.size
	}
}
