/**
 * Correlation ID utilities for request tracing.
 *
 * Correlation IDs link the log entries of one API call across retries and
 * the token refresh it may trigger.
 */

import { randomUUID } from 'node:crypto'

/**
 * Generate an 8-character correlation ID.
 *
 * @returns Short UUID prefix (e.g., "a1b2c3d4")
 *
 * @example
 * ```typescript
 * const cid = createCorrelationId()
 * logger.debug('Request sent', { cid, path })
 * ```
 */
export function createCorrelationId(): string {
	return randomUUID().slice(0, 8)
}
