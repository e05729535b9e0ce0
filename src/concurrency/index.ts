/**
 * Concurrency primitives.
 *
 * ## Single flight
 *
 * Collapse overlapping calls for the same key into one execution.
 *
 * ```typescript
 * import { SingleFlight } from 'garmin-connect-kit/concurrency'
 *
 * const flight = new SingleFlight<string, Token>()
 * const token = await flight.run('oauth2', () => refreshToken())
 * ```
 *
 * @module concurrency
 */

export { SingleFlight } from './single-flight.ts'
