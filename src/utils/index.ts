/**
 * General utilities shared by the auth, http and api modules.
 *
 * @example
 * ```ts
 * import { retry, titleCase } from 'garmin-connect-kit/utils'
 *
 * const data = await retry(() => fetchData(), { maxAttempts: 3 })
 * ```
 */

export { retry, type RetryOptions, sleep } from './retry.ts'
export { capitalize, getErrorMessage, titleCase } from './string.ts'
