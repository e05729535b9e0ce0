/**
 * String utilities
 *
 * @example
 * ```ts
 * import { capitalize, titleCase } from 'garmin-connect-kit/utils'
 *
 * capitalize('hello'); // 'Hello'
 * titleCase('BEARER'); // 'Bearer'
 * ```
 */

/**
 * Capitalize the first letter of a string, leaving the rest unchanged.
 *
 * @example
 * ```ts
 * capitalize('hello'); // 'Hello'
 * capitalize('hELLO'); // 'HELLO'
 * capitalize(''); // ''
 * ```
 */
export function capitalize(str: string): string {
	if (!str) return str
	return str.charAt(0).toUpperCase() + str.slice(1)
}

/**
 * Uppercase the first letter and lowercase the rest.
 *
 * Used to render OAuth token types, where some servers only accept
 * `Bearer` and reject `bearer` or `BEARER`.
 *
 * @example
 * ```ts
 * titleCase('bearer'); // 'Bearer'
 * titleCase('BEARER'); // 'Bearer'
 * ```
 */
export function titleCase(str: string): string {
	return capitalize(str.toLowerCase())
}

/**
 * Convert unknown error value to a readable message.
 *
 * @param error - Unknown error value (from catch block)
 */
export function getErrorMessage(error: unknown): string {
	if (error instanceof Error) {
		return error.message
	}
	return String(error)
}
