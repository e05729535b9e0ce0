/**
 * Errors raised while loading or decoding persisted credentials.
 *
 * @module errors/credential-errors
 */

import { ConnectError } from './connect-error.ts'

/**
 * The token directory, or one of its two credential files, does not exist.
 */
export class CredentialNotFoundError extends ConnectError {
	/** Path that was looked for. */
	public readonly path: string

	constructor(message: string, path: string) {
		super(message, { category: 'NOT_FOUND', code: 'CREDENTIALS_NOT_FOUND', context: { path } })
		this.name = 'CredentialNotFoundError'
		this.path = path
	}
}

/**
 * Stored or encoded credentials are not valid base64, JSON, or credential maps.
 */
export class CredentialFormatError extends ConnectError {
	constructor(message: string, context: Record<string, unknown> = {}, cause?: Error) {
		super(message, { category: 'VALIDATION', code: 'CREDENTIALS_INVALID', context, cause })
		this.name = 'CredentialFormatError'
	}
}
