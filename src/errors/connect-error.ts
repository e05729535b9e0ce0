/**
 * Structured error root for the Garmin Connect client.
 *
 * Every error the library raises extends {@link ConnectError}, which carries:
 * - A high-level category for classification
 * - A machine-readable code
 * - A recoverability hint (safe to back off and retry)
 * - Arbitrary context metadata (never credentials)
 * - Error chaining via `cause`
 *
 * @module errors/connect-error
 */

/**
 * High-level error categories.
 */
export type ErrorCategory =
	| 'AUTHENTICATION' // Login, MFA, credential or session problems
	| 'HTTP' // Generic non-success HTTP response
	| 'PERMISSION' // 403
	| 'NOT_FOUND' // 404, missing credential files
	| 'RATE_LIMIT' // 429
	| 'SERVER' // 5xx
	| 'PARSE' // Response claimed JSON but did not parse
	| 'NETWORK_ERROR' // Connectivity or timeout after retries
	| 'VALIDATION' // Malformed stored credentials
	| 'CONFIGURATION' // Invalid client options

/** Constructor options shared by every {@link ConnectError}. */
export interface ConnectErrorOptions {
	category: ErrorCategory
	code: string
	recoverable?: boolean
	context?: Record<string, unknown>
	cause?: Error
}

/**
 * Base class for all errors raised by this library.
 *
 * @example
 * ```typescript
 * try {
 *   await client.login()
 * } catch (error) {
 *   if (isConnectError(error) && error.category === 'AUTHENTICATION') {
 *     // prompt for new credentials
 *   }
 * }
 * ```
 */
export class ConnectError extends Error {
	public readonly category: ErrorCategory

	public readonly code: string

	/** Whether backing off and retrying the same call can succeed. */
	public readonly recoverable: boolean

	public readonly context: Record<string, unknown>

	public override readonly cause?: Error

	constructor(message: string, options: ConnectErrorOptions) {
		super(message)
		this.name = 'ConnectError'
		this.category = options.category
		this.code = options.code
		this.recoverable = options.recoverable ?? false
		this.context = options.context ?? {}
		this.cause = options.cause

		if (Error.captureStackTrace) {
			Error.captureStackTrace(this, new.target)
		}
	}

	/**
	 * Serialize error to JSON for logging or transport.
	 */
	toJSON(): {
		name: string
		message: string
		category: ErrorCategory
		code: string
		recoverable: boolean
		context: Record<string, unknown>
		stack?: string
		cause?: {
			name: string
			message: string
			stack?: string
		}
	} {
		return {
			name: this.name,
			message: this.message,
			category: this.category,
			code: this.code,
			recoverable: this.recoverable,
			context: this.context,
			stack: this.stack,
			cause: this.cause
				? {
						name: this.cause.name,
						message: this.cause.message,
						stack: this.cause.stack,
					}
				: undefined,
		}
	}
}

/**
 * Type guard for {@link ConnectError}.
 */
export function isConnectError(error: unknown): error is ConnectError {
	return error instanceof ConnectError
}

/**
 * True if the error is a {@link ConnectError} marked recoverable
 * (rate limiting, server errors, network failures).
 */
export function isRecoverableError(error: unknown): boolean {
	return isConnectError(error) && error.recoverable
}

/**
 * Raised when client options fail validation.
 */
export class ConfigurationError extends ConnectError {
	constructor(message: string, context: Record<string, unknown> = {}) {
		super(message, { category: 'CONFIGURATION', code: 'INVALID_OPTIONS', context })
		this.name = 'ConfigurationError'
	}
}
