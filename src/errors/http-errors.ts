/**
 * HTTP response, parse and network errors raised by the session.
 *
 * @module errors/http-errors
 */

import { ConnectError, type ErrorCategory } from './connect-error.ts'

interface HttpErrorShape {
	category: ErrorCategory
	code: string
	recoverable: boolean
}

const GENERIC: HttpErrorShape = { category: 'HTTP', code: 'HTTP_ERROR', recoverable: false }

/**
 * Non-success HTTP response. Always carries the numeric status and raw body.
 */
export class HTTPError extends ConnectError {
	public readonly status: number

	public readonly body: string

	constructor(message: string, status: number, body: string, shape: HttpErrorShape = GENERIC) {
		super(message, { ...shape, context: { status } })
		this.name = 'HTTPError'
		this.status = status
		this.body = body
	}
}

export class BadRequestError extends HTTPError {
	constructor(message: string, status: number, body: string) {
		super(message, status, body, { category: 'HTTP', code: 'BAD_REQUEST', recoverable: false })
		this.name = 'BadRequestError'
	}
}

export class UnauthorizedError extends HTTPError {
	constructor(message: string, status: number, body: string) {
		super(message, status, body, { category: 'AUTHENTICATION', code: 'UNAUTHORIZED', recoverable: false })
		this.name = 'UnauthorizedError'
	}
}

export class ForbiddenError extends HTTPError {
	constructor(message: string, status: number, body: string) {
		super(message, status, body, { category: 'PERMISSION', code: 'FORBIDDEN', recoverable: false })
		this.name = 'ForbiddenError'
	}
}

export class NotFoundError extends HTTPError {
	constructor(message: string, status: number, body: string) {
		super(message, status, body, { category: 'NOT_FOUND', code: 'NOT_FOUND', recoverable: false })
		this.name = 'NotFoundError'
	}
}

export class TooManyRequestsError extends HTTPError {
	constructor(message: string, status: number, body: string) {
		super(message, status, body, { category: 'RATE_LIMIT', code: 'TOO_MANY_REQUESTS', recoverable: true })
		this.name = 'TooManyRequestsError'
	}
}

export class ServerError extends HTTPError {
	constructor(message: string, status: number, body: string) {
		super(message, status, body, { category: 'SERVER', code: 'SERVER_ERROR', recoverable: true })
		this.name = 'ServerError'
	}
}

type HttpErrorClass = new (message: string, status: number, body: string) => HTTPError

const STATUS_ERRORS: ReadonlyMap<number, HttpErrorClass> = new Map<number, HttpErrorClass>([
	[400, BadRequestError],
	[401, UnauthorizedError],
	[403, ForbiddenError],
	[404, NotFoundError],
	[429, TooManyRequestsError],
])

/**
 * Build the error for a non-success status: exact match for 400, 401, 403,
 * 404 and 429, {@link ServerError} for 5xx, {@link HTTPError} otherwise.
 *
 * @example
 * ```typescript
 * const error = errorForStatus(429, '{"message":"slow down"}')
 * error instanceof TooManyRequestsError // true
 * ```
 */
export function errorForStatus(status: number, body: string): HTTPError {
	const message = `Garmin API error: HTTP ${status}`
	const ErrorClass = STATUS_ERRORS.get(status)
	if (ErrorClass) {
		return new ErrorClass(message, status, body)
	}
	if (status >= 500) {
		return new ServerError(message, status, body)
	}
	return new HTTPError(message, status, body)
}

/**
 * The response declared `application/json` but its body did not parse.
 */
export class ParseError extends ConnectError {
	constructor(message: string, context: Record<string, unknown> = {}, cause?: Error) {
		super(message, { category: 'PARSE', code: 'PARSE_FAILED', context, cause })
		this.name = 'ParseError'
	}
}

/**
 * The request never produced a response (connection failure or timeout),
 * after all retry attempts.
 */
export class NetworkError extends ConnectError {
	constructor(message: string, context: Record<string, unknown> = {}, cause?: Error) {
		super(message, { category: 'NETWORK_ERROR', code: 'NETWORK_FAILED', recoverable: true, context, cause })
		this.name = 'NetworkError'
	}
}
