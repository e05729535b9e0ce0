/**
 * Authentication errors raised by the SSO flow, token exchanges and the client.
 *
 * @module errors/auth-errors
 */

import { ConnectError, type ConnectErrorOptions } from './connect-error.ts'

type AuthErrorOptions = Partial<Omit<ConnectErrorOptions, 'category'>>

/**
 * Credentials or session problems. Callers usually react by re-authenticating.
 */
export class AuthenticationError extends ConnectError {
	constructor(message: string, options: AuthErrorOptions = {}) {
		super(message, {
			category: 'AUTHENTICATION',
			code: options.code ?? 'AUTHENTICATION_FAILED',
			recoverable: options.recoverable ?? false,
			context: options.context,
			cause: options.cause,
		})
		this.name = 'AuthenticationError'
	}
}

/** SSO login steps, in the order the flow runs them. */
export type LoginStep =
	| 'bootstrap'
	| 'signin-page'
	| 'credentials'
	| 'mfa'
	| 'success-check'
	| 'ticket'
	| 'consumer'
	| 'oauth1-exchange'
	| 'oauth2-exchange'

/**
 * The SSO flow failed at a specific step.
 *
 * `context.step` names the step; `context.title` holds the page title when the
 * failure was an unexpected page.
 */
export class LoginError extends AuthenticationError {
	public readonly step: LoginStep

	constructor(message: string, step: LoginStep, context: Record<string, unknown> = {}) {
		super(message, { code: 'LOGIN_FAILED', context: { step, ...context } })
		this.name = 'LoginError'
		this.step = step
	}
}

/**
 * The SSO flow asked for an MFA code and none was supplied.
 */
export class MfaRequiredError extends AuthenticationError {
	/** HTML of the MFA challenge page, for callers that drive MFA themselves. */
	public readonly mfaHtml?: string

	constructor(message = 'MFA code required', mfaHtml?: string) {
		super(message, { code: 'MFA_CODE_MISSING' })
		this.name = 'MfaRequiredError'
		this.mfaHtml = mfaHtml
	}
}

/**
 * The stored OAuth1 credential is no longer accepted; a fresh login is needed.
 */
export class TokenExpiredError extends AuthenticationError {
	constructor(message = 'OAuth1 credential rejected, log in again', context: Record<string, unknown> = {}) {
		super(message, { code: 'TOKEN_EXPIRED', context })
		this.name = 'TokenExpiredError'
	}
}
