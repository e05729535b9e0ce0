/**
 * Error taxonomy.
 *
 * ```
 * ConnectError
 * ├── AuthenticationError
 * │   ├── LoginError
 * │   ├── MfaRequiredError
 * │   └── TokenExpiredError
 * ├── HTTPError
 * │   ├── BadRequestError (400)
 * │   ├── UnauthorizedError (401)
 * │   ├── ForbiddenError (403)
 * │   ├── NotFoundError (404)
 * │   ├── TooManyRequestsError (429)
 * │   └── ServerError (5xx)
 * ├── ParseError
 * ├── NetworkError
 * ├── CredentialNotFoundError
 * ├── CredentialFormatError
 * └── ConfigurationError
 * ```
 *
 * @module errors
 */

export {
	AuthenticationError,
	LoginError,
	type LoginStep,
	MfaRequiredError,
	TokenExpiredError,
} from './auth-errors.ts'
export {
	ConfigurationError,
	ConnectError,
	type ConnectErrorOptions,
	type ErrorCategory,
	isConnectError,
	isRecoverableError,
} from './connect-error.ts'
export { CredentialFormatError, CredentialNotFoundError } from './credential-errors.ts'
export {
	BadRequestError,
	errorForStatus,
	ForbiddenError,
	HTTPError,
	NetworkError,
	NotFoundError,
	ParseError,
	ServerError,
	TooManyRequestsError,
	UnauthorizedError,
} from './http-errors.ts'
