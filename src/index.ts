/**
 * garmin-connect-kit
 *
 * Authenticated Garmin Connect client: SSO login with MFA, OAuth1/OAuth2
 * credential lifecycle, stored tokens and thin endpoint functions.
 *
 * Import from subpath exports for the full surface:
 *   import { dailySummary } from 'garmin-connect-kit/api'
 *   import { SsoAuthenticator } from 'garmin-connect-kit/auth'
 *   import { createFetchScript } from 'garmin-connect-kit/testing'
 *
 * @packageDocumentation
 */

export const VERSION = '0.1.0'

export type { ApiContext, UserProfile } from './api/index.ts'
export { type ClientOptions, ConnectClient, login, optionsFromEnv } from './client/index.ts'
export {
	AuthenticationError,
	ConnectError,
	HTTPError,
	isConnectError,
	isRecoverableError,
	LoginError,
	MfaRequiredError,
	NetworkError,
	ParseError,
	TokenExpiredError,
	TooManyRequestsError,
} from './errors/index.ts'
export { type ConnectLoggingOptions, configureConnectLogging } from './logging/index.ts'
