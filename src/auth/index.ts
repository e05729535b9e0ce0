/**
 * Authentication: credential types, persistence and the SSO flow.
 *
 * ## Features
 *
 * - **Dual credential**: long-lived OAuth1 token, short-lived OAuth2 bearer
 * - **Peer-compatible storage**: `oauth1_token.json`/`oauth2_token.json`
 *   directories and base64 token strings
 * - **SSO login**: cookie bootstrap, CSRF, credentials, MFA, ticket, exchanges
 *
 * ## Usage
 *
 * ```typescript
 * import { SsoAuthenticator, saveCredentials } from 'garmin-connect-kit/auth'
 *
 * const pair = await new SsoAuthenticator().login({ email, password })
 * saveCredentials('~/.garminconnect', pair)
 * ```
 *
 * @module auth
 */

export { CookieJar } from './cookie-jar.ts'
export {
	clearCredentials,
	dumpCredentials,
	loadCredentials,
	OAUTH1_FILENAME,
	OAUTH2_FILENAME,
	parseCredentials,
	saveCredentials,
	saveOAuth2Credential,
} from './credential-store.ts'
export {
	type CredentialPair,
	DEFAULT_DOMAIN,
	OAuth1Credential,
	type OAuth1CredentialInit,
	type OAuth1Map,
	OAuth1MapSchema,
	OAuth2Credential,
	type OAuth2CredentialInit,
	type OAuth2Map,
	OAuth2MapSchema,
} from './credentials.ts'
export { createStdinMfaPrompt, type MfaHandler, type MfaPromptOptions } from './mfa-prompt.ts'
export {
	type OAuth1Consumer,
	type OAuth1Token,
	percentEncode,
	type SignRequestInput,
	signatureBaseString,
	signRequest,
} from './oauth1-signature.ts'
export {
	embedUrl,
	extractCsrf,
	extractTicket,
	extractTitle,
	type LoginInput,
	signinParams,
	signinUrl,
	SsoAuthenticator,
	type SsoAuthenticatorOptions,
} from './sso.ts'
