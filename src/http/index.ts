/**
 * HTTP layer: retrying transport, response decoding and the authenticated
 * session endpoint functions call through.
 *
 * @module http
 */

export {
	API_USER_AGENT,
	apiBaseUrl,
	CONSUMER_URL,
	DEFAULT_TIMEOUT_MS,
	OAUTH_USER_AGENT,
	ssoBaseUrl,
} from './endpoints.ts'
export { assertOk, decodeBody, parseBody } from './response.ts'
export {
	type BodyRequestOptions,
	type CredentialRefresher,
	type QueryParams,
	type QueryValue,
	type RequestOptions,
	Session,
	type SessionOptions,
	type UploadOptions,
} from './session.ts'
export {
	type FetchFn,
	RETRY_STATUSES,
	type SendOptions,
	Transport,
	type TransportOptions,
	type TransportRetryOptions,
} from './transport.ts'
