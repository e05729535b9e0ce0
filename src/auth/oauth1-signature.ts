/**
 * OAuth 1.0a request signing (RFC 5849, HMAC-SHA1).
 *
 * The ticket and token exchanges are one-legged OAuth1 requests: the consumer
 * key/secret sign the request, plus the OAuth1 token/secret once one exists.
 * The signature base string covers the query parameters and, for
 * form-encoded bodies, the body parameters.
 *
 * @module auth/oauth1-signature
 */

import { createHmac, randomBytes } from 'node:crypto'

export interface OAuth1Consumer {
	key: string
	secret: string
}

export interface OAuth1Token {
	token: string
	secret: string
}

export interface SignRequestInput {
	method: string
	/** Full URL; its query parameters are part of the signature */
	url: string
	consumer: OAuth1Consumer
	token?: OAuth1Token
	/** Form-encoded body parameters, if the body is `application/x-www-form-urlencoded` */
	bodyParams?: URLSearchParams
	/** Overrides for deterministic signatures */
	nonce?: string
	timestamp?: number
}

/**
 * Percent-encode per RFC 3986 (unreserved characters only).
 */
export function percentEncode(value: string): string {
	return encodeURIComponent(value).replace(/[!'()*]/g, (char) => `%${char.charCodeAt(0).toString(16).toUpperCase()}`)
}

/**
 * Signature base string: `METHOD&encoded(base-url)&encoded(normalized-params)`.
 */
export function signatureBaseString(method: string, url: string, params: Array<[string, string]>): string {
	// URL lowercases the host and drops default ports
	const parsed = new URL(url)
	const baseUrl = `${parsed.protocol}//${parsed.host}${parsed.pathname}`

	const normalized = params
		.map(([key, value]): [string, string] => [percentEncode(key), percentEncode(value)])
		.sort(([ak, av], [bk, bv]) => (ak === bk ? compare(av, bv) : compare(ak, bk)))
		.map(([key, value]) => `${key}=${value}`)
		.join('&')

	return [method.toUpperCase(), percentEncode(baseUrl), percentEncode(normalized)].join('&')
}

function compare(a: string, b: string): number {
	if (a < b) return -1
	if (a > b) return 1
	return 0
}

/**
 * Sign a request and return the `Authorization` header value.
 *
 * @example
 * ```typescript
 * const header = signRequest({
 *   method: 'GET',
 *   url: 'https://connectapi.garmin.com/oauth-service/oauth/preauthorized?ticket=ST-1',
 *   consumer: { key: 'consumer-key', secret: 'consumer-secret' },
 * })
 * // 'OAuth oauth_consumer_key="consumer-key", oauth_nonce="...", ...'
 * ```
 */
export function signRequest(input: SignRequestInput): string {
	const oauthParams: Record<string, string> = {
		oauth_consumer_key: input.consumer.key,
		oauth_nonce: input.nonce ?? randomBytes(16).toString('hex'),
		oauth_signature_method: 'HMAC-SHA1',
		oauth_timestamp: String(input.timestamp ?? Math.floor(Date.now() / 1000)),
		oauth_version: '1.0',
	}
	if (input.token) {
		oauthParams.oauth_token = input.token.token
	}

	const params: Array<[string, string]> = [
		...Object.entries(oauthParams),
		...new URL(input.url).searchParams.entries(),
		...(input.bodyParams ? input.bodyParams.entries() : []),
	]

	const baseString = signatureBaseString(input.method, input.url, params)
	const signingKey = `${percentEncode(input.consumer.secret)}&${percentEncode(input.token?.secret ?? '')}`
	oauthParams.oauth_signature = createHmac('sha1', signingKey).update(baseString).digest('base64')

	const header = Object.keys(oauthParams)
		.sort()
		.map((key) => `${percentEncode(key)}="${percentEncode(oauthParams[key] ?? '')}"`)
		.join(', ')

	return `OAuth ${header}`
}
