/**
 * Hosts, user agents and fixed URLs of the Garmin Connect service.
 */

/** User agent of the mobile app; required by the SSO pages and the API */
export const API_USER_AGENT = 'GCM-iOS-5.19.1.2'

/** User agent the OAuth exchange endpoints expect */
export const OAUTH_USER_AGENT = 'com.garmin.android.apps.connectmobile'

/** Shared OAuth1 consumer key/secret document */
export const CONSUMER_URL = 'https://thegarth.s3.amazonaws.com/oauth_consumer.json'

/** Default per-request timeout */
export const DEFAULT_TIMEOUT_MS = 10_000

/**
 * `https://connectapi.<domain>`
 */
export function apiBaseUrl(domain: string): string {
	return `https://connectapi.${domain}`
}

/**
 * `https://sso.<domain>/sso`
 */
export function ssoBaseUrl(domain: string): string {
	return `https://sso.${domain}/sso`
}
