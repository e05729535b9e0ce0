/**
 * Helpers that keep secrets out of log properties.
 */

/**
 * Render a URL for logging: origin and path only.
 *
 * Query strings are dropped because the SSO flow carries one-time tickets
 * and the API carries account identifiers in them.
 *
 * @example
 * ```typescript
 * describeUrl('https://sso.garmin.com/sso/embed?ticket=ST-1')
 * // 'https://sso.garmin.com/sso/embed'
 * ```
 */
export function describeUrl(url: string | URL): string {
	try {
		const parsed = typeof url === 'string' ? new URL(url) : url
		return `${parsed.origin}${parsed.pathname}`
	} catch {
		return '<invalid url>'
	}
}
