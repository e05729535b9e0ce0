/**
 * Minimal cookie jar for the SSO flow.
 *
 * The SSO pages only work when the cookies set by the embed page, the signin
 * page and every redirect in between are sent back. Cookies are keyed by
 * host and name; attributes other than `Max-Age=0`/`Expires` in the past
 * (deletion) are ignored.
 *
 * @module auth/cookie-jar
 */

export class CookieJar {
	private readonly cookies = new Map<string, Map<string, string>>()

	/**
	 * Record the `Set-Cookie` headers of a response.
	 */
	store(url: string | URL, headers: Headers): void {
		const host = new URL(url).hostname
		for (const line of headers.getSetCookie()) {
			this.storeLine(host, line)
		}
	}

	private storeLine(host: string, line: string): void {
		const [pair = '', ...attributes] = line.split(';')
		const separator = pair.indexOf('=')
		if (separator <= 0) return

		const name = pair.slice(0, separator).trim()
		const value = pair.slice(separator + 1).trim()
		const domain = attributeValue(attributes, 'domain')?.replace(/^\./, '').toLowerCase() ?? host

		const bucket = this.cookies.get(domain) ?? new Map<string, string>()
		if (isDeletion(attributes)) {
			bucket.delete(name)
		} else {
			bucket.set(name, value)
		}
		this.cookies.set(domain, bucket)
	}

	/**
	 * `Cookie` header value for a request URL, or undefined when nothing applies.
	 */
	header(url: string | URL): string | undefined {
		const host = new URL(url).hostname
		const pairs: string[] = []
		for (const [domain, bucket] of this.cookies) {
			if (host === domain || host.endsWith(`.${domain}`)) {
				for (const [name, value] of bucket) {
					pairs.push(`${name}=${value}`)
				}
			}
		}
		return pairs.length > 0 ? pairs.join('; ') : undefined
	}

	/** Number of cookies held */
	get size(): number {
		let count = 0
		for (const bucket of this.cookies.values()) count += bucket.size
		return count
	}
}

function attributeValue(attributes: string[], name: string): string | undefined {
	for (const attribute of attributes) {
		const [key = '', ...rest] = attribute.split('=')
		if (key.trim().toLowerCase() === name) {
			return rest.join('=').trim()
		}
	}
	return undefined
}

function isDeletion(attributes: string[]): boolean {
	const maxAge = attributeValue(attributes, 'max-age')
	if (maxAge !== undefined && Number(maxAge) <= 0) return true
	const expires = attributeValue(attributes, 'expires')
	if (expires !== undefined) {
		const at = Date.parse(expires)
		return !Number.isNaN(at) && at <= Date.now()
	}
	return false
}
