/**
 * Response classification and body decoding.
 *
 * @module http/response
 */

import { errorForStatus, ParseError } from '../errors/index.ts'

const BOM = [0xef, 0xbb, 0xbf] as const

const decoder = new TextDecoder('utf-8', { ignoreBOM: true })

/**
 * Raise the typed error for a non-success response. The error carries the
 * status and raw body.
 */
export async function assertOk(response: Response): Promise<void> {
	if (response.ok) return
	const body = await response.text()
	throw errorForStatus(response.status, body)
}

/**
 * Decode body bytes as UTF-8 text, dropping a leading byte-order mark.
 */
export function decodeBody(bytes: Uint8Array): string {
	const hasBom = bytes.length >= 3 && bytes[0] === BOM[0] && bytes[1] === BOM[1] && bytes[2] === BOM[2]
	return decoder.decode(hasBom ? bytes.subarray(3) : bytes)
}

/**
 * Decode a successful response.
 *
 * - 204 or an empty body → `undefined`
 * - JSON → the parsed value
 * - Unparseable under `application/json` → {@link ParseError}
 * - Unparseable otherwise → the text as-is
 */
export async function parseBody(response: Response): Promise<unknown> {
	if (response.status === 204) return undefined

	const text = decodeBody(new Uint8Array(await response.arrayBuffer()))
	if (text.length === 0) return undefined

	try {
		return JSON.parse(text)
	} catch (error) {
		const contentType = response.headers.get('content-type') ?? ''
		if (contentType.includes('application/json')) {
			throw new ParseError(
				`Failed to parse JSON response: ${text.slice(0, 200)}`,
				{ status: response.status, contentType },
				error instanceof Error ? error : undefined,
			)
		}
		return text
	}
}
