/**
 * Interactive MFA code prompt.
 *
 * Only the client wires this in as a default; the SSO flow itself never reads
 * from a terminal.
 */

import { createInterface } from 'node:readline/promises'
import type { Readable, Writable } from 'node:stream'

/**
 * Supplies an MFA code when the SSO flow asks for one. An empty string means
 * no code is available.
 */
export type MfaHandler = () => string | Promise<string>

export interface MfaPromptOptions {
	input?: Readable
	output?: Writable
	message?: string
}

/**
 * Build an {@link MfaHandler} that asks on stderr and reads one line from stdin.
 * Resolves to an empty string when stdin closes first.
 *
 * @example
 * ```typescript
 * const client = new ConnectClient({ email, password, mfaHandler: createStdinMfaPrompt() })
 * ```
 */
export function createStdinMfaPrompt(options: MfaPromptOptions = {}): MfaHandler {
	const { input = process.stdin, output = process.stderr, message = 'Enter Garmin MFA code: ' } = options

	return async () => {
		const rl = createInterface({ input, output, terminal: false })
		let closed = false
		try {
			// Input ending before a line arrives counts as no code
			const answer = await new Promise<string>((resolve, reject) => {
				rl.once('close', () => {
					closed = true
					resolve('')
				})
				rl.question(message).then(resolve, reject)
			})
			return answer.trim()
		} finally {
			if (!closed) rl.close()
		}
	}
}
