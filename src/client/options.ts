/**
 * Client configuration.
 *
 * Options are validated with zod; a bad value raises a
 * {@link ConfigurationError} naming the field. Environment variables fill in
 * whatever the caller leaves out.
 *
 * @module client/options
 */

import { homedir } from 'node:os'
import { join, resolve } from 'node:path'
import { z } from 'zod'
import { DEFAULT_DOMAIN } from '../auth/credentials.ts'
import type { MfaHandler } from '../auth/mfa-prompt.ts'
import { ConfigurationError } from '../errors/index.ts'
import { DEFAULT_TIMEOUT_MS } from '../http/endpoints.ts'
import type { FetchFn } from '../http/transport.ts'

/** Default token directory, shared with the peer implementation */
export const DEFAULT_TOKEN_DIR = join(homedir(), '.garminconnect')

const RetrySchema = z
	.object({
		maxAttempts: z.number().int().min(1).max(10).default(4),
		initialDelayMs: z.number().int().min(0).default(500),
		maxDelayMs: z.number().int().min(0).default(10_000),
		backoff: z.number().min(1).default(2),
		jitter: z.boolean().default(false),
	})
	.strict()

export const ClientOptionsSchema = z
	.object({
		email: z.string().email().optional(),
		password: z.string().min(1).optional(),
		domain: z
			.string()
			.regex(/^garmin\.(com|cn)$/, 'must be "garmin.com" or "garmin.cn"')
			.default(DEFAULT_DOMAIN),
		tokenDir: z.string().min(1).nullable().default(DEFAULT_TOKEN_DIR),
		tokenString: z.string().min(1).optional(),
		timeoutMs: z.number().int().positive().default(DEFAULT_TIMEOUT_MS),
		retry: RetrySchema.default({}),
	})
	.strict()

type SchemaInput = z.input<typeof ClientOptionsSchema>

/**
 * Options accepted by {@link ConnectClient}.
 *
 * `tokenString` takes precedence over `tokenDir`; `tokenDir: null` disables
 * persistence. `retry: false` makes a single attempt per request.
 */
export interface ClientOptions extends Omit<SchemaInput, 'retry'> {
	retry?: SchemaInput['retry'] | false
	/** Asked for a code when MFA is required (default: prompt on stdin) */
	mfaHandler?: MfaHandler
	/** Injected fetch, for tests and proxies */
	fetch?: FetchFn
	/** Delay implementation for retry backoff */
	sleep?: (ms: number) => Promise<void>
}

type SchemaOutput = z.output<typeof ClientOptionsSchema>

export type ResolvedOptions = Omit<SchemaOutput, 'retry'> & {
	retry: SchemaOutput['retry'] | false
	mfaHandler?: MfaHandler
	fetch?: FetchFn
	sleep?: (ms: number) => Promise<void>
}

/**
 * Expand a leading `~` and make the path absolute.
 */
export function expandHome(path: string): string {
	if (path === '~') return homedir()
	if (path.startsWith('~/')) return join(homedir(), path.slice(2))
	return resolve(path)
}

/**
 * Validate options and apply defaults.
 *
 * @throws {ConfigurationError} Naming the first invalid field
 */
export function resolveOptions(options: ClientOptions = {}): ResolvedOptions {
	const { mfaHandler, fetch, sleep, retry, ...rest } = options
	const result = ClientOptionsSchema.safeParse({ ...rest, retry: retry === false ? undefined : retry })
	if (!result.success) {
		const issue = result.error.issues[0]
		const field = issue?.path.join('.') || '(options)'
		throw new ConfigurationError(`Invalid client option "${field}": ${issue?.message ?? 'invalid value'}`, {
			field,
		})
	}

	const data = result.data
	return {
		...data,
		tokenDir: data.tokenDir === null ? null : expandHome(data.tokenDir),
		retry: retry === false ? false : data.retry,
		mfaHandler,
		fetch,
		sleep,
	}
}

/**
 * Read options from `GARMIN_EMAIL`, `GARMIN_PASSWORD`, `GARMIN_DOMAIN`,
 * `GARMIN_TOKEN_DIR` and `GARMIN_TOKENS`. Explicit options win; empty
 * variables are ignored.
 *
 * @example
 * ```typescript
 * const client = new ConnectClient(optionsFromEnv(process.env, { mfaHandler }))
 * ```
 */
export function optionsFromEnv(
	env: Record<string, string | undefined> = process.env,
	overrides: ClientOptions = {},
): ClientOptions {
	const pick = (name: string): string | undefined => {
		const value = env[name]?.trim()
		return value ? value : undefined
	}

	const fromEnv: ClientOptions = {}
	const email = pick('GARMIN_EMAIL')
	const password = pick('GARMIN_PASSWORD')
	const domain = pick('GARMIN_DOMAIN')
	const tokenDir = pick('GARMIN_TOKEN_DIR')
	const tokenString = pick('GARMIN_TOKENS')
	if (email) fromEnv.email = email
	if (password) fromEnv.password = password
	if (domain) fromEnv.domain = domain
	if (tokenDir) fromEnv.tokenDir = tokenDir
	if (tokenString) fromEnv.tokenString = tokenString

	const merged: ClientOptions = { ...fromEnv }
	for (const [key, value] of Object.entries(overrides)) {
		if (value !== undefined) Object.assign(merged, { [key]: value })
	}
	return merged
}
