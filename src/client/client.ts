/**
 * Client: decides how to obtain a session and caches the account identity
 * endpoint functions need.
 *
 * @module client/client
 */

import { existsSync } from 'node:fs'
import type { Logger } from '@logtape/logtape'
import { type ApiContext, isRecord, type UserProfile } from '../api/context.ts'
import { socialProfile, userSettings } from '../api/user.ts'
import {
	clearCredentials,
	dumpCredentials as encodeCredentials,
	loadCredentials,
	parseCredentials,
	saveCredentials as writeCredentials,
} from '../auth/credential-store.ts'
import type { CredentialPair } from '../auth/credentials.ts'
import { createStdinMfaPrompt } from '../auth/mfa-prompt.ts'
import { SsoAuthenticator } from '../auth/sso.ts'
import { AuthenticationError, ConnectError, HTTPError, isConnectError } from '../errors/index.ts'
import { Session } from '../http/session.ts'
import { getConnectLogger } from '../logging/index.ts'
import { type ClientOptions, DEFAULT_TOKEN_DIR, type ResolvedOptions, resolveOptions } from './options.ts'

/** A non-empty string field, or undefined */
function textField(record: Record<string, unknown>, key: string): string | undefined {
	const value = record[key]
	return typeof value === 'string' && value !== '' ? value : undefined
}

/** A numeric id, also accepted as a string of digits */
function idField(record: Record<string, unknown>, key: string): number | undefined {
	const value = record[key]
	if (typeof value === 'number' && Number.isSafeInteger(value)) return value
	if (typeof value === 'string' && /^\d+$/.test(value)) return Number(value)
	return undefined
}

function recordOf(value: unknown): Record<string, unknown> {
	return isRecord(value) ? value : {}
}

/** Where the credentials of the current session came from */
export type CredentialSource = 'token-string' | 'token-dir' | 'login'

/**
 * Logged-in Garmin Connect client.
 *
 * `login()` tries, in order: the token string, the token directory (when it
 * exists), then an SSO login with email and password. A resume that fails
 * with a library error falls through to the email/password path.
 *
 * @example
 * ```typescript
 * const client = new ConnectClient({ email, password })
 * await client.login()
 * const summary = await dailySummary(client)
 * ```
 */
export class ConnectClient implements ApiContext {
	private readonly options: ResolvedOptions
	private readonly authenticator: SsoAuthenticator
	private readonly logger: Logger
	private domain: string
	private current?: Session
	private identity: UserProfile = {}
	private source?: CredentialSource

	constructor(options: ClientOptions = {}) {
		this.options = resolveOptions(options)
		this.domain = this.options.domain
		this.logger = getConnectLogger('client')
		this.authenticator = new SsoAuthenticator({ fetch: this.options.fetch, timeoutMs: this.options.timeoutMs })
	}

	/** A session exists and holds an OAuth2 credential; no request is made */
	get authenticated(): boolean {
		return this.current !== undefined
	}

	/**
	 * The live session.
	 *
	 * @throws {AuthenticationError} Before `login()` or after `logout()`
	 */
	get session(): Session {
		if (!this.current) {
			throw new AuthenticationError('Not logged in; call login() first', { code: 'NOT_AUTHENTICATED' })
		}
		return this.current
	}

	get profile(): Readonly<UserProfile> {
		return this.identity
	}

	/** Undefined until logged in */
	get credentialSource(): CredentialSource | undefined {
		return this.source
	}

	/**
	 * Obtain a session from stored credentials or a fresh SSO login, then
	 * fetch the account profile.
	 *
	 * @throws {AuthenticationError} If nothing can be resumed and no email and password were given
	 * @throws {LoginError} If the SSO login fails
	 */
	async login(): Promise<this> {
		const resumed = this.resume()
		if (resumed) {
			this.domain = resumed.pair.oauth1.domain
			this.open(resumed.pair, resumed.source)
			await this.loadProfile()
			return this
		}

		const { email, password } = this.options
		if (!email || !password) {
			throw new AuthenticationError('No credentials or saved tokens available', { code: 'NO_CREDENTIALS' })
		}

		this.logger.info('Logging in with email and password', { domain: this.domain })
		const pair = await this.authenticator.login({
			email,
			password,
			domain: this.domain,
			mfaHandler: this.options.mfaHandler ?? createStdinMfaPrompt(),
		})
		this.open(pair, 'login')
		if (this.options.tokenDir) {
			this.saveCredentials()
		}
		await this.loadProfile()
		return this
	}

	/**
	 * Drop the session and profile. Stored tokens stay unless `forget` is set,
	 * which also removes the token files from the configured directory. The
	 * server side is untouched either way.
	 */
	logout(options: { forget?: boolean } = {}): void {
		if (options.forget && this.options.tokenDir) {
			clearCredentials(this.options.tokenDir)
		}
		this.current = undefined
		this.identity = {}
		this.source = undefined
		this.logger.info('Logged out')
	}

	/**
	 * Write the current credentials to `directory` (default: the configured
	 * token directory, or `~/.garminconnect`).
	 *
	 * @returns The directory written to
	 */
	saveCredentials(directory?: string): string {
		const target = directory ?? this.options.tokenDir ?? DEFAULT_TOKEN_DIR
		return writeCredentials(target, this.requirePair('No tokens to save'))
	}

	/** The current credentials as a base64 token string */
	dumpCredentials(): string {
		return encodeCredentials(this.requirePair('No tokens to dump'))
	}

	private requirePair(message: string): CredentialPair {
		if (!this.current) {
			throw new ConnectError(message, { category: 'AUTHENTICATION', code: 'NO_TOKENS' })
		}
		return this.current.credentials
	}

	private resume(): { pair: CredentialPair; source: CredentialSource } | undefined {
		const { tokenString, tokenDir } = this.options
		try {
			if (tokenString) {
				return { pair: parseCredentials(tokenString), source: 'token-string' }
			}
			if (tokenDir && existsSync(tokenDir)) {
				return { pair: loadCredentials(tokenDir), source: 'token-dir' }
			}
		} catch (error) {
			if (!isConnectError(error)) throw error
			this.logger.warn('Could not resume from stored credentials: {error}', { code: error.code, error: error.message })
		}
		return undefined
	}

	private open(pair: CredentialPair, source: CredentialSource): void {
		this.current = new Session({
			credentials: pair,
			refresher: this.authenticator,
			domain: this.domain,
			tokenDir: this.options.tokenDir ?? undefined,
			fetch: this.options.fetch,
			timeoutMs: this.options.timeoutMs,
			retry: this.options.retry,
			sleep: this.options.sleep,
		})
		this.identity = {}
		this.source = source
		this.logger.info('Session ready from {source}', { source, domain: this.domain })
	}

	/**
	 * Fetch settings and the social profile. An HTTP error leaves the profile
	 * partly filled; anything else propagates.
	 */
	private async loadProfile(): Promise<void> {
		try {
			const settings = recordOf(await userSettings(this))
			this.identity = { unitSystem: textField(recordOf(settings.userData), 'measurementSystem') }

			// Fields are read independently of one another
			const profile = recordOf(await socialProfile(this))
			this.identity = {
				...this.identity,
				displayName:
					textField(profile, 'displayName') ??
					textField(recordOf(profile.socialProfile), 'displayName') ??
					textField(profile, 'userName'),
				fullName: textField(profile, 'fullName'),
				userProfilePk: idField(profile, 'profileId') ?? idField(settings, 'id'),
			}
		} catch (error) {
			if (!(error instanceof HTTPError)) throw error
			this.logger.warn('Profile lookup failed with HTTP {status}; display name unavailable', {
				status: error.status,
			})
		}
	}
}

/**
 * Create a client and log in.
 *
 * @example
 * ```typescript
 * const client = await login({ tokenString: process.env.GARMIN_TOKENS })
 * ```
 */
export async function login(options: ClientOptions = {}): Promise<ConnectClient> {
	return new ConnectClient(options).login()
}
