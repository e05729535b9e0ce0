/**
 * Authenticated API session.
 *
 * A {@link Session} owns the live credential pair. Before every call it
 * checks the OAuth2 credential; an expired one is refreshed through the
 * injected {@link CredentialRefresher} and, when a token directory is
 * configured, only the new OAuth2 credential is written back. Concurrent
 * calls that find the credential expired share one refresh.
 *
 * @module http/session
 */

import { readFile } from 'node:fs/promises'
import { basename } from 'node:path'
import type { Logger } from '@logtape/logtape'
import { saveOAuth2Credential } from '../auth/credential-store.ts'
import { type CredentialPair, DEFAULT_DOMAIN, type OAuth1Credential, type OAuth2Credential } from '../auth/credentials.ts'
import { SingleFlight } from '../concurrency/single-flight.ts'
import { isConnectError } from '../errors/index.ts'
import { createCorrelationId, getConnectLogger } from '../logging/index.ts'
import { API_USER_AGENT, apiBaseUrl } from './endpoints.ts'
import { assertOk, parseBody } from './response.ts'
import { type FetchFn, Transport, type TransportRetryOptions } from './transport.ts'

/**
 * Mints a new OAuth2 credential from the OAuth1 credential.
 * {@link SsoAuthenticator} is the production implementation.
 */
export interface CredentialRefresher {
	refresh(oauth1: OAuth1Credential, domain?: string): Promise<OAuth2Credential>
}

/** Query string values; `undefined` and `null` entries are skipped, arrays repeat the key */
export type QueryValue = string | number | boolean | null | undefined | ReadonlyArray<string | number>
export type QueryParams = Record<string, QueryValue>

export interface RequestOptions {
	params?: QueryParams
	headers?: Record<string, string>
}

export interface BodyRequestOptions extends RequestOptions {
	/** JSON-serialized unless already a string */
	body?: unknown
}

export interface UploadOptions extends RequestOptions {
	/** File name sent in the multipart part (default: the path's base name) */
	fileName?: string
}

export interface SessionOptions {
	credentials: CredentialPair
	refresher: CredentialRefresher
	/** Regional domain (default: "garmin.com") */
	domain?: string
	/** Directory refreshed OAuth2 credentials are written to; unset disables persistence */
	tokenDir?: string
	fetch?: FetchFn
	timeoutMs?: number
	retry?: TransportRetryOptions | false
	sleep?: (ms: number) => Promise<void>
	logger?: Logger
}

type Method = 'GET' | 'POST' | 'PUT' | 'DELETE'

export class Session {
	readonly domain: string
	readonly tokenDir?: string
	private pair: CredentialPair
	private readonly refresher: CredentialRefresher
	private readonly transport: Transport
	private readonly flight = new SingleFlight<'oauth2', OAuth2Credential>()
	private readonly logger: Logger

	constructor(options: SessionOptions) {
		this.pair = options.credentials
		this.refresher = options.refresher
		this.domain = options.domain ?? DEFAULT_DOMAIN
		this.tokenDir = options.tokenDir
		this.logger = options.logger ?? getConnectLogger('session')
		this.transport = new Transport({
			fetch: options.fetch,
			timeoutMs: options.timeoutMs,
			retry: options.retry,
			sleep: options.sleep,
		})
	}

	/** The live credential pair */
	get credentials(): CredentialPair {
		return this.pair
	}

	/** `https://connectapi.<domain>` */
	get baseUrl(): string {
		return apiBaseUrl(this.domain)
	}

	get(path: string, options: RequestOptions = {}): Promise<unknown> {
		return this.request('GET', path, options)
	}

	post(path: string, options: BodyRequestOptions = {}): Promise<unknown> {
		return this.request('POST', path, options)
	}

	put(path: string, options: BodyRequestOptions = {}): Promise<unknown> {
		return this.request('PUT', path, options)
	}

	delete(path: string, options: RequestOptions = {}): Promise<unknown> {
		return this.request('DELETE', path, options)
	}

	/**
	 * Fetch raw bytes (FIT, GPX, TCX and KML exports).
	 */
	async download(path: string, options: RequestOptions = {}): Promise<Uint8Array> {
		const response = await this.send('GET', path, options, undefined)
		return new Uint8Array(await response.arrayBuffer())
	}

	/**
	 * Upload a file as the multipart field `file`.
	 *
	 * @example
	 * ```typescript
	 * await session.upload('/upload-service/upload', './morning-run.fit')
	 * ```
	 */
	async upload(path: string, filePath: string, options: UploadOptions = {}): Promise<unknown> {
		const bytes = await readFile(filePath)
		const form = new FormData()
		form.append('file', new Blob([bytes]), options.fileName ?? basename(filePath))
		const response = await this.send('POST', path, options, form)
		return parseBody(response)
	}

	/**
	 * Force an OAuth2 refresh, whether or not the current credential expired.
	 */
	refresh(): Promise<OAuth2Credential> {
		return this.flight.run('oauth2', () => this.performRefresh(createCorrelationId()))
	}

	private async request(method: Method, path: string, options: BodyRequestOptions): Promise<unknown> {
		const response = await this.send(method, path, options, encodeBody(options.body))
		return parseBody(response)
	}

	private async send(
		method: Method,
		path: string,
		options: RequestOptions,
		body: string | FormData | undefined,
	): Promise<Response> {
		const cid = createCorrelationId()
		const oauth2 = await this.ensureFresh(cid)

		const headers: Record<string, string> = {
			'User-Agent': API_USER_AGENT,
			Accept: 'application/json',
			Authorization: oauth2.authorizationValue(),
			...options.headers,
		}
		if (typeof body === 'string') {
			headers['Content-Type'] = 'application/json'
		}

		const url = this.buildUrl(path, options.params)
		const started = Date.now()
		const response = await this.transport.send(url, { method, headers, body, cid })
		const durationMs = Date.now() - started

		if (!response.ok) {
			this.logger.warn('{method} {path} failed with HTTP {status}', {
				cid,
				method,
				path,
				status: response.status,
				durationMs,
			})
		} else {
			this.logger.debug('{method} {path} returned {status}', { cid, method, path, status: response.status, durationMs })
		}

		await assertOk(response)
		return response
	}

	private async ensureFresh(cid: string): Promise<OAuth2Credential> {
		if (!this.pair.oauth2.expired()) {
			return this.pair.oauth2
		}
		return this.flight.run('oauth2', () => this.performRefresh(cid))
	}

	private async performRefresh(cid: string): Promise<OAuth2Credential> {
		this.logger.info('Refreshing OAuth2 credential', { cid, domain: this.domain })
		let oauth2: OAuth2Credential
		try {
			oauth2 = await this.refresher.refresh(this.pair.oauth1, this.domain)
		} catch (error) {
			this.logger.error('OAuth2 refresh failed', {
				cid,
				code: isConnectError(error) ? error.code : undefined,
				error: error instanceof Error ? error.message : String(error),
			})
			throw error
		}

		this.pair = { oauth1: this.pair.oauth1, oauth2 }
		if (this.tokenDir) {
			saveOAuth2Credential(this.tokenDir, oauth2)
		}
		return oauth2
	}

	private buildUrl(path: string, params: QueryParams | undefined): string {
		const url = new URL(path, this.baseUrl)
		for (const [key, value] of Object.entries(params ?? {})) {
			if (value === undefined || value === null) continue
			if (Array.isArray(value)) {
				for (const item of value) url.searchParams.append(key, String(item))
			} else {
				url.searchParams.append(key, String(value))
			}
		}
		return url.toString()
	}
}

function encodeBody(body: unknown): string | undefined {
	if (body === undefined || body === null) return undefined
	return typeof body === 'string' ? body : JSON.stringify(body)
}
