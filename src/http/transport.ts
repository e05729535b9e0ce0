/**
 * Timed, retrying fetch.
 *
 * Every outbound request goes through a {@link Transport}: it applies the
 * per-request timeout, retries network failures and transient statuses with
 * exponential backoff, and turns an exhausted network failure into a
 * {@link NetworkError}. A transient status that is still failing after the
 * last attempt is returned as-is, so the caller classifies it like any other
 * response.
 *
 * @module http/transport
 */

import type { Logger } from '@logtape/logtape'
import { NetworkError } from '../errors/index.ts'
import { describeUrl, getConnectLogger } from '../logging/index.ts'
import { retry } from '../utils/retry.ts'
import { getErrorMessage } from '../utils/string.ts'
import { DEFAULT_TIMEOUT_MS } from './endpoints.ts'

/** The `fetch` signature the transport depends on */
export type FetchFn = (input: string | URL, init?: RequestInit) => Promise<Response>

/** Statuses retried by default */
export const RETRY_STATUSES: readonly number[] = [408, 500, 502, 503, 504]

export interface TransportRetryOptions {
	/** Attempts including the first (default: 4) */
	maxAttempts?: number
	/** Delay before the first retry in ms (default: 500) */
	initialDelayMs?: number
	/** Upper bound for a single delay in ms (default: 10000) */
	maxDelayMs?: number
	/** Backoff multiplier (default: 2) */
	backoff?: number
	/** Random jitter on each delay (default: false) */
	jitter?: boolean
	/** Statuses worth another attempt (default: {@link RETRY_STATUSES}) */
	statuses?: readonly number[]
}

export interface TransportOptions {
	/** Injected fetch (default: the global fetch) */
	fetch?: FetchFn
	/** Per-attempt timeout in ms (default: 10000) */
	timeoutMs?: number
	/** Retry settings, or false for a single attempt */
	retry?: TransportRetryOptions | false
	/** Delay implementation; tests pass one that resolves immediately */
	sleep?: (ms: number) => Promise<void>
	logger?: Logger
}

export interface SendOptions extends Omit<RequestInit, 'signal'> {
	/** Correlation id for log entries */
	cid?: string
}

/** Thrown inside the retry loop to ask for another attempt on a status; never escapes */
class RetryableStatus extends Error {
	constructor(readonly status: number) {
		super(`Retryable status ${status}`)
		this.name = 'RetryableStatus'
	}
}

export class Transport {
	private readonly fetchFn: FetchFn
	private readonly timeoutMs: number
	private readonly retryOptions: Required<TransportRetryOptions>
	private readonly sleep?: (ms: number) => Promise<void>
	private readonly logger: Logger

	constructor(options: TransportOptions = {}) {
		this.fetchFn = options.fetch ?? ((input, init) => fetch(input, init))
		this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS
		const retryOptions: TransportRetryOptions = options.retry === false ? { maxAttempts: 1 } : (options.retry ?? {})
		this.retryOptions = {
			maxAttempts: retryOptions.maxAttempts ?? 4,
			initialDelayMs: retryOptions.initialDelayMs ?? 500,
			maxDelayMs: retryOptions.maxDelayMs ?? 10_000,
			backoff: retryOptions.backoff ?? 2,
			jitter: retryOptions.jitter ?? false,
			statuses: retryOptions.statuses ?? RETRY_STATUSES,
		}
		this.sleep = options.sleep
		this.logger = options.logger ?? getConnectLogger('transport')
	}

	/**
	 * Send a request, retrying transient failures.
	 *
	 * @throws {NetworkError} If the request could not complete on any attempt
	 */
	async send(url: string | URL, options: SendOptions = {}): Promise<Response> {
		const { cid, ...init } = options
		const { maxAttempts, statuses } = this.retryOptions
		const method = init.method ?? 'GET'
		const target = describeUrl(url)

		try {
			return await retry(
				async (attempt) => {
					let response: Response
					try {
						response = await this.fetchFn(url, { ...init, signal: AbortSignal.timeout(this.timeoutMs) })
					} catch (error) {
						throw new NetworkError(
							`${method} ${target} failed: ${getErrorMessage(error)}`,
							{ method, url: target, attempt },
							error instanceof Error ? error : undefined,
						)
					}

					if (statuses.includes(response.status) && attempt < maxAttempts) {
						await response.body?.cancel()
						throw new RetryableStatus(response.status)
					}
					return response
				},
				{
					maxAttempts,
					initialDelay: this.retryOptions.initialDelayMs,
					maxDelay: this.retryOptions.maxDelayMs,
					backoff: this.retryOptions.backoff,
					jitter: this.retryOptions.jitter,
					shouldRetry: (error) => error instanceof RetryableStatus || error instanceof NetworkError,
					onRetry: (error, attempt, delayMs) => {
						this.logger.warn('Retrying {method} {url} after attempt {attempt}: {reason}', {
							cid,
							method,
							url: target,
							attempt,
							delayMs,
							reason: error.message,
						})
					},
					sleep: this.sleep,
				},
			)
		} catch (error) {
			if (error instanceof NetworkError) {
				this.logger.error('{method} {url} failed after retries', { cid, method, url: target, error: error.message })
			}
			throw error
		}
	}
}
