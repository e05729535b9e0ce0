/**
 * Garmin SSO login and OAuth token exchanges.
 *
 * The login mirrors the mobile app:
 *   1. Load the SSO embed page (establish cookies)
 *   2. Load the signin page (extract the CSRF token)
 *   3. POST email + password
 *   4. Answer the MFA challenge if the page asks for one
 *   5. Extract the SSO ticket from the success page
 *   6. Exchange the ticket for an OAuth1 token (consumer-signed)
 *   7. Exchange the OAuth1 token for an OAuth2 bearer token
 *
 * A refresh runs step 7 alone with an OAuth1 token already held.
 *
 * @module auth/sso
 */

import type { Logger } from '@logtape/logtape'
import { z } from 'zod'
import {
	AuthenticationError,
	LoginError,
	type LoginStep,
	MfaRequiredError,
	TokenExpiredError,
} from '../errors/index.ts'
import {
	API_USER_AGENT,
	apiBaseUrl,
	CONSUMER_URL,
	OAUTH_USER_AGENT,
	ssoBaseUrl,
} from '../http/endpoints.ts'
import { type FetchFn, Transport } from '../http/transport.ts'
import { describeUrl, getConnectLogger } from '../logging/index.ts'
import { CookieJar } from './cookie-jar.ts'
import { type CredentialPair, DEFAULT_DOMAIN, OAuth1Credential, OAuth2Credential } from './credentials.ts'
import type { MfaHandler } from './mfa-prompt.ts'
import { type OAuth1Consumer, signRequest } from './oauth1-signature.ts'

const CSRF_RE = /name="_csrf"\s+value="(.+?)"/
const TITLE_RE = /<title>(.+?)<\/title>/s
const TICKET_RE = /embed\?ticket=([^"]+)"/

const MAX_REDIRECTS = 10

const FORM_CONTENT_TYPE = 'application/x-www-form-urlencoded'

const ConsumerSchema = z.object({
	consumer_key: z.string().min(1),
	consumer_secret: z.string().min(1),
})

const OAuth2ResponseSchema = z.object({
	access_token: z.string().min(1),
	refresh_token: z.string().optional(),
	token_type: z.string().optional(),
	scope: z.string().optional(),
	jti: z.string().optional(),
	expires_in: z.number().int(),
	refresh_token_expires_in: z.number().int().optional(),
})

export interface SsoAuthenticatorOptions {
	/** Injected fetch (default: the global fetch) */
	fetch?: FetchFn
	/** Per-request timeout in ms (default: 10000) */
	timeoutMs?: number
	logger?: Logger
}

export interface LoginInput {
	email: string
	password: string
	/** "garmin.com" (default) or "garmin.cn" */
	domain?: string
	/** Asked for a code when the account has MFA enabled */
	mfaHandler?: MfaHandler
}

/** A fetched SSO page after redirects were followed */
interface SsoPage {
	url: string
	status: number
	html: string
}

/**
 * URL of the SSO embed widget, the cookie bootstrap target.
 */
export function embedUrl(ssoBase: string): string {
	const params = new URLSearchParams({
		id: 'gauth-widget',
		embedWidget: 'true',
		gauthHost: ssoBase,
	})
	return `${ssoBase}/embed?${params}`
}

/**
 * Query parameters shared by the signin page and the MFA verification form.
 */
export function signinParams(ssoBase: string): URLSearchParams {
	const embed = `${ssoBase}/embed`
	return new URLSearchParams({
		id: 'gauth-widget',
		embedWidget: 'true',
		gauthHost: embed,
		service: embed,
		source: embed,
		redirectAfterAccountLoginUrl: embed,
		redirectAfterAccountCreationUrl: embed,
	})
}

export function signinUrl(ssoBase: string): string {
	return `${ssoBase}/signin?${signinParams(ssoBase)}`
}

export function extractCsrf(html: string, step: LoginStep): string {
	const match = CSRF_RE.exec(html)
	if (!match?.[1]) {
		throw new LoginError('Could not extract CSRF token from SSO page', step)
	}
	return match[1]
}

/** Trimmed `<title>` text, or an empty string */
export function extractTitle(html: string): string {
	return TITLE_RE.exec(html)?.[1]?.trim() ?? ''
}

export function extractTicket(html: string): string {
	const match = TICKET_RE.exec(html)
	if (!match?.[1]) {
		throw new LoginError('Could not extract SSO ticket from success page', 'ticket')
	}
	return match[1]
}

/**
 * Cookie-carrying page client for one login attempt. Redirects are followed
 * by hand so the cookies set on every hop land in the jar.
 */
class SsoBrowser {
	private readonly jar = new CookieJar()

	constructor(
		private readonly transport: Transport,
		private readonly logger: Logger,
	) {}

	async request(
		step: LoginStep,
		url: string,
		init: { method?: 'GET' | 'POST'; headers?: Record<string, string>; body?: string } = {},
	): Promise<SsoPage> {
		let method = init.method ?? 'GET'
		let body = init.body
		let current = url

		for (let hop = 0; hop <= MAX_REDIRECTS; hop++) {
			const headers: Record<string, string> = { 'User-Agent': API_USER_AGENT, ...init.headers }
			const cookie = this.jar.header(current)
			if (cookie) headers.Cookie = cookie
			if (body !== undefined) headers['Content-Type'] = FORM_CONTENT_TYPE

			const response = await this.transport.send(current, { method, headers, body, redirect: 'manual' })
			this.jar.store(current, response.headers)

			const location = response.headers.get('location')
			if (response.status >= 300 && response.status < 400 && location) {
				await response.body?.cancel()
				this.logger.debug('SSO {step} redirected to {location}', { step, location: describeUrl(new URL(location, current)) })
				current = new URL(location, current).toString()
				if (response.status === 303 || ((response.status === 301 || response.status === 302) && method === 'POST')) {
					method = 'GET'
					body = undefined
				}
				continue
			}

			const html = await response.text()
			if (response.status >= 400) {
				throw new LoginError(`SSO ${step} request failed: HTTP ${response.status}`, step, {
					status: response.status,
				})
			}
			return { url: current, status: response.status, html }
		}

		throw new LoginError(`SSO ${step} exceeded ${MAX_REDIRECTS} redirects`, step)
	}
}

/**
 * Runs the SSO login and the OAuth exchanges.
 *
 * One authenticator can serve many logins; the consumer key/secret are
 * fetched once and reused.
 *
 * @example
 * ```typescript
 * const sso = new SsoAuthenticator()
 * const { oauth1, oauth2 } = await sso.login({
 *   email: 'athlete@example.com',
 *   password: 'test-password',
 *   mfaHandler: async () => readCodeFromSomewhere(),
 * })
 * ```
 */
export class SsoAuthenticator {
	private readonly transport: Transport
	private readonly logger: Logger
	private consumer?: Promise<OAuth1Consumer>

	constructor(options: SsoAuthenticatorOptions = {}) {
		this.logger = options.logger ?? getConnectLogger('sso')
		// No retries inside the login flow: every step fails at the first unmet precondition
		this.transport = new Transport({ fetch: options.fetch, timeoutMs: options.timeoutMs, retry: false })
	}

	/**
	 * Full login with email and password.
	 *
	 * @throws {MfaRequiredError} If MFA is required and no code was supplied
	 * @throws {LoginError} If a page is missing what the flow expects, or the
	 * final page title is not "Success"
	 * @throws {AuthenticationError} If a token exchange is refused
	 */
	async login(input: LoginInput): Promise<CredentialPair> {
		const domain = input.domain ?? DEFAULT_DOMAIN
		const ssoBase = ssoBaseUrl(domain)
		const browser = new SsoBrowser(this.transport, this.logger)

		this.logger.info('Starting SSO login for {domain}', { domain })

		await browser.request('bootstrap', embedUrl(ssoBase))

		const signin = signinUrl(ssoBase)
		const signinPage = await browser.request('signin-page', signin, {
			headers: { Referer: `${ssoBase}/embed` },
		})
		const csrf = extractCsrf(signinPage.html, 'signin-page')

		let page = await browser.request('credentials', signin, {
			method: 'POST',
			headers: { Referer: signin },
			body: new URLSearchParams({
				username: input.email,
				password: input.password,
				embed: 'true',
				_csrf: csrf,
			}).toString(),
		})
		let title = extractTitle(page.html)

		const mfa = title.toLowerCase().includes('mfa')
		if (mfa) {
			page = await this.answerMfa(browser, page, ssoBase, input.mfaHandler)
			title = extractTitle(page.html)
		}

		if (title !== 'Success') {
			throw new LoginError(`Login failed. Response title: '${title}'`, 'success-check', { title })
		}

		const ticket = extractTicket(page.html)
		const consumer = await this.fetchConsumer()
		const oauth1 = await this.exchangeTicket(ticket, consumer, domain)
		const oauth2 = await this.exchangeOAuth1(oauth1, consumer, domain, false)

		this.logger.info('SSO login succeeded for {domain}', { domain, mfa })
		return { oauth1, oauth2 }
	}

	/**
	 * Mint a fresh OAuth2 credential from an OAuth1 credential, without a login.
	 *
	 * @param domain - Overrides the domain stored on the OAuth1 credential
	 * @throws {TokenExpiredError} If the OAuth1 credential is no longer accepted
	 * @throws {AuthenticationError} If the exchange fails otherwise
	 */
	async refresh(oauth1: OAuth1Credential, domain?: string): Promise<OAuth2Credential> {
		const target = domain ?? oauth1.domain
		this.logger.debug('Refreshing OAuth2 credential for {domain}', { domain: target })
		const consumer = await this.fetchConsumer()
		return this.exchangeOAuth1(oauth1, consumer, target, true)
	}

	private async answerMfa(
		browser: SsoBrowser,
		page: SsoPage,
		ssoBase: string,
		mfaHandler: MfaHandler | undefined,
	): Promise<SsoPage> {
		const csrf = extractCsrf(page.html, 'mfa')
		if (!mfaHandler) {
			throw new MfaRequiredError('MFA code required but no MFA handler was supplied', page.html)
		}

		const code = (await mfaHandler()).trim()
		if (code.length === 0) {
			throw new MfaRequiredError('No MFA code provided', page.html)
		}

		this.logger.debug('Submitting MFA code')
		return browser.request('mfa', `${ssoBase}/verifyMFA/loginEnterMfaCode?${signinParams(ssoBase)}`, {
			method: 'POST',
			headers: { Referer: `${ssoBase}/verifyMFA/loginEnterMfaCode` },
			body: new URLSearchParams({
				'mfa-code': code,
				embed: 'true',
				_csrf: csrf,
				fromPage: 'setupEnterMfaCode',
			}).toString(),
		})
	}

	private fetchConsumer(): Promise<OAuth1Consumer> {
		if (!this.consumer) {
			this.consumer = this.loadConsumer().catch((error: unknown) => {
				// Let the next call try again
				this.consumer = undefined
				throw error
			})
		}
		return this.consumer
	}

	private async loadConsumer(): Promise<OAuth1Consumer> {
		const response = await this.transport.send(CONSUMER_URL)
		if (!response.ok) {
			throw new AuthenticationError('Failed to fetch OAuth consumer credentials', {
				code: 'CONSUMER_FETCH_FAILED',
				context: { status: response.status },
			})
		}

		const parsed = ConsumerSchema.safeParse(await response.json().catch(() => undefined))
		if (!parsed.success) {
			throw new AuthenticationError('OAuth consumer document is malformed', { code: 'CONSUMER_FETCH_FAILED' })
		}
		return { key: parsed.data.consumer_key, secret: parsed.data.consumer_secret }
	}

	private async exchangeTicket(ticket: string, consumer: OAuth1Consumer, domain: string): Promise<OAuth1Credential> {
		const query = new URLSearchParams({
			ticket,
			'login-url': `${ssoBaseUrl(domain)}/embed`,
			'accepts-mfa-tokens': 'true',
		})
		const url = `${apiBaseUrl(domain)}/oauth-service/oauth/preauthorized?${query}`

		const response = await this.transport.send(url, {
			headers: {
				'User-Agent': OAUTH_USER_AGENT,
				Authorization: signRequest({ method: 'GET', url, consumer }),
			},
		})
		const body = await response.text()
		if (response.status !== 200) {
			throw new AuthenticationError(`OAuth1 exchange failed: HTTP ${response.status}`, {
				code: 'OAUTH1_EXCHANGE_FAILED',
				context: { status: response.status },
			})
		}

		// Form-encoded, not JSON
		const data = new URLSearchParams(body)
		const token = data.get('oauth_token')
		const secret = data.get('oauth_token_secret')
		if (!token || !secret) {
			throw new AuthenticationError('OAuth1 exchange response is missing the token', {
				code: 'OAUTH1_EXCHANGE_FAILED',
			})
		}

		return new OAuth1Credential({
			token,
			secret,
			mfaToken: data.get('mfa_token') ?? undefined,
			mfaExpiration: data.get('mfa_expiration_timestamp') ?? undefined,
			domain,
		})
	}

	private async exchangeOAuth1(
		oauth1: OAuth1Credential,
		consumer: OAuth1Consumer,
		domain: string,
		refreshing: boolean,
	): Promise<OAuth2Credential> {
		const url = `${apiBaseUrl(domain)}/oauth-service/oauth/exchange/user/2.0`
		const bodyParams = new URLSearchParams()
		if (oauth1.mfaToken) {
			bodyParams.set('mfa_token', oauth1.mfaToken)
		}

		const response = await this.transport.send(url, {
			method: 'POST',
			headers: {
				'User-Agent': OAUTH_USER_AGENT,
				'Content-Type': FORM_CONTENT_TYPE,
				Authorization: signRequest({
					method: 'POST',
					url,
					consumer,
					token: { token: oauth1.token, secret: oauth1.secret },
					bodyParams,
				}),
			},
			body: bodyParams.toString(),
		})
		const body = await response.text()

		if (response.status === 401 && refreshing) {
			throw new TokenExpiredError('OAuth1 credential was rejected during refresh, log in again', {
				status: response.status,
			})
		}
		if (response.status !== 200) {
			throw new AuthenticationError(`OAuth2 exchange failed: HTTP ${response.status}`, {
				code: 'OAUTH2_EXCHANGE_FAILED',
				context: { status: response.status },
			})
		}

		let json: unknown
		try {
			json = JSON.parse(body)
		} catch {
			json = undefined
		}
		const parsed = OAuth2ResponseSchema.safeParse(json)
		if (!parsed.success) {
			throw new AuthenticationError('OAuth2 exchange response is malformed', { code: 'OAUTH2_EXCHANGE_FAILED' })
		}

		const data = parsed.data
		return new OAuth2Credential({
			accessToken: data.access_token,
			refreshToken: data.refresh_token,
			tokenType: data.token_type,
			scope: data.scope,
			jti: data.jti,
			expiresIn: data.expires_in,
			refreshTokenExpiresIn: data.refresh_token_expires_in,
		})
	}
}
