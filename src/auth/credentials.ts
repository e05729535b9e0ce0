/**
 * OAuth credential value objects.
 *
 * In memory the two credential kinds are plain immutable classes with
 * camelCase fields. The snake_case key names shared with the peer
 * implementation only exist at the serialization boundary
 * ({@link OAuth1Credential.toMap}, {@link OAuth2Credential.fromMap}).
 *
 * @module auth/credentials
 */

import { z } from 'zod'
import { CredentialFormatError } from '../errors/index.ts'
import { titleCase } from '../utils/string.ts'

/** Default (global) domain */
export const DEFAULT_DOMAIN = 'garmin.com'

/** Default OAuth2 lifetime when a stored map carries no expires_in */
const DEFAULT_EXPIRES_IN = 3600

function nowSeconds(): number {
	return Math.floor(Date.now() / 1000)
}

const optionalString = z.string().nullish()
const optionalInt = z.number().int().nullish()

/**
 * Serialized OAuth1 credential. Key names are a compatibility contract with
 * the peer implementation and must not change.
 */
export const OAuth1MapSchema = z.object({
	oauth_token: z.string().min(1),
	oauth_token_secret: z.string().min(1),
	mfa_token: optionalString,
	mfa_expiration_timestamp: optionalString,
	domain: optionalString,
})

export type OAuth1Map = z.input<typeof OAuth1MapSchema>

/**
 * Serialized OAuth2 credential. Key names are a compatibility contract with
 * the peer implementation and must not change.
 */
export const OAuth2MapSchema = z.object({
	access_token: z.string().min(1),
	refresh_token: optionalString,
	token_type: optionalString,
	scope: optionalString,
	jti: optionalString,
	expires_in: optionalInt,
	expires_at: optionalInt,
	refresh_token_expires_in: optionalInt,
	refresh_token_expires_at: optionalInt,
})

export type OAuth2Map = z.input<typeof OAuth2MapSchema>

function parseMap<T extends z.ZodTypeAny>(schema: T, data: unknown, kind: string): z.output<T> {
	const result = schema.safeParse(data)
	if (!result.success) {
		const issue = result.error.issues[0]
		const where = issue?.path.join('.') || '(root)'
		throw new CredentialFormatError(`Invalid ${kind} credential: ${where}: ${issue?.message ?? 'invalid'}`, {
			kind,
			field: where,
		})
	}
	return result.data
}

export interface OAuth1CredentialInit {
	token: string
	secret: string
	/** Set only when MFA was used during the ticket exchange */
	mfaToken?: string
	mfaExpiration?: string
	/** Regional domain, e.g. "garmin.com" or "garmin.cn" */
	domain?: string
}

/**
 * Long-lived (~1 year) OAuth1 token/secret pair obtained by exchanging an SSO
 * ticket. Used only to mint OAuth2 credentials.
 */
export class OAuth1Credential {
	readonly token: string
	readonly secret: string
	readonly mfaToken?: string
	readonly mfaExpiration?: string
	readonly domain: string

	constructor(init: OAuth1CredentialInit) {
		this.token = init.token
		this.secret = init.secret
		this.mfaToken = init.mfaToken
		this.mfaExpiration = init.mfaExpiration
		this.domain = init.domain ?? DEFAULT_DOMAIN
		Object.freeze(this)
	}

	toMap(): OAuth1Map {
		return {
			oauth_token: this.token,
			oauth_token_secret: this.secret,
			mfa_token: this.mfaToken ?? null,
			mfa_expiration_timestamp: this.mfaExpiration ?? null,
			domain: this.domain,
		}
	}

	/**
	 * @throws {CredentialFormatError} If the map lacks the token or secret
	 */
	static fromMap(data: unknown): OAuth1Credential {
		const map = parseMap(OAuth1MapSchema, data, 'OAuth1')
		return new OAuth1Credential({
			token: map.oauth_token,
			secret: map.oauth_token_secret,
			mfaToken: map.mfa_token ?? undefined,
			mfaExpiration: map.mfa_expiration_timestamp ?? undefined,
			domain: map.domain ?? undefined,
		})
	}
}

export interface OAuth2CredentialInit {
	accessToken: string
	refreshToken?: string
	tokenType?: string
	scope?: string
	jti?: string
	/** Lifetime in seconds (default 3600) */
	expiresIn?: number
	/** Absolute expiry, epoch seconds. Derived from expiresIn when absent. */
	expiresAt?: number
	refreshTokenExpiresIn?: number
	refreshTokenExpiresAt?: number
}

/**
 * Short-lived (~20 hours) bearer token used to authorize API calls.
 *
 * Immutable: a refresh produces a new instance.
 */
export class OAuth2Credential {
	readonly accessToken: string
	readonly refreshToken?: string
	readonly tokenType: string
	readonly scope?: string
	readonly jti?: string
	readonly expiresIn: number
	readonly expiresAt: number
	readonly refreshTokenExpiresIn?: number
	readonly refreshTokenExpiresAt?: number

	constructor(init: OAuth2CredentialInit) {
		const now = nowSeconds()
		this.accessToken = init.accessToken
		this.refreshToken = init.refreshToken
		this.tokenType = init.tokenType ?? 'Bearer'
		this.scope = init.scope
		this.jti = init.jti
		this.expiresIn = init.expiresIn ?? DEFAULT_EXPIRES_IN
		this.expiresAt = init.expiresAt ?? now + this.expiresIn
		this.refreshTokenExpiresIn = init.refreshTokenExpiresIn
		this.refreshTokenExpiresAt =
			init.refreshTokenExpiresAt ??
			(init.refreshTokenExpiresIn === undefined ? undefined : now + init.refreshTokenExpiresIn)
		Object.freeze(this)
	}

	/**
	 * True once the current time reaches `expiresAt`. Evaluated on every call.
	 *
	 * @param now - Epoch seconds (defaults to the current time)
	 */
	expired(now: number = nowSeconds()): boolean {
		return now >= this.expiresAt
	}

	/**
	 * True once the refresh token's expiry has passed; false when unknown.
	 */
	refreshExpired(now: number = nowSeconds()): boolean {
		return this.refreshTokenExpiresAt !== undefined && now >= this.refreshTokenExpiresAt
	}

	/** Seconds left before expiry (negative once expired). */
	secondsUntilExpiry(now: number = nowSeconds()): number {
		return this.expiresAt - now
	}

	/**
	 * `Authorization` header value, e.g. `Bearer eyJ...`.
	 */
	authorizationValue(): string {
		return `${titleCase(this.tokenType)} ${this.accessToken}`
	}

	toString(): string {
		return this.authorizationValue()
	}

	toMap(): OAuth2Map {
		return {
			access_token: this.accessToken,
			refresh_token: this.refreshToken ?? null,
			token_type: this.tokenType,
			scope: this.scope ?? null,
			jti: this.jti ?? null,
			expires_in: this.expiresIn,
			expires_at: this.expiresAt,
			refresh_token_expires_in: this.refreshTokenExpiresIn ?? null,
			refresh_token_expires_at: this.refreshTokenExpiresAt ?? null,
		}
	}

	/**
	 * @throws {CredentialFormatError} If the map lacks the access token or
	 * carries non-integer timing fields
	 */
	static fromMap(data: unknown): OAuth2Credential {
		const map = parseMap(OAuth2MapSchema, data, 'OAuth2')
		return new OAuth2Credential({
			accessToken: map.access_token,
			refreshToken: map.refresh_token ?? undefined,
			tokenType: map.token_type ?? undefined,
			scope: map.scope ?? undefined,
			jti: map.jti ?? undefined,
			expiresIn: map.expires_in ?? undefined,
			expiresAt: map.expires_at ?? undefined,
			refreshTokenExpiresIn: map.refresh_token_expires_in ?? undefined,
			refreshTokenExpiresAt: map.refresh_token_expires_at ?? undefined,
		})
	}
}

/**
 * The (OAuth1, OAuth2) pair: the unit of persistence and of being logged in.
 */
export interface CredentialPair {
	readonly oauth1: OAuth1Credential
	readonly oauth2: OAuth2Credential
}
