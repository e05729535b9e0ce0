/**
 * What endpoint functions need from a logged-in client.
 *
 * @module api/context
 */

import { AuthenticationError } from '../errors/index.ts'
import type { Session } from '../http/session.ts'

/** Account identity fetched after login; any field may be missing */
export interface UserProfile {
	displayName?: string
	fullName?: string
	/** e.g. "metric" or "statute_us" */
	unitSystem?: string
	userProfilePk?: number
}

/**
 * A session plus the cached profile. {@link ConnectClient} implements this;
 * tests can pass a plain object.
 */
export interface ApiContext {
	readonly session: Session
	readonly profile: Readonly<UserProfile>
}

/**
 * The logged-in account's display name.
 *
 * @throws {AuthenticationError} If the profile lookup after login did not yield one
 */
export function requireDisplayName(ctx: ApiContext): string {
	const { displayName } = ctx.profile
	if (!displayName) {
		throw new AuthenticationError('Display name unavailable; the profile lookup after login did not return one', {
			code: 'PROFILE_UNAVAILABLE',
		})
	}
	return displayName
}

/**
 * The logged-in account's numeric profile id.
 *
 * @throws {AuthenticationError} If the profile lookup after login did not yield one
 */
export function requireProfilePk(ctx: ApiContext): number {
	const { userProfilePk } = ctx.profile
	if (userProfilePk === undefined) {
		throw new AuthenticationError('User profile id unavailable; the profile lookup after login did not return one', {
			code: 'PROFILE_UNAVAILABLE',
		})
	}
	return userProfilePk
}

/** Narrow a decoded JSON value to an object */
export function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/** Decoded JSON objects in an array, skipping anything else */
export function recordsOf(value: unknown): Array<Record<string, unknown>> {
	return Array.isArray(value) ? value.filter(isRecord) : []
}
