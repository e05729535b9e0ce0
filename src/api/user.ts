/**
 * User profile and settings.
 *
 * @module api/user
 */

import { type ApiContext, requireDisplayName } from './context.ts'

/** Settings including `userData.measurementSystem` and the numeric `id` */
export async function userSettings(ctx: ApiContext): Promise<unknown> {
	return ctx.session.get('/userprofile-service/userprofile/user-settings')
}

/** Profile configuration */
export async function userProfile(ctx: ApiContext): Promise<unknown> {
	return ctx.session.get('/userprofile-service/userprofile/settings')
}

/** Social profile: `displayName`, `fullName`, `profileId` */
export async function socialProfile(ctx: ApiContext): Promise<unknown> {
	return ctx.session.get('/userprofile-service/userprofile/profile')
}

/**
 * Personal information for a display name (default: the logged-in account).
 */
export async function personalInformation(ctx: ApiContext, displayName?: string): Promise<unknown> {
	const name = displayName ?? requireDisplayName(ctx)
	return ctx.session.get(`/userprofile-service/userprofile/personal-information/${encodeURIComponent(name)}`)
}
