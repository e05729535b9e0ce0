/**
 * Badges, challenges, personal records and goals.
 *
 * @module api/badges
 */

import { type ApiContext, recordsOf, requireDisplayName } from './context.ts'

export interface PageOptions {
	/** Pagination offset (default: 0) */
	start?: number
	/** Page size (default: 20) */
	limit?: number
}

const page = ({ start = 0, limit = 20 }: PageOptions) => ({ start, limit })

export async function earnedBadges(ctx: ApiContext): Promise<unknown> {
	return ctx.session.get('/badge-service/badge/earned')
}

export async function availableBadges(ctx: ApiContext): Promise<unknown> {
	return ctx.session.get('/badge-service/badge/available', { params: { showExclusiveBadge: true } })
}

/**
 * Available badges that have not been earned yet. Empty unless both lists
 * come back as arrays.
 */
export async function inProgressBadges(ctx: ApiContext): Promise<Array<Record<string, unknown>>> {
	const earned = await earnedBadges(ctx)
	const available = await availableBadges(ctx)
	if (!Array.isArray(earned) || !Array.isArray(available)) return []

	const earnedIds = new Set<unknown>(
		recordsOf(earned)
			.map((badge) => badge.badgeId)
			.filter((id) => id !== undefined && id !== null),
	)
	return recordsOf(available).filter((badge) => !earnedIds.has(badge.badgeId))
}

export async function adhocChallenges(ctx: ApiContext, options: PageOptions = {}): Promise<unknown> {
	return ctx.session.get('/adhocchallenge-service/adHocChallenge/historical', { params: page(options) })
}

/** Completed badge challenges */
export async function badgeChallenges(ctx: ApiContext, options: PageOptions = {}): Promise<unknown> {
	return ctx.session.get('/badgechallenge-service/badgeChallenge/completed', { params: page(options) })
}

export async function availableBadgeChallenges(ctx: ApiContext, options: PageOptions = {}): Promise<unknown> {
	return ctx.session.get('/badgechallenge-service/badgeChallenge/available', { params: page(options) })
}

export async function nonCompletedBadgeChallenges(ctx: ApiContext, options: PageOptions = {}): Promise<unknown> {
	return ctx.session.get('/badgechallenge-service/badgeChallenge/non-completed', { params: page(options) })
}

/** In-progress virtual challenges */
export async function virtualChallenges(ctx: ApiContext, options: PageOptions = {}): Promise<unknown> {
	return ctx.session.get('/badgechallenge-service/virtualChallenge/inProgress', { params: page(options) })
}

export async function personalRecords(ctx: ApiContext, displayName?: string): Promise<unknown> {
	const name = displayName ?? requireDisplayName(ctx)
	return ctx.session.get(`/personalrecord-service/personalrecord/prs/${encodeURIComponent(name)}`)
}

export async function goals(
	ctx: ApiContext,
	options: PageOptions & { status?: 'active' | 'future' | 'past' } = {},
): Promise<unknown> {
	return ctx.session.get('/goal-service/goal/goals', {
		params: { status: options.status ?? 'active', ...page(options), sortOrder: 'asc' },
	})
}
