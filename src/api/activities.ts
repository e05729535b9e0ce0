/**
 * Activities: listing, details, edits, file export and upload.
 *
 * @module api/activities
 */

import { type ApiContext, isRecord } from './context.ts'
import { type DateInput, formatDate, today } from './dates.ts'

const SEARCH_PATH = '/activitylist-service/activities/search/activities'

export const DOWNLOAD_FORMATS = {
	original: '/download-service/files/activity',
	tcx: '/download-service/export/tcx/activity',
	gpx: '/download-service/export/gpx/activity',
	kml: '/download-service/export/kml/activity',
	csv: '/download-service/export/csv/activity',
} as const

export type DownloadFormat = keyof typeof DOWNLOAD_FORMATS

export type ActivityId = string | number

export interface ActivityListOptions {
	/** Pagination offset (default: 0) */
	start?: number
	/** Page size (default: 20) */
	limit?: number
	activityType?: string
	sortOrder?: 'asc' | 'desc'
}

const activityPath = (activityId: ActivityId, suffix = ''): string =>
	`/activity-service/activity/${encodeURIComponent(String(activityId))}${suffix}`

export async function activities(ctx: ApiContext, options: ActivityListOptions = {}): Promise<unknown> {
	const { start = 0, limit = 20, activityType, sortOrder = 'desc' } = options
	return ctx.session.get(SEARCH_PATH, { params: { start, limit, activityType, sortOrder } })
}

/** Up to 100 activities between two dates */
export async function activitiesByDate(
	ctx: ApiContext,
	start: DateInput,
	end: DateInput,
	activityType?: string,
): Promise<unknown> {
	return ctx.session.get(SEARCH_PATH, {
		params: { startDate: formatDate(start), endDate: formatDate(end), start: 0, limit: 100, activityType },
	})
}

export async function activityCount(ctx: ApiContext): Promise<unknown> {
	return ctx.session.get('/activitylist-service/activities/count')
}

/** The most recent activity, or undefined when there is none */
export async function lastActivity(ctx: ApiContext): Promise<Record<string, unknown> | undefined> {
	const results = await activities(ctx, { start: 0, limit: 1 })
	if (!Array.isArray(results)) return undefined
	const [first] = results
	return isRecord(first) ? first : undefined
}

export async function activity(ctx: ApiContext, activityId: ActivityId): Promise<unknown> {
	return ctx.session.get(activityPath(activityId))
}

/** Charts and polylines */
export async function activityDetails(
	ctx: ApiContext,
	activityId: ActivityId,
	options: { maxChartSize?: number; maxPolylineSize?: number } = {},
): Promise<unknown> {
	const { maxChartSize = 2000, maxPolylineSize = 4000 } = options
	return ctx.session.get(activityPath(activityId, '/details'), { params: { maxChartSize, maxPolylineSize } })
}

export async function activitySplits(ctx: ApiContext, activityId: ActivityId): Promise<unknown> {
	return ctx.session.get(activityPath(activityId, '/splits'))
}

export async function activityTypedSplits(ctx: ApiContext, activityId: ActivityId): Promise<unknown> {
	return ctx.session.get(activityPath(activityId, '/typedsplits'))
}

export async function activitySplitSummaries(ctx: ApiContext, activityId: ActivityId): Promise<unknown> {
	return ctx.session.get(activityPath(activityId, '/split_summaries'))
}

export async function activityWeather(ctx: ApiContext, activityId: ActivityId): Promise<unknown> {
	return ctx.session.get(activityPath(activityId, '/weather'))
}

export async function activityHrZones(ctx: ApiContext, activityId: ActivityId): Promise<unknown> {
	return ctx.session.get(activityPath(activityId, '/hrTimeInZones'))
}

export async function activityPowerZones(ctx: ApiContext, activityId: ActivityId): Promise<unknown> {
	return ctx.session.get(activityPath(activityId, '/powerTimeInZones'))
}

export async function activityExerciseSets(ctx: ApiContext, activityId: ActivityId): Promise<unknown> {
	return ctx.session.get(activityPath(activityId, '/exerciseSets'))
}

export async function activityTypes(ctx: ApiContext): Promise<unknown> {
	return ctx.session.get('/activity-service/activity/activityTypes')
}

export async function heartRateActivities(ctx: ApiContext, date: DateInput = today()): Promise<unknown> {
	return ctx.session.get(`/mobile-gateway/heartRate/forDate/${formatDate(date)}`)
}

/** Create a manual activity */
export async function createActivity(ctx: ApiContext, payload: Record<string, unknown>): Promise<unknown> {
	return ctx.session.post('/activity-service/activity', { body: payload })
}

export async function renameActivity(ctx: ApiContext, activityId: ActivityId, name: string): Promise<unknown> {
	return ctx.session.put(activityPath(activityId), { body: { activityId, activityName: name } })
}

/**
 * @param activityType - The `activityTypeDTO` object, e.g. `{ typeKey: 'trail_running' }`
 */
export async function updateActivityType(
	ctx: ApiContext,
	activityId: ActivityId,
	activityType: Record<string, unknown>,
): Promise<unknown> {
	return ctx.session.put(activityPath(activityId), { body: { activityId, activityTypeDTO: activityType } })
}

export async function deleteActivity(ctx: ApiContext, activityId: ActivityId): Promise<unknown> {
	return ctx.session.delete(activityPath(activityId))
}

/** Raw file bytes; `original` is the zipped FIT upload */
export async function downloadActivity(
	ctx: ApiContext,
	activityId: ActivityId,
	format: DownloadFormat = 'original',
): Promise<Uint8Array> {
	return ctx.session.download(`${DOWNLOAD_FORMATS[format]}/${encodeURIComponent(String(activityId))}`)
}

/** Upload a FIT, GPX or TCX file */
export async function uploadActivity(ctx: ApiContext, filePath: string): Promise<unknown> {
	return ctx.session.upload('/upload-service/upload', filePath)
}

/**
 * Lifetime progress between two dates, grouped by parent activity type.
 *
 * @param metric - e.g. "distance", "duration", "elevationGain"
 */
export async function progressSummary(
	ctx: ApiContext,
	start: DateInput,
	end: DateInput,
	metric = 'distance',
): Promise<unknown> {
	return ctx.session.get('/fitnessstats-service/activity', {
		params: {
			startDate: formatDate(start),
			endDate: formatDate(end),
			aggregation: 'lifetime',
			groupByParentActivityType: true,
			metric,
		},
	})
}
