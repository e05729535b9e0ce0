/**
 * Training metrics, scores, biometrics and long-range trends.
 *
 * @module api/metrics
 */

import { type ApiContext, isRecord, requireDisplayName } from './context.ts'
import { chunkedRequest, type DateInput, formatDate, today } from './dates.ts'

/** Daily steps are served at most this many days per request */
export const DAILY_STEPS_MAX_DAYS = 28

/** Either one day or an inclusive range */
export interface ScoreQuery {
	date?: DateInput
	start?: DateInput
	end?: DateInput
	aggregation?: 'daily' | 'weekly'
}

/** VO2 max */
export async function maxMetrics(ctx: ApiContext, date: DateInput = today()): Promise<unknown> {
	const day = formatDate(date)
	return ctx.session.get(`/metrics-service/metrics/maxmet/daily/${day}/${day}`)
}

export async function trainingReadiness(ctx: ApiContext, date: DateInput = today()): Promise<unknown> {
	return ctx.session.get(`/metrics-service/metrics/trainingreadiness/${formatDate(date)}`)
}

/**
 * Training readiness entries for `date` only. A non-array response is
 * returned as is.
 */
export async function morningTrainingReadiness(ctx: ApiContext, date: DateInput = today()): Promise<unknown> {
	const day = formatDate(date)
	const data = await trainingReadiness(ctx, day)
	if (!Array.isArray(data)) return data
	return data.filter((entry) => isRecord(entry) && entry.calendarDate === day)
}

export async function trainingStatus(ctx: ApiContext, date: DateInput = today()): Promise<unknown> {
	return ctx.session.get(`/metrics-service/metrics/trainingstatus/aggregated/${formatDate(date)}`)
}

function score(
	ctx: ApiContext,
	base: string,
	query: ScoreQuery,
	defaultAggregation: 'daily' | 'weekly',
): Promise<unknown> {
	if (query.start !== undefined && query.end !== undefined) {
		return ctx.session.get(`${base}/stats`, {
			params: {
				startDate: formatDate(query.start),
				endDate: formatDate(query.end),
				aggregation: query.aggregation ?? defaultAggregation,
			},
		})
	}
	return ctx.session.get(base, { params: { calendarDate: formatDate(query.date ?? today()) } })
}

/** Endurance score for a day, or weekly stats over a range */
export async function enduranceScore(ctx: ApiContext, query: ScoreQuery = {}): Promise<unknown> {
	return score(ctx, '/metrics-service/metrics/endurancescore', query, 'weekly')
}

/** Hill score for a day, or daily stats over a range */
export async function hillScore(ctx: ApiContext, query: ScoreQuery = {}): Promise<unknown> {
	return score(ctx, '/metrics-service/metrics/hillscore', query, 'daily')
}

/**
 * Race time predictions. Without a full `type`/`start`/`end` triple the
 * latest prediction is returned.
 */
export async function racePredictions(
	ctx: ApiContext,
	query: { type?: 'daily' | 'monthly'; start?: DateInput; end?: DateInput } = {},
): Promise<unknown> {
	const name = encodeURIComponent(requireDisplayName(ctx))
	if (query.type && query.start !== undefined && query.end !== undefined) {
		return ctx.session.get(`/metrics-service/metrics/racepredictions/${query.type}/${name}`, {
			params: { fromCalendarDate: formatDate(query.start), toCalendarDate: formatDate(query.end) },
		})
	}
	return ctx.session.get(`/metrics-service/metrics/racepredictions/latest/${name}`)
}

export async function fitnessAge(ctx: ApiContext, date: DateInput = today()): Promise<unknown> {
	return ctx.session.get(`/fitnessage-service/fitnessage/${formatDate(date)}`)
}

export async function lactateThreshold(ctx: ApiContext): Promise<unknown> {
	return ctx.session.get('/biometric-service/biometric/latestLactateThreshold')
}

/** Running lactate threshold speed, heart rate and power over a range */
export async function lactateThresholdHistory(
	ctx: ApiContext,
	start: DateInput,
	end: DateInput,
	aggregation: 'daily' | 'weekly' | 'monthly' | 'yearly' = 'daily',
): Promise<{ speed: unknown; heartRate: unknown; power: unknown }> {
	const range = `range/${formatDate(start)}/${formatDate(end)}`
	const params = { sport: 'RUNNING', aggregation, aggregationStrategy: 'LATEST' }
	const speed = await ctx.session.get(`/biometric-service/stats/lactateThresholdSpeed/${range}`, { params })
	const heartRate = await ctx.session.get(`/biometric-service/stats/lactateThresholdHeartRate/${range}`, { params })
	const power = await ctx.session.get(`/biometric-service/stats/functionalThresholdPower/${range}`, { params })
	return { speed, heartRate, power }
}

/** Latest cycling functional threshold power */
export async function cyclingFtp(ctx: ApiContext): Promise<unknown> {
	return ctx.session.get('/biometric-service/biometric/latestFunctionalThresholdPower/CYCLING')
}

/** Daily step totals over any range, fetched in 28-day windows */
export async function dailySteps(ctx: ApiContext, start: DateInput, end: DateInput): Promise<unknown[]> {
	return chunkedRequest(start, end, DAILY_STEPS_MAX_DAYS, (windowStart, windowEnd) =>
		ctx.session.get(`/usersummary-service/stats/steps/daily/${windowStart}/${windowEnd}`),
	)
}

export async function weeklySteps(ctx: ApiContext, end: DateInput = today(), weeks = 52): Promise<unknown> {
	return ctx.session.get(`/usersummary-service/stats/steps/weekly/${formatDate(end)}/${weeks}`)
}

export async function weeklyStress(ctx: ApiContext, end: DateInput = today(), weeks = 52): Promise<unknown> {
	return ctx.session.get(`/usersummary-service/stats/stress/weekly/${formatDate(end)}/${weeks}`)
}

export async function weeklyIntensityMinutes(ctx: ApiContext, start: DateInput, end: DateInput = today()): Promise<unknown> {
	return ctx.session.get(`/usersummary-service/stats/im/weekly/${formatDate(start)}/${formatDate(end)}`)
}
