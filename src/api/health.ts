/**
 * Daily health data: summaries, heart rate, sleep, stress, body battery.
 *
 * Functions taking a date default to today.
 *
 * @module api/health
 */

import { bodyComposition } from './body-composition.ts'
import { type ApiContext, requireDisplayName } from './context.ts'
import { type DateInput, formatDate, today } from './dates.ts'

const userPath = (prefix: string, ctx: ApiContext): string =>
	`${prefix}/${encodeURIComponent(requireDisplayName(ctx))}`

/** Steps, calories, distance and the rest of the daily summary */
export async function dailySummary(ctx: ApiContext, date: DateInput = today()): Promise<unknown> {
	return ctx.session.get(userPath('/usersummary-service/usersummary/daily', ctx), {
		params: { calendarDate: formatDate(date) },
	})
}

/** Alias of {@link dailySummary} */
export const stats = dailySummary

/** Daily summary and body composition for one day */
export async function statsAndBody(
	ctx: ApiContext,
	date: DateInput = today(),
): Promise<{ stats: unknown; bodyComposition: unknown }> {
	const summary = await dailySummary(ctx, date)
	const composition = await bodyComposition(ctx, date, date)
	return { stats: summary, bodyComposition: composition }
}

export async function heartRates(ctx: ApiContext, date: DateInput = today()): Promise<unknown> {
	return ctx.session.get(userPath('/wellness-service/wellness/dailyHeartRate', ctx), {
		params: { date: formatDate(date) },
	})
}

export async function restingHeartRate(ctx: ApiContext, start: DateInput, end: DateInput = start): Promise<unknown> {
	return ctx.session.get(userPath('/userstats-service/wellness/daily', ctx), {
		params: { fromDate: formatDate(start), untilDate: formatDate(end), metricId: 60 },
	})
}

/** Heart rate variability */
export async function hrv(ctx: ApiContext, date: DateInput = today()): Promise<unknown> {
	return ctx.session.get(`/hrv-service/hrv/${formatDate(date)}`)
}

export async function sleepData(ctx: ApiContext, date: DateInput = today()): Promise<unknown> {
	return ctx.session.get(userPath('/wellness-service/wellness/dailySleepData', ctx), {
		params: { date: formatDate(date), nonSleepBufferMinutes: 60 },
	})
}

export async function stress(ctx: ApiContext, date: DateInput = today()): Promise<unknown> {
	return ctx.session.get(`/wellness-service/wellness/dailyStress/${formatDate(date)}`)
}

/** Body battery daily report */
export async function bodyBattery(ctx: ApiContext, start: DateInput = today(), end: DateInput = start): Promise<unknown> {
	return ctx.session.get('/wellness-service/wellness/bodyBattery/reports/daily', {
		params: { startDate: formatDate(start), endDate: formatDate(end) },
	})
}

/** Body battery events (sleep, activities, naps) */
export async function bodyBatteryEvents(ctx: ApiContext, date: DateInput = today()): Promise<unknown> {
	return ctx.session.get(`/wellness-service/wellness/bodyBattery/events/${formatDate(date)}`)
}

export async function stepsData(ctx: ApiContext, date: DateInput = today()): Promise<unknown> {
	return ctx.session.get(userPath('/wellness-service/wellness/dailySummaryChart', ctx), {
		params: { date: formatDate(date) },
	})
}

export async function floors(ctx: ApiContext, date: DateInput = today()): Promise<unknown> {
	return ctx.session.get(`/wellness-service/wellness/floorsChartData/daily/${formatDate(date)}`)
}

export async function respiration(ctx: ApiContext, date: DateInput = today()): Promise<unknown> {
	return ctx.session.get(`/wellness-service/wellness/daily/respiration/${formatDate(date)}`)
}

/** Blood oxygen */
export async function spo2(ctx: ApiContext, date: DateInput = today()): Promise<unknown> {
	return ctx.session.get(`/wellness-service/wellness/daily/spo2/${formatDate(date)}`)
}

export async function intensityMinutes(ctx: ApiContext, date: DateInput = today()): Promise<unknown> {
	return ctx.session.get(`/wellness-service/wellness/daily/im/${formatDate(date)}`)
}

/** Auto-detected activities and other all-day events */
export async function dailyEvents(ctx: ApiContext, date: DateInput = today()): Promise<unknown> {
	return ctx.session.get('/wellness-service/wellness/dailyEvents', {
		params: { calendarDate: formatDate(date) },
	})
}

/** Ask the service to reload offloaded data for a day */
export async function requestReload(ctx: ApiContext, date: DateInput = today()): Promise<unknown> {
	return ctx.session.post(`/wellness-service/wellness/epoch/request/${formatDate(date)}`)
}
