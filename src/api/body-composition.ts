/**
 * Weight, body composition, hydration and blood pressure.
 *
 * Manual entries are stamped with the local wall-clock time; pass `now` to
 * pin it.
 *
 * @module api/body-composition
 */

import { type ApiContext, isRecord, recordsOf } from './context.ts'
import { type DateInput, formatDate, localTime, today } from './dates.ts'

export type WeightUnit = 'kg' | 'lbs'

export async function bodyComposition(ctx: ApiContext, start: DateInput = today(), end: DateInput = start): Promise<unknown> {
	return ctx.session.get('/weight-service/weight/dateRange', {
		params: { startDate: formatDate(start), endDate: formatDate(end) },
	})
}

export async function weighIns(ctx: ApiContext, start: DateInput, end: DateInput): Promise<unknown> {
	return ctx.session.get(`/weight-service/weight/range/${formatDate(start)}/${formatDate(end)}`, {
		params: { includeAll: true },
	})
}

export async function dailyWeighIns(ctx: ApiContext, date: DateInput = today()): Promise<unknown> {
	return ctx.session.get(`/weight-service/weight/dayview/${formatDate(date)}`, {
		params: { includeAll: true },
	})
}

/** Record a weigh-in at noon on `date` (default: today) */
export async function addWeighIn(
	ctx: ApiContext,
	value: number,
	options: { date?: DateInput; unitKey?: WeightUnit } = {},
): Promise<unknown> {
	const timestamp = `${formatDate(options.date ?? today())}T12:00:00.000`
	return addWeighInWithTimestamps(ctx, value, {
		dateTimestamp: timestamp,
		gmtTimestamp: timestamp,
		unitKey: options.unitKey,
	})
}

/**
 * Record a weigh-in with explicit local and GMT timestamps, e.g.
 * `2024-02-11T08:30:00.000`.
 */
export async function addWeighInWithTimestamps(
	ctx: ApiContext,
	value: number,
	options: { dateTimestamp: string; gmtTimestamp: string; unitKey?: WeightUnit },
): Promise<unknown> {
	return ctx.session.post('/weight-service/user-weight', {
		body: {
			dateTimestamp: options.dateTimestamp,
			gmtTimestamp: options.gmtTimestamp,
			unitKey: options.unitKey ?? 'kg',
			sourceType: 'MANUAL',
			value,
		},
	})
}

/** Upload a FIT file of full body-scale data (body fat, muscle and bone mass) */
export async function addBodyComposition(ctx: ApiContext, filePath: string): Promise<unknown> {
	return ctx.session.upload('/upload-service/upload', filePath)
}

export async function deleteWeighIn(ctx: ApiContext, date: DateInput, weightPk: string | number): Promise<unknown> {
	return ctx.session.delete(`/weight-service/weight/${formatDate(date)}/byversion/${encodeURIComponent(String(weightPk))}`)
}

/**
 * Delete every weigh-in on a day, one request per entry.
 *
 * @returns How many entries were deleted
 */
export async function deleteWeighIns(ctx: ApiContext, date: DateInput): Promise<number> {
	const day = await dailyWeighIns(ctx, date)
	const entries = isRecord(day) ? recordsOf(day.dateWeightList) : []

	let deleted = 0
	for (const entry of entries) {
		const weightPk = entry.version ?? entry.samplePk
		if (typeof weightPk === 'string' || typeof weightPk === 'number') {
			await deleteWeighIn(ctx, date, weightPk)
			deleted++
		}
	}
	return deleted
}

export async function hydration(ctx: ApiContext, date: DateInput = today()): Promise<unknown> {
	return ctx.session.get(`/usersummary-service/usersummary/hydration/daily/${formatDate(date)}`)
}

/**
 * Log water intake; a negative amount subtracts.
 */
export async function logHydration(
	ctx: ApiContext,
	valueInMl: number,
	options: { date?: DateInput; now?: Date } = {},
): Promise<unknown> {
	const calendarDate = formatDate(options.date ?? today(options.now))
	return ctx.session.put('/usersummary-service/usersummary/hydration/log', {
		body: {
			calendarDate,
			timestampLocal: `${calendarDate}T${localTime(options.now)}.000`,
			valueInML: valueInMl,
		},
	})
}

export async function bloodPressure(ctx: ApiContext, start: DateInput, end: DateInput): Promise<unknown> {
	return ctx.session.get(`/bloodpressure-service/bloodpressure/range/${formatDate(start)}/${formatDate(end)}`, {
		params: { includeAll: true },
	})
}

export interface BloodPressureReading {
	systolic: number
	diastolic: number
	pulse: number
	notes?: string
	date?: DateInput
	now?: Date
}

export async function logBloodPressure(ctx: ApiContext, reading: BloodPressureReading): Promise<unknown> {
	const timestamp = `${formatDate(reading.date ?? today(reading.now))}T${localTime(reading.now)}.000`
	return ctx.session.post('/bloodpressure-service/bloodpressure', {
		body: {
			measurementTimestampLocal: timestamp,
			measurementTimestampGMT: timestamp,
			systolic: reading.systolic,
			diastolic: reading.diastolic,
			pulse: reading.pulse,
			sourceType: 'MANUAL',
			...(reading.notes ? { notes: reading.notes } : {}),
		},
	})
}

export async function deleteBloodPressure(ctx: ApiContext, date: DateInput, version: string | number): Promise<unknown> {
	return ctx.session.delete(`/bloodpressure-service/bloodpressure/${formatDate(date)}/${encodeURIComponent(String(version))}`)
}
