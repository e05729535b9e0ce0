/**
 * Calendar-date helpers shared by endpoint functions.
 *
 * Dates travel as `YYYY-MM-DD` strings. A `Date` is read in local time, the
 * way the account's calendar days are.
 *
 * @module api/dates
 */

import { ConfigurationError } from '../errors/index.ts'

export type DateInput = Date | string

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/
const DAY_MS = 86_400_000

const pad = (value: number, width = 2): string => String(value).padStart(width, '0')

/**
 * Format a date as `YYYY-MM-DD`.
 *
 * @throws {ConfigurationError} If a string is not a valid calendar date
 */
export function formatDate(date: DateInput): string {
	if (date instanceof Date) {
		return `${pad(date.getFullYear(), 4)}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`
	}
	toEpochDay(date)
	return date
}

/** Today's local date */
export function today(now: Date = new Date()): string {
	return formatDate(now)
}

/** Local wall-clock time as `HH:MM:SS` */
export function localTime(now: Date = new Date()): string {
	return `${pad(now.getHours())}:${pad(now.getMinutes())}:${pad(now.getSeconds())}`
}

function toEpochDay(value: string): number {
	const match = ISO_DATE.exec(value)
	if (match) {
		const [, year, month, day] = match
		const ms = Date.UTC(Number(year), Number(month) - 1, Number(day))
		// Date.UTC rolls 2024-02-30 over into March; reject instead
		if (new Date(ms).toISOString().startsWith(value)) {
			return ms / DAY_MS
		}
	}
	throw new ConfigurationError(`Invalid date "${value}": expected YYYY-MM-DD`, { field: 'date', value })
}

function fromEpochDay(day: number): string {
	return new Date(day * DAY_MS).toISOString().slice(0, 10)
}

/**
 * Split an inclusive date range into windows of at most `maxDays` days.
 * An end before the start yields no windows.
 *
 * @example
 * ```typescript
 * chunkDateRange('2024-01-01', '2024-01-10', 4)
 * // [['2024-01-01', '2024-01-04'], ['2024-01-05', '2024-01-08'], ['2024-01-09', '2024-01-10']]
 * ```
 */
export function chunkDateRange(start: DateInput, end: DateInput, maxDays: number): Array<[string, string]> {
	if (!Number.isInteger(maxDays) || maxDays < 1) {
		throw new ConfigurationError(`maxDays must be a positive integer, got ${maxDays}`, { field: 'maxDays' })
	}

	const last = toEpochDay(formatDate(end))
	const windows: Array<[string, string]> = []
	for (let day = toEpochDay(formatDate(start)); day <= last; day += maxDays) {
		windows.push([fromEpochDay(day), fromEpochDay(Math.min(day + maxDays - 1, last))])
	}
	return windows
}

/**
 * Run `fetchWindow` over each window of a long range, one after another, and
 * concatenate the results. A non-array result counts as a single item;
 * `undefined` counts as none.
 */
export async function chunkedRequest(
	start: DateInput,
	end: DateInput,
	maxDays: number,
	fetchWindow: (windowStart: string, windowEnd: string) => Promise<unknown>,
): Promise<unknown[]> {
	const results: unknown[] = []
	for (const [windowStart, windowEnd] of chunkDateRange(start, end, maxDays)) {
		const chunk = await fetchWindow(windowStart, windowEnd)
		if (Array.isArray(chunk)) {
			results.push(...chunk)
		} else if (chunk !== undefined && chunk !== null) {
			results.push(chunk)
		}
	}
	return results
}
