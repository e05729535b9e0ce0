/**
 * Menstrual cycle, pregnancy, lifestyle logging and the GraphQL gateway.
 *
 * @module api/wellness
 */

import type { ApiContext } from './context.ts'
import { type DateInput, formatDate, today } from './dates.ts'

export async function menstrualData(ctx: ApiContext, date: DateInput = today()): Promise<unknown> {
	return ctx.session.get(`/periodichealth-service/menstrualcycle/dayview/${formatDate(date)}`)
}

export async function menstrualCalendar(ctx: ApiContext, start: DateInput, end: DateInput): Promise<unknown> {
	return ctx.session.get(`/periodichealth-service/menstrualcycle/calendar/${formatDate(start)}/${formatDate(end)}`)
}

export async function pregnancySummary(ctx: ApiContext): Promise<unknown> {
	return ctx.session.get('/periodichealth-service/menstrualcycle/pregnancysnapshot')
}

export async function lifestyleLogging(ctx: ApiContext, date: DateInput = today()): Promise<unknown> {
	return ctx.session.get(`/lifestylelogging-service/dailyLog/${formatDate(date)}`)
}

export interface GraphqlOptions {
	variables?: Record<string, unknown>
	operationName?: string
}

/**
 * Run a query against the GraphQL gateway and return the decoded response.
 *
 * @example
 * ```typescript
 * await graphql(client, 'query { userGoals { goalType } }')
 * ```
 */
export async function graphql(ctx: ApiContext, query: string, options: GraphqlOptions = {}): Promise<unknown> {
	const body: Record<string, unknown> = { query, variables: options.variables ?? {} }
	if (options.operationName) {
		body.operationName = options.operationName
	}
	return ctx.session.post('/graphql-gateway/graphql', { body })
}
