/**
 * Workouts and training plans.
 *
 * @module api/workouts
 */

import type { PageOptions } from './badges.ts'
import type { ApiContext } from './context.ts'

type Id = string | number

const segment = (value: Id): string => encodeURIComponent(String(value))

export async function workouts(ctx: ApiContext, options: PageOptions = {}): Promise<unknown> {
	const { start = 0, limit = 20 } = options
	return ctx.session.get('/workout-service/workouts', { params: { start, limit } })
}

export async function workout(ctx: ApiContext, workoutId: Id): Promise<unknown> {
	return ctx.session.get(`/workout-service/workout/${segment(workoutId)}`)
}

/** The workout as FIT bytes */
export async function downloadWorkout(ctx: ApiContext, workoutId: Id): Promise<Uint8Array> {
	return ctx.session.download(`/workout-service/workout/FIT/${segment(workoutId)}`)
}

export async function createWorkout(ctx: ApiContext, payload: Record<string, unknown>): Promise<unknown> {
	return ctx.session.post('/workout-service/workout', { body: payload })
}

export async function scheduledWorkout(ctx: ApiContext, scheduledWorkoutId: Id): Promise<unknown> {
	return ctx.session.get(`/workout-service/schedule/${segment(scheduledWorkoutId)}`)
}

export async function trainingPlans(ctx: ApiContext): Promise<unknown> {
	return ctx.session.get('/trainingplan-service/trainingplan/plans')
}

/** A phased training plan */
export async function trainingPlan(ctx: ApiContext, planId: Id): Promise<unknown> {
	return ctx.session.get(`/trainingplan-service/trainingplan/phased/${segment(planId)}`)
}

export async function adaptiveTrainingPlan(ctx: ApiContext, planId: Id): Promise<unknown> {
	return ctx.session.get(`/trainingplan-service/trainingplan/fbt-adaptive/${segment(planId)}`)
}
