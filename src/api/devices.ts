/**
 * Devices and gear.
 *
 * @module api/devices
 */

import { type ApiContext, isRecord, recordsOf, requireProfilePk } from './context.ts'
import { type DateInput, formatDate } from './dates.ts'

type Id = string | number

const segment = (value: Id): string => encodeURIComponent(String(value))

export async function devices(ctx: ApiContext): Promise<unknown> {
	return ctx.session.get('/device-service/deviceregistration/devices')
}

/** Device settings, including alarms */
export async function deviceSettings(ctx: ApiContext, deviceId: Id): Promise<unknown> {
	return ctx.session.get(`/device-service/deviceservice/device-info/settings/${segment(deviceId)}`)
}

export async function lastUsedDevice(ctx: ApiContext): Promise<unknown> {
	return ctx.session.get('/device-service/deviceservice/mylastused')
}

export async function primaryTrainingDevice(ctx: ApiContext): Promise<unknown> {
	return ctx.session.get('/web-gateway/device-info/primary-training-device')
}

export async function deviceSolarData(
	ctx: ApiContext,
	deviceId: Id,
	start: DateInput,
	end: DateInput,
	singleDay = false,
): Promise<unknown> {
	return ctx.session.get(`/web-gateway/solar/${segment(deviceId)}/${formatDate(start)}/${formatDate(end)}`, {
		params: { singleDayView: singleDay },
	})
}

export interface DeviceAlarms {
	device: Record<string, unknown>
	alarms: unknown
}

/**
 * Alarms of every registered device, skipping devices without any.
 * Settings are fetched one device at a time.
 */
export async function deviceAlarms(ctx: ApiContext): Promise<DeviceAlarms[]> {
	const result: DeviceAlarms[] = []
	for (const device of recordsOf(await devices(ctx))) {
		const { deviceId } = device
		if (typeof deviceId !== 'string' && typeof deviceId !== 'number') continue

		const settings = await deviceSettings(ctx, deviceId)
		const alarms = isRecord(settings) ? settings.alarms : undefined
		if (alarms !== undefined && alarms !== null) {
			result.push({ device, alarms })
		}
	}
	return result
}

/** All gear owned by the logged-in account */
export async function gear(ctx: ApiContext): Promise<unknown> {
	return ctx.session.get('/gear-service/gear/filterGear', { params: { userProfilePk: requireProfilePk(ctx) } })
}

export async function activityGear(ctx: ApiContext, activityId: Id): Promise<unknown> {
	return ctx.session.get('/gear-service/gear/filterGear', { params: { activityId } })
}

export async function gearStats(ctx: ApiContext, gearUuid: string): Promise<unknown> {
	return ctx.session.get(`/gear-service/gear/stats/${segment(gearUuid)}`)
}

/** Default gear per activity type */
export async function gearDefaults(ctx: ApiContext): Promise<unknown> {
	return ctx.session.get(`/gear-service/gear/user/${requireProfilePk(ctx)}/activityTypes`)
}

/** Make a gear item the default for an activity type, or stop it being one */
export async function setGearDefault(
	ctx: ApiContext,
	gearUuid: string,
	activityType: string,
	isDefault = true,
): Promise<unknown> {
	const base = `/gear-service/gear/${segment(gearUuid)}/activityType/${segment(activityType)}`
	return isDefault ? ctx.session.put(`${base}/default/true`) : ctx.session.delete(base)
}

export async function linkGear(ctx: ApiContext, gearUuid: string, activityId: Id): Promise<unknown> {
	return ctx.session.put(`/gear-service/gear/link/${segment(gearUuid)}/activity/${segment(activityId)}`)
}

export async function unlinkGear(ctx: ApiContext, gearUuid: string, activityId: Id): Promise<unknown> {
	return ctx.session.put(`/gear-service/gear/unlink/${segment(gearUuid)}/activity/${segment(activityId)}`)
}

export async function gearActivities(ctx: ApiContext, gearUuid: string, limit = 20): Promise<unknown> {
	return ctx.session.get(`/activitylist-service/activities/${segment(gearUuid)}/gear`, {
		params: { start: 0, limit },
	})
}
