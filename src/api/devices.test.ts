import { describe, expect, test } from 'vitest'
import { AuthenticationError } from '../errors/index.ts'
import { createApiContext, createFetchScript } from '../testing/index.ts'
import { inProgressBadges } from './badges.ts'
import { deviceAlarms, gear, setGearDefault } from './devices.ts'
import { graphql } from './wellness.ts'

describe('devices and gear', () => {
	test('deviceAlarms keeps devices that report alarms', async () => {
		const script = createFetchScript()
			.on('GET', '/deviceregistration/devices', {
				json: [{ deviceId: 1, name: 'watch' }, { name: 'no id' }, { deviceId: 2, name: 'scale' }],
			})
			.on('GET', '/device-info/settings/1', { json: { alarms: [{ time: 390 }] } })
			.on('GET', '/device-info/settings/2', { json: {} })

		const alarms = await deviceAlarms(createApiContext(script.fetch))

		expect(alarms).toEqual([{ device: { deviceId: 1, name: 'watch' }, alarms: [{ time: 390 }] }])
		expect(script.calls).toHaveLength(3)
	})

	test('gear filters by the profile id', async () => {
		const script = createFetchScript().on('GET', 'filterGear', { json: [] })

		await gear(createApiContext(script.fetch, { userProfilePk: 4242 }))

		expect(script.calls[0]?.url).toBe('https://connectapi.garmin.com/gear-service/gear/filterGear?userProfilePk=4242')
	})

	test('gear rejects without a profile id', async () => {
		await expect(gear(createApiContext(createFetchScript().fetch))).rejects.toThrow(AuthenticationError)
	})

	test('setGearDefault PUTs to set and DELETEs to clear', async () => {
		const script = createFetchScript().on(undefined, '/gear-service/gear/abc/activityType/running', { status: 204 })
		const ctx = createApiContext(script.fetch)

		await setGearDefault(ctx, 'abc', 'running')
		await setGearDefault(ctx, 'abc', 'running', false)

		expect(script.calls.map((call) => `${call.method} ${new URL(call.url).pathname}`)).toEqual([
			'PUT /gear-service/gear/abc/activityType/running/default/true',
			'DELETE /gear-service/gear/abc/activityType/running',
		])
	})
})

describe('badges', () => {
	test('inProgressBadges is available minus earned', async () => {
		const script = createFetchScript()
			.on('GET', '/badge/earned', { json: [{ badgeId: 1 }, { badgeName: 'no id' }] })
			.on('GET', '/badge/available', { json: [{ badgeId: 1 }, { badgeId: 2 }, { badgeId: 3 }] })

		expect(await inProgressBadges(createApiContext(script.fetch))).toEqual([{ badgeId: 2 }, { badgeId: 3 }])
	})

	test('inProgressBadges is empty when a list is not an array', async () => {
		const script = createFetchScript()
			.on('GET', '/badge/earned', { json: { error: 'unavailable' } })
			.on('GET', '/badge/available', { json: [{ badgeId: 2 }] })

		expect(await inProgressBadges(createApiContext(script.fetch))).toEqual([])
	})
})

describe('graphql', () => {
	test('posts the query with empty variables by default', async () => {
		const script = createFetchScript().on('POST', '/graphql-gateway/graphql', { json: { data: { ok: true } } })

		const result = await graphql(createApiContext(script.fetch), 'query { ok }')

		expect(result).toEqual({ data: { ok: true } })
		expect(JSON.parse(script.calls[0]?.body ?? '')).toEqual({ query: 'query { ok }', variables: {} })
	})

	test('includes the operation name when given', async () => {
		const script = createFetchScript().on('POST', 'graphql', { json: {} })

		await graphql(createApiContext(script.fetch), 'query Goals { goals }', {
			variables: { limit: 5 },
			operationName: 'Goals',
		})

		expect(JSON.parse(script.calls[0]?.body ?? '')).toEqual({
			query: 'query Goals { goals }',
			variables: { limit: 5 },
			operationName: 'Goals',
		})
	})
})
