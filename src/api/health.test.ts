import { describe, expect, test } from 'vitest'
import { AuthenticationError } from '../errors/index.ts'
import { createApiContext, createFetchScript } from '../testing/index.ts'
import { dailySummary, hrv, restingHeartRate, sleepData, statsAndBody } from './health.ts'
import { personalInformation, userSettings } from './user.ts'

const PROFILE = { displayName: 'trail runner', userProfilePk: 4242 }

describe('health endpoints', () => {
	test('dailySummary addresses the display name and passes the date', async () => {
		const script = createFetchScript().on('GET', 'usersummary/daily', { json: { totalSteps: 10432 } })

		const summary = await dailySummary(createApiContext(script.fetch, PROFILE), '2024-03-01')

		expect(summary).toEqual({ totalSteps: 10432 })
		expect(script.calls[0]?.url).toBe(
			'https://connectapi.garmin.com/usersummary-service/usersummary/daily/trail%20runner?calendarDate=2024-03-01',
		)
	})

	test('functions that need a display name reject without one', async () => {
		const script = createFetchScript()

		await expect(dailySummary(createApiContext(script.fetch), '2024-03-01')).rejects.toThrow(AuthenticationError)
		expect(script.calls).toHaveLength(0)
	})

	test('restingHeartRate defaults the end to the start', async () => {
		const script = createFetchScript().on('GET', 'userstats-service', { json: {} })

		await restingHeartRate(createApiContext(script.fetch, PROFILE), '2024-03-01')

		expect(new URL(script.calls[0]?.url ?? '').search).toBe('?fromDate=2024-03-01&untilDate=2024-03-01&metricId=60')
	})

	test('sleepData adds the non-sleep buffer', async () => {
		const script = createFetchScript().on('GET', 'dailySleepData', { json: {} })

		await sleepData(createApiContext(script.fetch, PROFILE), new Date(2024, 2, 1))

		expect(script.calls[0]?.url).toBe(
			'https://connectapi.garmin.com/wellness-service/wellness/dailySleepData/trail%20runner?date=2024-03-01&nonSleepBufferMinutes=60',
		)
	})

	test('a date-only endpoint puts the date in the path', async () => {
		const script = createFetchScript().on('GET', '/hrv-service/hrv/2024-03-01', { status: 204 })

		expect(await hrv(createApiContext(script.fetch), '2024-03-01')).toBeUndefined()
	})

	test('an invalid date rejects before any request', async () => {
		const script = createFetchScript()

		await expect(hrv(createApiContext(script.fetch), '03/01/2024')).rejects.toThrow('Invalid date "03/01/2024"')
		expect(script.calls).toHaveLength(0)
	})

	test('statsAndBody combines the summary and body composition', async () => {
		const script = createFetchScript()
			.on('GET', 'usersummary/daily', { json: { totalSteps: 1 } })
			.on('GET', '/weight-service/weight/dateRange', { json: { dateWeightList: [] } })

		const combined = await statsAndBody(createApiContext(script.fetch, PROFILE), '2024-03-01')

		expect(combined).toEqual({ stats: { totalSteps: 1 }, bodyComposition: { dateWeightList: [] } })
		expect(new URL(script.calls[1]?.url ?? '').search).toBe('?startDate=2024-03-01&endDate=2024-03-01')
	})
})

describe('user endpoints', () => {
	test('userSettings needs no display name', async () => {
		const script = createFetchScript().on('GET', 'user-settings', { json: { id: 1 } })

		expect(await userSettings(createApiContext(script.fetch))).toEqual({ id: 1 })
	})

	test('personalInformation takes an explicit display name over the profile', async () => {
		const script = createFetchScript().on('GET', 'personal-information', { json: {} })

		await personalInformation(createApiContext(script.fetch, PROFILE), 'someone-else')

		expect(script.calls[0]?.url).toBe(
			'https://connectapi.garmin.com/userprofile-service/userprofile/personal-information/someone-else',
		)
	})
})
