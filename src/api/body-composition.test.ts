import { describe, expect, test } from 'vitest'
import { createApiContext, createFetchScript, type RecordedCall } from '../testing/index.ts'
import { addWeighIn, deleteWeighIns, logBloodPressure, logHydration } from './body-composition.ts'

const bodyOf = (call: RecordedCall | undefined): unknown => JSON.parse(call?.body ?? '')

describe('weigh-ins', () => {
	test('addWeighIn stamps noon on the given day in kg by default', async () => {
		const script = createFetchScript().on('POST', '/weight-service/user-weight', { status: 204 })

		await addWeighIn(createApiContext(script.fetch), 71.5, { date: '2024-02-11' })

		expect(bodyOf(script.calls[0])).toEqual({
			dateTimestamp: '2024-02-11T12:00:00.000',
			gmtTimestamp: '2024-02-11T12:00:00.000',
			unitKey: 'kg',
			sourceType: 'MANUAL',
			value: 71.5,
		})
	})

	test('deleteWeighIns deletes each entry by version, falling back to samplePk', async () => {
		const script = createFetchScript()
			.on('GET', '/weight-service/weight/dayview/2024-02-11', {
				json: { dateWeightList: [{ version: 101 }, { samplePk: 'sample-202' }, { weight: 70 }] },
			})
			.on('DELETE', '/weight-service/weight/2024-02-11/byversion/', { status: 204 })

		const deleted = await deleteWeighIns(createApiContext(script.fetch), '2024-02-11')

		expect(deleted).toBe(2)
		expect(script.calls.map((call) => `${call.method} ${new URL(call.url).pathname}`)).toEqual([
			'GET /weight-service/weight/dayview/2024-02-11',
			'DELETE /weight-service/weight/2024-02-11/byversion/101',
			'DELETE /weight-service/weight/2024-02-11/byversion/sample-202',
		])
	})

	test('deleteWeighIns does nothing when the day has no list', async () => {
		const script = createFetchScript().on('GET', 'dayview', { status: 204 })

		expect(await deleteWeighIns(createApiContext(script.fetch), '2024-02-11')).toBe(0)
		expect(script.calls).toHaveLength(1)
	})
})

describe('hydration and blood pressure', () => {
	const now = new Date(2024, 4, 6, 18, 30, 5)

	test('logHydration stamps the local time', async () => {
		const script = createFetchScript().on('PUT', '/hydration/log', { json: {} })

		await logHydration(createApiContext(script.fetch), 250, { now })

		expect(bodyOf(script.calls[0])).toEqual({
			calendarDate: '2024-05-06',
			timestampLocal: '2024-05-06T18:30:05.000',
			valueInML: 250,
		})
	})

	test('logBloodPressure leaves notes out unless given', async () => {
		const script = createFetchScript().on('POST', '/bloodpressure-service/bloodpressure', { json: {} })

		await logBloodPressure(createApiContext(script.fetch), { systolic: 118, diastolic: 76, pulse: 58, now })

		expect(bodyOf(script.calls[0])).toEqual({
			measurementTimestampLocal: '2024-05-06T18:30:05.000',
			measurementTimestampGMT: '2024-05-06T18:30:05.000',
			systolic: 118,
			diastolic: 76,
			pulse: 58,
			sourceType: 'MANUAL',
		})
	})
})
