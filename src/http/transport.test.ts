import { describe, expect, test } from 'vitest'
import { NetworkError } from '../errors/index.ts'
import { createFetchScript, createInstantSleep } from '../testing/index.ts'
import { Transport } from './transport.ts'

const TARGET = 'https://connectapi.garmin.com/usersummary-service/stats'

describe('Transport', () => {
	test('returns the first successful response', async () => {
		const script = createFetchScript().on('GET', 'stats', { json: { ok: true } })
		const transport = new Transport({ fetch: script.fetch })

		const response = await transport.send(TARGET)

		expect(response.status).toBe(200)
		expect(script.calls).toHaveLength(1)
	})

	test('retries transient statuses with exponential backoff', async () => {
		const script = createFetchScript().on('GET', 'stats', { status: 503 }, { status: 502 }, { json: { ok: true } })
		const { sleep, delays } = createInstantSleep()

		const response = await new Transport({ fetch: script.fetch, sleep }).send(TARGET)

		expect(response.status).toBe(200)
		expect(script.calls).toHaveLength(3)
		expect(delays).toEqual([500, 1000])
	})

	test('returns the final response once attempts are exhausted', async () => {
		const script = createFetchScript().on('GET', 'stats', { status: 500, body: 'still broken' })
		const { sleep, delays } = createInstantSleep()

		const response = await new Transport({ fetch: script.fetch, sleep }).send(TARGET)

		expect(response.status).toBe(500)
		expect(await response.text()).toBe('still broken')
		expect(script.calls).toHaveLength(4)
		expect(delays).toEqual([500, 1000, 2000])
	})

	test('does not retry other client errors', async () => {
		const script = createFetchScript().on('GET', 'stats', { status: 404 })

		const response = await new Transport({ fetch: script.fetch, sleep: createInstantSleep().sleep }).send(TARGET)

		expect(response.status).toBe(404)
		expect(script.calls).toHaveLength(1)
	})

	test('retries network failures and raises NetworkError when they persist', async () => {
		const script = createFetchScript().on('GET', 'stats', new TypeError('fetch failed'))
		const { sleep } = createInstantSleep()

		const error = await new Transport({ fetch: script.fetch, sleep, retry: { maxAttempts: 2 } })
			.send(TARGET)
			.catch((caught: unknown) => caught)

		expect(error).toBeInstanceOf(NetworkError)
		if (error instanceof NetworkError) {
			expect(error.message).toBe('GET https://connectapi.garmin.com/usersummary-service/stats failed: fetch failed')
			expect(error.cause?.message).toBe('fetch failed')
			expect(error.recoverable).toBe(true)
		}
		expect(script.calls).toHaveLength(2)
	})

	test('recovers when a network failure is followed by a response', async () => {
		const script = createFetchScript().on('GET', 'stats', new TypeError('socket hang up'), { json: [] })

		const response = await new Transport({ fetch: script.fetch, sleep: createInstantSleep().sleep }).send(TARGET)

		expect(response.status).toBe(200)
		expect(script.calls).toHaveLength(2)
	})

	test('retry: false makes a single attempt', async () => {
		const script = createFetchScript().on('GET', 'stats', { status: 503 })

		const response = await new Transport({ fetch: script.fetch, retry: false }).send(TARGET)

		expect(response.status).toBe(503)
		expect(script.calls).toHaveLength(1)
	})

	test('passes a timeout signal to fetch', async () => {
		const seen: { signal?: AbortSignal | null } = {}
		const transport = new Transport({
			timeoutMs: 1234,
			fetch: async (_input, init) => {
				seen.signal = init?.signal
				return new Response('ok')
			},
		})

		await transport.send(TARGET)

		expect(seen.signal).toBeInstanceOf(AbortSignal)
		expect(seen.signal?.aborted).toBe(false)
	})
})
