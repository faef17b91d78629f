import { describe, it, expect, vi } from 'vitest'
import { fetchWithResult, parseJsonWithResult, readBodyWithResult } from './result.js'
import type { FetchFn } from './types.js'

describe('fetchWithResult', () => {
	it('passes the response through', async () => {
		const response = new Response('{}')
		const mockFetch = vi.fn<FetchFn>().mockResolvedValue(response)

		const result = await fetchWithResult('http://localhost:3000/joke/Any', mockFetch)

		expect(result).toEqual({ ok: true, value: response })
		expect(mockFetch).toHaveBeenCalledWith('http://localhost:3000/joke/Any')
	})

	it('converts a rejection into a transport error', async () => {
		const mockFetch = vi.fn<FetchFn>().mockRejectedValue(new TypeError('fetch failed'))

		const result = await fetchWithResult('http://localhost:3000/joke/Any', mockFetch)

		expect(result).toEqual({ ok: false, error: { type: 'transport', message: 'fetch failed' } })
	})

	it('keeps non-Error rejection reasons', async () => {
		const mockFetch = vi.fn<FetchFn>().mockRejectedValue('connection reset')

		const result = await fetchWithResult('http://localhost:3000/joke/Any', mockFetch)

		expect(result).toEqual({ ok: false, error: { type: 'transport', message: 'connection reset' } })
	})
})

describe('readBodyWithResult', () => {
	it('reads the whole body as text', async () => {
		expect(await readBodyWithResult(new Response('{"error":false}'))).toEqual({ ok: true, value: '{"error":false}' })
	})
})

describe('parseJsonWithResult', () => {
	it('parses JSON text', () => {
		expect(parseJsonWithResult('{"amount":2}')).toEqual({ ok: true, value: { amount: 2 } })
	})

	it('converts a syntax error into a decode error', () => {
		const result = parseJsonWithResult('{')
		expect(result).toMatchObject({ ok: false, error: { type: 'decode' } })
	})
})
