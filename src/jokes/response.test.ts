import { describe, it, expect } from 'vitest'
import { formatJoke, parseResponse } from './response.js'
import { errorPayload, listPayload, singleJoke, singlePayload, twoPartJoke } from '../../tests/fixtures/jokes.js'

describe('parseResponse', () => {
	it('returns every joke when the payload carries an amount', () => {
		expect(parseResponse(listPayload([singleJoke, twoPartJoke]))).toEqual({
			ok: true,
			value: [singleJoke, twoPartJoke],
		})
	})

	it('relies on the presence of amount, not its value', () => {
		expect(parseResponse('{"error":false,"amount":0,"jokes":[]}')).toEqual({ ok: true, value: [] })
	})

	it('wraps a single joke in a one-element list', () => {
		expect(parseResponse(singlePayload())).toEqual({ ok: true, value: [singleJoke] })
		expect(parseResponse(singlePayload(twoPartJoke))).toEqual({ ok: true, value: [twoPartJoke] })
	})

	it('decodes raw UTF-8 bytes', () => {
		const bytes = new TextEncoder().encode(singlePayload())
		expect(parseResponse(bytes)).toEqual({ ok: true, value: [singleJoke] })
	})

	it('returns an API error, and no jokes, for an error payload', () => {
		const result = parseResponse(JSON.stringify(errorPayload))

		expect(result).toEqual({
			ok: false,
			error: {
				type: 'api',
				message: 'No matching joke found: Filters matched nothing',
				response: {
					code: 106,
					message: 'No matching joke found',
					additionalInfo: 'Filters matched nothing',
					causedBy: ['No jokes were found that match your provided filter(s).'],
					internalError: false,
					timestamp: 1700000000000,
				},
			},
		})
	})

	it('fills absent error members with zero values', () => {
		const result = parseResponse('{"error":true,"message":"m","additionalInfo":"i"}')

		expect(result).toEqual({
			ok: false,
			error: {
				type: 'api',
				message: 'm: i',
				response: { code: 0, message: 'm', additionalInfo: 'i', causedBy: [], internalError: false, timestamp: 0 },
			},
		})
	})

	it('decodes a minimal single joke, filling absent members with zero values', () => {
		expect(parseResponse('{"error":false,"joke":"x","type":"single"}')).toEqual({
			ok: true,
			value: [{ type: 'single', joke: 'x', flags: {}, id: 0, safe: false }],
		})
	})

	it('accepts a flags mapping with only some flags present', () => {
		const result = parseResponse(JSON.stringify({ error: false, ...singleJoke, flags: { nsfw: true } }))

		expect(result).toEqual({ ok: true, value: [{ ...singleJoke, flags: { nsfw: true } }] })
	})

	it('treats a null error discriminator as false', () => {
		expect(parseResponse(JSON.stringify({ ...singleJoke, error: null }))).toEqual({ ok: true, value: [singleJoke] })
	})

	it('fails when the error discriminator is missing', () => {
		expect(parseResponse('{"joke":"x","type":"single"}')).toEqual({
			ok: false,
			error: { type: 'decode', message: 'malformed response: missing "error" property' },
		})
	})

	it('fails when the error discriminator is not a boolean', () => {
		expect(parseResponse('{"error":"false"}')).toEqual({
			ok: false,
			error: { type: 'decode', message: 'malformed response: "error" property is not a boolean' },
		})
	})

	it('fails on a body that is not JSON', () => {
		const result = parseResponse('<html>Bad Gateway</html>')

		expect(result.ok).toBe(false)
		if (!result.ok) {
			expect(result.error.type).toBe('decode')
			expect(result.error.message).toMatch(/^invalid JSON: /)
		}
	})

	it('fails on JSON that is not an object', () => {
		for (const body of ['[]', 'null', '42', '"error"']) {
			expect(parseResponse(body), `Expected ${body} to be rejected`).toEqual({
				ok: false,
				error: { type: 'decode', message: 'malformed response: expected a JSON object' },
			})
		}
	})

	it('reports the member that does not match the joke shape', () => {
		const { joke: _joke, ...withoutText } = singleJoke

		expect(parseResponse(JSON.stringify({ error: false, ...withoutText }))).toEqual({
			ok: false,
			error: { type: 'decode', message: 'invalid joke: joke: Required' },
		})
	})

	it('reports a joke list that is not an array', () => {
		expect(parseResponse('{"error":false,"amount":1,"jokes":"nope"}')).toEqual({
			ok: false,
			error: { type: 'decode', message: 'invalid joke list: jokes: Expected array, received string' },
		})
	})

	it('rejects an unknown joke type', () => {
		const result = parseResponse(JSON.stringify({ error: false, ...singleJoke, type: 'threepart' }))
		expect(result).toMatchObject({ ok: false, error: { type: 'decode' } })
	})
})

describe('formatJoke', () => {
	it('puts setup and delivery of a two-part joke on separate lines', () => {
		expect(formatJoke(twoPartJoke)).toBe('What is the setup?\nThis is the delivery.')
	})

	it('returns the text of a single joke', () => {
		expect(formatJoke(singleJoke)).toBe('A test joke with no punchline.')
	})
})
