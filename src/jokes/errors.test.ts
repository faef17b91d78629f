import { describe, it, expect } from 'vitest'
import { apiError, describeError, validationError } from './errors.js'
import { decodeError, transportError } from '../result.js'

describe('describeError', () => {
	it('prints validation errors as they are', () => {
		expect(describeError(validationError('flag', 'rude'))).toBe('invalid flag: "rude"')
	})

	it('prefixes transport and decode failures', () => {
		expect(describeError(transportError('fetch failed'))).toBe('request failed: fetch failed')
		expect(describeError(decodeError('invalid joke: id: Required'))).toBe(
			'unexpected response: invalid joke: id: Required',
		)
	})

	it('appends the service error code', () => {
		const error = apiError({
			code: 106,
			message: 'No matching joke found',
			additionalInfo: 'Filters matched nothing',
			causedBy: [],
			internalError: false,
			timestamp: 0,
		})
		expect(error.message).toBe('No matching joke found: Filters matched nothing')
		expect(describeError(error)).toBe('No matching joke found: Filters matched nothing (code 106)')
	})
})
