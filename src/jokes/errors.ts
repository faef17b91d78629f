import type { DecodeError, TransportError } from '../result.js'
import type { ErrorResponse } from './response.js'

export type ValidationField = 'flag' | 'category' | 'lang code' | 'type' | 'amount' | 'id range'

/**
 * A raw string that is not part of a field's vocabulary.
 * The field it was meant for is left untouched.
 */
export type ValidationError = {
	type: 'validation'
	field: ValidationField
	value: string
	message: string
}

/**
 * A well-formed error payload sent by the service (`"error": true`).
 */
export type ApiError = {
	type: 'api'
	message: string
	response: ErrorResponse
}

export type JokeError = ValidationError | TransportError | DecodeError | ApiError

export function validationError(field: ValidationField, value: string): ValidationError {
	return { type: 'validation', field, value, message: `invalid ${field}: ${JSON.stringify(value)}` }
}

export function apiError(response: ErrorResponse): ApiError {
	return { type: 'api', message: `${response.message}: ${response.additionalInfo}`, response }
}

/**
 * One-line, human readable form of any failure, for terminal output.
 */
export function describeError(error: JokeError): string {
	switch (error.type) {
		case 'validation':
			return error.message
		case 'transport':
			return `request failed: ${error.message}`
		case 'decode':
			return `unexpected response: ${error.message}`
		case 'api':
			return `${error.message} (code ${error.response.code})`
	}
}
