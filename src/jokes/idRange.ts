import { type Result, ok, err } from '../result.js'
import { type ValidationError, validationError } from './errors.js'

/**
 * Inclusive range of joke ids. An `upper` of 0 means a single id.
 * See https://jokeapi.dev/#idrange-param
 */
export interface IdRange {
	lower: number
	upper: number
}

export function idRange(lower: number, upper: number): IdRange {
	return { lower, upper }
}

export function singleId(id: number): IdRange {
	return { lower: id, upper: 0 }
}

export function formatIdRange({ lower, upper }: IdRange): string {
	return upper > 0 ? `${lower}-${upper}` : `${lower}`
}

const ID_RANGE_PATTERN = /^(\d+)(?:-(\d+))?$/

/**
 * Parses "n" or "n-m", the two forms {@link formatIdRange} produces.
 */
export function parseIdRange(raw: string): Result<IdRange, ValidationError> {
	const match = ID_RANGE_PATTERN.exec(raw.trim())
	if (!match) {
		return err(validationError('id range', raw))
	}

	const lower = Number(match[1])
	const upper = match[2] === undefined ? 0 : Number(match[2])
	if (!Number.isSafeInteger(lower) || !Number.isSafeInteger(upper)) {
		return err(validationError('id range', raw))
	}
	if (upper > 0 && upper < lower) {
		return err(validationError('id range', raw))
	}

	return ok({ lower, upper })
}
