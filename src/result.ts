import type { FetchFn } from './types.js'

/**
 * Result type for explicit error handling.
 * Expected failures are modeled in types, not exceptions.
 */
export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E }

export function ok<T>(value: T): Result<T, never> {
	return { ok: true, value }
}

export function err<E>(error: E): Result<never, E> {
	return { ok: false, error }
}

/**
 * Boundary error types - failures at the edge of the process (network, bytes on the wire)
 * that can legitimately throw and are caught exactly once.
 */
export type TransportError = {
	type: 'transport'
	message: string
}

export type DecodeError = {
	type: 'decode'
	message: string
}

export type BoundaryError = TransportError | DecodeError

export function transportError(message: string): TransportError {
	return { type: 'transport', message }
}

export function decodeError(message: string): DecodeError {
	return { type: 'decode', message }
}

function messageOf(error: unknown): string {
	return error instanceof Error ? error.message : String(error)
}

/**
 * Wraps the GET and converts a rejected fetch into a TransportError.
 * The cause's message is kept verbatim.
 */
export async function fetchWithResult(
	input: string | URL,
	fetchFn: FetchFn = globalThis.fetch,
	init?: RequestInit,
): Promise<Result<Response, TransportError>> {
	try {
		const response = init === undefined ? await fetchFn(input) : await fetchFn(input, init)
		return ok(response)
	} catch (error) {
		return err(transportError(messageOf(error)))
	}
}

/**
 * Reads the whole response body. A failed read is a transport failure,
 * not a decode failure: no bytes reached the parser.
 */
export async function readBodyWithResult(response: Response): Promise<Result<string, TransportError>> {
	try {
		return ok(await response.text())
	} catch (error) {
		return err(transportError(messageOf(error)))
	}
}

export function parseJsonWithResult(text: string): Result<unknown, DecodeError> {
	try {
		return ok(JSON.parse(text))
	} catch (error) {
		return err(decodeError(`invalid JSON: ${messageOf(error)}`))
	}
}
