import { z } from 'zod'
import { type DecodeError, type Result, ok, err, decodeError, parseJsonWithResult } from '../result.js'
import { type ApiError, apiError } from './errors.js'
import { CategorySchema, FlagSchema, LanguageSchema } from './vocabulary.js'

const JokeFlagsSchema = z.record(FlagSchema, z.boolean())

// Only the type tag and the joke text are required; absent members decode to zero values
const JokeBaseSchema = z.object({
	category: CategorySchema.optional(),
	flags: JokeFlagsSchema.default({}),
	id: z.number().int().default(0),
	lang: LanguageSchema.optional(),
	safe: z.boolean().default(false),
})

const SingleJokeSchema = JokeBaseSchema.extend({
	type: z.literal('single'),
	joke: z.string(),
})

const TwoPartJokeSchema = JokeBaseSchema.extend({
	type: z.literal('twopart'),
	setup: z.string(),
	delivery: z.string(),
})

export const JokeSchema = z.discriminatedUnion('type', [SingleJokeSchema, TwoPartJokeSchema])

const JokeListSchema = z.object({
	jokes: z.array(JokeSchema),
})

// Missing members decode to zero values, the service omits some of them
const ErrorResponseSchema = z.object({
	code: z.number().int().default(0),
	message: z.string().default(''),
	additionalInfo: z.string().default(''),
	causedBy: z.array(z.string()).default([]),
	internalError: z.boolean().default(false),
	timestamp: z.number().default(0),
})

const EnvelopeSchema = z.record(z.string(), z.unknown())

export type Joke = z.infer<typeof JokeSchema>
export type SingleJoke = z.infer<typeof SingleJokeSchema>
export type TwoPartJoke = z.infer<typeof TwoPartJokeSchema>
export type JokeFlags = z.infer<typeof JokeFlagsSchema>
export type ErrorResponse = z.infer<typeof ErrorResponseSchema>

function summarize(error: z.ZodError): string {
	return error.issues
		.map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
		.join('; ')
}

function decodeWith<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, what: string, data: unknown): Result<T, DecodeError> {
	const result = schema.safeParse(data)
	return result.success ? ok(result.data) : err(decodeError(`invalid ${what}: ${summarize(result.error)}`))
}

/**
 * Decodes a body from the joke endpoint.
 *
 * The payload carries no tag saying which shape it is, so it is decoded in two steps:
 * the `error` and `amount` members are inspected first, then the whole payload is
 * decoded as an error response, a joke list or a single joke.
 */
export function parseResponse(raw: string | Uint8Array): Result<Joke[], DecodeError | ApiError> {
	const text = typeof raw === 'string' ? raw : new TextDecoder().decode(raw)

	const json = parseJsonWithResult(text)
	if (!json.ok) {
		return json
	}

	const envelope = EnvelopeSchema.safeParse(json.value)
	if (!envelope.success) {
		return err(decodeError('malformed response: expected a JSON object'))
	}
	const payload = envelope.data

	if (!('error' in payload)) {
		return err(decodeError('malformed response: missing "error" property'))
	}
	// null leaves the flag at false
	const isError = z.boolean().nullable().safeParse(payload.error)
	if (!isError.success) {
		return err(decodeError('malformed response: "error" property is not a boolean'))
	}

	if (isError.data === true) {
		const response = decodeWith(ErrorResponseSchema, 'error response', payload)
		return response.ok ? err(apiError(response.value)) : response
	}

	if ('amount' in payload) {
		const list = decodeWith(JokeListSchema, 'joke list', payload)
		return list.ok ? ok(list.value.jokes) : list
	}

	const joke = decodeWith(JokeSchema, 'joke', payload)
	return joke.ok ? ok([joke.value]) : joke
}

/**
 * Display form of a joke: setup and delivery on two lines, or the single joke text.
 */
export function formatJoke(joke: Joke): string {
	if (joke.type === 'twopart') {
		return `${joke.setup}\n${joke.delivery}`
	}
	return joke.joke
}
