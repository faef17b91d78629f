import type { FetchFn } from '../types.js'
import {
	type DecodeError,
	type Result,
	ok,
	err,
	decodeError,
	fetchWithResult,
	readBodyWithResult,
} from '../result.js'
import { type JokeError, type ValidationError, validationError } from './errors.js'
import { type IdRange, formatIdRange, parseIdRange } from './idRange.js'
import { type Joke, parseResponse } from './response.js'
import {
	type Category,
	type Flag,
	type JokeType,
	type Language,
	parseCategory,
	parseFlag,
	parseJokeType,
	parseLanguage,
} from './vocabulary.js'

export const DEFAULT_API_URL = 'https://v2.jokeapi.dev'

export const QueryKey = {
	amount: 'amount',
	blacklist: 'blacklistFlags',
	contains: 'contains',
	idRange: 'idRange',
	lang: 'lang',
	safe: 'safe-mode',
	type: 'type',
} as const

export type QueryKey = (typeof QueryKey)[keyof typeof QueryKey]

export type QueryParams = Partial<Record<QueryKey, string>>

export interface JokeRequestOptions {
	apiUrl: string
}

export interface GetJokesDeps {
	fetch: FetchFn
}

function getDefaultDeps(): GetJokesDeps {
	return {
		fetch: globalThis.fetch,
	}
}

const AMOUNT_PATTERN = /^\d+$/
const JOKE_PATH_PATTERN = /^(.*)\/joke\/([^/]+)$/

/**
 * Filter criteria for one call to the joke endpoint.
 *
 * Enumerated fields should be set through the validated setters. Each setter takes a
 * raw string, and on failure returns a ValidationError and leaves the request as it was,
 * so it can be handed straight to a flag parser.
 */
export class JokeRequest {
	amount?: number
	blacklist: Flag[] = []
	categories: Category[] = []
	contains = ''
	idRange?: IdRange
	lang?: Language
	safe = false
	type?: JokeType

	readonly apiUrl: string

	constructor(options: Partial<JokeRequestOptions> = {}) {
		this.apiUrl = (options.apiUrl ?? DEFAULT_API_URL).replace(/\/+$/, '')
	}

	/**
	 * Any non-negative integer; 0 clears the amount. Caps are left to the service.
	 */
	setAmount(raw: string | number): Result<void, ValidationError> {
		const text = String(raw).trim()
		const amount = AMOUNT_PATTERN.test(text) ? Number(text) : NaN
		if (!Number.isSafeInteger(amount)) {
			return err(validationError('amount', String(raw)))
		}
		this.amount = amount > 0 ? amount : undefined
		return ok(undefined)
	}

	addFlag(raw: string): Result<void, ValidationError> {
		const flag = parseFlag(raw)
		if (!flag.ok) {
			return flag
		}
		this.blacklist.push(flag.value)
		return ok(undefined)
	}

	addCategory(raw: string): Result<void, ValidationError> {
		const category = parseCategory(raw)
		if (!category.ok) {
			return category
		}
		this.categories.push(category.value)
		return ok(undefined)
	}

	setLang(raw: string): Result<void, ValidationError> {
		const lang = parseLanguage(raw)
		if (!lang.ok) {
			return lang
		}
		this.lang = lang.value
		return ok(undefined)
	}

	setType(raw: string): Result<void, ValidationError> {
		const type = parseJokeType(raw)
		if (!type.ok) {
			return type
		}
		this.type = type.value
		return ok(undefined)
	}

	setIdRange(raw: string): Result<void, ValidationError> {
		const range = parseIdRange(raw)
		if (!range.ok) {
			return range
		}
		this.idRange = range.value
		return ok(undefined)
	}

	/**
	 * Query parameters for the fields that are set, in a fixed key order.
	 * Safe mode is a bare switch and is sent with an empty value.
	 */
	query(): QueryParams {
		const params: QueryParams = {}

		if (this.amount !== undefined && this.amount > 0) {
			params[QueryKey.amount] = String(this.amount)
		}
		if (this.blacklist.length > 0) {
			params[QueryKey.blacklist] = this.blacklist.join(',')
		}
		if (this.contains !== '') {
			params[QueryKey.contains] = this.contains
		}
		if (this.idRange !== undefined) {
			params[QueryKey.idRange] = formatIdRange(this.idRange)
		}
		if (this.lang !== undefined) {
			params[QueryKey.lang] = this.lang
		}
		if (this.safe) {
			params[QueryKey.safe] = ''
		}
		if (this.type !== undefined) {
			params[QueryKey.type] = this.type
		}

		return params
	}

	/**
	 * Full endpoint URL. Without categories the request asks for "Any".
	 */
	url(): string {
		const categories = this.categories.length > 0 ? this.categories.join(',') : 'Any'

		const search = new URLSearchParams()
		for (const [key, value] of Object.entries(this.query())) {
			if (value !== undefined) {
				search.append(key, value)
			}
		}

		const query = search.toString()
		return `${this.apiUrl}/joke/${categories}${query ? `?${query}` : ''}`
	}

	/**
	 * Performs a single GET of {@link url} and decodes the body. Transport failures are
	 * returned as they came from fetch; nothing is retried. `init` (an AbortSignal for a
	 * deadline, say) goes to fetch unmodified.
	 */
	async get(deps: Partial<GetJokesDeps> = {}, init?: RequestInit): Promise<Result<Joke[], JokeError>> {
		const { fetch } = { ...getDefaultDeps(), ...deps }

		const response = await fetchWithResult(this.url(), fetch, init)
		if (!response.ok) {
			return response
		}

		// The service reports failures in the body, whatever the status code
		const body = await readBodyWithResult(response.value)
		if (!body.ok) {
			return body
		}

		return parseResponse(body.value)
	}

	/**
	 * Reads a URL of the shape {@link url} produces back into a request.
	 * A lone "Any" category is the implicit default and yields no categories.
	 */
	static fromURL(input: string | URL): Result<JokeRequest, ValidationError | DecodeError> {
		let url: URL
		try {
			url = new URL(input)
		} catch {
			return err(decodeError(`invalid URL: ${String(input)}`))
		}

		const match = JOKE_PATH_PATTERN.exec(url.pathname)
		if (!match) {
			return err(decodeError(`not a joke endpoint: ${url.pathname}`))
		}
		const [, prefix, categoryList] = match

		const request = new JokeRequest({ apiUrl: `${url.origin}${prefix}` })

		if (categoryList !== 'Any') {
			for (const category of categoryList.split(',')) {
				const added = request.addCategory(category)
				if (!added.ok) {
					return added
				}
			}
		}

		const params = url.searchParams
		const setters: Array<[QueryKey, (raw: string) => Result<void, ValidationError>]> = [
			[QueryKey.amount, (raw) => request.setAmount(raw)],
			[QueryKey.blacklist, (raw) => addAll(raw, (flag) => request.addFlag(flag))],
			[QueryKey.idRange, (raw) => request.setIdRange(raw)],
			[QueryKey.lang, (raw) => request.setLang(raw)],
			[QueryKey.type, (raw) => request.setType(raw)],
		]
		for (const [key, set] of setters) {
			const raw = params.get(key)
			if (raw === null) {
				continue
			}
			const result = set(raw)
			if (!result.ok) {
				return result
			}
		}

		request.contains = params.get(QueryKey.contains) ?? ''
		request.safe = params.has(QueryKey.safe)

		return ok(request)
	}
}

function addAll(list: string, add: (token: string) => Result<void, ValidationError>): Result<void, ValidationError> {
	for (const token of list.split(',')) {
		if (token === '') {
			continue
		}
		const result = add(token)
		if (!result.ok) {
			return result
		}
	}
	return ok(undefined)
}
