export { type Result, type TransportError, type DecodeError, ok, err } from './result.js'
export type { FetchFn } from './types.js'
export {
	type ValidationError,
	type ValidationField,
	type ApiError,
	type JokeError,
	describeError,
} from './jokes/errors.js'
export {
	type Language,
	type Flag,
	type Category,
	type JokeType,
	LANGUAGES,
	FLAGS,
	CATEGORIES,
	JOKE_TYPES,
	parseLanguage,
	parseFlag,
	parseCategory,
	parseJokeType,
} from './jokes/vocabulary.js'
export { type IdRange, idRange, singleId, formatIdRange, parseIdRange } from './jokes/idRange.js'
export {
	type Joke,
	type SingleJoke,
	type TwoPartJoke,
	type JokeFlags,
	type ErrorResponse,
	parseResponse,
	formatJoke,
} from './jokes/response.js'
export {
	type QueryParams,
	type JokeRequestOptions,
	type GetJokesDeps,
	JokeRequest,
	QueryKey,
	DEFAULT_API_URL,
} from './jokes/request.js'
export { type JokeDefaults, loadConfig, applyDefaults } from './config/loadConfig.js'
