import { parseArgs } from 'node:util'
import { type Result, ok, err } from '../result.js'
import type { ValidationError } from '../jokes/errors.js'
import type { JokeRequest } from '../jokes/request.js'
import { CATEGORIES, FLAGS, JOKE_TYPES, LANGUAGES } from '../jokes/vocabulary.js'
import { c } from '../terminal.js'

/**
 * Raw flag values, before any of them is validated against a vocabulary.
 */
export interface CliOptions {
	help: boolean
	version: boolean
	amount: string
	contains?: string
	safe: boolean
	flags: string[]
	categories: string[]
	lang?: string
	type?: string
	id?: string
}

export type UsageError = {
	type: 'usage'
	message: string
}

// Matches the service's own default of one joke per call
const DEFAULT_AMOUNT = '1'

export function parseCliArgs(args: string[]): Result<CliOptions, UsageError> {
	// node:util throws on unknown or malformed options; caught here exactly once
	let parsed: ReturnType<typeof parseWithConfig>
	try {
		parsed = parseWithConfig(args)
	} catch (error) {
		const message = error instanceof Error ? error.message : String(error)
		return err({ type: 'usage', message })
	}
	const { values } = parsed

	return ok({
		help: values.help ?? false,
		version: values.version ?? false,
		amount: values.amount ?? DEFAULT_AMOUNT,
		contains: values.contains,
		safe: values.safe ?? false,
		flags: values.flag ?? [],
		categories: values.category ?? [],
		lang: values.lang,
		type: values.type,
		id: values.id,
	})
}

function parseWithConfig(args: string[]) {
	return parseArgs({
		args,
		strict: true,
		allowPositionals: false,
		options: {
			amount: { type: 'string', short: 'n' },
			contains: { type: 'string' },
			safe: { type: 'boolean' },
			flag: { type: 'string', multiple: true },
			category: { type: 'string', short: 'c', multiple: true },
			lang: { type: 'string' },
			type: { type: 'string' },
			id: { type: 'string' },
			help: { type: 'boolean', short: 'h' },
			version: { type: 'boolean', short: 'v' },
		},
	})
}

/**
 * Feeds the flag values through the request's validated setters.
 * Stops at the first value that is not in its vocabulary.
 */
export function applyOptions(request: JokeRequest, options: CliOptions): Result<void, ValidationError> {
	const steps: Array<() => Result<void, ValidationError>> = [
		() => request.setAmount(options.amount),
		...options.flags.map((flag) => () => request.addFlag(flag)),
		...options.categories.map((category) => () => request.addCategory(category)),
	]
	if (options.lang !== undefined) {
		const lang = options.lang
		steps.push(() => request.setLang(lang))
	}
	if (options.type !== undefined) {
		const type = options.type
		steps.push(() => request.setType(type))
	}
	if (options.id !== undefined) {
		const id = options.id
		steps.push(() => request.setIdRange(id))
	}

	for (const step of steps) {
		const result = step()
		if (!result.ok) {
			return result
		}
	}

	if (options.contains !== undefined) {
		request.contains = options.contains
	}
	if (options.safe) {
		request.safe = true
	}

	return ok(undefined)
}

export function usage(): string {
	const option = (name: string, description: string): string => `  ${c.cyan(name.padEnd(22))} ${description}`

	return [
		`${c.bold('Usage:')} joke [options]`,
		'',
		c.bold('Options:'),
		option('-n, --amount <n>', 'Get n jokes (default 1)'),
		option('--contains <text>', 'Get jokes containing text'),
		option('--safe', 'Set safe-mode on'),
		option('--flag <flag>', `Add a blacklist flag (${FLAGS.join(', ')})`),
		option('-c, --category <cat>', `Add a category (${CATEGORIES.join(', ')})`),
		option('--lang <lang>', `Set the language (${LANGUAGES.join(', ')})`),
		option('--type <type>', `Set the joke type (${JOKE_TYPES.join(', ')})`),
		option('--id <n|n-m>', 'Restrict to one id or an id range'),
		option('-h, --help', 'Show this help'),
		option('-v, --version', 'Show the version'),
		'',
		`Defaults can be set in ${c.bold('~/.jokerc')} (or $JOKERC): lang, type, safe, blacklist, category.`,
	].join('\n')
}
