import { readFile } from 'fs/promises'
import { homedir } from 'os'
import { join } from 'path'
import { parse } from 'ini'
import { z } from 'zod'
import type { FsModule } from '../types.js'
import { type DecodeError, type Result, ok, err, decodeError } from '../result.js'
import type { ValidationError } from '../jokes/errors.js'
import type { JokeRequest } from '../jokes/request.js'
import {
	type Category,
	type Flag,
	type JokeType,
	type Language,
	parseCategory,
	parseFlag,
	parseJokeType,
	parseLanguage,
} from '../jokes/vocabulary.js'

/**
 * Request defaults read from the user's config file, e.g.
 *
 *     lang = en
 *     safe = true
 *     blacklist = nsfw,racist
 *     category = Programming,Pun
 */
export interface JokeDefaults {
	lang?: Language
	type?: JokeType
	safe?: boolean
	blacklist: Flag[]
	categories: Category[]
}

export interface LoadConfigDeps {
	fs: FsModule
	configPath: string
}

export function defaultConfigPath(): string {
	return process.env.JOKERC ?? join(homedir(), '.jokerc')
}

function getDefaultDeps(): LoadConfigDeps {
	return {
		fs: {
			readFile: (path, encoding) => readFile(path, encoding),
		},
		configPath: defaultConfigPath(),
	}
}

// ini already turns true/false into booleans; other spellings are rejected
const ConfigFileSchema = z.object({
	lang: z.string().optional(),
	type: z.string().optional(),
	safe: z.boolean().optional(),
	blacklist: z.string().optional(),
	category: z.string().optional(),
})

/**
 * Reads the config file content.
 * Returns null if the file doesn't exist (expected outcome, not an error).
 */
async function readConfigContent(fs: FsModule, configPath: string): Promise<string | null> {
	try {
		return await fs.readFile(configPath, 'utf-8')
	} catch (error) {
		if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
			return null
		}
		// Unexpected filesystem error - propagate as invariant violation
		throw error
	}
}

function parseList<T>(
	list: string | undefined,
	parseToken: (raw: string) => Result<T, ValidationError>,
): Result<T[], ValidationError> {
	const values: T[] = []
	const tokens = (list ?? '').split(',').map((token) => token.trim()).filter((token) => token !== '')
	for (const token of tokens) {
		const parsed = parseToken(token)
		if (!parsed.ok) {
			return parsed
		}
		values.push(parsed.value)
	}
	return ok(values)
}

export async function loadConfig(
	deps: Partial<LoadConfigDeps> = {},
): Promise<Result<JokeDefaults, ValidationError | DecodeError>> {
	const { fs, configPath } = { ...getDefaultDeps(), ...deps }

	const content = await readConfigContent(fs, configPath)
	if (content === null) {
		return ok({ blacklist: [], categories: [] })
	}

	const file = ConfigFileSchema.safeParse(parse(content))
	if (!file.success) {
		const issue = file.error.issues[0]
		return err(decodeError(`invalid config file: ${issue.path.join('.')}: ${issue.message}`))
	}
	const { data } = file

	const blacklist = parseList(data.blacklist, parseFlag)
	if (!blacklist.ok) {
		return blacklist
	}
	const categories = parseList(data.category, parseCategory)
	if (!categories.ok) {
		return categories
	}

	const defaults: JokeDefaults = {
		safe: data.safe,
		blacklist: blacklist.value,
		categories: categories.value,
	}

	if (data.lang !== undefined) {
		const lang = parseLanguage(data.lang)
		if (!lang.ok) {
			return lang
		}
		defaults.lang = lang.value
	}

	if (data.type !== undefined) {
		const type = parseJokeType(data.type)
		if (!type.ok) {
			return type
		}
		defaults.type = type.value
	}

	return ok(defaults)
}

/**
 * Copies config defaults onto a fresh request. Flags parsed afterwards
 * add to the lists and replace the scalar values.
 */
export function applyDefaults(request: JokeRequest, defaults: JokeDefaults): void {
	request.blacklist.push(...defaults.blacklist)
	request.categories.push(...defaults.categories)
	if (defaults.lang !== undefined) {
		request.lang = defaults.lang
	}
	if (defaults.type !== undefined) {
		request.type = defaults.type
	}
	if (defaults.safe !== undefined) {
		request.safe = defaults.safe
	}
}
