import type { ExitFn, FetchFn, FsModule, Output } from '../types.js'
import { readFile } from 'fs/promises'
import { applyDefaults, defaultConfigPath, loadConfig } from '../config/loadConfig.js'
import { describeError } from '../jokes/errors.js'
import { DEFAULT_API_URL, JokeRequest } from '../jokes/request.js'
import { formatJoke } from '../jokes/response.js'
import { c } from '../terminal.js'
import { NAME, VERSION } from '../version.js'
import { applyOptions, parseCliArgs, usage } from './parseArgs.js'

export const JOKE_SEPARATOR = '---'

export interface RunDeps {
	fetch: FetchFn
	exit: ExitFn
	output: Output
	fs: FsModule
	configPath: string
	apiUrl: string
}

const defaultExit: ExitFn = (code) => process.exit(code)

function getDefaultDeps(): RunDeps {
	return {
		fetch: globalThis.fetch,
		exit: defaultExit,
		output: {
			log: (message) => console.log(message),
			error: (message) => console.error(message),
		},
		fs: {
			readFile: (path, encoding) => readFile(path, encoding),
		},
		configPath: defaultConfigPath(),
		apiUrl: process.env.JOKEAPI_URL ?? DEFAULT_API_URL,
	}
}

/**
 * Main entry point for the CLI
 * @param args - Command line arguments (defaults to process.argv.slice(2))
 */
export async function run(args: string[] = process.argv.slice(2), deps: Partial<RunDeps> = {}): Promise<void> {
	const { fetch, exit, output, fs, configPath, apiUrl } = { ...getDefaultDeps(), ...deps }

	const options = parseCliArgs(args)
	if (!options.ok) {
		output.error(c.red(options.error.message))
		output.error(`Run 'joke --help' for usage.`)
		return exit(2)
	}

	if (options.value.help) {
		output.log(usage())
		return
	}
	if (options.value.version) {
		output.log(`${NAME} v${VERSION}`)
		return
	}

	const request = new JokeRequest({ apiUrl })

	// Config defaults go first so that flags can add to and override them
	const defaults = await loadConfig({ fs, configPath })
	if (!defaults.ok) {
		output.error(c.red(`${configPath}: ${defaults.error.message}`))
		return exit(2)
	}
	applyDefaults(request, defaults.value)

	const applied = applyOptions(request, options.value)
	if (!applied.ok) {
		output.error(c.red(describeError(applied.error)))
		output.error(`Run 'joke --help' for usage.`)
		return exit(2)
	}

	const jokes = await request.get({ fetch })
	if (!jokes.ok) {
		output.error(c.red(describeError(jokes.error)))
		return exit(1)
	}

	jokes.value.forEach((joke, index) => {
		if (index > 0) {
			output.log(c.dim(JOKE_SEPARATOR))
		}
		output.log(formatJoke(joke))
	})
}
