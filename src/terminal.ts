/**
 * ANSI styling for CLI output, without a dependency.
 *
 * Styling is switched off for NO_COLOR (https://no-color.org/), TERM=dumb
 * and when stdout is not a terminal, so piped jokes stay plain text.
 */

const supportsColor = (): boolean => {
	if (process.env.NO_COLOR !== undefined) return false
	if (process.env.TERM === 'dumb') return false
	return process.stdout.isTTY === true
}

const USE_COLOR = supportsColor()

const RESET = '\x1b[0m'

const CODES = {
	bold: '\x1b[1m',
	dim: '\x1b[2m',
	red: '\x1b[31m',
	cyan: '\x1b[36m',
} as const

type Style = keyof typeof CODES

const paint = (style: Style) => (text: string): string =>
	USE_COLOR ? `${CODES[style]}${text}${RESET}` : text

export const c = {
	/** Failures written to stderr */
	red: paint('red'),
	/** The separator between jokes */
	dim: paint('dim'),
	/** Headings in usage text */
	bold: paint('bold'),
	/** Option names in usage text */
	cyan: paint('cyan'),
} as const
