/**
 * Package name and version for `joke --version`.
 * package.json sits one level above both src/ and dist/.
 */

import { readFileSync } from 'node:fs'
import { fileURLToPath } from 'node:url'
import { z } from 'zod'

const PackageJsonSchema = z.object({
	name: z.string(),
	version: z.string(),
})

const pkgPath = fileURLToPath(new URL('../package.json', import.meta.url))
const pkg = PackageJsonSchema.parse(JSON.parse(readFileSync(pkgPath, 'utf-8')))

export const VERSION = pkg.version
export const NAME = pkg.name
