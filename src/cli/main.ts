#!/usr/bin/env node
import { run } from './run.js'

// Anything thrown here is an invariant violation (e.g. an unreadable config file)
run().catch((error: unknown) => {
	console.error(error)
	process.exit(1)
})
