#!/usr/bin/env node
import { readFileSync } from 'node:fs'
import { dirname, join } from 'node:path'
import { fileURLToPath } from 'node:url'
import { Command } from 'commander'
import { registerCallCommand } from './commands/call.js'
import { registerConfigCommand } from './commands/config.js'
import { registerServeCommand } from './commands/serve.js'
import { registerToolsCommand } from './commands/tools.js'
import { loadConfig } from './core/config.js'
import { errorMessage } from './core/errors.js'
import { setLogLevel } from './core/logger.js'
import { registerAllOperations } from './operations/registry.js'
import type { OutputFormat } from './types.js'

const __dirname = dirname(fileURLToPath(import.meta.url))
const pkg: { version: string } = JSON.parse(
	readFileSync(join(__dirname, '..', 'package.json'), 'utf-8'),
)

const program = new Command()

program
	.name('pitmd')
	.description('Point-in-time financial data tools over MCP')
	.version(pkg.version)
	.option('--json', 'output as JSON')
	.option('--plain', 'output as tab-separated values')
	.option('-v, --verbose', 'debug logging on stderr')
	.hook('preAction', () => {
		const rawOpts = program.opts()
		let format: OutputFormat = 'markdown'
		if (rawOpts.json) format = 'json'
		else if (rawOpts.plain) format = 'plain'
		program.setOptionValue('format', format)

		const level = rawOpts.verbose ? 'debug' : loadConfig().logLevel
		if (level) setLogLevel(level)
	})

registerAllOperations()

registerServeCommand(program, pkg.version)
registerToolsCommand(program)
registerCallCommand(program)
registerConfigCommand(program)

program.parseAsync(process.argv).catch((err: unknown) => {
	console.error(`Error: ${errorMessage(err)}`)
	process.exit(1)
})
