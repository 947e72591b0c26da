import type { Command } from 'commander'
import { formatTable } from '../core/formatter.js'
import { getExposedOperations, getOperations } from '../core/registry.js'
import { DISABLED_OPERATIONS } from '../operations/disabled.js'
import type { GlobalOptions } from '../types.js'

export function registerToolsCommand(program: Command): void {
	program
		.command('tools')
		.description('List exposed tools, or the tools withheld because they cannot honour a cutoff')
		.option('--disabled', 'list the withheld tools and why')
		.action((cmdOpts: { disabled?: boolean }) => {
			const opts = program.opts<GlobalOptions>()

			if (cmdOpts.disabled) {
				const rows = DISABLED_OPERATIONS.map((op) => [op.name, op.path, op.reason, op.alternative])
				console.log(formatTable(['Tool', 'Path', 'Reason', 'Alternative'], rows, opts.format))
				return
			}

			const exposed = new Set(getExposedOperations().map((op) => op.name))
			const rows = getOperations().map((op) => [
				op.name,
				exposed.has(op.name) ? 'exposed' : 'disabled in config',
				op.path,
				op.envelope,
				op.cutoff,
			])
			console.log(formatTable(['Tool', 'Status', 'Path', 'Field', 'Cutoff'], rows, opts.format))
		})
}
