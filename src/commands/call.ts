import type { Command } from 'commander'
import { invokeOutcome, renderOutcome } from '../core/adapter.js'
import { formatKeyValue } from '../core/formatter.js'
import { getOperation } from '../core/registry.js'
import type { GlobalOptions } from '../types.js'

function collect(value: string, previous: string[]): string[] {
	return [...previous, value]
}

/** Parses repeated `key=value` pairs. Values stay strings; each tool's schema coerces them. */
export function parseArgPairs(pairs: string[]): Record<string, string> {
	const args: Record<string, string> = {}
	for (const pair of pairs) {
		const eqIdx = pair.indexOf('=')
		if (eqIdx <= 0) throw new Error(`Invalid --arg "${pair}", expected key=value`)
		const key = pair.slice(0, eqIdx).trim()
		const value = pair.slice(eqIdx + 1).trim()
		args[key] = value
	}
	return args
}

export function registerCallCommand(program: Command): void {
	program
		.command('call <tool>')
		.description('Invoke one tool through the adapter and print its result')
		.option('-a, --arg <key=value>', 'tool argument (repeatable)', collect, [])
		.option('-c, --cutoff <date>', 'cutoff date (YYYY-MM-DD) the host would inject')
		.action(async (tool: string, cmdOpts: { arg: string[]; cutoff?: string }) => {
			const opts = program.opts<GlobalOptions>()
			const spec = getOperation(tool)
			if (!spec) {
				throw new Error(`Unknown tool "${tool}". Run: pitmd tools`)
			}

			const args = parseArgPairs(cmdOpts.arg)
			if (cmdOpts.cutoff) args.cutoff_date = cmdOpts.cutoff

			const outcome = await invokeOutcome(tool, args)
			console.log(renderOutcome(spec, outcome))

			if (opts.verbose) {
				const detail: Record<string, string | undefined> = { outcome: outcome.kind }
				if (outcome.kind !== 'invalid-args') detail.url = outcome.url
				if (outcome.kind === 'upstream-error' || outcome.kind === 'invalid-args') {
					detail.reason = outcome.reason
				}
				console.error(`\n${formatKeyValue(detail, opts.format)}`)
			}
		})
}
