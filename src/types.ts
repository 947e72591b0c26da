export type OutputFormat = 'markdown' | 'json' | 'plain'

export interface GlobalOptions {
	format: OutputFormat
	verbose: boolean
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

/** Arguments after defaults are applied. `cutoff_date` is always present. */
export interface InvocationArgs {
	cutoff_date: string
	ticker?: string
	start_date?: string
	end_date?: string
	interval?: string
	interval_multiplier?: number
	period?: string
	limit?: number
}

export type UpstreamResponse =
	| { kind: 'data'; body: unknown }
	| { kind: 'upstream-error'; reason: string; status?: number }

export type ToolOutcome =
	| { kind: 'data'; value: unknown; url: string }
	| { kind: 'not-found'; url: string }
	| { kind: 'upstream-error'; url: string; reason: string; status?: number }
	| { kind: 'invalid-args'; reason: string }
