export type {
	GlobalOptions,
	InvocationArgs,
	LogLevel,
	OutputFormat,
	ToolOutcome,
	UpstreamResponse,
} from './types.js'

export type {
	CutoffStrategy,
	DisabledOperation,
	DisabledOperationName,
	OperationName,
	OperationSpec,
} from './operations/types.js'

export {
	invoke,
	invokeOutcome,
	buildUrl,
	renderOutcome,
	type InvokeOptions,
} from './core/adapter.js'
export { clampEndDate, isIsoDate, resolveCutoff } from './core/cutoff.js'
export { type Clock, systemClock } from './core/clock.js'
export { loadConfig, saveConfig, getConfigPath, type PitConfig } from './core/config.js'
export { UpstreamError } from './core/errors.js'
export {
	registerOperation,
	getOperation,
	getOperations,
	getExposedOperations,
} from './core/registry.js'
export { registerAllOperations } from './operations/registry.js'
export { DISABLED_OPERATIONS } from './operations/disabled.js'
export { createServer, startStdioServer, SERVER_NAME } from './server.js'
export * as formatter from './core/formatter.js'
