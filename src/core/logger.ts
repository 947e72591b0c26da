import type { LogLevel } from '../types.js'

const RANK: Record<LogLevel, number> = {
	debug: 10,
	info: 20,
	warn: 30,
	error: 40,
}

let threshold: LogLevel = 'warn'

export function setLogLevel(level: LogLevel): void {
	threshold = level
}

export function getLogLevel(): LogLevel {
	return threshold
}

export interface Logger {
	debug(message: string): void
	info(message: string): void
	warn(message: string): void
	error(message: string): void
}

// stdout belongs to the JSON-RPC stream, so every level goes to stderr
function write(level: LogLevel, component: string, message: string): void {
	if (RANK[level] < RANK[threshold]) return
	console.error(`[pitmd] ${level} ${component}: ${message}`)
}

export function createLogger(component: string): Logger {
	return {
		debug: (message) => write('debug', component, message),
		info: (message) => write('info', component, message),
		warn: (message) => write('warn', component, message),
		error: (message) => write('error', component, message),
	}
}
