import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs'
import { homedir } from 'node:os'
import { join, resolve } from 'node:path'
import type { LogLevel } from '../types.js'
import { isIsoDate } from './cutoff.js'
import { errorMessage } from './errors.js'

// Load .env file if present (minimal dotenv, existing vars win)
function loadEnvFile(): void {
	const envPath = resolve(process.cwd(), '.env')
	if (!existsSync(envPath)) return
	let content: string
	try {
		content = readFileSync(envPath, 'utf-8')
	} catch (err) {
		console.error(`[pitmd] config: could not read ${envPath}: ${errorMessage(err)}`)
		return
	}
	for (const line of content.split('\n')) {
		const trimmed = line.trim()
		if (!trimmed || trimmed.startsWith('#')) continue
		const eqIdx = trimmed.indexOf('=')
		if (eqIdx === -1) continue
		const key = trimmed.slice(0, eqIdx).trim()
		let val = trimmed.slice(eqIdx + 1).trim()
		if (
			(val.startsWith('"') && val.endsWith('"')) ||
			(val.startsWith("'") && val.endsWith("'"))
		) {
			val = val.slice(1, -1)
		}
		if (process.env[key] === undefined) {
			process.env[key] = val
		}
	}
}

loadEnvFile()

export const DEFAULT_BASE_URL = 'https://api.financialdatasets.ai'
export const DEFAULT_TIMEOUT_MS = 30_000

export interface PitConfig {
	apiKey?: string
	baseUrl?: string
	timeoutMs?: number
	cutoffDate?: string
	logLevel?: LogLevel
	disabledTools?: string[]
}

export const CONFIG_KEYS = [
	'apiKey',
	'baseUrl',
	'timeoutMs',
	'cutoffDate',
	'logLevel',
	'disabledTools',
] as const

export type ConfigKey = (typeof CONFIG_KEYS)[number]

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error']

const CONFIG_DIR = join(homedir(), '.pitmd')
const CONFIG_FILE = join(CONFIG_DIR, 'config.json')

let cached: PitConfig | null = null

export function isConfigKey(key: string): key is ConfigKey {
	return (CONFIG_KEYS as readonly string[]).includes(key)
}

export function parseLogLevel(value: string | undefined): LogLevel | undefined {
	if (value === undefined) return undefined
	const lower = value.trim().toLowerCase()
	return LOG_LEVELS.find((l) => l === lower)
}

function parseTimeout(value: unknown): number | undefined {
	const n = typeof value === 'string' ? Number(value) : value
	if (typeof n !== 'number' || !Number.isFinite(n) || n <= 0) return undefined
	return Math.floor(n)
}

/** An absolute http(s) URL the request paths can be appended to. */
export function isBaseUrl(value: string): boolean {
	try {
		const { protocol } = new URL(value)
		return protocol === 'http:' || protocol === 'https:'
	} catch {
		return false
	}
}

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === 'object' && value !== null && !Array.isArray(value)
}

// Keep only well-typed fields from a parsed config file
function sanitize(raw: unknown): PitConfig {
	if (!isRecord(raw)) return {}
	const out: PitConfig = {}
	if (typeof raw.apiKey === 'string' && raw.apiKey) out.apiKey = raw.apiKey
	if (typeof raw.baseUrl === 'string' && isBaseUrl(raw.baseUrl)) out.baseUrl = raw.baseUrl
	const timeout = parseTimeout(raw.timeoutMs)
	if (timeout !== undefined) out.timeoutMs = timeout
	if (typeof raw.cutoffDate === 'string' && raw.cutoffDate) out.cutoffDate = raw.cutoffDate
	const level = typeof raw.logLevel === 'string' ? parseLogLevel(raw.logLevel) : undefined
	if (level) out.logLevel = level
	if (Array.isArray(raw.disabledTools)) {
		out.disabledTools = raw.disabledTools.filter((t): t is string => typeof t === 'string')
	}
	return out
}

function parseBaseUrl(value: string | undefined): string | undefined {
	if (!value) return undefined
	if (isBaseUrl(value)) return value
	console.error(
		`[pitmd] config: ignoring FINANCIAL_DATASETS_BASE_URL "${value}", not an http(s) URL`,
	)
	return undefined
}

function readConfigFile(): PitConfig {
	if (!existsSync(CONFIG_FILE)) return {}
	try {
		return sanitize(JSON.parse(readFileSync(CONFIG_FILE, 'utf-8')))
	} catch (err) {
		console.error(`[pitmd] config: ignoring malformed ${CONFIG_FILE}: ${errorMessage(err)}`)
		return {}
	}
}

export function loadConfig(): PitConfig {
	if (cached) return cached

	// Env vars take priority over the file
	const env = process.env
	const fromEnv: PitConfig = {
		apiKey: env.FINANCIAL_DATASETS_API_KEY || undefined,
		baseUrl: parseBaseUrl(env.FINANCIAL_DATASETS_BASE_URL),
		timeoutMs: parseTimeout(env.PITMD_TIMEOUT_MS),
		cutoffDate: env.PITMD_CUTOFF_DATE || undefined,
		logLevel: parseLogLevel(env.PITMD_LOG_LEVEL),
	}

	cached = {
		...readConfigFile(),
		...(fromEnv.apiKey && { apiKey: fromEnv.apiKey }),
		...(fromEnv.baseUrl && { baseUrl: fromEnv.baseUrl }),
		...(fromEnv.timeoutMs !== undefined && { timeoutMs: fromEnv.timeoutMs }),
		...(fromEnv.cutoffDate && { cutoffDate: fromEnv.cutoffDate }),
		...(fromEnv.logLevel && { logLevel: fromEnv.logLevel }),
	}

	return cached
}

export function saveConfig(config: Partial<PitConfig>): void {
	const merged = { ...readConfigFile(), ...config }

	if (!existsSync(CONFIG_DIR)) {
		mkdirSync(CONFIG_DIR, { recursive: true })
	}
	writeFileSync(CONFIG_FILE, JSON.stringify(merged, null, 2), { mode: 0o600 })
	cached = null
}

/**
 * Coerces a CLI string into the typed value stored for `key`.
 * Throws when the value cannot be stored.
 */
export function parseConfigValue(key: ConfigKey, value: string): Partial<PitConfig> {
	switch (key) {
		case 'timeoutMs': {
			const timeout = parseTimeout(value)
			if (timeout === undefined) {
				throw new Error(`timeoutMs must be a positive number, got "${value}"`)
			}
			return { timeoutMs: timeout }
		}
		case 'logLevel': {
			const level = parseLogLevel(value)
			if (!level) throw new Error(`logLevel must be one of ${LOG_LEVELS.join(', ')}`)
			return { logLevel: level }
		}
		case 'disabledTools':
			return {
				disabledTools: value
					.split(',')
					.map((t) => t.trim())
					.filter(Boolean),
			}
		case 'cutoffDate':
			if (!isIsoDate(value)) {
				throw new Error(`cutoffDate must be a YYYY-MM-DD date, got "${value}"`)
			}
			return { cutoffDate: value }
		case 'apiKey':
			return { apiKey: value }
		case 'baseUrl':
			if (!isBaseUrl(value)) throw new Error(`baseUrl must be an http(s) URL, got "${value}"`)
			return { baseUrl: value }
	}
}

export function resetConfigCache(): void {
	cached = null
}

export function getConfigPath(): string {
	return CONFIG_FILE
}
