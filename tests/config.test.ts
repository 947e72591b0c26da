import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import {
	isBaseUrl,
	isConfigKey,
	loadConfig,
	parseConfigValue,
	parseLogLevel,
	resetConfigCache,
} from '../src/core/config.js'

const ENV_KEYS = [
	'FINANCIAL_DATASETS_API_KEY',
	'FINANCIAL_DATASETS_BASE_URL',
	'PITMD_TIMEOUT_MS',
	'PITMD_CUTOFF_DATE',
	'PITMD_LOG_LEVEL',
]

describe('config: environment', () => {
	const saved: Record<string, string | undefined> = {}

	beforeEach(() => {
		for (const key of ENV_KEYS) saved[key] = process.env[key]
		resetConfigCache()
	})

	afterEach(() => {
		for (const key of ENV_KEYS) {
			if (saved[key] === undefined) delete process.env[key]
			else process.env[key] = saved[key]
		}
		resetConfigCache()
	})

	it('reads the API key and settings from env vars', () => {
		process.env.FINANCIAL_DATASETS_API_KEY = 'test-key'
		process.env.FINANCIAL_DATASETS_BASE_URL = 'http://localhost:9999'
		process.env.PITMD_TIMEOUT_MS = '1500'
		process.env.PITMD_CUTOFF_DATE = '2023-06-30'
		process.env.PITMD_LOG_LEVEL = 'DEBUG'

		const config = loadConfig()
		expect(config.apiKey).toBe('test-key')
		expect(config.baseUrl).toBe('http://localhost:9999')
		expect(config.timeoutMs).toBe(1500)
		expect(config.cutoffDate).toBe('2023-06-30')
		expect(config.logLevel).toBe('debug')
	})

	it('ignores a base URL override without an http(s) scheme', () => {
		const stderr = vi.spyOn(console, 'error').mockImplementation(() => {})
		process.env.FINANCIAL_DATASETS_BASE_URL = 'api.example.test'

		expect(loadConfig().baseUrl).toBeUndefined()
		expect(stderr).toHaveBeenCalledWith(
			'[pitmd] config: ignoring FINANCIAL_DATASETS_BASE_URL "api.example.test", not an http(s) URL',
		)
		stderr.mockRestore()
	})

	it('caches until reset', () => {
		process.env.PITMD_TIMEOUT_MS = '1000'
		expect(loadConfig().timeoutMs).toBe(1000)
		process.env.PITMD_TIMEOUT_MS = '2000'
		expect(loadConfig().timeoutMs).toBe(1000)
		resetConfigCache()
		expect(loadConfig().timeoutMs).toBe(2000)
	})
})

describe('config: values', () => {
	it('recognises config keys', () => {
		expect(isConfigKey('apiKey')).toBe(true)
		expect(isConfigKey('fredApiKey')).toBe(false)
	})

	it('parses log levels case-insensitively', () => {
		expect(parseLogLevel(' Warn ')).toBe('warn')
		expect(parseLogLevel('verbose')).toBeUndefined()
		expect(parseLogLevel(undefined)).toBeUndefined()
	})

	it('coerces CLI strings into typed values', () => {
		expect(parseConfigValue('timeoutMs', '45000')).toEqual({ timeoutMs: 45000 })
		expect(parseConfigValue('disabledTools', 'get_company_news, get_crypto_prices,')).toEqual({
			disabledTools: ['get_company_news', 'get_crypto_prices'],
		})
		expect(parseConfigValue('cutoffDate', '2024-02-29')).toEqual({ cutoffDate: '2024-02-29' })
		expect(parseConfigValue('apiKey', 'test-key')).toEqual({ apiKey: 'test-key' })
		expect(parseConfigValue('baseUrl', 'http://localhost:8080')).toEqual({
			baseUrl: 'http://localhost:8080',
		})
	})

	it('accepts only absolute http(s) base URLs', () => {
		expect(isBaseUrl('https://api.example.test')).toBe(true)
		expect(isBaseUrl('http://localhost:8080/v1')).toBe(true)
		expect(isBaseUrl('api.example.test')).toBe(false)
		expect(isBaseUrl('ftp://api.example.test')).toBe(false)
		expect(isBaseUrl('')).toBe(false)
	})

	it('rejects values that cannot be stored', () => {
		expect(() => parseConfigValue('timeoutMs', 'soon')).toThrow(
			'timeoutMs must be a positive number',
		)
		expect(() => parseConfigValue('cutoffDate', '2023-02-30')).toThrow(
			'cutoffDate must be a YYYY-MM-DD date',
		)
		expect(() => parseConfigValue('logLevel', 'loud')).toThrow(
			'logLevel must be one of debug, info, warn, error',
		)
		expect(() => parseConfigValue('baseUrl', 'api.example.test')).toThrow(
			'baseUrl must be an http(s) URL, got "api.example.test"',
		)
	})
})
