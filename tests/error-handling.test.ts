import { afterEach, beforeAll, beforeEach, describe, expect, it, vi } from 'vitest'
import { invoke, invokeOutcome } from '../src/core/adapter.js'
import type { PitConfig } from '../src/core/config.js'
import { UpstreamError } from '../src/core/errors.js'
import { requestUpstream, upstreamGet } from '../src/core/http.js'
import { registerAllOperations } from '../src/operations/registry.js'
import { stubFetch } from './helpers.js'

const config: PitConfig = { apiKey: 'test-key' }

const NOT_FOUND: Record<string, string> = {
	get_income_statements: 'Unable to fetch income statements or no income statements found.',
	get_balance_sheets: 'Unable to fetch balance sheets or no balance sheets found.',
	get_cash_flow_statements: 'Unable to fetch cash flow statements or no cash flow statements found.',
	get_historical_stock_prices: 'Unable to fetch prices or no prices found.',
	get_company_news: 'Unable to fetch news or no news found.',
	get_available_crypto_tickers:
		'Unable to fetch available crypto tickers or no available crypto tickers found.',
	get_crypto_prices: 'Unable to fetch prices or no prices found.',
	get_historical_crypto_prices: 'Unable to fetch prices or no prices found.',
}

const VALID_ARGS: Record<string, Record<string, unknown>> = {
	get_income_statements: { ticker: 'AAPL' },
	get_balance_sheets: { ticker: 'AAPL' },
	get_cash_flow_statements: { ticker: 'AAPL' },
	get_historical_stock_prices: { ticker: 'AAPL', start_date: '2023-01-01', end_date: '2023-02-01' },
	get_company_news: { ticker: 'AAPL' },
	get_available_crypto_tickers: {},
	get_crypto_prices: { ticker: 'BTC-USD', start_date: '2023-01-01', end_date: '2023-02-01' },
	get_historical_crypto_prices: {
		ticker: 'BTC-USD',
		start_date: '2023-01-01',
		end_date: '2023-02-01',
	},
}

const ENVELOPE: Record<string, string> = {
	get_income_statements: 'income_statements',
	get_balance_sheets: 'balance_sheets',
	get_cash_flow_statements: 'cash_flow_statements',
	get_historical_stock_prices: 'prices',
	get_company_news: 'news',
	get_available_crypto_tickers: 'tickers',
	get_crypto_prices: 'prices',
	get_historical_crypto_prices: 'prices',
}

const names = Object.keys(NOT_FOUND)
const argsFor = (name: string) => ({ ...VALID_ARGS[name], cutoff_date: '2024-01-01' })

beforeAll(() => {
	registerAllOperations()
})

beforeEach(() => {
	// warn-level logs go to stderr; keep test output clean
	vi.spyOn(console, 'error').mockImplementation(() => {})
})

afterEach(() => {
	vi.unstubAllGlobals()
	vi.restoreAllMocks()
})

// ─── Not-found rendering ─────────────────────────────────────────────────────

describe('not-found string for every operation', () => {
	it.each(names)('%s: HTTP 500 yields the not-found string', async (name) => {
		stubFetch({ error: 'internal' }, 500)
		expect(await invoke(name, argsFor(name), { config })).toBe(NOT_FOUND[name])
	})

	it.each(names)('%s: an empty envelope array yields the not-found string', async (name) => {
		stubFetch({ [ENVELOPE[name]]: [] })
		expect(await invoke(name, argsFor(name), { config })).toBe(NOT_FOUND[name])
	})

	it.each(names)('%s: a transport failure yields the same string', async (name) => {
		vi.stubGlobal(
			'fetch',
			vi.fn(async () => {
				throw new TypeError('fetch failed')
			}),
		)
		expect(await invoke(name, argsFor(name), { config })).toBe(NOT_FOUND[name])
	})
})

describe('degraded responses', () => {
	it('treats a missing envelope field as not found', async () => {
		stubFetch({ something_else: [1, 2] })
		const outcome = await invokeOutcome('get_company_news', argsFor('get_company_news'), { config })
		expect(outcome.kind).toBe('not-found')
	})

	it('treats a null envelope field as not found', async () => {
		stubFetch({ news: null })
		expect(await invoke('get_company_news', argsFor('get_company_news'), { config })).toBe(
			NOT_FOUND.get_company_news,
		)
	})

	it('treats an undecodable body as an upstream error', async () => {
		stubFetch('<html>gateway</html>')
		const outcome = await invokeOutcome('get_balance_sheets', argsFor('get_balance_sheets'), {
			config,
		})
		expect(outcome.kind).toBe('upstream-error')
		expect(await invoke('get_balance_sheets', argsFor('get_balance_sheets'), { config })).toBe(
			NOT_FOUND.get_balance_sheets,
		)
	})

	it('records the status of a rejected request', async () => {
		stubFetch({ error: 'Invalid API key' }, 401)
		const outcome = await invokeOutcome(
			'get_income_statements',
			argsFor('get_income_statements'),
			{ config },
		)
		expect(outcome).toEqual({
			kind: 'upstream-error',
			url: 'https://api.financialdatasets.ai/financials/income-statements/?ticker=AAPL&period=annual&limit=4&report_period_lte=2024-01-01',
			reason: 'upstream error 401: {"error":"Invalid API key"}',
			status: 401,
		})
	})
})

// ─── Invalid arguments ───────────────────────────────────────────────────────

describe('invalid arguments', () => {
	it('never calls upstream when a required argument is missing', async () => {
		const fetchMock = stubFetch({ prices: [{ close: 1 }] })
		const result = await invoke(
			'get_historical_stock_prices',
			{ ticker: 'AAPL', cutoff_date: '2024-01-01' },
			{ config },
		)
		expect(result).toBe(NOT_FOUND.get_historical_stock_prices)
		expect(fetchMock).not.toHaveBeenCalled()
	})

	it('refuses a cutoff that is not a calendar date', async () => {
		const fetchMock = stubFetch({ news: [{ title: 'x' }] })
		const outcome = await invokeOutcome(
			'get_company_news',
			{ ticker: 'AAPL', cutoff_date: '2023-13-01' },
			{ config },
		)
		expect(outcome.kind).toBe('invalid-args')
		expect(fetchMock).not.toHaveBeenCalled()
	})

	it('leaves unsupported values such as an unknown period to the upstream', async () => {
		const fetchMock = stubFetch({ error: 'bad period' }, 400)
		const result = await invoke(
			'get_income_statements',
			{ ticker: 'AAPL', period: 'weekly', cutoff_date: '2024-01-01' },
			{ config },
		)
		expect(fetchMock).toHaveBeenCalledTimes(1)
		expect(result).toBe(NOT_FOUND.get_income_statements)
	})
})

// ─── Configuration ───────────────────────────────────────────────────────────

describe('unusable base URL', () => {
	it('resolves to the not-found text instead of rejecting', async () => {
		const fetchMock = stubFetch({ news: [{ title: 'x' }] })
		const result = await invoke(
			'get_company_news',
			{ ticker: 'AAPL', cutoff_date: '2024-01-01' },
			{ config: { apiKey: 'test-key', baseUrl: 'api.example.test' } },
		)
		expect(result).toBe(NOT_FOUND.get_company_news)
		expect(fetchMock).not.toHaveBeenCalled()
	})

	it('reports the base URL in the outcome', async () => {
		stubFetch({ news: [] })
		const outcome = await invokeOutcome(
			'get_company_news',
			{ ticker: 'AAPL', cutoff_date: '2024-01-01' },
			{ config: { baseUrl: 'api.example.test' } },
		)
		expect(outcome).toMatchObject({ kind: 'upstream-error', url: 'api.example.test' })
	})
})

// ─── Timeouts and cancellation ───────────────────────────────────────────────

// Never settles until its signal aborts
function hangingFetch() {
	return vi.fn(
		(_input: string | URL | Request, init?: RequestInit) =>
			new Promise<Response>((_resolve, reject) => {
				if (init?.signal?.aborted) reject(new DOMException('aborted', 'AbortError'))
				init?.signal?.addEventListener('abort', () => reject(new DOMException('aborted', 'AbortError')))
			}),
	)
}

describe('timeouts and cancellation', () => {
	it('degrades to not found when the request times out', async () => {
		vi.stubGlobal('fetch', hangingFetch())
		const outcome = await invokeOutcome('get_company_news', argsFor('get_company_news'), {
			config: { ...config, timeoutMs: 20 },
		})
		expect(outcome).toMatchObject({ kind: 'upstream-error', reason: 'request timed out after 20ms' })
	})

	it('aborts the outstanding request when the host cancels', async () => {
		const fetchMock = hangingFetch()
		vi.stubGlobal('fetch', fetchMock)
		const controller = new AbortController()

		const pending = invoke('get_company_news', argsFor('get_company_news'), {
			config,
			signal: controller.signal,
		})
		controller.abort()

		expect(await pending).toBe(NOT_FOUND.get_company_news)
		expect(fetchMock.mock.calls[0][1]?.signal?.aborted).toBe(true)
	})

	it('does not start a request for an already cancelled call', async () => {
		const fetchMock = hangingFetch()
		vi.stubGlobal('fetch', fetchMock)
		const controller = new AbortController()
		controller.abort()

		const response = await requestUpstream('https://example.test/news/', {
			timeoutMs: 1_000,
			signal: controller.signal,
		})
		expect(response).toEqual({ kind: 'upstream-error', reason: 'request cancelled' })
		expect(fetchMock).not.toHaveBeenCalled()
	})
})

describe('http: upstreamGet', () => {
	it('throws UpstreamError with the status for non-2xx responses', async () => {
		stubFetch('rate limited', 429)
		const err = await upstreamGet('https://example.test/prices/', { timeoutMs: 1_000 }).catch(
			(e: unknown) => e,
		)
		expect(err).toBeInstanceOf(UpstreamError)
		expect(err).toMatchObject({ status: 429, url: 'https://example.test/prices/' })
	})
})
