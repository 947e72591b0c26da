import type { ZodRawShape } from 'zod'
import type { InvocationArgs } from '../types.js'

export type OperationName =
	| 'get_income_statements'
	| 'get_balance_sheets'
	| 'get_cash_flow_statements'
	| 'get_historical_stock_prices'
	| 'get_company_news'
	| 'get_available_crypto_tickers'
	| 'get_crypto_prices'
	| 'get_historical_crypto_prices'

export type DisabledOperationName =
	| 'get_current_stock_price'
	| 'get_current_crypto_price'
	| 'get_sec_filings'

/**
 * How an operation keeps records dated after the cutoff out of its response.
 *
 * - `clamp-end-date`: the caller's `end_date` is lowered to the cutoff before the URL is built
 * - `report-period-lte`: the cutoff is sent as `report_period_lte`
 * - `news-end-date`: the cutoff is sent as the upstream `end_date`
 * - `none`: the data has no time dimension
 */
export type CutoffStrategy = 'clamp-end-date' | 'report-period-lte' | 'news-end-date' | 'none'

export type QueryValue = string | number | undefined

export interface OperationSpec {
	name: OperationName
	title: string
	description: string
	/** Path under the base URL, trailing slash included where the API expects one. */
	path: string
	/** Caller-facing arguments. `cutoff_date` is never part of this shape. */
	inputShape: ZodRawShape
	cutoff: CutoffStrategy
	/** Ordered query parameters; undefined values are left out. */
	query(args: InvocationArgs): [string, QueryValue][]
	envelope: string
	notFound: string
}

export interface DisabledOperation {
	name: DisabledOperationName
	path: string
	reason: string
	alternative?: string
}
