import type { InvocationArgs } from '../types.js'
import { cryptoTicker, priceRangeShape, stockTicker } from './schemas.js'
import type { OperationSpec, QueryValue } from './types.js'

const PRICES_NOT_FOUND = 'Unable to fetch prices or no prices found.'

/** Shared by stock and crypto price queries; `end_date` has already been clamped. */
function priceQuery(args: InvocationArgs): [string, QueryValue][] {
	return [
		['ticker', args.ticker],
		['interval', args.interval],
		['interval_multiplier', args.interval_multiplier],
		['start_date', args.start_date],
		['end_date', args.end_date],
	]
}

export const historicalStockPrices: OperationSpec = {
	name: 'get_historical_stock_prices',
	title: 'Get historical stock prices',
	description:
		'Get historical OHLCV (open, high, low, close, volume) stock prices for a date range at a given interval. Use it to analyze trends, compute returns or build technical indicators.',
	path: '/prices/',
	inputShape: priceRangeShape(stockTicker),
	cutoff: 'clamp-end-date',
	query: priceQuery,
	envelope: 'prices',
	notFound: PRICES_NOT_FOUND,
}

const cryptoPriceDescription =
	'Get historical OHLCV (open, high, low, close, volume) cryptocurrency prices for a date range at a given interval. Use get_available_crypto_tickers to see which tickers can be queried.'

export const cryptoPrices: OperationSpec = {
	name: 'get_crypto_prices',
	title: 'Get crypto prices',
	description: cryptoPriceDescription,
	path: '/crypto/prices/',
	inputShape: priceRangeShape(cryptoTicker),
	cutoff: 'clamp-end-date',
	query: priceQuery,
	envelope: 'prices',
	notFound: PRICES_NOT_FOUND,
}

export const historicalCryptoPrices: OperationSpec = {
	...cryptoPrices,
	name: 'get_historical_crypto_prices',
	title: 'Get historical crypto prices',
	description: `${cryptoPriceDescription} Identical to get_crypto_prices; use either one.`,
}
