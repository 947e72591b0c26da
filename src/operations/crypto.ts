import type { OperationSpec } from './types.js'

export const availableCryptoTickers: OperationSpec = {
	name: 'get_available_crypto_tickers',
	title: 'Get available crypto tickers',
	description:
		'List every cryptocurrency ticker (e.g. BTC-USD, ETH-USD, SOL-USD) that can be queried for price data.',
	path: '/crypto/prices/tickers',
	inputShape: {},
	cutoff: 'none',
	query: () => [],
	envelope: 'tickers',
	notFound: 'Unable to fetch available crypto tickers or no available crypto tickers found.',
}
