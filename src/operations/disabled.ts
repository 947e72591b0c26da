import type { DisabledOperation } from './types.js'

/**
 * Tools the upstream API offers that cannot honour a cutoff date. They are
 * never registered with the server and `invoke` treats them as unknown.
 */
export const DISABLED_OPERATIONS: readonly DisabledOperation[] = [
	{
		name: 'get_current_stock_price',
		path: '/prices/snapshot/',
		reason: 'Returns the latest price, which is always after any historical cutoff.',
		alternative: 'get_historical_stock_prices with start_date and end_date set to the cutoff',
	},
	{
		name: 'get_current_crypto_price',
		path: '/crypto/prices/snapshot/',
		reason: 'Returns the latest price, which is always after any historical cutoff.',
		alternative: 'get_crypto_prices with start_date and end_date set to the cutoff',
	},
	{
		name: 'get_sec_filings',
		path: '/filings/',
		reason:
			'Filings carry only the fiscal report date, not the date they became public, so a filing published after the cutoff cannot be excluded.',
	},
]

export function isDisabledOperation(name: string): boolean {
	return DISABLED_OPERATIONS.some((op) => op.name === name)
}
