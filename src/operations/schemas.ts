import { z } from 'zod'
import { isIsoDate } from '../core/cutoff.js'

export const cutoffDateSchema = z
	.string()
	.refine(isIsoDate, 'cutoff_date must be a YYYY-MM-DD date')

export const stockTicker = z
	.string()
	.min(1)
	.describe('Stock ticker symbol (e.g. AAPL for Apple, TSLA for Tesla, NVDA for Nvidia)')

export const cryptoTicker = z
	.string()
	.min(1)
	.describe(
		'Cryptocurrency ticker symbol (e.g. BTC-USD for Bitcoin, ETH-USD for Ethereum, SOL-USD for Solana)',
	)

export function statementShape() {
	return {
		ticker: stockTicker,
		period: z
			.string()
			.default('annual')
			.describe(
				'"annual" for yearly data, "quarterly" for Q1-Q4, "ttm" for trailing twelve months',
			),
		limit: z.coerce
			.number()
			.int()
			.default(4)
			.describe('Number of historical periods to return (default: 4)'),
	}
}

export function priceRangeShape(ticker: z.ZodString) {
	return {
		ticker,
		start_date: z.string().describe('Start date in YYYY-MM-DD format (e.g. 2020-01-01)'),
		end_date: z.string().describe('End date in YYYY-MM-DD format (e.g. 2020-12-31)'),
		interval: z
			.string()
			.default('day')
			.describe('Time interval: "minute", "hour", "day", "week", or "month"'),
		interval_multiplier: z.coerce
			.number()
			.int()
			.default(1)
			.describe('Multiplies the interval (5 with "minute" = every 5 minutes)'),
	}
}

/** Every argument any operation takes, after its own schema has applied defaults. */
export const invocationArgsSchema = z.object({
	cutoff_date: cutoffDateSchema,
	ticker: z.string().optional(),
	start_date: z.string().optional(),
	end_date: z.string().optional(),
	interval: z.string().optional(),
	interval_multiplier: z.number().optional(),
	period: z.string().optional(),
	limit: z.number().optional(),
})

/** For operations that ignore the cutoff: any string is carried through unchecked. */
export const uncheckedCutoffArgsSchema = invocationArgsSchema.extend({
	cutoff_date: z.string(),
})
