import { stockTicker } from './schemas.js'
import type { OperationSpec } from './types.js'

const NEWS_LIMIT = 20

export const companyNews: OperationSpec = {
	name: 'get_company_news',
	title: 'Get company news',
	description:
		`Get up to ${NEWS_LIMIT} recent news articles about a company, ` +
		'with title, url, date, author, source and sentiment.',
	path: '/news/',
	inputShape: { ticker: stockTicker },
	cutoff: 'news-end-date',
	query: (args) => [
		['limit', NEWS_LIMIT],
		['end_date', args.cutoff_date],
		['ticker', args.ticker],
	],
	envelope: 'news',
	notFound: 'Unable to fetch news or no news found.',
}
