import type { InvocationArgs } from '../types.js'
import { statementShape } from './schemas.js'
import type { OperationName, OperationSpec, QueryValue } from './types.js'

// Statements are filtered server-side on report period
function statementQuery(args: InvocationArgs): [string, QueryValue][] {
	return [
		['ticker', args.ticker],
		['period', args.period],
		['limit', args.limit],
		['report_period_lte', args.cutoff_date],
	]
}

function statement(
	name: OperationName,
	resource: string,
	envelope: string,
	label: string,
	description: string,
): OperationSpec {
	return {
		name,
		title: `Get ${label}`,
		description,
		path: `/financials/${resource}/`,
		inputShape: statementShape(),
		cutoff: 'report-period-lte',
		query: statementQuery,
		envelope,
		notFound: `Unable to fetch ${label} or no ${label} found.`,
	}
}

export const incomeStatements = statement(
	'get_income_statements',
	'income-statements',
	'income_statements',
	'income statements',
	'Get historical income statements for a company. Returns a JSON array with fields like revenue, net_income, operating_income and earnings_per_share.',
)

export const balanceSheets = statement(
	'get_balance_sheets',
	'balance-sheets',
	'balance_sheets',
	'balance sheets',
	'Get historical balance sheets for a company. Returns a JSON array with fields like total_assets, cash_and_equivalents, total_debt and shareholders_equity.',
)

export const cashFlowStatements = statement(
	'get_cash_flow_statements',
	'cash-flow-statements',
	'cash_flow_statements',
	'cash flow statements',
	'Get historical cash flow statements for a company. Returns a JSON array with fields like net_cash_flow_from_operations, capital_expenditure and free_cash_flow.',
)
