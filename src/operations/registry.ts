import { registerOperation } from '../core/registry.js'
import { availableCryptoTickers } from './crypto.js'
import { balanceSheets, cashFlowStatements, incomeStatements } from './financials.js'
import { companyNews } from './news.js'
import { cryptoPrices, historicalCryptoPrices, historicalStockPrices } from './prices.js'

export function registerAllOperations(): void {
	registerOperation(incomeStatements)
	registerOperation(balanceSheets)
	registerOperation(cashFlowStatements)
	registerOperation(historicalStockPrices)
	registerOperation(companyNews)
	registerOperation(availableCryptoTickers)
	registerOperation(cryptoPrices)
	registerOperation(historicalCryptoPrices)
}
