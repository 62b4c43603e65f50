export type { PriceSource } from './price-source.js';
export { YahooFinancePriceSource, type FetchFn, type YahooFinanceOptions } from './yahoo-finance.source.js';
export { StaticPriceSource } from './static.source.js';
