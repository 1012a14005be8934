export * from "./types";
export { normalizeSeries } from "./normalizeSeries";
export type { NormalizeSeriesResult } from "./normalizeSeries";
export { YahooSeriesProvider, readYahooChart } from "./yahooSeriesProvider";
export type { YahooSeriesProviderOptions } from "./yahooSeriesProvider";
export {
	CCXT_EXCHANGE_IDS,
	CcxtSeriesProvider,
	createCcxtExchange,
	isCcxtExchangeId,
} from "./ccxtSeriesProvider";
export type {
	CcxtExchangeId,
	CcxtSeriesProviderOptions,
	OhlcvClient,
} from "./ccxtSeriesProvider";
export { createSeriesProvider } from "./createSeriesProvider";
export type { SeriesProviderSelection } from "./createSeriesProvider";
export { mapCcxtRowToPricePoint } from "./utils/ccxtMapper";
