import { createLogger } from "@tickercast/core";
import type { ProviderName } from "@tickercast/core";
import {
	CcxtSeriesProvider,
	createCcxtExchange,
} from "./ccxtSeriesProvider";
import type { SeriesProvider } from "./types";
import { YahooSeriesProvider } from "./yahooSeriesProvider";

export interface SeriesProviderSelection {
	provider: ProviderName;
	exchange: string;
}

export const createSeriesProvider = (
	selection: SeriesProviderSelection
): SeriesProvider => {
	const logger = createLogger("data");
	switch (selection.provider) {
		case "yahoo":
			return new YahooSeriesProvider({ logger });
		case "ccxt":
			return new CcxtSeriesProvider({
				client: createCcxtExchange(selection.exchange),
				exchangeId: selection.exchange.toLowerCase(),
				logger,
			});
	}
};
